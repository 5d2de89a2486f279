import type { SourceDocument } from "../document/tree.js";
import { PayloadParseError } from "../pipeline/errors.js";
import { decodeChartPayload, DEFAULT_HOVER_FIELDS } from "./payload-decoders.js";
import { decodePayload, findPayloads, type PayloadSite } from "./payloads.js";
import { isExcludedGroup, resolveGroup } from "./sections.js";
import type { ExtractionItem, ExtractionOptions } from "./types.js";

export function extractPlotRecords(
  document: SourceDocument,
  options: ExtractionOptions = {}
): Iterable<ExtractionItem> {
  return {
    [Symbol.iterator]: () => scanPlots(document, options),
  };
}

function* scanPlots(document: SourceDocument, options: ExtractionOptions): Generator<ExtractionItem> {
  for (const site of findPayloads(document)) {
    const group = resolveGroup(site.visit);
    let decoded: ReturnType<typeof decodeChartPayload>;
    try {
      decoded = decodeChartPayload(decodePayload(site), {
        elementId: site.elementId,
        contextTitle: site.contextTitle,
        hoverFields: options.hoverFields ?? DEFAULT_HOVER_FIELDS,
      });
    } catch (error) {
      if (!(error instanceof PayloadParseError)) {
        throw error;
      }
      yield {
        kind: "warning",
        warning: {
          kind: "payload-parse-error",
          elementId: site.elementId,
          groupId: group.id,
          message: error.message,
        },
      };
      continue;
    }

    if (!decoded) {
      yield declinedNote(site, group.id);
      continue;
    }
    if (isExcludedGroup(group, options.excludeSections)) {
      yield {
        kind: "note",
        note: {
          kind: "section-excluded",
          elementId: site.elementId,
          groupId: group.id,
          message: `Section ${group.id} is excluded by configuration`,
        },
      };
      continue;
    }

    const chartTitle = decoded.title || site.visit.node.attrs["data-title"];
    for (const [index, fields] of decoded.points.entries()) {
      yield {
        kind: "record",
        record: {
          fields,
          origin: "plot",
          elementId: site.elementId,
          group,
          index,
          ...(chartTitle ? { chartTitle } : {}),
        },
      };
    }
  }
}

function declinedNote(site: PayloadSite, groupId: string): ExtractionItem {
  return {
    kind: "note",
    note: {
      kind: "payload-declined",
      elementId: site.elementId,
      groupId,
      message: "No chart decoder accepted the payload",
    },
  };
}
