import { rawText, walkElements, type ElementVisit, type SourceDocument } from "../document/tree.js";
import { PayloadParseError } from "../pipeline/errors.js";

const PAYLOAD_ATTRIBUTES = ["data-chart", "data-plot"] as const;

export interface PayloadSite {
  visit: ElementVisit;
  elementId: string;
  source: "script" | "attribute";
  text: string;
  contextTitle?: string;
}

export function* findPayloads(document: SourceDocument): Generator<PayloadSite> {
  for (const visit of walkElements(document.root)) {
    const { node } = visit;
    const contextTitle = node.attrs["data-title"] || visit.precedingHeading;

    if (node.tag === "script" && (node.attrs.type ?? "").toLowerCase() === "application/json") {
      yield { visit, elementId: node.locator, source: "script", text: rawText(node), contextTitle };
      continue;
    }

    for (const attribute of PAYLOAD_ATTRIBUTES) {
      const value = node.attrs[attribute];
      if (value !== undefined) {
        yield {
          visit,
          elementId: `${node.locator}@${attribute}`,
          source: "attribute",
          text: value,
          contextTitle,
        };
      }
    }
  }
}

export function decodePayload(site: PayloadSite): unknown {
  const text = site.text.trim();
  if (!text) {
    throw new PayloadParseError(site.elementId, "payload is empty");
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new PayloadParseError(
      site.elementId,
      error instanceof Error ? error.message : String(error),
      error
    );
  }
}

export function tryDecodePayload(site: PayloadSite): unknown {
  try {
    return decodePayload(site);
  } catch (error) {
    if (error instanceof PayloadParseError) {
      return undefined;
    }
    throw error;
  }
}
