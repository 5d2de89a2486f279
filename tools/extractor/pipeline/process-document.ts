import { basename } from "path";
import { loadDocument } from "../document/loader.js";
import type { SourceDocument } from "../document/tree.js";
import { extractPlotRecords } from "../executors/plot.js";
import { extractTableRecords } from "../executors/table.js";
import type {
  ExtractionItem,
  ExtractionNote,
  ExtractionOptions,
  ExtractionWarning,
  RawRecord,
} from "../executors/types.js";
import { archiveDocument } from "../output/file-state.js";
import { writeExtract, type WrittenExtract } from "../output/writer.js";
import { tagProvenance } from "../provenance/provenance.js";
import type { FieldSchema } from "../reconcile/field-schema.js";
import { reconcileRecords } from "../reconcile/reconcile.js";
import {
  LoadError,
  PipelineError,
  ProvenanceParseError,
  SchemaMismatchError,
  WriteError,
} from "./errors.js";
import { logger } from "./logger.js";
import { runWithTelemetryContext } from "./telemetry-context.js";
import type { ExtractOptions, StageName } from "./types.js";

export type DocumentErrorKind =
  | "LoadError"
  | "SchemaMismatchError"
  | "ProvenanceParseError"
  | "WriteError"
  | "InternalError";

export type DocumentRunOptions = Pick<
  ExtractOptions,
  "processedDir" | "outputDir" | "layout" | "archive" | "dryRun" | "conflictTolerance" | "hoverFields"
>;

interface OutcomeBase {
  document: string;
  path: string;
  warnings: ExtractionWarning[];
  notes: ExtractionNote[];
  durationMs: number;
}

export interface DocumentSuccess extends OutcomeBase {
  status: "succeeded";
  rowCount: number;
  outputs: WrittenExtract[];
  archivedTo?: string;
}

export interface DocumentFailure extends OutcomeBase {
  status: "failed";
  errorKind: DocumentErrorKind;
  errorCode: string;
  message: string;
}

export type DocumentOutcome = DocumentSuccess | DocumentFailure;

interface Extracted {
  records: RawRecord[];
  tableRecords: number;
  plotRecords: number;
}

export function processDocument(
  filePath: string,
  schema: FieldSchema,
  options: DocumentRunOptions
): DocumentOutcome {
  const name = basename(filePath);
  const startedAt = Date.now();
  const warnings: ExtractionWarning[] = [];
  const notes: ExtractionNote[] = [];
  const inStage = <T>(stage: StageName, fn: () => T): T =>
    runWithTelemetryContext({ document: name, stage }, fn);

  inStage("load", () =>
    logger.info("Document started", { eventType: "document.lifecycle", phase: "start", path: filePath })
  );

  try {
    const document = inStage("load", () => loadDocument(filePath));
    const extracted = inStage("extract", () =>
      extractDocument(document, { excludeSections: schema.excludeSections, hoverFields: options.hoverFields }, warnings, notes)
    );

    const reconciled = inStage("reconcile", () => {
      const result = reconcileRecords(extracted.records, schema, {
        conflictTolerance: options.conflictTolerance,
      });
      for (const conflict of result.conflicts) {
        logger.warn(conflict.message, { eventType: "reconcile.conflict", elementId: conflict.elementId });
      }
      warnings.push(...result.conflicts);
      return result.rows;
    });

    const tagged = inStage("provenance", () => tagProvenance(filePath, reconciled));

    const outputs = inStage("write", () =>
      writeExtract(tagged.rows, tagged.provenance, schema, {
        outputDir: options.outputDir,
        layout: options.layout,
        dryRun: options.dryRun,
      })
    );

    let archivedTo: string | undefined;
    if (options.archive && !options.dryRun) {
      const outcome = inStage("archive", () =>
        archiveDocument(filePath, options.processedDir, tagged.provenance.siteCode)
      );
      if (outcome.status === "moved") {
        archivedTo = outcome.destination;
      } else {
        warnings.push(outcome.warning);
      }
    }

    const durationMs = Date.now() - startedAt;
    inStage("archive", () =>
      logger.info("Document extracted", {
        eventType: "document.lifecycle",
        phase: "end",
        rowCount: tagged.rows.length,
        tableRecords: extracted.tableRecords,
        plotRecords: extracted.plotRecords,
        warningCount: warnings.length,
        durationMs,
      })
    );

    return {
      status: "succeeded",
      document: name,
      path: filePath,
      rowCount: tagged.rows.length,
      outputs,
      archivedTo,
      warnings,
      notes,
      durationMs,
    };
  } catch (error) {
    const durationMs = Date.now() - startedAt;
    const errorKind = classifyError(error);
    const message = error instanceof Error ? error.message : String(error);
    const errorCode = error instanceof PipelineError ? error.code : "INTERNAL_ERROR";
    runWithTelemetryContext({ document: name, stage: "system" }, () =>
      logger.error(message, {
        eventType: "document.lifecycle",
        phase: "fail",
        errorCode,
        errorKind,
        warningCount: warnings.length,
        durationMs,
      })
    );
    return {
      status: "failed",
      document: name,
      path: filePath,
      errorKind,
      errorCode,
      message,
      warnings,
      notes,
      durationMs,
    };
  }
}

function extractDocument(
  document: SourceDocument,
  options: ExtractionOptions,
  warnings: ExtractionWarning[],
  notes: ExtractionNote[]
): Extracted {
  const records: RawRecord[] = [];
  const collect = (items: Iterable<ExtractionItem>): number => {
    let count = 0;
    for (const item of items) {
      if (item.kind === "record") {
        records.push(item.record);
        count++;
      } else if (item.kind === "warning") {
        warnings.push(item.warning);
        logger.warn(item.warning.message, {
          eventType: "extract.warning",
          warningKind: item.warning.kind,
          elementId: item.warning.elementId,
        });
      } else {
        notes.push(item.note);
        logger.debug(item.note.message, {
          eventType: "extract.warning",
          noteKind: item.note.kind,
          elementId: item.note.elementId,
        });
      }
    }
    return count;
  };

  const tableRecords = collect(extractTableRecords(document, options));
  logger.info("Table records extracted", { eventType: "extract.table", rowCount: tableRecords });
  const plotRecords = collect(extractPlotRecords(document, options));
  logger.info("Chart records extracted", { eventType: "extract.plot", rowCount: plotRecords });

  return { records, tableRecords, plotRecords };
}

function classifyError(error: unknown): DocumentErrorKind {
  if (error instanceof LoadError) {
    return "LoadError";
  }
  if (error instanceof SchemaMismatchError) {
    return "SchemaMismatchError";
  }
  if (error instanceof ProvenanceParseError) {
    return "ProvenanceParseError";
  }
  if (error instanceof WriteError) {
    return "WriteError";
  }
  return "InternalError";
}
