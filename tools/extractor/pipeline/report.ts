import type { ExtractionNoteKind, ExtractionWarning } from "../executors/types.js";
import type { DocumentErrorKind, DocumentOutcome } from "./process-document.js";

export interface SucceededDocument {
  document: string;
  rowCount: number;
  outputs: Array<{ path: string; rowCount: number }>;
  archivedTo?: string;
}

export interface FailedDocument {
  document: string;
  errorKind: DocumentErrorKind;
  errorCode: string;
  message: string;
}

export interface ReportedWarning extends ExtractionWarning {
  document: string;
}

export interface BatchReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  dryRun: boolean;
  totals: {
    documents: number;
    succeeded: number;
    failed: number;
    rows: number;
    warnings: number;
    droppedRows: number;
  };
  succeeded: SucceededDocument[];
  failed: FailedDocument[];
  warnings: ReportedWarning[];
  notes: Partial<Record<ExtractionNoteKind, number>>;
}

export interface BatchReportInput {
  runId: string;
  startedAt: string;
  finishedAt: string;
  dryRun: boolean;
  outcomes: readonly DocumentOutcome[];
}

export function buildBatchReport(input: BatchReportInput): BatchReport {
  const succeeded: SucceededDocument[] = [];
  const failed: FailedDocument[] = [];
  const warnings: ReportedWarning[] = [];
  const notes: Partial<Record<ExtractionNoteKind, number>> = {};

  for (const outcome of input.outcomes) {
    if (outcome.status === "succeeded") {
      succeeded.push({
        document: outcome.document,
        rowCount: outcome.rowCount,
        outputs: outcome.outputs.map(({ path, rowCount }) => ({ path, rowCount })),
        ...(outcome.archivedTo ? { archivedTo: outcome.archivedTo } : {}),
      });
    } else {
      failed.push({
        document: outcome.document,
        errorKind: outcome.errorKind,
        errorCode: outcome.errorCode,
        message: outcome.message,
      });
    }
    for (const warning of outcome.warnings) {
      warnings.push({ document: outcome.document, ...warning });
    }
    for (const note of outcome.notes) {
      notes[note.kind] = (notes[note.kind] ?? 0) + 1;
    }
  }

  return {
    runId: input.runId,
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
    dryRun: input.dryRun,
    totals: {
      documents: input.outcomes.length,
      succeeded: succeeded.length,
      failed: failed.length,
      rows: succeeded.reduce((sum, entry) => sum + entry.rowCount, 0),
      warnings: warnings.length,
      droppedRows: warnings.filter((warning) => warning.kind === "row-column-mismatch").length,
    },
    succeeded,
    failed,
    warnings,
    notes,
  };
}
