import { readdirSync, type Dirent } from "fs";
import { join } from "path";
import { writeJsonAtomic } from "../lib/json.js";
import { batchReportPath, defaultEventFilePath } from "../lib/paths.js";
import { loadFieldSchema } from "../reconcile/field-schema.js";
import { ConfigError, PipelineError } from "./errors.js";
import { initializeEventEmitter } from "./events.js";
import { logger } from "./logger.js";
import { processDocument, type DocumentOutcome } from "./process-document.js";
import { buildBatchReport, type BatchReport } from "./report.js";
import type { ExtractOptions } from "./types.js";

export interface BatchResult {
  report: BatchReport;
  reportPath: string;
}

export interface BatchRuntime {
  terminal: boolean;
}

export function listInputFiles(dir: string, fileExt: string): string[] {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw new ConfigError(
      `Cannot read unprocessed directory ${dir}: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
  const ext = fileExt.toLowerCase();
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(ext))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}

export function runBatch(options: ExtractOptions, runtime: BatchRuntime = { terminal: true }): BatchResult {
  initializeEventEmitter({
    runId: options.runId,
    format: options.logFormat,
    verbose: options.verbose,
    terminal: runtime.terminal,
    eventFilePath: options.eventFile ?? defaultEventFilePath(options.outputDir, options.runId),
  });

  const startedAt = new Date().toISOString();
  logger.info("Batch start", {
    eventType: "batch.lifecycle",
    phase: "start",
    unprocessedDir: options.unprocessedDir,
    outputDir: options.outputDir,
    fieldSchema: options.fieldSchemaPath,
    layout: options.layout,
    archive: options.archive,
    dryRun: options.dryRun,
  });

  const schema = loadFieldSchema(options.fieldSchemaPath);
  logger.info("Field schema loaded", {
    eventType: "config.lifecycle",
    fieldCount: schema.fields.length,
    keyFields: schema.keyFields,
  });

  const files = listInputFiles(options.unprocessedDir, options.fileExt);
  if (files.length === 0) {
    throw new PipelineError(`No ${options.fileExt} files found in ${options.unprocessedDir}`, {
      code: "NO_INPUT_FILES",
    });
  }

  const outcomes: DocumentOutcome[] = files.map((file) => processDocument(file, schema, options));

  const report = buildBatchReport({
    runId: options.runId,
    startedAt,
    finishedAt: new Date().toISOString(),
    dryRun: options.dryRun,
    outcomes,
  });
  const reportPath = batchReportPath(options.outputDir, options.runId);
  writeJsonAtomic(reportPath, report);

  for (const failure of report.failed) {
    logger.error(`${failure.document}: ${failure.message}`, {
      eventType: "summary",
      document: failure.document,
      errorCode: failure.errorCode,
    });
  }
  logger.info("Batch finished", {
    eventType: "summary",
    phase: "end",
    documents: report.totals.documents,
    succeeded: report.totals.succeeded,
    failed: report.totals.failed,
    rowCount: report.totals.rows,
    warningCount: report.totals.warnings,
    reportPath,
  });

  return { report, reportPath };
}
