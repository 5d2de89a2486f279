#!/usr/bin/env node
import { parseArgs } from "util";
import { loadDotenv, resolveExtractOptions, type ExtractFlags } from "../lib/config.js";
import { runBatch } from "../pipeline/batch.js";
import { PipelineError } from "../pipeline/errors.js";

const USAGE = `Usage: extract-batch [options]

  --unprocessed-dir <dir>      source documents (COSD_UNPROCESSED_DIR, default data/unprocessed)
  --processed-dir <dir>        archive for extracted sources (COSD_PROCESSED_DIR, default data/processed)
  --output-dir <dir>           extracts, reports and event logs (COSD_OUTPUT_DIR, default data/output)
  --field-schema <file>        canonical fields and aliases (COSD_FIELD_SCHEMA)
  --layout document|section    one CSV per document or per section (COSD_OUTPUT_LAYOUT)
  --ext <.ext>                 input file extension (COSD_FILE_EXT, default .html)
  --no-archive                 leave sources in the unprocessed directory
  --dry-run                    extract and report without writing extracts or moving files
  --run-id <id>                name of this run's report and event log
  --log-format pretty|json     terminal output format (COSD_LOG_FORMAT)
  --event-file <file>          JSONL event log path
  --conflict-tolerance <n>     numeric table/chart difference treated as agreement (default 0.05)
  --hover-fields <a,b>         labels read from chart hover text (default Numerator,Denominator)
  --verbose                    print every event
  --help                       show this message
`;

function parseCliArgs(): ExtractFlags | null {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      "unprocessed-dir": { type: "string" },
      "processed-dir": { type: "string" },
      "output-dir": { type: "string" },
      "field-schema": { type: "string" },
      layout: { type: "string" },
      ext: { type: "string" },
      "no-archive": { type: "boolean" },
      "dry-run": { type: "boolean" },
      "run-id": { type: "string" },
      "log-format": { type: "string" },
      "event-file": { type: "string" },
      "conflict-tolerance": { type: "string" },
      "hover-fields": { type: "string" },
      verbose: { type: "boolean" },
      help: { type: "boolean" },
    },
    strict: true,
  });

  if (values.help) {
    return null;
  }

  return {
    unprocessedDir: values["unprocessed-dir"],
    processedDir: values["processed-dir"],
    outputDir: values["output-dir"],
    fieldSchema: values["field-schema"],
    layout: values.layout,
    fileExt: values.ext,
    archive: values["no-archive"] ? false : undefined,
    dryRun: values["dry-run"],
    runId: values["run-id"],
    logFormat: values["log-format"],
    eventFile: values["event-file"],
    conflictTolerance: values["conflict-tolerance"],
    hoverFields: values["hover-fields"],
    verbose: values.verbose,
  };
}

function main(): number {
  const flags = parseCliArgs();
  if (!flags) {
    console.log(USAGE);
    return 0;
  }
  loadDotenv();
  const options = resolveExtractOptions(flags);
  const { report, reportPath } = runBatch(options);

  console.log(
    `${report.totals.succeeded}/${report.totals.documents} documents extracted, ${report.totals.rows} rows, ${report.totals.warnings} warnings`
  );
  console.log(`Report: ${reportPath}`);
  return report.totals.failed > 0 ? 2 : 0;
}

try {
  process.exitCode = main();
} catch (error) {
  if (error instanceof PipelineError) {
    console.error(`Extraction failed [${error.code}]: ${error.message}`);
  } else {
    console.error("Extraction failed:", error);
  }
  process.exitCode = 1;
}
