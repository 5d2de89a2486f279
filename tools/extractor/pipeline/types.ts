export const STAGE_ORDER = ["load", "extract", "reconcile", "provenance", "write", "archive"] as const;

export type StageName = (typeof STAGE_ORDER)[number];

export type LogFormat = "pretty" | "json";
export type OutputLayout = "document" | "section";

export type EventType =
  | "batch.lifecycle"
  | "document.lifecycle"
  | "file.read"
  | "file.write"
  | "file.move"
  | "extract.table"
  | "extract.plot"
  | "extract.warning"
  | "reconcile.conflict"
  | "config.lifecycle"
  | "summary";

export interface PipelineEvent {
  ts: string;
  runId: string;
  level: "debug" | "info" | "warn" | "error";
  document: string;
  stage: StageName | "system";
  eventType: EventType;
  message: string;
  phase?: "start" | "end" | "fail" | "progress";
  durationMs?: number;
  bytes?: number;
  path?: string;
  errorCode?: string;
  [key: string]: unknown;
}

export interface LogRuntimeConfig {
  runId: string;
  format: LogFormat;
  verbose: boolean;
  terminal: boolean;
  eventFilePath?: string;
}

export interface ExtractOptions {
  runId: string;
  unprocessedDir: string;
  processedDir: string;
  outputDir: string;
  fieldSchemaPath: string;
  fileExt: string;
  layout: OutputLayout;
  archive: boolean;
  dryRun: boolean;
  verbose: boolean;
  logFormat: LogFormat;
  eventFile?: string;
  conflictTolerance: number;
  hoverFields: string[];
}
