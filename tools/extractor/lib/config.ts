import { resolve } from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_HOVER_FIELDS } from "../executors/payload-decoders.js";
import { ConfigError } from "../pipeline/errors.js";
import type { ExtractOptions } from "../pipeline/types.js";
import { DEFAULT_CONFLICT_TOLERANCE } from "../reconcile/reconcile.js";
import { DEFAULT_FIELD_SCHEMA_PATH } from "./paths.js";

export interface ExtractFlags {
  unprocessedDir?: string;
  processedDir?: string;
  outputDir?: string;
  fieldSchema?: string;
  layout?: string;
  fileExt?: string;
  logFormat?: string;
  runId?: string;
  eventFile?: string;
  conflictTolerance?: string;
  hoverFields?: string;
  archive?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

const optionsSchema = z.object({
  runId: z.string().regex(/^[A-Za-z0-9._-]+$/, "may only contain letters, digits, '.', '_' and '-'"),
  unprocessedDir: z.string().min(1),
  processedDir: z.string().min(1),
  outputDir: z.string().min(1),
  fieldSchemaPath: z.string().min(1),
  fileExt: z.string().regex(/^\.[A-Za-z0-9]+$/, "must look like .html"),
  layout: z.enum(["document", "section"]),
  archive: z.boolean(),
  dryRun: z.boolean(),
  verbose: z.boolean(),
  logFormat: z.enum(["pretty", "json"]),
  eventFile: z.string().min(1).optional(),
  conflictTolerance: z.coerce.number().finite().nonnegative(),
  hoverFields: z.array(z.string().min(1)),
});

export function loadDotenv(path = resolve(process.cwd(), ".env")): void {
  dotenv.config({ path });
}

export function resolveExtractOptions(
  flags: ExtractFlags,
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date()
): ExtractOptions {
  const candidate = {
    runId: flags.runId ?? createRunId(now),
    unprocessedDir: resolve(flags.unprocessedDir ?? env.COSD_UNPROCESSED_DIR ?? "data/unprocessed"),
    processedDir: resolve(flags.processedDir ?? env.COSD_PROCESSED_DIR ?? "data/processed"),
    outputDir: resolve(flags.outputDir ?? env.COSD_OUTPUT_DIR ?? "data/output"),
    fieldSchemaPath: resolve(flags.fieldSchema ?? env.COSD_FIELD_SCHEMA ?? DEFAULT_FIELD_SCHEMA_PATH),
    fileExt: flags.fileExt ?? env.COSD_FILE_EXT ?? ".html",
    layout: flags.layout ?? env.COSD_OUTPUT_LAYOUT ?? "document",
    archive: flags.archive ?? true,
    dryRun: flags.dryRun ?? false,
    verbose: flags.verbose ?? false,
    logFormat: flags.logFormat ?? env.COSD_LOG_FORMAT ?? "pretty",
    eventFile: flags.eventFile === undefined ? undefined : resolve(flags.eventFile),
    conflictTolerance: flags.conflictTolerance ?? DEFAULT_CONFLICT_TOLERANCE,
    hoverFields: flags.hoverFields === undefined ? [...DEFAULT_HOVER_FIELDS] : splitList(flags.hoverFields),
  };

  const parsed = optionsSchema.safeParse(candidate);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  return parsed.data;
}

export function createRunId(now: Date): string {
  return `extract-${now.toISOString().replace(/[.:]/g, "-")}`;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
