import { existsSync } from "fs";
import { basename, dirname, extname, join, resolve } from "path";
import { fileURLToPath } from "url";

const THIS_DIR = dirname(fileURLToPath(import.meta.url));

// Sources run from tools/extractor/lib, builds from dist/tools/extractor/lib.
export const REPO_ROOT = findPackageRoot(THIS_DIR);

export const CONFIG_DIR = join(REPO_ROOT, "config");
export const DEFAULT_FIELD_SCHEMA_PATH = join(CONFIG_DIR, "field-schema.json");
export const FIELD_SCHEMA_SCHEMA_PATH = join(CONFIG_DIR, "field-schema.schema.json");

export function documentStem(filePath: string): string {
  const name = basename(filePath);
  return name.slice(0, name.length - extname(name).length);
}

export function documentOutputPath(outputDir: string, siteCode: string, filePath: string): string {
  return join(outputDir, siteCode, `${documentStem(filePath)}.csv`);
}

export function sectionOutputPath(
  outputDir: string,
  siteCode: string,
  filePath: string,
  sectionId: string
): string {
  return join(outputDir, siteCode, documentStem(filePath), `${sectionId}.csv`);
}

export function archivedSourcePath(processedDir: string, siteCode: string, filePath: string): string {
  return join(processedDir, siteCode, basename(filePath));
}

export function batchReportPath(outputDir: string, runId: string): string {
  return join(outputDir, "reports", `${runId}.json`);
}

export function defaultEventFilePath(outputDir: string, runId: string): string {
  return join(outputDir, "runs", runId, "events.jsonl");
}

function findPackageRoot(start: string): string {
  let dir = start;
  while (!existsSync(join(dir, "package.json"))) {
    const parent = dirname(dir);
    if (parent === dir) {
      return resolve(start, "../../..");
    }
    dir = parent;
  }
  return dir;
}
