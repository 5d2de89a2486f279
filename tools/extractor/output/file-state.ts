import { constants, copyFileSync, existsSync, renameSync, unlinkSync } from "fs";
import { dirname } from "path";
import type { ExtractionWarning } from "../executors/types.js";
import { ensureDir } from "../lib/json.js";
import { archivedSourcePath } from "../lib/paths.js";
import { emitEvent } from "../pipeline/events.js";

export type ArchiveOutcome =
  | { status: "moved"; destination: string }
  | { status: "skipped"; destination: string; warning: ExtractionWarning };

export function archiveDocument(filePath: string, processedDir: string, siteCode: string): ArchiveOutcome {
  const destination = archivedSourcePath(processedDir, siteCode, filePath);

  if (existsSync(destination)) {
    return skipped(filePath, destination, `${destination} already exists; source left in place`);
  }

  try {
    ensureDir(dirname(destination));
    moveFile(filePath, destination);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return skipped(filePath, destination, `Cannot move to ${destination}: ${reason}`);
  }

  emitEvent({
    level: "info",
    eventType: "file.move",
    message: "Archived source document",
    path: destination,
  });
  return { status: "moved", destination };
}

function moveFile(from: string, to: string): void {
  try {
    renameSync(from, to);
  } catch (error) {
    if (!isCrossDevice(error)) {
      throw error;
    }
    copyFileSync(from, to, constants.COPYFILE_EXCL);
    unlinkSync(from);
  }
}

function isCrossDevice(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EXDEV";
}

function skipped(filePath: string, destination: string, message: string): ArchiveOutcome {
  emitEvent({
    level: "warn",
    eventType: "file.move",
    message,
    path: filePath,
  });
  return {
    status: "skipped",
    destination,
    warning: { kind: "archive-skipped", elementId: filePath, message },
  };
}
