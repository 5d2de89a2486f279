import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { archiveDocument } from "../output/file-state.js";

describe("file state", () => {
  let root: string;
  let unprocessed: string;
  let processed: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "cosd-state-"));
    unprocessed = join(root, "unprocessed");
    processed = join(root, "processed");
    mkdirSync(unprocessed);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  test("moves an extracted source under its site code", () => {
    const source = join(unprocessed, "2026_1_XXX_My_Hospital.html");
    writeFileSync(source, "<html></html>");

    const outcome = archiveDocument(source, processed, "XXX");

    const destination = join(processed, "XXX", "2026_1_XXX_My_Hospital.html");
    expect(outcome).toEqual({ status: "moved", destination });
    expect(existsSync(source)).toBe(false);
    expect(readFileSync(destination, "utf-8")).toBe("<html></html>");
  });

  test("never overwrites an archived copy", () => {
    const source = join(unprocessed, "2026_1_XXX_My_Hospital.html");
    const destination = join(processed, "XXX", "2026_1_XXX_My_Hospital.html");
    writeFileSync(source, "new");
    mkdirSync(join(processed, "XXX"), { recursive: true });
    writeFileSync(destination, "old");

    const outcome = archiveDocument(source, processed, "XXX");

    expect(outcome).toEqual({
      status: "skipped",
      destination,
      warning: {
        kind: "archive-skipped",
        elementId: source,
        message: `${destination} already exists; source left in place`,
      },
    });
    expect(readFileSync(source, "utf-8")).toBe("new");
    expect(readFileSync(destination, "utf-8")).toBe("old");
  });
});
