import { readFileSync } from "fs";
import { describe, expect, test } from "vitest";
import { LoadError, PipelineError, WriteError } from "../pipeline/errors.js";

describe("pipeline errors", () => {
  test("subclasses carry their code, name and cause", () => {
    const cause = new Error("disk full");
    const error = new WriteError("/out/XXX/report.csv", cause);

    expect(error).toBeInstanceOf(PipelineError);
    expect(error.name).toBe("WriteError");
    expect(error.code).toBe("WRITE_ERROR");
    expect(error.message).toBe("Cannot write /out/XXX/report.csv: disk full");
    expect(error.cause).toBe(cause);
    expect(Object.keys(new LoadError("a.html", "document is empty")).sort()).toEqual(["code", "name", "path"]);
  });
});

describe("cli entry point", () => {
  test("starts with a node shebang so the installed bin runs", () => {
    const source = readFileSync(new URL("../cli/extract-batch.ts", import.meta.url), "utf-8");

    expect(source.split("\n")[0]).toBe("#!/usr/bin/env node");
  });
});
