import { join } from "path";
import { fileURLToPath } from "url";
import { describe, expect, test } from "vitest";
import { loadDocument, parseHtml } from "../document/loader.js";
import { findAll, findFirst, textContent, walkElements } from "../document/tree.js";
import { LoadError } from "../pipeline/errors.js";

const FIXTURE_DIR = fileURLToPath(new URL("./fixtures/", import.meta.url));

describe("document loader", () => {
  test("builds a tagged tree with structural locators", () => {
    const document = parseHtml(
      `<html><body><div id="results"><table><tr><th>A</th></tr></table><table></table></div></body></html>`,
      "/data/sample.html"
    );

    expect(document.fileName).toBe("sample.html");
    expect(document.root.kind).toBe("element");
    const tables = findAll(document.root, (node) => node.tag === "table");
    expect(tables.map((table) => table.locator)).toEqual([
      "html[0]>body[0]>div#results>table[0]",
      "html[0]>body[0]>div#results>table[1]",
    ]);
  });

  test("renders text with line breaks as spaces and skips scripts", () => {
    const document = parseHtml(
      `<html><body><p>Records<br>meeting   standard<script>var x = 1;</script></p></body></html>`,
      "text.html"
    );
    const paragraph = findFirst(document.root, (node) => node.tag === "p");

    expect(paragraph && textContent(paragraph)).toBe("Records meeting standard");
  });

  test("tracks the closest preceding heading", () => {
    const document = parseHtml(
      `<html><body><h2>First</h2><div><table></table></div><h3>Second</h3><table></table></body></html>`,
      "headings.html"
    );
    const headings = [...walkElements(document.root)]
      .filter((visit) => visit.node.tag === "table")
      .map((visit) => visit.precedingHeading);

    expect(headings).toEqual(["First", "Second"]);
  });

  test("loads a report from disk", () => {
    const document = loadDocument(join(FIXTURE_DIR, "report.html"));

    expect(document.fileName).toBe("report.html");
    expect(findAll(document.root, (node) => node.tag === "tr")).toHaveLength(4);
  });

  test("rejects an unreadable file", () => {
    const missing = join(FIXTURE_DIR, "missing.html");

    expect(() => loadDocument(missing)).toThrow(LoadError);
    try {
      loadDocument(missing);
    } catch (error) {
      expect(error).toBeInstanceOf(LoadError);
      expect(error instanceof LoadError && error.code).toBe("LOAD_ERROR");
    }
  });

  test("rejects empty, binary and bodiless markup", () => {
    expect(() => parseHtml("   ", "empty.html")).toThrow("Cannot load empty.html: document is empty");
    expect(() => parseHtml("<html>\u0000</html>", "binary.html")).toThrow(
      "Cannot load binary.html: document contains binary content"
    );
    expect(() => parseHtml("<html><head><title>t</title></head><body> </body></html>", "blank.html")).toThrow(
      "Cannot load blank.html: document has no body content"
    );
  });
});
