import { join } from "path";
import { fileURLToPath } from "url";
import { describe, expect, test } from "vitest";
import { loadDocument, parseHtml } from "../document/loader.js";
import { extractTableRecords } from "../executors/table.js";
import type { ExtractionItem, RawRecord } from "../executors/types.js";

const FIXTURE_DIR = fileURLToPath(new URL("./fixtures/", import.meta.url));

function records(items: Iterable<ExtractionItem>): RawRecord[] {
  return [...items].flatMap((item) => (item.kind === "record" ? [item.record] : []));
}

function page(body: string): string {
  return `<!DOCTYPE html><html><head><title>t</title></head><body>${body}</body></html>`;
}

describe("table extractor", () => {
  test("emits one record per body row keyed by header text", () => {
    const document = parseHtml(
      page(
        `<h2>Completeness by site</h2><table>` +
          `<tr><th>Cancer Site</th><th>Rate</th></tr>` +
          `<tr><td>Breast</td><td>91</td></tr>` +
          `<tr><td>Lung</td><td>80</td></tr>` +
          `<tr><td>Skin</td><td>70</td></tr>` +
          `</table>`
      ),
      "simple.html"
    );

    const rows = records(extractTableRecords(document));

    expect(rows).toHaveLength(3);
    expect(rows[0]).toEqual({
      fields: { "Cancer Site": "Breast", Rate: "91" },
      origin: "table",
      elementId: "html[0]>body[0]>table[0]",
      group: { id: "completeness-by-site", num: "", name: "Completeness by site" },
      index: 0,
    });
    expect(rows.map((row) => row.index)).toEqual([0, 1, 2]);
  });

  test("copies spanned cells into every covered column", () => {
    const document = parseHtml(
      page(
        `<table><thead>` +
          `<tr><th rowspan="2">Cancer Group</th><th colspan="2">Trust</th></tr>` +
          `<tr><th>Numerator</th><th>Denominator</th></tr>` +
          `</thead><tbody>` +
          `<tr><td rowspan="2">Breast</td><td>1</td><td>2</td></tr>` +
          `<tr><td>3</td><td>4</td></tr>` +
          `<tr><td colspan="3">n/a</td></tr>` +
          `</tbody></table>`
      ),
      "spans.html"
    );

    expect(records(extractTableRecords(document)).map((row) => row.fields)).toEqual([
      { "Cancer Group": "Breast", "Trust Numerator": "1", "Trust Denominator": "2" },
      { "Cancer Group": "Breast", "Trust Numerator": "3", "Trust Denominator": "4" },
      { "Cancer Group": "n/a", "Trust Numerator": "n/a", "Trust Denominator": "n/a" },
    ]);
  });

  test("skips rows whose width differs from the header and reports them", () => {
    const document = parseHtml(
      page(
        `<table>` +
          `<tr><th>Category</th><th>Rate</th></tr>` +
          `<tr><td>Breast</td><td>90</td></tr>` +
          `<tr><td>Lung</td></tr>` +
          `<tr><td>Skin</td><td>70</td><td>extra</td></tr>` +
          `</table>`
      ),
      "ragged.html"
    );

    const items = [...extractTableRecords(document)];

    expect(items.map((item) => item.kind)).toEqual(["record", "warning", "warning"]);
    expect(items[1]).toEqual({
      kind: "warning",
      warning: {
        kind: "row-column-mismatch",
        elementId: "html[0]>body[0]>table[0]",
        groupId: "document",
        rowIndex: 1,
        message: "Row 1 has 1 cells, header has 2",
        droppedValues: ["Lung"],
      },
    });
    expect(items[2]).toMatchObject({
      warning: { message: "Row 2 has 3 cells, header has 2", droppedValues: ["Skin", "70", "extra"] },
    });
  });

  test("notes layout tables without a header row", () => {
    const document = parseHtml(page(`<table><tr><td>a</td><td>b</td></tr></table>`), "layout.html");

    expect([...extractTableRecords(document)]).toEqual([
      {
        kind: "note",
        note: {
          kind: "table-without-header",
          elementId: "html[0]>body[0]>table[0]",
          groupId: "document",
          message: "Table has no header row; not treated as a data table",
        },
      },
    ]);
  });

  test("transposes DataTables widget columns and drops the row-name column", () => {
    const document = loadDocument(join(FIXTURE_DIR, "ranking.html"));

    const items = [
      ...extractTableRecords(document, {
        excludeSections: [/^stage[-_]by[-_]cancer[-_]group[-_]in[-_]/],
      }),
    ];

    expect(records(items)).toEqual([
      {
        fields: { "Cancer Site": "Breast", "Overall Rank": "3", "Trust (%)": "91.5" },
        origin: "table",
        elementId: "html[0]>body[0]>div#overall-ranking>script[0]",
        group: { id: "overall-ranking", num: "2", name: "Overall ranking" },
        index: 0,
      },
      {
        fields: { "Cancer Site": "Lung", "Overall Rank": "12", "Trust (%)": "77.25" },
        origin: "table",
        elementId: "html[0]>body[0]>div#overall-ranking>script[0]",
        group: { id: "overall-ranking", num: "2", name: "Overall ranking" },
        index: 1,
      },
    ]);
    expect(items.at(-1)).toEqual({
      kind: "note",
      note: {
        kind: "section-excluded",
        elementId: "html[0]>body[0]>div#stage-by-cancer-group-in-trust>table[0]",
        groupId: "stage-by-cancer-group-in-trust",
        message: "Section stage-by-cancer-group-in-trust is excluded by configuration",
      },
    });
  });

  test("names widget columns from columnDefs when they cover the data", () => {
    const payload = JSON.stringify({
      x: {
        container: "<table></table>",
        data: [
          ["1", "2"],
          ["Breast", "Lung"],
          [90, 80],
        ],
        options: {
          columnDefs: [
            { orderable: false, targets: 0 },
            { name: "Cancer Site", targets: 1 },
            { name: "Rate", targets: 2 },
          ],
        },
      },
    });
    const document = parseHtml(
      page(`<h2>Ranks</h2><script type="application/json">${payload}</script>`),
      "defs.html"
    );

    expect(records(extractTableRecords(document)).map((row) => row.fields)).toEqual([
      { "Cancer Site": "Breast", Rate: "90" },
      { "Cancer Site": "Lung", Rate: "80" },
    ]);
  });

  test("warns when a widget header cannot cover its data columns", () => {
    const payload = JSON.stringify({
      x: { container: "<table><thead><tr><th>A</th></tr></thead></table>", data: [["x"], ["y"]] },
    });
    const document = parseHtml(page(`<script type="application/json">${payload}</script>`), "widget.html");

    expect([...extractTableRecords(document)]).toEqual([
      {
        kind: "warning",
        warning: {
          kind: "row-column-mismatch",
          elementId: "html[0]>body[0]>script[0]",
          groupId: "document",
          message: "Widget table header does not cover its 2 data columns; 1 rows dropped",
        },
      },
    ]);
  });

  test("re-scanning the same document yields the same sequence", () => {
    const document = loadDocument(join(FIXTURE_DIR, "report.html"));
    const items = extractTableRecords(document);

    const first = [...items];
    const second = [...items];

    expect(first).toHaveLength(3);
    expect(second).toEqual(first);
  });
});
