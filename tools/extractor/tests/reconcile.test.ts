import { join } from "path";
import { fileURLToPath } from "url";
import { describe, expect, test } from "vitest";
import { loadDocument, parseHtml } from "../document/loader.js";
import { extractPlotRecords } from "../executors/plot.js";
import { extractTableRecords } from "../executors/table.js";
import type { ExtractionItem, RawRecord, RecordGroup } from "../executors/types.js";
import { DEFAULT_FIELD_SCHEMA_PATH } from "../lib/paths.js";
import { SchemaMismatchError } from "../pipeline/errors.js";
import { tagProvenance, type NormalizedRow } from "../provenance/provenance.js";
import type { FieldValue } from "../reconcile/coerce.js";
import { loadFieldSchema } from "../reconcile/field-schema.js";
import { reconcileRecords } from "../reconcile/reconcile.js";

const FIXTURE_DIR = fileURLToPath(new URL("./fixtures/", import.meta.url));
const schema = loadFieldSchema(DEFAULT_FIELD_SCHEMA_PATH);
const group: RecordGroup = { id: "g", num: "", name: "G" };

function records(...sources: Iterable<ExtractionItem>[]): RawRecord[] {
  return sources.flatMap((items) => [...items].flatMap((item) => (item.kind === "record" ? [item.record] : [])));
}

function record(origin: RawRecord["origin"], fields: RawRecord["fields"], elementId: RawRecord["elementId"] = origin, index = 0): RawRecord {
  return { fields, origin, elementId, group, index };
}

function emptyValues(): Record<string, FieldValue> {
  return Object.fromEntries(schema.fields.map((field) => [field.name, null]));
}

describe("schema reconciler", () => {
  test("a table and a two-series chart over the same categories give one row per category", () => {
    const document = loadDocument(join(FIXTURE_DIR, "report.html"));

    const result = reconcileRecords(records(extractTableRecords(document), extractPlotRecords(document)), schema);

    const completeness = { id: "overall-completeness", num: "1.1", name: "Overall completeness" };
    expect(result.rows).toEqual([
      {
        group: completeness,
        values: { ...emptyValues(), category: "Breast", numerator: 45, denominator: 50, rate_pct: 90, national_rate_pct: 88.5 },
        origin: "table+plot",
      },
      {
        group: completeness,
        values: { ...emptyValues(), category: "Lung", numerator: 1200, denominator: 1500, rate_pct: 80, national_rate_pct: 79 },
        origin: "table+plot",
      },
      {
        group: completeness,
        values: { ...emptyValues(), category: "Skin", numerator: 7, denominator: 10, rate_pct: 70, national_rate_pct: 75.25 },
        origin: "table+plot",
      },
    ]);
    expect(result.conflicts).toEqual([
      {
        kind: "value-conflict",
        elementId: "html[0]>body[0]>div#overall-completeness>table[0]",
        groupId: "overall-completeness",
        message:
          "Field rate_pct in overall-completeness: 80 vs 80.1; table value kept over html[0]>body[0]>div#overall-completeness>script[0]",
      },
    ]);
  });

  test("the table value wins over any differing chart value", () => {
    const document = loadDocument(join(FIXTURE_DIR, "report.html"));

    const result = reconcileRecords(records(extractTableRecords(document), extractPlotRecords(document)), schema, {
      conflictTolerance: 0,
    });

    expect(result.rows.map((row) => row.values.rate_pct)).toEqual([90, 80, 70]);
    expect(result.conflicts.map((conflict) => conflict.message.split(";")[0])).toEqual([
      "Field rate_pct in overall-completeness: 90 vs 90.02",
      "Field rate_pct in overall-completeness: 80 vs 80.1",
    ]);
  });

  test("chart rows without a table counterpart follow the table rows", () => {
    const result = reconcileRecords(
      [
        record("table", { Category: "Breast", Rate: "90" }),
        record("plot", { category: "Lung", "National (%)": 79 }),
        record("plot", { category: "breast", "National (%)": 88 }),
        record("plot", { "National (%)": 50 }),
      ],
      schema
    );

    expect(result.rows.map((row) => [row.origin, row.values.category, row.values.national_rate_pct])).toEqual([
      ["table+plot", "Breast", 88],
      ["plot", "Lung", 79],
      ["plot", null, 50],
    ]);
    expect(result.conflicts).toEqual([]);
  });

  test("every row carries the full canonical field set in schema order", () => {
    const result = reconcileRecords(
      [record("table", { "Cancer Site": "Breast", Rank: "1" }), record("table", { "Cancer Site": "Lung", Rank: "2" })],
      schema
    );

    expect(result.rows).toHaveLength(2);
    for (const row of result.rows) {
      expect(Object.keys(row.values)).toEqual(schema.fields.map((field) => field.name));
      expect(Object.isFrozen(row)).toBe(true);
      expect(Object.isFrozen(row.values)).toBe(true);
    }
  });

  test("unknown and uncoercible fields fail the document together", () => {
    const other: RecordGroup = { id: "b", num: "", name: "B" };
    let caught: unknown;
    try {
      reconcileRecords(
        [
          { ...record("table", { Category: "Breast", Stage: "2" }, "t1"), group: { ...group, id: "a" } },
          { ...record("table", { Bogus: "x", Rate: "abc" }, "t2"), group: other },
          { ...record("table", { Stage: "3" }, "t1"), group: { ...group, id: "a" } },
        ],
        schema
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaMismatchError);
    expect(caught instanceof SchemaMismatchError && caught.mismatches).toEqual([
      { groupId: "a", elementId: "t1", field: "Stage", reason: "unknown-field" },
      { groupId: "b", elementId: "t2", field: "Bogus", reason: "unknown-field" },
      { groupId: "b", elementId: "t2", field: "rate_pct", reason: "uncoercible-value", value: "abc" },
    ]);
    expect(caught instanceof SchemaMismatchError && caught.message).toBe(
      'Schema mismatch: unknown field "Stage" in a; unknown field "Bogus" in b; ' +
        'value "abc" of "rate_pct" in b does not fit its type'
    );
  });

  test("two columns folding into one field with different values is a mismatch", () => {
    expect(() => reconcileRecords([record("table", { "Trust (%)": "90", Rate: "91" })], schema)).toThrow(
      'several columns of one row fold into "rate_pct" with different values in g'
    );
  });

  test("extraction and reconciliation reproduce the rows a document was built from", () => {
    const path = "/reports/2026_1_XXX_My_Hospital.html";
    const section = { id: "stage-completeness", num: "1.2", name: "Stage completeness" };
    const provenance = {
      periodYear: 2026,
      periodCycle: 1,
      siteCode: "XXX",
      siteName: "My Hospital",
      sourceDocument: path,
    };
    const expected: NormalizedRow[] = [
      {
        group: section,
        values: { ...emptyValues(), category: "Breast", period: "2025-Q4", rank: 3, numerator: 45, denominator: 50, rate_pct: 90 },
        origin: "table",
        provenance,
      },
      {
        group: section,
        values: { ...emptyValues(), category: "Lung", period: "2025-Q4", numerator: 8, denominator: 10, rate_pct: 80, lower_ci: 72.5, upper_ci: 86.25 },
        origin: "table",
        provenance,
      },
    ];

    const names = schema.fields.map((field) => field.name);
    const head = names.map((name) => `<th>${name}</th>`).join("");
    const body = expected
      .map((row) => `<tr>${names.map((name) => `<td>${row.values[name] ?? ""}</td>`).join("")}</tr>`)
      .join("");
    const document = parseHtml(
      `<html><body><div class="section level3" id="${section.id}"><h3>${section.num} ${section.name}</h3>` +
        `<table><thead><tr>${head}</tr></thead><tbody>${body}</tbody></table></div></body></html>`,
      path
    );

    const reconciled = reconcileRecords(records(extractTableRecords(document), extractPlotRecords(document)), schema);
    const tagged = tagProvenance(path, reconciled.rows);

    expect(tagged.rows).toEqual(expected);
  });
});
