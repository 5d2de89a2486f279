import { z } from "zod";
import { parseFragment } from "../document/loader.js";
import {
  childElements,
  findAll,
  textContent,
  walkElements,
  type ElementNode,
  type ElementVisit,
  type SourceDocument,
} from "../document/tree.js";
import { findPayloads, tryDecodePayload, type PayloadSite } from "./payloads.js";
import { isExcludedGroup, resolveGroup } from "./sections.js";
import type { ExtractionItem, ExtractionOptions, RawValue, RecordGroup } from "./types.js";

const MAX_SPAN = 1000;

interface SourceRow {
  cells: ElementNode[];
  inHead: boolean;
}

interface GridRow {
  cells: Array<string | undefined>;
  header: boolean;
}

const widgetCellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const dataTableWidgetSchema = z.object({
  x: z.object({
    container: z.string(),
    data: z.array(z.array(widgetCellSchema)),
    options: z
      .object({
        columnDefs: z
          .array(
            z.object({
              name: z.string().optional(),
              targets: z.unknown().optional(),
            })
          )
          .optional(),
      })
      .optional(),
  }),
});

type DataTableWidget = z.infer<typeof dataTableWidgetSchema>;

export function extractTableRecords(
  document: SourceDocument,
  options: ExtractionOptions = {}
): Iterable<ExtractionItem> {
  return {
    [Symbol.iterator]: () => scanTables(document, options),
  };
}

function* scanTables(document: SourceDocument, options: ExtractionOptions): Generator<ExtractionItem> {
  const widgets = new Map<string, PayloadSite>();
  for (const site of findPayloads(document)) {
    if (site.source === "script") {
      widgets.set(site.elementId, site);
    }
  }

  for (const visit of walkElements(document.root)) {
    if (visit.node.tag === "table") {
      yield* tableElementItems(visit, options);
      continue;
    }
    const site = widgets.get(visit.node.locator);
    if (site) {
      const parsed = dataTableWidgetSchema.safeParse(tryDecodePayload(site));
      if (parsed.success) {
        yield* widgetTableItems(site, parsed.data, options);
      }
    }
  }
}

function* tableElementItems(visit: ElementVisit, options: ExtractionOptions): Generator<ExtractionItem> {
  const table = visit.node;
  const group = resolveGroup(visit);
  if (isExcludedGroup(group, options.excludeSections)) {
    yield excludedNote(table.locator, group);
    return;
  }

  const grid = expandGrid(collectRows(table));
  const headerRows = grid.filter((row) => row.header);
  if (headerRows.length === 0) {
    yield {
      kind: "note",
      note: {
        kind: "table-without-header",
        elementId: table.locator,
        groupId: group.id,
        message: "Table has no header row; not treated as a data table",
      },
    };
    return;
  }

  const headers = buildHeaderLabels(headerRows);
  const bodyRows = grid.filter((row) => !row.header);
  yield* rowItems(
    bodyRows.map((row) => row.cells),
    headers,
    table.locator,
    group
  );
}

function* widgetTableItems(
  site: PayloadSite,
  widget: DataTableWidget,
  options: ExtractionOptions
): Generator<ExtractionItem> {
  const group = resolveGroup(site.visit);
  if (isExcludedGroup(group, options.excludeSections)) {
    yield excludedNote(site.elementId, group);
    return;
  }

  const columns = widget.x.data;
  const headers = widgetHeaders(widget, columns.length, site.elementId);
  const rowCount = Math.max(0, ...columns.map((column) => column.length));
  if (!headers) {
    yield {
      kind: "warning",
      warning: {
        kind: "row-column-mismatch",
        elementId: site.elementId,
        groupId: group.id,
        message: `Widget table header does not cover its ${columns.length} data columns; ${rowCount} rows dropped`,
      },
    };
    return;
  }

  const kept = headers.flatMap((label, column) => (column === 0 && label === "" ? [] : [column]));
  const labels = dedupeLabels(kept.map((column) => headers[column] || `Column ${column + 1}`));
  const rows: Array<Array<string | undefined>> = [];
  for (let i = 0; i < rowCount; i++) {
    rows.push(kept.map((column) => (i < columns[column].length ? widgetCellText(columns[column][i]) : undefined)));
  }
  yield* rowItems(rows, labels, site.elementId, group);
}

function* rowItems(
  rows: Array<Array<string | undefined>>,
  headers: string[],
  elementId: string,
  group: RecordGroup
): Generator<ExtractionItem> {
  let index = 0;
  for (const [rowIndex, cells] of rows.entries()) {
    const width = cells.filter((cell) => cell !== undefined).length;
    if (width !== headers.length || cells.length !== headers.length) {
      yield {
        kind: "warning",
        warning: {
          kind: "row-column-mismatch",
          elementId,
          groupId: group.id,
          rowIndex,
          message: `Row ${rowIndex} has ${width} cells, header has ${headers.length}`,
          droppedValues: cells.map((cell) => cell ?? null),
        },
      };
      continue;
    }

    const fields: Record<string, RawValue> = {};
    headers.forEach((header, column) => {
      fields[header] = cells[column] ?? null;
    });
    yield {
      kind: "record",
      record: { fields, origin: "table", elementId, group, index },
    };
    index += 1;
  }
}

function collectRows(table: ElementNode): SourceRow[] {
  const rows: SourceRow[] = [];
  const visit = (node: ElementNode, inHead: boolean): void => {
    for (const child of childElements(node)) {
      if (child.tag === "table") {
        continue;
      }
      if (child.tag === "tr") {
        rows.push({
          cells: childElements(child).filter((cell) => cell.tag === "td" || cell.tag === "th"),
          inHead,
        });
        continue;
      }
      visit(child, inHead || child.tag === "thead");
    }
  };
  visit(table, false);
  return rows;
}

function expandGrid(rows: SourceRow[]): GridRow[] {
  const carried = new Map<number, Map<number, string>>();
  const grid: GridRow[] = [];
  let inHeaderBlock = true;

  rows.forEach((row, rowIndex) => {
    const cells: Array<string | undefined> = [];
    for (const [column, value] of carried.get(rowIndex) ?? []) {
      cells[column] = value;
    }
    carried.delete(rowIndex);

    let column = 0;
    for (const cell of row.cells) {
      while (cells[column] !== undefined) {
        column += 1;
      }
      const text = textContent(cell);
      const colspan = parseSpan(cell.attrs.colspan, 1, 1);
      const rowspan = parseSpan(cell.attrs.rowspan, 1, rows.length - rowIndex);
      for (let c = 0; c < colspan; c++) {
        cells[column + c] = text;
        for (let r = 1; r < rowspan; r++) {
          const target = carried.get(rowIndex + r) ?? new Map<number, string>();
          target.set(column + c, text);
          carried.set(rowIndex + r, target);
        }
      }
      column += colspan;
    }

    const allHeaderCells = row.cells.length > 0 && row.cells.every((cell) => cell.tag === "th");
    const header = inHeaderBlock && (row.inHead || allHeaderCells);
    if (!header) {
      inHeaderBlock = false;
    }
    grid.push({ cells, header });
  });

  return grid;
}

function parseSpan(raw: string | undefined, fallback: number, whenZero: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }
  // rowspan="0" runs to the last row
  if (parsed === 0) {
    return Math.max(1, Math.min(whenZero, MAX_SPAN));
  }
  return Math.min(parsed, MAX_SPAN);
}

function buildHeaderLabels(headerRows: GridRow[]): string[] {
  const width = Math.max(...headerRows.map((row) => row.cells.length));
  const labels: string[] = [];
  for (let column = 0; column < width; column++) {
    const parts: string[] = [];
    for (const row of headerRows) {
      const value = row.cells[column];
      if (value && !parts.includes(value)) {
        parts.push(value);
      }
    }
    labels.push(parts.join(" ") || `Column ${column + 1}`);
  }
  return dedupeLabels(labels);
}

function dedupeLabels(labels: string[]): string[] {
  const seen = new Map<string, number>();
  return labels.map((label) => {
    const count = (seen.get(label) ?? 0) + 1;
    seen.set(label, count);
    return count === 1 ? label : `${label} ${count}`;
  });
}

// DataTables leaves the row-name column 0 unnamed; it comes back as "".
function widgetHeaders(widget: DataTableWidget, columnCount: number, elementId: string): string[] | null {
  if (columnCount === 0) {
    return null;
  }
  const byTarget = new Map<number, string>();
  for (const def of widget.x.options?.columnDefs ?? []) {
    if (typeof def.name === "string" && typeof def.targets === "number") {
      byTarget.set(def.targets, def.name.trim());
    }
  }
  const named = Array.from({ length: columnCount }, (_, column) => byTarget.get(column) ?? "");
  if (byTarget.size > 0 && named.slice(1).every((label) => label !== "")) {
    return named;
  }

  const container = parseFragment(widget.x.container, `${elementId}>container`);
  const labels = findAll(container, (node) => node.tag === "th").map((th) => textContent(th));
  if (labels.length === columnCount) {
    return labels;
  }
  // A header cell above a row-name column the data does not carry.
  if (labels.length === columnCount + 1) {
    return labels.slice(1);
  }
  return null;
}

function widgetCellText(value: string | number | boolean | null): string {
  if (value === null) {
    return "";
  }
  if (typeof value === "string" && /<[a-z]/i.test(value)) {
    return textContent(parseFragment(value, "cell"));
  }
  return String(value);
}

function excludedNote(elementId: string, group: RecordGroup): ExtractionItem {
  return {
    kind: "note",
    note: {
      kind: "section-excluded",
      elementId,
      groupId: group.id,
      message: `Section ${group.id} is excluded by configuration`,
    },
  };
}
