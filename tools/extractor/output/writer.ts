import { formatCsv, type CsvCell } from "../lib/csv.js";
import { writeTextAtomic } from "../lib/json.js";
import { documentOutputPath, sectionOutputPath } from "../lib/paths.js";
import { WriteError } from "../pipeline/errors.js";
import type { OutputLayout } from "../pipeline/types.js";
import type { NormalizedRow, Provenance } from "../provenance/provenance.js";
import type { FieldSchema } from "../reconcile/field-schema.js";

export interface WriteExtractOptions {
  outputDir: string;
  layout: OutputLayout;
  dryRun?: boolean;
}

export interface WrittenExtract {
  path: string;
  rowCount: number;
  bytes: number;
}

const LEADING_COLUMNS = ["section_id", "section_num", "section_name"] as const;
const TRAILING_COLUMNS = ["period_year", "period_cycle", "site_code", "site_name", "source_origin"] as const;

export function extractColumns(schema: FieldSchema): string[] {
  return [...LEADING_COLUMNS, ...schema.fields.map((field) => field.name), ...TRAILING_COLUMNS];
}

export function renderExtract(rows: readonly NormalizedRow[], schema: FieldSchema): string {
  return formatCsv(
    extractColumns(schema),
    rows.map((row) => rowCells(row, schema))
  );
}

function rowCells(row: NormalizedRow, schema: FieldSchema): CsvCell[] {
  const { provenance } = row;
  return [
    row.group.id,
    row.group.num,
    row.group.name,
    ...schema.fields.map((field) => row.values[field.name] ?? null),
    provenance.periodYear,
    provenance.periodCycle,
    provenance.siteCode,
    provenance.siteName,
    row.origin,
  ];
}

export function writeExtract(
  rows: readonly NormalizedRow[],
  provenance: Provenance,
  schema: FieldSchema,
  options: WriteExtractOptions
): WrittenExtract[] {
  const planned =
    options.layout === "section"
      ? [...groupBySection(rows)].map(([sectionId, sectionRows]) => ({
          path: sectionOutputPath(options.outputDir, provenance.siteCode, provenance.sourceDocument, sectionId),
          rows: sectionRows,
        }))
      : [
          {
            path: documentOutputPath(options.outputDir, provenance.siteCode, provenance.sourceDocument),
            rows,
          },
        ];

  return planned.map(({ path, rows: fileRows }) => {
    const content = renderExtract(fileRows, schema);
    if (!options.dryRun) {
      try {
        writeTextAtomic(path, content);
      } catch (error) {
        throw new WriteError(path, error);
      }
    }
    return { path, rowCount: fileRows.length, bytes: Buffer.byteLength(content) };
  });
}

function groupBySection(rows: readonly NormalizedRow[]): Map<string, NormalizedRow[]> {
  const sections = new Map<string, NormalizedRow[]>();
  for (const row of rows) {
    const sectionId = row.group.id.replace(/-/g, "_");
    const bucket = sections.get(sectionId);
    if (bucket) {
      bucket.push(row);
    } else {
      sections.set(sectionId, [row]);
    }
  }
  return sections;
}
