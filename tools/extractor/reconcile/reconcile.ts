import type { ExtractionWarning, RawRecord, RecordGroup } from "../executors/types.js";
import { SchemaMismatchError, type FieldMismatch } from "../pipeline/errors.js";
import { coerceValue, type FieldValue } from "./coerce.js";
import type { FieldSchema } from "./field-schema.js";

export type SourceOrigin = "table" | "plot" | "table+plot";

export interface ReconciledRow {
  readonly group: Readonly<RecordGroup>;
  readonly values: Readonly<Record<string, FieldValue>>;
  readonly origin: SourceOrigin;
}

export interface ReconcileOptions {
  conflictTolerance?: number;
}

export interface ReconcileResult {
  rows: ReconciledRow[];
  conflicts: ExtractionWarning[];
}

export const DEFAULT_CONFLICT_TOLERANCE = 0.05;

interface MappedRecord {
  record: RawRecord;
  values: Map<string, FieldValue>;
}

interface PlotPartial {
  key: string | undefined;
  values: Map<string, FieldValue>;
  elementIds: string[];
  consumed: boolean;
}

interface GroupBucket {
  group: RecordGroup;
  table: MappedRecord[];
  plot: MappedRecord[];
}

export function reconcileRecords(
  records: Iterable<RawRecord>,
  schema: FieldSchema,
  options: ReconcileOptions = {}
): ReconcileResult {
  const tolerance = options.conflictTolerance ?? DEFAULT_CONFLICT_TOLERANCE;
  const mismatches: FieldMismatch[] = [];
  const buckets = new Map<string, GroupBucket>();

  for (const record of records) {
    const mapped = mapRecord(record, schema, mismatches);
    let bucket = buckets.get(record.group.id);
    if (!bucket) {
      bucket = { group: record.group, table: [], plot: [] };
      buckets.set(record.group.id, bucket);
    }
    (record.origin === "table" ? bucket.table : bucket.plot).push(mapped);
  }

  if (mismatches.length > 0) {
    throw new SchemaMismatchError(dedupeMismatches(mismatches));
  }

  const rows: ReconciledRow[] = [];
  const conflicts: ExtractionWarning[] = [];
  for (const bucket of buckets.values()) {
    reconcileGroup(bucket, schema, tolerance, rows, conflicts);
  }
  return { rows, conflicts };
}

function mapRecord(record: RawRecord, schema: FieldSchema, mismatches: FieldMismatch[]): MappedRecord {
  const values = new Map<string, FieldValue>();
  const base = { groupId: record.group.id, elementId: record.elementId };

  for (const [sourceName, raw] of Object.entries(record.fields)) {
    const field = schema.resolve(sourceName);
    if (!field) {
      mismatches.push({ ...base, field: sourceName, reason: "unknown-field" });
      continue;
    }
    const coerced = coerceValue(raw, field, schema);
    if (!coerced.ok) {
      mismatches.push({ ...base, field: field.name, reason: "uncoercible-value", value: String(raw) });
      continue;
    }

    // Two source columns of one row may fold into the same field.
    const existing = values.get(field.name);
    if (existing === undefined || existing === null) {
      values.set(field.name, coerced.value);
    } else if (coerced.value !== null && !sameValue(existing, coerced.value, 0)) {
      mismatches.push({ ...base, field: field.name, reason: "ambiguous-field", value: String(raw) });
    }
  }

  return { record, values };
}

function dedupeMismatches(mismatches: FieldMismatch[]): FieldMismatch[] {
  const seen = new Set<string>();
  return mismatches.filter((mismatch) => {
    const id =
      mismatch.reason === "unknown-field"
        ? `${mismatch.reason}|${mismatch.groupId}|${mismatch.field}`
        : `${mismatch.reason}|${mismatch.groupId}|${mismatch.field}|${mismatch.value ?? ""}`;
    if (seen.has(id)) {
      return false;
    }
    seen.add(id);
    return true;
  });
}

function reconcileGroup(
  bucket: GroupBucket,
  schema: FieldSchema,
  tolerance: number,
  rows: ReconciledRow[],
  conflicts: ExtractionWarning[]
): void {
  const partials: PlotPartial[] = [];
  const byKey = new Map<string, PlotPartial>();

  for (const mapped of bucket.plot) {
    const key = recordKey(mapped.values, schema);
    const partial = key === undefined ? undefined : byKey.get(key);
    if (!partial) {
      const created: PlotPartial = {
        key,
        values: new Map(mapped.values),
        elementIds: [mapped.record.elementId],
        consumed: false,
      };
      partials.push(created);
      if (key !== undefined) {
        byKey.set(key, created);
      }
      continue;
    }

    if (!partial.elementIds.includes(mapped.record.elementId)) {
      partial.elementIds.push(mapped.record.elementId);
    }
    for (const [field, value] of mapped.values) {
      const current = partial.values.get(field);
      if (current === undefined || current === null) {
        partial.values.set(field, value);
      } else if (value !== null && !sameValue(current, value, tolerance)) {
        conflicts.push(
          conflictWarning(bucket.group.id, mapped.record.elementId, field, current, value, "first chart value kept")
        );
      }
    }
  }

  for (const mapped of bucket.table) {
    const values = new Map(mapped.values);
    let origin: SourceOrigin = "table";
    const key = recordKey(mapped.values, schema);
    const partial = key === undefined ? undefined : byKey.get(key);

    if (partial && !partial.consumed) {
      partial.consumed = true;
      for (const [field, plotValue] of partial.values) {
        if (!values.has(field)) {
          values.set(field, plotValue);
          origin = "table+plot";
          continue;
        }
        const tableValue = values.get(field) ?? null;
        if (plotValue !== null && !sameValue(tableValue, plotValue, tolerance)) {
          conflicts.push(
            conflictWarning(
              bucket.group.id,
              mapped.record.elementId,
              field,
              tableValue,
              plotValue,
              `table value kept over ${partial.elementIds.join(", ")}`
            )
          );
        }
      }
    }

    rows.push(freezeRow(bucket.group, values, origin, schema));
  }

  for (const partial of partials) {
    if (!partial.consumed) {
      rows.push(freezeRow(bucket.group, partial.values, "plot", schema));
    }
  }
}

function recordKey(values: ReadonlyMap<string, FieldValue>, schema: FieldSchema): string | undefined {
  const parts: Array<[string, string | number]> = [];
  for (const name of schema.keyFields) {
    const value = values.get(name);
    if (value === undefined || value === null) {
      continue;
    }
    parts.push([name, typeof value === "string" ? value.toLowerCase() : value]);
  }
  return parts.length > 0 ? JSON.stringify(parts) : undefined;
}

function sameValue(a: FieldValue, b: FieldValue, tolerance: number): boolean {
  if (typeof a === "number" && typeof b === "number") {
    return Math.abs(a - b) <= tolerance;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a.toLowerCase() === b.toLowerCase();
  }
  return a === b;
}

function conflictWarning(
  groupId: string,
  elementId: string,
  field: string,
  kept: FieldValue,
  other: FieldValue,
  resolution: string
): ExtractionWarning {
  return {
    kind: "value-conflict",
    elementId,
    groupId,
    message: `Field ${field} in ${groupId}: ${formatValue(kept)} vs ${formatValue(other)}; ${resolution}`,
  };
}

function formatValue(value: FieldValue): string {
  return value === null ? "null" : JSON.stringify(value);
}

function freezeRow(
  group: RecordGroup,
  observed: ReadonlyMap<string, FieldValue>,
  origin: SourceOrigin,
  schema: FieldSchema
): ReconciledRow {
  const values: Record<string, FieldValue> = {};
  for (const field of schema.fields) {
    values[field.name] = observed.get(field.name) ?? null;
  }
  return Object.freeze({
    group: Object.freeze({ ...group }),
    values: Object.freeze(values),
    origin,
  });
}
