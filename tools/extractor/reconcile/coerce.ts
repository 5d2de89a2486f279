import type { RawValue } from "../executors/types.js";
import type { FieldDefinition, FieldSchema } from "./field-schema.js";

export type FieldValue = string | number | null;

export type CoerceResult = { ok: true; value: FieldValue } | { ok: false };

const NUMERIC = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

export function coerceValue(raw: RawValue, field: FieldDefinition, schema: FieldSchema): CoerceResult {
  if (raw === null) {
    return { ok: true, value: null };
  }

  if (typeof raw === "number") {
    if (field.type === "string") {
      return { ok: true, value: String(raw) };
    }
    return checkNumber(raw, field);
  }

  const text = raw.replace(/\s+/g, " ").trim();
  if (text === "" || schema.isNullToken(text)) {
    return { ok: true, value: null };
  }
  if (field.type === "string") {
    return { ok: true, value: text };
  }

  // "1,234" and "12.5%" are how the reports print numbers
  const cleaned = text.replace(/,/g, "").replace(/\s*%$/, "");
  if (!NUMERIC.test(cleaned)) {
    return { ok: false };
  }
  return checkNumber(Number(cleaned), field);
}

function checkNumber(value: number, field: FieldDefinition): CoerceResult {
  if (!Number.isFinite(value)) {
    return { ok: false };
  }
  if (field.type === "integer" && !Number.isInteger(value)) {
    return { ok: false };
  }
  return { ok: true, value };
}
