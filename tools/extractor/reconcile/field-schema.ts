import { readJsonFile } from "../lib/json.js";
import {
  validateFieldSchemaDocument,
  type FieldRole,
  type FieldSchemaDocument,
  type FieldType,
} from "../lib/validation.js";
import { ConfigError } from "../pipeline/errors.js";

export interface FieldDefinition {
  readonly name: string;
  readonly type: FieldType;
  readonly role: FieldRole;
  readonly aliases: readonly string[];
}

export const RESERVED_COLUMNS = [
  "section_id",
  "section_num",
  "section_name",
  "period_year",
  "period_cycle",
  "site_code",
  "site_name",
  "source_origin",
] as const;

export class FieldSchema {
  readonly fields: readonly FieldDefinition[];
  readonly keyFields: readonly string[];
  readonly excludeSections: readonly RegExp[];
  private readonly byAlias: ReadonlyMap<string, FieldDefinition>;
  private readonly nullTokens: ReadonlySet<string>;

  private constructor(
    fields: FieldDefinition[],
    byAlias: Map<string, FieldDefinition>,
    nullTokens: Set<string>,
    excludeSections: RegExp[]
  ) {
    this.fields = Object.freeze(fields);
    this.keyFields = Object.freeze(fields.filter((field) => field.role === "key").map((field) => field.name));
    this.byAlias = byAlias;
    this.nullTokens = nullTokens;
    this.excludeSections = Object.freeze(excludeSections);
    Object.freeze(this);
  }

  static fromDocument(document: FieldSchemaDocument): FieldSchema {
    const fields: FieldDefinition[] = [];
    const byAlias = new Map<string, FieldDefinition>();
    const problems: string[] = [];
    const reserved = new Set<string>(RESERVED_COLUMNS);

    for (const entry of document.fields) {
      if (reserved.has(entry.name)) {
        problems.push(`field "${entry.name}" collides with an output column`);
      }
      const definition: FieldDefinition = Object.freeze({
        name: entry.name,
        type: entry.type,
        role: entry.role ?? "value",
        aliases: Object.freeze([...(entry.aliases ?? [])]),
      });
      fields.push(definition);

      for (const alias of [entry.name, ...(entry.aliases ?? [])]) {
        const key = normalizeFieldName(alias);
        const owner = byAlias.get(key);
        if (owner && owner.name !== definition.name) {
          problems.push(`alias "${alias}" maps to both "${owner.name}" and "${definition.name}"`);
          continue;
        }
        byAlias.set(key, definition);
      }
    }

    if (problems.length > 0) {
      throw new ConfigError(`Invalid field schema: ${problems.join("; ")}`);
    }

    return new FieldSchema(
      fields,
      byAlias,
      new Set((document.nullTokens ?? []).map((token) => token.trim().toLowerCase())),
      (document.excludeSections ?? []).map((pattern) => new RegExp(pattern))
    );
  }

  resolve(sourceName: string): FieldDefinition | undefined {
    return this.byAlias.get(normalizeFieldName(sourceName));
  }

  isNullToken(value: string): boolean {
    return this.nullTokens.has(value.trim().toLowerCase());
  }
}

export function normalizeFieldName(name: string): string {
  return name.replace(/\s+/g, " ").trim().replace(/\s*:$/, "").toLowerCase();
}

export function loadFieldSchema(path: string): FieldSchema {
  let raw: unknown;
  try {
    raw = readJsonFile<unknown>(path);
  } catch (error) {
    throw new ConfigError(
      `Cannot read field schema ${path}: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
  const { document, issues } = validateFieldSchemaDocument(path, raw);
  if (!document) {
    throw new ConfigError(
      `Field schema ${path} is invalid: ${issues.flatMap((issue) => issue.messages).join("; ")}`
    );
  }
  return FieldSchema.fromDocument(document);
}
