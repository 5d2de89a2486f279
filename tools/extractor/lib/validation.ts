import { Ajv, type SchemaObject } from "ajv";
import addFormatsPlugin from "ajv-formats";
import { FIELD_SCHEMA_SCHEMA_PATH } from "./paths.js";
import { readJsonFile } from "./json.js";

export type FieldType = "string" | "number" | "integer";
export type FieldRole = "key" | "value";

export interface FieldDefinitionDocument {
  name: string;
  type: FieldType;
  role?: FieldRole;
  aliases?: string[];
}

export interface FieldSchemaDocument {
  version: number;
  nullTokens?: string[];
  excludeSections?: string[];
  fields: FieldDefinitionDocument[];
}

export interface ValidationIssue {
  file: string;
  messages: string[];
}

// ajv-formats is CommonJS; its plugin function sits on `default` under NodeNext.
const addFormats = addFormatsPlugin.default;

function createAjv(): Ajv {
  const ajv = new Ajv({ allErrors: true, strict: true, strictSchema: true });
  addFormats(ajv);
  return ajv;
}

export function validateFieldSchemaDocument(
  file: string,
  data: unknown
): { document: FieldSchemaDocument | null; issues: ValidationIssue[] } {
  const validate = createAjv().compile<FieldSchemaDocument>(
    readJsonFile<SchemaObject>(FIELD_SCHEMA_SCHEMA_PATH)
  );
  if (validate(data)) {
    return { document: data, issues: [] };
  }
  return {
    document: null,
    issues: [
      {
        file,
        messages: (validate.errors ?? []).map((err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`),
      },
    ],
  };
}
