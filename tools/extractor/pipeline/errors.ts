export class PipelineError extends Error {
  public readonly code: string;

  constructor(message: string, options: { code: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "CONFIG_ERROR", cause });
  }
}

export class LoadError extends PipelineError {
  constructor(
    public readonly path: string,
    message: string,
    cause?: unknown
  ) {
    super(`Cannot load ${path}: ${message}`, { code: "LOAD_ERROR", cause });
  }
}

export class PayloadParseError extends PipelineError {
  constructor(
    public readonly elementId: string,
    message: string,
    cause?: unknown
  ) {
    super(`Payload at ${elementId} could not be decoded: ${message}`, {
      code: "PAYLOAD_PARSE_ERROR",
      cause,
    });
  }
}

export interface FieldMismatch {
  field: string;
  groupId: string;
  elementId: string;
  reason: "unknown-field" | "uncoercible-value" | "ambiguous-field";
  value?: string;
}

export class SchemaMismatchError extends PipelineError {
  constructor(public readonly mismatches: FieldMismatch[]) {
    super(`Schema mismatch: ${mismatches.map(describeMismatch).join("; ")}`, {
      code: "SCHEMA_MISMATCH",
    });
  }
}

export class ProvenanceParseError extends PipelineError {
  constructor(
    public readonly fileName: string,
    message: string
  ) {
    super(`Cannot derive provenance from ${fileName}: ${message}`, {
      code: "PROVENANCE_PARSE_ERROR",
    });
  }
}

export class WriteError extends PipelineError {
  constructor(
    public readonly path: string,
    cause?: unknown
  ) {
    super(`Cannot write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      code: "WRITE_ERROR",
      cause,
    });
  }
}

function describeMismatch(mismatch: FieldMismatch): string {
  if (mismatch.reason === "unknown-field") {
    return `unknown field "${mismatch.field}" in ${mismatch.groupId}`;
  }
  if (mismatch.reason === "ambiguous-field") {
    return `several columns of one row fold into "${mismatch.field}" with different values in ${mismatch.groupId}`;
  }
  return `value ${JSON.stringify(mismatch.value)} of "${mismatch.field}" in ${mismatch.groupId} does not fit its type`;
}
