export type RawValue = string | number | null;
export type RecordOrigin = "table" | "plot";

export interface RecordGroup {
  id: string;
  num: string;
  name: string;
}

export interface RawRecord {
  fields: Record<string, RawValue>;
  origin: RecordOrigin;
  elementId: string;
  group: RecordGroup;
  index: number;
  chartTitle?: string;
}

export type ExtractionWarningKind =
  | "row-column-mismatch"
  | "payload-parse-error"
  | "value-conflict"
  | "archive-skipped";

export interface ExtractionWarning {
  kind: ExtractionWarningKind;
  elementId: string;
  message: string;
  groupId?: string;
  rowIndex?: number;
  droppedValues?: RawValue[];
}

export type ExtractionNoteKind = "table-without-header" | "payload-declined" | "section-excluded";

export interface ExtractionNote {
  kind: ExtractionNoteKind;
  elementId: string;
  message: string;
  groupId?: string;
}

export type ExtractionItem =
  | { kind: "record"; record: RawRecord }
  | { kind: "warning"; warning: ExtractionWarning }
  | { kind: "note"; note: ExtractionNote };

export interface ExtractionOptions {
  excludeSections?: readonly RegExp[];
  hoverFields?: readonly string[];
}
