import { basename, extname } from "path";
import { ProvenanceParseError } from "../pipeline/errors.js";
import type { ReconciledRow } from "../reconcile/reconcile.js";

export interface Provenance {
  readonly periodYear: number;
  readonly periodCycle: number;
  readonly siteCode: string;
  readonly siteName: string;
  readonly sourceDocument: string;
}

export interface NormalizedRow extends ReconciledRow {
  readonly provenance: Provenance;
}

const YEAR = /^\d{4}$/;
const CYCLE = /^\d{1,2}$/;
const SITE_CODE = /^[A-Za-z0-9]+$/;

// `<year>_<cycle>_<site-code>_<site-name>[_FIX].<ext>`; only a trailing `_FIX` marks a re-issue.
export function parseProvenance(filePath: string): Provenance {
  const fileName = basename(filePath);
  const stem = fileName.slice(0, fileName.length - extname(fileName).length).replace(/_FIX$/, "");
  const [year = "", cycle = "", siteCode = "", ...nameParts] = stem.split("_");

  if (!YEAR.test(year)) {
    throw new ProvenanceParseError(fileName, `year "${year}" is not four digits`);
  }
  const periodCycle = Number(cycle);
  if (!CYCLE.test(cycle) || periodCycle < 1 || periodCycle > 12) {
    throw new ProvenanceParseError(fileName, `cycle "${cycle}" is not a reporting month 1-12`);
  }
  if (!SITE_CODE.test(siteCode)) {
    throw new ProvenanceParseError(fileName, `site code "${siteCode}" is not alphanumeric`);
  }
  const siteName = nameParts.filter((part) => part !== "").join(" ");
  if (siteName === "") {
    throw new ProvenanceParseError(fileName, "site name is missing");
  }

  return Object.freeze({
    periodYear: Number(year),
    periodCycle,
    siteCode,
    siteName,
    sourceDocument: filePath,
  });
}

export interface TaggedRows {
  provenance: Provenance;
  rows: NormalizedRow[];
}

export function tagProvenance(filePath: string, rows: readonly ReconciledRow[]): TaggedRows {
  const provenance = parseProvenance(filePath);
  return {
    provenance,
    rows: rows.map((row) => Object.freeze({ ...row, provenance })),
  };
}
