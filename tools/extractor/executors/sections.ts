import { childElements, hasClass, isHeading, textContent, type ElementVisit } from "../document/tree.js";
import type { RecordGroup } from "./types.js";

export const DOCUMENT_GROUP: RecordGroup = { id: "document", num: "", name: "" };

// Innermost `div.section[id]` wins; loose markup falls back to the closest preceding heading.
export function resolveGroup(visit: ElementVisit): RecordGroup {
  for (let i = visit.ancestors.length - 1; i >= 0; i--) {
    const ancestor = visit.ancestors[i];
    const id = ancestor.attrs.id;
    if (!id || !hasClass(ancestor, "section")) {
      continue;
    }
    const heading = childElements(ancestor).find(isHeading);
    return { id, ...splitSectionTitle(heading ? textContent(heading) : "") };
  }

  if (visit.precedingHeading) {
    return { id: slugify(visit.precedingHeading), ...splitSectionTitle(visit.precedingHeading) };
  }

  return DOCUMENT_GROUP;
}

export function splitSectionTitle(title: string): { num: string; name: string } {
  const [first, ...rest] = title.split(" ");
  if (first && /^\d+(\.\d+)*\.?$/.test(first)) {
    return { num: first.replace(/\.$/, ""), name: rest.join(" ") };
  }
  return { num: "", name: title };
}

export function isExcludedGroup(group: RecordGroup, patterns: readonly RegExp[] | undefined): boolean {
  return (patterns ?? []).some((pattern) => pattern.test(group.id));
}

export function slugify(input: string): string {
  const slug = input
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "section";
}
