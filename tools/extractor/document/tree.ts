import type { ChildNode } from "domhandler";
import { isTag, isText } from "domhandler";

export interface ElementNode {
  readonly kind: "element";
  readonly tag: string;
  readonly attrs: Readonly<Record<string, string>>;
  readonly children: readonly DocNode[];
  readonly locator: string;
}

export interface TextNode {
  readonly kind: "text";
  readonly text: string;
}

export type DocNode = ElementNode | TextNode;

export interface SourceDocument {
  readonly path: string;
  readonly fileName: string;
  readonly root: ElementNode;
}

export interface ElementVisit {
  node: ElementNode;
  ancestors: readonly ElementNode[];
  precedingHeading?: string;
}

const HEADING_TAGS = new Set(["h1", "h2", "h3", "h4", "h5", "h6"]);

export function fromDomNodes(nodes: readonly ChildNode[], parentLocator = ""): ElementNode {
  return {
    kind: "element",
    tag: "#root",
    attrs: {},
    children: convertChildren(nodes, parentLocator),
    locator: parentLocator,
  };
}

function convertChildren(nodes: readonly ChildNode[], parentLocator: string): DocNode[] {
  const out: DocNode[] = [];
  const tagCounts = new Map<string, number>();
  for (const node of nodes) {
    if (isText(node)) {
      out.push({ kind: "text", text: node.data });
      continue;
    }
    if (!isTag(node)) {
      continue;
    }
    const tag = node.name.toLowerCase();
    const position = tagCounts.get(tag) ?? 0;
    tagCounts.set(tag, position + 1);
    const id = node.attribs.id;
    const segment = id ? `${tag}#${id}` : `${tag}[${position}]`;
    const locator = parentLocator ? `${parentLocator}>${segment}` : segment;
    out.push({
      kind: "element",
      tag,
      attrs: { ...node.attribs },
      children: convertChildren(node.children, locator),
      locator,
    });
  }
  return out;
}

export function isElement(node: DocNode): node is ElementNode {
  return node.kind === "element";
}

export function childElements(node: ElementNode): ElementNode[] {
  return node.children.filter(isElement);
}

export function* walkElements(root: ElementNode): Generator<ElementVisit> {
  const state: { heading?: string } = {};
  yield* walk(root, [], state);
}

function* walk(
  node: ElementNode,
  ancestors: ElementNode[],
  state: { heading?: string }
): Generator<ElementVisit> {
  for (const child of childElements(node)) {
    yield { node: child, ancestors, precedingHeading: state.heading };
    if (HEADING_TAGS.has(child.tag)) {
      const title = textContent(child);
      if (title) {
        state.heading = title;
      }
      continue;
    }
    yield* walk(child, [...ancestors, child], state);
  }
}

export function findAll(root: ElementNode, predicate: (node: ElementNode) => boolean): ElementNode[] {
  const out: ElementNode[] = [];
  for (const visit of walkElements(root)) {
    if (predicate(visit.node)) {
      out.push(visit.node);
    }
  }
  return out;
}

export function findFirst(
  root: ElementNode,
  predicate: (node: ElementNode) => boolean
): ElementNode | undefined {
  for (const visit of walkElements(root)) {
    if (predicate(visit.node)) {
      return visit.node;
    }
  }
  return undefined;
}

export function hasClass(node: ElementNode, className: string): boolean {
  const classes = node.attrs.class;
  if (!classes) {
    return false;
  }
  return classes.split(/\s+/).includes(className);
}

export function isHeading(node: ElementNode): boolean {
  return HEADING_TAGS.has(node.tag);
}

export function rawText(node: ElementNode): string {
  let out = "";
  for (const child of node.children) {
    out += child.kind === "text" ? child.text : rawText(child);
  }
  return out;
}

export function textContent(node: ElementNode): string {
  return normalizeSpace(collectText(node));
}

function collectText(node: ElementNode): string {
  if (node.tag === "script" || node.tag === "style") {
    return "";
  }
  let out = "";
  for (const child of node.children) {
    if (child.kind === "text") {
      out += child.text;
    } else if (child.tag === "br") {
      out += " ";
    } else {
      out += collectText(child);
    }
  }
  return out;
}

export function normalizeSpace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}
