import { readFileSync } from "fs";
import { basename } from "path";
import * as cheerio from "cheerio";
import { LoadError } from "../pipeline/errors.js";
import { emitEvent } from "../pipeline/events.js";
import { findFirst, fromDomNodes, textContent, type ElementNode, type SourceDocument } from "./tree.js";

export function loadDocument(path: string): SourceDocument {
  let html: string;
  try {
    html = readFileSync(path, "utf-8");
  } catch (error) {
    throw new LoadError(path, error instanceof Error ? error.message : String(error), error);
  }
  emitEvent({
    level: "debug",
    eventType: "file.read",
    message: "Read source document",
    path,
    bytes: Buffer.byteLength(html),
  });
  return parseHtml(html, path);
}

export function parseHtml(html: string, path: string): SourceDocument {
  if (html.trim().length === 0) {
    throw new LoadError(path, "document is empty");
  }
  if (html.includes("\u0000")) {
    throw new LoadError(path, "document contains binary content");
  }

  const $ = cheerio.load(html);
  const root = fromDomNodes($.root()[0].children);
  const body = findFirst(root, (node) => node.tag === "body");
  if (!body || !hasContent(body)) {
    throw new LoadError(path, "document has no body content");
  }

  return { path, fileName: basename(path), root };
}

export function parseFragment(html: string, locator: string): ElementNode {
  const $ = cheerio.load(html, {}, false);
  return fromDomNodes($.root()[0].children, locator);
}

function hasContent(body: ElementNode): boolean {
  return body.children.some((child) => child.kind === "element") || textContent(body).length > 0;
}
