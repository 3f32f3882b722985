import { JSDOM } from "jsdom";
import { NodePath, ParseMode } from "../types";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

const DOCUMENT_MARKER = /<(?:!doctype|html|head|body)[\s>/]/i;

export interface ParsedHtml {
  mode: ParseMode;
  root: Node; // Document or DocumentFragment
  serialize(): string;
}

export function detectMode(html: string): ParseMode {
  return DOCUMENT_MARKER.test(html) ? "document" : "fragment";
}

// Fragments go through a <template> so head-only elements (title, meta) keep their place
// and the output is not wrapped in <html><body>.
export function parseHtml(html: string): ParsedHtml {
  if (detectMode(html) === "document") {
    const dom = new JSDOM(html);
    return { mode: "document", root: dom.window.document, serialize: () => dom.serialize() };
  }
  const dom = new JSDOM("");
  const template = dom.window.document.createElement("template");
  template.innerHTML = html;
  return { mode: "fragment", root: template.content, serialize: () => template.innerHTML };
}

export function normalizeHtml(html: string): string {
  return parseHtml(html).serialize();
}

export function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function resolvePath(root: Node, path: NodePath): Node | undefined {
  let current: Node = root;
  for (const index of path) {
    const next: Node | null = current.childNodes.item(index);
    if (!next) return undefined;
    current = next;
  }
  return current;
}
