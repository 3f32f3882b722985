import { Extraction, NodePath, TextSpan } from "../types";
import { ExtractionError, describeError } from "../errors";
import { hasRtlScript, isRtlLanguage } from "../lang";
import { Logger, getLogger } from "../logger";
import { ParsedHtml, isElement, isText, parseHtml } from "./dom";

export const MAX_HTML_SIZE = 10 * 1024 * 1024;
export const DEFAULT_MIN_TEXT_LENGTH = 2;

// Subtrees whose text is code, markup or otherwise not prose.
const SKIP_TAGS = new Set(["script", "style", "noscript", "template", "code", "pre", "textarea", "svg", "math"]);

const EDGE_WHITESPACE = /^(\s*)([\s\S]*?)(\s*)$/;

export interface ExtractOptions {
  minTextLength?: number;
  logger?: Logger;
}

/**
 * Walks the parsed tree in document order and records every translatable text node
 * as a span addressed by its child-index path. The tree itself is never modified.
 */
export function extractSpans(html: unknown, opts: ExtractOptions = {}): Extraction {
  const parsed = parseOrThrow(html);
  const minTextLength = opts.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH;
  const spans: TextSpan[] = [];
  const placement = new Map<number, NodePath>();

  const visit = (node: Node, path: number[]) => {
    if (isText(node)) {
      const span = toSpan(node, path, spans.length, minTextLength);
      if (span) {
        spans.push(span);
        placement.set(span.id, span.path);
      }
      return;
    }
    if (isElement(node) && isSkipped(node)) return;
    node.childNodes.forEach((child, index) => visit(child, [...path, index]));
  };
  visit(parsed.root, []);

  (opts.logger ?? getLogger("core")).debug("extract.done", { mode: parsed.mode, spans: spans.length, chars: parsed.source.length });
  return { source: parsed.source, mode: parsed.mode, spans, placement };
}

function parseOrThrow(html: unknown): ParsedHtml & { source: string } {
  if (typeof html !== "string") {
    throw new ExtractionError("invalid_input", `Expected an HTML string, got ${typeof html}`);
  }
  if (!html.trim()) throw new ExtractionError("empty", "HTML input is empty");
  if (html.length > MAX_HTML_SIZE) {
    throw new ExtractionError("too_large", `HTML input is too large (${html.length} chars, max ${MAX_HTML_SIZE})`);
  }
  try {
    return { ...parseHtml(html), source: html };
  } catch (e) {
    throw new ExtractionError("parse_failed", `Could not parse HTML: ${describeError(e)}`, { cause: e });
  }
}

function isSkipped(el: Element): boolean {
  return SKIP_TAGS.has(el.localName) || el.getAttribute("translate")?.toLowerCase() === "no";
}

function toSpan(node: Text, path: number[], id: number, minTextLength: number): TextSpan | null {
  const match = EDGE_WHITESPACE.exec(node.data);
  const [, leading = "", text = "", trailing = ""] = match ?? [];
  if (!text || Array.from(text).length < minTextLength) return null;

  const container = node.parentElement;
  const dir = container?.closest("[dir]")?.getAttribute("dir") ?? undefined;
  const lang = container?.closest("[lang]")?.getAttribute("lang") ?? undefined;
  return {
    id,
    text,
    leading,
    trailing,
    path,
    container: container?.localName ?? "#fragment",
    dir,
    lang,
    rtl: detectRtl(container, dir, lang, text),
  };
}

function detectRtl(container: Element | null, dir: string | undefined, lang: string | undefined, text: string): boolean {
  const direction = dir?.trim().toLowerCase();
  if (direction === "rtl") return true;
  if (direction === "ltr") return false;
  if (isRtlLanguage(lang)) return true;
  if (container && Array.from(container.classList).some((c) => c.toLowerCase().includes("rtl"))) return true;
  return hasRtlScript(text);
}
