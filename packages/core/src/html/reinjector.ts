import { Extraction, TextSpan, TransformedSpan } from "../types";
import { ReinjectionError } from "../errors";
import { isText, parseHtml, resolvePath } from "./dom";

export interface ReinjectOptions {
  preserveFormatting?: boolean;
}

/**
 * Re-parses the extraction source and writes each transformed text into the text node
 * its span was taken from. Elements, attributes and node order are left as parsed.
 */
export function reinject(
  extraction: Extraction,
  transformed: ReadonlyArray<TransformedSpan>,
  opts: ReinjectOptions = {}
): string {
  const { spans, placement } = extraction;
  if (transformed.length !== spans.length || transformed.length !== placement.size) {
    throw new ReinjectionError(
      "count_mismatch",
      `Expected ${spans.length} transformed spans, got ${transformed.length}`
    );
  }

  const byId = new Map<number, TextSpan>(spans.map((s) => [s.id, s]));
  const seen = new Set<number>();
  for (const t of transformed) {
    if (!placement.has(t.id) || !byId.has(t.id)) {
      throw new ReinjectionError("unknown_id", `Span id ${t.id} is not in the placement map`);
    }
    if (seen.has(t.id)) throw new ReinjectionError("duplicate_id", `Span id ${t.id} was supplied twice`);
    seen.add(t.id);
  }

  const parsed = parseHtml(extraction.source);
  const preserve = opts.preserveFormatting ?? true;
  for (const t of transformed) {
    const span = byId.get(t.id);
    const path = placement.get(t.id);
    if (!span || !path) continue; // checked above
    const node = resolvePath(parsed.root, path);
    if (!node || !isText(node)) {
      throw new ReinjectionError("unresolvable_path", `Span ${t.id} path [${path.join(",")}] does not resolve to a text node`);
    }
    node.data = preserve
      ? `${span.leading}${t.text}${span.trailing}`
      : `${collapse(span.leading)}${t.text}${collapse(span.trailing)}`;
  }
  return parsed.serialize();
}

export function identitySpans(extraction: Extraction): TransformedSpan[] {
  return extraction.spans.map((s) => ({ id: s.id, text: s.text }));
}

function collapse(ws: string): string {
  return ws ? " " : "";
}
