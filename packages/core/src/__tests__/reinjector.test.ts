import { describe, it, expect } from "@jest/globals";
import { ReinjectionError } from "../errors";
import { normalizeHtml } from "../html/dom";
import { extractSpans } from "../html/extractor";
import { identitySpans, reinject } from "../html/reinjector";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof ReinjectionError) return e.code;
    throw e;
  }
  return undefined;
}

describe("reinject", () => {
  const documents = [
    '<!DOCTYPE html><html lang="he" dir="rtl"><head><meta charset="utf-8"><title>כותרת</title></head>' +
      '<body><!-- note --><p class="a">  שלום   עולם  </p><script>var s = "<p>";</script>' +
      "<ul><li>One item</li><li>Two</li></ul></body></html>",
    '<p>Hello <em>there</em>, friend.</p><br><img src="x.png" alt="An image">',
    "<table><tr><td>Cell one</td><td> </td></tr></table>",
  ];

  it.each(documents)("writes identity spans back to the normalized input: %s", (html) => {
    const ex = extractSpans(html);
    expect(reinject(ex, identitySpans(ex))).toBe(normalizeHtml(html));
  });

  it("replaces text while keeping attributes and edge whitespace", () => {
    const ex = extractSpans('<p dir="rtl" class="x">  שלום עולם </p>');
    expect(reinject(ex, [{ id: 0, text: "NEW" }])).toBe('<p dir="rtl" class="x">  NEW </p>');
  });

  it("collapses edge whitespace when formatting is not preserved", () => {
    const ex = extractSpans("<p>  Hello world\n</p>");
    expect(reinject(ex, [{ id: 0, text: "Bonjour" }], { preserveFormatting: false })).toBe("<p> Bonjour </p>");
  });

  it("escapes markup characters in the new text", () => {
    const ex = extractSpans("<p>Hello world</p>");
    expect(reinject(ex, [{ id: 0, text: "x < y & z" }])).toBe("<p>x &lt; y &amp; z</p>");
  });

  it("leaves skipped subtrees untouched", () => {
    const ex = extractSpans('<p>Hello world</p><script>var a = "Hello world";</script>');
    expect(reinject(ex, [{ id: 0, text: "Hi" }])).toBe('<p>Hi</p><script>var a = "Hello world";</script>');
  });

  it("reports count, id and path violations", () => {
    const ex = extractSpans("<p>First line</p><p>Second line</p>");
    expect(codeOf(() => reinject(ex, [{ id: 0, text: "x" }]))).toBe("count_mismatch");
    expect(codeOf(() => reinject(ex, [{ id: 0, text: "x" }, { id: 9, text: "y" }]))).toBe("unknown_id");
    expect(codeOf(() => reinject(ex, [{ id: 0, text: "x" }, { id: 0, text: "y" }]))).toBe("duplicate_id");

    const single = extractSpans("<p>Only line</p>");
    const broken = { ...single, placement: new Map([[0, [9, 9]]]) };
    expect(codeOf(() => reinject(broken, [{ id: 0, text: "x" }]))).toBe("unresolvable_path");
  });
});
