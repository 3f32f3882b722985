import { describe, it, expect } from "@jest/globals";
import { ExtractionError } from "../errors";
import { MAX_HTML_SIZE, extractSpans } from "../html/extractor";

describe("extractSpans", () => {
  it("collects text nodes in document order with their child-index paths", () => {
    const html =
      "<html><head><title>Page title</title></head>" +
      "<body><h1>Hello there</h1><p>Some <b>bold</b> text</p></body></html>";
    const ex = extractSpans(html);

    expect(ex.mode).toBe("document");
    expect(ex.spans.map((s) => s.text)).toEqual(["Page title", "Hello there", "Some", "bold", "text"]);
    expect(ex.spans.map((s) => s.id)).toEqual([0, 1, 2, 3, 4]);
    expect(ex.spans.map((s) => s.path)).toEqual([
      [0, 0, 0, 0],
      [0, 1, 0, 0],
      [0, 1, 1, 0],
      [0, 1, 1, 1, 0],
      [0, 1, 1, 2],
    ]);
    expect(ex.spans.map((s) => s.container)).toEqual(["title", "h1", "p", "b", "p"]);
  });

  it("keeps a placement entry for every span", () => {
    const ex = extractSpans("<ul><li>First item</li><li>Second item</li></ul><p>Closing line</p>");
    expect(ex.placement.size).toBe(ex.spans.length);
    for (const span of ex.spans) expect(ex.placement.get(span.id)).toEqual(span.path);
  });

  it("splits edge whitespace off the text", () => {
    const ex = extractSpans("<p>Some <b>bold</b> text</p>");
    expect(ex.mode).toBe("fragment");
    expect(ex.spans[0]).toMatchObject({ text: "Some", leading: "", trailing: " " });
    expect(ex.spans[2]).toMatchObject({ text: "text", leading: " ", trailing: "" });
  });

  it("skips script, style, code and translate=no subtrees", () => {
    const ex = extractSpans(
      "<div><p>Visible text</p><script>var x = 1;</script><style>p { color: red }</style>" +
        "<code>let y = 2</code><pre>raw block</pre><span translate=\"no\">BrandName</span></div>"
    );
    expect(ex.spans.map((s) => s.text)).toEqual(["Visible text"]);
  });

  it("drops whitespace-only nodes and text shorter than min_text_length", () => {
    const html = "<div>\n  <p>a</p>\n  <p>ok</p>\n</div>";
    expect(extractSpans(html).spans.map((s) => s.text)).toEqual(["ok"]);
    expect(extractSpans(html, { minTextLength: 1 }).spans.map((s) => s.text)).toEqual(["a", "ok"]);
  });

  it("marks right-to-left spans from dir, lang, class and script", () => {
    const ex = extractSpans(
      '<div dir="rtl"><p>שלום עולם</p></div>' +
        '<p lang="ar-EG">مرحبا بكم</p>' +
        '<p class="text-rtl">Plain text</p>' +
        "<p>English words</p>" +
        '<p dir="ltr">שלום</p>'
    );
    expect(ex.spans.map((s) => s.rtl)).toEqual([true, true, true, false, false]);
    expect(ex.spans[0].dir).toBe("rtl");
    expect(ex.spans[1].lang).toBe("ar-EG");
  });

  it("detects Hebrew text without any markup hints", () => {
    const ex = extractSpans("<p>זהו מסמך לדוגמה</p>");
    expect(ex.spans[0].rtl).toBe(true);
    expect(ex.spans[0].dir).toBeUndefined();
  });

  it("rejects input that is not usable HTML", () => {
    expect(() => extractSpans(42)).toThrow(ExtractionError);
    try {
      extractSpans("   ");
      throw new Error("expected extractSpans to throw");
    } catch (e) {
      expect(e).toBeInstanceOf(ExtractionError);
      expect(e).toMatchObject({ code: "empty" });
    }
    expect(() => extractSpans("a".repeat(MAX_HTML_SIZE + 1))).toThrow(/too large/);
  });
});
