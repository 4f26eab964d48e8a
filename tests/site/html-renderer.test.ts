import { describe, it, expect } from "vitest";
import { text } from "@/core/nodes/types.js";
import { parseWikitext } from "@/core/parser/parser.js";
import { escapeHtml, parseHtmlAttributes, renderHtml } from "@/site/html-renderer.js";

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#039;s&lt;/a&gt;"
    );
  });
});

describe("parseHtmlAttributes", () => {
  it("reads quoted, unquoted and bare attributes", () => {
    expect(parseHtmlAttributes(`class="a b" colspan=2 hidden data-x='y' ID=main`)).toEqual([
      ["class", "a b"],
      ["colspan", "2"],
      ["hidden", ""],
      ["data-x", "y"],
      ["id", "main"],
    ]);
  });

  it("drops invalid attribute names", () => {
    expect(parseHtmlAttributes("1bad=2 good=3")).toEqual([["good", "3"]]);
  });
});

describe("renderHtml", () => {
  it("renders headings and links", () => {
    const nodes = parseWikitext("== Intro ==\nSee [[Main Page|home]] and [https://example.com site].");
    expect(renderHtml(nodes)).toBe(
      '<h2>Intro</h2>See <a href="/wiki/Main_Page.html">home</a> and <a href="https://example.com">site</a>.'
    );
  });

  it("resolves internal links into a custom directory", () => {
    expect(renderHtml({ type: "link", title: "Lua/Test Table", text: "table" }, { wikiRoute: "docs" })).toBe(
      '<a href="/docs/Lua/Test_Table.html">table</a>'
    );
  });

  it("renders tables with attributes", () => {
    const nodes = parseWikitext('{| class="wikitable"\n|+ Cap\n! A\n|-\n| align="right" | 1\n|}');
    expect(renderHtml(nodes)).toBe(
      '<table class="wikitable"><caption>Cap</caption><tbody><tr><th>A</th></tr>' +
        '<tr><td align="right">1</td></tr></tbody></table>'
    );
  });

  it("renders lists and emphasis", () => {
    expect(renderHtml(parseWikitext("* '''a'''\n# ''b''"))).toBe(
      "<ul><li><strong>a</strong></li></ul><ol><li><em>b</em></li></ol>"
    );
  });

  it("re-emits tag attributes", () => {
    expect(renderHtml(parseWikitext("<span style='color: red'>x</span>"))).toBe(
      '<span style="color: red">x</span>'
    );
  });

  it("renders breaks, dividers and redirects", () => {
    expect(renderHtml([text("a"), { type: "newline" }, { type: "horizontal-divider" }])).toBe("a<br /><hr />");
    expect(renderHtml({ type: "redirect", target: "Main Page" })).toBe(
      '<a href="/wiki/Main_Page.html">REDIRECT: Main Page</a>'
    );
  });

  it("passes text through and escapes unresolved invocations", () => {
    expect(renderHtml(text("<b>raw</b>"))).toBe("<b>raw</b>");
    expect(renderHtml({ type: "template", name: "X", parameters: [{ name: "1", value: "<b>" }] })).toBe(
      "{{X|&lt;b&gt;}}"
    );
  });
});
