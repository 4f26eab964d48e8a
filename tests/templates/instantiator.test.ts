import { describe, it, expect, vi } from "vitest";
import { fragment, text } from "@/core/nodes/types.js";
import { parseWikitext } from "@/core/parser/parser.js";
import { toWikitext } from "@/core/parser/serializer.js";
import {
  ParseError,
  RecursionLimitError,
  TemplateCycleError,
  TemplateNotFoundError,
} from "@/lib/errors.js";
import { childrenOf, createTestContext, createTestInstantiator } from "@tests/fixtures/wiki.js";
import type { Node, TableNode } from "@/core/nodes/types.js";

const context = createTestContext();

function firstTable(node: Node): TableNode {
  const table = childrenOf(node).find((child): child is TableNode => child.type === "table");
  if (table === undefined) {
    throw new Error("expected a table");
  }
  return table;
}

describe("Instantiator", () => {
  describe("parameter substitution", () => {
    const { instantiator } = createTestInstantiator({
      Greeting: "Hello, {{{name|World}}}!",
      Wrapper: "{{Greeting}}",
    });

    it("falls back to the default without arguments", () => {
      expect(toWikitext(instantiator.instantiate("Greeting", [], context))).toBe("Hello, World!");
    });

    it("uses a named argument", () => {
      const result = instantiator.instantiate("Greeting", [{ name: "name", value: "Ada" }], context);
      expect(toWikitext(result)).toBe("Hello, Ada!");
    });

    it("resolves through nested templates", () => {
      expect(toWikitext(instantiator.instantiate("Wrapper", [], context))).toBe("Hello, World!");
    });

    it("passes arguments from the invocation site", () => {
      const page = fragment(parseWikitext("{{Greeting|name=Grace}} and {{Greeting}}"));
      expect(toWikitext(instantiator.instantiate(page, [], context))).toBe("Hello, Grace! and Hello, World!");
    });
  });

  describe("lookup precedence", () => {
    const { instantiator } = createTestInstantiator({
      Sub: "{{{subpagename|def}}}",
      Fallback: "[{{{missing|def}}}]",
      Empty: "[{{{missing}}}]",
      Positional: "{{{1}}}-{{{2|two}}}",
    });

    it("prefers an explicit argument over the page name", () => {
      const result = instantiator.instantiate("Sub", [{ name: "subpagename", value: "arg" }], context);
      expect(toWikitext(result)).toBe("arg");
    });

    it("uses the sub-page name for the magic parameter", () => {
      expect(toWikitext(instantiator.instantiate("Sub", [], context))).toBe("Overview");
    });

    it("uses the default when no argument matches", () => {
      expect(toWikitext(instantiator.instantiate("Fallback", [], context))).toBe("[def]");
    });

    it("substitutes empty text without argument or default", () => {
      expect(toWikitext(instantiator.instantiate("Empty", [], context))).toBe("[]");
    });

    it("matches positional arguments by number", () => {
      const page = fragment(parseWikitext("{{Positional|one}}"));
      expect(toWikitext(instantiator.instantiate(page, [], context))).toBe("one-two");
    });
  });

  describe("magic words", () => {
    it("answers SUBPAGENAME from the context without a store lookup", () => {
      const { instantiator, loader } = createTestInstantiator({ Page: "{{SUBPAGENAME}}" });
      const load = vi.spyOn(loader, "load");

      const result = instantiator.instantiate("Page", [], context);

      expect(toWikitext(result)).toBe("Overview");
      expect(load).toHaveBeenCalledTimes(1);
      expect(load).toHaveBeenCalledWith("Page");
    });

    it("answers PAGENAME with the page title", () => {
      const { instantiator } = createTestInstantiator({});
      expect(instantiator.instantiate("PAGENAME", [], context)).toEqual(text("Guide/Overview"));
    });
  });

  describe("re-parsing substituted text", () => {
    it("turns argument text into markup", () => {
      const { instantiator } = createTestInstantiator({ Emphasis: "'''{{{1}}}'''" });
      const result = instantiator.instantiate("Emphasis", [{ name: "1", value: "[[Help|help]]" }], context);
      expect(childrenOf(result)).toEqual([{ type: "bold", children: [{ type: "link", title: "Help", text: "help" }] }]);
    });

    it("builds template names from placeholders", () => {
      const { instantiator } = createTestInstantiator({
        Wrapper: "{{ {{{kind}}}Box }}",
        InfoBox: "info!",
      });
      const result = instantiator.instantiate("Wrapper", [{ name: "kind", value: "Info" }], context);
      expect(toWikitext(result)).toBe("info!");
    });

    it("expands a template nested in its own argument", () => {
      const { instantiator } = createTestInstantiator({ Wrap: "({{{1}}})" });
      const page = fragment(parseWikitext("{{Wrap|{{Wrap|x}}}}"));
      expect(toWikitext(instantiator.instantiate(page, [], context))).toBe("((x))");
    });

    it("reports argument text that breaks the grammar", () => {
      const { instantiator } = createTestInstantiator({ Raw: "{{{1}}}" });
      expect(() => instantiator.instantiate("Raw", [{ name: "1", value: "{|\n| a" }], context)).toThrow(
        "Substituted text no longer parses: Unterminated table: missing closing |}"
      );
      expect(() => instantiator.instantiate("Raw", [{ name: "1", value: "{|\n| a" }], context)).toThrow(ParseError);
    });
  });

  describe("tables", () => {
    it("keeps cells apart when a template supplies cell attributes", () => {
      const { instantiator } = createTestInstantiator({ CellAlign: 'align="right"' });
      const page = fragment(
        parseWikitext(
          [
            '{| class="wikitable"',
            "! Name !! Value",
            "|-",
            "| {{CellAlign}} | TypeA || 1",
            "|-",
            "| TypeB || 2",
            "|}",
          ].join("\n")
        )
      );

      const table = firstTable(instantiator.instantiate(page, [], context));
      const row = table.rows[1];

      expect(table.rows).toHaveLength(3);
      expect(row?.cells).toHaveLength(2);
      expect(toWikitext(row?.cells[0]?.attributes ?? [])).toBe('align="right"');
      expect(toWikitext(row?.cells[0]?.content ?? [])).toBe("TypeA");
      expect(toWikitext(row?.cells[1]?.content ?? [])).toBe("1");
    });

    it("re-parses markup inside a single cell", () => {
      const { instantiator } = createTestInstantiator({ Row: "{|\n| {{{1}}} || other\n|}" });
      const result = instantiator.instantiate("Row", [{ name: "1", value: "[[Target|label]]" }], context);

      const cells = firstTable(result).rows[0]?.cells ?? [];
      expect(cells).toHaveLength(2);
      expect(cells[0]?.content).toEqual([{ type: "link", title: "Target", text: "label" }]);
      expect(cells[1]?.content).toEqual([text("other")]);
    });

    it("does not split a cell on pipes carried in by an argument", () => {
      const { instantiator } = createTestInstantiator({ Row: "{|\n| {{{1}}} || other\n|}" });
      const result = instantiator.instantiate("Row", [{ name: "1", value: "a || b" }], context);

      const cells = firstTable(result).rows[0]?.cells ?? [];
      expect(cells).toHaveLength(2);
      expect(cells[0]?.content).toEqual([text("a || b")]);
    });

    it("counts convergence passes and re-parsed cells", () => {
      const { instantiator } = createTestInstantiator({ Row: "{|\n| {{{1}}} || other\n|}" });
      instantiator.instantiate("Row", [{ name: "1", value: "''x''" }], context);

      expect(instantiator.stats()).toMatchObject({ tableIterations: 1, cellsReparsed: 1, roundtrips: 0 });
    });

    it("keeps cells apart when table content arrives through nested templates", () => {
      const { instantiator } = createTestInstantiator({
        AlignInner: 'align="right"',
        Align: "{{AlignInner}}",
        Inner: "'''{{{1}}}'''",
        CellT: "{{Inner|strong}}",
        Linker: "{{{1}}}",
        TableT: [
          "{|",
          "! Name !! Value",
          "|-",
          "| {{Align}} | {{CellT}} || {{Linker|[[Target|label]]}}",
          "|-",
          "| {{Align}} | plain || two",
          "|}",
        ].join("\n"),
      });
      const page = fragment(parseWikitext("{{TableT}}"));

      const table = firstTable(instantiator.instantiate(page, [], context));
      const [, first, second] = table.rows;

      expect(table.rows).toHaveLength(3);
      expect(first?.cells).toHaveLength(2);
      expect(second?.cells).toHaveLength(2);
      expect(toWikitext(first?.cells[0]?.attributes ?? [])).toBe('align="right"');
      expect(first?.cells[0]?.content).toEqual([{ type: "bold", children: [text("strong")] }]);
      expect(first?.cells[1]?.content).toEqual([{ type: "link", title: "Target", text: "label" }]);
      expect(toWikitext(second?.cells[0]?.attributes ?? [])).toBe('align="right"');
      expect(second?.cells[0]?.content).toEqual([text("plain")]);
      expect(instantiator.stats().tableIterations).toBe(2);
    });

    it("re-parses a cell once even when enclosing templates revisit the table", () => {
      const { instantiator } = createTestInstantiator({
        Row: "{|\n| {{{1}}} || other\n|}",
        Outer: "{{Row|''x''}}",
      });

      const table = firstTable(instantiator.instantiate("Outer", [], context));

      expect(table.rows[0]?.cells[0]?.content).toEqual([{ type: "italic", children: [text("x")] }]);
      expect(instantiator.stats()).toMatchObject({ tableIterations: 2, cellsReparsed: 1, roundtrips: 0 });
    });

    it("fails when a table never converges within the pass limit", () => {
      const { instantiator } = createTestInstantiator({ Row: "{|\n| {{{1}}}\n|}" }, { maxTableIterations: 0 });
      expect(() => instantiator.instantiate("Row", [{ name: "1", value: "x" }], context)).toThrow(
        "Table expansion did not converge within 0 passes"
      );
    });
  });

  describe("errors and limits", () => {
    it("rejects unknown templates", () => {
      const { instantiator } = createTestInstantiator({});
      expect(() => instantiator.instantiate("Nope", [], context)).toThrow(TemplateNotFoundError);
      expect(() => instantiator.instantiate("Nope", [], context)).toThrow("Template not found: Nope -> nope");
    });

    it("detects mutual recursion", () => {
      const { instantiator } = createTestInstantiator({ A: "{{B}}", B: "{{A}}" });
      expect(() => instantiator.instantiate("A", [], context)).toThrow(TemplateCycleError);
      expect(() => instantiator.instantiate("A", [], context)).toThrow("Template cycle detected: a -> b -> a");
    });

    it("detects direct self-invocation", () => {
      const { instantiator } = createTestInstantiator({ Self: "x {{Self}}" });
      expect(() => instantiator.instantiate("Self", [], context)).toThrow("Template cycle detected: self -> self");
    });

    it("bounds the nesting depth", () => {
      const templates = { L1: "{{L2}}", L2: "{{L3}}", L3: "{{L4}}", L4: "end" };

      const shallow = createTestInstantiator(templates, { maxDepth: 2 }).instantiator;
      expect(() => shallow.instantiate("L1", [], context)).toThrow(RecursionLimitError);

      const deep = createTestInstantiator(templates, { maxDepth: 4 }).instantiator;
      expect(toWikitext(deep.instantiate("L1", [], context))).toBe("end");
    });

    it("bounds arguments that keep re-introducing placeholders", () => {
      const { instantiator } = createTestInstantiator({}, { maxDepth: 10 });
      const tree = fragment([{ type: "template-parameter-use", name: "a" }]);
      expect(() => instantiator.instantiate(tree, [{ name: "a", value: "x{{{a}}}" }], context)).toThrow(
        "Template expansion exceeded maximum depth of 10"
      );
    });
  });

  describe("cache and statistics", () => {
    it("never mutates the cached template tree", () => {
      const { instantiator, cache } = createTestInstantiator({ Greeting: "Hello, {{{name|World}}}!" });
      instantiator.instantiate("Greeting", [{ name: "name", value: "Ada" }], context);

      expect(toWikitext(cache.get("Greeting"))).toBe("Hello, {{{name|World}}}!");
    });

    it("counts expansions, cache hits and roundtrips", () => {
      const { instantiator, cache } = createTestInstantiator({ Greeting: "Hello, {{{name|World}}}!" });
      instantiator.instantiate("Greeting", [], context);
      instantiator.instantiate("Greeting", [], context);

      expect(instantiator.stats()).toEqual({
        templatesExpanded: 2,
        cacheHits: 1,
        roundtrips: 2,
        tableIterations: 0,
        cellsReparsed: 0,
      });
      expect(cache.parses).toBe(1);

      instantiator.resetStats();
      expect(instantiator.stats().templatesExpanded).toBe(0);
    });

    it("returns resolved trees unchanged", () => {
      const { instantiator } = createTestInstantiator({});
      const tree = fragment([text("plain")]);
      expect(instantiator.instantiate(tree, [], context)).toBe(tree);
    });
  });
});
