import { describe, it, expect } from "vitest";
import { describePageContext, resolveMagicWord } from "@/templates/context.js";
import { createTestContext } from "@tests/fixtures/wiki.js";

describe("page context", () => {
  const context = createTestContext();

  it("is frozen", () => {
    expect(Object.isFrozen(context)).toBe(true);
  });

  it("describes itself for diagnostics", () => {
    expect(describePageContext(context)).toBe("Guide/Overview (from wiki/Guide/Overview.wikitext)");
  });

  it("resolves magic words case-insensitively", () => {
    expect(resolveMagicWord("SUBPAGENAME", context)).toBe("Overview");
    expect(resolveMagicWord(" PageName ", context)).toBe("Guide/Overview");
  });

  it("returns undefined for ordinary names", () => {
    expect(resolveMagicWord("Greeting", context)).toBeUndefined();
    expect(resolveMagicWord("constructor", context)).toBeUndefined();
  });
});
