import { z } from "zod";

import { ValidationError } from "../../lib/errors.js";

import type { WrapperType } from "../nodes/types.js";

/**
 * Grammar configuration schema.
 *
 * One immutable value is shared by every parse in a run; it selects the
 * markup dialect rather than carrying per-document state.
 */
export const GrammarSchema = z.object({
  /** Magic words that turn a leading `X [[Target]]` line into a redirect */
  redirectKeywords: z.array(z.string().min(1)).default(["#REDIRECT"]),
  /** URL prefixes recognised inside `[url text]` external links */
  protocols: z
    .array(z.string().min(1))
    .default(["http://", "https://", "ftp://", "ftps://", "mailto:", "//"]),
  /** HTML-like tags passed through as `tag` nodes */
  tags: z
    .array(z.string().regex(/^[a-z][a-z0-9]*$/))
    .default([
      "abbr",
      "b",
      "center",
      "code",
      "del",
      "div",
      "font",
      "i",
      "ins",
      "kbd",
      "p",
      "pre",
      "s",
      "samp",
      "span",
      "strike",
      "tt",
      "u",
      "var",
    ]),
  /** Deepest nesting of brace, link and tag constructs before parsing fails */
  maxNesting: z.number().int().positive().default(64),
});

export type Grammar = Readonly<z.infer<typeof GrammarSchema>>;
export type GrammarInput = z.input<typeof GrammarSchema>;

/**
 * Tags with a dedicated node variant
 */
export const WRAPPER_TAGS: Readonly<Record<string, WrapperType>> = {
  sup: "superscript",
  sub: "subscript",
  small: "small",
  blockquote: "blockquote",
};

/**
 * Build a frozen grammar from partial overrides
 *
 * @throws ValidationError when an override is malformed
 */
export function createGrammar(overrides: GrammarInput = {}): Grammar {
  const validation = GrammarSchema.safeParse(overrides);
  if (!validation.success) {
    throw new ValidationError("Invalid grammar", { issues: validation.error.issues });
  }
  return Object.freeze(validation.data);
}

/**
 * MediaWiki-flavoured defaults
 */
export const DEFAULT_GRAMMAR: Grammar = createGrammar();
