/**
 * Per-page facts that template expansion may consult
 */
export interface PageContext {
  /** Source file the page was read from */
  readonly inputPath: string;
  /** Display title, e.g. "Lua/Test Table" */
  readonly title: string;
  /** URL path of the generated page */
  readonly routePath: string;
  /** Last path segment of the page name, e.g. "Test_Table" */
  readonly subPageName: string;
}

export function createPageContext(fields: PageContext): PageContext {
  return Object.freeze({
    inputPath: fields.inputPath,
    title: fields.title,
    routePath: fields.routePath,
    subPageName: fields.subPageName,
  });
}

/**
 * Short human-readable label for diagnostics
 */
export function describePageContext(context: PageContext): string {
  return `${context.title} (from ${context.inputPath})`;
}

const MAGIC_WORDS: ReadonlyMap<string, (context: PageContext) => string> = new Map([
  ["subpagename", (context: PageContext) => context.subPageName],
  ["pagename", (context: PageContext) => context.title],
]);

/**
 * Value of a magic word such as `{{SUBPAGENAME}}`, or undefined for ordinary names
 */
export function resolveMagicWord(name: string, context: PageContext): string | undefined {
  const resolver = MAGIC_WORDS.get(name.trim().toLowerCase());
  return resolver?.(context);
}
