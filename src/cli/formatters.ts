import chalk from "chalk";

import { WikismithError } from "../lib/errors.js";

import type { DocumentFormat, SiteResult } from "../site/generator.js";

const RENDER_FORMATS: readonly DocumentFormat[] = ["wikitext", "html", "json"];

/**
 * Check if format is valid
 */
export function isValidRenderFormat(format: string): format is DocumentFormat {
  return RENDER_FORMATS.some((candidate) => candidate === format);
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  if (error instanceof WikismithError) {
    return chalk.red(`Error [${error.code}]: ${error.message}`);
  }
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a warning for terminal output
 */
export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}

/**
 * Summary printed after a build
 */
export function formatBuildSummary(result: SiteResult, outputDir: string): string {
  const { stats } = result;
  const lines: string[] = [];

  const headline = `Generated ${result.pages.length} pages and ${result.redirects.length} redirects in ${outputDir}`;
  lines.push(result.failures.length === 0 ? formatSuccess(headline) : formatWarning(headline));

  lines.push(
    chalk.gray(
      `  ${stats.templatesParsed} templates parsed, ${stats.templatesExpanded} expansions ` +
        `(${stats.cacheHits} cached), ${stats.roundtrips} roundtrips, ` +
        `${stats.tableIterations} table passes, ${stats.cellsReparsed} cells reparsed`
    )
  );
  lines.push(chalk.gray(`  ${stats.staticFiles} static files copied in ${(stats.durationMs / 1000).toFixed(2)}s`));

  if (result.failures.length > 0) {
    lines.push("");
    lines.push(chalk.red.bold(`${result.failures.length} documents failed:`));
    for (const failure of result.failures) {
      lines.push(`  ${chalk.white(failure.inputPath)}`);
      lines.push(`    ${formatError(failure.error)}`);
    }
  }

  return lines.join("\n");
}

/**
 * Template keys, one per line, with a count footer
 */
export function formatTemplateList(names: string[]): string {
  if (names.length === 0) {
    return chalk.yellow("No templates found.");
  }
  return [...names, "", chalk.gray(`${names.length} templates`)].join("\n");
}
