/**
 * Render command - Expand a single document and print the result
 */

import { existsSync } from "fs";
import { resolve } from "path";

import type { Command } from "commander";

import { renderDocument } from "../../site/index.js";
import { formatError, isValidRenderFormat } from "../formatters.js";
import { configureLogging, loadSiteConfig, toError } from "../shared.js";

export function registerRenderCommand(program: Command): void {
  program
    .command("render <file>")
    .description("Expand the templates of one document and print it")
    .option("-c, --config <path>", "Path to the configuration file (default: wikismith.config.yaml)")
    .option("--wiki <dir>", "Directory of wikitext sources and templates")
    .option("-f, --format <format>", "Output format: wikitext, html, json", "wikitext")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (file: string, options: Record<string, unknown>) => {
      configureLogging(options);

      const format = String(options["format"] ?? "wikitext");
      if (!isValidRenderFormat(format)) {
        console.error(formatError(new Error(`Invalid format: ${format}. Use: wikitext, html, json`)));
        process.exit(1);
      }

      const filePath = resolve(file);
      if (!existsSync(filePath)) {
        console.error(formatError(new Error(`File not found: ${filePath}`)));
        process.exit(1);
      }

      const config = loadSiteConfig(options);
      try {
        console.log(await renderDocument(filePath, config, format));
      } catch (error) {
        console.error(formatError(toError(error)));
        process.exit(1);
      }
    });
}
