/**
 * Templates command - List the template keys the wiki directory provides
 */

import type { Command } from "commander";

import { FileSystemTemplateLoader } from "../../templates/index.js";
import { formatError, formatTemplateList } from "../formatters.js";
import { configureLogging, loadSiteConfig, toError } from "../shared.js";

export function registerTemplatesCommand(program: Command): void {
  program
    .command("templates")
    .description("List template keys discovered in the wiki directory")
    .option("-c, --config <path>", "Path to the configuration file (default: wikismith.config.yaml)")
    .option("--wiki <dir>", "Directory of wikitext sources and templates")
    .option("--json", "Print the keys as a JSON array")
    .option("-v, --verbose", "Verbose output")
    .action(async (options: Record<string, unknown>) => {
      configureLogging(options);
      const asJson = options["json"] === true;
      const config = loadSiteConfig({ ...options, json: undefined });

      try {
        const loader = await FileSystemTemplateLoader.create(config.wikiDir, { extension: config.extension });
        const names = loader.names();
        console.log(asJson ? JSON.stringify(names, null, 2) : formatTemplateList(names));
      } catch (error) {
        console.error(formatError(toError(error)));
        process.exit(1);
      }
    });
}
