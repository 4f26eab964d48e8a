/**
 * Build command - Generate the static site
 */

import ora from "ora";

import type { Command } from "commander";

import { generateSite } from "../../site/index.js";
import { formatBuildSummary, formatError } from "../formatters.js";
import { configureLogging, loadSiteConfig, toError } from "../shared.js";

export function registerBuildCommand(program: Command): void {
  program
    .command("build")
    .description("Generate HTML pages for every document in the wiki directory")
    .option("-c, --config <path>", "Path to the configuration file (default: wikismith.config.yaml)")
    .option("--wiki <dir>", "Directory of wikitext sources and templates")
    .option("--static <dir>", "Directory copied verbatim into the output")
    .option("--output <dir>", "Output directory (recreated on every build)")
    .option("--no-json", "Do not write parsed documents as JSON")
    .option("--keep-going", "Report failing documents and continue")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (options: Record<string, unknown>) => {
      configureLogging(options);
      const isQuiet = options["quiet"] === true;
      const config = loadSiteConfig(options);

      const spinner = isQuiet ? null : ora(`Building ${config.wikiDir}...`).start();

      try {
        const result = await generateSite({
          ...config,
          keepGoing: options["keepGoing"] === true,
          onDocument: (relativePath, index, total) => {
            if (spinner) {
              spinner.text = `[${index + 1}/${total}] ${relativePath}`;
            }
          },
        });

        spinner?.stop();
        if (!isQuiet || result.failures.length > 0) {
          console.log(formatBuildSummary(result, config.outputDir));
        }
        if (result.failures.length > 0) {
          process.exit(1);
        }
      } catch (error) {
        spinner?.fail("Build failed");
        console.error(formatError(toError(error)));
        process.exit(1);
      }
    });
}
