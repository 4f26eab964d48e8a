/**
 * Shared CLI utilities
 */

import { logger } from "../lib/index.js";

import { applyOverrides, loadConfig } from "./config.js";
import { formatError } from "./formatters.js";

import type { ConfigOverrides, SiteConfig } from "./config.js";

/**
 * Apply `--verbose` / `--quiet` to the global logger
 */
export function configureLogging(options: Record<string, unknown>): void {
  if (options["quiet"] === true) {
    logger.configure({ level: "error" });
  } else if (options["verbose"] === true) {
    logger.configure({ level: "debug" });
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Load the configuration named by `--config` (or the default file) and apply
 * directory flags on top. Exits the process when the configuration is invalid.
 */
export function loadSiteConfig(options: Record<string, unknown>): SiteConfig {
  const loaded = loadConfig(optionalString(options["config"]));
  if (!loaded.success) {
    console.error(formatError(loaded.error));
    process.exit(1);
  }

  if (loaded.data.source !== undefined) {
    logger.debug(`Using configuration from ${loaded.data.source}`);
  }

  const overrides: ConfigOverrides = {};
  const wikiDir = optionalString(options["wiki"]);
  const staticDir = optionalString(options["static"]);
  const outputDir = optionalString(options["output"]);
  if (wikiDir !== undefined) overrides.wikiDir = wikiDir;
  if (staticDir !== undefined) overrides.staticDir = staticDir;
  if (outputDir !== undefined) overrides.outputDir = outputDir;
  // commander sets `json: false` for --no-json
  if (options["json"] === false) overrides.emitJson = false;

  return applyOverrides(loaded.data.config, overrides);
}
