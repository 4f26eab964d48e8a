/**
 * Configuration Management
 *
 * Reads `wikismith.config.yaml`, validates it with zod and resolves the
 * directory settings against the file's location. Every key is optional;
 * command-line flags override whatever the file says.
 */

import { existsSync, readFileSync } from "fs";
import path from "path";

import YAML from "yaml";
import { z } from "zod";

import { ConfigError } from "../lib/errors.js";
import { err, ok, tryCatch } from "../lib/result.js";

import type { Result } from "../lib/result.js";

export const CONFIG_FILE_NAME = "wikismith.config.yaml";

/**
 * Configuration schema
 */
export const SiteConfigSchema = z
  .object({
    wikiDir: z.string().min(1).default("wiki"),
    staticDir: z.string().min(1).default("static"),
    outputDir: z.string().min(1).default("output"),
    wikiRoute: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, "must be a single URL path segment")
      .default("wiki"),
    siteTitle: z.string().default("Wiki"),
    homePage: z.string().min(1).default("Main_Page"),
    extension: z
      .string()
      .regex(/^\.[A-Za-z0-9]+$/, "must look like .wikitext")
      .default(".wikitext"),
    exclude: z.array(z.string().min(1)).default([]),
    emitJson: z.boolean().default(true),
    navLinks: z
      .array(z.object({ label: z.string().min(1), href: z.string().min(1) }))
      .default([{ label: "Website", href: "/" }]),
    stylesheets: z.array(z.string().min(1)).default(["/style/bootstrap.min.css"]),
    scripts: z.array(z.string().min(1)).default(["/js/bootstrap.bundle.min.js"]),
    maxDepth: z.number().int().positive().default(100),
    maxTableIterations: z.number().int().positive().default(50),
  })
  .strict();

export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type SiteConfigInput = z.input<typeof SiteConfigSchema>;

/**
 * Values given on the command line
 */
export interface ConfigOverrides {
  wikiDir?: string;
  staticDir?: string;
  outputDir?: string;
  emitJson?: boolean;
}

export interface LoadedConfig {
  config: SiteConfig;
  /** File the values came from, undefined when defaults were used */
  source: string | undefined;
}

/**
 * Validate raw configuration values and resolve directories against `baseDir`
 */
export function parseConfig(raw: unknown, baseDir: string, source?: string): Result<SiteConfig, ConfigError> {
  const validation = SiteConfigSchema.safeParse(raw ?? {});
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    return err(
      new ConfigError(`Invalid configuration${source !== undefined ? ` in ${source}` : ""}: ${issues.join("; ")}`, {
        source,
        issues,
      })
    );
  }

  const config = validation.data;
  return ok({
    ...config,
    wikiDir: path.resolve(baseDir, config.wikiDir),
    staticDir: path.resolve(baseDir, config.staticDir),
    outputDir: path.resolve(baseDir, config.outputDir),
  });
}

/**
 * Load configuration from disk.
 *
 * With an explicit path the file must exist. Without one,
 * `wikismith.config.yaml` in `cwd` is used when present, defaults otherwise.
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): Result<LoadedConfig, ConfigError> {
  const candidate = path.resolve(cwd, configPath ?? CONFIG_FILE_NAME);

  if (!existsSync(candidate)) {
    if (configPath !== undefined) {
      return err(new ConfigError(`Config file not found: ${candidate}`, { configPath: candidate }));
    }
    const defaults = parseConfig({}, cwd);
    return defaults.success ? ok({ config: defaults.data, source: undefined }) : defaults;
  }

  const read = tryCatch((): unknown => YAML.parse(readFileSync(candidate, "utf-8")));
  if (!read.success) {
    return err(
      new ConfigError(`Failed to read config file: ${candidate}`, {
        configPath: candidate,
        cause: read.error.message,
      })
    );
  }

  const parsed = parseConfig(read.data, path.dirname(candidate), candidate);
  return parsed.success ? ok({ config: parsed.data, source: candidate }) : parsed;
}

/**
 * Apply command-line values on top of the loaded configuration
 */
export function applyOverrides(config: SiteConfig, overrides: ConfigOverrides, cwd: string = process.cwd()): SiteConfig {
  return {
    ...config,
    ...(overrides.wikiDir !== undefined ? { wikiDir: path.resolve(cwd, overrides.wikiDir) } : {}),
    ...(overrides.staticDir !== undefined ? { staticDir: path.resolve(cwd, overrides.staticDir) } : {}),
    ...(overrides.outputDir !== undefined ? { outputDir: path.resolve(cwd, overrides.outputDir) } : {}),
    ...(overrides.emitJson !== undefined ? { emitJson: overrides.emitJson } : {}),
  };
}
