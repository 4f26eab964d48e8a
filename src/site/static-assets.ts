import { existsSync } from "fs";
import fs from "fs/promises";
import path from "path";

import { glob } from "glob";

import { GenerationError } from "../lib/errors.js";
import { err, ok, tryCatchAsync } from "../lib/result.js";

import type { Result } from "../lib/result.js";

/**
 * Copy the static directory (stylesheets, scripts, images) into the output
 * root. A missing source directory copies nothing.
 *
 * @returns Number of files copied
 */
export async function copyStaticAssets(
  sourceDir: string,
  outputDir: string
): Promise<Result<number, GenerationError>> {
  if (!existsSync(sourceDir)) {
    return ok(0);
  }

  const result = await tryCatchAsync(async () => {
    const files = await glob("**/*", { cwd: sourceDir, nodir: true, dot: true });
    await fs.cp(sourceDir, outputDir, { recursive: true });
    return files.length;
  });

  if (!result.success) {
    return err(
      new GenerationError(`Failed to copy static assets from ${sourceDir}`, {
        sourceDir,
        outputDir,
        cause: result.error.message,
      })
    );
  }
  return result;
}

/**
 * Write a generated file, creating its directory as needed
 */
export async function writeOutputFile(
  filePath: string,
  content: string
): Promise<Result<string, GenerationError>> {
  const result = await tryCatchAsync(async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf-8");
    return filePath;
  });

  if (!result.success) {
    return err(
      new GenerationError(`Failed to write ${filePath}`, { filePath, cause: result.error.message })
    );
  }
  return result;
}

/**
 * Remove and recreate the output directory
 */
export async function resetOutputDirectory(outputDir: string): Promise<Result<string, GenerationError>> {
  const result = await tryCatchAsync(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
    await fs.mkdir(outputDir, { recursive: true });
    return outputDir;
  });

  if (!result.success) {
    return err(
      new GenerationError(`Failed to prepare output directory ${outputDir}`, {
        outputDir,
        cause: result.error.message,
      })
    );
  }
  return result;
}
