#!/usr/bin/env node
/**
 * wikismith CLI entry point
 *
 * Commands:
 * - build     - Generate the static site from the wiki directory
 * - render    - Expand one document and print wikitext, HTML or JSON
 * - templates - List template keys found in the wiki directory
 */

import { Command } from "commander";

import { VERSION } from "../core/index.js";

import { registerBuildCommand, registerRenderCommand, registerTemplatesCommand } from "./commands/index.js";

const program = new Command();

program
  .name("wikismith")
  .description("Expand wikitext templates and generate a static HTML wiki")
  .version(VERSION);

registerBuildCommand(program);
registerRenderCommand(program);
registerTemplatesCommand(program);

await program.parseAsync();
