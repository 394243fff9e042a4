#!/usr/bin/env tsx

/**
 * CLI entry point for the ebolg static blog generator
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("ebolg")
  .description("Convert Markdown posts into Tailwind-styled HTML pages")
  .version("0.1.0");

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

// Main build command (default action)
program
  .argument("<input>", "Markdown file or directory of posts")
  .argument("[output]", "Output directory (defaults to the input directory)")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-s, --stylesheet <path>", "Prebuilt stylesheet to copy into the output tree")
  .option("--no-index", "Do not generate the index page")
  .option("--dry-run", "Preview the build without writing files")
  .option("-v, --verbose", "Verbose output")
  .action(buildCommand);

await program.parseAsync();
