#!/usr/bin/env tsx

/**
 * CLI entry point for sitesmith
 * Handles command-line argument parsing
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { configCommand } from "./commands/config";
import { s3BuildCommand } from "./commands/s3-build";

const program = new Command();

program
  .name("sitesmith")
  .description("Build a static site from Markdown content and Handlebars templates")
  .version("0.1.0");

const withBuildFlags = (command: Command): Command =>
  command
    .option("-c, --config <path>", "Site config path inside the source", "config.json")
    .option("--drafts", "Build draft content")
    .option("--future", "Build future-dated content")
    .option("--base-url <url>", "Override the configured base URL")
    .option("--strict", "Exit non-zero when any file or plugin failed")
    .option("-v, --verbose", "Verbose output");

withBuildFlags(
  program
    .command("build")
    .description("Build a site from a local directory")
    .option("-s, --source <dir>", "Site source directory", ".")
    .option("-o, --output <dir>", "Output directory (defaults to outputDirectory in the config)"),
).action(buildCommand);

withBuildFlags(
  program
    .command("s3-build")
    .description("Build a site stored in an S3 bucket")
    .requiredOption("--bucket <name>", "Source bucket")
    .option("--prefix <prefix>", "Key prefix of the site inside the source bucket", "")
    .option("--output-bucket <name>", "Destination bucket (defaults to the source bucket)")
    .option("--output-prefix <prefix>", "Key prefix for the built site", "_site")
    .option("--region <region>", "AWS region"),
).action(s3BuildCommand);

// Config command - show config location
program
  .command("config")
  .description("Show user configuration file location")
  .action(configCommand);

await program.parseAsync();
