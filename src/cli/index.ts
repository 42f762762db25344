#!/usr/bin/env node

/**
 * CLI entry point for the product media migrator
 * Handles command-line argument parsing and user interaction
 */

import "dotenv/config";
import { Command } from "commander";
import { migrateCommand } from "./commands/migrate";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("media-migrate")
  .description(
    "Download product images and upload them to the media service",
  )
  .version("0.1.0");

// Main migration command (default action)
program
  .option("-c, --config <path>", "Path to custom config file")
  .option("-i, --input <path>", "Read records from a JSON file instead of the database")
  .option("-o, --images <path>", "Directory for downloaded images")
  .option("-r, --report <path>", "Directory for the report files")
  .option("--concurrency <n>", "Records processed at the same time")
  .option("--memory", "Keep downloaded images in memory instead of on disk")
  .option("-v, --verbose", "Verbose output")
  .action(migrateCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
