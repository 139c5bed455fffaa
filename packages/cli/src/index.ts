#!/usr/bin/env node
import { Command, Option } from "commander";
import { generateCommand } from "./commands/generate.js";
import { initConfigCommand } from "./commands/init-config.js";
import { validateCommand } from "./commands/validate.js";
import { validateConfigCommand } from "./commands/validate-config.js";

const program = new Command();

program
  .name("millwork")
  .description("Generate casework shop drawings from room schedules")
  .version("0.1.0");

program
  .command("generate <input>")
  .description("Validate a room CSV and draw an SVG elevation per room")
  .option("-c, --config <file>", "Configuration file (YAML or JSON)")
  .option("-o, --output <dir>", "Output directory", "output")
  .option("--strict", "Treat warnings as errors and stop on any rejection")
  .addOption(
    new Option("--units <unit>", "Dimension label units")
      .choices(["in", "mm", "ft-in"])
      .default("in"),
  )
  .option("--width <px>", "SVG width in pixels", "1200")
  .option("--dry-run", "Validate and lay out without writing files")
  .option("-v, --verbose", "Print per-room detail")
  .action(generateCommand);

program
  .command("validate <input>")
  .description("Check a room CSV without drawing anything")
  .option("-c, --config <file>", "Configuration file (YAML or JSON)")
  .option("--strict", "Treat warnings as errors")
  .action(validateCommand);

program
  .command("init-config")
  .description("Write a starter configuration with the built-in defaults")
  .option("-o, --output <file>", "Output file (default: stdout)")
  .option("--force", "Overwrite an existing file")
  .action(initConfigCommand);

program
  .command("validate-config <file>")
  .description("Check a configuration file against the schema")
  .action(validateConfigCommand);

program.parse();
