import { existsSync, writeFileSync } from "node:fs";
import { DEFAULT_CONFIG, dumpConfig } from "@millwork/core";
import { errorMessage } from "../output.js";

const HEADER = "# Millwork drafting configuration. All lengths are inches.\n";

interface InitConfigOptions {
  output?: string;
  force?: boolean;
}

/** Starter configuration text: the built-in defaults as YAML. */
export function starterConfig(): string {
  return HEADER + dumpConfig(DEFAULT_CONFIG);
}

export function initConfigCommand(options: InitConfigOptions): void {
  const text = starterConfig();

  if (!options.output) {
    process.stdout.write(text);
    return;
  }

  if (existsSync(options.output) && !options.force) {
    console.error(`Refusing to overwrite ${options.output} (use --force)`);
    process.exit(1);
  }

  try {
    writeFileSync(options.output, text, "utf-8");
    console.log(`Wrote ${options.output}`);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(2);
  }
}
