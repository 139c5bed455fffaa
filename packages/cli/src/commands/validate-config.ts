import { readFileSync } from "node:fs";
import { configFingerprint, parseConfig } from "@millwork/core";
import { errorMessage } from "../output.js";

export function validateConfigCommand(file: string): void {
  try {
    const config = parseConfig(readFileSync(file, "utf-8"));
    const profile = config.ADA ? "on" : "off";
    console.log(`✓ Configuration is valid. ADA profile ${profile}.`);
    console.log(`  Fingerprint: ${configFingerprint(config).slice(0, 12)}`);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(2);
  }
}
