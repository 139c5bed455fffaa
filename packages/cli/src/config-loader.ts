import { readFileSync } from "node:fs";
import { DEFAULT_CONFIG, parseConfig, type MillworkConfig } from "@millwork/core";

export interface LoadedConfig {
  config: MillworkConfig;
  /** Path the config came from; null for the built-in defaults */
  path: string | null;
}

/** Read and validate a config file, or fall back to the built-in defaults. */
export function loadConfig(path?: string): LoadedConfig {
  if (!path) {
    return { config: DEFAULT_CONFIG, path: null };
  }
  const content = readFileSync(path, "utf-8");
  return { config: parseConfig(content), path };
}
