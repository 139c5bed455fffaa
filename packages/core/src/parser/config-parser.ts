import yaml from "js-yaml";
import { ConfigurationError } from "../errors.js";
import type { MillworkConfig } from "../types/config.js";
import { DEFAULT_CONFIG, MillworkConfigSchema } from "../types/config.js";

/**
 * Parse a JSON or YAML string into a validated MillworkConfig.
 * Detects format automatically (tries JSON first, then YAML). Values are
 * merged onto the built-in defaults before validation; `null` removes a
 * section (e.g. `ADA: null` disables the accessibility profile).
 * Throws a ConfigurationError listing every issue if the input is invalid.
 */
export function parseConfig(input: string): MillworkConfig {
  let raw: unknown;

  try {
    raw = JSON.parse(input);
  } catch {
    try {
      raw = yaml.load(input);
    } catch (yamlErr) {
      throw new ConfigurationError(
        `Failed to parse input as JSON or YAML: ${yamlErr instanceof Error ? yamlErr.message : String(yamlErr)}`,
      );
    }
  }

  if (raw !== undefined && raw !== null && !isPlainObject(raw)) {
    throw new ConfigurationError("Configuration must be a mapping of keys", "", raw);
  }

  return validateConfig(mergeDefaults(DEFAULT_CONFIG, raw ?? {}));
}

/** Validate an already-decoded configuration object as-is, without defaults. */
export function validateConfig(raw: unknown): MillworkConfig {
  const result = MillworkConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    const first = result.error.issues[0];
    throw new ConfigurationError(
      `Invalid millwork config:\n${issues}`,
      first ? first.path.join(".") : "",
    );
  }

  return result.data;
}

/** Serialize a configuration to YAML, e.g. for writing a starter file. */
export function dumpConfig(config: MillworkConfig): string {
  return yaml.dump(config, { sortKeys: false, indent: 2, lineWidth: -1 });
}

/**
 * Recursively overlay `override` onto `base`. Mappings merge key by key;
 * arrays, scalars and null replace.
 */
export function mergeDefaults(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }

  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    out[key] = mergeDefaults(base[key], value);
  }
  return out;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
