import type { Finding } from "./types/validation.js";

/**
 * A configuration value the engine depends on is missing or malformed.
 * Fatal for the whole batch: no record can be laid out without it.
 */
export class ConfigurationError extends Error {
  readonly path: string;
  readonly value: unknown;

  constructor(message: string, path = "", value?: unknown) {
    super(message);
    this.name = "ConfigurationError";
    this.path = path;
    this.value = value;
  }
}

/**
 * The layout engine was handed a record that breaks its input contract
 * (something validation should already have rejected).
 */
export class LayoutContractError extends Error {
  readonly finding: Finding;

  constructor(finding: Finding) {
    super(finding.message);
    this.name = "LayoutContractError";
    this.finding = finding;
  }
}
