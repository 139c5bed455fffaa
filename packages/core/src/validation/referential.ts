import type { MillworkConfig } from "../types/config.js";
import type { ParsedRoomData } from "../types/record.js";
import type {
  CheckContext,
  Finding,
  ValidationResult,
} from "../types/validation.js";
import { recordFinding, toResult } from "./findings.js";

/**
 * Check that every configuration key a record refers to exists: edge rule,
 * hardware defaults key and (when a catalog is configured) material codes.
 */
export function checkReferentialIntegrity(
  record: ParsedRoomData,
  config: MillworkConfig,
  context: CheckContext = {},
): ValidationResult {
  const findings: Finding[] = [];

  const edgeRule = record.edge_rule;
  if (edgeRule) {
    const allowed = config.EDGE_RULES;
    if (!allowed) {
      findings.push(
        recordFinding(record, {
          kind: "referential",
          code: "missing-config-key",
          field: "edge_rule",
          message: `Edge rule "${edgeRule}" cannot be checked: EDGE_RULES is not configured`,
          value: edgeRule,
        }),
      );
    } else if (!allowed.includes(edgeRule)) {
      findings.push(
        recordFinding(record, {
          kind: "referential",
          code: "unknown-edge-rule",
          field: "edge_rule",
          message: `Invalid edge rule "${edgeRule}". Valid options: [${allowed.join(", ")}]`,
          value: edgeRule,
        }),
      );
    }
  }

  const hwKey = record.hardware_defaults;
  if (hwKey) {
    const defaults = config.HW?.DEFAULTS;
    if (!defaults) {
      findings.push(
        recordFinding(record, {
          kind: "referential",
          code: "missing-config-key",
          field: "hardware_defaults",
          message: `Hardware defaults "${hwKey}" cannot be checked: HW.DEFAULTS is not configured`,
          value: hwKey,
        }),
      );
    } else if (!Object.hasOwn(defaults, hwKey)) {
      findings.push(
        recordFinding(record, {
          kind: "referential",
          code: "unknown-hardware-defaults",
          field: "hardware_defaults",
          message: `Invalid hardware defaults "${hwKey}". Valid options: [${Object.keys(defaults).join(", ")}]`,
          value: hwKey,
        }),
      );
    }
  }

  // No catalog means nothing to check against
  const catalog = config.MATERIALS;
  if (catalog) {
    const fields = [
      ["material_top", record.material_top],
      ["material_casework", record.material_casework],
    ] as const;
    for (const [field, code] of fields) {
      if (!Object.hasOwn(catalog, code)) {
        findings.push(
          recordFinding(record, {
            kind: "referential",
            code: "unknown-material",
            field,
            message: `Material code "${code}" not found in MATERIALS. Valid options: [${Object.keys(catalog).join(", ")}]`,
            value: code,
          }),
        );
      }
    }
  }

  return toResult(findings, context.strict);
}
