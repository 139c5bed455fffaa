import crypto from "node:crypto";

export function sha256Hex(data: string | Uint8Array): string {
  return crypto.createHash("sha256").update(data).digest("hex");
}

/** JSON with object keys sorted at every level; undefined members are dropped. */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortRec(value));
}

/** Reproducibility hash of a configuration, independent of key order */
export function configFingerprint(config: unknown): string {
  return sha256Hex(stableStringify(config));
}

/** Hash of the raw input (file bytes or a record's canonical form) */
export function inputFingerprint(data: string | Uint8Array): string {
  return sha256Hex(data);
}

function sortRec(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortRec);
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    )) {
      if (v === undefined) continue;
      out[key] = sortRec(v);
    }
    return out;
  }
  return value;
}
