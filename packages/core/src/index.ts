export * from "./types/config.js";
export * from "./types/geometry.js";
export * from "./types/record.js";
export * from "./types/validation.js";
export { ConfigurationError, LayoutContractError } from "./errors.js";
export {
  configFingerprint,
  inputFingerprint,
  sha256Hex,
  stableStringify,
} from "./fingerprint.js";
export {
  convertLength,
  applyScale,
  roundTo,
  nearlyEqual,
  formatLength,
  formatScale,
} from "./geometry/units.js";
export type { LengthUnit, DisplayUnit } from "./geometry/units.js";
export { boundingBox, spanUnion } from "./geometry/bounds.js";
export { parseClearance } from "./parser/clearance.js";
export type { Clearance } from "./parser/clearance.js";
export {
  parseConfig,
  validateConfig,
  dumpConfig,
  mergeDefaults,
} from "./parser/config-parser.js";
export { parseField } from "./parser/field-parser.js";
export type { FieldParseOutcome } from "./parser/field-parser.js";
export { ROOM_SCHEMA, requiredFieldNames, fieldNames } from "./parser/room-schema.js";
export { checkHeaders, parseRow, parseRows } from "./parser/row-parser.js";
export type {
  ParseRowsResult,
  RowParseResult,
  RowRejection,
} from "./parser/row-parser.js";
export {
  errorsOf,
  warningsOf,
  mergeResults,
} from "./validation/findings.js";
export { checkTypeAndDomain } from "./validation/type-domain.js";
export {
  checkGeometricConsistency,
  measureLengthSum,
} from "./validation/geometric.js";
export { checkReferentialIntegrity } from "./validation/referential.js";
export { RECORD_CHECKS, validateRecord } from "./validation/validate-record.js";
export type { RecordCheck } from "./validation/validate-record.js";
export { validateBatch } from "./validation/batch.js";
export type {
  BatchValidation,
  RecordOutcome,
} from "./validation/batch.js";
export {
  computeLayout,
  resolveAdaProfile,
  LAYOUT_VERSION,
} from "./resolver/layout-resolver.js";
export type { AdaProfile, LayoutOptions } from "./resolver/layout-resolver.js";
export { runPipeline } from "./resolver/pipeline.js";
export type {
  LayoutFailure,
  PipelineOptions,
  PipelineResult,
} from "./resolver/pipeline.js";
