import { ConfigurationError, LayoutContractError } from "../errors.js";
import { configFingerprint, inputFingerprint, stableStringify } from "../fingerprint.js";
import { boundingBox, spanUnion } from "../geometry/bounds.js";
import { parseClearance, type Clearance } from "../parser/clearance.js";
import type { MillworkConfig } from "../types/config.js";
import type {
  ADALayout,
  CountertopLayout,
  FillerLayout,
  LayoutResult,
  ModuleLayout,
} from "../types/geometry.js";
import type { ParsedRoomData } from "../types/record.js";
import { measureLengthSum } from "../validation/geometric.js";
import { recordFinding } from "../validation/findings.js";

export const LAYOUT_VERSION = "1.0";
const DEFAULT_CODE_BASIS = "ADA 2010";

export interface AdaProfile {
  knee: Clearance;
  toe: Clearance;
  counterRange: [number, number];
  approachWidth: number;
  codeBasis: string;
}

export interface LayoutOptions {
  /** Pre-resolved accessibility profile; resolved from config when omitted */
  ada?: AdaProfile;
  /** Precomputed config fingerprint, to avoid re-hashing per record */
  configFingerprint?: string;
  /** Fingerprint of the source input; defaults to a hash of the record */
  inputFingerprint?: string;
  /** ISO timestamp recorded in metadata; defaults to now */
  computedAt?: string;
}

/**
 * Parse the accessibility profile's clearance specifications. Returns
 * undefined when no profile is configured; throws ConfigurationError when a
 * clearance string is malformed, since no record can be laid out without it.
 */
export function resolveAdaProfile(config: MillworkConfig): AdaProfile | undefined {
  const ada = config.ADA;
  if (!ada) return undefined;

  return {
    knee: parseClearance(ada.KNEE_CLEAR, "ADA.KNEE_CLEAR"),
    toe: parseClearance(ada.TOE_CLEAR, "ADA.TOE_CLEAR"),
    counterRange: ada.COUNTER_RANGE,
    approachWidth: ada.CLEAR_WIDTHS,
    codeBasis: config.CODE?.BASIS ?? DEFAULT_CODE_BASIS,
  };
}

/**
 * Compute positioned geometry for one validated record.
 *
 * Modules run left to right from x = 0 (after the left filler, if any), all in
 * elevation with y up from the floor. Geometry is kept at full precision;
 * rounding is left to whoever displays it.
 *
 * Throws LayoutContractError if the record breaks the engine's input contract.
 */
export function computeLayout(
  record: ParsedRoomData,
  config: MillworkConfig,
  options: LayoutOptions = {},
): LayoutResult {
  assertContract(record, config);

  const counterHeight = record.counter_height_in ?? config.COUNTER_HEIGHT;
  const height = cabinetHeight(record, config, counterHeight);
  const depth = config.BASE_DEPTH;

  const modules = positionModules(record, height, depth);
  const fillers = positionFillers(record, modules, height, depth);
  const countertop = generateCountertop(
    record,
    config,
    counterHeight,
    modules,
    fillers,
  );
  const ada = options.ada ?? resolveAdaProfile(config);

  const bounds = boundingBox([
    ...modules,
    ...fillers,
    {
      x: countertop.x,
      y: countertop.y,
      width: countertop.width,
      height: countertop.height,
    },
  ]);

  return {
    roomId: record.room_id,
    modules,
    fillers,
    countertop,
    ada: ada ? generateAdaLayout(ada, countertop, counterHeight) : undefined,
    assemblyLength: countertop.width,
    bounds,
    metadata: {
      roomId: record.room_id,
      rowNumber: record.rowNumber,
      sourceFile: record.sourceFile ?? null,
      configFingerprint: options.configFingerprint ?? configFingerprint(config),
      inputFingerprint:
        options.inputFingerprint ?? inputFingerprint(stableStringify(record)),
      computedAt: options.computedAt ?? new Date().toISOString(),
      layoutVersion: LAYOUT_VERSION,
      toleranceUsed: config.TOLERANCES.LENGTH_SUM,
    },
  };
}

/**
 * Box height under the countertop. A record whose own counter height leaves
 * no room for the top is a record failure; the configured defaults doing
 * the same is a configuration failure.
 */
function cabinetHeight(
  record: ParsedRoomData,
  config: MillworkConfig,
  counterHeight: number,
): number {
  if (config.CABINET_HEIGHT !== undefined) return config.CABINET_HEIGHT;

  const thickness = config.COUNTERTOP.THICKNESS;
  const height = counterHeight - thickness;
  if (height > 0) return height;

  if (record.counter_height_in !== undefined) {
    throw new LayoutContractError(
      recordFinding(record, {
        kind: "geometric",
        code: "layout-contract",
        field: "counter_height_in",
        message: `Cannot lay out ${record.room_id}: counter height ${counterHeight}" leaves no cabinet height under COUNTERTOP.THICKNESS ${thickness}"`,
        value: counterHeight,
      }),
    );
  }
  throw new ConfigurationError(
    `Cabinet height must be positive (COUNTER_HEIGHT ${counterHeight}" minus COUNTERTOP.THICKNESS ${thickness}")`,
    "COUNTERTOP.THICKNESS",
    thickness,
  );
}

function assertContract(record: ParsedRoomData, config: MillworkConfig): void {
  const widths = record.module_widths;

  if (widths.length !== record.num_modules) {
    throw new LayoutContractError(
      recordFinding(record, {
        kind: "domain",
        code: "layout-contract",
        field: "module_widths",
        message: `Cannot lay out ${record.room_id}: ${widths.length} module widths for ${record.num_modules} modules`,
        value: [...widths],
      }),
    );
  }

  const bad = widths.findIndex((w) => !Number.isFinite(w) || w <= 0);
  if (bad >= 0) {
    throw new LayoutContractError(
      recordFinding(record, {
        kind: "geometric",
        code: "layout-contract",
        field: "module_widths",
        message: `Cannot lay out ${record.room_id}: module ${bad + 1} has width ${widths[bad]}`,
        value: widths[bad],
      }),
    );
  }

  const sum = measureLengthSum(record, config.TOLERANCES.LENGTH_SUM);
  if (!sum.withinTolerance) {
    throw new LayoutContractError(
      recordFinding(record, {
        kind: "geometric",
        code: "layout-contract",
        field: "total_length_in",
        message: `Cannot lay out ${record.room_id}: assembly length ${sum.computedTotal}" differs from total length ${sum.totalLength}" by ${sum.delta}"`,
        value: { ...sum },
      }),
    );
  }
}

function positionModules(
  record: ParsedRoomData,
  height: number,
  depth: number,
): ModuleLayout[] {
  const modules: ModuleLayout[] = [];
  let x = record.left_filler_in;

  record.module_widths.forEach((width, index) => {
    modules.push({
      index,
      x,
      y: 0,
      width,
      height,
      depth,
      materialCode: record.material_casework,
    });
    x += width;
  });

  return modules;
}

function positionFillers(
  record: ParsedRoomData,
  modules: readonly ModuleLayout[],
  height: number,
  depth: number,
): FillerLayout[] {
  const fillers: FillerLayout[] = [];

  if (record.left_filler_in > 0) {
    fillers.push({
      side: "left",
      x: 0,
      y: 0,
      width: record.left_filler_in,
      height,
      depth,
    });
  }

  const last = modules[modules.length - 1];
  if (record.right_filler_in > 0 && last) {
    fillers.push({
      side: "right",
      x: last.x + last.width,
      y: 0,
      width: record.right_filler_in,
      height,
      depth,
    });
  }

  return fillers;
}

function generateCountertop(
  record: ParsedRoomData,
  config: MillworkConfig,
  counterHeight: number,
  modules: readonly ModuleLayout[],
  fillers: readonly FillerLayout[],
): CountertopLayout {
  const span = spanUnion([...modules, ...fillers]);
  const thickness = config.COUNTERTOP.THICKNESS;

  return {
    x: span.x,
    y: counterHeight - thickness,
    width: span.width,
    depth: config.COUNTERTOP.DEPTH ?? config.BASE_DEPTH,
    height: thickness,
    materialCode: record.material_top,
    edgeRule: record.edge_rule ?? config.EDGE_RULE,
  };
}

function generateAdaLayout(
  profile: AdaProfile,
  countertop: CountertopLayout,
  counterHeight: number,
): ADALayout {
  const center = countertop.x + countertop.width / 2;
  const underside = countertop.y;

  const kneeBox = {
    x: center - profile.knee.width / 2,
    y: underside - profile.knee.height,
    width: profile.knee.width,
    height: profile.knee.height,
    depth: profile.knee.depth,
  };

  const toeBox = {
    x: center - profile.toe.width / 2,
    y: kneeBox.y - profile.toe.height,
    width: profile.toe.width,
    height: profile.toe.height,
    depth: profile.toe.depth,
  };

  return {
    kneeBox,
    toeBox,
    approachWidth: profile.approachWidth,
    counterHeight,
    counterRange: profile.counterRange,
    codeBasis: profile.codeBasis,
  };
}
