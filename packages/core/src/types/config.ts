import { z } from "zod";
import { parseClearance } from "../parser/clearance.js";

// ---- Enums ----

export type PageSize =
  | "letter"
  | "tabloid"
  | "ANSI-A"
  | "ANSI-B"
  | "ANSI-C"
  | "ANSI-D";

/** Landscape sheet sizes in inches */
export const PAGE_DIMENSIONS: Record<PageSize, { width: number; height: number }> = {
  letter: { width: 11, height: 8.5 },
  tabloid: { width: 17, height: 11 },
  "ANSI-A": { width: 11, height: 8.5 },
  "ANSI-B": { width: 17, height: 11 },
  "ANSI-C": { width: 22, height: 17 },
  "ANSI-D": { width: 34, height: 22 },
};

// ---- Config interfaces ----

/**
 * Resolved millwork configuration. Key names mirror the YAML file so that
 * findings can cite the exact path a value came from (e.g. `ADA.COUNTER_RANGE`).
 * All lengths are inches.
 */
export interface MillworkConfig {
  SCALE_PLAN: number;
  COUNTER_HEIGHT: number;
  BASE_DEPTH: number;
  /** Module box height; defaults to counter height minus countertop thickness */
  CABINET_HEIGHT?: number;
  COUNTERTOP: CountertopConfig;
  /** Edge treatment for records that do not name one */
  EDGE_RULE: string;
  EDGE_RULES?: string[];
  ADA?: AdaConfig | null;
  TOLERANCES: ToleranceConfig;
  LIMITS?: LimitsConfig;
  HW?: HardwareConfig;
  /** Material catalog: code → description */
  MATERIALS?: Record<string, string>;
  CODE?: CodeConfig;
  PAGE: PageConfig;
}

export interface CountertopConfig {
  DEPTH?: number;
  THICKNESS: number;
}

export interface AdaConfig {
  KNEE_CLEAR: string;
  TOE_CLEAR: string;
  COUNTER_RANGE: [number, number];
  CLEAR_WIDTHS: number;
}

export interface ToleranceConfig {
  LENGTH_SUM: number;
  LENGTH_ROUNDING: number;
}

export interface RangeLimit {
  MIN?: number;
  MAX?: number;
}

export interface LimitsConfig {
  MODULE_WIDTH?: RangeLimit;
  FILLER_WIDTH?: RangeLimit;
}

export interface HardwareConfig {
  DEFAULTS: Record<string, string>;
}

export interface CodeConfig {
  BASIS: string;
}

export interface PageConfig {
  SIZE: PageSize;
  /** top, right, bottom, left */
  MARGINS: [number, number, number, number];
}

// ---- Zod schemas for runtime validation ----

const PositiveNumber = z.number().positive();

const ClearanceSchema = z.string().superRefine((value, ctx) => {
  try {
    parseClearance(value);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : String(err),
    });
  }
});

const AdaSchema = z.object({
  KNEE_CLEAR: ClearanceSchema,
  TOE_CLEAR: ClearanceSchema,
  COUNTER_RANGE: z
    .tuple([z.number(), z.number()])
    .refine(([min, max]) => min < max, {
      message: "First value must be less than second",
    }),
  CLEAR_WIDTHS: PositiveNumber,
});

const RangeLimitSchema = z.object({
  MIN: z.number().nonnegative().optional(),
  MAX: PositiveNumber.optional(),
});

export const MillworkConfigSchema: z.ZodType<MillworkConfig> = z
  .object({
    SCALE_PLAN: PositiveNumber,
    COUNTER_HEIGHT: PositiveNumber,
    BASE_DEPTH: PositiveNumber,
    CABINET_HEIGHT: PositiveNumber.optional(),
    COUNTERTOP: z.object({
      DEPTH: PositiveNumber.optional(),
      THICKNESS: PositiveNumber,
    }),
    EDGE_RULE: z.string().min(1),
    EDGE_RULES: z.array(z.string().min(1)).optional(),
    ADA: AdaSchema.nullable().optional(),
    TOLERANCES: z.object({
      LENGTH_SUM: z.number().nonnegative(),
      LENGTH_ROUNDING: z.number().int().nonnegative(),
    }),
    LIMITS: z
      .object({
        MODULE_WIDTH: RangeLimitSchema.optional(),
        FILLER_WIDTH: RangeLimitSchema.optional(),
      })
      .optional(),
    HW: z.object({ DEFAULTS: z.record(z.string()) }).optional(),
    MATERIALS: z.record(z.string()).optional(),
    CODE: z.object({ BASIS: z.string() }).optional(),
    PAGE: z.object({
      SIZE: z.enum(["letter", "tabloid", "ANSI-A", "ANSI-B", "ANSI-C", "ANSI-D"]),
      MARGINS: z.tuple([
        z.number().nonnegative(),
        z.number().nonnegative(),
        z.number().nonnegative(),
        z.number().nonnegative(),
      ]),
    }),
  })
  .superRefine((config, ctx) => {
    if (config.COUNTERTOP.THICKNESS >= config.COUNTER_HEIGHT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COUNTERTOP", "THICKNESS"],
        message: `Must be less than COUNTER_HEIGHT (${config.COUNTER_HEIGHT})`,
      });
    }
    if (config.EDGE_RULES && !config.EDGE_RULES.includes(config.EDGE_RULE)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["EDGE_RULE"],
        message: `"${config.EDGE_RULE}" is not one of EDGE_RULES [${config.EDGE_RULES.join(", ")}]`,
      });
    }
  });

// ---- Defaults ----

export const DEFAULT_CONFIG: MillworkConfig = {
  SCALE_PLAN: 0.25,
  COUNTER_HEIGHT: 36,
  BASE_DEPTH: 24,
  COUNTERTOP: { THICKNESS: 1.5 },
  EDGE_RULE: "MATCH_FACE",
  EDGE_RULES: ["MATCH_FACE", "PVC_EDGE", "SOLID_LUMBER", "RADIUS"],
  ADA: {
    KNEE_CLEAR: '27" H x 30" W x 17" D',
    TOE_CLEAR: '9" H x 30" W x 6" D',
    COUNTER_RANGE: [28, 34],
    CLEAR_WIDTHS: 32,
  },
  TOLERANCES: { LENGTH_SUM: 0.125, LENGTH_ROUNDING: 2 },
  LIMITS: {
    MODULE_WIDTH: { MIN: 6, MAX: 60 },
    FILLER_WIDTH: { MAX: 6 },
  },
  HW: {
    DEFAULTS: { HINGE: "BLUM-110", PULL: "SS-128", SLIDE: "BLUM-563" },
  },
  CODE: { BASIS: "ADA 2010" },
  PAGE: { SIZE: "letter", MARGINS: [0.5, 0.5, 0.5, 0.5] },
};
