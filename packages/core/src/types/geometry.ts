// ---- Primitive geometry ----

export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned rectangle; (x, y) is the bottom-left corner, Y up. */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

// ---- Layout elements (elevation coordinates, inches) ----

export interface ModuleLayout {
  readonly index: number;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly depth: number;
  readonly materialCode: string;
}

export type FillerSide = "left" | "right";

export interface FillerLayout {
  readonly side: FillerSide;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly depth: number;
}

export interface CountertopLayout {
  readonly x: number;
  /** Underside elevation; the finished surface is at y + height */
  readonly y: number;
  readonly width: number;
  readonly depth: number;
  /** Slab thickness */
  readonly height: number;
  readonly materialCode: string;
  /** Edge treatment: the record's rule, else the configured default */
  readonly edgeRule: string;
}

export interface ClearanceBox extends Rect {
  readonly depth: number;
}

export interface ADALayout {
  readonly kneeBox: ClearanceBox;
  readonly toeBox: ClearanceBox;
  readonly approachWidth: number;
  readonly counterHeight: number;
  readonly counterRange: readonly [number, number];
  readonly codeBasis: string;
}

export interface LayoutMetadata {
  readonly roomId: string;
  readonly rowNumber: number;
  readonly sourceFile: string | null;
  readonly configFingerprint: string;
  readonly inputFingerprint: string;
  readonly computedAt: string;
  readonly layoutVersion: string;
  readonly toleranceUsed: number;
}

export interface LayoutResult {
  readonly roomId: string;
  readonly modules: readonly ModuleLayout[];
  readonly fillers: readonly FillerLayout[];
  readonly countertop: CountertopLayout;
  readonly ada?: ADALayout;
  readonly assemblyLength: number;
  readonly bounds: Rect;
  readonly metadata: LayoutMetadata;
}
