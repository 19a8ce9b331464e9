export type RgbTriple = [number, number, number];

export type Point2 = { x: number; y: number };

/**
 * Decoded 8-bit image, interleaved samples.
 *
 * `channels: 4` accepts canvas `ImageData` buffers directly; alpha is ignored.
 */
export type RgbImage = {
  width: number;
  height: number;
  channels: 3 | 4;
  data: Uint8Array | Uint8ClampedArray;
};

/** RGBA buffer with the same layout as `ImageData`. */
export type RgbaImage = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};

export type HsvColor = {
  /** Half-range hue, 0..180 (wraps). */
  h: number;
  s: number;
  v: number;
};

export type HsvImage = {
  width: number;
  height: number;
  /** Interleaved H, S, V. */
  data: Float32Array;
};

export type HsvTolerance = {
  hueTol: number;
  satTol: number;
  valTol: number;
};

export type ToleranceSet = HsvTolerance & {
  /** Components smaller than this many pixels are dropped. */
  minArea: number;
};

export type ColorCenter = {
  hsv: HsvColor;
  /** Arithmetic mean of the raw samples, for swatches only. */
  rgb: RgbTriple;
};

export type Connectivity2D = 4 | 8;

export type ParticleRecord = {
  /** 1 = largest. */
  rank: number;
  areaPx: number;
  /** Source image pixel coordinates. */
  centroid: Point2;
};

export type PreviewViewState = {
  zoom: number;
  offsetX: number;
  offsetY: number;
};

export type ParticleSummary = {
  count: number;
  totalAreaPx: number;
  imageAreaPx: number;
  /** totalAreaPx / imageAreaPx, 0..1. */
  coverage: number;
  coveragePercent: number;
  /** Calibrated length per pixel; 0 when uncalibrated. */
  lengthPerPixel: number;
  /** lengthPerPixel² when calibrated, otherwise 1 (areas stay in px²). */
  areaUnitScale: number;
  /** Areas in calibrated units, rank order. */
  areas: number[];
  totalArea: number;
  meanArea: number;
  stdArea: number;
  minArea: number;
  maxArea: number;
};

export const DEFAULT_TOLERANCES: ToleranceSet = {
  hueTol: 15,
  satTol: 50,
  valTol: 50,
  minArea: 10,
};

export const TOLERANCE_LIMITS = {
  HUE: { MIN: 0, MAX: 90 },
  SAT: { MIN: 0, MAX: 128 },
  VAL: { MIN: 0, MAX: 128 },
  MIN_AREA: { MIN: 0, MAX: 500 },
} as const;

export const AUTO_TOLERANCE = {
  SPREAD_FACTOR: 1.5,
  HUE: { MARGIN: 5, MIN: 5, MAX: 90 },
  SAT: { MARGIN: 10, MIN: 10, MAX: 128 },
  VAL: { MARGIN: 10, MIN: 10, MAX: 128 },
} as const;

export const BRUSH_WIDTH_LIMITS = { MIN: 1, MAX: 30, DEFAULT: 3 } as const;

export const PREVIEW = {
  /** Longest side of the preview thumbnail. */
  MAX_SIZE: 600,
  /** Weight of the palette color when blending over the thumbnail. */
  BLEND_ALPHA: 0.6,
  /** Above this zoom the preview is resized with nearest-neighbor. */
  NEAREST_ZOOM_THRESHOLD: 3,
  /** Labels this far outside the viewport are still drawn. */
  LABEL_MARGIN_PX: 20,
  LABEL_FONT: { MIN: 7, MAX: 12, PER_ZOOM: 8 },
} as const;

export const PREVIEW_ZOOM_LIMITS = { MIN: 0.5, MAX: 20, WHEEL_STEP: 1.2 } as const;

export const DEFAULT_PREVIEW_VIEW: PreviewViewState = { zoom: 1, offsetX: 0, offsetY: 0 };

export const RECOMPUTE_DEBOUNCE_MS = 80;
