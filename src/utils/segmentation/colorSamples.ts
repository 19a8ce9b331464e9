import type { ColorCenter, HsvColor, HsvTolerance, RgbTriple } from '../../types/particles';
import { AUTO_TOLERANCE, DEFAULT_TOLERANCES } from '../../types/particles';
import { clamp, mod } from '../math';
import { HUE_RANGE, hueDistance, rgbPointsToHsv } from './colorSpace';

/**
 * Circular mean of half-range hues (0..180), normalized into [0, 180).
 */
export function circularMeanHue(hues: readonly number[]): number {
  if (hues.length === 0) return 0;

  let sinSum = 0;
  let cosSum = 0;
  for (const h of hues) {
    const rad = h * (Math.PI / 90);
    sinSum += Math.sin(rad);
    cosSum += Math.cos(rad);
  }

  const meanDeg = Math.atan2(sinSum / hues.length, cosSum / hues.length) * (90 / Math.PI);
  const h = mod(meanDeg, HUE_RANGE);
  // mod() of a tiny negative can land exactly on the range end.
  return h >= HUE_RANGE ? 0 : h;
}

export function computeHsvCenter(colors: readonly HsvColor[]): HsvColor | null {
  const n = colors.length;
  if (n === 0) return null;

  let s = 0;
  let v = 0;
  for (const c of colors) {
    s += c.s;
    v += c.v;
  }

  return {
    h: circularMeanHue(colors.map((c) => c.h)),
    s: s / n,
    v: v / n,
  };
}

export function averageRgb(points: readonly RgbTriple[]): RgbTriple | null {
  const n = points.length;
  if (n === 0) return null;

  let r = 0;
  let g = 0;
  let b = 0;
  for (const p of points) {
    r += p[0];
    g += p[1];
    b += p[2];
  }

  return [Math.round(r / n), Math.round(g / n), Math.round(b / n)];
}

/**
 * Derive hue/sat/val tolerances from the spread of the samples around `center`.
 *
 * Max deviation per channel, scaled and padded, clamped into the slider range
 * and truncated to an integer. Fewer than two samples carry no spread: the
 * defaults are returned.
 */
export function computeAutoTolerance(colors: readonly HsvColor[], center: HsvColor | null): HsvTolerance {
  if (colors.length < 2 || !center) {
    return {
      hueTol: DEFAULT_TOLERANCES.hueTol,
      satTol: DEFAULT_TOLERANCES.satTol,
      valTol: DEFAULT_TOLERANCES.valTol,
    };
  }

  let maxH = 0;
  let maxS = 0;
  let maxV = 0;
  for (const c of colors) {
    maxH = Math.max(maxH, hueDistance(c.h, center.h));
    maxS = Math.max(maxS, Math.abs(c.s - center.s));
    maxV = Math.max(maxV, Math.abs(c.v - center.v));
  }

  const k = AUTO_TOLERANCE.SPREAD_FACTOR;
  const { HUE, SAT, VAL } = AUTO_TOLERANCE;

  return {
    hueTol: Math.trunc(clamp(maxH * k + HUE.MARGIN, HUE.MIN, HUE.MAX)),
    satTol: Math.trunc(clamp(maxS * k + SAT.MARGIN, SAT.MIN, SAT.MAX)),
    valTol: Math.trunc(clamp(maxV * k + VAL.MARGIN, VAL.MIN, VAL.MAX)),
  };
}

/**
 * Reference colors picked by the operator.
 *
 * Seeds are fixed for the lifetime of the set; appended points can be undone.
 * Statistics always use seeds followed by appended points.
 */
export class ColorSampleSet {
  private readonly seedList: RgbTriple[];
  private readonly addedList: RgbTriple[] = [];

  constructor(seeds: readonly RgbTriple[] = []) {
    this.seedList = seeds.map(normalizeRgb);
  }

  get seeds(): readonly RgbTriple[] {
    return this.seedList;
  }

  get added(): readonly RgbTriple[] {
    return this.addedList;
  }

  get all(): RgbTriple[] {
    return [...this.seedList, ...this.addedList];
  }

  get size(): number {
    return this.seedList.length + this.addedList.length;
  }

  addPoint(rgb: RgbTriple): void {
    this.addedList.push(normalizeRgb(rgb));
  }

  /** Undo the last appended point. Seeds cannot be undone. */
  undoLast(): boolean {
    return this.addedList.pop() !== undefined;
  }

  hsv(): HsvColor[] {
    return rgbPointsToHsv(this.all);
  }

  center(): ColorCenter | null {
    const all = this.all;
    const hsv = computeHsvCenter(rgbPointsToHsv(all));
    const rgb = averageRgb(all);
    if (!hsv || !rgb) return null;
    return { hsv, rgb };
  }

  autoTolerance(): HsvTolerance {
    const colors = this.hsv();
    return computeAutoTolerance(colors, computeHsvCenter(colors));
  }
}

function normalizeRgb(rgb: RgbTriple): RgbTriple {
  const byte = (x: number) => (Number.isFinite(x) ? clamp(Math.round(x), 0, 255) : 0);
  return [byte(rgb[0]), byte(rgb[1]), byte(rgb[2])];
}
