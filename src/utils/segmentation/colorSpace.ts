import type { HsvColor, HsvImage, RgbImage, RgbTriple } from '../../types/particles';
import { mod } from '../math';

/** Hue wraps at this value (half-range degrees, 8-bit friendly). */
export const HUE_RANGE = 180;

/**
 * Convert one 8-bit RGB color to HSV.
 *
 * Output ranges: H 0..180 (wrapping), S 0..255, V 0..255.
 */
export function rgbToHsv(r: number, g: number, b: number): HsvColor {
  const rf = r / 255;
  const gf = g / 255;
  const bf = b / 255;

  const cmax = Math.max(rf, gf, bf);
  const cmin = Math.min(rf, gf, bf);
  const delta = cmax - cmin;

  let hDeg = 0;
  if (delta > 0) {
    if (cmax === rf) {
      hDeg = 60 * mod((gf - bf) / delta, 6);
    } else if (cmax === gf) {
      hDeg = 60 * ((bf - rf) / delta + 2);
    } else {
      hDeg = 60 * ((rf - gf) / delta + 4);
    }
  }

  let h = hDeg / 2;
  if (h >= HUE_RANGE) h -= HUE_RANGE;

  const s = cmax > 0 ? (delta / cmax) * 255 : 0;
  const v = cmax * 255;

  return { h, s, v };
}

export function rgbPointsToHsv(points: readonly RgbTriple[]): HsvColor[] {
  return points.map(([r, g, b]) => rgbToHsv(r, g, b));
}

/**
 * Convert a whole image to interleaved HSV floats (same width/height).
 */
export function rgbImageToHsv(image: RgbImage): HsvImage {
  const { width, height, channels, data } = image;
  const n = width * height;
  const out = new Float32Array(n * 3);

  for (let i = 0; i < n; i++) {
    const si = i * channels;
    const hsv = rgbToHsv(data[si] ?? 0, data[si + 1] ?? 0, data[si + 2] ?? 0);
    const o = i * 3;
    out[o] = hsv.h;
    out[o + 1] = hsv.s;
    out[o + 2] = hsv.v;
  }

  return { width, height, data: out };
}

/**
 * Circular distance between two hues on the 0..180 wheel.
 */
export function hueDistance(a: number, b: number): number {
  const d = Math.abs(a - b) % HUE_RANGE;
  return Math.min(d, HUE_RANGE - d);
}
