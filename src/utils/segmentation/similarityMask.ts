import type { HsvColor, HsvImage, HsvTolerance } from '../../types/particles';
import { hueDistance } from './colorSpace';

/**
 * Binary mask (0/1) of pixels within tolerance of `center` on every channel.
 *
 * Hue uses circular distance; saturation and value use absolute difference.
 * Always evaluated on the full-resolution HSV image so areas stay exact.
 */
export function computeSimilarityMask(hsv: HsvImage, center: HsvColor, tol: HsvTolerance): Uint8Array {
  const n = hsv.width * hsv.height;
  const out = new Uint8Array(n);
  const data = hsv.data;

  for (let i = 0; i < n; i++) {
    const o = i * 3;
    const h = data[o] ?? 0;
    const s = data[o + 1] ?? 0;
    const v = data[o + 2] ?? 0;

    if (hueDistance(h, center.h) > tol.hueTol) continue;
    if (Math.abs(s - center.s) > tol.satTol) continue;
    if (Math.abs(v - center.v) > tol.valTol) continue;

    out[i] = 1;
  }

  return out;
}
