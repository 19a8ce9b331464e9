import type { ParticleSummary } from '../../types/particles';
import { mean, sampleStd } from '../math';

/**
 * Area multiplier for a length-per-pixel calibration (px² -> unit²).
 * Uncalibrated (0 or invalid) keeps pixel units.
 */
export function areaUnitScale(lengthPerPixel: number): number {
  return Number.isFinite(lengthPerPixel) && lengthPerPixel > 0 ? lengthPerPixel * lengthPerPixel : 1;
}

export function summarizeParticles(
  areasPx: readonly number[],
  imageAreaPx: number,
  lengthPerPixel: number = 0
): ParticleSummary {
  const calibrated = Number.isFinite(lengthPerPixel) && lengthPerPixel > 0;
  const unit = areaUnitScale(lengthPerPixel);

  let totalAreaPx = 0;
  for (const a of areasPx) totalAreaPx += a;

  const coverage = imageAreaPx > 0 ? totalAreaPx / imageAreaPx : 0;
  const areas = areasPx.map((a) => a * unit);

  let minArea = areas.length > 0 ? Infinity : 0;
  let maxArea = 0;
  for (const a of areas) {
    if (a < minArea) minArea = a;
    if (a > maxArea) maxArea = a;
  }

  return {
    count: areasPx.length,
    totalAreaPx,
    imageAreaPx: Math.max(0, imageAreaPx),
    coverage,
    coveragePercent: coverage * 100,
    lengthPerPixel: calibrated ? lengthPerPixel : 0,
    areaUnitScale: unit,
    areas,
    totalArea: totalAreaPx * unit,
    meanArea: mean(areas),
    stdArea: sampleStd(areas),
    minArea,
    maxArea,
  };
}
