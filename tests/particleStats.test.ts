import { describe, expect, it } from 'vitest';
import { areaUnitScale, summarizeParticles } from '../src/utils/segmentation/particleStats';

describe('areaUnitScale', () => {
  it('squares a positive calibration and keeps pixels otherwise', () => {
    expect(areaUnitScale(0.5)).toBe(0.25);
    expect(areaUnitScale(0)).toBe(1);
    expect(areaUnitScale(-2)).toBe(1);
    expect(areaUnitScale(Number.NaN)).toBe(1);
  });
});

describe('summarizeParticles', () => {
  it('reports pixel statistics when uncalibrated', () => {
    const s = summarizeParticles([30, 10, 20], 600);
    expect(s.count).toBe(3);
    expect(s.totalAreaPx).toBe(60);
    expect(s.imageAreaPx).toBe(600);
    expect(s.coverage).toBe(0.1);
    expect(s.coveragePercent).toBe(10);
    expect(s.lengthPerPixel).toBe(0);
    expect(s.areaUnitScale).toBe(1);
    expect(s.areas).toEqual([30, 10, 20]);
    expect(s.totalArea).toBe(60);
    expect(s.meanArea).toBe(20);
    // Sample std: sqrt((100 + 100 + 0) / 2).
    expect(s.stdArea).toBe(10);
    expect(s.minArea).toBe(10);
    expect(s.maxArea).toBe(30);
  });

  it('converts areas with a length-per-pixel calibration', () => {
    const s = summarizeParticles([30, 10, 20], 600, 0.5);
    expect(s.lengthPerPixel).toBe(0.5);
    expect(s.areaUnitScale).toBe(0.25);
    expect(s.areas).toEqual([7.5, 2.5, 5]);
    expect(s.totalArea).toBe(15);
    expect(s.meanArea).toBe(5);
    expect(s.stdArea).toBe(2.5);
    expect(s.minArea).toBe(2.5);
    expect(s.maxArea).toBe(7.5);
    expect(s.totalAreaPx).toBe(60);
  });

  it('is all zeros with no particles', () => {
    const s = summarizeParticles([], 100);
    expect(s).toMatchObject({
      count: 0,
      totalAreaPx: 0,
      coverage: 0,
      meanArea: 0,
      stdArea: 0,
      minArea: 0,
      maxArea: 0,
    });
  });

  it('uses zero std for a single particle', () => {
    expect(summarizeParticles([42], 100).stdArea).toBe(0);
  });
});
