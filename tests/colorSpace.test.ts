import { describe, expect, it } from 'vitest';
import { hueDistance, rgbImageToHsv, rgbPointsToHsv, rgbToHsv } from '../src/utils/segmentation/colorSpace';

describe('colorSpace', () => {
  it('maps black to zero on every channel', () => {
    expect(rgbToHsv(0, 0, 0)).toEqual({ h: 0, s: 0, v: 0 });
  });

  it('gives zero saturation and hue for grays', () => {
    for (const g of [1, 64, 128, 255]) {
      const hsv = rgbToHsv(g, g, g);
      expect(hsv.s).toBe(0);
      expect(hsv.h).toBe(0);
      expect(hsv.v).toBeCloseTo(g, 10);
    }
  });

  it('uses half-range hues for the primaries', () => {
    expect(rgbToHsv(255, 0, 0)).toEqual({ h: 0, s: 255, v: 255 });
    expect(rgbToHsv(0, 255, 0)).toEqual({ h: 60, s: 255, v: 255 });
    expect(rgbToHsv(0, 0, 255)).toEqual({ h: 120, s: 255, v: 255 });
  });

  it('handles secondary colors where two channels tie for the max', () => {
    expect(rgbToHsv(255, 255, 0).h).toBeCloseTo(30, 10);
    expect(rgbToHsv(0, 255, 255).h).toBeCloseTo(90, 10);
    expect(rgbToHsv(255, 0, 255).h).toBeCloseTo(150, 10);
  });

  it('keeps magenta-reds below 180', () => {
    const hsv = rgbToHsv(255, 0, 1);
    expect(hsv.h).toBeGreaterThan(179);
    expect(hsv.h).toBeLessThan(180);
  });

  it('computes saturation relative to the max channel', () => {
    const hsv = rgbToHsv(200, 100, 100);
    expect(hsv.s).toBeCloseTo(127.5, 10);
    expect(hsv.v).toBeCloseTo(200, 10);
    expect(hsv.h).toBe(0);
  });

  it('converts an RGBA image pixel by pixel and ignores alpha', () => {
    const image = {
      width: 2,
      height: 1,
      channels: 4 as const,
      data: new Uint8ClampedArray([0, 255, 0, 10, 0, 0, 0, 255]),
    };

    const hsv = rgbImageToHsv(image);
    expect(hsv.width).toBe(2);
    expect(hsv.height).toBe(1);
    expect(Array.from(hsv.data)).toEqual([60, 255, 255, 0, 0, 0]);
  });

  it('converts point lists independently', () => {
    const out = rgbPointsToHsv([
      [255, 0, 0],
      [0, 0, 255],
    ]);
    expect(out.map((c) => c.h)).toEqual([0, 120]);
  });

  it('measures hue distance around the wheel', () => {
    expect(hueDistance(5, 175)).toBe(10);
    expect(hueDistance(175, 5)).toBe(10);
    expect(hueDistance(0, 90)).toBe(90);
    expect(hueDistance(30, 40)).toBe(10);
    expect(hueDistance(0, 0)).toBe(0);
  });
});
