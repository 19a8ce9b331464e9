import { describe, expect, it } from 'vitest';
import {
  buildRankRgbaPalette,
  paletteColorForRank,
  PARTICLE_PALETTE,
  rgbCss,
  rgbHex,
} from '../src/utils/segmentation/labelPalette';

describe('labelPalette', () => {
  it('has 20 distinct colors', () => {
    expect(PARTICLE_PALETTE.length).toBe(20);
    expect(new Set(PARTICLE_PALETTE.map((c) => c.join(','))).size).toBe(20);
  });

  it('cycles colors by rank', () => {
    expect(paletteColorForRank(1)).toEqual([230, 25, 75]);
    expect(paletteColorForRank(20)).toEqual([128, 128, 128]);
    expect(paletteColorForRank(21)).toEqual(paletteColorForRank(1));
    expect(paletteColorForRank(42)).toEqual([60, 180, 75]);
  });

  it('keeps rank 0 transparent', () => {
    const p = buildRankRgbaPalette(2);
    expect(p.length).toBe(3 * 4);
    expect(Array.from(p.subarray(0, 4))).toEqual([0, 0, 0, 0]);
  });

  it('makes ranked entries opaque', () => {
    const p = buildRankRgbaPalette(2);
    expect(Array.from(p.subarray(4, 8))).toEqual([230, 25, 75, 255]);
    expect(Array.from(p.subarray(8, 12))).toEqual([60, 180, 75, 255]);
  });

  it('rgbCss clamps components', () => {
    expect(rgbCss([300, -2, 10.4])).toBe('rgb(255, 0, 10)');
  });

  it('rgbHex pads each byte', () => {
    expect(rgbHex([255, 0, 10])).toBe('#ff000a');
  });
});
