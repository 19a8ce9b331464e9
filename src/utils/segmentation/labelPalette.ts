import type { RgbTriple } from '../../types/particles';

function clampByte(x: number): number {
  if (!Number.isFinite(x)) return 0;
  const xi = Math.round(x);
  return xi < 0 ? 0 : xi > 255 ? 255 : xi;
}

/** Distinct colors for neighboring ranks; rank i uses entry (i - 1) mod 20. */
export const PARTICLE_PALETTE: readonly RgbTriple[] = [
  [230, 25, 75],
  [60, 180, 75],
  [255, 225, 25],
  [0, 130, 200],
  [245, 130, 48],
  [145, 30, 180],
  [70, 240, 240],
  [240, 50, 230],
  [210, 245, 60],
  [250, 190, 212],
  [0, 128, 128],
  [220, 190, 255],
  [170, 110, 40],
  [255, 250, 200],
  [128, 0, 0],
  [170, 255, 195],
  [128, 128, 0],
  [255, 215, 180],
  [0, 0, 128],
  [128, 128, 128],
];

export function paletteColorForRank(rank: number): RgbTriple {
  const n = PARTICLE_PALETTE.length;
  const i = ((Math.trunc(rank) - 1) % n + n) % n;
  return PARTICLE_PALETTE[i] ?? [255, 255, 255];
}

export type RgbaRankPalette = Uint8Array;

/**
 * RGBA lookup for ranks 0..maxRank. Rank 0 (background) is fully transparent.
 */
export function buildRankRgbaPalette(maxRank: number): RgbaRankPalette {
  const count = Math.max(0, Math.trunc(maxRank));
  const rgba = new Uint8Array((count + 1) * 4);

  for (let rank = 1; rank <= count; rank++) {
    const [r, g, b] = paletteColorForRank(rank);
    const o = rank * 4;
    rgba[o] = r;
    rgba[o + 1] = g;
    rgba[o + 2] = b;
    rgba[o + 3] = 255;
  }

  return rgba;
}

export function rgbCss(color: readonly [number, number, number]): string {
  const [r, g, b] = color;
  return `rgb(${clampByte(r)}, ${clampByte(g)}, ${clampByte(b)})`;
}

export function rgbHex(color: readonly [number, number, number]): string {
  return `#${color.map((c) => clampByte(c).toString(16).padStart(2, '0')).join('')}`;
}
