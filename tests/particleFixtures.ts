import type { RgbImage, RgbTriple } from '../src/types/particles';

export const RED: RgbTriple = [200, 0, 0];
export const GREEN: RgbTriple = [0, 200, 0];

/**
 * 100x100 field of `background` with a 10x10 `square` at x, y in [5, 14].
 */
export function redSquareImage(square: RgbTriple = RED, background: RgbTriple = GREEN): RgbImage {
  const width = 100;
  const height = 100;
  const data = new Uint8Array(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const c = x >= 5 && x <= 14 && y >= 5 && y <= 14 ? square : background;
      data.set(c, (y * width + x) * 3);
    }
  }
  return { width, height, channels: 3, data };
}
