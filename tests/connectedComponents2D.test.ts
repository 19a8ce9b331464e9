import { describe, expect, it } from 'vitest';
import { extractComponents } from '../src/utils/segmentation/connectedComponents2D';

function fillRect(mask: Uint8Array, w: number, x0: number, y0: number, x1: number, y1: number) {
  for (let y = y0; y <= y1; y++) {
    for (let x = x0; x <= x1; x++) {
      mask[y * w + x] = 1;
    }
  }
}

describe('extractComponents', () => {
  it('finds one component covering an all-true mask, centered in the image', () => {
    const w = 4;
    const h = 6;
    const mask = new Uint8Array(w * h).fill(1);

    const out = extractComponents({ mask, width: w, height: h, minArea: 0 });
    expect(out.areas).toEqual([24]);
    expect(out.centroids[0]!.x).toBeCloseTo(1.5, 10);
    expect(out.centroids[0]!.y).toBeCloseTo(2.5, 10);
    expect(Array.from(out.labels).every((l) => l === 1)).toBe(true);
  });

  it('drops components below minArea and clears them from the mask', () => {
    const w = 10;
    const h = 10;
    const mask = new Uint8Array(w * h);
    fillRect(mask, w, 0, 0, 4, 0); // area 5
    fillRect(mask, w, 0, 3, 9, 7); // area 50

    const out = extractComponents({ mask, width: w, height: h, minArea: 10 });
    expect(out.areas).toEqual([50]);
    expect(out.particles).toEqual([{ rank: 1, areaPx: 50, centroid: { x: 4.5, y: 5 } }]);

    expect(mask[0]).toBe(0);
    expect(mask[4]).toBe(0);
    expect(mask[3 * w]).toBe(1);
    expect(out.labels[0]).toBe(0);
    expect(out.labels[5 * w + 5]).toBe(1);
  });

  it('ranks by descending area and keeps scan order on ties', () => {
    const w = 9;
    const h = 3;
    const mask = new Uint8Array(w * h);
    fillRect(mask, w, 0, 0, 0, 2); // A: area 3, first in scan order
    fillRect(mask, w, 2, 0, 3, 2); // B: area 6
    fillRect(mask, w, 5, 0, 5, 2); // C: area 3

    const out = extractComponents({ mask, width: w, height: h, minArea: 0 });
    expect(out.areas).toEqual([6, 3, 3]);
    expect(out.labels[2]).toBe(1);
    expect(out.labels[0]).toBe(2);
    expect(out.labels[5]).toBe(3);
    expect(out.particles.map((p) => p.rank)).toEqual([1, 2, 3]);
    expect(out.centroids[0]).toEqual({ x: 2.5, y: 1 });
    expect(out.centroids[1]).toEqual({ x: 0, y: 1 });
    expect(out.centroids[2]).toEqual({ x: 5, y: 1 });
  });

  it('joins diagonal neighbors only with 8-connectivity', () => {
    const w = 3;
    const h = 3;
    const diag = () => new Uint8Array([1, 0, 0, 0, 1, 0, 0, 0, 1]);

    const four = extractComponents({ mask: diag(), width: w, height: h, minArea: 0, connectivity: 4 });
    expect(four.areas).toEqual([1, 1, 1]);

    const eight = extractComponents({ mask: diag(), width: w, height: h, minArea: 0, connectivity: 8 });
    expect(eight.areas).toEqual([3]);
    expect(eight.centroids[0]).toEqual({ x: 1, y: 1 });
  });

  it('is idempotent on the same mask and minArea', () => {
    const w = 12;
    const h = 8;
    const mask = new Uint8Array(w * h);
    fillRect(mask, w, 0, 0, 2, 2);
    fillRect(mask, w, 5, 1, 10, 3);
    fillRect(mask, w, 1, 6, 1, 6);
    fillRect(mask, w, 7, 5, 9, 7);

    const a = extractComponents({ mask, width: w, height: h, minArea: 2 });
    const b = extractComponents({ mask, width: w, height: h, minArea: 2 });

    expect(b.areas).toEqual(a.areas);
    expect(b.centroids).toEqual(a.centroids);
    expect(Array.from(b.labels)).toEqual(Array.from(a.labels));
    expect(a.areas).toEqual([18, 9, 9]);
  });

  it('keeps areas sorted in non-increasing order', () => {
    const w = 16;
    const h = 16;
    const mask = new Uint8Array(w * h);
    // Deterministic speckle pattern.
    for (let i = 0; i < mask.length; i++) {
      mask[i] = (i * 7919) % 5 < 2 ? 1 : 0;
    }

    const out = extractComponents({ mask, width: w, height: h, minArea: 0 });
    for (let i = 1; i < out.areas.length; i++) {
      expect(out.areas[i - 1]!).toBeGreaterThanOrEqual(out.areas[i]!);
    }
    const maxLabel = Math.max(0, ...Array.from(out.labels));
    expect(maxLabel).toBe(out.areas.length);
  });

  it('returns an empty result when nothing survives', () => {
    const mask = new Uint8Array([1, 0, 0, 0]);
    const out = extractComponents({ mask, width: 2, height: 2, minArea: 5 });
    expect(out.areas).toEqual([]);
    expect(out.centroids).toEqual([]);
    expect(Array.from(out.labels)).toEqual([0, 0, 0, 0]);
    expect(Array.from(mask)).toEqual([0, 0, 0, 0]);
  });

  it('throws on a mask/size mismatch', () => {
    expect(() => extractComponents({ mask: new Uint8Array(3), width: 2, height: 2, minArea: 0 })).toThrow(
      /mask length mismatch/
    );
  });
});
