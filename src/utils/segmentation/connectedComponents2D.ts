import type { Connectivity2D, ParticleRecord, Point2 } from '../../types/particles';

export type ComponentExtraction = {
  /** 0 = background, 1..N by descending area. */
  labels: Int32Array;
  /** Rank order; areas[i] belongs to label i + 1. */
  areas: number[];
  centroids: Point2[];
  particles: ParticleRecord[];
};

/**
 * Label connected regions of a 2D binary mask and rank them by area.
 *
 * Components smaller than `minArea` are cleared from `mask` in place, so the mask
 * the caller keeps matches what was counted. Survivors are relabeled 1..N by
 * descending area (ties keep scan order) and get a centroid in pixel coordinates.
 */
export function extractComponents(params: {
  mask: Uint8Array;
  width: number;
  height: number;
  minArea: number;
  connectivity?: Connectivity2D;
}): ComponentExtraction {
  const { mask, width: w, height: h } = params;
  const n = w * h;

  if (mask.length !== n) {
    throw new Error(`extractComponents: mask length mismatch (expected ${n}, got ${mask.length})`);
  }

  const connectivity: Connectivity2D = params.connectivity ?? 4;
  const minArea = Number.isFinite(params.minArea) ? params.minArea : 0;

  const raw = new Int32Array(n);
  const queue = new Uint32Array(n);

  // Index 0 unused so raw ids index these directly.
  const areas: number[] = [0];
  const sumX: number[] = [0];
  const sumY: number[] = [0];

  let nextId = 1;

  for (let start = 0; start < n; start++) {
    if (!mask[start] || raw[start]) continue;

    const id = nextId++;
    let head = 0;
    let tail = 0;
    queue[tail++] = start;
    raw[start] = id;

    let area = 0;
    let sx = 0;
    let sy = 0;

    while (head < tail) {
      const i = queue[head++]!;
      const y = Math.floor(i / w);
      const x = i - y * w;

      area++;
      sx += x;
      sy += y;

      const tryNeighbor = (xx: number, yy: number) => {
        if (xx < 0 || xx >= w || yy < 0 || yy >= h) return;
        const ni = yy * w + xx;
        if (raw[ni] || !mask[ni]) return;
        raw[ni] = id;
        queue[tail++] = ni;
      };

      tryNeighbor(x - 1, y);
      tryNeighbor(x + 1, y);
      tryNeighbor(x, y - 1);
      tryNeighbor(x, y + 1);

      if (connectivity === 8) {
        tryNeighbor(x - 1, y - 1);
        tryNeighbor(x + 1, y - 1);
        tryNeighbor(x - 1, y + 1);
        tryNeighbor(x + 1, y + 1);
      }
    }

    areas.push(area);
    sumX.push(sx);
    sumY.push(sy);
  }

  const rawCount = nextId - 1;

  const kept: number[] = [];
  let removedAny = false;
  for (let id = 1; id <= rawCount; id++) {
    if (areas[id]! >= minArea) kept.push(id);
    else removedAny = true;
  }

  if (removedAny) {
    for (let i = 0; i < n; i++) {
      const id = raw[i]!;
      if (id && areas[id]! < minArea) mask[i] = 0;
    }
  }

  // Array.prototype.sort is stable, so equal areas keep raw (scan) order.
  kept.sort((a, b) => areas[b]! - areas[a]!);

  const remap = new Int32Array(rawCount + 1);
  const outAreas: number[] = [];
  const centroids: Point2[] = [];
  const particles: ParticleRecord[] = [];

  kept.forEach((id, k) => {
    const rank = k + 1;
    remap[id] = rank;
    const area = areas[id]!;
    const centroid = { x: sumX[id]! / area, y: sumY[id]! / area };
    outAreas.push(area);
    centroids.push(centroid);
    particles.push({ rank, areaPx: area, centroid });
  });

  const labels = new Int32Array(n);
  if (kept.length > 0) {
    for (let i = 0; i < n; i++) {
      const id = raw[i]!;
      if (id) labels[i] = remap[id]!;
    }
  }

  return { labels, areas: outAreas, centroids, particles };
}
