import type { Point2 } from '../../types/particles';
import { BRUSH_WIDTH_LIMITS } from '../../types/particles';
import { clamp } from '../math';

export type CutStroke = {
  /** Image pixel coordinates, already clamped to the image. */
  points: Point2[];
  radius: number;
};

/**
 * Brush width (image px) -> capsule radius. Never below 1px.
 */
export function brushWidthToRadius(width: number): number {
  const w = Number.isFinite(width) ? clamp(width, BRUSH_WIDTH_LIMITS.MIN, BRUSH_WIDTH_LIMITS.MAX) : BRUSH_WIDTH_LIMITS.DEFAULT;
  return Math.max(1, w / 2);
}

/**
 * OR a capsule (segment with rounded ends) of the given radius into `mask`.
 *
 * Only cells in the segment's bounding box (+ radius, + 1px slack) are tested.
 */
export function rasterizeCapsule(
  mask: Uint8Array,
  w: number,
  h: number,
  a: Point2,
  b: Point2,
  radius: number
): void {
  const bx0 = Math.max(0, Math.floor(Math.min(a.x, b.x) - radius) - 1);
  const by0 = Math.max(0, Math.floor(Math.min(a.y, b.y) - radius) - 1);
  const bx1 = Math.min(w, Math.floor(Math.max(a.x, b.x) + radius) + 2);
  const by1 = Math.min(h, Math.floor(Math.max(a.y, b.y) + radius) + 2);
  if (bx0 >= bx1 || by0 >= by1) return;

  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const segLenSq = dx * dx + dy * dy;
  const r2 = radius * radius;

  for (let y = by0; y < by1; y++) {
    const row = y * w;
    for (let x = bx0; x < bx1; x++) {
      let px = a.x;
      let py = a.y;

      // Near-zero length segments degrade to a disc around `a`.
      if (segLenSq >= 1e-6) {
        const t = clamp(((x - a.x) * dx + (y - a.y) * dy) / segLenSq, 0, 1);
        px = a.x + t * dx;
        py = a.y + t * dy;
      }

      const ex = x - px;
      const ey = y - py;
      if (ex * ex + ey * ey <= r2) {
        mask[row + x] = 1;
      }
    }
  }
}

export function rasterizeStroke(mask: Uint8Array, w: number, h: number, stroke: CutStroke): void {
  const pts = stroke.points;
  for (let k = 0; k + 1 < pts.length; k++) {
    rasterizeCapsule(mask, w, h, pts[k]!, pts[k + 1]!, stroke.radius);
  }
}

/**
 * `mask AND NOT cutMask`, as a new array.
 */
export function applyCuts(mask: Uint8Array, cutMask: Uint8Array): Uint8Array {
  if (mask.length !== cutMask.length) {
    throw new Error(`applyCuts: mask length mismatch (mask ${mask.length}, cuts ${cutMask.length})`);
  }

  const out = new Uint8Array(mask.length);
  for (let i = 0; i < mask.length; i++) {
    out[i] = mask[i] && !cutMask[i] ? 1 : 0;
  }
  return out;
}

/**
 * Operator-painted "cut" strokes that split touching particles.
 *
 * The cut mask is always the union of the stored strokes: undo/clear rebuild it
 * from the list instead of subtracting in place.
 */
export class CutLayer {
  readonly width: number;
  readonly height: number;

  private readonly strokeList: CutStroke[] = [];
  private cutMask: Uint8Array;
  private painted = 0;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.cutMask = new Uint8Array(width * height);
  }

  get strokes(): readonly CutStroke[] {
    return this.strokeList;
  }

  get strokeCount(): number {
    return this.strokeList.length;
  }

  get mask(): Uint8Array {
    return this.cutMask;
  }

  hasCuts(): boolean {
    return this.painted > 0;
  }

  /**
   * Rasterize and record a stroke. Needs at least two points.
   */
  paintStroke(points: readonly Point2[], radius: number): boolean {
    if (points.length < 2) return false;
    if (!Number.isFinite(radius) || radius < 0) return false;

    const maxX = Math.max(0, this.width - 1);
    const maxY = Math.max(0, this.height - 1);
    const clamped: Point2[] = [];
    for (const p of points) {
      if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) continue;
      clamped.push({ x: clamp(p.x, 0, maxX), y: clamp(p.y, 0, maxY) });
    }
    if (clamped.length < 2) return false;

    const stroke: CutStroke = { points: clamped, radius };
    this.strokeList.push(stroke);
    rasterizeStroke(this.cutMask, this.width, this.height, stroke);
    this.painted = countOn(this.cutMask);
    return true;
  }

  undoLastStroke(): boolean {
    if (this.strokeList.length === 0) return false;
    this.strokeList.pop();
    this.rebuild();
    return true;
  }

  clearStrokes(): boolean {
    if (this.strokeList.length === 0) return false;
    this.strokeList.length = 0;
    this.rebuild();
    return true;
  }

  /** Remove cut cells from a similarity mask. */
  apply(mask: Uint8Array): Uint8Array {
    if (!this.hasCuts()) return mask;
    return applyCuts(mask, this.cutMask);
  }

  private rebuild(): void {
    const next = new Uint8Array(this.width * this.height);
    for (const s of this.strokeList) {
      rasterizeStroke(next, this.width, this.height, s);
    }
    this.cutMask = next;
    this.painted = countOn(next);
  }
}

function countOn(mask: Uint8Array): number {
  let n = 0;
  for (let i = 0; i < mask.length; i++) {
    if (mask[i]) n++;
  }
  return n;
}
