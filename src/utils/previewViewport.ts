import type { Point2, PreviewViewState } from '../types/particles';
import { DEFAULT_PREVIEW_VIEW, PREVIEW_ZOOM_LIMITS } from '../types/particles';
import { clamp } from './math';

export type ViewportSize = { w: number; h: number };

export type ImageSizePx = { w: number; h: number };

/**
 * Where the thumbnail lands in the viewport for a given view state.
 *
 * `baseScale` is the "contain" fit; `scale` includes the user zoom; `originX/Y`
 * is the thumbnail's top-left corner in viewport pixels.
 */
export type PreviewLayout = {
  baseScale: number;
  scale: number;
  originX: number;
  originY: number;
};

/** Half-open thumbnail pixel rect [x0, x1) × [y0, y1). */
export type ThumbRect = { x0: number; y0: number; x1: number; y1: number };

export type PanAnchor = {
  pointerX: number;
  pointerY: number;
  offsetX: number;
  offsetY: number;
};

export function normalizePreviewView(v?: Partial<PreviewViewState> | null): PreviewViewState {
  const zoom = typeof v?.zoom === 'number' && Number.isFinite(v.zoom) ? v.zoom : DEFAULT_PREVIEW_VIEW.zoom;
  return {
    zoom: clamp(zoom, PREVIEW_ZOOM_LIMITS.MIN, PREVIEW_ZOOM_LIMITS.MAX),
    offsetX: typeof v?.offsetX === 'number' && Number.isFinite(v.offsetX) ? v.offsetX : DEFAULT_PREVIEW_VIEW.offsetX,
    offsetY: typeof v?.offsetY === 'number' && Number.isFinite(v.offsetY) ? v.offsetY : DEFAULT_PREVIEW_VIEW.offsetY,
  };
}

export function computePreviewLayout(view: PreviewViewState, viewport: ViewportSize, thumb: ImageSizePx): PreviewLayout {
  const tw = Math.max(1, thumb.w);
  const th = Math.max(1, thumb.h);

  const baseScale = Math.min(viewport.w / tw, viewport.h / th);
  const scale = baseScale * view.zoom;

  return {
    baseScale,
    scale,
    originX: (viewport.w - tw * scale) / 2 + view.offsetX,
    originY: (viewport.h - th * scale) / 2 + view.offsetY,
  };
}

/**
 * Zoom about a viewport point, keeping the image point under it fixed.
 */
export function zoomPreviewAt(
  view: PreviewViewState,
  cursor: Point2,
  factor: number,
  viewport: ViewportSize
): PreviewViewState {
  if (!Number.isFinite(factor) || factor <= 0) return view;

  const oldZoom = view.zoom;
  const zoom = clamp(oldZoom * factor, PREVIEW_ZOOM_LIMITS.MIN, PREVIEW_ZOOM_LIMITS.MAX);
  const r = zoom / oldZoom;

  const cx = viewport.w / 2;
  const cy = viewport.h / 2;

  return {
    zoom,
    offsetX: (1 - r) * (cursor.x - cx) + r * view.offsetX,
    offsetY: (1 - r) * (cursor.y - cy) + r * view.offsetY,
  };
}

/**
 * Wheel zoom: one step in per negative delta, one step out per positive delta.
 */
export function wheelZoomFactor(deltaY: number): number {
  if (deltaY < 0) return PREVIEW_ZOOM_LIMITS.WHEEL_STEP;
  if (deltaY > 0) return 1 / PREVIEW_ZOOM_LIMITS.WHEEL_STEP;
  return 1;
}

export function beginPreviewPan(view: PreviewViewState, pointer: Point2): PanAnchor {
  return { pointerX: pointer.x, pointerY: pointer.y, offsetX: view.offsetX, offsetY: view.offsetY };
}

export function panPreview(view: PreviewViewState, anchor: PanAnchor, pointer: Point2): PreviewViewState {
  return {
    zoom: view.zoom,
    offsetX: anchor.offsetX + (pointer.x - anchor.pointerX),
    offsetY: anchor.offsetY + (pointer.y - anchor.pointerY),
  };
}

export function resetPreviewView(): PreviewViewState {
  return { ...DEFAULT_PREVIEW_VIEW };
}

/**
 * Thumbnail pixels that intersect the viewport, or null when nothing is visible.
 */
export function visibleThumbRect(layout: PreviewLayout, viewport: ViewportSize, thumb: ImageSizePx): ThumbRect | null {
  const s = layout.scale;
  if (!(s > 0)) return null;

  const x0 = Math.max(0, Math.floor(-layout.originX / s));
  const y0 = Math.max(0, Math.floor(-layout.originY / s));
  const x1 = Math.min(thumb.w, Math.floor((viewport.w - layout.originX) / s) + 1);
  const y1 = Math.min(thumb.h, Math.floor((viewport.h - layout.originY) / s) + 1);

  if (x1 <= x0 || y1 <= y0) return null;
  return { x0, y0, x1, y1 };
}

export function viewportToThumb(p: Point2, layout: PreviewLayout): Point2 {
  return {
    x: (p.x - layout.originX) / layout.scale,
    y: (p.y - layout.originY) / layout.scale,
  };
}

export function thumbToViewport(p: Point2, layout: PreviewLayout): Point2 {
  return {
    x: layout.originX + p.x * layout.scale,
    y: layout.originY + p.y * layout.scale,
  };
}

export function thumbToImage(p: Point2, thumb: ImageSizePx, image: ImageSizePx): Point2 {
  return {
    x: (p.x * image.w) / Math.max(1, thumb.w),
    y: (p.y * image.h) / Math.max(1, thumb.h),
  };
}

/**
 * Map a viewport click to an image pixel for color picking.
 *
 * Returns null outside the thumbnail; otherwise integer pixel coords clamped
 * to the image.
 */
export function viewportToImagePixel(
  p: Point2,
  layout: PreviewLayout,
  thumb: ImageSizePx,
  image: ImageSizePx
): Point2 | null {
  const t = viewportToThumb(p, layout);
  if (!Number.isFinite(t.x) || !Number.isFinite(t.y)) return null;
  if (t.x < 0 || t.x >= thumb.w || t.y < 0 || t.y >= thumb.h) return null;

  const ip = thumbToImage(t, thumb, image);
  return {
    x: clamp(Math.trunc(ip.x), 0, Math.max(0, image.w - 1)),
    y: clamp(Math.trunc(ip.y), 0, Math.max(0, image.h - 1)),
  };
}

/**
 * Map a stroke path from viewport to (fractional) image coordinates.
 */
export function viewportPathToImage(
  points: readonly Point2[],
  layout: PreviewLayout,
  thumb: ImageSizePx,
  image: ImageSizePx
): Point2[] {
  return points.map((p) => thumbToImage(viewportToThumb(p, layout), thumb, image));
}
