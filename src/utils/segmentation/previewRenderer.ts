import type { Point2, PreviewViewState, RgbaImage } from '../../types/particles';
import { PREVIEW } from '../../types/particles';
import { cropRgba, resizeRgba, type ResampleMode } from '../imageResize';
import {
  computePreviewLayout,
  thumbToViewport,
  visibleThumbRect,
  type PreviewLayout,
  type ThumbRect,
  type ViewportSize,
} from '../previewViewport';

export type PreviewLabel = {
  rank: number;
  /** Viewport pixel position of the centroid. */
  x: number;
  y: number;
  fontSize: number;
};

export type RenderedPreview = {
  /** Visible part of the overlay at screen resolution, or null when nothing is visible. */
  image: RgbaImage | null;
  /** Viewport position of `image`'s top-left corner. */
  x: number;
  y: number;
  layout: PreviewLayout | null;
  visible: ThumbRect | null;
  resample: ResampleMode;
  labels: PreviewLabel[];
};

export function previewLabelFontSize(zoom: number): number {
  const { MIN, MAX, PER_ZOOM } = PREVIEW.LABEL_FONT;
  return Math.max(MIN, Math.min(MAX, Math.trunc(PER_ZOOM * zoom)));
}

export function previewResampleMode(zoom: number): ResampleMode {
  return zoom > PREVIEW.NEAREST_ZOOM_THRESHOLD ? 'nearest' : 'bilinear';
}

/**
 * Render the thumbnail overlay for the current pan/zoom.
 *
 * Only the visible sub-rectangle of the thumbnail is cropped and resized, so the
 * cost is bounded by the viewport size rather than the zoom level. Rank labels
 * are placed for centroids inside the viewport (plus a small margin); drawing
 * the text is left to the caller.
 */
export function renderPreview(params: {
  overlay: RgbaImage;
  centroidsThumb: readonly Point2[];
  view: PreviewViewState;
  viewport: ViewportSize;
}): RenderedPreview {
  const { overlay, centroidsThumb, view, viewport } = params;
  const resample = previewResampleMode(view.zoom);

  const empty: RenderedPreview = { image: null, x: 0, y: 0, layout: null, visible: null, resample, labels: [] };
  if (viewport.w < 2 || viewport.h < 2 || overlay.width === 0 || overlay.height === 0) return empty;

  const thumb = { w: overlay.width, h: overlay.height };
  const layout = computePreviewLayout(view, viewport, thumb);
  const visible = visibleThumbRect(layout, viewport, thumb);
  if (!visible) return { ...empty, layout };

  const s = layout.scale;
  const crop = cropRgba(overlay, visible.x0, visible.y0, visible.x1, visible.y1);
  const outW = Math.max(1, Math.trunc((visible.x1 - visible.x0) * s));
  const outH = Math.max(1, Math.trunc((visible.y1 - visible.y0) * s));
  const image = resizeRgba(crop, outW, outH, resample);

  const margin = PREVIEW.LABEL_MARGIN_PX;
  const fontSize = previewLabelFontSize(view.zoom);
  const labels: PreviewLabel[] = [];

  centroidsThumb.forEach((c, i) => {
    const p = thumbToViewport(c, layout);
    if (p.x > -margin && p.x < viewport.w + margin && p.y > -margin && p.y < viewport.h + margin) {
      labels.push({ rank: i + 1, x: p.x, y: p.y, fontSize });
    }
  });

  return {
    image,
    x: layout.originX + visible.x0 * s,
    y: layout.originY + visible.y0 * s,
    layout,
    visible,
    resample,
    labels,
  };
}

/** The part of `CanvasRenderingContext2D` the preview draws with. */
export type PreviewDrawContext = {
  font: string;
  fillStyle: string | CanvasGradient | CanvasPattern;
  textAlign: CanvasTextAlign;
  textBaseline: CanvasTextBaseline;
  createImageData(sw: number, sh: number): ImageData;
  putImageData(imagedata: ImageData, dx: number, dy: number): void;
  fillText(text: string, x: number, y: number): void;
};

/**
 * Blit a rendered preview and draw its rank labels: white bold text over a
 * black shadow offset by 1px.
 */
export function drawRenderedPreview(ctx: PreviewDrawContext, rendered: RenderedPreview): void {
  const { image } = rendered;
  if (image && image.width > 0 && image.height > 0) {
    const img = ctx.createImageData(image.width, image.height);
    img.data.set(image.data);
    ctx.putImageData(img, Math.round(rendered.x), Math.round(rendered.y));
  }

  if (rendered.labels.length === 0) return;

  ctx.textAlign = 'center';
  ctx.textBaseline = 'middle';
  for (const label of rendered.labels) {
    const text = String(label.rank);
    ctx.font = `bold ${label.fontSize}px sans-serif`;
    ctx.fillStyle = 'black';
    ctx.fillText(text, label.x + 1, label.y + 1);
    ctx.fillStyle = 'white';
    ctx.fillText(text, label.x, label.y);
  }
}
