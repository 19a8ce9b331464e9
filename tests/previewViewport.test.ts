import { describe, expect, it } from 'vitest';
import {
  beginPreviewPan,
  computePreviewLayout,
  normalizePreviewView,
  panPreview,
  resetPreviewView,
  viewportPathToImage,
  viewportToImagePixel,
  viewportToThumb,
  visibleThumbRect,
  wheelZoomFactor,
  zoomPreviewAt,
} from '../src/utils/previewViewport';

const viewport = { w: 200, h: 100 };
const thumb = { w: 100, h: 100 };

describe('computePreviewLayout', () => {
  it('contain-fits and centers the thumbnail', () => {
    const layout = computePreviewLayout({ zoom: 1, offsetX: 0, offsetY: 0 }, viewport, thumb);
    expect(layout).toEqual({ baseScale: 1, scale: 1, originX: 50, originY: 0 });
  });

  it('applies zoom and offset', () => {
    const layout = computePreviewLayout({ zoom: 2, offsetX: 20, offsetY: 20 }, viewport, thumb);
    expect(layout).toEqual({ baseScale: 1, scale: 2, originX: 20, originY: -30 });
  });
});

describe('zoomPreviewAt', () => {
  it('keeps the offset when zooming about the viewport center', () => {
    const v = zoomPreviewAt({ zoom: 1, offsetX: 0, offsetY: 0 }, { x: 100, y: 50 }, 2, viewport);
    expect(v).toEqual({ zoom: 2, offsetX: 0, offsetY: 0 });
  });

  it('keeps the thumbnail point under the cursor fixed', () => {
    const before = { zoom: 1, offsetX: 0, offsetY: 0 };
    const cursor = { x: 80, y: 30 };
    const after = zoomPreviewAt(before, cursor, 2, viewport);

    expect(after).toEqual({ zoom: 2, offsetX: 20, offsetY: 20 });
    expect(viewportToThumb(cursor, computePreviewLayout(before, viewport, thumb))).toEqual({ x: 30, y: 30 });
    expect(viewportToThumb(cursor, computePreviewLayout(after, viewport, thumb))).toEqual({ x: 30, y: 30 });
  });

  it('clamps zoom to the allowed range', () => {
    const v = zoomPreviewAt({ zoom: 20, offsetX: 5, offsetY: 6 }, { x: 0, y: 0 }, 1.2, viewport);
    expect(v).toEqual({ zoom: 20, offsetX: 5, offsetY: 6 });

    expect(zoomPreviewAt({ zoom: 0.6, offsetX: 0, offsetY: 0 }, { x: 100, y: 50 }, 0.5, viewport).zoom).toBe(0.5);
  });

  it('ignores invalid factors', () => {
    const v = { zoom: 1, offsetX: 0, offsetY: 0 };
    expect(zoomPreviewAt(v, { x: 0, y: 0 }, 0, viewport)).toBe(v);
    expect(zoomPreviewAt(v, { x: 0, y: 0 }, Number.NaN, viewport)).toBe(v);
  });
});

describe('wheelZoomFactor', () => {
  it('steps by 1.2 per notch', () => {
    expect(wheelZoomFactor(-100)).toBe(1.2);
    expect(wheelZoomFactor(100)).toBe(1 / 1.2);
    expect(wheelZoomFactor(0)).toBe(1);
  });
});

describe('pan', () => {
  it('moves the offset by the pointer delta from the anchor', () => {
    const view = { zoom: 3, offsetX: 5, offsetY: 5 };
    const anchor = beginPreviewPan(view, { x: 10, y: 10 });
    expect(panPreview(view, anchor, { x: 30, y: 0 })).toEqual({ zoom: 3, offsetX: 25, offsetY: -5 });
  });

  it('resets to the default view', () => {
    expect(resetPreviewView()).toEqual({ zoom: 1, offsetX: 0, offsetY: 0 });
  });
});

describe('normalizePreviewView', () => {
  it('fills defaults and clamps zoom', () => {
    expect(normalizePreviewView(null)).toEqual({ zoom: 1, offsetX: 0, offsetY: 0 });
    expect(normalizePreviewView({ zoom: 99, offsetX: Number.NaN, offsetY: 4 })).toEqual({
      zoom: 20,
      offsetX: 0,
      offsetY: 4,
    });
  });
});

describe('visibleThumbRect', () => {
  it('covers the whole thumbnail when it fits', () => {
    const layout = computePreviewLayout({ zoom: 1, offsetX: 0, offsetY: 0 }, viewport, thumb);
    expect(visibleThumbRect(layout, viewport, thumb)).toEqual({ x0: 0, y0: 0, x1: 100, y1: 100 });
  });

  it('crops to the viewport when zoomed', () => {
    const layout = computePreviewLayout({ zoom: 2, offsetX: 20, offsetY: 20 }, viewport, thumb);
    expect(visibleThumbRect(layout, viewport, thumb)).toEqual({ x0: 0, y0: 15, x1: 91, y1: 66 });
  });

  it('is null when panned fully out of view', () => {
    const layout = computePreviewLayout({ zoom: 1, offsetX: 1000, offsetY: 0 }, viewport, thumb);
    expect(visibleThumbRect(layout, viewport, thumb)).toBeNull();
  });
});

describe('viewportToImagePixel', () => {
  const image = { w: 1000, h: 1000 };
  const layout = computePreviewLayout({ zoom: 1, offsetX: 0, offsetY: 0 }, viewport, thumb);

  it('maps clicks inside the thumbnail to integer image pixels', () => {
    expect(viewportToImagePixel({ x: 50, y: 0 }, layout, thumb, image)).toEqual({ x: 0, y: 0 });
    expect(viewportToImagePixel({ x: 75.5, y: 42 }, layout, thumb, image)).toEqual({ x: 255, y: 420 });
  });

  it('returns null outside the thumbnail', () => {
    expect(viewportToImagePixel({ x: 49, y: 10 }, layout, thumb, image)).toBeNull();
    expect(viewportToImagePixel({ x: 150, y: 50 }, layout, thumb, image)).toBeNull();
  });

  it('maps stroke paths to fractional image coordinates', () => {
    expect(
      viewportPathToImage(
        [
          { x: 50, y: 0 },
          { x: 150, y: 100 },
        ],
        layout,
        thumb,
        image
      )
    ).toEqual([
      { x: 0, y: 0 },
      { x: 1000, y: 1000 },
    ]);
  });
});
