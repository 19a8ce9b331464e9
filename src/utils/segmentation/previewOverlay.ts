import type { Point2, RgbaImage, RgbImage } from '../../types/particles';
import { PREVIEW } from '../../types/particles';
import { createRgbaImage } from '../imageResize';
import { buildRankRgbaPalette } from './labelPalette';

export type ThumbnailSize = { width: number; height: number; scale: number };

/**
 * Aspect-preserving thumbnail size whose longest side is at most `maxSize`.
 * Never upscales.
 */
export function computeThumbnailSize(width: number, height: number, maxSize: number = PREVIEW.MAX_SIZE): ThumbnailSize {
  const w = Math.max(1, width);
  const h = Math.max(1, height);

  let scale = 1;
  if (Number.isFinite(maxSize) && maxSize >= 1) {
    scale = Math.min(maxSize / w, maxSize / h, 1);
  }

  return {
    width: Math.max(1, Math.floor(w * scale)),
    height: Math.max(1, Math.floor(h * scale)),
    scale,
  };
}

/**
 * Box-filter (area) downsample of an RGB(A) image into an opaque RGBA thumbnail.
 *
 * Each source pixel is a constant over its unit square; each destination pixel
 * is the area-weighted mean over the source box it covers.
 */
export function resampleRgbAreaAverage(image: RgbImage, outW: number, outH: number): RgbaImage {
  const out = createRgbaImage(outW, outH);
  const inW = image.width;
  const inH = image.height;
  if (out.width === 0 || out.height === 0 || inW === 0 || inH === 0) return out;

  const ch = image.channels;
  const src = image.data;
  const rowScale = inH / out.height;
  const colScale = inW / out.width;
  const invArea = 1 / (rowScale * colScale);

  for (let dr = 0; dr < out.height; dr++) {
    const srcR0 = dr * rowScale;
    const srcR1 = (dr + 1) * rowScale;
    const r0 = Math.max(0, Math.floor(srcR0));
    const r1 = Math.min(inH, Math.ceil(srcR1));

    for (let dc = 0; dc < out.width; dc++) {
      const srcC0 = dc * colScale;
      const srcC1 = (dc + 1) * colScale;
      const c0 = Math.max(0, Math.floor(srcC0));
      const c1 = Math.min(inW, Math.ceil(srcC1));

      let sr = 0;
      let sg = 0;
      let sb = 0;

      for (let r = r0; r < r1; r++) {
        const wr = Math.min(r + 1, srcR1) - Math.max(r, srcR0);
        if (wr <= 0) continue;

        for (let c = c0; c < c1; c++) {
          const wc = Math.min(c + 1, srcC1) - Math.max(c, srcC0);
          if (wc <= 0) continue;

          const wgt = wr * wc;
          const si = (r * inW + c) * ch;
          sr += (src[si] ?? 0) * wgt;
          sg += (src[si + 1] ?? 0) * wgt;
          sb += (src[si + 2] ?? 0) * wgt;
        }
      }

      const o = (dr * out.width + dc) * 4;
      out.data[o] = sr * invArea;
      out.data[o + 1] = sg * invArea;
      out.data[o + 2] = sb * invArea;
      out.data[o + 3] = 255;
    }
  }

  return out;
}

/**
 * Nearest-neighbor downsample of a label map (labels must never be blended).
 */
export function downsampleLabelsNearest(
  labels: Int32Array,
  width: number,
  height: number,
  outW: number,
  outH: number
): Int32Array {
  const out = new Int32Array(Math.max(0, outW * outH));
  if (outW <= 0 || outH <= 0 || width <= 0 || height <= 0) return out;

  const sxScale = width / outW;
  const syScale = height / outH;

  for (let y = 0; y < outH; y++) {
    const sy = Math.min(height - 1, Math.floor((y + 0.5) * syScale));
    const srcRow = sy * width;
    const outRow = y * outW;
    for (let x = 0; x < outW; x++) {
      const sx = Math.min(width - 1, Math.floor((x + 0.5) * sxScale));
      out[outRow + x] = labels[srcRow + sx] ?? 0;
    }
  }

  return out;
}

/**
 * Blend a palette color over every labeled thumbnail pixel:
 * `floor(base * (1 - alpha) + color * alpha)`.
 */
export function buildParticleOverlay(
  thumbnail: RgbaImage,
  thumbLabels: Int32Array,
  particleCount: number,
  alpha: number = PREVIEW.BLEND_ALPHA
): RgbaImage {
  const out: RgbaImage = {
    width: thumbnail.width,
    height: thumbnail.height,
    data: new Uint8ClampedArray(thumbnail.data),
  };
  if (particleCount <= 0) return out;

  const palette = buildRankRgbaPalette(particleCount);
  const keep = 1 - alpha;
  const n = thumbnail.width * thumbnail.height;

  for (let i = 0; i < n; i++) {
    const rank = thumbLabels[i] ?? 0;
    if (rank <= 0 || rank > particleCount) continue;

    const p = rank * 4;
    const o = i * 4;
    for (let c = 0; c < 3; c++) {
      out.data[o + c] = Math.floor((thumbnail.data[o + c] ?? 0) * keep + (palette[p + c] ?? 0) * alpha);
    }
  }

  return out;
}

export function projectCentroidsToThumbnail(
  centroids: readonly Point2[],
  image: { width: number; height: number },
  thumb: { width: number; height: number }
): Point2[] {
  const sx = thumb.width / Math.max(1, image.width);
  const sy = thumb.height / Math.max(1, image.height);
  return centroids.map((c) => ({ x: c.x * sx, y: c.y * sy }));
}
