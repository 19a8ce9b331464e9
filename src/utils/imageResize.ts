import type { RgbaImage } from '../types/particles';

export type ResampleMode = 'nearest' | 'bilinear';

export function createRgbaImage(width: number, height: number): RgbaImage {
  const w = Math.max(0, Math.floor(width));
  const h = Math.max(0, Math.floor(height));
  return { width: w, height: h, data: new Uint8ClampedArray(w * h * 4) };
}

/**
 * Copy the half-open pixel rect [x0, x1) × [y0, y1), clamped to the image.
 */
export function cropRgba(image: RgbaImage, x0: number, y0: number, x1: number, y1: number): RgbaImage {
  const cx0 = Math.max(0, Math.min(image.width, Math.floor(x0)));
  const cy0 = Math.max(0, Math.min(image.height, Math.floor(y0)));
  const cx1 = Math.max(cx0, Math.min(image.width, Math.floor(x1)));
  const cy1 = Math.max(cy0, Math.min(image.height, Math.floor(y1)));

  const out = createRgbaImage(cx1 - cx0, cy1 - cy0);
  const rowBytes = out.width * 4;

  for (let y = 0; y < out.height; y++) {
    const srcStart = ((cy0 + y) * image.width + cx0) * 4;
    out.data.set(image.data.subarray(srcStart, srcStart + rowBytes), y * rowBytes);
  }

  return out;
}

export function resizeRgbaNearest(image: RgbaImage, outW: number, outH: number): RgbaImage {
  const out = createRgbaImage(outW, outH);
  if (out.width === 0 || out.height === 0 || image.width === 0 || image.height === 0) return out;

  const sxScale = image.width / out.width;
  const syScale = image.height / out.height;

  for (let y = 0; y < out.height; y++) {
    const sy = Math.min(image.height - 1, Math.floor((y + 0.5) * syScale));
    for (let x = 0; x < out.width; x++) {
      const sx = Math.min(image.width - 1, Math.floor((x + 0.5) * sxScale));
      const si = (sy * image.width + sx) * 4;
      const o = (y * out.width + x) * 4;
      out.data[o] = image.data[si] ?? 0;
      out.data[o + 1] = image.data[si + 1] ?? 0;
      out.data[o + 2] = image.data[si + 2] ?? 0;
      out.data[o + 3] = image.data[si + 3] ?? 0;
    }
  }

  return out;
}

/**
 * Bilinear resize with pixel-center alignment; edges clamp.
 */
export function resizeRgbaBilinear(image: RgbaImage, outW: number, outH: number): RgbaImage {
  const out = createRgbaImage(outW, outH);
  if (out.width === 0 || out.height === 0 || image.width === 0 || image.height === 0) return out;

  const iw = image.width;
  const ih = image.height;
  const sxScale = iw / out.width;
  const syScale = ih / out.height;
  const src = image.data;

  for (let y = 0; y < out.height; y++) {
    const fy = Math.max(0, Math.min(ih - 1, (y + 0.5) * syScale - 0.5));
    const y0 = Math.floor(fy);
    const y1 = Math.min(ih - 1, y0 + 1);
    const ty = fy - y0;

    for (let x = 0; x < out.width; x++) {
      const fx = Math.max(0, Math.min(iw - 1, (x + 0.5) * sxScale - 0.5));
      const x0 = Math.floor(fx);
      const x1 = Math.min(iw - 1, x0 + 1);
      const tx = fx - x0;

      const i00 = (y0 * iw + x0) * 4;
      const i10 = (y0 * iw + x1) * 4;
      const i01 = (y1 * iw + x0) * 4;
      const i11 = (y1 * iw + x1) * 4;
      const o = (y * out.width + x) * 4;

      for (let c = 0; c < 4; c++) {
        const a = (src[i00 + c] ?? 0) * (1 - tx) + (src[i10 + c] ?? 0) * tx;
        const b = (src[i01 + c] ?? 0) * (1 - tx) + (src[i11 + c] ?? 0) * tx;
        out.data[o + c] = a * (1 - ty) + b * ty;
      }
    }
  }

  return out;
}

export function resizeRgba(image: RgbaImage, outW: number, outH: number, mode: ResampleMode): RgbaImage {
  return mode === 'nearest' ? resizeRgbaNearest(image, outW, outH) : resizeRgbaBilinear(image, outW, outH);
}
