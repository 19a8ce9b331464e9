import type {
  ColorCenter,
  Connectivity2D,
  HsvImage,
  ParticleRecord,
  ParticleSummary,
  Point2,
  PreviewViewState,
  RgbaImage,
  RgbImage,
  RgbTriple,
  ToleranceSet,
} from '../types/particles';
import { DEFAULT_TOLERANCES, PREVIEW, TOLERANCE_LIMITS } from '../types/particles';
import { debugParticlesLog } from '../utils/debugParticles';
import { clamp, clampInt } from '../utils/math';
import {
  computePreviewLayout,
  viewportPathToImage,
  viewportToImagePixel,
  type PreviewLayout,
  type ViewportSize,
} from '../utils/previewViewport';
import { ColorSampleSet } from '../utils/segmentation/colorSamples';
import { rgbImageToHsv } from '../utils/segmentation/colorSpace';
import { extractComponents } from '../utils/segmentation/connectedComponents2D';
import { brushWidthToRadius, CutLayer } from '../utils/segmentation/cutLayer';
import { summarizeParticles } from '../utils/segmentation/particleStats';
import {
  buildParticleOverlay,
  computeThumbnailSize,
  downsampleLabelsNearest,
  projectCentroidsToThumbnail,
  resampleRgbAreaAverage,
} from '../utils/segmentation/previewOverlay';
import { renderPreview, type RenderedPreview } from '../utils/segmentation/previewRenderer';
import { computeSimilarityMask } from '../utils/segmentation/similarityMask';

export type ParticleAnalysisOptions = {
  seedColors: readonly RgbTriple[];
  /** Overrides for the initial tolerances (otherwise derived from the seeds). */
  tolerances?: Partial<ToleranceSet>;
  /** Retune hue/sat/val tolerances from the sample spread on every add/undo. */
  autoTolerance?: boolean;
  connectivity?: Connectivity2D;
  previewMaxSize?: number;
  /** Calibrated length per pixel; 0 = uncalibrated. */
  lengthPerPixel?: number;
  debug?: boolean;
};

export type SegmentationResult = {
  /** Increments on every recompute. */
  revision: number;
  center: ColorCenter | null;
  tolerances: ToleranceSet;
  /** Similarity mask after cuts and the min-area filter. */
  mask: Uint8Array;
  labels: Int32Array;
  particles: ParticleRecord[];
  areas: number[];
  centroids: Point2[];
  thumbLabels: Int32Array;
  centroidsThumb: Point2[];
  overlay: RgbaImage;
  summary: ParticleSummary;
};

function assertValidImage(image: RgbImage): void {
  const { width, height, channels, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`ParticleAnalysisSession: invalid image size ${width}x${height}`);
  }
  if (channels !== 3 && channels !== 4) {
    throw new Error(`ParticleAnalysisSession: unsupported channel count ${String(channels)}`);
  }
  const expected = width * height * channels;
  if (data.length !== expected) {
    throw new Error(`ParticleAnalysisSession: image data length mismatch (expected ${expected}, got ${data.length})`);
  }
}

function clampTolerance(value: number | undefined, fallback: number, lim: { MIN: number; MAX: number }): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
  return clamp(value, lim.MIN, lim.MAX);
}

/**
 * All segmentation state for one loaded image.
 *
 * The HSV image and preview thumbnail are computed once here; masks and label
 * maps are rebuilt from scratch by `recompute()`.
 */
export class ParticleAnalysisSession {
  readonly image: RgbImage;
  readonly hsv: HsvImage;
  readonly thumbnail: RgbaImage;
  readonly samples: ColorSampleSet;
  readonly cuts: CutLayer;
  readonly connectivity: Connectivity2D;

  private tol: ToleranceSet;
  private autoTol: boolean;
  private scale: number;
  private sampleCenter: ColorCenter | null;
  private current: SegmentationResult | null = null;
  private revision = 0;
  private readonly debug: boolean;

  constructor(image: RgbImage, options: ParticleAnalysisOptions) {
    assertValidImage(image);

    this.image = image;
    this.debug = options.debug ?? false;
    this.connectivity = options.connectivity ?? 4;
    this.autoTol = options.autoTolerance ?? true;
    this.scale = 0;
    this.setLengthPerPixel(options.lengthPerPixel ?? 0);

    const started = performance.now();
    this.hsv = rgbImageToHsv(image);

    const thumbSize = computeThumbnailSize(image.width, image.height, options.previewMaxSize ?? PREVIEW.MAX_SIZE);
    this.thumbnail = resampleRgbAreaAverage(image, thumbSize.width, thumbSize.height);

    this.samples = new ColorSampleSet(options.seedColors);
    this.cuts = new CutLayer(image.width, image.height);
    this.sampleCenter = this.samples.center();

    // Initial tolerances follow the seed spread, even when auto-tolerance is off.
    this.tol = { ...DEFAULT_TOLERANCES, ...this.samples.autoTolerance() };
    if (options.tolerances) this.setTolerances(options.tolerances);

    debugParticlesLog(
      'session created',
      {
        width: image.width,
        height: image.height,
        thumb: `${thumbSize.width}x${thumbSize.height}`,
        seeds: this.samples.size,
        tolerances: this.tol,
        ms: Math.round(performance.now() - started),
      },
      this.debug
    );
  }

  get width(): number {
    return this.image.width;
  }

  get height(): number {
    return this.image.height;
  }

  get tolerances(): ToleranceSet {
    return { ...this.tol };
  }

  get autoToleranceEnabled(): boolean {
    return this.autoTol;
  }

  get center(): ColorCenter | null {
    return this.sampleCenter;
  }

  get lengthPerPixel(): number {
    return this.scale;
  }

  /** Last committed result, or null before the first recompute. */
  get result(): SegmentationResult | null {
    return this.current;
  }

  /**
   * Merge operator tolerances. Non-finite values are ignored; the rest are
   * clamped into the slider ranges.
   */
  setTolerances(partial: Partial<ToleranceSet>): void {
    this.tol = {
      hueTol: clampTolerance(partial.hueTol, this.tol.hueTol, TOLERANCE_LIMITS.HUE),
      satTol: clampTolerance(partial.satTol, this.tol.satTol, TOLERANCE_LIMITS.SAT),
      valTol: clampTolerance(partial.valTol, this.tol.valTol, TOLERANCE_LIMITS.VAL),
      minArea: clampTolerance(partial.minArea, this.tol.minArea, TOLERANCE_LIMITS.MIN_AREA),
    };
  }

  setAutoTolerance(enabled: boolean): void {
    this.autoTol = enabled;
  }

  setLengthPerPixel(lengthPerPixel: number): void {
    this.scale = Number.isFinite(lengthPerPixel) && lengthPerPixel > 0 ? lengthPerPixel : 0;
  }

  /**
   * Sample the source pixel at an image coordinate (clamped into the image).
   */
  addSampleAt(point: Point2): RgbTriple | null {
    if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) return null;

    const x = clampInt(point.x, 0, this.image.width - 1);
    const y = clampInt(point.y, 0, this.image.height - 1);
    const si = (y * this.image.width + x) * this.image.channels;
    const d = this.image.data;
    const rgb: RgbTriple = [d[si] ?? 0, d[si + 1] ?? 0, d[si + 2] ?? 0];

    this.addSampleColor(rgb);
    return rgb;
  }

  addSampleColor(rgb: RgbTriple): void {
    this.samples.addPoint(rgb);
    this.refreshCenter();
  }

  undoSample(): boolean {
    if (!this.samples.undoLast()) return false;
    this.refreshCenter();
    return true;
  }

  paintCutStroke(points: readonly Point2[], radius: number): boolean {
    return this.cuts.paintStroke(points, radius);
  }

  undoCutStroke(): boolean {
    return this.cuts.undoLastStroke();
  }

  clearCutStrokes(): boolean {
    return this.cuts.clearStrokes();
  }

  layout(view: PreviewViewState, viewport: ViewportSize): PreviewLayout {
    return computePreviewLayout(view, viewport, { w: this.thumbnail.width, h: this.thumbnail.height });
  }

  /**
   * Pick a sample color from a click on the preview. Clicks outside the image
   * are ignored.
   */
  addSampleInViewport(point: Point2, view: PreviewViewState, viewport: ViewportSize): RgbTriple | null {
    const px = viewportToImagePixel(
      point,
      this.layout(view, viewport),
      { w: this.thumbnail.width, h: this.thumbnail.height },
      { w: this.image.width, h: this.image.height }
    );
    if (!px) return null;
    return this.addSampleAt(px);
  }

  /**
   * Paint a cut stroke drawn on the preview; `brushWidth` is in image pixels.
   */
  paintCutStrokeInViewport(
    points: readonly Point2[],
    brushWidth: number,
    view: PreviewViewState,
    viewport: ViewportSize
  ): boolean {
    const path = viewportPathToImage(
      points,
      this.layout(view, viewport),
      { w: this.thumbnail.width, h: this.thumbnail.height },
      { w: this.image.width, h: this.image.height }
    );
    return this.paintCutStroke(path, brushWidthToRadius(brushWidth));
  }

  /**
   * similarity mask -> cuts -> components -> preview overlay -> statistics.
   *
   * Total over every tolerance/min-area/stroke combination: with no samples the
   * mask is empty and the result simply has zero particles.
   */
  recompute(): SegmentationResult {
    const started = performance.now();
    const { width, height } = this.image;
    const n = width * height;
    const tolerances = this.tolerances;
    const center = this.sampleCenter;

    const similar = center ? computeSimilarityMask(this.hsv, center.hsv, tolerances) : new Uint8Array(n);
    const mask = this.cuts.apply(similar);

    const extracted = extractComponents({
      mask,
      width,
      height,
      minArea: tolerances.minArea,
      connectivity: this.connectivity,
    });

    const tw = this.thumbnail.width;
    const th = this.thumbnail.height;
    const thumbLabels = downsampleLabelsNearest(extracted.labels, width, height, tw, th);
    const overlay = buildParticleOverlay(this.thumbnail, thumbLabels, extracted.areas.length);
    const centroidsThumb = projectCentroidsToThumbnail(extracted.centroids, this.image, this.thumbnail);

    const result: SegmentationResult = {
      revision: ++this.revision,
      center,
      tolerances,
      mask,
      labels: extracted.labels,
      particles: extracted.particles,
      areas: extracted.areas,
      centroids: extracted.centroids,
      thumbLabels,
      centroidsThumb,
      overlay,
      summary: summarizeParticles(extracted.areas, n, this.scale),
    };

    this.current = result;

    debugParticlesLog(
      'recompute',
      {
        revision: result.revision,
        particles: result.summary.count,
        coveragePercent: result.summary.coveragePercent,
        strokes: this.cuts.strokeCount,
        samples: this.samples.size,
        ms: Math.round(performance.now() - started),
      },
      this.debug
    );

    return result;
  }

  renderPreview(view: PreviewViewState, viewport: ViewportSize): RenderedPreview {
    const r = this.current;
    return renderPreview({
      overlay: r ? r.overlay : this.thumbnail,
      centroidsThumb: r ? r.centroidsThumb : [],
      view,
      viewport,
    });
  }

  private refreshCenter(): void {
    this.sampleCenter = this.samples.center();
    if (this.autoTol && this.samples.size >= 2) {
      this.tol = { ...this.tol, ...this.samples.autoTolerance() };
    }
  }
}
