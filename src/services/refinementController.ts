import type { Point2, PreviewViewState, RgbTriple, ToleranceSet } from '../types/particles';
import { RECOMPUTE_DEBOUNCE_MS } from '../types/particles';
import type { ViewportSize } from '../utils/previewViewport';
import type { ParticleAnalysisSession, SegmentationResult } from './particleAnalysisSession';

export type RefinementControllerOptions = {
  delayMs?: number;
  onCommit?: (result: SegmentationResult) => void;
  onError?: (err: unknown) => void;
};

/**
 * Debounced recompute for interactive refinement.
 *
 * Every change issues a new request token and (re)arms one timer. When the timer
 * fires only the latest token may run and commit; anything older is dropped, so
 * dragging a slider costs one recompute per idle interval.
 */
export class RefinementController {
  readonly session: ParticleAnalysisSession;

  private readonly delayMs: number;
  private readonly onCommit?: (result: SegmentationResult) => void;
  private readonly onError?: (err: unknown) => void;

  private latestToken = 0;
  private pendingToken: number | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private disposed = false;

  constructor(session: ParticleAnalysisSession, options: RefinementControllerOptions = {}) {
    this.session = session;
    this.delayMs = Math.max(0, options.delayMs ?? RECOMPUTE_DEBOUNCE_MS);
    this.onCommit = options.onCommit;
    this.onError = options.onError;
  }

  get isPending(): boolean {
    return this.pendingToken !== null;
  }

  /** Token of the most recent request. */
  get token(): number {
    return this.latestToken;
  }

  requestRecompute(): number {
    if (this.disposed) return this.latestToken;

    const token = ++this.latestToken;
    this.clearTimer();
    this.pendingToken = token;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.run(token);
    }, this.delayMs);

    return token;
  }

  /** Run the pending recompute now, if there is one. */
  flush(): SegmentationResult | null {
    const token = this.pendingToken;
    if (token === null) return null;
    this.clearTimer();
    return this.run(token);
  }

  /** Supersede anything pending and recompute immediately. */
  recomputeNow(): SegmentationResult | null {
    if (this.disposed) return null;
    const token = ++this.latestToken;
    this.clearTimer();
    this.pendingToken = token;
    return this.run(token);
  }

  cancel(): void {
    this.clearTimer();
    this.pendingToken = null;
  }

  dispose(): void {
    this.cancel();
    this.disposed = true;
  }

  setTolerances(partial: Partial<ToleranceSet>): void {
    this.session.setTolerances(partial);
    this.requestRecompute();
  }

  /** Only affects later sample changes; nothing to recompute. */
  setAutoTolerance(enabled: boolean): void {
    this.session.setAutoTolerance(enabled);
  }

  setLengthPerPixel(lengthPerPixel: number): void {
    this.session.setLengthPerPixel(lengthPerPixel);
    this.requestRecompute();
  }

  addSampleAt(point: Point2): RgbTriple | null {
    const rgb = this.session.addSampleAt(point);
    if (rgb) this.requestRecompute();
    return rgb;
  }

  addSampleInViewport(point: Point2, view: PreviewViewState, viewport: ViewportSize): RgbTriple | null {
    const rgb = this.session.addSampleInViewport(point, view, viewport);
    if (rgb) this.requestRecompute();
    return rgb;
  }

  addSampleColor(rgb: RgbTriple): void {
    this.session.addSampleColor(rgb);
    this.requestRecompute();
  }

  undoSample(): boolean {
    const changed = this.session.undoSample();
    if (changed) this.requestRecompute();
    return changed;
  }

  paintCutStroke(points: readonly Point2[], radius: number): boolean {
    const changed = this.session.paintCutStroke(points, radius);
    if (changed) this.requestRecompute();
    return changed;
  }

  paintCutStrokeInViewport(
    points: readonly Point2[],
    brushWidth: number,
    view: PreviewViewState,
    viewport: ViewportSize
  ): boolean {
    const changed = this.session.paintCutStrokeInViewport(points, brushWidth, view, viewport);
    if (changed) this.requestRecompute();
    return changed;
  }

  undoCutStroke(): boolean {
    const changed = this.session.undoCutStroke();
    if (changed) this.requestRecompute();
    return changed;
  }

  clearCutStrokes(): boolean {
    const changed = this.session.clearCutStrokes();
    if (changed) this.requestRecompute();
    return changed;
  }

  private run(token: number): SegmentationResult | null {
    // Superseded requests never run.
    if (this.disposed || token !== this.latestToken) return null;
    this.pendingToken = null;

    try {
      const result = this.session.recompute();
      this.onCommit?.(result);
      return result;
    } catch (err) {
      console.error('[particles] Recompute failed', err);
      this.onError?.(err);
      return null;
    }
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
