import { useCallback, useEffect, useRef, useState } from 'react';
import type { Point2, PreviewViewState, RgbImage, RgbTriple, ToleranceSet } from '../types/particles';
import { DEFAULT_PREVIEW_VIEW, DEFAULT_TOLERANCES, RECOMPUTE_DEBOUNCE_MS } from '../types/particles';
import { ParticleAnalysisSession } from '../services/particleAnalysisSession';
import type { ParticleAnalysisOptions, SegmentationResult } from '../services/particleAnalysisSession';
import { RefinementController } from '../services/refinementController';
import { debugParticlesLog, isDebugParticlesEnabled } from '../utils/debugParticles';
import {
  beginPreviewPan,
  panPreview,
  resetPreviewView,
  wheelZoomFactor,
  zoomPreviewAt,
  type PanAnchor,
  type ViewportSize,
} from '../utils/previewViewport';
import {
  drawRenderedPreview,
  type PreviewDrawContext,
  type RenderedPreview,
} from '../utils/segmentation/previewRenderer';

export type UseParticleAnalysisParams = {
  image: RgbImage | null;
  seedColors: readonly RgbTriple[];
  options?: Omit<ParticleAnalysisOptions, 'seedColors' | 'debug'>;
  delayMs?: number;
};

/**
 * Drive a particle analysis session from React state.
 *
 * A new session is created whenever `image` changes (seed colors and options are
 * read at that moment). The first result is computed right away; later edits go
 * through the debounced controller.
 */
export function useParticleAnalysis({
  image,
  seedColors,
  options,
  delayMs = RECOMPUTE_DEBOUNCE_MS,
}: UseParticleAnalysisParams) {
  const [result, setResult] = useState<SegmentationResult | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [tolerances, setTolerancesState] = useState<ToleranceSet>(DEFAULT_TOLERANCES);
  const [autoTolerance, setAutoToleranceState] = useState(true);
  const [samples, setSamples] = useState<RgbTriple[]>([]);
  const [strokeCount, setStrokeCount] = useState(0);
  const [view, setView] = useState<PreviewViewState>(DEFAULT_PREVIEW_VIEW);

  const controllerRef = useRef<RefinementController | null>(null);
  const panAnchorRef = useRef<PanAnchor | null>(null);
  const viewRef = useRef(view);
  const seedColorsRef = useRef(seedColors);
  const optionsRef = useRef(options);

  useEffect(() => {
    seedColorsRef.current = seedColors;
    optionsRef.current = options;
  }, [seedColors, options]);

  // viewRef changes together with the view state; picks and strokes read it.
  const updateView = useCallback((next: (v: PreviewViewState) => PreviewViewState) => {
    const v = next(viewRef.current);
    viewRef.current = v;
    setView(v);
  }, []);

  const syncFromSession = useCallback((session: ParticleAnalysisSession) => {
    setTolerancesState(session.tolerances);
    setAutoToleranceState(session.autoToleranceEnabled);
    setSamples(session.samples.all);
    setStrokeCount(session.cuts.strokeCount);
  }, []);

  useEffect(() => {
    if (!image) {
      setResult(null);
      return;
    }

    const debug = isDebugParticlesEnabled();
    let controller: RefinementController | null = null;

    try {
      const session = new ParticleAnalysisSession(image, {
        ...(optionsRef.current ?? {}),
        seedColors: seedColorsRef.current,
        debug,
      });

      controller = new RefinementController(session, {
        delayMs,
        onCommit: (r) => {
          setResult(r);
          setError(null);
        },
        onError: (err) => {
          setError(err instanceof Error ? err.message : String(err));
        },
      });

      controllerRef.current = controller;
      syncFromSession(session);
      updateView(resetPreviewView);
      controller.recomputeNow();
    } catch (err) {
      console.error('[particles] Failed to start analysis session', err);
      controllerRef.current = null;
      setResult(null);
      setError(err instanceof Error ? err.message : String(err));
    }

    return () => {
      controller?.dispose();
      if (controllerRef.current === controller) {
        controllerRef.current = null;
      }
      debugParticlesLog('session disposed', {}, debug);
    };
  }, [image, delayMs, syncFromSession, updateView]);

  const setTolerances = useCallback((partial: Partial<ToleranceSet>) => {
    const c = controllerRef.current;
    if (!c) return;
    c.setTolerances(partial);
    setTolerancesState(c.session.tolerances);
  }, []);

  const setAutoTolerance = useCallback((enabled: boolean) => {
    const c = controllerRef.current;
    if (!c) return;
    c.setAutoTolerance(enabled);
    setAutoToleranceState(enabled);
  }, []);

  const setLengthPerPixel = useCallback((lengthPerPixel: number) => {
    controllerRef.current?.setLengthPerPixel(lengthPerPixel);
  }, []);

  const pickSampleAtCanvas = useCallback(
    (point: Point2, viewport: ViewportSize): RgbTriple | null => {
      const c = controllerRef.current;
      if (!c) return null;
      const rgb = c.addSampleInViewport(point, viewRef.current, viewport);
      if (rgb) syncFromSession(c.session);
      return rgb;
    },
    [syncFromSession]
  );

  const undoSample = useCallback((): boolean => {
    const c = controllerRef.current;
    if (!c) return false;
    const changed = c.undoSample();
    if (changed) syncFromSession(c.session);
    return changed;
  }, [syncFromSession]);

  const paintCutStrokeOnCanvas = useCallback(
    (points: readonly Point2[], brushWidth: number, viewport: ViewportSize): boolean => {
      const c = controllerRef.current;
      if (!c) return false;
      const changed = c.paintCutStrokeInViewport(points, brushWidth, viewRef.current, viewport);
      if (changed) setStrokeCount(c.session.cuts.strokeCount);
      return changed;
    },
    []
  );

  const undoCutStroke = useCallback((): boolean => {
    const c = controllerRef.current;
    if (!c) return false;
    const changed = c.undoCutStroke();
    if (changed) setStrokeCount(c.session.cuts.strokeCount);
    return changed;
  }, []);

  const clearCutStrokes = useCallback((): boolean => {
    const c = controllerRef.current;
    if (!c) return false;
    const changed = c.clearCutStrokes();
    if (changed) setStrokeCount(0);
    return changed;
  }, []);

  const zoomAt = useCallback(
    (cursor: Point2, factor: number, viewport: ViewportSize) => {
      updateView((v) => zoomPreviewAt(v, cursor, factor, viewport));
    },
    [updateView]
  );

  const wheelZoom = useCallback(
    (cursor: Point2, deltaY: number, viewport: ViewportSize) => {
      const factor = wheelZoomFactor(deltaY);
      if (factor === 1) return;
      updateView((v) => zoomPreviewAt(v, cursor, factor, viewport));
    },
    [updateView]
  );

  const beginPan = useCallback((pointer: Point2) => {
    panAnchorRef.current = beginPreviewPan(viewRef.current, pointer);
  }, []);

  const panTo = useCallback(
    (pointer: Point2) => {
      const anchor = panAnchorRef.current;
      if (!anchor) return;
      updateView((v) => panPreview(v, anchor, pointer));
    },
    [updateView]
  );

  const endPan = useCallback(() => {
    panAnchorRef.current = null;
  }, []);

  const resetView = useCallback(() => {
    panAnchorRef.current = null;
    updateView(resetPreviewView);
  }, [updateView]);

  const renderPreview = useCallback(
    (viewport: ViewportSize): RenderedPreview | null => {
      const c = controllerRef.current;
      if (!c || !result) return null;
      return c.session.renderPreview(view, viewport);
    },
    [result, view]
  );

  /** Draw the current preview with its rank labels. Returns false before the first result. */
  const drawPreview = useCallback(
    (ctx: PreviewDrawContext, viewport: ViewportSize): boolean => {
      const rendered = renderPreview(viewport);
      if (!rendered) return false;
      drawRenderedPreview(ctx, rendered);
      return true;
    },
    [renderPreview]
  );

  const flush = useCallback(() => {
    controllerRef.current?.flush();
  }, []);

  return {
    result,
    summary: result?.summary ?? null,
    error,
    tolerances,
    autoTolerance,
    samples,
    strokeCount,
    view,
    setTolerances,
    setAutoTolerance,
    setLengthPerPixel,
    pickSampleAtCanvas,
    undoSample,
    paintCutStrokeOnCanvas,
    undoCutStroke,
    clearCutStrokes,
    zoomAt,
    wheelZoom,
    beginPan,
    panTo,
    endPan,
    resetView,
    renderPreview,
    drawPreview,
    flush,
  };
}
