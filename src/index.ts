export * from './types/particles';
export { ParticleAnalysisSession } from './services/particleAnalysisSession';
export type { ParticleAnalysisOptions, SegmentationResult } from './services/particleAnalysisSession';
export { RefinementController } from './services/refinementController';
export type { RefinementControllerOptions } from './services/refinementController';
export { useParticleAnalysis } from './hooks/useParticleAnalysis';
export type { UseParticleAnalysisParams } from './hooks/useParticleAnalysis';
export { rgbToHsv, rgbImageToHsv, rgbPointsToHsv, hueDistance, HUE_RANGE } from './utils/segmentation/colorSpace';
export { computeSimilarityMask } from './utils/segmentation/similarityMask';
export { CutLayer, applyCuts, brushWidthToRadius } from './utils/segmentation/cutLayer';
export type { CutStroke } from './utils/segmentation/cutLayer';
export { extractComponents } from './utils/segmentation/connectedComponents2D';
export type { ComponentExtraction } from './utils/segmentation/connectedComponents2D';
export {
  ColorSampleSet,
  averageRgb,
  circularMeanHue,
  computeAutoTolerance,
  computeHsvCenter,
} from './utils/segmentation/colorSamples';
export { PARTICLE_PALETTE, paletteColorForRank, rgbCss, rgbHex } from './utils/segmentation/labelPalette';
export { summarizeParticles, areaUnitScale } from './utils/segmentation/particleStats';
export { drawRenderedPreview, renderPreview } from './utils/segmentation/previewRenderer';
export type { PreviewDrawContext, PreviewLabel, RenderedPreview } from './utils/segmentation/previewRenderer';
export {
  computePreviewLayout,
  zoomPreviewAt,
  wheelZoomFactor,
  beginPreviewPan,
  panPreview,
  resetPreviewView,
  viewportToImagePixel,
} from './utils/previewViewport';
export type { PreviewLayout, ViewportSize } from './utils/previewViewport';
export { DEBUG_PARTICLES_STORAGE_KEY, isDebugParticlesEnabled } from './utils/debugParticles';
