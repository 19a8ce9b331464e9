/**
 * Debug logging for the particle analysis pipeline.
 *
 * Defaults:
 * - In DEV builds, particle debug logging is enabled by default.
 * - In production builds, it is opt-in.
 *
 * You can always override via localStorage:
 *   localStorage.setItem('particle-analysis:debug', '1') // force on
 *   localStorage.setItem('particle-analysis:debug', '0') // force off
 */

export const DEBUG_PARTICLES_STORAGE_KEY = 'particle-analysis:debug';

export function isDebugParticlesEnabled(): boolean {
  if (typeof window === 'undefined') return false;

  try {
    const v = window.localStorage.getItem(DEBUG_PARTICLES_STORAGE_KEY);
    if (v === '1') return true;
    if (v === '0') return false;

    return !!import.meta.env.DEV;
  } catch {
    return false;
  }
}

export function debugParticlesLog(step: string, details: Record<string, unknown>, enabled: boolean): void {
  if (!enabled) return;
  console.log(`[particles] ${step}`, details);
}
