import { roundToPrecision } from './numberUtils.js';

export const DEFAULT_FRAME_DELAY_MS = 100;

export interface FrameTimingStats {
  averageDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  totalDurationMs: number;
  fps: number;
}

/**
 * Reads a frame delay that may be absent or garbage. Zero counts as absent: browsers
 * treat a zero GIF delay as "use the default" too.
 */
export function resolveFrameDelay(delayMs: unknown, fallbackMs = DEFAULT_FRAME_DELAY_MS): number {
  if (typeof delayMs !== 'number' || !Number.isFinite(delayMs) || delayMs <= 0) {
    return fallbackMs;
  }

  return Math.round(delayMs);
}

export function calculateFrameTimingStats(delaysMs: number[]): FrameTimingStats {
  if (delaysMs.length === 0) {
    return {
      averageDelayMs: 0,
      minDelayMs: 0,
      maxDelayMs: 0,
      totalDurationMs: 0,
      fps: 0,
    };
  }

  const total = delaysMs.reduce((sum, delay) => sum + delay, 0);
  const average = total / delaysMs.length;
  const fps = average > 0 ? 1000 / average : 0;

  return {
    averageDelayMs: roundToPrecision(average, 3),
    minDelayMs: Math.min(...delaysMs),
    maxDelayMs: Math.max(...delaysMs),
    totalDurationMs: total,
    fps: roundToPrecision(fps, 3),
  };
}
