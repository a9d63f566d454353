import { setTimeout as sleepTimeout } from "timers/promises";
import type { PacingLevel } from "./types";

/** Delay range in milliseconds applied before each fetch after the first. */
export const PACING_DELAYS: Record<PacingLevel, readonly [number, number]> = {
  off: [0, 0],
  low: [500, 1500],
  medium: [1000, 3000],
  high: [2000, 5000],
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function drawDelay(level: PacingLevel, random: () => number = Math.random): number {
  const [min, max] = PACING_DELAYS[level];
  if (max <= min) return min;
  return Math.round(min + random() * (max - min));
}

/**
 * Resolves after `ms`, or early (without throwing) when `signal` aborts.
 * Callers re-check the signal afterwards.
 */
export const abortableSleep: Sleep = async (ms, signal) => {
  if (ms <= 0 || signal?.aborted) return;
  try {
    await sleepTimeout(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
};
