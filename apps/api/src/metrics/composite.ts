import type { Goal } from '@underwriter/shared';
import { GOAL_SCORE_KEYS, type FlowMetrics } from './metric-types.js';
import { clamp, mean, roundTo } from './math.js';

const WPM_CEILING = 40;
const TTR_CEILING = 0.6;

/** Negative or zero elapsed time carries no rate signal. */
export const wordsPerMinute = (wordCount: number, elapsedSeconds: number): number =>
  elapsedSeconds > 0 ? (60 * wordCount) / elapsedSeconds : 0;

export const goalAverage = (metrics: FlowMetrics, goals: readonly Goal[]): number =>
  mean([...new Set(goals)].map((goal) => metrics[GOAL_SCORE_KEYS[goal]]));

/**
 * Explainable practice score around a 100 baseline:
 * rate, lexical variety and goal alignment add, repetition subtracts.
 * Only the individual terms are bounded; the total is not clamped.
 */
export const computeComposite = (
  metrics: FlowMetrics,
  elapsedSeconds: number,
  goals: readonly Goal[],
): number => {
  const wpm = wordsPerMinute(metrics.wordCount, elapsedSeconds);

  const score = 100
    + 10 * clamp(wpm / WPM_CEILING)
    + 20 * clamp(metrics.vocabTtr / TTR_CEILING)
    + 20 * clamp(goalAverage(metrics, goals))
    - 10 * clamp(metrics.repetitionRate * 2);

  return roundTo(score, 2);
};
