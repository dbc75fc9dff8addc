import type { StyleMetrics } from '../metrics/metric-types.js';

export interface StyleProfile {
  count: number;
  avgSentenceLength: number;
  vocabRichness: number;
  frequentWords: string[];
}

const MIN_BASELINE_WRITINGS = 3;
const CONSISTENT_STYLE_WRITINGS = 5;
const SENTENCE_LENGTH_TOLERANCE = 5;
const RICHNESS_TOLERANCE = 0.05;

export const BUILDING_BASELINE_MESSAGE = 'Building baseline profile; few comparisons available yet.';

const runningMean = (previous: number, next: number, count: number): number =>
  (previous * (count - 1) + next) / count;

/** Folds one writing's metrics into the running profile. */
export const mergeProfile = (profile: StyleProfile | null | undefined, metrics: StyleMetrics): StyleProfile => {
  const base = profile ?? { count: 0, avgSentenceLength: 0, vocabRichness: 0, frequentWords: [] };
  const count = base.count + 1;

  return {
    count,
    avgSentenceLength: runningMean(base.avgSentenceLength, metrics.sentenceLengthAvg, count),
    vocabRichness: runningMean(base.vocabRichness, metrics.vocabRichness, count),
    frequentWords: [...new Set([...base.frequentWords, ...metrics.frequentWords])],
  };
};

export const detectOutliers = (metrics: StyleMetrics, profile: StyleProfile | null | undefined): string[] => {
  if (!profile || profile.count < MIN_BASELINE_WRITINGS) {
    return [BUILDING_BASELINE_MESSAGE];
  }

  const suggestions: string[] = [];

  const avgLen = metrics.sentenceLengthAvg;
  const baseline = profile.avgSentenceLength;
  if (Math.abs(avgLen - baseline) > SENTENCE_LENGTH_TOLERANCE) {
    suggestions.push(avgLen > baseline
      ? `Your sentences are longer than usual (${avgLen.toFixed(1)} vs ${baseline.toFixed(1)}) — feels reflective.`
      : `Your sentences are shorter than usual (${avgLen.toFixed(1)} vs ${baseline.toFixed(1)}) — feels more direct.`);
  }

  const richness = metrics.vocabRichness;
  if (richness > profile.vocabRichness + RICHNESS_TOLERANCE) {
    suggestions.push('More diverse vocabulary than usual — feels exploratory.');
  } else if (richness < profile.vocabRichness - RICHNESS_TOLERANCE) {
    suggestions.push('Simpler vocabulary than usual — reads cleaner but less nuanced.');
  }

  return suggestions;
};

export const isConsistentStyle = (profile: StyleProfile): boolean =>
  profile.count >= CONSISTENT_STYLE_WRITINGS;
