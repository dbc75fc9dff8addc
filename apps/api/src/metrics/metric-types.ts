import type { Goal } from '@underwriter/shared';

export interface StyleMetrics {
  sentenceLengthAvg: number;
  // max − min words per sentence; a range, not a statistical variance
  sentenceLengthVar: number;
  vocabRichness: number;
  frequentWords: string[];
  punctuationUse: Record<string, number>;
}

export interface FlowMetrics {
  wordCount: number;
  vocabTypeCount: number;
  vocabTtr: number;
  repetitionRate: number;
  playfulnessScore: number;
  clarityScore: number;
  creativityScore: number;
}

export type GoalScoreKey = 'playfulnessScore' | 'clarityScore' | 'creativityScore';

export const GOAL_SCORE_KEYS: Record<Goal, GoalScoreKey> = {
  playfulness: 'playfulnessScore',
  clarity: 'clarityScore',
  creativity: 'creativityScore',
};

export const EMPTY_FLOW_METRICS: Readonly<FlowMetrics> = {
  wordCount: 0,
  vocabTypeCount: 0,
  vocabTtr: 0,
  repetitionRate: 0,
  playfulnessScore: 0,
  clarityScore: 0,
  creativityScore: 0,
};
