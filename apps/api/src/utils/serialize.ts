import type {
  FlowAttemptResponse,
  FlowMetricsResponse,
  GoalTrendResponse,
  RubricSchemaResponse,
  StyleMetricsResponse,
  StyleProfileResponse,
} from '@underwriter/shared';
import type { FlowMetrics, StyleMetrics } from '../metrics/metric-types.js';
import type { FlowAttemptScore, GoalTrend } from '../metrics/flow-practice.js';
import type { StyleProfile } from '../feedback/profile.js';
import type { RubricSchema } from '../grading/rubric.js';

/**
 * Wire format is snake_case; engine records stay camelCase.
 */
export const serializeStyleMetrics = (m: StyleMetrics): StyleMetricsResponse => ({
  sentence_length_avg: m.sentenceLengthAvg,
  sentence_length_var: m.sentenceLengthVar,
  vocab_richness: m.vocabRichness,
  frequent_words: m.frequentWords,
  punctuation_use: m.punctuationUse,
});

export const serializeFlowMetrics = (m: FlowMetrics): FlowMetricsResponse => ({
  word_count: m.wordCount,
  vocab_type_count: m.vocabTypeCount,
  vocab_ttr: m.vocabTtr,
  repetition_rate: m.repetitionRate,
  playfulness_score: m.playfulnessScore,
  clarity_score: m.clarityScore,
  creativity_score: m.creativityScore,
});

export const deserializeFlowMetrics = (m: FlowMetricsResponse): FlowMetrics => ({
  wordCount: m.word_count,
  vocabTypeCount: m.vocab_type_count,
  vocabTtr: m.vocab_ttr,
  repetitionRate: m.repetition_rate,
  playfulnessScore: m.playfulness_score,
  clarityScore: m.clarity_score,
  creativityScore: m.creativity_score,
});

export const serializeProfile = (p: StyleProfile): StyleProfileResponse => ({
  count: p.count,
  avg_sentence_length: p.avgSentenceLength,
  vocab_richness: p.vocabRichness,
  frequent_words: p.frequentWords,
});

export const deserializeProfile = (p: StyleProfileResponse): StyleProfile => ({
  count: p.count,
  avgSentenceLength: p.avg_sentence_length,
  vocabRichness: p.vocab_richness,
  frequentWords: p.frequent_words,
});

const serializeTrend = (t: GoalTrend): GoalTrendResponse => ({
  goal: t.goal,
  value: t.value,
  baseline: t.baseline,
  delta: t.delta,
});

export const serializeFlowAttempt = (
  score: FlowAttemptScore,
  trendSummary: string,
  feedback: string,
): FlowAttemptResponse => ({
  elapsed_seconds: score.elapsedSeconds,
  wpm: score.wpm,
  composite_score: score.compositeScore,
  metrics: serializeFlowMetrics(score.metrics),
  trends: score.trends.map(serializeTrend),
  trend_summary: trendSummary,
  feedback,
});

export const serializeRubric = (r: RubricSchema): RubricSchemaResponse => ({
  title: r.title,
  scale: r.scale,
  criteria: r.criteria.map((c) => ({
    name: c.name,
    weight: c.weight,
    descriptor_levels: c.descriptorLevels,
  })),
});
