import { z } from 'zod';
import { GOALS } from '@underwriter/shared';

export const goalSchema = z.enum(GOALS);

const score = z.number().min(0).max(1);

export const textBodySchema = z.object({
  text: z.string(),
});

export const flowMetricsSchema = z.object({
  word_count: z.number().int().nonnegative(),
  vocab_type_count: z.number().int().nonnegative(),
  vocab_ttr: score,
  repetition_rate: score,
  playfulness_score: score,
  clarity_score: score,
  creativity_score: score,
});

export const compositeBodySchema = z.object({
  metrics: flowMetricsSchema,
  elapsed_seconds: z.number(),
  goals: z.array(goalSchema).default([]),
});

const contextPackSchema = z.object({
  overview: z.object({
    writings_count: z.number().optional(),
    flow_attempts_count: z.number().optional(),
    streak_days: z.number().optional(),
  }).optional(),
  style_profile: z.record(z.unknown()).optional(),
  recent_samples: z.array(z.string()).optional(),
  flow_metrics_recent: z.array(z.record(z.unknown())).optional(),
  active_goals: z.array(goalSchema).optional(),
});

const profileSchema = z.object({
  count: z.number().int().nonnegative(),
  avg_sentence_length: z.number(),
  vocab_richness: z.number(),
  frequent_words: z.array(z.string()).default([]),
});

const anchorSchema = z.object({
  id: z.string().optional(),
  title: z.string().optional(),
  excerpt: z.string().optional(),
});

export const analyzeWritingBodySchema = z.object({
  text: z.string(),
  profile: profileSchema.optional(),
  profile_summary: z.string().optional(),
  context_pack: contextPackSchema.optional(),
  personal_anchors: z.array(anchorSchema).optional(),
});

export const flowAttemptBodySchema = z.object({
  text: z.string(),
  elapsed_seconds: z.number(),
  goals: z.array(goalSchema).default([]),
  baselines: z.object({
    playfulness: z.number().optional(),
    clarity: z.number().optional(),
    creativity: z.number().optional(),
  }).optional(),
  context_pack: contextPackSchema.optional(),
});

export const rubricBodySchema = z.object({
  text: z.string().trim().min(1, 'Rubric text is required'),
});
