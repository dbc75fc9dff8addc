// Practice goals a writer can focus a flow burst on
export const GOALS = ['playfulness', 'clarity', 'creativity'] as const;
export type Goal = (typeof GOALS)[number];

export type TokenizerKind = 'regex' | 'pos';

export type Intention = 'inquisitive' | 'exploratory' | 'persuasive' | 'expressive' | 'descriptive';

export type Energy = 'calm/expansive' | 'steady' | 'brisk';

export type RubricScale = '0-4' | '0-100';

// API request/response types
export interface StyleMetricsResponse {
  sentence_length_avg: number;
  sentence_length_var: number;
  vocab_richness: number;
  frequent_words: string[];
  punctuation_use: Record<string, number>;
}

export interface FlowMetricsResponse {
  word_count: number;
  vocab_type_count: number;
  vocab_ttr: number;
  repetition_rate: number;
  playfulness_score: number;
  clarity_score: number;
  creativity_score: number;
}

export interface CompositeRequest {
  metrics: FlowMetricsResponse;
  elapsed_seconds: number;
  goals: Goal[];
}

export interface CompositeResponse {
  composite_score: number;
  wpm: number;
}

export interface StyleProfileResponse {
  count: number;
  avg_sentence_length: number;
  vocab_richness: number;
  frequent_words: string[];
}

export interface PersonalAnchor {
  id?: string;
  title?: string;
  excerpt?: string;
}

export interface ContextOverview {
  writings_count?: number;
  flow_attempts_count?: number;
  streak_days?: number;
}

export interface ContextPack {
  overview?: ContextOverview;
  style_profile?: Record<string, unknown>;
  recent_samples?: string[];
  flow_metrics_recent?: Record<string, unknown>[];
  active_goals?: Goal[];
}

export interface AnalyzeWritingRequest {
  text: string;
  profile?: StyleProfileResponse;
  profile_summary?: string;
  context_pack?: ContextPack;
  personal_anchors?: PersonalAnchor[];
}

export interface AnalyzeWritingResponse {
  metrics: StyleMetricsResponse;
  tone: string;
  intention: Intention;
  energy: Energy;
  profile: StyleProfileResponse;
  suggestions: string[];
  consistent_style: boolean;
  snapshot: string | null;
  feedback: string;
}

export type GoalBaselines = Partial<Record<Goal, number>>;

export interface FlowAttemptRequest {
  text: string;
  elapsed_seconds: number;
  goals: Goal[];
  baselines?: GoalBaselines;
  context_pack?: ContextPack;
}

export interface GoalTrendResponse {
  goal: Goal;
  value: number;
  baseline: number;
  delta: number;
}

export interface FlowAttemptResponse {
  elapsed_seconds: number;
  wpm: number;
  composite_score: number;
  metrics: FlowMetricsResponse;
  trends: GoalTrendResponse[];
  trend_summary: string;
  feedback: string;
}

export interface RubricCriterionResponse {
  name: string;
  weight: number;
  descriptor_levels: Record<'4' | '3' | '2' | '1' | '0', string>;
}

export interface RubricSchemaResponse {
  title: string;
  scale: RubricScale;
  criteria: RubricCriterionResponse[];
}

export interface ErrorResponse {
  error: string;
  code?: string;
}
