import type { Goal, GoalBaselines } from '@underwriter/shared';
import { computeFlowMetrics } from './analyze-flow.js';
import { computeComposite, wordsPerMinute } from './composite.js';
import { GOAL_SCORE_KEYS, type FlowMetrics } from './metric-types.js';
import { roundTo } from './math.js';
import { getTokenizer } from './tokenizer.js';

export interface GoalTrend {
  goal: Goal;
  value: number;
  baseline: number;
  delta: number;
}

export interface FlowAttemptScore {
  elapsedSeconds: number;
  wpm: number;
  compositeScore: number;
  metrics: FlowMetrics;
  trends: GoalTrend[];
}

const capitalize = (s: string): string => s.charAt(0).toUpperCase() + s.slice(1);

export const computeGoalTrends = (
  metrics: FlowMetrics,
  goals: readonly Goal[],
  baselines: GoalBaselines = {},
): GoalTrend[] =>
  [...new Set(goals)].map((goal) => {
    const value = metrics[GOAL_SCORE_KEYS[goal]];
    const baseline = baselines[goal] ?? 0;
    return { goal, value, baseline, delta: roundTo(value - baseline, 4) };
  });

export const formatGoalTrends = (trends: GoalTrend[]): string => {
  if (trends.length === 0) return 'no active goal trend';
  return trends
    .map((t) => `${capitalize(t.goal)} ${t.delta >= 0 ? '+' : ''}${t.delta.toFixed(2)}`)
    .join('; ');
};

export const scoreFlowAttempt = (input: {
  text: string;
  elapsedSeconds: number;
  goals: readonly Goal[];
  baselines?: GoalBaselines;
}): FlowAttemptScore => {
  const elapsedSeconds = Math.max(0, input.elapsedSeconds);
  const metrics = computeFlowMetrics(input.text, getTokenizer());

  return {
    elapsedSeconds: roundTo(elapsedSeconds, 2),
    wpm: roundTo(wordsPerMinute(metrics.wordCount, elapsedSeconds), 2),
    compositeScore: computeComposite(metrics, elapsedSeconds, input.goals),
    metrics,
    trends: computeGoalTrends(metrics, input.goals, input.baselines),
  };
};
