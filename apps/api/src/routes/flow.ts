import { Hono } from 'hono';
import { scoreFlowAttempt, formatGoalTrends } from '../metrics/flow-practice.js';
import { getFlowFeedback } from '../feedback/flow-feedback.js';
import { formatContextHint } from '../feedback/context.js';
import { serializeFlowAttempt } from '../utils/serialize.js';
import { flowAttemptBodySchema } from './schemas.js';
import { parseBody } from './validation.js';

export const flowRoutes = new Hono();

flowRoutes.post('/attempts', async (c) => {
  const body = await parseBody(c, flowAttemptBodySchema);

  const score = scoreFlowAttempt({
    text: body.text,
    elapsedSeconds: body.elapsed_seconds,
    goals: body.goals,
    baselines: body.baselines,
  });
  const trendSummary = formatGoalTrends(score.trends);

  const hint = formatContextHint(body.context_pack);
  console.log(`[Flow] words=${score.metrics.wordCount} wpm=${score.wpm} composite=${score.compositeScore}${hint ? ` ${hint}` : ''}`);

  const feedback = await getFlowFeedback({
    text: body.text,
    goals: body.goals,
    trendSummary,
    contextPack: body.context_pack,
  });

  return c.json(serializeFlowAttempt(score, trendSummary, feedback));
});
