import { Hono } from 'hono';
import type { CompositeResponse } from '@underwriter/shared';
import { computeStyleMetrics } from '../metrics/analyze-style.js';
import { computeFlowMetrics } from '../metrics/analyze-flow.js';
import { computeComposite, wordsPerMinute } from '../metrics/composite.js';
import { roundTo } from '../metrics/math.js';
import { getTokenizer } from '../metrics/tokenizer.js';
import { deserializeFlowMetrics, serializeFlowMetrics, serializeStyleMetrics } from '../utils/serialize.js';
import { compositeBodySchema, textBodySchema } from './schemas.js';
import { parseBody } from './validation.js';

export const analyzeRoutes = new Hono();

analyzeRoutes.post('/style', async (c) => {
  const { text } = await parseBody(c, textBodySchema);
  return c.json(serializeStyleMetrics(computeStyleMetrics(text, getTokenizer())));
});

analyzeRoutes.post('/flow', async (c) => {
  const { text } = await parseBody(c, textBodySchema);
  return c.json(serializeFlowMetrics(computeFlowMetrics(text, getTokenizer())));
});

analyzeRoutes.post('/composite', async (c) => {
  const body = await parseBody(c, compositeBodySchema);
  const metrics = deserializeFlowMetrics(body.metrics);
  const elapsed = Math.max(0, body.elapsed_seconds);

  const response: CompositeResponse = {
    composite_score: computeComposite(metrics, elapsed, body.goals),
    wpm: roundTo(wordsPerMinute(metrics.wordCount, elapsed), 2),
  };
  return c.json(response);
});
