import { Hono } from 'hono';
import type { AnalyzeWritingResponse } from '@underwriter/shared';
import { computeStyleMetrics } from '../metrics/analyze-style.js';
import { getTokenizer } from '../metrics/tokenizer.js';
import { classifyTone } from '../feedback/tone.js';
import { buildStyleSnapshot, inferEnergy, inferIntention } from '../feedback/insights.js';
import { detectOutliers, isConsistentStyle, mergeProfile } from '../feedback/profile.js';
import { getCompanionFeedback } from '../feedback/companion.js';
import { createBadRequestError } from '../lib/errors.js';
import { deserializeProfile, serializeProfile, serializeStyleMetrics } from '../utils/serialize.js';
import { analyzeWritingBodySchema } from './schemas.js';
import { parseBody } from './validation.js';

export const writingsRoutes = new Hono();

writingsRoutes.post('/analyze', async (c) => {
  const body = await parseBody(c, analyzeWritingBodySchema);
  if (!body.text.trim()) {
    throw createBadRequestError('Please enter some text.');
  }

  const metrics = computeStyleMetrics(body.text, getTokenizer());
  const intention = inferIntention(body.text);
  const energy = inferEnergy(metrics);

  // The caller owns persistence; the profile it sends comes back updated
  const profile = mergeProfile(body.profile ? deserializeProfile(body.profile) : null, metrics);

  const [tone, feedback] = await Promise.all([
    classifyTone(body.text),
    getCompanionFeedback({
      text: body.text,
      profileSummary: body.profile_summary,
      contextPack: body.context_pack,
      personalAnchors: body.personal_anchors,
    }),
  ]);

  const response: AnalyzeWritingResponse = {
    metrics: serializeStyleMetrics(metrics),
    tone,
    intention,
    energy,
    profile: serializeProfile(profile),
    suggestions: detectOutliers(metrics, profile),
    consistent_style: isConsistentStyle(profile),
    snapshot: buildStyleSnapshot(profile.count, tone, intention, energy),
    feedback,
  };
  return c.json(response);
});
