import type { ContextPack, Goal } from '@underwriter/shared';
import { createChatModel, isLlmConfigured, messageText } from '../lib/openrouter.js';
import { safeJson, truncate } from './context.js';

const FLOW_SYSTEM = `You are a reflective writing companion in flow practice mode.
Constraints:
- Never write or rewrite for the user.
- At most three short sentences in total.
- Name one concrete improvement trend if the context shows one.
- Give exactly one micro-nudge aligned with the selected goals.
- Warm, brisk and direct. No lists, no emojis.`;

export const FLOW_FALLBACK = 'Nice burst. Keep momentum—state one idea plainly, then add one vivid image.';

export interface FlowFeedbackInput {
  text: string;
  goals: readonly Goal[];
  trendSummary?: string;
  contextPack?: ContextPack;
}

export const buildFlowMessage = (input: FlowFeedbackInput): string => {
  const goals = input.goals.length > 0 ? input.goals.join(', ') : 'none';
  const ctxHint = safeJson(
    {
      active_goals: input.contextPack?.active_goals ?? null,
      overview: input.contextPack?.overview ?? null,
    },
    600,
  );

  return [
    `User goals: ${goals}`,
    `Recent trend summary: ${input.trendSummary || 'none'}`,
    `Context (counts/goals): ${ctxHint}`,
    `User's flow attempt:\n---\n${truncate(input.text, 3000)}\n---`,
    'Respond now with at most three short sentences, honoring the constraints.',
  ].join('\n');
};

export const getFlowFeedback = async (input: FlowFeedbackInput): Promise<string> => {
  if (!isLlmConfigured()) return FLOW_FALLBACK;

  try {
    const model = createChatModel({ temperature: 0.4, maxTokens: 120 });
    const response = await model.invoke([
      { role: 'system', content: FLOW_SYSTEM },
      { role: 'user', content: buildFlowMessage(input) },
    ]);
    return messageText(response.content) || FLOW_FALLBACK;
  } catch (err) {
    console.warn('[Feedback] Flow micro-feedback failed:', (err as Error).message);
    return FLOW_FALLBACK;
  }
};
