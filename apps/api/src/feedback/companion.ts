import type { ContextPack, PersonalAnchor } from '@underwriter/shared';
import { createChatModel, isLlmConfigured, messageText } from '../lib/openrouter.js';
import { formatPersonalAnchors, safeJson, truncate } from './context.js';

const COMPANION_SYSTEM = `You are a reflective writing companion. You read what the user wrote and respond with insight; you never write or rewrite for them.

Stance:
- Warm and direct. Offer praise and critique; say plainly when reasoning or facts are weak.
- Speak to the effect on a reader (tone, energy, clarity, rhythm). Never quote counts, scores or readability numbers.
- Infer the user's intention (business, technical, creative) and read through that lens.
- Keep the response proportional to the length of the writing.

Personalization:
- Compare the piece with the user's own baseline from the context pack and anchors before reaching for generic rules.
- If context is thin, say this is a first impression.

Hard rules:
- No standalone text, paragraphs or rewrites.
- Suggestions are micro and optional, each grounded in a quoted fragment.

Output: one or two short paragraphs of reflection, then 2-5 bullet micro-suggestions of about twelve words each.`;

export const COMPANION_FALLBACK_NUDGE = 'One nudge: read once out loud and trim any filler.';

export interface CompanionFeedbackInput {
  text: string;
  profileSummary?: string;
  contextPack?: ContextPack;
  personalAnchors?: PersonalAnchor[];
}

export const buildCompanionMessage = (input: CompanionFeedbackInput): string => {
  const ctxJson = safeJson(input.contextPack, 1800);
  const anchorsJson = formatPersonalAnchors(input.personalAnchors, 360, 3);

  return [
    `User context pack (counts/streak/traits/goals/excerpts):\n${ctxJson}`,
    `User style summary: ${input.profileSummary || 'learning user style'}`,
    `Personal anchors (prior excerpts):\n${anchorsJson}`,
    `Current writing:\n---\n${truncate(input.text, 6000)}\n---`,
    'Task: give a short reflection and a few micro-suggestions. Compare with the user\'s own baseline where relevant. Do not rewrite or generate content for the user.',
  ].join('\n\n');
};

export const getCompanionFeedback = async (input: CompanionFeedbackInput): Promise<string> => {
  if (!isLlmConfigured()) {
    return `(Fallback) Reflection unavailable: OPEN_ROUTER_API_KEY is not set. ${COMPANION_FALLBACK_NUDGE}`;
  }

  try {
    const model = createChatModel({ temperature: 0.5, maxTokens: 380 });
    const response = await model.invoke([
      { role: 'system', content: COMPANION_SYSTEM },
      { role: 'user', content: buildCompanionMessage(input) },
    ]);
    return messageText(response.content);
  } catch (err) {
    const message = (err as Error).message;
    console.warn('[Feedback] Companion reflection failed:', message);
    return `(Fallback) Reflection unavailable: ${message}. ${COMPANION_FALLBACK_NUDGE}`;
  }
};
