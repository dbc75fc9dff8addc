import { createFastModel, isLlmConfigured, messageText } from '../lib/openrouter.js';

// Simple heuristic classifier (fallback when no API key)
export const classifyToneByHeuristic = (text: string): string => {
  if (text.includes('!')) return 'energetic';
  if (text.includes('?')) return 'inquisitive';
  const lower = text.trimStart().toLowerCase();
  if (lower.startsWith('dear') || lower.startsWith('to whom')) return 'formal';
  return 'neutral';
};

export const classifyTone = async (text: string): Promise<string> => {
  if (!isLlmConfigured()) {
    return classifyToneByHeuristic(text);
  }

  try {
    const model = createFastModel({ temperature: 0, maxTokens: 10 });

    const response = await model.invoke([
      {
        role: 'system',
        content: 'Classify the tone of the text in one or two words (e.g., reflective, casual, formal). Reply with the words only.',
      },
      { role: 'user', content: text.slice(0, 2000) },
    ]);

    const label = messageText(response.content).toLowerCase();
    return label || classifyToneByHeuristic(text);
  } catch (err) {
    console.warn('[Tone] Classification API failed, using heuristic:', (err as Error).message);
    return classifyToneByHeuristic(text);
  }
};
