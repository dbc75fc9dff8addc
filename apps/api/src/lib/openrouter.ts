import { ChatOpenAI } from '@langchain/openai';
import { config } from './config.js';

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

const getApiKey = (): string => {
  const key = config.OPEN_ROUTER_API_KEY;
  if (!key) throw new Error('OPEN_ROUTER_API_KEY is not set');
  return key;
};

const openRouterConfig = {
  baseURL: OPENROUTER_BASE_URL,
};

export const MODELS = {
  // Reflections and flow micro-feedback
  writer: 'openai/gpt-4o',
  // Tone labels and rubric extraction
  fast: 'openai/gpt-4o-mini',
} as const;

export const isLlmConfigured = (): boolean => Boolean(config.OPEN_ROUTER_API_KEY);

export const createChatModel = (options?: {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}) => {
  return new ChatOpenAI({
    model: options?.model ?? MODELS.writer,
    temperature: options?.temperature ?? 0.7,
    maxTokens: options?.maxTokens,
    apiKey: getApiKey(),
    configuration: openRouterConfig,
  });
};

export const createFastModel = (options?: {
  temperature?: number;
  maxTokens?: number;
}) => {
  return new ChatOpenAI({
    model: MODELS.fast,
    temperature: options?.temperature ?? 0,
    maxTokens: options?.maxTokens,
    apiKey: getApiKey(),
    configuration: openRouterConfig,
  });
};

/** Flattens a chat reply to plain text; multimodal parts contribute their text. */
export const messageText = (content: unknown): string => {
  if (typeof content === 'string') return content.trim();
  if (Array.isArray(content)) {
    return content
      .map((part) => (typeof part === 'object' && part !== null && 'text' in part ? String(part.text) : ''))
      .join('')
      .trim();
  }
  return String(content ?? '').trim();
};
