import { z } from 'zod';
import type { TokenizerKind } from '@underwriter/shared';
import { isStopword } from './stopwords.js';

export interface Token {
  text: string;
  lower: string;
  // Stopword or, when a tagger is available, a tagged function word
  functionWord: boolean;
}

export interface Tokenizer {
  readonly kind: TokenizerKind;
  tokenize(text: string): Token[];
  splitSentences(text: string): string[];
}

const WHITESPACE_RE = /\s+/g;
const WORD_RE = /[A-Za-z]+(?:'[A-Za-z]+)*/g;
const WHOLE_WORD_RE = /^[A-Za-z]+(?:'[A-Za-z]+)*$/;
const SENTENCE_END_RE = /[.!?]+/;

export const normalizeWhitespace = (text: string): string =>
  text.replace(WHITESPACE_RE, ' ').trim();

const toToken = (text: string, functionWord = false): Token => {
  const lower = text.toLowerCase();
  return { text, lower, functionWord: functionWord || isStopword(lower) };
};

export const regexTokenizer: Tokenizer = {
  kind: 'regex',

  tokenize: (text) => {
    const words = normalizeWhitespace(text).match(WORD_RE) ?? [];
    return words.map((w) => toToken(w));
  },

  splitSentences: (text) =>
    normalizeWhitespace(text)
      .split(SENTENCE_END_RE)
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
};

// Shape of compromise's doc.json() output that the tokenizer relies on
const posTermSchema = z.object({
  text: z.string(),
  tags: z.array(z.string()).default([]),
});

const posSentenceSchema = z.object({
  text: z.string(),
  terms: z.array(posTermSchema).default([]),
});

const FUNCTION_TAGS = new Set([
  'Determiner',
  'Pronoun',
  'Preposition',
  'Conjunction',
  'Auxiliary',
  'Copula',
]);

type NlpFactory = (text: string) => { json: () => unknown };

export const createPosTokenizer = (nlp: NlpFactory): Tokenizer => {
  const parse = (text: string) => {
    const normalized = normalizeWhitespace(text);
    if (!normalized) return [];
    return z.array(posSentenceSchema).parse(nlp(normalized).json());
  };

  return {
    kind: 'pos',

    tokenize: (text) =>
      parse(text).flatMap((sentence) =>
        sentence.terms
          .filter((term) => WHOLE_WORD_RE.test(term.text))
          .map((term) => toToken(term.text, term.tags.some((tag) => FUNCTION_TAGS.has(tag)))),
      ),

    splitSentences: (text) =>
      parse(text)
        .map((sentence) => sentence.text.trim())
        .filter((s) => s.length > 0),
  };
};

let activeTokenizer: Tokenizer = regexTokenizer;
let initPromise: Promise<Tokenizer> | null = null;

const loadPosTokenizer = async (): Promise<Tokenizer> => {
  const { default: nlp } = await import('compromise');
  return createPosTokenizer(nlp);
};

/**
 * Loads the configured tokenizer once and makes it the shared active one.
 * A part-of-speech model that fails to load leaves the regex tokenizer active.
 */
export const initTokenizer = (kind: TokenizerKind): Promise<Tokenizer> => {
  if (initPromise) return initPromise;

  initPromise = (async () => {
    if (kind === 'regex') {
      activeTokenizer = regexTokenizer;
      return activeTokenizer;
    }
    try {
      activeTokenizer = await loadPosTokenizer();
      console.log('[Tokenizer] Part-of-speech tokenizer loaded');
    } catch (err) {
      console.warn('[Tokenizer] Part-of-speech model unavailable, using regex:', (err as Error).message);
      activeTokenizer = regexTokenizer;
    }
    return activeTokenizer;
  })();

  return initPromise;
};

export const getTokenizer = (): Tokenizer => activeTokenizer;

/** Drops the shared tokenizer so the next init starts over. */
export const resetTokenizer = (): void => {
  activeTokenizer = regexTokenizer;
  initPromise = null;
};
