import { EMPTY_FLOW_METRICS, type FlowMetrics } from './metric-types.js';
import { clamp, mean, ratio, roundTo } from './math.js';
import { normalizeWhitespace, regexTokenizer, type Tokenizer } from './tokenizer.js';

// Nine marks; either parenthesis counts as the same mark
const VARIETY_MARKS: Record<string, string> = {
  ',': ',',
  '.': '.',
  '—': '—',
  '-': '-',
  ':': ':',
  ';': ';',
  '!': '!',
  '?': '?',
  '(': '()',
  ')': '()',
};
const MAX_VARIETY = 6;

const FIGURATIVE_RE = /\b(?:like|as if|as though)\b/g;
const INTERJECTION_RE = /\b(?:hey|wow|ah|oh|hmm|ugh|ha)\b/g;
const HEDGE_RE = /\b(?:maybe|kind of|sort of|perhaps|somewhat|a bit)\b/g;
const PASSIVE_CUE_RE = /\b(?:be|been|being|is|was|were|are)\s+\w+ed\b/g;

// Sentences around this many words read clearest; longer ones lose credit linearly
const IDEAL_SENTENCE_WORDS = 18;
const SENTENCE_PENALTY_SPAN = 22;

const TTR_CEILING = 0.6;
const RARE_RATE_CEILING = 0.15;
const RARE_WORD_MIN_LENGTH = 7;

const countMatches = (text: string, re: RegExp): number => (text.match(re) ?? []).length;

export const punctuationVariety = (text: string): number => {
  const marks = new Set<string>();
  for (const ch of text) {
    const mark = VARIETY_MARKS[ch];
    if (mark) marks.add(mark);
  }
  return marks.size;
};

const scorePlayfulness = (text: string, lowered: string, ttr: number): number =>
  clamp(
    0.15 * Math.min(punctuationVariety(text), MAX_VARIETY)
    + 0.2 * countMatches(lowered, FIGURATIVE_RE)
    + 0.1 * countMatches(lowered, INTERJECTION_RE)
    + 0.6 * clamp(ttr / TTR_CEILING),
  );

const scoreClarity = (text: string, lowered: string, tokenizer: Tokenizer): number => {
  const sentences = tokenizer.splitSentences(text);
  const avgSentenceWords = mean(sentences.map((s) => tokenizer.tokenize(s).length));
  const hedges = countMatches(lowered, HEDGE_RE);
  const passiveCues = countMatches(lowered, PASSIVE_CUE_RE);

  return clamp(
    0.6 * clamp(1 - Math.max(0, avgSentenceWords - IDEAL_SENTENCE_WORDS) / SENTENCE_PENALTY_SPAN)
    + 0.25 * clamp(1 - hedges / 4)
    + 0.15 * clamp(1 - passiveCues / 3),
  );
};

const scoreCreativity = (rareRate: number, ttr: number): number =>
  clamp(0.7 * clamp(rareRate / RARE_RATE_CEILING) + 0.3 * clamp(ttr / TTR_CEILING));

/**
 * Lexical counts plus three explainable 0–1 heuristics for a practice burst.
 * Text without a single word token scores zero across the board.
 */
export const computeFlowMetrics = (
  text: string,
  tokenizer: Tokenizer = regexTokenizer,
): FlowMetrics => {
  const cleaned = normalizeWhitespace(text);
  const tokens = tokenizer.tokenize(cleaned);
  const wordCount = tokens.length;
  if (wordCount === 0) return { ...EMPTY_FLOW_METRICS };

  const types = new Set(tokens.map((t) => t.lower)).size;
  const ttr = ratio(types, wordCount);
  const lowered = cleaned.toLowerCase();

  const rareCount = tokens.filter((t) => !t.functionWord && t.lower.length >= RARE_WORD_MIN_LENGTH).length;

  return {
    wordCount,
    vocabTypeCount: types,
    vocabTtr: roundTo(ttr, 4),
    repetitionRate: roundTo(clamp(1 - ttr), 4),
    playfulnessScore: roundTo(scorePlayfulness(cleaned, lowered, ttr), 4),
    clarityScore: roundTo(scoreClarity(cleaned, lowered, tokenizer), 4),
    creativityScore: roundTo(scoreCreativity(ratio(rareCount, wordCount), ttr), 4),
  };
};
