import type { StyleMetrics } from './metric-types.js';
import { mean, ratio, roundTo } from './math.js';
import { normalizeWhitespace, regexTokenizer, type Tokenizer } from './tokenizer.js';

const PUNCTUATION = new Set('!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~');
const FREQUENT_WORD_LIMIT = 5;

const countPunctuation = (text: string): Record<string, number> => {
  const counts: Record<string, number> = {};
  for (const ch of text) {
    if (PUNCTUATION.has(ch)) counts[ch] = (counts[ch] ?? 0) + 1;
  }
  return counts;
};

// Map keeps first-seen order, and sort is stable, so ties stay in document order
export const topWords = (words: string[], limit = FREQUENT_WORD_LIMIT): string[] => {
  const counts = new Map<string, number>();
  for (const w of words) counts.set(w, (counts.get(w) ?? 0) + 1);
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([word]) => word);
};

export const computeStyleMetrics = (
  text: string,
  tokenizer: Tokenizer = regexTokenizer,
): StyleMetrics => {
  const cleaned = normalizeWhitespace(text);

  const sentences = tokenizer.splitSentences(cleaned);
  const sentenceLengths = sentences.map((s) => tokenizer.tokenize(s).length);
  const sentenceLengthAvg = mean(sentenceLengths);
  const sentenceLengthVar = sentenceLengths.length > 0
    ? sentenceLengths.reduce((a, b) => Math.max(a, b)) - sentenceLengths.reduce((a, b) => Math.min(a, b))
    : 0;

  const tokens = tokenizer.tokenize(cleaned);
  const uniqueTypes = new Set(tokens.map((t) => t.lower));
  const vocabRichness = ratio(uniqueTypes.size, tokens.length);

  const contentWords = tokens.filter((t) => !t.functionWord).map((t) => t.lower);

  return {
    sentenceLengthAvg: roundTo(sentenceLengthAvg, 2),
    sentenceLengthVar,
    vocabRichness: roundTo(vocabRichness, 2),
    frequentWords: topWords(contentWords),
    punctuationUse: countPunctuation(cleaned),
  };
};
