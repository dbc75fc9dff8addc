import { describe, expect, it } from 'vitest';
import { computeStyleMetrics, topWords } from '../analyze-style.js';
import { regexTokenizer, type Tokenizer } from '../tokenizer.js';
import { STOPWORDS } from '../stopwords.js';

describe('computeStyleMetrics', () => {
  it('returns zero metrics for empty text', () => {
    expect(computeStyleMetrics('')).toEqual({
      sentenceLengthAvg: 0,
      sentenceLengthVar: 0,
      vocabRichness: 0,
      frequentWords: [],
      punctuationUse: {},
    });
  });

  it('analyzes a two-sentence greeting', () => {
    expect(computeStyleMetrics('Hello world! This is a test.')).toEqual({
      sentenceLengthAvg: 3,
      sentenceLengthVar: 2,
      vocabRichness: 1,
      frequentWords: ['hello', 'world', 'test'],
      punctuationUse: { '!': 1, '.': 1 },
    });
  });

  it('reports the sentence length range, not a variance', () => {
    const metrics = computeStyleMetrics('One. Two three four five.');
    expect(metrics.sentenceLengthVar).toBe(3);
    expect(metrics.sentenceLengthAvg).toBe(2.5);
  });

  it('has zero range for a single sentence', () => {
    expect(computeStyleMetrics('Just one sentence here').sentenceLengthVar).toBe(0);
  });

  it('rounds averages to two decimals', () => {
    const metrics = computeStyleMetrics('One two three. Four. Five.');
    expect(metrics.sentenceLengthAvg).toBe(1.67);
    expect(computeStyleMetrics('go go go').vocabRichness).toBe(0.33);
  });

  it('rounds exact halves to the even digit', () => {
    expect(computeStyleMetrics('apple berry cherry damson elder apple berry cherry').vocabRichness).toBe(0.62);
    expect(computeStyleMetrics('One. Two. Three. Four. Five. Six. Seven. Eight nine.').sentenceLengthAvg).toBe(1.12);
  });

  it('keeps vocabulary richness within 0..1 and at 0 only without words', () => {
    const samples = [
      '',
      '!!! ???',
      '日本語です',
      'a',
      'go go go go',
      'Hello world! This is a test.',
      "It's raining, isn't it? Rain, rain, rain.",
      'Luminous cathedral whispers drift over quiet harbors at dusk',
    ];
    for (const text of samples) {
      const { vocabRichness } = computeStyleMetrics(text);
      expect(vocabRichness).toBeGreaterThanOrEqual(0);
      expect(vocabRichness).toBeLessThanOrEqual(1);
      expect(vocabRichness === 0).toBe(regexTokenizer.tokenize(text).length === 0);
    }
  });

  it('compares words case-insensitively', () => {
    const metrics = computeStyleMetrics('River river RIVER stone');
    expect(metrics.vocabRichness).toBe(0.5);
    expect(metrics.frequentWords).toEqual(['river', 'stone']);
  });

  it('keeps five frequent words, ties in order of first appearance', () => {
    const metrics = computeStyleMetrics('alpha beta gamma delta epsilon zeta beta');
    expect(metrics.frequentWords).toEqual(['beta', 'alpha', 'gamma', 'delta', 'epsilon']);
  });

  it('never returns stopwords as frequent words', () => {
    const metrics = computeStyleMetrics('The cat and the dog and the bird were there, and they were here.');
    expect(metrics.frequentWords).toEqual(['cat', 'dog', 'bird']);
    for (const word of metrics.frequentWords) {
      expect(STOPWORDS.has(word)).toBe(false);
    }
  });

  it('counts only ASCII punctuation', () => {
    const metrics = computeStyleMetrics('She said, "wait"; then—left...');
    expect(metrics.punctuationUse).toEqual({ ',': 1, '"': 2, ';': 1, '.': 3 });
  });

  it('handles text without ASCII words', () => {
    expect(computeStyleMetrics('日本語です。すごい！')).toEqual({
      sentenceLengthAvg: 0,
      sentenceLengthVar: 0,
      vocabRichness: 0,
      frequentWords: [],
      punctuationUse: {},
    });
  });

  it('is idempotent', () => {
    const text = 'Rain again. The gutters sing, the street shines; nobody minds!';
    expect(computeStyleMetrics(text)).toEqual(computeStyleMetrics(text));
  });

  it('takes function words from the injected tokenizer', () => {
    const tagger: Tokenizer = {
      kind: 'pos',
      tokenize: (text) => regexTokenizer.tokenize(text).map((t) => ({
        ...t,
        functionWord: t.functionWord || t.lower === 'hello',
      })),
      splitSentences: regexTokenizer.splitSentences,
    };
    expect(computeStyleMetrics('Hello world! This is a test.', tagger).frequentWords).toEqual(['world', 'test']);
  });
});

describe('topWords', () => {
  it('orders by count then by first appearance', () => {
    expect(topWords(['b', 'a', 'a', 'c', 'b', 'd'], 3)).toEqual(['b', 'a', 'c']);
  });
});
