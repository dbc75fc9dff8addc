import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  createPosTokenizer,
  getTokenizer,
  initTokenizer,
  normalizeWhitespace,
  regexTokenizer,
  resetTokenizer,
} from '../tokenizer.js';

const fakeNlp = () => ({
  json: () => [
    {
      text: 'The cat sat.',
      terms: [
        { text: 'The', tags: ['Determiner'] },
        { text: 'cat', tags: ['Noun', 'Singular'] },
        { text: 'sat', tags: ['Verb', 'PastTense'] },
      ],
    },
    {
      text: ' Whoa! ',
      terms: [
        { text: 'Whoa', tags: ['Expression'] },
        { text: '', tags: [] },
      ],
    },
  ],
});

describe('Tokenizer', () => {
  afterEach(() => {
    resetTokenizer();
    vi.doUnmock('compromise');
    vi.resetModules();
    vi.restoreAllMocks();
  });

  describe('normalizeWhitespace', () => {
    it('collapses runs of whitespace and trims', () => {
      expect(normalizeWhitespace('  one\n\n\ttwo   three \r\n')).toBe('one two three');
    });
  });

  describe('regexTokenizer', () => {
    it('keeps embedded apostrophes and drops surrounding quotes', () => {
      const tokens = regexTokenizer.tokenize("Isn't it 'quoted' rock'n'roll?");
      expect(tokens.map((t) => t.text)).toEqual(["Isn't", 'it', 'quoted', "rock'n'roll"]);
    });

    it('preserves case in text and lowercases for comparison', () => {
      const [token] = regexTokenizer.tokenize('Hello');
      expect(token).toEqual({ text: 'Hello', lower: 'hello', functionWord: false });
    });

    it('marks stopwords as function words', () => {
      const flags = regexTokenizer.tokenize("The garden isn't quiet").map((t) => t.functionWord);
      expect(flags).toEqual([true, false, true, false]);
    });

    it('splits sentences on runs of terminal punctuation', () => {
      expect(regexTokenizer.splitSentences('Hello world!!! This is a test... And a tail'))
        .toEqual(['Hello world', 'This is a test', 'And a tail']);
    });

    it('treats empty and whitespace-only text as valid', () => {
      expect(regexTokenizer.tokenize('   \n ')).toEqual([]);
      expect(regexTokenizer.splitSentences('')).toEqual([]);
      expect(regexTokenizer.splitSentences(' ?! ')).toEqual([]);
    });

    it('ignores non-ASCII letters', () => {
      expect(regexTokenizer.tokenize('日本語です')).toEqual([]);
      expect(regexTokenizer.splitSentences('日本語です')).toEqual(['日本語です']);
    });
  });

  describe('createPosTokenizer', () => {
    it('flags tagged function words and skips empty terms', () => {
      const tokenizer = createPosTokenizer(fakeNlp);
      const tokens = tokenizer.tokenize('The cat sat. Whoa!');
      expect(tokens.map((t) => t.text)).toEqual(['The', 'cat', 'sat', 'Whoa']);
      expect(tokens.map((t) => t.functionWord)).toEqual([true, false, false, false]);
    });

    it('uses the tagger sentence segmentation', () => {
      const tokenizer = createPosTokenizer(fakeNlp);
      expect(tokenizer.splitSentences('The cat sat. Whoa!')).toEqual(['The cat sat.', 'Whoa!']);
    });

    it('never calls the tagger for blank text', () => {
      const nlp = vi.fn(fakeNlp);
      const tokenizer = createPosTokenizer(nlp);
      expect(tokenizer.tokenize('  ')).toEqual([]);
      expect(nlp).not.toHaveBeenCalled();
    });
  });

  describe('initTokenizer', () => {
    it('starts with the regex tokenizer', () => {
      expect(getTokenizer()).toBe(regexTokenizer);
    });

    it('activates the regex tokenizer when configured', async () => {
      await expect(initTokenizer('regex')).resolves.toBe(regexTokenizer);
      expect(getTokenizer().kind).toBe('regex');
    });

    it('loads the part-of-speech tokenizer once', async () => {
      vi.doMock('compromise', () => ({ default: fakeNlp }));
      vi.spyOn(console, 'log').mockImplementation(() => {});

      const first = initTokenizer('pos');
      const second = initTokenizer('pos');
      expect(second).toBe(first);

      const tokenizer = await first;
      expect(tokenizer.kind).toBe('pos');
      expect(getTokenizer()).toBe(tokenizer);
    });

    it('falls back to regex when the model cannot load', async () => {
      vi.doMock('compromise', () => {
        throw new Error('model missing');
      });
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      const tokenizer = await initTokenizer('pos');
      expect(tokenizer).toBe(regexTokenizer);
      expect(getTokenizer()).toBe(regexTokenizer);
      expect(warn).toHaveBeenCalledOnce();
    });
  });
});
