import { readFileSync } from 'node:fs';
import { z } from 'zod';

const stopwordListSchema = z.array(z.string().min(1));

const loadStopwords = (): ReadonlySet<string> => {
  const raw = readFileSync(new URL('./stopwords.json', import.meta.url), 'utf-8');
  const words = stopwordListSchema.parse(JSON.parse(raw));
  return new Set(words.map((w) => w.toLowerCase()));
};

export const STOPWORDS: ReadonlySet<string> = loadStopwords();

export const isStopword = (word: string): boolean => STOPWORDS.has(word.toLowerCase());
