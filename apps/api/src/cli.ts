import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { GOALS, type Goal } from '@underwriter/shared';
import { computeStyleMetrics } from './metrics/analyze-style.js';
import { computeFlowMetrics } from './metrics/analyze-flow.js';
import { computeComposite, wordsPerMinute } from './metrics/composite.js';
import { roundTo } from './metrics/math.js';
import { getTokenizer, initTokenizer } from './metrics/tokenizer.js';
import { serializeFlowMetrics, serializeStyleMetrics } from './utils/serialize.js';

export const getArg = (args: string[], name: string): string | undefined => {
  const idx = args.findIndex((a) => a.startsWith(`--${name}=`));
  if (idx >= 0) return args[idx].slice(name.length + 3);
  const flagIdx = args.findIndex((a) => a === `--${name}`);
  if (flagIdx >= 0 && args[flagIdx + 1]) return args[flagIdx + 1];
  return undefined;
};

const isGoal = (value: string): value is Goal => GOALS.some((g) => g === value);

export const parseGoals = (raw: string | undefined): Goal[] =>
  (raw ?? '')
    .split(',')
    .map((g) => g.trim().toLowerCase())
    .filter(isGoal);

/** Metrics for one text as pretty-printed snake_case JSON. */
export const renderMetrics = (mode: string, text: string, args: string[]): string => {
  const tokenizer = getTokenizer();

  switch (mode) {
    case 'style':
      return JSON.stringify(serializeStyleMetrics(computeStyleMetrics(text, tokenizer)), null, 2);
    case 'flow': {
      const metrics = computeFlowMetrics(text, tokenizer);
      const elapsed = Math.max(0, Number(getArg(args, 'elapsed')) || 0);
      const goals = parseGoals(getArg(args, 'goals'));
      return JSON.stringify({
        ...serializeFlowMetrics(metrics),
        wpm: roundTo(wordsPerMinute(metrics.wordCount, elapsed), 2),
        composite_score: computeComposite(metrics, elapsed, goals),
      }, null, 2);
    }
    default:
      throw new Error(`Unknown mode: ${mode}`);
  }
};

const readStdin = async (): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
};

const run = async () => {
  const args = process.argv.slice(2);
  const mode = getArg(args, 'mode') || 'style';
  const file = getArg(args, 'file');
  const tokenizerKind = getArg(args, 'tokenizer') === 'pos' ? 'pos' : 'regex';

  await initTokenizer(tokenizerKind);
  const text = file ? await readFile(file, 'utf-8') : await readStdin();
  console.log(renderMetrics(mode, text, args));
};

// Only run when executed directly, not when imported by tests
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  run().catch((err) => {
    console.error('Analysis failed:', (err as Error).message);
    process.exit(1);
  });
}
