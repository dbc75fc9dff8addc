import type { Energy, Intention } from '@underwriter/shared';
import type { StyleMetrics } from '../metrics/metric-types.js';

const INTENTION_CUES: Array<[Exclude<Intention, 'inquisitive' | 'descriptive'>, string[]]> = [
  ['exploratory', ['i think', 'maybe', 'perhaps', 'wonder']],
  ['persuasive', ['should', 'must', 'need to', 'important']],
  ['expressive', ['i feel', "i'm", 'sad', 'happy', 'excited']],
];

const SNAPSHOT_EVERY = 5;

export const inferIntention = (text: string): Intention => {
  if (text.includes('?')) return 'inquisitive';
  const lower = text.toLowerCase();
  for (const [intention, cues] of INTENTION_CUES) {
    if (cues.some((cue) => lower.includes(cue))) return intention;
  }
  return 'descriptive';
};

export const inferEnergy = (metrics: Pick<StyleMetrics, 'sentenceLengthAvg'>): Energy => {
  if (metrics.sentenceLengthAvg >= 22) return 'calm/expansive';
  if (metrics.sentenceLengthAvg >= 15) return 'steady';
  return 'brisk';
};

/** One-line summary written every fifth writing; null in between. */
export const buildStyleSnapshot = (
  totalWritings: number,
  tone: string,
  intention: Intention,
  energy: Energy,
): string | null => {
  if (totalWritings <= 0 || totalWritings % SNAPSHOT_EVERY !== 0) return null;
  return `By entry ${totalWritings}, tone leans '${tone}' with '${intention}' intent; energy '${energy}'.`;
};
