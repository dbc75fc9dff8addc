import { describe, expect, it } from 'vitest';
import { computeFlowMetrics, punctuationVariety } from '../analyze-flow.js';
import { EMPTY_FLOW_METRICS } from '../metric-types.js';

describe('punctuationVariety', () => {
  it('counts distinct marks', () => {
    expect(punctuationVariety('a, b, c.')).toBe(2);
    expect(punctuationVariety('no marks here')).toBe(0);
  });

  it('treats either parenthesis as one mark', () => {
    expect(punctuationVariety('(a) b')).toBe(1);
    expect(punctuationVariety('a ( b')).toBe(1);
  });

  it('recognizes all nine marks', () => {
    expect(punctuationVariety(', . — - : ; ! ? ( )')).toBe(9);
  });

  it('ignores marks outside the set', () => {
    expect(punctuationVariety('"quoted" & [bracketed]')).toBe(0);
  });
});

describe('computeFlowMetrics', () => {
  it('returns all zeros when there are no words', () => {
    expect(computeFlowMetrics('')).toEqual(EMPTY_FLOW_METRICS);
    expect(computeFlowMetrics('!!! ???')).toEqual(EMPTY_FLOW_METRICS);
  });

  it('scores a repetitive burst', () => {
    expect(computeFlowMetrics(Array(10).fill('go').join(' '))).toEqual({
      wordCount: 10,
      vocabTypeCount: 1,
      vocabTtr: 0.1,
      repetitionRate: 0.9,
      playfulnessScore: 0.1,
      clarityScore: 1,
      creativityScore: 0.05,
    });
  });

  it('rewards interjections, comparisons and varied punctuation', () => {
    const metrics = computeFlowMetrics("Wow! This is like a dream, isn't it?");
    expect(metrics.wordCount).toBe(8);
    expect(metrics.vocabTtr).toBe(1);
    expect(metrics.repetitionRate).toBe(0);
    expect(metrics.playfulnessScore).toBe(1);
    expect(metrics.clarityScore).toBe(1);
    expect(metrics.creativityScore).toBe(0.3);
  });

  it('penalizes hedges and passive cues', () => {
    const metrics = computeFlowMetrics('Maybe the report was delayed. Perhaps it is kind of finished.');
    expect(metrics.clarityScore).toBe(0.7625);
  });

  it('penalizes very long sentences', () => {
    const metrics = computeFlowMetrics(Array(40).fill('word').join(' '));
    expect(metrics.clarityScore).toBe(0.4);
  });

  it('rewards long content words', () => {
    expect(computeFlowMetrics('Luminous cathedral whispers').creativityScore).toBe(1);
  });

  it('rounds exact halves to the even digit', () => {
    const metrics = computeFlowMetrics(Array(32).fill('go').join(' '));
    expect(metrics.vocabTtr).toBe(0.0312);
    expect(metrics.repetitionRate).toBe(0.9688);
  });

  it('returns identical output for the same text', () => {
    const text = 'Hey, the lantern swings like a pendulum; maybe it was designed that way. Perhaps!';
    const first = computeFlowMetrics(text);
    const second = computeFlowMetrics(text);
    const before = Object.entries(first);
    const after = Object.entries(second);
    expect(after.map(([key]) => key)).toEqual(before.map(([key]) => key));
    before.forEach(([, value], i) => {
      expect(after[i][1]).toBe(value);
    });
  });

  it('keeps scores within 0..1', () => {
    const metrics = computeFlowMetrics('Hey! Oh, wow; ha: ugh - hmm (ah) like as if, as though?');
    for (const score of [metrics.playfulnessScore, metrics.clarityScore, metrics.creativityScore]) {
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
    expect(metrics.playfulnessScore).toBe(1);
  });
});
