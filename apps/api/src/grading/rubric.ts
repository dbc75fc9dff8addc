import { z } from 'zod';
import type { RubricScale } from '@underwriter/shared';
import { createFastModel, isLlmConfigured, messageText } from '../lib/openrouter.js';
import { roundTo } from '../metrics/math.js';

export const BANDS = ['4', '3', '2', '1', '0'] as const;
export type Band = (typeof BANDS)[number];

export interface RubricCriterion {
  name: string;
  weight: number;
  descriptorLevels: Record<Band, string>;
}

export interface RubricSchema {
  title: string;
  scale: RubricScale;
  criteria: RubricCriterion[];
}

const EXTRACT_SYSTEM = `You convert teacher rubrics into a clean JSON schema.
- Do not invent criteria that are not present.
- If weights are not explicit, propose reasonable weights that sum to about 1.0.
- Keep descriptor wording concise and faithful.
Output only JSON of this shape:
{
  "title": "string",
  "scale": "0-4" | "0-100",
  "criteria": [
    { "name": "string", "weight": number, "descriptor_levels": { "4": "...", "3": "...", "2": "...", "1": "...", "0": "..." } }
  ]
}
For a 0-100 rubric, map its bands onto 4..0.`;

const weightSchema = z.union([z.number(), z.string()]).transform((v) => {
  const n = Number(v);
  return Number.isFinite(n) ? n : 0;
});

const rawRubricSchema = z.object({
  title: z.string().optional(),
  scale: z.string().nullish(),
  criteria: z.array(z.object({
    name: z.string().min(1),
    weight: weightSchema.optional(),
    descriptor_levels: z.record(z.union([z.string(), z.number(), z.null()])).nullish(),
  })).default([]),
});

const emptyBands = (): Record<Band, string> => ({ '4': '', '3': '', '2': '', '1': '', '0': '' });

export const FALLBACK_RUBRIC: Readonly<RubricSchema> = {
  title: 'Untitled Rubric',
  scale: '0-4',
  criteria: ['Thesis', 'Evidence', 'Organization', 'Style/Mechanics'].map((name) => ({
    name,
    weight: 0.25,
    descriptorLevels: emptyBands(),
  })),
};

const fallbackRubric = (): RubricSchema => ({
  ...FALLBACK_RUBRIC,
  criteria: FALLBACK_RUBRIC.criteria.map((c) => ({ ...c, descriptorLevels: { ...c.descriptorLevels } })),
});

/** Scales weights to sum to 1; an all-zero rubric is left at zero. */
export const normalizeWeights = <T extends { weight: number }>(criteria: T[]): T[] => {
  const total = criteria.reduce((sum, c) => sum + c.weight, 0) || 1;
  return criteria.map((c) => ({ ...c, weight: roundTo(c.weight / total, 4) }));
};

const toScale = (value: string | null | undefined): RubricScale =>
  value === '0-100' ? '0-100' : '0-4';

export const canonicalizeRubric = (raw: unknown): RubricSchema => {
  const parsed = rawRubricSchema.parse(raw);

  const criteria = parsed.criteria.map((c) => {
    const levels = c.descriptor_levels ?? {};
    const descriptorLevels = emptyBands();
    for (const band of BANDS) {
      const level = levels[band];
      // A band the model left null stays empty
      if (level !== undefined && level !== null) descriptorLevels[band] = String(level);
    }
    return { name: c.name, weight: c.weight ?? 0, descriptorLevels };
  });

  return {
    title: parsed.title?.trim() || FALLBACK_RUBRIC.title,
    scale: toScale(parsed.scale),
    criteria: normalizeWeights(criteria),
  };
};

// Strip markdown code fences if present
export const stripCodeFences = (content: string): string =>
  content
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/i, '')
    .trim();

export const extractRubricSchema = async (rubricText: string): Promise<RubricSchema> => {
  if (!isLlmConfigured()) {
    console.warn('[Rubric] No OPEN_ROUTER_API_KEY, returning fallback rubric');
    return fallbackRubric();
  }

  try {
    const model = createFastModel({ temperature: 0.2, maxTokens: 1200 });
    const response = await model.invoke([
      { role: 'system', content: EXTRACT_SYSTEM },
      {
        role: 'user',
        content: `Extract a rubric JSON from the following text. If the scale isn't explicit, prefer '0-4'.\n\nRUBRIC TEXT:\n---\n${rubricText}\n---`,
      },
    ]);

    const json: unknown = JSON.parse(stripCodeFences(messageText(response.content)));
    return canonicalizeRubric(json);
  } catch (err) {
    console.warn('[Rubric] Extraction failed, returning fallback rubric:', (err as Error).message);
    return fallbackRubric();
  }
};
