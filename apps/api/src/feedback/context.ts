import type { ContextPack, PersonalAnchor } from '@underwriter/shared';

export const truncate = (s: string | null | undefined, maxChars: number): string => {
  if (!s) return '';
  const trimmed = s.trim();
  return trimmed.length <= maxChars ? trimmed : `${trimmed.slice(0, maxChars)}…`;
};

const stringify = (value: unknown): string => {
  try {
    return JSON.stringify(value ?? {}) ?? '{}';
  } catch {
    return '{}';
  }
};

/** Prompt-ready JSON, cut at maxChars. */
export const safeJson = (value: unknown, maxChars = 2000): string =>
  truncate(stringify(value), maxChars);

export const formatPersonalAnchors = (
  anchors: PersonalAnchor[] | undefined,
  maxEach = 400,
  k = 3,
): string => {
  if (!anchors || anchors.length === 0) return '[]';
  const pruned = anchors.slice(0, k).map((a) => ({
    id: a.id ?? null,
    title: a.title ?? null,
    excerpt: truncate(a.excerpt, maxEach),
  }));
  return safeJson(pruned, 1600);
};

export const formatContextHint = (pack: ContextPack | undefined): string => {
  if (!pack) return '';
  const ov = pack.overview ?? {};
  return `(Overview: writings=${ov.writings_count ?? 0}, bursts=${ov.flow_attempts_count ?? 0}, streak=${ov.streak_days ?? 0}d)`;
};
