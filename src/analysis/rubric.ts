import { z } from 'zod';
import { AnalysisUnavailableError } from '../core/errors.js';
import type { RiskJudgment } from '../core/types.js';

export interface SeverityScale {
  min: number;
  max: number;
  /** Score meaning "no change between years". */
  baseline: number;
}

export interface Rubric {
  version: string;
  scale: SeverityScale;
  themes: readonly string[];
  guidance: string;
}

export const RISK_THEMES = [
  'strategic',
  'operational',
  'financial',
  'regulatory',
  'legal',
  'market',
  'macroeconomic',
  'technology',
  'cybersecurity',
  'competitive',
  'supply-chain',
  'geopolitical',
] as const;

export const DEFAULT_RUBRIC: Rubric = {
  version: 'risk-drift-v1',
  scale: { min: -5, max: 5, baseline: 0 },
  themes: RISK_THEMES,
  guidance:
    'Score how the current-year passage changes the company\'s disclosed risk relative to the prior-year passage. ' +
    'Positive scores mean risk intensified or new risks appeared, negative scores mean risks were reduced or removed, ' +
    '0 means no material change. Wording, ordering and formatting changes alone score 0.',
};

function themeList() {
  return z
    .array(z.string())
    .default([])
    .transform((labels) => normalizeThemes(labels));
}

export function judgmentSchema(rubric: Rubric) {
  return z.object({
    severityDelta: z.number().finite().min(rubric.scale.min).max(rubric.scale.max),
    addedThemes: themeList(),
    removedThemes: themeList(),
    intensifiedThemes: themeList(),
    rationale: z.string().default(''),
  });
}

export function normalizeThemes(labels: readonly string[]): string[] {
  const out = new Set<string>();
  for (const label of labels) {
    const cleaned = label.trim().toLowerCase().replace(/\s+/g, '-');
    if (cleaned) out.add(cleaned);
  }
  return [...out].sort();
}

/** Validates a provider response against the rubric's shape and score range. */
export function parseJudgment(value: unknown, rubric: Rubric = DEFAULT_RUBRIC): RiskJudgment {
  const parsed = judgmentSchema(rubric).safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new AnalysisUnavailableError(`Judgment does not match rubric ${rubric.version}: ${issues}`);
  }
  return parsed.data;
}
