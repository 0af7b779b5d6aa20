import type { AnalysisProvider, AnalysisRequest } from '../analysis/provider.js';
import type { RiskJudgment } from '../core/types.js';

const THEME_KEYWORDS: Record<string, string[]> = {
  strategic: ['strategy', 'acquisition', 'integration'],
  operational: ['operations', 'disruption', 'outage'],
  financial: ['liquidity', 'indebtedness', 'credit'],
  regulatory: ['regulation', 'regulatory', 'compliance'],
  legal: ['litigation', 'lawsuit', 'liability'],
  market: ['volatility', 'demand', 'pricing'],
  macroeconomic: ['inflation', 'interest rate', 'recession'],
  technology: ['artificial intelligence', 'software', 'technology'],
  cybersecurity: ['cybersecurity', 'breach', 'ransomware'],
  competitive: ['competition', 'competitor', 'competitive'],
  'supply-chain': ['supply chain', 'supplier', 'shortage'],
  geopolitical: ['tariff', 'sanctions', 'war'],
};

const THEME_PATTERNS: Array<[string, RegExp[]]> = Object.entries(THEME_KEYWORDS).map(
  ([theme, words]) => [
    theme,
    words.map((w) => new RegExp(`\\b${w.replace(/\s+/g, '\\s+')}s?\\b`, 'gi')),
  ]
);

export function themeCounts(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const [theme, patterns] of THEME_PATTERNS) {
    let n = 0;
    for (const pattern of patterns) n += text.match(pattern)?.length ?? 0;
    if (n > 0) counts.set(theme, n);
  }
  return counts;
}

/**
 * Keyword-count judge used for dry runs: no network, same inputs always give
 * the same judgment.
 */
export class LexicalAnalysisProvider implements AnalysisProvider {
  readonly name = 'lexical';

  async judge(request: AnalysisRequest): Promise<RiskJudgment> {
    const before = themeCounts(request.priorText);
    const after = themeCounts(request.currentText);

    const added: string[] = [];
    const removed: string[] = [];
    const intensified: string[] = [];
    let reduced = 0;

    for (const theme of Object.keys(THEME_KEYWORDS)) {
      const b = before.get(theme) ?? 0;
      const a = after.get(theme) ?? 0;
      if (a > 0 && b === 0) added.push(theme);
      else if (b > 0 && a === 0) removed.push(theme);
      else if (a > b) intensified.push(theme);
      else if (a < b) reduced++;
    }

    const { min, max } = request.rubric.scale;
    const raw = added.length - removed.length + 0.5 * (intensified.length - reduced);
    const severityDelta = Math.min(max, Math.max(min, raw));

    const parts: string[] = [];
    if (added.length > 0) parts.push(`New emphasis on ${added.join(', ')}.`);
    if (removed.length > 0) parts.push(`No longer discusses ${removed.join(', ')}.`);
    if (intensified.length > 0) parts.push(`More frequent mention of ${intensified.join(', ')}.`);

    return {
      severityDelta,
      addedThemes: added,
      removedThemes: removed,
      intensifiedThemes: intensified,
      rationale: parts.join(' '),
    };
  }
}
