import keywords from './keywords.json';

/** The math word list repeats "factor"; each copy counts toward both the hits and the maximum. */
export const MATH_CONFIDENCE = {
  keywords: keywords.math,
  patterns: [
    /\d+\s*[+\-*/^]\s*\d+/,
    /[xy]\s*[+\-*/]\s*\d+/,
    /=/,
    /[xy]\^?\d*/,
    /sin|cos|tan|log|ln|sqrt/,
    /∫|∑|∆|π|θ|α|β|γ/,
  ],
  keywordWeight: 0.3,
  patternWeight: 0.7,
  intentVerbs: ['solve', 'calculate', 'compute', 'equation', 'formula'],
  intentBoost: 0.3,
} as const;

export interface TwoTierConfidenceConfig {
  keywords: readonly string[];
  /** Terms that earn the second boost on top of the keyword boost. */
  focusTerms: readonly string[];
  base: number;
  keywordBoost: number;
  keywordCap: number;
  focusBoost: number;
  focusCap: number;
}

export const PHYSICS_CONFIDENCE: TwoTierConfidenceConfig = {
  keywords: keywords.physics,
  focusTerms: ['formula', 'equation', 'calculate'],
  base: 0.2,
  keywordBoost: 0.3,
  keywordCap: 0.8,
  focusBoost: 0.2,
  focusCap: 1.0,
};

export const BIOLOGY_CONFIDENCE: TwoTierConfidenceConfig = {
  ...PHYSICS_CONFIDENCE,
  keywords: keywords.biology,
  focusTerms: ['cell', 'dna', 'gene', 'protein', 'enzyme'],
};

function containsAny(text: string, terms: readonly string[]): boolean {
  return terms.some((term) => text.includes(term));
}

/** Weighted keyword and pattern hits, normalized by the best possible score, plus an intent boost. */
export function estimateMathConfidence(text: string): number {
  const lower = text.toLowerCase();
  const cfg = MATH_CONFIDENCE;

  const keywordHits = cfg.keywords.filter((keyword) => lower.includes(keyword)).length;
  const patternHits = cfg.patterns.filter((pattern) => pattern.test(lower)).length;

  const score = keywordHits * cfg.keywordWeight + patternHits * cfg.patternWeight;
  const maxScore = cfg.keywords.length * cfg.keywordWeight + cfg.patterns.length * cfg.patternWeight;
  let confidence = maxScore > 0 ? Math.min(score / maxScore, 1) : 0;

  if (containsAny(lower, cfg.intentVerbs)) {
    confidence = Math.min(confidence + cfg.intentBoost, 1);
  }
  return confidence;
}

export function estimateTwoTierConfidence(text: string, cfg: TwoTierConfidenceConfig): number {
  const lower = text.toLowerCase();
  let confidence = cfg.base;

  if (containsAny(lower, cfg.keywords)) {
    confidence = Math.min(confidence + cfg.keywordBoost, cfg.keywordCap);
  }
  if (containsAny(lower, cfg.focusTerms)) {
    confidence = Math.min(confidence + cfg.focusBoost, cfg.focusCap);
  }
  return confidence;
}
