interface EnhancementRule {
  keywords: string[];
  prefix: string;
}

// Checked in order; the first rule whose keyword appears in the feedback wins.
const ENHANCEMENT_RULES: ReadonlyArray<EnhancementRule> = [
  { keywords: ['specific'], prefix: 'Detailed information about:' },
  { keywords: ['context', 'relevant'], prefix: 'Comprehensive explanation of:' },
  { keywords: ['recent', 'current'], prefix: 'Current and up-to-date information about:' },
  { keywords: ['faithfulness', 'hallucination'], prefix: 'Factual and verified information about:' },
];

const FALLBACK_PREFIX = 'Complete guide to:';

/**
 * Rewrites a query using the grader's improvement feedback. Keyword templates
 * only; the same inputs always give the same query.
 */
export function enhanceQuery(originalQuery: string, improvementReason: string): string {
  const feedback = improvementReason.toLowerCase();
  const rule = ENHANCEMENT_RULES.find(candidate =>
    candidate.keywords.some(keyword => feedback.includes(keyword))
  );
  return `${rule ? rule.prefix : FALLBACK_PREFIX} ${originalQuery}`;
}
