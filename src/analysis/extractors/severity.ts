import type {
  ExtractOptions,
  SeverityAssessment,
  SeverityTier,
} from "@/analysis/types";
import { isLikelySeverityIndicator } from "../context-filter";
import { SEVERITY_RULES, type KeywordPattern } from "../patterns";
import { normalizePhrase, windowAround } from "../utils";
import { validateInput } from "../validation";

const FILTER_WINDOW = 24;

/** Tiers with phrases ordered longest first */
const TIERS = SEVERITY_RULES.map((rule) => ({
  category: rule.category,
  phrases: [...rule.phrases].sort((a, b) => b.phrase.length - a.phrase.length),
}));

interface IndicatorHit {
  phrase: string;
  start: number;
  end: number;
}

/**
 * Map a count of distinct indicators onto [0, 1).
 * 1 -> 0.5, 2 -> 0.667, 3 -> 0.75, ...
 */
export function confidenceFor(indicatorCount: number): number {
  if (indicatorCount <= 0) return 0;
  return 1 - 1 / (indicatorCount + 1);
}

/**
 * Match one tier's phrases against the text. Longer phrases claim their
 * span first so "service down" is not counted again as "down".
 */
function matchTier(text: string, phrases: readonly KeywordPattern[]): IndicatorHit[] {
  const hits: IndicatorHit[] = [];

  for (const { phrase, pattern: regex } of phrases) {
    regex.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
      const start = match.index;
      const end = start + match[0].length;
      if (hits.some((h) => start >= h.start && end <= h.end)) continue;
      if (!isLikelySeverityIndicator(phrase, windowAround(text, start, end, FILTER_WINDOW))) {
        continue;
      }
      hits.push({ phrase, start, end });
    }
  }

  return hits.sort((a, b) => a.start - b.start);
}

/**
 * Assess incident severity from keyword tiers. The highest-priority tier
 * with any surviving indicator wins; no match at all yields "unknown".
 */
export function detectSeverity(
  text: string,
  options?: ExtractOptions
): SeverityAssessment {
  const input = validateInput(text, options);

  for (const rule of TIERS) {
    const hits = matchTier(input.text, rule.phrases);
    if (hits.length === 0) continue;

    const indicators: string[] = [];
    for (const hit of hits) {
      const phrase = normalizePhrase(hit.phrase);
      if (!indicators.includes(phrase)) indicators.push(phrase);
    }

    return assessment(rule.category, indicators);
  }

  return { level: "unknown", confidence: 0, indicators: [] };
}

function assessment(level: SeverityTier, indicators: string[]): SeverityAssessment {
  return { level, confidence: confidenceFor(indicators.length), indicators };
}
