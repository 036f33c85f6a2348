import type { ActionCategory, SeverityTier } from "@/analysis/types";
import { ACTION_CATEGORIES, SEVERITY_ORDER } from "@/lib/constants";
import keywords from "./keywords.json";

export interface KeywordPattern {
  phrase: string;
  /** Global and case-insensitive; reset lastIndex before each scan */
  pattern: RegExp;
}

export interface KeywordRule<C extends string> {
  category: C;
  phrases: readonly KeywordPattern[];
}

function compilePhrases(phrases: readonly string[]): readonly KeywordPattern[] {
  return Object.freeze(phrases.map((phrase) => ({ phrase, pattern: phrasePattern(phrase) })));
}

/**
 * Action keyword sets in fixed category order.
 */
export const ACTION_RULES: readonly KeywordRule<ActionCategory>[] =
  ACTION_CATEGORIES.map((category) => ({
    category,
    phrases: compilePhrases(keywords.actions[category]),
  }));

/**
 * Severity keyword tiers, highest priority first.
 */
export const SEVERITY_RULES: readonly KeywordRule<SeverityTier>[] =
  SEVERITY_ORDER.map((category) => ({
    category,
    phrases: compilePhrases(keywords.severity[category]),
  }));

/** Generic line prefixes that look like "Name:" but never name an actor */
export const RESERVED_PREFIXES: ReadonlySet<string> = new Set(
  keywords.reservedPrefixes
);

/** Final labels accepted as domain suffixes */
export const KNOWN_TLDS: ReadonlySet<string> = new Set(keywords.tlds);

/**
 * Compile a keyword phrase into a case-insensitive whole-word pattern.
 * Internal spaces match any run of whitespace.
 */
export function phrasePattern(phrase: string): RegExp {
  const body = phrase
    .trim()
    .split(/\s+/)
    .map((word) => word.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"))
    .join("\\s+");
  return new RegExp(`\\b${body}\\b`, "gi");
}
