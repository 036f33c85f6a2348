import type { Action, ExtractOptions } from "@/analysis/types";
import { isLikelyAction } from "../context-filter";
import { ACTION_RULES, type KeywordPattern } from "../patterns";
import {
  normalizePhrase,
  snippetAround,
  splitLines,
  windowAround,
} from "../utils";
import { validateInput } from "../validation";

/** Characters of context handed to the action filter on each side */
const FILTER_WINDOW = 24;

interface KeywordHit {
  phrase: string;
  start: number;
  end: number;
}

/**
 * Earliest keyword from `phrases` in the segment that survives context
 * filtering, or null.
 */
function firstHit(
  segment: string,
  phrases: readonly KeywordPattern[]
): KeywordHit | null {
  let best: KeywordHit | null = null;

  for (const { pattern: regex } of phrases) {
    regex.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = regex.exec(segment)) !== null) {
      const start = match.index;
      const end = start + match[0].length;
      if (best && start >= best.start) break;
      if (!isLikelyAction(windowAround(segment, start, end, FILTER_WINDOW))) continue;
      best = { phrase: match[0], start, end };
      break;
    }
  }

  return best;
}

/**
 * Tag each line with the action categories whose keywords it contains.
 * A line mentioning several categories yields one Action per category.
 */
export function identifyActions(text: string, options?: ExtractOptions): Action[] {
  const input = validateInput(text, options);
  const actions: Action[] = [];

  for (const { text: segment, lineNumber } of splitLines(input.text)) {
    for (const rule of ACTION_RULES) {
      const hit = firstHit(segment, rule.phrases);
      if (!hit) continue;

      actions.push({
        action: normalizePhrase(hit.phrase),
        category: rule.category,
        context: snippetAround(segment, hit.start, hit.end, input.options.contextWindow),
        lineNumber,
      });
    }
  }

  return actions;
}
