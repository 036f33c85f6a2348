import type { ActorConvention } from "@/analysis/types";

export interface ActorRule {
  convention: ActorConvention;
  /**
   * Anchored at the start of the text under test. Group 1 is the name,
   * the full match includes the convention's punctuation.
   */
  pattern: RegExp;
}

/**
 * Actor naming conventions in priority order.
 * Names with lowercase particles ("de", "von", "van") are not captured.
 */
export const ACTOR_RULES: readonly ActorRule[] = [
  // @sarah, @mike.jones, @john-smith
  { convention: "mention", pattern: /^@([\w.-]+):?/ },
  // mike.jones:
  { convention: "dotted_name", pattern: /^([A-Za-z]+\.[A-Za-z]+):(?!\d)/ },
  // Sarah:, Mike Jones:
  { convention: "name_colon", pattern: /^([A-Z][a-z]+(?: [A-Z][a-z]+)?):(?=\s|$)/ },
];

/** Optional wrapper around a line-leading actor, e.g. "[sarah]" or "<Mike:>" */
export const ACTOR_WRAPPER_OPEN = /^[[<(]\s*/;
export const ACTOR_WRAPPER_CLOSE = /^\s*[\]>)]/;
