import type {
  ActorConvention,
  MatchWindow,
  TimestampKind,
} from "@/analysis/types";
import { KNOWN_TLDS, RESERVED_PREFIXES } from "./patterns";

/**
 * Context filtering: each predicate judges one raw match against the text
 * around it. Rejected matches are dropped before anything is materialized.
 */

/** Words that turn a following "H:MM" into a ratio, score or version */
const RATIO_CUE =
  /\b(?:ratios?|rate\s+of|versions?|ver|scaled|odds|score|aspect)\b/i;

/** Words right after an "H:MM" that make it a ratio */
const TRAILING_RATIO_CUE = /^\s*(?:ratios?|odds|aspect|split)\b/i;

/**
 * Accept full-date timestamps unconditionally. Reject a bare time that sits
 * in a ratio/rate context or is glued to a non-time numeric expression.
 */
export function isLikelyTimestamp(
  kind: TimestampKind,
  window: MatchWindow
): boolean {
  if (kind !== "time") return true;

  if (RATIO_CUE.test(window.before)) return false;
  if (TRAILING_RATIO_CUE.test(window.after)) return false;
  if (/[./\d]$/.test(window.before)) return false;
  if (/^(?:[./,]\d|%)/.test(window.after)) return false;

  return true;
}

/**
 * True when the token's last dot-separated label is a known TLD.
 */
export function isDomainLike(token: string): boolean {
  const dot = token.lastIndexOf(".");
  if (dot <= 0 || dot === token.length - 1) return false;
  return KNOWN_TLDS.has(token.slice(dot + 1).toLowerCase());
}

/**
 * Validate and normalize an actor candidate captured by one of the actor
 * conventions. Returns null when the candidate is not a plausible actor.
 */
export function normalizeActor(
  candidate: string,
  convention: ActorConvention
): string | null {
  switch (convention) {
    case "mention": {
      const handle = candidate.replace(/^@/, "").replace(/[.-]+$/, "");
      if (!handle || isDomainLike(handle)) return null;
      return handle;
    }
    case "dotted_name": {
      if (!/^[A-Za-z]+\.[A-Za-z]+$/.test(candidate)) return null;
      if (isDomainLike(candidate)) return null;
      return candidate;
    }
    case "name_colon": {
      const name = candidate.trim();
      const firstWord = name.split(/\s+/)[0].toLowerCase();
      if (RESERVED_PREFIXES.has(name.toLowerCase())) return null;
      if (RESERVED_PREFIXES.has(firstWord)) return null;
      if (isDomainLike(name)) return null;
      return name;
    }
  }
}

const NEGATION =
  /\b(?:not|never|no|without|isn't|wasn't|aren't|weren't|hasn't|haven't|hadn't|didn't|don't|doesn't|won't|can't|couldn't)\s+(?:\w+\s+)?$/i;

/**
 * Reject an action keyword that is part of an identifier
 * (monitoring-service, started_at, /api/updated) or is directly negated.
 */
export function isLikelyAction(window: MatchWindow): boolean {
  if (/[-_/]$|\.$/.test(window.before)) return false;
  if (/^(?:[-_/]|\.\w)/.test(window.after)) return false;
  if (NEGATION.test(window.before)) return false;
  return true;
}

/** Verbs that make a following "down" a phrasal verb rather than an outage */
const PHRASAL_DOWN =
  /\b(?:scaled?|scaling|slow(?:ed|ing)?|shut(?:ting)?|step(?:ped|ping)?|wind(?:ing)?|wound|cool(?:ed|ing)?|turn(?:ed|ing)?|ton(?:e|ed|ing)|narrow(?:ed|ing)?|track(?:ed|ing)?|spin(?:ning)?|spun|calm(?:ed|ing)?)\s+$/i;

/** "down to 200ms", "down by half", "down 5%": a decrease, not an outage */
const QUANTITY_DOWN = /^\s+(?:to|by)\b|^\s*\d/i;

/**
 * Reject a severity indicator that is negated ("no outage") or, for
 * "down", completes a phrasal verb ("scaled down") or reports a decrease.
 */
export function isLikelySeverityIndicator(
  phrase: string,
  window: MatchWindow
): boolean {
  if (NEGATION.test(window.before)) return false;
  if (phrase.toLowerCase() === "down") {
    if (PHRASAL_DOWN.test(window.before)) return false;
    if (QUANTITY_DOWN.test(window.after)) return false;
  }
  return true;
}

/**
 * A domain candidate must end in a known TLD and have at least one
 * non-numeric label before it.
 */
export function isLikelyDomain(candidate: string): boolean {
  if (!isDomainLike(candidate)) return false;
  const labels = candidate.split(".");
  return labels.slice(0, -1).some((label) => /[a-z]/i.test(label));
}
