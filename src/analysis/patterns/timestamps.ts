import type { TimestampKind } from "@/analysis/types";

export interface TimestampRule {
  kind: TimestampKind;
  /** Source pattern; scanners compile their own global RegExp from it */
  pattern: RegExp;
}

/**
 * Timestamp recognizers, most specific first. A match from a later rule
 * that overlaps an earlier rule's match is discarded by the scanner.
 */
export const TIMESTAMP_RULES: readonly TimestampRule[] = [
  {
    // 2024-01-15T14:23:00Z, 2024-01-15T14:23:00.123+02:00, 2024-01-15T14:23
    kind: "iso8601",
    pattern:
      /\b\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?(?!\w|:\d)/,
  },
  {
    // 2024-01-15 14:23 or 2024-01-15 14:23:45
    kind: "datetime",
    pattern: /\b\d{4}-\d{2}-\d{2}\s+\d{2}:\d{2}(?::\d{2})?(?!:\d)\b/,
  },
  {
    // 14:23, 14:23:45 or 2:30pm, never a port, version tag or multi-part reference
    kind: "time",
    pattern:
      /(?<![\w:.])(?:[01]?\d|2[0-3]):[0-5]\d(?::[0-5]\d)?(?!:\d)(?:\s?[AaPp][Mm])?\b/,
  },
];

/**
 * Build a fresh global copy of a rule's pattern so that scans never
 * share lastIndex state between calls.
 */
export function globalPattern(pattern: RegExp): RegExp {
  const flags = pattern.flags.includes("g") ? pattern.flags : pattern.flags + "g";
  return new RegExp(pattern.source, flags);
}

/**
 * Parse a full-date timestamp into epoch milliseconds.
 * Bare times carry no date and always return null.
 */
export function parseTimestamp(raw: string, kind: TimestampKind): number | null {
  if (kind === "time") return null;

  let iso = raw.replace(/\s+/, "T").replace(/([+-]\d{2})(\d{2})$/, "$1:$2");
  if (!/(?:Z|[+-]\d{2}:?\d{2})$/.test(iso)) iso += "Z";
  const ts = Date.parse(iso);
  return isNaN(ts) ? null : ts;
}
