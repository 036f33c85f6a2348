import type { MatchWindow } from "@/analysis/types";

export interface SourceLine {
  /** Trimmed line content */
  text: string;
  lineNumber: number;
}

/**
 * Split raw text into trimmed, non-empty lines with their 1-based numbers.
 */
export function splitLines(text: string): SourceLine[] {
  const lines: SourceLine[] = [];
  text.split(/\r?\n/).forEach((raw, index) => {
    const trimmed = raw.trim();
    if (trimmed) lines.push({ text: trimmed, lineNumber: index + 1 });
  });
  return lines;
}

/**
 * Cut the text around a match into a bounded before/after window.
 */
export function windowAround(
  text: string,
  start: number,
  end: number,
  size: number
): MatchWindow {
  return {
    before: text.slice(Math.max(0, start - size), start),
    after: text.slice(end, end + size),
  };
}

/**
 * Return a snippet of at most `size` characters centred on a match.
 * Cut ends are marked with "...".
 */
export function snippetAround(
  line: string,
  start: number,
  end: number,
  size: number
): string {
  if (line.length <= size) return line;

  const matchLength = end - start;
  const slack = Math.max(0, size - matchLength);
  let from = Math.max(0, start - Math.floor(slack / 2));
  const to = Math.min(line.length, from + Math.max(size, matchLength));
  from = Math.max(0, to - Math.max(size, matchLength));

  const prefix = from > 0 ? "..." : "";
  const suffix = to < line.length ? "..." : "";
  return prefix + line.slice(from, to).trim() + suffix;
}

/** Collapse whitespace and lowercase a matched phrase */
export function normalizePhrase(phrase: string): string {
  return phrase.trim().replace(/\s+/g, " ").toLowerCase();
}
