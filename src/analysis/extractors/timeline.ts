import type {
  ActorConvention,
  ExtractOptions,
  TimelineEvent,
  TimestampKind,
} from "@/analysis/types";
import { TIMESTAMP_CUE_WINDOW } from "@/lib/constants";
import { isLikelyTimestamp, normalizeActor } from "../context-filter";
import {
  ACTOR_RULES,
  ACTOR_WRAPPER_CLOSE,
  ACTOR_WRAPPER_OPEN,
  TIMESTAMP_RULES,
  globalPattern,
  parseTimestamp,
} from "../patterns";
import { splitLines, windowAround } from "../utils";
import { validateInput } from "../validation";

interface TimestampMatch {
  start: number;
  end: number;
  value: string;
  kind: TimestampKind;
}

interface ActorMatch {
  name: string;
  convention: ActorConvention;
  /** Length of the consumed prefix, including wrapper and separators */
  length: number;
}

/** Separators between a timestamp, an actor and the message */
const LEADING_SEPARATORS = /^[\s:\-|\]),>]+/;

/**
 * Find every accepted timestamp in a line, ordered by column.
 * Rules run in priority order; a match overlapping one already taken
 * by a higher-priority rule is discarded.
 */
export function findTimestamps(line: string): TimestampMatch[] {
  const taken: TimestampMatch[] = [];

  for (const rule of TIMESTAMP_RULES) {
    const regex = globalPattern(rule.pattern);
    let match: RegExpExecArray | null;
    while ((match = regex.exec(line)) !== null) {
      const start = match.index;
      const end = start + match[0].length;

      const overlaps = taken.some((t) => start < t.end && end > t.start);
      if (overlaps) continue;

      const window = windowAround(line, start, end, TIMESTAMP_CUE_WINDOW);
      if (!isLikelyTimestamp(rule.kind, window)) continue;

      taken.push({ start, end, value: match[0], kind: rule.kind });
    }
  }

  return taken.sort((a, b) => a.start - b.start);
}

/**
 * Match an actor convention anchored at the start of `text`.
 * Handles an optional wrapper such as "<@sarah>" or "[@sarah]".
 */
export function matchActorAt(text: string): ActorMatch | null {
  const open = text.match(ACTOR_WRAPPER_OPEN);
  const offset = open ? open[0].length : 0;
  const rest = text.slice(offset);

  for (const rule of ACTOR_RULES) {
    const match = rest.match(rule.pattern);
    if (!match) continue;

    const name = normalizeActor(match[1], rule.convention);
    if (!name) continue;

    let length = offset + match[0].length;
    if (open) {
      const close = text.slice(length).match(ACTOR_WRAPPER_CLOSE);
      if (!close) continue;
      length += close[0].length;
    }

    return { name, convention: rule.convention, length };
  }

  return null;
}

function stripSeparators(text: string): string {
  return text.replace(LEADING_SEPARATORS, "").trim();
}

/**
 * Extract timestamped events from incident text in order of appearance.
 *
 * An actor that opens the line and ends before a timestamp is the author of
 * that event. Otherwise an actor written right after the timestamp is used
 * ("[14:23] Sarah: ..."). The event text is the rest of the line after the
 * timestamp, minus any actor taken from it.
 */
export function extractTimeline(
  text: string,
  options?: ExtractOptions
): TimelineEvent[] {
  const input = validateInput(text, options);
  const events: TimelineEvent[] = [];

  for (const { text: line, lineNumber } of splitLines(input.text)) {
    const timestamps = findTimestamps(line);
    if (timestamps.length === 0) continue;

    const leadingActor = matchActorAt(line);

    for (const ts of timestamps) {
      const remainder = line.slice(ts.end);

      let actor: string | null = null;
      let eventText = stripSeparators(remainder);

      if (leadingActor && leadingActor.length <= ts.start) {
        actor = leadingActor.name;
      } else {
        const afterSeparators = remainder.replace(LEADING_SEPARATORS, "");
        const trailingActor = matchActorAt(afterSeparators);
        if (trailingActor) {
          actor = trailingActor.name;
          eventText = stripSeparators(afterSeparators.slice(trailingActor.length));
        }
      }

      events.push({
        time: ts.value,
        kind: ts.kind,
        timestamp: parseTimestamp(ts.value, ts.kind),
        actor,
        text: eventText,
        line,
        lineNumber,
      });
    }
  }

  return events;
}
