import type {
  Action,
  ActionCategory,
  EntityBundle,
  ExtractOptions,
  Report,
  ReportStats,
  SeverityAssessment,
  TimelineEvent,
} from "@/analysis/types";
import { ACTION_CATEGORIES } from "@/lib/constants";
import { identifyActions } from "./actions";
import { extractEntities } from "./entities";
import { detectSeverity } from "./severity";
import { extractTimeline } from "./timeline";

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

/**
 * Counts shown in the digest, computed only from extractor output.
 */
function computeStats(
  timeline: TimelineEvent[],
  actions: Action[],
  entities: EntityBundle
): ReportStats {
  const actionCounts: Record<ActionCategory, number> = {
    investigation: 0,
    remediation: 0,
    communication: 0,
    status: 0,
  };
  for (const action of actions) {
    actionCounts[action.category]++;
  }

  const actors: string[] = [];
  for (const event of timeline) {
    if (event.actor && !actors.includes(event.actor)) actors.push(event.actor);
  }

  return {
    eventCount: timeline.length,
    actors,
    actionCounts,
    entityCounts: {
      services: entities.services.length,
      ips: entities.ips.length,
      domains: entities.domains.length,
    },
  };
}

function renderEventTime(event: TimelineEvent): string {
  return event.timestamp !== null ? new Date(event.timestamp).toISOString() : event.time;
}

function renderTimeline(timeline: TimelineEvent[]): string {
  if (timeline.length === 0) return "Timeline: No timestamped events found";

  const first = timeline[0];
  const last = timeline[timeline.length - 1];
  const bothDated = first.timestamp !== null && last.timestamp !== null;
  const from = bothDated ? renderEventTime(first) : first.time;
  const to = bothDated ? renderEventTime(last) : last.time;

  const events = plural(timeline.length, "event");
  return timeline.length === 1
    ? `Timeline: ${events} at ${from}`
    : `Timeline: ${events} from ${from} to ${to}`;
}

function renderSeverity(severity: SeverityAssessment): string {
  if (severity.level === "unknown") {
    return "Severity: UNKNOWN (no indicators found)";
  }
  return (
    `Severity: ${severity.level.toUpperCase()} ` +
    `(confidence ${severity.confidence.toFixed(2)}) - indicators: ${severity.indicators.join(", ")}`
  );
}

/**
 * Render the human-readable digest. Deterministic for identical inputs.
 */
function renderDigest(
  timeline: TimelineEvent[],
  entities: EntityBundle,
  severity: SeverityAssessment,
  stats: ReportStats
): string {
  const lines = ["Incident summary", renderSeverity(severity), renderTimeline(timeline)];

  if (stats.actors.length > 0) {
    lines.push(`Participants: ${stats.actors.join(", ")}`);
  }

  lines.push(
    "Actions: " +
      ACTION_CATEGORIES.map((c) => `${c} ${stats.actionCounts[c]}`).join(", ")
  );

  lines.push(
    `Entities: ${plural(stats.entityCounts.services, "service")}, ` +
      `${plural(stats.entityCounts.ips, "IP")}, ` +
      `${plural(stats.entityCounts.domains, "domain")}`
  );
  if (entities.services.length > 0) lines.push(`Services: ${entities.services.join(", ")}`);
  if (entities.ips.length > 0) lines.push(`IPs: ${entities.ips.join(", ")}`);
  if (entities.domains.length > 0) lines.push(`Domains: ${entities.domains.join(", ")}`);

  return lines.join("\n");
}

/**
 * Run all four extractors over the same text and assemble a report.
 */
export function generateSummary(text: string, options?: ExtractOptions): Report {
  const timeline = extractTimeline(text, options);
  const actions = identifyActions(text, options);
  const entities = extractEntities(text, options);
  const severity = detectSeverity(text, options);

  const stats = computeStats(timeline, actions, entities);

  return {
    timeline,
    actions,
    entities,
    severity,
    stats,
    summary: renderDigest(timeline, entities, severity, stats),
  };
}
