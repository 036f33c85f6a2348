export type TimestampKind = "iso8601" | "datetime" | "time";
export type ActorConvention = "mention" | "dotted_name" | "name_colon";
export type ActionCategory =
  | "investigation"
  | "remediation"
  | "communication"
  | "status";
export type SeverityTier = "critical" | "high" | "medium" | "low";
export type SeverityLevel = SeverityTier | "unknown";
export type EntityKind = "service" | "ip" | "domain";

export interface TimelineEvent {
  /** Timestamp exactly as it appears in the source */
  time: string;
  kind: TimestampKind;
  /** Epoch ms for full dates (UTC when no offset is given), null for bare times */
  timestamp: number | null;
  actor: string | null;
  text: string;
  /** Full trimmed source line */
  line: string;
  lineNumber: number;
}

export interface Action {
  action: string;
  category: ActionCategory;
  context: string;
  lineNumber: number;
}

export interface EntityBundle {
  services: string[];
  ips: string[];
  domains: string[];
}

export interface SeverityAssessment {
  level: SeverityLevel;
  confidence: number;
  indicators: string[];
}

export interface ReportStats {
  eventCount: number;
  actors: string[];
  actionCounts: Record<ActionCategory, number>;
  entityCounts: { services: number; ips: number; domains: number };
}

export interface Report {
  timeline: TimelineEvent[];
  actions: Action[];
  entities: EntityBundle;
  severity: SeverityAssessment;
  stats: ReportStats;
  summary: string;
}

export interface ExtractOptions {
  /** Reject inputs longer than this many characters */
  maxInputLength?: number;
  /** Maximum length of an action's context snippet */
  contextWindow?: number;
}

/**
 * Text surrounding a raw match, handed to the context filter.
 */
export interface MatchWindow {
  before: string;
  after: string;
}
