export {
  extractTimeline,
  identifyActions,
  extractEntities,
  detectSeverity,
  generateSummary,
} from "./analysis/extractors";
export { InvalidInputError } from "./analysis/errors";
export type {
  Action,
  ActionCategory,
  EntityBundle,
  ExtractOptions,
  Report,
  ReportStats,
  SeverityAssessment,
  SeverityLevel,
  TimelineEvent,
  TimestampKind,
} from "./analysis/types";
