export { extractTimeline, findTimestamps, matchActorAt } from "./timeline";
export { identifyActions } from "./actions";
export { extractEntities } from "./entities";
export { detectSeverity, confidenceFor } from "./severity";
export { generateSummary } from "./summary";
