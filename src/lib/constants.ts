export const MAX_INPUT_LENGTH = 1_000_000;

/** Default maximum length of an action's context snippet */
export const DEFAULT_CONTEXT_WINDOW = 200;

/** Characters inspected before a bare time when looking for ratio cues */
export const TIMESTAMP_CUE_WINDOW = 20;

export const SEVERITY_ORDER = ["critical", "high", "medium", "low"] as const;

export const ACTION_CATEGORIES = [
  "investigation",
  "remediation",
  "communication",
  "status",
] as const;

export const SERVER_NAME = "incident-timeline-extractor";
export const SERVER_VERSION = "0.1.0";
