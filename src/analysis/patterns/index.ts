export { TIMESTAMP_RULES, globalPattern, parseTimestamp } from "./timestamps";
export type { TimestampRule } from "./timestamps";
export { ACTOR_RULES, ACTOR_WRAPPER_OPEN, ACTOR_WRAPPER_CLOSE } from "./actors";
export type { ActorRule } from "./actors";
export { ENTITY_RULES } from "./entities";
export type { EntityRule } from "./entities";
export {
  ACTION_RULES,
  SEVERITY_RULES,
  RESERVED_PREFIXES,
  KNOWN_TLDS,
  phrasePattern,
} from "./keywords";
export type { KeywordPattern, KeywordRule } from "./keywords";
