import type { EntityKind } from "@/analysis/types";

export interface EntityRule {
  kind: EntityKind;
  /** Group 1 is the entity value */
  pattern: RegExp;
}

/** Trailing segments that mark a hyphenated token as a service name */
const SERVICE_SUFFIXES = [
  "service",
  "svc",
  "api",
  "worker",
  "job",
  "daemon",
  "gateway",
  "proxy",
  "server",
  "db",
  "cache",
  "queue",
  "backend",
  "frontend",
];

export const ENTITY_RULES: readonly EntityRule[] = [
  {
    // checkout-service, user_api, payment-service-v2
    kind: "service",
    pattern: new RegExp(
      String.raw`(?<![\w./@-])([a-z][a-z0-9]*(?:[-_][a-z0-9]+)*[-_](?:${SERVICE_SUFFIXES.join("|")})(?:[-_][a-z0-9]+)*)(?![\w@-]|\.[a-z0-9])`
    ),
  },
  {
    // dotted quad, shape only
    kind: "ip",
    pattern: /(?<![\w.])(\d{1,3}(?:\.\d{1,3}){3})(?!\.?\d)(?!\w)/,
  },
  {
    // api.example.com, db01.prod.internal
    kind: "domain",
    pattern:
      /(?<![\w@.-])((?:[a-z0-9](?:[a-z0-9-]*[a-z0-9])?\.)+[a-z]{2,})(?![\w-]|\.[a-z0-9])/i,
  },
];
