import type { EntityBundle, EntityKind, ExtractOptions } from "@/analysis/types";
import { isLikelyDomain } from "../context-filter";
import { ENTITY_RULES, globalPattern } from "../patterns";
import { validateInput } from "../validation";

const ACCEPT: Record<EntityKind, (value: string) => boolean> = {
  service: () => true,
  ip: () => true,
  domain: isLikelyDomain,
};

/**
 * Collect all matches of one entity rule, lowercased where case carries no
 * meaning, deduplicated in order of first appearance.
 */
function scan(text: string, kind: EntityKind, pattern: RegExp): string[] {
  const seen = new Set<string>();
  const regex = globalPattern(pattern);
  let match: RegExpExecArray | null;

  while ((match = regex.exec(text)) !== null) {
    const value = match[1].toLowerCase();
    if (!ACCEPT[kind](value)) continue;
    seen.add(value);
  }

  return Array.from(seen);
}

/**
 * Find service names, IPv4 addresses and domains mentioned in the text.
 * IPs are matched by shape only; no range validation.
 */
export function extractEntities(text: string, options?: ExtractOptions): EntityBundle {
  const input = validateInput(text, options);
  const bundle: EntityBundle = { services: [], ips: [], domains: [] };

  for (const rule of ENTITY_RULES) {
    const values = scan(input.text, rule.kind, rule.pattern);
    switch (rule.kind) {
      case "service":
        bundle.services = values;
        break;
      case "ip":
        bundle.ips = values;
        break;
      case "domain":
        bundle.domains = values;
        break;
    }
  }

  return bundle;
}
