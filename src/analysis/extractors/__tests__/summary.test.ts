import { describe, it, expect } from "vitest";
import { InvalidInputError } from "@/analysis/errors";
import { identifyActions } from "../actions";
import { extractEntities } from "../entities";
import { detectSeverity } from "../severity";
import { generateSummary } from "../summary";
import { extractTimeline } from "../timeline";

const INCIDENT = [
  "@sarah 14:23: payment-service down, error rate at 15%",
  "@mike 14:25: rolling back deploy",
  "@sarah 14:30: service restored",
].join("\n");

describe("generateSummary", () => {
  it("renders the digest for a chat transcript", () => {
    const report = generateSummary(INCIDENT);

    expect(report.summary).toBe(
      [
        "Incident summary",
        "Severity: CRITICAL (confidence 0.50) - indicators: service down",
        "Timeline: 3 events from 14:23 to 14:30",
        "Participants: sarah, mike",
        "Actions: investigation 0, remediation 1, communication 0, status 1",
        "Entities: 1 service, 0 IPs, 0 domains",
        "Services: payment-service",
      ].join("\n")
    );
  });

  it("embeds the same results the individual extractors return", () => {
    const report = generateSummary(INCIDENT);

    expect(report.timeline).toEqual(extractTimeline(INCIDENT));
    expect(report.actions).toEqual(identifyActions(INCIDENT));
    expect(report.entities).toEqual(extractEntities(INCIDENT));
    expect(report.severity).toEqual(detectSeverity(INCIDENT));
  });

  it("derives stats from the extractor output", () => {
    const { stats, timeline, actions, entities } = generateSummary(INCIDENT);

    expect(stats.eventCount).toBe(timeline.length);
    expect(stats.actors).toEqual(["sarah", "mike"]);
    expect(stats.actionCounts).toEqual({
      investigation: 0,
      remediation: 1,
      communication: 0,
      status: 1,
    });
    expect(stats.actionCounts.remediation + stats.actionCounts.status).toBe(actions.length);
    expect(stats.entityCounts).toEqual({
      services: entities.services.length,
      ips: entities.ips.length,
      domains: entities.domains.length,
    });
  });

  it("reports the absence of everything for empty text", () => {
    const report = generateSummary("");

    expect(report.summary).toBe(
      [
        "Incident summary",
        "Severity: UNKNOWN (no indicators found)",
        "Timeline: No timestamped events found",
        "Actions: investigation 0, remediation 0, communication 0, status 0",
        "Entities: 0 services, 0 IPs, 0 domains",
      ].join("\n")
    );
    expect(report.stats.actors).toEqual([]);
  });

  it("renders full dates as ISO instants", () => {
    const { summary } = generateSummary(
      "2024-01-15T14:23:00Z @sarah: outage declared\n2024-01-15T15:05:00Z @mike: resolved"
    );

    expect(summary.split("\n")[2]).toBe(
      "Timeline: 2 events from 2024-01-15T14:23:00.000Z to 2024-01-15T15:05:00.000Z"
    );
  });

  it("uses the singular form for a single event", () => {
    const { summary } = generateSummary("Alert fired 14:23");
    expect(summary.split("\n")[2]).toBe("Timeline: 1 event at 14:23");
  });

  it("lists IPs and domains when present", () => {
    const { summary } = generateSummary("blocked 10.0.0.5 in front of api.example.com");
    const lines = summary.split("\n");

    expect(lines).toContain("Entities: 0 services, 1 IP, 1 domain");
    expect(lines).toContain("IPs: 10.0.0.5");
    expect(lines).toContain("Domains: api.example.com");
  });

  it("is deterministic for identical input", () => {
    expect(generateSummary(INCIDENT)).toEqual(generateSummary(INCIDENT));
  });

  it("rejects text over the size limit", () => {
    expect(() => generateSummary("x".repeat(30), { maxInputLength: 10 })).toThrow(
      InvalidInputError
    );
  });
});
