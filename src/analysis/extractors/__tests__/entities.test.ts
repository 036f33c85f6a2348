import { describe, it, expect } from "vitest";
import { extractEntities } from "../entities";

describe("extractEntities", () => {
  it("deduplicates repeated service names", () => {
    const { services } = extractEntities(
      "payment-service down. payment-service still down. checkout-service ok"
    );
    expect(services).toEqual(["payment-service", "checkout-service"]);
  });

  it("recognizes several service naming styles", () => {
    const { services } = extractEntities(
      "user_api and auth-worker-2 restarted; not a service: rolling-back"
    );
    expect(services).toEqual(["user_api", "auth-worker-2"]);
  });

  it("collects IPv4 addresses by shape", () => {
    const { ips } = extractEntities(
      "Blocked 10.0.0.5 and 192.168.1.10, again 10.0.0.5:8080, odd 999.999.999.999"
    );
    expect(ips).toEqual(["10.0.0.5", "192.168.1.10", "999.999.999.999"]);
  });

  it("ignores version strings and longer dotted numbers", () => {
    expect(extractEntities("version 1.2.3 and oid 1.2.3.4.5").ips).toEqual([]);
  });

  it("collects domains with known suffixes, lowercased", () => {
    const { domains } = extractEntities(
      "Errors from api.example.com and CDN.Example.NET; see notes.txt and https://status.example.io/incidents"
    );
    expect(domains).toEqual(["api.example.com", "cdn.example.net", "status.example.io"]);
  });

  it("does not report shell scripts as domains", () => {
    expect(extractEntities("ran deploy.sh against api.example.com").domains).toEqual([
      "api.example.com",
    ]);
  });

  it("does not take domains out of email addresses", () => {
    expect(extractEntities("contact ops@example.com").domains).toEqual([]);
  });

  it("does not cross-reference entity kinds", () => {
    const bundle = extractEntities("resolving payment-service.internal");
    expect(bundle).toEqual({
      services: [],
      ips: [],
      domains: ["payment-service.internal"],
    });
  });

  it("returns empty lists for blank input", () => {
    expect(extractEntities("   ")).toEqual({ services: [], ips: [], domains: [] });
  });
});
