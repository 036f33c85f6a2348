import { describe, it, expect } from "vitest";
import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({ maxInputLength: 1_000_000, contextWindow: 200 });
  });

  it("reads numeric environment values", () => {
    expect(
      loadConfig({ INCIDENT_MAX_INPUT_LENGTH: "5000", INCIDENT_CONTEXT_WINDOW: "80" })
    ).toEqual({ maxInputLength: 5000, contextWindow: 80 });
  });

  it("treats empty values as unset", () => {
    expect(
      loadConfig({ INCIDENT_MAX_INPUT_LENGTH: "", INCIDENT_CONTEXT_WINDOW: "" })
    ).toEqual({ maxInputLength: 1_000_000, contextWindow: 200 });
  });

  it("rejects non-numeric values", () => {
    expect(() => loadConfig({ INCIDENT_MAX_INPUT_LENGTH: "abc" })).toThrow(
      /^Invalid configuration: INCIDENT_MAX_INPUT_LENGTH/
    );
  });

  it("rejects a context window below the minimum", () => {
    expect(() => loadConfig({ INCIDENT_CONTEXT_WINDOW: "5" })).toThrow(
      /^Invalid configuration: INCIDENT_CONTEXT_WINDOW/
    );
  });
});
