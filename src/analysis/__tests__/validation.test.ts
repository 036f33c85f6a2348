import { describe, it, expect } from "vitest";
import { InvalidInputError } from "../errors";
import { validateInput } from "../validation";

describe("validateInput", () => {
  it("resolves default options", () => {
    expect(validateInput("hello")).toEqual({
      text: "hello",
      options: { maxInputLength: 1_000_000, contextWindow: 200 },
    });
  });

  it("keeps explicit options", () => {
    const { options } = validateInput("hello", { maxInputLength: 50, contextWindow: 40 });
    expect(options).toEqual({ maxInputLength: 50, contextWindow: 40 });
  });

  it("accepts empty text", () => {
    expect(validateInput("").text).toBe("");
  });

  it("names the received type for non-string text", () => {
    expect(() => validateInput(null)).toThrow("Expected text to be a string, received null");
    expect(() => validateInput(42)).toThrow("Expected text to be a string, received number");
    expect(() => validateInput(undefined)).toThrow(
      "Expected text to be a string, received undefined"
    );
  });

  it("rejects an out-of-range context window", () => {
    expect(() => validateInput("hello", { contextWindow: 5 })).toThrow(InvalidInputError);
    expect(() => validateInput("hello", { contextWindow: 5 })).toThrow(
      /^Invalid options: contextWindow/
    );
  });

  it("rejects unknown option keys", () => {
    const options = { contextWindow: 50, verbose: true };
    expect(() => validateInput("hello", options)).toThrow(/^Invalid options/);
  });

  it("carries the individual issues on the error", () => {
    try {
      validateInput("hello", { maxInputLength: -1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^maxInputLength: /);
      }
    }
  });

  it("rejects text over the limit", () => {
    expect(() => validateInput("x".repeat(11), { maxInputLength: 10 })).toThrow(
      "Text is 11 characters, limit is 10"
    );
    expect(validateInput("x".repeat(10), { maxInputLength: 10 }).text).toHaveLength(10);
  });
});
