import { z } from "zod/v4";
import { DEFAULT_CONTEXT_WINDOW, MAX_INPUT_LENGTH } from "@/lib/constants";
import { InvalidInputError } from "./errors";
import type { ExtractOptions } from "./types";

const extractOptionsSchema = z
  .object({
    maxInputLength: z.number().int().positive().optional(),
    contextWindow: z.number().int().min(20).max(10_000).optional(),
  })
  .strict();

export interface ResolvedOptions {
  maxInputLength: number;
  contextWindow: number;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.map(String).join(".")}: ${issue.message}`
      : issue.message
  );
}

/**
 * Validate the text argument and options of an extraction call.
 * Throws InvalidInputError for anything that is not a string, for unknown
 * or out-of-range options, and for text over the size limit.
 */
export function validateInput(
  text: unknown,
  options?: ExtractOptions
): { text: string; options: ResolvedOptions } {
  if (typeof text !== "string") {
    const received = text === null ? "null" : typeof text;
    throw new InvalidInputError(`Expected text to be a string, received ${received}`);
  }

  const parsed = z.safeParse(extractOptionsSchema, options ?? {});
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new InvalidInputError(`Invalid options: ${issues.join("; ")}`, issues);
  }

  const resolved: ResolvedOptions = {
    maxInputLength: parsed.data.maxInputLength ?? MAX_INPUT_LENGTH,
    contextWindow: parsed.data.contextWindow ?? DEFAULT_CONTEXT_WINDOW,
  };

  if (text.length > resolved.maxInputLength) {
    throw new InvalidInputError(
      `Text is ${text.length} characters, limit is ${resolved.maxInputLength}`
    );
  }

  return { text, options: resolved };
}
