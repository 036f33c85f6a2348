import { z } from "zod/v4";
import { DEFAULT_CONTEXT_WINDOW, MAX_INPUT_LENGTH } from "@/lib/constants";

export interface ServerConfig {
  maxInputLength: number;
  contextWindow: number;
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  INCIDENT_MAX_INPUT_LENGTH: positiveInt(MAX_INPUT_LENGTH),
  INCIDENT_CONTEXT_WINDOW: positiveInt(DEFAULT_CONTEXT_WINDOW).pipe(
    z.number().min(20).max(10_000)
  ),
});

/**
 * Read server configuration from environment variables.
 * Unset or empty variables fall back to the defaults in constants.ts.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = z.safeParse(envSchema, {
    INCIDENT_MAX_INPUT_LENGTH: env.INCIDENT_MAX_INPUT_LENGTH || undefined,
    INCIDENT_CONTEXT_WINDOW: env.INCIDENT_CONTEXT_WINDOW || undefined,
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    maxInputLength: result.data.INCIDENT_MAX_INPUT_LENGTH,
    contextWindow: result.data.INCIDENT_CONTEXT_WINDOW,
  };
}
