import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod/v4";
import { InvalidInputError } from "@/analysis/errors";
import {
  detectSeverity,
  extractEntities,
  extractTimeline,
  generateSummary,
  identifyActions,
} from "@/analysis/extractors";
import type { ExtractOptions } from "@/analysis/types";
import type { ServerConfig } from "@/lib/config";

type Extractor = (text: string, options?: ExtractOptions) => unknown;

interface ToolDefinition {
  name: string;
  description: string;
  run: Extractor;
}

const INPUT_SCHEMA: Tool["inputSchema"] = {
  type: "object",
  properties: {
    text: {
      type: "string",
      description: "Raw incident text (chat logs, notes, status updates)",
    },
    options: {
      type: "object",
      properties: {
        contextWindow: {
          type: "integer",
          minimum: 20,
          maximum: 10000,
          description: "Maximum length of each action's context snippet",
        },
      },
      additionalProperties: false,
    },
  },
  required: ["text"],
};

export const TOOLS: readonly ToolDefinition[] = [
  {
    name: "extract_timeline",
    description:
      "Extract the chronological timeline from incident text. Returns events " +
      "in order of appearance with timestamp, actor and message.",
    run: extractTimeline,
  },
  {
    name: "identify_actions",
    description:
      "Identify actions taken during incident response, categorized as " +
      "investigation, remediation, communication or status.",
    run: identifyActions,
  },
  {
    name: "extract_entities",
    description:
      "Extract services, IP addresses and domains mentioned in incident text.",
    run: extractEntities,
  },
  {
    name: "detect_severity",
    description:
      "Detect incident severity (critical/high/medium/low/unknown) from " +
      "keywords, with a confidence score and the indicators that matched.",
    run: detectSeverity,
  },
  {
    name: "generate_summary",
    description:
      "Generate a full incident report combining timeline, actions, entities " +
      "and severity, plus a human-readable digest.",
    run: generateSummary,
  },
];

const toolArgsSchema = z.object({
  text: z.string({ error: "text must be a string" }),
  options: z
    .object({
      contextWindow: z.number().int().min(20).max(10_000).optional(),
    })
    .strict()
    .optional(),
});

export function listTools(): Tool[] {
  return TOOLS.map(({ name, description }) => ({
    name,
    description,
    inputSchema: INPUT_SCHEMA,
  }));
}

function errorResult(message: string): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: message }) }],
    isError: true,
  };
}

/**
 * Route a tool call to its extractor and serialize the result as JSON text.
 * Errors are returned as tool results, never thrown to the transport.
 */
export function handleToolCall(
  name: string,
  args: unknown,
  config: ServerConfig
): CallToolResult {
  const tool = TOOLS.find((t) => t.name === name);
  if (!tool) return errorResult(`Unknown tool: ${name}`);

  const parsed = z.safeParse(toolArgsSchema, args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message);
    return errorResult(`Invalid arguments: ${issues.join("; ")}`);
  }

  try {
    const result = tool.run(parsed.data.text, {
      maxInputLength: config.maxInputLength,
      contextWindow: parsed.data.options?.contextWindow ?? config.contextWindow,
    });
    return {
      content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
    };
  } catch (error) {
    if (error instanceof InvalidInputError) {
      return errorResult(error.message);
    }
    console.error(`[Server] Tool ${name} failed:`, error);
    return errorResult(error instanceof Error ? error.message : "Unknown error");
  }
}
