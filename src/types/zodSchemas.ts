import { z } from "zod";

/**
 * Arguments the agent passes to search_and_filter_papers.
 * Numeric strings are accepted for both fields; the JSON schema declared to the agent
 * is derived from this, default included.
 */
export const searchAndFilterArgsSchema = (defaultMaxResults: number) =>
  z.object({
    year: z.coerce
      .number({ required_error: "year is required", invalid_type_error: "year must be an integer" })
      .int()
      .describe("Year to search"),
    max_results: z.coerce
      .number()
      .int()
      .positive()
      .default(defaultMaxResults)
      .describe("Maximum papers to fetch for the year"),
  });

/**
 * stdout of a code-execution result block
 */
export const CodeExecutionOutputSchema = z.object({
  stdout: z.string().default(""),
  stderr: z.string().default(""),
});

export const TextBlockSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

export const ToolUseBlockSchema = z.object({
  type: z.enum(["tool_use", "server_tool_use"]),
  id: z.string(),
  name: z.string(),
  input: z.unknown(),
});

export const ServerToolResultBlockSchema = z.object({
  type: z.string().regex(/code_execution_tool_result$/),
  tool_use_id: z.string(),
  content: z.unknown(),
});
