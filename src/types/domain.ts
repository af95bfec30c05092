export interface PaperQuery {
  readonly year: number;
  readonly categories: readonly string[];
  readonly keywords: readonly string[];
  readonly maxResults: number;
}

export interface PaperRecord {
  title: string;
  summary: string;
  link: string;
  publishedYear: number;
}

/**
 * Per-year summary that crosses from the paper source into the agent's context.
 * Raw records never leave the adapter.
 */
export interface YearAggregate {
  year: number;
  totalPapers: number;
  agentPapers: number; // always <= totalPapers
  searchError: string | null;
}

export interface YearRange {
  fromYear: number;
  toYear: number;
}

export interface ToolCall {
  callId: string;
  name: string;
  arguments: unknown;
}

export interface ToolResult {
  callId: string;
  payload: string; // compact JSON, or an error description when isError
  isError: boolean;
}

/**
 * Events read off one reasoning-agent response, in block order.
 */
export type AgentEvent =
  | { kind: "local_tool_invocation"; call: ToolCall }
  | {
      kind: "remote_capability_invocation";
      callId: string;
      name: string;
      input: unknown;
      output: string | null;
    }
  | { kind: "terminal_answer"; text: string };

export type StopReason =
  | "tool_requested"
  | "capability_requested"
  | "completed"
  | "token_limit_reached";

export type DispatchOutcome =
  | { kind: "tool_result"; result: ToolResult }
  | { kind: "artifact"; callId: string; text: string | null }
  | { kind: "answer"; text: string | null };

export interface ReportDocument {
  markdown: string;
  generatedAt: Date;
  fallback: boolean;
}
