import Anthropic from "@anthropic-ai/sdk";
import type { ToolDeclaration } from "../orchestrator/tools/index.js";
import type { AgentEvent, StopReason } from "../types/domain.js";
import {
  CodeExecutionOutputSchema,
  ServerToolResultBlockSchema,
  TextBlockSchema,
  ToolUseBlockSchema,
} from "../types/zodSchemas.js";
import { AgentTransportError } from "./errors.js";
import type { Logger } from "./logger.js";
import { classifyFailure, errorMessage } from "./resilience.js";

export type ConversationTurn = Anthropic.Beta.Messages.BetaMessageParam;
type BetaTool = Anthropic.Beta.Messages.BetaToolUnion;

export interface AgentRequest {
  system?: string;
  messages: readonly ConversationTurn[];
  tools: readonly ToolDeclaration[];
  maxTokens: number;
}

export interface AgentResponse {
  id: string;
  model: string;
  stopReason: StopReason;
  events: AgentEvent[];
  usage: { inputTokens: number; outputTokens: number };
  /** Appended to the conversation as-is; server tool blocks must be sent back unchanged */
  assistantTurn: ConversationTurn;
}

/**
 * The reasoning agent as an opaque request/response service.
 */
export interface ReasoningAgent {
  respond(request: AgentRequest): Promise<AgentResponse>;
}

/**
 * The parts of a Messages API response the event mapping reads.
 */
export interface RawAgentMessage {
  id: string;
  model: string;
  stop_reason: string | null;
  content: readonly unknown[];
  usage: { input_tokens: number; output_tokens: number };
}

export function toStopReason(raw: string | null): StopReason {
  switch (raw) {
    case "tool_use":
      return "tool_requested";
    case "pause_turn":
      return "capability_requested";
    case "max_tokens":
    case "model_context_window_exceeded":
      return "token_limit_reached";
    default:
      // end_turn, stop_sequence, refusal
      return "completed";
  }
}

function codeExecutionOutput(content: unknown): string | null {
  const parsed = CodeExecutionOutputSchema.safeParse(content);
  if (!parsed.success) return null;
  const stdout = parsed.data.stdout.trim();
  return stdout.length > 0 ? stdout : null;
}

/**
 * Maps response blocks, in order, onto agent events. Server tool results are folded into
 * the invocation they answer.
 */
export function toEvents(content: readonly unknown[]): AgentEvent[] {
  const outputs = new Map<string, string | null>();
  for (const block of content) {
    const result = ServerToolResultBlockSchema.safeParse(block);
    if (result.success) {
      outputs.set(result.data.tool_use_id, codeExecutionOutput(result.data.content));
    }
  }

  const events: AgentEvent[] = [];
  for (const block of content) {
    const text = TextBlockSchema.safeParse(block);
    if (text.success) {
      events.push({ kind: "terminal_answer", text: text.data.text });
      continue;
    }

    const use = ToolUseBlockSchema.safeParse(block);
    if (!use.success) continue;

    const { id, name, input } = use.data;
    if (use.data.type === "tool_use") {
      events.push({ kind: "local_tool_invocation", call: { callId: id, name, arguments: input } });
    } else {
      events.push({
        kind: "remote_capability_invocation",
        callId: id,
        name,
        input,
        output: outputs.get(id) ?? null,
      });
    }
  }
  return events;
}

export function toBetaTools(declarations: readonly ToolDeclaration[]): BetaTool[] {
  return declarations.map((declaration): BetaTool => {
    if (declaration.kind === "remote") {
      return { type: "code_execution_20250825", name: "code_execution" };
    }
    return {
      name: declaration.name,
      description: declaration.description,
      input_schema: { ...declaration.inputSchema, type: "object" },
    };
  });
}

export function toAgentResponse(message: RawAgentMessage, assistantTurn: ConversationTurn): AgentResponse {
  return {
    id: message.id,
    model: message.model,
    stopReason: toStopReason(message.stop_reason),
    events: toEvents(message.content),
    usage: { inputTokens: message.usage.input_tokens, outputTokens: message.usage.output_tokens },
    assistantTurn,
  };
}

export interface AnthropicAgentOptions {
  apiKey: string;
  model: string;
  /** Beta flags; code execution needs its own */
  betas: readonly string[];
  timeoutMs: number;
  client?: Anthropic;
}

/**
 * Beta Messages API client. One attempt per request: the SDK's own retries are off.
 */
export class AnthropicAgent implements ReasoningAgent {
  private readonly client: Anthropic;

  constructor(
    private readonly options: AnthropicAgentOptions,
    private readonly logger: Logger,
  ) {
    this.client =
      options.client ?? new Anthropic({ apiKey: options.apiKey, maxRetries: 0, timeout: options.timeoutMs });
  }

  async respond(request: AgentRequest): Promise<AgentResponse> {
    const started = Date.now();
    let message: Anthropic.Beta.Messages.BetaMessage;
    try {
      message = await this.client.beta.messages.create({
        model: this.options.model,
        max_tokens: request.maxTokens,
        system: request.system,
        messages: [...request.messages],
        tools: toBetaTools(request.tools),
        betas: [...this.options.betas],
      });
    } catch (err) {
      const status = err instanceof Anthropic.APIError ? err.status : undefined;
      throw new AgentTransportError(
        `Reasoning agent request failed (${classifyFailure(err)}): ${errorMessage(err)}`,
        status,
        { cause: err },
      );
    }

    this.logger.info(
      `Response ${message.id} from ${message.model} in ${((Date.now() - started) / 1000).toFixed(2)}s (stop_reason: ${message.stop_reason ?? "none"})`,
    );
    return toAgentResponse(message, { role: "assistant", content: message.content });
  }
}
