import { z } from 'zod';
import type { PaperSearch } from '../src/ingestion/arxiv.js';
import { renderTrendReport } from '../src/report/render.js';
import type { AgentEvent, PaperQuery, PaperRecord, StopReason, YearAggregate } from '../src/types/domain.js';
import type { AgentRequest, AgentResponse, ConversationTurn, ReasoningAgent } from '../src/utils/llm.js';
import type { Logger } from '../src/utils/logger.js';

export const FIXED_NOW = new Date('2026-03-01T00:00:00.000Z');
export const clock = (): Date => FIXED_NOW;

export function paper(title: string, summary: string, year = 2024): PaperRecord {
  return { title, summary, link: `http://arxiv.org/abs/${year}.0000${title.length}v1`, publishedYear: year };
}

/**
 * In-process paper search: fixed records per year, or a thrown error for failing years.
 */
export class FakePaperSearch implements PaperSearch {
  readonly queries: PaperQuery[] = [];

  constructor(
    private readonly byYear: Record<number, PaperRecord[]>,
    private readonly failures: Record<number, Error> = {},
  ) {}

  async search(query: PaperQuery): Promise<PaperRecord[]> {
    this.queries.push(query);
    const failure = this.failures[query.year];
    if (failure) throw failure;
    return (this.byYear[query.year] ?? []).slice(0, query.maxResults);
  }
}

/**
 * Logger that keeps warnings and errors for assertions; children share the lists.
 */
export class RecordingLogger implements Logger {
  constructor(
    readonly warnings: string[] = [],
    readonly errors: string[] = [],
  ) {}

  error(message: string): void {
    this.errors.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  info(): void {}

  debug(): void {}

  child(): Logger {
    return new RecordingLogger(this.warnings, this.errors);
  }
}

let responseCounter = 0;

export function agentResponse(stopReason: StopReason, events: AgentEvent[]): AgentResponse {
  responseCounter++;
  const text = events
    .map((e) => (e.kind === 'terminal_answer' ? e.text : `[${e.kind}]`))
    .join('\n');
  return {
    id: `msg_test_${responseCounter}`,
    model: 'test-model',
    stopReason,
    events,
    usage: { inputTokens: 100, outputTokens: 20 },
    assistantTurn: { role: 'assistant', content: text || '(no text)' },
  };
}

export function toolCall(callId: string, name: string, args: unknown): AgentEvent {
  return { kind: 'local_tool_invocation', call: { callId, name, arguments: args } };
}

export function answer(text: string): AgentEvent {
  return { kind: 'terminal_answer', text };
}

type Step = (request: AgentRequest) => AgentResponse | Promise<AgentResponse>;

/**
 * Reasoning agent stand-in that plays back one step per request.
 */
export class ScriptedAgent implements ReasoningAgent {
  readonly requests: AgentRequest[] = [];
  private next = 0;

  constructor(private readonly steps: Step[]) {}

  async respond(request: AgentRequest): Promise<AgentResponse> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const step = this.steps[this.next++];
    if (!step) throw new Error(`ScriptedAgent has no step for request ${this.next}`);
    return step(request);
  }
}

const PayloadSchema = z.object({
  year: z.number(),
  total_papers: z.number(),
  agent_papers: z.number(),
  search_error: z.string().nullable(),
});

/**
 * Tool results carried by the last user turn, decoded back into aggregates.
 */
export function aggregatesFromLastTurn(messages: readonly ConversationTurn[]): YearAggregate[] {
  const last = messages[messages.length - 1];
  if (!last || last.role !== 'user' || typeof last.content === 'string') return [];

  const aggregates: YearAggregate[] = [];
  for (const block of last.content) {
    if (block.type !== 'tool_result' || typeof block.content !== 'string' || block.is_error) continue;
    const payload = PayloadSchema.parse(JSON.parse(block.content));
    aggregates.push({
      year: payload.year,
      totalPapers: payload.total_papers,
      agentPapers: payload.agent_papers,
      searchError: payload.search_error,
    });
  }
  return aggregates;
}

/**
 * An agent that asks for every year in one turn, then writes the report from the results.
 */
export function reportWritingAgent(years: number[]): ScriptedAgent {
  return new ScriptedAgent([
    () =>
      agentResponse(
        'tool_requested',
        years.map((year) => toolCall(`toolu_${year}`, 'search_and_filter_papers', { year })),
      ),
    (request) => agentResponse('completed', [answer(renderTrendReport(aggregatesFromLastTurn(request.messages)))]),
  ]);
}
