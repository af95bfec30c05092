import type { ToolResult } from "../types/domain.js";
import type { Logger } from "../utils/logger.js";
import type { ConversationTurn, ReasoningAgent } from "../utils/llm.js";
import type { ToolDispatcher } from "./dispatcher.js";
import type { ToolRegistry } from "./tools/index.js";

export interface ConversationOptions {
    instruction: string;
    system?: string;
    maxTurns: number;
    /** Output-token ceiling per request */
    maxTokens: number;
}

export type Termination = "completed" | "token_limit" | "turn_limit";

export interface ConversationOutcome {
    markdown: string | null;
    termination: Termination;
    turns: number;
}

function toolResultTurn(results: readonly ToolResult[]): ConversationTurn {
    return {
        role: "user",
        content: results.map((result) => ({
            type: "tool_result" as const,
            tool_use_id: result.callId,
            content: result.payload,
            is_error: result.isError,
        })),
    };
}

/**
 * Text from a turn that asked for tools counts as a report only when it carries a
 * markdown heading or a fenced block; anything else is narration.
 */
export function looksLikeReport(text: string): boolean {
    return /^#{1,6} /m.test(text) || text.includes("```");
}

function fenced(text: string): string {
    return `\`\`\`text\n${text}\n\`\`\``;
}

/**
 * Conversation Driver: one sequential exchange with the reasoning agent.
 *
 * Each turn consumes one response, dispatches its events in order and sends every tool
 * result back before asking for the next response. Transport errors propagate.
 */
export class ConversationDriver {
    constructor(
        private readonly agent: ReasoningAgent,
        private readonly registry: ToolRegistry,
        private readonly dispatcher: ToolDispatcher,
        private readonly logger: Logger,
    ) {}

    async run(options: ConversationOptions): Promise<ConversationOutcome> {
        const history: ConversationTurn[] = [{ role: "user", content: options.instruction }];
        const tools = this.registry.declarations();

        let latestAnswer: string | null = null;
        let latestArtifact: string | null = null;

        this.logger.info(`Starting conversation (max_turns: ${options.maxTurns}, max_tokens: ${options.maxTokens})`);
        this.logger.debug(`Initial prompt:\n${options.instruction}`);

        for (let turn = 1; turn <= options.maxTurns; turn++) {
            this.logger.info(`Turn ${turn}: sending ${history.length} messages`);

            const response = await this.agent.respond({
                system: options.system,
                messages: history,
                tools,
                maxTokens: options.maxTokens,
            });
            history.push(response.assistantTurn);

            this.logger.info(
                `Turn ${turn}: stop_reason=${response.stopReason}, tokens in/out ${response.usage.inputTokens}/${response.usage.outputTokens}, events [${response.events.map((e) => e.kind).join(", ")}]`,
            );

            const results: ToolResult[] = [];
            const answers: string[] = [];

            for (const event of response.events) {
                const outcome = await this.dispatcher.dispatch(event);
                switch (outcome.kind) {
                    case "tool_result":
                        results.push(outcome.result);
                        break;
                    case "artifact":
                        if (outcome.text) latestArtifact = outcome.text;
                        break;
                    case "answer":
                        if (outcome.text) answers.push(outcome.text);
                        break;
                }
            }

            const turnAnswer = answers.length > 0 ? answers.join("\n\n") : null;
            if (turnAnswer && looksLikeReport(turnAnswer)) latestAnswer = turnAnswer;

            if (results.length > 0) {
                history.push(toolResultTurn(results));
                this.logger.info(`Added ${results.length} tool results to conversation`);
            }

            switch (response.stopReason) {
                case "completed": {
                    const markdown =
                        turnAnswer ?? latestAnswer ?? (latestArtifact ? fenced(latestArtifact) : null);
                    this.logger.info(`Conversation completed after ${turn} turns`);
                    return { markdown, termination: "completed", turns: turn };
                }
                case "token_limit_reached":
                    this.logger.warn(`Token ceiling reached on turn ${turn}; keeping partial output`);
                    return { markdown: turnAnswer ?? latestAnswer, termination: "token_limit", turns: turn };
                case "tool_requested":
                case "capability_requested":
                    // paused server tools continue from the assistant turn already appended
                    break;
            }
        }

        this.logger.warn(`No final answer within ${options.maxTurns} turns`);
        return { markdown: null, termination: "turn_limit", turns: options.maxTurns };
    }
}
