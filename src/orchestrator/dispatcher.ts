import type { z } from "zod";
import type { AgentEvent, DispatchOutcome, ToolCall, ToolResult } from "../types/domain.js";
import { InvalidQueryError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { errorMessage } from "../utils/resilience.js";
import type { ToolRegistry } from "./tools/index.js";

function assertNever(value: never): never {
    throw new Error(`Unhandled agent event: ${JSON.stringify(value)}`);
}

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
}

function errorResult(callId: string, payload: string): ToolResult {
    return { callId, payload, isError: true };
}

/**
 * Routes each agent event to its handler. Never throws for a bad call: unknown tools,
 * malformed arguments and tool crashes all come back as error results with the
 * originating call id, so the agent can correct itself.
 */
export class ToolDispatcher {
    constructor(
        private readonly registry: ToolRegistry,
        private readonly logger: Logger,
    ) {}

    async dispatch(event: AgentEvent): Promise<DispatchOutcome> {
        switch (event.kind) {
            case "local_tool_invocation":
                return { kind: "tool_result", result: await this.invokeLocal(event.call) };

            case "remote_capability_invocation": {
                const capability = this.registry.findRemote(event.name);
                if (!capability) {
                    this.logger.warn(`Agent used an undeclared server tool: ${event.name}`);
                }
                const code = codeOf(event.input);
                if (code) this.logger.debug(`Code submitted to ${event.name}:\n${code}`);

                const text = event.output?.trim() || null;
                this.logger.info(
                    `Server tool ${capability ? `${capability.name}/` : ""}${event.name} (${event.callId}) ${text ? `produced ${text.length} chars` : "produced no output"}`,
                );
                return { kind: "artifact", callId: event.callId, text };
            }

            case "terminal_answer": {
                const text = event.text.trim();
                return { kind: "answer", text: text.length > 0 ? text : null };
            }

            default:
                return assertNever(event);
        }
    }

    private async invokeLocal(call: ToolCall): Promise<ToolResult> {
        this.logger.info(`Processing tool call: ${call.name} with input: ${JSON.stringify(call.arguments)}`);

        const tool = this.registry.getLocal(call.name);
        if (!tool) {
            this.logger.warn(`Unknown tool: ${call.name}`);
            return errorResult(call.callId, `Unsupported tool: ${call.name}`);
        }

        const parsed = tool.schema.safeParse(call.arguments ?? {});
        if (!parsed.success) {
            this.logger.warn(`Malformed arguments for ${call.name}: ${describeIssues(parsed.error)}`);
            return errorResult(call.callId, `Malformed arguments for ${call.name}: ${describeIssues(parsed.error)}`);
        }

        try {
            const payload = await tool.run(parsed.data);
            this.logger.info(`Tool ${call.name} completed: ${payload}`);
            return { callId: call.callId, payload, isError: false };
        } catch (err) {
            if (err instanceof InvalidQueryError) {
                this.logger.warn(`Malformed arguments for ${call.name}: ${err.message}`);
                return errorResult(call.callId, `Malformed arguments for ${call.name}: ${err.message}`);
            }
            this.logger.error(`Tool ${call.name} failed`, err);
            return errorResult(call.callId, `Tool ${call.name} failed: ${errorMessage(err)}`);
        }
    }
}

function codeOf(input: unknown): string | null {
    if (typeof input !== "object" || input === null) return null;
    for (const key of ["code", "command", "file_text"]) {
        if (key in input) {
            const value: unknown = Reflect.get(input, key);
            if (typeof value === "string") return value;
        }
    }
    return null;
}
