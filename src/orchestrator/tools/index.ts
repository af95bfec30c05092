/**
 * Orchestrator Tools
 *
 * Registry of everything the agent may call: local tools executed here, and remote
 * capabilities the agent platform executes on its own.
 */

import type { z } from "zod";

export interface LocalTool {
    name: string;
    description: string;
    /** Argument validation run by the dispatcher before `run` */
    schema: z.ZodTypeAny;
    /** JSON schema declared to the agent */
    inputSchema: Record<string, unknown>;
    /** Returns the serialized result */
    run(args: unknown): Promise<string>;
}

/**
 * Sandboxed code execution hosted by the agent platform. Never executed locally.
 */
export interface RemoteCapability {
    kind: "code_execution";
    name: string;
    /** Names the platform reports on the server tool blocks it emits for this capability */
    operations: readonly string[];
}

export type ToolDeclaration =
    | { kind: "local"; name: string; description: string; inputSchema: Record<string, unknown> }
    | { kind: "remote"; capability: RemoteCapability };

export const CODE_EXECUTION: RemoteCapability = {
    kind: "code_execution",
    name: "code_execution",
    operations: ["bash_code_execution", "text_editor_code_execution"],
};

export class ToolRegistry {
    private readonly local = new Map<string, LocalTool>();
    private readonly remote = new Map<string, RemoteCapability>();

    registerLocal(tool: LocalTool): this {
        if (this.local.has(tool.name) || this.remote.has(tool.name)) {
            throw new Error(`Tool already registered: ${tool.name}`);
        }
        this.local.set(tool.name, tool);
        return this;
    }

    registerRemote(capability: RemoteCapability): this {
        if (this.local.has(capability.name) || this.remote.has(capability.name)) {
            throw new Error(`Tool already registered: ${capability.name}`);
        }
        this.remote.set(capability.name, capability);
        return this;
    }

    getLocal(name: string): LocalTool | undefined {
        return this.local.get(name);
    }

    /**
     * Capability behind a server tool block, matched by its declared name or one of its operations.
     */
    findRemote(name: string): RemoteCapability | undefined {
        for (const capability of this.remote.values()) {
            if (capability.name === name || capability.operations.includes(name)) return capability;
        }
        return undefined;
    }

    declarations(): ToolDeclaration[] {
        return [
            ...[...this.remote.values()].map((capability): ToolDeclaration => ({ kind: "remote", capability })),
            ...[...this.local.values()].map(
                (tool): ToolDeclaration => ({
                    kind: "local",
                    name: tool.name,
                    description: tool.description,
                    inputSchema: tool.inputSchema,
                }),
            ),
        ];
    }
}

export {
    createSearchAndFilterTool,
    toPayload,
    SEARCH_AND_FILTER_TOOL,
    type AggregatePayload,
    type SearchAndFilterOptions,
} from "./searchAndFilter.js";
