import { tool } from "llamaindex";
import type { PaperSourceAdapter } from "../../ingestion/paperSource.js";
import type { YearAggregate } from "../../types/domain.js";
import { searchAndFilterArgsSchema } from "../../types/zodSchemas.js";
import type { LocalTool } from "./index.js";

export const SEARCH_AND_FILTER_TOOL = "search_and_filter_papers";

/**
 * Wire shape the agent sees. Snake case, and a type alias so it stays JSON-compatible.
 */
export type AggregatePayload = {
    year: number;
    total_papers: number;
    agent_papers: number;
    search_error: string | null;
};

export function toPayload(aggregate: YearAggregate): AggregatePayload {
    return {
        year: aggregate.year,
        total_papers: aggregate.totalPapers,
        agent_papers: aggregate.agentPapers,
        search_error: aggregate.searchError,
    };
}

/**
 * JSON schema llamaindex derived from the zod parameters, minus the `$schema` marker
 * the Messages API does not take.
 */
function declaredSchema(derived: object | undefined): Record<string, unknown> {
    const schema: Record<string, unknown> = Object.fromEntries(
        Object.entries(derived ?? {}).filter(([key]) => key !== "$schema"),
    );
    return { ...schema, type: "object" };
}

export interface SearchAndFilterOptions {
    categories: readonly string[];
    keywords: readonly string[];
    defaultMaxResults: number;
    /** Receives every aggregate the tool hands back to the agent */
    onAggregate?: (aggregate: YearAggregate) => void;
}

/**
 * TOOL: Search one year of arXiv and count the agent-related papers.
 * Only the count summary reaches the agent.
 */
export function createSearchAndFilterTool(
    source: PaperSourceAdapter,
    options: SearchAndFilterOptions,
): LocalTool {
    const parameters = searchAndFilterArgsSchema(options.defaultMaxResults);
    const searchTool = tool({
        name: SEARCH_AND_FILTER_TOOL,
        description:
            "Search arXiv papers submitted in one year and filter them for agent-related keywords. Returns only a count summary: {year, total_papers, agent_papers, search_error}.",
        parameters,
        execute: async ({ year, max_results }): Promise<AggregatePayload> => {
            const aggregate = await source.searchAndFilter({
                year,
                categories: options.categories,
                keywords: options.keywords,
                maxResults: max_results,
            });
            options.onAggregate?.(aggregate);
            return toPayload(aggregate);
        },
    });

    return {
        name: SEARCH_AND_FILTER_TOOL,
        description: searchTool.metadata.description,
        schema: parameters,
        inputSchema: declaredSchema(searchTool.metadata.parameters),
        run: async (args) => {
            const parsed = parameters.parse(args);
            return JSON.stringify(await searchTool.call(parsed));
        },
    };
}
