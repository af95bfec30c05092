import type { AnalyzerConfig } from "./config/index.js";
import { ArxivClient, type PaperSearch } from "./ingestion/arxiv.js";
import { PaperSourceAdapter } from "./ingestion/paperSource.js";
import {
    CODE_EXECUTION,
    ConversationDriver,
    ToolDispatcher,
    ToolRegistry,
    createSearchAndFilterTool,
    type ConversationOutcome,
} from "./orchestrator/index.js";
import { TREND_REPORT_SYSTEM_PROMPT, buildTrendReportPrompt } from "./prompts/trendReport.js";
import { persistReport } from "./report/persister.js";
import type { ReportDocument, YearAggregate } from "./types/domain.js";
import { AnthropicAgent, type ReasoningAgent } from "./utils/llm.js";
import type { Logger } from "./utils/logger.js";
import { errorMessage } from "./utils/resilience.js";

export interface AnalyzerDeps {
    logger: Logger;
    /** Defaults to the Anthropic client built from config */
    agent?: ReasoningAgent;
    /** Defaults to the arXiv client built from config */
    search?: PaperSearch;
    clock?: () => Date;
}

export interface AnalysisResult {
    markdown: string | null;
    aggregates: YearAggregate[];
    outcome: ConversationOutcome;
}

/**
 * Collects what the tool returned so a fallback report can still show it.
 * The latest aggregate per year wins.
 */
class AggregateLedger {
    private readonly byYear = new Map<number, YearAggregate>();

    record(aggregate: YearAggregate): void {
        this.byYear.set(aggregate.year, aggregate);
    }

    list(): YearAggregate[] {
        return [...this.byYear.values()].sort((a, b) => a.year - b.year);
    }
}

async function analyze(config: AnalyzerConfig, deps: AnalyzerDeps, ledger: AggregateLedger): Promise<AnalysisResult> {
    const { logger } = deps;
    const { analysis } = config;

    const search = deps.search ?? new ArxivClient(config.arxiv, logger.child("arxiv"));
    const source = new PaperSourceAdapter(search, logger.child("paperSource"), deps.clock);

    const registry = new ToolRegistry()
        .registerRemote(CODE_EXECUTION)
        .registerLocal(
            createSearchAndFilterTool(source, {
                categories: analysis.categories,
                keywords: analysis.keywords,
                defaultMaxResults: analysis.maxResults,
                onAggregate: (aggregate) => ledger.record(aggregate),
            }),
        );

    const agent = deps.agent ?? new AnthropicAgent(config.anthropic, logger.child("llm"));
    const driver = new ConversationDriver(agent, registry, new ToolDispatcher(registry, logger.child("dispatcher")), logger.child("controller"));

    const outcome = await driver.run({
        instruction: buildTrendReportPrompt({
            fromYear: analysis.fromYear,
            toYear: analysis.toYear,
            categories: analysis.categories,
            keywords: analysis.keywords,
            maxResults: analysis.maxResults,
        }),
        system: TREND_REPORT_SYSTEM_PROMPT,
        maxTurns: analysis.maxTurns,
        maxTokens: analysis.maxTokens,
    });

    return { markdown: outcome.markdown, aggregates: ledger.list(), outcome };
}

/**
 * One analysis run. Transport failures of the agent exchange propagate.
 */
export async function runAnalysis(config: AnalyzerConfig, deps: AnalyzerDeps): Promise<AnalysisResult> {
    return analyze(config, deps, new AggregateLedger());
}

export interface RunReport {
    document: ReportDocument;
    result: AnalysisResult | null;
    /** Set when the run aborted; the fallback document was still written */
    fatalError: Error | null;
}

const TERMINATION_REASONS: Record<ConversationOutcome["termination"], string> = {
    completed: "the agent finished without producing a report.",
    token_limit: "the agent hit its token ceiling before producing a report.",
    turn_limit: "the agent did not finish within the turn budget.",
};

/**
 * Runs the analysis and always writes the destination file, falling back to a
 * locally rendered document when the agent produced nothing or the run aborted.
 */
export async function runAndPersist(config: AnalyzerConfig, deps: AnalyzerDeps): Promise<RunReport> {
    const { logger } = deps;
    const ledger = new AggregateLedger();
    const persist = { now: deps.clock, logger: logger.child("report") };

    try {
        const result = await analyze(config, deps, ledger);
        const document = await persistReport(result.markdown, config.paths.output, {
            ...persist,
            aggregates: result.aggregates,
            failureReason: TERMINATION_REASONS[result.outcome.termination],
        });
        return { document, result, fatalError: null };
    } catch (err) {
        const fatalError = err instanceof Error ? err : new Error(errorMessage(err));
        logger.error("Analysis aborted", fatalError);

        const document = await persistReport(null, config.paths.output, {
            ...persist,
            aggregates: ledger.list(),
            failureReason: fatalError.message,
        });
        return { document, result: null, fatalError };
    }
}
