import type { YearAggregate } from "../types/domain.js";

export const REPORT_TITLE = "# arXiv Trend Report";
export const FALLBACK_HEADER = "# arXiv Trend Report (fallback)";

const BAR_WIDTH = 20;

export function share(aggregate: YearAggregate): string {
    if (aggregate.totalPapers === 0) return "0.00";
    return ((aggregate.agentPapers / aggregate.totalPapers) * 100).toFixed(2);
}

function signed(delta: number): string {
    return delta >= 0 ? `+${delta}` : String(delta);
}

export function renderYearSection(aggregate: YearAggregate): string {
    const lines = [
        `## ${aggregate.year}`,
        "",
        `- Total papers: ${aggregate.totalPapers}`,
        `- Agent-related papers: ${aggregate.agentPapers} (${share(aggregate)}%)`,
    ];
    if (aggregate.searchError) {
        lines.push(`- Search failed: ${aggregate.searchError}`);
    }
    return lines.join("\n");
}

export function renderComparison(aggregates: readonly YearAggregate[]): string {
    const lines = [
        "## Year-over-year comparison",
        "",
        "| Year | Total papers | Agent papers | Share |",
        "| --- | --- | --- | --- |",
        ...aggregates.map((a) => `| ${a.year} | ${a.totalPapers} | ${a.agentPapers} | ${share(a)}% |`),
    ];

    const pairs: string[] = [];
    for (let i = 1; i < aggregates.length; i++) {
        const prev = aggregates[i - 1];
        const curr = aggregates[i];
        if (!prev || !curr) continue;
        pairs.push(
            `- ${prev.year} → ${curr.year}: agent papers ${prev.agentPapers} → ${curr.agentPapers} (${signed(curr.agentPapers - prev.agentPapers)}), share ${share(prev)}% → ${share(curr)}%`,
        );
    }
    if (pairs.length > 0) lines.push("", ...pairs);

    return lines.join("\n");
}

/**
 * One line per year; bars scale to the largest agent count.
 */
export function renderBarChart(aggregates: readonly YearAggregate[]): string {
    const max = Math.max(0, ...aggregates.map((a) => a.agentPapers));
    const rows = aggregates.map((a) => {
        const length = max === 0 ? 0 : Math.round((a.agentPapers / max) * BAR_WIDTH);
        const bar = "█".repeat(length);
        return `${a.year} : ${bar}${bar ? " " : ""}${a.agentPapers} papers (${share(a)}%)`;
    });
    return ["```text", ...rows, "```"].join("\n");
}

/**
 * Markdown body for the given years, ascending.
 */
export function renderTrendReport(aggregates: readonly YearAggregate[], title: string = REPORT_TITLE): string {
    const sorted = [...aggregates].sort((a, b) => a.year - b.year);
    const sections = [title, ...sorted.map(renderYearSection)];
    if (sorted.length > 0) {
        sections.push(renderComparison(sorted), renderBarChart(sorted));
    }
    return `${sections.join("\n\n")}\n`;
}

export interface FallbackInput {
    reason: string;
    aggregates: readonly YearAggregate[];
    generatedAt: Date;
}

export function renderFallbackReport({ reason, aggregates, generatedAt }: FallbackInput): string {
    const note = [
        `> Report generation failed: ${reason}`,
        "",
        `Generated at: ${generatedAt.toISOString()}`,
    ].join("\n");

    if (aggregates.length === 0) {
        return `${FALLBACK_HEADER}\n\n${note}\n\nNo paper counts were collected.\n`;
    }
    const body = renderTrendReport(aggregates, "Counts collected before the failure:");
    return `${FALLBACK_HEADER}\n\n${note}\n\n${body}`;
}
