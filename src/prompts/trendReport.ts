import { PromptTemplate } from "llamaindex";
import { yearsOf } from "../config/index.js";
import type { YearRange } from "../types/domain.js";

export const TREND_REPORT_SYSTEM_PROMPT =
    "You are a research analyst who measures how much of the arXiv literature is about autonomous agents. You work only from the counts your tools return.";

export const TREND_REPORT_PROMPT = new PromptTemplate({
    template: `
Task: analyse the growth of agent research in arXiv {categories} papers from {fromYear} to {toYear}.

Steps:
1. Call search_and_filter_papers once for each year from {fromYear} to {toYear} (years: {years}), with max_results {maxResults}.
   Each call searches that year's papers, filters them for agent-related keywords ({keywords}) and returns only a count summary,
   e.g. {"year": {fromYear}, "total_papers": {maxResults}, "agent_papers": 10, "search_error": null}.
   A non-null search_error means the search failed and the counts for that year are zero; say so in the report.
2. Use code_execution to compute each year's agent-paper share and draw an ASCII bar chart with the character █, one bar per year.

Final output, in markdown and nothing else:
- "# arXiv Trend Report" as the title
- one "## <year>" section per year with the total papers, the agent papers and their share (two decimals)
- a "## Year-over-year comparison" section comparing consecutive years, quoting both years' counts
- the ASCII bar chart inside a fenced code block, one line per year in the form
  "<year> : ███ <agent papers> papers (<share>%)"
`,
});

export interface TrendReportPromptInput extends YearRange {
    categories: readonly string[];
    keywords: readonly string[];
    maxResults: number;
}

export function buildTrendReportPrompt(input: TrendReportPromptInput): string {
    return TREND_REPORT_PROMPT.format({
        categories: input.categories.join(", "),
        fromYear: String(input.fromYear),
        toYear: String(input.toYear),
        years: yearsOf(input).join(", "),
        maxResults: String(input.maxResults),
        keywords: input.keywords.length > 0 ? input.keywords.map((k) => `"${k}"`).join(", ") : "none: every paper counts",
    }).trim();
}
