import { MIN_YEAR } from "../config/index.js";
import type { PaperQuery, PaperRecord, YearAggregate } from "../types/domain.js";
import { InvalidQueryError, PaperSearchError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { errorMessage } from "../utils/resilience.js";
import type { PaperSearch } from "./arxiv.js";

/**
 * True when any keyword occurs (case-insensitively) in the title or summary.
 * An empty keyword list matches everything.
 */
export function matchesKeywords(record: PaperRecord, keywords: readonly string[]): boolean {
    if (keywords.length === 0) return true;

    const text = `${record.title} ${record.summary}`.toLowerCase();
    return keywords.some((keyword) => text.includes(keyword.toLowerCase()));
}

export function countMatching(records: readonly PaperRecord[], keywords: readonly string[]): number {
    return records.filter((record) => matchesKeywords(record, keywords)).length;
}

export function validateQuery(query: PaperQuery, now: Date = new Date()): void {
    const maxYear = now.getFullYear() + 1;
    if (!Number.isInteger(query.year) || query.year < MIN_YEAR || query.year > maxYear) {
        throw new InvalidQueryError(`year must be an integer between ${MIN_YEAR} and ${maxYear}, got ${query.year}`);
    }
    if (!Number.isInteger(query.maxResults) || query.maxResults <= 0) {
        throw new InvalidQueryError(`max_results must be a positive integer, got ${query.maxResults}`);
    }
}

/**
 * Paper Source Adapter: one year's search, reduced to counts.
 */
export class PaperSourceAdapter {
    constructor(
        private readonly search: PaperSearch,
        private readonly logger: Logger,
        private readonly clock: () => Date = () => new Date(),
    ) {}

    /**
     * @throws InvalidQueryError when the query is out of range; search failures never throw
     */
    async searchAndFilter(query: PaperQuery): Promise<YearAggregate> {
        validateQuery(query, this.clock());

        let records: PaperRecord[];
        try {
            records = (await this.search.search(query)).slice(0, query.maxResults);
        } catch (err) {
            const failure = new PaperSearchError(
                query.year,
                `Search for ${query.year} failed: ${errorMessage(err)}`,
                { cause: err },
            );
            this.logger.error(`❌ ${failure.message}; counting the year as empty`);
            return { year: query.year, totalPapers: 0, agentPapers: 0, searchError: failure.message };
        }

        const agentPapers = countMatching(records, query.keywords);
        this.logger.info(
            `Filter result for ${query.year}: ${agentPapers} agent, ${records.length - agentPapers} other out of ${records.length}`,
        );

        return {
            year: query.year,
            totalPapers: records.length,
            agentPapers,
            searchError: null,
        };
    }
}
