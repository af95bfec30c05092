import axios, { type AxiosInstance } from "axios";
import type { PaperQuery, PaperRecord } from "../types/domain.js";
import { ArxivFeedError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { attemptOnce, sleep } from "../utils/resilience.js";

export interface ArxivClientOptions {
    apiUrl: string;
    pageSize: number;
    pageDelayMs: number;
    timeoutMs: number;
    /** Injected in tests; defaults to a fresh axios instance */
    http?: AxiosInstance;
}

/**
 * Anything that can list the papers of one year. The adapter only depends on this.
 */
export interface PaperSearch {
    search(query: PaperQuery): Promise<PaperRecord[]>;
}

const ENTITIES: Record<string, string> = {
    "&amp;": "&",
    "&lt;": "<",
    "&gt;": ">",
    "&quot;": '"',
    "&apos;": "'",
};

function decodeXml(text: string): string {
    return text
        .replace(/&(amp|lt|gt|quot|apos);/g, (entity) => ENTITIES[entity] ?? entity)
        .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)));
}

function cleanText(raw: string): string {
    return decodeXml(raw).replace(/\s+/g, " ").trim();
}

function tag(entry: string, name: string): string | null {
    const match = entry.match(new RegExp(`<${name}[^>]*>([\\s\\S]*?)</${name}>`));
    return match?.[1] ?? null;
}

/**
 * Parse the Atom feed returned by the arXiv query API.
 * Regex extraction is enough for the handful of fields we read.
 * @throws ArxivFeedError when the feed carries an error entry (arXiv still answers 200)
 */
export function parseAtomFeed(xml: string): PaperRecord[] {
    const records: PaperRecord[] = [];

    for (const match of xml.matchAll(/<entry>([\s\S]*?)<\/entry>/g)) {
        const entry = match[1] ?? "";
        const id = tag(entry, "id");
        const title = tag(entry, "title");
        if (!id || title === null) continue;
        if (id.includes("/api/errors")) {
            throw new ArxivFeedError(cleanText(tag(entry, "summary") ?? title));
        }

        const published = tag(entry, "published") ?? "";
        const year = Number.parseInt(published.slice(0, 4), 10);

        records.push({
            title: cleanText(title),
            summary: cleanText(tag(entry, "summary") ?? ""),
            link: id.trim(),
            publishedYear: Number.isNaN(year) ? 0 : year,
        });
    }

    return records;
}

/**
 * arXiv search expression for every paper submitted in `year` within `categories`.
 */
export function buildSearchQuery(year: number, categories: readonly string[]): string {
    const cats = categories.map((c) => `cat:${c}`);
    const catExpr = cats.length === 1 ? cats[0] : `(${cats.join(" OR ")})`;
    return `${catExpr} AND submittedDate:[${year}01010000 TO ${year}12312359]`;
}

export class ArxivClient implements PaperSearch {
    private readonly http: AxiosInstance;

    constructor(
        private readonly options: ArxivClientOptions,
        private readonly logger: Logger,
    ) {
        this.http = options.http ?? axios.create();
    }

    async search(query: PaperQuery): Promise<PaperRecord[]> {
        const searchQuery = buildSearchQuery(query.year, query.categories);
        this.logger.info(`🔍 Searching arXiv: "${searchQuery}" (max_results: ${query.maxResults})`);

        const records: PaperRecord[] = [];
        for (let start = 0; start < query.maxResults; start += this.options.pageSize) {
            const size = Math.min(this.options.pageSize, query.maxResults - start);

            if (start > 0 && this.options.pageDelayMs > 0) {
                await sleep(this.options.pageDelayMs);
            }

            const page = await this.fetchPage(searchQuery, start, size);
            records.push(...page);
            this.logger.debug(`Page at ${start}: ${page.length} entries`);

            if (page.length < size) break;
        }

        const sliced = records.slice(0, query.maxResults);
        this.logger.info(`✅ Found ${sliced.length} papers for ${query.year}`);
        return sliced;
    }

    private async fetchPage(searchQuery: string, start: number, maxResults: number): Promise<PaperRecord[]> {
        const response = await attemptOnce(
            () =>
                this.http.get<string>(this.options.apiUrl, {
                    params: {
                        search_query: searchQuery,
                        start,
                        max_results: maxResults,
                        sortBy: "submittedDate",
                        sortOrder: "descending",
                    },
                    responseType: "text",
                    timeout: this.options.timeoutMs,
                }),
            { name: `arXiv request (start=${start})`, logger: this.logger },
        );

        if (typeof response.data !== "string") {
            throw new Error(`Unexpected arXiv response body (${typeof response.data})`);
        }
        return parseAtomFeed(response.data);
    }
}
