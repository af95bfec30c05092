import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "../utils/errors.js";
import type { YearRange } from "../types/domain.js";
import type { LogLevelName } from "../utils/logger.js";

/**
 * Centralized configuration module.
 * Each run parses its own immutable AnalyzerConfig; nothing here is mutated afterwards.
 */

export const DEFAULT_KEYWORDS = [
    "agent",
    "multi-agent",
    "agentic",
    "planning",
    "reasoning",
    "tool calling",
    "tool use",
] as const;

export const MIN_YEAR = 2000;

export interface AnalyzerConfig {
    readonly anthropic: {
        readonly apiKey: string;
        readonly model: string;
        readonly betas: readonly string[];
        readonly timeoutMs: number;
    };
    readonly arxiv: {
        readonly apiUrl: string;
        readonly pageSize: number;
        readonly pageDelayMs: number;
        readonly timeoutMs: number;
    };
    readonly analysis: {
        readonly fromYear: number;
        readonly toYear: number;
        readonly maxResults: number;
        readonly categories: readonly string[];
        readonly keywords: readonly string[];
        readonly maxTurns: number;
        readonly maxTokens: number;
    };
    readonly paths: {
        readonly output: string;
        readonly logFile: string | null;
    };
    readonly logLevel: LogLevelName;
}

export type ConfigOverrides = Partial<{
    fromYear: number;
    toYear: number;
    maxResults: number;
    categories: string[];
    keywords: string[];
    maxTurns: number;
    maxTokens: number;
    output: string;
    model: string;
}>;

const list = (fallback: readonly string[]) =>
    z
        .string()
        .optional()
        .transform((value) =>
            value === undefined
                ? [...fallback]
                : value.split(",").map((item) => item.trim()).filter((item) => item.length > 0),
        );

const int = (fallback: number) => z.coerce.number().int().default(fallback);

const EnvSchema = z.object({
    ANTHROPIC_API_KEY: z.string().default(""),
    ANTHROPIC_MODEL: z.string().min(1).default("claude-sonnet-4-5-20250929"),
    ANTHROPIC_BETAS: list(["code-execution-2025-08-25"]),
    ANTHROPIC_TIMEOUT_MS: int(300_000).pipe(z.number().positive()),
    ARXIV_API_URL: z.string().url().default("http://export.arxiv.org/api/query"),
    ARXIV_PAGE_SIZE: int(100).pipe(z.number().min(1).max(2000)),
    ARXIV_PAGE_DELAY_MS: int(3000).pipe(z.number().min(0)),
    ARXIV_TIMEOUT_MS: int(30_000).pipe(z.number().positive()),
    ANALYSIS_FROM_YEAR: int(2020),
    ANALYSIS_TO_YEAR: int(2025),
    ANALYSIS_MAX_RESULTS: int(200),
    ANALYSIS_CATEGORIES: list(["cs.AI"]),
    ANALYSIS_KEYWORDS: list(DEFAULT_KEYWORDS),
    ANALYSIS_MAX_TURNS: int(20).pipe(z.number().min(0)),
    ANALYSIS_MAX_TOKENS: int(10_000).pipe(z.number().positive()),
    OUTPUT_PATH: z.string().min(1).default("output.md"),
    LOG_LEVEL: z
        .string()
        .default("info")
        .transform((value) => value.toLowerCase())
        .pipe(z.enum(["silent", "error", "warn", "info", "debug"])),
    LOG_FILE: z
        .string()
        .default("arxiv_analyzer.log")
        .transform((value) => (value.trim() === "" ? null : value)),
});

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Builds the configuration for one run from the environment plus CLI overrides.
 * @throws ConfigError listing every invalid value
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: ConfigOverrides = {},
    now: Date = new Date(),
): AnalyzerConfig {
    // Blank variables count as unset, except LOG_FILE where blank disables the file sink
    const present = Object.fromEntries(
        Object.entries(env).filter(
            ([key, value]) => value !== undefined && (key === "LOG_FILE" || value.trim() !== ""),
        ),
    );
    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        throw new ConfigError(formatIssues(parsed.error));
    }
    const vars = parsed.data;

    const config: AnalyzerConfig = {
        anthropic: {
            apiKey: vars.ANTHROPIC_API_KEY,
            model: overrides.model ?? vars.ANTHROPIC_MODEL,
            betas: vars.ANTHROPIC_BETAS,
            timeoutMs: vars.ANTHROPIC_TIMEOUT_MS,
        },
        arxiv: {
            apiUrl: vars.ARXIV_API_URL,
            pageSize: vars.ARXIV_PAGE_SIZE,
            pageDelayMs: vars.ARXIV_PAGE_DELAY_MS,
            timeoutMs: vars.ARXIV_TIMEOUT_MS,
        },
        analysis: {
            fromYear: overrides.fromYear ?? vars.ANALYSIS_FROM_YEAR,
            toYear: overrides.toYear ?? vars.ANALYSIS_TO_YEAR,
            maxResults: overrides.maxResults ?? vars.ANALYSIS_MAX_RESULTS,
            categories: overrides.categories ?? vars.ANALYSIS_CATEGORIES,
            keywords: overrides.keywords ?? vars.ANALYSIS_KEYWORDS,
            maxTurns: overrides.maxTurns ?? vars.ANALYSIS_MAX_TURNS,
            maxTokens: overrides.maxTokens ?? vars.ANALYSIS_MAX_TOKENS,
        },
        paths: {
            output: overrides.output ?? vars.OUTPUT_PATH,
            logFile: vars.LOG_FILE,
        },
        logLevel: vars.LOG_LEVEL,
    };

    const issues = checkAnalysis(config.analysis, now.getFullYear() + 1);
    if (issues.length > 0) {
        throw new ConfigError(issues);
    }
    return config;
}

function checkAnalysis(analysis: AnalyzerConfig["analysis"], maxYear: number): string[] {
    const issues: string[] = [];
    const { fromYear, toYear } = analysis;

    if (!Number.isInteger(fromYear) || fromYear < MIN_YEAR || fromYear > maxYear) {
        issues.push(`fromYear: must be an integer between ${MIN_YEAR} and ${maxYear}`);
    }
    if (!Number.isInteger(toYear) || toYear < MIN_YEAR || toYear > maxYear) {
        issues.push(`toYear: must be an integer between ${MIN_YEAR} and ${maxYear}`);
    }
    if (fromYear > toYear) {
        issues.push("fromYear: must not be after toYear");
    }
    if (!Number.isInteger(analysis.maxResults) || analysis.maxResults <= 0) {
        issues.push("maxResults: must be a positive integer");
    }
    if (analysis.categories.length === 0) {
        issues.push("categories: at least one arXiv category is required");
    }
    if (!Number.isInteger(analysis.maxTurns) || analysis.maxTurns < 0) {
        issues.push("maxTurns: must be a non-negative integer");
    }
    if (!Number.isInteger(analysis.maxTokens) || analysis.maxTokens <= 0) {
        issues.push("maxTokens: must be a positive integer");
    }
    return issues;
}

/**
 * Validates that the secrets a live run needs are present
 * @throws ConfigError if required values are missing
 */
export function validateConfig(config: AnalyzerConfig) {
    const missing: string[] = [];
    if (!config.anthropic.apiKey) missing.push("ANTHROPIC_API_KEY");

    if (missing.length > 0) {
        throw new ConfigError(missing.map((key) => `Missing required environment variable: ${key}`));
    }
}

export function yearsOf(range: YearRange): number[] {
    const years: number[] = [];
    for (let year = range.fromYear; year <= range.toYear; year++) {
        years.push(year);
    }
    return years;
}
