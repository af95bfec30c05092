#!/usr/bin/env node
import { runAndPersist } from "./analyzer.js";
import { loadConfig, validateConfig, type AnalyzerConfig, type ConfigOverrides } from "./config/index.js";
import { ConfigError } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";

const USAGE = `Usage: arxiv-trends [--from=YEAR] [--to=YEAR] [--max-results=N] [--categories=cs.AI,cs.CL]
                    [--keywords=agent,LLM] [--output=output.md] [--max-turns=N] [--max-tokens=N] [--model=ID]`;

function flag(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
}

function intFlag(args: string[], name: string): number | undefined {
  const raw = flag(args, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError([`--${name}: expected an integer, got "${raw}"`]);
  }
  return value;
}

function listFlag(args: string[], name: string): string[] | undefined {
  const raw = flag(args, name);
  return raw === undefined ? undefined : raw.split(",").map((item) => item.trim()).filter(Boolean);
}

export function parseArgs(args: string[]): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  const fromYear = intFlag(args, "from");
  const toYear = intFlag(args, "to");
  const maxResults = intFlag(args, "max-results");
  const maxTurns = intFlag(args, "max-turns");
  const maxTokens = intFlag(args, "max-tokens");
  const categories = listFlag(args, "categories");
  const keywords = listFlag(args, "keywords");
  const output = flag(args, "output");
  const model = flag(args, "model");

  if (fromYear !== undefined) overrides.fromYear = fromYear;
  if (toYear !== undefined) overrides.toYear = toYear;
  if (maxResults !== undefined) overrides.maxResults = maxResults;
  if (maxTurns !== undefined) overrides.maxTurns = maxTurns;
  if (maxTokens !== undefined) overrides.maxTokens = maxTokens;
  if (categories !== undefined) overrides.categories = categories;
  if (keywords !== undefined) overrides.keywords = keywords;
  if (output) overrides.output = output;
  if (model) overrides.model = model;
  return overrides;
}

async function main() {
  const args = process.argv.slice(2);
  if (args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    return;
  }

  let config: AnalyzerConfig;
  try {
    config = loadConfig(process.env, parseArgs(args));
    validateConfig(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error(USAGE);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const logger = createLogger({ level: config.logLevel, file: config.paths.logFile, scope: "analyzer" });
  logger.info(
    `Application started: ${config.analysis.fromYear}-${config.analysis.toYear}, ${config.analysis.categories.join(", ")}, max ${config.analysis.maxResults} papers/year`,
  );

  const { document, fatalError } = await runAndPersist(config, { logger });
  if (fatalError) {
    process.exitCode = 1;
    return;
  }
  logger.info(`Analysis finished${document.fallback ? " with fallback report" : ""}`);
  console.log(config.paths.output);
}

if (import.meta.url.startsWith("file:")) {
  const modulePath = new URL(import.meta.url).pathname;
  if (process.argv[1] === modulePath || process.argv[1]?.endsWith("index.ts") || process.argv[1]?.endsWith("arxiv-trends")) {
    main().catch((error: unknown) => {
      console.error("Application failed:", error);
      process.exitCode = 1;
    });
  }
}
