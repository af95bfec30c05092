import fs from "fs/promises";
import path from "path";
import type { ReportDocument, YearAggregate } from "../types/domain.js";
import type { Logger } from "../utils/logger.js";
import { renderFallbackReport } from "./render.js";

export const DEFAULT_FAILURE_REASON = "the agent produced no usable output.";

export interface PersistOptions {
    aggregates?: readonly YearAggregate[];
    failureReason?: string;
    now?: () => Date;
    logger?: Logger;
}

/**
 * Writes the agent's markdown verbatim, or the deterministic fallback when there is none.
 * The destination is overwritten on every run.
 */
export async function persistReport(
    markdown: string | null,
    destination: string,
    options: PersistOptions = {},
): Promise<ReportDocument> {
    const generatedAt = (options.now ?? (() => new Date()))();
    const document: ReportDocument =
        markdown !== null && markdown.trim().length > 0
        ? { markdown, generatedAt, fallback: false }
        : {
              markdown: renderFallbackReport({
                  reason: options.failureReason ?? DEFAULT_FAILURE_REASON,
                  aggregates: options.aggregates ?? [],
                  generatedAt,
              }),
              generatedAt,
              fallback: true,
          };

    await fs.mkdir(path.dirname(path.resolve(destination)), { recursive: true });
    await fs.writeFile(destination, document.markdown, "utf-8");

    options.logger?.info(
        `${document.fallback ? "⚠️  Fallback report" : "✅ Report"} saved to ${destination} (${document.markdown.length} characters)`,
    );
    return document;
}
