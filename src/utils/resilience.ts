/**
 * Resilience Utility
 *
 * Runs IO-bound operations (network, API) exactly once and classifies their failures
 * for the log. Nothing here retries: every external call is a single bounded attempt.
 */

import axios from "axios";
import type { Logger } from "./logger.js";

export type FailureKind = "timeout" | "rate_limited" | "network" | "http" | "unknown";

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function statusOf(error: unknown): number | undefined {
  if (axios.isAxiosError(error)) return error.response?.status;
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

export function classifyFailure(error: unknown): FailureKind {
  const status = statusOf(error);
  if (status === 429 || status === 503) return "rate_limited";
  if (status !== undefined) return "http";

  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") return "timeout";
    return "network";
  }

  const message = errorMessage(error).toLowerCase();
  if (message.includes("timeout") || message.includes("timed out")) return "timeout";
  if (message.includes("econnrefused") || message.includes("enotfound") || message.includes("network")) {
    return "network";
  }
  return "unknown";
}

/**
 * Runs `operation` once. A failure is logged with its classification and rethrown.
 */
export async function attemptOnce<T>(
  operation: () => Promise<T>,
  options: { name: string; logger: Logger },
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    const kind = classifyFailure(error);
    options.logger.warn(`${options.name} failed (${kind}): ${errorMessage(error)}`);
    throw error;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
