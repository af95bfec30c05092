export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}

/**
 * One year's search failed. Callers log it and carry on with a zero aggregate.
 */
export class PaperSearchError extends Error {
  constructor(
    readonly year: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PaperSearchError";
  }
}

/**
 * arXiv answered with an error entry instead of results, e.g. for a malformed query.
 */
export class ArxivFeedError extends Error {
  constructor(readonly detail: string) {
    super(`arXiv API error: ${detail}`);
    this.name = "ArxivFeedError";
  }
}

/**
 * The reasoning-agent API could not be reached or answered with an unrecoverable status.
 * Aborts the run.
 */
export class AgentTransportError extends Error {
  constructor(
    message: string,
    readonly status: number | undefined,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AgentTransportError";
  }
}
