/**
 * Error taxonomy for graph builds. Every error the CLI reports as a clean
 * one-line failure is a GraphError; anything else is a bug.
 */
export class GraphError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: string
  ) {
    super(message);
    this.name = "GraphError";
  }
}

/**
 * The issue source could not produce a record. Always fatal: a graph built
 * without this issue would silently omit reachable work.
 */
export class FetchError extends GraphError {
  constructor(
    public readonly issueId: string,
    message: string,
    details?: string
  ) {
    super("FETCH_FAILED", `Failed to fetch ${issueId}: ${message}`, details);
    this.name = "FetchError";
  }
}

/**
 * Invalid or missing run configuration, raised before any traversal starts.
 */
export class ConfigurationError extends GraphError {
  constructor(message: string, details?: string) {
    super("INVALID_CONFIG", message, details);
    this.name = "ConfigurationError";
  }
}

export function isGraphError(err: unknown): err is GraphError {
  return err instanceof GraphError;
}
