/**
 * Collector Errors
 *
 * Only two conditions are thrown as exceptions:
 * - ConfigurationError: fatal, raised before any network call
 * - StoreCommitError: raised by the store, converted into a CommitFailure
 *   at the park boundary by the collector
 *
 * Everything else (network, parse, schema drift) is returned as a value.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class StoreCommitError extends Error {
  constructor(
    readonly parkId: number,
    message: string,
  ) {
    super(message);
    this.name = "StoreCommitError";
  }
}

/**
 * Extracts a readable message from an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
