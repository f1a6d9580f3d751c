/**
 * Error types raised outside the pure core (config, vault access, generation).
 * The batching and retrieval functions themselves never throw.
 */

export class TagdigestError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TagdigestError';
    if (cause instanceof Error && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/** Invalid or unreadable configuration, including bad batch capacities. */
export class ConfigError extends TagdigestError {
  constructor(message: string, public readonly issues: string[] = [], cause?: unknown) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, cause);
    this.name = 'ConfigError';
  }
}

/** The vault or summaries directory is missing or not a directory. */
export class VaultError extends TagdigestError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, cause);
    this.name = 'VaultError';
  }
}

/** A generation request failed after all retries. */
export class GenerationError extends TagdigestError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly model: string,
    cause?: unknown
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`${message}${detail}`, cause);
    this.name = 'GenerationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
