/**
 * @fileoverview Error taxonomy.
 *
 * Structured error classes with machine-readable codes and a data payload.
 * Analysis code never throws for data-quality reasons; these errors come from
 * sources (network, malformed payloads) and configuration loading.
 *
 * @module @crosslag/contracts/errors
 */

/**
 * Base class for all errors raised by the suite.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new CrosslagError('BUFFER_FULL', 'Buffer rejected bar', { series: 'A' });
 * ```
 */
export class CrosslagError extends Error {
  /** Machine-readable error code (e.g. 'SOURCE_ERROR') */
  public readonly code: string;

  /** Structured context for logs and retry decisions */
  public readonly data?: Record<string, unknown>;

  /** ISO 8601 creation time */
  public readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (data !== undefined) {
      this.data = data;
    }
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Plain-object form, used by JSON.stringify and structured logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * A bar that failed validation where one was required (e.g. a source payload
 * that cannot be parsed into a bar at all). Non-finite values inside an
 * otherwise well-formed bar are dropped by the buffer instead.
 */
export class InvalidBarError extends CrosslagError {
  constructor(message: string, data: { series?: string; [key: string]: unknown }) {
    super('INVALID_BAR', message, data);
  }
}

/**
 * A market-data source failed: HTTP error, malformed response, closed stream.
 *
 * @example
 * ```typescript
 * throw new SourceError('Klines request failed', { source: 'binance', status: 429 });
 * ```
 */
export class SourceError extends CrosslagError {
  /** Source name ('binance', 'yahoo', ...) */
  public readonly source: string;

  /** HTTP status, when the failure was an HTTP response */
  public readonly status: number | undefined;

  constructor(message: string, data: { source: string; status?: number; [key: string]: unknown }) {
    super('SOURCE_ERROR', message, data);
    this.source = data.source;
    this.status = data.status;
  }
}

/**
 * Configuration failed validation. `issues` lists every failing path.
 */
export class ConfigError extends CrosslagError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[]) {
    super('CONFIG_INVALID', message, { issues });
    this.issues = issues;
  }
}

export function isCrosslagError(error: unknown): error is CrosslagError {
  return error instanceof CrosslagError;
}

/**
 * @example
 * ```typescript
 * catch (err) {
 *   if (isSourceError(err) && err.status === 429) {
 *     await delay(backoffMs);
 *   }
 * }
 * ```
 */
export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
