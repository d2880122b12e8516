// @filename: error.ts
/**
 * Error type raised when a queue, listener or channel is misused.
 *
 * Ordinary reads never throw: an empty read is `[]`, an unknown listener key
 * is a no-op. `QueueError` is reserved for programming mistakes such as an
 * invalid count, closing a queue that still has listeners attached, or
 * re-entering a channel from inside its own `bounce` callback, plus errors
 * thrown by user callbacks passed to `map`.
 *
 * @module
 */

/**
 * Context attached to a {@link QueueError}.
 */
export interface QueueErrorOptions {
  /** The operation that failed, e.g. `"peekN"` or `"close"` */
  operation?: string;
  /** The value being processed or the offending argument */
  value?: unknown;
  /** The underlying cause, if any */
  cause?: unknown;
}

/**
 * Represents a failure inside a queue operation, aggregating the underlying
 * error(s) together with the name of the operation and the value involved.
 *
 * @example
 * ```ts
 * try {
 *   listener.peekN(-1);
 * } catch (err) {
 *   if (isQueueError(err)) console.error(err.operation, err.value); // 'peekN' -1
 * }
 * ```
 */
export class QueueError extends AggregateError {
  /** The operation where the error occurred */
  readonly operation?: string;

  /** The value being processed when the error occurred */
  readonly value?: unknown;

  /**
   * @param errors - The error(s) that caused this error, may be empty
   * @param message - The error message
   * @param options - Additional error context
   */
  constructor(
    errors: unknown,
    message: string,
    options?: QueueErrorOptions
  ) {
    const errorArray: unknown[] = Array.isArray(errors) ? errors : [errors];
    const normalizedErrors = errorArray.map(err =>
      err instanceof Error ? err : new Error(String(err))
    );

    super(normalizedErrors, message, { cause: options?.cause });
    this.name = 'QueueError';
    this.operation = options?.operation;
    this.value = options?.value;
  }

  /**
   * Wraps a thrown value in a QueueError naming the operation and the value
   * it was processing. QueueErrors pass through unchanged.
   */
  static from(error: unknown, operation: string, value?: unknown): QueueError {
    if (error instanceof QueueError) return error;

    return new QueueError(
      error,
      error instanceof Error ? error.message : String(error),
      { operation, value, cause: error }
    );
  }
}

/**
 * Checks whether a value is a {@link QueueError}.
 */
export function isQueueError(value: unknown): value is QueueError {
  return value instanceof QueueError;
}

/**
 * Throws a QueueError unless `n` is a non-negative integer.
 *
 * @internal
 */
export function assertCount(n: number, operation: string): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new QueueError(
      new RangeError(`Expected a non-negative integer, got ${n}`),
      `${operation} needs a non-negative integer count`,
      { operation, value: n }
    );
  }
}
