/**
 * backend/src/shared/db/store-errors.ts
 *
 * WHY:
 * - No store access may hang: a slow or unreachable database must surface as
 *   a retryable StoreUnavailableError, not as a stuck request.
 * - StoreUnavailableError is the ONLY error kind a caller should retry
 *   automatically (with backoff). Everything else is terminal for the request.
 *
 * HOW TO USE:
 * - await withStoreTimeout('credentials.findByEmail', timeoutMs, () => query())
 *
 * RULES:
 * - Not an AppError: DAL code never throws AppError.
 * - Only transient failures (timeouts, connection loss, serialization
 *   conflicts) are mapped. Constraint violations and bugs propagate as-is.
 */

export class StoreUnavailableError extends Error {
  constructor(
    public readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super('Store unavailable', options);
    this.name = 'StoreUnavailableError';
  }
}

const TRANSIENT_NODE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE']);

// 08xxx (connection exception) is matched by prefix below.
const TRANSIENT_SQLSTATES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '53300', // too_many_connections
  '57014', // query_canceled (statement_timeout)
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
]);

const UNIQUE_VIOLATION = '23505';

function errorCode(err: unknown): string | null {
  if (!(err instanceof Error)) return null;
  if (!('code' in err)) return null;
  return typeof err.code === 'string' ? err.code : null;
}

export function isTransientStoreError(err: unknown): boolean {
  const code = errorCode(err);

  if (code === null) {
    // node-postgres reports pool/connection timeouts as plain Errors.
    return err instanceof Error && /timeout|connection terminated/i.test(err.message);
  }

  return TRANSIENT_NODE_CODES.has(code) || code.startsWith('08') || TRANSIENT_SQLSTATES.has(code);
}

export function isUniqueViolation(err: unknown): boolean {
  return errorCode(err) === UNIQUE_VIOLATION;
}

export async function withStoreTimeout<T>(
  operation: string,
  timeoutMs: number,
  run: () => Promise<T>,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(
        new StoreUnavailableError(operation, {
          cause: new Error(`${operation} timed out after ${timeoutMs}ms`),
        }),
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(), timeout]);
  } catch (err) {
    if (err instanceof StoreUnavailableError) throw err;
    if (isTransientStoreError(err)) throw new StoreUnavailableError(operation, { cause: err });
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
