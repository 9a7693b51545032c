/**
 * errors.ts
 *
 * Storage failures are wrapped in DatabaseError so route handlers can answer
 * with a generic 500 without leaking driver error text to clients.
 */

export class DatabaseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatabaseError';
  }
}

/**
 * Run a synchronous storage operation, rethrowing any failure as DatabaseError
 */
export function withDatabaseErrors<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof DatabaseError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new DatabaseError(`Error ${operation}: ${message}`, { cause: error });
  }
}
