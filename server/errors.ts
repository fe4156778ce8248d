/**
 * Pipeline error taxonomy.
 *
 * Provider failures (extraction, geocoding) are not here: they are returned
 * as values and never cross a component boundary as exceptions.
 */

/** Navigation or network failure for one date. The run moves on to the next date. */
export class FetchError extends Error {
  readonly date: string;

  constructor(date: string, message: string, options?: { cause?: unknown }) {
    super(`Fetch failed for ${date}: ${message}`, options);
    this.name = 'FetchError';
    this.date = date;
  }
}

/** Failure persisting one listing. Logged; the batch continues. */
export class PersistenceError extends Error {
  readonly listingId: string;

  constructor(listingId: string, message: string, options?: { cause?: unknown }) {
    super(`Persisting listing ${listingId} failed: ${message}`, options);
    this.name = 'PersistenceError';
    this.listingId = listingId;
  }
}

/** Fatal: the whole run is recorded as failed. */
export class RunFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RunFailure';
  }
}

/** A second run was requested while one is still going. */
export class RunInProgressError extends RunFailure {
  constructor() {
    super('An ingestion run is already in progress');
    this.name = 'RunInProgressError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
