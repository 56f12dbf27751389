// src/utils/errors.ts — error taxonomy for the answering engine

export class AppError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly status: number = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No retrieval backend can accept writes. */
export class StoreUnavailableError extends AppError {
  constructor(message = 'Vector store is unavailable; cannot ingest documents', options?: { cause?: unknown }) {
    super(message, 'store_unavailable', 503, options);
  }
}

/** The remote ANN service could not be reached or provisioned. */
export class VectorStoreUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'vector_store_unavailable', 503, options);
  }
}

/** The document store failed while answering a query. */
export class RetrievalUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'retrieval_unavailable', 503, options);
  }
}

export class CatalogUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'catalog_unavailable', 503, options);
  }
}

export function isAbortError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return err.name === 'AbortError' || err.name === 'CanceledError' || err.name === 'APIUserAbortError';
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    const err = new Error('Request was cancelled');
    err.name = 'AbortError';
    throw err;
  }
}
