/**
 * Errors raised along the query -> embed -> search -> group path.
 * `status` is the HTTP status the presentation layer responds with.
 */
export class SearchError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class QueryValidationError extends SearchError {
  constructor(message: string) {
    super(message, 400);
  }
}

// The embedder could not produce a vector for the given text
export class EncodingError extends SearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, options);
  }
}

// The similarity search backend is unreachable or rejected the query
export class SearchServiceError extends SearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, options);
  }
}

/**
 * A candidate record that violates the search contract.
 * Collected per record and excluded, never thrown past the parser.
 */
export class DataIntegrityError extends SearchError {
  constructor(
    message: string,
    readonly recordIndex: number,
    readonly field: string
  ) {
    super(message, 500);
  }
}
