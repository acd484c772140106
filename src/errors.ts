export type FetchErrorKind = "transport" | "http" | "parse";

/**
 * The credential file could not be read, or held nothing but whitespace.
 */
export class CredentialError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CredentialError";
    this.path = path;
  }
}

/**
 * The health-check request failed. Reported through ConnectionStatus,
 * never thrown out of testConnection().
 */
export class ConnectionError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
    this.status = status;
  }
}

/**
 * One ticker's request failed. The batch it belongs to carries on without it.
 */
export class FetchError extends Error {
  readonly ticker: string;
  readonly kind: FetchErrorKind;
  readonly status?: number;

  constructor(
    ticker: string,
    kind: FetchErrorKind,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "FetchError";
    this.ticker = ticker;
    this.kind = kind;
    this.status = options?.status;
  }
}

export class ValidationError extends Error {
  // Offending columns, when the failure is about columns
  readonly columns: string[];

  constructor(message: string, columns: string[] = []) {
    super(message);
    this.name = "ValidationError";
    this.columns = columns;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
