export type FetchErrorKind = "network" | "extraction" | "relocation" | "config";

/**
 * Terminal failure of a materialization run. `kind` says which phase failed;
 * the underlying error, if any, is kept as `cause`.
 */
export class FetchError extends Error {
  declare cause?: unknown;
  readonly kind: FetchErrorKind;

  constructor(kind: FetchErrorKind, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "FetchError";
    this.kind = kind;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class NetworkError extends FetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("network", message, options);
    this.name = "NetworkError";
  }
}

export class ExtractionError extends FetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("extraction", message, options);
    this.name = "ExtractionError";
  }
}

export class RelocationError extends FetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("relocation", message, options);
    this.name = "RelocationError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
