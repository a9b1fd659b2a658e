export type ErrorKind = "fetch" | "extract" | "state";

export class WatcherError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class FetchError extends WatcherError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("fetch", message, options);
    this.status = options?.status;
  }
}

export class ExtractError extends WatcherError {
  constructor(message: string) {
    super("extract", message);
  }
}

export class StateError extends WatcherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("state", message, options);
  }
}
