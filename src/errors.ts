export type ErrorKind =
  | "input"
  | "resolution"
  | "staging"
  | "publish"
  | "callback";

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export class LayerError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Missing or unsupported request fields, raised before any external call. */
export class InputError extends LayerError {
  constructor(message: string, options?: ErrorOptions) {
    super("input", message, options);
  }
}

export class ResolutionError extends LayerError {
  constructor(message: string, options?: ErrorOptions) {
    super("resolution", message, options);
  }
}

/** Package installation or archive creation failed. */
export class StagingError extends LayerError {
  constructor(message: string, options?: ErrorOptions) {
    super("staging", message, options);
  }
}

export class PublishError extends LayerError {
  constructor(message: string, options?: ErrorOptions) {
    super("publish", message, options);
  }
}

export class CallbackError extends LayerError {
  constructor(message: string, options?: ErrorOptions) {
    super("callback", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
