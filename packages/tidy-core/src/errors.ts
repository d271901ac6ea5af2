export type TidyErrorCode =
  | "INVALID_CONFIG"
  | "SPAN_OUT_OF_RANGE"
  | "UNKNOWN_ANNOTATION"
  | "LAYER_NOT_INSTALLED"
  | "ANNOTATION_REMOVE_FAILED";

type TidyErrorOptions = {
  context?: Record<string, unknown>;
  cause?: unknown;
};

export class TidyError extends Error {
  readonly code: TidyErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: TidyErrorCode, message: string, options: TidyErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "TidyError";
    this.code = code;
    this.context = options.context;
  }
}

export function isTidyError(error: unknown, code?: TidyErrorCode): error is TidyError {
  if (!(error instanceof TidyError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
