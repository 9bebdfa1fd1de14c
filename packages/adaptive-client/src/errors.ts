// packages/adaptive-client/src/errors.ts
//
// Error taxonomy. Everything thrown by the client is one of these, except
// ItemProcessorMisuseError which is a TypeError (caller misuse, not a
// service condition).

type ErrorOptionsWithCause = { cause?: unknown };

export class AdaptiveEvalError extends Error {
  constructor(message: string, options?: ErrorOptionsWithCause) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or unusable client configuration. Raised at construction. */
export class ConfigurationError extends AdaptiveEvalError {}

/** Non-2xx response or transport failure. Never retried by the client. */
export class ApiError extends AdaptiveEvalError {
  public readonly status: number | undefined;
  constructor(message: string, options?: ErrorOptionsWithCause & { status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/** HTTP 413. The caller has to shrink the request (usually its metadata). */
export class PayloadTooLargeError extends ApiError {
  constructor(message = "Payload too large.", options?: ErrorOptionsWithCause) {
    super(message, { ...options, status: 413 });
  }
}

/** HTTP 422, or a request the client can tell is invalid before sending it. */
export class ValidationError extends ApiError {}

export class MalformedResponseError extends AdaptiveEvalError {
  public readonly path: string;
  public readonly key: string | undefined;
  constructor(message: string, options: ErrorOptionsWithCause & { path: string; key?: string }) {
    super(message, options);
    this.path = options.path;
    this.key = options.key;
  }
}

export class UnrecognizedItemTypeError extends AdaptiveEvalError {
  public readonly itemType: string;
  constructor(itemType: string) {
    super(`API has returned unrecognized item type: ${itemType}`);
    this.itemType = itemType;
  }
}

export class UnsupportedFeatureError extends AdaptiveEvalError {
  public readonly feature: string;
  constructor(feature: string, message: string) {
    super(message);
    this.feature = feature;
  }
}

/** The orchestrator ended up with a state it cannot score. Not retryable. */
export class RunStateError extends AdaptiveEvalError {}

export class ItemProcessorMisuseError extends TypeError {
  constructor(message = "Sync client cannot use an async item processor. Use the async client instead.") {
    super(message);
    this.name = "ItemProcessorMisuseError";
  }
}
