export type TalkbackErrorCode =
  | "NETWORK_ERROR"
  | "MALFORMED_RESPONSE"
  | "CONSENT_TIMEOUT"
  | "CONFIG_ERROR";

export class TalkbackError extends Error {
  constructor(
    message: string,
    public readonly code: TalkbackErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TalkbackError";
  }
}

/**
 * Transport failure, or a response with a non-2xx status.
 */
export class NetworkError extends TalkbackError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, "NETWORK_ERROR", options);
    this.name = "NetworkError";
  }
}

/**
 * The backend answered, but not with the shape we rely on.
 * `path` points at the offending field when validation found one.
 */
export class MalformedResponseError extends TalkbackError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly path: Array<string | number> = [],
    options?: { cause?: unknown },
  ) {
    super(message, "MALFORMED_RESPONSE", options);
    this.name = "MalformedResponseError";
  }
}

export class ConsentTimeoutError extends TalkbackError {
  constructor(public readonly timeoutSeconds: number) {
    super(`accepting terms and conditions timed out after ${timeoutSeconds}s`, "CONSENT_TIMEOUT");
    this.name = "ConsentTimeoutError";
  }
}

export class ConfigError extends TalkbackError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}

export function isTalkbackError(error: unknown): error is TalkbackError {
  return error instanceof TalkbackError;
}
