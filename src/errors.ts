export type FrameStimulusErrorCode =
  | "E_INVALID_ARGUMENT"
  | "E_TRANSPORT"
  | "E_ENCODING"
  | "E_CONNECT_TIMEOUT";

export class FrameStimulusError extends Error {
  readonly code: FrameStimulusErrorCode;

  constructor(
    code: FrameStimulusErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.code = code;
    this.name = "FrameStimulusError";
  }
}

/**
 * Malformed configuration or arguments, detected before any I/O.
 */
export class InvalidArgumentError extends FrameStimulusError {
  constructor(message: string) {
    super("E_INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * A hand-off to the transport made no progress, or the connection broke.
 */
export class TransportError extends FrameStimulusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("E_TRANSPORT", message, options);
    this.name = "TransportError";
  }
}

export class EncodingError extends FrameStimulusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("E_ENCODING", message, options);
    this.name = "EncodingError";
  }
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
