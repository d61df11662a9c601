// Typed failures for every phase. Only ConfigError should end the process before a phase
// starts; the rest propagate to the caller of runThumbnailer (or stay per-unit values).

export type ErrorCode =
  | 'IO_ERROR'
  | 'REMOTE_ERROR'
  | 'DECODE_FAILED'
  | 'ENCODE_FAILED'
  | 'CONFIG_ERROR';

export type ErrorDetails = Record<string, string | number | boolean | undefined>;

export interface ThumbnailerErrorShape {
  code: ErrorCode;
  message: string;
  details?: ErrorDetails;
  cause?: unknown;
}

export class ThumbnailerError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;

  constructor(opts: ThumbnailerErrorShape) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'ThumbnailerError';
    this.code = opts.code;
    this.details = opts.details;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class IOError extends ThumbnailerError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super({ code: 'IO_ERROR', message, details, cause });
    this.name = 'IOError';
  }
}

export class RemoteError extends ThumbnailerError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super({ code: 'REMOTE_ERROR', message, details, cause });
    this.name = 'RemoteError';
  }
}

export class ConfigError extends ThumbnailerError {
  constructor(message: string, details?: ErrorDetails) {
    super({ code: 'CONFIG_ERROR', message, details });
    this.name = 'ConfigError';
  }
}

export type TransformErrorKind = 'DecodeFailed' | 'EncodeFailed';

export class TransformError extends ThumbnailerError {
  readonly kind: TransformErrorKind;

  constructor(kind: TransformErrorKind, message: string, details?: ErrorDetails, cause?: unknown) {
    super({
      code: kind === 'DecodeFailed' ? 'DECODE_FAILED' : 'ENCODE_FAILED',
      message,
      details,
      cause,
    });
    this.name = 'TransformError';
    this.kind = kind;
  }
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function isThumbnailerError(err: unknown): err is ThumbnailerError {
  return err instanceof ThumbnailerError;
}

/** Message of anything thrown, for log lines. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
