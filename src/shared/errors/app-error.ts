import { StudioError } from './base.error.js';

export type AppErrorKind =
  | 'invalid-parameter'
  | 'payload-too-large'
  | 'unsupported-media'
  | 'composition-failure'
  | 'cancelled'
  | 'unexpected';

interface AppErrorOptions {
  readonly code: string;
  readonly kind: AppErrorKind;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export class AppError extends StudioError {
  public readonly kind: AppErrorKind;

  private constructor(options: AppErrorOptions) {
    super({
      code: options.code,
      message: options.message,
      metadata: options.metadata,
      cause: options.cause,
      exposeMessage: options.exposeMessage ?? false,
    });
    this.kind = options.kind;
  }

  /** Client-side mistakes; the caller should not retry the same request. */
  public get isClientError(): boolean {
    return (
      this.kind === 'invalid-parameter' ||
      this.kind === 'payload-too-large' ||
      this.kind === 'unsupported-media' ||
      this.kind === 'cancelled'
    );
  }

  public static fromUnknown(error: unknown, code = 'UNEXPECTED_ERROR'): AppError {
    if (error instanceof AppError) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error('Unknown error');
    return new AppError({ code, kind: 'unexpected', message: cause.message, cause, exposeMessage: false });
  }

  public static validation(code: string, metadata: Record<string, unknown>, message?: string): AppError {
    return new AppError({
      code,
      kind: 'invalid-parameter',
      message: message ?? 'Validation failed for the provided payload.',
      metadata,
      exposeMessage: true,
    });
  }

  public static payloadTooLarge(maxBytes: number, sizeBytes?: number): AppError {
    const maxMb = maxBytes / 1024 / 1024;
    return new AppError({
      code: 'qr.payload-too-large',
      kind: 'payload-too-large',
      message: `File too large. Maximum size is ${maxMb}MB`,
      metadata: { sizeBytes, maxBytes },
      exposeMessage: true,
    });
  }

  public static unsupportedMedia(extension: string, cause: unknown): AppError {
    const label = extension === '' ? '(none)' : `.${extension}`;
    return new AppError({
      code: 'qr.unsupported-media',
      kind: 'unsupported-media',
      message: `Unable to process image format ${label}. Supported: JPG, PNG, BMP, GIF, WebP`,
      metadata: { extension },
      cause,
      exposeMessage: true,
    });
  }

  public static compositionFailure(code: string, cause: unknown, metadata?: Record<string, unknown>): AppError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new AppError({
      code,
      kind: 'composition-failure',
      message: `QR code generation error: ${reason}`,
      metadata,
      cause,
      exposeMessage: true,
    });
  }

  public static cancelled(stage: string, cause?: unknown): AppError {
    return new AppError({
      code: 'qr.request-cancelled',
      kind: 'cancelled',
      message: 'The request was cancelled before it completed.',
      metadata: { stage },
      cause,
      exposeMessage: true,
    });
  }
}
