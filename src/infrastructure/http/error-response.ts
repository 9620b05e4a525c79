import multer from 'multer';

import { AppError, type AppErrorKind } from '@/shared/errors/app-error.js';

const STATUS_BY_KIND: Record<AppErrorKind, number> = {
  'invalid-parameter': 400,
  'payload-too-large': 413,
  'unsupported-media': 415,
  cancelled: 499,
  'composition-failure': 500,
  unexpected: 500,
};

export interface HttpErrorResponse {
  readonly status: number;
  readonly body: {
    readonly error: string;
    readonly message: string;
  };
}

export function toHttpError(error: unknown, maxUploadBytes: number): HttpErrorResponse {
  const appError = fromMulterError(error, maxUploadBytes) ?? AppError.fromUnknown(error, 'qr.unexpected');

  return {
    status: STATUS_BY_KIND[appError.kind],
    body: {
      error: appError.code,
      message: appError.exposeMessage ? appError.message : 'Internal server error',
    },
  };
}

function fromMulterError(error: unknown, maxUploadBytes: number): AppError | undefined {
  if (!(error instanceof multer.MulterError)) {
    return undefined;
  }

  if (error.code === 'LIMIT_FILE_SIZE') {
    return AppError.payloadTooLarge(maxUploadBytes);
  }

  return AppError.validation('qr.invalid-parameter', { field: error.field, multerCode: error.code }, error.message);
}
