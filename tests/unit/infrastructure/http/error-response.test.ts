import multer from 'multer';
import { describe, expect, it } from 'vitest';

import { toHttpError } from '@/infrastructure/http/index.js';
import { AppError } from '@/shared/errors/app-error.js';

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

describe('toHttpError', () => {
  it.each([
    [AppError.validation('qr.invalid-parameter', {}, 'Level must be one of: L, M, Q, H'), 400],
    [AppError.payloadTooLarge(MAX_UPLOAD_BYTES, MAX_UPLOAD_BYTES + 1), 413],
    [AppError.unsupportedMedia('tiff', new Error('decode failed')), 415],
    [AppError.cancelled('composed'), 499],
    [AppError.compositionFailure('qr.composition-failed', new Error('boom')), 500],
  ])('maps %s to %i', (error, status) => {
    const response = toHttpError(error, MAX_UPLOAD_BYTES);

    expect(response.status).toBe(status);
    expect(response.body).toEqual({ error: error.code, message: error.message });
  });

  it('uses the documented messages for client errors', () => {
    expect(toHttpError(AppError.payloadTooLarge(MAX_UPLOAD_BYTES), MAX_UPLOAD_BYTES).body.message).toBe(
      'File too large. Maximum size is 10MB',
    );
    expect(toHttpError(AppError.unsupportedMedia('tiff', undefined), MAX_UPLOAD_BYTES).body.message).toBe(
      'Unable to process image format .tiff. Supported: JPG, PNG, BMP, GIF, WebP',
    );
    expect(
      toHttpError(AppError.compositionFailure('qr.composition-failed', new Error('boom')), MAX_UPLOAD_BYTES).body
        .message,
    ).toBe('QR code generation error: boom');
  });

  it('hides the message of unexpected errors', () => {
    expect(toHttpError(new Error('database password leaked'), MAX_UPLOAD_BYTES)).toEqual({
      status: 500,
      body: { error: 'qr.unexpected', message: 'Internal server error' },
    });
  });

  it('maps the multer size limit to payload too large', () => {
    const response = toHttpError(new multer.MulterError('LIMIT_FILE_SIZE', 'picture'), MAX_UPLOAD_BYTES);

    expect(response.status).toBe(413);
    expect(response.body.error).toBe('qr.payload-too-large');
  });

  it('maps other multer errors to invalid parameters', () => {
    const response = toHttpError(new multer.MulterError('LIMIT_UNEXPECTED_FILE', 'other'), MAX_UPLOAD_BYTES);

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('qr.invalid-parameter');
  });
});
