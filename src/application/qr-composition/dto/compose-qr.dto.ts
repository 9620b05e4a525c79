import { ERROR_CORRECTION_LEVELS } from '@domain/qr-composition/index.js';
import { z } from 'zod';

import type { VersionRange } from '@/shared/config/env.js';

const RESERVED_NAMES = new Set(['', '.', '..']);

export const uploadedMediaSchema = z.object({
  filename: z
    .string()
    .min(1)
    .refine((name) => !RESERVED_NAMES.has((name.split(/[\\/]/).pop() ?? '').trim()), {
      message: 'Upload filename is not usable',
    }),
  bytes: z.instanceof(Buffer),
});

export function createComposeQrSchema(versions: VersionRange) {
  return z.object({
    text: z.string().min(1, 'words must not be empty'),
    version: z
      .number()
      .int()
      .min(versions.min, `Version must be between ${versions.min} and ${versions.max}`)
      .max(versions.max, `Version must be between ${versions.min} and ${versions.max}`),
    // Raw string in, checked level out: callers pass whatever the client sent.
    level: z.string().pipe(
      z.enum(ERROR_CORRECTION_LEVELS, {
        errorMap: () => ({ message: 'Level must be one of: L, M, Q, H' }),
      }),
    ),
    upload: uploadedMediaSchema.optional(),
    colorized: z.boolean().default(false),
    contrast: z.number().min(0.1).max(10).default(1),
    brightness: z.number().min(0.1).max(10).default(1),
  });
}

export type ComposeQrSchema = ReturnType<typeof createComposeQrSchema>;

export type ComposeQrPayload = z.input<ComposeQrSchema>;

export type ValidatedComposeQr = z.output<ComposeQrSchema>;
