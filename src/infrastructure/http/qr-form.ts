import { z } from 'zod';

import type { ComposeQrPayload } from '@/application/qr-composition/index.js';
import { AppError } from '@/shared/errors/app-error.js';

const TRUE_VALUES = new Set(['true', '1', 'on', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'off', 'no']);

const formBoolean = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .refine((value) => TRUE_VALUES.has(value) || FALSE_VALUES.has(value), {
    message: 'Expected a boolean value',
  })
  .transform((value) => TRUE_VALUES.has(value));

const formNumber = z.string().trim().min(1, 'Expected a number').pipe(z.coerce.number());

export const qrFormSchema = z.object({
  words: z.string({ required_error: 'words is required' }),
  version: formNumber.optional(),
  level: z.string().optional(),
  colorized: formBoolean.optional(),
  contrast: formNumber.optional(),
  brightness: formNumber.optional(),
});

/** The subset of a multer file the form needs. */
export interface FormFile {
  readonly originalname: string;
  readonly buffer: Buffer;
}

/**
 * Multipart fields arrive as strings. This only coerces them; range and level checks
 * belong to the compose handler so every caller gets the same rules.
 */
export function parseQrForm(body: unknown, file?: FormFile): ComposeQrPayload {
  const parsed = qrFormSchema.safeParse(body ?? {});

  if (!parsed.success) {
    const [first] = parsed.error.issues;
    throw AppError.validation(
      'qr.invalid-parameter',
      { issues: parsed.error.issues },
      first ? `${first.path.join('.')}: ${first.message}` : undefined,
    );
  }

  const form = parsed.data;

  return {
    text: form.words,
    version: form.version ?? 1,
    level: form.level ?? 'H',
    colorized: form.colorized ?? false,
    contrast: form.contrast ?? 1,
    brightness: form.brightness ?? 1,
    upload: file ? { filename: file.originalname, bytes: file.buffer } : undefined,
  };
}
