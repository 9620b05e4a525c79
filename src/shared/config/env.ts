import os from 'node:os';

import { z } from 'zod';

const MEBIBYTE = 1024 * 1024;

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    QR_MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * MEBIBYTE),
    QR_MAX_EDGE_PX: z.coerce.number().int().min(16).max(4096).default(600),
    QR_MAX_GIF_FRAMES: z.coerce.number().int().min(1).max(1000).default(50),
    QR_DEFAULT_FRAME_DELAY_MS: z.coerce.number().int().min(10).max(60_000).default(100),
    QR_VERSION_MIN: z.coerce.number().int().min(1).max(40).default(1),
    QR_VERSION_MAX: z.coerce.number().int().min(1).max(40).default(40),
    QR_WORKSPACE_ROOT: z.string().min(1).optional(),
  })
  .refine((env) => env.QR_VERSION_MIN <= env.QR_VERSION_MAX, {
    message: 'QR_VERSION_MIN must not exceed QR_VERSION_MAX',
    path: ['QR_VERSION_MIN'],
  });

export interface MediaLimits {
  readonly maxUploadBytes: number;
  readonly maxEdgePx: number;
  readonly maxFrames: number;
  readonly defaultFrameDelayMs: number;
}

export interface VersionRange {
  readonly min: number;
  readonly max: number;
}

export interface AppConfig {
  readonly port: number;
  readonly logLevel: string;
  readonly media: MediaLimits;
  readonly versions: VersionRange;
  readonly workspaceRoot: string;
}

export const DEFAULT_MEDIA_LIMITS: MediaLimits = {
  maxUploadBytes: 10 * MEBIBYTE,
  maxEdgePx: 600,
  maxFrames: 50,
  defaultFrameDelayMs: 100,
};

export const DEFAULT_VERSION_RANGE: VersionRange = { min: 1, max: 40 };

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const values = parsed.data;

  return {
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    media: {
      maxUploadBytes: values.QR_MAX_UPLOAD_BYTES,
      maxEdgePx: values.QR_MAX_EDGE_PX,
      maxFrames: values.QR_MAX_GIF_FRAMES,
      defaultFrameDelayMs: values.QR_DEFAULT_FRAME_DELAY_MS,
    },
    versions: { min: values.QR_VERSION_MIN, max: values.QR_VERSION_MAX },
    workspaceRoot: values.QR_WORKSPACE_ROOT ?? os.tmpdir(),
  };
}
