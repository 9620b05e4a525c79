import os from 'node:os';

import { describe, expect, it } from 'vitest';

import { loadConfig } from '@/shared/config/env.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe('info');
    expect(config.media).toEqual({
      maxUploadBytes: 10_485_760,
      maxEdgePx: 600,
      maxFrames: 50,
      defaultFrameDelayMs: 100,
    });
    expect(config.versions).toEqual({ min: 1, max: 40 });
    expect(config.workspaceRoot).toBe(os.tmpdir());
  });

  it('reads overrides from string values', () => {
    const config = loadConfig({
      PORT: '8080',
      LOG_LEVEL: 'debug',
      QR_MAX_UPLOAD_BYTES: '2048',
      QR_MAX_GIF_FRAMES: '12',
      QR_VERSION_MIN: '2',
      QR_VERSION_MAX: '10',
      QR_WORKSPACE_ROOT: '/var/tmp/qr',
    });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
    expect(config.media.maxUploadBytes).toBe(2048);
    expect(config.media.maxFrames).toBe(12);
    expect(config.versions).toEqual({ min: 2, max: 10 });
    expect(config.workspaceRoot).toBe('/var/tmp/qr');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrowError(/^Invalid environment configuration: PORT/);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrowError(/LOG_LEVEL/);
  });

  it('rejects an inverted version range', () => {
    expect(() => loadConfig({ QR_VERSION_MIN: '20', QR_VERSION_MAX: '5' })).toThrowError(
      'QR_VERSION_MIN: QR_VERSION_MIN must not exceed QR_VERSION_MAX',
    );
  });
});
