import { describe, expect, it } from 'vitest';

import { parseQrForm } from '@/infrastructure/http/index.js';

const captureError = (attempt: () => unknown): unknown => {
  try {
    attempt();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the form to be rejected');
};

describe('parseQrForm', () => {
  it('fills in form defaults', () => {
    expect(parseQrForm({ words: 'hello' })).toEqual({
      text: 'hello',
      version: 1,
      level: 'H',
      colorized: false,
      contrast: 1,
      brightness: 1,
      upload: undefined,
    });
  });

  it('coerces multipart strings', () => {
    const payload = parseQrForm({
      words: 'hello',
      version: '5',
      level: 'Q',
      colorized: 'On',
      contrast: ' 1.5 ',
      brightness: '0.8',
    });

    expect(payload).toMatchObject({ version: 5, level: 'Q', colorized: true, contrast: 1.5, brightness: 0.8 });
  });

  it('passes the level through untouched for the handler to check', () => {
    expect(parseQrForm({ words: 'hello', level: 'X' }).level).toBe('X');
  });

  it('maps the uploaded file', () => {
    const buffer = Buffer.from('img');
    const payload = parseQrForm({ words: 'hello' }, { originalname: 'cat.png', buffer });

    expect(payload.upload).toEqual({ filename: 'cat.png', bytes: buffer });
  });

  it('rejects a missing text field', () => {
    expect(() => parseQrForm({})).toThrowError('words: words is required');
    expect(() => parseQrForm(undefined)).toThrowError('words: words is required');
  });

  it.each([
    ['version', 'abc'],
    ['version', ''],
    ['contrast', 'bright'],
    ['colorized', 'maybe'],
  ])('rejects %s=%j as an invalid parameter', (field, value) => {
    expect(captureError(() => parseQrForm({ words: 'hello', [field]: value }))).toMatchObject({
      kind: 'invalid-parameter',
      code: 'qr.invalid-parameter',
    });
  });
});
