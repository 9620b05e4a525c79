import type { WorkspaceHandle } from '@domain/qr-composition/index.js';
import { createCanvas } from '@napi-rs/canvas';
import { PNG } from 'pngjs';
import { afterAll, afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FormatNormalizer, NORMALIZED_FILE } from '@/application/qr-composition/index.js';
import { TempWorkspaceProvider } from '@/infrastructure/workspace/index.js';

import {
  makePng,
  makeTempRoot,
  pixelAt,
  removeTempRoot,
  solidPixels,
} from '../../../support/media-fixtures.js';

describe('FormatNormalizer', () => {
  const normalizer = new FormatNormalizer({ maxEdgePx: 600 });
  let root: string;
  let provider: TempWorkspaceProvider;
  let workspace: WorkspaceHandle;

  beforeEach(async () => {
    root = await makeTempRoot();
    provider = new TempWorkspaceProvider(root);
    workspace = await provider.acquire();
  });

  afterEach(async () => {
    await provider.release(workspace);
  });

  afterAll(async () => {
    await removeTempRoot(root);
  });

  const readNormalized = async () => PNG.sync.read(await workspace.read(NORMALIZED_FILE));

  it('persists an opaque PNG within bounds unchanged in size', async () => {
    const bytes = makePng(300, 300, solidPixels(300, 300, [20, 40, 60, 255]), 2);
    const result = await normalizer.normalize({ bytes, extension: 'png' }, workspace);

    expect(result.outcome).toBe('normalized');
    expect(result.path).toBe(workspace.resolve(NORMALIZED_FILE));
    expect(result.media.kind).toBe('static');

    const png = await readNormalized();
    expect([png.width, png.height]).toEqual([300, 300]);
    expect(png.color).toBe(true);
    expect(png.alpha).toBe(false);
    expect(pixelAt(png.data, 300, 150, 150)).toEqual([20, 40, 60, 255]);
  });

  it('bounds the longer edge to the configured limit', async () => {
    const bytes = makePng(900, 450, solidPixels(900, 450, [200, 10, 10, 255]), 2);
    await normalizer.normalize({ bytes, extension: 'png' }, workspace);

    const png = await readNormalized();
    expect([png.width, png.height]).toEqual([600, 300]);
  });

  it('turns transparent pixels into exactly white', async () => {
    const pixels = solidPixels(10, 10, [0, 0, 0, 0]);
    pixels.set([255, 0, 0, 255], 0);

    await normalizer.normalize({ bytes: makePng(10, 10, pixels, 6), extension: 'png' }, workspace);

    const png = await readNormalized();
    expect(pixelAt(png.data, 10, 0, 0)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(png.data, 10, 5, 5)).toEqual([255, 255, 255, 255]);
  });

  it('expands greyscale sources to RGB', async () => {
    const bytes = makePng(4, 4, solidPixels(4, 4, [70, 70, 70, 255]), 0);
    const result = await normalizer.normalize({ bytes, extension: 'png' }, workspace);

    expect(result.media).toMatchObject({ kind: 'static', image: { mode: 'rgb' } });
    const png = await readNormalized();
    expect(pixelAt(png.data, 4, 3, 3)).toEqual([70, 70, 70, 255]);
  });

  it('converts formats outside the native set to PNG', async () => {
    const canvas = createCanvas(20, 20);
    const ctx = canvas.getContext('2d');
    ctx.fillStyle = '#ff0000';
    ctx.fillRect(0, 0, 10, 20);

    await normalizer.normalize({ bytes: canvas.toBuffer('image/webp'), extension: 'webp' }, workspace);

    const png = await readNormalized();
    expect([png.width, png.height]).toEqual([20, 20]);
    expect(png.alpha).toBe(false);
    expect(pixelAt(png.data, 20, 17, 10)).toEqual([255, 255, 255, 255]);
  });

  it('decodes by content when the declared extension is wrong', async () => {
    const canvas = createCanvas(30, 12);
    const ctx = canvas.getContext('2d');
    ctx.fillStyle = '#204060';
    ctx.fillRect(0, 0, 30, 12);

    await normalizer.normalize({ bytes: canvas.toBuffer('image/jpeg'), extension: 'png' }, workspace);

    const png = await readNormalized();
    expect([png.width, png.height]).toEqual([30, 12]);
    expect(png.alpha).toBe(false);
  });

  it('reports undecodable bytes as unsupported media naming the extension', async () => {
    await expect(
      normalizer.normalize({ bytes: Buffer.from('not an image'), extension: 'png' }, workspace),
    ).rejects.toMatchObject({
      kind: 'unsupported-media',
      code: 'qr.unsupported-media',
      message: 'Unable to process image format .png. Supported: JPG, PNG, BMP, GIF, WebP',
    });
    expect(await workspace.exists(NORMALIZED_FILE)).toBe(false);
  });
});
