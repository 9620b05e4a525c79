import type { WorkspaceHandle } from '@domain/qr-composition/index.js';
import { afterAll, afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FrameReducer, OPTIMIZED_FILE } from '@/application/qr-composition/index.js';
import { TempWorkspaceProvider } from '@/infrastructure/workspace/index.js';
import { DEFAULT_MEDIA_LIMITS } from '@/shared/config/env.js';
import { decodeGif } from '@/shared/media/gifToolkit.js';

import { makeGif, makeTempRoot, pixelAt, removeTempRoot } from '../../../support/media-fixtures.js';

describe('FrameReducer', () => {
  const reducer = new FrameReducer(DEFAULT_MEDIA_LIMITS);
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

  it('re-encodes every frame with its own delay', async () => {
    const bytes = makeGif(200, 200, [
      { color: [255, 0, 0, 255], delayMs: 100 },
      { color: [0, 255, 0, 255], delayMs: 250 },
      { color: [0, 0, 255, 255], delayMs: 70 },
    ]);
    const originalPath = await workspace.write('clip.gif', bytes);

    const result = await reducer.reduce({ bytes, originalPath }, workspace);

    expect(result.outcome).toBe('normalized');
    expect(result.path).toBe(workspace.resolve(OPTIMIZED_FILE));
    if (result.outcome !== 'normalized' || result.media.kind !== 'animated') {
      throw new Error('expected an animated normalization');
    }

    const { sequence } = result.media;
    expect(result.truncatedFrom).toBeUndefined();
    expect(sequence.loopCount).toBe(0);
    expect(sequence.frames.map((frame) => frame.durationMs)).toEqual([100, 250, 70]);
    expect(sequence.frames.every((frame) => frame.image.mode === 'rgb')).toBe(true);

    const written = decodeGif(await workspace.read(OPTIMIZED_FILE));
    expect([written.width, written.height]).toEqual([200, 200]);
    expect(written.frames.map((frame) => frame.delayMs)).toEqual([100, 250, 70]);

    const [red, green, blue] = written.frames.map((frame) => pixelAt(frame.image.data, 200, 100, 100));
    expect(red[0]).toBeGreaterThan(180);
    expect(green[1]).toBeGreaterThan(180);
    expect(blue[2]).toBeGreaterThan(180);
  });

  it('keeps the first 50 frames of a longer animation', async () => {
    const frames = Array.from({ length: 55 }, (_, index) => ({
      color: [index * 4, 0, 255 - index * 4, 255] as const,
      delayMs: (index + 1) * 10,
    }));
    const bytes = makeGif(8, 8, frames);

    const result = await reducer.reduce({ bytes, originalPath: await workspace.write('long.gif', bytes) }, workspace);

    if (result.outcome !== 'normalized' || result.media.kind !== 'animated') {
      throw new Error('expected an animated normalization');
    }
    expect(result.truncatedFrom).toBe(55);
    expect(result.media.sequence.frames).toHaveLength(50);

    const written = decodeGif(await workspace.read(OPTIMIZED_FILE));
    expect(written.frames.map((frame) => frame.delayMs)).toEqual(frames.slice(0, 50).map((frame) => frame.delayMs));
  });

  it('substitutes the default delay for frames without one', async () => {
    const bytes = makeGif(8, 8, [
      { color: [0, 0, 0, 255], delayMs: 0 },
      { color: [255, 255, 255, 255], delayMs: 250 },
    ]);

    const reduced = await reducer.reduceFrames(bytes);

    expect(reduced.sequence.frames.map((frame) => frame.durationMs)).toEqual([100, 250]);
  });

  it('applies the configured default delay to frames stored with a zero delay', async () => {
    const slowDefault = new FrameReducer({ ...DEFAULT_MEDIA_LIMITS, defaultFrameDelayMs: 250 });
    const bytes = makeGif(8, 8, [
      { color: [0, 0, 0, 255], delayMs: 0 },
      { color: [255, 255, 255, 255], delayMs: 120 },
    ]);

    const reduced = await slowDefault.reduceFrames(bytes);

    expect(reduced.sequence.frames.map((frame) => frame.durationMs)).toEqual([250, 120]);
  });

  it('bounds oversized frames', async () => {
    const bytes = makeGif(800, 400, [{ color: [10, 20, 30, 255], delayMs: 100 }]);

    const reduced = await reducer.reduceFrames(bytes);
    const [frame] = reduced.sequence.frames;

    expect([frame.image.width, frame.image.height]).toEqual([600, 300]);
  });

  it('falls back to the original upload when the GIF cannot be reduced', async () => {
    const bytes = Buffer.from('plain text');
    const originalPath = await workspace.write('fake.gif', bytes);

    await expect(reducer.reduce({ bytes, originalPath }, workspace)).resolves.toEqual({
      outcome: 'passthrough',
      path: originalPath,
      kind: 'animated',
      reason: 'Input is not a GIF stream',
    });
    expect(await workspace.exists(OPTIMIZED_FILE)).toBe(false);
  });
});
