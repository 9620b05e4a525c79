import { applyPalette, GIFEncoder, quantize } from 'gifenc';
import { decompressFrames, parseGIF, type ParsedFrame } from 'gifuct-js';

import { resolveFrameDelay } from './frameTiming.js';
import type { DecodedImage } from './rasterToolkit.js';

export interface GifFrame {
  image: DecodedImage;
  delayMs: number;
  disposalType: number;
}

export interface DecodedGif {
  width: number;
  height: number;
  /** Frames present in the source, including any beyond `maxFrames`. */
  sourceFrameCount: number;
  frames: GifFrame[];
}

export interface GifDecodeOptions {
  maxFrames: number;
  defaultDelayMs: number;
}

export interface GifEncodeFrame {
  image: DecodedImage;
  delayMs: number;
}

export interface GifEncodeOptions {
  /** 0 loops forever. */
  repeat: number;
  /** Palette size per frame, at most 256. */
  maxColors: number;
}

const DEFAULT_DECODE_OPTIONS: GifDecodeOptions = {
  maxFrames: Number.POSITIVE_INFINITY,
  defaultDelayMs: 100,
};

const DEFAULT_ENCODE_OPTIONS: GifEncodeOptions = {
  repeat: 0,
  maxColors: 256,
};

export function isGif(buffer: Buffer): boolean {
  return buffer.length >= 6 && (buffer.toString('latin1', 0, 6) === 'GIF87a' || buffer.toString('latin1', 0, 6) === 'GIF89a');
}

/**
 * Decodes the first `maxFrames` frames into full logical-screen RGBA images,
 * replaying patch placement and disposal the way a viewer would.
 */
export function decodeGif(buffer: Buffer, customOptions: Partial<GifDecodeOptions> = {}): DecodedGif {
  const options = { ...DEFAULT_DECODE_OPTIONS, ...customOptions } satisfies GifDecodeOptions;

  if (!isGif(buffer)) {
    throw new TypeError('Input is not a GIF stream');
  }

  const gif = parseGifBuffer(buffer);
  const parsedFrames = decompressFrames(gif, true);
  const rawDelays = rawDelaysOf(gif);
  const width = gif.lsd.width;
  const height = gif.lsd.height;

  if (parsedFrames.length === 0 || width === 0 || height === 0) {
    throw new Error('GIF contains no frames');
  }

  const kept = parsedFrames.slice(0, options.maxFrames);

  return {
    width,
    height,
    sourceFrameCount: parsedFrames.length,
    frames: expandToFullFrames(kept, rawDelays, width, height, options.defaultDelayMs),
  };
}

export function encodeGif(frames: GifEncodeFrame[], customOptions: Partial<GifEncodeOptions> = {}): Buffer {
  const options = { ...DEFAULT_ENCODE_OPTIONS, ...customOptions } satisfies GifEncodeOptions;
  const first = frames[0];

  if (!first) {
    throw new Error('Cannot encode a GIF without frames');
  }

  const { width, height } = first.image;
  const encoder = GIFEncoder();

  for (const frame of frames) {
    if (frame.image.width !== width || frame.image.height !== height) {
      throw new Error(
        `Frame size ${frame.image.width}x${frame.image.height} does not match ${width}x${height}`,
      );
    }

    const palette = quantize(frame.image.data, options.maxColors);
    const indexed = applyPalette(frame.image.data, palette);

    encoder.writeFrame(indexed, width, height, {
      palette,
      delay: frame.delayMs,
      repeat: options.repeat,
    });
  }

  encoder.finish();
  return Buffer.from(encoder.bytes());
}

function parseGifBuffer(buffer: Buffer): ReturnType<typeof parseGIF> {
  const copy = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(copy).set(buffer);
  return parseGIF(copy);
}

/**
 * Delay of each image block as stored in its graphic control extension, in ms.
 * gifuct-js rewrites a stored 0 to 100 ms, which would hide it from the caller's fallback.
 */
function rawDelaysOf(gif: { readonly frames?: readonly unknown[] }): Array<number | undefined> {
  return (gif.frames ?? []).filter(hasImageBlock).map((block) => {
    const { gce } = block;
    if (typeof gce !== 'object' || gce === null || !('delay' in gce) || typeof gce.delay !== 'number') {
      return undefined;
    }
    return gce.delay * 10;
  });
}

function hasImageBlock(block: unknown): block is { readonly image: unknown; readonly gce?: unknown } {
  return typeof block === 'object' && block !== null && 'image' in block;
}

function expandToFullFrames(
  frames: ParsedFrame[],
  rawDelays: ReadonlyArray<number | undefined>,
  width: number,
  height: number,
  defaultDelayMs: number,
): GifFrame[] {
  let previous = new Uint8ClampedArray(width * height * 4);

  return frames.map((frame, index) => {
    const beforeDrawing = new Uint8ClampedArray(previous);
    const working = new Uint8ClampedArray(previous);
    const { dims, patch } = frame;

    if (patch) {
      compositePatch(working, patch, dims, width, height);
    }

    const disposalType = frame.disposalType ?? 0;

    switch (disposalType) {
      case 2: {
        const cleared = new Uint8ClampedArray(working);
        clearPatch(cleared, dims, width, height);
        previous = cleared;
        break;
      }
      case 3: {
        previous = beforeDrawing;
        break;
      }
      default: {
        previous = working;
        break;
      }
    }

    return {
      image: { width, height, mode: 'palette', data: new Uint8ClampedArray(working) },
      delayMs: resolveFrameDelay(rawDelays[index] ?? frame.delay, defaultDelayMs),
      disposalType,
    } satisfies GifFrame;
  });
}

function compositePatch(
  destination: Uint8ClampedArray,
  patch: Uint8ClampedArray,
  dims: ParsedFrame['dims'],
  width: number,
  height: number,
): void {
  const { top, left, width: patchWidth, height: patchHeight } = dims;

  for (let y = 0; y < patchHeight; y += 1) {
    const destY = top + y;
    if (destY >= height) {
      break;
    }

    for (let x = 0; x < patchWidth; x += 1) {
      const destX = left + x;
      if (destX >= width) {
        break;
      }

      const patchIndex = (y * patchWidth + x) * 4;
      const alpha = patch[patchIndex + 3];
      if (alpha === 0) {
        continue;
      }

      const destIndex = (destY * width + destX) * 4;
      destination[destIndex] = patch[patchIndex];
      destination[destIndex + 1] = patch[patchIndex + 1];
      destination[destIndex + 2] = patch[patchIndex + 2];
      destination[destIndex + 3] = alpha;
    }
  }
}

function clearPatch(
  destination: Uint8ClampedArray,
  dims: ParsedFrame['dims'],
  width: number,
  height: number,
): void {
  const { top, left, width: patchWidth, height: patchHeight } = dims;
  const right = Math.min(width, left + patchWidth);
  const bottom = Math.min(height, top + patchHeight);

  for (let y = top; y < bottom; y += 1) {
    destination.fill(0, (y * width + left) * 4, (y * width + right) * 4);
  }
}
