import { createCanvas, loadImage, type Canvas } from '@napi-rs/canvas';
import { PNG } from 'pngjs';

import { isGif } from './gifToolkit.js';

/**
 * Colour layout the source was encoded with. Pixel data is always expanded to
 * interleaved RGBA on decode; the mode records what that RGBA came from so the
 * right conversion can be picked when flattening.
 */
export type ColorMode = 'rgb' | 'rgba' | 'palette' | 'luminance' | 'luminance-alpha';

export interface DecodedImage {
  readonly width: number;
  readonly height: number;
  readonly mode: ColorMode;
  readonly data: Uint8ClampedArray;
}

export interface RgbColor {
  readonly red: number;
  readonly green: number;
  readonly blue: number;
}

export const WHITE: RgbColor = { red: 255, green: 255, blue: 255 };

/** Extensions the composition step reads directly; others are converted to PNG first. */
export const NATIVE_EXTENSIONS: ReadonlySet<string> = new Set(['jpg', 'jpeg', 'png', 'bmp', 'gif']);

export function extensionOf(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  if (dot <= 0 || dot === base.length - 1) {
    return '';
  }

  return base.slice(dot + 1).toLowerCase();
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export function isPng(bytes: Buffer): boolean {
  return bytes.length >= PNG_SIGNATURE.length && bytes.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE);
}

/**
 * Picks the decoder from the content, not the declared name: PNG goes through pngjs
 * for its colour-type metadata, everything else through the canvas decoder.
 */
export async function decodeImage(bytes: Buffer): Promise<DecodedImage> {
  if (isPng(bytes)) {
    return decodePng(bytes);
  }

  return decodeWithCanvas(bytes, isGif(bytes) ? 'palette' : undefined);
}

export function decodePng(bytes: Buffer): DecodedImage {
  const png = PNG.sync.read(bytes);

  return {
    width: png.width,
    height: png.height,
    mode: pngColorMode(png.palette, png.color, png.alpha),
    data: new Uint8ClampedArray(png.data),
  };
}

async function decodeWithCanvas(bytes: Buffer, modeHint?: ColorMode): Promise<DecodedImage> {
  const image = await loadImage(bytes);
  const { width, height } = image;

  if (width === 0 || height === 0) {
    throw new Error('Decoded image has no pixels');
  }

  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');
  ctx.drawImage(image, 0, 0);
  const data = new Uint8ClampedArray(ctx.getImageData(0, 0, width, height).data);

  return {
    width,
    height,
    mode: modeHint ?? (hasTransparency(data) ? 'rgba' : 'rgb'),
    data,
  };
}

function pngColorMode(palette: boolean, color: boolean, alpha: boolean): ColorMode {
  if (palette) {
    return 'palette';
  }

  if (color) {
    return alpha ? 'rgba' : 'rgb';
  }

  return alpha ? 'luminance-alpha' : 'luminance';
}

export function hasTransparency(data: Uint8ClampedArray): boolean {
  for (let index = 3; index < data.length; index += 4) {
    if (data[index] < 255) {
      return true;
    }
  }

  return false;
}

type OpaqueConversion = (image: DecodedImage, background: RgbColor) => Uint8ClampedArray;

const fromRgb: OpaqueConversion = (image) => withOpaqueAlpha(image.data);

const fromLuminance: OpaqueConversion = (image) => withOpaqueAlpha(spreadLuminance(image.data));

const fromAlphaChannel: OpaqueConversion = (image, background) => compositeOver(image.data, background);

const fromLuminanceAlpha: OpaqueConversion = (image, background) =>
  compositeOver(spreadLuminance(image.data), background);

// Decoders already expand the palette (and its tRNS entries) into RGBA.
const fromPalette: OpaqueConversion = (image, background) => compositeOver(image.data, background);

const OPAQUE_CONVERSIONS: Record<ColorMode, OpaqueConversion> = {
  rgb: fromRgb,
  rgba: fromAlphaChannel,
  palette: fromPalette,
  luminance: fromLuminance,
  'luminance-alpha': fromLuminanceAlpha,
};

/** Resolves transparency against `background`; the result is always opaque RGB. */
export function flattenToRgb(image: DecodedImage, background: RgbColor = WHITE): DecodedImage {
  const data = OPAQUE_CONVERSIONS[image.mode](image, background);
  return { width: image.width, height: image.height, mode: 'rgb', data };
}

/** Plain colour conversion: alpha is discarded, not blended. */
export function convertToRgb(image: DecodedImage): DecodedImage {
  const data = image.mode === 'luminance' || image.mode === 'luminance-alpha'
    ? withOpaqueAlpha(spreadLuminance(image.data))
    : withOpaqueAlpha(image.data);

  return { width: image.width, height: image.height, mode: 'rgb', data };
}

function withOpaqueAlpha(source: Uint8ClampedArray): Uint8ClampedArray {
  const result = new Uint8ClampedArray(source);
  for (let index = 3; index < result.length; index += 4) {
    result[index] = 255;
  }
  return result;
}

function spreadLuminance(source: Uint8ClampedArray): Uint8ClampedArray {
  const result = new Uint8ClampedArray(source);
  for (let index = 0; index < result.length; index += 4) {
    result[index + 1] = result[index];
    result[index + 2] = result[index];
  }
  return result;
}

function compositeOver(source: Uint8ClampedArray, background: RgbColor): Uint8ClampedArray {
  const result = new Uint8ClampedArray(source.length);
  const { red, green, blue } = background;

  for (let index = 0; index < source.length; index += 4) {
    const alpha = source[index + 3];

    if (alpha === 255) {
      result[index] = source[index];
      result[index + 1] = source[index + 1];
      result[index + 2] = source[index + 2];
    } else if (alpha === 0) {
      result[index] = red;
      result[index + 1] = green;
      result[index + 2] = blue;
    } else {
      const inverse = 255 - alpha;
      result[index] = Math.round((source[index] * alpha + red * inverse) / 255);
      result[index + 1] = Math.round((source[index + 1] * alpha + green * inverse) / 255);
      result[index + 2] = Math.round((source[index + 2] * alpha + blue * inverse) / 255);
    }

    result[index + 3] = 255;
  }

  return result;
}

/**
 * Target size when the longer edge must not exceed `maxEdge`. Never grows the image.
 */
export function fitWithin(width: number, height: number, maxEdge: number): { width: number; height: number } {
  const longer = Math.max(width, height);
  if (longer <= maxEdge) {
    return { width, height };
  }

  const scale = maxEdge / longer;
  return {
    width: width >= height ? maxEdge : Math.max(1, Math.round(width * scale)),
    height: height >= width ? maxEdge : Math.max(1, Math.round(height * scale)),
  };
}

export function boundDimensions(image: DecodedImage, maxEdge: number): DecodedImage {
  const target = fitWithin(image.width, image.height, maxEdge);
  return resizeImage(image, target.width, target.height);
}

export function resizeImage(image: DecodedImage, width: number, height: number): DecodedImage {
  if (width === image.width && height === image.height) {
    return image;
  }

  const target = createCanvas(width, height);
  const ctx = target.getContext('2d');
  ctx.imageSmoothingEnabled = true;
  ctx.imageSmoothingQuality = 'high';
  ctx.drawImage(toCanvas(image), 0, 0, width, height);

  const resized = new Uint8ClampedArray(ctx.getImageData(0, 0, width, height).data);

  return {
    width,
    height,
    mode: image.mode,
    // Smoothing can leave a sub-255 alpha on the border of an opaque source.
    data: image.mode === 'rgb' || image.mode === 'luminance' ? withOpaqueAlpha(resized) : resized,
  };
}

export function cropToSquare(image: DecodedImage): DecodedImage {
  const side = Math.min(image.width, image.height);
  if (image.width === image.height) {
    return image;
  }

  const left = Math.floor((image.width - side) / 2);
  const top = Math.floor((image.height - side) / 2);
  const data = new Uint8ClampedArray(side * side * 4);

  for (let y = 0; y < side; y += 1) {
    const sourceStart = ((top + y) * image.width + left) * 4;
    data.set(image.data.subarray(sourceStart, sourceStart + side * 4), y * side * 4);
  }

  return { width: side, height: side, mode: image.mode, data };
}

function toCanvas(image: DecodedImage): Canvas {
  const canvas = createCanvas(image.width, image.height);
  const ctx = canvas.getContext('2d');
  const imageData = ctx.createImageData(image.width, image.height);
  imageData.data.set(image.data);
  ctx.putImageData(imageData, 0, 0);
  return canvas;
}

/** Encodes as truecolour PNG without an alpha channel (colour type 2). */
export function encodePng(image: DecodedImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);
  return PNG.sync.write(png, { colorType: 2 });
}
