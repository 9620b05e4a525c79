import { clampByte } from './numberUtils.js';
import type { DecodedImage } from './rasterToolkit.js';

export interface EnhanceOptions {
  /** 1 keeps the image as is; below 1 pulls towards mean grey. */
  readonly contrast: number;
  /** Multiplier on every channel. */
  readonly brightness: number;
  readonly grayscale: boolean;
}

const luminance = (r: number, g: number, b: number): number => 0.299 * r + 0.587 * g + 0.114 * b;

export function enhanceImage(image: DecodedImage, options: EnhanceOptions): DecodedImage {
  const { contrast, brightness, grayscale } = options;

  if (contrast === 1 && brightness === 1 && !grayscale) {
    return image;
  }

  const source = image.data;
  const result = new Uint8ClampedArray(source.length);
  const mean = contrast === 1 ? 0 : meanLuminance(source);

  for (let index = 0; index < source.length; index += 4) {
    let r = source[index];
    let g = source[index + 1];
    let b = source[index + 2];

    if (contrast !== 1) {
      r = clampByte(mean + (r - mean) * contrast);
      g = clampByte(mean + (g - mean) * contrast);
      b = clampByte(mean + (b - mean) * contrast);
    }

    r = clampByte(r * brightness);
    g = clampByte(g * brightness);
    b = clampByte(b * brightness);

    if (grayscale) {
      const grey = clampByte(luminance(r, g, b));
      r = grey;
      g = grey;
      b = grey;
    }

    result[index] = r;
    result[index + 1] = g;
    result[index + 2] = b;
    result[index + 3] = source[index + 3];
  }

  return { width: image.width, height: image.height, mode: image.mode, data: result };
}

function meanLuminance(data: Uint8ClampedArray): number {
  const pixels = data.length / 4;
  if (pixels === 0) {
    return 0;
  }

  let total = 0;
  for (let index = 0; index < data.length; index += 4) {
    total += luminance(data[index], data[index + 1], data[index + 2]);
  }

  return Math.round(total / pixels);
}
