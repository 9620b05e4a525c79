import { promises as fs } from 'node:fs';
import path from 'node:path';

import type {
  CompositionRequest,
  CompositionStep,
  CompositionStepResult,
  DecodedImage,
} from '@domain/qr-composition/index.js';
import QRCode from 'qrcode';
import type { QRCode as QrSymbol } from 'qrcode';

import { createChildLogger } from '@/shared/logger/pino.js';
import { decodeGif, encodeGif } from '@/shared/media/gifToolkit.js';
import { enhanceImage, type EnhanceOptions } from '@/shared/media/imageEnhance.js';
import {
  convertToRgb,
  cropToSquare,
  decodeImage,
  encodePng,
  extensionOf,
  flattenToRgb,
  resizeImage,
} from '@/shared/media/rasterToolkit.js';

import { MODULE_PIXELS, renderSymbol } from './symbol-renderer.js';

export interface QrCompositorOptions {
  readonly defaultFrameDelayMs?: number;
}

/**
 * Draws the QR symbol over the prepared picture. A GIF picture yields a GIF output
 * with one rendered frame per source frame; anything else yields a PNG.
 */
export class QrCompositorService implements CompositionStep {
  private readonly logger = createChildLogger({ module: 'QrCompositorService' });

  private readonly defaultFrameDelayMs: number;

  public constructor(options: QrCompositorOptions = {}) {
    this.defaultFrameDelayMs = options.defaultFrameDelayMs ?? 100;
  }

  public async compose(request: CompositionRequest): Promise<CompositionStepResult> {
    const symbol = createSymbol(request.text, request.version, request.level);
    const { picturePath } = request;
    const animated = picturePath !== undefined && extensionOf(picturePath) === 'gif';
    const outputName = animated ? withExtension(request.saveName, '.gif') : request.saveName;

    let output: Buffer;
    if (picturePath === undefined) {
      output = encodePng(renderSymbol(symbol.modules));
    } else if (animated) {
      output = await this.renderAnimated(symbol, picturePath, request);
    } else {
      output = await this.renderStatic(symbol, picturePath, request);
    }

    await fs.writeFile(path.join(request.saveDir, outputName), output);

    this.logger.debug(
      { version: symbol.version, level: request.level, outputName, sizeBytes: output.byteLength },
      'QR symbol composed',
    );

    return { versionUsed: symbol.version, levelUsed: request.level, outputName };
  }

  private async renderStatic(
    symbol: QrSymbol,
    picturePath: string,
    request: CompositionRequest,
  ): Promise<Buffer> {
    const bytes = await fs.readFile(picturePath);
    const picture = flattenToRgb(await decodeImage(bytes));
    const backdrop = prepareBackdrop(picture, symbol.modules.size, enhanceOptionsOf(request));

    return encodePng(renderSymbol(symbol.modules, backdrop));
  }

  private async renderAnimated(
    symbol: QrSymbol,
    picturePath: string,
    request: CompositionRequest,
  ): Promise<Buffer> {
    const bytes = await fs.readFile(picturePath);
    const gif = decodeGif(bytes, { defaultDelayMs: this.defaultFrameDelayMs });
    const enhance = enhanceOptionsOf(request);

    const frames = gif.frames.map((frame) => ({
      image: renderSymbol(
        symbol.modules,
        prepareBackdrop(convertToRgb(frame.image), symbol.modules.size, enhance),
      ),
      delayMs: frame.delayMs,
    }));

    return encodeGif(frames, { repeat: 0 });
  }
}

/**
 * The requested version is a floor: longer text grows the symbol instead of failing.
 */
export function createSymbol(text: string, version: number, level: CompositionRequest['level']): QrSymbol {
  const minimal = QRCode.create(text, { errorCorrectionLevel: level });
  if (minimal.version >= version) {
    return minimal;
  }

  return QRCode.create(text, { errorCorrectionLevel: level, version });
}

function enhanceOptionsOf(request: CompositionRequest): EnhanceOptions {
  return {
    contrast: request.contrast,
    brightness: request.brightness,
    grayscale: !request.colorized,
  };
}

function prepareBackdrop(picture: DecodedImage, moduleCount: number, enhance: EnhanceOptions): DecodedImage {
  const side = moduleCount * MODULE_PIXELS;
  return resizeImage(cropToSquare(enhanceImage(picture, enhance)), side, side);
}

function withExtension(name: string, extension: string): string {
  const dot = name.lastIndexOf('.');
  return `${dot >= 0 ? name.slice(0, dot) : name}${extension}`;
}
