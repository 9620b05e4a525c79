import type {
  DecodedImage,
  PreparedPicture,
  WorkspaceHandle,
} from '@domain/qr-composition/index.js';

import type { MediaLimits } from '@/shared/config/env.js';
import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import {
  NATIVE_EXTENSIONS,
  boundDimensions,
  decodeImage,
  encodePng,
  flattenToRgb,
} from '@/shared/media/rasterToolkit.js';

export const NORMALIZED_FILE = 'normalized.png';

export interface StaticSource {
  readonly bytes: Buffer;
  /** Lower-case extension without the dot; may be empty. */
  readonly extension: string;
}

export class FormatNormalizer {
  private readonly logger = createChildLogger({ module: 'FormatNormalizer' });

  public constructor(private readonly limits: Pick<MediaLimits, 'maxEdgePx'>) {}

  public async normalize(
    source: StaticSource,
    workspace: WorkspaceHandle,
  ): Promise<Extract<PreparedPicture, { outcome: 'normalized' }>> {
    if (!NATIVE_EXTENSIONS.has(source.extension)) {
      this.logger.info({ extension: source.extension }, 'Converting upload to PNG for compatibility');
    }

    const { image, encoded } = await this.convert(source);
    const path = await workspace.write(NORMALIZED_FILE, encoded);

    return {
      outcome: 'normalized',
      path,
      media: { kind: 'static', image },
    };
  }

  private async convert(source: StaticSource): Promise<{ image: DecodedImage; encoded: Buffer }> {
    const { extension } = source;

    try {
      const decoded = await decodeImage(source.bytes);
      const flattened = flattenToRgb(decoded);
      const image = boundDimensions(flattened, this.limits.maxEdgePx);

      if (image !== flattened) {
        this.logger.info(
          { from: [decoded.width, decoded.height], to: [image.width, image.height] },
          'Resized image',
        );
      }

      this.logger.debug({ extension, sourceMode: decoded.mode }, 'Image flattened to opaque RGB');
      return { image, encoded: encodePng(image) };
    } catch (error) {
      this.logger.warn({ extension, error }, 'Error converting image');
      throw AppError.unsupportedMedia(extension, error);
    }
  }
}
