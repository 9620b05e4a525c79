import type { DecodedImage } from '@/shared/media/rasterToolkit.js';

export type { ColorMode, DecodedImage } from '@/shared/media/rasterToolkit.js';

export type MediaKind = 'static' | 'animated';

export interface UploadedMedia {
  readonly filename: string;
  readonly bytes: Buffer;
}

export interface TimedFrame {
  readonly image: DecodedImage;
  readonly durationMs: number;
}

/**
 * Ordered, non-empty run of frames. Every frame is opaque RGB with its longer edge
 * already bounded. `loopCount` 0 means loop forever.
 */
export interface FrameSequence {
  readonly frames: readonly TimedFrame[];
  readonly loopCount: number;
}

export type NormalizedMedia =
  | { readonly kind: 'static'; readonly image: DecodedImage }
  | { readonly kind: 'animated'; readonly sequence: FrameSequence };

/**
 * What ends up as the composition picture. `passthrough` is the degraded path where
 * the original animation is handed on untouched.
 */
export type PreparedPicture =
  | {
      readonly outcome: 'normalized';
      readonly path: string;
      readonly media: NormalizedMedia;
      readonly truncatedFrom?: number;
    }
  | {
      readonly outcome: 'passthrough';
      readonly path: string;
      readonly kind: 'animated';
      readonly reason: string;
    };

export function preparedKind(picture: PreparedPicture): MediaKind {
  return picture.outcome === 'passthrough' ? picture.kind : picture.media.kind;
}
