import type {
  FrameSequence,
  PreparedPicture,
  WorkspaceHandle,
} from '@domain/qr-composition/index.js';

import type { MediaLimits } from '@/shared/config/env.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { calculateFrameTimingStats } from '@/shared/media/frameTiming.js';
import { decodeGif, encodeGif } from '@/shared/media/gifToolkit.js';
import { boundDimensions, convertToRgb } from '@/shared/media/rasterToolkit.js';

export const OPTIMIZED_FILE = 'optimized.gif';

const LOOP_FOREVER = 0;

export interface AnimatedSource {
  readonly bytes: Buffer;
  /** Where the untouched upload already sits; used when reduction fails. */
  readonly originalPath: string;
}

export interface ReducedAnimation {
  readonly sequence: FrameSequence;
  readonly sourceFrameCount: number;
  readonly encoded: Buffer;
}

export class FrameReducer {
  private readonly logger = createChildLogger({ module: 'FrameReducer' });

  public constructor(
    private readonly limits: Pick<MediaLimits, 'maxEdgePx' | 'maxFrames' | 'defaultFrameDelayMs'>,
  ) {}

  public async reduce(source: AnimatedSource, workspace: WorkspaceHandle): Promise<PreparedPicture> {
    this.logger.info({ sizeBytes: source.bytes.length }, 'Optimizing GIF for faster processing');

    try {
      const reduced = await this.reduceFrames(source.bytes);
      const path = await workspace.write(OPTIMIZED_FILE, reduced.encoded);
      const truncated = reduced.sourceFrameCount > reduced.sequence.frames.length;

      return {
        outcome: 'normalized',
        path,
        media: { kind: 'animated', sequence: reduced.sequence },
        truncatedFrom: truncated ? reduced.sourceFrameCount : undefined,
      };
    } catch (error) {
      return this.passthrough(source, error);
    }
  }

  public async reduceFrames(bytes: Buffer): Promise<ReducedAnimation> {
    const { maxFrames, maxEdgePx, defaultFrameDelayMs } = this.limits;
    const gif = decodeGif(bytes, { maxFrames, defaultDelayMs: defaultFrameDelayMs });

    if (gif.sourceFrameCount > maxFrames) {
      this.logger.info(
        { sourceFrameCount: gif.sourceFrameCount, maxFrames },
        `Limited GIF to ${maxFrames} frames for performance`,
      );
    }

    const frames = gif.frames.map((frame) => ({
      image: boundDimensions(convertToRgb(frame.image), maxEdgePx),
      durationMs: frame.delayMs,
    }));

    const encoded = encodeGif(
      frames.map((frame) => ({ image: frame.image, delayMs: frame.durationMs })),
      { repeat: LOOP_FOREVER },
    );

    const first = frames[0];
    this.logger.info(
      {
        frameCount: frames.length,
        size: [first.image.width, first.image.height],
        timing: calculateFrameTimingStats(frames.map((frame) => frame.durationMs)),
      },
      'GIF optimized',
    );

    return {
      sequence: { frames, loopCount: LOOP_FOREVER },
      sourceFrameCount: gif.sourceFrameCount,
      encoded,
    };
  }

  private passthrough(source: AnimatedSource, error: unknown): PreparedPicture {
    const reason = error instanceof Error ? error.message : String(error);

    this.logger.warn(
      { recovery: 'animation-passthrough', originalPath: source.originalPath, error },
      'GIF optimization failed; using original GIF without optimization',
    );

    return {
      outcome: 'passthrough',
      path: source.originalPath,
      kind: 'animated',
      reason,
    };
  }
}
