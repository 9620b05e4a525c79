import type { MediaKind } from './normalized-media.js';

export const ERROR_CORRECTION_LEVELS = ['L', 'M', 'Q', 'H'] as const;

export type ErrorCorrectionLevel = (typeof ERROR_CORRECTION_LEVELS)[number];

export interface CompositionRequest {
  readonly text: string;
  readonly version: number;
  readonly level: ErrorCorrectionLevel;
  readonly picturePath?: string;
  readonly colorized: boolean;
  readonly contrast: number;
  readonly brightness: number;
  readonly saveName: string;
  readonly saveDir: string;
}

export type OutcomeWarning = 'frames-truncated' | 'animation-passthrough';

export interface ComposeQrOutcome {
  readonly bytes: Buffer;
  readonly mediaKind: MediaKind;
  readonly mimeType: 'image/png' | 'image/gif';
  readonly fileName: string;
  readonly versionUsed: number;
  readonly levelUsed: ErrorCorrectionLevel;
  readonly warnings: readonly OutcomeWarning[];
}
