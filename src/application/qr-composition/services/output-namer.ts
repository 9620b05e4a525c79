import type { MediaKind } from '@domain/qr-composition/index.js';

const MAX_NAME_CHARACTERS = 50;
const SAFE_CHARACTER = /^[\p{L}\p{N}_-]$/u;

/**
 * File name for the composed image. Only the first 50 characters of the text count,
 * and anything but letters, digits, `-` and `_` (in any script) becomes `_`.
 */
export function deriveOutputName(text: string, kind: MediaKind): string {
  const stem = Array.from(text)
    .slice(0, MAX_NAME_CHARACTERS)
    .map((character) => (SAFE_CHARACTER.test(character) ? character : '_'))
    .join('');

  return `${stem}${kind === 'animated' ? '.gif' : '.png'}`;
}
