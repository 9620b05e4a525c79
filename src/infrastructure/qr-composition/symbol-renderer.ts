import type { DecodedImage } from '@domain/qr-composition/index.js';

/** Pixels per module edge. */
export const MODULE_PIXELS = 6;

/** Light border around the symbol, in modules. */
export const QUIET_ZONE_MODULES = 4;

const DOT_PIXELS = 2;
const DOT_OFFSET = (MODULE_PIXELS - DOT_PIXELS) / 2;
const FINDER_SPAN = 8;

export interface ModuleMatrix {
  readonly size: number;
  get(row: number, col: number): number | boolean;
}

/**
 * Rasterizes the module matrix. Without a backdrop every module is a solid square;
 * with one, each module keeps only a centred dot and the backdrop shows around it,
 * except the three finder patterns, which stay solid so scanners can lock on.
 * `backdrop` must be `size * MODULE_PIXELS` square.
 */
export function renderSymbol(matrix: ModuleMatrix, backdrop?: DecodedImage): DecodedImage {
  const { size } = matrix;
  const area = size * MODULE_PIXELS;

  if (backdrop && (backdrop.width !== area || backdrop.height !== area)) {
    throw new Error(`Backdrop must be ${area}x${area}, got ${backdrop.width}x${backdrop.height}`);
  }

  const side = (size + QUIET_ZONE_MODULES * 2) * MODULE_PIXELS;
  const origin = QUIET_ZONE_MODULES * MODULE_PIXELS;
  const data = new Uint8ClampedArray(side * side * 4).fill(255);

  for (let row = 0; row < size; row += 1) {
    for (let col = 0; col < size; col += 1) {
      const value = matrix.get(row, col) ? 0 : 255;
      const solid = !backdrop || isFinderModule(row, col, size);

      for (let dy = 0; dy < MODULE_PIXELS; dy += 1) {
        for (let dx = 0; dx < MODULE_PIXELS; dx += 1) {
          const x = col * MODULE_PIXELS + dx;
          const y = row * MODULE_PIXELS + dy;
          const target = ((origin + y) * side + origin + x) * 4;

          if (solid || isDotPixel(dx, dy)) {
            data[target] = value;
            data[target + 1] = value;
            data[target + 2] = value;
          } else if (backdrop) {
            const source = (y * area + x) * 4;
            data[target] = backdrop.data[source];
            data[target + 1] = backdrop.data[source + 1];
            data[target + 2] = backdrop.data[source + 2];
          }
        }
      }
    }
  }

  return { width: side, height: side, mode: 'rgb', data };
}

function isDotPixel(dx: number, dy: number): boolean {
  return dx >= DOT_OFFSET && dx < DOT_OFFSET + DOT_PIXELS && dy >= DOT_OFFSET && dy < DOT_OFFSET + DOT_PIXELS;
}

function isFinderModule(row: number, col: number, size: number): boolean {
  const nearTop = row < FINDER_SPAN;
  const nearLeft = col < FINDER_SPAN;
  return (nearTop && nearLeft) || (nearTop && col >= size - FINDER_SPAN) || (row >= size - FINDER_SPAN && nearLeft);
}
