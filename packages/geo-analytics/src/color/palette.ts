import { color as parseColor } from 'd3-color';
import { InvalidPaletteError } from '../errors';
import type { RgbColor } from '../types';

export interface ParsedPalette {
  names: readonly string[];
  colors: readonly RgbColor[];
  /** `#rrggbb` form of each color, in palette order. */
  hex: readonly string[];
}

/**
 * Resolves CSS color names or hex strings into RGB triples. The palette is
 * ordered low to high and needs at least two entries.
 */
export function parsePalette(palette: readonly string[]): ParsedPalette {
  if (palette.length < 2) {
    throw new InvalidPaletteError(`Palette needs at least 2 colors, received ${palette.length}`);
  }

  const colors: RgbColor[] = [];
  const hex: string[] = [];
  for (const name of palette) {
    const parsed = parseColor(name.trim());
    if (!parsed) {
      throw new InvalidPaletteError(`Unrecognized palette color '${name}'`);
    }
    const value = parsed.rgb();
    colors.push([value.r, value.g, value.b]);
    hex.push(value.formatHex());
  }

  return { names: [...palette], colors, hex };
}
