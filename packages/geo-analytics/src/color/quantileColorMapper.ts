import { bisectLeft, quantileSorted } from 'd3-array';
import { rgb } from 'd3-color';
import { interpolateRgb, piecewise } from 'd3-interpolate';
import { EmptyInputError } from '../errors';
import type { LegendStop, QuantileBreaks, RgbColor } from '../types';
import { parsePalette } from './palette';

export const BREAK_PERCENTILES = [0, 0.25, 0.5, 0.75, 1] as const;

export type ColorScale = (value: number) => RgbColor;

/**
 * Quartile breaks over the full distribution using linear interpolation
 * between closest ranks (position `(n - 1) * p`). Non-finite values are
 * ignored; an empty or all non-finite input raises {@link EmptyInputError}.
 */
export function computeBreaks(values: Iterable<number>): QuantileBreaks {
  const sorted = Array.from(values)
    .filter((value) => Number.isFinite(value))
    .sort((a, b) => a - b);
  if (sorted.length === 0) {
    throw new EmptyInputError();
  }

  const min = sorted[0];
  const max = sorted[sorted.length - 1];
  let previous = min;
  const at = (p: number): number => {
    const raw = quantileSorted(sorted, p) ?? min;
    // interpolation rounding must not break ordering
    previous = Math.min(Math.max(raw, previous), max);
    return previous;
  };

  return [min, at(0.25), at(0.5), at(0.75), max];
}

export function isDegenerate(breaks: QuantileBreaks): boolean {
  return breaks[0] === breaks[4];
}

/**
 * Position of `value` on the quantile axis, in [0, 1]: break `i` sits at
 * `i / 4` and values between breaks are interpolated linearly. Values at or
 * below the first break map to 0, at or above the last to 1. A value equal
 * to several tied breaks takes the first of them. A degenerate scale puts
 * everything at 0.5.
 */
export function createQuantilePosition(breaks: QuantileBreaks): (value: number) => number {
  const degenerate = isDegenerate(breaks);
  const segments = breaks.length - 1;

  return (value) => {
    if (Number.isNaN(value)) {
      throw new RangeError('Cannot place NaN on a color scale');
    }
    if (degenerate) {
      return 0.5;
    }
    if (value <= breaks[0]) {
      return 0;
    }
    if (value >= breaks[segments]) {
      return 1;
    }
    // breaks[i - 1] < value <= breaks[i], so the segment has positive width
    const i = bisectLeft(breaks, value);
    const lower = breaks[i - 1];
    const upper = breaks[i];
    return (i - 1 + (value - lower) / (upper - lower)) / segments;
  };
}

export function createColorScale(breaks: QuantileBreaks, palette: readonly string[]): ColorScale {
  const { hex } = parsePalette(palette);
  const ramp: (t: number) => string = piecewise(interpolateRgb, [...hex]);
  const position = createQuantilePosition(breaks);

  return (value) => {
    const { r, g, b } = rgb(ramp(position(value)));
    return [r, g, b];
  };
}

export function colorFor(value: number, breaks: QuantileBreaks, palette: readonly string[]): RgbColor {
  return createColorScale(breaks, palette)(value);
}

/** One stop per break, for drawing the map legend. */
export function buildLegend(breaks: QuantileBreaks, palette: readonly string[]): LegendStop[] {
  const scale = createColorScale(breaks, palette);
  return breaks.map((value) => ({ value, color: scale(value) }));
}
