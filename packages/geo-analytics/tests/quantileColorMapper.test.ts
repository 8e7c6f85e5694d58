import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  DEFAULT_PALETTE,
  EmptyInputError,
  buildLegend,
  colorFor,
  computeBreaks,
  createColorScale,
  createQuantilePosition
} from '../src/index';

test('computeBreaks returns quartiles of the full distribution', () => {
  assert.deepEqual(computeBreaks([4, 100, 1, 3, 2]), [1, 2, 3, 4, 100]);
});

test('computeBreaks interpolates between closest ranks', () => {
  assert.deepEqual(computeBreaks([10, 20]), [10, 12.5, 15, 17.5, 20]);
});

test('computeBreaks ignores non-finite values', () => {
  assert.deepEqual(computeBreaks([Number.NaN, 7, Number.POSITIVE_INFINITY]), [7, 7, 7, 7, 7]);
});

test('computeBreaks rejects an empty distribution', () => {
  assert.throws(() => computeBreaks([]), EmptyInputError);
  assert.throws(() => computeBreaks([Number.NaN]), (error: unknown) => {
    assert.ok(error instanceof EmptyInputError);
    assert.equal(error.code, 'EMPTY_INPUT');
    return true;
  });
});

test('colorFor places the median at the middle of the palette', () => {
  const breaks = computeBreaks([1, 2, 3, 4, 100]);
  assert.deepEqual(colorFor(3, breaks, DEFAULT_PALETTE), [128, 192, 0]);
});

test('colorFor clamps values outside the breaks', () => {
  const breaks = computeBreaks([1, 2, 3, 4, 100]);
  assert.deepEqual(colorFor(1000, breaks, DEFAULT_PALETTE), [255, 0, 0]);
  assert.deepEqual(colorFor(-5, breaks, DEFAULT_PALETTE), [128, 128, 128]);
});

test('colorFor interpolates inside the top quartile', () => {
  const breaks = computeBreaks([1, 2, 3, 4, 100]);
  assert.equal(createQuantilePosition(breaks)(52), 0.875);
  assert.deepEqual(colorFor(52, breaks, DEFAULT_PALETTE), [255, 103, 0]);
});

test('degenerate breaks map every value to the middle color', () => {
  const scale = createColorScale([5, 5, 5, 5, 5], ['black', 'white']);
  assert.deepEqual(scale(5), [128, 128, 128]);
  assert.deepEqual(scale(-1000), [128, 128, 128]);
});

test('color scale rejects NaN', () => {
  const scale = createColorScale([1, 2, 3, 4, 100], DEFAULT_PALETTE);
  assert.throws(() => scale(Number.NaN), RangeError);
});

test('buildLegend emits one stop per break', () => {
  assert.deepEqual(buildLegend([1, 2, 3, 4, 100], ['black', 'white']), [
    { value: 1, color: [0, 0, 0] },
    { value: 2, color: [64, 64, 64] },
    { value: 3, color: [128, 128, 128] },
    { value: 4, color: [191, 191, 191] },
    { value: 100, color: [255, 255, 255] }
  ]);
});

test('values at or below tied lower breaks take the first palette color', () => {
  const breaks = computeBreaks([0, 0, 0, 0, 10]);
  assert.deepEqual(breaks, [0, 0, 0, 0, 10]);
  const position = createQuantilePosition(breaks);
  assert.equal(position(-5), 0);
  assert.equal(position(0), 0);
  assert.equal(position(5), 0.875);
  assert.deepEqual(colorFor(-5, breaks, DEFAULT_PALETTE), [128, 128, 128]);
  assert.deepEqual(colorFor(0, breaks, DEFAULT_PALETTE), [128, 128, 128]);
});

test('a value equal to tied interior breaks sits at the first of them', () => {
  const breaks = [0, 1, 1, 1, 10] as const;
  assert.equal(createQuantilePosition(breaks)(1), 0.25);
  assert.deepEqual(colorFor(1, breaks, DEFAULT_PALETTE), [0, 32, 191]);
});

function pseudoRandomValues(count: number, seed: number): number[] {
  const values: number[] = [];
  let state = seed;
  for (let i = 0; i < count; i += 1) {
    state = (state * 1103515245 + 12345) % 2147483648;
    values.push((state % 2000) / 10 - 50);
  }
  return values;
}

const distributions: number[][] = [
  [5, 3, 9, 1, 7],
  [2, 2, 2, 2, 2, 2, 9],
  [0, 0, 0, 0, 10],
  [1, 1, 1, 1, 50],
  [-10, -3, -3, 0, 4, 4, 4],
  [7, 7, 7, 1],
  [42],
  [3, 1, 2],
  pseudoRandomValues(50, 7),
  pseudoRandomValues(200, 2024)
];

test('breaks are ordered and span the distribution', () => {
  for (const values of distributions) {
    const breaks = computeBreaks(values);
    assert.equal(breaks[0], Math.min(...values));
    assert.equal(breaks[4], Math.max(...values));
    for (let i = 1; i < breaks.length; i += 1) {
      assert.ok(breaks[i - 1] <= breaks[i], `breaks ${breaks.join(',')} decrease at ${i}`);
    }
  }
});

test('palette position never decreases as the value grows', () => {
  for (const values of distributions) {
    const breaks = computeBreaks(values);
    const position = createQuantilePosition(breaks);
    const span = Math.max(breaks[4] - breaks[0], 1);
    const from = breaks[0] - span;
    const steps = 400;
    let previous = Number.NEGATIVE_INFINITY;
    for (let step = 0; step <= steps; step += 1) {
      const value = from + (3 * span * step) / steps;
      const current = position(value);
      assert.ok(current >= 0 && current <= 1, `position ${current} out of range`);
      assert.ok(current >= previous, `position drops at ${value} for breaks ${breaks.join(',')}`);
      previous = current;
    }
    for (const value of values) {
      assert.ok(position(value) >= position(breaks[0]));
      assert.ok(position(value) <= position(breaks[4]));
    }
  }
});
