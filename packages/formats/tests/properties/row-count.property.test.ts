/**
 * Property Tests for the rows codec
 *
 * Critical Invariants:
 * 1. Row-count laws: k cats / samples / quantiles give k rows; point and named give 1
 * 2. Every row has exactly 12 cells
 * 3. Bin (cat, prob) pairs survive rows -> prediction set in order
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { csvRowsFromPredictionSet, predictionSetFromCsvRows } from '../../src/csv-rows.js';
import type { PredictionEntry } from '../../src/prediction-set.js';

const label = fc.string({ minLength: 1, maxLength: 12 });
const scalar = fc.oneof(label, fc.integer(), fc.boolean());

const binEntry = fc
  .array(fc.tuple(label, fc.double({ min: 0, max: 1, noNaN: true })), { minLength: 1, maxLength: 20 })
  .chain((pairs) =>
    fc.record({ unit: label, target: label }).map(
      ({ unit, target }): PredictionEntry => ({
        unit,
        target,
        class: 'bin',
        prediction: { cat: pairs.map(([cat]) => cat), prob: pairs.map(([, prob]) => prob) },
      })
    )
  );

const anyEntry: fc.Arbitrary<PredictionEntry> = fc.oneof(
  binEntry,
  fc.record({ unit: label, target: label, value: scalar }).map(
    ({ unit, target, value }): PredictionEntry => ({ unit, target, class: 'point', prediction: { value } })
  ),
  fc.record({ unit: label, target: label, family: label, param1: fc.integer() }).map(
    ({ unit, target, family, param1 }): PredictionEntry => ({
      unit,
      target,
      class: 'named',
      prediction: { family, param1 },
    })
  ),
  fc.record({ unit: label, target: label, sample: fc.array(scalar, { maxLength: 20 }) }).map(
    ({ unit, target, sample }): PredictionEntry => ({ unit, target, class: 'sample', prediction: { sample } })
  ),
  fc.record({ unit: label, target: label, pairs: fc.array(fc.tuple(fc.double({ noNaN: true }), scalar)) }).map(
    ({ unit, target, pairs }): PredictionEntry => ({
      unit,
      target,
      class: 'quantile',
      prediction: { quantile: pairs.map(([q]) => q), value: pairs.map(([, v]) => v) },
    })
  )
);

function expectedRowCount(entry: PredictionEntry): number {
  switch (entry.class) {
    case 'bin':
      return entry.prediction.cat.length;
    case 'sample':
      return entry.prediction.sample.length;
    case 'quantile':
      return entry.prediction.quantile.length;
    case 'point':
    case 'named':
      return 1;
  }
}

describe('Rows codec - Property Tests', () => {
  it('emits header plus the per-class row count for every entry', () => {
    fc.assert(
      fc.property(fc.array(anyEntry, { maxLength: 10 }), (predictions) => {
        const rows = csvRowsFromPredictionSet({ predictions });
        const expected = predictions.reduce((total, entry) => total + expectedRowCount(entry), 1);

        expect(rows).toHaveLength(expected);
        expect(rows.every((row) => row.length === 12)).toBe(true);
      })
    );
  });

  it('preserves entry order in the class column', () => {
    fc.assert(
      fc.property(fc.array(anyEntry, { maxLength: 10 }), (predictions) => {
        const classes = csvRowsFromPredictionSet({ predictions })
          .slice(1)
          .map((row) => row[2]);
        const expected = predictions.flatMap((entry) =>
          Array.from({ length: expectedRowCount(entry) }, () => entry.class)
        );

        expect(classes).toEqual(expected);
      })
    );
  });

  it('reproduces bin (cat, prob) pairs in order', () => {
    fc.assert(
      fc.property(binEntry, (entry) => {
        const rebuilt = predictionSetFromCsvRows(csvRowsFromPredictionSet({ predictions: [entry] }));

        expect(rebuilt.predictions).toEqual([entry]);
      })
    );
  });
});
