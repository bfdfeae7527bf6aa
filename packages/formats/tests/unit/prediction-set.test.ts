/**
 * Tests for prediction-set.ts
 */

import { describe, it, expect } from 'vitest';
import { FormatError } from '@predictkit/utils';
import { isPredictionClass, parsePredictionSet } from '../../src/prediction-set.js';

describe('isPredictionClass', () => {
  it('should accept the five prediction classes only', () => {
    expect(['bin', 'named', 'point', 'sample', 'quantile'].every(isPredictionClass)).toBe(true);
    expect(isPredictionClass('Point')).toBe(false);
    expect(isPredictionClass(3)).toBe(false);
  });
});

describe('parsePredictionSet', () => {
  it('should accept a well-formed prediction set and keep meta', () => {
    const json = {
      meta: { forecast: { id: 71 } },
      predictions: [
        { unit: 'loc1', target: 't1', class: 'quantile', prediction: { quantile: [0.5], value: [3] } },
      ],
    };

    expect(parsePredictionSet(json)).toEqual(json);
  });

  it('should report an unknown class by name', () => {
    const json = {
      predictions: [{ unit: 'loc1', target: 't1', class: 'histogram', prediction: {} }],
    };

    expect(() => parsePredictionSet(json)).toThrow('invalid prediction class: histogram');
  });

  it('should reject a missing predictions section', () => {
    expect(() => parsePredictionSet({ meta: {} })).toThrow(
      'no predictions section found in prediction set'
    );
  });

  it('should reject a payload that does not match its class', () => {
    const json = {
      predictions: [{ unit: 'loc1', target: 't1', class: 'bin', prediction: { cat: ['a'] } }],
    };

    expect(() => parsePredictionSet(json)).toThrow(FormatError);
    expect(() => parsePredictionSet(json)).toThrow(/predictions\.0\.prediction\.prob/);
  });
});
