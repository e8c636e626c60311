import { describe, it, expect } from 'vitest';
import { DimensionMismatchError } from '@qclearn/quantum-core';
import { argmax, logLoss, oneHot, softmax } from '../numeric';

describe('softmax', () => {
  it('is non-negative and sums to 1', () => {
    const p = softmax([0.3, -2, 5, 1e3]);
    expect(p.every((v) => v >= 0)).toBe(true);
    expect(p.reduce((a, b) => a + b, 0)).toBeCloseTo(1, 12);
  });

  it('gives equal weight to equal scores', () => {
    expect(softmax([2, 2])).toEqual([0.5, 0.5]);
  });

  it('returns an empty vector for no scores', () => {
    expect(softmax([])).toEqual([]);
  });
});

describe('logLoss', () => {
  it('is ln 2 for a uniform binary prediction', () => {
    expect(logLoss([[1, 0]], [[0.5, 0.5]])).toBeCloseTo(Math.LN2, 12);
  });

  it('averages over samples', () => {
    const loss = logLoss(
      [
        [1, 0],
        [0, 1],
      ],
      [
        [0.5, 0.5],
        [0.75, 0.25],
      ]
    );
    expect(loss).toBeCloseTo((Math.LN2 + Math.log(4)) / 2, 12);
  });

  it('stays finite on a zero probability', () => {
    expect(Number.isFinite(logLoss([[1, 0]], [[0, 1]]))).toBe(true);
  });

  it('rejects mismatched shapes', () => {
    expect(() => logLoss([[1, 0]], [])).toThrow(DimensionMismatchError);
    expect(() => logLoss([[1, 0]], [[1, 0, 0]])).toThrow('class count: expected 2, got 3');
  });
});

describe('oneHot', () => {
  it('encodes labels as rows', () => {
    expect(oneHot([2, 0], 3)).toEqual([
      [0, 0, 1],
      [1, 0, 0],
    ]);
  });

  it('rejects labels out of range', () => {
    expect(() => oneHot([3], 3)).toThrow('Label 3 out of range [0, 2]');
  });
});

describe('argmax', () => {
  it('picks the first of tied maxima', () => {
    expect(argmax([0.1, 0.4, 0.4])).toBe(1);
  });
});
