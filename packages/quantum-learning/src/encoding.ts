/**
 * Feature encoding: min-max scaling and the two-feature input circuit.
 */

import { DimensionMismatchError } from '@qclearn/quantum-core';
import { LearningCircuit } from './learning-circuit';

export const FEATURE_COUNT = 2;

/**
 * Per-column bounds captured from a batch
 */
export interface FeatureRange {
  min: number[];
  max: number[];
}

export function fitFeatureRange(batch: readonly (readonly number[])[]): FeatureRange {
  if (batch.length === 0) {
    throw new Error('Cannot fit a feature range on an empty batch');
  }
  const width = batch[0].length;
  const min = new Array<number>(width).fill(Infinity);
  const max = new Array<number>(width).fill(-Infinity);
  for (const row of batch) {
    if (row.length !== width) {
      throw new DimensionMismatchError('feature count', width, row.length);
    }
    row.forEach((v, c) => {
      min[c] = Math.min(min[c], v);
      max[c] = Math.max(max[c], v);
    });
  }
  return { min, max };
}

/**
 * Map each column onto [-1, 1] using `range`.
 * Constant columns map to 0; values outside the range are clamped.
 */
export function applyFeatureRange(
  batch: readonly (readonly number[])[],
  range: FeatureRange
): number[][] {
  const width = range.min.length;
  return batch.map((row) => {
    if (row.length !== width) {
      throw new DimensionMismatchError('feature count', width, row.length);
    }
    return row.map((v, c) => {
      const span = range.max[c] - range.min[c];
      if (span === 0) {
        return 0;
      }
      const scaled = (2 * (v - range.min[c])) / span - 1;
      return Math.min(1, Math.max(-1, scaled));
    });
  });
}

export function minMaxScale(batch: readonly (readonly number[])[]): number[][] {
  return applyFeatureRange(batch, fitFeatureRange(batch));
}

function feature(x: readonly number[], index: number): number {
  if (x.length !== FEATURE_COUNT) {
    throw new DimensionMismatchError('sample length', FEATURE_COUNT, x.length);
  }
  return x[index];
}

/**
 * Encoder with input slots only: qubit i gets RY(asin(x_f)) then RZ(acos(x_f²)),
 * with f = i mod 2.
 */
export function createInputEncoder(numQubits: number): LearningCircuit {
  const encoder = new LearningCircuit(numQubits);
  for (let i = 0; i < numQubits; i++) {
    const f = i % FEATURE_COUNT;
    encoder.inputRy(i, (x) => Math.asin(feature(x, f)));
    encoder.inputRz(i, (x) => Math.acos(feature(x, f) ** 2));
  }
  return encoder;
}
