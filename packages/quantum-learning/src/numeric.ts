/**
 * Numeric helpers shared by the training loop.
 */

import { DimensionMismatchError } from '@qclearn/quantum-core';

export const LOG_LOSS_EPSILON = 1e-15;

/**
 * softmax(x)_i = e^{x_i} / Σ_j e^{x_j}, shifted by max(x) so large inputs do not overflow
 */
export function softmax(x: readonly number[]): number[] {
  if (x.length === 0) {
    return [];
  }
  const max = Math.max(...x);
  const exps = x.map((v) => Math.exp(v - max));
  const sum = exps.reduce((a, b) => a + b, 0);
  return exps.map((v) => v / sum);
}

/**
 * Multi-class cross-entropy averaged over samples.
 * Probabilities are clipped to [ε, 1-ε] and each row renormalized first.
 */
export function logLoss(
  yTrue: readonly (readonly number[])[],
  yPred: readonly (readonly number[])[]
): number {
  if (yTrue.length !== yPred.length) {
    throw new DimensionMismatchError('sample count', yTrue.length, yPred.length);
  }
  if (yTrue.length === 0) {
    throw new Error('logLoss needs at least one sample');
  }

  let total = 0;
  for (let s = 0; s < yTrue.length; s++) {
    const target = yTrue[s];
    const pred = yPred[s];
    if (target.length !== pred.length) {
      throw new DimensionMismatchError('class count', target.length, pred.length);
    }
    const clipped = pred.map((p) => Math.min(Math.max(p, LOG_LOSS_EPSILON), 1 - LOG_LOSS_EPSILON));
    const rowSum = clipped.reduce((a, b) => a + b, 0);
    for (let c = 0; c < target.length; c++) {
      if (target[c] !== 0) {
        total -= target[c] * Math.log(clipped[c] / rowSum);
      }
    }
  }
  return total / yTrue.length;
}

/**
 * Class labels to one-hot rows
 */
export function oneHot(labels: readonly number[], numClass: number): number[][] {
  return labels.map((label) => {
    if (!Number.isInteger(label) || label < 0 || label >= numClass) {
      throw new Error(`Label ${label} out of range [0, ${numClass - 1}]`);
    }
    return Array.from({ length: numClass }, (_, c) => (c === label ? 1 : 0));
  });
}

/**
 * Index of the largest entry (first one on ties)
 */
export function argmax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}
