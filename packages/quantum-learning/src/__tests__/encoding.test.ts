/**
 * Tests for feature scaling and the input encoder
 */

import { describe, it, expect } from 'vitest';
import { DimensionMismatchError, Observable } from '@qclearn/quantum-core';
import { CircuitRunner } from '../circuit-runner';
import { applyFeatureRange, createInputEncoder, fitFeatureRange, minMaxScale } from '../encoding';

describe('minMaxScale', () => {
  it('maps every column onto exactly [-1, 1]', () => {
    expect(
      minMaxScale([
        [0, 10],
        [5, 20],
        [10, 15],
      ])
    ).toEqual([
      [-1, -1],
      [0, 1],
      [1, 0],
    ]);
  });

  it('maps a constant column to 0', () => {
    expect(
      minMaxScale([
        [4, 1],
        [4, 3],
      ])
    ).toEqual([
      [0, -1],
      [0, 1],
    ]);
  });

  it('rejects ragged rows', () => {
    expect(() => fitFeatureRange([[1, 2], [3]])).toThrow(DimensionMismatchError);
  });
});

describe('applyFeatureRange', () => {
  it('clamps values outside a captured range', () => {
    const range = { min: [0], max: [1] };
    expect(applyFeatureRange([[2], [-1], [0.5]], range)).toEqual([[1], [-1], [0]]);
  });
});

describe('createInputEncoder', () => {
  it('registers two input slots per qubit and no learning parameters', () => {
    const encoder = createInputEncoder(3);
    expect(encoder.registry.inputCount).toBe(6);
    expect(encoder.parameterCount).toBe(0);
  });

  it('encodes the first feature on even qubits and the second on odd ones', () => {
    const runner = new CircuitRunner(createInputEncoder(2));
    const state = runner.run([0, 1]);
    // qubit 0: RY(0) RZ(π/2); qubit 1: RY(π/2) RZ(0)
    expect(Observable.z(2, 0).expectationValue(state)).toBeCloseTo(1, 12);
    expect(Observable.z(2, 1).expectationValue(state)).toBeCloseTo(0, 12);
    expect(state.norm()).toBeCloseTo(1, 12);
  });

  it('rejects samples that do not have two features', () => {
    const runner = new CircuitRunner(createInputEncoder(2));
    expect(() => runner.run([0.1, 0.2, 0.3])).toThrow('sample length: expected 2, got 3');
  });
});
