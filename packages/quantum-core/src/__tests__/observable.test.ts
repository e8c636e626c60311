import { describe, it, expect } from 'vitest';
import { UnsupportedAxisError } from '../errors';
import { Observable } from '../observable';
import { QuantumState } from '../quantum-state';

describe('Observable', () => {
  it('parses Pauli strings and drops identity factors', () => {
    const observable = new Observable(3).addOperator(0.5, 'X 0 I 1 Z 2');
    expect(observable.terms).toEqual([
      {
        coefficient: 0.5,
        factors: [
          { axis: 'X', qubit: 0 },
          { axis: 'Z', qubit: 2 },
        ],
      },
    ]);
  });

  it('rejects malformed strings', () => {
    expect(() => new Observable(2).addOperator(1, 'X')).toThrow("Malformed Pauli string 'X'");
    expect(() => new Observable(2).addOperator(1, 'Z 0 X 0')).toThrow("Qubit 0 appears twice in 'Z 0 X 0'");
    expect(() => new Observable(2).addOperator(1, 'Q 0')).toThrow(UnsupportedAxisError);
    expect(() => new Observable(2).addOperator(1, 'Z 2')).toThrow('Qubit 2 out of range [0, 1]');
  });

  it('computes weighted expectation values', () => {
    const state = QuantumState.zero(2).x(1);
    const observable = new Observable(2).addOperator(2, 'Z 0').addOperator(-3, 'Z 1').addOperator(1, '');
    // 2·(+1) - 3·(-1) + 1
    expect(observable.expectationValue(state)).toBeCloseTo(6, 12);
  });

  it('measures ⟨ZZ⟩ = 1 on a Bell state', () => {
    const bell = QuantumState.zero(2).h(0).cnot(0, 1);
    expect(new Observable(2).addOperator(1, 'Z 0 Z 1').expectationValue(bell)).toBeCloseTo(1, 12);
    expect(Observable.z(2, 0).expectationValue(bell)).toBeCloseTo(0, 12);
  });

  it('applies O to a state without touching it', () => {
    const state = QuantumState.zero(1);
    const image = new Observable(1).addOperator(2, 'X 0').apply(state);
    expect(image.amplitude(1).real).toBe(2);
    expect(state.amplitude(0).real).toBe(1);
  });
});
