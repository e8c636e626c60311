import { describe, it, expect } from 'vitest';
import { ParametricCircuit, QuantumState, VERSION, complex, identityMatrix } from '../index';

describe('Package entry', () => {
  it('exposes a semver version string', () => {
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('builds dense gates from the exported helpers', () => {
    const state = new ParametricCircuit(1).x(0).dense([0], identityMatrix(2)).applyTo(QuantumState.zero(1));
    const one = complex(1);
    expect(state.amplitude(1).real).toBeCloseTo(one.real, 12);
    expect(state.amplitude(1).imag).toBeCloseTo(one.imag, 12);
  });
});
