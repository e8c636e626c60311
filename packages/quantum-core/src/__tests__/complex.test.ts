/**
 * Tests for complex number utilities
 */

import { describe, it, expect } from 'vitest';
import {
  complex,
  ONE,
  I,
  magnitudeSquared,
  conjugate,
  add,
  subtract,
  multiply,
  scale,
  expi,
  equals,
  fromInterleaved,
  toInterleaved,
  innerProduct,
  norm,
  identityMatrix,
  conjugateTranspose,
  matrixMultiply,
} from '../complex';

describe('Complex Arithmetic', () => {
  it('creates a real number by default', () => {
    expect(complex(3)).toEqual({ real: 3, imag: 0 });
  });

  it('adds, subtracts and scales componentwise', () => {
    expect(add(complex(1, 2), complex(3, -1))).toEqual({ real: 4, imag: 1 });
    expect(subtract(complex(1, 2), complex(3, -1))).toEqual({ real: -2, imag: 3 });
    expect(scale(complex(1, -2), 3)).toEqual({ real: 3, imag: -6 });
  });

  it('multiplies i by i to -1', () => {
    expect(multiply(I, I)).toEqual({ real: -1, imag: 0 });
    expect(multiply(complex(1, 2), complex(3, 4))).toEqual({ real: -5, imag: 10 });
  });

  it('conjugates and measures magnitude', () => {
    expect(conjugate(complex(1, 2))).toEqual({ real: 1, imag: -2 });
    expect(magnitudeSquared(complex(3, 4))).toBe(25);
  });

  it('computes e^(iθ) on the unit circle', () => {
    expect(equals(expi(Math.PI / 2), I)).toBe(true);
    expect(equals(expi(0), ONE)).toBe(true);
  });
});

describe('Vectors', () => {
  it('round trips the interleaved layout', () => {
    const values = [complex(1, 2), complex(-3, 0.5)];
    expect(Array.from(toInterleaved(values))).toEqual([1, 2, -3, 0.5]);
    expect(fromInterleaved(toInterleaved(values))).toEqual(values);
  });

  it('conjugates the left vector in the inner product', () => {
    expect(innerProduct([I], [I])).toEqual({ real: 1, imag: 0 });
    expect(innerProduct([ONE], [I])).toEqual({ real: 0, imag: 1 });
  });

  it('rejects vectors of different length', () => {
    expect(() => innerProduct([ONE], [ONE, ONE])).toThrow('Vectors must have same length');
  });

  it('computes the Euclidean norm', () => {
    expect(norm([complex(3, 0), complex(0, 4)])).toBe(5);
  });
});

describe('Matrices', () => {
  it('multiplies by the identity without change', () => {
    const m = [
      [complex(1, 1), complex(2)],
      [complex(0, -1), complex(3, 2)],
    ];
    expect(matrixMultiply(identityMatrix(2), m)).toEqual(m);
  });

  it('conjugates and transposes', () => {
    const m = [
      [complex(1, 1), complex(2)],
      [complex(0, -1), complex(3, 2)],
    ];
    expect(conjugateTranspose(m)).toEqual([
      [complex(1, -1), complex(0, 1)],
      [complex(2, -0), complex(3, -2)],
    ]);
  });
});
