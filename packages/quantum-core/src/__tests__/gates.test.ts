import { describe, it, expect } from 'vitest';
import { UnsupportedAxisError } from '../errors';
import { ROTATION_AXES, parseRotationAxis, pauliMatrix, rotationMatrix } from '../gates';

describe('parseRotationAxis', () => {
  it('accepts X, Y and Z in either case', () => {
    expect(['x', 'Y', 'z'].map(parseRotationAxis)).toEqual(['X', 'Y', 'Z']);
  });

  it('rejects any other tag', () => {
    expect(() => parseRotationAxis('W')).toThrow(UnsupportedAxisError);
    expect(() => parseRotationAxis('W')).toThrow("Unsupported axis 'W': expected one of X, Y, Z");
  });
});

describe('rotationMatrix', () => {
  it('reduces to the identity at angle 0', () => {
    for (const axis of ROTATION_AXES) {
      rotationMatrix(axis, 0).forEach((entry, k) => {
        expect(entry.real).toBeCloseTo(k === 0 || k === 3 ? 1 : 0, 12);
        expect(entry.imag).toBeCloseTo(0, 12);
      });
    }
  });

  it('equals -i times the Pauli matrix at angle π', () => {
    for (const axis of ROTATION_AXES) {
      const rotation = rotationMatrix(axis, Math.PI);
      pauliMatrix(axis).forEach((p, k) => {
        // -i (a + bi) = b - ai
        expect(rotation[k].real).toBeCloseTo(p.imag, 12);
        expect(rotation[k].imag).toBeCloseTo(-p.real, 12);
      });
    }
  });
});
