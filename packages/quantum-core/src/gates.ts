/**
 * Gate matrices
 *
 * Single-qubit matrices are stored flat as [m00, m01, m10, m11].
 * Rotations follow R_a(θ) = exp(-iθσ_a/2).
 */

import { complex, type Complex } from './complex';
import { UnsupportedAxisError } from './errors';

// ============================================================================
// Axes
// ============================================================================

/**
 * Rotation / Pauli axis
 */
export type RotationAxis = 'X' | 'Y' | 'Z';

export const ROTATION_AXES: readonly RotationAxis[] = ['X', 'Y', 'Z'];

/**
 * Turn an external tag ("x", "Y", ...) into a RotationAxis.
 * This is the only place an unknown axis can enter the library.
 */
export function parseRotationAxis(tag: string): RotationAxis {
  switch (tag.toUpperCase()) {
    case 'X':
      return 'X';
    case 'Y':
      return 'Y';
    case 'Z':
      return 'Z';
    default:
      throw new UnsupportedAxisError(tag);
  }
}

/**
 * Exhaustiveness check for switches over closed unions
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected variant: ${JSON.stringify(value)}`);
}

// ============================================================================
// Matrices
// ============================================================================

export type Matrix2 = readonly [Complex, Complex, Complex, Complex];

/**
 * Fixed single-qubit gate types
 */
export type FixedGateType = 'h' | 'x' | 'y' | 'z' | 's' | 'sdg' | 't' | 'tdg';

const R = Math.SQRT1_2;

export const FIXED_GATES: Readonly<Record<FixedGateType, Matrix2>> = {
  h: [complex(R), complex(R), complex(R), complex(-R)],
  x: [complex(0), complex(1), complex(1), complex(0)],
  y: [complex(0), complex(0, -1), complex(0, 1), complex(0)],
  z: [complex(1), complex(0), complex(0), complex(-1)],
  s: [complex(1), complex(0), complex(0), complex(0, 1)],
  sdg: [complex(1), complex(0), complex(0), complex(0, -1)],
  t: [complex(1), complex(0), complex(0), complex(R, R)],
  tdg: [complex(1), complex(0), complex(0), complex(R, -R)],
};

/**
 * Inverse of each fixed gate
 */
export const FIXED_GATE_INVERSE: Readonly<Record<FixedGateType, FixedGateType>> = {
  h: 'h',
  x: 'x',
  y: 'y',
  z: 'z',
  s: 'sdg',
  sdg: 's',
  t: 'tdg',
  tdg: 't',
};

/**
 * Pauli matrix for an axis
 */
export function pauliMatrix(axis: RotationAxis): Matrix2 {
  switch (axis) {
    case 'X':
      return FIXED_GATES.x;
    case 'Y':
      return FIXED_GATES.y;
    case 'Z':
      return FIXED_GATES.z;
    default:
      return assertNever(axis);
  }
}

/**
 * R_axis(θ) = cos(θ/2) I - i sin(θ/2) σ_axis
 */
export function rotationMatrix(axis: RotationAxis, theta: number): Matrix2 {
  const c = Math.cos(theta / 2);
  const s = Math.sin(theta / 2);
  switch (axis) {
    case 'X':
      return [complex(c), complex(0, -s), complex(0, -s), complex(c)];
    case 'Y':
      return [complex(c), complex(-s), complex(s), complex(c)];
    case 'Z':
      return [complex(c, -s), complex(0), complex(0), complex(c, s)];
    default:
      return assertNever(axis);
  }
}

