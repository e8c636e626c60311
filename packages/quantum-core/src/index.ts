/**
 * @qclearn/quantum-core
 *
 * In-process state-vector simulator: quantum states, parametric circuits
 * whose rotation angles can be rebound after construction, Pauli
 * observables and adjoint-method gradients.
 *
 * @example
 * ```typescript
 * import { ParametricCircuit, QuantumState, Observable } from '@qclearn/quantum-core';
 *
 * const circuit = new ParametricCircuit(2).h(0).cnot(0, 1);
 * const pos = circuit.addParametricRotation('Y', 1, 0.4);
 *
 * const state = circuit.applyTo(QuantumState.zero(2));
 * const z1 = Observable.z(2, 1);
 * z1.expectationValue(state);
 * circuit.backprop(z1)[pos]; // d⟨Z1⟩/dθ
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Core Classes
// ============================================================================

export { QuantumState, MAX_QUBITS } from './quantum-state';
export type { QuantumStateOptions } from './quantum-state';

export { ParametricCircuit } from './circuit';
export type {
  Gate,
  FixedGate,
  RotationGate,
  TwoQubitGate,
  TwoQubitGateType,
  DenseMatrixGate,
  CircuitStats,
} from './circuit';

export { Observable } from './observable';
export type { PauliFactor, PauliTerm } from './observable';

// ============================================================================
// Gates and Axes
// ============================================================================

export {
  ROTATION_AXES,
  FIXED_GATES,
  parseRotationAxis,
  assertNever,
  pauliMatrix,
  rotationMatrix,
} from './gates';
export type { RotationAxis, FixedGateType, Matrix2 } from './gates';

// ============================================================================
// Complex Number Utilities
// ============================================================================

export {
  complex,
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
  ZERO,
  ONE,
  I,
} from './complex';
export type { Complex, ComplexMatrix } from './complex';

// ============================================================================
// Errors
// ============================================================================

export {
  QclearnError,
  DimensionMismatchError,
  InvalidReferenceError,
  UnsupportedAxisError,
  ConfigurationError,
} from './errors';
export type { QclearnErrorCode } from './errors';

export const VERSION = '0.1.0';
