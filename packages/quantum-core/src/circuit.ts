/**
 * Parametric Circuit
 *
 * An ordered, reusable gate sequence. Rotation gates added through
 * addParametricRotation() get a parameter position, and their angle can be
 * read and replaced after construction without rebuilding the circuit.
 */

import type { ComplexMatrix } from './complex';
import { conjugateTranspose } from './complex';
import { DimensionMismatchError, InvalidReferenceError } from './errors';
import {
  FIXED_GATE_INVERSE,
  assertNever,
  type FixedGateType,
  type RotationAxis,
} from './gates';
import type { Observable } from './observable';
import { MAX_QUBITS, QuantumState } from './quantum-state';

// ============================================================================
// Gate Definitions
// ============================================================================

/**
 * Single-qubit gate without parameters
 */
export interface FixedGate {
  type: FixedGateType;
  qubit: number;
}

/**
 * Rotation about X, Y or Z. `parameterPosition` is set when the angle is
 * addressable through setParameter().
 */
export interface RotationGate {
  type: 'rotation';
  axis: RotationAxis;
  qubit: number;
  angle: number;
  parameterPosition?: number;
}

export type TwoQubitGateType = 'cnot' | 'cz' | 'swap';

export interface TwoQubitGate {
  type: TwoQubitGateType;
  control: number;
  target: number;
}

/**
 * Arbitrary dense matrix on a list of target qubits
 */
export interface DenseMatrixGate {
  type: 'dense';
  targets: number[];
  matrix: ComplexMatrix;
}

export type Gate = FixedGate | RotationGate | TwoQubitGate | DenseMatrixGate;

/**
 * Statistics about a circuit
 */
export interface CircuitStats {
  numQubits: number;
  depth: number;
  totalGates: number;
  parametricGates: number;
  gateBreakdown: Record<string, number>;
}

// ============================================================================
// ParametricCircuit Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const circuit = new ParametricCircuit(2).h(0).cnot(0, 1);
 * const pos = circuit.addParametricRotation('Y', 1, 0.3);
 * circuit.setParameter(pos, 1.2);
 * const state = circuit.applyTo(QuantumState.zero(2));
 * ```
 */
export class ParametricCircuit {
  private readonly _numQubits: number;
  private readonly _gates: Gate[] = [];
  private readonly _parameters: RotationGate[] = [];

  constructor(numQubits: number) {
    if (!Number.isInteger(numQubits) || numQubits < 1 || numQubits > MAX_QUBITS) {
      throw new Error(`numQubits must be between 1 and ${MAX_QUBITS}`);
    }
    this._numQubits = numQubits;
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get numQubits(): number {
    return this._numQubits;
  }

  get gates(): readonly Gate[] {
    return this._gates;
  }

  get length(): number {
    return this._gates.length;
  }

  /**
   * Number of addressable parameters; the next parametric gate gets this position
   */
  get parameterCount(): number {
    return this._parameters.length;
  }

  // =========================================================================
  // Fixed Gates
  // =========================================================================

  h(qubit: number): this {
    return this.pushFixed('h', qubit);
  }

  x(qubit: number): this {
    return this.pushFixed('x', qubit);
  }

  y(qubit: number): this {
    return this.pushFixed('y', qubit);
  }

  z(qubit: number): this {
    return this.pushFixed('z', qubit);
  }

  s(qubit: number): this {
    return this.pushFixed('s', qubit);
  }

  t(qubit: number): this {
    return this.pushFixed('t', qubit);
  }

  /**
   * Rotation with a fixed angle (no parameter position)
   */
  rotation(axis: RotationAxis, qubit: number, angle: number): this {
    this.validateQubit(qubit);
    this._gates.push({ type: 'rotation', axis, qubit, angle });
    return this;
  }

  rx(qubit: number, angle: number): this {
    return this.rotation('X', qubit, angle);
  }

  ry(qubit: number, angle: number): this {
    return this.rotation('Y', qubit, angle);
  }

  rz(qubit: number, angle: number): this {
    return this.rotation('Z', qubit, angle);
  }

  cnot(control: number, target: number): this {
    return this.pushTwoQubit('cnot', control, target);
  }

  cz(control: number, target: number): this {
    return this.pushTwoQubit('cz', control, target);
  }

  swap(qubit1: number, qubit2: number): this {
    return this.pushTwoQubit('swap', qubit1, qubit2);
  }

  /**
   * Dense gate; bit j of the matrix index addresses targets[j]
   */
  dense(targets: readonly number[], matrix: ComplexMatrix): this {
    for (const q of targets) {
      this.validateQubit(q);
    }
    if (new Set(targets).size !== targets.length) {
      throw new Error('All qubits must be different');
    }
    const size = 1 << targets.length;
    if (matrix.length !== size || matrix.some((row) => row.length !== size)) {
      throw new DimensionMismatchError('dense gate size', size, matrix.length);
    }
    this._gates.push({
      type: 'dense',
      targets: [...targets],
      matrix: matrix.map((row) => row.map((entry) => ({ ...entry }))),
    });
    return this;
  }

  // =========================================================================
  // Parameters
  // =========================================================================

  /**
   * Append a rotation whose angle can be changed later.
   * @returns The gate's parameter position
   */
  addParametricRotation(axis: RotationAxis, qubit: number, angle: number): number {
    this.validateQubit(qubit);
    const parameterPosition = this._parameters.length;
    const gate: RotationGate = { type: 'rotation', axis, qubit, angle, parameterPosition };
    this._gates.push(gate);
    this._parameters.push(gate);
    return parameterPosition;
  }

  getParameter(position: number): number {
    return this.parameterGate(position).angle;
  }

  setParameter(position: number, angle: number): void {
    this.parameterGate(position).angle = angle;
  }

  // =========================================================================
  // Application
  // =========================================================================

  /**
   * Apply this circuit to a state in place
   */
  applyTo(state: QuantumState): QuantumState {
    this.checkState(state);
    for (const gate of this._gates) {
      applyGate(state, gate);
    }
    return state;
  }

  /**
   * Gradient of ⟨0|U† O U|0⟩ with respect to every parameter position,
   * by adjoint differentiation: one forward pass, then the state and
   * O|ψ⟩ are walked back through the gates together.
   */
  backprop(observable: Observable): number[] {
    if (observable.numQubits !== this._numQubits) {
      throw new DimensionMismatchError('observable qubit count', this._numQubits, observable.numQubits);
    }
    const gradient: number[] = new Array<number>(this._parameters.length).fill(0);
    const psi = this.applyTo(QuantumState.zero(this._numQubits));
    const lambda = observable.apply(psi);

    for (let i = this._gates.length - 1; i >= 0; i--) {
      const gate = this._gates[i];
      if (gate.type === 'rotation' && gate.parameterPosition !== undefined) {
        // d/dθ exp(-iθσ/2) = -i/2 σ exp(-iθσ/2)
        const shifted = psi.copy().pauli(gate.axis, gate.qubit);
        gradient[gate.parameterPosition] = lambda.innerProduct(shifted).imag;
      }
      applyInverseGate(psi, gate);
      applyInverseGate(lambda, gate);
    }
    return gradient;
  }

  // =========================================================================
  // Statistics
  // =========================================================================

  getStats(): CircuitStats {
    const gateBreakdown: Record<string, number> = {};
    for (const gate of this._gates) {
      const key = gate.type === 'rotation' ? `r${gate.axis.toLowerCase()}` : gate.type;
      gateBreakdown[key] = (gateBreakdown[key] ?? 0) + 1;
    }
    return {
      numQubits: this._numQubits,
      depth: this.calculateDepth(),
      totalGates: this._gates.length,
      parametricGates: this._parameters.length,
      gateBreakdown,
    };
  }

  private calculateDepth(): number {
    const qubitDepths: number[] = new Array<number>(this._numQubits).fill(0);

    for (const gate of this._gates) {
      const qubits = gateQubits(gate);
      const maxDepth = Math.max(...qubits.map((q) => qubitDepths[q]));
      for (const q of qubits) {
        qubitDepths[q] = maxDepth + 1;
      }
    }

    return Math.max(...qubitDepths);
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private pushFixed(type: FixedGateType, qubit: number): this {
    this.validateQubit(qubit);
    this._gates.push({ type, qubit });
    return this;
  }

  private pushTwoQubit(type: TwoQubitGateType, control: number, target: number): this {
    this.validateQubit(control);
    this.validateQubit(target);
    if (control === target) {
      throw new Error('Control and target must be different qubits');
    }
    this._gates.push({ type, control, target });
    return this;
  }

  private parameterGate(position: number): RotationGate {
    const gate = this._parameters[position];
    if (gate === undefined) {
      throw new InvalidReferenceError(
        position,
        `Parameter position ${position} out of range [0, ${this._parameters.length - 1}]`
      );
    }
    return gate;
  }

  private validateQubit(qubit: number): void {
    if (!Number.isInteger(qubit) || qubit < 0 || qubit >= this._numQubits) {
      throw new Error(
        `Qubit ${qubit} out of range [0, ${this._numQubits - 1}]`
      );
    }
  }

  private checkState(state: QuantumState): void {
    if (state.numQubits !== this._numQubits) {
      throw new Error(
        `Circuit has ${this._numQubits} qubits but state has ${state.numQubits}`
      );
    }
  }
}

// ============================================================================
// Gate Application
// ============================================================================

function gateQubits(gate: Gate): number[] {
  switch (gate.type) {
    case 'rotation':
      return [gate.qubit];
    case 'cnot':
    case 'cz':
    case 'swap':
      return [gate.control, gate.target];
    case 'dense':
      return gate.targets;
    default:
      return [gate.qubit];
  }
}

function applyGate(state: QuantumState, gate: Gate): void {
  switch (gate.type) {
    case 'rotation':
      state.rotate(gate.axis, gate.qubit, gate.angle);
      break;
    case 'cnot':
      state.cnot(gate.control, gate.target);
      break;
    case 'cz':
      state.cz(gate.control, gate.target);
      break;
    case 'swap':
      state.swap(gate.control, gate.target);
      break;
    case 'dense':
      state.applyMatrix(gate.targets, gate.matrix);
      break;
    case 'h':
    case 'x':
    case 'y':
    case 'z':
    case 's':
    case 'sdg':
    case 't':
    case 'tdg':
      state[gate.type](gate.qubit);
      break;
    default:
      assertNever(gate);
  }
}

function applyInverseGate(state: QuantumState, gate: Gate): void {
  switch (gate.type) {
    case 'rotation':
      state.rotate(gate.axis, gate.qubit, -gate.angle);
      break;
    case 'cnot':
    case 'cz':
    case 'swap':
      applyGate(state, gate);
      break;
    case 'dense':
      state.applyMatrix(gate.targets, conjugateTranspose(gate.matrix));
      break;
    case 'h':
    case 'x':
    case 'y':
    case 'z':
    case 's':
    case 'sdg':
    case 't':
    case 'tdg':
      state[FIXED_GATE_INVERSE[gate.type]](gate.qubit);
      break;
    default:
      assertNever(gate);
  }
}
