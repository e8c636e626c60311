/**
 * QuantumState Class
 *
 * State-vector simulator with a fluent API for applying gates.
 * Amplitudes live in one interleaved Float64Array [re0, im0, re1, im1, ...];
 * qubit k is bit k of the basis index.
 */

import {
  fromInterleaved,
  toInterleaved,
  type Complex,
  type ComplexMatrix,
} from './complex';
import { DimensionMismatchError } from './errors';
import {
  FIXED_GATES,
  pauliMatrix,
  rotationMatrix,
  type Matrix2,
  type RotationAxis,
} from './gates';

export const MAX_QUBITS = 24;

/**
 * Options for creating a quantum state
 */
export interface QuantumStateOptions {
  /**
   * Number of qubits (1-24)
   */
  numQubits: number;

  /**
   * Initial amplitudes (optional, defaults to |0...0⟩)
   */
  amplitudes?: readonly Complex[];
}

/**
 * Quantum state class with fluent API
 *
 * @example
 * ```typescript
 * const state = QuantumState.zero(2);
 * state.h(0).cnot(0, 1);  // Bell state
 * state.getProbabilities(); // [0.5, 0, 0, 0.5]
 * ```
 */
export class QuantumState {
  private readonly _numQubits: number;
  private data: Float64Array;

  constructor(options: QuantumStateOptions) {
    if (options.numQubits < 1 || options.numQubits > MAX_QUBITS) {
      throw new Error(`numQubits must be between 1 and ${MAX_QUBITS}`);
    }
    this._numQubits = options.numQubits;
    this.data = new Float64Array(2 << options.numQubits);

    if (options.amplitudes) {
      this.setAmplitudes(options.amplitudes);
    } else {
      this.data[0] = 1;
    }
  }

  /**
   * |0...0⟩ on numQubits qubits
   */
  static zero(numQubits: number): QuantumState {
    return new QuantumState({ numQubits });
  }

  /**
   * The all-zero vector. Not a physical state; used to accumulate
   * linear combinations such as O|ψ⟩.
   */
  static blank(numQubits: number): QuantumState {
    const state = new QuantumState({ numQubits });
    state.data[0] = 0;
    return state;
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get numQubits(): number {
    return this._numQubits;
  }

  /**
   * Dimension of state space (2^n)
   */
  get stateDim(): number {
    return 1 << this._numQubits;
  }

  // =========================================================================
  // State Operations
  // =========================================================================

  /**
   * Reset to |0...0⟩
   */
  setZeroState(): this {
    this.data.fill(0);
    this.data[0] = 1;
    return this;
  }

  /**
   * Independent deep copy. Gates applied to the copy never touch this state.
   */
  copy(): QuantumState {
    const clone = QuantumState.blank(this._numQubits);
    clone.data.set(this.data);
    return clone;
  }

  getAmplitudes(): Complex[] {
    return fromInterleaved(this.data);
  }

  amplitude(basisState: number): Complex {
    this.checkBasisState(basisState);
    return { real: this.data[2 * basisState], imag: this.data[2 * basisState + 1] };
  }

  /**
   * Set amplitudes (must have correct dimension)
   */
  setAmplitudes(amplitudes: readonly Complex[]): this {
    if (amplitudes.length !== this.stateDim) {
      throw new DimensionMismatchError('amplitudes', this.stateDim, amplitudes.length);
    }
    this.data = toInterleaved(amplitudes);
    return this;
  }

  getProbabilities(): Float64Array {
    const probs = new Float64Array(this.stateDim);
    for (let i = 0; i < probs.length; i++) {
      const re = this.data[2 * i];
      const im = this.data[2 * i + 1];
      probs[i] = re * re + im * im;
    }
    return probs;
  }

  /**
   * ||ψ||
   */
  norm(): number {
    let sum = 0;
    for (let i = 0; i < this.data.length; i++) {
      sum += this.data[i] * this.data[i];
    }
    return Math.sqrt(sum);
  }

  /**
   * <this|other>
   */
  innerProduct(other: QuantumState): Complex {
    this.checkSameSize(other);
    let real = 0;
    let imag = 0;
    for (let i = 0; i < this.data.length; i += 2) {
      const ar = this.data[i];
      const ai = this.data[i + 1];
      const br = other.data[i];
      const bi = other.data[i + 1];
      real += ar * br + ai * bi;
      imag += ar * bi - ai * br;
    }
    return { real, imag };
  }

  /**
   * this += factor * other
   */
  addScaled(other: QuantumState, factor: number): this {
    this.checkSameSize(other);
    for (let i = 0; i < this.data.length; i++) {
      this.data[i] += factor * other.data[i];
    }
    return this;
  }

  // =========================================================================
  // Single-Qubit Gates
  // =========================================================================

  h(qubit: number): this {
    return this.applySingleQubit(qubit, FIXED_GATES.h);
  }

  x(qubit: number): this {
    return this.applySingleQubit(qubit, FIXED_GATES.x);
  }

  y(qubit: number): this {
    return this.applySingleQubit(qubit, FIXED_GATES.y);
  }

  z(qubit: number): this {
    return this.applySingleQubit(qubit, FIXED_GATES.z);
  }

  s(qubit: number): this {
    return this.applySingleQubit(qubit, FIXED_GATES.s);
  }

  sdg(qubit: number): this {
    return this.applySingleQubit(qubit, FIXED_GATES.sdg);
  }

  t(qubit: number): this {
    return this.applySingleQubit(qubit, FIXED_GATES.t);
  }

  tdg(qubit: number): this {
    return this.applySingleQubit(qubit, FIXED_GATES.tdg);
  }

  /**
   * Rx(θ) = exp(-iθX/2)
   */
  rx(qubit: number, angle: number): this {
    return this.rotate('X', qubit, angle);
  }

  /**
   * Ry(θ) = exp(-iθY/2)
   */
  ry(qubit: number, angle: number): this {
    return this.rotate('Y', qubit, angle);
  }

  /**
   * Rz(θ) = exp(-iθZ/2)
   */
  rz(qubit: number, angle: number): this {
    return this.rotate('Z', qubit, angle);
  }

  rotate(axis: RotationAxis, qubit: number, angle: number): this {
    return this.applySingleQubit(qubit, rotationMatrix(axis, angle));
  }

  pauli(axis: RotationAxis, qubit: number): this {
    return this.applySingleQubit(qubit, pauliMatrix(axis));
  }

  /**
   * Apply a 2x2 matrix [m00, m01, m10, m11] to one qubit
   */
  applySingleQubit(qubit: number, mat: Matrix2): this {
    this.checkQubit(qubit);
    const [m00, m01, m10, m11] = mat;
    const mask = 1 << qubit;
    const dim = this.stateDim;
    const d = this.data;

    for (let i = 0; i < dim; i += 2 * mask) {
      for (let j = 0; j < mask; j++) {
        const i0 = 2 * (i + j);
        const i1 = 2 * (i + j + mask);
        const a0r = d[i0];
        const a0i = d[i0 + 1];
        const a1r = d[i1];
        const a1i = d[i1 + 1];

        d[i0] = m00.real * a0r - m00.imag * a0i + m01.real * a1r - m01.imag * a1i;
        d[i0 + 1] = m00.real * a0i + m00.imag * a0r + m01.real * a1i + m01.imag * a1r;
        d[i1] = m10.real * a0r - m10.imag * a0i + m11.real * a1r - m11.imag * a1i;
        d[i1 + 1] = m10.real * a0i + m10.imag * a0r + m11.real * a1i + m11.imag * a1r;
      }
    }
    return this;
  }

  // =========================================================================
  // Two-Qubit Gates
  // =========================================================================

  /**
   * Controlled-NOT: flips target if control is |1⟩
   */
  cnot(control: number, target: number): this {
    this.checkPair(control, target);
    const cMask = 1 << control;
    const tMask = 1 << target;
    for (let i = 0; i < this.stateDim; i++) {
      if ((i & cMask) !== 0 && (i & tMask) === 0) {
        this.swapAmplitudes(i, i | tMask);
      }
    }
    return this;
  }

  /**
   * Controlled-Z: negates |11⟩ components
   */
  cz(control: number, target: number): this {
    this.checkPair(control, target);
    const mask = (1 << control) | (1 << target);
    for (let i = 0; i < this.stateDim; i++) {
      if ((i & mask) === mask) {
        this.data[2 * i] = -this.data[2 * i];
        this.data[2 * i + 1] = -this.data[2 * i + 1];
      }
    }
    return this;
  }

  /**
   * SWAP gate - exchanges two qubits
   */
  swap(qubit1: number, qubit2: number): this {
    this.checkQubit(qubit1);
    this.checkQubit(qubit2);
    if (qubit1 === qubit2) {
      return this; // SWAP(q,q) is identity
    }
    const m1 = 1 << qubit1;
    const m2 = 1 << qubit2;
    for (let i = 0; i < this.stateDim; i++) {
      if ((i & m1) !== 0 && (i & m2) === 0) {
        this.swapAmplitudes(i, (i & ~m1) | m2);
      }
    }
    return this;
  }

  // =========================================================================
  // Dense Gates
  // =========================================================================

  /**
   * Apply a dense 2^k x 2^k matrix to k target qubits.
   * Bit j of the matrix row/column index addresses targets[j].
   */
  applyMatrix(targets: readonly number[], matrix: ComplexMatrix): this {
    for (const q of targets) {
      this.checkQubit(q);
    }
    if (new Set(targets).size !== targets.length) {
      throw new Error('All qubits must be different');
    }
    const size = 1 << targets.length;
    if (matrix.length !== size) {
      throw new DimensionMismatchError('matrix rows', size, matrix.length);
    }
    for (const row of matrix) {
      if (row.length !== size) {
        throw new DimensionMismatchError('matrix columns', size, row.length);
      }
    }

    let targetMask = 0;
    for (const q of targets) {
      targetMask |= 1 << q;
    }
    const offsets = Array.from({ length: size }, (_, sub) => {
      let offset = 0;
      for (let j = 0; j < targets.length; j++) {
        if ((sub >> j) & 1) {
          offset |= 1 << targets[j];
        }
      }
      return offset;
    });

    const inRe = new Float64Array(size);
    const inIm = new Float64Array(size);
    for (let base = 0; base < this.stateDim; base++) {
      if ((base & targetMask) !== 0) continue;

      for (let c = 0; c < size; c++) {
        const idx = 2 * (base | offsets[c]);
        inRe[c] = this.data[idx];
        inIm[c] = this.data[idx + 1];
      }
      for (let r = 0; r < size; r++) {
        const row = matrix[r];
        let re = 0;
        let im = 0;
        for (let c = 0; c < size; c++) {
          const m = row[c];
          re += m.real * inRe[c] - m.imag * inIm[c];
          im += m.real * inIm[c] + m.imag * inRe[c];
        }
        const idx = 2 * (base | offsets[r]);
        this.data[idx] = re;
        this.data[idx + 1] = im;
      }
    }
    return this;
  }

  // =========================================================================
  // Measurement Statistics
  // =========================================================================

  /**
   * Probability of measuring |1⟩ on a qubit (non-destructive)
   */
  probabilityOne(qubit: number): number {
    this.checkQubit(qubit);
    const mask = 1 << qubit;
    let p = 0;
    for (let i = 0; i < this.stateDim; i++) {
      if ((i & mask) !== 0) {
        p += this.data[2 * i] ** 2 + this.data[2 * i + 1] ** 2;
      }
    }
    return p;
  }

  /**
   * ⟨Z⟩ = P(0) - P(1) on a normalized state
   */
  expectationZ(qubit: number): number {
    const p1 = this.probabilityOne(qubit);
    return this.norm() ** 2 - 2 * p1;
  }

  // =========================================================================
  // Internal Helpers
  // =========================================================================

  private swapAmplitudes(a: number, b: number): void {
    const d = this.data;
    const re = d[2 * a];
    const im = d[2 * a + 1];
    d[2 * a] = d[2 * b];
    d[2 * a + 1] = d[2 * b + 1];
    d[2 * b] = re;
    d[2 * b + 1] = im;
  }

  private checkQubit(qubit: number): void {
    if (!Number.isInteger(qubit) || qubit < 0 || qubit >= this._numQubits) {
      throw new Error(
        `Qubit ${qubit} out of range [0, ${this._numQubits - 1}]`
      );
    }
  }

  private checkPair(control: number, target: number): void {
    this.checkQubit(control);
    this.checkQubit(target);
    if (control === target) {
      throw new Error('Control and target must be different qubits');
    }
  }

  private checkBasisState(basisState: number): void {
    if (basisState < 0 || basisState >= this.stateDim) {
      throw new Error(`Basis state must be between 0 and ${this.stateDim - 1}`);
    }
  }

  private checkSameSize(other: QuantumState): void {
    if (other._numQubits !== this._numQubits) {
      throw new DimensionMismatchError('qubit count', this._numQubits, other._numQubits);
    }
  }
}
