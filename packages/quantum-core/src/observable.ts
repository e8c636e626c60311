/**
 * Observable
 *
 * A Hermitian operator written as a real-weighted sum of Pauli strings,
 * e.g. 0.5·Z0 + 1.0·X0 X1.
 */

import { parseRotationAxis, type RotationAxis } from './gates';
import { QuantumState } from './quantum-state';

/**
 * One Pauli factor of a term
 */
export interface PauliFactor {
  axis: RotationAxis;
  qubit: number;
}

export interface PauliTerm {
  coefficient: number;
  factors: PauliFactor[];
}

/**
 * @example
 * ```typescript
 * const obs = new Observable(2).addOperator(1.0, 'Z 0');
 * obs.expectationValue(QuantumState.zero(2)); // 1
 * ```
 */
export class Observable {
  private readonly _numQubits: number;
  private readonly _terms: PauliTerm[] = [];

  constructor(numQubits: number) {
    if (!Number.isInteger(numQubits) || numQubits < 1) {
      throw new Error('numQubits must be a positive integer');
    }
    this._numQubits = numQubits;
  }

  /**
   * Single-term observable Z on one qubit
   */
  static z(numQubits: number, qubit: number): Observable {
    return new Observable(numQubits).addOperator(1, `Z ${qubit}`);
  }

  get numQubits(): number {
    return this._numQubits;
  }

  get terms(): readonly PauliTerm[] {
    return this._terms;
  }

  /**
   * Add `coefficient · P` where P is written as "X 0 Z 2".
   * "I" factors are accepted and dropped; an empty string is the identity.
   */
  addOperator(coefficient: number, pauliString: string): this {
    const tokens = pauliString.trim().split(/\s+/).filter((t) => t.length > 0);
    if (tokens.length % 2 !== 0) {
      throw new Error(`Malformed Pauli string '${pauliString}'`);
    }

    const factors: PauliFactor[] = [];
    const seen = new Set<number>();
    for (let i = 0; i < tokens.length; i += 2) {
      const qubit = Number(tokens[i + 1]);
      if (!Number.isInteger(qubit) || qubit < 0 || qubit >= this._numQubits) {
        throw new Error(
          `Qubit ${tokens[i + 1]} out of range [0, ${this._numQubits - 1}]`
        );
      }
      if (seen.has(qubit)) {
        throw new Error(`Qubit ${qubit} appears twice in '${pauliString}'`);
      }
      seen.add(qubit);
      if (tokens[i].toUpperCase() === 'I') continue;
      factors.push({ axis: parseRotationAxis(tokens[i]), qubit });
    }

    this._terms.push({ coefficient, factors });
    return this;
  }

  /**
   * O|ψ⟩ as a new (generally unnormalized) vector
   */
  apply(state: QuantumState): QuantumState {
    this.checkState(state);
    const result = QuantumState.blank(this._numQubits);
    for (const term of this._terms) {
      const image = state.copy();
      for (const f of term.factors) {
        image.pauli(f.axis, f.qubit);
      }
      result.addScaled(image, term.coefficient);
    }
    return result;
  }

  /**
   * ⟨ψ|O|ψ⟩ (real for Hermitian O)
   */
  expectationValue(state: QuantumState): number {
    this.checkState(state);
    let value = 0;
    for (const term of this._terms) {
      const image = state.copy();
      for (const f of term.factors) {
        image.pauli(f.axis, f.qubit);
      }
      value += term.coefficient * state.innerProduct(image).real;
    }
    return value;
  }

  private checkState(state: QuantumState): void {
    if (state.numQubits !== this._numQubits) {
      throw new Error(
        `Observable has ${this._numQubits} qubits but state has ${state.numQubits}`
      );
    }
  }
}
