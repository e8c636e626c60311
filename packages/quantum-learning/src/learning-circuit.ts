/**
 * Learning Circuit
 *
 * Builder over a ParametricCircuit that registers every rotation it adds
 * with a ParameterRegistry, as a learning, input or coupled slot.
 *
 * @example
 * ```typescript
 * const lc = new LearningCircuit(2)
 *   .inputRy(0, (x) => Math.asin(x[0]))
 *   .parametricRx(0, 0.1)
 *   .cnot(0, 1)
 *   .parametricInputRz(1, 0.2, (theta, x) => theta * x[1]);
 *
 * lc.updateParameters([0.3, 0.4]);
 * ```
 */

import {
  ParametricCircuit,
  type ComplexMatrix,
  type RotationAxis,
} from '@qclearn/quantum-core';
import {
  ParameterRegistry,
  type CoupledTransform,
  type InputTransform,
} from './parameter-registry';

const firstFeature: InputTransform = (x) => x[0];
const firstFeatureCoupled: CoupledTransform = (_theta, x) => x[0];

export class LearningCircuit {
  private readonly _circuit: ParametricCircuit;
  private readonly _registry: ParameterRegistry;

  constructor(numQubits: number) {
    this._circuit = new ParametricCircuit(numQubits);
    this._registry = new ParameterRegistry(this._circuit);
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get numQubits(): number {
    return this._circuit.numQubits;
  }

  get circuit(): ParametricCircuit {
    return this._circuit;
  }

  get registry(): ParameterRegistry {
    return this._registry;
  }

  get parameterCount(): number {
    return this._registry.learningCount;
  }

  // =========================================================================
  // Fixed Gates
  // =========================================================================

  h(qubit: number): this {
    this._circuit.h(qubit);
    return this;
  }

  x(qubit: number): this {
    this._circuit.x(qubit);
    return this;
  }

  y(qubit: number): this {
    this._circuit.y(qubit);
    return this;
  }

  z(qubit: number): this {
    this._circuit.z(qubit);
    return this;
  }

  cnot(control: number, target: number): this {
    this._circuit.cnot(control, target);
    return this;
  }

  cz(control: number, target: number): this {
    this._circuit.cz(control, target);
    return this;
  }

  rx(qubit: number, angle: number): this {
    this._circuit.rx(qubit, angle);
    return this;
  }

  ry(qubit: number, angle: number): this {
    this._circuit.ry(qubit, angle);
    return this;
  }

  rz(qubit: number, angle: number): this {
    this._circuit.rz(qubit, angle);
    return this;
  }

  dense(targets: readonly number[], matrix: ComplexMatrix): this {
    this._circuit.dense(targets, matrix);
    return this;
  }

  // =========================================================================
  // Input Rotations
  // =========================================================================

  /**
   * Rotation whose angle is recomputed from each data sample
   */
  inputRotation(axis: RotationAxis, qubit: number, transform: InputTransform): this {
    const position = this._circuit.addParametricRotation(axis, qubit, 0);
    this._registry.addInputSlot(position, { transform });
    return this;
  }

  inputRx(qubit: number, transform: InputTransform = firstFeature): this {
    return this.inputRotation('X', qubit, transform);
  }

  inputRy(qubit: number, transform: InputTransform = firstFeature): this {
    return this.inputRotation('Y', qubit, transform);
  }

  inputRz(qubit: number, transform: InputTransform = firstFeature): this {
    return this.inputRotation('Z', qubit, transform);
  }

  // =========================================================================
  // Learning Rotations
  // =========================================================================

  /**
   * Trainable rotation; its theta index is the current parameterCount
   */
  parametricRotation(axis: RotationAxis, qubit: number, initial: number): this {
    const position = this._circuit.addParametricRotation(axis, qubit, initial);
    this._registry.addLearningSlot(position, initial);
    return this;
  }

  parametricRx(qubit: number, initial: number): this {
    return this.parametricRotation('X', qubit, initial);
  }

  parametricRy(qubit: number, initial: number): this {
    return this.parametricRotation('Y', qubit, initial);
  }

  parametricRz(qubit: number, initial: number): this {
    return this.parametricRotation('Z', qubit, initial);
  }

  // =========================================================================
  // Coupled Rotations
  // =========================================================================

  /**
   * Trainable rotation that every bind also rewrites from (theta, x)
   */
  parametricInputRotation(
    axis: RotationAxis,
    qubit: number,
    initial: number,
    transform: CoupledTransform
  ): this {
    const position = this._circuit.addParametricRotation(axis, qubit, initial);
    this._registry.addCoupledSlot(position, initial, transform);
    return this;
  }

  parametricInputRx(qubit: number, initial: number, transform: CoupledTransform = firstFeatureCoupled): this {
    return this.parametricInputRotation('X', qubit, initial, transform);
  }

  parametricInputRy(qubit: number, initial: number, transform: CoupledTransform = firstFeatureCoupled): this {
    return this.parametricInputRotation('Y', qubit, initial, transform);
  }

  parametricInputRz(qubit: number, initial: number, transform: CoupledTransform = firstFeatureCoupled): this {
    return this.parametricInputRotation('Z', qubit, initial, transform);
  }

  // =========================================================================
  // Theta
  // =========================================================================

  updateParameters(theta: readonly number[]): this {
    this._registry.applyTheta(theta);
    return this;
  }

  getParameters(): number[] {
    return this._registry.snapshotTheta();
  }
}
