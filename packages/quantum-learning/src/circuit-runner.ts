/**
 * Circuit Runner
 *
 * Executes a LearningCircuit: binds a data sample, commits the angles and
 * runs the circuit from |0…0⟩. Also produces softmaxed predictions over
 * captured input states and per-theta gradients.
 */

import { Observable, QuantumState } from '@qclearn/quantum-core';
import type { LearningCircuit } from './learning-circuit';
import { softmax } from './numeric';

const SHIFT = Math.PI / 2;

export class CircuitRunner {
  private readonly learningCircuit: LearningCircuit;

  constructor(learningCircuit: LearningCircuit) {
    this.learningCircuit = learningCircuit;
  }

  get circuit(): LearningCircuit {
    return this.learningCircuit;
  }

  /**
   * Bind `data` into every input slot, then execute from |0…0⟩
   */
  run(data: readonly number[] = []): QuantumState {
    this.bind(data);
    return this.runWithoutRebindingInputs();
  }

  /**
   * Execute with whatever angles the circuit currently holds
   */
  runWithoutRebindingInputs(): QuantumState {
    const circuit = this.learningCircuit.circuit;
    return circuit.applyTo(QuantumState.zero(circuit.numQubits));
  }

  expectation(data: readonly number[], observable: Observable): number {
    return observable.expectationValue(this.run(data));
  }

  /**
   * For each captured input state: copy it, apply the circuit with `theta`,
   * measure every observable and softmax the results.
   * Input states are never modified.
   */
  predict(
    theta: readonly number[],
    inputStates: readonly QuantumState[],
    observables: readonly Observable[]
  ): number[][] {
    this.learningCircuit.registry.applyTheta(theta);
    const circuit = this.learningCircuit.circuit;
    return inputStates.map((input) => {
      const state = circuit.applyTo(input.copy());
      return softmax(observables.map((o) => o.expectationValue(state)));
    });
  }

  /**
   * d⟨O⟩/dθ per theta index by adjoint differentiation
   */
  gradientAnalytic(data: readonly number[], observable: Observable): number[] {
    this.bind(data);
    const perPosition = this.learningCircuit.circuit.backprop(observable);
    return this.learningCircuit.registry.routeGradient(perPosition);
  }

  /**
   * d⟨O⟩/dθ per theta index by the parameter-shift rule:
   * (f(θ + π/2·e_k) - f(θ - π/2·e_k)) / 2. Coupled rows get 0.
   * Theta is restored afterwards.
   */
  gradientParameterShift(data: readonly number[], observable: Observable): number[] {
    this.bind(data);
    const registry = this.learningCircuit.registry;
    const theta = registry.snapshotTheta();
    const gradient: number[] = new Array<number>(theta.length).fill(0);

    const evaluate = (shifted: number[]): number => {
      registry.applyTheta(shifted);
      return observable.expectationValue(this.runWithoutRebindingInputs());
    };

    for (const k of registry.trainableIndices()) {
      const plus = [...theta];
      plus[k] += SHIFT;
      const minus = [...theta];
      minus[k] -= SHIFT;
      gradient[k] = (evaluate(plus) - evaluate(minus)) / 2;
    }

    registry.applyTheta(theta);
    return gradient;
  }

  private bind(data: readonly number[]): void {
    const registry = this.learningCircuit.registry;
    registry.commitInputs(registry.bindInputs(data));
  }
}
