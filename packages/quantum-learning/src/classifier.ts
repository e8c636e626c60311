/**
 * Quantum circuit learning classifier.
 *
 * Two-feature samples are min-max scaled and encoded by an input circuit;
 * the captured states are then fed through a trainable output circuit of
 * `cDepth` blocks (random Ising time evolution followed by RX RZ RX on every
 * qubit). Class scores are ⟨Z_i⟩ on the first `numClass` qubits, softmaxed.
 *
 * @example
 * ```typescript
 * const clf = new QclClassifier({ nQubit: 4, cDepth: 4, numClass: 3 });
 * const { result } = clf.fit(x, oneHot(labels, 3), { maxIter: 50 });
 * clf.predictClass(xTest);
 * ```
 */

import { DimensionMismatchError, Observable, type QuantumState } from '@qclearn/quantum-core';
import { CircuitRunner } from './circuit-runner';
import {
  resolveClassifierSettings,
  resolveFitSettings,
  type ClassifierOptions,
  type ClassifierSettings,
  type FitOptions,
} from './config';
import { applyFeatureRange, createInputEncoder, fitFeatureRange, type FeatureRange } from './encoding';
import { createTimeEvolutionGate } from './hamiltonian';
import { LearningCircuit } from './learning-circuit';
import { createLogger } from './logging';
import { argmax, logLoss } from './numeric';
import { BfgsOptimizer, type MinimizeResult } from './optimizer';

const logger = createLogger('classifier');

const SHIFT = Math.PI / 2;

/**
 * How new samples are scaled before encoding:
 * - `batch`: fit the min-max range on the batch itself
 * - `training`: reuse the range captured by the last batch-normalized setInputState
 */
export type Normalization = 'batch' | 'training';

export interface PredictOptions {
  normalization?: Normalization;
}

export interface FitResult {
  result: MinimizeResult;
  thetaInit: number[];
  thetaOpt: number[];
}

type Matrix = readonly (readonly number[])[];

export class QclClassifier {
  readonly settings: ClassifierSettings;
  private readonly random: () => number;
  private readonly observables: Observable[];
  private readonly encoder: CircuitRunner;
  private output: LearningCircuit;
  private runner: CircuitRunner;
  private _theta: number[] = [];
  private _inputStates: QuantumState[] = [];
  private featureRange: FeatureRange | undefined;
  private targets: number[][] | undefined;

  constructor(options: ClassifierOptions) {
    this.settings = resolveClassifierSettings(options);
    this.random = options.random ?? Math.random;

    const { nQubit, numClass } = this.settings;
    this.observables = Array.from({ length: numClass }, (_, i) => Observable.z(nQubit, i));
    this.encoder = new CircuitRunner(createInputEncoder(nQubit));

    this.output = new LearningCircuit(nQubit);
    this.runner = new CircuitRunner(this.output);
    this.createInitialOutputGate();
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get theta(): number[] {
    return [...this._theta];
  }

  get inputStates(): readonly QuantumState[] {
    return this._inputStates;
  }

  get outputCircuit(): LearningCircuit {
    return this.output;
  }

  // =========================================================================
  // Setup
  // =========================================================================

  /**
   * Scale and encode a batch; the states are kept for every later forward pass
   */
  setInputState(xList: Matrix, normalization: Normalization = 'batch'): this {
    if (normalization === 'batch') {
      this.featureRange = fitFeatureRange(xList);
    }
    this._inputStates = this.encode(xList, normalization);
    return this;
  }

  /**
   * Fresh output circuit with random Ising blocks and angles in [0, 2π).
   * Theta layout: depth, then qubit, then (RX, RZ, RX).
   * @returns The initial theta
   */
  createInitialOutputGate(): number[] {
    const { nQubit, cDepth, timeStep } = this.settings;
    const output = new LearningCircuit(nQubit);
    for (let d = 0; d < cDepth; d++) {
      const gate = createTimeEvolutionGate(nQubit, timeStep, this.random);
      output.dense(gate.targets, gate.matrix);
      for (let i = 0; i < nQubit; i++) {
        output.parametricRx(i, 2 * Math.PI * this.random());
        output.parametricRz(i, 2 * Math.PI * this.random());
        output.parametricRx(i, 2 * Math.PI * this.random());
      }
    }
    this.output = output;
    this.runner = new CircuitRunner(output);
    this._theta = output.getParameters();
    return this.theta;
  }

  updateOutputGate(theta: readonly number[]): this {
    this.output.updateParameters(theta);
    this._theta = [...theta];
    return this;
  }

  // =========================================================================
  // Model
  // =========================================================================

  /**
   * Softmaxed class scores of every captured input state under `theta`
   */
  forward(theta: readonly number[]): number[][] {
    return this.runner.predict(theta, this._inputStates, this.observables);
  }

  loss(theta: readonly number[], yList: Matrix = this.requireTargets()): number {
    return logLoss(yList, this.forward(theta));
  }

  /**
   * ∂pred/∂θ_k for every k: gradient[k][sample][class], by shifting θ_k
   * by ±π/2 and halving the difference of the two forward passes
   */
  predictionGradient(theta: readonly number[]): number[][][] {
    return theta.map((_, k) => {
      const plus = [...theta];
      plus[k] += SHIFT;
      const minus = [...theta];
      minus[k] -= SHIFT;
      const predPlus = this.forward(plus);
      const predMinus = this.forward(minus);
      return predPlus.map((row, s) => row.map((p, c) => (p - predMinus[s][c]) / 2));
    });
  }

  /**
   * Σ_samples Σ_classes (pred - y) · ∂pred/∂θ_k
   */
  lossGradient(theta: readonly number[], yList: Matrix = this.requireTargets()): number[] {
    const pred = this.forward(theta);
    const residual = pred.map((row, s) => row.map((p, c) => p - yList[s][c]));
    return this.predictionGradient(theta).map((perSample) => {
      let sum = 0;
      perSample.forEach((row, s) => {
        row.forEach((b, c) => {
          sum += residual[s][c] * b;
        });
      });
      return sum;
    });
  }

  // =========================================================================
  // Training
  // =========================================================================

  /**
   * Encode `x`, draw a fresh output circuit, then minimize the log-loss
   * against the one-hot rows `y`. The output circuit is left at the
   * optimized theta.
   */
  fit(x: Matrix, y: Matrix, options: FitOptions = {}): FitResult {
    const { maxIter, reportEvery } = resolveFitSettings(options);
    const optimizer = options.optimizer ?? new BfgsOptimizer();
    this.checkTargets(x, y);

    this.setInputState(x);
    this.targets = y.map((row) => [...row]);

    const thetaInit = this.createInitialOutputGate();
    logger.debug(`Initial parameter: [${thetaInit.join(', ')}]`);
    logger.info(`Initial loss: ${this.loss(thetaInit)}`);

    const result = optimizer.minimize({
      objective: (theta) => this.loss(theta),
      gradient: (theta) => this.lossGradient(theta),
      initial: thetaInit,
      maxIterations: maxIter,
      onIteration: (theta, iteration) => {
        if (iteration % reportEvery === 0) {
          logger.info(`Iteration ${iteration} / ${maxIter}, loss: ${this.loss(theta)}`);
        }
      },
    });

    const thetaOpt = [...result.x];
    this.updateOutputGate(thetaOpt);
    logger.info(`Final loss: ${result.fun} (${result.message})`);
    return { result, thetaInit, thetaOpt };
  }

  // =========================================================================
  // Prediction
  // =========================================================================

  /**
   * Class probabilities for new samples under the current theta.
   * The captured training states are left untouched.
   */
  predictProba(x: Matrix, options: PredictOptions = {}): number[][] {
    const states = this.encode(x, options.normalization ?? 'batch');
    return this.runner.predict(this._theta, states, this.observables);
  }

  predictClass(x: Matrix, options: PredictOptions = {}): number[] {
    return this.predictProba(x, options).map(argmax);
  }

  // =========================================================================
  // Helpers
  // =========================================================================

  private encode(x: Matrix, normalization: Normalization): QuantumState[] {
    let range: FeatureRange;
    if (normalization === 'training') {
      if (this.featureRange === undefined) {
        throw new Error('No training feature range; call setInputState or fit first');
      }
      range = this.featureRange;
    } else {
      range = fitFeatureRange(x);
    }
    return applyFeatureRange(x, range).map((sample) => this.encoder.run(sample));
  }

  private checkTargets(x: Matrix, y: Matrix): void {
    if (y.length !== x.length) {
      throw new DimensionMismatchError('label rows', x.length, y.length);
    }
    for (const row of y) {
      if (row.length !== this.settings.numClass) {
        throw new DimensionMismatchError('label columns', this.settings.numClass, row.length);
      }
    }
  }

  private requireTargets(): number[][] {
    if (this.targets === undefined) {
      throw new Error('No training targets; call fit first');
    }
    return this.targets;
  }
}
