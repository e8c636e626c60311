/**
 * @qclearn/quantum-learning
 *
 * Quantum circuit learning on top of @qclearn/quantum-core: a parameter
 * registry binding theta vectors and data samples to circuit angles, a
 * runner with analytic and parameter-shift gradients, and a classifier
 * trained with BFGS.
 *
 * @packageDocumentation
 */

// ============================================================================
// Parameters and Circuits
// ============================================================================

export { ParameterRegistry } from './parameter-registry';
export type {
  InputTransform,
  CoupledTransform,
  ParameterSink,
  ParameterRow,
  LearningRow,
  InputRow,
  CoupledRow,
  InputBinding,
  LearningParameter,
} from './parameter-registry';

export { LearningCircuit } from './learning-circuit';
export { CircuitRunner } from './circuit-runner';

// ============================================================================
// Encoding and Ansatz
// ============================================================================

export {
  FEATURE_COUNT,
  fitFeatureRange,
  applyFeatureRange,
  minMaxScale,
  createInputEncoder,
} from './encoding';
export type { FeatureRange } from './encoding';

export {
  buildFullOperator,
  randomIsingHamiltonian,
  evolutionOperator,
  createTimeEvolutionGate,
} from './hamiltonian';
export type { TimeEvolutionGate } from './hamiltonian';

// ============================================================================
// Training
// ============================================================================

export { QclClassifier } from './classifier';
export type { Normalization, PredictOptions, FitResult } from './classifier';

export { BfgsOptimizer } from './optimizer';
export type {
  Optimizer,
  ObjectiveFn,
  GradientFn,
  MinimizeRequest,
  MinimizeResult,
  BfgsOptions,
} from './optimizer';

export {
  DEFAULT_TIME_STEP,
  DEFAULT_MAX_ITER,
  resolveClassifierSettings,
  resolveFitSettings,
} from './config';
export type { ClassifierOptions, FitOptions, ClassifierSettings, FitSettings } from './config';

export { softmax, logLoss, oneHot, argmax, LOG_LOSS_EPSILON } from './numeric';

export { createLogger, resolveLogLevel, DEFAULT_LOG_LEVEL } from './logging';
export type { Logger, LogLevelName } from './logging';
