/**
 * Classifier and fit configuration.
 *
 * Options are plain objects with documented defaults. After defaults are
 * filled in, the numeric settings are checked against JSON schemas with ajv
 * and every violation is reported at once.
 *
 * @module config
 */

import Ajv, { type ErrorObject, type JSONSchemaType } from 'ajv';
import { ConfigurationError, MAX_QUBITS } from '@qclearn/quantum-core';
import type { Optimizer } from './optimizer';

export const DEFAULT_TIME_STEP = 0.77;
export const DEFAULT_MAX_ITER = 200;

/**
 * Constructor options of QclClassifier
 */
export interface ClassifierOptions {
  /** Qubit count; at least numClass */
  nQubit: number;
  /** Number of (time evolution, rotation layer) blocks in the output circuit */
  cDepth: number;
  /** Number of classes, i.e. of measured qubits */
  numClass: number;
  /** Evolution time of the random Ising Hamiltonian (default 0.77) */
  timeStep?: number;
  /** Uniform [0, 1) source for couplings and initial angles (default Math.random) */
  random?: () => number;
}

export interface FitOptions {
  /** Optimizer iteration cap (default 200) */
  maxIter?: number;
  /** Report the loss every this many iterations (default maxIter / 10) */
  reportEvery?: number;
  /** Defaults to a fresh BfgsOptimizer */
  optimizer?: Optimizer;
}

export interface ClassifierSettings {
  nQubit: number;
  cDepth: number;
  numClass: number;
  timeStep: number;
}

export interface FitSettings {
  maxIter: number;
  reportEvery: number;
}

const ajv = new Ajv({ allErrors: true });

const classifierSchema: JSONSchemaType<ClassifierSettings> = {
  type: 'object',
  properties: {
    nQubit: { type: 'integer', minimum: 1, maximum: MAX_QUBITS },
    cDepth: { type: 'integer', minimum: 1 },
    numClass: { type: 'integer', minimum: 1 },
    timeStep: { type: 'number' },
  },
  required: ['nQubit', 'cDepth', 'numClass', 'timeStep'],
  additionalProperties: false,
};

const fitSchema: JSONSchemaType<FitSettings> = {
  type: 'object',
  properties: {
    maxIter: { type: 'integer', minimum: 0 },
    reportEvery: { type: 'integer', minimum: 1 },
  },
  required: ['maxIter', 'reportEvery'],
  additionalProperties: false,
};

const validateClassifier = ajv.compile(classifierSchema);
const validateFit = ajv.compile(fitSchema);

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
}

export function resolveClassifierSettings(options: ClassifierOptions): ClassifierSettings {
  const settings: ClassifierSettings = {
    nQubit: options.nQubit,
    cDepth: options.cDepth,
    numClass: options.numClass,
    timeStep: options.timeStep ?? DEFAULT_TIME_STEP,
  };
  if (!validateClassifier(settings)) {
    throw new ConfigurationError('classifier options', formatErrors(validateClassifier.errors));
  }
  if (settings.numClass > settings.nQubit) {
    throw new ConfigurationError('classifier options', [
      `/numClass must be <= nQubit (${settings.nQubit})`,
    ]);
  }
  return settings;
}

export function resolveFitSettings(options: FitOptions): FitSettings {
  const maxIter = options.maxIter ?? DEFAULT_MAX_ITER;
  const settings: FitSettings = {
    maxIter,
    reportEvery: options.reportEvery ?? Math.max(1, Math.floor(maxIter / 10)),
  };
  if (!validateFit(settings)) {
    throw new ConfigurationError('fit options', formatErrors(validateFit.errors));
  }
  return settings;
}
