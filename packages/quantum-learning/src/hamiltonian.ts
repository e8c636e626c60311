/**
 * Ansatz building blocks: full-register operators and the random
 * transverse-field Ising time-evolution gate.
 */

import { all, create } from 'mathjs';
import {
  DimensionMismatchError,
  complex,
  pauliMatrix,
  type ComplexMatrix,
  type RotationAxis,
} from '@qclearn/quantum-core';
import { DEFAULT_TIME_STEP } from './config';

const math = create(all, {});

type RealMatrix = number[][];

/**
 * Dense gate over `targets`, ready for ParametricCircuit#dense
 */
export interface TimeEvolutionGate {
  targets: number[];
  matrix: ComplexMatrix;
}

const IDENTITY_2: RealMatrix = [
  [1, 0],
  [0, 1],
];

function realPauli(axis: Exclude<RotationAxis, 'Y'>): RealMatrix {
  const [a, b, c, d] = pauliMatrix(axis);
  return [
    [a.real, b.real],
    [c.real, d.real],
  ];
}

const PAULI_X = realPauli('X');
const PAULI_Z = realPauli('Z');

function toRealVector(value: unknown): number[] {
  const raw = math.isMatrix(value) ? value.toArray() : value;
  if (!Array.isArray(raw)) {
    throw new Error('Expected a vector');
  }
  return raw.flat().map((entry: unknown) => {
    if (typeof entry !== 'number') {
      throw new Error('Expected real vector entries');
    }
    return entry;
  });
}

function toRealMatrix(value: unknown): RealMatrix {
  const raw = math.isMatrix(value) ? value.toArray() : value;
  if (!Array.isArray(raw)) {
    throw new Error('Expected a matrix');
  }
  return raw.map((row: unknown) => toRealVector(row));
}

/**
 * Kronecker product of per-site operators over `numQubits` sites, identity
 * where a site has none. Qubit 0 is the rightmost factor, so bit k of a
 * row/column index is qubit k.
 */
export function buildFullOperator(
  siteOperators: ReadonlyMap<number, RealMatrix>,
  numQubits: number
): RealMatrix {
  for (const site of siteOperators.keys()) {
    if (!Number.isInteger(site) || site < 0 || site >= numQubits) {
      throw new Error(`Qubit ${site} out of range [0, ${numQubits - 1}]`);
    }
  }
  let full: RealMatrix = [[1]];
  for (let q = numQubits - 1; q >= 0; q--) {
    const site = siteOperators.get(q) ?? IDENTITY_2;
    full = toRealMatrix(math.kron(full, site));
  }
  return full;
}

/**
 * H = Σ_i a_i X_i + Σ_{i<j} J_ij Z_i Z_j with a_i, J_ij ~ U[-1, 1)
 */
export function randomIsingHamiltonian(
  numQubits: number,
  random: () => number = Math.random
): RealMatrix {
  const dim = 1 << numQubits;
  let hamiltonian: RealMatrix = Array.from({ length: dim }, () => new Array<number>(dim).fill(0));

  const accumulate = (coefficient: number, term: RealMatrix): void => {
    hamiltonian = hamiltonian.map((row, r) => row.map((v, c) => v + coefficient * term[r][c]));
  };

  for (let i = 0; i < numQubits; i++) {
    accumulate(-1 + 2 * random(), buildFullOperator(new Map([[i, PAULI_X]]), numQubits));
    for (let j = i + 1; j < numQubits; j++) {
      const zz = buildFullOperator(
        new Map([
          [i, PAULI_Z],
          [j, PAULI_Z],
        ]),
        numQubits
      );
      accumulate(-1 + 2 * random(), zz);
    }
  }
  return hamiltonian;
}

/**
 * e^{-iHt} = P e^{-iDt} Pᵀ for a real symmetric H
 */
export function evolutionOperator(hamiltonian: RealMatrix, timeStep: number): ComplexMatrix {
  const dim = hamiltonian.length;
  if (hamiltonian.some((row) => row.length !== dim)) {
    throw new DimensionMismatchError('hamiltonian columns', dim, hamiltonian[0]?.length ?? 0);
  }

  const modes = math.eigs(hamiltonian).eigenvectors.map(({ value, vector }) => {
    if (typeof value !== 'number') {
      throw new Error('Expected a real eigenvalue');
    }
    const v = toRealVector(vector);
    const length = Math.hypot(...v);
    return { value, vector: v.map((x) => x / length) };
  });

  return Array.from({ length: dim }, (_, r) =>
    Array.from({ length: dim }, (_, c) => {
      let real = 0;
      let imag = 0;
      for (const { value, vector } of modes) {
        const weight = vector[r] * vector[c];
        real += weight * Math.cos(-timeStep * value);
        imag += weight * Math.sin(-timeStep * value);
      }
      return complex(real, imag);
    })
  );
}

/**
 * Random Ising time evolution over every qubit of an n-qubit register
 */
export function createTimeEvolutionGate(
  numQubits: number,
  timeStep: number = DEFAULT_TIME_STEP,
  random: () => number = Math.random
): TimeEvolutionGate {
  const hamiltonian = randomIsingHamiltonian(numQubits, random);
  return {
    targets: Array.from({ length: numQubits }, (_, q) => q),
    matrix: evolutionOperator(hamiltonian, timeStep),
  };
}
