/**
 * Optimizer capability and the BFGS implementation used by default.
 *
 * The training loop only sees the `Optimizer` interface; any quasi-Newton
 * or first-order method that honors it can be swapped in.
 */

import { DimensionMismatchError } from '@qclearn/quantum-core';
import { createLogger } from './logging';

const logger = createLogger('optimizer');

export type ObjectiveFn = (x: readonly number[]) => number;
export type GradientFn = (x: readonly number[]) => number[];

export interface MinimizeRequest {
  objective: ObjectiveFn;
  gradient: GradientFn;
  initial: readonly number[];
  maxIterations: number;
  /** Called after every accepted step with the new point and the 1-based iteration */
  onIteration?: (x: readonly number[], iteration: number) => void;
}

export interface MinimizeResult {
  x: number[];
  fun: number;
  iterations: number;
  converged: boolean;
  message: string;
  objectiveEvaluations: number;
  gradientEvaluations: number;
}

export interface Optimizer {
  minimize(request: MinimizeRequest): MinimizeResult;
}

export interface BfgsOptions {
  /** Stop when the gradient's infinity norm falls below this (default 1e-5) */
  gtol?: number;
  /** Armijo sufficient-decrease constant (default 1e-4) */
  c1?: number;
  /** Step halvings tried before giving up on a direction (default 30) */
  maxLineSearchSteps?: number;
}

/**
 * BFGS on the inverse Hessian with a backtracking Armijo line search.
 * Steps that fail to decrease the objective are never taken, so the
 * returned objective is at most the initial one.
 */
export class BfgsOptimizer implements Optimizer {
  private readonly gtol: number;
  private readonly c1: number;
  private readonly maxLineSearchSteps: number;

  constructor(options: BfgsOptions = {}) {
    this.gtol = options.gtol ?? 1e-5;
    this.c1 = options.c1 ?? 1e-4;
    this.maxLineSearchSteps = options.maxLineSearchSteps ?? 30;
  }

  minimize(request: MinimizeRequest): MinimizeResult {
    const { objective, gradient, maxIterations } = request;
    const n = request.initial.length;
    let objectiveEvaluations = 0;
    let gradientEvaluations = 0;

    const evalObjective = (x: readonly number[]): number => {
      objectiveEvaluations++;
      return objective(x);
    };
    const evalGradient = (x: readonly number[]): number[] => {
      gradientEvaluations++;
      const g = gradient(x);
      if (g.length !== n) {
        throw new DimensionMismatchError('gradient length', n, g.length);
      }
      return g;
    };

    let x = [...request.initial];
    let f = evalObjective(x);
    let g = evalGradient(x);
    let h = identity(n);
    let iterations = 0;
    let converged = false;
    let message = 'Maximum number of iterations has been exceeded.';

    while (iterations < maxIterations) {
      if (normInf(g) < this.gtol) {
        converged = true;
        message = 'Optimization terminated successfully.';
        break;
      }

      let direction = matVec(h, g).map((v) => -v);
      let slope = dot(g, direction);
      if (!(slope < 0)) {
        // Curvature estimate lost positive definiteness; restart from steepest descent.
        h = identity(n);
        direction = g.map((v) => -v);
        slope = -dot(g, g);
      }

      let alpha = 1;
      let next: number[] | undefined;
      let fNext = f;
      for (let step = 0; step < this.maxLineSearchSteps; step++) {
        const candidate = x.map((v, i) => v + alpha * direction[i]);
        const fCandidate = evalObjective(candidate);
        if (fCandidate <= f + this.c1 * alpha * slope) {
          next = candidate;
          fNext = fCandidate;
          break;
        }
        alpha /= 2;
      }

      if (next === undefined) {
        message = 'Desired error not necessarily achieved due to precision loss.';
        logger.debug(`line search failed at iteration ${iterations + 1}, keeping f=${f}`);
        break;
      }

      const gNext = evalGradient(next);
      const s = next.map((v, i) => v - x[i]);
      const y = gNext.map((v, i) => v - g[i]);
      const sy = dot(s, y);
      if (sy > 1e-10) {
        h = bfgsUpdate(h, s, y, sy);
      }

      x = next;
      f = fNext;
      g = gNext;
      iterations++;
      request.onIteration?.(x, iterations);
    }

    return {
      x,
      fun: f,
      iterations,
      converged,
      message,
      objectiveEvaluations,
      gradientEvaluations,
    };
  }
}

// ============================================================================
// Dense helpers
// ============================================================================

function identity(n: number): number[][] {
  return Array.from({ length: n }, (_, r) =>
    Array.from({ length: n }, (_, c) => (r === c ? 1 : 0))
  );
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

function matVec(m: number[][], v: readonly number[]): number[] {
  return m.map((row) => dot(row, v));
}

function normInf(v: readonly number[]): number {
  return v.reduce((max, x) => Math.max(max, Math.abs(x)), 0);
}

/**
 * H' = (I - ρ s yᵀ) H (I - ρ y sᵀ) + ρ s sᵀ, expanded for symmetric H
 */
function bfgsUpdate(h: number[][], s: number[], y: number[], sy: number): number[][] {
  const rho = 1 / sy;
  const hy = matVec(h, y);
  const yhy = dot(y, hy);
  const ss = rho * rho * yhy + rho;
  return h.map((row, i) =>
    row.map((value, j) => value - rho * (hy[i] * s[j] + s[i] * hy[j]) + ss * s[i] * s[j])
  );
}
