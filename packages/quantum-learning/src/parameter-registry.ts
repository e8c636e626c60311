/**
 * Parameter Registry
 *
 * Bookkeeping between a flat theta vector and the parameter positions of a
 * parametric circuit. Every registered position is one row of a single table,
 * tagged by role:
 *
 * - `learning`: angle optimized by training, addressed by a theta index
 * - `input`: angle recomputed from the data sample on every execution
 * - `coupled`: a learning angle that an input transform also rewrites
 *
 * Theta indices are assigned contiguously in insertion order. Rows are never
 * removed or reordered; only the cached values of learning and coupled rows
 * change.
 *
 * Executions follow a two-phase protocol:
 *
 * 1. Bind: `bindInputs(x)` evaluates every input transform and returns the
 *    angles to write. Coupled rows store the computed angle as their value.
 * 2. Commit: `commitInputs(bound)` writes those angles to the circuit, and
 *    `applyTheta(theta)` writes learning angles.
 *
 * Callers bind first and apply theta after; on a coupled row the later write
 * wins. The registry does not enforce the order.
 */

import {
  DimensionMismatchError,
  InvalidReferenceError,
  assertNever,
} from '@qclearn/quantum-core';

/**
 * Input angle computed from the data sample alone
 */
export type InputTransform = (x: readonly number[]) => number;

/**
 * Input angle computed from the companion's current value and the sample
 */
export type CoupledTransform = (theta: number, x: readonly number[]) => number;

/**
 * Where angles are written; ParametricCircuit satisfies this.
 */
export interface ParameterSink {
  setParameter(position: number, angle: number): void;
}

export interface LearningRow {
  kind: 'learning';
  position: number;
  thetaIndex: number;
  value: number;
}

export interface InputRow {
  kind: 'input';
  position: number;
  transform: InputTransform;
}

export interface CoupledRow {
  kind: 'coupled';
  position: number;
  thetaIndex: number;
  value: number;
  transform: CoupledTransform;
}

export type ParameterRow = LearningRow | InputRow | CoupledRow;

/**
 * Second argument of addInputSlot
 */
export type InputBinding =
  | { transform: InputTransform }
  | { transform: CoupledTransform; companionThetaIndex: number };

/**
 * Read-only view of one learning parameter
 */
export interface LearningParameter {
  gatePosition: number;
  thetaIndex: number;
  currentValue: number;
  isAlsoInput: boolean;
}

type ThetaRow = LearningRow | CoupledRow;
type BindableRow = InputRow | CoupledRow;

export class ParameterRegistry {
  private readonly sink: ParameterSink;
  private readonly rows: ParameterRow[] = [];
  private readonly byPosition = new Map<number, number>();
  private readonly thetaRows: ThetaRow[] = [];
  private readonly inputRows: BindableRow[] = [];

  constructor(sink: ParameterSink) {
    this.sink = sink;
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get learningCount(): number {
    return this.thetaRows.length;
  }

  get inputCount(): number {
    return this.inputRows.length;
  }

  /**
   * All rows in insertion order
   */
  get table(): readonly Readonly<ParameterRow>[] {
    return this.rows;
  }

  learningParameters(): LearningParameter[] {
    return this.thetaRows.map((row) => ({
      gatePosition: row.position,
      thetaIndex: row.thetaIndex,
      currentValue: row.value,
      isAlsoInput: row.kind === 'coupled',
    }));
  }

  // =========================================================================
  // Registration
  // =========================================================================

  /**
   * Register a trainable angle at a circuit parameter position.
   * @returns Its theta index (the number of learning parameters before it)
   */
  addLearningSlot(gatePosition: number, initialValue: number): number {
    this.claimPosition(gatePosition);
    const row: LearningRow = {
      kind: 'learning',
      position: gatePosition,
      thetaIndex: this.thetaRows.length,
      value: initialValue,
    };
    this.byPosition.set(gatePosition, this.rows.length);
    this.rows.push(row);
    this.thetaRows.push(row);
    return row.thetaIndex;
  }

  /**
   * Register an input angle. With `companionThetaIndex`, the learning
   * parameter at that index (which must sit at the same position) becomes a
   * coupled row whose value the transform rewrites on every bind.
   */
  addInputSlot(gatePosition: number, binding: InputBinding): void {
    if (!('companionThetaIndex' in binding)) {
      this.claimPosition(gatePosition);
      const row: InputRow = { kind: 'input', position: gatePosition, transform: binding.transform };
      this.byPosition.set(gatePosition, this.rows.length);
      this.rows.push(row);
      this.inputRows.push(row);
      return;
    }

    const index = binding.companionThetaIndex;
    const companion = this.thetaRows[index];
    if (companion === undefined) {
      throw new InvalidReferenceError(
        index,
        `Companion theta index ${index} does not exist (${this.thetaRows.length} learning parameters)`
      );
    }
    if (companion.kind === 'coupled') {
      throw new InvalidReferenceError(index, `Theta index ${index} is already coupled to an input`);
    }
    if (companion.position !== gatePosition) {
      throw new InvalidReferenceError(
        index,
        `Theta index ${index} is bound to position ${companion.position}, not ${gatePosition}`
      );
    }

    const coupled: CoupledRow = {
      kind: 'coupled',
      position: gatePosition,
      thetaIndex: index,
      value: companion.value,
      transform: binding.transform,
    };
    const rowIndex = this.byPosition.get(gatePosition);
    if (rowIndex === undefined) {
      throw new InvalidReferenceError(gatePosition, `Position ${gatePosition} is not registered`);
    }
    this.rows[rowIndex] = coupled;
    this.thetaRows[index] = coupled;
    this.inputRows.push(coupled);
  }

  /**
   * Learning slot and its input coupling in one step.
   * @returns The theta index
   */
  addCoupledSlot(gatePosition: number, initialValue: number, transform: CoupledTransform): number {
    const thetaIndex = this.addLearningSlot(gatePosition, initialValue);
    this.addInputSlot(gatePosition, { transform, companionThetaIndex: thetaIndex });
    return thetaIndex;
  }

  // =========================================================================
  // Bind phase
  // =========================================================================

  /**
   * Evaluate every input row in insertion order.
   * Coupled rows read their current value and store the computed angle.
   * @returns gate position -> angle, to be committed
   */
  bindInputs(x: readonly number[]): Map<number, number> {
    const bound = new Map<number, number>();
    for (const row of this.inputRows) {
      switch (row.kind) {
        case 'input':
          bound.set(row.position, row.transform(x));
          break;
        case 'coupled': {
          const angle = row.transform(row.value, x);
          row.value = angle;
          bound.set(row.position, angle);
          break;
        }
        default:
          assertNever(row);
      }
    }
    return bound;
  }

  // =========================================================================
  // Commit phase
  // =========================================================================

  commitInputs(bound: ReadonlyMap<number, number>): void {
    for (const [position, angle] of bound) {
      this.sink.setParameter(position, angle);
    }
  }

  /**
   * Store theta[thetaIndex] on every learning row and write it to the circuit
   */
  applyTheta(theta: readonly number[]): void {
    if (theta.length !== this.thetaRows.length) {
      throw new DimensionMismatchError('theta length', this.thetaRows.length, theta.length);
    }
    for (const row of this.thetaRows) {
      row.value = theta[row.thetaIndex];
      this.sink.setParameter(row.position, row.value);
    }
  }

  /**
   * Cached learning values in theta-index order
   */
  snapshotTheta(): number[] {
    return this.thetaRows.map((row) => row.value);
  }

  // =========================================================================
  // Gradient routing
  // =========================================================================

  /**
   * Project a per-position gradient onto theta indices.
   * Only `learning` rows receive a component; coupled angles are recomputed
   * from data on every run, so their entry stays 0.
   */
  routeGradient(perPosition: readonly number[]): number[] {
    const gradient: number[] = new Array<number>(this.thetaRows.length).fill(0);
    for (const row of this.thetaRows) {
      if (row.kind === 'learning') {
        const value = perPosition[row.position];
        if (value === undefined) {
          throw new DimensionMismatchError('gradient length', row.position + 1, perPosition.length);
        }
        gradient[row.thetaIndex] = value;
      }
    }
    return gradient;
  }

  /**
   * Theta indices of `learning` rows (the ones routeGradient keeps)
   */
  trainableIndices(): number[] {
    return this.thetaRows.filter((row) => row.kind === 'learning').map((row) => row.thetaIndex);
  }

  private claimPosition(position: number): void {
    if (!Number.isInteger(position) || position < 0) {
      throw new InvalidReferenceError(position, `Invalid gate position ${position}`);
    }
    if (this.byPosition.has(position)) {
      throw new InvalidReferenceError(position, `Gate position ${position} is already registered`);
    }
  }
}
