/**
 * Tests for ParameterRegistry
 */

import { describe, it, expect } from 'vitest';
import { DimensionMismatchError, InvalidReferenceError } from '@qclearn/quantum-core';
import { ParameterRegistry } from '../parameter-registry';
import { RecordingSink } from './helpers';

describe('Registration', () => {
  it('assigns contiguous theta indices when learning and input slots interleave', () => {
    const registry = new ParameterRegistry(new RecordingSink());
    expect(registry.addLearningSlot(0, 0.1)).toBe(0);
    registry.addInputSlot(1, { transform: (x: readonly number[]) => x[0] });
    expect(registry.addLearningSlot(2, 0.2)).toBe(1);
    registry.addInputSlot(3, { transform: (x: readonly number[]) => x[1] });
    expect(registry.addLearningSlot(4, 0.3)).toBe(2);

    expect(registry.learningCount).toBe(3);
    expect(registry.inputCount).toBe(2);
    expect(registry.learningParameters().map((p) => p.gatePosition)).toEqual([0, 2, 4]);
  });

  it('turns a learning row into a coupled row when an input names it as companion', () => {
    const registry = new ParameterRegistry(new RecordingSink());
    const index = registry.addLearningSlot(0, 0.5);
    registry.addInputSlot(0, { transform: (theta, x) => theta + x[0], companionThetaIndex: index });

    expect(registry.table.map((row) => row.kind)).toEqual(['coupled']);
    expect(registry.learningParameters()).toEqual([
      { gatePosition: 0, thetaIndex: 0, currentValue: 0.5, isAlsoInput: true },
    ]);
    expect(registry.inputCount).toBe(1);
  });

  it('rejects a companion index that does not exist', () => {
    const registry = new ParameterRegistry(new RecordingSink());
    registry.addLearningSlot(0, 0);
    expect(() =>
      registry.addInputSlot(0, { transform: (theta: number) => theta, companionThetaIndex: 3 })
    ).toThrow(InvalidReferenceError);
  });

  it('rejects a companion that is already coupled', () => {
    const registry = new ParameterRegistry(new RecordingSink());
    const index = registry.addCoupledSlot(0, 0, (theta) => theta);
    expect(() =>
      registry.addInputSlot(0, { transform: (theta: number) => theta, companionThetaIndex: index })
    ).toThrow('Theta index 0 is already coupled to an input');
  });

  it('rejects a companion at another gate position', () => {
    const registry = new ParameterRegistry(new RecordingSink());
    registry.addLearningSlot(0, 0);
    registry.addLearningSlot(1, 0);
    expect(() =>
      registry.addInputSlot(1, { transform: (theta: number) => theta, companionThetaIndex: 0 })
    ).toThrow('Theta index 0 is bound to position 0, not 1');
  });

  it('rejects a position registered twice', () => {
    const registry = new ParameterRegistry(new RecordingSink());
    registry.addLearningSlot(2, 0);
    expect(() => registry.addInputSlot(2, { transform: (x: readonly number[]) => x[0] })).toThrow(
      'Gate position 2 is already registered'
    );
  });
});

describe('Bind and Commit', () => {
  it('computes input angles without writing them until commit', () => {
    const sink = new RecordingSink();
    const registry = new ParameterRegistry(sink);
    registry.addInputSlot(0, { transform: (x: readonly number[]) => 2 * x[0] });
    registry.addInputSlot(1, { transform: (x: readonly number[]) => x[1] - 1 });

    const bound = registry.bindInputs([0.25, 3]);
    expect([...bound]).toEqual([
      [0, 0.5],
      [1, 2],
    ]);
    expect(sink.writes).toEqual([]);

    registry.commitInputs(bound);
    expect(sink.writes).toEqual([
      [0, 0.5],
      [1, 2],
    ]);
  });

  it('keeps the latest bound value on a coupled companion', () => {
    const registry = new ParameterRegistry(new RecordingSink());
    registry.addCoupledSlot(0, 1, (theta, x) => theta + x[0]);

    registry.bindInputs([2]);
    expect(registry.snapshotTheta()).toEqual([3]);
    registry.bindInputs([0.5]);
    expect(registry.snapshotTheta()).toEqual([3.5]);
  });

  it('lets applyTheta after bind win on a coupled row', () => {
    const sink = new RecordingSink();
    const registry = new ParameterRegistry(sink);
    registry.addCoupledSlot(0, 0, (_theta, x) => x[0]);

    registry.commitInputs(registry.bindInputs([7]));
    registry.applyTheta([1.5]);

    expect(sink.angles.get(0)).toBe(1.5);
    expect(registry.snapshotTheta()).toEqual([1.5]);
  });
});

describe('Theta', () => {
  it('round trips apply and snapshot', () => {
    const sink = new RecordingSink();
    const registry = new ParameterRegistry(sink);
    registry.addLearningSlot(0, 0);
    registry.addInputSlot(1, { transform: (x: readonly number[]) => x[0] });
    registry.addLearningSlot(2, 0);

    registry.applyTheta([0.3, -1.2]);
    expect(registry.snapshotTheta()).toEqual([0.3, -1.2]);
    expect(sink.writes).toEqual([
      [0, 0.3],
      [2, -1.2],
    ]);
  });

  it('throws DimensionMismatchError on a theta of the wrong length', () => {
    const registry = new ParameterRegistry(new RecordingSink());
    registry.addLearningSlot(0, 0);
    expect(() => registry.applyTheta([1, 2])).toThrow(DimensionMismatchError);
    expect(() => registry.applyTheta([1, 2])).toThrow('theta length: expected 1, got 2');
  });
});

describe('Gradient routing', () => {
  it('keeps learning rows and zeroes coupled rows', () => {
    const registry = new ParameterRegistry(new RecordingSink());
    registry.addLearningSlot(0, 0);
    registry.addInputSlot(1, { transform: (x: readonly number[]) => x[0] });
    registry.addCoupledSlot(2, 0, (theta) => theta);
    registry.addLearningSlot(3, 0);

    expect(registry.routeGradient([0.1, 0.2, 0.3, 0.4])).toEqual([0.1, 0, 0.4]);
    expect(registry.trainableIndices()).toEqual([0, 2]);
  });

  it('rejects a per-position gradient that is too short', () => {
    const registry = new ParameterRegistry(new RecordingSink());
    registry.addLearningSlot(3, 0);
    expect(() => registry.routeGradient([0, 0])).toThrow('gradient length: expected 4, got 2');
  });
});
