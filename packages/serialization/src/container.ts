// ============================================================================
// @dagwire/serialization — Container Builders
// ============================================================================
//
// The Encoder appends steps to a ContainerBuilder and gets back each step's
// position. Two sinks exist: ContainerAssembler produces a bulk Container
// with trailing output arrays; StepStreamBuilder produces the incremental
// form, where outputs are marker steps.
// ============================================================================

import { CONTAINER_VERSION, type Container, type DecodingStep, type IndexedStep } from './types.js';

export interface ContainerBuilder {
  /** Append a step and return its position. */
  add(step: DecodingStep): number;
  /** Number of steps appended so far. */
  readonly size: number;
}

export class ContainerAssembler implements ContainerBuilder {
  private steps: DecodingStep[] = [];

  add(step: DecodingStep): number {
    this.steps.push(step);
    return this.steps.length - 1;
  }

  get size(): number {
    return this.steps.length;
  }

  finish(outputValueIndices: readonly number[], outputExprIndices: readonly number[]): Container {
    return {
      version: CONTAINER_VERSION,
      decodingSteps: this.steps,
      outputValueIndices: [...outputValueIndices],
      outputExprIndices: [...outputExprIndices],
    };
  }
}

export class StepStreamBuilder implements ContainerBuilder {
  private steps: IndexedStep[] = [];

  add(step: DecodingStep): number {
    const index = this.steps.length;
    this.steps.push({ index, step });
    return index;
  }

  get size(): number {
    return this.steps.length;
  }

  addOutputValue(index: number): number {
    return this.add({ kind: 'outputValueIndex', index });
  }

  addOutputExpr(index: number): number {
    return this.add({ kind: 'outputExprIndex', index });
  }

  finish(): IndexedStep[] {
    return this.steps;
  }
}
