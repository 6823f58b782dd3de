// ============================================================================
// @dagwire/serialization — Encoder
// ============================================================================
//
// Turns values and expressions into decoding steps. Values and expression
// nodes are deduplicated by fingerprint, and expression DAGs are walked in
// post-order, so every step only references steps already emitted.
//
// If any call fails the encoder state is unspecified; discard the instance.
// ============================================================================

import {
  type ExprNode,
  FailedPreconditionError,
  type Fingerprint,
  type TypedValue,
  exprRepr,
  operatorValue,
  postOrder,
} from '@dagwire/core';
import { ContainerAssembler, type ContainerBuilder } from './container.js';
import type { ValueEncoder } from './types.js';

export class Encoder {
  private codecSlots = new Map<string, number>();
  private valueIndices = new Map<Fingerprint, number>();
  private exprIndices = new Map<Fingerprint, number>();

  constructor(
    private readonly valueEncoder: ValueEncoder,
    readonly builder: ContainerBuilder = new ContainerAssembler(),
  ) {}

  /**
   * Declare a codec, once per name. Returns its codec slot.
   */
  encodeCodec(name: string): number {
    const existing = this.codecSlots.get(name);
    if (existing !== undefined) return existing;
    this.builder.add({ kind: 'codec', name });
    const slot = this.codecSlots.size;
    this.codecSlots.set(name, slot);
    return slot;
  }

  /**
   * Encode a value, once per fingerprint. Returns the step index.
   */
  encodeValue(value: TypedValue): number {
    const existing = this.valueIndices.get(value.fingerprint);
    if (existing !== undefined) return existing;
    const encoded = this.valueEncoder(value, this);
    const index = this.builder.add({ kind: 'value', ...encoded });
    this.valueIndices.set(value.fingerprint, index);
    return index;
  }

  /**
   * Encode an expression, emitting every node not encoded before.
   * Returns the step index of the root.
   */
  encodeExpr(expr: ExprNode): number {
    const existing = this.exprIndices.get(expr.fingerprint);
    if (existing !== undefined) return existing;
    for (const node of postOrder(expr)) {
      if (!this.exprIndices.has(node.fingerprint)) {
        this.exprIndices.set(node.fingerprint, this.encodeNode(node));
      }
    }
    return this.lookupExpr(expr);
  }

  /** Number of steps emitted so far. */
  get stepCount(): number {
    return this.builder.size;
  }

  private encodeNode(node: ExprNode): number {
    switch (node.kind) {
      case 'literal': {
        const literalValueIndex = this.encodeValue(node.value);
        return this.builder.add({ kind: 'literalNode', literalValueIndex });
      }
      case 'leaf':
        return this.builder.add({ kind: 'leafNode', leafKey: node.key });
      case 'placeholder':
        return this.builder.add({ kind: 'placeholderNode', placeholderKey: node.key });
      case 'operator': {
        const operatorValueIndex = this.encodeValue(operatorValue(node.op));
        const inputExprIndices = node.deps.map((dep) => this.lookupExpr(dep));
        return this.builder.add({ kind: 'operatorNode', operatorValueIndex, inputExprIndices });
      }
    }
  }

  private lookupExpr(expr: ExprNode): number {
    const index = this.exprIndices.get(expr.fingerprint);
    if (index === undefined) {
      throw new FailedPreconditionError(
        `unable to find the serialized dependency ${exprRepr(expr)}; this is an internal error`,
      );
    }
    return index;
  }
}
