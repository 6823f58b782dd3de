import {
  BackendOperator,
  type ExprNode,
  MakeTupleOperator,
  OperatorRegistry,
  bytes,
  callOp,
  float32,
  int64,
  leaf,
  literal,
  makeOpNode,
  makeTuple,
  placeholder,
  text,
  unsafeMakeOperatorNode,
} from '@dagwire/core';
import { describe, expect, it } from 'vitest';
import { deserialize, deserializeFromBytes, serialize, serializeToBytes } from '../api.js';
import { createDefaultCodecRegistry } from '../codecs/index.js';
import { Decoder } from '../decoder.js';
import { encodeAsStream } from '../encode.js';
import type { DecodingStep } from '../types.js';
import { add, mul, operators, registry } from './helpers.js';

function fingerprints(items: readonly { fingerprint: string }[]): string[] {
  return items.map((item) => item.fingerprint);
}

function referencedPositions(step: DecodingStep): readonly number[] {
  switch (step.kind) {
    case 'value':
      return [...step.inputValueIndices, ...step.inputExprIndices];
    case 'literalNode':
      return [step.literalValueIndex];
    case 'operatorNode':
      return [step.operatorValueIndex, ...step.inputExprIndices];
    case 'outputValueIndex':
    case 'outputExprIndex':
      return [step.index];
    default:
      return [];
  }
}

describe('serialize / deserialize', () => {
  it('encodes a lone literal as one value step and one literal step', () => {
    const expr = literal(float32(1));
    const container = serialize([], [expr], registry);
    const kinds = container.decodingSteps.map((s) => s.kind);
    expect(kinds).toEqual(['codec', 'value', 'literalNode']);
    expect(container.outputExprIndices).toEqual([2]);

    const { exprs } = deserialize(container, registry);
    expect(fingerprints(exprs)).toEqual([expr.fingerprint]);
  });

  it('emits a shared leaf once and references it twice', () => {
    const x = leaf('x');
    const expr = makeOpNode(add, [x, x]);
    const container = serialize([], [expr], registry);
    expect(container.decodingSteps.filter((s) => s.kind === 'leafNode')).toHaveLength(1);
    expect(container.decodingSteps[3]).toEqual({
      kind: 'operatorNode',
      operatorValueIndex: 2,
      inputExprIndices: [0, 0],
    });

    const { exprs } = deserialize(container, registry);
    expect(exprs[0].fingerprint).toBe(expr.fingerprint);
  });

  it('restores values and expressions of every built-in kind', () => {
    const values = [
      makeTuple(float32(1), makeTuple(text('nested'), int64(-3n))),
      bytes(new Uint8Array([9, 8, 7])),
    ];
    const exprs: ExprNode[] = [
      callOp('math.mul', [leaf('a'), placeholder('p')], operators),
      makeOpNode(new MakeTupleOperator(), [literal(float32(1)), literal(text('t'))]),
    ];
    const result = deserialize(serialize(values, exprs, registry), registry);
    expect(fingerprints(result.values)).toEqual(fingerprints(values));
    expect(fingerprints(result.exprs)).toEqual(fingerprints(exprs));
    expect(result.exprs[1].attributes.qvalue?.repr()).toBe("(float32{1}, 't')");
  });

  it('keeps repeated roots pointing at one step', () => {
    const v = text('same');
    const e = leaf('k');
    const container = serialize([v, v], [e, e], registry);
    expect(container.outputValueIndices).toEqual([1, 1]);
    expect(container.outputExprIndices).toEqual([2, 2]);
    const { values, exprs } = deserialize(container, registry);
    expect(values[0].equals(values[1])).toBe(true);
    expect(exprs[0]).toBe(exprs[1]);
  });

  it('stays linear in the size of a deeply shared DAG', () => {
    let node: ExprNode = leaf('x');
    for (let i = 0; i < 50; i++) node = makeOpNode(add, [node, node]);
    const container = serialize([], [node], registry);
    expect(container.decodingSteps).toHaveLength(53);
    expect(deserialize(container, registry).exprs[0].fingerprint).toBe(node.fingerprint);
  });

  it('keeps safe-mode arity errors short on a deeply shared DAG', () => {
    let node: ExprNode = leaf('x');
    for (let i = 0; i < 60; i++) node = unsafeMakeOperatorNode(mul, [node, node]);
    expect(deserialize(serialize([], [node], registry), registry).exprs[0].fingerprint).toBe(
      node.fingerprint,
    );

    const broken = serialize([], [unsafeMakeOperatorNode(mul, [node])], registry);
    expect(() => deserialize(broken, registry)).toThrow('while calling math.mul with args {math.mul(');
    expect(() => deserialize(broken, registry)).toThrow(
      /^incorrect number of dependencies passed to an operator node: expected 2 but got 1; .{0,600}$/,
    );
  });

  it('matches registered operators by name across registries', () => {
    const elsewhere = new OperatorRegistry();
    elsewhere.register('math.mul', new BackendOperator('math.mul', 'x, y', 'Another product.'));
    elsewhere.freeze();
    const expr = makeOpNode(mul, [leaf('x'), leaf('y')]);
    const { exprs } = deserialize(serialize([], [expr], registry), createDefaultCodecRegistry(elsewhere));
    expect(exprs[0].fingerprint).toBe(expr.fingerprint);
  });

  it('is not affected by writes to a value handed out earlier', () => {
    const value = bytes(new Uint8Array([1, 2, 3]));
    value.toBytes().fill(0);
    const { values } = deserialize(serialize([value], [], registry), registry);
    expect([...values[0].toBytes()]).toEqual([1, 2, 3]);
    expect(values[0].fingerprint).toBe(value.fingerprint);
  });

  it('never references a later step', () => {
    const x = leaf('x');
    const container = serialize(
      [makeTuple(float32(2), float32(2))],
      [makeOpNode(add, [makeOpNode(add, [x, literal(float32(2))]), x])],
      registry,
    );
    container.decodingSteps.forEach((step, position) => {
      for (const index of referencedPositions(step)) {
        expect(index).toBeLessThan(position);
      }
    });
  });

  it('goes through the binary format', () => {
    const expr = makeOpNode(add, [leaf('x'), literal(float32(0.5))]);
    const result = deserializeFromBytes(serializeToBytes([float32(0.5)], [expr], registry), registry);
    expect(result.values[0].toNumber()).toBe(0.5);
    expect(result.exprs[0].fingerprint).toBe(expr.fingerprint);
  });
});

describe('incremental decoding', () => {
  it('yields the same result as bulk decoding', () => {
    const x = leaf('x');
    const values = [makeTuple(float32(1), text('b')), float32(1)];
    const exprs = [makeOpNode(add, [x, literal(float32(1))]), x];

    const bulk = deserialize(serialize(values, exprs, registry), registry);

    const decoder = new Decoder(registry.codecLookup);
    for (const { index, step } of encodeAsStream(values, exprs, registry.valueEncoder)) {
      decoder.onStep(index, step);
    }
    const streamed = decoder.finish();

    expect(fingerprints(streamed.values)).toEqual(fingerprints(bulk.values));
    expect(fingerprints(streamed.exprs)).toEqual(fingerprints(bulk.exprs));
  });

  it('places output markers right after their roots', () => {
    const steps = encodeAsStream([float32(3)], [leaf('y')], registry.valueEncoder);
    expect(steps.map(({ index, step }) => [index, step.kind])).toEqual([
      [0, 'codec'],
      [1, 'value'],
      [2, 'outputValueIndex'],
      [3, 'leafNode'],
      [4, 'outputExprIndex'],
    ]);
  });
});
