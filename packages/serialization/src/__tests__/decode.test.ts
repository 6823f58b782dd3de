import { DagwireError, float32, hasStatus, leaf, makeTuple, text } from '@dagwire/core';
import { describe, expect, it, vi } from 'vitest';
import { OPERATOR_CODEC, SCALAR_CODEC, TUPLE_CODEC } from '../codecs/index.js';
import { decode } from '../decode.js';
import {
  type CodecLookup,
  type Container,
  type DecodingStep,
  NO_EXTENSION_FOUND,
  type ValueDecoder,
  type ValueDecoderResult,
} from '../types.js';
import { payloadOf, registry, valueStep } from './helpers.js';

function container(
  decodingSteps: DecodingStep[],
  outputValueIndices: number[] = [],
  outputExprIndices: number[] = [],
): Container {
  return { version: 1, decodingSteps, outputValueIndices, outputExprIndices };
}

function caught(fn: () => unknown): DagwireError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DagwireError) return err;
    throw err;
  }
  throw new Error('expected an error');
}

describe('container version', () => {
  it('requires a version', () => {
    expect(() =>
      decode({ decodingSteps: [], outputValueIndices: [], outputExprIndices: [] }, registry.codecLookup),
    ).toThrow('missing container.version');
  });

  it('accepts only version 1', () => {
    expect(() => decode({ ...container([]), version: 2 }, registry.codecLookup)).toThrow(
      'expected container.version to be 1, got 2',
    );
  });

  it('decodes an empty container to nothing', () => {
    expect(decode(container([]), registry.codecLookup)).toEqual({ values: [], exprs: [] });
  });
});

describe('decode errors', () => {
  it('rejects an operator node whose operator is not an operator', () => {
    const steps: DecodingStep[] = [
      { kind: 'codec', name: SCALAR_CODEC },
      valueStep(payloadOf(float32(1)), 0),
      { kind: 'operatorNode', operatorValueIndex: 1, inputExprIndices: [] },
    ];
    const err = caught(() => decode(container(steps), registry.codecLookup));
    expect(err.code).toBe('INVALID_ARGUMENT');
    expect(err.message).toBe(
      'expected a value of EXPR_OPERATOR type in decoding_step_results[1], got FLOAT32; ' +
        'decoding_step.type=OPERATOR_NODE; while handling decoding_steps[2]',
    );
  });

  it('rejects out-of-range output indices', () => {
    const steps: DecodingStep[] = [{ kind: 'leafNode', leafKey: 'x' }];
    expect(() => decode(container(steps, [-1]), registry.codecLookup)).toThrow(
      'value index is out of range: -1; while loading output values',
    );
    expect(() => decode(container(steps, [1]), registry.codecLookup)).toThrow(
      'value index is out of range: 1; while loading output values',
    );
    expect(() => decode(container(steps, [], [7]), registry.codecLookup)).toThrow(
      'expr index is out of range: 7; while loading output expressions',
    );
  });

  it('rejects outputs of the wrong kind', () => {
    const steps: DecodingStep[] = [
      { kind: 'codec', name: SCALAR_CODEC },
      valueStep(payloadOf(float32(1)), 0),
    ];
    expect(() => decode(container(steps, [], [1]), registry.codecLookup)).toThrow(
      'expected an expression in decoding_step_results[1], got a value; while loading output expressions',
    );
    expect(() => decode(container(steps, [0]), registry.codecLookup)).toThrow(
      'found no value in decoding_step_results[0]; while loading output values',
    );
  });

  it('rejects a codec index with no codec behind it', () => {
    const steps: DecodingStep[] = [valueStep(payloadOf(float32(1)), 0)];
    expect(() => decode(container(steps), registry.codecLookup)).toThrow(
      'codec index is out of range: 0; decoding_step.type=VALUE; while handling decoding_steps[0]',
    );
  });

  it('rejects steps with no type', () => {
    const steps: DecodingStep[] = JSON.parse('[{"leafKey": "x"}]');
    expect(() => decode(container(steps), registry.codecLookup)).toThrow(
      'missing decoding_step.type; while handling decoding_steps[0]',
    );
  });
});

describe('codec dispatch', () => {
  const codecSteps: DecodingStep[] = [
    { kind: 'codec', name: OPERATOR_CODEC },
    { kind: 'codec', name: TUPLE_CODEC },
    { kind: 'codec', name: SCALAR_CODEC },
  ];

  it('tries loaded codecs in order when the value names none', () => {
    const steps = [...codecSteps, valueStep(payloadOf(text('hi')))];
    const { values } = decode(container(steps, [3]), registry.codecLookup);
    expect(values[0].toText()).toBe('hi');
  });

  it('stops at the first codec that recognises the payload', () => {
    const first = vi.fn((): ValueDecoderResult => NO_EXTENSION_FOUND);
    const second = vi.fn((): ValueDecoderResult => NO_EXTENSION_FOUND);
    const third = vi.fn((): ValueDecoderResult => float32(7));
    const decoders = new Map<string, ValueDecoder>([
      ['test.a', first],
      ['test.b', second],
      ['test.c', third],
    ]);
    const lookup: CodecLookup = (name) => decoders.get(name) ?? registry.codecLookup(name);
    const steps: DecodingStep[] = [
      { kind: 'codec', name: 'test.a' },
      { kind: 'codec', name: 'test.b' },
      { kind: 'codec', name: 'test.c' },
      valueStep(new Uint8Array([1])),
    ];

    const { values } = decode(container(steps, [3]), lookup);
    expect(values[0].toNumber()).toBe(7);
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
    expect(third).toHaveBeenCalledTimes(1);
    expect(first.mock.invocationCallOrder[0]).toBeLessThan(second.mock.invocationCallOrder[0]);
    expect(second.mock.invocationCallOrder[0]).toBeLessThan(third.mock.invocationCallOrder[0]);
  });

  it('fails when no loaded codec recognises the payload', () => {
    const steps = [...codecSteps, valueStep(new Uint8Array([0xff]))];
    expect(() => decode(container(steps), registry.codecLookup)).toThrow(
      'unable to detect codec; decoding_step.type=VALUE; while handling decoding_steps[3]',
    );
  });

  it('reports NOT_FOUND when the named codec does not recognise the payload', () => {
    const steps = [...codecSteps, valueStep(payloadOf(float32(1)), 1)];
    const err = caught(() => decode(container(steps), registry.codecLookup));
    expect(hasStatus(err, 'NOT_FOUND')).toBe(true);
    expect(err.message).toBe(
      'no extension found; codecs[1]=dagwire.tuple.v1; ' +
        'decoding_step.type=VALUE; while handling decoding_steps[3]',
    );
  });

  it('wraps errors thrown by a codec', () => {
    const original = new Error('kaput');
    const lookup: CodecLookup = (name) => {
      if (name !== 'test.boom') return registry.codecLookup(name);
      return () => {
        throw original;
      };
    };
    const steps: DecodingStep[] = [{ kind: 'codec', name: 'test.boom' }, valueStep(new Uint8Array(), 0)];
    const err = caught(() => decode(container(steps), lookup));
    expect(err.code).toBe('UNKNOWN');
    expect(err.cause).toBe(original);
    expect(err.message).toBe(
      'kaput; codecs[0]=test.boom; decoding_step.type=VALUE; while handling decoding_steps[1]',
    );
  });

  it('passes input values to the codec', () => {
    const steps: DecodingStep[] = [
      { kind: 'codec', name: TUPLE_CODEC },
      { kind: 'codec', name: SCALAR_CODEC },
      valueStep(payloadOf(float32(1)), 1),
      { ...valueStep(payloadOf(makeTuple()), 0), inputValueIndices: [2, 2] },
    ];
    const { values } = decode(container(steps, [3]), registry.codecLookup);
    expect(values[0].equals(makeTuple(float32(1), float32(1)))).toBe(true);
  });
});

describe('output marker steps', () => {
  it('lists marker outputs before the trailing output arrays', () => {
    const steps: DecodingStep[] = [
      { kind: 'leafNode', leafKey: 'a' },
      { kind: 'leafNode', leafKey: 'b' },
      { kind: 'outputExprIndex', index: 1 },
    ];
    const { exprs } = decode(container(steps, [], [0]), registry.codecLookup);
    expect(exprs.map((e) => e.fingerprint)).toEqual([leaf('b').fingerprint, leaf('a').fingerprint]);
  });
});
