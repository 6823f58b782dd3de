import { BackendOperator, FLOAT32, OperatorRegistry, type TypedValue } from '@dagwire/core';
import { createDefaultCodecRegistry } from '../codecs/index.js';
import { Encoder } from '../encoder.js';
import type { CodecRegistry } from '../registry.js';
import type { ValueStep } from '../types.js';

export const add = new BackendOperator('math.add', 'x, y', 'Adds two values.', FLOAT32);

export const operators = new OperatorRegistry();
export const mul = operators.register(
  'math.mul',
  new BackendOperator('math.mul', 'x, y', 'Multiplies two values.', FLOAT32),
);
operators.freeze();

export const registry = createDefaultCodecRegistry(operators);

/** The payload the registry's encoder produces for `value`. */
export function payloadOf(value: TypedValue, codecs: CodecRegistry = registry): Uint8Array {
  return codecs.valueEncoder(value, new Encoder(codecs.valueEncoder)).payload;
}

export function valueStep(payload: Uint8Array, codecIndex?: number): ValueStep {
  return { kind: 'value', payload, codecIndex, inputValueIndices: [], inputExprIndices: [] };
}
