import { EXPR_OPERATOR, OperatorRegistry, TUPLE_SPECIALIZATION_KEY } from '@dagwire/core';
import { CodecRegistry } from '../registry.js';
import { OPERATOR_CODEC, createOperatorCodec } from './operator.js';
import { SCALAR_CODEC, SCALAR_CODEC_QTYPES, decodeScalar, encodeScalar } from './scalar.js';
import { TUPLE_CODEC, decodeTuple, encodeTuple } from './tuple.js';

export { OPERATOR_CODEC, createOperatorCodec } from './operator.js';
export type { OperatorCodec } from './operator.js';
export { SCALAR_CODEC, SCALAR_CODEC_QTYPES, decodeScalar, encodeScalar } from './scalar.js';
export { TUPLE_CODEC, decodeTuple, encodeTuple } from './tuple.js';

/**
 * A frozen registry with the scalar, tuple and operator codecs.
 * Registered operators resolve against `operators` when decoding.
 */
export function createDefaultCodecRegistry(
  operators: OperatorRegistry = new OperatorRegistry().freeze(),
): CodecRegistry {
  const registry = new CodecRegistry();
  for (const qtype of SCALAR_CODEC_QTYPES) {
    registry.registerValueEncoderByQType(qtype, encodeScalar);
  }
  registry.registerValueDecoder(SCALAR_CODEC, decodeScalar);

  registry.registerValueEncoderByKey(TUPLE_SPECIALIZATION_KEY, encodeTuple);
  registry.registerValueDecoder(TUPLE_CODEC, decodeTuple);

  const operatorCodec = createOperatorCodec(operators);
  registry.registerValueEncoderByQType(EXPR_OPERATOR, operatorCodec.encode);
  registry.registerValueDecoder(OPERATOR_CODEC, operatorCodec.decode);

  return registry.freeze();
}
