// ============================================================================
// @dagwire/serialization — Tuple Codec
// ============================================================================
//
// The payload is just the codec tag; the fields travel as input values, so
// shared fields are stored once.
// ============================================================================

import { InvalidArgumentError, type TypedValue, makeTuple } from '@dagwire/core';
import type { Encoder } from '../encoder.js';
import { type EncodedValue, NO_EXTENSION_FOUND, type ValueDecoder } from '../types.js';
import { ByteReader, ByteWriter } from '../wire/buffer.js';

export const TUPLE_CODEC = 'dagwire.tuple.v1';

export function encodeTuple(value: TypedValue, encoder: Encoder): EncodedValue {
  const fields = value.toFields();
  const codecIndex = encoder.encodeCodec(TUPLE_CODEC);
  const inputValueIndices = fields.map((field) => encoder.encodeValue(field));
  const w = new ByteWriter(32);
  w.writeString(TUPLE_CODEC);
  return { payload: w.toUint8Array(), codecIndex, inputValueIndices, inputExprIndices: [] };
}

export const decodeTuple: ValueDecoder = (payload, inputValues, inputExprs) => {
  const r = new ByteReader(payload);
  if (!r.tryReadTag(TUPLE_CODEC)) return NO_EXTENSION_FOUND;
  r.expectEnd();
  if (inputExprs.length > 0) {
    throw new InvalidArgumentError('tuple values take no input expressions');
  }
  return makeTuple(...inputValues);
};
