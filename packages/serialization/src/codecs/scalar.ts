// ============================================================================
// @dagwire/serialization — Scalar Codec
// ============================================================================
//
// Payload: codec tag, one type-code byte, then the value in little-endian
// form (TEXT and BYTES length-prefixed, UNIT empty).
// ============================================================================

import {
  BOOLEAN,
  BYTES,
  FLOAT32,
  FLOAT64,
  INT32,
  INT64,
  InvalidArgumentError,
  type QType,
  TEXT,
  type TypedValue,
  UNIT,
  boolean,
  bytes,
  float32,
  float64,
  int32,
  int64,
  text,
  unit,
} from '@dagwire/core';
import type { Encoder } from '../encoder.js';
import { type EncodedValue, NO_EXTENSION_FOUND, type ValueDecoder } from '../types.js';
import { ByteReader, ByteWriter } from '../wire/buffer.js';

export const SCALAR_CODEC = 'dagwire.scalar.v1';

const TYPE_CODES = new Map<QType, number>([
  [FLOAT32, 1],
  [FLOAT64, 2],
  [INT32, 3],
  [INT64, 4],
  [BOOLEAN, 5],
  [TEXT, 6],
  [BYTES, 7],
  [UNIT, 8],
]);

export const SCALAR_CODEC_QTYPES: readonly QType[] = [...TYPE_CODES.keys()];

export function encodeScalar(value: TypedValue, encoder: Encoder): EncodedValue {
  const code = TYPE_CODES.get(value.qtype);
  if (code === undefined) {
    throw new InvalidArgumentError(`${SCALAR_CODEC} does not support qtype=${value.qtype.name}`);
  }
  const codecIndex = encoder.encodeCodec(SCALAR_CODEC);
  const w = new ByteWriter(32);
  w.writeString(SCALAR_CODEC);
  w.writeByte(code);
  switch (value.qtype) {
    case FLOAT32:
      w.writeFloat32(value.toNumber());
      break;
    case FLOAT64:
      w.writeFloat64(value.toNumber());
      break;
    case INT32:
      w.writeInt32(value.toNumber());
      break;
    case INT64:
      w.writeBigInt64(value.toBigInt());
      break;
    case BOOLEAN:
      w.writeByte(value.toBoolean() ? 1 : 0);
      break;
    case TEXT:
      w.writeString(value.toText());
      break;
    case BYTES:
      w.writeBlob(value.toBytes());
      break;
    case UNIT:
      break;
  }
  return { payload: w.toUint8Array(), codecIndex, inputValueIndices: [], inputExprIndices: [] };
}

export const decodeScalar: ValueDecoder = (payload, inputValues, inputExprs) => {
  const r = new ByteReader(payload);
  if (!r.tryReadTag(SCALAR_CODEC)) return NO_EXTENSION_FOUND;
  if (inputValues.length > 0 || inputExprs.length > 0) {
    throw new InvalidArgumentError('scalar values take no input values or expressions');
  }
  const value = readScalar(r);
  r.expectEnd();
  return value;
};

function readScalar(r: ByteReader): TypedValue {
  const code = r.readByte();
  switch (code) {
    case 1:
      return float32(r.readFloat32());
    case 2:
      return float64(r.readFloat64());
    case 3:
      return int32(r.readInt32());
    case 4:
      return int64(r.readBigInt64());
    case 5: {
      const b = r.readByte();
      if (b > 1) throw new InvalidArgumentError(`invalid boolean byte ${b}`);
      return boolean(b === 1);
    }
    case 6:
      return text(r.readString());
    case 7:
      return bytes(r.readBlob());
    case 8:
      return unit();
    default:
      throw new InvalidArgumentError(`unknown scalar type code ${code}`);
  }
}
