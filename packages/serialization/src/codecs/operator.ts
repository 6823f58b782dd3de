// ============================================================================
// @dagwire/serialization — Operator Codec
// ============================================================================
//
// Payload: codec tag, one kind byte, then kind-specific fields.
//
//   1 registered   name; resolved against the operator registry on decode
//   2 backend      name, signature spec, doc, output qtype name ('' if none)
//   3 make_tuple   nothing
// ============================================================================

import {
  BackendOperator,
  InvalidArgumentError,
  MakeTupleOperator,
  type OperatorRegistry,
  RegisteredOperator,
  type TypedValue,
  UnimplementedError,
  operatorValue,
  parseSignature,
  scalarQTypeByName,
  signatureSpec,
} from '@dagwire/core';
import type { Encoder } from '../encoder.js';
import { type EncodedValue, NO_EXTENSION_FOUND, type ValueDecoder } from '../types.js';
import { ByteReader, ByteWriter } from '../wire/buffer.js';

export const OPERATOR_CODEC = 'dagwire.operator.v1';

const KIND_REGISTERED = 1;
const KIND_BACKEND = 2;
const KIND_MAKE_TUPLE = 3;

export interface OperatorCodec {
  encode(value: TypedValue, encoder: Encoder): EncodedValue;
  decode: ValueDecoder;
}

/**
 * Build the operator codec. Registered operators are looked up by name in
 * `operators` when decoding.
 */
export function createOperatorCodec(operators: OperatorRegistry): OperatorCodec {
  return {
    encode(value, encoder) {
      const op = value.toOperator();
      const codecIndex = encoder.encodeCodec(OPERATOR_CODEC);
      const w = new ByteWriter(64);
      w.writeString(OPERATOR_CODEC);
      if (op instanceof RegisteredOperator) {
        w.writeByte(KIND_REGISTERED);
        w.writeString(op.displayName);
      } else if (op instanceof MakeTupleOperator) {
        w.writeByte(KIND_MAKE_TUPLE);
      } else if (op instanceof BackendOperator) {
        const output = op.outputQType;
        if (output !== undefined && scalarQTypeByName(output.name) !== output) {
          throw new UnimplementedError(
            `cannot serialize backend operator ${op.displayName} with output qtype=${output.name}`,
          );
        }
        w.writeByte(KIND_BACKEND);
        w.writeString(op.displayName);
        w.writeString(signatureSpec(op.signature));
        w.writeString(op.doc);
        w.writeString(output?.name ?? '');
      } else {
        throw new UnimplementedError(`cannot serialize operator ${op.displayName}`);
      }
      return { payload: w.toUint8Array(), codecIndex, inputValueIndices: [], inputExprIndices: [] };
    },

    decode(payload, inputValues, inputExprs) {
      const r = new ByteReader(payload);
      if (!r.tryReadTag(OPERATOR_CODEC)) return NO_EXTENSION_FOUND;
      if (inputValues.length > 0 || inputExprs.length > 0) {
        throw new InvalidArgumentError('operator values take no input values or expressions');
      }
      const kind = r.readByte();
      switch (kind) {
        case KIND_REGISTERED: {
          const name = r.readString();
          r.expectEnd();
          return operatorValue(operators.lookup(name));
        }
        case KIND_BACKEND: {
          const name = r.readString();
          const spec = r.readString();
          const doc = r.readString();
          const outputName = r.readString();
          r.expectEnd();
          const output = outputName === '' ? undefined : scalarQTypeByName(outputName);
          if (outputName !== '' && output === undefined) {
            throw new InvalidArgumentError(`unknown qtype name '${outputName}'`);
          }
          return operatorValue(new BackendOperator(name, parseSignature(spec), doc, output));
        }
        case KIND_MAKE_TUPLE:
          r.expectEnd();
          return operatorValue(new MakeTupleOperator());
        default:
          throw new InvalidArgumentError(`unknown operator kind ${kind}`);
      }
    },
  };
}
