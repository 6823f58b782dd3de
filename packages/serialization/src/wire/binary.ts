// ============================================================================
// @dagwire/serialization — Binary Container Format
// ============================================================================
//
// Layout (integers are unsigned LEB128 unless noted):
//
//   "DAGW"                      magic
//   version
//   step count, then per step:  tag byte + fields
//   output value indices        count + indices
//   output expr indices         count + indices
//   CRC32 of all of the above   uint32 LE
//
// Step tags:
//   1 codec            name
//   2 value            payload, has-codec byte [+ codec index],
//                      input value indices, input expr indices
//   3 literal node     literal value index
//   4 leaf node        leaf key
//   5 placeholder node placeholder key
//   6 operator node    operator value index, input expr indices
//   7 output value     index
//   8 output expr      index
// ============================================================================

import { InvalidArgumentError, annotate, logger } from '@dagwire/core';
import type { Container, DecodingStep } from '../types.js';
import { ByteReader, ByteWriter } from './buffer.js';
import { crc32 } from './crc32.js';

const MAGIC = new Uint8Array([0x44, 0x41, 0x47, 0x57]); // DAGW
const CHECKSUM_BYTES = 4;

const TAG_CODEC = 1;
const TAG_VALUE = 2;
const TAG_LITERAL_NODE = 3;
const TAG_LEAF_NODE = 4;
const TAG_PLACEHOLDER_NODE = 5;
const TAG_OPERATOR_NODE = 6;
const TAG_OUTPUT_VALUE = 7;
const TAG_OUTPUT_EXPR = 8;

function writeIndices(w: ByteWriter, indices: readonly number[]) {
  w.writeVarint(indices.length);
  for (const index of indices) w.writeVarint(index);
}

function readIndices(r: ByteReader): number[] {
  const count = r.readVarint();
  if (count > r.remaining) {
    throw new InvalidArgumentError(`index count ${count} exceeds remaining data`);
  }
  const out: number[] = [];
  for (let i = 0; i < count; i++) out.push(r.readVarint());
  return out;
}

function writeStep(w: ByteWriter, step: DecodingStep) {
  switch (step.kind) {
    case 'codec':
      w.writeByte(TAG_CODEC);
      w.writeString(step.name);
      return;
    case 'value':
      w.writeByte(TAG_VALUE);
      w.writeBlob(step.payload);
      if (step.codecIndex === undefined) {
        w.writeByte(0);
      } else {
        w.writeByte(1);
        w.writeVarint(step.codecIndex);
      }
      writeIndices(w, step.inputValueIndices);
      writeIndices(w, step.inputExprIndices);
      return;
    case 'literalNode':
      w.writeByte(TAG_LITERAL_NODE);
      w.writeVarint(step.literalValueIndex);
      return;
    case 'leafNode':
      w.writeByte(TAG_LEAF_NODE);
      w.writeString(step.leafKey);
      return;
    case 'placeholderNode':
      w.writeByte(TAG_PLACEHOLDER_NODE);
      w.writeString(step.placeholderKey);
      return;
    case 'operatorNode':
      w.writeByte(TAG_OPERATOR_NODE);
      w.writeVarint(step.operatorValueIndex);
      writeIndices(w, step.inputExprIndices);
      return;
    case 'outputValueIndex':
      w.writeByte(TAG_OUTPUT_VALUE);
      w.writeVarint(step.index);
      return;
    case 'outputExprIndex':
      w.writeByte(TAG_OUTPUT_EXPR);
      w.writeVarint(step.index);
      return;
  }
}

function readStep(r: ByteReader): DecodingStep {
  const tag = r.readByte();
  switch (tag) {
    case TAG_CODEC:
      return { kind: 'codec', name: r.readString() };
    case TAG_VALUE: {
      const payload = r.readBlob();
      const hasCodec = r.readByte();
      if (hasCodec > 1) {
        throw new InvalidArgumentError(`malformed container: invalid codec flag ${hasCodec}`);
      }
      const codecIndex = hasCodec === 1 ? r.readVarint() : undefined;
      const inputValueIndices = readIndices(r);
      const inputExprIndices = readIndices(r);
      return codecIndex === undefined
        ? { kind: 'value', payload, inputValueIndices, inputExprIndices }
        : { kind: 'value', payload, codecIndex, inputValueIndices, inputExprIndices };
    }
    case TAG_LITERAL_NODE:
      return { kind: 'literalNode', literalValueIndex: r.readVarint() };
    case TAG_LEAF_NODE:
      return { kind: 'leafNode', leafKey: r.readString() };
    case TAG_PLACEHOLDER_NODE:
      return { kind: 'placeholderNode', placeholderKey: r.readString() };
    case TAG_OPERATOR_NODE: {
      const operatorValueIndex = r.readVarint();
      return { kind: 'operatorNode', operatorValueIndex, inputExprIndices: readIndices(r) };
    }
    case TAG_OUTPUT_VALUE:
      return { kind: 'outputValueIndex', index: r.readVarint() };
    case TAG_OUTPUT_EXPR:
      return { kind: 'outputExprIndex', index: r.readVarint() };
    default:
      throw new InvalidArgumentError(`malformed container: unknown step tag ${tag}`);
  }
}

/**
 * Serialize a container to bytes.
 */
export function writeContainer(container: Container): Uint8Array {
  if (container.version === undefined) {
    throw new InvalidArgumentError('missing container.version');
  }
  const w = new ByteWriter(1024);
  w.writeBytes(MAGIC);
  w.writeVarint(container.version);
  w.writeVarint(container.decodingSteps.length);
  container.decodingSteps.forEach((step, i) => {
    annotate(`while writing decoding_steps[${i}]`, () => writeStep(w, step));
  });
  writeIndices(w, container.outputValueIndices);
  writeIndices(w, container.outputExprIndices);
  w.writeUint32(crc32(w.toUint8Array()));
  const out = w.toUint8Array();
  logger.debug(`writeContainer: ${out.length} bytes`, { steps: container.decodingSteps.length });
  return out;
}

/**
 * Parse bytes produced by writeContainer. The result still has to go
 * through decode(), which checks the version.
 */
export function readContainer(bytes: Uint8Array): Container {
  if (bytes.length < MAGIC.length || MAGIC.some((b, i) => bytes[i] !== b)) {
    throw new InvalidArgumentError('malformed container: bad magic bytes');
  }
  if (bytes.length < MAGIC.length + CHECKSUM_BYTES) {
    throw new InvalidArgumentError('malformed container: unexpected end of data');
  }
  const bodyEnd = bytes.length - CHECKSUM_BYTES;
  const body = bytes.subarray(0, bodyEnd);
  const expected = new ByteReader(bytes.subarray(bodyEnd)).readUint32();
  if (crc32(body) !== expected) {
    throw new InvalidArgumentError('malformed container: checksum mismatch');
  }

  const r = new ByteReader(body.subarray(MAGIC.length));
  const version = r.readVarint();
  const stepCount = r.readVarint();
  if (stepCount > r.remaining) {
    throw new InvalidArgumentError(`malformed container: step count ${stepCount} exceeds remaining data`);
  }
  const decodingSteps: DecodingStep[] = [];
  for (let i = 0; i < stepCount; i++) {
    decodingSteps.push(annotate(`while reading decoding_steps[${i}]`, () => readStep(r)));
  }
  const outputValueIndices = annotate('while reading output_value_indices', () => readIndices(r));
  const outputExprIndices = annotate('while reading output_expr_indices', () => readIndices(r));
  r.expectEnd();
  return { version, decodingSteps, outputValueIndices, outputExprIndices };
}
