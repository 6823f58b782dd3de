// ============================================================================
// @dagwire/serialization — Public API
// ============================================================================

// Steps & containers
export { CONTAINER_VERSION, NO_EXTENSION_FOUND, STEP_TYPE_NAMES } from './types.js';
export type {
  CodecStep,
  ValueStep,
  LiteralNodeStep,
  LeafNodeStep,
  PlaceholderNodeStep,
  OperatorNodeStep,
  OutputValueIndexStep,
  OutputExprIndexStep,
  DecodingStep,
  DecodingStepKind,
  Container,
  IndexedStep,
  DecodeResult,
  EncodedValue,
  ValueEncoder,
  ValueDecoder,
  ValueDecoderResult,
  CodecLookup,
} from './types.js';
export { ContainerAssembler, StepStreamBuilder } from './container.js';
export type { ContainerBuilder } from './container.js';

// Encoding & decoding
export { Encoder } from './encoder.js';
export { Decoder } from './decoder.js';
export { encode, encodeAsStream } from './encode.js';
export { decode } from './decode.js';
export { decodingOptionsSchema, resolveDecodingOptions } from './options.js';
export type { DecodingOptions, ResolvedDecodingOptions } from './options.js';

// Codecs
export { CodecRegistry } from './registry.js';
export {
  createDefaultCodecRegistry,
  createOperatorCodec,
  OPERATOR_CODEC,
  SCALAR_CODEC,
  SCALAR_CODEC_QTYPES,
  TUPLE_CODEC,
  decodeScalar,
  encodeScalar,
  decodeTuple,
  encodeTuple,
} from './codecs/index.js';
export type { OperatorCodec } from './codecs/index.js';

// Wire formats
export { writeContainer, readContainer } from './wire/binary.js';
export { containerToJson, parseContainerJson, containerJsonSchema } from './wire/json.js';
export type { ContainerJson } from './wire/json.js';
export { ByteReader, ByteWriter } from './wire/buffer.js';
export { crc32 } from './wire/crc32.js';

// High-level API
export { serialize, deserialize, serializeToBytes, deserializeFromBytes } from './api.js';
