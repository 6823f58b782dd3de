// ============================================================================
// @dagwire/serialization — High-level API
// ============================================================================

import type { ExprNode, TypedValue } from '@dagwire/core';
import { decode } from './decode.js';
import { encode } from './encode.js';
import type { DecodingOptions } from './options.js';
import type { CodecRegistry } from './registry.js';
import type { Container, DecodeResult } from './types.js';
import { readContainer, writeContainer } from './wire/binary.js';

/**
 * Encode values and expressions with the codecs of `registry`.
 *
 * @example
 * ```ts
 * const registry = createDefaultCodecRegistry();
 * const container = serialize([float32(1)], [leaf('x')], registry);
 * const { values, exprs } = deserialize(container, registry);
 * ```
 */
export function serialize(
  values: readonly TypedValue[],
  exprs: readonly ExprNode[],
  registry: CodecRegistry,
): Container {
  return encode(values, exprs, registry.valueEncoder);
}

export function deserialize(
  container: Container,
  registry: CodecRegistry,
  options?: DecodingOptions,
): DecodeResult {
  return decode(container, registry.codecLookup, options);
}

/** serialize() followed by writeContainer(). */
export function serializeToBytes(
  values: readonly TypedValue[],
  exprs: readonly ExprNode[],
  registry: CodecRegistry,
): Uint8Array {
  return writeContainer(serialize(values, exprs, registry));
}

/** readContainer() followed by deserialize(). */
export function deserializeFromBytes(
  bytes: Uint8Array,
  registry: CodecRegistry,
  options?: DecodingOptions,
): DecodeResult {
  return deserialize(readContainer(bytes), registry, options);
}
