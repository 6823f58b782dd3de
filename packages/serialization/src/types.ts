// ============================================================================
// @dagwire/serialization — Decoding Steps & Container
// ============================================================================
//
// A container is a linear program: each decoding step produces one value,
// one expression node or one codec, and may reference the results of
// strictly earlier steps by position.
// ============================================================================

import type { ExprNode, TypedValue } from '@dagwire/core';
import type { Encoder } from './encoder.js';

/** The only container version this engine reads and writes. */
export const CONTAINER_VERSION = 1;

/** Declares a codec; it takes the next codec slot. */
export interface CodecStep {
  kind: 'codec';
  name: string;
}

/** A codec-specific serialized value. */
export interface ValueStep {
  kind: 'value';
  payload: Uint8Array;
  /** Codec slot; when absent the decoder tries every loaded codec. */
  codecIndex?: number;
  inputValueIndices: readonly number[];
  inputExprIndices: readonly number[];
}

export interface LiteralNodeStep {
  kind: 'literalNode';
  literalValueIndex: number;
}

export interface LeafNodeStep {
  kind: 'leafNode';
  leafKey: string;
}

export interface PlaceholderNodeStep {
  kind: 'placeholderNode';
  placeholderKey: string;
}

export interface OperatorNodeStep {
  kind: 'operatorNode';
  operatorValueIndex: number;
  inputExprIndices: readonly number[];
}

/** Marks a value as part of the output (step stream only). */
export interface OutputValueIndexStep {
  kind: 'outputValueIndex';
  index: number;
}

/** Marks an expression as part of the output (step stream only). */
export interface OutputExprIndexStep {
  kind: 'outputExprIndex';
  index: number;
}

export type DecodingStep =
  | CodecStep
  | ValueStep
  | LiteralNodeStep
  | LeafNodeStep
  | PlaceholderNodeStep
  | OperatorNodeStep
  | OutputValueIndexStep
  | OutputExprIndexStep;

export type DecodingStepKind = DecodingStep['kind'];

/** Names used for step kinds in error messages. */
export const STEP_TYPE_NAMES: Record<DecodingStepKind, string> = {
  codec: 'CODEC',
  value: 'VALUE',
  literalNode: 'LITERAL_NODE',
  leafNode: 'LEAF_NODE',
  placeholderNode: 'PLACEHOLDER_NODE',
  operatorNode: 'OPERATOR_NODE',
  outputValueIndex: 'OUTPUT_VALUE_INDEX',
  outputExprIndex: 'OUTPUT_EXPR_INDEX',
};

/**
 * The complete serialized form of a set of roots. Array position is the
 * step index.
 */
export interface Container {
  /** Absent only in hand-built or parsed input; decode() rejects it. */
  version?: number;
  decodingSteps: readonly DecodingStep[];
  outputValueIndices: readonly number[];
  outputExprIndices: readonly number[];
}

/** A step paired with its explicit position, for the incremental API. */
export interface IndexedStep {
  index: number;
  step: DecodingStep;
}

export interface DecodeResult {
  values: TypedValue[];
  exprs: ExprNode[];
}

// ---------------------------------------------------------------------------
// Codec protocol
// ---------------------------------------------------------------------------

/** What a value encoder produces: everything of a value step but its kind. */
export type EncodedValue = Omit<ValueStep, 'kind'>;

/**
 * Produces the last assembly step of `value`. May call back into `encoder`
 * for nested content; those calls land in earlier steps.
 */
export type ValueEncoder = (value: TypedValue, encoder: Encoder) => EncodedValue;

/** Returned by a value decoder for a payload that is not its own. */
export const NO_EXTENSION_FOUND: unique symbol = Symbol('NO_EXTENSION_FOUND');

export type ValueDecoderResult = TypedValue | typeof NO_EXTENSION_FOUND;

export type ValueDecoder = (
  payload: Uint8Array,
  inputValues: readonly TypedValue[],
  inputExprs: readonly ExprNode[],
) => ValueDecoderResult;

/** Resolves a codec name; throws for unknown names. */
export type CodecLookup = (codecName: string) => ValueDecoder;
