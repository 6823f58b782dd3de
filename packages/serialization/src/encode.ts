// ============================================================================
// @dagwire/serialization — Encoding Entry Points
// ============================================================================

import { type ExprNode, type TypedValue, annotate, logger } from '@dagwire/core';
import { ContainerAssembler, StepStreamBuilder } from './container.js';
import { Encoder } from './encoder.js';
import type { Container, IndexedStep, ValueEncoder } from './types.js';

/**
 * Encode roots into a bulk container. The output index arrays follow the
 * order of `values` and `exprs`.
 */
export function encode(
  values: readonly TypedValue[],
  exprs: readonly ExprNode[],
  valueEncoder: ValueEncoder,
): Container {
  const t = logger.timer('encode');
  const assembler = new ContainerAssembler();
  const encoder = new Encoder(valueEncoder, assembler);
  const outputValueIndices = values.map((value, i) =>
    annotate(`while encoding values[${i}]`, () => encoder.encodeValue(value)),
  );
  const outputExprIndices = exprs.map((expr, i) =>
    annotate(`while encoding exprs[${i}]`, () => encoder.encodeExpr(expr)),
  );
  t.endWith({ steps: assembler.size, values: values.length, exprs: exprs.length });
  return assembler.finish(outputValueIndices, outputExprIndices);
}

/**
 * Encode roots into the incremental form: a step stream where each root is
 * followed by an output marker step. Feed it to `Decoder.onStep`.
 */
export function encodeAsStream(
  values: readonly TypedValue[],
  exprs: readonly ExprNode[],
  valueEncoder: ValueEncoder,
): IndexedStep[] {
  const stream = new StepStreamBuilder();
  const encoder = new Encoder(valueEncoder, stream);
  values.forEach((value, i) => {
    const index = annotate(`while encoding values[${i}]`, () => encoder.encodeValue(value));
    stream.addOutputValue(index);
  });
  exprs.forEach((expr, i) => {
    const index = annotate(`while encoding exprs[${i}]`, () => encoder.encodeExpr(expr));
    stream.addOutputExpr(index);
  });
  logger.debug(`encodeAsStream: ${stream.size} steps`, { steps: stream.size });
  return stream.finish();
}
