// ============================================================================
// @dagwire/serialization — Bulk Decoding
// ============================================================================

import { InvalidArgumentError, annotate, logger } from '@dagwire/core';
import { Decoder } from './decoder.js';
import type { DecodingOptions } from './options.js';
import { CONTAINER_VERSION, type CodecLookup, type Container, type DecodeResult } from './types.js';

/**
 * Decode a whole container.
 *
 * Every step goes through the same state machine as the incremental API,
 * at its array position. The result holds the outputs of any marker steps
 * followed by the container's trailing output indices.
 *
 * @example
 * ```ts
 * const { values, exprs } = decode(container, registry.codecLookup);
 * ```
 */
export function decode(
  container: Container,
  codecLookup: CodecLookup,
  options: DecodingOptions = {},
): DecodeResult {
  if (container.version === undefined) {
    throw new InvalidArgumentError('missing container.version');
  }
  if (container.version !== CONTAINER_VERSION) {
    throw new InvalidArgumentError(
      `expected container.version to be ${CONTAINER_VERSION}, got ${container.version}`,
    );
  }
  const t = logger.timer('decode');
  const decoder = new Decoder(codecLookup, options);
  container.decodingSteps.forEach((step, i) => {
    annotate(`while handling decoding_steps[${i}]`, () => decoder.onStep(i, step));
  });
  const streamed = decoder.finish();
  const values = annotate('while loading output values', () =>
    decoder.resolveValues(container.outputValueIndices),
  );
  const exprs = annotate('while loading output expressions', () =>
    decoder.resolveExprs(container.outputExprIndices),
  );
  t.endWith({
    steps: container.decodingSteps.length,
    values: values.length,
    exprs: exprs.length,
  });
  return {
    values: [...streamed.values, ...values],
    exprs: [...streamed.exprs, ...exprs],
  };
}
