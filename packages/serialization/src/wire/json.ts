// ============================================================================
// @dagwire/serialization — JSON Container Format
// ============================================================================
//
// A readable rendition of a container, for fixtures and debugging. Each
// step is an object with a `type` field; payloads are base64.
//
//   {
//     "version": 1,
//     "decoding_steps": [
//       { "type": "codec", "name": "dagwire.scalar.v1" },
//       { "type": "value", "codec_index": 0, "payload": "...",
//         "input_value_indices": [], "input_expr_indices": [] },
//       { "type": "literal_node", "literal_value_index": 1 }
//     ],
//     "output_value_indices": [],
//     "output_expr_indices": [2]
//   }
// ============================================================================

import { InvalidArgumentError } from '@dagwire/core';
import { z } from 'zod';
import { formatIssue } from '../options.js';
import type { Container, DecodingStep } from '../types.js';

const index = (field: string) =>
  z.number({ required_error: `missing ${field}` }).int();

const indices = z.array(z.number().int()).default([]);

const key = (field: string) => z.string({ required_error: `missing ${field}` });

const stepSchema = z.discriminatedUnion(
  'type',
  [
    z.object({
      type: z.literal('codec'),
      name: z.string({ required_error: 'missing codec.name' }),
    }),
    z.object({
      type: z.literal('value'),
      payload: z.string().base64().default(''),
      codec_index: z.number().int().optional(),
      input_value_indices: indices,
      input_expr_indices: indices,
    }),
    z.object({
      type: z.literal('literal_node'),
      literal_value_index: index('literal_node.literal_value_index'),
    }),
    z.object({
      type: z.literal('leaf_node'),
      leaf_key: key('leaf_node.leaf_key'),
    }),
    z.object({
      type: z.literal('placeholder_node'),
      placeholder_key: key('placeholder_node.placeholder_key'),
    }),
    z.object({
      type: z.literal('operator_node'),
      operator_value_index: index('operator_node.operator_value_index'),
      input_expr_indices: indices,
    }),
    z.object({
      type: z.literal('output_value_index'),
      index: index('output_value_index.index'),
    }),
    z.object({
      type: z.literal('output_expr_index'),
      index: index('output_expr_index.index'),
    }),
  ],
  {
    errorMap: (issue, ctx) =>
      issue.code === 'invalid_union_discriminator'
        ? { message: 'missing or unknown decoding_step.type' }
        : { message: ctx.defaultError },
  },
);

export const containerJsonSchema = z.object({
  version: z.number().int().optional(),
  decoding_steps: z.array(stepSchema).default([]),
  output_value_indices: indices,
  output_expr_indices: indices,
});

export type ContainerJson = z.input<typeof containerJsonSchema>;
type StepJson = z.output<typeof stepSchema>;
type StepJsonInput = z.input<typeof stepSchema>;

function fromJsonStep(step: StepJson): DecodingStep {
  switch (step.type) {
    case 'codec':
      return { kind: 'codec', name: step.name };
    case 'value': {
      const payload = new Uint8Array(Buffer.from(step.payload, 'base64'));
      const inputValueIndices = step.input_value_indices;
      const inputExprIndices = step.input_expr_indices;
      return step.codec_index === undefined
        ? { kind: 'value', payload, inputValueIndices, inputExprIndices }
        : { kind: 'value', payload, codecIndex: step.codec_index, inputValueIndices, inputExprIndices };
    }
    case 'literal_node':
      return { kind: 'literalNode', literalValueIndex: step.literal_value_index };
    case 'leaf_node':
      return { kind: 'leafNode', leafKey: step.leaf_key };
    case 'placeholder_node':
      return { kind: 'placeholderNode', placeholderKey: step.placeholder_key };
    case 'operator_node':
      return {
        kind: 'operatorNode',
        operatorValueIndex: step.operator_value_index,
        inputExprIndices: step.input_expr_indices,
      };
    case 'output_value_index':
      return { kind: 'outputValueIndex', index: step.index };
    case 'output_expr_index':
      return { kind: 'outputExprIndex', index: step.index };
  }
}

function toJsonStep(step: DecodingStep): StepJsonInput {
  switch (step.kind) {
    case 'codec':
      return { type: 'codec', name: step.name };
    case 'value':
      return {
        type: 'value',
        payload: Buffer.from(step.payload).toString('base64'),
        ...(step.codecIndex === undefined ? {} : { codec_index: step.codecIndex }),
        input_value_indices: [...step.inputValueIndices],
        input_expr_indices: [...step.inputExprIndices],
      };
    case 'literalNode':
      return { type: 'literal_node', literal_value_index: step.literalValueIndex };
    case 'leafNode':
      return { type: 'leaf_node', leaf_key: step.leafKey };
    case 'placeholderNode':
      return { type: 'placeholder_node', placeholder_key: step.placeholderKey };
    case 'operatorNode':
      return {
        type: 'operator_node',
        operator_value_index: step.operatorValueIndex,
        input_expr_indices: [...step.inputExprIndices],
      };
    case 'outputValueIndex':
      return { type: 'output_value_index', index: step.index };
    case 'outputExprIndex':
      return { type: 'output_expr_index', index: step.index };
  }
}

/**
 * Render a container as a JSON-compatible object.
 */
export function containerToJson(container: Container): ContainerJson {
  return {
    ...(container.version === undefined ? {} : { version: container.version }),
    decoding_steps: container.decodingSteps.map(toJsonStep),
    output_value_indices: [...container.outputValueIndices],
    output_expr_indices: [...container.outputExprIndices],
  };
}

/**
 * Validate and convert parsed JSON into a container.
 *
 * Problems inside a step are reported the way the decoder reports them,
 * e.g. `missing leaf_node.leaf_key; while handling decoding_steps[3]`.
 */
export function parseContainerJson(input: unknown): Container {
  const parsed = containerJsonSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const [field, position] = issue?.path ?? [];
    if (issue !== undefined && field === 'decoding_steps' && typeof position === 'number') {
      throw new InvalidArgumentError(issue.message).addContext(
        `while handling decoding_steps[${position}]`,
      );
    }
    throw new InvalidArgumentError(`invalid container: ${formatIssue(parsed.error)}`);
  }
  const json = parsed.data;
  return {
    ...(json.version === undefined ? {} : { version: json.version }),
    decodingSteps: json.decoding_steps.map(fromJsonStep),
    outputValueIndices: json.output_value_indices,
    outputExprIndices: json.output_expr_indices,
  };
}
