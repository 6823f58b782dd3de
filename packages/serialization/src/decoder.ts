// ============================================================================
// @dagwire/serialization — Decoder
// ============================================================================
//
// Replays decoding steps one at a time. Each step assembles one of:
//
//   * an expression node (literal, leaf, placeholder, operator);
//   * a value, delegated to a codec named by `codecIndex`, or to the first
//     loaded codec that recognises the payload;
//   * a codec, acquired through the codec lookup;
//   * an output marker, copying an earlier result to the output.
//
// Results are kept per step position and may be referenced by any later
// step. The first error is terminal.
// ============================================================================

import {
  EXPR_OPERATOR,
  type ExprNode,
  FailedPreconditionError,
  InvalidArgumentError,
  NotFoundError,
  type TypedValue,
  annotate,
  leaf,
  literal,
  makeOpNode,
  placeholder,
  unsafeMakeOperatorNode,
} from '@dagwire/core';
import { type DecodingOptions, type ResolvedDecodingOptions, resolveDecodingOptions } from './options.js';
import {
  type CodecLookup,
  type DecodeResult,
  type DecodingStep,
  NO_EXTENSION_FOUND,
  type OperatorNodeStep,
  STEP_TYPE_NAMES,
  type ValueDecoder,
  type ValueStep,
} from './types.js';

interface Codec {
  name: string;
  decoder: ValueDecoder;
}

/** What a step position holds. Values and expressions share a namespace. */
interface StepSlot {
  value?: TypedValue;
  expr?: ExprNode;
  codec?: Codec;
}

export class Decoder {
  private readonly options: ResolvedDecodingOptions;
  private slots: StepSlot[] = [];
  private codecs: Codec[] = [];
  private outputValues: TypedValue[] = [];
  private outputExprs: ExprNode[] = [];
  private failed = false;

  constructor(
    private readonly codecLookup: CodecLookup,
    options: DecodingOptions = {},
  ) {
    this.options = resolveDecodingOptions(options);
  }

  /** Number of step positions seen so far. */
  get stepCount(): number {
    return this.slots.length;
  }

  /**
   * Process one decoding step. `stepIndex` must be the next position, or
   * an existing one whose slot is still free for this kind of result.
   */
  onStep(stepIndex: number, step: DecodingStep): void {
    this.ensureUsable();
    try {
      this.handleStep(stepIndex, step);
    } catch (err) {
      this.failed = true;
      throw err;
    }
  }

  /** Outputs collected from output marker steps, in marker order. */
  finish(): DecodeResult {
    this.ensureUsable();
    return { values: [...this.outputValues], exprs: [...this.outputExprs] };
  }

  /** Resolve indices against every step processed so far. */
  resolveValues(indices: readonly number[]): TypedValue[] {
    this.ensureUsable();
    return indices.map((index) => this.loadValue(index, this.slots.length));
  }

  resolveExprs(indices: readonly number[]): ExprNode[] {
    this.ensureUsable();
    return indices.map((index) => this.loadExpr(index, this.slots.length));
  }

  private ensureUsable() {
    if (this.failed) {
      throw new FailedPreconditionError('decoder is in a failed state after a previous error');
    }
  }

  private handleStep(stepIndex: number, step: DecodingStep) {
    if (!Number.isInteger(stepIndex) || stepIndex < 0 || stepIndex > this.slots.length) {
      throw new InvalidArgumentError(
        `encountered unexpected decoding_step_index=${stepIndex}, indicating missing step ${this.slots.length}`,
      );
    }
    if (stepIndex === this.slots.length) {
      this.slots.push({});
    }
    const slot = this.slots[stepIndex];
    const note = `decoding_step.type=${STEP_TYPE_NAMES[step.kind] ?? String(step.kind)}`;

    switch (step.kind) {
      case 'literalNode':
        return annotate(note, () => {
          const value = this.loadValue(step.literalValueIndex, stepIndex);
          storeExpr(slot, literal(value));
        });
      case 'leafNode':
        return annotate(note, () => storeExpr(slot, leaf(step.leafKey)));
      case 'placeholderNode':
        return annotate(note, () => storeExpr(slot, placeholder(step.placeholderKey)));
      case 'operatorNode':
        return annotate(note, () => storeExpr(slot, this.decodeOperatorNode(stepIndex, step)));
      case 'value':
        return annotate(note, () => storeValue(slot, this.decodeValue(stepIndex, step)));
      case 'codec':
        return annotate(note, () => {
          if (slot.codec !== undefined) {
            throw new FailedPreconditionError('codec_index collision');
          }
          const codec = { name: step.name, decoder: this.codecLookup(step.name) };
          slot.codec = codec;
          this.codecs.push(codec);
        });
      case 'outputValueIndex':
        return annotate(note, () => {
          this.outputValues.push(this.loadValue(step.index, stepIndex));
        });
      case 'outputExprIndex':
        return annotate(note, () => {
          this.outputExprs.push(this.loadExpr(step.index, stepIndex));
        });
      default:
        throw unexpectedStepType(step);
    }
  }

  private decodeOperatorNode(stepIndex: number, step: OperatorNodeStep): ExprNode {
    const value = this.loadValue(step.operatorValueIndex, stepIndex);
    if (value.qtype !== EXPR_OPERATOR) {
      throw new InvalidArgumentError(
        `expected a value of ${EXPR_OPERATOR.name} type in decoding_step_results[${step.operatorValueIndex}], got ${value.qtype.name}`,
      );
    }
    const op = value.toOperator();
    const deps = step.inputExprIndices.map((index) => this.loadExpr(index, stepIndex));
    if (this.options.safe) {
      return makeOpNode(op, deps, { inferAttributes: this.options.inferAttributes });
    }
    return unsafeMakeOperatorNode(op, deps);
  }

  private decodeValue(stepIndex: number, step: ValueStep): TypedValue {
    const inputValues = step.inputValueIndices.map((index) => this.loadValue(index, stepIndex));
    const inputExprs = step.inputExprIndices.map((index) => this.loadExpr(index, stepIndex));
    if (step.codecIndex !== undefined) {
      return this.decodeValueWithKnownCodec(step, step.codecIndex, inputValues, inputExprs);
    }
    return this.decodeValueWithUnknownCodec(step, inputValues, inputExprs);
  }

  private decodeValueWithKnownCodec(
    step: ValueStep,
    codecIndex: number,
    inputValues: TypedValue[],
    inputExprs: ExprNode[],
  ): TypedValue {
    if (!Number.isInteger(codecIndex) || codecIndex < 0 || codecIndex >= this.codecs.length) {
      throw new InvalidArgumentError(`codec index is out of range: ${codecIndex}`);
    }
    const codec = this.codecs[codecIndex];
    const result = annotate(`codecs[${codecIndex}]=${codec.name}`, () =>
      codec.decoder(step.payload, inputValues, inputExprs),
    );
    if (result === NO_EXTENSION_FOUND) {
      throw new NotFoundError(`no extension found; codecs[${codecIndex}]=${codec.name}`);
    }
    return result;
  }

  private decodeValueWithUnknownCodec(
    step: ValueStep,
    inputValues: TypedValue[],
    inputExprs: ExprNode[],
  ): TypedValue {
    for (let i = 0; i < this.codecs.length; i++) {
      const codec = this.codecs[i];
      const result = annotate(`codecs[${i}]=${codec.name}`, () =>
        codec.decoder(step.payload, inputValues, inputExprs),
      );
      if (result !== NO_EXTENSION_FOUND) return result;
    }
    throw new InvalidArgumentError('unable to detect codec');
  }

  /** Only positions below `limit` are visible. */
  private loadValue(index: number, limit: number): TypedValue {
    if (!Number.isInteger(index) || index < 0 || index >= limit) {
      throw new InvalidArgumentError(`value index is out of range: ${index}`);
    }
    const slot = this.slots[index];
    if (slot.value !== undefined) return slot.value;
    if (slot.expr !== undefined) {
      throw new InvalidArgumentError(
        `expected a value in decoding_step_results[${index}], got an expression`,
      );
    }
    throw new InvalidArgumentError(`found no value in decoding_step_results[${index}]`);
  }

  private loadExpr(index: number, limit: number): ExprNode {
    if (!Number.isInteger(index) || index < 0 || index >= limit) {
      throw new InvalidArgumentError(`expr index is out of range: ${index}`);
    }
    const slot = this.slots[index];
    if (slot.expr !== undefined) return slot.expr;
    if (slot.value !== undefined) {
      throw new InvalidArgumentError(
        `expected an expression in decoding_step_results[${index}], got a value`,
      );
    }
    throw new InvalidArgumentError(`found no expression in decoding_step_results[${index}]`);
  }
}

function storeValue(slot: StepSlot, value: TypedValue) {
  if (slot.value !== undefined || slot.expr !== undefined) {
    throw new FailedPreconditionError('value_index collision');
  }
  slot.value = value;
}

function storeExpr(slot: StepSlot, expr: ExprNode) {
  if (slot.expr !== undefined || slot.value !== undefined) {
    throw new FailedPreconditionError('expr_index collision');
  }
  slot.expr = expr;
}

/** Steps from untyped sources may carry no kind, or one we do not know. */
function unexpectedStepType(step: unknown): InvalidArgumentError {
  const kind = typeof step === 'object' && step !== null && 'kind' in step ? step.kind : undefined;
  if (kind === undefined) {
    return new InvalidArgumentError('missing decoding_step.type');
  }
  return new InvalidArgumentError(`unexpected decoding_step.type=${String(kind)}`);
}
