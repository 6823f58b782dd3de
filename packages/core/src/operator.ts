// ============================================================================
// @dagwire/core — Operators & Signatures
// ============================================================================

import { InvalidArgumentError } from './errors.js';
import type { ExprAttributes } from './expr.js';
import { type Fingerprint, FingerprintHasher } from './fingerprint.js';
import { type QType, tupleQType } from './qtype.js';
import { makeTuple, type TypedValue } from './typed_value.js';

export interface SignatureParameter {
  name: string;
  kind: 'positional' | 'variadic';
}

export interface ExprOperatorSignature {
  readonly parameters: readonly SignatureParameter[];
}

const PARAM_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Parse a signature spec such as `"x, y, *args"`.
 */
export function parseSignature(spec: string): ExprOperatorSignature {
  const trimmed = spec.trim();
  if (trimmed === '') return { parameters: [] };

  const parameters: SignatureParameter[] = [];
  const seen = new Set<string>();
  const parts = trimmed.split(',').map((p) => p.trim());
  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    const variadic = part.startsWith('*');
    const name = variadic ? part.slice(1) : part;
    if (!PARAM_NAME.test(name)) {
      throw new InvalidArgumentError(`illegal parameter name '${part}' in signature "${spec}"`);
    }
    if (seen.has(name)) {
      throw new InvalidArgumentError(`duplicated parameter name '${name}' in signature "${spec}"`);
    }
    if (variadic && i !== parts.length - 1) {
      throw new InvalidArgumentError(`variadic parameter must be the last in signature "${spec}"`);
    }
    seen.add(name);
    parameters.push({ name, kind: variadic ? 'variadic' : 'positional' });
  }
  return { parameters };
}

/** Inverse of parseSignature. */
export function signatureSpec(signature: ExprOperatorSignature): string {
  return signature.parameters
    .map((p) => (p.kind === 'variadic' ? `*${p.name}` : p.name))
    .join(', ');
}

/**
 * Check that `count` dependencies fit the signature.
 */
export function validateDepsCount(signature: ExprOperatorSignature, count: number): void {
  const params = signature.parameters;
  const variadic = params.length > 0 && params[params.length - 1].kind === 'variadic';
  const required = variadic ? params.length - 1 : params.length;
  if (variadic ? count < required : count !== required) {
    throw new InvalidArgumentError(
      `incorrect number of dependencies passed to an operator node: expected ${
        variadic ? `at least ${required}` : required
      } but got ${count}`,
    );
  }
}

/**
 * Base class for expression operators.
 */
export abstract class ExprOperator {
  private cachedFingerprint: Fingerprint | undefined;

  constructor(
    public readonly displayName: string,
    public readonly signature: ExprOperatorSignature,
    public readonly doc: string = '',
  ) {}

  get fingerprint(): Fingerprint {
    if (this.cachedFingerprint === undefined) {
      const hasher = new FingerprintHasher('ExprOperator')
        .addString(this.constructor.name)
        .addString(this.displayName)
        .addString(signatureSpec(this.signature))
        .addString(this.doc);
      this.hashExtra(hasher);
      this.cachedFingerprint = hasher.finish();
    }
    return this.cachedFingerprint;
  }

  /** Attributes of a node built from this operator and inputs with `inputs`. */
  abstract inferAttributes(inputs: readonly ExprAttributes[]): ExprAttributes;

  protected hashExtra(_hasher: FingerprintHasher): void {}
}

/**
 * An operator implemented by the evaluation backend. The output type, when
 * given, is reported once every input type is known.
 */
export class BackendOperator extends ExprOperator {
  constructor(
    name: string,
    signature: ExprOperatorSignature | string,
    doc = '',
    public readonly outputQType?: QType,
  ) {
    super(name, typeof signature === 'string' ? parseSignature(signature) : signature, doc);
  }

  inferAttributes(inputs: readonly ExprAttributes[]): ExprAttributes {
    if (this.outputQType === undefined || inputs.some((a) => a.qtype === undefined)) {
      return {};
    }
    return { qtype: this.outputQType };
  }

  protected override hashExtra(hasher: FingerprintHasher): void {
    hasher.addString(this.outputQType?.name ?? '');
  }
}

export const MAKE_TUPLE_OPERATOR_NAME = 'core.make_tuple';

/**
 * Builds a tuple from its inputs. Folds to a literal value when every input
 * is a known value.
 */
export class MakeTupleOperator extends ExprOperator {
  constructor() {
    super(MAKE_TUPLE_OPERATOR_NAME, parseSignature('*fields'), 'Returns a tuple of the inputs.');
  }

  inferAttributes(inputs: readonly ExprAttributes[]): ExprAttributes {
    const qtypes: QType[] = [];
    for (const input of inputs) {
      if (input.qtype === undefined) return {};
      qtypes.push(input.qtype);
    }
    const values: TypedValue[] = [];
    for (const input of inputs) {
      if (input.qvalue === undefined) return { qtype: tupleQType(qtypes) };
      values.push(input.qvalue);
    }
    return { qtype: tupleQType(qtypes), qvalue: makeTuple(...values) };
  }
}
