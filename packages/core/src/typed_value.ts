// ============================================================================
// @dagwire/core — Typed Values
// ============================================================================

import { InvalidArgumentError } from './errors.js';
import { type Fingerprint, FingerprintHasher } from './fingerprint.js';
import type { ExprOperator } from './operator.js';
import {
  BOOLEAN,
  BYTES,
  EXPR_OPERATOR,
  FLOAT32,
  FLOAT64,
  INT32,
  INT64,
  type QType,
  TEXT,
  UNIT,
  tupleQType,
} from './qtype.js';

/** Internal representation of a value, keyed by storage kind. */
export type ValueData =
  | { kind: 'number'; value: number }
  | { kind: 'bigint'; value: bigint }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'text'; value: string }
  | { kind: 'bytes'; value: Uint8Array }
  | { kind: 'unit' }
  | { kind: 'tuple'; fields: readonly TypedValue[] }
  | { kind: 'operator'; op: ExprOperator };

/**
 * An immutable, typed value. Values are shared freely between the
 * structures that reference them; identity is the fingerprint.
 */
export class TypedValue {
  private cachedFingerprint: Fingerprint | undefined;

  constructor(
    public readonly qtype: QType,
    public readonly data: ValueData,
  ) {}

  get fingerprint(): Fingerprint {
    if (this.cachedFingerprint === undefined) {
      this.cachedFingerprint = computeFingerprint(this);
    }
    return this.cachedFingerprint;
  }

  toNumber(): number {
    if (this.data.kind !== 'number') throw mismatch('FLOAT32|FLOAT64|INT32', this.qtype);
    return this.data.value;
  }

  toBigInt(): bigint {
    if (this.data.kind !== 'bigint') throw mismatch(INT64.name, this.qtype);
    return this.data.value;
  }

  toBoolean(): boolean {
    if (this.data.kind !== 'boolean') throw mismatch(BOOLEAN.name, this.qtype);
    return this.data.value;
  }

  toText(): string {
    if (this.data.kind !== 'text') throw mismatch(TEXT.name, this.qtype);
    return this.data.value;
  }

  toBytes(): Uint8Array {
    if (this.data.kind !== 'bytes') throw mismatch(BYTES.name, this.qtype);
    return this.data.value.slice();
  }

  toFields(): readonly TypedValue[] {
    if (this.data.kind !== 'tuple') throw mismatch('tuple', this.qtype);
    return this.data.fields;
  }

  toOperator(): ExprOperator {
    if (this.data.kind !== 'operator') throw mismatch(EXPR_OPERATOR.name, this.qtype);
    return this.data.op;
  }

  /** Short human-readable rendering used in error messages. */
  repr(): string {
    const d = this.data;
    switch (d.kind) {
      case 'number':
        if (this.qtype === INT32) return String(d.value);
        return `${this.qtype.name.toLowerCase()}{${d.value}}`;
      case 'bigint':
        return `int64{${d.value}}`;
      case 'boolean':
        return String(d.value);
      case 'text':
        return `'${d.value}'`;
      case 'bytes':
        return `b'${Buffer.from(d.value).toString('hex')}'`;
      case 'unit':
        return 'unit';
      case 'tuple':
        return `(${d.fields.map((f) => f.repr()).join(', ')})`;
      case 'operator':
        return d.op.displayName;
    }
  }

  equals(other: TypedValue): boolean {
    return this.qtype === other.qtype && this.fingerprint === other.fingerprint;
  }
}

function mismatch(expected: string, actual: QType): InvalidArgumentError {
  return new InvalidArgumentError(`type mismatch: expected ${expected}, got ${actual.name}`);
}

function computeFingerprint(value: TypedValue): Fingerprint {
  const hasher = new FingerprintHasher('TypedValue').addString(value.qtype.name);
  const d = value.data;
  switch (d.kind) {
    case 'number':
      hasher.addNumber(d.value);
      break;
    case 'bigint':
      hasher.addBigInt(d.value);
      break;
    case 'boolean':
      hasher.addNumber(d.value ? 1 : 0);
      break;
    case 'text':
      hasher.addString(d.value);
      break;
    case 'bytes':
      hasher.addBytes(d.value);
      break;
    case 'unit':
      break;
    case 'tuple':
      for (const field of d.fields) hasher.addFingerprint(field.fingerprint);
      break;
    case 'operator':
      hasher.addFingerprint(d.op.fingerprint);
      break;
  }
  return hasher.finish();
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function float32(value: number): TypedValue {
  return new TypedValue(FLOAT32, { kind: 'number', value: Math.fround(value) });
}

export function float64(value: number): TypedValue {
  return new TypedValue(FLOAT64, { kind: 'number', value });
}

export function int32(value: number): TypedValue {
  if (!Number.isInteger(value) || (value | 0) !== value) {
    throw new InvalidArgumentError(`expected an int32, got ${value}`);
  }
  return new TypedValue(INT32, { kind: 'number', value });
}

export function int64(value: bigint): TypedValue {
  return new TypedValue(INT64, { kind: 'bigint', value: BigInt.asIntN(64, value) });
}

export function boolean(value: boolean): TypedValue {
  return new TypedValue(BOOLEAN, { kind: 'boolean', value });
}

export function text(value: string): TypedValue {
  return new TypedValue(TEXT, { kind: 'text', value });
}

export function bytes(value: Uint8Array): TypedValue {
  return new TypedValue(BYTES, { kind: 'bytes', value: value.slice() });
}

export function unit(): TypedValue {
  return new TypedValue(UNIT, { kind: 'unit' });
}

export function makeTuple(...fields: TypedValue[]): TypedValue {
  return new TypedValue(
    tupleQType(fields.map((f) => f.qtype)),
    { kind: 'tuple', fields: Object.freeze([...fields]) },
  );
}

export function operatorValue(op: ExprOperator): TypedValue {
  return new TypedValue(EXPR_OPERATOR, { kind: 'operator', op });
}
