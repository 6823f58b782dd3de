// ============================================================================
// @dagwire/core — Value Types
// ============================================================================

/**
 * A value type. QTypes are interned: two values have the same type iff
 * their `qtype` fields are the same object.
 */
export interface QType {
  readonly name: string;
  /** Groups parametric types (all tuples share one key); empty for scalars. */
  readonly specializationKey: string;
  /** Field types, for tuple qtypes. */
  readonly fields?: readonly QType[];
}

function scalar(name: string): QType {
  return Object.freeze({ name, specializationKey: '' });
}

export const FLOAT32 = scalar('FLOAT32');
export const FLOAT64 = scalar('FLOAT64');
export const INT32 = scalar('INT32');
export const INT64 = scalar('INT64');
export const BOOLEAN = scalar('BOOLEAN');
export const TEXT = scalar('TEXT');
export const BYTES = scalar('BYTES');
export const UNIT = scalar('UNIT');
export const EXPR_OPERATOR = scalar('EXPR_OPERATOR');

export const SCALAR_QTYPES: readonly QType[] = [
  FLOAT32,
  FLOAT64,
  INT32,
  INT64,
  BOOLEAN,
  TEXT,
  BYTES,
  UNIT,
];

export const TUPLE_SPECIALIZATION_KEY = '::dagwire::TupleQType';

const tupleQTypes = new Map<string, QType>();

/**
 * Get the interned tuple qtype for the given field types.
 */
export function tupleQType(fields: readonly QType[]): QType {
  const name = `tuple<${fields.map((f) => f.name).join(',')}>`;
  let qtype = tupleQTypes.get(name);
  if (qtype === undefined) {
    qtype = Object.freeze({
      name,
      specializationKey: TUPLE_SPECIALIZATION_KEY,
      fields: Object.freeze([...fields]),
    });
    tupleQTypes.set(name, qtype);
  }
  return qtype;
}

export function isTupleQType(qtype: QType): boolean {
  return qtype.specializationKey === TUPLE_SPECIALIZATION_KEY;
}

/**
 * Find a scalar qtype (or EXPR_OPERATOR) by name.
 */
export function scalarQTypeByName(name: string): QType | undefined {
  if (name === EXPR_OPERATOR.name) return EXPR_OPERATOR;
  return SCALAR_QTYPES.find((q) => q.name === name);
}
