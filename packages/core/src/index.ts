// ============================================================================
// @dagwire/core — Public API
// ============================================================================

// Errors
export {
  DagwireError,
  InvalidArgumentError,
  FailedPreconditionError,
  NotFoundError,
  UnimplementedError,
  withContext,
  annotate,
  hasStatus,
} from './errors.js';
export type { StatusCode } from './errors.js';

// Logging
export * as logger from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';

// Fingerprints
export { FingerprintHasher } from './fingerprint.js';
export type { Fingerprint } from './fingerprint.js';

// Types & values
export {
  FLOAT32,
  FLOAT64,
  INT32,
  INT64,
  BOOLEAN,
  TEXT,
  BYTES,
  UNIT,
  EXPR_OPERATOR,
  SCALAR_QTYPES,
  TUPLE_SPECIALIZATION_KEY,
  tupleQType,
  isTupleQType,
  scalarQTypeByName,
} from './qtype.js';
export type { QType } from './qtype.js';
export {
  TypedValue,
  float32,
  float64,
  int32,
  int64,
  boolean,
  text,
  bytes,
  unit,
  makeTuple,
  operatorValue,
} from './typed_value.js';
export type { ValueData } from './typed_value.js';

// Operators
export {
  ExprOperator,
  BackendOperator,
  MakeTupleOperator,
  MAKE_TUPLE_OPERATOR_NAME,
  parseSignature,
  signatureSpec,
  validateDepsCount,
} from './operator.js';
export type { ExprOperatorSignature, SignatureParameter } from './operator.js';
export { OperatorRegistry, RegisteredOperator } from './operator_registry.js';

// Expressions
export {
  literal,
  leaf,
  placeholder,
  makeOpNode,
  unsafeMakeOperatorNode,
  callOp,
  postOrder,
  getLeafKeys,
  getPlaceholderKeys,
  exprRepr,
} from './expr.js';
export type {
  ExprNode,
  LiteralNode,
  LeafNode,
  PlaceholderNode,
  OperatorNode,
  ExprAttributes,
  MakeOpNodeOptions,
} from './expr.js';
