// ============================================================================
// @dagwire/core — Expression Nodes
// ============================================================================
//
// Expressions are immutable DAGs. Each node's fingerprint is computed from
// its kind and content (children by fingerprint), so structurally equal
// sub-expressions share a fingerprint no matter how they were built.
// ============================================================================

import { InvalidArgumentError, withContext } from './errors.js';
import { type Fingerprint, FingerprintHasher } from './fingerprint.js';
import { type ExprOperator, validateDepsCount } from './operator.js';
import type { OperatorRegistry } from './operator_registry.js';
import type { QType } from './qtype.js';
import type { TypedValue } from './typed_value.js';

/**
 * Static knowledge about a node: its output type and, for constant
 * sub-expressions, its value.
 */
export interface ExprAttributes {
  readonly qtype?: QType;
  readonly qvalue?: TypedValue;
}

interface ExprNodeBase {
  readonly fingerprint: Fingerprint;
  readonly attributes: ExprAttributes;
}

export interface LiteralNode extends ExprNodeBase {
  readonly kind: 'literal';
  readonly value: TypedValue;
}

export interface LeafNode extends ExprNodeBase {
  readonly kind: 'leaf';
  readonly key: string;
}

export interface PlaceholderNode extends ExprNodeBase {
  readonly kind: 'placeholder';
  readonly key: string;
}

export interface OperatorNode extends ExprNodeBase {
  readonly kind: 'operator';
  readonly op: ExprOperator;
  readonly deps: readonly ExprNode[];
}

export type ExprNode = LiteralNode | LeafNode | PlaceholderNode | OperatorNode;

const NO_ATTRIBUTES: ExprAttributes = Object.freeze({});

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function literal(value: TypedValue): LiteralNode {
  return Object.freeze({
    kind: 'literal',
    value,
    fingerprint: new FingerprintHasher('LiteralNode').addFingerprint(value.fingerprint).finish(),
    attributes: Object.freeze({ qtype: value.qtype, qvalue: value }),
  });
}

export function leaf(key: string): LeafNode {
  return Object.freeze({
    kind: 'leaf',
    key,
    fingerprint: new FingerprintHasher('LeafNode').addString(key).finish(),
    attributes: NO_ATTRIBUTES,
  });
}

export function placeholder(key: string): PlaceholderNode {
  return Object.freeze({
    kind: 'placeholder',
    key,
    fingerprint: new FingerprintHasher('PlaceholderNode').addString(key).finish(),
    attributes: NO_ATTRIBUTES,
  });
}

export interface MakeOpNodeOptions {
  /** Compute the node's attributes through the operator. Default: true. */
  inferAttributes?: boolean;
}

/**
 * Build an operator node, checking the dependency count against the
 * operator's signature.
 */
export function makeOpNode(
  op: ExprOperator,
  deps: readonly ExprNode[],
  options: MakeOpNodeOptions = {},
): OperatorNode {
  try {
    validateDepsCount(op.signature, deps.length);
  } catch (err) {
    const memo = new Map<Fingerprint, string>();
    const args = deps.map((d) => reprNode(d, memo)).join(', ');
    throw withContext(err, `while calling ${op.displayName} with args {${args}}`);
  }
  const attributes =
    options.inferAttributes === false
      ? NO_ATTRIBUTES
      : Object.freeze(op.inferAttributes(deps.map((d) => d.attributes)));
  return unsafeMakeOperatorNode(op, deps, attributes);
}

/**
 * Build an operator node as given: no signature check, no inference.
 */
export function unsafeMakeOperatorNode(
  op: ExprOperator,
  deps: readonly ExprNode[],
  attributes: ExprAttributes = NO_ATTRIBUTES,
): OperatorNode {
  const hasher = new FingerprintHasher('OperatorNode').addFingerprint(op.fingerprint);
  for (const dep of deps) hasher.addFingerprint(dep.fingerprint);
  return Object.freeze({
    kind: 'operator',
    op,
    deps: Object.freeze([...deps]),
    fingerprint: hasher.finish(),
    attributes,
  });
}

/**
 * Call an operator, given directly or by its registered name.
 */
export function callOp(
  op: ExprOperator | string,
  deps: readonly ExprNode[],
  registry?: OperatorRegistry,
): OperatorNode {
  if (typeof op === 'string') {
    if (registry === undefined) {
      throw new InvalidArgumentError(`cannot resolve operator '${op}' without a registry`);
    }
    return makeOpNode(registry.lookup(op), deps);
  }
  return makeOpNode(op, deps);
}

// ---------------------------------------------------------------------------
// Traversal
// ---------------------------------------------------------------------------

function depsOf(node: ExprNode): readonly ExprNode[] {
  return node.kind === 'operator' ? node.deps : [];
}

/**
 * Distinct nodes of the DAG, every dependency before its dependents.
 * Nodes are distinguished by fingerprint.
 */
export function postOrder(root: ExprNode): ExprNode[] {
  const result: ExprNode[] = [];
  const visited = new Set<Fingerprint>([root.fingerprint]);
  const stack: Array<{ node: ExprNode; next: number }> = [{ node: root, next: 0 }];
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    const deps = depsOf(top.node);
    if (top.next < deps.length) {
      const dep = deps[top.next++];
      if (!visited.has(dep.fingerprint)) {
        visited.add(dep.fingerprint);
        stack.push({ node: dep, next: 0 });
      }
    } else {
      stack.pop();
      result.push(top.node);
    }
  }
  return result;
}

/** Sorted, distinct leaf keys. */
export function getLeafKeys(expr: ExprNode): string[] {
  const keys = new Set<string>();
  for (const node of postOrder(expr)) {
    if (node.kind === 'leaf') keys.add(node.key);
  }
  return [...keys].sort();
}

/** Sorted, distinct placeholder keys. */
export function getPlaceholderKeys(expr: ExprNode): string[] {
  const keys = new Set<string>();
  for (const node of postOrder(expr)) {
    if (node.kind === 'placeholder') keys.add(node.key);
  }
  return [...keys].sort();
}

/** Longest rendering kept for any one node; longer ones end in `...`. */
const REPR_LIMIT = 256;

/**
 * Short rendering for error messages. Shared sub-expressions are rendered
 * once per call and each node's text is capped.
 */
export function exprRepr(expr: ExprNode): string {
  return reprNode(expr, new Map());
}

function reprNode(expr: ExprNode, memo: Map<Fingerprint, string>): string {
  const cached = memo.get(expr.fingerprint);
  if (cached !== undefined) return cached;
  let out = renderNode(expr, memo);
  if (out.length > REPR_LIMIT) out = `${out.slice(0, REPR_LIMIT - 3)}...`;
  memo.set(expr.fingerprint, out);
  return out;
}

function renderNode(expr: ExprNode, memo: Map<Fingerprint, string>): string {
  switch (expr.kind) {
    case 'literal':
      return expr.value.repr();
    case 'leaf':
      return `L.${expr.key}`;
    case 'placeholder':
      return `P.${expr.key}`;
    case 'operator':
      return `${expr.op.displayName}(${expr.deps.map((d) => reprNode(d, memo)).join(', ')})`;
  }
}
