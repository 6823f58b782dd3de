import { describe, expect, it } from 'vitest';
import { FailedPreconditionError, NotFoundError } from '../errors.js';
import {
  BackendOperator,
  MakeTupleOperator,
  parseSignature,
  signatureSpec,
  validateDepsCount,
} from '../operator.js';
import { OperatorRegistry, RegisteredOperator } from '../operator_registry.js';
import { FLOAT32, INT32, tupleQType } from '../qtype.js';
import { int32 } from '../typed_value.js';

describe('signatures', () => {
  it('parses positional and variadic parameters', () => {
    expect(parseSignature('x, y, *args').parameters).toEqual([
      { name: 'x', kind: 'positional' },
      { name: 'y', kind: 'positional' },
      { name: 'args', kind: 'variadic' },
    ]);
    expect(parseSignature('  ').parameters).toEqual([]);
  });

  it('renders back to its source string', () => {
    expect(signatureSpec(parseSignature('x,y ,  *args'))).toBe('x, y, *args');
  });

  it('rejects malformed specs', () => {
    expect(() => parseSignature('*a, b')).toThrow(
      'variadic parameter must be the last in signature "*a, b"',
    );
    expect(() => parseSignature('x, x')).toThrow(
      `duplicated parameter name 'x' in signature "x, x"`,
    );
    expect(() => parseSignature('1x')).toThrow(`illegal parameter name '1x' in signature "1x"`);
  });

  it('validates dependency counts', () => {
    expect(() => validateDepsCount(parseSignature('x, y'), 2)).not.toThrow();
    expect(() => validateDepsCount(parseSignature('x, y'), 1)).toThrow(
      'incorrect number of dependencies passed to an operator node: expected 2 but got 1',
    );
    expect(() => validateDepsCount(parseSignature('x, *rest'), 3)).not.toThrow();
    expect(() => validateDepsCount(parseSignature('x, *rest'), 0)).toThrow(
      'incorrect number of dependencies passed to an operator node: expected at least 1 but got 0',
    );
  });
});

describe('operators', () => {
  it('fingerprints by name, signature, doc and output type', () => {
    const a = new BackendOperator('math.add', 'x, y', '', FLOAT32);
    expect(a.fingerprint).toBe(new BackendOperator('math.add', 'x, y', '', FLOAT32).fingerprint);
    expect(a.fingerprint).not.toBe(new BackendOperator('math.sub', 'x, y', '', FLOAT32).fingerprint);
    expect(a.fingerprint).not.toBe(new BackendOperator('math.add', 'x, y', '', INT32).fingerprint);
    expect(a.fingerprint).not.toBe(new BackendOperator('math.add', 'x, y').fingerprint);
  });

  it('reports the backend output type once inputs are typed', () => {
    const op = new BackendOperator('math.add', 'x, y', '', FLOAT32);
    expect(op.inferAttributes([{ qtype: FLOAT32 }, { qtype: FLOAT32 }])).toEqual({
      qtype: FLOAT32,
    });
    expect(op.inferAttributes([{ qtype: FLOAT32 }, {}])).toEqual({});
  });

  it('infers tuple types and folds known values', () => {
    const op = new MakeTupleOperator();
    expect(op.inferAttributes([{ qtype: INT32 }, {}])).toEqual({});
    expect(op.inferAttributes([{ qtype: INT32 }]).qtype).toBe(tupleQType([INT32]));
    const folded = op.inferAttributes([{ qtype: INT32, qvalue: int32(3) }]);
    expect(folded.qvalue?.repr()).toBe('(3)');
  });
});

describe('OperatorRegistry', () => {
  const make = () => new OperatorRegistry();

  it('returns references that resolve to the implementation', () => {
    const registry = make();
    const impl = new BackendOperator('impl', 'x');
    const ref = registry.register('test.op', impl);
    expect(ref).toBeInstanceOf(RegisteredOperator);
    expect(ref.displayName).toBe('test.op');
    expect(signatureSpec(ref.signature)).toBe('x');
    expect(registry.lookupImpl('test.op')).toBe(impl);
    expect(registry.lookup('test.op').fingerprint).toBe(ref.fingerprint);
    expect(registry.names()).toEqual(['test.op']);
  });

  it('rejects duplicates and writes after freeze', () => {
    const registry = make();
    registry.register('a', new BackendOperator('a', ''));
    expect(() => registry.register('a', new BackendOperator('a', ''))).toThrow(
      "operator 'a' already exists",
    );
    registry.freeze();
    expect(registry.isFrozen()).toBe(true);
    expect(() => registry.register('b', new BackendOperator('b', ''))).toThrow(
      FailedPreconditionError,
    );
  });

  it('fingerprints references by name alone', () => {
    const first = make();
    const second = make();
    first.register('m.f', new BackendOperator('m.f', 'x', 'A'));
    second.register('m.f', new BackendOperator('m.f', 'x, y', 'B'));
    expect(first.lookup('m.f').fingerprint).toBe(second.lookup('m.f').fingerprint);
    expect(first.lookup('m.f').fingerprint).not.toBe(first.lookupImpl('m.f').fingerprint);
  });

  it('reports unknown names as not found', () => {
    expect(() => make().lookup('nope')).toThrow(NotFoundError);
    expect(() => make().lookup('nope')).toThrow("operator 'nope' not found");
  });
});
