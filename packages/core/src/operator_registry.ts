// ============================================================================
// @dagwire/core — Operator Registry
// ============================================================================
//
// Populated once during start-up, then frozen. After freeze() the registry
// only serves lookups, so one instance can be shared by any number of
// encoders and decoders.
// ============================================================================

import { FailedPreconditionError, InvalidArgumentError, NotFoundError } from './errors.js';
import type { ExprAttributes } from './expr.js';
import { type Fingerprint, FingerprintHasher } from './fingerprint.js';
import { ExprOperator } from './operator.js';

export class OperatorRegistry {
  private operators = new Map<string, ExprOperator>();
  private frozen = false;

  /**
   * Register an implementation under `name` and return a RegisteredOperator
   * that refers to it.
   */
  register(name: string, impl: ExprOperator): RegisteredOperator {
    if (this.frozen) {
      throw new FailedPreconditionError(`operator registry is frozen; cannot register '${name}'`);
    }
    if (name === '') {
      throw new InvalidArgumentError('operator name is empty');
    }
    if (this.operators.has(name)) {
      throw new FailedPreconditionError(`operator '${name}' already exists`);
    }
    this.operators.set(name, impl);
    return new RegisteredOperator(name, this);
  }

  has(name: string): boolean {
    return this.operators.has(name);
  }

  /** Implementation registered under `name`. */
  lookupImpl(name: string): ExprOperator {
    const impl = this.operators.get(name);
    if (impl === undefined) {
      throw new NotFoundError(`operator '${name}' not found`);
    }
    return impl;
  }

  /** A reference to the operator registered under `name`. */
  lookup(name: string): RegisteredOperator {
    const impl = this.lookupImpl(name);
    return new RegisteredOperator(name, this, impl);
  }

  names(): string[] {
    return [...this.operators.keys()].sort();
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }
}

/**
 * A named reference to an operator in a registry. The fingerprint covers
 * the name only, so references to the same name match across registries
 * whatever implementation each one holds.
 */
export class RegisteredOperator extends ExprOperator {
  private readonly impl: ExprOperator;
  private readonly nameFingerprint: Fingerprint;

  constructor(
    name: string,
    public readonly registry: OperatorRegistry,
    impl?: ExprOperator,
  ) {
    const resolved = impl ?? registry.lookupImpl(name);
    super(name, resolved.signature, resolved.doc);
    this.impl = resolved;
    this.nameFingerprint = new FingerprintHasher('RegisteredOperator').addString(name).finish();
  }

  override get fingerprint(): Fingerprint {
    return this.nameFingerprint;
  }

  inferAttributes(inputs: readonly ExprAttributes[]): ExprAttributes {
    return this.impl.inferAttributes(inputs);
  }
}
