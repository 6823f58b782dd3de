// ============================================================================
// @dagwire/serialization — Codec Registry
// ============================================================================
//
// Maps value types to value encoders and codec names to value decoders.
// Encoders are found by exact qtype first, then by specialization key, so
// one encoder can serve a whole family of parametric types (all tuples).
//
// Fill the registry at start-up and freeze() it; a frozen registry is
// read-only and may be shared across encoders and decoders.
// ============================================================================

import {
  FailedPreconditionError,
  InvalidArgumentError,
  type QType,
  UnimplementedError,
  logger,
} from '@dagwire/core';
import type { CodecLookup, ValueDecoder, ValueEncoder } from './types.js';

export class CodecRegistry {
  private encodersByQType = new Map<QType, ValueEncoder>();
  private encodersByKey = new Map<string, ValueEncoder>();
  private decoders = new Map<string, ValueDecoder>();
  private frozen = false;

  registerValueEncoderByQType(qtype: QType, encoder: ValueEncoder): this {
    this.ensureMutable();
    if (this.encodersByQType.has(qtype)) {
      throw new InvalidArgumentError(
        `value_encoder for qtype=${qtype.name} has been already registered`,
      );
    }
    this.encodersByQType.set(qtype, encoder);
    return this;
  }

  registerValueEncoderByKey(specializationKey: string, encoder: ValueEncoder): this {
    this.ensureMutable();
    if (specializationKey === '') {
      throw new InvalidArgumentError('specialization_key is empty');
    }
    if (this.encodersByKey.has(specializationKey)) {
      throw new InvalidArgumentError(
        `value_encoder for specialization_key='${specializationKey}' has been already registered`,
      );
    }
    this.encodersByKey.set(specializationKey, encoder);
    return this;
  }

  registerValueDecoder(codecName: string, decoder: ValueDecoder): this {
    this.ensureMutable();
    if (codecName === '') {
      throw new InvalidArgumentError('codec name is empty');
    }
    if (this.decoders.has(codecName)) {
      throw new InvalidArgumentError(
        `value_decoder for codec_name='${codecName}' has been already registered`,
      );
    }
    this.decoders.set(codecName, decoder);
    return this;
  }

  freeze(): this {
    this.frozen = true;
    logger.debug('codec registry frozen', {
      qtypes: this.encodersByQType.size,
      keys: this.encodersByKey.size,
      codecs: this.decoders.size,
    });
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  /** Registered codec names, sorted. */
  codecNames(): string[] {
    return [...this.decoders.keys()].sort();
  }

  /** Dispatches to the encoder registered for the value's type. */
  readonly valueEncoder: ValueEncoder = (value, encoder) => {
    const byQType = this.encodersByQType.get(value.qtype);
    if (byQType !== undefined) return byQType(value, encoder);
    const key = value.qtype.specializationKey;
    const byKey = key === '' ? undefined : this.encodersByKey.get(key);
    if (byKey !== undefined) return byKey(value, encoder);
    throw new UnimplementedError(
      `cannot serialize value: qtype=${value.qtype.name}, specialization_key='${key}': ${value.repr()}`,
    );
  };

  readonly codecLookup: CodecLookup = (codecName) => {
    const decoder = this.decoders.get(codecName);
    if (decoder === undefined) {
      throw new InvalidArgumentError(`unknown codec: "${codecName}"`);
    }
    return decoder;
  };

  private ensureMutable() {
    if (this.frozen) {
      throw new FailedPreconditionError('codec registry is frozen');
    }
  }
}
