// ============================================================================
// @dagwire/core — Content Fingerprints
// ============================================================================
//
// A fingerprint is a 128-bit content identity, rendered as 32 hex chars.
// Fields are framed with a type tag and a length so that ("ab", "c") and
// ("a", "bc") never collide.
// ============================================================================

import { createHash, type Hash } from 'node:crypto';

/** 128-bit content identity as lowercase hex. */
export type Fingerprint = string;

const TAG_STRING = 0x01;
const TAG_NUMBER = 0x02;
const TAG_BIGINT = 0x03;
const TAG_BYTES = 0x04;
const TAG_FINGERPRINT = 0x05;

const sharedTextEncoder = new TextEncoder();

/**
 * Incremental fingerprint builder over SHA-256.
 *
 * @example
 * ```ts
 * const fp = new FingerprintHasher('leaf').addString('x').finish();
 * ```
 */
export class FingerprintHasher {
  private hash: Hash;
  private scratch = new DataView(new ArrayBuffer(8));

  constructor(salt: string) {
    this.hash = createHash('sha256');
    this.addString(salt);
  }

  addString(value: string): this {
    const utf8 = sharedTextEncoder.encode(value);
    this.writeTag(TAG_STRING, utf8.length);
    this.hash.update(utf8);
    return this;
  }

  /** Numbers are hashed by their float64 bit pattern, so -0 differs from 0. */
  addNumber(value: number): this {
    this.writeTag(TAG_NUMBER, 8);
    this.scratch.setFloat64(0, value, true);
    this.hash.update(new Uint8Array(this.scratch.buffer.slice(0)));
    return this;
  }

  addBigInt(value: bigint): this {
    const text = value.toString(16);
    this.writeTag(TAG_BIGINT, text.length);
    this.hash.update(text);
    return this;
  }

  addBytes(value: Uint8Array): this {
    this.writeTag(TAG_BYTES, value.length);
    this.hash.update(value);
    return this;
  }

  addFingerprint(value: Fingerprint): this {
    this.writeTag(TAG_FINGERPRINT, value.length);
    this.hash.update(value);
    return this;
  }

  finish(): Fingerprint {
    return this.hash.digest('hex').slice(0, 32);
  }

  private writeTag(tag: number, length: number) {
    const header = new Uint8Array(5);
    header[0] = tag;
    new DataView(header.buffer).setUint32(1, length, true);
    this.hash.update(header);
  }
}
