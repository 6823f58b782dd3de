// ============================================================================
// @dagwire/serialization — Byte Buffers
// ============================================================================
//
// ByteWriter grows by doubling; ByteReader walks a Uint8Array and throws
// InvalidArgumentError on truncated or malformed input. Both are shared by
// the binary container format and the built-in codec payloads.
// ============================================================================

import { InvalidArgumentError } from '@dagwire/core';

const sharedTextEncoder = new TextEncoder();
const sharedTextDecoder = new TextDecoder('utf-8', { fatal: true });

export class ByteWriter {
  private buf: Uint8Array;
  private view: DataView;
  private pos = 0;

  constructor(initialCapacity = 256) {
    this.buf = new Uint8Array(initialCapacity);
    this.view = new DataView(this.buf.buffer);
  }

  get length() {
    return this.pos;
  }

  /** Return a trimmed copy of the written bytes. */
  toUint8Array(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }

  private ensure(extra: number) {
    const needed = this.pos + extra;
    if (needed <= this.buf.length) return;
    let cap = this.buf.length;
    while (cap < needed) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.pos));
    this.buf = next;
    this.view = new DataView(next.buffer);
  }

  writeByte(b: number) {
    this.ensure(1);
    this.buf[this.pos++] = b;
  }

  writeBytes(bytes: Uint8Array) {
    this.ensure(bytes.length);
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  /** Unsigned LEB128, up to 32 bits. */
  writeVarint(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new InvalidArgumentError(`cannot write ${value} as an unsigned varint`);
    }
    this.ensure(5);
    let remaining = value;
    while (remaining > 127) {
      this.buf[this.pos++] = (remaining & 127) | 128;
      remaining = Math.floor(remaining / 128);
    }
    this.buf[this.pos++] = remaining;
  }

  /** Length-prefixed bytes. */
  writeBlob(bytes: Uint8Array) {
    this.writeVarint(bytes.length);
    this.writeBytes(bytes);
  }

  /** Length-prefixed UTF-8. */
  writeString(value: string) {
    this.writeBlob(sharedTextEncoder.encode(value));
  }

  writeUint32(value: number) {
    this.ensure(4);
    this.view.setUint32(this.pos, value, true);
    this.pos += 4;
  }

  writeInt32(value: number) {
    this.ensure(4);
    this.view.setInt32(this.pos, value, true);
    this.pos += 4;
  }

  writeFloat32(value: number) {
    this.ensure(4);
    this.view.setFloat32(this.pos, value, true);
    this.pos += 4;
  }

  writeFloat64(value: number) {
    this.ensure(8);
    this.view.setFloat64(this.pos, value, true);
    this.pos += 8;
  }

  writeBigInt64(value: bigint) {
    this.ensure(8);
    this.view.setBigInt64(this.pos, value, true);
    this.pos += 8;
  }
}

export class ByteReader {
  private view: DataView;
  private pos = 0;

  constructor(private readonly buf: Uint8Array) {
    this.view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  get offset() {
    return this.pos;
  }

  get remaining() {
    return this.buf.length - this.pos;
  }

  atEnd(): boolean {
    return this.pos >= this.buf.length;
  }

  expectEnd() {
    if (!this.atEnd()) {
      throw new InvalidArgumentError(`unexpected trailing data at offset ${this.pos}`);
    }
  }

  private require(n: number) {
    if (this.pos + n > this.buf.length) {
      throw new InvalidArgumentError(`unexpected end of data at offset ${this.pos}`);
    }
  }

  readByte(): number {
    this.require(1);
    return this.buf[this.pos++];
  }

  readBytes(n: number): Uint8Array {
    this.require(n);
    const out = this.buf.slice(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  readVarint(): number {
    let result = 0;
    let scale = 1;
    for (let i = 0; i < 5; i++) {
      const b = this.readByte();
      result += (b & 127) * scale;
      if ((b & 128) === 0) {
        if (result > 0xffffffff) break;
        return result;
      }
      scale *= 128;
    }
    throw new InvalidArgumentError(`varint too long at offset ${this.pos}`);
  }

  readBlob(): Uint8Array {
    return this.readBytes(this.readVarint());
  }

  readString(): string {
    const start = this.pos;
    const bytes = this.readBlob();
    try {
      return sharedTextDecoder.decode(bytes);
    } catch {
      throw new InvalidArgumentError(`invalid UTF-8 string at offset ${start}`);
    }
  }

  /**
   * Consume `tag` if the data starts with it as a string; otherwise leave
   * the position untouched and return false.
   */
  tryReadTag(tag: string): boolean {
    const start = this.pos;
    try {
      if (this.readString() === tag) return true;
    } catch (err) {
      if (!(err instanceof InvalidArgumentError)) throw err;
    }
    this.pos = start;
    return false;
  }

  readUint32(): number {
    this.require(4);
    const v = this.view.getUint32(this.pos, true);
    this.pos += 4;
    return v;
  }

  readInt32(): number {
    this.require(4);
    const v = this.view.getInt32(this.pos, true);
    this.pos += 4;
    return v;
  }

  readFloat32(): number {
    this.require(4);
    const v = this.view.getFloat32(this.pos, true);
    this.pos += 4;
    return v;
  }

  readFloat64(): number {
    this.require(8);
    const v = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return v;
  }

  readBigInt64(): bigint {
    this.require(8);
    const v = this.view.getBigInt64(this.pos, true);
    this.pos += 8;
    return v;
  }
}
