// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Byte-order-aware random-access reads over an immutable byte source.
 *
 * Every read takes an explicit absolute offset; the cursor holds no
 * position, so one instance can be shared by any number of readers.
 */

import { TiffError } from "./errors.js";

/** A `numerator / denominator` pair as stored by RATIONAL and SRATIONAL fields. */
export interface Rational {
  numerator: number;
  denominator: number;
}

export class ByteCursor {
  readonly bytes: Uint8Array;
  readonly littleEndian: boolean;
  private readonly view: DataView;

  constructor(bytes: Uint8Array, littleEndian: boolean = true) {
    this.bytes = bytes;
    this.littleEndian = littleEndian;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /** Wrap an ArrayBuffer or a byte view without copying. */
  static from(source: ArrayBuffer | Uint8Array, littleEndian: boolean = true): ByteCursor {
    const bytes = source instanceof Uint8Array ? source : new Uint8Array(source);
    return new ByteCursor(bytes, littleEndian);
  }

  get length(): number {
    return this.bytes.byteLength;
  }

  /** The same bytes read with another byte order. */
  withByteOrder(littleEndian: boolean): ByteCursor {
    return littleEndian === this.littleEndian ? this : new ByteCursor(this.bytes, littleEndian);
  }

  /** True when `length` bytes starting at `offset` lie inside the source. */
  contains(offset: number, length: number): boolean {
    return (
      Number.isInteger(offset) &&
      Number.isInteger(length) &&
      offset >= 0 &&
      length >= 0 &&
      offset + length <= this.bytes.byteLength
    );
  }

  /**
   * Throw `OutOfRange` unless `[offset, offset + length)` lies inside the
   * source.
   */
  check(offset: number, length: number): void {
    if (!this.contains(offset, length)) {
      throw new TiffError(
        "OutOfRange",
        `Read of ${length} byte(s) at offset ${offset} exceeds stream length ${this.bytes.byteLength}`,
        { offset },
      );
    }
  }

  readU8(offset: number): number {
    this.check(offset, 1);
    return this.view.getUint8(offset);
  }

  readI8(offset: number): number {
    this.check(offset, 1);
    return this.view.getInt8(offset);
  }

  readU16(offset: number): number {
    this.check(offset, 2);
    return this.view.getUint16(offset, this.littleEndian);
  }

  readI16(offset: number): number {
    this.check(offset, 2);
    return this.view.getInt16(offset, this.littleEndian);
  }

  readU32(offset: number): number {
    this.check(offset, 4);
    return this.view.getUint32(offset, this.littleEndian);
  }

  readI32(offset: number): number {
    this.check(offset, 4);
    return this.view.getInt32(offset, this.littleEndian);
  }

  readF32(offset: number): number {
    this.check(offset, 4);
    return this.view.getFloat32(offset, this.littleEndian);
  }

  readF64(offset: number): number {
    this.check(offset, 8);
    return this.view.getFloat64(offset, this.littleEndian);
  }

  readRational(offset: number): Rational {
    this.check(offset, 8);
    return {
      numerator: this.view.getUint32(offset, this.littleEndian),
      denominator: this.view.getUint32(offset + 4, this.littleEndian),
    };
  }

  readSRational(offset: number): Rational {
    this.check(offset, 8);
    return {
      numerator: this.view.getInt32(offset, this.littleEndian),
      denominator: this.view.getInt32(offset + 4, this.littleEndian),
    };
  }

  /** A view (not a copy) of `length` bytes at `offset`. */
  slice(offset: number, length: number): Uint8Array {
    this.check(offset, length);
    return this.bytes.subarray(offset, offset + length);
  }
}
