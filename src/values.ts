// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Tag value resolution and typed accessors.
 *
 * `resolveValue` turns an entry into a tagged value determined only by the
 * entry's type and count, never by the tag id. The accessors on top of it
 * either return the stored type or apply the one documented widening:
 * BYTE, SHORT and LONG read as unsigned integers.
 */

import { ByteCursor, type Rational } from "./byte-cursor.js";
import { TiffError } from "./errors.js";
import type { Ifd, IfdEntry } from "./ifd.js";
import {
  TIFF_TYPE_ASCII,
  TIFF_TYPE_BYTE,
  TIFF_TYPE_DOUBLE,
  TIFF_TYPE_FLOAT,
  TIFF_TYPE_LONG,
  TIFF_TYPE_RATIONAL,
  TIFF_TYPE_SBYTE,
  TIFF_TYPE_SHORT,
  TIFF_TYPE_SLONG,
  TIFF_TYPE_SRATIONAL,
  TIFF_TYPE_SSHORT,
  TIFF_TYPE_UNDEFINED,
  tagName,
} from "./tags.js";

export type { Rational } from "./byte-cursor.js";

/** A resolved tag value, discriminated by field type. */
export type ResolvedValue =
  | { type: "byte"; values: number[] }
  | { type: "ascii"; values: string[] }
  | { type: "short"; values: number[] }
  | { type: "long"; values: number[] }
  | { type: "rational"; values: Rational[] }
  | { type: "sbyte"; values: number[] }
  | { type: "undefined"; bytes: Uint8Array }
  | { type: "sshort"; values: number[] }
  | { type: "slong"; values: number[] }
  | { type: "srational"; values: Rational[] }
  | { type: "float"; values: number[] }
  | { type: "double"; values: number[] };

function readNumbers(count: number, width: number, base: number, read: (offset: number) => number): number[] {
  const values = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    values[i] = read(base + i * width);
  }
  return values;
}

function readRationals(count: number, base: number, read: (offset: number) => Rational): Rational[] {
  const values = new Array<Rational>(count);
  for (let i = 0; i < count; i++) {
    values[i] = read(base + i * 8);
  }
  return values;
}

/**
 * Split ASCII bytes on NUL into strings. A missing final terminator is
 * tolerated; the empty string after the final NUL is not reported.
 */
export function decodeAscii(bytes: Uint8Array): string[] {
  const strings: string[] = [];
  let start = 0;
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] === 0) {
      strings.push(latin1(bytes.subarray(start, i)));
      start = i + 1;
    }
  }
  if (start < bytes.length) {
    strings.push(latin1(bytes.subarray(start)));
  }
  return strings;
}

function latin1(bytes: Uint8Array): string {
  let s = "";
  for (const b of bytes) s += String.fromCharCode(b);
  return s;
}

/**
 * Resolve an entry's value, reading inline data or following its offset.
 *
 * @throws TiffError `OutOfRange` when the value lies outside the stream.
 */
export function resolveValue(cursor: ByteCursor, entry: IfdEntry): ResolvedValue {
  const { count, valueOffset: base } = entry;
  cursor.check(base, entry.byteLength);

  switch (entry.type) {
    case TIFF_TYPE_BYTE:
      return { type: "byte", values: Array.from(cursor.slice(base, count)) };
    case TIFF_TYPE_ASCII:
      return { type: "ascii", values: decodeAscii(cursor.slice(base, count)) };
    case TIFF_TYPE_SHORT:
      return { type: "short", values: readNumbers(count, 2, base, (o) => cursor.readU16(o)) };
    case TIFF_TYPE_LONG:
      return { type: "long", values: readNumbers(count, 4, base, (o) => cursor.readU32(o)) };
    case TIFF_TYPE_RATIONAL:
      return { type: "rational", values: readRationals(count, base, (o) => cursor.readRational(o)) };
    case TIFF_TYPE_SBYTE:
      return { type: "sbyte", values: readNumbers(count, 1, base, (o) => cursor.readI8(o)) };
    case TIFF_TYPE_SSHORT:
      return { type: "sshort", values: readNumbers(count, 2, base, (o) => cursor.readI16(o)) };
    case TIFF_TYPE_SLONG:
      return { type: "slong", values: readNumbers(count, 4, base, (o) => cursor.readI32(o)) };
    case TIFF_TYPE_SRATIONAL:
      return { type: "srational", values: readRationals(count, base, (o) => cursor.readSRational(o)) };
    case TIFF_TYPE_FLOAT:
      return { type: "float", values: readNumbers(count, 4, base, (o) => cursor.readF32(o)) };
    case TIFF_TYPE_DOUBLE:
      return { type: "double", values: readNumbers(count, 8, base, (o) => cursor.readF64(o)) };
    case TIFF_TYPE_UNDEFINED:
    default:
      return { type: "undefined", bytes: cursor.slice(base, entry.byteLength).slice() };
  }
}

// ── Accessors ───────────────────────────────────────────────────────

/**
 * Look up and resolve `tag` in `ifd`.
 *
 * @throws TiffError `TagNotFound` when absent, `OutOfRange` when the entry
 *   was skipped as unreadable or its value lies outside the stream.
 */
export function getValue(cursor: ByteCursor, ifd: Ifd, tag: number): ResolvedValue {
  const entry = ifd.get(tag);
  if (entry === undefined) {
    const skipped = ifd.unreadable(tag);
    if (skipped !== undefined) {
      throw new TiffError("OutOfRange", skipped.message, { tag, offset: skipped.offset });
    }
    throw new TiffError("TagNotFound", `${tagName(tag)} not present in directory at ${ifd.offset}`, { tag });
  }
  return resolveValue(cursor, entry);
}

function mismatch(tag: number, wanted: string, value: ResolvedValue): TiffError {
  return new TiffError("TypeMismatch", `${tagName(tag)} is stored as ${value.type}, not ${wanted}`, { tag });
}

/** Widen BYTE, SHORT or LONG values to plain unsigned integers. */
export function asUnsignedArray(value: ResolvedValue, tag: number): number[] {
  switch (value.type) {
    case "byte":
    case "short":
    case "long":
      return value.values;
    default:
      throw mismatch(tag, "an unsigned integer", value);
  }
}

export function getUnsignedArray(cursor: ByteCursor, ifd: Ifd, tag: number): number[] {
  return asUnsignedArray(getValue(cursor, ifd, tag), tag);
}

/** First value of an unsigned integer tag. */
export function getUnsigned(cursor: ByteCursor, ifd: Ifd, tag: number): number {
  const values = getUnsignedArray(cursor, ifd, tag);
  if (values.length === 0) {
    throw new TiffError("InconsistentLayout", `${tagName(tag)} has no values`, { tag });
  }
  return values[0];
}

/** ASCII strings joined with newlines. */
export function getAscii(cursor: ByteCursor, ifd: Ifd, tag: number): string {
  const value = getValue(cursor, ifd, tag);
  if (value.type !== "ascii") throw mismatch(tag, "ascii", value);
  return value.values.join("\n");
}

export function getRationals(cursor: ByteCursor, ifd: Ifd, tag: number): Rational[] {
  const value = getValue(cursor, ifd, tag);
  if (value.type !== "rational" && value.type !== "srational") throw mismatch(tag, "rational", value);
  return value.values;
}

/**
 * Raw bytes of a BYTE or UNDEFINED tag, such as an embedded ICC profile.
 * The result is a copy; the stream is never written through it.
 */
export function getBytes(cursor: ByteCursor, ifd: Ifd, tag: number): Uint8Array {
  const entry = ifd.get(tag);
  const value = getValue(cursor, ifd, tag);
  if (value.type === "undefined") return value.bytes;
  if (value.type === "byte" && entry !== undefined) return cursor.slice(entry.valueOffset, entry.count).slice();
  throw mismatch(tag, "bytes", value);
}

/** Numeric view of any numeric value; rationals become quotients. */
export function asNumbers(value: ResolvedValue): number[] {
  switch (value.type) {
    case "ascii":
      return [];
    case "undefined":
      return Array.from(value.bytes);
    case "rational":
    case "srational":
      return value.values.map((r) => r.numerator / r.denominator);
    default:
      return value.values;
  }
}
