// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Header and directory parsing.
 *
 * Structure errors that make the stream unusable (bad header, unreadable
 * entry count) are fatal. Problems confined to a single entry are recorded
 * as diagnostics on the directory and the entry is skipped.
 */

import { ByteCursor } from "./byte-cursor.js";
import { TiffError } from "./errors.js";
import { Ifd, type Diagnostic, type IfdEntry } from "./ifd.js";
import { TIFF_TYPE_UNDEFINED, tagName, typeWidth } from "./tags.js";

/** Classic TIFF version number. */
export const TIFF_MAGIC = 42;
export const HEADER_SIZE = 8;
export const IFD_ENTRY_SIZE = 12;
/** Values up to this many bytes are stored in the entry itself. */
export const INLINE_THRESHOLD = 4;

const BYTE_ORDER_LITTLE = 0x4949; // "II"
const BYTE_ORDER_BIG = 0x4d4d; // "MM"

export type ByteOrder = "little" | "big";

export interface TiffHeader {
  byteOrder: ByteOrder;
  littleEndian: boolean;
  magic: number;
  firstIfdOffset: number;
}

/**
 * Validate the 8-byte header and return it.
 *
 * The cursor's own byte order is irrelevant; the header declares it.
 */
export function parseHeader(cursor: ByteCursor): TiffHeader {
  if (cursor.length < 2) {
    throw new TiffError("UnexpectedEof", "Stream ends before the byte-order mark", { offset: 0 });
  }
  const mark = (cursor.readU8(0) << 8) | cursor.readU8(1);
  let littleEndian: boolean;
  if (mark === BYTE_ORDER_LITTLE) {
    littleEndian = true;
  } else if (mark === BYTE_ORDER_BIG) {
    littleEndian = false;
  } else {
    throw new TiffError(
      "InvalidHeader",
      `Unrecognised byte-order mark 0x${mark.toString(16).padStart(4, "0")}`,
      { offset: 0 },
    );
  }

  if (cursor.length < 4) {
    throw new TiffError("UnexpectedEof", "Stream ends before the version number", { offset: 2 });
  }
  const ordered = cursor.withByteOrder(littleEndian);
  const magic = ordered.readU16(2);
  if (magic !== TIFF_MAGIC) {
    throw new TiffError("InvalidHeader", `Unsupported TIFF version ${magic}`, { offset: 2 });
  }

  if (cursor.length < HEADER_SIZE) {
    throw new TiffError("UnexpectedEof", "Stream ends before the first IFD offset", { offset: 4 });
  }
  const firstIfdOffset = ordered.readU32(4);
  if (firstIfdOffset !== 0 && firstIfdOffset < HEADER_SIZE) {
    throw new TiffError("InvalidHeader", `First IFD offset ${firstIfdOffset} points into the header`, {
      offset: 4,
    });
  }

  return { byteOrder: littleEndian ? "little" : "big", littleEndian, magic, firstIfdOffset };
}

/**
 * Parse the directory at `offset`.
 *
 * An unreadable entry count is fatal. Entries that extend past the end of
 * the stream, or whose value does, are skipped with a diagnostic. Unknown
 * field types are kept as UNDEFINED over the raw value field. When a tag
 * id repeats, the first occurrence is kept.
 */
export function parseIfd(cursor: ByteCursor, offset: number): Ifd {
  const count = cursor.readU16(offset);
  const diagnostics: Diagnostic[] = [];
  const unreadable = new Map<number, Diagnostic>();
  const entries: IfdEntry[] = [];
  const seen = new Set<number>();

  const record = (d: Diagnostic): void => {
    diagnostics.push(d);
  };

  let pos = offset + 2;
  let parsed = 0;
  for (; parsed < count; parsed++, pos += IFD_ENTRY_SIZE) {
    if (!cursor.contains(pos, IFD_ENTRY_SIZE)) {
      record({
        kind: "OutOfRange",
        message: `Directory at ${offset} declares ${count} entries but the stream ends after ${parsed}`,
        offset: pos,
      });
      break;
    }

    const tag = cursor.readU16(pos);
    const rawType = cursor.readU16(pos + 2);
    const valueCount = cursor.readU32(pos + 4);
    const fieldOffset = pos + 8;

    if (seen.has(tag)) {
      record({
        kind: "InconsistentLayout",
        message: `Duplicate entry for ${tagName(tag)} ignored`,
        tag,
        offset: pos,
      });
      continue;
    }
    seen.add(tag);

    const width = typeWidth(rawType);
    if (width === undefined) {
      record({
        kind: "TypeMismatch",
        message: `${tagName(tag)} uses unknown field type ${rawType}; kept as raw bytes`,
        tag,
        offset: pos,
      });
      entries.push({
        tag,
        type: TIFF_TYPE_UNDEFINED,
        rawType,
        count: valueCount,
        fieldOffset,
        valueOffset: fieldOffset,
        byteLength: INLINE_THRESHOLD,
        inline: true,
      });
      continue;
    }

    const byteLength = valueCount * width;
    const inline = byteLength <= INLINE_THRESHOLD;
    const valueOffset = inline ? fieldOffset : cursor.readU32(fieldOffset);

    if (!inline && !cursor.contains(valueOffset, byteLength)) {
      const diagnostic: Diagnostic = {
        kind: "OutOfRange",
        message:
          `${tagName(tag)} value (${byteLength} bytes at offset ${valueOffset}) ` +
          `exceeds stream length ${cursor.length}`,
        tag,
        offset: valueOffset,
      };
      record(diagnostic);
      unreadable.set(tag, diagnostic);
      continue;
    }

    entries.push({ tag, type: rawType, rawType, count: valueCount, fieldOffset, valueOffset, byteLength, inline });
  }

  let nextIfdOffset = 0;
  const nextPos = offset + 2 + count * IFD_ENTRY_SIZE;
  if (parsed === count && cursor.contains(nextPos, 4)) {
    nextIfdOffset = cursor.readU32(nextPos);
  } else if (parsed === count) {
    record({
      kind: "OutOfRange",
      message: `Next-IFD offset of directory at ${offset} lies past the end of the stream`,
      offset: nextPos,
    });
  }

  return new Ifd(offset, entries, nextIfdOffset, diagnostics, unreadable);
}

/** Result of walking the next-IFD chain. */
export interface IfdChain {
  ifds: Ifd[];
  /** Problems that ended the walk early. */
  diagnostics: Diagnostic[];
}

/**
 * Parse every directory reachable from `firstOffset`.
 *
 * The first directory must parse; a broken link further down ends the
 * chain with a diagnostic, as do loops and chains longer than `maxIfds`.
 */
export function parseIfdChain(cursor: ByteCursor, firstOffset: number, maxIfds: number = 1024): IfdChain {
  const ifds: Ifd[] = [];
  const diagnostics: Diagnostic[] = [];
  const visited = new Set<number>();

  let offset = firstOffset;
  while (offset !== 0) {
    if (ifds.length >= maxIfds) {
      diagnostics.push({ kind: "InconsistentLayout", message: `Stopped after ${maxIfds} directories`, offset });
      break;
    }
    if (visited.has(offset)) {
      diagnostics.push({ kind: "InconsistentLayout", message: `Directory chain loops back to offset ${offset}`, offset });
      break;
    }
    if (ifds.length > 0 && !cursor.contains(offset, 2)) {
      diagnostics.push({ kind: "OutOfRange", message: `Next directory offset ${offset} is past the end of the stream`, offset });
      break;
    }
    visited.add(offset);
    const ifd = parseIfd(cursor, offset);
    ifds.push(ifd);
    offset = ifd.nextIfdOffset;
  }

  return { ifds, diagnostics };
}
