// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Low-level TIFF binary builder.
 *
 * Assembles IFD entries, tag values and already-encoded strip or tile data
 * into a classic TIFF file (32-bit offsets, magic 42) in either byte order.
 *
 * Layout strategy (two-pass):
 *   Pass 1: Resolve tags, compute sizes and offsets.
 *   Pass 2: Write into a pre-allocated ArrayBuffer.
 *
 * File layout:
 *   [Header 8 bytes]
 *   [IFD 0 entries + overflow data + chunk data]
 *   [IFD 1 entries + overflow data + chunk data]
 *   ...
 *
 * Every IFD starts on a word boundary.
 */

import type { ByteOrder } from "./directory.js";
import { HEADER_SIZE, IFD_ENTRY_SIZE, INLINE_THRESHOLD, TIFF_MAGIC } from "./directory.js";
import { TiffError } from "./errors.js";
import {
  TAG_STRIP_BYTE_COUNTS,
  TAG_STRIP_OFFSETS,
  TAG_TILE_BYTE_COUNTS,
  TAG_TILE_OFFSETS,
  TAG_TILE_WIDTH,
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
  typeWidth,
} from "./tags.js";

const MAX_CLASSIC_SIZE = 0xffff_ffff;

// ── Public types ────────────────────────────────────────────────────

/** A single TIFF tag entry. */
export interface TiffTag {
  /** TIFF tag number (e.g. 256 for ImageWidth). */
  tag: number;
  /** TIFF field type (e.g. TIFF_TYPE_SHORT = 3). */
  type: number;
  /**
   * Tag values. For ASCII tags, pass a string. RATIONAL and SRATIONAL
   * values are flat numerator/denominator pairs.
   */
  values: readonly number[] | string;
}

/** Describes one IFD (image) to be written. */
export interface WritableIfd {
  /** Tags for this IFD, excluding offset and byte-count tags, which are generated. */
  tags: TiffTag[];
  /**
   * Encoded strips or tiles in storage order. Tiled output is selected
   * by the presence of a TileWidth tag.
   */
  chunks: Uint8Array[];
}

/** Options for buildTiff. */
export interface BuildTiffOptions {
  /** Default: "little". */
  byteOrder?: ByteOrder;
}

// ── Internal types ──────────────────────────────────────────────────

/** Resolved tag with computed byte representation. */
interface ResolvedTag {
  tag: number;
  type: number;
  count: number;
  /** Serialized value bytes; inline when no longer than four bytes. */
  valueBytes: Uint8Array;
}

/** An IFD with all offsets computed, ready to write. */
interface PlacedIfd {
  ifdOffset: number;
  /** Sorted by tag number. */
  tags: ResolvedTag[];
  overflowOffset: number;
  chunkDataOffset: number;
  chunks: Uint8Array[];
  /** Absolute byte offset of the next IFD (0 if last in chain). */
  nextIfdOffset: number;
  /** Offset just past this IFD's padded chunk data. */
  end: number;
}

// ── Public API ──────────────────────────────────────────────────────

/**
 * Build a complete TIFF file from a list of IFDs, linked in order through
 * their next-IFD offsets.
 *
 * @throws TiffError `InvalidInput` for an empty list, malformed tags, or
 *   a file that would exceed the 4 GiB classic TIFF limit.
 */
export function buildTiff(ifds: WritableIfd[], options: BuildTiffOptions = {}): ArrayBuffer {
  if (ifds.length === 0) {
    throw new TiffError("InvalidInput", "A TIFF file needs at least one image");
  }
  const littleEndian = (options.byteOrder ?? "little") === "little";

  const placed = placeIfds(ifds, littleEndian);
  const totalSize = placed[placed.length - 1].end;
  if (totalSize > MAX_CLASSIC_SIZE) {
    throw new TiffError("InvalidInput", `File size ${totalSize} exceeds the classic TIFF 4 GiB limit`);
  }

  const buffer = new ArrayBuffer(totalSize);
  const view = new DataView(buffer);

  writeHeader(view, littleEndian, placed[0].ifdOffset);
  for (const p of placed) {
    writeIfd(view, buffer, p, littleEndian);
  }

  return buffer;
}

// ── Internal helpers ────────────────────────────────────────────────

/** Write the TIFF file header. */
function writeHeader(view: DataView, littleEndian: boolean, firstIfdOffset: number): void {
  // "II" or "MM"
  view.setUint16(0, littleEndian ? 0x4949 : 0x4d4d, false);
  view.setUint16(2, TIFF_MAGIC, littleEndian);
  view.setUint32(4, firstIfdOffset, littleEndian);
}

function encodeAscii(text: string): Uint8Array {
  const bytes = new Uint8Array(text.length + 1); // +1 for the NUL terminator
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > 0xff) {
      throw new TiffError("InvalidInput", `ASCII value contains a character outside Latin-1 at index ${i}`);
    }
    bytes[i] = code;
  }
  return bytes;
}

/** Resolve a TiffTag to its byte representation. */
function resolveTag(tag: TiffTag, littleEndian: boolean): ResolvedTag {
  if (typeof tag.values === "string") {
    if (tag.type !== TIFF_TYPE_ASCII) {
      throw new TiffError("InvalidInput", `${tagName(tag.tag)}: string values need the ASCII type`, { tag: tag.tag });
    }
    const valueBytes = encodeAscii(tag.values);
    return { tag: tag.tag, type: TIFF_TYPE_ASCII, count: valueBytes.length, valueBytes };
  }

  const typeSize = typeWidth(tag.type);
  if (typeSize === undefined) {
    throw new TiffError("InvalidInput", `${tagName(tag.tag)}: unknown TIFF type ${tag.type}`, { tag: tag.tag });
  }

  const paired = tag.type === TIFF_TYPE_RATIONAL || tag.type === TIFF_TYPE_SRATIONAL;
  if (paired && tag.values.length % 2 !== 0) {
    throw new TiffError("InvalidInput", `${tagName(tag.tag)}: rational values come in pairs`, { tag: tag.tag });
  }
  const count = paired ? tag.values.length / 2 : tag.values.length;
  if (count === 0) {
    throw new TiffError("InvalidInput", `${tagName(tag.tag)}: at least one value is required`, { tag: tag.tag });
  }

  const valueBytes = new Uint8Array(count * typeSize);
  const dv = new DataView(valueBytes.buffer, valueBytes.byteOffset, valueBytes.byteLength);

  tag.values.forEach((value, i) => {
    switch (tag.type) {
      case TIFF_TYPE_BYTE:
      case TIFF_TYPE_ASCII:
      case TIFF_TYPE_UNDEFINED:
        dv.setUint8(i, value);
        break;
      case TIFF_TYPE_SBYTE:
        dv.setInt8(i, value);
        break;
      case TIFF_TYPE_SHORT:
        dv.setUint16(i * 2, value, littleEndian);
        break;
      case TIFF_TYPE_SSHORT:
        dv.setInt16(i * 2, value, littleEndian);
        break;
      case TIFF_TYPE_LONG:
      case TIFF_TYPE_RATIONAL:
        dv.setUint32(i * 4, value, littleEndian);
        break;
      case TIFF_TYPE_SLONG:
      case TIFF_TYPE_SRATIONAL:
        dv.setInt32(i * 4, value, littleEndian);
        break;
      case TIFF_TYPE_FLOAT:
        dv.setFloat32(i * 4, value, littleEndian);
        break;
      case TIFF_TYPE_DOUBLE:
        dv.setFloat64(i * 8, value, littleEndian);
        break;
    }
  });

  return { tag: tag.tag, type: tag.type, count, valueBytes };
}

/** Byte size of an IFD entry block: 2 + 12*N + 4. */
function ifdEntryBlockSize(numTags: number): number {
  return 2 + numTags * IFD_ENTRY_SIZE + 4;
}

function padded(length: number): number {
  return length + (length % 2);
}

/** Overflow size for resolved tags (values that don't fit inline), word-aligned per value. */
function overflowSize(tags: ResolvedTag[]): number {
  let size = 0;
  for (const t of tags) {
    if (t.valueBytes.length > INLINE_THRESHOLD) size += padded(t.valueBytes.length);
  }
  return size;
}

function totalChunkSize(chunks: Uint8Array[]): number {
  return chunks.reduce((sum, c) => sum + c.length, 0);
}

function longArray(values: readonly number[], littleEndian: boolean): Uint8Array {
  const bytes = new Uint8Array(values.length * 4);
  const dv = new DataView(bytes.buffer);
  values.forEach((v, i) => dv.setUint32(i * 4, v, littleEndian));
  return bytes;
}

/** Place all IFDs sequentially, computing absolute offsets. */
function placeIfds(ifds: WritableIfd[], littleEndian: boolean): PlacedIfd[] {
  const placed: PlacedIfd[] = [];
  let cursor = HEADER_SIZE;

  for (const ifd of ifds) {
    if (ifd.chunks.length === 0) {
      throw new TiffError("InvalidInput", "An image needs at least one strip or tile");
    }
    const seen = new Set<number>();
    const userTags = ifd.tags.map((t) => {
      if (seen.has(t.tag)) {
        throw new TiffError("InvalidInput", `Duplicate tag ${tagName(t.tag)}`, { tag: t.tag });
      }
      seen.add(t.tag);
      return resolveTag(t, littleEndian);
    });

    // Tiled or stripped, based on tags
    const tiled = seen.has(TAG_TILE_WIDTH);
    const offsetTag = tiled ? TAG_TILE_OFFSETS : TAG_STRIP_OFFSETS;
    const countTag = tiled ? TAG_TILE_BYTE_COUNTS : TAG_STRIP_BYTE_COUNTS;
    if (seen.has(offsetTag) || seen.has(countTag)) {
      throw new TiffError("InvalidInput", `${tagName(offsetTag)} and ${tagName(countTag)} are generated`);
    }

    const allTags: ResolvedTag[] = [
      ...userTags,
      {
        // placeholder, patched in writeIfd once offsets are known
        tag: offsetTag,
        type: TIFF_TYPE_LONG,
        count: ifd.chunks.length,
        valueBytes: new Uint8Array(ifd.chunks.length * 4),
      },
      {
        tag: countTag,
        type: TIFF_TYPE_LONG,
        count: ifd.chunks.length,
        valueBytes: longArray(
          ifd.chunks.map((c) => c.length),
          littleEndian,
        ),
      },
    ];

    // Sort by tag number (TIFF requires this)
    allTags.sort((a, b) => a.tag - b.tag);

    const ifdOffset = cursor;
    cursor += ifdEntryBlockSize(allTags.length);
    const overflowOffset = cursor;
    cursor += overflowSize(allTags);
    const chunkDataOffset = cursor;
    cursor += padded(totalChunkSize(ifd.chunks));

    placed.push({
      ifdOffset,
      tags: allTags,
      overflowOffset,
      chunkDataOffset,
      chunks: ifd.chunks,
      nextIfdOffset: 0,
      end: cursor,
    });
  }

  // Link next-IFD pointers
  for (let i = 0; i < placed.length - 1; i++) {
    placed[i].nextIfdOffset = placed[i + 1].ifdOffset;
  }

  return placed;
}

/** Write a single placed IFD into the buffer. */
function writeIfd(view: DataView, buffer: ArrayBuffer, placed: PlacedIfd, littleEndian: boolean): void {
  let pos = placed.ifdOffset;

  view.setUint16(pos, placed.tags.length, littleEndian);
  pos += 2;

  const chunkOffsets: number[] = [];
  let chunkCursor = placed.chunkDataOffset;
  for (const chunk of placed.chunks) {
    chunkOffsets.push(chunkCursor);
    chunkCursor += chunk.length;
  }

  let overflowCursor = placed.overflowOffset;

  for (const tag of placed.tags) {
    view.setUint16(pos, tag.tag, littleEndian);
    view.setUint16(pos + 2, tag.type, littleEndian);
    view.setUint32(pos + 4, tag.count, littleEndian);

    const valueFieldOffset = pos + 8;
    const valueBytes =
      tag.tag === TAG_TILE_OFFSETS || tag.tag === TAG_STRIP_OFFSETS
        ? longArray(chunkOffsets, littleEndian)
        : tag.valueBytes;

    if (valueBytes.length <= INLINE_THRESHOLD) {
      // Inline values are left-justified in the 4-byte field
      const dest = new Uint8Array(buffer, valueFieldOffset, INLINE_THRESHOLD);
      dest.fill(0);
      dest.set(valueBytes);
    } else {
      view.setUint32(valueFieldOffset, overflowCursor, littleEndian);
      new Uint8Array(buffer, overflowCursor, valueBytes.length).set(valueBytes);
      overflowCursor += padded(valueBytes.length);
    }

    pos += IFD_ENTRY_SIZE;
  }

  view.setUint32(pos, placed.nextIfdOffset, littleEndian);

  let chunkPos = placed.chunkDataOffset;
  for (const chunk of placed.chunks) {
    new Uint8Array(buffer, chunkPos, chunk.length).set(chunk);
    chunkPos += chunk.length;
  }
}
