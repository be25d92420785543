// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Chunk codecs.
 *
 * The supported codecs form a closed set; any other Compression value is
 * rejected with `UnsupportedCompression`. Decoders produce exactly the
 * expected number of bytes and never write past it.
 */

import { unzlibSync, zlibSync, type DeflateOptions } from "fflate";
import { TiffError } from "./errors.js";
import { lzwDecode, lzwEncode } from "./lzw.js";
import {
  COMPRESSION_CCITT_RLE,
  COMPRESSION_CCITT_T4,
  COMPRESSION_CCITT_T6,
  COMPRESSION_DEFLATE,
  COMPRESSION_DEFLATE_LEGACY,
  COMPRESSION_JPEG,
  COMPRESSION_LZW,
  COMPRESSION_NONE,
  COMPRESSION_OJPEG,
  COMPRESSION_PACKBITS,
  TAG_COMPRESSION,
} from "./tags.js";

export type CompressionKind = "none" | "packbits" | "lzw" | "deflate";

const UNSUPPORTED_NAMES: Record<number, string> = {
  [COMPRESSION_CCITT_RLE]: "CCITT modified Huffman RLE",
  [COMPRESSION_CCITT_T4]: "CCITT Group 3",
  [COMPRESSION_CCITT_T6]: "CCITT Group 4",
  [COMPRESSION_OJPEG]: "old-style JPEG",
  [COMPRESSION_JPEG]: "JPEG",
};

/**
 * Map a Compression tag value to a codec.
 *
 * @throws TiffError `UnsupportedCompression` for anything else.
 */
export function compressionFromCode(code: number): CompressionKind {
  switch (code) {
    case COMPRESSION_NONE:
      return "none";
    case COMPRESSION_PACKBITS:
      return "packbits";
    case COMPRESSION_LZW:
      return "lzw";
    case COMPRESSION_DEFLATE:
    case COMPRESSION_DEFLATE_LEGACY:
      return "deflate";
    default: {
      const name = UNSUPPORTED_NAMES[code] ?? `code ${code}`;
      throw new TiffError("UnsupportedCompression", `Unsupported compression: ${name}`, { tag: TAG_COMPRESSION });
    }
  }
}

/** The Compression tag value written for a codec. */
export function compressionCode(kind: CompressionKind): number {
  switch (kind) {
    case "none":
      return COMPRESSION_NONE;
    case "packbits":
      return COMPRESSION_PACKBITS;
    case "lzw":
      return COMPRESSION_LZW;
    case "deflate":
      return COMPRESSION_DEFLATE;
  }
}

// ── PackBits ────────────────────────────────────────────────────────

/**
 * Decode PackBits into exactly `expectedLength` bytes.
 *
 * Control byte n: 0..127 copies the next n + 1 bytes, 129..255 repeats
 * the next byte 257 - n times, 128 does nothing.
 */
export function decodePackBits(input: Uint8Array, expectedLength: number): Uint8Array {
  const out = new Uint8Array(expectedLength);
  let ip = 0;
  let op = 0;

  while (op < expectedLength) {
    if (ip >= input.length) {
      throw new TiffError(
        "CodecError",
        `PackBits: input exhausted after ${op} of ${expectedLength} bytes`,
        { offset: ip },
      );
    }
    const n = input[ip++];
    if (n < 128) {
      const available = Math.min(n + 1, input.length - ip);
      const take = Math.min(available, expectedLength - op);
      out.set(input.subarray(ip, ip + take), op);
      op += take;
      ip += available;
    } else if (n > 128) {
      if (ip >= input.length) {
        throw new TiffError("CodecError", "PackBits: run is missing its value byte", { offset: ip - 1 });
      }
      const value = input[ip++];
      const take = Math.min(257 - n, expectedLength - op);
      out.fill(value, op, op + take);
      op += take;
    }
  }

  return out;
}

function packRow(row: Uint8Array, out: number[]): void {
  const n = row.length;
  let i = 0;
  while (i < n) {
    let run = 1;
    while (i + run < n && run < 128 && row[i + run] === row[i]) run++;

    if (run >= 2) {
      out.push(257 - run, row[i]);
      i += run;
      continue;
    }

    let j = i;
    while (j < n && j - i < 128) {
      if (j + 1 < n && row[j] === row[j + 1]) break;
      j++;
    }
    out.push(j - i - 1);
    for (let k = i; k < j; k++) out.push(row[k]);
    i = j;
  }
}

/**
 * Encode bytes with PackBits. Runs never cross a row boundary when
 * `rowBytes` is given.
 */
export function encodePackBits(data: Uint8Array, rowBytes: number = data.length): Uint8Array {
  const out: number[] = [];
  const step = Math.max(1, rowBytes);
  for (let start = 0; start < data.length; start += step) {
    packRow(data.subarray(start, Math.min(start + step, data.length)), out);
  }
  return Uint8Array.from(out);
}

// ── Deflate ─────────────────────────────────────────────────────────

type DeflateLevel = NonNullable<DeflateOptions["level"]>;

const DEFLATE_LEVELS: readonly DeflateLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

function deflateLevel(level: number): DeflateLevel {
  const found = DEFLATE_LEVELS.find((l) => l === level);
  if (found === undefined) {
    throw new TiffError("InvalidInput", `Deflate level must be an integer from 0 to 9, got ${level}`);
  }
  return found;
}

/**
 * Inflate a zlib-wrapped chunk. Output beyond `expectedLength` is dropped;
 * a short result is an error.
 */
export function inflateChunk(input: Uint8Array, expectedLength: number): Uint8Array {
  let inflated: Uint8Array;
  try {
    inflated = unzlibSync(input);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new TiffError("CodecError", `Deflate: ${message}`, { offset: 0, cause: err });
  }
  if (inflated.length < expectedLength) {
    throw new TiffError(
      "CodecError",
      `Deflate: produced ${inflated.length} of ${expectedLength} bytes`,
      { offset: input.length },
    );
  }
  return inflated.length === expectedLength ? inflated : inflated.slice(0, expectedLength);
}

/**
 * Compress a Uint8Array using deflate (zlib-wrapped, RFC 1950).
 * Compatible with TIFF compression code 8.
 */
export function deflateChunk(data: Uint8Array, level: number = 6): Uint8Array {
  return zlibSync(data, { level: deflateLevel(level) });
}

// ── Dispatch ────────────────────────────────────────────────────────

/**
 * Decode one chunk into a fresh buffer of exactly `expectedLength` bytes.
 * The input is never modified.
 */
export function decompressChunk(kind: CompressionKind, raw: Uint8Array, expectedLength: number): Uint8Array {
  switch (kind) {
    case "none":
      if (raw.length !== expectedLength) {
        throw new TiffError(
          "CodecError",
          `Uncompressed chunk holds ${raw.length} bytes, expected ${expectedLength}`,
          { offset: Math.min(raw.length, expectedLength) },
        );
      }
      return raw.slice();
    case "packbits":
      return decodePackBits(raw, expectedLength);
    case "lzw":
      return lzwDecode(raw, expectedLength);
    case "deflate":
      return inflateChunk(raw, expectedLength);
  }
}

export interface CompressChunkOptions {
  /** Deflate level (0-9). Default: 6. */
  level?: number;
  /** Stored row length, so PackBits runs stop at row ends. */
  rowBytes?: number;
}

export function compressChunk(kind: CompressionKind, data: Uint8Array, options: CompressChunkOptions = {}): Uint8Array {
  switch (kind) {
    case "none":
      return data;
    case "packbits":
      return encodePackBits(data, options.rowBytes ?? data.length);
    case "lzw":
      return lzwEncode(data);
    case "deflate":
      return deflateChunk(data, options.level ?? 6);
  }
}
