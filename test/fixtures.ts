// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Test fixture helpers: create small TIFF files in memory for testing.
 *
 * Uses geotiff.js writeArrayBuffer for files written by an independent
 * implementation, and a byte-level assembler for malformed and unusual
 * directories that no writer produces.
 */

import { writeArrayBuffer, type GeoTIFFImage } from "geotiff";

/** Gradient samples: value at (x, y) is (x + y) % 256. */
export function gradient(width: number, height: number): number[] {
  const values: number[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      values.push((x + y) % 256);
    }
  }
  return values;
}

/**
 * Create a simple single-band uint8 TIFF with known pixel values.
 * 64x64 pixels, uncompressed, with a linear gradient pattern.
 */
export function createSimpleTiff(): ArrayBuffer {
  const width = 64;
  const height = 64;
  return writeArrayBuffer(gradient(width, height), {
    width,
    height,
    BitsPerSample: [8],
    SampleFormat: [1], // unsigned int
    PhotometricInterpretation: 1, // MinIsBlack
    SamplesPerPixel: 1,
  });
}

/** Pixel-interleaved RGB samples: (x * 10, y * 10, 200). */
export function rgbValues(width: number, height: number): number[] {
  const values: number[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      values.push((x * 10) % 256, (y * 10) % 256, 200);
    }
  }
  return values;
}

/** A 16x8 RGB uint8 TIFF written by geotiff.js. */
export function createRgbTiff(): ArrayBuffer {
  const width = 16;
  const height = 8;
  return writeArrayBuffer(rgbValues(width, height), {
    width,
    height,
    BitsPerSample: [8, 8, 8],
    SampleFormat: [1, 1, 1],
    PhotometricInterpretation: 2, // RGB
    SamplesPerPixel: 3,
  });
}

/** First band of an image as read by geotiff.js. */
export async function firstBand(image: GeoTIFFImage): Promise<number[]> {
  const rasters = await image.readRasters();
  const band = Array.isArray(rasters) ? rasters[0] : rasters;
  return Array.from(band);
}

/** Pixel-interleaved samples of an image as read by geotiff.js. */
export async function interleaved(image: GeoTIFFImage): Promise<number[]> {
  const rasters = await image.readRasters({ interleave: true });
  const data = Array.isArray(rasters) ? rasters[0] : rasters;
  return Array.from(data);
}

// ── Hand-assembled streams ──────────────────────────────────────────

/** One directory entry written verbatim. */
export interface RawEntry {
  tag: number;
  type: number;
  count: number;
  /**
   * Contents of the 4-byte value field: a SHORT with count 1 is written
   * as a 16-bit value, a BYTE with count 1 as one byte, anything else as
   * a 32-bit value (inline LONG or an offset).
   */
  value: number;
}

/** Offset of the first byte after a single directory of `entryCount` entries at offset 8. */
export function tailOffset(entryCount: number): number {
  return 8 + 2 + 12 * entryCount + 4;
}

/**
 * Assemble header, one directory at offset 8 and `tail` bytes directly
 * after it. Entries are written in the order given.
 */
export function assembleTiff(
  entries: readonly RawEntry[],
  tail: readonly number[] = [],
  littleEndian: boolean = true,
  nextIfdOffset: number = 0,
): Uint8Array {
  const start = tailOffset(entries.length);
  const bytes = new Uint8Array(start + tail.length);
  const view = new DataView(bytes.buffer);

  view.setUint16(0, littleEndian ? 0x4949 : 0x4d4d, false);
  view.setUint16(2, 42, littleEndian);
  view.setUint32(4, 8, littleEndian);
  view.setUint16(8, entries.length, littleEndian);

  entries.forEach((entry, i) => {
    const pos = 10 + i * 12;
    view.setUint16(pos, entry.tag, littleEndian);
    view.setUint16(pos + 2, entry.type, littleEndian);
    view.setUint32(pos + 4, entry.count, littleEndian);
    if (entry.type === 3 && entry.count === 1) {
      view.setUint16(pos + 8, entry.value, littleEndian);
    } else if (entry.type === 1 && entry.count === 1) {
      view.setUint8(pos + 8, entry.value);
    } else {
      view.setUint32(pos + 8, entry.value, littleEndian);
    }
  });
  view.setUint32(10 + entries.length * 12, nextIfdOffset, littleEndian);
  bytes.set(tail, start);
  return bytes;
}

/**
 * Entries for a minimal single-strip image whose pixel bytes sit at the
 * start of the tail. Extra entries are appended in the order given.
 */
export function stripEntries(
  width: number,
  height: number,
  stripOffset: number,
  stripBytes: number,
  extra: readonly RawEntry[] = [],
): RawEntry[] {
  return [
    { tag: 256, type: 3, count: 1, value: width },
    { tag: 257, type: 3, count: 1, value: height },
    { tag: 273, type: 4, count: 1, value: stripOffset },
    { tag: 278, type: 3, count: 1, value: height },
    { tag: 279, type: 4, count: 1, value: stripBytes },
    ...extra,
  ];
}
