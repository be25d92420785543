// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Utility helpers for pixel window computation and bit-level sample
 * access, used by both the decoder and the encoder.
 */

/**
 * Compute the pixel window for a chunk within an image.
 *
 * @param chunkX - The x chunk index.
 * @param chunkY - The y chunk index.
 * @param chunkWidth - The width of each chunk in pixels.
 * @param chunkHeight - The height of each chunk in pixels.
 * @param imageWidth - The total image width in pixels.
 * @param imageHeight - The total image height in pixels.
 * @returns The pixel window [left, top, right, bottom], clipped to the image.
 */
export function computePixelWindow(
  chunkX: number,
  chunkY: number,
  chunkWidth: number,
  chunkHeight: number,
  imageWidth: number,
  imageHeight: number,
): [number, number, number, number] {
  const left = chunkX * chunkWidth;
  const top = chunkY * chunkHeight;
  const right = Math.min(left + chunkWidth, imageWidth);
  const bottom = Math.min(top + chunkHeight, imageHeight);
  return [left, top, right, bottom];
}

/**
 * Compute the number of chunks along each dimension.
 */
export function computeChunkCounts(
  shape: number[],
  chunkShape: number[],
): number[] {
  return shape.map((s, i) => Math.ceil(s / chunkShape[i]));
}

/** Bytes in one stored row of `width` pixels at `bitsPerPixel`, padded to a byte boundary. */
export function rowByteLength(width: number, bitsPerPixel: number): number {
  return Math.ceil((width * bitsPerPixel) / 8);
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/**
 * Read `count` bits (at most 16) starting at absolute bit position
 * `bitOffset`, most significant bit first.
 */
export function readBits(bytes: Uint8Array, bitOffset: number, count: number): number {
  let value = 0;
  for (let i = 0; i < count; i++) {
    const bit = bitOffset + i;
    value = (value << 1) | ((bytes[bit >>> 3] >>> (7 - (bit & 7))) & 1);
  }
  return value;
}

/** Write the low `count` bits of `value` at `bitOffset`, most significant bit first. */
export function writeBits(bytes: Uint8Array, bitOffset: number, count: number, value: number): void {
  for (let i = 0; i < count; i++) {
    const bit = bitOffset + i;
    const mask = 0x80 >>> (bit & 7);
    if ((value >>> (count - 1 - i)) & 1) {
      bytes[bit >>> 3] |= mask;
    } else {
      bytes[bit >>> 3] &= ~mask;
    }
  }
}

/** Copy an ArrayBuffer-backed slice out of any byte view. */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}
