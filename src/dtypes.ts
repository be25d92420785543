// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Sample format and bit depth to output storage mapping.
 *
 * TIFF SampleFormat values:
 *   1 = unsigned integer
 *   2 = signed integer (two's complement)
 *   3 = IEEE floating point
 *   4 = undefined
 *
 * Decoded samples are stored in 8-bit or 16-bit unsigned buffers: the
 * narrowest one that holds the widest declared sample.
 */

import { TiffError } from "./errors.js";

/** Output sample storage. */
export type SampleStorage = "uint8" | "uint16";

/** Typed pixel buffer matching a {@link SampleStorage}. */
export type SampleArray = Uint8Array | Uint16Array;

export const SAMPLE_FORMAT_UINT = 1;
export const SAMPLE_FORMAT_INT = 2;
export const SAMPLE_FORMAT_FLOAT = 3;
export const SAMPLE_FORMAT_UNDEFINED = 4;

export const MAX_BITS_PER_SAMPLE = 16;

/**
 * Pick the storage for a set of per-sample bit depths.
 *
 * @throws TiffError `UnsupportedFeature` for depths outside 1..16.
 */
export function storageForBits(bitsPerSample: readonly number[]): SampleStorage {
  let widest = 0;
  for (const bits of bitsPerSample) {
    if (!Number.isInteger(bits) || bits < 1 || bits > MAX_BITS_PER_SAMPLE) {
      throw new TiffError("UnsupportedFeature", `Unsupported bit depth: ${bits} bits per sample`);
    }
    widest = Math.max(widest, bits);
  }
  return widest <= 8 ? "uint8" : "uint16";
}

/**
 * Reject sample formats that cannot be stored as unsigned integers.
 * Signed samples are kept as their two's-complement bit patterns.
 */
export function checkSampleFormat(sampleFormat: readonly number[]): void {
  for (const format of sampleFormat) {
    switch (format) {
      case SAMPLE_FORMAT_UINT:
      case SAMPLE_FORMAT_INT:
      case SAMPLE_FORMAT_UNDEFINED:
        break;
      case SAMPLE_FORMAT_FLOAT:
        throw new TiffError("UnsupportedFeature", "Floating-point samples are not supported");
      default:
        throw new TiffError("UnsupportedFeature", `Unsupported SampleFormat: ${format}`);
    }
  }
}

export function bytesPerElement(storage: SampleStorage): number {
  return storage === "uint8" ? 1 : 2;
}

export function allocateSamples(storage: SampleStorage, length: number): SampleArray {
  return storage === "uint8" ? new Uint8Array(length) : new Uint16Array(length);
}

export function storageOf(data: SampleArray): SampleStorage {
  return data instanceof Uint8Array ? "uint8" : "uint16";
}
