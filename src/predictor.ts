// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Horizontal differencing (Predictor = 2).
 *
 * Each sample is stored as the difference from the sample of the same
 * component one pixel to its left, with wrap-around at the sample width.
 * Differences restart on every row.
 */

import { TiffError } from "./errors.js";

export interface PredictorLayout {
  /** Pixels per row in the chunk. */
  width: number;
  rows: number;
  /** Distance between consecutive samples of one component: samples per pixel when chunky, 1 when planar. */
  stride: number;
  /** 8 or 16. */
  bitsPerSample: number;
  /** Byte order of 16-bit samples. */
  littleEndian: boolean;
}

function checkBits(bits: number): void {
  if (bits !== 8 && bits !== 16) {
    throw new TiffError("UnsupportedFeature", `Horizontal predictor is not supported for ${bits}-bit samples`);
  }
}

/** Reverse horizontal differencing in place. */
export function undoHorizontalPredictor(data: Uint8Array, layout: PredictorLayout): void {
  const { width, rows, stride, bitsPerSample, littleEndian } = layout;
  checkBits(bitsPerSample);
  const samplesPerRow = width * stride;

  if (bitsPerSample === 8) {
    for (let row = 0; row < rows; row++) {
      const start = row * samplesPerRow;
      for (let i = start + stride; i < start + samplesPerRow; i++) {
        data[i] = (data[i] + data[i - stride]) & 0xff;
      }
    }
    return;
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  for (let row = 0; row < rows; row++) {
    const start = row * samplesPerRow;
    for (let i = start + stride; i < start + samplesPerRow; i++) {
      const value = view.getUint16(i * 2, littleEndian) + view.getUint16((i - stride) * 2, littleEndian);
      view.setUint16(i * 2, value & 0xffff, littleEndian);
    }
  }
}

/** Apply horizontal differencing in place, the inverse of {@link undoHorizontalPredictor}. */
export function applyHorizontalPredictor(data: Uint8Array, layout: PredictorLayout): void {
  const { width, rows, stride, bitsPerSample, littleEndian } = layout;
  checkBits(bitsPerSample);
  const samplesPerRow = width * stride;

  if (bitsPerSample === 8) {
    for (let row = 0; row < rows; row++) {
      const start = row * samplesPerRow;
      for (let i = start + samplesPerRow - 1; i >= start + stride; i--) {
        data[i] = (data[i] - data[i - stride]) & 0xff;
      }
    }
    return;
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  for (let row = 0; row < rows; row++) {
    const start = row * samplesPerRow;
    for (let i = start + samplesPerRow - 1; i >= start + stride; i--) {
      const value = view.getUint16(i * 2, littleEndian) - view.getUint16((i - stride) * 2, littleEndian);
      view.setUint16(i * 2, value & 0xffff, littleEndian);
    }
  }
}
