// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { type SampleArray, type SampleStorage, storageOf } from "./dtypes.js";

/**
 * A decoded image.
 *
 * `data` is always pixel-interleaved (`samplesPerPixel` consecutive values
 * per pixel, rows top to bottom) and holds exactly
 * `width * height * samplesPerPixel` samples. Samples narrower than their
 * storage keep their raw value: a 4-bit sample reads 0..15.
 *
 * `photometric` and `bitsPerSample` describe `data`, which differs from
 * the stored image when palette expansion or a colour transform ran.
 */
export interface TiffImage {
  width: number;
  height: number;
  samplesPerPixel: number;
  bitsPerSample: number[];
  photometric: number;
  /** Storage layout of the source directory; `data` is interleaved regardless. */
  planarConfiguration: number;
  /** Compression of the source directory. */
  compression: number;
  predictor: number;
  sampleFormat: number[];
  extraSamples: number[];
  data: SampleArray;
}

/**
 * The image-shaped input accepted by the encoder. A decoded
 * {@link TiffImage} satisfies it.
 */
export interface ImageInput {
  width: number;
  height: number;
  samplesPerPixel: number;
  /** One depth for every sample, or one per sample. */
  bitsPerSample: number | readonly number[];
  /** Default: RGB for three or more samples, otherwise BlackIsZero. */
  photometric?: number;
  extraSamples?: readonly number[];
  sampleFormat?: readonly number[];
  /** Required for palette images: 3 * 2^bits 16-bit entries, reds then greens then blues. */
  colorMap?: readonly number[];
  data: SampleArray;
}

/** A deep copy: new sample storage and new per-sample arrays. */
export function copyImage(image: TiffImage): TiffImage {
  return {
    ...image,
    bitsPerSample: [...image.bitsPerSample],
    sampleFormat: [...image.sampleFormat],
    extraSamples: [...image.extraSamples],
    data: image.data.slice(),
  };
}

export function sampleStorage(image: Pick<TiffImage, "data">): SampleStorage {
  return storageOf(image.data);
}

/** The samples of the pixel at (x, y). */
export function pixelAt(image: Pick<TiffImage, "width" | "samplesPerPixel" | "data">, x: number, y: number): number[] {
  const start = (y * image.width + x) * image.samplesPerPixel;
  return Array.from(image.data.subarray(start, start + image.samplesPerPixel));
}
