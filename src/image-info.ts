// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Reads the layout-describing tags of a directory into one summary,
 * applying registry defaults for optional tags.
 */

import type { ByteCursor } from "./byte-cursor.js";
import { TiffError } from "./errors.js";
import type { Ifd } from "./ifd.js";
import { readChunkLayout, type ChunkLayout } from "./layout.js";
import {
  PHOTOMETRIC_RGB,
  PHOTOMETRIC_WHITE_IS_ZERO,
  PHOTOMETRIC_YCBCR,
  PLANAR_CHUNKY,
  PLANAR_SEPARATE,
  TAG_BITS_PER_SAMPLE,
  TAG_COLOR_MAP,
  TAG_COMPRESSION,
  TAG_EXTRA_SAMPLES,
  TAG_IMAGE_LENGTH,
  TAG_IMAGE_WIDTH,
  TAG_INK_SET,
  TAG_PHOTOMETRIC,
  TAG_PLANAR_CONFIGURATION,
  TAG_PREDICTOR,
  TAG_SAMPLE_FORMAT,
  TAG_SAMPLES_PER_PIXEL,
  TAG_YCBCR_COEFFICIENTS,
  TAG_YCBCR_SUBSAMPLING,
  lookupTag,
  tagName,
} from "./tags.js";
import { asNumbers, getUnsigned, getUnsignedArray, getValue } from "./values.js";

/** Everything needed to decode a directory's pixels, without the pixels. */
export interface ImageInfo {
  width: number;
  height: number;
  samplesPerPixel: number;
  /** One entry per sample. */
  bitsPerSample: number[];
  /** One entry per sample. */
  sampleFormat: number[];
  compression: number;
  photometric: number;
  /** True when the Photometric tag was absent and a default was used. */
  photometricDefaulted: boolean;
  planarConfiguration: number;
  predictor: number;
  extraSamples: number[];
  colorMap?: number[];
  inkSet: number;
  ycbcrSubsampling: [number, number];
  /** LumaRed, LumaGreen, LumaBlue. */
  ycbcrCoefficients: [number, number, number];
  littleEndian: boolean;
  layout: ChunkLayout;
}

function registryDefault(tag: number): number {
  const value = lookupTag(tag).defaultValue;
  if (typeof value === "number") return value;
  throw new Error(`Tag registry has no scalar default for ${tagName(tag)}`);
}

function unsignedOr(cursor: ByteCursor, ifd: Ifd, tag: number, fallback: number): number {
  return ifd.has(tag) ? getUnsigned(cursor, ifd, tag) : fallback;
}

function required(cursor: ByteCursor, ifd: Ifd, tag: number): number {
  if (!ifd.has(tag) && ifd.unreadable(tag) === undefined) {
    throw new TiffError("MissingRequiredTag", `${tagName(tag)} is required`, { tag });
  }
  return getUnsigned(cursor, ifd, tag);
}

/**
 * Expand a per-sample tag that may carry a single value for all samples.
 *
 * @throws TiffError `InconsistentLayout` when the count is neither 1 nor
 *   `samplesPerPixel`.
 */
function perSample(cursor: ByteCursor, ifd: Ifd, tag: number, samplesPerPixel: number): number[] {
  if (!ifd.has(tag)) {
    return new Array<number>(samplesPerPixel).fill(registryDefault(tag));
  }
  const values = getUnsignedArray(cursor, ifd, tag);
  if (values.length === samplesPerPixel) return values;
  if (values.length === 1 || (values.length > samplesPerPixel && values.slice(1).every((v) => v === values[0]))) {
    return new Array<number>(samplesPerPixel).fill(values[0]);
  }
  throw new TiffError(
    "InconsistentLayout",
    `${tagName(tag)} has ${values.length} values for ${samplesPerPixel} samples per pixel`,
    { tag },
  );
}

function ycbcrSubsampling(cursor: ByteCursor, ifd: Ifd, photometric: number): [number, number] {
  if (photometric !== PHOTOMETRIC_YCBCR) return [1, 1];
  if (!ifd.has(TAG_YCBCR_SUBSAMPLING)) return [2, 2];
  const values = getUnsignedArray(cursor, ifd, TAG_YCBCR_SUBSAMPLING);
  if (values.length !== 2 || !values.every((v) => v === 1 || v === 2 || v === 4)) {
    throw new TiffError("InconsistentLayout", `Invalid YCbCrSubSampling: ${values.join(",")}`, {
      tag: TAG_YCBCR_SUBSAMPLING,
    });
  }
  return [values[0], values[1]];
}

function ycbcrCoefficients(cursor: ByteCursor, ifd: Ifd, photometric: number): [number, number, number] {
  if (photometric !== PHOTOMETRIC_YCBCR || !ifd.has(TAG_YCBCR_COEFFICIENTS)) return [0.299, 0.587, 0.114];
  const values = asNumbers(getValue(cursor, ifd, TAG_YCBCR_COEFFICIENTS));
  // LumaGreen is a divisor in the conversion to RGB
  if (values.length !== 3 || values.some((v) => !Number.isFinite(v)) || values[1] <= 0) {
    throw new TiffError(
      "InconsistentLayout",
      "YCbCrCoefficients must hold three finite values with a positive LumaGreen",
      { tag: TAG_YCBCR_COEFFICIENTS },
    );
  }
  return [values[0], values[1], values[2]];
}

/**
 * Summarise a directory's image.
 *
 * @throws TiffError `MissingRequiredTag` without width or length,
 *   `NoImageData` without strip or tile offsets, and any layout error from
 *   the chunk locator.
 */
export function readImageInfo(cursor: ByteCursor, ifd: Ifd): ImageInfo {
  const width = required(cursor, ifd, TAG_IMAGE_WIDTH);
  const height = required(cursor, ifd, TAG_IMAGE_LENGTH);
  if (width === 0 || height === 0) {
    throw new TiffError("NoImageData", `Image has zero size (${width}x${height})`);
  }

  const samplesPerPixel = unsignedOr(cursor, ifd, TAG_SAMPLES_PER_PIXEL, registryDefault(TAG_SAMPLES_PER_PIXEL));
  if (samplesPerPixel < 1) {
    throw new TiffError("InconsistentLayout", "SamplesPerPixel must be at least 1", { tag: TAG_SAMPLES_PER_PIXEL });
  }
  const bitsPerSample = perSample(cursor, ifd, TAG_BITS_PER_SAMPLE, samplesPerPixel);
  const sampleFormat = perSample(cursor, ifd, TAG_SAMPLE_FORMAT, samplesPerPixel);

  const photometricDefaulted = !ifd.has(TAG_PHOTOMETRIC);
  const photometric = photometricDefaulted
    ? samplesPerPixel >= 3
      ? PHOTOMETRIC_RGB
      : PHOTOMETRIC_WHITE_IS_ZERO
    : getUnsigned(cursor, ifd, TAG_PHOTOMETRIC);

  let planarConfiguration = unsignedOr(
    cursor,
    ifd,
    TAG_PLANAR_CONFIGURATION,
    registryDefault(TAG_PLANAR_CONFIGURATION),
  );
  if (planarConfiguration !== PLANAR_CHUNKY && planarConfiguration !== PLANAR_SEPARATE) {
    throw new TiffError("InconsistentLayout", `Invalid PlanarConfiguration: ${planarConfiguration}`, {
      tag: TAG_PLANAR_CONFIGURATION,
    });
  }
  if (samplesPerPixel === 1) planarConfiguration = PLANAR_CHUNKY;
  const planes = planarConfiguration === PLANAR_SEPARATE ? samplesPerPixel : 1;

  const layout = readChunkLayout(cursor, ifd, { width, height, planes });

  return {
    width,
    height,
    samplesPerPixel,
    bitsPerSample,
    sampleFormat,
    compression: unsignedOr(cursor, ifd, TAG_COMPRESSION, registryDefault(TAG_COMPRESSION)),
    photometric,
    photometricDefaulted,
    planarConfiguration,
    predictor: unsignedOr(cursor, ifd, TAG_PREDICTOR, registryDefault(TAG_PREDICTOR)),
    extraSamples: ifd.has(TAG_EXTRA_SAMPLES) ? getUnsignedArray(cursor, ifd, TAG_EXTRA_SAMPLES) : [],
    colorMap: ifd.has(TAG_COLOR_MAP) ? getUnsignedArray(cursor, ifd, TAG_COLOR_MAP) : undefined,
    inkSet: unsignedOr(cursor, ifd, TAG_INK_SET, registryDefault(TAG_INK_SET)),
    ycbcrSubsampling: ycbcrSubsampling(cursor, ifd, photometric),
    ycbcrCoefficients: ycbcrCoefficients(cursor, ifd, photometric),
    littleEndian: cursor.littleEndian,
    layout,
  };
}

