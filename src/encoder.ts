// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Image → TIFF encoder.
 *
 * The mirror of the decode pipeline: samples are packed into strips or
 * tiles, differenced when a predictor is requested, compressed, and laid
 * out by {@link buildTiff}.
 *
 * @example
 * ```ts
 * const bytes = encodeTiff(
 *   { width: 2, height: 1, samplesPerPixel: 3, bitsPerSample: 8, data: new Uint8Array([255, 0, 0, 0, 0, 255]) },
 *   { compression: "lzw", predictor: "horizontal" },
 * );
 * ```
 */

import { compressChunk, compressionCode, type CompressionKind } from "./compression.js";
import type { ByteOrder } from "./directory.js";
import { MAX_BITS_PER_SAMPLE, SAMPLE_FORMAT_FLOAT, SAMPLE_FORMAT_UINT } from "./dtypes.js";
import { TiffError } from "./errors.js";
import type { ImageInput } from "./image.js";
import { type ChunkDescriptor, type ImageGeometry, stripDescriptors, tileDescriptors } from "./layout.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { applyHorizontalPredictor } from "./predictor.js";
import {
  EXTRA_SAMPLE_UNASSOCIATED_ALPHA,
  EXTRA_SAMPLE_UNSPECIFIED,
  PHOTOMETRIC_BLACK_IS_ZERO,
  PHOTOMETRIC_CIELAB,
  PHOTOMETRIC_CMYK,
  PHOTOMETRIC_PALETTE,
  PHOTOMETRIC_RGB,
  PHOTOMETRIC_YCBCR,
  PLANAR_CHUNKY,
  PLANAR_SEPARATE,
  PREDICTOR_HORIZONTAL,
  RESOLUTION_UNIT_CENTIMETER,
  RESOLUTION_UNIT_INCH,
  RESOLUTION_UNIT_NONE,
  TAG_BITS_PER_SAMPLE,
  TAG_COLOR_MAP,
  TAG_COMPRESSION,
  TAG_EXTRA_SAMPLES,
  TAG_IMAGE_DESCRIPTION,
  TAG_IMAGE_LENGTH,
  TAG_IMAGE_WIDTH,
  TAG_NEW_SUBFILE_TYPE,
  TAG_PHOTOMETRIC,
  TAG_PLANAR_CONFIGURATION,
  TAG_PREDICTOR,
  TAG_RESOLUTION_UNIT,
  TAG_ROWS_PER_STRIP,
  TAG_SAMPLE_FORMAT,
  TAG_SAMPLES_PER_PIXEL,
  TAG_SOFTWARE,
  TAG_TILE_LENGTH,
  TAG_TILE_WIDTH,
  TAG_X_RESOLUTION,
  TAG_Y_RESOLUTION,
  TAG_YCBCR_SUBSAMPLING,
  TIFF_TYPE_ASCII,
  TIFF_TYPE_LONG,
  TIFF_TYPE_RATIONAL,
  TIFF_TYPE_SHORT,
} from "./tags.js";
import { buildTiff, type TiffTag, type WritableIfd } from "./tiff-writer.js";
import { rowByteLength, sum, writeBits } from "./utils.js";

const COMPONENT = "encoder";

/** Target uncompressed strip size when `rowsPerStrip` is not given. */
const DEFAULT_STRIP_BYTES = 8192;

export type ResolutionUnit = "none" | "inch" | "centimeter";

export interface Resolution {
  x: number;
  y: number;
  /** Default: "inch". */
  unit?: ResolutionUnit;
}

export interface EncodeOptions {
  /** Default: "none". */
  compression?: CompressionKind;
  /** Deflate level (0-9). Default: 6. */
  compressionLevel?: number;
  /** Horizontal differencing for 8- and 16-bit samples. Default: "none". */
  predictor?: "none" | "horizontal";
  /** Default: "chunky". */
  planarConfiguration?: "chunky" | "planar";
  /** Rows per strip. Default: enough rows for strips of about 8 KiB. */
  rowsPerStrip?: number;
  /** Write square tiles of this size instead of strips. Must be a multiple of 16. */
  tileSize?: number;
  /** Default: "little". */
  byteOrder?: ByteOrder;
  description?: string;
  software?: string;
  /** Default: 72 x 72 pixels per inch. */
  resolution?: Resolution;
  logger?: Logger;
}

/** An input image after validation, with every default applied. */
interface NormalizedImage {
  width: number;
  height: number;
  samplesPerPixel: number;
  bitsPerSample: number[];
  photometric: number;
  extraSamples: number[];
  sampleFormat: number[];
  colorMap: readonly number[] | undefined;
  data: ImageInput["data"];
}

function invalid(message: string, tag?: number): TiffError {
  return new TiffError("InvalidInput", message, { tag });
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/** Colour channels implied by a photometric interpretation; the rest are extra samples. */
function colorChannels(photometric: number): number {
  switch (photometric) {
    case PHOTOMETRIC_RGB:
    case PHOTOMETRIC_YCBCR:
    case PHOTOMETRIC_CIELAB:
      return 3;
    case PHOTOMETRIC_CMYK:
      return 4;
    default:
      return 1;
  }
}

function normalizeImage(image: ImageInput): NormalizedImage {
  const { width, height, samplesPerPixel: spp } = image;
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw invalid(`Image size must be positive integers, got ${width}x${height}`);
  }
  if (!isPositiveInteger(spp) || spp > 0xffff) {
    throw invalid(`SamplesPerPixel must be a positive integer, got ${spp}`, TAG_SAMPLES_PER_PIXEL);
  }

  const bitsPerSample =
    typeof image.bitsPerSample === "number"
      ? new Array<number>(spp).fill(image.bitsPerSample)
      : image.bitsPerSample.length === 1
        ? new Array<number>(spp).fill(image.bitsPerSample[0])
        : [...image.bitsPerSample];
  if (bitsPerSample.length !== spp) {
    throw invalid(`Expected 1 or ${spp} bit depths, got ${bitsPerSample.length}`, TAG_BITS_PER_SAMPLE);
  }
  for (const bits of bitsPerSample) {
    if (!Number.isInteger(bits) || bits < 1 || bits > MAX_BITS_PER_SAMPLE) {
      throw invalid(`Bits per sample must be between 1 and ${MAX_BITS_PER_SAMPLE}, got ${bits}`, TAG_BITS_PER_SAMPLE);
    }
  }
  if (Math.max(...bitsPerSample) > 8 && image.data instanceof Uint8Array) {
    throw invalid("Samples wider than 8 bits need a Uint16Array", TAG_BITS_PER_SAMPLE);
  }

  const expected = width * height * spp;
  if (image.data.length !== expected) {
    throw invalid(`Expected ${expected} samples (${width}x${height}x${spp}), got ${image.data.length}`);
  }
  for (let i = 0; i < image.data.length; i++) {
    const bits = bitsPerSample[i % spp];
    if (image.data[i] >= 2 ** bits) {
      throw invalid(`Sample ${i} (${image.data[i]}) does not fit in ${bits} bits`);
    }
  }

  const photometric = image.photometric ?? (spp >= 3 ? PHOTOMETRIC_RGB : PHOTOMETRIC_BLACK_IS_ZERO);
  const channels = colorChannels(photometric);
  if (spp < channels) {
    throw invalid(`Photometric ${photometric} needs at least ${channels} samples, got ${spp}`, TAG_PHOTOMETRIC);
  }

  let extraSamples: number[];
  if (image.extraSamples !== undefined) {
    extraSamples = [...image.extraSamples];
  } else if (spp === channels + 1 && (photometric === PHOTOMETRIC_RGB || channels === 1)) {
    extraSamples = [EXTRA_SAMPLE_UNASSOCIATED_ALPHA];
  } else {
    extraSamples = new Array<number>(spp - channels).fill(EXTRA_SAMPLE_UNSPECIFIED);
  }
  if (extraSamples.length !== spp - channels) {
    throw invalid(`Expected ${spp - channels} extra sample types, got ${extraSamples.length}`, TAG_EXTRA_SAMPLES);
  }

  const sampleFormat = image.sampleFormat === undefined ? new Array<number>(spp).fill(SAMPLE_FORMAT_UINT) : [...image.sampleFormat];
  if (sampleFormat.length !== spp) {
    throw invalid(`Expected ${spp} sample formats, got ${sampleFormat.length}`, TAG_SAMPLE_FORMAT);
  }
  if (sampleFormat.some((f) => f === SAMPLE_FORMAT_FLOAT)) {
    throw invalid("Floating-point samples cannot be encoded", TAG_SAMPLE_FORMAT);
  }

  if (photometric === PHOTOMETRIC_PALETTE) {
    const entries = 2 ** bitsPerSample[0];
    if (spp !== 1) throw invalid("Palette images have one sample per pixel", TAG_SAMPLES_PER_PIXEL);
    if (image.colorMap === undefined || image.colorMap.length !== 3 * entries) {
      throw invalid(`Palette images need a ColorMap of ${3 * entries} entries`, TAG_COLOR_MAP);
    }
  }

  return {
    width,
    height,
    samplesPerPixel: spp,
    bitsPerSample,
    photometric,
    extraSamples,
    sampleFormat,
    colorMap: photometric === PHOTOMETRIC_PALETTE ? image.colorMap : undefined,
    data: image.data,
  };
}

/** Encoding parameters shared by every page. */
interface EncodePlan {
  compression: CompressionKind;
  level: number;
  predictor: boolean;
  planar: boolean;
  rowsPerStrip: number | undefined;
  tileSize: number | undefined;
  littleEndian: boolean;
  resolution: Required<Resolution>;
}

function resolvePlan(options: EncodeOptions): EncodePlan {
  const { rowsPerStrip, tileSize } = options;
  if (rowsPerStrip !== undefined && !isPositiveInteger(rowsPerStrip)) {
    throw invalid(`rowsPerStrip must be a positive integer, got ${rowsPerStrip}`, TAG_ROWS_PER_STRIP);
  }
  if (tileSize !== undefined && (!isPositiveInteger(tileSize) || tileSize % 16 !== 0)) {
    throw invalid(`tileSize must be a positive multiple of 16, got ${tileSize}`, TAG_TILE_WIDTH);
  }
  const resolution: Required<Resolution> = {
    x: options.resolution?.x ?? 72,
    y: options.resolution?.y ?? 72,
    unit: options.resolution?.unit ?? "inch",
  };
  if (!(resolution.x > 0) || !(resolution.y > 0)) {
    throw invalid("Resolution must be positive", TAG_X_RESOLUTION);
  }
  return {
    compression: options.compression ?? "none",
    level: options.compressionLevel ?? 6,
    predictor: (options.predictor ?? "none") === "horizontal",
    planar: (options.planarConfiguration ?? "chunky") === "planar",
    rowsPerStrip,
    tileSize,
    littleEndian: (options.byteOrder ?? "little") === "little",
    resolution,
  };
}

/** Samples stored together in one chunk of `plane`. */
function chunkSamples(image: NormalizedImage, planar: boolean, plane: number): number[] {
  return planar ? [plane] : Array.from({ length: image.samplesPerPixel }, (_, s) => s);
}

/** Pack the region a chunk covers; the rest of the stored chunk stays zero. */
function packChunk(image: NormalizedImage, chunk: ChunkDescriptor, samples: number[], littleEndian: boolean): Uint8Array {
  const bits = samples.map((s) => image.bitsPerSample[s]);
  const rowBytes = rowByteLength(chunk.chunkWidth, sum(bits));
  const out = new Uint8Array(rowBytes * chunk.chunkHeight);
  const view = new DataView(out.buffer);
  const spp = image.samplesPerPixel;

  for (let r = 0; r < chunk.height; r++) {
    let bitPos = r * rowBytes * 8;
    for (let c = 0; c < chunk.width; c++) {
      const base = ((chunk.y + r) * image.width + chunk.x + c) * spp;
      samples.forEach((s, k) => {
        const value = image.data[base + s];
        const width = bits[k];
        if (width === 8 && (bitPos & 7) === 0) {
          out[bitPos >>> 3] = value;
        } else if (width === 16 && (bitPos & 7) === 0) {
          view.setUint16(bitPos >>> 3, value, littleEndian);
        } else {
          writeBits(out, bitPos, width, value);
        }
        bitPos += width;
      });
    }
  }
  return out;
}

function layoutChunks(image: NormalizedImage, plan: EncodePlan): { descriptors: ChunkDescriptor[]; tags: TiffTag[] } {
  const planes = plan.planar ? image.samplesPerPixel : 1;
  const geometry: ImageGeometry = { width: image.width, height: image.height, planes };

  if (plan.tileSize !== undefined) {
    const t = plan.tileSize;
    const count = Math.ceil(image.width / t) * Math.ceil(image.height / t) * planes;
    const zeros = new Array<number>(count).fill(0);
    return {
      descriptors: tileDescriptors(geometry, t, t, zeros, zeros),
      tags: [
        { tag: TAG_TILE_WIDTH, type: TIFF_TYPE_LONG, values: [t] },
        { tag: TAG_TILE_LENGTH, type: TIFF_TYPE_LONG, values: [t] },
      ],
    };
  }

  const bitsPerPixel = plan.planar ? Math.max(...image.bitsPerSample) : sum(image.bitsPerSample);
  const fitted = Math.max(1, Math.floor(DEFAULT_STRIP_BYTES / rowByteLength(image.width, bitsPerPixel)));
  const rowsPerStrip = Math.min(plan.rowsPerStrip ?? fitted, image.height);
  const count = Math.ceil(image.height / rowsPerStrip) * planes;
  const zeros = new Array<number>(count).fill(0);
  return {
    descriptors: stripDescriptors(geometry, rowsPerStrip, zeros, zeros),
    tags: [{ tag: TAG_ROWS_PER_STRIP, type: TIFF_TYPE_LONG, values: [rowsPerStrip] }],
  };
}

const RESOLUTION_UNITS: Record<ResolutionUnit, number> = {
  none: RESOLUTION_UNIT_NONE,
  inch: RESOLUTION_UNIT_INCH,
  centimeter: RESOLUTION_UNIT_CENTIMETER,
};

/** Express a positive number as a LONG rational. */
function toRational(value: number): [number, number] {
  if (Number.isInteger(value) && value <= 0xffff_ffff) return [value, 1];
  const denominator = 10000;
  return [Math.round(value * denominator), denominator];
}

function imageTags(image: NormalizedImage, plan: EncodePlan, options: EncodeOptions, page: number, pages: number): TiffTag[] {
  const tags: TiffTag[] = [];

  if (pages > 1) {
    // multi-page document
    tags.push({ tag: TAG_NEW_SUBFILE_TYPE, type: TIFF_TYPE_LONG, values: [2] });
  }
  tags.push({ tag: TAG_IMAGE_WIDTH, type: TIFF_TYPE_LONG, values: [image.width] });
  tags.push({ tag: TAG_IMAGE_LENGTH, type: TIFF_TYPE_LONG, values: [image.height] });
  tags.push({ tag: TAG_BITS_PER_SAMPLE, type: TIFF_TYPE_SHORT, values: image.bitsPerSample });
  tags.push({ tag: TAG_COMPRESSION, type: TIFF_TYPE_SHORT, values: [compressionCode(plan.compression)] });
  tags.push({ tag: TAG_PHOTOMETRIC, type: TIFF_TYPE_SHORT, values: [image.photometric] });
  if (options.description !== undefined && page === 0) {
    tags.push({ tag: TAG_IMAGE_DESCRIPTION, type: TIFF_TYPE_ASCII, values: options.description });
  }
  tags.push({ tag: TAG_SAMPLES_PER_PIXEL, type: TIFF_TYPE_SHORT, values: [image.samplesPerPixel] });
  tags.push({ tag: TAG_X_RESOLUTION, type: TIFF_TYPE_RATIONAL, values: toRational(plan.resolution.x) });
  tags.push({ tag: TAG_Y_RESOLUTION, type: TIFF_TYPE_RATIONAL, values: toRational(plan.resolution.y) });
  tags.push({
    tag: TAG_PLANAR_CONFIGURATION,
    type: TIFF_TYPE_SHORT,
    values: [plan.planar ? PLANAR_SEPARATE : PLANAR_CHUNKY],
  });
  tags.push({ tag: TAG_RESOLUTION_UNIT, type: TIFF_TYPE_SHORT, values: [RESOLUTION_UNITS[plan.resolution.unit]] });
  if (options.software !== undefined) {
    tags.push({ tag: TAG_SOFTWARE, type: TIFF_TYPE_ASCII, values: options.software });
  }
  if (plan.predictor) {
    tags.push({ tag: TAG_PREDICTOR, type: TIFF_TYPE_SHORT, values: [PREDICTOR_HORIZONTAL] });
  }
  if (image.colorMap !== undefined) {
    tags.push({ tag: TAG_COLOR_MAP, type: TIFF_TYPE_SHORT, values: image.colorMap });
  }
  if (image.extraSamples.length > 0) {
    tags.push({ tag: TAG_EXTRA_SAMPLES, type: TIFF_TYPE_SHORT, values: image.extraSamples });
  }
  tags.push({ tag: TAG_SAMPLE_FORMAT, type: TIFF_TYPE_SHORT, values: image.sampleFormat });
  if (image.photometric === PHOTOMETRIC_YCBCR) {
    // samples are stored at full resolution
    tags.push({ tag: TAG_YCBCR_SUBSAMPLING, type: TIFF_TYPE_SHORT, values: [1, 1] });
  }

  return tags;
}

function encodePage(image: NormalizedImage, plan: EncodePlan, options: EncodeOptions, page: number, pages: number): WritableIfd {
  if (plan.predictor) {
    const bits = image.bitsPerSample[0];
    if ((bits !== 8 && bits !== 16) || image.bitsPerSample.some((b) => b !== bits)) {
      throw invalid(
        `Horizontal predictor needs equal 8- or 16-bit samples, got ${image.bitsPerSample.join(",")}`,
        TAG_PREDICTOR,
      );
    }
  }

  const { descriptors, tags: layoutTags } = layoutChunks(image, plan);
  const chunks = descriptors.map((chunk) => {
    const samples = chunkSamples(image, plan.planar, chunk.plane);
    const packed = packChunk(image, chunk, samples, plan.littleEndian);
    if (plan.predictor) {
      applyHorizontalPredictor(packed, {
        width: chunk.chunkWidth,
        rows: chunk.chunkHeight,
        stride: samples.length,
        bitsPerSample: image.bitsPerSample[0],
        littleEndian: plan.littleEndian,
      });
    }
    const rowBytes = rowByteLength(chunk.chunkWidth, sum(samples.map((s) => image.bitsPerSample[s])));
    return compressChunk(plan.compression, packed, { level: plan.level, rowBytes });
  });

  return { tags: [...imageTags(image, plan, options, page, pages), ...layoutTags], chunks };
}

/**
 * Encode several images as the pages of one file, in order.
 *
 * @throws TiffError `InvalidInput` for malformed images or options.
 */
export function encodeTiffPages(images: readonly ImageInput[], options: EncodeOptions = {}): Uint8Array {
  const log = options.logger ?? defaultLogger;
  if (images.length === 0) {
    throw invalid("At least one image is required");
  }
  const plan = resolvePlan(options);
  const ifds = images.map((input, page) => {
    const image = normalizeImage(input);
    const ifd = encodePage(image, plan, options, page, images.length);
    log.debug(COMPONENT, `encoded page ${page}`, {
      width: image.width,
      height: image.height,
      samplesPerPixel: image.samplesPerPixel,
      compression: plan.compression,
      chunks: ifd.chunks.length,
    });
    return ifd;
  });

  const bytes = new Uint8Array(buildTiff(ifds, { byteOrder: plan.littleEndian ? "little" : "big" }));
  log.debug(COMPONENT, `wrote ${bytes.length} bytes`, { pages: images.length });
  return bytes;
}

/** Encode a single image. */
export function encodeTiff(image: ImageInput, options: EncodeOptions = {}): Uint8Array {
  return encodeTiffPages([image], options);
}
