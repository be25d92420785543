// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * tiff-codec
 *
 * Decode and encode TIFF raster images: directory and tag parsing,
 * stripped and tiled layouts, PackBits, LZW and Deflate compression.
 *
 * @example
 * ```ts
 * import { Decoder, encodeTiff } from "tiff-codec";
 *
 * const decoder = await Decoder.fromFile("input.tif");
 * const image = decoder.image();
 * const bytes = encodeTiff(image, { compression: "lzw" });
 * ```
 */

// Decoder
export { Decoder, type DecoderOptions, type DecoderState } from "./decoder.js";
export type { ImageInfo } from "./image-info.js";
export { copyImage, pixelAt, sampleStorage, type ImageInput, type TiffImage } from "./image.js";
export type { ColorTransform } from "./assembler.js";
export { createTaskPool, type TaskPool } from "./pool.js";

// Encoder
export { encodeTiff, encodeTiffPages, type EncodeOptions, type Resolution, type ResolutionUnit } from "./encoder.js";
export { buildTiff, type BuildTiffOptions, type TiffTag, type WritableIfd } from "./tiff-writer.js";

// Structure
export { ByteCursor, type Rational } from "./byte-cursor.js";
export {
  parseHeader,
  parseIfd,
  parseIfdChain,
  type ByteOrder,
  type IfdChain,
  type TiffHeader,
} from "./directory.js";
export { Ifd, type Diagnostic, type IfdEntry } from "./ifd.js";
export { readChunkLayout, type ChunkDescriptor, type ChunkLayout } from "./layout.js";
export {
  asUnsignedArray,
  getAscii,
  getBytes,
  getRationals,
  getUnsigned,
  getUnsignedArray,
  getValue,
  resolveValue,
  type ResolvedValue,
} from "./values.js";
export * from "./tags.js";

// Codecs
export {
  compressChunk,
  compressionFromCode,
  decompressChunk,
  decodePackBits,
  encodePackBits,
  type CompressionKind,
} from "./compression.js";
export { lzwDecode, lzwEncode } from "./lzw.js";
export { applyHorizontalPredictor, undoHorizontalPredictor } from "./predictor.js";

// Samples
export { bytesPerElement, storageForBits, type SampleArray, type SampleStorage } from "./dtypes.js";
export { toArrayBuffer } from "./utils.js";

// Errors and logging
export { attempt, attemptAsync, isTiffError, TiffError, type Result, type TiffErrorKind } from "./errors.js";
export { Logger, LogLevel, logger, parseLogLevel, type LogSink } from "./logger.js";
