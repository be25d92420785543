// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Decoder facade.
 *
 * Opening a decoder validates the header and locates the first directory.
 * Directories are parsed on demand; pixels are reconstructed only by
 * {@link Decoder.image} and {@link Decoder.imageAsync}:
 *
 *   chunk bytes → codec → predictor → placement → photometric
 *
 * @example
 * ```ts
 * const decoder = await Decoder.fromFile("scan.tif");
 * const image = decoder.image();
 * console.log(image.width, image.height, image.samplesPerPixel);
 * ```
 */

import { readFile } from "node:fs/promises";
import {
  allocateSampleBuffer,
  applyPhotometric,
  chunkByteLength,
  type ColorTransform,
  placeChunk,
  type SampleBuffer,
} from "./assembler.js";
import { ByteCursor, type Rational } from "./byte-cursor.js";
import { compressionFromCode, decompressChunk, type CompressionKind } from "./compression.js";
import { parseHeader, parseIfd, parseIfdChain, type ByteOrder, type TiffHeader } from "./directory.js";
import { bytesPerElement, checkSampleFormat, storageForBits } from "./dtypes.js";
import { TiffError } from "./errors.js";
import type { Ifd } from "./ifd.js";
import { copyImage, type TiffImage } from "./image.js";
import { readImageInfo, type ImageInfo } from "./image-info.js";
import type { ChunkDescriptor } from "./layout.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { createTaskPool, type TaskPool } from "./pool.js";
import { undoHorizontalPredictor } from "./predictor.js";
import {
  isExpectedType,
  PHOTOMETRIC_PALETTE,
  PLANAR_SEPARATE,
  PREDICTOR_FLOATING_POINT,
  PREDICTOR_HORIZONTAL,
  PREDICTOR_NONE,
  TAG_ICC_PROFILE,
  TAG_PREDICTOR,
  tagName,
  typeName,
} from "./tags.js";
import {
  getAscii,
  getBytes,
  getRationals,
  getUnsigned,
  getUnsignedArray,
  getValue,
  type ResolvedValue,
} from "./values.js";

const COMPONENT = "decoder";

/** Progress of a decode session. */
export type DecoderState = "headerValidated" | "firstIfdLocated" | "ifdFetched" | "imageMaterialized";

export interface DecoderOptions {
  /** Default: "none". */
  colorTransform?: ColorTransform;
  /** Longest directory chain that is followed. Default: 1024. */
  maxIfds?: number;
  /** Chunks decoded at once by {@link Decoder.imageAsync}. Default: 4. */
  concurrency?: number;
  /** Pool used by {@link Decoder.imageAsync} instead of a new one. */
  pool?: TaskPool;
  /**
   * Largest decoded image, or single decompressed chunk, in bytes.
   * Default: 1 GiB.
   */
  maxBytes?: number;
  logger?: Logger;
}

/** Everything the chunk pipeline needs for one directory. */
interface DecodePlan {
  index: number;
  info: ImageInfo;
  codec: CompressionKind;
  target: SampleBuffer;
}

export class Decoder {
  readonly header: TiffHeader;
  private readonly cursor: ByteCursor;
  private readonly colorTransform: ColorTransform;
  private readonly maxIfds: number;
  private readonly concurrency: number;
  private readonly pool: TaskPool | undefined;
  private readonly maxBytes: number;
  private readonly log: Logger;

  private currentState: DecoderState;
  private firstIfd: Ifd | undefined;
  private chain: Ifd[] | undefined;
  private readonly images = new Map<number, TiffImage>();

  private constructor(source: ByteCursor, options: DecoderOptions) {
    this.log = options.logger ?? defaultLogger;
    this.colorTransform = options.colorTransform ?? "none";
    this.maxIfds = options.maxIfds ?? 1024;
    this.concurrency = options.concurrency ?? 4;
    this.pool = options.pool;
    this.maxBytes = options.maxBytes ?? 2 ** 30;

    this.header = parseHeader(source);
    this.cursor = source.withByteOrder(this.header.littleEndian);
    this.currentState = "headerValidated";
    this.log.debug(COMPONENT, "header validated", {
      byteOrder: this.header.byteOrder,
      firstIfdOffset: this.header.firstIfdOffset,
    });

    const first = this.header.firstIfdOffset;
    if (first === 0) {
      throw new TiffError("NoImageData", "Stream contains no image directories", { offset: 4 });
    }
    if (!this.cursor.contains(first, 2)) {
      throw new TiffError("OutOfRange", `First IFD offset ${first} is past the end of the stream`, { offset: first });
    }
    this.currentState = "firstIfdLocated";
  }

  /** Open an in-memory stream. The bytes are read in place, not copied. */
  static fromBytes(source: ArrayBuffer | Uint8Array, options: DecoderOptions = {}): Decoder {
    return new Decoder(ByteCursor.from(source), options);
  }

  static async fromBlob(blob: Blob, options: DecoderOptions = {}): Promise<Decoder> {
    return Decoder.fromBytes(await blob.arrayBuffer(), options);
  }

  static async fromFile(path: string, options: DecoderOptions = {}): Promise<Decoder> {
    return Decoder.fromBytes(await readFile(path), options);
  }

  get state(): DecoderState {
    return this.currentState;
  }

  get byteOrder(): ByteOrder {
    return this.header.byteOrder;
  }

  // ── Directories ───────────────────────────────────────────────────

  /**
   * The directory at `index` in the chain (default: the first).
   *
   * @throws TiffError `OutOfRange` when the chain is shorter.
   */
  ifd(index: number = 0): Ifd {
    if (index === 0) {
      if (this.firstIfd === undefined) {
        this.firstIfd = parseIfd(this.cursor, this.header.firstIfdOffset);
        this.reportDiagnostics(this.firstIfd, 0);
      }
      this.markFetched();
      return this.firstIfd;
    }

    const chain = this.ifds();
    const ifd = chain[index];
    if (ifd === undefined) {
      throw new TiffError(
        "OutOfRange",
        `Directory index ${index} is out of range (${chain.length} directories)`,
      );
    }
    return ifd;
  }

  /** Every directory reachable through the next-IFD links. */
  ifds(): Ifd[] {
    if (this.chain === undefined) {
      const { ifds, diagnostics } = parseIfdChain(this.cursor, this.header.firstIfdOffset, this.maxIfds);
      ifds.forEach((ifd, i) => {
        if (i > 0 || this.firstIfd === undefined) this.reportDiagnostics(ifd, i);
      });
      for (const d of diagnostics) {
        this.log.warn(COMPONENT, d.message, { kind: d.kind, offset: d.offset });
      }
      this.log.debug(COMPONENT, `directory chain holds ${ifds.length} entries`);
      if (this.firstIfd === undefined) {
        this.firstIfd = ifds[0];
      } else {
        ifds[0] = this.firstIfd;
      }
      this.chain = ifds;
    }
    this.markFetched();
    return [...this.chain];
  }

  get ifdCount(): number {
    return this.ifds().length;
  }

  private reportDiagnostics(ifd: Ifd, index: number): void {
    this.log.debug(COMPONENT, `parsed directory ${index}`, { offset: ifd.offset, entries: ifd.size });
    for (const d of ifd.diagnostics) {
      this.log.warn(COMPONENT, d.message, { directory: index, kind: d.kind, tag: d.tag, offset: d.offset });
    }
  }

  private markFetched(): void {
    if (this.currentState === "firstIfdLocated") this.currentState = "ifdFetched";
  }

  // ── Tag values ────────────────────────────────────────────────────

  /**
   * Resolve one entry without touching pixel data. A field type the tag
   * registry does not expect is logged, not rejected.
   *
   * @throws TiffError `TagNotFound` when the tag is absent, `OutOfRange`
   *   when its value lies outside the stream.
   */
  getValue(ifd: Ifd, tag: number): ResolvedValue {
    const entry = ifd.get(tag);
    if (entry !== undefined && !isExpectedType(tag, entry.type)) {
      this.log.warn(COMPONENT, `${tagName(tag)} stored as unexpected type ${typeName(entry.type) ?? entry.rawType}`);
    }
    return getValue(this.cursor, ifd, tag);
  }

  getUnsigned(ifd: Ifd, tag: number): number {
    return getUnsigned(this.cursor, ifd, tag);
  }

  getUnsignedArray(ifd: Ifd, tag: number): number[] {
    return getUnsignedArray(this.cursor, ifd, tag);
  }

  getAscii(ifd: Ifd, tag: number): string {
    return getAscii(this.cursor, ifd, tag);
  }

  getRationals(ifd: Ifd, tag: number): Rational[] {
    return getRationals(this.cursor, ifd, tag);
  }

  getBytes(ifd: Ifd, tag: number): Uint8Array {
    return getBytes(this.cursor, ifd, tag);
  }

  /** The embedded ICC profile, uninterpreted. */
  iccProfile(ifd: Ifd): Uint8Array | undefined {
    return ifd.has(TAG_ICC_PROFILE) ? this.getBytes(ifd, TAG_ICC_PROFILE) : undefined;
  }

  // ── Images ────────────────────────────────────────────────────────

  /** Layout summary of directory `index`, without decoding pixels. */
  imageInfo(index: number = 0): ImageInfo {
    return readImageInfo(this.cursor, this.ifd(index));
  }

  /**
   * Decode the image of directory `index`. Results are cached, so repeated
   * calls return equal images without re-reading the stream. Each call
   * returns its own copy of the samples.
   */
  image(index: number = 0): TiffImage {
    const cached = this.images.get(index);
    if (cached !== undefined) return copyImage(cached);

    const plan = this.plan(index);
    for (const chunk of plan.info.layout.descriptors) {
      placeChunk(this.decodeChunk(plan, chunk), chunk, plan.info, plan.target);
    }
    return this.finish(plan);
  }

  /**
   * Like {@link image}, but chunks are decoded through a task pool. Each
   * chunk writes a region of the output no other chunk covers. The first
   * failure rejects the call and stops further dispatch.
   */
  async imageAsync(index: number = 0): Promise<TiffImage> {
    const cached = this.images.get(index);
    if (cached !== undefined) return copyImage(cached);

    const plan = this.plan(index);
    const pool = this.pool ?? createTaskPool(this.concurrency);
    await pool.runTasks(
      plan.info.layout.descriptors.map((chunk) => async () => {
        placeChunk(this.decodeChunk(plan, chunk), chunk, plan.info, plan.target);
      }),
    );
    return this.finish(plan);
  }

  private plan(index: number): DecodePlan {
    const info = this.imageInfo(index);
    checkSampleFormat(info.sampleFormat);
    const storage = storageForBits(info.bitsPerSample);
    const codec = compressionFromCode(info.compression);
    this.checkPredictor(info);

    const pixels = info.width * info.height;
    const samples = pixels * info.samplesPerPixel;
    const paletteBytes = info.photometric === PHOTOMETRIC_PALETTE ? pixels * 3 : 0;
    const bytes = Math.max(samples * bytesPerElement(storage), paletteBytes);
    this.checkSize(bytes, `Image ${index} (${info.width}x${info.height}x${info.samplesPerPixel})`);

    this.log.debug(COMPONENT, `decoding image ${index}`, {
      width: info.width,
      height: info.height,
      samplesPerPixel: info.samplesPerPixel,
      bitsPerSample: info.bitsPerSample,
      compression: codec,
      chunks: info.layout.descriptors.length,
    });
    return { index, info, codec, target: allocateSampleBuffer(info) };
  }

  private checkSize(bytes: number, what: string): void {
    if (bytes > this.maxBytes) {
      throw new TiffError(
        "UnsupportedFeature",
        `${what} needs ${bytes} bytes, more than the limit of ${this.maxBytes}`,
      );
    }
  }

  private checkPredictor(info: ImageInfo): void {
    switch (info.predictor) {
      case PREDICTOR_NONE:
        return;
      case PREDICTOR_HORIZONTAL: {
        const bits = info.bitsPerSample[0];
        if ((bits !== 8 && bits !== 16) || info.bitsPerSample.some((b) => b !== bits)) {
          throw new TiffError(
            "UnsupportedFeature",
            `Horizontal predictor needs equal 8- or 16-bit samples, got ${info.bitsPerSample.join(",")}`,
            { tag: TAG_PREDICTOR },
          );
        }
        return;
      }
      case PREDICTOR_FLOATING_POINT:
        throw new TiffError("UnsupportedFeature", "Floating-point predictor is not supported", { tag: TAG_PREDICTOR });
      default:
        throw new TiffError("UnsupportedFeature", `Unknown predictor ${info.predictor}`, { tag: TAG_PREDICTOR });
    }
  }

  private decodeChunk(plan: DecodePlan, chunk: ChunkDescriptor): Uint8Array {
    const { info } = plan;
    const expected = chunkByteLength(info, chunk);
    this.checkSize(expected, `Chunk ${chunk.index}`);
    const raw = this.cursor.slice(chunk.offset, chunk.byteCount);
    this.log.trace(COMPONENT, `chunk ${chunk.index}`, { offset: chunk.offset, byteCount: chunk.byteCount, expected });

    const decoded = decompressChunk(plan.codec, raw, expected);
    if (info.predictor === PREDICTOR_HORIZONTAL) {
      undoHorizontalPredictor(decoded, {
        width: chunk.chunkWidth,
        rows: chunk.chunkHeight,
        stride: info.planarConfiguration === PLANAR_SEPARATE ? 1 : info.samplesPerPixel,
        bitsPerSample: info.bitsPerSample[0],
        littleEndian: info.littleEndian,
      });
    }
    return decoded;
  }

  private finish(plan: DecodePlan): TiffImage {
    const { info } = plan;
    const pixels = applyPhotometric(plan.target, info, this.colorTransform);
    const sameSamples = pixels.samplesPerPixel === info.samplesPerPixel;
    const image: TiffImage = {
      width: info.width,
      height: info.height,
      samplesPerPixel: pixels.samplesPerPixel,
      bitsPerSample: pixels.bitsPerSample,
      photometric: pixels.photometric,
      planarConfiguration: info.planarConfiguration,
      compression: info.compression,
      predictor: info.predictor,
      sampleFormat: sameSamples ? [...info.sampleFormat] : new Array<number>(pixels.samplesPerPixel).fill(1),
      extraSamples: sameSamples ? [...info.extraSamples] : [],
      data: pixels.data,
    };
    this.images.set(plan.index, image);
    this.currentState = "imageMaterialized";
    return copyImage(image);
  }
}
