// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Pixel assembly.
 *
 * `placeChunk` unpacks one decompressed chunk into its region of an
 * interleaved sample buffer; `applyPhotometric` then turns the assembled
 * samples into the output colour representation.
 *
 * Chunk rows start on byte boundaries. Sub-byte samples are read most
 * significant bit first and keep their raw value (no rescaling). 16-bit
 * samples follow the stream's byte order.
 */

import { allocateSamples, type SampleArray, storageForBits } from "./dtypes.js";
import { TiffError } from "./errors.js";
import type { ImageInfo } from "./image-info.js";
import type { ChunkDescriptor } from "./layout.js";
import {
  PHOTOMETRIC_BLACK_IS_ZERO,
  PHOTOMETRIC_CMYK,
  PHOTOMETRIC_PALETTE,
  PHOTOMETRIC_RGB,
  PHOTOMETRIC_WHITE_IS_ZERO,
  PHOTOMETRIC_YCBCR,
  PLANAR_SEPARATE,
  TAG_COLOR_MAP,
  TAG_INK_SET,
} from "./tags.js";
import { readBits, rowByteLength, sum } from "./utils.js";

/**
 * Colour handling for decoded pixels.
 *   - "none": samples as stored (palette images are still expanded to RGB)
 *   - "rgb": additionally invert WhiteIsZero and convert CMYK and YCbCr to RGB
 */
export type ColorTransform = "none" | "rgb";

/** The subset of {@link ImageInfo} the assembler reads. */
export type PixelLayout = Pick<
  ImageInfo,
  | "width"
  | "height"
  | "samplesPerPixel"
  | "bitsPerSample"
  | "photometric"
  | "planarConfiguration"
  | "ycbcrSubsampling"
  | "littleEndian"
>;

/** Interleaved samples of the whole image, as stored. */
export interface SampleBuffer {
  width: number;
  height: number;
  samplesPerPixel: number;
  data: SampleArray;
}

export function allocateSampleBuffer(layout: PixelLayout): SampleBuffer {
  const { width, height, samplesPerPixel } = layout;
  return {
    width,
    height,
    samplesPerPixel,
    data: allocateSamples(storageForBits(layout.bitsPerSample), width * height * samplesPerPixel),
  };
}

/** True when chunky YCbCr data is stored in subsampled data units. */
function isSubsampled(layout: PixelLayout): boolean {
  const [h, v] = layout.ycbcrSubsampling;
  return (
    layout.photometric === PHOTOMETRIC_YCBCR &&
    layout.planarConfiguration !== PLANAR_SEPARATE &&
    (h !== 1 || v !== 1)
  );
}

function checkSubsampled(layout: PixelLayout): void {
  if (layout.samplesPerPixel !== 3 || layout.bitsPerSample.some((b) => b !== 8)) {
    throw new TiffError("UnsupportedFeature", "Subsampled YCbCr is supported for 3 x 8-bit samples only");
  }
}

/** Decompressed size in bytes of one chunk. */
export function chunkByteLength(layout: PixelLayout, chunk: ChunkDescriptor): number {
  if (isSubsampled(layout)) {
    checkSubsampled(layout);
    const [h, v] = layout.ycbcrSubsampling;
    const units = Math.ceil(chunk.chunkWidth / h) * Math.ceil(chunk.chunkHeight / v);
    return units * (h * v + 2);
  }
  const bitsPerPixel =
    layout.planarConfiguration === PLANAR_SEPARATE ? layout.bitsPerSample[chunk.plane] : sum(layout.bitsPerSample);
  return rowByteLength(chunk.chunkWidth, bitsPerPixel) * chunk.chunkHeight;
}

function readSample(bytes: Uint8Array, view: DataView, bitPos: number, bits: number, littleEndian: boolean): number {
  if ((bitPos & 7) === 0) {
    if (bits === 8) return bytes[bitPos >>> 3];
    if (bits === 16) return view.getUint16(bitPos >>> 3, littleEndian);
  }
  return readBits(bytes, bitPos, bits);
}

/**
 * Copy the samples of one decompressed chunk into `target`, clipping edge
 * tiles to the image. Writes only the pixels the chunk covers.
 */
export function placeChunk(decoded: Uint8Array, chunk: ChunkDescriptor, layout: PixelLayout, target: SampleBuffer): void {
  if (isSubsampled(layout)) {
    placeSubsampled(decoded, chunk, layout, target);
    return;
  }

  const { samplesPerPixel: spp, bitsPerSample, littleEndian } = layout;
  const { data, width } = target;
  const view = new DataView(decoded.buffer, decoded.byteOffset, decoded.byteLength);

  if (layout.planarConfiguration === PLANAR_SEPARATE) {
    const bits = bitsPerSample[chunk.plane];
    const rowBytes = rowByteLength(chunk.chunkWidth, bits);
    for (let r = 0; r < chunk.height; r++) {
      let bitPos = r * rowBytes * 8;
      let dst = ((chunk.y + r) * width + chunk.x) * spp + chunk.plane;
      for (let c = 0; c < chunk.width; c++) {
        data[dst] = readSample(decoded, view, bitPos, bits, littleEndian);
        bitPos += bits;
        dst += spp;
      }
    }
    return;
  }

  const bitsPerPixel = sum(bitsPerSample);
  const rowBytes = rowByteLength(chunk.chunkWidth, bitsPerPixel);
  const allBytes = data instanceof Uint8Array && bitsPerSample.every((b) => b === 8);

  for (let r = 0; r < chunk.height; r++) {
    const srcRow = r * rowBytes;
    const dstRow = ((chunk.y + r) * width + chunk.x) * spp;
    if (allBytes) {
      data.set(decoded.subarray(srcRow, srcRow + chunk.width * spp), dstRow);
      continue;
    }
    let bitPos = srcRow * 8;
    let dst = dstRow;
    for (let c = 0; c < chunk.width; c++) {
      for (let s = 0; s < spp; s++) {
        data[dst++] = readSample(decoded, view, bitPos, bitsPerSample[s], littleEndian);
        bitPos += bitsPerSample[s];
      }
    }
  }
}

/**
 * Subsampled YCbCr: each data unit holds h * v luma samples followed by
 * one Cb and one Cr shared by the whole unit.
 */
function placeSubsampled(decoded: Uint8Array, chunk: ChunkDescriptor, layout: PixelLayout, target: SampleBuffer): void {
  checkSubsampled(layout);
  const [h, v] = layout.ycbcrSubsampling;
  const unitsAcross = Math.ceil(chunk.chunkWidth / h);
  const unitsDown = Math.ceil(chunk.chunkHeight / v);
  const unitSize = h * v + 2;
  const { data, width } = target;

  let src = 0;
  for (let uy = 0; uy < unitsDown; uy++) {
    for (let ux = 0; ux < unitsAcross; ux++) {
      const cb = decoded[src + h * v];
      const cr = decoded[src + h * v + 1];
      for (let by = 0; by < v; by++) {
        const row = uy * v + by;
        if (row >= chunk.height) continue;
        for (let bx = 0; bx < h; bx++) {
          const col = ux * h + bx;
          if (col >= chunk.width) continue;
          const dst = ((chunk.y + row) * width + chunk.x + col) * 3;
          data[dst] = decoded[src + by * h + bx];
          data[dst + 1] = cb;
          data[dst + 2] = cr;
        }
      }
      src += unitSize;
    }
  }
}

// ── Photometric interpretation ──────────────────────────────────────

/** Pixels in their output representation. */
export interface PixelResult {
  data: SampleArray;
  samplesPerPixel: number;
  bitsPerSample: number[];
  photometric: number;
}

type PhotometricLayout = PixelLayout & Pick<ImageInfo, "extraSamples" | "colorMap" | "inkSet" | "ycbcrCoefficients">;

function expandPalette(buffer: SampleBuffer, layout: PhotometricLayout): PixelResult {
  const { colorMap } = layout;
  if (colorMap === undefined) {
    throw new TiffError("MissingRequiredTag", "Palette image has no ColorMap", { tag: TAG_COLOR_MAP });
  }
  const entries = 2 ** layout.bitsPerSample[0];
  if (colorMap.length !== 3 * entries) {
    throw new TiffError(
      "InconsistentLayout",
      `ColorMap has ${colorMap.length} values, expected ${3 * entries} for ${layout.bitsPerSample[0]}-bit indices`,
      { tag: TAG_COLOR_MAP },
    );
  }

  const pixels = buffer.width * buffer.height;
  const out = new Uint8Array(pixels * 3);
  for (let i = 0; i < pixels; i++) {
    const index = buffer.data[i * buffer.samplesPerPixel];
    out[i * 3] = colorMap[index] >>> 8;
    out[i * 3 + 1] = colorMap[entries + index] >>> 8;
    out[i * 3 + 2] = colorMap[2 * entries + index] >>> 8;
  }
  return { data: out, samplesPerPixel: 3, bitsPerSample: [8, 8, 8], photometric: PHOTOMETRIC_RGB };
}

function invertGray(buffer: SampleBuffer, layout: PhotometricLayout): PixelResult {
  const spp = buffer.samplesPerPixel;
  const colorSamples = Math.max(1, spp - layout.extraSamples.length);
  const out = buffer.data.slice();
  for (let i = 0; i < out.length; i += spp) {
    for (let s = 0; s < colorSamples; s++) {
      out[i + s] = 2 ** layout.bitsPerSample[s] - 1 - out[i + s];
    }
  }
  return {
    data: out,
    samplesPerPixel: spp,
    bitsPerSample: [...layout.bitsPerSample],
    photometric: PHOTOMETRIC_BLACK_IS_ZERO,
  };
}

function cmykToRgb(buffer: SampleBuffer, layout: PhotometricLayout): PixelResult {
  if (layout.inkSet !== 1 || buffer.samplesPerPixel < 4) {
    throw new TiffError("UnsupportedFeature", "Only four-ink CMYK can be converted to RGB", { tag: TAG_INK_SET });
  }
  const bits = layout.bitsPerSample[0];
  if (layout.bitsPerSample.slice(0, 4).some((b) => b !== bits)) {
    throw new TiffError("UnsupportedFeature", "CMYK conversion needs equal bit depths for all inks");
  }
  const max = 2 ** bits - 1;
  const spp = buffer.samplesPerPixel;
  const pixels = buffer.width * buffer.height;
  const out = allocateSamples(storageForBits([bits]), pixels * 3);
  for (let i = 0; i < pixels; i++) {
    const src = i * spp;
    const k = max - buffer.data[src + 3];
    out[i * 3] = Math.round(((max - buffer.data[src]) * k) / max);
    out[i * 3 + 1] = Math.round(((max - buffer.data[src + 1]) * k) / max);
    out[i * 3 + 2] = Math.round(((max - buffer.data[src + 2]) * k) / max);
  }
  return { data: out, samplesPerPixel: 3, bitsPerSample: [bits, bits, bits], photometric: PHOTOMETRIC_RGB };
}

function clampByte(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}

function ycbcrToRgb(buffer: SampleBuffer, layout: PhotometricLayout): PixelResult {
  if (buffer.samplesPerPixel < 3 || layout.bitsPerSample.slice(0, 3).some((b) => b !== 8)) {
    throw new TiffError("UnsupportedFeature", "YCbCr conversion needs three 8-bit samples");
  }
  const [lumaRed, lumaGreen, lumaBlue] = layout.ycbcrCoefficients;
  const spp = buffer.samplesPerPixel;
  const pixels = buffer.width * buffer.height;
  const out = new Uint8Array(pixels * 3);
  for (let i = 0; i < pixels; i++) {
    const src = i * spp;
    const y = buffer.data[src];
    const cb = buffer.data[src + 1] - 128;
    const cr = buffer.data[src + 2] - 128;
    const red = y + cr * (2 - 2 * lumaRed);
    const blue = y + cb * (2 - 2 * lumaBlue);
    const green = (y - lumaBlue * blue - lumaRed * red) / lumaGreen;
    out[i * 3] = clampByte(red);
    out[i * 3 + 1] = clampByte(green);
    out[i * 3 + 2] = clampByte(blue);
  }
  return { data: out, samplesPerPixel: 3, bitsPerSample: [8, 8, 8], photometric: PHOTOMETRIC_RGB };
}

/**
 * Produce output pixels from assembled samples. Palette images always
 * expand to 8-bit RGB (16-bit map entries keep their high byte); other
 * conversions run only under `transform: "rgb"`.
 */
export function applyPhotometric(buffer: SampleBuffer, layout: PhotometricLayout, transform: ColorTransform): PixelResult {
  if (layout.photometric === PHOTOMETRIC_PALETTE) {
    return expandPalette(buffer, layout);
  }
  if (transform === "rgb") {
    switch (layout.photometric) {
      case PHOTOMETRIC_WHITE_IS_ZERO:
        return invertGray(buffer, layout);
      case PHOTOMETRIC_CMYK:
        return cmykToRgb(buffer, layout);
      case PHOTOMETRIC_YCBCR:
        return ycbcrToRgb(buffer, layout);
    }
  }
  return {
    data: buffer.data,
    samplesPerPixel: buffer.samplesPerPixel,
    bitsPerSample: [...layout.bitsPerSample],
    photometric: layout.photometric,
  };
}
