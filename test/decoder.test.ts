import { describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Decoder } from "../src/decoder.js";
import { encodeTiff, encodeTiffPages } from "../src/encoder.js";
import { attempt, TiffError, type TiffErrorKind } from "../src/errors.js";
import { pixelAt, sampleStorage } from "../src/image.js";
import { Logger, LogLevel, type LogSink } from "../src/logger.js";
import { createTaskPool, type TaskPool } from "../src/pool.js";
import {
  PHOTOMETRIC_BLACK_IS_ZERO,
  PHOTOMETRIC_RGB,
  PHOTOMETRIC_WHITE_IS_ZERO,
  TAG_COMPRESSION,
  TAG_IMAGE_DESCRIPTION,
} from "../src/tags.js";
import {
  assembleTiff,
  createRgbTiff,
  createSimpleTiff,
  stripEntries,
  tailOffset,
  type RawEntry,
} from "./fixtures.js";

const BITS_8: RawEntry = { tag: 258, type: 3, count: 1, value: 8 };

/** A single-strip image whose strip bytes are `strip`. */
function stripStream(width: number, height: number, strip: number[], extra: RawEntry[] = []): Uint8Array {
  const entries = stripEntries(width, height, tailOffset(5 + extra.length), strip.length, extra);
  return assembleTiff(entries, strip);
}

function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const sink: LogSink = {
    write: (_level, line) => {
      lines.push(line);
    },
  };
  return { logger: new Logger(LogLevel.Warn, sink), lines };
}

function expectKind(fn: () => unknown, kind: TiffErrorKind): TiffError {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(TiffError);
    if (err instanceof TiffError) {
      expect(err.kind).toBe(kind);
      return err;
    }
  }
  throw new Error(`expected a ${kind} error`);
}

describe("Decoder", () => {
  describe("opening a stream", () => {
    it("validates the header and locates the first directory", () => {
      const decoder = Decoder.fromBytes(stripStream(4, 2, [0, 1, 2, 3, 4, 5, 6, 7], [BITS_8]));
      expect(decoder.state).toBe("firstIfdLocated");
      expect(decoder.byteOrder).toBe("little");
      expect(decoder.header.firstIfdOffset).toBe(8);
    });

    it("rejects streams that are not TIFF", () => {
      expectKind(() => Decoder.fromBytes(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0, 0, 0, 0])), "InvalidHeader");
    });

    it("reports a stream without directories", () => {
      expectKind(() => Decoder.fromBytes(new Uint8Array([0x49, 0x49, 42, 0, 0, 0, 0, 0])), "NoImageData");
    });

    it("reports a first directory past the end", () => {
      const err = expectKind(
        () => Decoder.fromBytes(new Uint8Array([0x49, 0x49, 42, 0, 100, 0, 0, 0])),
        "OutOfRange",
      );
      expect(err.offset).toBe(100);
    });

    it("opens files and blobs", async () => {
      const bytes = stripStream(2, 1, [7, 9], [BITS_8]);
      const dir = await mkdtemp(join(tmpdir(), "tiff-codec-"));
      try {
        const path = join(dir, "tiny.tif");
        await writeFile(path, bytes);
        const fromFile = await Decoder.fromFile(path);
        expect(Array.from(fromFile.image().data)).toEqual([7, 9]);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }

      const fromBlob = await Decoder.fromBlob(new Blob([bytes]));
      expect(Array.from(fromBlob.image().data)).toEqual([7, 9]);
    });
  });

  describe("directories", () => {
    it("advances the state as directories and pixels are read", () => {
      const decoder = Decoder.fromBytes(stripStream(4, 2, [0, 1, 2, 3, 4, 5, 6, 7], [BITS_8]));
      decoder.ifd();
      expect(decoder.state).toBe("ifdFetched");
      decoder.image();
      expect(decoder.state).toBe("imageMaterialized");
    });

    it("walks the directory chain", () => {
      const page = (value: number) => ({
        width: 2,
        height: 2,
        samplesPerPixel: 1,
        bitsPerSample: 8,
        data: new Uint8Array(4).fill(value),
      });
      const decoder = Decoder.fromBytes(encodeTiffPages([page(1), page(2)]));

      expect(decoder.ifdCount).toBe(2);
      expect(decoder.ifd(0)).toBe(decoder.ifds()[0]);
      expect(Array.from(decoder.image(1).data)).toEqual([2, 2, 2, 2]);
      const err = expectKind(() => decoder.ifd(2), "OutOfRange");
      expect(err.message).toBe("Directory index 2 is out of range (2 directories)");
    });

    it("logs directory diagnostics as warnings", () => {
      const { logger, lines } = captureLogger();
      const bytes = stripStream(2, 1, [0, 0], [BITS_8, { tag: 256, type: 3, count: 1, value: 9 }]);
      const decoder = Decoder.fromBytes(bytes, { logger });

      expect(decoder.image().width).toBe(2);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatch(/\[WARN\] \[decoder\] Duplicate entry for ImageWidth ignored$/);
    });
  });

  describe("tag values", () => {
    it("resolves values without decoding pixels", () => {
      const bytes = stripStream(2, 1, [0, 0], [BITS_8, { tag: 259, type: 3, count: 1, value: 7 }]);
      const decoder = Decoder.fromBytes(bytes);
      expect(decoder.getUnsigned(decoder.ifd(), TAG_COMPRESSION)).toBe(7);
      expect(decoder.getUnsignedArray(decoder.ifd(), 273)).toEqual([tailOffset(7)]);
    });

    it("logs values stored with an unexpected field type", () => {
      const { logger, lines } = captureLogger();
      const bytes = stripStream(2, 1, [0, 0], [BITS_8, { tag: 270, type: 1, count: 1, value: 65 }]);
      const decoder = Decoder.fromBytes(bytes, { logger });

      expect(decoder.getValue(decoder.ifd(), TAG_IMAGE_DESCRIPTION)).toEqual({ type: "byte", values: [65] });
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatch(/\[WARN\] \[decoder\] ImageDescription stored as unexpected type byte$/);
    });

    it("returns the embedded ICC profile", () => {
      const icc: RawEntry = { tag: 34675, type: 7, count: 4, value: 0x04030201 };
      const withProfile = Decoder.fromBytes(stripStream(2, 1, [0, 0], [BITS_8, icc]));
      expect(Array.from(withProfile.iccProfile(withProfile.ifd()) ?? [])).toEqual([1, 2, 3, 4]);

      const without = Decoder.fromBytes(stripStream(2, 1, [0, 0], [BITS_8]));
      expect(without.iccProfile(without.ifd())).toBeUndefined();
    });

    it("returns byte values as copies of the stream", () => {
      const icc: RawEntry = { tag: 34675, type: 7, count: 4, value: 0x04030201 };
      const bytes = stripStream(2, 1, [0, 0], [BITS_8, icc]);
      const decoder = Decoder.fromBytes(bytes);

      const profile = decoder.iccProfile(decoder.ifd()) ?? new Uint8Array(0);
      profile.fill(0xff);
      const raw = decoder.getBytes(decoder.ifd(), 34675);
      raw[0] = 0xee;

      expect(Array.from(decoder.getBytes(decoder.ifd(), 34675))).toEqual([1, 2, 3, 4]);
      expect(bytes[8 + 2 + 6 * 12 + 8]).toBe(1);
    });
  });

  describe("images", () => {
    it("decodes an uncompressed grayscale strip", () => {
      const bytes = stripStream(4, 2, [0, 1, 2, 3, 4, 5, 6, 7], [BITS_8, { tag: 262, type: 3, count: 1, value: 1 }]);
      const image = Decoder.fromBytes(bytes).image();

      expect(image.width).toBe(4);
      expect(image.height).toBe(2);
      expect(image.samplesPerPixel).toBe(1);
      expect(image.bitsPerSample).toEqual([8]);
      expect(image.photometric).toBe(PHOTOMETRIC_BLACK_IS_ZERO);
      expect(image.data).toBeInstanceOf(Uint8Array);
      expect(Array.from(image.data)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    });

    it("decodes a PackBits strip", () => {
      const bytes = stripStream(3, 2, [0xfd, 9, 1, 1, 2], [BITS_8, { tag: 259, type: 3, count: 1, value: 32773 }]);
      expect(Array.from(Decoder.fromBytes(bytes).image().data)).toEqual([9, 9, 9, 9, 1, 2]);
    });

    it("treats a missing Photometric on one sample as WhiteIsZero", () => {
      const bytes = stripStream(2, 1, [0, 200], [BITS_8]);
      const decoder = Decoder.fromBytes(bytes);
      expect(decoder.imageInfo().photometricDefaulted).toBe(true);

      const stored = decoder.image();
      expect(stored.photometric).toBe(PHOTOMETRIC_WHITE_IS_ZERO);
      expect(Array.from(stored.data)).toEqual([0, 200]);

      const inverted = Decoder.fromBytes(bytes, { colorTransform: "rgb" }).image();
      expect(inverted.photometric).toBe(PHOTOMETRIC_BLACK_IS_ZERO);
      expect(Array.from(inverted.data)).toEqual([255, 55]);
    });

    it("expands a 1-bit palette image to RGB", () => {
      const colorMapOffset = tailOffset(7);
      const entries = stripEntries(5, 1, colorMapOffset + 12, 1, [
        { tag: 262, type: 3, count: 1, value: 3 },
        { tag: 320, type: 3, count: 6, value: colorMapOffset },
      ]);
      // ColorMap reds, greens, blues: [0, 65535] each
      const tail = [0, 0, 255, 255, 0, 0, 255, 255, 0, 0, 255, 255, 0b1011_0000];
      const image = Decoder.fromBytes(assembleTiff(entries, tail)).image();

      expect(image.photometric).toBe(PHOTOMETRIC_RGB);
      expect(image.samplesPerPixel).toBe(3);
      expect(pixelAt(image, 0, 0)).toEqual([255, 255, 255]);
      expect(pixelAt(image, 1, 0)).toEqual([0, 0, 0]);
      expect(pixelAt(image, 3, 0)).toEqual([255, 255, 255]);
      expect(pixelAt(image, 4, 0)).toEqual([0, 0, 0]);
    });

    it("decodes files written by geotiff.js", () => {
      const gray = Decoder.fromBytes(createSimpleTiff()).image();
      expect(gray.width).toBe(64);
      expect(gray.data.length).toBe(64 * 64);
      expect(pixelAt(gray, 3, 5)).toEqual([8]);
      expect(pixelAt(gray, 63, 63)).toEqual([126]);

      const rgb = Decoder.fromBytes(createRgbTiff()).image();
      expect(rgb.samplesPerPixel).toBe(3);
      expect(rgb.photometric).toBe(PHOTOMETRIC_RGB);
      expect(pixelAt(rgb, 2, 3)).toEqual([20, 30, 200]);
    });

    it("caches decoded images", () => {
      const decoder = Decoder.fromBytes(createSimpleTiff());
      const first = decoder.image();
      const second = decoder.image();
      expect(second).not.toBe(first);
      expect(second).toEqual(first);
      expect(sampleStorage(second)).toBe("uint8");
    });

    it("hands out images the caller may modify", () => {
      const decoder = Decoder.fromBytes(stripStream(2, 1, [1, 2], [BITS_8, { tag: 262, type: 3, count: 1, value: 1 }]));
      const image = decoder.image();
      image.data[0] = 99;
      image.bitsPerSample[0] = 4;

      const again = decoder.image();
      expect(Array.from(again.data)).toEqual([1, 2]);
      expect(again.bitsPerSample).toEqual([8]);
    });

    it("reports 16-bit storage", () => {
      const image = Decoder.fromBytes(stripStream(1, 1, [0x34, 0x12], [{ ...BITS_8, value: 16 }])).image();
      expect(sampleStorage(image)).toBe("uint16");
      expect(Array.from(image.data)).toEqual([0x1234]);
    });

    it("decodes past tags it does not recognise", () => {
      const { logger } = captureLogger();
      const unknown: RawEntry = { tag: 50000, type: 77, count: 9999, value: 0 };
      const bytes = stripStream(2, 1, [5, 6], [BITS_8, { tag: 262, type: 3, count: 1, value: 1 }, unknown]);
      const decoder = Decoder.fromBytes(bytes, { logger });

      expect(Array.from(decoder.image().data)).toEqual([5, 6]);
      expect(decoder.ifd().diagnostics.map((d) => d.kind)).toEqual(["TypeMismatch"]);
    });

    it("ignores YCbCr tags on images that are not YCbCr", () => {
      const subsampling: RawEntry = { tag: 530, type: 3, count: 1, value: 3 };
      const bytes = stripStream(2, 1, [7, 8], [BITS_8, { tag: 262, type: 3, count: 1, value: 1 }, subsampling]);
      expect(Array.from(Decoder.fromBytes(bytes).image().data)).toEqual([7, 8]);
    });

    it("rejects YCbCr coefficients without a usable LumaGreen", () => {
      const start = tailOffset(9);
      const entries = stripEntries(2, 1, start, 6, [
        BITS_8,
        { tag: 262, type: 3, count: 1, value: 6 },
        { tag: 277, type: 3, count: 1, value: 3 },
        { tag: 529, type: 5, count: 3, value: start + 6 },
      ]);
      // 299/1000, 0/1, 114/1000
      const coefficients = [0x2b, 1, 0, 0, 0xe8, 3, 0, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0x72, 0, 0, 0, 0xe8, 3, 0, 0];
      const decoder = Decoder.fromBytes(assembleTiff(entries, [128, 128, 128, 128, 128, 128, ...coefficients]));

      const err = expectKind(() => decoder.imageInfo(), "InconsistentLayout");
      expect(err.message).toBe("YCbCrCoefficients must hold three finite values with a positive LumaGreen");
    });

    it("refuses images larger than the size limit before allocating", () => {
      const start = tailOffset(7);
      const entries: RawEntry[] = [
        { tag: 256, type: 4, count: 1, value: 200000 },
        { tag: 257, type: 4, count: 1, value: 200000 },
        BITS_8,
        { tag: 259, type: 3, count: 1, value: 32773 },
        { tag: 273, type: 4, count: 1, value: start },
        { tag: 278, type: 4, count: 1, value: 200000 },
        { tag: 279, type: 4, count: 1, value: 2 },
      ];
      const decoder = Decoder.fromBytes(assembleTiff(entries, [0x81, 0]));

      const result = attempt(() => decoder.image());
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("UnsupportedFeature");
        expect(result.error.message).toBe(
          "Image 0 (200000x200000x1) needs 40000000000 bytes, more than the limit of 1073741824",
        );
      }
    });

    it("applies a caller-supplied size limit", () => {
      const bytes = stripStream(4, 2, [0, 1, 2, 3, 4, 5, 6, 7], [BITS_8]);
      expectKind(() => Decoder.fromBytes(bytes, { maxBytes: 7 }).image(), "UnsupportedFeature");
      expect(Decoder.fromBytes(bytes, { maxBytes: 8 }).image().data).toHaveLength(8);
    });

    it("reports unsupported content when pixels are requested", () => {
      const cases: Array<[RawEntry, TiffErrorKind, string]> = [
        [{ tag: 259, type: 3, count: 1, value: 7 }, "UnsupportedCompression", "Unsupported compression: JPEG"],
        [{ tag: 339, type: 3, count: 1, value: 3 }, "UnsupportedFeature", "Floating-point samples are not supported"],
        [{ tag: 317, type: 3, count: 1, value: 3 }, "UnsupportedFeature", "Floating-point predictor is not supported"],
      ];
      for (const [entry, kind, message] of cases) {
        const decoder = Decoder.fromBytes(stripStream(2, 1, [0, 0], [BITS_8, entry]));
        const err = expectKind(() => decoder.image(), kind);
        expect(err.message).toBe(message);
      }

      const wide = Decoder.fromBytes(stripStream(2, 1, [0, 0, 0, 0, 0, 0, 0, 0], [{ ...BITS_8, value: 32 }]));
      expect(expectKind(() => wide.image(), "UnsupportedFeature").message).toBe(
        "Unsupported bit depth: 32 bits per sample",
      );
    });

    it("returns failures as results through attempt", () => {
      const bytes = stripStream(2, 1, [0, 0], [BITS_8, { tag: 259, type: 3, count: 1, value: 7 }]);
      const decoder = Decoder.fromBytes(bytes);
      const result = attempt(() => decoder.image());
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe("UnsupportedCompression");
    });
  });

  describe("imageAsync", () => {
    const input = {
      width: 6,
      height: 5,
      samplesPerPixel: 3,
      bitsPerSample: 8,
      data: Uint8Array.from({ length: 90 }, (_, i) => (i * 7) % 256),
    };

    it("matches the sequential decode", async () => {
      const bytes = encodeTiff(input, { compression: "lzw", rowsPerStrip: 1 });
      const sequential = Decoder.fromBytes(bytes).image();
      const parallel = await Decoder.fromBytes(bytes, { concurrency: 2 }).imageAsync();
      expect(parallel.data).toEqual(sequential.data);
      expect(Array.from(parallel.data)).toEqual(Array.from(input.data));
    });

    it("runs chunks on the supplied pool", async () => {
      const inner = createTaskPool(2);
      const batches: number[] = [];
      const pool: TaskPool = {
        runTasks<T>(tasks: Array<() => Promise<T>>): Promise<T[]> {
          batches.push(tasks.length);
          return inner.runTasks(tasks);
        },
      };
      const bytes = encodeTiff(input, { rowsPerStrip: 2 });
      const decoder = Decoder.fromBytes(bytes, { pool });

      const image = await decoder.imageAsync();
      expect(batches).toEqual([3]);
      expect(await decoder.imageAsync()).toEqual(image);
      expect(decoder.image()).toEqual(image);
    });

    it("rejects when a chunk fails", async () => {
      const bytes = stripStream(3, 2, [0xfd, 9], [BITS_8, { tag: 259, type: 3, count: 1, value: 32773 }]);
      await expect(Decoder.fromBytes(bytes).imageAsync()).rejects.toMatchObject({ kind: "CodecError" });
    });
  });
});
