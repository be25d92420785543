import { describe, it, expect } from "vitest";
import { ByteCursor } from "../src/byte-cursor.js";
import { parseHeader, parseIfd, parseIfdChain } from "../src/directory.js";
import { TiffError, type TiffErrorKind } from "../src/errors.js";
import {
  asUnsignedArray,
  getAscii,
  getBytes,
  getRationals,
  getUnsigned,
  getUnsignedArray,
  getValue,
} from "../src/values.js";
import { assembleTiff, tailOffset, type RawEntry } from "./fixtures.js";

function cursorFor(bytes: Uint8Array): ByteCursor {
  const raw = ByteCursor.from(bytes);
  return raw.withByteOrder(parseHeader(raw).littleEndian);
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

/** Bytes of a standalone directory: count, 12-byte entries, next offset. */
function directoryBytes(entries: readonly RawEntry[], next: number): number[] {
  const bytes = new Uint8Array(2 + 12 * entries.length + 4);
  const view = new DataView(bytes.buffer);
  view.setUint16(0, entries.length, true);
  entries.forEach((e, i) => {
    view.setUint16(2 + i * 12, e.tag, true);
    view.setUint16(4 + i * 12, e.type, true);
    view.setUint32(6 + i * 12, e.count, true);
    view.setUint32(10 + i * 12, e.value, true);
  });
  view.setUint32(2 + 12 * entries.length, next, true);
  return Array.from(bytes);
}

describe("parseHeader", () => {
  it("reads a little-endian header", () => {
    const header = parseHeader(ByteCursor.from(assembleTiff([])));
    expect(header).toEqual({ byteOrder: "little", littleEndian: true, magic: 42, firstIfdOffset: 8 });
  });

  it("reads a big-endian header", () => {
    const header = parseHeader(ByteCursor.from(assembleTiff([], [], false)));
    expect(header.byteOrder).toBe("big");
    expect(header.firstIfdOffset).toBe(8);
  });

  it("rejects an unknown byte-order mark", () => {
    const err = expectKind(
      () => parseHeader(ByteCursor.from(new Uint8Array([0x49, 0x4d, 42, 0, 8, 0, 0, 0]))),
      "InvalidHeader",
    );
    expect(err.message).toBe("Unrecognised byte-order mark 0x494d");
  });

  it("rejects other versions", () => {
    const err = expectKind(
      () => parseHeader(ByteCursor.from(new Uint8Array([0x49, 0x49, 43, 0, 8, 0, 0, 0]))),
      "InvalidHeader",
    );
    expect(err.message).toBe("Unsupported TIFF version 43");
  });

  it("reports truncated headers as unexpected end of stream", () => {
    expectKind(() => parseHeader(ByteCursor.from(new Uint8Array([0x49]))), "UnexpectedEof");
    const err = expectKind(
      () => parseHeader(ByteCursor.from(new Uint8Array([0x4d, 0x4d, 0, 42, 0]))),
      "UnexpectedEof",
    );
    expect(err.offset).toBe(4);
  });

  it("rejects a first directory inside the header", () => {
    expectKind(
      () => parseHeader(ByteCursor.from(new Uint8Array([0x49, 0x49, 42, 0, 4, 0, 0, 0]))),
      "InvalidHeader",
    );
  });
});

describe("parseIfd", () => {
  it("locates inline and offset values", () => {
    const entries: RawEntry[] = [
      { tag: 256, type: 3, count: 1, value: 3 },
      { tag: 270, type: 2, count: 6, value: tailOffset(2) },
    ];
    const bytes = assembleTiff(entries, [...Buffer.from("hello"), 0]);
    const cursor = cursorFor(bytes);
    const ifd = parseIfd(cursor, 8);

    expect(ifd.size).toBe(2);
    expect(ifd.tags()).toEqual([256, 270]);
    expect(ifd.isLast).toBe(true);
    expect(ifd.diagnostics).toEqual([]);

    const width = ifd.get(256);
    expect(width?.inline).toBe(true);
    expect(width?.valueOffset).toBe(18);

    const description = ifd.get(270);
    expect(description?.inline).toBe(false);
    expect(description?.valueOffset).toBe(tailOffset(2));
    expect(getAscii(cursor, ifd, 270)).toBe("hello");
    expect(getUnsigned(cursor, ifd, 256)).toBe(3);
  });

  it("keeps the first of duplicate tags", () => {
    const bytes = assembleTiff([
      { tag: 256, type: 3, count: 1, value: 5 },
      { tag: 256, type: 3, count: 1, value: 7 },
    ]);
    const cursor = cursorFor(bytes);
    const ifd = parseIfd(cursor, 8);
    expect(ifd.size).toBe(1);
    expect(getUnsigned(cursor, ifd, 256)).toBe(5);
    expect(ifd.diagnostics.map((d) => d.kind)).toEqual(["InconsistentLayout"]);
  });

  it("keeps unknown tags with unknown types as raw bytes", () => {
    const bytes = assembleTiff([{ tag: 40000, type: 99, count: 1, value: 0x04030201 }]);
    const cursor = cursorFor(bytes);
    const ifd = parseIfd(cursor, 8);

    const entry = ifd.get(40000);
    expect(entry?.type).toBe(7);
    expect(entry?.rawType).toBe(99);
    expect(getValue(cursor, ifd, 40000)).toEqual({ type: "undefined", bytes: new Uint8Array([1, 2, 3, 4]) });
    expect(ifd.diagnostics[0].kind).toBe("TypeMismatch");
    expect(ifd.diagnostics[0].tag).toBe(40000);
  });

  it("skips entries whose value lies outside the stream", () => {
    const bytes = assembleTiff([
      { tag: 256, type: 3, count: 1, value: 4 },
      { tag: 270, type: 2, count: 100, value: 5000 },
    ]);
    const cursor = cursorFor(bytes);
    const ifd = parseIfd(cursor, 8);

    expect(ifd.has(270)).toBe(false);
    expect(ifd.unreadable(270)?.offset).toBe(5000);
    const err = expectKind(() => getValue(cursor, ifd, 270), "OutOfRange");
    expect(err.tag).toBe(270);
    expect(getUnsigned(cursor, ifd, 256)).toBe(4);
  });

  it("stops at a truncated entry table", () => {
    const bytes = assembleTiff([{ tag: 256, type: 3, count: 1, value: 4 }]);
    new DataView(bytes.buffer).setUint16(8, 3, true);
    const ifd = parseIfd(cursorFor(bytes), 8);
    expect(ifd.size).toBe(1);
    expect(ifd.nextIfdOffset).toBe(0);
    expect(ifd.diagnostics.map((d) => d.kind)).toEqual(["OutOfRange"]);
    expect(ifd.diagnostics[0].offset).toBe(22);
  });

  it("fails when the entry count itself is unreadable", () => {
    const bytes = assembleTiff([]);
    expectKind(() => parseIfd(cursorFor(bytes), 13), "OutOfRange");
  });

  it("reads big-endian entries", () => {
    const entries: RawEntry[] = [
      { tag: 257, type: 3, count: 1, value: 300 },
      { tag: 258, type: 3, count: 3, value: tailOffset(2) },
    ];
    const bytes = assembleTiff(entries, [0, 8, 0, 8, 0, 16], false);
    const cursor = cursorFor(bytes);
    const ifd = parseIfd(cursor, 8);
    expect(getUnsigned(cursor, ifd, 257)).toBe(300);
    expect(getUnsignedArray(cursor, ifd, 258)).toEqual([8, 8, 16]);
  });
});

describe("tag values", () => {
  const rationalOffset = tailOffset(6);
  const bytes = assembleTiff(
    [
      { tag: 270, type: 2, count: 6, value: rationalOffset + 8 },
      { tag: 282, type: 5, count: 1, value: rationalOffset },
      { tag: 305, type: 1, count: 3, value: 0x00030201 },
      { tag: 40001, type: 8, count: 1, value: 0xfffe },
      { tag: 40002, type: 9, count: 1, value: 0xffffffff },
      { tag: 40003, type: 11, count: 1, value: 0x3fc00000 },
    ],
    [
      // 72/1
      72, 0, 0, 0, 1, 0, 0, 0,
      // "ab\0cd\0"
      0x61, 0x62, 0, 0x63, 0x64, 0,
    ],
  );
  const cursor = cursorFor(bytes);
  const ifd = parseIfd(cursor, 8);

  it("resolves rationals as pairs", () => {
    expect(getRationals(cursor, ifd, 282)).toEqual([{ numerator: 72, denominator: 1 }]);
  });

  it("splits ASCII on NUL", () => {
    expect(getValue(cursor, ifd, 270)).toEqual({ type: "ascii", values: ["ab", "cd"] });
    expect(getAscii(cursor, ifd, 270)).toBe("ab\ncd");
  });

  it("resolves signed and floating-point types", () => {
    expect(getValue(cursor, ifd, 40001)).toEqual({ type: "sshort", values: [-2] });
    expect(getValue(cursor, ifd, 40002)).toEqual({ type: "slong", values: [-1] });
    expect(getValue(cursor, ifd, 40003)).toEqual({ type: "float", values: [1.5] });
  });

  it("returns BYTE values as bytes", () => {
    expect(getValue(cursor, ifd, 305)).toEqual({ type: "byte", values: [1, 2, 3] });
    expect(Array.from(getBytes(cursor, ifd, 305))).toEqual([1, 2, 3]);
  });

  it("refuses to widen non-integer types", () => {
    const err = expectKind(() => asUnsignedArray(getValue(cursor, ifd, 270), 270), "TypeMismatch");
    expect(err.tag).toBe(270);
    expectKind(() => getUnsigned(cursor, ifd, 282), "TypeMismatch");
  });

  it("reports absent tags", () => {
    expectKind(() => getValue(cursor, ifd, 256), "TagNotFound");
  });
});

describe("parseIfdChain", () => {
  const entry: RawEntry = { tag: 256, type: 3, count: 1, value: 1 };
  const second = tailOffset(1);

  it("follows next-directory links", () => {
    const bytes = assembleTiff([entry], directoryBytes([{ ...entry, value: 9 }], 0), true, second);
    const cursor = cursorFor(bytes);
    const { ifds, diagnostics } = parseIfdChain(cursor, 8);
    expect(ifds.map((i) => i.offset)).toEqual([8, second]);
    expect(getUnsigned(cursor, ifds[1], 256)).toBe(9);
    expect(diagnostics).toEqual([]);
  });

  it("stops at a loop", () => {
    const bytes = assembleTiff([entry], directoryBytes([entry], 8), true, second);
    const { ifds, diagnostics } = parseIfdChain(cursorFor(bytes), 8);
    expect(ifds).toHaveLength(2);
    expect(diagnostics[0].message).toBe("Directory chain loops back to offset 8");
  });

  it("stops after the directory limit", () => {
    const bytes = assembleTiff([entry], directoryBytes([entry], 0), true, second);
    const { ifds, diagnostics } = parseIfdChain(cursorFor(bytes), 8, 1);
    expect(ifds).toHaveLength(1);
    expect(diagnostics[0].message).toBe("Stopped after 1 directories");
  });

  it("stops at a next offset past the end", () => {
    const bytes = assembleTiff([entry], [], true, 9999);
    const { ifds, diagnostics } = parseIfdChain(cursorFor(bytes), 8);
    expect(ifds).toHaveLength(1);
    expect(diagnostics[0].kind).toBe("OutOfRange");
  });
});
