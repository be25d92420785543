// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Strip and tile location.
 *
 * Turns the offset, byte-count and layout tags of a directory into an
 * ordered list of chunk descriptors, each naming where one compressed
 * chunk lives in the stream and which pixels it covers.
 */

import type { ByteCursor } from "./byte-cursor.js";
import { TiffError } from "./errors.js";
import type { Ifd } from "./ifd.js";
import {
  TAG_ROWS_PER_STRIP,
  TAG_STRIP_BYTE_COUNTS,
  TAG_STRIP_OFFSETS,
  TAG_TILE_BYTE_COUNTS,
  TAG_TILE_LENGTH,
  TAG_TILE_OFFSETS,
  TAG_TILE_WIDTH,
  tagName,
} from "./tags.js";
import { computeChunkCounts, computePixelWindow } from "./utils.js";
import { getUnsigned, getUnsignedArray } from "./values.js";

/** One compressed strip or tile. */
export interface ChunkDescriptor {
  /** Position in the offsets / byte-counts arrays. */
  index: number;
  offset: number;
  byteCount: number;
  /** Sample plane (always 0 for chunky data). */
  plane: number;
  /** Left column of the covered region. */
  x: number;
  /** Top row of the covered region. */
  y: number;
  /** Covered width, clipped to the image. */
  width: number;
  /** Covered height, clipped to the image. */
  height: number;
  /** Stored width: the tile width, or the image width for strips. */
  chunkWidth: number;
  /** Stored height: the tile length, or the strip's row count. */
  chunkHeight: number;
}

export interface ImageGeometry {
  width: number;
  height: number;
  /** Number of separately stored sample planes (1 when chunky). */
  planes: number;
}

export type ChunkLayout =
  | {
      kind: "strips";
      rowsPerStrip: number;
      chunksPerPlane: number;
      descriptors: ChunkDescriptor[];
    }
  | {
      kind: "tiles";
      tileWidth: number;
      tileLength: number;
      tilesAcross: number;
      tilesDown: number;
      chunksPerPlane: number;
      descriptors: ChunkDescriptor[];
    };

function checkArrays(offsets: readonly number[], byteCounts: readonly number[], expected: number, what: string): void {
  if (offsets.length !== byteCounts.length) {
    throw new TiffError(
      "InconsistentLayout",
      `${what} offsets (${offsets.length}) and byte counts (${byteCounts.length}) differ in length`,
    );
  }
  if (offsets.length !== expected) {
    throw new TiffError(
      "InconsistentLayout",
      `Expected ${expected} ${what.toLowerCase()}(s) but the directory lists ${offsets.length}`,
    );
  }
}

/**
 * Descriptors for a stripped image.
 *
 * Each plane holds `ceil(height / rowsPerStrip)` strips; every strip but
 * the last covers `rowsPerStrip` rows and the last covers the remainder.
 */
export function stripDescriptors(
  geometry: ImageGeometry,
  rowsPerStrip: number,
  offsets: readonly number[],
  byteCounts: readonly number[],
): ChunkDescriptor[] {
  const { width, height, planes } = geometry;
  if (!Number.isInteger(rowsPerStrip) || rowsPerStrip < 1) {
    throw new TiffError("InconsistentLayout", `Invalid RowsPerStrip: ${rowsPerStrip}`, { tag: TAG_ROWS_PER_STRIP });
  }
  const rows = Math.min(rowsPerStrip, height);
  const stripsPerPlane = Math.ceil(height / rows);
  checkArrays(offsets, byteCounts, stripsPerPlane * planes, "Strip");

  const descriptors: ChunkDescriptor[] = [];
  for (let plane = 0; plane < planes; plane++) {
    for (let s = 0; s < stripsPerPlane; s++) {
      const index = plane * stripsPerPlane + s;
      const [, top, , bottom] = computePixelWindow(0, s, width, rows, width, height);
      descriptors.push({
        index,
        offset: offsets[index],
        byteCount: byteCounts[index],
        plane,
        x: 0,
        y: top,
        width,
        height: bottom - top,
        chunkWidth: width,
        chunkHeight: bottom - top,
      });
    }
  }
  return descriptors;
}

/**
 * Descriptors for a tiled image, tiles in row-major order within each
 * plane. Edge tiles are stored at full size and clipped on placement.
 */
export function tileDescriptors(
  geometry: ImageGeometry,
  tileWidth: number,
  tileLength: number,
  offsets: readonly number[],
  byteCounts: readonly number[],
): ChunkDescriptor[] {
  const { width, height, planes } = geometry;
  if (!Number.isInteger(tileWidth) || tileWidth < 1 || !Number.isInteger(tileLength) || tileLength < 1) {
    throw new TiffError("InconsistentLayout", `Invalid tile size ${tileWidth}x${tileLength}`, {
      tag: TAG_TILE_WIDTH,
    });
  }
  const [tilesDown, tilesAcross] = computeChunkCounts([height, width], [tileLength, tileWidth]);
  const tilesPerPlane = tilesAcross * tilesDown;
  checkArrays(offsets, byteCounts, tilesPerPlane * planes, "Tile");

  const descriptors: ChunkDescriptor[] = [];
  for (let plane = 0; plane < planes; plane++) {
    for (let ty = 0; ty < tilesDown; ty++) {
      for (let tx = 0; tx < tilesAcross; tx++) {
        const index = plane * tilesPerPlane + ty * tilesAcross + tx;
        const [left, top, right, bottom] = computePixelWindow(tx, ty, tileWidth, tileLength, width, height);
        descriptors.push({
          index,
          offset: offsets[index],
          byteCount: byteCounts[index],
          plane,
          x: left,
          y: top,
          width: right - left,
          height: bottom - top,
          chunkWidth: tileWidth,
          chunkHeight: tileLength,
        });
      }
    }
  }
  return descriptors;
}

/**
 * Check that, for every plane, the descriptors tile the image exactly:
 * bands of equal height stacked from row 0 to `height`, each band filled
 * left to right from column 0 to `width`.
 *
 * @throws TiffError `InconsistentLayout` on any gap or overlap.
 */
export function verifyCoverage(descriptors: readonly ChunkDescriptor[], geometry: ImageGeometry): void {
  const { width, height, planes } = geometry;
  for (let plane = 0; plane < planes; plane++) {
    const chunks = descriptors
      .filter((d) => d.plane === plane)
      .sort((a, b) => a.y - b.y || a.x - b.x);

    let row = 0;
    let i = 0;
    while (i < chunks.length) {
      const bandTop = chunks[i].y;
      const bandHeight = chunks[i].height;
      if (bandTop !== row || bandHeight <= 0) {
        throw new TiffError("InconsistentLayout", `Plane ${plane}: rows ${row}..${bandTop} are not covered exactly`);
      }
      let col = 0;
      while (i < chunks.length && chunks[i].y === bandTop) {
        const c = chunks[i];
        if (c.x !== col || c.height !== bandHeight || c.width <= 0) {
          throw new TiffError(
            "InconsistentLayout",
            `Plane ${plane}: chunk ${c.index} at (${c.x}, ${c.y}) leaves a gap or overlaps its neighbour`,
          );
        }
        col += c.width;
        i++;
      }
      if (col !== width) {
        throw new TiffError("InconsistentLayout", `Plane ${plane}: band at row ${bandTop} covers ${col} of ${width} columns`);
      }
      row += bandHeight;
    }
    if (row !== height) {
      throw new TiffError("InconsistentLayout", `Plane ${plane}: chunks cover ${row} of ${height} rows`);
    }
  }
}

/**
 * Build and validate the chunk layout of a directory.
 *
 * Tiled layout is chosen when TileOffsets is present. Every chunk's byte
 * range must lie inside the stream.
 *
 * @throws TiffError `NoImageData` when neither strip nor tile offsets are
 *   present, `MissingRequiredTag` when a companion tag is missing.
 */
export function readChunkLayout(cursor: ByteCursor, ifd: Ifd, geometry: ImageGeometry): ChunkLayout {
  const tiled = ifd.has(TAG_TILE_OFFSETS) || ifd.unreadable(TAG_TILE_OFFSETS) !== undefined;
  const stripped = ifd.has(TAG_STRIP_OFFSETS) || ifd.unreadable(TAG_STRIP_OFFSETS) !== undefined;
  if (!tiled && !stripped) {
    throw new TiffError("NoImageData", `Directory at ${ifd.offset} has neither strip nor tile offsets`);
  }

  const offsetsTag = tiled ? TAG_TILE_OFFSETS : TAG_STRIP_OFFSETS;
  const countsTag = tiled ? TAG_TILE_BYTE_COUNTS : TAG_STRIP_BYTE_COUNTS;
  for (const tag of tiled ? [countsTag, TAG_TILE_WIDTH, TAG_TILE_LENGTH] : [countsTag]) {
    if (!ifd.has(tag) && ifd.unreadable(tag) === undefined) {
      throw new TiffError("MissingRequiredTag", `${tagName(tag)} is required`, { tag });
    }
  }

  const offsets = getUnsignedArray(cursor, ifd, offsetsTag);
  const byteCounts = getUnsignedArray(cursor, ifd, countsTag);

  let layout: ChunkLayout;
  if (tiled) {
    const tileWidth = getUnsigned(cursor, ifd, TAG_TILE_WIDTH);
    const tileLength = getUnsigned(cursor, ifd, TAG_TILE_LENGTH);
    const descriptors = tileDescriptors(geometry, tileWidth, tileLength, offsets, byteCounts);
    const tilesAcross = Math.ceil(geometry.width / tileWidth);
    const tilesDown = Math.ceil(geometry.height / tileLength);
    layout = {
      kind: "tiles",
      tileWidth,
      tileLength,
      tilesAcross,
      tilesDown,
      chunksPerPlane: tilesAcross * tilesDown,
      descriptors,
    };
  } else {
    const rowsPerStrip = ifd.has(TAG_ROWS_PER_STRIP) ? getUnsigned(cursor, ifd, TAG_ROWS_PER_STRIP) : 0xffff_ffff;
    const descriptors = stripDescriptors(geometry, rowsPerStrip, offsets, byteCounts);
    layout = {
      kind: "strips",
      rowsPerStrip: Math.min(rowsPerStrip, geometry.height),
      chunksPerPlane: descriptors.length / geometry.planes,
      descriptors,
    };
  }

  verifyCoverage(layout.descriptors, geometry);

  for (const d of layout.descriptors) {
    if (!cursor.contains(d.offset, d.byteCount)) {
      throw new TiffError(
        "OutOfRange",
        `${tiled ? "Tile" : "Strip"} ${d.index} (${d.byteCount} bytes at offset ${d.offset}) exceeds stream length ${cursor.length}`,
        { offset: d.offset, tag: offsetsTag },
      );
    }
  }

  return layout;
}
