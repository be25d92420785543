// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Field types, tag ids and the tag registry.
 *
 * The registry (tag-registry.json) maps a tag id to its name, the field
 * types it is expected to use, its cardinality and its default. It is
 * advisory: unknown ids are valid vendor-private tags and unexpected types
 * are reported, never rejected.
 */

import registryData from "./tag-registry.json" with { type: "json" };

// ── Field types ─────────────────────────────────────────────────────

export const TIFF_TYPE_BYTE = 1;
export const TIFF_TYPE_ASCII = 2;
export const TIFF_TYPE_SHORT = 3;
export const TIFF_TYPE_LONG = 4;
export const TIFF_TYPE_RATIONAL = 5; // two LONGs
export const TIFF_TYPE_SBYTE = 6;
export const TIFF_TYPE_UNDEFINED = 7;
export const TIFF_TYPE_SSHORT = 8;
export const TIFF_TYPE_SLONG = 9;
export const TIFF_TYPE_SRATIONAL = 10; // two SLONGs
export const TIFF_TYPE_FLOAT = 11;
export const TIFF_TYPE_DOUBLE = 12;

/** Lower-case type names, used as the discriminant of resolved values. */
export type FieldTypeName =
  | "byte"
  | "ascii"
  | "short"
  | "long"
  | "rational"
  | "sbyte"
  | "undefined"
  | "sshort"
  | "slong"
  | "srational"
  | "float"
  | "double";

interface FieldTypeInfo {
  name: FieldTypeName;
  width: number;
}

const FIELD_TYPES: ReadonlyMap<number, FieldTypeInfo> = new Map([
  [TIFF_TYPE_BYTE, { name: "byte", width: 1 }],
  [TIFF_TYPE_ASCII, { name: "ascii", width: 1 }],
  [TIFF_TYPE_SHORT, { name: "short", width: 2 }],
  [TIFF_TYPE_LONG, { name: "long", width: 4 }],
  [TIFF_TYPE_RATIONAL, { name: "rational", width: 8 }],
  [TIFF_TYPE_SBYTE, { name: "sbyte", width: 1 }],
  [TIFF_TYPE_UNDEFINED, { name: "undefined", width: 1 }],
  [TIFF_TYPE_SSHORT, { name: "sshort", width: 2 }],
  [TIFF_TYPE_SLONG, { name: "slong", width: 4 }],
  [TIFF_TYPE_SRATIONAL, { name: "srational", width: 8 }],
  [TIFF_TYPE_FLOAT, { name: "float", width: 4 }],
  [TIFF_TYPE_DOUBLE, { name: "double", width: 8 }],
]);

const TYPE_CODES_BY_NAME: ReadonlyMap<string, number> = new Map(
  [...FIELD_TYPES].map(([code, info]) => [info.name.toUpperCase(), code]),
);

export function isKnownType(type: number): boolean {
  return FIELD_TYPES.has(type);
}

/** Byte width of one value of `type`, or undefined for unknown type codes. */
export function typeWidth(type: number): number | undefined {
  return FIELD_TYPES.get(type)?.width;
}

export function typeName(type: number): FieldTypeName | undefined {
  return FIELD_TYPES.get(type)?.name;
}

// ── Tag ids ─────────────────────────────────────────────────────────

export const TAG_NEW_SUBFILE_TYPE = 254;
export const TAG_IMAGE_WIDTH = 256;
export const TAG_IMAGE_LENGTH = 257;
export const TAG_BITS_PER_SAMPLE = 258;
export const TAG_COMPRESSION = 259;
export const TAG_PHOTOMETRIC = 262;
export const TAG_FILL_ORDER = 266;
export const TAG_IMAGE_DESCRIPTION = 270;
export const TAG_STRIP_OFFSETS = 273;
export const TAG_ORIENTATION = 274;
export const TAG_SAMPLES_PER_PIXEL = 277;
export const TAG_ROWS_PER_STRIP = 278;
export const TAG_STRIP_BYTE_COUNTS = 279;
export const TAG_X_RESOLUTION = 282;
export const TAG_Y_RESOLUTION = 283;
export const TAG_PLANAR_CONFIGURATION = 284;
export const TAG_RESOLUTION_UNIT = 296;
export const TAG_SOFTWARE = 305;
export const TAG_PREDICTOR = 317;
export const TAG_COLOR_MAP = 320;
export const TAG_TILE_WIDTH = 322;
export const TAG_TILE_LENGTH = 323;
export const TAG_TILE_OFFSETS = 324;
export const TAG_TILE_BYTE_COUNTS = 325;
export const TAG_INK_SET = 332;
export const TAG_EXTRA_SAMPLES = 338;
export const TAG_SAMPLE_FORMAT = 339;
export const TAG_YCBCR_COEFFICIENTS = 529;
export const TAG_YCBCR_SUBSAMPLING = 530;
export const TAG_ICC_PROFILE = 34675;

// ── Enumerated tag values ───────────────────────────────────────────

export const COMPRESSION_NONE = 1;
export const COMPRESSION_CCITT_RLE = 2;
export const COMPRESSION_CCITT_T4 = 3;
export const COMPRESSION_CCITT_T6 = 4;
export const COMPRESSION_LZW = 5;
export const COMPRESSION_OJPEG = 6;
export const COMPRESSION_JPEG = 7;
export const COMPRESSION_DEFLATE = 8;
export const COMPRESSION_PACKBITS = 32773;
export const COMPRESSION_DEFLATE_LEGACY = 32946;

export const PHOTOMETRIC_WHITE_IS_ZERO = 0;
export const PHOTOMETRIC_BLACK_IS_ZERO = 1;
export const PHOTOMETRIC_RGB = 2;
export const PHOTOMETRIC_PALETTE = 3;
export const PHOTOMETRIC_MASK = 4;
export const PHOTOMETRIC_CMYK = 5;
export const PHOTOMETRIC_YCBCR = 6;
export const PHOTOMETRIC_CIELAB = 8;

export const PLANAR_CHUNKY = 1;
export const PLANAR_SEPARATE = 2;

export const PREDICTOR_NONE = 1;
export const PREDICTOR_HORIZONTAL = 2;
export const PREDICTOR_FLOATING_POINT = 3;

export const EXTRA_SAMPLE_UNSPECIFIED = 0;
export const EXTRA_SAMPLE_ASSOCIATED_ALPHA = 1;
export const EXTRA_SAMPLE_UNASSOCIATED_ALPHA = 2;

export const RESOLUTION_UNIT_NONE = 1;
export const RESOLUTION_UNIT_INCH = 2;
export const RESOLUTION_UNIT_CENTIMETER = 3;

// ── Registry ────────────────────────────────────────────────────────

/**
 * Number of values a tag carries: a fixed count, one per sample
 * ("samplesPerPixel"), or unconstrained (undefined).
 */
export type TagCardinality = number | "samplesPerPixel" | undefined;

export interface TagInfo {
  id: number;
  name: string;
  /** False for vendor-private and otherwise unregistered ids. */
  known: boolean;
  /** Field type codes the tag is expected to use. Empty for unknown tags. */
  types: readonly number[];
  count: TagCardinality;
  required: boolean;
  defaultValue?: number | readonly number[];
}

interface TagRecord {
  id: number;
  name: string;
  types: string[];
  count?: number | string;
  required?: boolean;
  default?: number | number[];
}

const RECORDS: readonly TagRecord[] = registryData;

function toTagInfo(record: TagRecord): TagInfo {
  const types: number[] = [];
  for (const name of record.types) {
    const code = TYPE_CODES_BY_NAME.get(name);
    if (code === undefined) {
      throw new Error(`Tag registry entry ${record.name} names unknown field type ${name}`);
    }
    types.push(code);
  }
  let count: TagCardinality;
  if (typeof record.count === "number" || record.count === "samplesPerPixel") {
    count = record.count;
  }
  return {
    id: record.id,
    name: record.name,
    known: true,
    types,
    count,
    required: record.required ?? false,
    defaultValue: record.default,
  };
}

const REGISTRY: ReadonlyMap<number, TagInfo> = new Map(RECORDS.map((r) => [r.id, toTagInfo(r)]));

const IDS_BY_NAME: ReadonlyMap<string, number> = new Map(RECORDS.map((r) => [r.name, r.id]));

/**
 * Look up a tag id. Unregistered ids succeed with `known: false` and a
 * synthetic name such as `Private(40000)`.
 */
export function lookupTag(id: number): TagInfo {
  return (
    REGISTRY.get(id) ?? {
      id,
      name: `Private(${id})`,
      known: false,
      types: [],
      count: undefined,
      required: false,
    }
  );
}

export function tagName(id: number): string {
  return lookupTag(id).name;
}

/** Resolve a registered tag name (e.g. "ImageWidth") to its id. */
export function tagIdByName(name: string): number | undefined {
  return IDS_BY_NAME.get(name);
}

/** All registered tags, ordered by id. */
export function registeredTags(): TagInfo[] {
  return [...REGISTRY.values()].sort((a, b) => a.id - b.id);
}

/** Whether `type` is one the registry expects for tag `id`. Unknown tags accept anything. */
export function isExpectedType(id: number, type: number): boolean {
  const info = lookupTag(id);
  return !info.known || info.types.includes(type);
}
