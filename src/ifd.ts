// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * In-memory model of one Image File Directory.
 */

import type { TiffErrorKind } from "./errors.js";

/** One 12-byte directory entry, located but not yet resolved. */
export interface IfdEntry {
  tag: number;
  /**
   * Field type used to resolve the value. Unknown type codes are stored as
   * UNDEFINED (7) covering the raw 4-byte value field.
   */
  type: number;
  /** Type code exactly as stored in the file. */
  rawType: number;
  count: number;
  /** Absolute offset of the entry's 4-byte value field. */
  fieldOffset: number;
  /** Absolute offset of the value data: `fieldOffset` when inline, otherwise the offset held there. */
  valueOffset: number;
  /** `count * typeWidth`, the number of bytes the value occupies. */
  byteLength: number;
  inline: boolean;
}

/** A recoverable problem noticed while parsing. */
export interface Diagnostic {
  kind: TiffErrorKind;
  message: string;
  tag?: number;
  offset?: number;
}

/**
 * An immutable directory: entries unique by tag id, in file order, plus
 * the link to the next directory (0 when this is the last).
 */
export class Ifd {
  /** Absolute offset of the directory's entry-count field. */
  readonly offset: number;
  readonly nextIfdOffset: number;
  readonly diagnostics: readonly Diagnostic[];
  private readonly entryMap: ReadonlyMap<number, IfdEntry>;
  private readonly unreadableMap: ReadonlyMap<number, Diagnostic>;

  constructor(
    offset: number,
    entries: readonly IfdEntry[],
    nextIfdOffset: number,
    diagnostics: readonly Diagnostic[] = [],
    unreadable: ReadonlyMap<number, Diagnostic> = new Map(),
  ) {
    this.offset = offset;
    this.nextIfdOffset = nextIfdOffset;
    this.entryMap = new Map(entries.map((e) => [e.tag, e]));
    this.unreadableMap = unreadable;
    this.diagnostics = Object.freeze([...diagnostics]);
  }

  get size(): number {
    return this.entryMap.size;
  }

  get isLast(): boolean {
    return this.nextIfdOffset === 0;
  }

  get(tag: number): IfdEntry | undefined {
    return this.entryMap.get(tag);
  }

  has(tag: number): boolean {
    return this.entryMap.has(tag);
  }

  /** Tag ids in file order. */
  tags(): number[] {
    return [...this.entryMap.keys()];
  }

  entries(): IterableIterator<IfdEntry> {
    return this.entryMap.values();
  }

  [Symbol.iterator](): IterableIterator<IfdEntry> {
    return this.entryMap.values();
  }

  /** The diagnostic recorded for a tag whose entry was skipped as unreadable. */
  unreadable(tag: number): Diagnostic | undefined {
    return this.unreadableMap.get(tag);
  }
}
