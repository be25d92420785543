// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * TIFF flavour of LZW.
 *
 * Codes are 9 to 12 bits wide and packed most significant bit first.
 * Code 256 clears the table and 257 ends the stream. The code width grows
 * one code earlier than in GIF: a decoder switches to 10 bits once its
 * table holds 511 entries, and an encoder once it has assigned code 511.
 */

import { TiffError } from "./errors.js";
import { readBits } from "./utils.js";

export const LZW_CLEAR_CODE = 256;
export const LZW_EOI_CODE = 257;
const FIRST_CODE = 258;
const MIN_WIDTH = 9;
const MAX_WIDTH = 12;
const TABLE_SIZE = 1 << MAX_WIDTH;
/** The encoder resets the table before assigning this code. */
const ENCODER_LIMIT = TABLE_SIZE - 2;

function codecError(message: string, offset: number): TiffError {
  return new TiffError("CodecError", `LZW: ${message}`, { offset });
}

/**
 * Decode one LZW chunk into exactly `expectedLength` bytes.
 *
 * Output past `expectedLength` is discarded. Running out of input or
 * reaching end-of-information before the output is full is an error.
 */
export function lzwDecode(input: Uint8Array, expectedLength: number): Uint8Array {
  const out = new Uint8Array(expectedLength);
  const prefix = new Uint16Array(TABLE_SIZE);
  const suffix = new Uint8Array(TABLE_SIZE);
  const first = new Uint8Array(TABLE_SIZE);
  const lengths = new Uint16Array(TABLE_SIZE);
  for (let i = 0; i < 256; i++) {
    suffix[i] = i;
    first[i] = i;
    lengths[i] = 1;
  }

  const totalBits = input.length * 8;
  let tableSize = FIRST_CODE;
  let width = MIN_WIDTH;
  let bitPos = 0;
  let op = 0;
  let previous = -1;

  const emit = (code: number): void => {
    const length = lengths[code];
    const take = Math.min(length, expectedLength - op);
    let c = code;
    for (let k = length - 1; k >= 0; k--) {
      if (k < take) out[op + k] = suffix[c];
      c = prefix[c];
    }
    op += take;
  };

  while (op < expectedLength) {
    if (bitPos + width > totalBits) {
      throw codecError(`input exhausted after ${op} of ${expectedLength} bytes`, bitPos >>> 3);
    }
    const code = readBits(input, bitPos, width);
    const codeOffset = bitPos >>> 3;
    bitPos += width;

    if (code === LZW_EOI_CODE) {
      break;
    }
    if (code === LZW_CLEAR_CODE) {
      tableSize = FIRST_CODE;
      width = MIN_WIDTH;
      previous = -1;
      continue;
    }

    if (previous < 0) {
      if (code > 255) {
        throw codecError(`code ${code} cannot start a sequence`, codeOffset);
      }
      emit(code);
      previous = code;
      continue;
    }

    let head: number;
    if (code < tableSize) {
      head = first[code];
    } else if (code === tableSize) {
      head = first[previous];
    } else {
      throw codecError(`code ${code} is not in the table (size ${tableSize})`, codeOffset);
    }

    if (tableSize < TABLE_SIZE) {
      prefix[tableSize] = previous;
      suffix[tableSize] = head;
      first[tableSize] = first[previous];
      lengths[tableSize] = lengths[previous] + 1;
      tableSize++;
    }
    emit(code);
    previous = code;

    if (tableSize + 1 >= 1 << width && width < MAX_WIDTH) {
      width++;
    }
  }

  if (op < expectedLength) {
    throw codecError(`end of information after ${op} of ${expectedLength} bytes`, bitPos >>> 3);
  }
  return out;
}

/** Accumulates variable-width codes, most significant bit first. */
class BitWriter {
  private readonly bytes: number[] = [];
  private acc = 0;
  private bits = 0;

  write(code: number, width: number): void {
    this.acc = (this.acc << width) | code;
    this.bits += width;
    while (this.bits >= 8) {
      this.bits -= 8;
      this.bytes.push((this.acc >>> this.bits) & 0xff);
    }
    this.acc &= (1 << this.bits) - 1;
  }

  finish(): Uint8Array {
    if (this.bits > 0) {
      this.bytes.push((this.acc << (8 - this.bits)) & 0xff);
      this.acc = 0;
      this.bits = 0;
    }
    return Uint8Array.from(this.bytes);
  }
}

/**
 * Encode bytes as one LZW chunk: a clear code, the data, and an
 * end-of-information code.
 */
export function lzwEncode(input: Uint8Array): Uint8Array {
  const writer = new BitWriter();
  const table = new Map<number, number>();
  let nextCode = FIRST_CODE;
  let width = MIN_WIDTH;

  writer.write(LZW_CLEAR_CODE, width);
  if (input.length === 0) {
    writer.write(LZW_EOI_CODE, width);
    return writer.finish();
  }

  let current = input[0];
  for (let i = 1; i < input.length; i++) {
    const byte = input[i];
    const key = current * 256 + byte;
    const known = table.get(key);
    if (known !== undefined) {
      current = known;
      continue;
    }

    writer.write(current, width);
    table.set(key, nextCode++);
    if (nextCode >= ENCODER_LIMIT) {
      writer.write(LZW_CLEAR_CODE, width);
      table.clear();
      nextCode = FIRST_CODE;
      width = MIN_WIDTH;
    } else if (nextCode >= 1 << width) {
      width++;
    }
    current = byte;
  }

  writer.write(current, width);
  // The decoder adds one more entry when it reads the final code.
  nextCode++;
  if (nextCode >= 1 << width && width < MAX_WIDTH) {
    width++;
  }
  writer.write(LZW_EOI_CODE, width);
  return writer.finish();
}
