// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Typed errors raised by the decoder and encoder.
 *
 * Every failure carries a `kind` so callers can branch without parsing
 * messages, plus the offending byte offset or tag id where one applies.
 */

/** Error kinds. */
export type TiffErrorKind =
  | "InvalidHeader"
  | "UnexpectedEof"
  | "OutOfRange"
  | "MissingRequiredTag"
  | "NoImageData"
  | "TypeMismatch"
  | "TagNotFound"
  | "UnsupportedCompression"
  | "UnsupportedFeature"
  | "CodecError"
  | "InconsistentLayout"
  | "InvalidInput";

/** Optional location details attached to a {@link TiffError}. */
export interface TiffErrorDetails {
  /** Absolute byte offset in the stream, or the position inside a compressed chunk for codec errors. */
  offset?: number;
  /** Tag id the failure relates to. */
  tag?: number;
  cause?: unknown;
}

export class TiffError extends Error {
  readonly kind: TiffErrorKind;
  readonly offset?: number;
  readonly tag?: number;

  constructor(kind: TiffErrorKind, message: string, details: TiffErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "TiffError";
    this.kind = kind;
    this.offset = details.offset;
    this.tag = details.tag;
  }
}

export function isTiffError(value: unknown): value is TiffError {
  return value instanceof TiffError;
}

// ── Result values ───────────────────────────────────────────────────

/** Explicit success/failure value for callers that prefer not to catch. */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: TiffError };

/**
 * Run `fn` and capture a {@link TiffError} as a failed result.
 *
 * Only `TiffError` is captured; anything else is a programming error and
 * is rethrown.
 *
 * @example
 * ```ts
 * const result = attempt(() => decoder.image());
 * if (!result.ok) console.error(result.error.kind);
 * ```
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (isTiffError(err)) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/** Async counterpart of {@link attempt}. */
export async function attemptAsync<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    if (isTiffError(err)) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
