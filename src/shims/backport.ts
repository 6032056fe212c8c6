/**
 * Backported array, string and integer helpers
 *
 * Equivalents of the array-copy, charset and comparison helpers that newer
 * runtimes ship natively. Every function throws NullArgumentError when a
 * required argument is null or undefined, even though the types rule that out
 * for typed callers.
 */

import { encodeWithReport, resolveCharset, type CharsetLike } from './charset.js';
import { requireIndexRange, requireLength, requireNonNull, ArgumentRangeError } from './errors.js';

export { ISO_8859_1, UTF_8 } from './charset.js';

export type Int32Sequence = Int32Array | readonly number[];
export type ByteSequence = Uint8Array | readonly number[];

/**
 * Copy `source` into a new array of `length` elements, truncating or
 * zero-padding as needed.
 *
 * Elements are stored as 32-bit signed integers: fractions are truncated
 * toward zero and values outside int32 wrap modulo 2^32, so
 * `copyOf([1.5, 2 ** 32], 2)` is `[1, 0]`.
 */
export function copyOf(source: Int32Sequence, length: number): Int32Array {
  requireNonNull(source, 'copyOf(null, ...)');
  requireNonNull(length, 'copyOf(..., null)');
  requireLength('length', length);

  const target = new Int32Array(length);
  const count = Math.min(source.length, length);
  for (let i = 0; i < count; i++) {
    target[i] = source[i];
  }
  return target;
}

/**
 * Copy `source[from..upto)` into a new array. Elements are stored as int32,
 * the same way as in copyOf.
 */
export function copyOfRange(source: Int32Sequence, from: number, upto: number): Int32Array {
  requireNonNull(source, 'copyOfRange(null, ...)');
  requireNonNull(from, 'copyOfRange(..., null, ...)');
  requireNonNull(upto, 'copyOfRange(..., null)');
  requireIndexRange(from, upto, source.length);

  const target = new Int32Array(upto - from);
  for (let i = from; i < upto; i++) {
    target[i - from] = source[i];
  }
  return target;
}

/**
 * Encode `contents` in the given charset. Unmappable characters become '?'.
 */
export function getBytes(contents: string, charset: CharsetLike): Uint8Array {
  requireNonNull(contents, 'getBytes(null, ...)');
  requireNonNull(charset, 'getBytes(..., null)');
  return encodeWithReport(resolveCharset(charset), contents).bytes;
}

/**
 * Decode `content` in the given charset. Malformed input becomes U+FFFD.
 * Plain number arrays are read as signed or unsigned bytes (low 8 bits).
 */
export function getString(content: ByteSequence, charset: CharsetLike): string {
  requireNonNull(content, 'getString(null, ...)');
  requireNonNull(charset, 'getString(..., null)');
  const bytes = content instanceof Uint8Array ? content : Uint8Array.from(content, (b) => b & 0xff);
  return resolveCharset(charset).decode(bytes);
}

export function isEmpty(contents: string): boolean {
  requireNonNull(contents, 'isEmpty(null)');
  return contents.length === 0;
}

/** Three-way comparison: -1 if a < b, +1 if a > b, otherwise 0. */
export function compare(a: number, b: number): -1 | 0 | 1 {
  requireNonNull(a, 'compare(null, ...)');
  requireNonNull(b, 'compare(..., null)');
  if (Number.isNaN(a)) throw new ArgumentRangeError('a', a, 'compare() operands must not be NaN');
  if (Number.isNaN(b)) throw new ArgumentRangeError('b', b, 'compare() operands must not be NaN');

  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
