/**
 * Shim errors and argument preconditions
 *
 * Every shim fails fast: a missing argument or an out-of-range bound throws
 * synchronously and the error reaches the caller unchanged.
 */

export class ShimError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A required argument was null or undefined. */
export class NullArgumentError extends ShimError {}

/** A numeric argument fell outside its valid range. */
export class ArgumentRangeError extends ShimError {
  readonly paramName: string;
  readonly actualValue: unknown;

  constructor(paramName: string, actualValue: unknown, message?: string) {
    super(message ?? `${paramName} is out of range: ${String(actualValue)}`);
    this.paramName = paramName;
    this.actualValue = actualValue;
  }
}

export class UnsupportedCharsetError extends ShimError {
  readonly charsetName: string;

  constructor(charsetName: string) {
    super(`Unsupported charset: "${charsetName}"`);
    this.charsetName = charsetName;
  }
}

/**
 * Throw NullArgumentError unless value is present.
 * Typed callers can't pass null, but plain JS callers can.
 */
export function requireNonNull<T>(value: T | null | undefined, message: string): T {
  if (value === null || value === undefined) {
    throw new NullArgumentError(message);
  }
  return value;
}

/** Non-negative safe integer, e.g. an array length. */
export function requireLength(paramName: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ArgumentRangeError(paramName, value, `${paramName} must be a non-negative integer, got ${value}`);
  }
  return value;
}

/**
 * Validate a half-open range [from, upto) against a sequence of `size` elements.
 */
export function requireIndexRange(from: number, upto: number, size: number): void {
  if (!Number.isSafeInteger(from) || from < 0 || from > size) {
    throw new ArgumentRangeError('from', from, `from ${from} is outside [0, ${size}]`);
  }
  if (!Number.isSafeInteger(upto) || upto < 0 || upto > size) {
    throw new ArgumentRangeError('upto', upto, `upto ${upto} is outside [0, ${size}]`);
  }
  if (from > upto) {
    throw new ArgumentRangeError('from', from, `from ${from} is greater than upto ${upto}`);
  }
}
