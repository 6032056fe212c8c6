/**
 * backport-shims
 *
 * Array-copy, charset and comparison helpers for runtimes that lack them.
 */

export {
  copyOf,
  copyOfRange,
  getBytes,
  getString,
  isEmpty,
  compare,
  ISO_8859_1,
  UTF_8,
  type Int32Sequence,
  type ByteSequence,
} from './shims/backport.js';

export {
  US_ASCII,
  forName,
  isSupported,
  availableCharsets,
  defaultCharset,
  resolveCharset,
  encodeWithReport,
  type Charset,
  type CharsetLike,
  type EncodeResult,
} from './shims/charset.js';

export {
  ShimError,
  NullArgumentError,
  ArgumentRangeError,
  UnsupportedCharsetError,
} from './shims/errors.js';

export { initConfig, loadConfigFrom, type Config, type LogConfig, type CharsetsConfig } from './app/config.js';
export { initLogger, initLoggerFromConfig, createLogger } from './app/logger.js';

export * as Backport from './shims/backport.js';
