/**
 * Charsets
 *
 * Named codecs between JS strings and byte arrays. UTF-8 goes through the
 * platform TextEncoder/TextDecoder; the single-byte charsets are mapped here,
 * since WHATWG "latin1" decodes as windows-1252 rather than ISO-8859-1.
 *
 * Unmappable characters encode to '?' and malformed bytes decode to U+FFFD,
 * matching the usual replace-on-error charset policy.
 */

import { logger } from '../app/logger.js';
import { getCharsetsConfig } from '../app/config.js';
import { UnsupportedCharsetError, requireNonNull } from './errors.js';

export interface Charset {
  /** Canonical name, e.g. "UTF-8" */
  readonly name: string;
  readonly aliases: readonly string[];
  encode(text: string): Uint8Array;
  decode(bytes: Uint8Array): string;
}

export type CharsetLike = Charset | string;

export interface EncodeResult {
  bytes: Uint8Array;
  /** Characters replaced by '?' */
  replaced: number;
}

const REPLACEMENT_BYTE = 0x3f; // '?'
const REPLACEMENT_CHAR = '\uFFFD';

// Lone high or low surrogate
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

// ============================================
// Codecs
// ============================================

abstract class BaseCharset implements Charset {
  constructor(
    readonly name: string,
    readonly aliases: readonly string[],
  ) {}

  encode(text: string): Uint8Array {
    return this.encodeCounting(text).bytes;
  }

  abstract encodeCounting(text: string): EncodeResult;
  abstract decode(bytes: Uint8Array): string;

  toString(): string {
    return this.name;
  }
}

/**
 * One byte per code point, for charsets whose code points equal their byte values
 * up to `maxCodePoint` (ISO-8859-1, US-ASCII).
 */
class SingleByteCharset extends BaseCharset {
  constructor(
    name: string,
    aliases: readonly string[],
    private readonly maxCodePoint: number,
  ) {
    super(name, aliases);
  }

  encodeCounting(text: string): EncodeResult {
    const out: number[] = [];
    let replaced = 0;
    // for..of walks code points, so a surrogate pair becomes a single '?'
    for (const ch of text) {
      const cp = ch.codePointAt(0) ?? 0;
      if (cp <= this.maxCodePoint) {
        out.push(cp);
      } else {
        out.push(REPLACEMENT_BYTE);
        replaced++;
      }
    }
    return { bytes: Uint8Array.from(out), replaced };
  }

  decode(bytes: Uint8Array): string {
    let text = '';
    for (const b of bytes) {
      text += b <= this.maxCodePoint ? String.fromCharCode(b) : REPLACEMENT_CHAR;
    }
    return text;
  }
}

class Utf8Charset extends BaseCharset {
  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: true });

  encodeCounting(text: string): EncodeResult {
    let replaced = 0;
    // TextEncoder would emit U+FFFD (3 bytes) for a lone surrogate
    const wellFormed = text.replace(LONE_SURROGATE, () => {
      replaced++;
      return '?';
    });
    return { bytes: this.encoder.encode(wellFormed), replaced };
  }

  decode(bytes: Uint8Array): string {
    return this.decoder.decode(bytes);
  }
}

export const ISO_8859_1: Charset = new SingleByteCharset(
  'ISO-8859-1',
  ['latin1', 'l1', 'iso8859_1', 'iso_8859_1', 'iso-latin-1', 'cp819', 'ibm819'],
  0xff,
);

export const US_ASCII: Charset = new SingleByteCharset('US-ASCII', ['ascii', 'us', 'iso646-us', 'ascii7'], 0x7f);

export const UTF_8: Charset = new Utf8Charset('UTF-8', ['utf8']);

// ============================================
// Registry
// ============================================

const registry = new Map<string, Charset>();
for (const charset of [ISO_8859_1, US_ASCII, UTF_8]) {
  registry.set(charset.name.toLowerCase(), charset);
  for (const alias of charset.aliases) {
    registry.set(alias.toLowerCase(), charset);
  }
}

/**
 * Look up a charset by canonical name or alias, ignoring case.
 */
export function forName(name: string): Charset {
  requireNonNull(name, 'forName(null)');
  const charset = registry.get(name.trim().toLowerCase());
  if (!charset) {
    logger.warn({ charset: name }, 'Unsupported charset requested');
    throw new UnsupportedCharsetError(name);
  }
  if (charset.name !== name) {
    logger.debug({ requested: name, charset: charset.name }, 'Resolved charset alias');
  }
  return charset;
}

export function isSupported(name: string): boolean {
  requireNonNull(name, 'isSupported(null)');
  return registry.has(name.trim().toLowerCase());
}

/** Canonical names of every registered charset, sorted. */
export function availableCharsets(): string[] {
  return [...new Set([...registry.values()].map((c) => c.name))].sort();
}

/**
 * The charset named by `charsets.default` in config.
 */
export function defaultCharset(): Charset {
  return forName(getCharsetsConfig().default);
}

export function resolveCharset(charset: CharsetLike): Charset {
  return typeof charset === 'string' ? forName(charset) : charset;
}

/**
 * Encode and report how many characters had to be replaced.
 * Charsets from outside this module report zero replacements.
 */
export function encodeWithReport(charset: Charset, text: string): EncodeResult {
  const result = charset instanceof BaseCharset
    ? charset.encodeCounting(text)
    : { bytes: charset.encode(text), replaced: 0 };
  if (result.replaced > 0) {
    logger.trace({ charset: charset.name, replaced: result.replaced }, 'Replaced unmappable characters');
  }
  return result;
}
