/**
 * Byte-level helpers shared by the buffer and the decoders
 */

import { ParseError } from "../errors";

export const LF = 0x0a;
export const CR = 0x0d;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Position of the first occurrence of `needle` in `haystack` at or after `from`
 *
 * @returns Index of the match, or -1
 */
export function findPattern(haystack: Uint8Array, needle: Uint8Array, from = 0): number {
  if (needle.length === 0) return from <= haystack.length ? from : -1;
  const first = needle[0];
  const last = haystack.length - needle.length;
  let start = from;
  while (start <= last) {
    const candidate = haystack.indexOf(first, start);
    if (candidate < 0 || candidate > last) return -1;
    let matched = true;
    for (let i = 1; i < needle.length; i++) {
      if (haystack[candidate + i] !== needle[i]) {
        matched = false;
        break;
      }
    }
    if (matched) return candidate;
    start = candidate + 1;
  }
  return -1;
}

export function startsWith(bytes: Uint8Array, prefix: Uint8Array, at = 0): boolean {
  if (bytes.length - at < prefix.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (bytes[at + i] !== prefix[i]) return false;
  }
  return true;
}

export function ascii(text: string): Uint8Array {
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) bytes[i] = text.charCodeAt(i);
  return bytes;
}

/**
 * End of a line that finishes just before `newline`, dropping a CR before it
 */
export function trimCR(bytes: Uint8Array, start: number, end: number): number {
  return end > start && bytes[end - 1] === CR ? end - 1 : end;
}

/**
 * Decode UTF-8 text, reporting invalid bytes as a parse error for `field`
 */
export function decodeText(bytes: Uint8Array, format: string, field: string): string {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new ParseError(`Invalid UTF-8 in ${field}`, format, {
      context: error instanceof Error ? error.message : String(error),
    });
  }
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  if (parts.length === 1 && parts[0] !== undefined) return parts[0];
  let total = 0;
  for (const part of parts) total += part.length;
  const joined = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    joined.set(part, offset);
    offset += part.length;
  }
  return joined;
}

/**
 * Little-endian reads at an offset into a byte array
 *
 * Callers check lengths first; these read whatever the view holds.
 */
export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
