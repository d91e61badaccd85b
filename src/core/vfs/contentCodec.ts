/**
 * File content codec.
 *
 * Stored content is either literal text or the marker "base64:" followed by
 * base64-encoded UTF-8 bytes.
 */

import { ContentDecodeError, errorMessage } from "../errors";

export const CONTENT_MARKER = "base64:";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export function isEncoded(raw: string): boolean {
  return raw.startsWith(CONTENT_MARKER);
}

/**
 * Decode a marker-less base64 payload to UTF-8 text.
 * @throws ContentDecodeError on a malformed payload or invalid UTF-8
 */
export function decodePayload(payload: string): string {
  const compact = payload.replace(/\s+/g, "");
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new ContentDecodeError("invalid base64 payload");
  }

  const bytes = Buffer.from(compact, "base64");
  try {
    return utf8Decoder.decode(bytes);
  } catch (err) {
    throw new ContentDecodeError(`payload is not valid UTF-8 (${errorMessage(err)})`);
  }
}

/**
 * Text to display for a stored value. A payload that fails to decode yields
 * an error line in place of the content.
 */
export function decodeContent(raw: string): string {
  if (!isEncoded(raw)) return raw;

  try {
    return decodePayload(raw.slice(CONTENT_MARKER.length));
  } catch (err) {
    return `Decoding error: ${errorMessage(err)}`;
  }
}

export function encodeContent(text: string): string {
  return CONTENT_MARKER + Buffer.from(text, "utf8").toString("base64");
}
