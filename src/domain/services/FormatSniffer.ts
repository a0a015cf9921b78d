import { DEFAULT_ENCODING, decodeText, type TextInput } from './TextDecoding.js';

/** Every K-NET / KiK-net ASCII record opens with this label. */
export const KNET_SIGNATURE = 'Origin Time';

/** Enough bytes for 11 characters in any supported encoding. */
export const SNIFF_BYTES = 64;

/**
 * Whether the input looks like a K-NET / KiK-net ASCII record: its first 11 characters,
 * decoded under `encoding`, are exactly `Origin Time`. Never throws; undecodable input
 * and unknown encodings count as no match.
 */
export function isKnetAscii(data: TextInput, encoding: string = DEFAULT_ENCODING): boolean {
  const prefix = typeof data === 'string' ? data : data.subarray(0, SNIFF_BYTES);

  let text: string;
  try {
    text = decodeText(prefix, encoding, true);
  } catch {
    return false;
  }

  return text.length >= KNET_SIGNATURE.length && text.slice(0, KNET_SIGNATURE.length) === KNET_SIGNATURE;
}
