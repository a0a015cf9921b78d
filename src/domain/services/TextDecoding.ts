import { KnetDecodeError } from '../model/KnetDecodeError.js';

/** Node.js decodes text as UTF-8 unless told otherwise. */
export const DEFAULT_ENCODING = 'utf-8';

export type TextInput = string | Uint8Array;

/**
 * Decode bytes under a WHATWG encoding label, failing on any malformed sequence.
 * A string is already text and is returned as-is, minus a leading byte-order mark.
 *
 * With `stream: true` an incomplete multi-byte sequence at the very end is held back
 * instead of being reported, which is what a decoder of a truncated prefix needs.
 */
export function decodeText(data: TextInput, encoding: string = DEFAULT_ENCODING, stream = false): string {
  if (typeof data === 'string') {
    return data.startsWith('\uFEFF') ? data.slice(1) : data;
  }

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch (error) {
    throw KnetDecodeError.encoding(encoding, error instanceof Error ? error.message : String(error));
  }

  try {
    return decoder.decode(data, { stream });
  } catch (error) {
    throw KnetDecodeError.encoding(encoding, error instanceof Error ? error.message : String(error));
  }
}

/** Split decoded text on `\n`. A newline that ends the text does not open another line. */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
