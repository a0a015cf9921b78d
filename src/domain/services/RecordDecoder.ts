import type { KnetHeader, KnetHeaderOptions } from '../model/KnetHeader.js';
import { createTrace, type KnetTrace } from '../model/KnetTrace.js';
import { KnetDecodeError } from '../model/KnetDecodeError.js';
import { parseHeader } from './HeaderParser.js';
import { parseSamples } from './SampleParser.js';
import { DEFAULT_ENCODING, decodeText, splitLines, type TextInput } from './TextDecoding.js';

const HEADER_TERMINATOR = 'Memo';

export interface KnetDecodeOptions extends KnetHeaderOptions {
  /** WHATWG encoding label for byte input. Ignored for string input. Default: `'utf-8'`. */
  readonly encoding?: string;
}

/** Callbacks into a running decode. */
export interface DecodeHooks {
  /** Called with the parsed header before the sample block is read. */
  readonly onHeader?: (header: KnetHeader) => void;
}

export interface HeaderCollection {
  readonly headerLines: readonly string[];
  /** `true` when a `Memo` line closed the header; `false` when the input ran out first. */
  readonly terminated: boolean;
}

/** Take lines up to and including the first one starting with `Memo`. */
export function collectHeaderLines(lines: readonly string[]): HeaderCollection {
  const headerLines: string[] = [];

  for (const line of lines) {
    headerLines.push(line);
    if (line.startsWith(HEADER_TERMINATOR)) {
      return { headerLines, terminated: true };
    }
  }

  return { headerLines, terminated: false };
}

export function assembleTrace(header: KnetHeader, samples: readonly number[]): KnetTrace {
  return createTrace(header, samples);
}

/**
 * Decode a complete K-NET / KiK-net ASCII record.
 *
 * @throws {KnetDecodeError} on the first problem found; nothing partial is returned.
 *
 * @example
 * ```typescript
 * const trace = decodeKnetAscii(readFileSync('MYG0041103111446.NS'));
 * trace.header.stationCode; // 'MYG004'
 * ```
 */
export function decodeKnetAscii(data: TextInput, options?: KnetDecodeOptions, hooks?: DecodeHooks): KnetTrace {
  const text = decodeText(data, options?.encoding ?? DEFAULT_ENCODING);
  const lines = splitLines(text);

  const { headerLines, terminated } = collectHeaderLines(lines);
  if (!terminated) {
    throw KnetDecodeError.prematureEndOfHeader(headerLines.length);
  }

  const header = parseHeader(headerLines, options);
  hooks?.onHeader?.(header);

  const samples = parseSamples(lines.slice(headerLines.length), headerLines.length + 1);
  return assembleTrace(header, samples);
}
