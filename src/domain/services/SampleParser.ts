import { KnetDecodeError } from '../model/KnetDecodeError.js';
import { parseDecimal, tokenize } from './fieldParsers.js';

/**
 * Parse the sample block: every whitespace-separated token of every line, in order.
 * `firstLineNumber` is the 1-based input line of `lines[0]`, used in error reports.
 */
export function parseSamples(lines: readonly string[], firstLineNumber: number): number[] {
  const samples: number[] = [];

  lines.forEach((line, offset) => {
    tokenize(line).forEach((token, tokenIndex) => {
      const value = parseDecimal(token);
      if (value === null) {
        throw KnetDecodeError.malformedSample(firstLineNumber + offset, tokenIndex, token);
      }
      samples.push(value);
    });
  });

  return samples;
}
