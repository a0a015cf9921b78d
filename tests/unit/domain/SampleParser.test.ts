import { describe, it, expect } from 'vitest';
import { parseSamples } from '../../../src/domain/services/SampleParser.js';
import { isKnetDecodeError } from '../../../src/domain/model/KnetDecodeError.js';

describe('parseSamples', () => {
  it('should collect every token in line order and token order', () => {
    const samples = parseSamples(['  1  2  3', '4 5', '  6'], 18);
    expect(samples).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('should not assume a fixed number of tokens per line', () => {
    const samples = parseSamples(['-1 -2 -3 -4 -5 -6 -7 -8', '9'], 18);
    expect(samples).toHaveLength(9);
  });

  it('should skip blank lines and carriage returns', () => {
    expect(parseSamples(['10 20\r', '', '   ', '30\r'], 18)).toEqual([10, 20, 30]);
  });

  it('should return no samples for an empty block', () => {
    expect(parseSamples([], 18)).toEqual([]);
  });

  it('should report the line and token of a bad value', () => {
    try {
      parseSamples(['1 2 3', '4 x5 6'], 18);
      expect.unreachable('parseSamples should have thrown');
    } catch (error) {
      expect(isKnetDecodeError(error)).toBe(true);
      if (!isKnetDecodeError(error)) return;
      expect(error.code).toBe('MALFORMED_SAMPLE_VALUE');
      expect(error.details).toEqual({ line: 19, tokenIndex: 1, token: 'x5' });
      expect(error.message).toBe("Sample line 19, token 1: 'x5' is not a valid number");
    }
  });
});
