import { describe, it, expect } from 'vitest';
import { KnetDecodeError, isKnetDecodeError } from '../../../src/domain/model/KnetDecodeError.js';

describe('KnetDecodeError', () => {
  it('should be an Error with its own name', () => {
    const error = KnetDecodeError.headerLineCount(17, 16);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('KnetDecodeError');
    expect(error.code).toBe('HEADER_LINE_COUNT_MISMATCH');
  });

  it('should trim the line ending from the reported line', () => {
    const error = KnetDecodeError.headerLabelMismatch(3, 'Long.', 'Lat.   38.103\r');
    expect(error.details.actual).toBe('Lat.   38.103');
  });

  it('should describe a premature end of header', () => {
    const error = KnetDecodeError.prematureEndOfHeader(4);
    expect(error.message).toBe("Input ended after 4 line(s) without a 'Memo.' header line");
    expect(error.details).toEqual({ expected: 'Memo.', actual: 4 });
  });

  it('should describe a malformed number that is present', () => {
    const error = KnetDecodeError.malformedNumber(5, 'Mag.', 1, 'big');
    expect(error.message).toBe("Header line 5 ('Mag.'): 'big' is not a valid number");
  });

  it('should describe a malformed calibration field', () => {
    const error = KnetDecodeError.malformedCalibration(14, '1/2/3', 'must have the form <numerator>/<denominator>');
    expect(error.message).toBe("Header line 14 ('Scale Factor'): '1/2/3' must have the form <numerator>/<denominator>");
  });

  it('should default to empty details', () => {
    expect(new KnetDecodeError('ENCODING_ERROR', 'bad bytes').details).toEqual({});
  });
});

describe('isKnetDecodeError', () => {
  it('should narrow only decode errors', () => {
    expect(isKnetDecodeError(KnetDecodeError.stationNameTooLong('ABCDEFGH', 7))).toBe(true);
    expect(isKnetDecodeError(new Error('other'))).toBe(false);
    expect(isKnetDecodeError('HEADER_LABEL_MISMATCH')).toBe(false);
  });
});
