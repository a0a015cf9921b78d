export type KnetErrorCode =
  | 'ENCODING_ERROR'
  | 'HEADER_LABEL_MISMATCH'
  | 'HEADER_LINE_COUNT_MISMATCH'
  | 'STATION_NAME_TOO_LONG'
  | 'MALFORMED_NUMERIC_FIELD'
  | 'MALFORMED_CALIBRATION_FIELD'
  | 'MALFORMED_SAMPLE_VALUE'
  | 'PREMATURE_END_OF_HEADER'
  | 'MALFORMED_TIMESTAMP'
  | 'MISSING_FIELD';

export interface KnetErrorDetails {
  /** 1-based line number in the decoded input, when the failure belongs to a line. */
  readonly line?: number;
  /** Header label the failing line was expected to carry. */
  readonly label?: string;
  /** 0-based whitespace token index within the line. */
  readonly tokenIndex?: number;
  readonly token?: string;
  readonly expected?: string | number;
  readonly actual?: string | number;
}

/** Terminal failure of a K-NET ASCII decode. Build instances through the static factories. */
export class KnetDecodeError extends Error {
  constructor(
    readonly code: KnetErrorCode,
    message: string,
    readonly details: KnetErrorDetails = {},
  ) {
    super(message);
    this.name = 'KnetDecodeError';
  }

  static encoding(encoding: string, reason: string): KnetDecodeError {
    return new KnetDecodeError('ENCODING_ERROR', `Cannot decode input as '${encoding}': ${reason}`, {
      expected: encoding,
    });
  }

  static headerLabelMismatch(line: number, label: string, actual: string): KnetDecodeError {
    const shown = actual.trimEnd();
    return new KnetDecodeError(
      'HEADER_LABEL_MISMATCH',
      `Header line ${line}: expected line to start with '${label}' but got '${shown}'`,
      { line, label, expected: label, actual: shown },
    );
  }

  static headerLineCount(expected: number, actual: number): KnetDecodeError {
    return new KnetDecodeError(
      'HEADER_LINE_COUNT_MISMATCH',
      `Expected ${expected} header lines but got ${actual}`,
      { expected, actual },
    );
  }

  static prematureEndOfHeader(linesRead: number): KnetDecodeError {
    return new KnetDecodeError(
      'PREMATURE_END_OF_HEADER',
      `Input ended after ${linesRead} line(s) without a 'Memo.' header line`,
      { expected: 'Memo.', actual: linesRead },
    );
  }

  static stationNameTooLong(station: string, max: number): KnetDecodeError {
    return new KnetDecodeError(
      'STATION_NAME_TOO_LONG',
      `Station name '${station}' is longer than ${max} characters`,
      { token: station, expected: max, actual: station.length },
    );
  }

  static malformedNumber(line: number, label: string, tokenIndex: number, token: string | undefined): KnetDecodeError {
    const message =
      token === undefined
        ? `Header line ${line} ('${label}'): missing numeric field at token ${tokenIndex}`
        : `Header line ${line} ('${label}'): '${token}' is not a valid number`;
    return new KnetDecodeError('MALFORMED_NUMERIC_FIELD', message, { line, label, tokenIndex, token });
  }

  static malformedCalibration(line: number, token: string, reason: string): KnetDecodeError {
    return new KnetDecodeError(
      'MALFORMED_CALIBRATION_FIELD',
      `Header line ${line} ('Scale Factor'): '${token}' ${reason}`,
      { line, label: 'Scale Factor', token },
    );
  }

  static malformedTimestamp(line: number, label: string, token: string): KnetDecodeError {
    return new KnetDecodeError(
      'MALFORMED_TIMESTAMP',
      `Header line ${line} ('${label}'): '${token}' is not a valid YYYY/MM/DD HH:MM:SS time`,
      { line, label, token },
    );
  }

  static missingField(line: number, label: string, tokenIndex: number): KnetDecodeError {
    return new KnetDecodeError(
      'MISSING_FIELD',
      `Header line ${line} ('${label}'): missing field at token ${tokenIndex}`,
      { line, label, tokenIndex },
    );
  }

  static malformedSample(line: number, tokenIndex: number, token: string): KnetDecodeError {
    return new KnetDecodeError(
      'MALFORMED_SAMPLE_VALUE',
      `Sample line ${line}, token ${tokenIndex}: '${token}' is not a valid number`,
      { line, tokenIndex, token },
    );
  }
}

export function isKnetDecodeError(value: unknown): value is KnetDecodeError {
  return value instanceof KnetDecodeError;
}
