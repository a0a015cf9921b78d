import type { KnetHeader, KnetHeaderOptions } from '../model/KnetHeader.js';
import { KnetDecodeError } from '../model/KnetDecodeError.js';
import {
  MAX_STATION_CODE_LENGTH,
  jstToUtc,
  leadingDigits,
  parseDecimal,
  parseScaleFactor,
  parseWallClock,
  remapChannel,
  removeTriggerDelay,
  splitStationCode,
  tokenize,
} from './fieldParsers.js';

type HeaderDraft = { -readonly [K in keyof KnetHeader]?: KnetHeader[K] };

export interface ResolvedHeaderOptions {
  readonly convertStationName: boolean;
}

/** One tokenised header line, with accessors that fail with the line's position and label. */
export class HeaderLine {
  readonly tokens: readonly string[];

  constructor(
    readonly lineNumber: number,
    readonly label: string,
    text: string,
  ) {
    this.tokens = tokenize(text);
  }

  token(index: number): string {
    const token = this.tokens[index];
    if (token === undefined) {
      throw KnetDecodeError.missingField(this.lineNumber, this.label, index);
    }
    return token;
  }

  decimal(index: number): number {
    const token = this.tokens[index];
    const value = token === undefined ? null : parseDecimal(token);
    if (value === null) {
      throw KnetDecodeError.malformedNumber(this.lineNumber, this.label, index, token);
    }
    return value;
  }

  /** Leading digit run of the token as a positive integer (`100Hz` → 100). */
  leadingInteger(index: number): number {
    const token = this.tokens[index];
    const digits = token === undefined ? '' : leadingDigits(token);
    const value = Number.parseInt(digits, 10);
    if (digits === '' || value <= 0) {
      throw KnetDecodeError.malformedNumber(this.lineNumber, this.label, index, token);
    }
    return value;
  }

  /** Date token at `index` and time token at `index + 1`, read as wall-clock time. */
  wallClock(index: number): Date {
    const date = this.tokens[index];
    const time = this.tokens[index + 1];
    const text = [date, time].filter((t) => t !== undefined).join(' ');
    const parsed = date === undefined || time === undefined ? null : parseWallClock(text);
    if (parsed === null) {
      throw KnetDecodeError.malformedTimestamp(this.lineNumber, this.label, text);
    }
    return parsed;
  }

  scaleFactor(index: number): number {
    const token = this.token(index);
    const result = parseScaleFactor(token);
    if (!result.ok) {
      throw KnetDecodeError.malformedCalibration(this.lineNumber, token, result.reason);
    }
    return result.value;
  }

  /** Tokens from `index` on joined by single spaces, or `undefined` when there are none. */
  rest(index: number): string | undefined {
    return this.tokens.length > index ? this.tokens.slice(index).join(' ') : undefined;
  }
}

export interface HeaderLineRule {
  readonly label: string;
  readonly parse: (line: HeaderLine, options: ResolvedHeaderOptions) => HeaderDraft;
}

/** The header grammar: one rule per line, in file order. */
export const HEADER_RULES: readonly HeaderLineRule[] = [
  { label: 'Origin Time', parse: (l) => ({ eventOriginTime: jstToUtc(l.wallClock(2)) }) },
  { label: 'Lat.', parse: (l) => ({ eventLatitude: l.decimal(1) }) },
  { label: 'Long.', parse: (l) => ({ eventLongitude: l.decimal(1) }) },
  { label: 'Depth. (km)', parse: (l) => ({ eventDepthKm: l.decimal(2) }) },
  { label: 'Mag.', parse: (l) => ({ eventMagnitude: l.decimal(1) }) },
  {
    label: 'Station Code',
    parse: (l, options) => {
      const station = splitStationCode(l.token(2), options.convertStationName);
      if (station.stationCode.length > MAX_STATION_CODE_LENGTH) {
        throw KnetDecodeError.stationNameTooLong(station.stationCode, MAX_STATION_CODE_LENGTH);
      }
      return { ...station };
    },
  },
  { label: 'Station Lat.', parse: (l) => ({ stationLatitude: l.decimal(2) }) },
  { label: 'Station Long.', parse: (l) => ({ stationLongitude: l.decimal(2) }) },
  { label: 'Station Height(m)', parse: (l) => ({ stationElevationM: l.decimal(2) }) },
  { label: 'Record Time', parse: (l) => ({ recordStartTime: jstToUtc(removeTriggerDelay(l.wallClock(2))) }) },
  { label: 'Sampling Freq(Hz)', parse: (l) => ({ samplingRateHz: l.leadingInteger(2) }) },
  { label: 'Duration Time(s)', parse: (l) => ({ durationS: l.decimal(2) }) },
  { label: 'Dir.', parse: (l) => ({ channelCode: remapChannel(l.token(1)) }) },
  { label: 'Scale Factor', parse: (l) => ({ calibrationFactor: l.scaleFactor(2) }) },
  { label: 'Max. Acc. (gal)', parse: (l) => ({ maxAccelerationGal: l.decimal(3) }) },
  { label: 'Last Correction', parse: (l) => ({ lastCorrectionTime: jstToUtc(l.wallClock(2)) }) },
  {
    label: 'Memo.',
    parse: (l) => {
      const comment = l.rest(1);
      return comment === undefined ? {} : { comment };
    },
  },
];

export const HEADER_LINE_COUNT = HEADER_RULES.length;

/**
 * Parse the header block of a K-NET / KiK-net ASCII record.
 *
 * `headerLines` must hold exactly the 17 header lines, `Origin Time` through `Memo.`,
 * in file order.
 */
export function parseHeader(headerLines: readonly string[], options?: KnetHeaderOptions): KnetHeader {
  const resolved: ResolvedHeaderOptions = { convertStationName: options?.convertStationName ?? false };
  const draft: HeaderDraft = {};

  HEADER_RULES.forEach((rule, index) => {
    const text = headerLines[index];
    if (text === undefined) {
      throw KnetDecodeError.headerLineCount(HEADER_LINE_COUNT, headerLines.length);
    }
    if (!text.startsWith(rule.label)) {
      throw KnetDecodeError.headerLabelMismatch(index + 1, rule.label, text);
    }
    Object.assign(draft, rule.parse(new HeaderLine(index + 1, rule.label, text), resolved));
  });

  if (headerLines.length !== HEADER_LINE_COUNT) {
    throw KnetDecodeError.headerLineCount(HEADER_LINE_COUNT, headerLines.length);
  }

  return completeHeader(draft);
}

function field<K extends keyof KnetHeader>(draft: HeaderDraft, key: K): KnetHeader[K] {
  const value: KnetHeader[K] | undefined = draft[key];
  if (value === undefined) {
    throw new Error(`Header rule table never set '${key}'`);
  }
  return value;
}

function completeHeader(draft: HeaderDraft): KnetHeader {
  const header: KnetHeader = {
    eventOriginTime: field(draft, 'eventOriginTime'),
    eventLatitude: field(draft, 'eventLatitude'),
    eventLongitude: field(draft, 'eventLongitude'),
    eventDepthKm: field(draft, 'eventDepthKm'),
    eventMagnitude: field(draft, 'eventMagnitude'),
    stationCode: field(draft, 'stationCode'),
    locationCode: field(draft, 'locationCode'),
    stationLatitude: field(draft, 'stationLatitude'),
    stationLongitude: field(draft, 'stationLongitude'),
    stationElevationM: field(draft, 'stationElevationM'),
    recordStartTime: field(draft, 'recordStartTime'),
    samplingRateHz: field(draft, 'samplingRateHz'),
    durationS: field(draft, 'durationS'),
    channelCode: field(draft, 'channelCode'),
    calibrationFactor: field(draft, 'calibrationFactor'),
    maxAccelerationGal: field(draft, 'maxAccelerationGal'),
    lastCorrectionTime: field(draft, 'lastCorrectionTime'),
  };
  return draft.comment === undefined ? header : { ...header, comment: draft.comment };
}
