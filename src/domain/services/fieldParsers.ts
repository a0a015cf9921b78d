import { isValid, parse, subHours, subSeconds } from 'date-fns';
import { UTCDate } from '@date-fns/utc';

/** K-NET and KiK-net stamp every time in Japan Standard Time (UTC+9). */
export const JST_OFFSET_HOURS = 9;

/** Delay the K-NET / KiK-net data logger adds to the record start time. */
export const TRIGGER_DELAY_SECONDS = 15;

export const MAX_STATION_CODE_LENGTH = 7;

const STATION_SPLIT_THRESHOLD = 5;

const GAL_TO_METERS_PER_SECOND_SQUARED = 0.01;

const BOREHOLE_CHANNELS: Readonly<Record<string, string>> = {
  '1': 'NS1',
  '2': 'EW1',
  '3': 'UD1',
  '4': 'NS2',
  '5': 'EW2',
  '6': 'UD2',
};

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const LEADING_DIGITS_PATTERN = /^\d*/;
/** Doubled tokens take one or two digits, so zero-padded and bare fields both parse. */
const TIMESTAMP_FORMAT = 'yyyy/MM/dd HH:mm:ss';

export type FieldResult<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly reason: string };

/** Split a line into whitespace-delimited tokens. */
export function tokenize(line: string): string[] {
  const trimmed = line.trim();
  return trimmed === '' ? [] : trimmed.split(/\s+/);
}

/** Parse a plain decimal token (`12`, `-0.5`, `3.1e-2`). Returns `null` for anything else. */
export function parseDecimal(token: string): number | null {
  if (!DECIMAL_PATTERN.test(token)) return null;
  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

/** The run of digits a token starts with, e.g. `100` for `100Hz`. May be empty. */
export function leadingDigits(token: string): string {
  return LEADING_DIGITS_PATTERN.exec(token)?.[0] ?? '';
}

/**
 * Parse `YYYY/MM/DD HH:MM:SS` as wall-clock fields on the proleptic Gregorian calendar.
 * The fields are taken as-is into a UTC instant; the host time zone plays no part.
 */
export function parseWallClock(text: string): Date | null {
  const parsed = parse(text, TIMESTAMP_FORMAT, new UTCDate(0));
  return isValid(parsed) ? new Date(parsed.getTime()) : null;
}

export function jstToUtc(wallClock: Date): Date {
  return subHours(wallClock, JST_OFFSET_HOURS);
}

export function removeTriggerDelay(recordTime: Date): Date {
  return subSeconds(recordTime, TRIGGER_DELAY_SECONDS);
}

export interface StationName {
  readonly stationCode: string;
  readonly locationCode: string;
}

export function splitStationCode(raw: string, convertStationName: boolean): StationName {
  if (convertStationName && raw.length > STATION_SPLIT_THRESHOLD) {
    return { stationCode: raw.slice(0, -2), locationCode: raw.slice(-2) };
  }
  return { stationCode: raw, locationCode: '' };
}

/** `N-S` → `NS`; KiK-net sensor numbers `1`..`6` → `NS1`, `EW1`, `UD1`, `NS2`, `EW2`, `UD2`. */
export function remapChannel(direction: string): string {
  const stripped = direction.replace(/-/g, '').trim();
  return BOREHOLE_CHANNELS[stripped] ?? stripped;
}

/** `7845(gal)/8223790` → `0.01 * 7845 / 8223790`, i.e. counts to m/s². */
export function parseScaleFactor(token: string): FieldResult<number> {
  const parts = token.split('/');
  if (parts.length !== 2) {
    return { ok: false, reason: `must have the form <numerator>/<denominator>` };
  }

  const [numeratorText = '', denominatorText = ''] = parts;
  const digits = leadingDigits(numeratorText);
  if (digits === '') {
    return { ok: false, reason: `has no digits in numerator '${numeratorText}'` };
  }
  const denominator = parseDecimal(denominatorText);
  if (denominator === null) {
    return { ok: false, reason: `has a non-numeric denominator '${denominatorText}'` };
  }
  if (denominator === 0) {
    return { ok: false, reason: 'has a zero denominator' };
  }

  return { ok: true, value: (GAL_TO_METERS_PER_SECOND_SQUARED * Number(digits)) / denominator };
}
