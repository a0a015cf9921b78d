import { addMilliseconds } from 'date-fns';
import type { KnetHeader } from './KnetHeader.js';

/** FDSN network code of the NIED Bosai network that operates K-NET and KiK-net. */
export const KNET_NETWORK_CODE = 'BO' as const;

/** A decoded single-channel record: header metadata plus the sample block in file order. */
export interface KnetTrace {
  readonly header: KnetHeader;
  readonly networkCode: typeof KNET_NETWORK_CODE;
  readonly sampleCount: number;
  /** Sample interval in seconds. */
  readonly delta: number;
  /** Time of the last sample; equals `header.recordStartTime` when there are no samples. */
  readonly endTime: Date;
  readonly samples: readonly number[];
}

export function createTrace(header: KnetHeader, samples: readonly number[]): KnetTrace {
  const delta = 1 / header.samplingRateHz;
  const span = samples.length > 0 ? (samples.length - 1) * delta : 0;

  return Object.freeze({
    header: Object.freeze({ ...header }),
    networkCode: KNET_NETWORK_CODE,
    sampleCount: samples.length,
    delta,
    endTime: addMilliseconds(header.recordStartTime, Math.round(span * 1000)),
    samples: Object.freeze([...samples]),
  });
}
