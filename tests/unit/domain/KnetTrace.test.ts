import { describe, it, expect } from 'vitest';
import { createTrace, KNET_NETWORK_CODE } from '../../../src/domain/model/KnetTrace.js';
import { parseHeader } from '../../../src/domain/services/HeaderParser.js';
import { buildHeaderLines } from '../../helpers/knetRecord.js';

const header = parseHeader(buildHeaderLines());

describe('createTrace', () => {
  it('should derive the sample interval from the sampling rate', () => {
    expect(createTrace(header, [0, 0]).delta).toBe(0.01);
  });

  it('should place the end time on the last sample', () => {
    const trace = createTrace(header, new Array<number>(11).fill(0));
    expect(trace.endTime.toISOString()).toBe('2011-03-11T05:46:30.100Z');
  });

  it('should end at the start time when there are no samples', () => {
    const trace = createTrace(header, []);
    expect(trace.sampleCount).toBe(0);
    expect(trace.endTime.toISOString()).toBe(header.recordStartTime.toISOString());
  });

  it('should carry the Bosai network code', () => {
    expect(createTrace(header, []).networkCode).toBe(KNET_NETWORK_CODE);
    expect(KNET_NETWORK_CODE).toBe('BO');
  });

  it('should be frozen and detached from the input array', () => {
    const samples = [1, 2, 3];
    const trace = createTrace(header, samples);
    samples.push(4);

    expect(trace.samples).toEqual([1, 2, 3]);
    expect(Object.isFrozen(trace)).toBe(true);
    expect(Object.isFrozen(trace.samples)).toBe(true);
    expect(Object.isFrozen(trace.header)).toBe(true);
  });
});
