import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { KnetReader } from '../../src/KnetReader.js';
import { FilePathSource } from '../../src/infrastructure/sources/FilePathSource.js';
import { KnetDecodeError } from '../../src/domain/model/KnetDecodeError.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';

function fixture(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}

const SURFACE_RECORD = fixture('TST0011103111446.NS');
const BOREHOLE_RECORD = fixture('TSTH010806140843.UD2');
const NOT_A_RECORD = fixture('stations.csv');

describe('Reading K-NET / KiK-net files from disk', () => {
  describe('surface record (LF line endings)', () => {
    it('should decode every header field', async () => {
      const trace = await new KnetReader().read(new FilePathSource(SURFACE_RECORD));

      expect(trace.header).toEqual({
        eventOriginTime: new Date('2011-03-11T05:46:00.000Z'),
        eventLatitude: 38.103,
        eventLongitude: 142.86,
        eventDepthKm: 24,
        eventMagnitude: 9,
        stationCode: 'TST001',
        locationCode: '',
        stationLatitude: 38.7262,
        stationLongitude: 141.0212,
        stationElevationM: 440,
        recordStartTime: new Date('2011-03-11T05:46:30.000Z'),
        samplingRateHz: 100,
        durationS: 300,
        channelCode: 'NS',
        calibrationFactor: (0.01 * 2000) / 8388608,
        maxAccelerationGal: 2700.902,
        lastCorrectionTime: new Date('2011-03-11T05:46:30.000Z'),
      });
    });

    it('should decode the samples and derived timing', async () => {
      const trace = await new KnetReader().read(new FilePathSource(SURFACE_RECORD));

      expect(trace.networkCode).toBe('BO');
      expect(trace.sampleCount).toBe(18);
      expect(trace.samples[0]).toBe(-1027);
      expect(trace.samples[17]).toBe(-1009);
      expect(trace.delta).toBe(0.01);
      expect(trace.endTime).toEqual(new Date('2011-03-11T05:46:30.170Z'));
    });

    it('should decode identically when the file arrives in small chunks', async () => {
      const whole = await new KnetReader().read(new FilePathSource(SURFACE_RECORD));
      const chunked = await new KnetReader().read(new FilePathSource(SURFACE_RECORD, { highWaterMark: 16 }));

      expect(chunked).toEqual(whole);
    });
  });

  describe('borehole record (CRLF line endings)', () => {
    it('should decode the KiK-net channel, comment and negative elevation', async () => {
      const trace = await new KnetReader().read(new FilePathSource(BOREHOLE_RECORD));

      expect(trace.header.channelCode).toBe('UD2');
      expect(trace.header.comment).toBe('borehole sensor test record');
      expect(trace.header.stationElevationM).toBe(-260);
      expect(trace.header.samplingRateHz).toBe(200);
      expect(trace.header.calibrationFactor).toBe((0.01 * 3920) / 6170814);
    });

    it('should shift times across the date line into UTC', async () => {
      const trace = await new KnetReader().read(new FilePathSource(BOREHOLE_RECORD));

      expect(trace.header.eventOriginTime).toEqual(new Date('2008-06-13T23:43:00.000Z'));
      expect(trace.header.recordStartTime).toEqual(new Date('2008-06-13T23:43:14.000Z'));
      expect(trace.header.lastCorrectionTime).toEqual(new Date('2008-06-13T23:43:14.000Z'));
      expect(trace.endTime).toEqual(new Date('2008-06-13T23:43:14.025Z'));
    });

    it('should decode the samples without carriage returns', async () => {
      const trace = await new KnetReader().read(new FilePathSource(BOREHOLE_RECORD));

      expect(trace.samples).toEqual([12, 15, -3, 0, 7, -9]);
    });

    it('should keep the full station code unless conversion is enabled', async () => {
      const plain = await new KnetReader().read(new FilePathSource(BOREHOLE_RECORD));
      const converted = await new KnetReader({ convertStationName: true }).read(new FilePathSource(BOREHOLE_RECORD));

      expect(plain.header.stationCode).toBe('TSTH01');
      expect(plain.header.locationCode).toBe('');
      expect(converted.header.stationCode).toBe('TSTH');
      expect(converted.header.locationCode).toBe('01');
    });
  });

  describe('detection', () => {
    it('should detect both record files', async () => {
      const reader = new KnetReader();

      expect(await reader.detect(new FilePathSource(SURFACE_RECORD))).toBe(true);
      expect(await reader.detect(new FilePathSource(BOREHOLE_RECORD))).toBe(true);
    });

    it('should not detect a CSV file', async () => {
      expect(await new KnetReader().detect(new FilePathSource(NOT_A_RECORD))).toBe(false);
    });

    it('should not detect a missing file', async () => {
      expect(await new KnetReader().detect(new FilePathSource(fixture('missing.NS')))).toBe(false);
    });

    it('should read a file after detecting it', async () => {
      const reader = new KnetReader();
      const source = new FilePathSource(SURFACE_RECORD);

      expect(await reader.detect(source)).toBe(true);
      expect((await reader.read(source)).sampleCount).toBe(18);
    });
  });

  describe('failures', () => {
    it('should reject a CSV file with a premature end of header', async () => {
      const reader = new KnetReader();
      const events: DomainEvent[] = [];
      reader.onAny((event) => events.push(event));

      const error: unknown = await reader.read(new FilePathSource(NOT_A_RECORD)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(KnetDecodeError);
      expect(error).toMatchObject({ code: 'PREMATURE_END_OF_HEADER', details: { actual: 2 } });
      expect(events.map((event) => event.type)).toEqual(['decode:started', 'decode:failed']);
      expect(events[0]).toMatchObject({ source: { fileName: 'stations.csv' } });
    });
  });
});
