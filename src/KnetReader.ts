import { EventBus } from './application/EventBus.js';
import type { DomainEvent, EventPayload, EventType } from './domain/events/DomainEvents.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { KnetTrace } from './domain/model/KnetTrace.js';
import { KnetDecodeError, isKnetDecodeError } from './domain/model/KnetDecodeError.js';
import { SNIFF_BYTES, isKnetAscii } from './domain/services/FormatSniffer.js';
import { decodeKnetAscii } from './domain/services/RecordDecoder.js';
import { DEFAULT_ENCODING } from './domain/services/TextDecoding.js';

/** Configuration for a `KnetReader`. */
export interface KnetReaderConfig {
  /** WHATWG encoding label used for byte content. Default: `'utf-8'`. */
  readonly encoding?: string;
  /**
   * Move the last two characters of station codes longer than 5 characters into
   * `header.locationCode`. Default: `false`.
   */
  readonly convertStationName?: boolean;
  /** Number of bytes `detect()` samples from a source. Default: `64`. */
  readonly sniffBytes?: number;
}

/**
 * Facade that reads K-NET / KiK-net ASCII records from any `DataSource`:
 * sample → detect, or gather → decode → trace.
 *
 * @example
 * ```typescript
 * const reader = new KnetReader({ convertStationName: true });
 * reader.on('decode:completed', (e) => console.log(e.stationCode, e.sampleCount));
 *
 * const source = new FilePathSource('MYG0041103111446.NS');
 * if (await reader.detect(source)) {
 *   const trace = await reader.read(source);
 * }
 * ```
 */
export class KnetReader {
  private readonly eventBus = new EventBus();
  private readonly encoding: string;
  private readonly convertStationName: boolean;
  private readonly sniffBytes: number;

  constructor(config?: KnetReaderConfig) {
    this.encoding = config?.encoding ?? DEFAULT_ENCODING;
    this.convertStationName = config?.convertStationName ?? false;
    this.sniffBytes = config?.sniffBytes ?? SNIFF_BYTES;
  }

  /** Subscribe to decode lifecycle events. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to every decode lifecycle event, e.g. to forward them to a logger. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a handler registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  /**
   * Whether the source looks like a K-NET / KiK-net ASCII record. Resolves `false`
   * instead of rejecting when the source cannot be sampled.
   *
   * Sampling a `StreamSource` consumes it; open the stream again before `read()`.
   */
  async detect(source: DataSource): Promise<boolean> {
    try {
      const sample = await source.sample(this.sniffBytes);
      return isKnetAscii(sample, this.encoding);
    } catch {
      return false;
    }
  }

  /** Read and decode the whole source. Rejects with `KnetDecodeError` on malformed content. */
  async read(source: DataSource): Promise<KnetTrace> {
    try {
      this.eventBus.emit({ type: 'decode:started', source: source.metadata(), timestamp: Date.now() });

      const content = await this.gather(source);
      const trace = decodeKnetAscii(
        content,
        { encoding: this.encoding, convertStationName: this.convertStationName },
        {
          onHeader: (header) => {
            this.eventBus.emit({
              type: 'header:parsed',
              stationCode: header.stationCode,
              channelCode: header.channelCode,
              recordStartTime: header.recordStartTime,
              timestamp: Date.now(),
            });
          },
        },
      );

      this.eventBus.emit({
        type: 'decode:completed',
        stationCode: trace.header.stationCode,
        channelCode: trace.header.channelCode,
        sampleCount: trace.sampleCount,
        timestamp: Date.now(),
      });
      return trace;
    } catch (error) {
      this.eventBus.emit({
        type: 'decode:failed',
        ...(isKnetDecodeError(error) ? { code: error.code } : {}),
        error: error instanceof Error ? error.message : String(error),
        timestamp: Date.now(),
      });
      throw error;
    }
  }

  private async gather(source: DataSource): Promise<string | Buffer> {
    const strings: string[] = [];
    const buffers: Buffer[] = [];

    for await (const chunk of source.read()) {
      if (typeof chunk === 'string') strings.push(chunk);
      else buffers.push(chunk);
    }

    if (strings.length > 0 && buffers.length > 0) {
      throw KnetDecodeError.encoding(this.encoding, 'source yielded both text and byte chunks');
    }
    return buffers.length > 0 ? Buffer.concat(buffers) : strings.join('');
  }
}
