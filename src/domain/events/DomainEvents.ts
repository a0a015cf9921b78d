import type { SourceMetadata } from '../ports/DataSource.js';
import type { KnetErrorCode } from '../model/KnetDecodeError.js';

/** Emitted when `KnetReader.read()` starts pulling content from a source. */
export interface DecodeStartedEvent {
  readonly type: 'decode:started';
  readonly source: SourceMetadata;
  readonly timestamp: number;
}

/** Emitted once the 17 header lines have been parsed. */
export interface HeaderParsedEvent {
  readonly type: 'header:parsed';
  readonly stationCode: string;
  readonly channelCode: string;
  readonly recordStartTime: Date;
  readonly timestamp: number;
}

/** Emitted when a trace has been assembled. */
export interface DecodeCompletedEvent {
  readonly type: 'decode:completed';
  readonly stationCode: string;
  readonly channelCode: string;
  readonly sampleCount: number;
  readonly timestamp: number;
}

/** Emitted when a decode is abandoned. `code` is absent for failures of the source itself. */
export interface DecodeFailedEvent {
  readonly type: 'decode:failed';
  readonly code?: KnetErrorCode;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent = DecodeStartedEvent | HeaderParsedEvent | DecodeCompletedEvent | DecodeFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
