// Main entry point
export { KnetReader } from './KnetReader.js';
export type { KnetReaderConfig } from './KnetReader.js';

// Domain model
export type { KnetHeader, KnetHeaderOptions } from './domain/model/KnetHeader.js';
export type { KnetTrace } from './domain/model/KnetTrace.js';
export { KNET_NETWORK_CODE, createTrace } from './domain/model/KnetTrace.js';
export type { KnetErrorCode, KnetErrorDetails } from './domain/model/KnetDecodeError.js';
export { KnetDecodeError, isKnetDecodeError } from './domain/model/KnetDecodeError.js';

// Decoding pipeline
export { KNET_SIGNATURE, SNIFF_BYTES, isKnetAscii } from './domain/services/FormatSniffer.js';
export { collectHeaderLines, assembleTrace, decodeKnetAscii } from './domain/services/RecordDecoder.js';
export type { KnetDecodeOptions, DecodeHooks, HeaderCollection } from './domain/services/RecordDecoder.js';
export { HEADER_LINE_COUNT, HEADER_RULES, parseHeader } from './domain/services/HeaderParser.js';
export { parseSamples } from './domain/services/SampleParser.js';
export { DEFAULT_ENCODING, decodeText, splitLines } from './domain/services/TextDecoding.js';
export type { TextInput } from './domain/services/TextDecoding.js';
export {
  JST_OFFSET_HOURS,
  TRIGGER_DELAY_SECONDS,
  MAX_STATION_CODE_LENGTH,
  jstToUtc,
  removeTriggerDelay,
  parseWallClock,
  parseScaleFactor,
  remapChannel,
  splitStationCode,
} from './domain/services/fieldParsers.js';
export type { StationName, FieldResult } from './domain/services/fieldParsers.js';

// Application internals
export { EventBus } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  DecodeStartedEvent,
  HeaderParsedEvent,
  DecodeCompletedEvent,
  DecodeFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
