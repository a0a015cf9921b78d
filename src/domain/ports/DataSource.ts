/** What a source knows about its origin, reported with decode events. */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading a record from any origin (file, buffer, stream).
 *
 * Byte chunks are passed through undecoded; the decoder applies the configured
 * text encoding. String chunks are taken to be decoded text already.
 */
export interface DataSource {
  /** Yield the content in order as strings or Buffers. */
  read(): AsyncIterable<string | Buffer>;
  /** Return the first `maxBytes` of the content (all of it when omitted), for format detection. */
  sample(maxBytes?: number): Promise<string | Buffer>;
  metadata(): SourceMetadata;
}
