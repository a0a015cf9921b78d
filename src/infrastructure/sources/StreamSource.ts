import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface StreamSourceOptions {
  /** File name for metadata. Default: 'stream-input'. */
  readonly fileName?: string;
  /** Size in bytes for metadata (if known). */
  readonly fileSize?: number;
}

type ChunkStream = AsyncIterable<string | Uint8Array> | ReadableStream<string | Uint8Array>;

/** Data source that wraps an `AsyncIterable` (e.g. a Node.js `Readable`) or a web `ReadableStream`. Readable once. */
export class StreamSource implements DataSource {
  private readonly stream: ChunkStream;
  private readonly meta: SourceMetadata;
  private consumed = false;

  constructor(stream: ChunkStream, options?: StreamSourceOptions) {
    this.stream = stream;
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
    };
  }

  async *read(): AsyncIterable<string | Buffer> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = this.isReadableStream(this.stream) ? this.fromReadableStream(this.stream) : this.stream;

    for await (const chunk of iterable) {
      yield typeof chunk === 'string' ? chunk : Buffer.from(chunk);
    }
  }

  /**
   * Consumes the stream: a sampled `StreamSource` cannot be read afterwards.
   * `maxBytes` counts string chunks by their UTF-8 length. A stream that yields both
   * strings and bytes has no single encoding and is rejected.
   */
  async sample(maxBytes?: number): Promise<string | Buffer> {
    const strings: string[] = [];
    const buffers: Buffer[] = [];
    let total = 0;

    for await (const chunk of this.read()) {
      if (typeof chunk === 'string') {
        strings.push(chunk);
        total += Buffer.byteLength(chunk);
      } else {
        buffers.push(chunk);
        total += chunk.length;
      }
      if (strings.length > 0 && buffers.length > 0) {
        throw new Error('StreamSource: stream yielded both text and byte chunks.');
      }
      if (maxBytes && total >= maxBytes) break;
    }

    if (buffers.length === 0) {
      const joined = strings.join('');
      return maxBytes ? joined.slice(0, maxBytes) : joined;
    }
    const joined = Buffer.concat(buffers);
    return maxBytes ? joined.subarray(0, maxBytes) : joined;
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private isReadableStream(stream: ChunkStream): stream is ReadableStream<string | Uint8Array> {
    return 'getReader' in stream && typeof stream.getReader === 'function';
  }

  private async *fromReadableStream(stream: ReadableStream<string | Uint8Array>): AsyncIterable<string | Uint8Array> {
    const reader = stream.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        yield value;
      }
    } finally {
      reader.releaseLock();
    }
  }
}
