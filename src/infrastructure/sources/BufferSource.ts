import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

/** Data source over content already in memory. */
export class BufferSource implements DataSource {
  private readonly content: string | Buffer;
  private readonly meta: SourceMetadata;

  constructor(data: string | Uint8Array, metadata?: Partial<SourceMetadata>) {
    this.content = typeof data === 'string' ? data : Buffer.from(data);
    this.meta = {
      fileName: metadata?.fileName ?? 'buffer-input',
      fileSize: typeof this.content === 'string' ? Buffer.byteLength(this.content) : this.content.length,
    };
  }

  async *read(): AsyncIterable<string | Buffer> {
    yield await Promise.resolve(this.content);
  }

  /** Strings are cut by characters, Buffers by bytes. */
  sample(maxBytes?: number): Promise<string | Buffer> {
    if (maxBytes && maxBytes < this.content.length) {
      const head = typeof this.content === 'string' ? this.content.slice(0, maxBytes) : this.content.subarray(0, maxBytes);
      return Promise.resolve(head);
    }
    return Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
