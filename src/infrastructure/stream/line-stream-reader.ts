import type { Logger } from '../../core/logging/index.js';
import type { SplitFileSystemPort } from '../fs/fs.port.js';

const NEWLINE = 0x0a;

export interface LineStreamReaderConfig {
  /** Upper bound on bytes read per poll; the rest is picked up next poll. */
  readonly maxChunkBytes: number;
}

const DEFAULT_CONFIG: LineStreamReaderConfig = {
  maxChunkBytes: 1024 * 1024,
};

/**
 * Incremental tail of an append-only text file.
 *
 * Starts at the end of the file as it is when first initialized, so lines
 * from before startup are never replayed. Only whole lines are returned:
 * the offset stops after the last newline read and a trailing fragment is
 * picked up once its newline arrives.
 *
 * A shrinking file or a new file at the same path (different inode) resets
 * the offset to 0. I/O failures yield no lines for the cycle.
 */
export class LineStreamReader {
  private readonly config: LineStreamReaderConfig;
  private offset = 0;
  private identity: string | null = null;
  private initialized = false;

  constructor(
    readonly filePath: string,
    private readonly fs: SplitFileSystemPort,
    private readonly logger: Logger,
    config: Partial<LineStreamReaderConfig> = {},
  ) {
    this.config = Object.freeze({ ...DEFAULT_CONFIG, ...config });
  }

  /** Byte offset of the next unread line. */
  get position(): number {
    return this.offset;
  }

  async initialize(): Promise<void> {
    const stat = await this.fs.stat(this.filePath);
    if (stat.isOk()) {
      this.offset = stat.value.sizeBytes;
      this.identity = stat.value.identity;
    } else {
      this.offset = 0;
      this.identity = null;
      this.logger.debug({ filePath: this.filePath, error: stat.error.message }, 'Log file not readable yet, tailing from start once it appears');
    }
    this.initialized = true;
  }

  async poll(): Promise<string[]> {
    if (!this.initialized) {
      await this.initialize();
      return [];
    }

    const stat = await this.fs.stat(this.filePath);
    if (stat.isErr()) {
      this.logger.debug({ filePath: this.filePath, error: stat.error.message }, 'Log stat failed, no data this cycle');
      return [];
    }

    const { sizeBytes, identity } = stat.value;
    const replaced = this.identity !== null && identity !== null && identity !== this.identity;
    if (sizeBytes < this.offset || replaced) {
      this.logger.info({ filePath: this.filePath, previousOffset: this.offset, sizeBytes, replaced }, 'Log file rotated, reading from start');
      this.offset = 0;
    }
    this.identity = identity;

    if (sizeBytes <= this.offset) return [];

    const end = Math.min(sizeBytes, this.offset + this.config.maxChunkBytes);
    const read = await this.fs.readRange(this.filePath, this.offset, end);
    if (read.isErr()) {
      this.logger.debug({ filePath: this.filePath, error: read.error.message }, 'Log read failed, no data this cycle');
      return [];
    }

    return this.consume(read.value);
  }

  private consume(bytes: Uint8Array): string[] {
    const lastNewline = bytes.lastIndexOf(NEWLINE);
    if (lastNewline === -1) {
      // Oversized line: skip the chunk.
      if (bytes.length >= this.config.maxChunkBytes) {
        this.offset += bytes.length;
      }
      return [];
    }

    this.offset += lastNewline + 1;
    return Buffer.from(bytes.buffer, bytes.byteOffset, lastNewline + 1)
      .toString('utf8')
      .split(/\r?\n/)
      .filter((line) => line.trim().length > 0);
  }
}
