// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT SINKS — Where Formatted Output Goes
// ═══════════════════════════════════════════════════════════════════════════════

import { closeSync, openSync, writeSync } from 'node:fs';

/**
 * Synchronous output target. A failed write throws; the exporter turns the
 * exception into a SinkWriteError and stops.
 */
export interface ExportSink {
  write(chunk: string): void;
}

// ─────────────────────────────────────────────────────────────────────────────────
// IN-MEMORY
// ─────────────────────────────────────────────────────────────────────────────────

export class StringSink implements ExportSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FILE
// ─────────────────────────────────────────────────────────────────────────────────

export interface FileSinkOptions {
  /** Append instead of truncating */
  append?: boolean;
  /** latin1 keeps force-8-bit text byte for byte */
  encoding?: BufferEncoding;
}

export class FileSink implements ExportSink {
  private fd: number | null;
  private readonly encoding: BufferEncoding;

  constructor(readonly path: string, options: FileSinkOptions = {}) {
    this.fd = openSync(path, options.append ? 'a' : 'w');
    this.encoding = options.encoding ?? 'utf8';
  }

  /**
   * Write the whole chunk, retrying after short writes. A write that makes
   * no progress throws.
   */
  write(chunk: string): void {
    if (this.fd === null) {
      throw new Error(`File sink for ${this.path} is closed`);
    }

    const buffer = Buffer.from(chunk, this.encoding);
    let offset = 0;

    while (offset < buffer.length) {
      const written = this.writeBytes(this.fd, buffer, offset, buffer.length - offset);
      if (written <= 0) {
        throw new Error(`Short write to ${this.path} (${offset} of ${buffer.length} bytes)`);
      }
      offset += written;
    }
  }

  protected writeBytes(fd: number, buffer: Buffer, offset: number, length: number): number {
    return writeSync(fd, buffer, offset, length);
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// DECORATORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Passes writes through and counts the bytes that reached the inner sink.
 */
export class CountingSink implements ExportSink {
  private written = 0;

  constructor(
    private readonly inner: ExportSink,
    private readonly encoding: BufferEncoding = 'utf8'
  ) {}

  get bytesWritten(): number {
    return this.written;
  }

  write(chunk: string): void {
    this.inner.write(chunk);
    this.written += Buffer.byteLength(chunk, this.encoding);
  }
}
