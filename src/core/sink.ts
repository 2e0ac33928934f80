import * as fs from 'fs';

/**
 * Destination for encoded JSON text. `write` throws to report a failed write.
 */
export interface OutputSink {
  write(chunk: string): void;
}

export class StringSink implements OutputSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

/** Writes synchronously to an open file descriptor (1 for stdout). */
export class FileDescriptorSink implements OutputSink {
  constructor(private readonly fd: number) {}

  write(chunk: string): void {
    const buf = Buffer.from(chunk, 'utf-8');
    let offset = 0;
    while (offset < buf.length) {
      offset += fs.writeSync(this.fd, buf, offset);
    }
  }
}
