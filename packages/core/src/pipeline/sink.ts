import { closeSync, openSync, writeSync } from 'node:fs';
import { FileAccessError } from '../errors.js';

/** Destination every writer appends Markdown through. */
export interface MarkdownSink {
  write(text: string): void;
}

/** Collects output in memory. */
export class BufferSink implements MarkdownSink {
  private chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

/**
 * Appends to a file, creating it when absent. Writes go straight to the
 * descriptor, so text written before a failure stays in the file.
 */
export class FileSink implements MarkdownSink {
  private fd: number | null;

  constructor(readonly filePath: string) {
    try {
      this.fd = openSync(filePath, 'a');
    } catch (error) {
      throw new FileAccessError(filePath, error);
    }
  }

  write(text: string): void {
    if (this.fd === null) {
      throw new FileAccessError(this.filePath, new Error('sink is closed'));
    }
    try {
      writeSync(this.fd, text, null, 'utf-8');
    } catch (error) {
      throw new FileAccessError(this.filePath, error);
    }
  }

  /** Safe to call more than once. */
  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (error) {
      throw new FileAccessError(this.filePath, error);
    }
  }

  get closed(): boolean {
    return this.fd === null;
  }
}
