/**
 * @fileoverview File-backed managed resource
 *
 * Opens a descriptor at construction, writes timestamped lines between an
 * opening and a closing marker, and closes the descriptor exactly once.
 */

import { closeSync, openSync, readSync, writeSync } from 'fs';
import { resolve } from 'path';
import {
  ManagedResource,
  ResourceError,
  ResourceErrorCode,
  wrapError,
  type ManagedResourceOptions,
  type ResourceSnapshot,
} from '@lifeguard/core';

export const FILE_KIND = 'file';

/**
 * write truncates, append keeps existing content, read is read-only
 */
export type FileMode = 'read' | 'write' | 'append';

const OPEN_FLAGS: Record<FileMode, string> = {
  read: 'r',
  write: 'w',
  append: 'a',
};

const READ_CHUNK_SIZE = 64 * 1024;

export interface ManagedFileOptions extends ManagedResourceOptions {
  /** Directory relative identifiers are resolved against */
  workDir?: string;
  /** Write opening and closing marker lines (default true) */
  markers?: boolean;
}

export interface FileDescription extends ResourceSnapshot {
  path: string;
  mode: FileMode;
  isOpen: boolean;
  /** Every recorded entry, the opening marker included */
  linesWritten: number;
}

export function openingMarker(at: Date): string {
  return `=== File opened at ${at.toISOString()} ===`;
}

export function closingMarker(at: Date): string {
  return `=== File closed at ${at.toISOString()} ===`;
}

/**
 * Local wall-clock time as HH:MM:SS
 */
export function formatLineTime(at: Date): string {
  return at.toTimeString().slice(0, 8);
}

export class ManagedFile extends ManagedResource {
  readonly mode: FileMode;
  readonly path: string;

  private fd: number | undefined;
  private readonly entries: string[] = [];
  private readonly markers: boolean;

  constructor(identifier: string, mode: FileMode, options: ManagedFileOptions) {
    super(FILE_KIND, identifier, options);
    this.mode = mode;
    this.path = resolve(options.workDir ?? '.', identifier);
    this.markers = options.markers ?? true;

    this.acquire(() => {
      const fd = openSync(this.path, OPEN_FLAGS[mode]);
      this.fd = fd;
      if (this.writable && this.markers) {
        try {
          this.append(openingMarker(this.clock()));
        } catch (error) {
          this.fd = undefined;
          closeSync(fd);
          throw error;
        }
      }
    });
  }

  get writable(): boolean {
    return this.mode === 'write' || this.mode === 'append';
  }

  get readable(): boolean {
    return this.mode === 'read';
  }

  /**
   * Entries recorded by this instance, in write order
   */
  get lines(): readonly string[] {
    return this.entries;
  }

  /**
   * Append `HH:MM:SS - text`. Returns false, without touching the file,
   * when the file is not open for writing.
   */
  writeLine(text: string): boolean {
    const restriction = this.writable ? undefined : `file opened in ${this.mode} mode is not writable`;
    if (!this.checkOperation('writeLine', restriction)) {
      return false;
    }

    try {
      this.append(`${formatLineTime(this.clock())} - ${text}`);
    } catch (error) {
      this.report(wrapError(error, ResourceErrorCode.OperationFailed, undefined, this.errorContext('writeLine')));
      return false;
    }

    this.recordOperation('writeLine', { text });
    return true;
  }

  /**
   * Whole content from offset 0, or undefined when the file is not open for reading
   */
  readAll(): string | undefined {
    const restriction = this.readable ? undefined : `file opened in ${this.mode} mode is not readable`;
    if (!this.checkOperation('readAll', restriction)) {
      return undefined;
    }

    let content: string;
    try {
      content = this.readFromStart();
    } catch (error) {
      this.report(wrapError(error, ResourceErrorCode.OperationFailed, undefined, this.errorContext('readAll')));
      return undefined;
    }

    this.recordOperation('readAll', { bytes: Buffer.byteLength(content) });
    return content;
  }

  describe(): FileDescription {
    return {
      ...this.snapshot(),
      path: this.path,
      mode: this.mode,
      isOpen: this.isOpen,
      linesWritten: this.entries.length,
    };
  }

  protected describeRelease(): Record<string, unknown> {
    return { ...super.describeRelease(), linesWritten: this.entries.length };
  }

  protected releaseHandle(): void {
    const fd = this.fd;
    this.fd = undefined;
    if (fd === undefined) {
      return;
    }

    try {
      if (this.writable && this.markers) {
        writeSync(fd, `${closingMarker(this.clock())}\n`);
      }
    } finally {
      closeSync(fd);
    }
  }

  private append(line: string): void {
    writeSync(this.descriptor(), `${line}\n`);
    this.entries.push(line);
  }

  private readFromStart(): string {
    const fd = this.descriptor();
    const buffer = Buffer.alloc(READ_CHUNK_SIZE);
    const chunks: Buffer[] = [];
    let position = 0;

    for (;;) {
      const bytesRead = readSync(fd, buffer, 0, buffer.length, position);
      if (bytesRead === 0) break;
      chunks.push(Buffer.from(buffer.subarray(0, bytesRead)));
      position += bytesRead;
    }

    return Buffer.concat(chunks).toString('utf8');
  }

  private descriptor(): number {
    if (this.fd === undefined) {
      throw new ResourceError(ResourceErrorCode.InternalError, 'file descriptor is not available', {
        context: this.errorContext('descriptor'),
      });
    }
    return this.fd;
  }
}
