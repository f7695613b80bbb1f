import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { RecordCodec } from './records.js';
import { logger, errorMessage, type Logger } from '../utils/logger.js';
import { StateStoreError } from '../utils/errors.js';

/**
 * A stored value with its write metadata. `version` increases by one on every write.
 */
export interface VersionedRecord<T> {
  version: number;
  writtenAt: string;
  value: T;
}

/**
 * Durable single-record store. Writes replace the whole record atomically;
 * a reader sees either the previous record or the new one, never a mix.
 */
export interface DurableRecordStore<T> {
  readonly name: string;
  /** Latest record, or null when none was written. Throws StateStoreError when unreadable. */
  read(): Promise<VersionedRecord<T> | null>;
  write(value: T): Promise<VersionedRecord<T>>;
}

const EnvelopeSchema = z.object({
  version: z.number().int().nonnegative(),
  written_at: z.string(),
});

function encodeRecord<T>(codec: RecordCodec<T>, record: VersionedRecord<T>): Record<string, unknown> {
  return { ...codec.encode(record.value), version: record.version, written_at: record.writtenAt };
}

function decodeRecord<T>(codec: RecordCodec<T>, raw: unknown): VersionedRecord<T> {
  const envelope = EnvelopeSchema.parse(raw);
  return { version: envelope.version, writtenAt: envelope.written_at, value: codec.decode(raw) };
}

/**
 * Serializes writes within this process so versions never race
 */
class WriteQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<R>(task: () => Promise<R>): Promise<R> {
    const result = this.tail.then(task, task);
    this.tail = result.catch(() => undefined);
    return result;
  }
}

/**
 * JSON file store: write to a temp file beside the target, then rename over it
 */
export class FileRecordStore<T> implements DurableRecordStore<T> {
  readonly name: string;
  private filePath: string;
  private codec: RecordCodec<T>;
  private log: Logger;
  private queue = new WriteQueue();

  constructor(filePath: string, codec: RecordCodec<T>) {
    this.filePath = filePath;
    this.name = path.basename(filePath);
    this.codec = codec;
    this.log = logger(`RecordStore:${this.name}`);
  }

  getPath(): string {
    return this.filePath;
  }

  async read(): Promise<VersionedRecord<T> | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new StateStoreError(`Failed to read ${this.name}: ${errorMessage(error)}`, { path: this.filePath });
    }

    try {
      return decodeRecord(this.codec, JSON.parse(text));
    } catch (error) {
      throw new StateStoreError(`Malformed record in ${this.name}: ${errorMessage(error)}`, { path: this.filePath });
    }
  }

  write(value: T): Promise<VersionedRecord<T>> {
    return this.queue.run(async () => {
      const previous = await this.read().catch((error: unknown) => {
        // An unreadable record is replaced; versioning restarts above zero
        this.log.warn('Overwriting unreadable record', { error: errorMessage(error) });
        return null;
      });

      const record: VersionedRecord<T> = {
        version: (previous?.version ?? 0) + 1,
        writtenAt: new Date().toISOString(),
        value,
      };

      const tmpPath = `${this.filePath}.${process.pid}.${randomUUID()}.tmp`;
      try {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(tmpPath, `${JSON.stringify(encodeRecord(this.codec, record), null, 2)}\n`, 'utf8');
        await fs.rename(tmpPath, this.filePath);
      } catch (error) {
        await fs.rm(tmpPath, { force: true });
        throw new StateStoreError(`Failed to write ${this.name}: ${errorMessage(error)}`, { path: this.filePath });
      }

      this.log.debug('Record written', { version: record.version });
      return record;
    });
  }
}

/**
 * In-memory store holding the encoded form, so reads exercise the same codec as files
 */
export class MemoryRecordStore<T> implements DurableRecordStore<T> {
  readonly name: string;
  private codec: RecordCodec<T>;
  private log: Logger;
  private stored: string | null = null;

  constructor(name: string, codec: RecordCodec<T>) {
    this.name = name;
    this.codec = codec;
    this.log = logger(`RecordStore:${name}`);
  }

  async read(): Promise<VersionedRecord<T> | null> {
    return this.readNow();
  }

  // Read and write without yielding, so concurrent writers cannot share a version
  async write(value: T): Promise<VersionedRecord<T>> {
    let previous: VersionedRecord<T> | null = null;
    try {
      previous = this.readNow();
    } catch (error) {
      this.log.warn('Overwriting unreadable record', { error: errorMessage(error) });
    }
    const record: VersionedRecord<T> = {
      version: (previous?.version ?? 0) + 1,
      writtenAt: new Date().toISOString(),
      value,
    };
    this.stored = JSON.stringify(encodeRecord(this.codec, record));
    return record;
  }

  private readNow(): VersionedRecord<T> | null {
    if (this.stored === null) {
      return null;
    }
    try {
      return decodeRecord(this.codec, JSON.parse(this.stored));
    } catch (error) {
      throw new StateStoreError(`Malformed record in ${this.name}: ${errorMessage(error)}`);
    }
  }

  /**
   * Replace the raw stored text (for simulating foreign or corrupt writers)
   */
  setRaw(text: string | null): void {
    this.stored = text;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
