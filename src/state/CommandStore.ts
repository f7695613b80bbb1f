import type { DurableRecordStore, VersionedRecord } from './RecordStore.js';
import type { RiskCommand } from './records.js';
import { logger, errorMessage, type Logger } from '../utils/logger.js';

export interface LatestCommand {
  command: RiskCommand;
  version: number;
  writtenAt: string;
  /** Milliseconds since the record was written; Infinity when its timestamp is unreadable */
  ageMs: number;
}

/**
 * Single-writer, many-reader holder of the latest risk command
 */
export class CommandStore {
  private store: DurableRecordStore<RiskCommand>;
  private log: Logger;

  constructor(store: DurableRecordStore<RiskCommand>) {
    this.store = store;
    this.log = logger('CommandStore');
  }

  /**
   * Replace the published command as one unit
   */
  async publish(command: RiskCommand): Promise<number> {
    const record = await this.store.write(command);
    this.log.debug('Risk command published', { mode: command.mode, version: record.version });
    return record.version;
  }

  /**
   * Latest command, or null when absent or malformed
   */
  async readLatest(now: number = Date.now()): Promise<LatestCommand | null> {
    let record: VersionedRecord<RiskCommand> | null;
    try {
      record = await this.store.read();
    } catch (error) {
      this.log.warn('Risk command record unreadable, treating as absent', { error: errorMessage(error) });
      return null;
    }
    if (!record) {
      return null;
    }

    const writtenAtMs = Date.parse(record.writtenAt);
    return {
      command: record.value,
      version: record.version,
      writtenAt: record.writtenAt,
      ageMs: Number.isNaN(writtenAtMs) ? Number.POSITIVE_INFINITY : Math.max(0, now - writtenAtMs),
    };
  }
}
