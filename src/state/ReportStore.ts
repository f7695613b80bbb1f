import type { DurableRecordStore } from './RecordStore.js';
import type { PanicExecutionReport } from './records.js';

/**
 * Last panic execution report, including one still in flight
 */
export class ReportStore {
  private store: DurableRecordStore<PanicExecutionReport>;

  constructor(store: DurableRecordStore<PanicExecutionReport>) {
    this.store = store;
  }

  async save(report: PanicExecutionReport): Promise<void> {
    await this.store.write(report);
  }

  async latest(): Promise<PanicExecutionReport | null> {
    const record = await this.store.read();
    return record?.value ?? null;
  }
}
