import type { AccessRecord } from "../models/access";

export interface AccessLog {
  append(record: AccessRecord): Promise<void>;
  /** Last `limit` records in append order. */
  recent(limit: number): Promise<AccessRecord[]>;
}

export class InMemoryAccessLog implements AccessLog {
  private readonly records: AccessRecord[] = [];

  async append(record: AccessRecord): Promise<void> {
    this.records.push(Object.freeze({ ...record }));
  }

  async recent(limit: number): Promise<AccessRecord[]> {
    if (limit <= 0) {
      return [];
    }
    return this.records.slice(-limit);
  }

  all(): readonly AccessRecord[] {
    return [...this.records];
  }

  get size(): number {
    return this.records.length;
  }
}
