/**
 * In-process MetricStore for local runs and tests
 */

import type { MetricRecord, MetricType } from "../models/index.js";
import { generateRecordKeys } from "./keys.js";
import type { MetricStore, WriteResult } from "./metric-store.js";

export class InMemoryMetricStore implements MetricStore {
  private readonly records = new Map<MetricType, MetricRecord[]>();
  private readonly seen = new Set<string>();

  constructor(initial: MetricRecord[] = []) {
    for (const record of initial) {
      this.insert(record);
    }
  }

  async query(type: MetricType, start: number, end: number): Promise<MetricRecord[]> {
    return (this.records.get(type) ?? []).filter(
      (record) => record.timestamp >= start && record.timestamp < end
    );
  }

  async append(records: MetricRecord[]): Promise<WriteResult> {
    let written = 0;
    let duplicates = 0;
    for (const record of records) {
      if (this.insert(record)) written++;
      else duplicates++;
    }
    return { written, duplicates, errors: [] };
  }

  private insert(record: MetricRecord): boolean {
    const { sk } = generateRecordKeys("local", record);
    const key = `${record.type}#${sk}`;
    if (this.seen.has(key)) return false;
    this.seen.add(key);

    const list = this.records.get(record.type) ?? [];
    list.push(record);
    list.sort((a, b) => a.timestamp - b.timestamp);
    this.records.set(record.type, list);
    return true;
  }
}
