/**
 * Converge — In-Memory State Store
 *
 * Lightweight implementation for testing and development.
 */

import type { ResourceKey, StateRecord, StateStore } from "./types.js";
import { addressOf } from "./values.js";

export class MemoryStateStore implements StateStore {
  private records = new Map<string, StateRecord>();

  constructor(initial: StateRecord[] = []) {
    for (const record of initial) this.records.set(addressOf(record), structuredClone(record));
  }

  async open(): Promise<void> {
    // No-op for in-memory
  }

  async close(): Promise<void> {
    // No-op for in-memory
  }

  async get(key: ResourceKey): Promise<StateRecord | undefined> {
    const record = this.records.get(addressOf(key));
    return record ? structuredClone(record) : undefined;
  }

  async put(record: StateRecord): Promise<void> {
    this.records.set(addressOf(record), structuredClone(record));
  }

  async delete(key: ResourceKey): Promise<void> {
    this.records.delete(addressOf(key));
  }

  async list(): Promise<StateRecord[]> {
    return [...this.records.values()].map((r) => structuredClone(r));
  }

  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
  }
}
