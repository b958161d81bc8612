/**
 * In-Memory Store
 * Owns one entity collection and its id sequence.
 *
 * All methods are synchronous: reading the next id and inserting the record
 * happen in one turn of the event loop, so concurrent requests cannot
 * interleave between them.
 */

import { logger } from '../../config/logger.js';

export type Stored<T> = Readonly<T & { id: number }>;

function deepFreeze<V>(value: V): V {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export class InMemoryStore<T extends object> {
  private readonly records = new Map<number, Stored<T>>();
  private nextId = 1;

  constructor(private readonly entity: string) {}

  get size(): number {
    return this.records.size;
  }

  has(id: number): boolean {
    return this.records.has(id);
  }

  findById(id: number): Stored<T> | undefined {
    return this.records.get(id);
  }

  /**
   * All records in insertion order
   */
  findAll(): Stored<T>[] {
    return [...this.records.values()];
  }

  /**
   * Insert with a fresh id when `id` is undefined, otherwise replace
   * (or insert) under the given id. The stored record is a deep-frozen copy;
   * the caller's object is left untouched.
   */
  upsert(id: number | undefined, data: T): Stored<T> {
    const assignedId = id ?? this.nextId;
    if (assignedId >= this.nextId) {
      this.nextId = assignedId + 1;
    }

    const record: Stored<T> = deepFreeze({ ...structuredClone(data), id: assignedId });
    this.records.set(assignedId, record);

    logger.debug(`${this.entity} stored`, { id: assignedId, replaced: id !== undefined });
    return record;
  }

  delete(id: number): Stored<T> | undefined {
    const record = this.records.get(id);
    if (record) {
      this.records.delete(id);
      logger.debug(`${this.entity} removed`, { id });
    }
    return record;
  }

  /**
   * Drop every record and restart the id sequence
   */
  clear(): void {
    this.records.clear();
    this.nextId = 1;
  }
}
