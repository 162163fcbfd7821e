/**
 * Append-only record sequence with a single writer and many readers
 *
 * The loader appends each record only after it is fully validated, so a
 * reader never observes a half-built record, even when a load is abandoned
 * mid-file. Readers iterate over the records present when they started.
 *
 * @module record-stream
 */

import { ValidationError } from "./errors";

export class RecordStream<T> implements Iterable<T> {
  private readonly items: T[] = [];
  private isSealed = false;

  constructor(records: Iterable<T> = []) {
    for (const record of records) {
      this.append(record);
    }
  }

  /**
   * Append a validated record. The record is frozen on the way in.
   *
   * @throws {ValidationError} If the stream has been sealed
   */
  append(record: T): void {
    if (this.isSealed) {
      throw new ValidationError("Cannot append to a sealed record stream");
    }
    Object.freeze(record);
    this.items.push(record);
  }

  /**
   * Mark the stream complete; further appends throw
   */
  seal(): this {
    this.isSealed = true;
    return this;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): T | undefined {
    return this.items.at(index);
  }

  /**
   * Copy of the records appended so far
   */
  snapshot(): readonly T[] {
    return this.items.slice();
  }

  *[Symbol.iterator](): Iterator<T> {
    const end = this.items.length;
    for (let i = 0; i < end; i++) {
      const item = this.items[i];
      if (item !== undefined) {
        yield item;
      }
    }
  }
}
