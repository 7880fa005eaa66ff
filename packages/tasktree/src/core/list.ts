/**
 * Intrusive doubly linked list.
 *
 * The link slots live on the members themselves, so inserting and deleting
 * never allocates and deleting by identity is O(1).
 *
 * @module core/list
 */

import { ListMembershipError } from "./errors.js";

/**
 * Link slots carried by every list member.
 *
 * `prev` points toward the first-inserted end, `next` toward the insertion
 * end. Both are owned by whichever list currently holds the member.
 */
export interface ListLinks<T> {
  /** @internal */
  prev: T | null;
  /** @internal */
  next: T | null;
}

/**
 * A doubly linked list whose members carry their own link slots.
 *
 * A member can belong to at most one list at a time.
 *
 * @example
 * ```typescript
 * class Job implements ListLinks<Job> {
 *   prev: Job | null = null;
 *   next: Job | null = null;
 *   constructor(readonly name: string) {}
 * }
 *
 * const jobs = new IntrusiveList<Job>();
 * const a = new Job("a");
 * jobs.insert(a).insert(new Job("b"));
 *
 * for (const job of jobs) {
 *   if (job === a) jobs.delete(job); // safe while iterating
 * }
 * ```
 */
export class IntrusiveList<T extends ListLinks<T>> implements Iterable<T> {
  private head: T | null = null;
  private tail: T | null = null;
  private count = 0;

  get size(): number {
    return this.count;
  }

  get first(): T | null {
    return this.head;
  }

  get last(): T | null {
    return this.tail;
  }

  isEmpty(): boolean {
    return this.head === null;
  }

  /**
   * Append an item at the end of the list.
   *
   * @throws ListMembershipError if the item's slots are already linked
   */
  insert(item: T): this {
    if (item.prev !== null || item.next !== null || this.head === item) {
      throw new ListMembershipError("insert");
    }

    if (this.tail === null) {
      this.head = item;
      this.tail = item;
    } else {
      this.tail.next = item;
      item.prev = this.tail;
      this.tail = item;
    }

    this.count++;
    return this;
  }

  /**
   * Remove an item from wherever it sits and clear its slots.
   *
   * @throws ListMembershipError if the item is not linked into this list
   */
  delete(item: T): this {
    const { prev, next } = item;

    const linkedFromStart = prev === null ? this.head === item : prev.next === item;
    const linkedFromEnd = next === null ? this.tail === item : next.prev === item;
    if (!linkedFromStart || !linkedFromEnd) {
      throw new ListMembershipError("delete");
    }

    if (prev === null) {
      this.head = next;
    } else {
      prev.next = next;
    }

    if (next === null) {
      this.tail = prev;
    } else {
      next.prev = prev;
    }

    item.prev = null;
    item.next = null;

    this.count--;
    return this;
  }

  /**
   * Iterate the members in insertion order.
   *
   * The cursor starts at the list header and only moves onto a yielded member
   * if that member is still its immediate successor once the consumer resumes.
   * The consumer may therefore delete the yielded member, or any later one,
   * without members being skipped or visited twice.
   */
  *each(): Generator<T, void, undefined> {
    let cursor: T | null = null;

    for (;;) {
      const item = this.successorOf(cursor);
      if (item === null) return;

      yield item;

      // Deleted itself (or was replaced): stay put and re-read the successor.
      if (this.successorOf(cursor) === item) {
        cursor = item;
      }
    }
  }

  [Symbol.iterator](): Iterator<T> {
    return this.each();
  }

  /**
   * Identity-based membership test.
   */
  includes(needle: T): boolean {
    for (const item of this.each()) {
      if (item === needle) return true;
    }
    return false;
  }

  /**
   * Snapshot of the current members.
   */
  toArray(): T[] {
    return [...this.each()];
  }

  private successorOf(cursor: T | null): T | null {
    return cursor === null ? this.head : cursor.next;
  }
}
