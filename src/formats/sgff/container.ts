/**
 * Ordered block storage
 *
 * Entries live in one list in stream order; a type index maps each block
 * type to the positions of its entries in that list. Serialisation walks the
 * list, so a file that is parsed and written untouched keeps its block order.
 *
 * Mutation semantics:
 * - `set` replaces an existing entry in place, or appends when the type has
 *   no entry at that occurrence yet
 * - `append` always adds at the end
 * - `remove` drops entries and leaves the others in their relative order
 */

import type { BlockValue } from "./types";

export interface BlockEntry {
  readonly type: number;
  value: BlockValue;
}

export class BlockContainer implements Iterable<BlockEntry> {
  private readonly entries: BlockEntry[] = [];
  private readonly index = new Map<number, number[]>();

  /** Number of entries, counting repeats */
  get size(): number {
    return this.entries.length;
  }

  append(type: number, value: BlockValue): BlockEntry {
    const entry: BlockEntry = { type, value };
    const positions = this.index.get(type);
    if (positions === undefined) {
      this.index.set(type, [this.entries.length]);
    } else {
      positions.push(this.entries.length);
    }
    this.entries.push(entry);
    return entry;
  }

  /** Value of the nth entry of a type, in stream order */
  get(type: number, occurrence = 0): BlockValue | undefined {
    const position = this.index.get(type)?.[occurrence];
    return position === undefined ? undefined : this.entries[position]?.value;
  }

  getAll(type: number): BlockValue[] {
    const positions = this.index.get(type) ?? [];
    const values: BlockValue[] = [];
    for (const position of positions) {
      const entry = this.entries[position];
      if (entry !== undefined) {
        values.push(entry.value);
      }
    }
    return values;
  }

  has(type: number): boolean {
    return this.index.has(type);
  }

  count(type: number): number {
    return this.index.get(type)?.length ?? 0;
  }

  /** Distinct types in order of first appearance */
  types(): number[] {
    return [...this.index.keys()];
  }

  set(type: number, value: BlockValue, occurrence = 0): BlockEntry {
    const position = this.index.get(type)?.[occurrence];
    const existing = position === undefined ? undefined : this.entries[position];
    if (existing === undefined) {
      return this.append(type, value);
    }
    existing.value = value;
    return existing;
  }

  /**
   * Remove one occurrence of a type, or every entry of it when `occurrence`
   * is omitted. Returns whether anything was removed.
   */
  remove(type: number, occurrence?: number): boolean {
    const positions = this.index.get(type);
    if (positions === undefined) {
      return false;
    }
    const doomed = new Set(occurrence === undefined ? positions : positions.slice(occurrence, occurrence + 1));
    if (doomed.size === 0) {
      return false;
    }

    const kept = this.entries.filter((_, position) => !doomed.has(position));
    this.entries.length = 0;
    this.index.clear();
    for (const entry of kept) {
      this.append(entry.type, entry.value);
    }
    return true;
  }

  /**
   * Whether every entry of a type was decoded by a codec. Absent types and
   * types kept as raw bytes report false.
   */
  isDecoded(type: number): boolean {
    const values = this.getAll(type);
    return values.length > 0 && values.every((value) => value.kind !== "raw");
  }

  [Symbol.iterator](): Iterator<BlockEntry> {
    return this.entries[Symbol.iterator]();
  }
}
