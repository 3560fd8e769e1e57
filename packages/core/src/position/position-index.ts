/**
 * Position Index - ordered multi-value map keyed by source position
 *
 * Both extractors build one of these: the compiler output parser maps
 * positions to hints, the annotation scanner maps positions to annotations.
 * Values keep insertion order and duplicates are retained.
 */

import { comparePositions, positionKey, type Position } from './position.js';

/**
 * Entry of a position index
 */
export interface PositionEntry<T> {
  position: Position;
  values: readonly T[];
}

/**
 * Read-only view handed to consumers once an index is built.
 */
export interface ReadonlyPositionIndex<T> {
  /** Number of distinct positions */
  readonly size: number;
  /** Values at a position, empty when the position is absent */
  get(position: Position): readonly T[];
  has(position: Position): boolean;
  /** Positions sorted by file, then line */
  positions(): Position[];
  /** Entries sorted by file, then line */
  entries(): PositionEntry<T>[];
  /** Plain `"file:line" -> values` record in sorted order */
  toJSON(): Record<string, T[]>;
}

interface Slot<T> {
  position: Position;
  values: T[];
}

/**
 * Mutable index used while a document is being read.
 *
 * A position only exists once a value has been added to it, so no position
 * ever maps to an empty sequence.
 */
export class PositionIndex<T> implements ReadonlyPositionIndex<T> {
  private readonly slots = new Map<string, Slot<T>>();

  get size(): number {
    return this.slots.size;
  }

  add(position: Position, value: T): void {
    const key = positionKey(position);
    const slot = this.slots.get(key);
    if (slot) {
      slot.values.push(value);
      return;
    }
    this.slots.set(key, { position: { file: position.file, line: position.line }, values: [value] });
  }

  get(position: Position): readonly T[] {
    return this.slots.get(positionKey(position))?.values ?? [];
  }

  has(position: Position): boolean {
    return this.slots.has(positionKey(position));
  }

  positions(): Position[] {
    return this.sortedSlots().map((slot) => slot.position);
  }

  entries(): PositionEntry<T>[] {
    return this.sortedSlots().map((slot) => ({
      position: slot.position,
      values: [...slot.values],
    }));
  }

  toJSON(): Record<string, T[]> {
    const record: Record<string, T[]> = {};
    for (const slot of this.sortedSlots()) {
      record[positionKey(slot.position)] = [...slot.values];
    }
    return record;
  }

  private sortedSlots(): Slot<T>[] {
    return [...this.slots.values()].sort((a, b) => comparePositions(a.position, b.position));
  }
}
