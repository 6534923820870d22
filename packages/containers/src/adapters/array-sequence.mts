/**
 * Adapts a native array to the sequence capabilities.
 *
 * The array sits in a `MutableCell`, so the adapter goes through the cell's
 * scope check like every other container. Unlike the deque and the list,
 * `length` and `isEmpty` are checked too: they read the array through the
 * cell. Front operations are
 * `unshift` / `shift` and cost O(n); prefer `CircularBufferDeque` when the
 * front is hot.
 */

import type { DoubleEnded } from '../capabilities.mjs';
import { MutableCell } from '../cell/mutable-cell.mjs';
import type { CellOptions } from '../config.mjs';
import { none, some } from '../option.mjs';
import type { Option } from '../option.mjs';

export class ArraySequence<T> implements DoubleEnded<T> {
  readonly cell: MutableCell<T[]>;

  constructor(cell: MutableCell<T[]>) {
    this.cell = cell;
  }

  static empty<T>(options?: CellOptions): ArraySequence<T> {
    return new ArraySequence(MutableCell.boxed<T[]>([], options));
  }

  static of<T>(items: Iterable<T>, options?: CellOptions): ArraySequence<T> {
    return new ArraySequence(MutableCell.boxed([...items], options));
  }

  get length(): number {
    return this.cell.get().length;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  pushFront(value: T): void {
    this.cell.get().unshift(value);
  }

  pushBack(value: T): void {
    this.cell.get().push(value);
  }

  popFront(): Option<T> {
    const items = this.cell.get();
    return items.length === 0 ? none() : some(items.splice(0, 1)[0]);
  }

  popBack(): Option<T> {
    const items = this.cell.get();
    return items.length === 0 ? none() : some(items.splice(items.length - 1, 1)[0]);
  }

  clear(): void {
    this.cell.set([]);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.cell.get()[Symbol.iterator]();
  }
}
