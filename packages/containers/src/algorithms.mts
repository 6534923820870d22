/**
 * Algorithms written once against the capability interfaces
 */

import type { CollectionFactory, PopBack, PopFront, PushBack, PushFront } from './capabilities.mjs';
import { isSome } from './option.mjs';

/**
 * Builds a container from `factory` holding `items` front to back
 */
export function collect<T, C extends PushBack<T>>(factory: CollectionFactory<C>, items: Iterable<T>): C {
  const target = factory.empty();
  extendBack(target, items);
  return target;
}

export function extendBack<T>(target: PushBack<T>, items: Iterable<T>): void {
  for (const item of items) {
    target.pushBack(item);
  }
}

/**
 * Pushes each item to the front, so the last item ends up first
 */
export function extendFront<T>(target: PushFront<T>, items: Iterable<T>): void {
  for (const item of items) {
    target.pushFront(item);
  }
}

/**
 * Pops from the front until empty and returns the elements in pop order
 */
export function drainFront<T>(source: PopFront<T>): T[] {
  const drained: T[] = [];
  for (let next = source.popFront(); isSome(next); next = source.popFront()) {
    drained.push(next.value);
  }
  return drained;
}

/**
 * Pops from the back until empty and returns the elements in pop order
 */
export function drainBack<T>(source: PopBack<T>): T[] {
  const drained: T[] = [];
  for (let next = source.popBack(); isSome(next); next = source.popBack()) {
    drained.push(next.value);
  }
  return drained;
}

/**
 * Moves every element from the front of `from` to the back of `to`,
 * keeping their order. Returns how many moved.
 */
export function transfer<T>(from: PopFront<T>, to: PushBack<T>): number {
  let moved = 0;
  for (let next = from.popFront(); isSome(next); next = from.popFront()) {
    to.pushBack(next.value);
    moved++;
  }
  return moved;
}

/**
 * Rotates by `steps`: positive moves front elements to the back,
 * negative moves back elements to the front. Fractional steps are
 * truncated toward zero.
 */
export function rotate<T>(
  container: PopFront<T> & PopBack<T> & PushFront<T> & PushBack<T> & { readonly length: number },
  steps: number
): void {
  const length = container.length;
  if (length < 2) {
    return;
  }
  let remaining = Math.trunc(steps) % length;
  while (remaining > 0) {
    const front = container.popFront();
    if (isSome(front)) container.pushBack(front.value);
    remaining--;
  }
  while (remaining < 0) {
    const back = container.popBack();
    if (isSome(back)) container.pushFront(back.value);
    remaining++;
  }
}
