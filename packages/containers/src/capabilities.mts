/**
 * Capability interfaces for sequence containers.
 *
 * Each capability is one narrow operation. A container implements the ones
 * it supports and generic code asks only for what it uses, so a
 * `CircularBufferDeque` and a `DoublyLinkedList` are interchangeable
 * wherever the same capabilities are requested.
 *
 * @packageDocumentation
 */

import type { Option } from './option.mjs';

/**
 * Root capability: an iterable container with a known size
 */
export interface Collection<T> extends Iterable<T> {
  readonly length: number;
  isEmpty(): boolean;
  /** Removes and releases every element */
  clear(): void;
}

/**
 * Empty construction, usually a container class's static side
 *
 * @example
 * const factory: CollectionFactory<CircularBufferDeque<number>> = CircularBufferDeque;
 */
export interface CollectionFactory<C> {
  empty(): C;
}

export interface PushFront<T> {
  pushFront(value: T): void;
}

export interface PushBack<T> {
  pushBack(value: T): void;
}

export interface PopFront<T> {
  /** None when empty */
  popFront(): Option<T>;
}

export interface PopBack<T> {
  /** None when empty */
  popBack(): Option<T>;
}

export interface DoubleEnded<T> extends Collection<T>, PushFront<T>, PushBack<T>, PopFront<T>, PopBack<T> {}

export type ElementOf<C> = C extends Collection<infer T> ? T : never;
