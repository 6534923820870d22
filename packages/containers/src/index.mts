/**
 * Mutable container primitives: single cells, a growable ring-buffer deque
 * and a doubly-linked list, each over a pluggable storage strategy
 *
 * @packageDocumentation
 */

export { CircularBufferDeque } from './deque/circular-buffer-deque.mjs';
export type { DequeStats } from './deque/circular-buffer-deque.mjs';
export { DoublyLinkedList, NodeHandle } from './list/doubly-linked-list.mjs';
export { MutableCell } from './cell/mutable-cell.mjs';
export { ArraySequence } from './adapters/array-sequence.mjs';

export type {
  Collection,
  CollectionFactory,
  DoubleEnded,
  ElementOf,
  PopBack,
  PopFront,
  PushBack,
  PushFront,
} from './capabilities.mjs';
export { collect, drainBack, drainFront, extendBack, extendFront, rotate, transfer } from './algorithms.mjs';

export * from './storage/index.mjs';

export { fromNullable, getOrElse, isNone, isSome, map, none, some, toNullable } from './option.mjs';
export type { None, Option, Some } from './option.mjs';

export {
  AllocationError,
  CodecError,
  ContainerError,
  DisposedError,
  InvalidConfigError,
  InvalidHandleError,
  ScopeMismatchError,
  StorageMismatchError,
  VacantSlotError,
  isContainerError,
} from './errors.mjs';
export type { ContainerErrorCode, InvalidHandleReason } from './errors.mjs';

export { ExecutionScope, createScope, currentScope, rootScope, runInScope } from './scope.mjs';

export {
  DEFAULT_MIN_CAPACITY,
  LOG_LEVEL_ENV,
  MAX_CAPACITY,
  libraryLogLevel,
  resolveDequeOptions,
  resolveListOptions,
} from './config.mjs';
export type {
  CellOptions,
  ContainerOptions,
  DequeOptions,
  ListOptions,
  ResolvedDequeOptions,
  ResolvedListOptions,
} from './config.mjs';
