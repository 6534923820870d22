/**
 * @module option
 * @description Option type returned by every pop and peek. An empty
 * container yields `None`; callers branch on `_tag` (or `isSome`) instead
 * of comparing against `undefined`, which stays a legal element value.
 *
 * @example
 * ```typescript
 * const first = deque.popFront();
 * if (isSome(first)) {
 *   use(first.value);
 * }
 * const n = getOrElse(() => 0)(deque.peekBack());
 * ```
 */

/**
 * A value that may be absent.
 *
 * @template T - The type of the value when present
 */
export type Option<T> = Some<T> | None;

export interface Some<T> {
  readonly _tag: 'Some';
  readonly value: T;
}

export interface None {
  readonly _tag: 'None';
}

const NONE: None = Object.freeze({ _tag: 'None' });

/**
 * Wraps a present value.
 *
 * @example
 * some(3); // => { _tag: 'Some', value: 3 }
 */
export const some = <T,>(value: T): Option<T> => ({
  _tag: 'Some',
  value,
});

/**
 * The absent value. Always the same frozen object.
 */
export const none = (): Option<never> => NONE;

/**
 * Some if the value is neither null nor undefined, None otherwise.
 */
export const fromNullable = <T,>(value: T | null | undefined): Option<T> =>
  value === null || value === undefined ? none() : some(value);

export const isSome = <T,>(option: Option<T>): option is Some<T> =>
  option._tag === 'Some';

export const isNone = <T,>(option: Option<T>): option is None =>
  option._tag === 'None';

/**
 * Maps a function over the value in Some, does nothing for None.
 *
 * @example
 * map((n: number) => n * 2)(deque.peekFront());
 */
export const map =
  <A, B>(fn: (value: A) => B) =>
  (option: Option<A>): Option<B> =>
    isSome(option) ? some(fn(option.value)) : none();

/**
 * Returns the value if Some, otherwise the result of `onNone`.
 */
export const getOrElse =
  <T,>(onNone: () => T) =>
  (option: Option<T>): T =>
    isSome(option) ? option.value : onNone();

/**
 * Unwraps to the value or `undefined`.
 */
export const toNullable = <T,>(option: Option<T>): T | undefined =>
  isSome(option) ? option.value : undefined;
