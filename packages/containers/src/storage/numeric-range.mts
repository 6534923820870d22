/**
 * Value checks for fixed-width numeric layouts. Each returns why a value
 * does not fit, or undefined when it is stored exactly.
 */

export type NumericCheck<T> = (value: T) => string | undefined;

export const integerIn =
  (min: number, max: number): NumericCheck<number> =>
  (value) =>
    Number.isInteger(value) && value >= min && value <= max
      ? undefined
      : `${value} is not an integer between ${min} and ${max}`;

export const bigintIn =
  (min: bigint, max: bigint): NumericCheck<bigint> =>
  (value) =>
    value >= min && value <= max ? undefined : `${value} is not between ${min} and ${max}`;

export const float32Exact: NumericCheck<number> = (value) =>
  Number.isNaN(value) || Math.fround(value) === value
    ? undefined
    : `${value} has no exact float32 representation`;

export const INT8 = integerIn(-128, 127);
export const UINT8 = integerIn(0, 255);
export const INT16 = integerIn(-32768, 32767);
export const UINT16 = integerIn(0, 65535);
export const INT32 = integerIn(-2147483648, 2147483647);
export const UINT32 = integerIn(0, 4294967295);
export const BIGINT64 = bigintIn(-(2n ** 63n), 2n ** 63n - 1n);
export const BIGUINT64 = bigintIn(0n, 2n ** 64n - 1n);
