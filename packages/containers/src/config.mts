/**
 * Container options, their defaults and validation
 */

import type { LevelWithSilent } from 'pino';
import type { BaseLogger } from '@mutables/logger';

import { InvalidConfigError } from './errors.mjs';
import type { ExecutionScope } from './scope.mjs';

export const DEFAULT_MIN_CAPACITY = 4;

/** Largest capacity a deque or list arena may reach (2^30) */
export const MAX_CAPACITY = 2 ** 30;

/** Environment variable read for the shared library logger level */
export const LOG_LEVEL_ENV = 'MUTABLES_LOG_LEVEL';

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Options shared by every container
 */
export interface ContainerOptions {
  /** Scope the container belongs to; the active scope when omitted */
  scope?: ExecutionScope;
  /** Used in log lines and error messages */
  name?: string;
}

export interface DequeOptions extends ContainerOptions {
  /**
   * Capacity allocated by the first push and the floor for shrinking.
   * Must be a power of two.
   * @default 4
   */
  minCapacity?: number;
  /**
   * Halve capacity when a pop leaves the deque at most a quarter full
   * @default true
   */
  shrink?: boolean;
  /** Receives capacity changes; the shared library logger when omitted */
  logger?: BaseLogger;
}

export interface ListOptions extends ContainerOptions {
  /**
   * Node slots reserved up front
   * @default 0
   */
  initialCapacity?: number;
  logger?: BaseLogger;
}

export interface CellOptions extends ContainerOptions {
  /** Receives scope rejections; the shared library logger when omitted */
  logger?: BaseLogger;
}

export interface ResolvedDequeOptions {
  minCapacity: number;
  shrink: boolean;
}

export interface ResolvedListOptions {
  initialCapacity: number;
}

export const isPowerOfTwo = (n: number): boolean =>
  Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;

export function resolveDequeOptions(options: DequeOptions = {}): ResolvedDequeOptions {
  const minCapacity = options.minCapacity ?? DEFAULT_MIN_CAPACITY;
  if (!isPowerOfTwo(minCapacity) || minCapacity > MAX_CAPACITY) {
    throw new InvalidConfigError(
      `minCapacity must be a power of two between 1 and ${MAX_CAPACITY}, got ${minCapacity}`,
      'minCapacity',
      minCapacity
    );
  }
  return { minCapacity, shrink: options.shrink ?? true };
}

export function resolveListOptions(options: ListOptions = {}): ResolvedListOptions {
  const initialCapacity = options.initialCapacity ?? 0;
  if (!Number.isInteger(initialCapacity) || initialCapacity < 0 || initialCapacity > MAX_CAPACITY) {
    throw new InvalidConfigError(
      `initialCapacity must be an integer between 0 and ${MAX_CAPACITY}, got ${initialCapacity}`,
      'initialCapacity',
      initialCapacity
    );
  }
  return { initialCapacity };
}

const isLogLevel = (value: string): value is LevelWithSilent =>
  LOG_LEVELS.some((level) => level === value);

/**
 * Level of the shared library logger, from MUTABLES_LOG_LEVEL
 */
export function libraryLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const raw = env[LOG_LEVEL_ENV];
  if (raw === undefined || raw === '') {
    return 'warn';
  }
  const level = raw.toLowerCase();
  if (!isLogLevel(level)) {
    throw new InvalidConfigError(
      `${LOG_LEVEL_ENV} must be one of ${LOG_LEVELS.join(', ')}, got ${raw}`,
      LOG_LEVEL_ENV,
      raw
    );
  }
  return level;
}
