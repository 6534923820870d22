/**
 * Execution scopes.
 *
 * Every container records the scope that was active when it was built and
 * refuses to run operations from any other scope. A scope is entered with
 * `runInScope`; the active scope follows async continuations started inside
 * it, so a session that awaits keeps its identity.
 *
 * @example
 * ```typescript
 * const session = createScope('request-42');
 * runInScope(session, () => {
 *   const queue = CircularBufferDeque.empty<Job>();
 *   queue.pushBack(job);       // fine
 * });
 * queue.pushBack(other);       // throws ScopeMismatchError
 * ```
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { BaseLogger } from '@mutables/logger';

import { ScopeMismatchError } from './errors.mjs';

let nextScopeId = 0;

/**
 * Identity of an isolated computation
 */
export class ExecutionScope {
  readonly id: number;
  readonly name: string;

  constructor(name?: string) {
    this.id = nextScopeId++;
    this.name = name ?? `scope-${this.id}`;
  }

  toString(): string {
    return `${this.name}#${this.id}`;
  }
}

const storage = new AsyncLocalStorage<ExecutionScope>();

/**
 * Scope active outside any `runInScope` call
 */
export const rootScope = new ExecutionScope('root');

export function createScope(name?: string): ExecutionScope {
  return new ExecutionScope(name);
}

export function currentScope(): ExecutionScope {
  return storage.getStore() ?? rootScope;
}

/**
 * Runs `fn` with `scope` active and returns its result.
 */
export function runInScope<R>(scope: ExecutionScope, fn: () => R): R {
  return storage.run(scope, fn);
}

/**
 * Throws unless `owner` is the active scope. The rejection is logged at
 * warn level first when a logger is given.
 */
export function assertScope(
  owner: ExecutionScope,
  container: string,
  operation: string,
  logger?: BaseLogger
): void {
  const active = currentScope();
  if (active !== owner) {
    const error = new ScopeMismatchError(container, owner.toString(), active.toString(), operation);
    logger?.warn(error.message, error.context);
    throw error;
  }
}
