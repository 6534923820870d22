/**
 * Error classes for the container primitives
 */

export type ContainerErrorCode =
  | 'INVALID_CONFIG'
  | 'ALLOCATION_FAILED'
  | 'INVALID_HANDLE'
  | 'SCOPE_MISMATCH'
  | 'VACANT_SLOT'
  | 'CODEC_ERROR'
  | 'STORAGE_MISMATCH'
  | 'DISPOSED';

/**
 * Base error class for all container errors
 */
export class ContainerError extends Error {
  constructor(
    message: string,
    public readonly code: ContainerErrorCode,
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'ContainerError';

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when container options fail validation
 */
export class InvalidConfigError extends ContainerError {
  constructor(message: string, public readonly option: string, public readonly value: unknown) {
    super(message, 'INVALID_CONFIG', { option, value });
    this.name = 'InvalidConfigError';
  }
}

/**
 * Error thrown when a backing buffer cannot be allocated.
 * The container that asked for it is left as it was.
 */
export class AllocationError extends ContainerError {
  constructor(
    public readonly requestedCapacity: number,
    public readonly strategy: string,
    public readonly originalError?: Error
  ) {
    super(
      `Cannot allocate ${requestedCapacity} slots of ${strategy}${originalError ? `: ${originalError.message}` : ''}`,
      'ALLOCATION_FAILED',
      { requestedCapacity, strategy }
    );
    this.name = 'AllocationError';
  }
}

export type InvalidHandleReason = 'foreign' | 'stale';

/**
 * Error thrown when a node handle does not belong to the list it is used with
 */
export class InvalidHandleError extends ContainerError {
  constructor(public readonly list: string, public readonly reason: InvalidHandleReason) {
    super(
      reason === 'foreign'
        ? `Handle was not produced by list ${list}`
        : `Handle refers to a node no longer in list ${list}`,
      'INVALID_HANDLE',
      { list, reason }
    );
    this.name = 'InvalidHandleError';
  }
}

/**
 * Error thrown when a container is used outside the scope that created it
 */
export class ScopeMismatchError extends ContainerError {
  constructor(
    public readonly container: string,
    public readonly ownerScope: string,
    public readonly activeScope: string,
    public readonly operation: string
  ) {
    super(
      `${container} belongs to scope ${ownerScope} and cannot run ${operation} from scope ${activeScope}`,
      'SCOPE_MISMATCH',
      { container, ownerScope, activeScope, operation }
    );
    this.name = 'ScopeMismatchError';
  }
}

/**
 * Error thrown when an indirected slot with no occupant is read
 */
export class VacantSlotError extends ContainerError {
  constructor(public readonly index: number) {
    super(`Slot ${index} holds no element`, 'VACANT_SLOT', { index });
    this.name = 'VacantSlotError';
  }
}

/**
 * Error thrown when a value does not fit a fixed-width layout, packed or marshalled
 */
export class CodecError extends ContainerError {
  constructor(public readonly codec: string, message: string) {
    super(`${codec}: ${message}`, 'CODEC_ERROR', { codec });
    this.name = 'CodecError';
  }
}

/**
 * Error thrown when slots of two different storage bindings are mixed
 */
export class StorageMismatchError extends ContainerError {
  constructor(public readonly source: string, public readonly target: string) {
    super(
      `Cannot move elements from ${source} slots into ${target} slots`,
      'STORAGE_MISMATCH',
      { source, target }
    );
    this.name = 'StorageMismatchError';
  }
}

/**
 * Error thrown when a disposed container is used
 */
export class DisposedError extends ContainerError {
  constructor(public readonly container: string, public readonly operation: string) {
    super(`${container} was disposed and cannot run ${operation}`, 'DISPOSED', { container, operation });
    this.name = 'DisposedError';
  }
}

export const isContainerError = (value: unknown): value is ContainerError =>
  value instanceof ContainerError;
