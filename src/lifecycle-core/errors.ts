import type { ErrorCode, WorkItemState } from '@shared/types';

/**
 * Base class for every failure the tracker reports. All of them are
 * caller-local: the tracker is left exactly as it was before the call.
 */
export class LifecycleError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidInitialStateError extends LifecycleError {
  constructor(readonly state: string) {
    super(
      'INVALID_INITIAL_STATE',
      `Items can only be created in BACKLOG or READY, not '${state}'`,
    );
  }
}

export class InvalidKindError extends LifecycleError {
  constructor(readonly kind: string) {
    super('INVALID_KIND', `Items must be an ISSUE or a PULL_REQUEST, not '${kind}'`);
  }
}

export class IllegalTransitionError extends LifecycleError {
  constructor(
    readonly itemId: string,
    readonly fromState: WorkItemState,
    readonly toState: WorkItemState,
    reason: string,
  ) {
    super('ILLEGAL_TRANSITION', `Item '${itemId}': ${reason}`);
  }
}

export class NotBlockedError extends LifecycleError {
  constructor(
    readonly itemId: string,
    readonly state: WorkItemState,
  ) {
    super('NOT_BLOCKED', `Item '${itemId}' is not blocked (state '${state}')`);
  }
}

export class UnknownItemError extends LifecycleError {
  constructor(readonly itemId: string) {
    super('UNKNOWN_ITEM', `Item '${itemId}' is not tracked`);
  }
}

export class DuplicateItemError extends LifecycleError {
  constructor(readonly itemId: string) {
    super('DUPLICATE_ITEM', `Item '${itemId}' is already tracked`);
  }
}

export function isLifecycleError(err: unknown): err is LifecycleError {
  return err instanceof LifecycleError;
}
