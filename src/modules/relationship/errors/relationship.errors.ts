import { HttpException, HttpStatus } from '@nestjs/common';

export type RelationshipErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'STORE_UNAVAILABLE'
  | 'TIMEOUT'
  | 'DUPLICATE_REQUEST'
  | 'SELF_ACTION';

/**
 * Base Exception for the Relationship Module
 */
export class RelationshipException extends HttpException {
  constructor(
    message: string,
    status: HttpStatus,
    readonly code: RelationshipErrorCode,
    readonly retryable = false,
  ) {
    super(message, status);
  }
}

// --- STORE CONTRACT EXCEPTIONS ---

/** Request id is gone or no longer PENDING; callers treat it as already terminal */
export class FriendRequestNotFoundException extends RelationshipException {
  constructor(message = 'Friend request not found or no longer pending') {
    super(message, HttpStatus.NOT_FOUND, 'NOT_FOUND');
  }
}

export class DuplicateRequestException extends RelationshipException {
  constructor(message = 'A request or friendship already exists for this pair') {
    super(message, HttpStatus.CONFLICT, 'DUPLICATE_REQUEST');
  }
}

// --- TRANSITION EXCEPTIONS ---

export type TransitionHint = 'USE_ACCEPT';

export class InvalidTransitionException extends RelationshipException {
  constructor(
    message: string,
    readonly hint?: TransitionHint,
    readonly requestId?: string,
  ) {
    super(message, HttpStatus.CONFLICT, 'INVALID_TRANSITION');
  }
}

export class SelfActionException extends RelationshipException {
  constructor(message = 'Cannot perform this action on yourself') {
    super(message, HttpStatus.BAD_REQUEST, 'SELF_ACTION');
  }
}

// --- INFRASTRUCTURE EXCEPTIONS (retryable) ---

export class StoreUnavailableException extends RelationshipException {
  constructor(message = 'Relationship store unavailable') {
    super(message, HttpStatus.SERVICE_UNAVAILABLE, 'STORE_UNAVAILABLE', true);
  }
}

export class StoreTimeoutException extends RelationshipException {
  constructor(operation: string, timeoutMs: number) {
    super(
      `${operation} timed out after ${timeoutMs}ms`,
      HttpStatus.GATEWAY_TIMEOUT,
      'TIMEOUT',
      true,
    );
  }
}

/**
 * Classify an unknown failure. Known relationship exceptions pass through;
 * everything else is reported as a (retryable) backend failure.
 */
export function toRelationshipException(
  error: unknown,
  context: string,
): RelationshipException {
  if (error instanceof RelationshipException) {
    return error;
  }
  const errorMessage = error instanceof Error ? error.message : 'Unknown error';
  return new StoreUnavailableException(`${context} failed: ${errorMessage}`);
}
