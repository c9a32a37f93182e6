/**
 * RelationshipStateMachine - transition logic for one relationship pair
 *
 * Relationship state is shared by two users acting independently, so the
 * status a caller observed may already be stale when an action arrives:
 * - send uses the observed status only to skip a create; the store rejects
 *   duplicates
 * - cancel/accept/reject/remove re-read the pair first and act on what the
 *   store holds; an observed request id is never passed to the store
 * - After every action (no-ops included) the authoritative status is re-read
 *   and reported, never derived from the observed status plus the action
 * - If that re-read fails after an effective write, the outcome carries the
 *   transition's target status with `confirmed: false`
 *
 * Transitions:
 *   send    NONE             → createRequest    → OUTGOING_REQUEST(new id)
 *   cancel  OUTGOING_REQUEST → cancelRequest    → NONE
 *   accept  INCOMING_REQUEST → acceptRequest    → FRIENDS
 *   reject  INCOMING_REQUEST → rejectRequest    → NONE
 *   remove  FRIENDS          → removeFriendship → NONE
 *
 * Races (request already terminal, duplicate create) are absorbed by
 * re-reading. STORE_UNAVAILABLE and TIMEOUT propagate to the caller.
 */

import { Injectable, Logger } from '@nestjs/common';
import { RelationshipStoreClient } from './relationship-store.client';
import {
  RelationshipStatuses,
  describeStatus,
  hasPendingRequest,
  type RelationshipStatus,
  type RelationshipStatusKind,
  type UserId,
} from '../types/relationship-status';
import {
  DuplicateRequestException,
  FriendRequestNotFoundException,
  InvalidTransitionException,
  SelfActionException,
} from '../errors/relationship.errors';

export type RelationshipAction = 'SEND' | 'CANCEL' | 'ACCEPT' | 'REJECT' | 'REMOVE';

export interface TransitionOutcome {
  action: RelationshipAction;
  /** Authoritative status re-read after the action */
  status: RelationshipStatus;
  /** True only when this call changed the store */
  performed: boolean;
  /**
   * False when the re-read after an effective write failed; `status` is then
   * the target state of the transition, not a stored value
   */
  confirmed: boolean;
  /** Request the action created or operated on, when there was one */
  requestId?: string;
}

type RequestAction = Extract<RelationshipAction, 'CANCEL' | 'ACCEPT' | 'REJECT'>;

const REQUEST_ACTION_SOURCE: Record<RequestAction, RelationshipStatusKind> = {
  CANCEL: 'OUTGOING_REQUEST',
  ACCEPT: 'INCOMING_REQUEST',
  REJECT: 'INCOMING_REQUEST',
};

/** State an effective transition leaves the pair in */
function targetStatus(
  action: RelationshipAction,
  requestId: string | undefined,
): RelationshipStatus {
  switch (action) {
    case 'SEND':
      return requestId === undefined
        ? RelationshipStatuses.none()
        : RelationshipStatuses.outgoing(requestId);
    case 'ACCEPT':
      return RelationshipStatuses.friends();
    case 'CANCEL':
    case 'REJECT':
    case 'REMOVE':
      return RelationshipStatuses.none();
  }
}

@Injectable()
export class RelationshipStateMachine {
  private readonly logger = new Logger(RelationshipStateMachine.name);

  constructor(private readonly storeClient: RelationshipStoreClient) {}

  async send(
    currentUserId: UserId,
    otherUserId: UserId,
    observed: RelationshipStatus,
  ): Promise<TransitionOutcome> {
    if (currentUserId === otherUserId) {
      throw new SelfActionException('Cannot send friend request to yourself');
    }

    if (observed.kind === 'INCOMING_REQUEST') {
      throw this.incomingRequestExists(observed.requestId);
    }

    if (observed.kind === 'OUTGOING_REQUEST' || observed.kind === 'FRIENDS') {
      this.logger.debug(
        `[Idempotency] send ${currentUserId} → ${otherUserId} skipped, observed ${describeStatus(observed)}`,
      );
      return this.settle('SEND', currentUserId, otherUserId, false);
    }

    let requestId: string;
    try {
      requestId = await this.storeClient.createRequest(currentUserId, otherUserId);
    } catch (error) {
      if (!(error instanceof DuplicateRequestException)) {
        throw error;
      }
      // Stale NONE or a concurrent send: whatever exists now wins
      const outcome = await this.settle('SEND', currentUserId, otherUserId, false);
      if (outcome.status.kind === 'INCOMING_REQUEST') {
        throw this.incomingRequestExists(outcome.status.requestId);
      }
      this.logger.debug(
        `[Idempotency] send ${currentUserId} → ${otherUserId} resolved to ${describeStatus(outcome.status)}`,
      );
      return outcome;
    }

    this.logger.log(`Friend request sent: ${currentUserId} → ${otherUserId}`);
    return this.settle('SEND', currentUserId, otherUserId, true, requestId);
  }

  cancel(
    currentUserId: UserId,
    otherUserId: UserId,
    observed: RelationshipStatus,
  ): Promise<TransitionOutcome> {
    return this.applyToRequest('CANCEL', currentUserId, otherUserId, observed);
  }

  accept(
    currentUserId: UserId,
    otherUserId: UserId,
    observed: RelationshipStatus,
  ): Promise<TransitionOutcome> {
    return this.applyToRequest('ACCEPT', currentUserId, otherUserId, observed);
  }

  reject(
    currentUserId: UserId,
    otherUserId: UserId,
    observed: RelationshipStatus,
  ): Promise<TransitionOutcome> {
    return this.applyToRequest('REJECT', currentUserId, otherUserId, observed);
  }

  async remove(
    currentUserId: UserId,
    otherUserId: UserId,
    observed: RelationshipStatus,
  ): Promise<TransitionOutcome> {
    if (currentUserId === otherUserId) {
      throw new SelfActionException('Cannot unfriend yourself');
    }

    const source = await this.confirmSource(
      'FRIENDS',
      currentUserId,
      otherUserId,
      observed,
    );
    if (!source) {
      return this.settle('REMOVE', currentUserId, otherUserId, false);
    }

    await this.storeClient.removeFriendship(currentUserId, otherUserId);
    this.logger.log(`Friendship removed: ${currentUserId} ↔ ${otherUserId}`);
    return this.settle('REMOVE', currentUserId, otherUserId, true);
  }

  private async applyToRequest(
    action: RequestAction,
    currentUserId: UserId,
    otherUserId: UserId,
    observed: RelationshipStatus,
  ): Promise<TransitionOutcome> {
    const source = await this.confirmSource(
      REQUEST_ACTION_SOURCE[action],
      currentUserId,
      otherUserId,
      observed,
    );
    if (!source || !hasPendingRequest(source)) {
      return this.settle(action, currentUserId, otherUserId, false);
    }

    const { requestId } = source;
    try {
      await this.callStore(action, requestId);
    } catch (error) {
      if (!(error instanceof FriendRequestNotFoundException)) {
        throw error;
      }
      // Settled between the re-read and the call (e.g. accepted by the other side)
      const outcome = await this.settle(
        action,
        currentUserId,
        otherUserId,
        false,
        requestId,
      );
      this.logger.warn(
        `${action} on request ${requestId} lost a race, authoritative status ${describeStatus(outcome.status)}`,
      );
      return outcome;
    }

    this.logger.log(`Friend request ${requestId}: ${action} by ${currentUserId}`);
    return this.settle(action, currentUserId, otherUserId, true, requestId);
  }

  private callStore(action: RequestAction, requestId: string): Promise<void> {
    switch (action) {
      case 'CANCEL':
        return this.storeClient.cancelRequest(requestId);
      case 'ACCEPT':
        return this.storeClient.acceptRequest(requestId);
      case 'REJECT':
        return this.storeClient.rejectRequest(requestId);
    }
  }

  /**
   * Returns the stored status to act on, or null when the pair is not in the
   * action's source state. The observed status may belong to another pair or
   * request, so only the store's view is acted on.
   */
  private async confirmSource(
    expected: RelationshipStatusKind,
    currentUserId: UserId,
    otherUserId: UserId,
    observed: RelationshipStatus,
  ): Promise<RelationshipStatus | null> {
    const current = await this.storeClient.getStatus(currentUserId, otherUserId);
    if (describeStatus(current) !== describeStatus(observed)) {
      this.logger.debug(
        `Observed ${describeStatus(observed)} was stale, stored ${describeStatus(current)}`,
      );
    }
    return current.kind === expected ? current : null;
  }

  private async settle(
    action: RelationshipAction,
    currentUserId: UserId,
    otherUserId: UserId,
    performed: boolean,
    requestId?: string,
  ): Promise<TransitionOutcome> {
    try {
      const status = await this.storeClient.getStatus(currentUserId, otherUserId);
      return { action, status, performed, confirmed: true, requestId };
    } catch (error) {
      if (!performed) {
        throw error;
      }
      // The write is done; report its target state instead of failing
      const status = targetStatus(action, requestId);
      this.logger.warn(
        `Re-read after ${action} ${currentUserId} → ${otherUserId} failed, reporting ${describeStatus(status)}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return { action, status, performed, confirmed: false, requestId };
    }
  }

  private incomingRequestExists(requestId: string): InvalidTransitionException {
    return new InvalidTransitionException(
      'Incoming friend request exists, use accept',
      'USE_ACCEPT',
      requestId,
    );
  }
}
