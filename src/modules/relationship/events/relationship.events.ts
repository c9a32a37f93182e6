/**
 * RELATIONSHIP DOMAIN EVENTS
 *
 * Owner: RelationshipModule
 * Published by RelationshipGraphFacade after a mutation actually changed the
 * store. Idempotent no-ops and absorbed races publish nothing.
 */

import { DomainEvent } from '@shared/events';

const SOURCE = 'RelationshipModule';
const AGGREGATE = 'Relationship';

/**
 * Emitted when User A sends a friend request to User B.
 *
 * Typical listeners: notification delivery to User B, pending-list caches.
 *
 * @version 1
 */
export class FriendRequestSentEvent extends DomainEvent {
  readonly eventType = 'FRIEND_REQUEST_SENT';

  constructor(
    readonly requestId: string,
    readonly fromUserId: string,
    readonly toUserId: string,
  ) {
    super(SOURCE, AGGREGATE, requestId, 1);
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      requestId: this.requestId,
      fromUserId: this.fromUserId,
      toUserId: this.toUserId,
    };
  }
}

export class FriendRequestCancelledEvent extends DomainEvent {
  readonly eventType = 'FRIEND_REQUEST_CANCELLED';

  constructor(
    readonly requestId: string,
    readonly cancelledBy: string,
    readonly targetUserId: string,
  ) {
    super(SOURCE, AGGREGATE, requestId, 1);
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      requestId: this.requestId,
      cancelledBy: this.cancelledBy,
      targetUserId: this.targetUserId,
    };
  }
}

/**
 * Emitted when User B accepts the request from User A; the friendship edge
 * exists from this point on.
 *
 * @version 1
 */
export class FriendRequestAcceptedEvent extends DomainEvent {
  readonly eventType = 'FRIEND_REQUEST_ACCEPTED';

  constructor(
    readonly requestId: string,
    readonly acceptedBy: string,
    readonly requesterId: string,
  ) {
    super(SOURCE, AGGREGATE, requestId, 1);
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      requestId: this.requestId,
      acceptedBy: this.acceptedBy,
      requesterId: this.requesterId,
    };
  }
}

export class FriendRequestRejectedEvent extends DomainEvent {
  readonly eventType = 'FRIEND_REQUEST_REJECTED';

  constructor(
    readonly requestId: string,
    readonly fromUserId: string,
    readonly toUserId: string,
  ) {
    super(SOURCE, AGGREGATE, requestId, 1);
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      requestId: this.requestId,
      fromUserId: this.fromUserId,
      toUserId: this.toUserId,
    };
  }
}

/**
 * Emitted when either side removes an existing friendship.
 *
 * @version 1
 */
export class UnfriendedEvent extends DomainEvent {
  readonly eventType = 'UNFRIENDED';

  constructor(
    readonly initiatedBy: string,
    readonly removedFriendId: string,
  ) {
    super(SOURCE, AGGREGATE, initiatedBy, 1);
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      initiatedBy: this.initiatedBy,
      removedFriendId: this.removedFriendId,
    };
  }
}
