/**
 * IRelationshipStore - Persistence boundary for friend requests and friendships
 *
 * The engine never implements storage; the host application binds a concrete
 * store (database, REST backend, ...) to RELATIONSHIP_STORE.
 *
 * Error contract:
 * - cancel/accept/rejectRequest on a request that is missing or no longer
 *   PENDING rejects with FriendRequestNotFoundException
 * - createRequest for a pair that already has a pending request (either
 *   direction) or a friendship rejects with DuplicateRequestException
 * - removeFriendship on a pair that is not friends resolves without effect
 * - anything else is treated as a backend failure (STORE_UNAVAILABLE)
 *
 * The store must hold the pair invariant: at most one of {pending request,
 * friendship} per unordered pair.
 */

import type { RelationshipStatus, UserId } from '../types/relationship-status';
import type { PendingRequests } from '../types/friend-request.types';

export const RELATIONSHIP_STORE = Symbol('RELATIONSHIP_STORE');

export interface IRelationshipStore {
  /** Returns the id of the new PENDING request */
  createRequest(fromUserId: UserId, toUserId: UserId): Promise<string>;

  cancelRequest(requestId: string): Promise<void>;

  /** Marks the request ACCEPTED and creates the friendship edge */
  acceptRequest(requestId: string): Promise<void>;

  rejectRequest(requestId: string): Promise<void>;

  removeFriendship(userA: UserId, userB: UserId): Promise<void>;

  /** Status of the pair as seen by userA */
  getStatus(userA: UserId, userB: UserId): Promise<RelationshipStatus>;

  listPending(userId: UserId): Promise<PendingRequests>;

  listFriends(userId: UserId): Promise<UserId[]>;
}
