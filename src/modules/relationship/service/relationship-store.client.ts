import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import relationshipConfig from '@config/relationship.config';
import { withTimeout } from '@common/utils/async.util';
import {
  RELATIONSHIP_STORE,
  type IRelationshipStore,
} from '../interfaces/relationship-store.interface';
import type { RelationshipStatus, UserId } from '../types/relationship-status';
import type { PendingRequests } from '../types/friend-request.types';
import {
  StoreTimeoutException,
  toRelationshipException,
} from '../errors/relationship.errors';

/**
 * RelationshipStoreClient - the engine's only path to the store
 *
 * Wraps the bound IRelationshipStore so that every call:
 * - is bounded by the configured lookup/mutation timeout
 * - rejects only with RelationshipException subclasses
 *   (unknown failures become STORE_UNAVAILABLE, timeouts TIMEOUT)
 *
 * Holds no state and no lock: the store is shared with other clients and may
 * change between any two calls.
 */
@Injectable()
export class RelationshipStoreClient {
  constructor(
    @Inject(RELATIONSHIP_STORE)
    private readonly store: IRelationshipStore,
    @Inject(relationshipConfig.KEY)
    private readonly config: ConfigType<typeof relationshipConfig>,
  ) {}

  getStatus(userA: UserId, userB: UserId): Promise<RelationshipStatus> {
    return this.lookup('getStatus', () => this.store.getStatus(userA, userB));
  }

  listPending(userId: UserId): Promise<PendingRequests> {
    return this.lookup('listPending', () => this.store.listPending(userId));
  }

  listFriends(userId: UserId): Promise<UserId[]> {
    return this.lookup('listFriends', () => this.store.listFriends(userId));
  }

  createRequest(fromUserId: UserId, toUserId: UserId): Promise<string> {
    return this.mutate('createRequest', () =>
      this.store.createRequest(fromUserId, toUserId),
    );
  }

  cancelRequest(requestId: string): Promise<void> {
    return this.mutate('cancelRequest', () =>
      this.store.cancelRequest(requestId),
    );
  }

  acceptRequest(requestId: string): Promise<void> {
    return this.mutate('acceptRequest', () =>
      this.store.acceptRequest(requestId),
    );
  }

  rejectRequest(requestId: string): Promise<void> {
    return this.mutate('rejectRequest', () =>
      this.store.rejectRequest(requestId),
    );
  }

  removeFriendship(userA: UserId, userB: UserId): Promise<void> {
    return this.mutate('removeFriendship', () =>
      this.store.removeFriendship(userA, userB),
    );
  }

  private lookup<T>(operation: string, call: () => Promise<T>): Promise<T> {
    return this.invoke(operation, call, this.config.timeouts.lookupMs);
  }

  private mutate<T>(operation: string, call: () => Promise<T>): Promise<T> {
    return this.invoke(operation, call, this.config.timeouts.mutationMs);
  }

  private async invoke<T>(
    operation: string,
    call: () => Promise<T>,
    timeoutMs: number,
  ): Promise<T> {
    try {
      return await withTimeout(
        call(),
        timeoutMs,
        () => new StoreTimeoutException(`Store ${operation}`, timeoutMs),
      );
    } catch (error) {
      throw toRelationshipException(error, `Store ${operation}`);
    }
  }
}
