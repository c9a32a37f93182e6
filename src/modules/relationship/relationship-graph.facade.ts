import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { defer, finalize, type Observable } from 'rxjs';
import relationshipConfig from '@config/relationship.config';
import { EventPublisher, type DomainEvent } from '@shared/events';
import {
  USER_DIRECTORY,
  type IUserDirectory,
} from './interfaces/user-directory.interface';
import { RelationshipStoreClient } from './service/relationship-store.client';
import {
  RelationshipStateMachine,
  type TransitionOutcome,
} from './service/relationship-state-machine';
import {
  StatusResolver,
  type ResolutionHandle,
  type StatusResultHandler,
} from './service/status-resolver.service';
import {
  SearchCoordinator,
  type SearchEvent,
} from './service/search-coordinator';
import {
  RelationshipStatuses,
  describeStatus,
  type RelationshipStatus,
  type UserId,
} from './types/relationship-status';
import type { PendingRequests } from './types/friend-request.types';
import {
  RelationshipException,
  toRelationshipException,
} from './errors/relationship.errors';
import {
  FriendRequestAcceptedEvent,
  FriendRequestCancelledEvent,
  FriendRequestRejectedEvent,
  FriendRequestSentEvent,
  UnfriendedEvent,
} from './events/relationship.events';

export type RelationshipResult =
  | {
      ok: true;
      status: RelationshipStatus;
      /**
       * Set when the write succeeded but the store could not be re-read;
       * status is then the state the action leads to
       */
      unconfirmed?: true;
    }
  | {
      ok: false;
      error: RelationshipException;
      /** Re-checked after the failure; null when the re-check failed too */
      status: RelationshipStatus | null;
    };

export interface SearchSessionOptions {
  /** 'field' uses the longer per-field debounce window */
  mode?: 'live' | 'field';
  debounceMs?: number;
  resultLimit?: number;
  concurrencyLimit?: number;
}

type MutationStep = (
  currentUserId: UserId,
  otherUserId: UserId,
  observed: RelationshipStatus,
) => Promise<TransitionOutcome>;

/**
 * RelationshipGraphFacade - the engine's public surface
 *
 * Every call takes the acting user explicitly (`currentUserId`); nothing is
 * read from ambient session state.
 *
 * Mutations never throw: they resolve to a RelationshipResult carrying the
 * authoritative post-action status re-read from the store, also on failure,
 * so callers can reconcile without synthesizing state themselves. The one
 * exception is a write whose re-read failed: the result is `unconfirmed`.
 */
@Injectable()
export class RelationshipGraphFacade implements OnModuleDestroy {
  private readonly logger = new Logger(RelationshipGraphFacade.name);

  // currentUserId -> live search session used by search()
  private readonly sessions = new Map<UserId, SearchCoordinator>();

  constructor(
    private readonly storeClient: RelationshipStoreClient,
    private readonly stateMachine: RelationshipStateMachine,
    private readonly statusResolver: StatusResolver,
    @Inject(USER_DIRECTORY)
    private readonly directory: IUserDirectory,
    private readonly eventPublisher: EventPublisher,
    @Inject(relationshipConfig.KEY)
    private readonly config: ConfigType<typeof relationshipConfig>,
  ) {}

  // ============================================================================
  // Search
  // ============================================================================

  /**
   * Search-as-you-type for `currentUserId`. Subscribing starts the query and
   * supersedes the user's previous query; unsubscribing cancels it. The stream
   * completes after COMPLETED/FAILED/CLEARED, or silently when superseded.
   */
  search(currentUserId: UserId, query: string): Observable<SearchEvent> {
    return defer(() => {
      const session = this.sessionFor(currentUserId);
      const ticket = session.search(query);
      return ticket.events$.pipe(
        finalize(() => {
          session.cancel(ticket.generation);
          this.releaseIdleSession(currentUserId, session, ticket.generation);
        }),
      );
    });
  }

  /** Implicit search() sessions currently held, one per searching user */
  get activeSearchSessions(): number {
    return this.sessions.size;
  }

  /**
   * Independent session with its own generation counter, e.g. one per input
   * field. The caller owns it and must dispose() it.
   */
  createSearchSession(
    currentUserId: UserId,
    options: SearchSessionOptions = {},
  ): SearchCoordinator {
    const { search, resolver, timeouts } = this.config;
    const defaultDebounce =
      options.mode === 'field' ? search.fieldCheckDebounceMs : search.debounceMs;

    return new SearchCoordinator(currentUserId, this.directory, this.statusResolver, {
      debounceMs: options.debounceMs ?? defaultDebounce,
      resultLimit: options.resultLimit ?? search.resultLimit,
      directoryTimeoutMs: timeouts.directoryMs,
      concurrencyLimit: options.concurrencyLimit ?? resolver.concurrencyLimit,
    });
  }

  endSearchSession(currentUserId: UserId): void {
    const session = this.sessions.get(currentUserId);
    if (!session) return;
    session.dispose();
    this.sessions.delete(currentUserId);
  }

  onModuleDestroy(): void {
    for (const session of this.sessions.values()) {
      session.dispose();
    }
    this.sessions.clear();
  }

  // ============================================================================
  // Status
  // ============================================================================

  /**
   * Batch-resolve statuses with bounded concurrency, streaming each result.
   * Lookup failures resolve to NONE and never fail the batch.
   */
  resolveStatuses(
    currentUserId: UserId,
    userIds: Iterable<UserId>,
    onResult: StatusResultHandler,
  ): ResolutionHandle {
    return this.statusResolver.resolve(currentUserId, userIds, { onResult });
  }

  /**
   * Single lookup; fails open to NONE like a batch lookup.
   */
  async checkStatus(
    currentUserId: UserId,
    otherUserId: UserId,
  ): Promise<RelationshipStatus> {
    try {
      return await this.storeClient.getStatus(currentUserId, otherUserId);
    } catch (error) {
      this.logger.warn(
        `Status check ${currentUserId} → ${otherUserId} failed, reporting NONE: ${toRelationshipException(error, 'Status check').message}`,
      );
      return RelationshipStatuses.none();
    }
  }

  listPendingRequests(userId: UserId): Promise<PendingRequests> {
    return this.storeClient.listPending(userId);
  }

  listFriends(userId: UserId): Promise<UserId[]> {
    return this.storeClient.listFriends(userId);
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  /**
   * @param observed the caller's current view of the pair, if it has one.
   *   send skips the create when it shows OUTGOING_REQUEST or FRIENDS; the
   *   other mutations re-read the pair and act on the stored request
   */
  sendRequest(
    currentUserId: UserId,
    otherUserId: UserId,
    observed?: RelationshipStatus,
  ): Promise<RelationshipResult> {
    return this.mutate(currentUserId, otherUserId, observed, (...args) =>
      this.stateMachine.send(...args),
    );
  }

  cancelRequest(
    currentUserId: UserId,
    otherUserId: UserId,
    observed?: RelationshipStatus,
  ): Promise<RelationshipResult> {
    return this.mutate(currentUserId, otherUserId, observed, (...args) =>
      this.stateMachine.cancel(...args),
    );
  }

  acceptRequest(
    currentUserId: UserId,
    otherUserId: UserId,
    observed?: RelationshipStatus,
  ): Promise<RelationshipResult> {
    return this.mutate(currentUserId, otherUserId, observed, (...args) =>
      this.stateMachine.accept(...args),
    );
  }

  rejectRequest(
    currentUserId: UserId,
    otherUserId: UserId,
    observed?: RelationshipStatus,
  ): Promise<RelationshipResult> {
    return this.mutate(currentUserId, otherUserId, observed, (...args) =>
      this.stateMachine.reject(...args),
    );
  }

  removeFriend(
    currentUserId: UserId,
    otherUserId: UserId,
    observed?: RelationshipStatus,
  ): Promise<RelationshipResult> {
    return this.mutate(currentUserId, otherUserId, observed, (...args) =>
      this.stateMachine.remove(...args),
    );
  }

  private async mutate(
    currentUserId: UserId,
    otherUserId: UserId,
    observed: RelationshipStatus | undefined,
    step: MutationStep,
  ): Promise<RelationshipResult> {
    try {
      const hint =
        observed ?? (await this.storeClient.getStatus(currentUserId, otherUserId));
      const outcome = await step(currentUserId, otherUserId, hint);

      if (outcome.performed) {
        await this.publishOutcome(currentUserId, otherUserId, outcome);
      }
      return outcome.confirmed
        ? { ok: true, status: outcome.status }
        : { ok: true, status: outcome.status, unconfirmed: true };
    } catch (error) {
      const failure = toRelationshipException(error, 'Relationship mutation');
      this.logger.warn(
        `Mutation ${currentUserId} → ${otherUserId} failed [${failure.code}]: ${failure.message}`,
      );
      return {
        ok: false,
        error: failure,
        status: await this.recheck(currentUserId, otherUserId),
      };
    }
  }

  private async recheck(
    currentUserId: UserId,
    otherUserId: UserId,
  ): Promise<RelationshipStatus | null> {
    try {
      return await this.storeClient.getStatus(currentUserId, otherUserId);
    } catch (error) {
      this.logger.warn(
        `Re-check ${currentUserId} → ${otherUserId} failed: ${toRelationshipException(error, 'Status re-check').message}`,
      );
      return null;
    }
  }

  private async publishOutcome(
    currentUserId: UserId,
    otherUserId: UserId,
    outcome: TransitionOutcome,
  ): Promise<void> {
    const event = this.eventFor(currentUserId, otherUserId, outcome);
    if (!event) return;

    try {
      await this.eventPublisher.publish(event);
    } catch (error) {
      // The store already changed; a broken event must not report failure
      this.logger.error(
        `Failed to publish ${event.eventType} after ${outcome.action} (${describeStatus(outcome.status)})`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  private eventFor(
    currentUserId: UserId,
    otherUserId: UserId,
    { action, requestId }: TransitionOutcome,
  ): DomainEvent | null {
    if (action === 'REMOVE') {
      return new UnfriendedEvent(currentUserId, otherUserId);
    }
    if (!requestId) {
      return null;
    }

    switch (action) {
      case 'SEND':
        return new FriendRequestSentEvent(requestId, currentUserId, otherUserId);
      case 'CANCEL':
        return new FriendRequestCancelledEvent(
          requestId,
          currentUserId,
          otherUserId,
        );
      case 'ACCEPT':
        return new FriendRequestAcceptedEvent(
          requestId,
          currentUserId,
          otherUserId,
        );
      case 'REJECT':
        return new FriendRequestRejectedEvent(
          requestId,
          otherUserId,
          currentUserId,
        );
    }
  }

  /**
   * Drops the implicit session once the query that just ended was its latest
   * one and nothing replaced it; the next search() starts a fresh session.
   */
  private releaseIdleSession(
    currentUserId: UserId,
    session: SearchCoordinator,
    generation: number,
  ): void {
    if (this.sessions.get(currentUserId) !== session) return;
    if (!session.isCurrent(generation) || session.currentPhase !== 'IDLE') return;
    session.dispose();
    this.sessions.delete(currentUserId);
  }

  private sessionFor(currentUserId: UserId): SearchCoordinator {
    let session = this.sessions.get(currentUserId);
    if (!session) {
      session = this.createSearchSession(currentUserId);
      this.sessions.set(currentUserId, session);
    }
    return session;
  }
}
