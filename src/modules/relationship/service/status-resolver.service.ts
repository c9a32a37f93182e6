/**
 * StatusResolver - bounded, streaming status resolution for many candidates
 *
 * - At most `concurrencyLimit` store lookups are outstanding at any time,
 *   across the whole candidate set
 * - Each result is delivered through `onResult` as soon as its lookup
 *   settles (arrival order, never request order)
 * - A failed or timed-out lookup resolves to NONE for that candidate only
 * - cancel() (or aborting `signal`) stops issuing lookups and suppresses
 *   delivery of lookups already in flight
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import relationshipConfig from '@config/relationship.config';
import { RelationshipStoreClient } from './relationship-store.client';
import {
  RelationshipStatuses,
  type RelationshipStatus,
  type UserId,
} from '../types/relationship-status';

export type StatusResultHandler = (
  userId: UserId,
  status: RelationshipStatus,
) => void;

export interface ResolveOptions {
  onResult: StatusResultHandler;
  /** Defaults to relationship.resolver.concurrencyLimit */
  concurrencyLimit?: number;
  /** External cancellation scope, e.g. a search pipeline */
  signal?: AbortSignal;
}

export interface ResolutionSummary {
  requested: number;
  delivered: number;
  /** Lookups that failed open to NONE */
  failed: number;
  cancelled: boolean;
}

export interface ResolutionHandle {
  cancel(): void;
  readonly completion: Promise<ResolutionSummary>;
}

@Injectable()
export class StatusResolver {
  private readonly logger = new Logger(StatusResolver.name);

  constructor(
    private readonly storeClient: RelationshipStoreClient,
    @Inject(relationshipConfig.KEY)
    private readonly config: ConfigType<typeof relationshipConfig>,
  ) {}

  resolve(
    currentUserId: UserId,
    candidateIds: Iterable<UserId>,
    options: ResolveOptions,
  ): ResolutionHandle {
    const ids = [...new Set(candidateIds)];
    const limit = Math.max(
      1,
      Math.floor(options.concurrencyLimit ?? this.config.resolver.concurrencyLimit),
    );

    const controller = new AbortController();
    const onExternalAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    if (options.signal?.aborted) {
      controller.abort();
    }

    const summary: ResolutionSummary = {
      requested: ids.length,
      delivered: 0,
      failed: 0,
      cancelled: false,
    };

    let cursor = 0;
    const worker = async (): Promise<void> => {
      while (!controller.signal.aborted && cursor < ids.length) {
        const userId = ids[cursor++];
        const status = await this.lookup(currentUserId, userId, summary);
        if (controller.signal.aborted) {
          return;
        }
        this.deliver(options.onResult, userId, status);
        summary.delivered++;
      }
    };

    const workers = Array.from({ length: Math.min(limit, ids.length) }, () =>
      worker(),
    );

    const completion = Promise.all(workers).then(() => {
      options.signal?.removeEventListener('abort', onExternalAbort);
      summary.cancelled = controller.signal.aborted;
      if (summary.failed > 0) {
        this.logger.warn(
          `Resolved ${summary.delivered}/${summary.requested} statuses for ${currentUserId}, ${summary.failed} failed open`,
        );
      }
      return summary;
    });

    return {
      cancel: () => controller.abort(),
      completion,
    };
  }

  /**
   * Collect a whole batch into a map keyed by candidate id.
   */
  async resolveToMap(
    currentUserId: UserId,
    candidateIds: Iterable<UserId>,
    concurrencyLimit?: number,
  ): Promise<Map<UserId, RelationshipStatus>> {
    const results = new Map<UserId, RelationshipStatus>();
    const handle = this.resolve(currentUserId, candidateIds, {
      concurrencyLimit,
      onResult: (userId, status) => results.set(userId, status),
    });
    await handle.completion;
    return results;
  }

  private async lookup(
    currentUserId: UserId,
    userId: UserId,
    summary: ResolutionSummary,
  ): Promise<RelationshipStatus> {
    try {
      return await this.storeClient.getStatus(currentUserId, userId);
    } catch (error) {
      summary.failed++;
      this.logger.warn(
        `Status lookup ${currentUserId} → ${userId} failed, reporting NONE: ${error instanceof Error ? error.message : String(error)}`,
      );
      return RelationshipStatuses.none();
    }
  }

  private deliver(
    onResult: StatusResultHandler,
    userId: UserId,
    status: RelationshipStatus,
  ): void {
    try {
      onResult(userId, status);
    } catch (error) {
      this.logger.error(
        `Result handler threw for ${userId}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
