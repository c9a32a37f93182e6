/**
 * SearchCoordinator - one live search pipeline per session
 *
 * Lifecycle per query: IDLE → DEBOUNCING → SEARCHING → RESOLVING → IDLE
 *
 * Each query gets a new generation number and one AbortController that scopes
 * all three stages (debounce timer → directory call → resolver batch). A new
 * query aborts the previous scope before starting, so:
 * - a superseded debounce never reaches the directory
 * - a superseded directory result never reaches the resolver
 * - a superseded resolver batch delivers nothing more
 *
 * Every event is tagged with its generation. Events of a generation that is no
 * longer current are dropped here, and callers can compare against
 * `currentGeneration` for anything they buffered themselves.
 */

import { Logger } from '@nestjs/common';
import {
  BehaviorSubject,
  ReplaySubject,
  Subject,
  type Observable,
} from 'rxjs';
import { abortableDelay, withTimeout } from '@common/utils/async.util';
import type { IUserDirectory } from '../interfaces/user-directory.interface';
import type { RelationshipStatus, UserId } from '../types/relationship-status';
import type { UserSummary } from '../types/friend-request.types';
import {
  RelationshipException,
  StoreTimeoutException,
  toRelationshipException,
} from '../errors/relationship.errors';
import type { ResolutionSummary, StatusResolver } from './status-resolver.service';

export type SearchPhase = 'IDLE' | 'DEBOUNCING' | 'SEARCHING' | 'RESOLVING';

interface SearchEventBase {
  generation: number;
  query: string;
}

export type SearchEvent =
  | (SearchEventBase & { type: 'CLEARED' })
  | (SearchEventBase & { type: 'CANDIDATES'; candidates: UserSummary[] })
  | (SearchEventBase & {
      type: 'STATUS';
      userId: UserId;
      status: RelationshipStatus;
    })
  | (SearchEventBase & { type: 'COMPLETED'; summary: ResolutionSummary })
  | (SearchEventBase & { type: 'FAILED'; error: RelationshipException });

export interface SearchCoordinatorOptions {
  debounceMs: number;
  resultLimit: number;
  directoryTimeoutMs: number;
  concurrencyLimit?: number;
}

export interface SearchTicket {
  generation: number;
  /** Replays this generation's events; completes when it finishes or is superseded */
  events$: Observable<SearchEvent>;
}

interface Pipeline {
  generation: number;
  query: string;
  controller: AbortController;
  events: ReplaySubject<SearchEvent>;
}

export class SearchCoordinator {
  private readonly logger = new Logger(SearchCoordinator.name);

  private generation = 0;
  private active: Pipeline | null = null;
  private disposed = false;

  private readonly allEvents = new Subject<SearchEvent>();
  private readonly phase = new BehaviorSubject<SearchPhase>('IDLE');

  /** Events of whichever generation is current, across queries */
  readonly events$: Observable<SearchEvent> = this.allEvents.asObservable();
  readonly phase$: Observable<SearchPhase> = this.phase.asObservable();

  constructor(
    readonly currentUserId: UserId,
    private readonly directory: IUserDirectory,
    private readonly resolver: StatusResolver,
    private readonly options: SearchCoordinatorOptions,
  ) {}

  get currentGeneration(): number {
    return this.generation;
  }

  get currentPhase(): SearchPhase {
    return this.phase.value;
  }

  /** False for every generation older than the latest query */
  isCurrent(generation: number): boolean {
    return generation === this.generation;
  }

  /**
   * Supersede whatever is running and start a pipeline for `query`.
   * Empty or whitespace-only queries clear immediately without debounce.
   */
  search(query: string): SearchTicket {
    if (this.disposed) {
      throw new Error('SearchCoordinator has been disposed');
    }

    this.supersede();

    const pipeline: Pipeline = {
      generation: ++this.generation,
      query: query.trim(),
      controller: new AbortController(),
      events: new ReplaySubject<SearchEvent>(),
    };
    this.active = pipeline;

    const ticket: SearchTicket = {
      generation: pipeline.generation,
      events$: pipeline.events.asObservable(),
    };

    if (pipeline.query.length === 0) {
      this.emit(pipeline, { type: 'CLEARED', ...this.tag(pipeline) });
      this.finish(pipeline);
      return ticket;
    }

    this.run(pipeline).catch((error: unknown) => {
      // run() reports its own failures; this only guards unexpected throws
      this.fail(pipeline, toRelationshipException(error, 'Search pipeline'));
    });

    return ticket;
  }

  /**
   * Cancel the pipeline of `generation` if it is still the active one.
   * Without an argument, cancels whatever is active.
   */
  cancel(generation?: number): void {
    if (!this.active) return;
    if (generation !== undefined && this.active.generation !== generation) return;
    this.supersede();
    this.phase.next('IDLE');
  }

  dispose(): void {
    if (this.disposed) return;
    this.cancel();
    this.disposed = true;
    this.allEvents.complete();
    this.phase.complete();
  }

  private async run(pipeline: Pipeline): Promise<void> {
    const { signal } = pipeline.controller;

    this.enter(pipeline, 'DEBOUNCING');
    const elapsed = await abortableDelay(this.options.debounceMs, signal);
    if (!elapsed || signal.aborted) {
      return;
    }

    this.enter(pipeline, 'SEARCHING');
    let candidates: UserSummary[];
    try {
      candidates = await withTimeout(
        this.directory.search(pipeline.query, {
          excludeUserId: this.currentUserId,
          limit: this.options.resultLimit,
        }),
        this.options.directoryTimeoutMs,
        () =>
          new StoreTimeoutException(
            'Directory search',
            this.options.directoryTimeoutMs,
          ),
      );
    } catch (error) {
      if (!signal.aborted) {
        this.fail(pipeline, toRelationshipException(error, 'Directory search'));
      }
      return;
    }
    if (signal.aborted) {
      return;
    }

    this.emit(pipeline, { type: 'CANDIDATES', ...this.tag(pipeline), candidates });

    this.enter(pipeline, 'RESOLVING');
    const handle = this.resolver.resolve(
      this.currentUserId,
      candidates.map((candidate) => candidate.id),
      {
        concurrencyLimit: this.options.concurrencyLimit,
        signal,
        onResult: (userId, status) =>
          this.emit(pipeline, {
            type: 'STATUS',
            ...this.tag(pipeline),
            userId,
            status,
          }),
      },
    );

    const summary = await handle.completion;
    if (signal.aborted) {
      return;
    }

    this.emit(pipeline, { type: 'COMPLETED', ...this.tag(pipeline), summary });
    this.finish(pipeline);
  }

  private supersede(): void {
    const previous = this.active;
    if (!previous) return;

    this.active = null;
    previous.controller.abort();
    previous.events.complete();
    this.logger.debug(
      `Search generation ${previous.generation} ("${previous.query}") superseded`,
    );
  }

  private fail(pipeline: Pipeline, error: RelationshipException): void {
    this.logger.warn(
      `Search generation ${pipeline.generation} failed: ${error.message}`,
    );
    this.emit(pipeline, { type: 'FAILED', ...this.tag(pipeline), error });
    this.finish(pipeline);
  }

  private finish(pipeline: Pipeline): void {
    if (this.active !== pipeline) return;
    this.active = null;
    this.phase.next('IDLE');
    pipeline.events.complete();
  }

  private enter(pipeline: Pipeline, phase: SearchPhase): void {
    if (this.active === pipeline) {
      this.phase.next(phase);
    }
  }

  private emit(pipeline: Pipeline, event: SearchEvent): void {
    if (this.active !== pipeline || pipeline.controller.signal.aborted) {
      return;
    }
    pipeline.events.next(event);
    // A ticket subscriber may have started a newer query inside next()
    if (this.active === pipeline) {
      this.allEvents.next(event);
    }
  }

  private tag(pipeline: Pipeline): SearchEventBase {
    return { generation: pipeline.generation, query: pipeline.query };
  }
}
