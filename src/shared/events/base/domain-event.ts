/**
 * DomainEvent Base Class
 *
 * Every event the engine publishes extends this class:
 * - eventId: unique id, usable as an idempotency key by listeners
 * - version: event contract version
 * - timestamp / source: when and which module emitted it
 *
 * @example
 * ```typescript
 * export class UnfriendedEvent extends DomainEvent {
 *   readonly eventType = 'UNFRIENDED';
 *
 *   constructor(readonly initiatedBy: string, readonly otherUserId: string) {
 *     super('RelationshipModule', 'Relationship', initiatedBy);
 *   }
 * }
 * ```
 */

import { v4 as uuidv4 } from 'uuid';

export abstract class DomainEvent {
  readonly eventId: string;

  /**
   * Event contract version. Add optional fields and bump the version
   * instead of creating a new event class.
   */
  readonly version: number;

  readonly timestamp: Date;

  /** @example 'RelationshipModule' */
  readonly source: string;

  /** Aggregate that changed (e.g. the request id or the initiating user) */
  readonly aggregateId: string;

  readonly aggregateType: string;

  /** Upper-case event type, e.g. FRIEND_REQUEST_SENT */
  abstract readonly eventType: string;

  constructor(
    source: string,
    aggregateType: string,
    aggregateId: string,
    version: number = 1,
  ) {
    this.eventId = uuidv4();
    this.source = source;
    this.aggregateType = aggregateType;
    this.aggregateId = aggregateId;
    this.version = version;
    this.timestamp = new Date();
  }

  toJSON(): Record<string, unknown> {
    return {
      eventId: this.eventId,
      eventType: this.eventType,
      version: this.version,
      timestamp: this.timestamp.toISOString(),
      source: this.source,
      aggregateType: this.aggregateType,
      aggregateId: this.aggregateId,
    };
  }
}
