/**
 * EventPublisher Service
 *
 * Emits domain events to in-process listeners through EventEmitter2.
 * Relationship mutations publish here; notification delivery and any other
 * side effect live in listeners outside the engine.
 *
 * @example
 * ```typescript
 * await this.eventPublisher.publish(
 *   new FriendRequestSentEvent(requestId, fromUserId, toUserId),
 * );
 * ```
 */

import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DomainEvent } from './base';

@Injectable()
export class EventPublisher {
  private readonly logger = new Logger(EventPublisher.name);

  constructor(private readonly eventEmitter: EventEmitter2) {}

  /**
   * @returns the event id, for tracking
   */
  async publish(event: DomainEvent): Promise<string> {
    this.validateEvent(event);

    await this.emitEvent(event);

    this.logger.debug(`Event published: ${event.eventType} (${event.eventId})`);

    return event.eventId;
  }

  private validateEvent(event: DomainEvent): void {
    if (!event.eventId) {
      throw new Error(`Invalid event: missing eventId`);
    }
    if (!event.eventType) {
      throw new Error(`Invalid event: missing eventType`);
    }
    if (!event.source) {
      throw new Error(`Invalid event: missing source (which module emitted)`);
    }

    try {
      JSON.stringify(event.toJSON());
    } catch (error) {
      throw new Error(`Invalid event: not JSON serializable - ${String(error)}`);
    }
  }

  /** Waits for async listeners; a failing listener is logged, never rethrown */
  private async emitEvent(event: DomainEvent): Promise<void> {
    const eventName = EventPublisher.eventNameFor(event.eventType);

    try {
      await this.eventEmitter.emitAsync(eventName, event);
    } catch (error) {
      this.logger.error(
        `Event listener failed for ${eventName}:`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  /**
   * FRIEND_REQUEST_SENT → 'friendship.request.sent'
   * UNKNOWN_TYPE → 'unknown.type'
   *
   * Dotted names allow wildcard listeners such as @OnEvent('friendship.*').
   */
  static eventNameFor(eventType: string): string {
    const primaryMap: Record<string, string> = {
      FRIEND_REQUEST_SENT: 'friendship.request.sent',
      FRIEND_REQUEST_ACCEPTED: 'friendship.accepted',
      FRIEND_REQUEST_REJECTED: 'friendship.request.declined',
      FRIEND_REQUEST_CANCELLED: 'friendship.request.cancelled',
      UNFRIENDED: 'friendship.unfriended',
    };

    return primaryMap[eventType] ?? eventType.toLowerCase().split('_').join('.');
  }
}
