/**
 * Relationship status of one user pair, always expressed from the point of
 * view of the current user.
 *
 * At most one of {pending request in either direction, friendship} exists for
 * a pair at a time. The store enforces this; the engine only ever reports one
 * of the four variants below.
 */

export type UserId = string;

export type RelationshipStatusKind =
  | 'NONE'
  | 'OUTGOING_REQUEST'
  | 'INCOMING_REQUEST'
  | 'FRIENDS';

export type RelationshipStatus =
  | { readonly kind: 'NONE' }
  | { readonly kind: 'OUTGOING_REQUEST'; readonly requestId: string }
  | { readonly kind: 'INCOMING_REQUEST'; readonly requestId: string }
  | { readonly kind: 'FRIENDS' };

export type PendingRequestStatus = Extract<
  RelationshipStatus,
  { requestId: string }
>;

export const RelationshipStatuses = {
  none(): RelationshipStatus {
    return { kind: 'NONE' };
  },
  outgoing(requestId: string): RelationshipStatus {
    return { kind: 'OUTGOING_REQUEST', requestId };
  },
  incoming(requestId: string): RelationshipStatus {
    return { kind: 'INCOMING_REQUEST', requestId };
  },
  friends(): RelationshipStatus {
    return { kind: 'FRIENDS' };
  },
} as const;

export function hasPendingRequest(
  status: RelationshipStatus,
): status is PendingRequestStatus {
  return (
    status.kind === 'OUTGOING_REQUEST' || status.kind === 'INCOMING_REQUEST'
  );
}

export function describeStatus(status: RelationshipStatus): string {
  return hasPendingRequest(status)
    ? `${status.kind}(${status.requestId})`
    : status.kind;
}
