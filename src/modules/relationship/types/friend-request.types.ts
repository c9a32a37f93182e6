import type { UserId } from './relationship-status';

export type FriendRequestState = 'PENDING' | 'ACCEPTED' | 'REJECTED' | 'CANCELED';

export interface FriendRequest {
  id: string;
  fromUserId: UserId;
  toUserId: UserId;
  createdAt: Date;
  state: FriendRequestState;
}

/** Symmetric edge; userA/userB carry no ordering meaning */
export interface Friendship {
  userA: UserId;
  userB: UserId;
  createdAt: Date;
}

export interface PendingRequests {
  incoming: FriendRequest[];
  outgoing: FriendRequest[];
}

export interface UserSummary {
  id: UserId;
  username: string;
  displayName: string;
}
