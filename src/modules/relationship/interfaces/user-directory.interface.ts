import type { UserId } from '../types/relationship-status';
import type { UserSummary } from '../types/friend-request.types';

export const USER_DIRECTORY = Symbol('USER_DIRECTORY');

export interface DirectorySearchOptions {
  /** Usually the current user, who never appears in their own results */
  excludeUserId?: UserId;
  limit?: number;
}

export interface IUserDirectory {
  /** Ordered by relevance, as ranked by the directory */
  search(query: string, options?: DirectorySearchOptions): Promise<UserSummary[]>;
}
