import type { ValidationCode } from './errors.js';
import type { MirrorRefreshResult } from './mirror-sync.js';
import type { ActivePendingAction } from './pending-action.js';
import type { PostDraft } from './post-drafts.js';
import type { LeaderboardEntry } from './rating.js';
import type {
  CommentRecord,
  PostRecord,
  PrivateMessageRecord,
  ReactionCounts,
  UserRecord,
} from './types.js';

export type ThreadEntry = {
  comment: CommentRecord;
  author: Pick<UserRecord, 'id' | 'displayName' | 'sexTag'> | undefined;
  reactions: ReactionCounts;
  replyCount: number;
};

export type InboxEntry = {
  message: PrivateMessageRecord;
  sender: Pick<UserRecord, 'id' | 'displayName' | 'sexTag'> | undefined;
};

export type PendingPostEntry = {
  post: PostRecord;
  author: Pick<UserRecord, 'id' | 'displayName' | 'sexTag'> | undefined;
};

export type ProfileView = {
  user: UserRecord;
  score: number;
  rank: number | undefined;
  followers: number;
  isSelf: boolean;
  viewerFollows: boolean;
};

export type BoardStats = {
  users: number;
  approvedPosts: number;
  pendingPosts: number;
  comments: number;
  privateMessages: number;
};

/** Tagged result of one `handleUserInput` call, rendered by the presentation layer. */
export type OutcomeEvent =
  | { type: 'post-created'; post: PostRecord }
  | { type: 'comment-added'; comment: CommentRecord; threadSize: number; mirror: MirrorRefreshResult }
  | { type: 'reaction-toggled'; comment: CommentRecord; reactions: ReactionCounts; replyCount: number }
  | { type: 'message-sent'; message: PrivateMessageRecord; notified: boolean }
  | { type: 'awaiting-input'; pending: ActivePendingAction; preview?: string }
  | { type: 'draft-ready'; draft: PostDraft }
  | { type: 'post-cancelled' }
  | { type: 'post-approved'; post: PostRecord }
  | { type: 'post-rejected'; postId: number }
  | { type: 'name-changed'; user: UserRecord }
  | { type: 'profile'; profile: ProfileView }
  | { type: 'profile-updated'; user: UserRecord }
  | { type: 'follow-changed'; targetUserId: string; following: boolean }
  | { type: 'user-blocked'; targetUserId: string; alreadyBlocked: boolean }
  | {
      type: 'thread-page';
      post: PostRecord;
      parentCommentId: number | null;
      page: number;
      totalPages: number;
      threadSize: number;
      entries: ThreadEntry[];
    }
  | { type: 'leaderboard'; entries: LeaderboardEntry[]; viewer?: LeaderboardEntry & { rank: number } }
  | { type: 'inbox'; entries: InboxEntry[]; page: number; totalPages: number; unread: number }
  | { type: 'stats'; stats: BoardStats }
  | { type: 'pending-posts'; entries: PendingPostEntry[]; total: number }
  | { type: 'categories'; categories: string[] }
  | { type: 'menu'; isAdmin: boolean }
  | { type: 'ignored'; isAdmin: boolean }
  | { type: 'error'; code: ValidationCode | 'internal' };

export type OutcomeType = OutcomeEvent['type'];
