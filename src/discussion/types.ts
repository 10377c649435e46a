// ---------------------------------------------------------------------------
// Discussion data model: users, posts, threaded comments, reactions and the
// per-user pending action.
// ---------------------------------------------------------------------------

export const REACTION_TYPES = ['like', 'dislike'] as const;

export type ReactionType = (typeof REACTION_TYPES)[number];

export function isReactionType(s: string): s is ReactionType {
  return (REACTION_TYPES as readonly string[]).includes(s);
}

export const MEDIA_TYPES = ['photo', 'voice'] as const;

export type MediaType = (typeof MEDIA_TYPES)[number];

export function isMediaType(s: string): s is MediaType {
  return (MEDIA_TYPES as readonly string[]).includes(s);
}

/** Reference to an uploaded attachment; `ref` is whatever the transport can resend (a URL on Discord). */
export type MediaRef = {
  type: MediaType;
  ref: string;
};

/** Where an external message lives. Opaque to the core. */
export type MessageHandle = {
  channelId: string;
  messageId: string;
};

// ---------------------------------------------------------------------------
// Pending action
// ---------------------------------------------------------------------------

/**
 * What the user's next free-text or media message means. Exactly one per user;
 * every successful interpretation resets it to `none`.
 */
export type PendingAction =
  | { type: 'none' }
  | { type: 'awaitingName' }
  | { type: 'awaitingPost'; category: string }
  | { type: 'awaitingComment'; postId: number; parentCommentId: number | null }
  | { type: 'awaitingPrivateMessage'; targetUserId: string };

export const NO_PENDING_ACTION: PendingAction = { type: 'none' };

export function samePendingAction(a: PendingAction, b: PendingAction): boolean {
  switch (a.type) {
    case 'none':
    case 'awaitingName':
      return b.type === a.type;
    case 'awaitingPost':
      return b.type === 'awaitingPost' && b.category === a.category;
    case 'awaitingComment':
      return b.type === 'awaitingComment'
        && b.postId === a.postId
        && b.parentCommentId === a.parentCommentId;
    case 'awaitingPrivateMessage':
      return b.type === 'awaitingPrivateMessage' && b.targetUserId === a.targetUserId;
  }
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export type UserRecord = {
  id: string;
  displayName: string;
  sexTag: string;
  notificationsEnabled: boolean;
  privacyPublic: boolean;
  isAdmin: boolean;
  pendingAction: PendingAction;
  createdAt: string;
};

export type PostRecord = {
  id: number;
  authorId: string;
  content: string;
  category: string;
  media?: MediaRef;
  createdAt: string;
  approved: boolean;
  approvedBy?: string;
  /** Set once, when the post is published. */
  mirrorHandle?: MessageHandle;
  /** Last recomputed thread size. Overwritten, never incremented. */
  commentCount: number;
};

/** Covers top-level comments (`parentCommentId === null`) and replies at any depth. */
export type CommentRecord = {
  id: number;
  postId: number;
  parentCommentId: number | null;
  authorId: string;
  content: string;
  media?: MediaRef;
  createdAt: string;
};

export type ReactionRecord = {
  commentId: number;
  userId: string;
  type: ReactionType;
  createdAt: string;
};

export type ReactionCounts = {
  likes: number;
  dislikes: number;
};

export type FollowRecord = {
  followerId: string;
  followedId: string;
  createdAt: string;
};

export type BlockRecord = {
  blockerId: string;
  blockedId: string;
  createdAt: string;
};

export type PrivateMessageRecord = {
  id: number;
  senderId: string;
  receiverId: string;
  content: string;
  createdAt: string;
  read: boolean;
};

// ---------------------------------------------------------------------------
// Params
// ---------------------------------------------------------------------------

export type UserCreateParams = {
  id: string;
  displayName: string;
  isAdmin?: boolean;
};

export type UserUpdateParams = {
  displayName?: string;
  sexTag?: string;
  notificationsEnabled?: boolean;
  privacyPublic?: boolean;
  isAdmin?: boolean;
};

export type PostCreateParams = {
  authorId: string;
  content: string;
  category: string;
  media?: MediaRef;
};

export type PostListParams = {
  approved?: boolean;
  authorId?: string;
  limit?: number;
};

export type CommentCreateParams = {
  postId: number;
  parentCommentId: number | null;
  authorId: string;
  content: string;
  media?: MediaRef;
};

export type PrivateMessageCreateParams = {
  senderId: string;
  receiverId: string;
  content: string;
};

export const DEFAULT_SEX_TAG = '\u{1F464}'; // 👤

/** Profile markers a user may pick. */
export const SEX_TAGS: readonly string[] = ['\u{1F468}', '\u{1F469}', DEFAULT_SEX_TAG];

export const DEFAULT_CATEGORIES = [
  'General',
  'Advice',
  'WorkLife',
  'Relationships',
  'Family',
  'Faith',
  'Health',
  'Finance',
  'Youth',
  'Other',
] as const;
