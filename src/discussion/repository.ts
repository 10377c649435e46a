import type {
  BlockRecord,
  CommentCreateParams,
  CommentRecord,
  FollowRecord,
  MessageHandle,
  PendingAction,
  PostCreateParams,
  PostListParams,
  PostRecord,
  PrivateMessageCreateParams,
  PrivateMessageRecord,
  ReactionCounts,
  ReactionRecord,
  ReactionType,
  UserCreateParams,
  UserRecord,
  UserUpdateParams,
} from './types.js';

/**
 * Storage contract for the discussion engine.
 *
 * Every method is one atomic step against storage: an adapter must not let
 * another call observe a half-applied write. Uniqueness and reference
 * violations are reported by throwing `ConflictError`; callers treat that as
 * a signal rather than pre-checking.
 */
export type Repository = {
  // Users
  getUser(id: string): Promise<UserRecord | undefined>;
  /** Insert the user if absent. `created` is false when the row already existed. */
  ensureUser(params: UserCreateParams): Promise<{ user: UserRecord; created: boolean }>;
  updateUser(id: string, params: UserUpdateParams): Promise<UserRecord>;
  /** All users in insertion order. */
  listUsers(): Promise<UserRecord[]>;
  /**
   * Replace the user's pending action only if it still equals `expected`.
   * Returns false (and writes nothing) when it does not, or the user is unknown.
   */
  compareAndSetPendingAction(id: string, expected: PendingAction, next: PendingAction): Promise<boolean>;

  // Posts
  createPost(params: PostCreateParams): Promise<PostRecord>;
  getPost(id: number): Promise<PostRecord | undefined>;
  listPosts(params?: PostListParams): Promise<PostRecord[]>;
  countPosts(params?: Omit<PostListParams, 'limit'>): Promise<number>;
  /** Mark approved and attach the mirror handle. Throws `ConflictError('posts.mirror_handle')` if one is already set. */
  approvePost(id: number, approverId: string, mirrorHandle: MessageHandle): Promise<PostRecord>;
  setCommentCount(id: number, count: number): Promise<void>;
  /** Delete the post with its comments and their reactions. Returns false if it did not exist. */
  deletePost(id: number): Promise<boolean>;

  // Comments
  /**
   * Insert a comment. Throws `ConflictError('comments.post')` for an unknown post and
   * `ConflictError('comments.parent')` when the parent is missing or belongs to another post.
   */
  insertComment(params: CommentCreateParams): Promise<CommentRecord>;
  getComment(id: number): Promise<CommentRecord | undefined>;
  /** Direct children of `parentCommentId` (null = top level), oldest first. */
  listChildren(postId: number, parentCommentId: number | null): Promise<CommentRecord[]>;
  countComments(params?: { postId?: number; authorId?: string }): Promise<number>;

  // Reactions
  /** Throws `ConflictError('reactions.comment_user')` if the pair already has a row. */
  insertReaction(commentId: number, userId: string, type: ReactionType): Promise<ReactionRecord>;
  /** Remove and return the pair's row, if any. */
  deleteReaction(commentId: number, userId: string): Promise<ReactionRecord | undefined>;
  countReactions(commentId: number): Promise<ReactionCounts>;

  // Follows
  /** Throws `ConflictError('follows.pair')` if already following. */
  insertFollow(followerId: string, followedId: string): Promise<FollowRecord>;
  deleteFollow(followerId: string, followedId: string): Promise<boolean>;
  isFollowing(followerId: string, followedId: string): Promise<boolean>;
  countFollowers(userId: string): Promise<number>;

  // Blocks
  /** Throws `ConflictError('blocks.pair')` if already blocked. */
  insertBlock(blockerId: string, blockedId: string): Promise<BlockRecord>;
  isBlocked(blockerId: string, blockedId: string): Promise<boolean>;

  // Private messages
  insertPrivateMessage(params: PrivateMessageCreateParams): Promise<PrivateMessageRecord>;
  /** Newest first. */
  listInbox(receiverId: string, params: { offset: number; limit: number }): Promise<PrivateMessageRecord[]>;
  countInbox(receiverId: string, params?: { unreadOnly?: boolean }): Promise<number>;
  /** Returns how many messages flipped to read. */
  markInboxRead(receiverId: string): Promise<number>;
  countPrivateMessages(): Promise<number>;
};
