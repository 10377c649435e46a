import { EventEmitter } from 'node:events';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { LoggerLike } from '../logging/logger-like.js';
import { ConflictError, RepositoryError } from './errors.js';
import type { Repository } from './repository.js';
import {
  DEFAULT_SEX_TAG,
  NO_PENDING_ACTION,
  samePendingAction,
} from './types.js';
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

// ---------------------------------------------------------------------------
// Event map
// ---------------------------------------------------------------------------

type DiscussionStoreEventMap = {
  userCreated: [user: UserRecord];
  postCreated: [post: PostRecord];
  postApproved: [post: PostRecord];
  postDeleted: [post: PostRecord];
  commentCreated: [comment: CommentRecord];
  reactionChanged: [commentId: number, userId: string, type: ReactionType | null];
};

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export type DiscussionStoreOptions = {
  /** Directory holding one JSONL file per table. Optional; omit for a memory-only store. */
  dataDir?: string;
  /** Clock override for tests. */
  now?: () => Date;
  log?: LoggerLike;
};

export const TABLE_FILES = {
  users: 'users.jsonl',
  posts: 'posts.jsonl',
  comments: 'comments.jsonl',
  reactions: 'reactions.jsonl',
  follows: 'follows.jsonl',
  blocks: 'blocks.jsonl',
  messages: 'private-messages.jsonl',
} as const;

export type TableName = keyof typeof TABLE_FILES;

function pairKey(a: string | number, b: string | number): string {
  return `${a}\u0000${b}`;
}

function childKey(postId: number, parentCommentId: number | null): string {
  return `${postId}:${parentCommentId ?? 0}`;
}

function byCreatedThenId<T extends { createdAt: string; id: number }>(a: T, b: T): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.id - b.id;
}

// ---------------------------------------------------------------------------
// DiscussionStore
// ---------------------------------------------------------------------------

/**
 * In-process repository: Maps keyed by identifier, with a (postId, parentId)
 * index over comments. Every method finishes its read-modify-write before its
 * promise settles, so each call is atomic with respect to other callers.
 *
 * Persistence to JSONL files (if configured) is scheduled after each write and
 * serialized; call `flush()` to await the latest write.
 */
export class DiscussionStore extends EventEmitter<DiscussionStoreEventMap> implements Repository {
  private readonly users = new Map<string, UserRecord>();
  private readonly posts = new Map<number, PostRecord>();
  private readonly comments = new Map<number, CommentRecord>();
  private readonly children = new Map<string, number[]>();
  private readonly reactions = new Map<string, ReactionRecord>();
  private readonly follows = new Map<string, FollowRecord>();
  private readonly blocks = new Map<string, BlockRecord>();
  private readonly messages = new Map<number, PrivateMessageRecord>();

  private postCounter = 0;
  private commentCounter = 0;
  private messageCounter = 0;

  private readonly dataDir: string | undefined;
  private readonly now: () => Date;
  private readonly log: LoggerLike | undefined;
  private persistPromise: Promise<void> | null = null;

  constructor(opts: DiscussionStoreOptions = {}) {
    super();
    this.dataDir = opts.dataDir;
    this.now = opts.now ?? (() => new Date());
    this.log = opts.log;
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /**
   * Load every table from the data directory. No-op without a dataDir; a
   * missing file is an empty table.
   */
  async load(): Promise<void> {
    if (!this.dataDir) return;

    for (const user of await this.readTable<UserRecord>('users')) {
      this.users.set(user.id, user);
    }
    for (const post of await this.readTable<PostRecord>('posts')) {
      this.posts.set(post.id, post);
      if (post.id > this.postCounter) this.postCounter = post.id;
    }
    const comments = await this.readTable<CommentRecord>('comments');
    comments.sort(byCreatedThenId);
    for (const comment of comments) {
      this.comments.set(comment.id, comment);
      this.indexChild(comment);
      if (comment.id > this.commentCounter) this.commentCounter = comment.id;
    }
    for (const reaction of await this.readTable<ReactionRecord>('reactions')) {
      this.reactions.set(pairKey(reaction.commentId, reaction.userId), reaction);
    }
    for (const follow of await this.readTable<FollowRecord>('follows')) {
      this.follows.set(pairKey(follow.followerId, follow.followedId), follow);
    }
    for (const block of await this.readTable<BlockRecord>('blocks')) {
      this.blocks.set(pairKey(block.blockerId, block.blockedId), block);
    }
    for (const message of await this.readTable<PrivateMessageRecord>('messages')) {
      this.messages.set(message.id, message);
      if (message.id > this.messageCounter) this.messageCounter = message.id;
    }
  }

  /** Await the most recently scheduled persist, if any. */
  async flush(): Promise<void> {
    await this.persistPromise;
  }

  private async readTable<T>(table: TableName): Promise<T[]> {
    if (!this.dataDir) return [];
    const filePath = path.join(this.dataDir, TABLE_FILES[table]);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw new RepositoryError(`failed to read ${filePath}`, { cause: err });
    }
    const rows: T[] = [];
    const lines = content.split('\n');
    for (let i = 0; i < lines.length; i++) {
      const trimmed = lines[i].trim();
      if (!trimmed) continue;
      try {
        rows.push(JSON.parse(trimmed) as T);
      } catch (err) {
        throw new RepositoryError(`${filePath}:${i + 1}: invalid JSON`, { cause: err });
      }
    }
    return rows;
  }

  private schedulePersist(): void {
    if (!this.dataDir) return;
    this.persistPromise = (this.persistPromise ?? Promise.resolve())
      .then(() => this.writeToDisk())
      .catch((err) => {
        // In-memory state stays authoritative; the next write retries the full snapshot.
        this.log?.warn({ err, dataDir: this.dataDir }, 'store:persist failed');
      });
  }

  private async writeToDisk(): Promise<void> {
    if (!this.dataDir) return;
    await fs.mkdir(this.dataDir, { recursive: true });
    const tables: Array<[TableName, unknown[]]> = [
      ['users', [...this.users.values()]],
      ['posts', [...this.posts.values()]],
      ['comments', [...this.comments.values()]],
      ['reactions', [...this.reactions.values()]],
      ['follows', [...this.follows.values()]],
      ['blocks', [...this.blocks.values()]],
      ['messages', [...this.messages.values()]],
    ];
    for (const [table, rows] of tables) {
      const lines = rows.map((r) => JSON.stringify(r)).join('\n');
      await fs.writeFile(path.join(this.dataDir, TABLE_FILES[table]), lines ? lines + '\n' : '', 'utf8');
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private indexChild(comment: CommentRecord): void {
    const key = childKey(comment.postId, comment.parentCommentId);
    const ids = this.children.get(key);
    if (ids) ids.push(comment.id);
    else this.children.set(key, [comment.id]);
  }

  // ---------------------------------------------------------------------------
  // Users
  // ---------------------------------------------------------------------------

  async getUser(id: string): Promise<UserRecord | undefined> {
    return this.users.get(id);
  }

  async ensureUser(params: UserCreateParams): Promise<{ user: UserRecord; created: boolean }> {
    const existing = this.users.get(params.id);
    if (existing) return { user: existing, created: false };
    const user: UserRecord = {
      id: params.id,
      displayName: params.displayName,
      sexTag: DEFAULT_SEX_TAG,
      notificationsEnabled: true,
      privacyPublic: true,
      isAdmin: params.isAdmin ?? false,
      pendingAction: NO_PENDING_ACTION,
      createdAt: this.timestamp(),
    };
    this.users.set(user.id, user);
    this.emit('userCreated', user);
    this.schedulePersist();
    return { user, created: true };
  }

  async updateUser(id: string, params: UserUpdateParams): Promise<UserRecord> {
    const prev = this.users.get(id);
    if (!prev) throw new RepositoryError(`user not found: ${id}`);
    const updated: UserRecord = {
      ...prev,
      ...(params.displayName !== undefined && { displayName: params.displayName }),
      ...(params.sexTag !== undefined && { sexTag: params.sexTag }),
      ...(params.notificationsEnabled !== undefined && { notificationsEnabled: params.notificationsEnabled }),
      ...(params.privacyPublic !== undefined && { privacyPublic: params.privacyPublic }),
      ...(params.isAdmin !== undefined && { isAdmin: params.isAdmin }),
    };
    this.users.set(id, updated);
    this.schedulePersist();
    return updated;
  }

  async listUsers(): Promise<UserRecord[]> {
    return [...this.users.values()];
  }

  async compareAndSetPendingAction(
    id: string,
    expected: PendingAction,
    next: PendingAction,
  ): Promise<boolean> {
    const prev = this.users.get(id);
    if (!prev || !samePendingAction(prev.pendingAction, expected)) return false;
    this.users.set(id, { ...prev, pendingAction: next });
    this.schedulePersist();
    return true;
  }

  // ---------------------------------------------------------------------------
  // Posts
  // ---------------------------------------------------------------------------

  async createPost(params: PostCreateParams): Promise<PostRecord> {
    this.postCounter++;
    const post: PostRecord = {
      id: this.postCounter,
      authorId: params.authorId,
      content: params.content,
      category: params.category,
      ...(params.media !== undefined && { media: { ...params.media } }),
      createdAt: this.timestamp(),
      approved: false,
      commentCount: 0,
    };
    this.posts.set(post.id, post);
    this.emit('postCreated', post);
    this.schedulePersist();
    return post;
  }

  async getPost(id: number): Promise<PostRecord | undefined> {
    return this.posts.get(id);
  }

  /**
   * List posts oldest first.
   *
   * - `approved`: filter by approval state (omit for both).
   * - `authorId`: filter by author.
   * - `limit`: cap the number of results (0 or omitted = no cap).
   */
  async listPosts(params: PostListParams = {}): Promise<PostRecord[]> {
    let results = [...this.posts.values()];
    if (params.approved !== undefined) {
      results = results.filter((p) => p.approved === params.approved);
    }
    if (params.authorId !== undefined) {
      results = results.filter((p) => p.authorId === params.authorId);
    }
    results.sort(byCreatedThenId);
    if (params.limit != null && params.limit > 0) {
      results = results.slice(0, params.limit);
    }
    return results;
  }

  async countPosts(params: Omit<PostListParams, 'limit'> = {}): Promise<number> {
    let n = 0;
    for (const p of this.posts.values()) {
      if (params.approved !== undefined && p.approved !== params.approved) continue;
      if (params.authorId !== undefined && p.authorId !== params.authorId) continue;
      n++;
    }
    return n;
  }

  async approvePost(id: number, approverId: string, mirrorHandle: MessageHandle): Promise<PostRecord> {
    const prev = this.posts.get(id);
    if (!prev) throw new RepositoryError(`post not found: ${id}`);
    if (prev.mirrorHandle) {
      throw new ConflictError('posts.mirror_handle', `post ${id} is already published`);
    }
    const approved: PostRecord = {
      ...prev,
      approved: true,
      approvedBy: approverId,
      mirrorHandle: { ...mirrorHandle },
    };
    this.posts.set(id, approved);
    this.emit('postApproved', approved);
    this.schedulePersist();
    return approved;
  }

  async setCommentCount(id: number, count: number): Promise<void> {
    const prev = this.posts.get(id);
    if (!prev || prev.commentCount === count) return;
    this.posts.set(id, { ...prev, commentCount: count });
    this.schedulePersist();
  }

  async deletePost(id: number): Promise<boolean> {
    const post = this.posts.get(id);
    if (!post) return false;
    this.posts.delete(id);
    for (const comment of [...this.comments.values()]) {
      if (comment.postId !== id) continue;
      this.comments.delete(comment.id);
      for (const [key, reaction] of this.reactions) {
        if (reaction.commentId === comment.id) this.reactions.delete(key);
      }
    }
    for (const key of [...this.children.keys()]) {
      if (key.startsWith(`${id}:`)) this.children.delete(key);
    }
    this.emit('postDeleted', post);
    this.schedulePersist();
    return true;
  }

  // ---------------------------------------------------------------------------
  // Comments
  // ---------------------------------------------------------------------------

  async insertComment(params: CommentCreateParams): Promise<CommentRecord> {
    if (!this.posts.has(params.postId)) {
      throw new ConflictError('comments.post', `post not found: ${params.postId}`);
    }
    if (params.parentCommentId !== null) {
      const parent = this.comments.get(params.parentCommentId);
      if (!parent || parent.postId !== params.postId) {
        throw new ConflictError(
          'comments.parent',
          `comment ${params.parentCommentId} is not part of post ${params.postId}`,
        );
      }
    }
    this.commentCounter++;
    const comment: CommentRecord = {
      id: this.commentCounter,
      postId: params.postId,
      parentCommentId: params.parentCommentId,
      authorId: params.authorId,
      content: params.content,
      ...(params.media !== undefined && { media: { ...params.media } }),
      createdAt: this.timestamp(),
    };
    this.comments.set(comment.id, comment);
    this.indexChild(comment);
    this.emit('commentCreated', comment);
    this.schedulePersist();
    return comment;
  }

  async getComment(id: number): Promise<CommentRecord | undefined> {
    return this.comments.get(id);
  }

  async listChildren(postId: number, parentCommentId: number | null): Promise<CommentRecord[]> {
    const ids = this.children.get(childKey(postId, parentCommentId)) ?? [];
    const rows: CommentRecord[] = [];
    for (const id of ids) {
      const comment = this.comments.get(id);
      if (comment) rows.push(comment);
    }
    return rows.sort(byCreatedThenId);
  }

  async countComments(params: { postId?: number; authorId?: string } = {}): Promise<number> {
    let n = 0;
    for (const c of this.comments.values()) {
      if (params.postId !== undefined && c.postId !== params.postId) continue;
      if (params.authorId !== undefined && c.authorId !== params.authorId) continue;
      n++;
    }
    return n;
  }

  // ---------------------------------------------------------------------------
  // Reactions
  // ---------------------------------------------------------------------------

  async insertReaction(commentId: number, userId: string, type: ReactionType): Promise<ReactionRecord> {
    const key = pairKey(commentId, userId);
    if (this.reactions.has(key)) {
      throw new ConflictError('reactions.comment_user', `reaction exists for comment ${commentId} by ${userId}`);
    }
    const reaction: ReactionRecord = { commentId, userId, type, createdAt: this.timestamp() };
    this.reactions.set(key, reaction);
    this.emit('reactionChanged', commentId, userId, type);
    this.schedulePersist();
    return reaction;
  }

  async deleteReaction(commentId: number, userId: string): Promise<ReactionRecord | undefined> {
    const key = pairKey(commentId, userId);
    const existing = this.reactions.get(key);
    if (!existing) return undefined;
    this.reactions.delete(key);
    this.emit('reactionChanged', commentId, userId, null);
    this.schedulePersist();
    return existing;
  }

  async countReactions(commentId: number): Promise<ReactionCounts> {
    const counts: ReactionCounts = { likes: 0, dislikes: 0 };
    for (const r of this.reactions.values()) {
      if (r.commentId !== commentId) continue;
      if (r.type === 'like') counts.likes++;
      else counts.dislikes++;
    }
    return counts;
  }

  // ---------------------------------------------------------------------------
  // Follows and blocks
  // ---------------------------------------------------------------------------

  async insertFollow(followerId: string, followedId: string): Promise<FollowRecord> {
    const key = pairKey(followerId, followedId);
    if (this.follows.has(key)) throw new ConflictError('follows.pair');
    const follow: FollowRecord = { followerId, followedId, createdAt: this.timestamp() };
    this.follows.set(key, follow);
    this.schedulePersist();
    return follow;
  }

  async deleteFollow(followerId: string, followedId: string): Promise<boolean> {
    const removed = this.follows.delete(pairKey(followerId, followedId));
    if (removed) this.schedulePersist();
    return removed;
  }

  async isFollowing(followerId: string, followedId: string): Promise<boolean> {
    return this.follows.has(pairKey(followerId, followedId));
  }

  async countFollowers(userId: string): Promise<number> {
    let n = 0;
    for (const f of this.follows.values()) {
      if (f.followedId === userId) n++;
    }
    return n;
  }

  async insertBlock(blockerId: string, blockedId: string): Promise<BlockRecord> {
    const key = pairKey(blockerId, blockedId);
    if (this.blocks.has(key)) throw new ConflictError('blocks.pair');
    const block: BlockRecord = { blockerId, blockedId, createdAt: this.timestamp() };
    this.blocks.set(key, block);
    this.schedulePersist();
    return block;
  }

  async isBlocked(blockerId: string, blockedId: string): Promise<boolean> {
    return this.blocks.has(pairKey(blockerId, blockedId));
  }

  // ---------------------------------------------------------------------------
  // Private messages
  // ---------------------------------------------------------------------------

  async insertPrivateMessage(params: PrivateMessageCreateParams): Promise<PrivateMessageRecord> {
    this.messageCounter++;
    const message: PrivateMessageRecord = {
      id: this.messageCounter,
      senderId: params.senderId,
      receiverId: params.receiverId,
      content: params.content,
      createdAt: this.timestamp(),
      read: false,
    };
    this.messages.set(message.id, message);
    this.schedulePersist();
    return message;
  }

  async listInbox(
    receiverId: string,
    params: { offset: number; limit: number },
  ): Promise<PrivateMessageRecord[]> {
    const rows = [...this.messages.values()]
      .filter((m) => m.receiverId === receiverId)
      .sort((a, b) => byCreatedThenId(b, a));
    return rows.slice(params.offset, params.offset + params.limit);
  }

  async countInbox(receiverId: string, params: { unreadOnly?: boolean } = {}): Promise<number> {
    let n = 0;
    for (const m of this.messages.values()) {
      if (m.receiverId !== receiverId) continue;
      if (params.unreadOnly && m.read) continue;
      n++;
    }
    return n;
  }

  async markInboxRead(receiverId: string): Promise<number> {
    let flipped = 0;
    for (const m of this.messages.values()) {
      if (m.receiverId !== receiverId || m.read) continue;
      this.messages.set(m.id, { ...m, read: true });
      flipped++;
    }
    if (flipped > 0) this.schedulePersist();
    return flipped;
  }

  async countPrivateMessages(): Promise<number> {
    return this.messages.size;
  }
}
