import type { LoggerLike } from '../logging/logger-like.js';
import { ValidationError, isConflictError } from './errors.js';
import type { Repository } from './repository.js';
import type { CommentRecord, MediaRef, ReactionCounts, ReactionType } from './types.js';

export const DEFAULT_MAX_CONTENT_CHARS = 4000;

export type CommentTreeOptions = {
  repo: Repository;
  maxContentChars?: number;
  log?: LoggerLike;
};

export type AddCommentParams = {
  postId: number;
  parentCommentId: number | null;
  authorId: string;
  content: string;
  media?: MediaRef;
};

/** Root of a descendant count: a whole post, or one comment's subtree (excluding itself). */
export type CountRoot = { postId: number } | { commentId: number };

/**
 * Validate text/media content. Shared with post drafts so both paths reject
 * the same inputs.
 */
export function normalizeContent(
  content: string | undefined,
  media: MediaRef | undefined,
  maxChars: number,
): string {
  const text = (content ?? '').trim();
  if (!text && !media) throw new ValidationError('content_empty');
  if (text.length > maxChars) {
    throw new ValidationError('content_too_long', `content exceeds ${maxChars} characters`);
  }
  return text;
}

/**
 * Mutations and derived views over one post's discussion. Comments form a flat
 * collection with parent back-references; every figure here is recomputed from
 * the repository on each call.
 */
export class CommentTree {
  private readonly repo: Repository;
  private readonly maxContentChars: number;
  private readonly log: LoggerLike | undefined;

  constructor(opts: CommentTreeOptions) {
    this.repo = opts.repo;
    this.maxContentChars = opts.maxContentChars ?? DEFAULT_MAX_CONTENT_CHARS;
    this.log = opts.log;
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  async addComment(params: AddCommentParams): Promise<CommentRecord> {
    const content = normalizeContent(params.content, params.media, this.maxContentChars);

    if (!(await this.repo.getUser(params.authorId))) {
      throw new ValidationError('user_not_found');
    }

    // The store re-checks post and parent inside the insert; a violation there
    // means nothing was written.
    try {
      return await this.repo.insertComment({
        postId: params.postId,
        parentCommentId: params.parentCommentId,
        authorId: params.authorId,
        content,
        ...(params.media !== undefined && { media: params.media }),
      });
    } catch (err) {
      if (isConflictError(err, 'comments.post')) throw new ValidationError('post_not_found');
      if (isConflictError(err, 'comments.parent')) throw new ValidationError('invalid_parent');
      throw err;
    }
  }

  /**
   * Apply `type` for this user on this comment: any prior reaction is removed,
   * then `type` is inserted unless the removed one was the same type (toggle-off).
   * A unique-constraint hit from a concurrent toggle is retried once.
   */
  async toggleReaction(commentId: number, userId: string, type: ReactionType): Promise<ReactionCounts> {
    if (!(await this.repo.getComment(commentId))) {
      throw new ValidationError('comment_not_found');
    }

    try {
      await this.applyToggle(commentId, userId, type);
    } catch (err) {
      if (!isConflictError(err, 'reactions.comment_user')) throw err;
      this.log?.info({ commentId, userId, type }, 'comments:reaction conflict, retrying');
      try {
        await this.applyToggle(commentId, userId, type);
      } catch (retryErr) {
        if (isConflictError(retryErr, 'reactions.comment_user')) {
          throw new ValidationError('reaction_conflict');
        }
        throw retryErr;
      }
    }

    return this.repo.countReactions(commentId);
  }

  private async applyToggle(commentId: number, userId: string, type: ReactionType): Promise<void> {
    const removed = await this.repo.deleteReaction(commentId, userId);
    if (removed?.type === type) return;
    await this.repo.insertReaction(commentId, userId, type);
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  /**
   * Number of comments below the root at any depth. Walks the parent index with
   * an explicit stack so nesting depth is unbounded.
   */
  async countDescendants(root: CountRoot): Promise<number> {
    let postId: number;
    let start: number | null;
    if ('commentId' in root) {
      const comment = await this.repo.getComment(root.commentId);
      if (!comment) throw new ValidationError('comment_not_found');
      postId = comment.postId;
      start = comment.id;
    } else {
      postId = root.postId;
      start = null;
    }

    let total = 0;
    const stack: Array<number | null> = [start];
    while (stack.length > 0) {
      const parent = stack.pop() ?? null;
      const kids = await this.repo.listChildren(postId, parent);
      total += kids.length;
      for (const kid of kids) stack.push(kid.id);
    }
    return total;
  }

  /**
   * One page of direct children. Top-level comments come newest first; replies
   * come oldest first so a thread reads in conversational order.
   */
  async listPage(
    postId: number,
    parentCommentId: number | null,
    page: number,
    pageSize: number,
  ): Promise<CommentRecord[]> {
    if (!Number.isInteger(page) || page < 1) throw new ValidationError('invalid_page');
    const size = Math.max(1, Math.floor(pageSize));
    const rows = await this.repo.listChildren(postId, parentCommentId);
    if (parentCommentId === null) rows.reverse();
    const offset = (page - 1) * size;
    return rows.slice(offset, offset + size);
  }

  /** Pages of direct children at this level (0 when there are none). */
  async pageCount(postId: number, parentCommentId: number | null, pageSize: number): Promise<number> {
    const size = Math.max(1, Math.floor(pageSize));
    const rows = await this.repo.listChildren(postId, parentCommentId);
    return Math.ceil(rows.length / size);
  }

  async childCount(commentId: number): Promise<number> {
    const comment = await this.repo.getComment(commentId);
    if (!comment) return 0;
    return (await this.repo.listChildren(comment.postId, comment.id)).length;
  }

  async reactionCounts(commentId: number): Promise<ReactionCounts> {
    return this.repo.countReactions(commentId);
  }
}
