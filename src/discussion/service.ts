import type { LoggerLike } from '../logging/logger-like.js';
import { globalMetrics, type CounterSink } from '../observability/metrics.js';
import type { UserAction, UserInput } from './actions.js';
import { CommentTree, DEFAULT_MAX_CONTENT_CHARS, normalizeContent } from './comment-tree.js';
import { INPUT_VALIDATION_CODES, ValidationError, isConflictError, isValidationError } from './errors.js';
import type { Control, MessageContent, MessageTarget, Messenger } from './messenger.js';
import { commentControls } from './messenger.js';
import { MirrorSync } from './mirror-sync.js';
import type { NotificationEvent, NotificationPolicy } from './notification-policy.js';
import { createPreferenceNotificationPolicy } from './notification-policy.js';
import type { BoardStats, InboxEntry, OutcomeEvent, PendingPostEntry, ThreadEntry } from './outcomes.js';
import { ConversationStateMachine } from './pending-action.js';
import type { ActivePendingAction } from './pending-action.js';
import { PostDraftBook } from './post-drafts.js';
import type { DraftLookup, PostDraft } from './post-drafts.js';
import { RatingEngine } from './rating.js';
import type { Repository } from './repository.js';
import { DEFAULT_CATEGORIES, SEX_TAGS } from './types.js';
import type { MediaRef, PostRecord, UserRecord } from './types.js';

export const DEFAULT_COMMENTS_PAGE_SIZE = 5;
export const INBOX_PAGE_SIZE = 5;
export const DEFAULT_MAX_NAME_CHARS = 30;
export const DEFAULT_LEADERBOARD_SIZE = 10;
export const PENDING_POSTS_LIMIT = 10;

const PREVIEW_CHARS = 100;

export type DiscussionServiceOptions = {
  repo: Repository;
  messenger: Messenger;
  /** Channel approved posts are published to. */
  channelId: string;
  adminIds?: Iterable<string>;
  categories?: readonly string[];
  commentsPageSize?: number;
  maxContentChars?: number;
  maxNameChars?: number;
  leaderboardSize?: number;
  draftTtlMs?: number;
  mirrorRetryEnabled?: boolean;
  mirrorRetryDelayMs?: number;
  log?: LoggerLike;
  metrics?: CounterSink;
  // Collaborator overrides; built from the options above when omitted.
  tree?: CommentTree;
  pending?: ConversationStateMachine;
  drafts?: PostDraftBook;
  mirror?: MirrorSync;
  rating?: RatingEngine;
  notificationPolicy?: NotificationPolicy;
  now?: () => number;
};

/** `Anonymous<n>`: the id's last three digits, or a stable hash of a non-numeric id. */
export function defaultDisplayName(userId: string): string {
  if (/^\d+$/.test(userId)) return `Anonymous${Number(userId.slice(-3))}`;
  let hash = 0;
  for (let i = 0; i < userId.length; i++) {
    hash = (hash * 31 + userId.charCodeAt(i)) >>> 0;
  }
  return `Anonymous${hash % 1000}`;
}

function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}

/** Channel text of a published post. */
export function formatChannelPost(post: Pick<PostRecord, 'content' | 'category'>): string {
  return post.content ? `${post.content}\n\n#${post.category}` : `#${post.category}`;
}

/**
 * Single entry point for everything a user does. Each call is one task: the
 * user row is created on first contact, the input is routed (structured
 * actions directly, free text through the pending action), and the result
 * comes back as a tagged outcome for the presentation layer to render.
 */
export class DiscussionService {
  readonly tree: CommentTree;
  readonly pending: ConversationStateMachine;
  readonly drafts: PostDraftBook;
  readonly mirror: MirrorSync;
  readonly rating: RatingEngine;

  private readonly repo: Repository;
  private readonly messenger: Messenger;
  private readonly policy: NotificationPolicy;
  private readonly adminIds: ReadonlySet<string>;
  private readonly categories: readonly string[];
  private readonly commentsPageSize: number;
  private readonly maxContentChars: number;
  private readonly maxNameChars: number;
  private readonly leaderboardSize: number;
  private readonly log: LoggerLike | undefined;
  private readonly metrics: CounterSink;

  constructor(private readonly opts: DiscussionServiceOptions) {
    this.repo = opts.repo;
    this.messenger = opts.messenger;
    this.log = opts.log;
    this.metrics = opts.metrics ?? globalMetrics;
    this.adminIds = new Set(opts.adminIds ?? []);
    this.categories = opts.categories ?? DEFAULT_CATEGORIES;
    this.commentsPageSize = opts.commentsPageSize ?? DEFAULT_COMMENTS_PAGE_SIZE;
    this.maxContentChars = opts.maxContentChars ?? DEFAULT_MAX_CONTENT_CHARS;
    this.maxNameChars = opts.maxNameChars ?? DEFAULT_MAX_NAME_CHARS;
    this.leaderboardSize = opts.leaderboardSize ?? DEFAULT_LEADERBOARD_SIZE;

    this.tree = opts.tree ?? new CommentTree({ repo: this.repo, maxContentChars: this.maxContentChars, log: this.log });
    this.pending = opts.pending ?? new ConversationStateMachine({ repo: this.repo, log: this.log });
    this.drafts = opts.drafts ?? new PostDraftBook({
      ...(opts.draftTtlMs !== undefined && { ttlMs: opts.draftTtlMs }),
      ...(opts.now !== undefined && { now: opts.now }),
    });
    this.mirror = opts.mirror ?? new MirrorSync({
      repo: this.repo,
      tree: this.tree,
      messenger: this.messenger,
      log: this.log,
      metrics: this.metrics,
      ...(opts.mirrorRetryEnabled !== undefined && { enableFailureRetry: opts.mirrorRetryEnabled }),
      ...(opts.mirrorRetryDelayMs !== undefined && { failureRetryDelayMs: opts.mirrorRetryDelayMs }),
    });
    this.rating = opts.rating ?? new RatingEngine(this.repo);
    this.policy = opts.notificationPolicy ?? createPreferenceNotificationPolicy(this.repo);
  }

  async handleUserInput(userId: string, input: UserInput): Promise<OutcomeEvent> {
    let outcome: OutcomeEvent;
    try {
      const user = await this.ensureUser(userId);
      outcome = input.type === 'action'
        ? await this.handleAction(user, input.action)
        : await this.handleMessage(user, input.text, input.media);
    } catch (err) {
      if (isValidationError(err)) {
        outcome = { type: 'error', code: err.code };
      } else {
        this.log?.error(
          { err, userId, input: input.type === 'action' ? input.action.type : 'message' },
          'service:input failed',
        );
        outcome = { type: 'error', code: 'internal' };
      }
    }
    this.metrics.increment(`service.outcome.${outcome.type}`);
    return outcome;
  }

  /** Cancel background work (mirror retries). */
  dispose(): void {
    this.mirror.dispose();
  }

  /** Admin status follows the configured ids; the stored flag only mirrors it. */
  isAdmin(user: Pick<UserRecord, 'id'>): boolean {
    return this.adminIds.has(user.id);
  }

  private async ensureUser(userId: string): Promise<UserRecord> {
    const configuredAdmin = this.adminIds.has(userId);
    const { user, created } = await this.repo.ensureUser({
      id: userId,
      displayName: defaultDisplayName(userId),
      isAdmin: configuredAdmin,
    });
    if (created) this.log?.info({ userId }, 'service:user created');
    if (user.isAdmin !== configuredAdmin) {
      this.log?.info({ userId, isAdmin: configuredAdmin }, 'service:admin flag synced');
      return this.repo.updateUser(userId, { isAdmin: configuredAdmin });
    }
    return user;
  }

  // ---------------------------------------------------------------------------
  // Free-text / media messages
  // ---------------------------------------------------------------------------

  private async handleMessage(
    user: UserRecord,
    text: string | undefined,
    media: MediaRef | undefined,
  ): Promise<OutcomeEvent> {
    const pending = await this.pending.take(user.id);
    if (pending.type === 'none') return { type: 'ignored', isAdmin: this.isAdmin(user) };

    try {
      return await this.consume(user, pending, text, media);
    } catch (err) {
      // Bad input keeps the user in the same state so they can try again.
      if (isValidationError(err) && INPUT_VALIDATION_CODES.has(err.code)) {
        await this.pending.restore(user.id, pending);
      }
      throw err;
    }
  }

  private async consume(
    user: UserRecord,
    pending: ActivePendingAction,
    text: string | undefined,
    media: MediaRef | undefined,
  ): Promise<OutcomeEvent> {
    switch (pending.type) {
      case 'awaitingPost': {
        if (!this.categories.includes(pending.category)) throw new ValidationError('unknown_category');
        const content = normalizeContent(text, media, this.maxContentChars);
        const draft = this.drafts.put(user.id, {
          content,
          category: pending.category,
          ...(media !== undefined && { media }),
        });
        return { type: 'draft-ready', draft };
      }

      case 'awaitingComment':
        return this.addComment(user, pending.postId, pending.parentCommentId, text, media);

      case 'awaitingPrivateMessage':
        return this.sendPrivateMessage(user, pending.targetUserId, text);

      case 'awaitingName': {
        const name = (text ?? '').trim();
        if (!name || name.length > this.maxNameChars) {
          throw new ValidationError('name_invalid', `name must be 1-${this.maxNameChars} characters`);
        }
        const updated = await this.repo.updateUser(user.id, { displayName: name });
        return { type: 'name-changed', user: updated };
      }
    }
  }

  private async addComment(
    user: UserRecord,
    postId: number,
    parentCommentId: number | null,
    text: string | undefined,
    media: MediaRef | undefined,
  ): Promise<OutcomeEvent> {
    const comment = await this.tree.addComment({
      postId,
      parentCommentId,
      authorId: user.id,
      content: text ?? '',
      ...(media !== undefined && { media }),
    });

    // The comment is committed; nothing below may fail the operation.
    const mirror = await this.mirror.refresh(postId);
    const threadSize = 'count' in mirror && mirror.count !== undefined
      ? mirror.count
      : await this.tree.countDescendants({ postId });

    const recipient = parentCommentId === null
      ? (await this.repo.getPost(postId))?.authorId
      : (await this.repo.getComment(parentCommentId))?.authorId;
    if (recipient) {
      const event: NotificationEvent = { type: 'reply', actorId: user.id, postId, commentId: comment.id };
      await this.notify(recipient, event, {
        text: `\u{1F4AC} ${user.displayName} replied${parentCommentId === null ? ' to your post' : ' to your comment'}:\n\n${preview(comment.content)}`,
      }, [{ label: 'View thread', action: { type: 'viewComments', postId, parentCommentId, page: 1 } }]);
    }

    return { type: 'comment-added', comment, threadSize, mirror };
  }

  private async sendPrivateMessage(
    user: UserRecord,
    targetUserId: string,
    text: string | undefined,
  ): Promise<OutcomeEvent> {
    if (!(await this.repo.getUser(targetUserId))) throw new ValidationError('user_not_found');
    if (await this.repo.isBlocked(targetUserId, user.id)) throw new ValidationError('blocked');
    const content = normalizeContent(text, undefined, this.maxContentChars);

    const message = await this.repo.insertPrivateMessage({
      senderId: user.id,
      receiverId: targetUserId,
      content,
    });
    const notified = await this.notify(
      targetUserId,
      { type: 'privateMessage', actorId: user.id, messageId: message.id },
      { text: `\u{1F4E9} New private message from ${user.displayName}:\n\n${preview(content)}` },
      [
        { label: '\u{1F4AC} Reply', action: { type: 'composeMessage', targetUserId: user.id } },
        { label: '\u{26D4} Block', action: { type: 'block', targetUserId: user.id } },
      ],
    );
    return { type: 'message-sent', message, notified };
  }

  // ---------------------------------------------------------------------------
  // Structured actions
  // ---------------------------------------------------------------------------

  private async handleAction(user: UserRecord, action: UserAction): Promise<OutcomeEvent> {
    switch (action.type) {
      case 'chooseCategory': {
        if (!this.categories.includes(action.category)) throw new ValidationError('unknown_category');
        return this.enter(user, { type: 'awaitingPost', category: action.category });
      }
      case 'writeComment': {
        await this.requirePublished(action.postId);
        return this.enter(user, { type: 'awaitingComment', postId: action.postId, parentCommentId: null });
      }
      case 'replyTo': {
        await this.requirePublished(action.postId);
        const parent = await this.repo.getComment(action.commentId);
        if (!parent) throw new ValidationError('comment_not_found');
        if (parent.postId !== action.postId) throw new ValidationError('invalid_parent');
        return this.enter(
          user,
          { type: 'awaitingComment', postId: action.postId, parentCommentId: parent.id },
          preview(parent.content),
        );
      }
      case 'editName':
        return this.enter(user, { type: 'awaitingName' });
      case 'composeMessage': {
        if (action.targetUserId === user.id) throw new ValidationError('self_target');
        if (!(await this.repo.getUser(action.targetUserId))) throw new ValidationError('user_not_found');
        if (await this.repo.isBlocked(action.targetUserId, user.id)) throw new ValidationError('blocked');
        return this.enter(user, { type: 'awaitingPrivateMessage', targetUserId: action.targetUserId });
      }

      case 'confirmPost':
        return this.confirmPost(user);
      case 'editPost': {
        const draft = this.requireDraft(this.drafts.inspect(user.id));
        this.drafts.discard(user.id);
        return this.enter(user, { type: 'awaitingPost', category: draft.category }, preview(draft.content));
      }
      case 'cancelPost': {
        this.drafts.discard(user.id);
        await this.pending.cancel(user.id);
        return { type: 'post-cancelled' };
      }

      case 'toggleReaction': {
        const reactions = await this.tree.toggleReaction(action.commentId, user.id, action.reaction);
        const comment = await this.repo.getComment(action.commentId);
        if (!comment) throw new ValidationError('comment_not_found');
        const replyCount = await this.tree.childCount(comment.id);
        return { type: 'reaction-toggled', comment, reactions, replyCount };
      }

      case 'setSex': {
        if (!SEX_TAGS.includes(action.sexTag)) throw new ValidationError('invalid_option');
        const updated = await this.repo.updateUser(user.id, { sexTag: action.sexTag });
        return { type: 'profile-updated', user: updated };
      }
      case 'toggleNotifications': {
        const updated = await this.repo.updateUser(user.id, { notificationsEnabled: !user.notificationsEnabled });
        return { type: 'profile-updated', user: updated };
      }
      case 'togglePrivacy': {
        const updated = await this.repo.updateUser(user.id, { privacyPublic: !user.privacyPublic });
        return { type: 'profile-updated', user: updated };
      }
      case 'follow': {
        await this.requireOtherUser(user, action.targetUserId);
        try {
          await this.repo.insertFollow(user.id, action.targetUserId);
        } catch (err) {
          if (!isConflictError(err, 'follows.pair')) throw err;
        }
        return { type: 'follow-changed', targetUserId: action.targetUserId, following: true };
      }
      case 'unfollow': {
        await this.repo.deleteFollow(user.id, action.targetUserId);
        return { type: 'follow-changed', targetUserId: action.targetUserId, following: false };
      }
      case 'block': {
        await this.requireOtherUser(user, action.targetUserId);
        let alreadyBlocked = false;
        try {
          await this.repo.insertBlock(user.id, action.targetUserId);
        } catch (err) {
          if (!isConflictError(err, 'blocks.pair')) throw err;
          alreadyBlocked = true;
        }
        return { type: 'user-blocked', targetUserId: action.targetUserId, alreadyBlocked };
      }

      case 'approvePost':
        return this.approvePost(user, action.postId);
      case 'rejectPost':
        return this.rejectPost(user, action.postId);
      case 'viewPendingPosts':
        return this.viewPendingPosts(user);

      case 'viewComments':
        return this.viewComments(action.postId, action.parentCommentId, action.page);
      case 'viewProfile':
        return this.viewProfile(user, action.targetUserId ?? user.id);
      case 'viewLeaderboard':
        return this.viewLeaderboard(user);
      case 'viewInbox':
        return this.viewInbox(user, action.page);
      case 'viewStats': {
        this.requireAdmin(user);
        return { type: 'stats', stats: await this.stats() };
      }
      case 'showCategories':
        return { type: 'categories', categories: [...this.categories] };
      case 'menu':
        // Opening the menu leaves any pending action in place.
        return { type: 'menu', isAdmin: this.isAdmin(user) };
    }
  }

  private async enter(user: UserRecord, next: ActivePendingAction, previewText?: string): Promise<OutcomeEvent> {
    await this.pending.begin(user.id, next);
    return {
      type: 'awaiting-input',
      pending: next,
      ...(previewText !== undefined && { preview: previewText }),
    };
  }

  private requireDraft(lookup: DraftLookup): PostDraft {
    if (lookup.status === 'missing') throw new ValidationError('draft_missing');
    if (lookup.status === 'expired') throw new ValidationError('draft_expired');
    return lookup.draft;
  }

  private requireAdmin(user: UserRecord): void {
    if (!this.isAdmin(user)) throw new ValidationError('forbidden');
  }

  private async requireOtherUser(user: UserRecord, targetUserId: string): Promise<UserRecord> {
    if (targetUserId === user.id) throw new ValidationError('self_target');
    const target = await this.repo.getUser(targetUserId);
    if (!target) throw new ValidationError('user_not_found');
    return target;
  }

  private async requirePublished(postId: number): Promise<PostRecord> {
    const post = await this.repo.getPost(postId);
    if (!post || !post.approved) throw new ValidationError('post_not_found');
    return post;
  }

  // ---------------------------------------------------------------------------
  // Posts and moderation
  // ---------------------------------------------------------------------------

  private async confirmPost(user: UserRecord): Promise<OutcomeEvent> {
    const draft = this.requireDraft(this.drafts.inspect(user.id));
    this.drafts.discard(user.id);
    const post = await this.repo.createPost({
      authorId: user.id,
      content: draft.content,
      category: draft.category,
      ...(draft.media !== undefined && { media: draft.media }),
    });
    this.log?.info({ postId: post.id, authorId: user.id, category: post.category }, 'service:post submitted');

    const controls: Control[] = [
      { label: '\u{2705} Approve', action: { type: 'approvePost', postId: post.id } },
      { label: '\u{274C} Reject', action: { type: 'rejectPost', postId: post.id } },
    ];
    for (const adminId of this.adminIds) {
      await this.deliver(
        { type: 'user', userId: adminId },
        {
          text: `\u{1F195} New post #${post.id} awaiting approval from ${user.displayName} in #${post.category}:\n\n${preview(post.content)}`,
          ...(post.media !== undefined && { media: post.media }),
        },
        controls,
      );
    }
    return { type: 'post-created', post };
  }

  private async approvePost(user: UserRecord, postId: number): Promise<OutcomeEvent> {
    this.requireAdmin(user);
    const post = await this.repo.getPost(postId);
    if (!post) throw new ValidationError('post_not_found');
    if (post.approved || post.mirrorHandle) throw new ValidationError('already_published');

    const handle = await this.messenger.sendMessage(
      { type: 'channel', channelId: this.opts.channelId },
      { text: formatChannelPost(post), ...(post.media !== undefined && { media: post.media }) },
      commentControls(post.id, 0),
    );

    let approved: PostRecord;
    try {
      approved = await this.repo.approvePost(post.id, user.id, handle);
    } catch (err) {
      if (!isConflictError(err, 'posts.mirror_handle')) throw err;
      // Another admin won the race; the message just sent is a duplicate.
      this.log?.warn({ postId, handle }, 'service:post published twice');
      throw new ValidationError('already_published');
    }
    this.log?.info({ postId, approverId: user.id, handle }, 'service:post published');

    await this.deliver(
      { type: 'user', userId: approved.authorId },
      { text: '\u{2705} Your post has been approved and published!' },
      [],
    );
    return { type: 'post-approved', post: approved };
  }

  private async rejectPost(user: UserRecord, postId: number): Promise<OutcomeEvent> {
    this.requireAdmin(user);
    const post = await this.repo.getPost(postId);
    if (!post) throw new ValidationError('post_not_found');
    if (post.approved) throw new ValidationError('already_published');

    await this.repo.deletePost(postId);
    this.log?.info({ postId, adminId: user.id }, 'service:post rejected');
    await this.deliver(
      { type: 'user', userId: post.authorId },
      { text: '\u{274C} Your post was not approved by the admin.' },
      [],
    );
    return { type: 'post-rejected', postId };
  }

  /** Oldest unapproved posts first, so nothing submitted is stranded when an admin DM fails. */
  private async viewPendingPosts(user: UserRecord): Promise<OutcomeEvent> {
    this.requireAdmin(user);
    const [posts, total] = await Promise.all([
      this.repo.listPosts({ approved: false, limit: PENDING_POSTS_LIMIT }),
      this.repo.countPosts({ approved: false }),
    ]);
    const entries: PendingPostEntry[] = [];
    for (const post of posts) {
      const author = await this.repo.getUser(post.authorId);
      entries.push({
        post,
        author: author && { id: author.id, displayName: author.displayName, sexTag: author.sexTag },
      });
    }
    return { type: 'pending-posts', entries, total };
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  private async viewComments(postId: number, parentCommentId: number | null, page: number): Promise<OutcomeEvent> {
    const post = await this.requirePublished(postId);
    if (parentCommentId !== null) {
      const parent = await this.repo.getComment(parentCommentId);
      if (!parent || parent.postId !== postId) throw new ValidationError('invalid_parent');
    }

    const totalPages = await this.tree.pageCount(postId, parentCommentId, this.commentsPageSize);
    if (!Number.isInteger(page) || page < 1 || (page > 1 && page > totalPages)) {
      throw new ValidationError('invalid_page');
    }
    const comments = await this.tree.listPage(postId, parentCommentId, page, this.commentsPageSize);
    const entries: ThreadEntry[] = [];
    for (const comment of comments) {
      const author = await this.repo.getUser(comment.authorId);
      entries.push({
        comment,
        author: author && { id: author.id, displayName: author.displayName, sexTag: author.sexTag },
        reactions: await this.tree.reactionCounts(comment.id),
        replyCount: await this.tree.childCount(comment.id),
      });
    }
    const threadSize = await this.tree.countDescendants({ postId });
    return { type: 'thread-page', post, parentCommentId, page, totalPages, threadSize, entries };
  }

  private async viewProfile(viewer: UserRecord, targetUserId: string): Promise<OutcomeEvent> {
    const user = targetUserId === viewer.id ? viewer : await this.repo.getUser(targetUserId);
    if (!user) throw new ValidationError('user_not_found');
    const isSelf = user.id === viewer.id;
    if (!isSelf && !user.privacyPublic) throw new ValidationError('forbidden');

    const [score, rank, followers, viewerFollows] = await Promise.all([
      this.rating.score(user.id),
      this.rating.rank(user.id),
      this.repo.countFollowers(user.id),
      isSelf ? Promise.resolve(false) : this.repo.isFollowing(viewer.id, user.id),
    ]);
    return { type: 'profile', profile: { user, score, rank, followers, isSelf, viewerFollows } };
  }

  private async viewLeaderboard(viewer: UserRecord): Promise<OutcomeEvent> {
    const entries = await this.rating.leaderboard(this.leaderboardSize);
    const rank = await this.rating.rank(viewer.id);
    if (rank === undefined) return { type: 'leaderboard', entries };
    const score = await this.rating.score(viewer.id);
    return { type: 'leaderboard', entries, viewer: { user: viewer, score, rank } };
  }

  private async viewInbox(user: UserRecord, page: number): Promise<OutcomeEvent> {
    if (!Number.isInteger(page) || page < 1) throw new ValidationError('invalid_page');
    const total = await this.repo.countInbox(user.id);
    const totalPages = Math.ceil(total / INBOX_PAGE_SIZE);
    if (page > 1 && page > totalPages) throw new ValidationError('invalid_page');
    const unread = await this.repo.countInbox(user.id, { unreadOnly: true });

    const messages = await this.repo.listInbox(user.id, {
      offset: (page - 1) * INBOX_PAGE_SIZE,
      limit: INBOX_PAGE_SIZE,
    });
    const entries: InboxEntry[] = [];
    for (const message of messages) {
      const sender = await this.repo.getUser(message.senderId);
      entries.push({
        message,
        sender: sender && { id: sender.id, displayName: sender.displayName, sexTag: sender.sexTag },
      });
    }
    await this.repo.markInboxRead(user.id);
    return { type: 'inbox', entries, page, totalPages, unread };
  }

  private async stats(): Promise<BoardStats> {
    const [users, approvedPosts, pendingPosts, comments, privateMessages] = await Promise.all([
      this.repo.listUsers().then((u) => u.length),
      this.repo.countPosts({ approved: true }),
      this.repo.countPosts({ approved: false }),
      this.repo.countComments(),
      this.repo.countPrivateMessages(),
    ]);
    return { users, approvedPosts, pendingPosts, comments, privateMessages };
  }

  // ---------------------------------------------------------------------------
  // Outbound notifications (best effort)
  // ---------------------------------------------------------------------------

  private async notify(
    targetUserId: string,
    event: NotificationEvent,
    content: MessageContent,
    controls: Control[],
  ): Promise<boolean> {
    if (!(await this.policy.shouldNotify(targetUserId, event))) return false;
    return this.deliver({ type: 'user', userId: targetUserId }, content, controls);
  }

  private async deliver(target: MessageTarget, content: MessageContent, controls: Control[]): Promise<boolean> {
    try {
      await this.messenger.sendMessage(target, content, controls);
      return true;
    } catch (err) {
      this.metrics.increment('service.delivery.failed');
      this.log?.warn({ err, target }, 'service:delivery failed');
      return false;
    }
  }
}
