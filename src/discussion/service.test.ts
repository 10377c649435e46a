import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MetricsRegistry } from '../observability/metrics.js';
import type { UserAction } from './actions.js';
import type { Control, ControlUpdateOutcome, MessageContent, MessageTarget, Messenger } from './messenger.js';
import type { OutcomeEvent } from './outcomes.js';
import { DiscussionService, defaultDisplayName, formatChannelPost } from './service.js';
import type { DiscussionServiceOptions } from './service.js';
import { DiscussionStore } from './store.js';
import type { MessageHandle } from './types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ADMIN = '9000';
const ALICE = '1001';
const BOB = '1002';
const CHANNEL = '123456789012';

type Sent = { target: MessageTarget; content: MessageContent; controls: Control[] };

function makeMessenger() {
  const sent: Sent[] = [];
  let nextId = 1;
  const sendMessage = vi.fn(async (target: MessageTarget, content: MessageContent, controls: Control[]): Promise<MessageHandle> => {
    sent.push({ target, content, controls });
    return { channelId: target.type === 'channel' ? target.channelId : `dm-${target.userId}`, messageId: `m${nextId++}` };
  });
  const updateControl = vi.fn(async (): Promise<ControlUpdateOutcome> => 'updated');
  const messenger: Messenger = { sendMessage, updateControl };
  return { messenger, sendMessage, updateControl, sent };
}

function makeLog() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function makeService(overrides: Partial<DiscussionServiceOptions> = {}) {
  let tick = 0;
  const store = new DiscussionStore({ now: () => new Date(Date.UTC(2024, 0, 1) + tick++ * 1000) });
  const m = makeMessenger();
  const log = makeLog();
  const metrics = new MetricsRegistry();
  let nowMs = 1_000_000;
  const service = new DiscussionService({
    repo: store,
    messenger: m.messenger,
    channelId: CHANNEL,
    adminIds: [ADMIN],
    mirrorRetryEnabled: false,
    log,
    metrics,
    now: () => nowMs,
    ...overrides,
  });
  const act = (userId: string, action: UserAction) => service.handleUserInput(userId, { type: 'action', action });
  const say = (userId: string, text: string) => service.handleUserInput(userId, { type: 'message', text });
  const advance = (ms: number) => { nowMs += ms; };
  return { service, store, log, metrics, act, say, advance, ...m };
}

type Ctx = ReturnType<typeof makeService>;

function isOutcome<T extends OutcomeEvent['type']>(
  outcome: OutcomeEvent,
  type: T,
): outcome is Extract<OutcomeEvent, { type: T }> {
  return outcome.type === type;
}

function expectType<T extends OutcomeEvent['type']>(
  outcome: OutcomeEvent,
  type: T,
): Extract<OutcomeEvent, { type: T }> {
  expect(outcome.type).toBe(type);
  if (!isOutcome(outcome, type)) throw new Error(`expected ${type}, got ${outcome.type}`);
  return outcome;
}

/** Submit and approve a post; returns its id. */
async function publishPost(ctx: Ctx, authorId: string, text = 'Is this a good idea?'): Promise<number> {
  await ctx.act(authorId, { type: 'chooseCategory', category: 'General' });
  await ctx.say(authorId, text);
  const created = expectType(await ctx.act(authorId, { type: 'confirmPost' }), 'post-created');
  expectType(await ctx.act(ADMIN, { type: 'approvePost', postId: created.post.id }), 'post-approved');
  return created.post.id;
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

describe('defaultDisplayName', () => {
  it('uses the last three digits of a numeric id', () => {
    expect(defaultDisplayName('1001')).toBe('Anonymous1');
    expect(defaultDisplayName('98765')).toBe('Anonymous765');
  });

  it('is stable for non-numeric ids', () => {
    expect(defaultDisplayName('abc')).toBe(defaultDisplayName('abc'));
    expect(defaultDisplayName('abc')).toMatch(/^Anonymous\d{1,3}$/);
  });
});

describe('formatChannelPost', () => {
  it('appends the category tag', () => {
    expect(formatChannelPost({ content: 'Hi', category: 'Advice' })).toBe('Hi\n\n#Advice');
    expect(formatChannelPost({ content: '', category: 'Advice' })).toBe('#Advice');
  });
});

// ---------------------------------------------------------------------------
// End-to-end thread
// ---------------------------------------------------------------------------

describe('DiscussionService: thread', () => {
  let ctx: Ctx;
  beforeEach(() => { ctx = makeService(); });

  it('runs a post through comments, a reply and a reaction', async () => {
    const postId = await publishPost(ctx, ALICE);

    await ctx.act(BOB, { type: 'writeComment', postId });
    const c1 = expectType(await ctx.say(BOB, 'hello'), 'comment-added');
    expect(c1.threadSize).toBe(1);
    expect(c1.comment.parentCommentId).toBeNull();

    const reply = expectType(await ctx.act(ALICE, { type: 'replyTo', postId, commentId: c1.comment.id }), 'awaiting-input');
    expect(reply.preview).toBe('hello');
    const r1 = expectType(await ctx.say(ALICE, 'hi back'), 'comment-added');
    expect(r1.threadSize).toBe(2);
    expect(r1.mirror).toEqual({ status: 'updated', count: 2 });

    const toggled = expectType(
      await ctx.act(BOB, { type: 'toggleReaction', commentId: r1.comment.id, reaction: 'like' }),
      'reaction-toggled',
    );
    expect(toggled.reactions).toEqual({ likes: 1, dislikes: 0 });
    expect(toggled.replyCount).toBe(0);

    const children = await ctx.store.listChildren(postId, c1.comment.id);
    expect(children.map((c) => c.id)).toEqual([r1.comment.id]);
    expect((await ctx.store.getPost(postId))?.commentCount).toBe(2);
    expect(ctx.updateControl).toHaveBeenLastCalledWith(
      { channelId: CHANNEL, messageId: 'm2' },
      [{ label: '\u{1F4AC} Comments (2)', action: { type: 'viewComments', postId, parentCommentId: null, page: 1 } }],
    );
  });

  it('notifies the post author and the parent comment author', async () => {
    const postId = await publishPost(ctx, ALICE);
    ctx.sent.length = 0;

    await ctx.act(BOB, { type: 'writeComment', postId });
    const c1 = expectType(await ctx.say(BOB, 'hello'), 'comment-added');
    await ctx.act(ALICE, { type: 'replyTo', postId, commentId: c1.comment.id });
    await ctx.say(ALICE, 'hi back');

    expect(ctx.sent.map((s) => [s.target, s.content.text])).toEqual([
      [{ type: 'user', userId: ALICE }, '\u{1F4AC} Anonymous2 replied to your post:\n\nhello'],
      [{ type: 'user', userId: BOB }, '\u{1F4AC} Anonymous1 replied to your comment:\n\nhi back'],
    ]);
  });

  it('consumes the pending action once', async () => {
    const postId = await publishPost(ctx, ALICE);
    await ctx.act(BOB, { type: 'writeComment', postId });
    expect((await ctx.say(BOB, 'first')).type).toBe('comment-added');
    expect((await ctx.say(BOB, 'second')).type).toBe('ignored');
    expect(await ctx.store.countComments({ postId })).toBe(1);
  });

  it('keeps the pending action after bad input', async () => {
    const postId = await publishPost(ctx, ALICE);
    await ctx.act(BOB, { type: 'writeComment', postId });
    expect(await ctx.say(BOB, '   ')).toEqual({ type: 'error', code: 'content_empty' });
    expect((await ctx.say(BOB, 'now with text')).type).toBe('comment-added');
  });

  it('refuses to comment on an unpublished post', async () => {
    await ctx.act(ALICE, { type: 'chooseCategory', category: 'General' });
    await ctx.say(ALICE, 'pending question');
    const created = expectType(await ctx.act(ALICE, { type: 'confirmPost' }), 'post-created');
    expect(await ctx.act(BOB, { type: 'writeComment', postId: created.post.id }))
      .toEqual({ type: 'error', code: 'post_not_found' });
  });

  it('rejects a reply target from another post', async () => {
    const p1 = await publishPost(ctx, ALICE, 'one');
    const p2 = await publishPost(ctx, ALICE, 'two');
    await ctx.act(BOB, { type: 'writeComment', postId: p1 });
    const c1 = expectType(await ctx.say(BOB, 'on one'), 'comment-added');
    expect(await ctx.act(BOB, { type: 'replyTo', postId: p2, commentId: c1.comment.id }))
      .toEqual({ type: 'error', code: 'invalid_parent' });
  });

  it('replies to a reply and links it under that reply', async () => {
    const postId = await publishPost(ctx, ALICE);
    await ctx.act(BOB, { type: 'writeComment', postId });
    const c1 = expectType(await ctx.say(BOB, 'top'), 'comment-added');
    await ctx.act(ALICE, { type: 'replyTo', postId, commentId: c1.comment.id });
    const r1 = expectType(await ctx.say(ALICE, 'depth two'), 'comment-added');
    ctx.sent.length = 0;

    const prompt = expectType(await ctx.act(BOB, { type: 'replyTo', postId, commentId: r1.comment.id }), 'awaiting-input');
    expect(prompt.pending).toEqual({ type: 'awaitingComment', postId, parentCommentId: r1.comment.id });
    const r2 = expectType(await ctx.say(BOB, 'depth three'), 'comment-added');

    expect(r2.comment).toMatchObject({ postId, parentCommentId: r1.comment.id, authorId: BOB });
    expect(r2.threadSize).toBe(3);
    expect(r2.mirror).toEqual({ status: 'updated', count: 3 });
    expect((await ctx.store.listChildren(postId, r1.comment.id)).map((c) => c.id)).toEqual([r2.comment.id]);
    expect((await ctx.store.listChildren(postId, c1.comment.id)).map((c) => c.id)).toEqual([r1.comment.id]);
    expect((await ctx.store.getPost(postId))?.commentCount).toBe(3);
    expect(ctx.sent.map((s) => [s.target, s.content.text])).toEqual([
      [{ type: 'user', userId: ALICE }, '\u{1F4AC} Anonymous2 replied to your comment:\n\ndepth three'],
    ]);

    const level = expectType(
      await ctx.act(ALICE, { type: 'viewComments', postId, parentCommentId: r1.comment.id, page: 1 }),
      'thread-page',
    );
    expect(level.entries.map((e) => e.comment.content)).toEqual(['depth three']);
  });

  it('keeps the comment when the mirror update fails', async () => {
    const postId = await publishPost(ctx, ALICE);
    ctx.updateControl.mockRejectedValueOnce(new Error('Service Unavailable'));
    await ctx.act(BOB, { type: 'writeComment', postId });
    const added = expectType(await ctx.say(BOB, 'still here'), 'comment-added');

    expect(added.mirror).toEqual({
      status: 'failed',
      count: 1,
      error: `mirror update failed for post ${postId}: Service Unavailable`,
    });
    expect(added.threadSize).toBe(1);
    expect(await ctx.store.countComments({ postId })).toBe(1);
    expect((await ctx.store.getPost(postId))?.commentCount).toBe(1);
    expect(ctx.metrics.get('mirror.refresh.failed')).toBe(1);
  });

  it('pages a thread with reply counts', async () => {
    const postId = await publishPost(ctx, ALICE);
    await ctx.act(BOB, { type: 'writeComment', postId });
    const c1 = expectType(await ctx.say(BOB, 'first'), 'comment-added');
    await ctx.act(ALICE, { type: 'replyTo', postId, commentId: c1.comment.id });
    await ctx.say(ALICE, 'reply');
    await ctx.act(BOB, { type: 'writeComment', postId });
    await ctx.say(BOB, 'second');

    const page = expectType(
      await ctx.act(BOB, { type: 'viewComments', postId, parentCommentId: null, page: 1 }),
      'thread-page',
    );
    expect(page.entries.map((e) => [e.comment.content, e.replyCount, e.author?.displayName])).toEqual([
      ['second', 0, 'Anonymous2'],
      ['first', 1, 'Anonymous2'],
    ]);
    expect(page).toMatchObject({ page: 1, totalPages: 1, threadSize: 3 });
    expect(await ctx.act(BOB, { type: 'viewComments', postId, parentCommentId: null, page: 2 }))
      .toEqual({ type: 'error', code: 'invalid_page' });
  });
});

// ---------------------------------------------------------------------------
// Posts and moderation
// ---------------------------------------------------------------------------

describe('DiscussionService: posts', () => {
  let ctx: Ctx;
  beforeEach(() => { ctx = makeService(); });

  it('previews, confirms and sends the post to admins', async () => {
    const draft = expectType(await ctx.say(ALICE, 'nothing pending'), 'ignored');
    expect(draft).toEqual({ type: 'ignored', isAdmin: false });

    await ctx.act(ALICE, { type: 'chooseCategory', category: 'Advice' });
    const ready = expectType(await ctx.say(ALICE, '  my question  '), 'draft-ready');
    expect(ready.draft).toMatchObject({ content: 'my question', category: 'Advice' });

    const created = expectType(await ctx.act(ALICE, { type: 'confirmPost' }), 'post-created');
    expect(created.post).toMatchObject({ id: 1, approved: false, category: 'Advice', authorId: ALICE });
    expect(ctx.sent).toEqual([{
      target: { type: 'user', userId: ADMIN },
      content: { text: '\u{1F195} New post #1 awaiting approval from Anonymous1 in #Advice:\n\nmy question' },
      controls: [
        { label: '\u{2705} Approve', action: { type: 'approvePost', postId: 1 } },
        { label: '\u{274C} Reject', action: { type: 'rejectPost', postId: 1 } },
      ],
    }]);
    expect(await ctx.act(ALICE, { type: 'confirmPost' })).toEqual({ type: 'error', code: 'draft_missing' });
  });

  it('rejects an unknown category', async () => {
    expect(await ctx.act(ALICE, { type: 'chooseCategory', category: 'Nope' }))
      .toEqual({ type: 'error', code: 'unknown_category' });
  });

  it('expires an unconfirmed draft', async () => {
    await ctx.act(ALICE, { type: 'chooseCategory', category: 'General' });
    await ctx.say(ALICE, 'slow');
    ctx.advance(5 * 60_000 + 1);
    expect(await ctx.act(ALICE, { type: 'confirmPost' })).toEqual({ type: 'error', code: 'draft_expired' });
    expect(await ctx.store.countPosts()).toBe(0);
  });

  it('goes back to writing on edit and drops the draft on cancel', async () => {
    await ctx.act(ALICE, { type: 'chooseCategory', category: 'General' });
    await ctx.say(ALICE, 'draft text');
    expect(await ctx.act(ALICE, { type: 'editPost' })).toEqual({
      type: 'awaiting-input',
      pending: { type: 'awaitingPost', category: 'General' },
      preview: 'draft text',
    });
    await ctx.say(ALICE, 'better text');
    expect(await ctx.act(ALICE, { type: 'cancelPost' })).toEqual({ type: 'post-cancelled' });
    expect(await ctx.act(ALICE, { type: 'confirmPost' })).toEqual({ type: 'error', code: 'draft_missing' });
  });

  it('publishes to the channel on approval and tells the author', async () => {
    await ctx.act(ALICE, { type: 'chooseCategory', category: 'General' });
    await ctx.say(ALICE, 'body');
    await ctx.act(ALICE, { type: 'confirmPost' });
    ctx.sent.length = 0;

    const approved = expectType(await ctx.act(ADMIN, { type: 'approvePost', postId: 1 }), 'post-approved');
    expect(approved.post).toMatchObject({ approved: true, approvedBy: ADMIN, mirrorHandle: { channelId: CHANNEL, messageId: 'm2' } });
    expect(ctx.sent.map((s) => [s.target, s.content.text])).toEqual([
      [{ type: 'channel', channelId: CHANNEL }, 'body\n\n#General'],
      [{ type: 'user', userId: ALICE }, '\u{2705} Your post has been approved and published!'],
    ]);
    expect(await ctx.act(ADMIN, { type: 'approvePost', postId: 1 })).toEqual({ type: 'error', code: 'already_published' });
    expect(await ctx.act(ADMIN, { type: 'rejectPost', postId: 1 })).toEqual({ type: 'error', code: 'already_published' });
  });

  it('deletes a rejected post', async () => {
    await ctx.act(ALICE, { type: 'chooseCategory', category: 'General' });
    await ctx.say(ALICE, 'body');
    await ctx.act(ALICE, { type: 'confirmPost' });
    expect(await ctx.act(ADMIN, { type: 'rejectPost', postId: 1 })).toEqual({ type: 'post-rejected', postId: 1 });
    expect(await ctx.store.getPost(1)).toBeUndefined();
  });

  it('forbids moderation to non-admins', async () => {
    await ctx.act(ALICE, { type: 'chooseCategory', category: 'General' });
    await ctx.say(ALICE, 'body');
    await ctx.act(ALICE, { type: 'confirmPost' });
    expect(await ctx.act(BOB, { type: 'approvePost', postId: 1 })).toEqual({ type: 'error', code: 'forbidden' });
    expect(await ctx.act(BOB, { type: 'viewStats' })).toEqual({ type: 'error', code: 'forbidden' });
  });

  it('reports board statistics to admins', async () => {
    await publishPost(ctx, ALICE);
    const stats = expectType(await ctx.act(ADMIN, { type: 'viewStats' }), 'stats');
    expect(stats.stats).toEqual({ users: 2, approvedPosts: 1, pendingPosts: 0, comments: 0, privateMessages: 0 });
  });

  it('lists pending posts to admins, oldest first', async () => {
    for (const [author, text] of [[ALICE, 'first'], [BOB, 'second']] as const) {
      await ctx.act(author, { type: 'chooseCategory', category: 'General' });
      await ctx.say(author, text);
      await ctx.act(author, { type: 'confirmPost' });
    }
    const pending = expectType(await ctx.act(ADMIN, { type: 'viewPendingPosts' }), 'pending-posts');
    expect(pending.total).toBe(2);
    expect(pending.entries.map((e) => [e.post.id, e.post.content, e.author?.displayName])).toEqual([
      [1, 'first', 'Anonymous1'],
      [2, 'second', 'Anonymous2'],
    ]);

    await ctx.act(ADMIN, { type: 'approvePost', postId: 1 });
    const after = expectType(await ctx.act(ADMIN, { type: 'viewPendingPosts' }), 'pending-posts');
    expect(after.entries.map((e) => e.post.id)).toEqual([2]);
    expect(await ctx.act(BOB, { type: 'viewPendingPosts' })).toEqual({ type: 'error', code: 'forbidden' });
  });

  it('revokes admin rights removed from the configuration', async () => {
    ctx = makeService({ adminIds: [] });
    await ctx.store.ensureUser({ id: ADMIN, displayName: 'Former admin', isAdmin: true });
    await ctx.act(ALICE, { type: 'chooseCategory', category: 'General' });
    await ctx.say(ALICE, 'body');
    await ctx.act(ALICE, { type: 'confirmPost' });
    expect(ctx.sent).toEqual([]);

    expect(await ctx.act(ADMIN, { type: 'approvePost', postId: 1 })).toEqual({ type: 'error', code: 'forbidden' });
    expect((await ctx.store.getUser(ADMIN))?.isAdmin).toBe(false);
    expect(await ctx.act(ADMIN, { type: 'menu' })).toEqual({ type: 'menu', isAdmin: false });
  });

  it('maps an unexpected failure to internal and logs it', async () => {
    vi.spyOn(ctx.store, 'createPost').mockRejectedValueOnce(new Error('disk gone'));
    await ctx.act(ALICE, { type: 'chooseCategory', category: 'General' });
    await ctx.say(ALICE, 'body');
    expect(await ctx.act(ALICE, { type: 'confirmPost' })).toEqual({ type: 'error', code: 'internal' });
    expect(ctx.log.error).toHaveBeenCalledTimes(1);
    expect(ctx.metrics.get('service.outcome.error')).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Profiles, social and private messages
// ---------------------------------------------------------------------------

describe('DiscussionService: social', () => {
  let ctx: Ctx;
  beforeEach(async () => {
    ctx = makeService();
    await ctx.act(ALICE, { type: 'menu' });
    await ctx.act(BOB, { type: 'menu' });
  });

  it('changes the display name and rejects blank names', async () => {
    await ctx.act(ALICE, { type: 'editName' });
    expect(await ctx.say(ALICE, '   ')).toEqual({ type: 'error', code: 'name_invalid' });
    const changed = expectType(await ctx.say(ALICE, 'Quiet Owl'), 'name-changed');
    expect(changed.user.displayName).toBe('Quiet Owl');
  });

  it('only accepts the offered profile markers', async () => {
    const updated = expectType(await ctx.act(ALICE, { type: 'setSex', sexTag: '\u{1F469}' }), 'profile-updated');
    expect(updated.user.sexTag).toBe('\u{1F469}');
    expect(await ctx.act(ALICE, { type: 'setSex', sexTag: 'x' })).toEqual({ type: 'error', code: 'invalid_option' });
  });

  it('hides a private profile from others', async () => {
    await ctx.act(BOB, { type: 'togglePrivacy' });
    expect(await ctx.act(ALICE, { type: 'viewProfile', targetUserId: BOB })).toEqual({ type: 'error', code: 'forbidden' });
    const own = expectType(await ctx.act(BOB, { type: 'viewProfile' }), 'profile');
    expect(own.profile).toMatchObject({ isSelf: true, score: 0, followers: 0 });
  });

  it('follows idempotently and reports it on the profile', async () => {
    await ctx.act(ALICE, { type: 'follow', targetUserId: BOB });
    expect(await ctx.act(ALICE, { type: 'follow', targetUserId: BOB }))
      .toEqual({ type: 'follow-changed', targetUserId: BOB, following: true });
    const profile = expectType(await ctx.act(ALICE, { type: 'viewProfile', targetUserId: BOB }), 'profile');
    expect(profile.profile).toMatchObject({ followers: 1, viewerFollows: true, isSelf: false });
    expect(await ctx.act(ALICE, { type: 'follow', targetUserId: ALICE })).toEqual({ type: 'error', code: 'self_target' });
  });

  it('delivers a private message and lists it in the inbox', async () => {
    await ctx.act(ALICE, { type: 'composeMessage', targetUserId: BOB });
    const sentOutcome = expectType(await ctx.say(ALICE, 'psst'), 'message-sent');
    expect(sentOutcome.notified).toBe(true);
    expect(ctx.sent[0]).toEqual({
      target: { type: 'user', userId: BOB },
      content: { text: '\u{1F4E9} New private message from Anonymous1:\n\npsst' },
      controls: [
        { label: '\u{1F4AC} Reply', action: { type: 'composeMessage', targetUserId: ALICE } },
        { label: '\u{26D4} Block', action: { type: 'block', targetUserId: ALICE } },
      ],
    });

    const inbox = expectType(await ctx.act(BOB, { type: 'viewInbox', page: 1 }), 'inbox');
    expect(inbox).toMatchObject({ page: 1, totalPages: 1, unread: 1 });
    expect(inbox.entries.map((e) => [e.message.content, e.sender?.id])).toEqual([['psst', ALICE]]);
    expect(expectType(await ctx.act(BOB, { type: 'viewInbox', page: 1 }), 'inbox').unread).toBe(0);
  });

  it('stops messages from a blocked sender', async () => {
    expect(await ctx.act(BOB, { type: 'block', targetUserId: ALICE }))
      .toEqual({ type: 'user-blocked', targetUserId: ALICE, alreadyBlocked: false });
    expect(await ctx.act(ALICE, { type: 'composeMessage', targetUserId: BOB })).toEqual({ type: 'error', code: 'blocked' });
    expect(await ctx.act(BOB, { type: 'block', targetUserId: ALICE }))
      .toEqual({ type: 'user-blocked', targetUserId: ALICE, alreadyBlocked: true });
  });

  it('reports a failed notification without failing the send', async () => {
    ctx.sendMessage.mockRejectedValueOnce(new Error('Cannot send messages to this user'));
    await ctx.act(ALICE, { type: 'composeMessage', targetUserId: BOB });
    const outcome = expectType(await ctx.say(ALICE, 'hi'), 'message-sent');
    expect(outcome.notified).toBe(false);
    expect(ctx.metrics.get('service.delivery.failed')).toBe(1);
    expect(await ctx.store.countInbox(BOB)).toBe(1);
  });

  it('ranks the viewer on the leaderboard', async () => {
    const board = expectType(await ctx.act(BOB, { type: 'viewLeaderboard' }), 'leaderboard');
    expect(board.viewer).toMatchObject({ rank: 2, score: 0 });
    expect(board.entries.map((e) => e.user.id)).toEqual([ALICE, BOB]);
  });

  it('keeps a pending action while the menu is open', async () => {
    await ctx.act(ALICE, { type: 'editName' });
    expect(await ctx.act(ALICE, { type: 'menu' })).toEqual({ type: 'menu', isAdmin: false });
    expect((await ctx.store.getUser(ALICE))?.pendingAction).toEqual({ type: 'awaitingName' });
    const changed = expectType(await ctx.say(ALICE, 'Quiet Owl'), 'name-changed');
    expect(changed.user.displayName).toBe('Quiet Owl');
  });

  it('flags configured admins', async () => {
    expect(await ctx.act(ADMIN, { type: 'menu' })).toEqual({ type: 'menu', isAdmin: true });
    expect((await ctx.store.getUser(ADMIN))?.isAdmin).toBe(true);
    expect(await ctx.say(ADMIN, 'stray text')).toEqual({ type: 'ignored', isAdmin: true });
  });
});
