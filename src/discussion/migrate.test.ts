import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RepositoryError } from './errors.js';
import {
  convertLegacyExport,
  migrateLegacyExport,
  parseLegacyExport,
  pendingActionFromLegacyRow,
} from './migrate.js';
import type { LegacyExport } from './migrate.js';
import { DiscussionStore } from './store.js';

const NOW = new Date('2024-06-01T00:00:00.000Z');
const CHANNEL = '123456789012';

function makeExport(): LegacyExport {
  return {
    users: [
      { user_id: 1001, anonymous_name: ' Night Owl ', sex: '\u{1F469}', notifications_enabled: 0, privacy_public: 1, is_admin: 0 },
      { user_id: 1002, anonymous_name: null, waiting_for_comment: 1, comment_post_id: 1, comment_idx: 1, reply_idx: 2 },
    ],
    posts: [
      { post_id: 1, author_id: 1001, content: 'First', category: 'Advice', timestamp: '2023-02-01 10:00:00', approved: 1, channel_message_id: 555, comment_count: 2 },
      { post_id: 2, author_id: 1002, content: 'Pending', category: null, approved: 0, channel_message_id: 556 },
    ],
    comments: [
      { comment_id: 2, post_id: 1, parent_comment_id: 1, author_id: 1001, content: 'reply' },
      { comment_id: 1, post_id: 1, parent_comment_id: 0, author_id: 1002, content: 'top', type: 'photo', file_id: 'file-a' },
      { comment_id: 3, post_id: 2, parent_comment_id: 1, author_id: 1002, content: 'wrong post parent' },
      { comment_id: 4, post_id: 9, parent_comment_id: 0, author_id: 1002, content: 'no such post' },
    ],
    reactions: [
      { comment_id: 1, user_id: 1001, type: 'like' },
      { comment_id: 1, user_id: 1001, type: 'dislike' },
      { comment_id: 4, user_id: 1001, type: 'like' },
      { comment_id: 2, user_id: 1002, type: 'love' },
    ],
    followers: [
      { follower_id: 1002, followed_id: 1001 },
      { follower_id: 1001, followed_id: 1001 },
    ],
    blocks: [{ blocker_id: 1001, blocked_id: 1002 }],
    private_messages: [
      { message_id: 7, sender_id: 1001, receiver_id: 1002, content: 'hey', timestamp: '2023-02-02 08:30:00', is_read: 't' },
    ],
  };
}

// ---------------------------------------------------------------------------
// pendingActionFromLegacyRow
// ---------------------------------------------------------------------------

describe('pendingActionFromLegacyRow', () => {
  it('prefers a post over every other flag', () => {
    expect(pendingActionFromLegacyRow({
      waiting_for_post: 1, selected_category: 'Health', waiting_for_comment: 1, comment_post_id: 3, awaiting_name: 1,
    })).toEqual({ type: 'awaitingPost', category: 'Health' });
  });

  it('takes the deepest comment index as the parent', () => {
    expect(pendingActionFromLegacyRow({
      waiting_for_comment: true, comment_post_id: 3, comment_idx: 4, reply_idx: 5, nested_idx: 6,
    })).toEqual({ type: 'awaitingComment', postId: 3, parentCommentId: 6 });
    expect(pendingActionFromLegacyRow({ waiting_for_comment: 1, comment_post_id: 3 }))
      .toEqual({ type: 'awaitingComment', postId: 3, parentCommentId: null });
  });

  it('reads private message and name states', () => {
    expect(pendingActionFromLegacyRow({ waiting_for_private_message: 1, private_message_target: 42 }))
      .toEqual({ type: 'awaitingPrivateMessage', targetUserId: '42' });
    expect(pendingActionFromLegacyRow({ awaiting_name: 'true' })).toEqual({ type: 'awaitingName' });
  });

  it('ignores a flag without its payload', () => {
    expect(pendingActionFromLegacyRow({ waiting_for_post: 1 })).toEqual({ type: 'none' });
    expect(pendingActionFromLegacyRow({})).toEqual({ type: 'none' });
  });
});

// ---------------------------------------------------------------------------
// convertLegacyExport
// ---------------------------------------------------------------------------

describe('convertLegacyExport', () => {
  const { tables, skipped } = convertLegacyExport(makeExport(), { channelId: CHANNEL, now: () => NOW });

  it('maps users with defaults', () => {
    expect(tables.users).toEqual([
      {
        id: '1001', displayName: 'Night Owl', sexTag: '\u{1F469}', notificationsEnabled: false, privacyPublic: true,
        isAdmin: false, pendingAction: { type: 'none' }, createdAt: NOW.toISOString(),
      },
      {
        id: '1002', displayName: 'Anonymous2', sexTag: '\u{1F464}', notificationsEnabled: true, privacyPublic: true,
        isAdmin: false, pendingAction: { type: 'awaitingComment', postId: 1, parentCommentId: 2 }, createdAt: NOW.toISOString(),
      },
    ]);
  });

  it('sets the mirror handle only on approved posts', () => {
    expect(tables.posts[0]).toMatchObject({
      id: 1, category: 'Advice', createdAt: '2023-02-01T10:00:00.000Z', approved: true,
      mirrorHandle: { channelId: CHANNEL, messageId: '555' }, commentCount: 2,
    });
    expect(tables.posts[1]).toMatchObject({ id: 2, category: 'Other', approved: false });
    expect(tables.posts[1]?.mirrorHandle).toBeUndefined();
  });

  it('keeps comments whose parent belongs to the same post', () => {
    expect(tables.comments.map((c) => [c.id, c.parentCommentId])).toEqual([[1, null], [2, 1]]);
    expect(tables.comments[0]?.media).toEqual({ type: 'photo', ref: 'file-a' });
    expect(skipped.comments).toBe(2);
  });

  it('drops invalid, duplicate and orphaned relations', () => {
    expect(tables.reactions.map((r) => [r.commentId, r.userId, r.type])).toEqual([[1, '1001', 'like']]);
    expect(skipped.reactions).toBe(3);
    expect(tables.follows.map((f) => [f.followerId, f.followedId])).toEqual([['1002', '1001']]);
    expect(skipped.follows).toBe(1);
    expect(tables.blocks).toHaveLength(1);
  });

  it('drops rows that reference users missing from the export', () => {
    const ghosts = convertLegacyExport({
      users: [{ user_id: 1 }],
      posts: [{ post_id: 1, author_id: 1, approved: 1 }, { post_id: 2, author_id: 77 }],
      comments: [
        { comment_id: 1, post_id: 1, parent_comment_id: 0, author_id: 1, content: 'kept' },
        { comment_id: 2, post_id: 1, parent_comment_id: 0, author_id: 88, content: 'ghost' },
      ],
      reactions: [{ comment_id: 1, user_id: 99, type: 'like' }],
      followers: [{ follower_id: 1, followed_id: 66 }, { follower_id: 66, followed_id: 1 }],
      blocks: [{ blocker_id: 55, blocked_id: 1 }],
      private_messages: [{ message_id: 1, sender_id: 1, receiver_id: 44, content: 'x' }],
    }, { channelId: CHANNEL, now: () => NOW });

    expect(ghosts.tables.posts.map((p) => p.id)).toEqual([1]);
    expect(ghosts.tables.comments.map((c) => c.id)).toEqual([1]);
    expect(ghosts.tables.reactions).toEqual([]);
    expect(ghosts.tables.follows).toEqual([]);
    expect(ghosts.tables.blocks).toEqual([]);
    expect(ghosts.tables.messages).toEqual([]);
    expect(ghosts.skipped).toEqual({ users: 0, posts: 1, comments: 1, reactions: 1, follows: 2, blocks: 1, messages: 1 });
  });

  it('maps private messages with their read state', () => {
    expect(tables.messages).toEqual([{
      id: 7, senderId: '1001', receiverId: '1002', content: 'hey', createdAt: '2023-02-02T08:30:00.000Z', read: true,
    }]);
  });
});

describe('parseLegacyExport', () => {
  it('rejects non-object input and non-array tables', () => {
    expect(() => parseLegacyExport([])).toThrow(RepositoryError);
    expect(() => parseLegacyExport({ users: {} })).toThrow('legacy export: "users" must be an array');
  });

  it('drops non-object rows', () => {
    expect(parseLegacyExport({ users: [1, { user_id: 5 }] })).toEqual({ users: [{ user_id: 5 }] });
  });
});

// ---------------------------------------------------------------------------
// migrateLegacyExport
// ---------------------------------------------------------------------------

describe('migrateLegacyExport', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'threadline-migrate-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('writes tables the store can load', async () => {
    const sourcePath = path.join(tmpDir, 'export.json');
    await fs.writeFile(sourcePath, JSON.stringify(makeExport()), 'utf8');
    const destDir = path.join(tmpDir, 'data');

    const result = await migrateLegacyExport({ sourcePath, destDir, channelId: CHANNEL, now: () => NOW });
    expect(result.migrated).toEqual({ users: 2, posts: 2, comments: 2, reactions: 1, follows: 1, blocks: 1, messages: 1 });

    const store = new DiscussionStore({ dataDir: destDir });
    await store.load();
    expect((await store.listChildren(1, 1)).map((c) => c.content)).toEqual(['reply']);
    expect(await store.countReactions(1)).toEqual({ likes: 1, dislikes: 0 });
    expect(await store.isBlocked('1001', '1002')).toBe(true);
    expect((await store.getUser('1002'))?.pendingAction).toEqual({ type: 'awaitingComment', postId: 1, parentCommentId: 2 });
  });

  it('warns on an export without users', async () => {
    const sourcePath = path.join(tmpDir, 'empty.json');
    await fs.writeFile(sourcePath, '{}', 'utf8');
    const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    await migrateLegacyExport({ sourcePath, destDir: tmpDir, channelId: CHANNEL, log });
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it('wraps an unreadable source', async () => {
    await expect(migrateLegacyExport({ sourcePath: path.join(tmpDir, 'missing.json'), destDir: tmpDir, channelId: CHANNEL }))
      .rejects.toThrow(`failed to read legacy export ${path.join(tmpDir, 'missing.json')}`);
  });
});
