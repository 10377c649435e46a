import fs from 'node:fs/promises';
import path from 'node:path';
import type { LoggerLike } from '../logging/logger-like.js';
import { RepositoryError } from './errors.js';
import { defaultDisplayName } from './service.js';
import { TABLE_FILES } from './store.js';
import type { TableName } from './store.js';
import { DEFAULT_SEX_TAG, NO_PENDING_ACTION, isMediaType, isReactionType } from './types.js';
import type {
  BlockRecord,
  CommentRecord,
  FollowRecord,
  MediaRef,
  PendingAction,
  PostRecord,
  PrivateMessageRecord,
  ReactionRecord,
  UserRecord,
} from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One row of the legacy export, keyed by its original column names. */
export type LegacyRow = Record<string, unknown>;

/** Table dump of the legacy database: one array of rows per table. */
export type LegacyExport = {
  users?: LegacyRow[];
  posts?: LegacyRow[];
  comments?: LegacyRow[];
  reactions?: LegacyRow[];
  followers?: LegacyRow[];
  blocks?: LegacyRow[];
  private_messages?: LegacyRow[];
};

export type MigratedTables = {
  users: UserRecord[];
  posts: PostRecord[];
  comments: CommentRecord[];
  reactions: ReactionRecord[];
  follows: FollowRecord[];
  blocks: BlockRecord[];
  messages: PrivateMessageRecord[];
};

export type ConvertOptions = {
  /** Channel the legacy `channel_message_id` values live in. */
  channelId: string;
  /** Timestamp for rows that carry none. */
  now?: () => Date;
};

export type ConvertResult = {
  tables: MigratedTables;
  /** Rows dropped per table: unreadable ids, or references to rows that did not survive. */
  skipped: Record<TableName, number>;
};

export type MigrateOptions = ConvertOptions & {
  /** Path of the legacy JSON export. */
  sourcePath: string;
  /** Store data directory. Existing table files are overwritten. */
  destDir: string;
  log?: LoggerLike;
};

export type MigrateResult = {
  migrated: Record<TableName, number>;
  skipped: Record<TableName, number>;
};

// ---------------------------------------------------------------------------
// Column readers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is LegacyRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function flag(value: unknown, fallback = false): boolean {
  if (value === undefined || value === null) return fallback;
  return value === true || value === 1 || value === 't' || value === 'true' || value === '1';
}

function int(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return Number(value.trim());
  return undefined;
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return undefined;
}

function toIso(value: unknown, fallback: string): string {
  if (typeof value !== 'string' || !value.trim()) return fallback;
  let s = value.trim().replace(' ', 'T');
  // Legacy timestamps were written without a zone and in UTC.
  if (!/(Z|[+-]\d{2}:?\d{2})$/i.test(s)) s += 'Z';
  const d = new Date(s);
  return Number.isNaN(d.getTime()) ? fallback : d.toISOString();
}

function media(type: unknown, ref: unknown): MediaRef | undefined {
  const t = text(type);
  const r = text(ref);
  if (!t || !r || !isMediaType(t)) return undefined;
  return { type: t, ref: r };
}

function positive(value: unknown): number | undefined {
  const n = int(value);
  return n !== undefined && n > 0 ? n : undefined;
}

// ---------------------------------------------------------------------------
// Pending action
// ---------------------------------------------------------------------------

/**
 * Decode the legacy flag columns into one pending action.
 *
 * Several flags may be set at once in old rows. Precedence: post, comment,
 * private message, name. For a comment the deepest set index is the parent
 * (`nested_idx`, then `reply_idx`, then `comment_idx`).
 */
export function pendingActionFromLegacyRow(row: LegacyRow): PendingAction {
  const category = text(row.selected_category);
  if (flag(row.waiting_for_post) && category) {
    return { type: 'awaitingPost', category };
  }

  const postId = positive(row.comment_post_id);
  if (flag(row.waiting_for_comment) && postId !== undefined) {
    const parent = positive(row.nested_idx) ?? positive(row.reply_idx) ?? positive(row.comment_idx);
    return { type: 'awaitingComment', postId, parentCommentId: parent ?? null };
  }

  const target = text(row.private_message_target);
  if (flag(row.waiting_for_private_message) && target) {
    return { type: 'awaitingPrivateMessage', targetUserId: target };
  }

  if (flag(row.awaiting_name)) return { type: 'awaitingName' };
  return NO_PENDING_ACTION;
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

function emptyCounts(): Record<TableName, number> {
  return { users: 0, posts: 0, comments: 0, reactions: 0, follows: 0, blocks: 0, messages: 0 };
}

/** Map a legacy export onto store records. Pure; rows with dangling references are dropped. */
export function convertLegacyExport(data: LegacyExport, opts: ConvertOptions): ConvertResult {
  const now = (opts.now ?? (() => new Date()))().toISOString();
  const skipped = emptyCounts();

  const users: UserRecord[] = [];
  const userIds = new Set<string>();
  for (const row of data.users ?? []) {
    const id = text(row.user_id);
    if (!id || userIds.has(id)) {
      skipped.users++;
      continue;
    }
    userIds.add(id);
    users.push({
      id,
      displayName: text(row.anonymous_name)?.trim() || defaultDisplayName(id),
      sexTag: text(row.sex) || DEFAULT_SEX_TAG,
      notificationsEnabled: flag(row.notifications_enabled, true),
      privacyPublic: flag(row.privacy_public, true),
      isAdmin: flag(row.is_admin),
      pendingAction: pendingActionFromLegacyRow(row),
      createdAt: now,
    });
  }

  const posts: PostRecord[] = [];
  const postIds = new Set<number>();
  for (const row of data.posts ?? []) {
    const id = positive(row.post_id);
    const authorId = text(row.author_id);
    if (id === undefined || !authorId || !userIds.has(authorId) || postIds.has(id)) {
      skipped.posts++;
      continue;
    }
    postIds.add(id);
    const approved = flag(row.approved);
    const messageId = text(row.channel_message_id);
    const attachment = media(row.media_type, row.media_id);
    const approvedBy = text(row.admin_approved_by);
    posts.push({
      id,
      authorId,
      content: text(row.content) ?? '',
      category: text(row.category) || 'Other',
      ...(attachment !== undefined && { media: attachment }),
      createdAt: toIso(row.timestamp, now),
      approved,
      ...(approvedBy ? { approvedBy } : {}),
      ...(approved && messageId ? { mirrorHandle: { channelId: opts.channelId, messageId } } : {}),
      commentCount: Math.max(0, int(row.comment_count) ?? 0),
    });
  }

  // Parents always predate their replies, so one pass in id order resolves the tree.
  const comments: CommentRecord[] = [];
  const commentPost = new Map<number, number>();
  const commentRows = (data.comments ?? [])
    .map((row) => ({ row, id: positive(row.comment_id) }))
    .sort((a, b) => (a.id ?? 0) - (b.id ?? 0));
  for (const { row, id } of commentRows) {
    const postId = positive(row.post_id);
    const authorId = text(row.author_id);
    const parent = positive(row.parent_comment_id) ?? null;
    const parentOk = parent === null || commentPost.get(parent) === postId;
    if (id === undefined || postId === undefined || !authorId || !userIds.has(authorId)
      || commentPost.has(id) || !postIds.has(postId) || !parentOk) {
      skipped.comments++;
      continue;
    }
    commentPost.set(id, postId);
    const attachment = media(row.type, row.file_id);
    comments.push({
      id,
      postId,
      parentCommentId: parent,
      authorId,
      content: text(row.content) ?? '',
      ...(attachment !== undefined && { media: attachment }),
      createdAt: toIso(row.timestamp, now),
    });
  }

  const reactions: ReactionRecord[] = [];
  const reactionPairs = new Set<string>();
  for (const row of data.reactions ?? []) {
    const commentId = positive(row.comment_id);
    const userId = text(row.user_id);
    const type = text(row.type);
    const key = `${commentId}:${userId}`;
    if (commentId === undefined || !userId || !userIds.has(userId) || !type || !isReactionType(type)
      || !commentPost.has(commentId) || reactionPairs.has(key)) {
      skipped.reactions++;
      continue;
    }
    reactionPairs.add(key);
    reactions.push({ commentId, userId, type, createdAt: now });
  }

  const follows: FollowRecord[] = [];
  const followPairs = new Set<string>();
  for (const row of data.followers ?? []) {
    const followerId = text(row.follower_id);
    const followedId = text(row.followed_id);
    const key = `${followerId}:${followedId}`;
    if (!followerId || !followedId || !userIds.has(followerId) || !userIds.has(followedId)
      || followerId === followedId || followPairs.has(key)) {
      skipped.follows++;
      continue;
    }
    followPairs.add(key);
    follows.push({ followerId, followedId, createdAt: now });
  }

  const blocks: BlockRecord[] = [];
  const blockPairs = new Set<string>();
  for (const row of data.blocks ?? []) {
    const blockerId = text(row.blocker_id);
    const blockedId = text(row.blocked_id);
    const key = `${blockerId}:${blockedId}`;
    if (!blockerId || !blockedId || !userIds.has(blockerId) || !userIds.has(blockedId) || blockPairs.has(key)) {
      skipped.blocks++;
      continue;
    }
    blockPairs.add(key);
    blocks.push({ blockerId, blockedId, createdAt: now });
  }

  const messages: PrivateMessageRecord[] = [];
  const messageIds = new Set<number>();
  for (const row of data.private_messages ?? []) {
    const id = positive(row.message_id);
    const senderId = text(row.sender_id);
    const receiverId = text(row.receiver_id);
    if (id === undefined || !senderId || !receiverId || !userIds.has(senderId) || !userIds.has(receiverId)
      || messageIds.has(id)) {
      skipped.messages++;
      continue;
    }
    messageIds.add(id);
    messages.push({
      id,
      senderId,
      receiverId,
      content: text(row.content) ?? '',
      createdAt: toIso(row.timestamp, now),
      read: flag(row.is_read),
    });
  }

  return { tables: { users, posts, comments, reactions, follows, blocks, messages }, skipped };
}

/** Validate the top-level shape of a parsed export. */
export function parseLegacyExport(raw: unknown): LegacyExport {
  if (!isRecord(raw)) throw new RepositoryError('legacy export must be a JSON object');
  const tables: LegacyExport = {};
  const keys = ['users', 'posts', 'comments', 'reactions', 'followers', 'blocks', 'private_messages'] as const;
  for (const key of keys) {
    const value = raw[key];
    if (value === undefined) continue;
    if (!Array.isArray(value)) throw new RepositoryError(`legacy export: "${key}" must be an array`);
    tables[key] = value.filter(isRecord);
  }
  return tables;
}

// ---------------------------------------------------------------------------
// Writer
// ---------------------------------------------------------------------------

/** Write records as JSONL (one JSON object per line), replacing the file. */
export async function writeJsonl(destPath: string, rows: readonly unknown[]): Promise<void> {
  const lines = rows.map((r) => JSON.stringify(r)).join('\n');
  await fs.writeFile(destPath, lines ? lines + '\n' : '', 'utf8');
}

// ---------------------------------------------------------------------------
// Migration entry point
// ---------------------------------------------------------------------------

/**
 * One-shot import: reads the legacy JSON export and writes every table in the
 * store's JSONL layout under `destDir`, so `DiscussionStore.load()` picks it up.
 * Existing table files are replaced.
 */
export async function migrateLegacyExport(opts: MigrateOptions): Promise<MigrateResult> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(opts.sourcePath, 'utf8'));
  } catch (err) {
    throw new RepositoryError(`failed to read legacy export ${opts.sourcePath}`, { cause: err });
  }
  const { tables, skipped } = convertLegacyExport(parseLegacyExport(raw), opts);

  await fs.mkdir(opts.destDir, { recursive: true });
  const migrated = emptyCounts();
  const entries: Array<[TableName, readonly unknown[]]> = [
    ['users', tables.users],
    ['posts', tables.posts],
    ['comments', tables.comments],
    ['reactions', tables.reactions],
    ['follows', tables.follows],
    ['blocks', tables.blocks],
    ['messages', tables.messages],
  ];
  for (const [table, rows] of entries) {
    await writeJsonl(path.join(opts.destDir, TABLE_FILES[table]), rows);
    migrated[table] = rows.length;
  }

  if (tables.users.length === 0) {
    opts.log?.warn({ sourcePath: opts.sourcePath }, 'migrate:export has zero users; check the source file');
  }
  opts.log?.info({ migrated, skipped }, 'migrate:done');
  return { migrated, skipped };
}
