import path from 'node:path';
import { DEFAULT_CATEGORIES } from './discussion/types.js';

export const DEFAULT_DRAFT_TTL_MS = 300_000;
export const DEFAULT_MIRROR_RETRY_DELAY_MS = 30_000;

type ParseResult = {
  config: ThreadlineConfig;
  warnings: string[];
  infos: string[];
};

export type ThreadlineConfig = {
  token: string;
  /** Channel approved posts are published to. */
  channelId: string;
  adminIds: Set<string>;
  dataDir: string;
  categories: string[];

  draftTtlMs: number;
  commentsPageSize: number;
  maxContentChars: number;
  maxNameChars: number;
  leaderboardSize: number;

  mirrorRetryEnabled: boolean;
  mirrorRetryDelayMs: number;
};

function parseBoolean(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean,
): boolean {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new Error(`${name} must be "0"/"1" or "true"/"false", got "${raw}"`);
}

function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  if (!Number.isInteger(n)) {
    throw new Error(`${name} must be an integer, got "${n}"`);
  }
  return n;
}

function parseTrimmedString(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const raw = env[name];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

/** Comma/whitespace separated Discord user ids; anything non-numeric is dropped. */
export function parseUserIds(raw: string | undefined): Set<string> {
  const out = new Set<string>();
  for (const part of String(raw ?? '').split(/[,\s]+/g)) {
    const v = part.trim();
    if (!v) continue;
    if (/^\d+$/.test(v)) out.add(v);
  }
  return out;
}

/** Comma separated category names, de-duplicated, order kept. */
export function parseCategories(raw: string | undefined): string[] {
  const seen = new Set<string>();
  for (const part of String(raw ?? '').split(',')) {
    const v = part.trim().replace(/^#/, '');
    if (v) seen.add(v);
  }
  return [...seen];
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  const token = parseTrimmedString(env, 'DISCORD_TOKEN');
  if (!token) {
    throw new Error('Missing DISCORD_TOKEN');
  }

  const channelId = parseTrimmedString(env, 'THREADLINE_CHANNEL_ID');
  if (!channelId) {
    throw new Error('Missing THREADLINE_CHANNEL_ID');
  }
  if (!/^\d{8,}$/.test(channelId)) {
    throw new Error(`THREADLINE_CHANNEL_ID must be a channel snowflake, got "${channelId}"`);
  }

  const adminIdsRaw = env.THREADLINE_ADMIN_IDS;
  const adminIds = parseUserIds(adminIdsRaw);
  if ((adminIdsRaw ?? '').trim().length > 0 && adminIds.size === 0) {
    warnings.push('THREADLINE_ADMIN_IDS was set but no valid IDs were parsed: posts cannot be approved');
  } else if (adminIds.size === 0) {
    warnings.push('THREADLINE_ADMIN_IDS is empty: posts cannot be approved');
  }

  const dataDir = path.resolve(parseTrimmedString(env, 'THREADLINE_DATA_DIR') ?? './data');

  const categoriesRaw = parseTrimmedString(env, 'THREADLINE_CATEGORIES');
  let categories = parseCategories(categoriesRaw);
  if (categories.length === 0) {
    if (categoriesRaw) warnings.push('THREADLINE_CATEGORIES was set but no categories were parsed; using defaults');
    categories = [...DEFAULT_CATEGORIES];
  } else {
    infos.push(`THREADLINE_CATEGORIES: ${categories.join(', ')}`);
  }

  const draftTtlMs = parsePositiveInt(env, 'THREADLINE_DRAFT_TTL_MS', DEFAULT_DRAFT_TTL_MS);
  const commentsPageSize = parsePositiveInt(env, 'THREADLINE_COMMENTS_PAGE_SIZE', 5);
  const maxContentChars = parsePositiveInt(env, 'THREADLINE_MAX_CONTENT_CHARS', 4000);
  const maxNameChars = parsePositiveInt(env, 'THREADLINE_MAX_NAME_CHARS', 30);
  const leaderboardSize = parsePositiveInt(env, 'THREADLINE_LEADERBOARD_SIZE', 10);

  const mirrorRetryEnabled = parseBoolean(env, 'THREADLINE_MIRROR_RETRY', true);
  const mirrorRetryDelayMs = parsePositiveInt(env, 'THREADLINE_MIRROR_RETRY_DELAY_MS', DEFAULT_MIRROR_RETRY_DELAY_MS);
  if (!mirrorRetryEnabled && env.THREADLINE_MIRROR_RETRY_DELAY_MS) {
    infos.push('THREADLINE_MIRROR_RETRY=0; THREADLINE_MIRROR_RETRY_DELAY_MS is ignored');
  }

  return {
    config: {
      token,
      channelId,
      adminIds,
      dataDir,
      categories,
      draftTtlMs,
      commentsPageSize,
      maxContentChars,
      maxNameChars,
      leaderboardSize,
      mirrorRetryEnabled,
      mirrorRetryDelayMs,
    },
    warnings,
    infos,
  };
}
