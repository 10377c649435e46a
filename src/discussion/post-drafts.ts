import type { MediaRef } from './types.js';

export const DEFAULT_DRAFT_TTL_MS = 5 * 60_000;

export type PostDraft = {
  content: string;
  category: string;
  media?: MediaRef;
  createdAtMs: number;
};

export type DraftLookup =
  | { status: 'missing' }
  | { status: 'expired'; draft: PostDraft }
  | { status: 'ready'; draft: PostDraft };

export type PostDraftBookOptions = {
  ttlMs?: number;
  now?: () => number;
};

/**
 * Post drafts awaiting the author's confirmation.
 *
 * Held in memory only: a restart between preview and confirm loses the draft
 * and the author has to write it again.
 */
export class PostDraftBook {
  private readonly drafts = new Map<string, PostDraft>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: PostDraftBookOptions = {}) {
    this.ttlMs = opts.ttlMs ?? DEFAULT_DRAFT_TTL_MS;
    this.now = opts.now ?? Date.now;
  }

  /** Store (or replace) the user's draft. */
  put(userId: string, draft: Omit<PostDraft, 'createdAtMs'>): PostDraft {
    const stored: PostDraft = { ...draft, createdAtMs: this.now() };
    this.drafts.set(userId, stored);
    return stored;
  }

  /** Look up the draft; an expired one is discarded as part of the lookup. */
  inspect(userId: string): DraftLookup {
    const draft = this.drafts.get(userId);
    if (!draft) return { status: 'missing' };
    if (this.now() - draft.createdAtMs > this.ttlMs) {
      this.drafts.delete(userId);
      return { status: 'expired', draft };
    }
    return { status: 'ready', draft };
  }

  discard(userId: string): boolean {
    return this.drafts.delete(userId);
  }

  /** Drop every expired draft. Returns how many were removed. */
  sweep(): number {
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;
    for (const [userId, draft] of this.drafts) {
      if (draft.createdAtMs < cutoff) {
        this.drafts.delete(userId);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.drafts.size;
  }
}
