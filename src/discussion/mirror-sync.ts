import type { LoggerLike } from '../logging/logger-like.js';
import { globalMetrics, type CounterSink } from '../observability/metrics.js';
import type { CommentTree } from './comment-tree.js';
import { ExternalMirrorError } from './errors.js';
import { commentControls, isNotModifiedError } from './messenger.js';
import type { Control, Messenger } from './messenger.js';
import type { Repository } from './repository.js';

export type MirrorRefreshResult =
  | { status: 'skipped'; reason: 'post_not_found' | 'not_published' }
  | { status: 'updated'; count: number }
  | { status: 'unchanged'; count: number }
  | { status: 'failed'; count?: number; error: string };

export type MirrorSyncOptions = {
  repo: Repository;
  tree: CommentTree;
  messenger: Messenger;
  log?: LoggerLike;
  metrics?: CounterSink;
  /** Build the controls for a post's mirrored message. Default: a single "Comments (N)" button. */
  buildControls?: (postId: number, count: number) => Control[];
  enableFailureRetry?: boolean;
  failureRetryDelayMs?: number;
};

export function classifyMirrorError(message?: string): string {
  const msg = String(message ?? '').toLowerCase();
  if (!msg) return 'unknown';
  if (msg.includes('unknown message')) return 'message_deleted';
  if (msg.includes('missing permissions') || msg.includes('missing access')) return 'discord_permissions';
  if (msg.includes('rate limit')) return 'rate_limited';
  if (msg.includes('timed out') || msg.includes('timeout')) return 'timeout';
  return 'other';
}

/** Error classes a later attempt cannot fix: the message is gone or the bot lost access. */
export const PERMANENT_MIRROR_ERROR_CLASSES: ReadonlySet<string> = new Set(['message_deleted', 'discord_permissions']);

/**
 * Keeps the comment counter on a published post's channel message in line
 * with the live thread.
 *
 * `refresh` always pushes the freshly recomputed count, so concurrent refreshes
 * for the same post are safe: whichever lands last carries the current value.
 * A failure is reported in the result and never undoes the thread write that
 * triggered it; one background retry per post is scheduled instead, unless
 * the error class is permanent.
 */
export class MirrorSync {
  private readonly retryTimeouts = new Map<number, ReturnType<typeof setTimeout>>();

  constructor(private readonly opts: MirrorSyncOptions) {}

  async refresh(postId: number): Promise<MirrorRefreshResult> {
    const metrics = this.opts.metrics ?? globalMetrics;
    let count: number | undefined;
    try {
      const post = await this.opts.repo.getPost(postId);
      if (!post) {
        metrics.increment('mirror.refresh.skipped');
        return { status: 'skipped', reason: 'post_not_found' };
      }
      if (!post.mirrorHandle) {
        metrics.increment('mirror.refresh.skipped');
        return { status: 'skipped', reason: 'not_published' };
      }

      count = await this.opts.tree.countDescendants({ postId });
      await this.opts.repo.setCommentCount(postId, count);

      const controls = (this.opts.buildControls ?? commentControls)(postId, count);
      const outcome = await this.opts.messenger.updateControl(post.mirrorHandle, controls);
      metrics.increment(`mirror.refresh.${outcome}`);
      this.cancelRetry(postId, metrics);
      return { status: outcome, count };
    } catch (err) {
      if (count !== undefined && isNotModifiedError(err)) {
        metrics.increment('mirror.refresh.unchanged');
        this.cancelRetry(postId, metrics);
        return { status: 'unchanged', count };
      }
      const mirrorErr = new ExternalMirrorError(postId, { cause: err });
      const errorClass = classifyMirrorError(mirrorErr.message);
      metrics.increment('mirror.refresh.failed');
      metrics.increment(`mirror.refresh.error_class.${errorClass}`);
      this.opts.log?.warn({ err: mirrorErr, postId, count, errorClass }, 'mirror:refresh failed');
      if (PERMANENT_MIRROR_ERROR_CLASSES.has(errorClass)) {
        this.cancelRetry(postId, metrics);
        metrics.increment('mirror.retry.abandoned');
      } else {
        this.scheduleRetry(postId, metrics);
      }
      return { status: 'failed', ...(count !== undefined && { count }), error: mirrorErr.message };
    }
  }

  /** Post ids with a background retry pending. */
  pendingRetries(): number[] {
    return [...this.retryTimeouts.keys()];
  }

  /** Cancel every pending background retry. */
  dispose(): void {
    for (const timeout of this.retryTimeouts.values()) clearTimeout(timeout);
    this.retryTimeouts.clear();
  }

  private scheduleRetry(postId: number, metrics: CounterSink): void {
    if (this.opts.enableFailureRetry === false) {
      metrics.increment('mirror.retry.disabled');
      return;
    }
    if (this.retryTimeouts.has(postId)) {
      metrics.increment('mirror.retry.coalesced');
      return;
    }

    const delayMs = this.opts.failureRetryDelayMs ?? 30_000;
    metrics.increment('mirror.retry.scheduled');
    this.opts.log?.info({ postId, delayMs }, 'mirror:scheduling retry after refresh failure');

    const timeout = setTimeout(() => {
      this.retryTimeouts.delete(postId);
      metrics.increment('mirror.retry.triggered');
      this.refresh(postId)
        .then((result) => {
          // A failed retry schedules its own follow-up through refresh().
          if (result.status !== 'failed') metrics.increment('mirror.retry.succeeded');
        })
        .catch((err) => {
          metrics.increment('mirror.retry.errored');
          this.opts.log?.warn({ err, postId }, 'mirror:retry errored');
        });
    }, delayMs);
    timeout.unref?.();
    this.retryTimeouts.set(postId, timeout);
  }

  private cancelRetry(postId: number, metrics: CounterSink): void {
    const timeout = this.retryTimeouts.get(postId);
    if (!timeout) return;
    clearTimeout(timeout);
    this.retryTimeouts.delete(postId);
    metrics.increment('mirror.retry.canceled');
  }
}
