import type { LoggerLike } from '../logging/logger-like.js';
import { RepositoryError, ValidationError } from './errors.js';
import type { Repository } from './repository.js';
import { NO_PENDING_ACTION } from './types.js';
import type { PendingAction } from './types.js';

export type ActivePendingAction = Exclude<PendingAction, { type: 'none' }>;

export type ConversationStateMachineOptions = {
  repo: Repository;
  /** Attempts for a compare-and-swap loop before giving up. Default 5. */
  maxCasAttempts?: number;
  log?: LoggerLike;
};

/**
 * Per-user single-slot state describing what the next free-text message means.
 * The slot lives on the user row so it survives restarts.
 *
 * Starting an action overwrites whatever was pending (last action wins).
 * Consuming it is a compare-and-swap back to `none`, so of two messages racing
 * for the same pending action only one can claim it.
 */
export class ConversationStateMachine {
  private readonly repo: Repository;
  private readonly maxCasAttempts: number;
  private readonly log: LoggerLike | undefined;

  constructor(opts: ConversationStateMachineOptions) {
    this.repo = opts.repo;
    this.maxCasAttempts = opts.maxCasAttempts ?? 5;
    this.log = opts.log;
  }

  async current(userId: string): Promise<PendingAction> {
    const user = await this.repo.getUser(userId);
    return user?.pendingAction ?? NO_PENDING_ACTION;
  }

  /** Enter an awaiting state. Returns whatever was overwritten. */
  async begin(userId: string, next: ActivePendingAction): Promise<PendingAction> {
    if (!(await this.repo.getUser(userId))) throw new ValidationError('user_not_found');
    const prev = await this.swap(userId, () => next);
    if (prev.type !== 'none') {
      this.log?.info({ userId, from: prev.type, to: next.type }, 'pending:overwritten');
    }
    return prev;
  }

  /** Atomically claim the pending action, leaving `none` behind. */
  async take(userId: string): Promise<PendingAction> {
    return this.swap(userId, () => NO_PENDING_ACTION);
  }

  /** Drop any pending action. */
  async cancel(userId: string): Promise<PendingAction> {
    return this.take(userId);
  }

  /**
   * Put a claimed action back, but only if nothing else was started since.
   * Returns false when the slot is no longer empty.
   */
  async restore(userId: string, action: ActivePendingAction): Promise<boolean> {
    return this.repo.compareAndSetPendingAction(userId, NO_PENDING_ACTION, action);
  }

  private async swap(
    userId: string,
    next: (prev: PendingAction) => PendingAction,
  ): Promise<PendingAction> {
    for (let attempt = 0; attempt < this.maxCasAttempts; attempt++) {
      const user = await this.repo.getUser(userId);
      if (!user) return NO_PENDING_ACTION;
      const prev = user.pendingAction;
      if (await this.repo.compareAndSetPendingAction(userId, prev, next(prev))) {
        return prev;
      }
    }
    throw new RepositoryError(`pending action for ${userId} kept changing; gave up after ${this.maxCasAttempts} attempts`);
  }
}
