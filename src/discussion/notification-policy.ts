import type { Repository } from './repository.js';

export type NotificationEvent =
  | { type: 'reply'; actorId: string; postId: number; commentId: number }
  | { type: 'privateMessage'; actorId: string; messageId: number };

export type NotificationPolicy = {
  shouldNotify(targetUserId: string, event: NotificationEvent): Promise<boolean>;
};

/**
 * Reads the target's own flags: notifications on, actor not blocked, and
 * not notifying someone about their own action.
 */
export function createPreferenceNotificationPolicy(repo: Repository): NotificationPolicy {
  return {
    async shouldNotify(targetUserId, event) {
      if (targetUserId === event.actorId) return false;
      const target = await repo.getUser(targetUserId);
      if (!target || !target.notificationsEnabled) return false;
      return !(await repo.isBlocked(targetUserId, event.actorId));
    },
  };
}
