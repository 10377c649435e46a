import type { MediaRef, ReactionType } from './types.js';

// ---------------------------------------------------------------------------
// Inbound user actions (button presses, menu picks)
// ---------------------------------------------------------------------------

export type UserAction =
  // Transitions into a pending action
  | { type: 'chooseCategory'; category: string }
  | { type: 'writeComment'; postId: number }
  | { type: 'replyTo'; postId: number; commentId: number }
  | { type: 'editName' }
  | { type: 'composeMessage'; targetUserId: string }
  // Post draft confirmation
  | { type: 'confirmPost' }
  | { type: 'editPost' }
  | { type: 'cancelPost' }
  // Thread mutations
  | { type: 'toggleReaction'; commentId: number; reaction: ReactionType }
  // Profile and social
  | { type: 'setSex'; sexTag: string }
  | { type: 'toggleNotifications' }
  | { type: 'togglePrivacy' }
  | { type: 'follow'; targetUserId: string }
  | { type: 'unfollow'; targetUserId: string }
  | { type: 'block'; targetUserId: string }
  // Moderation
  | { type: 'approvePost'; postId: number }
  | { type: 'rejectPost'; postId: number }
  | { type: 'viewPendingPosts' }
  // Views
  | { type: 'viewComments'; postId: number; parentCommentId: number | null; page: number }
  | { type: 'viewProfile'; targetUserId?: string }
  | { type: 'viewLeaderboard' }
  | { type: 'viewInbox'; page: number }
  | { type: 'viewStats' }
  | { type: 'showCategories' }
  | { type: 'menu' };

export type UserActionType = UserAction['type'];

const USER_ACTION_TYPE_MAP: Record<UserActionType, true> = {
  chooseCategory: true,
  writeComment: true,
  replyTo: true,
  editName: true,
  composeMessage: true,
  confirmPost: true,
  editPost: true,
  cancelPost: true,
  toggleReaction: true,
  setSex: true,
  toggleNotifications: true,
  togglePrivacy: true,
  follow: true,
  unfollow: true,
  block: true,
  approvePost: true,
  rejectPost: true,
  viewPendingPosts: true,
  viewComments: true,
  viewProfile: true,
  viewLeaderboard: true,
  viewInbox: true,
  viewStats: true,
  showCategories: true,
  menu: true,
};

export const USER_ACTION_TYPES = new Set<string>(Object.keys(USER_ACTION_TYPE_MAP));

export function isUserActionType(type: string): type is UserActionType {
  return USER_ACTION_TYPES.has(type);
}

/** One inbound event: a structured action, or a free-form message interpreted against the pending action. */
export type UserInput =
  | { type: 'action'; action: UserAction }
  | { type: 'message'; text?: string; media?: MediaRef };
