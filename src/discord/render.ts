import type { UserAction } from '../discussion/actions.js';
import type { ValidationCode } from '../discussion/errors.js';
import type { Control } from '../discussion/messenger.js';
import type { InboxEntry, OutcomeEvent, PendingPostEntry, ProfileView, ThreadEntry } from '../discussion/outcomes.js';
import type { ActivePendingAction } from '../discussion/pending-action.js';
import { formatStars } from '../discussion/rating.js';
import type { CommentRecord, MediaRef, ReactionCounts, UserRecord } from '../discussion/types.js';
import { SEX_TAGS } from '../discussion/types.js';

export type RenderedMessage = {
  content: string;
  controls: Control[];
  media?: MediaRef;
};

const ERROR_TEXT: Record<ValidationCode | 'internal', string> = {
  user_not_found: '❌ User not found.',
  post_not_found: '❌ Post not found.',
  comment_not_found: '❌ Comment not found.',
  invalid_parent: '❌ That comment does not belong to this post.',
  content_empty: '❌ Message is empty. Send text, a photo or a voice message.',
  content_too_long: '❌ Message is too long. Please shorten it and send again.',
  name_invalid: '❌ Name cannot be empty or too long. Please try again.',
  unknown_category: '❌ Unknown category.',
  invalid_option: '❌ That option is not available.',
  draft_missing: '❌ No post is waiting for confirmation.',
  draft_expired: '⌛ Your draft expired. Please write it again.',
  blocked: '⛔ This user does not accept your messages.',
  self_target: '❌ You cannot do that to yourself.',
  forbidden: '🔒 You do not have permission to do this.',
  already_published: 'ℹ️ This post has already been handled.',
  invalid_page: '❌ That page does not exist.',
  reaction_conflict: '⚠️ Too many reactions at once. Please try again.',
  internal: '⚠️ Something went wrong. Please try again later.',
};

const MENU_CONTROL: Control = { label: '🏠 Menu', action: { type: 'menu' } };

function menuControls(isAdmin: boolean): Control[] {
  const controls: Control[] = [
    { label: '🙏 Ask Question', action: { type: 'showCategories' } },
    { label: '👤 My Profile', action: { type: 'viewProfile' } },
    { label: '🏆 Leaderboard', action: { type: 'viewLeaderboard' } },
    { label: '📬 Inbox', action: { type: 'viewInbox', page: 1 } },
  ];
  if (isAdmin) {
    controls.push(
      { label: '⏳ Pending posts', action: { type: 'viewPendingPosts' } },
      { label: '📊 Stats', action: { type: 'viewStats' } },
    );
  }
  return controls;
}

function nameOf(user: Pick<UserRecord, 'displayName' | 'sexTag'> | undefined): string {
  return user ? `${user.sexTag} ${user.displayName}` : '👤 (unknown)';
}

function profileControl(userId: string): Control {
  return { label: '👤 Profile', action: { type: 'viewProfile', targetUserId: userId } };
}

/** Buttons under one comment: reactions, reply, the author's profile, and the reply count when there are replies. */
export function commentEntryControls(comment: CommentRecord, reactions: ReactionCounts, replyCount: number): Control[] {
  const controls: Control[] = [
    { label: `👍 ${reactions.likes}`, action: { type: 'toggleReaction', commentId: comment.id, reaction: 'like' } },
    { label: `👎 ${reactions.dislikes}`, action: { type: 'toggleReaction', commentId: comment.id, reaction: 'dislike' } },
    { label: '↩️ Reply', action: { type: 'replyTo', postId: comment.postId, commentId: comment.id } },
    profileControl(comment.authorId),
  ];
  if (replyCount > 0) {
    controls.push({
      label: `💬 Replies (${replyCount})`,
      action: { type: 'viewComments', postId: comment.postId, parentCommentId: comment.id, page: 1 },
    });
  }
  return controls;
}

function renderEntry(entry: ThreadEntry): RenderedMessage {
  const body = entry.comment.content || (entry.comment.media ? `[${entry.comment.media.type}]` : '');
  return {
    content: `${nameOf(entry.author)}:\n${body}`,
    controls: commentEntryControls(entry.comment, entry.reactions, entry.replyCount),
    ...(entry.comment.media !== undefined && { media: entry.comment.media }),
  };
}

// A post prompt cancels through the draft's own cancel; other prompts stay pending until answered.
function promptControls(pending: ActivePendingAction): Control[] {
  return pending.type === 'awaitingPost'
    ? [{ label: '✖️ Cancel', action: { type: 'cancelPost' } }, MENU_CONTROL]
    : [MENU_CONTROL];
}

function promptFor(pending: ActivePendingAction, preview: string | undefined): string {
  switch (pending.type) {
    case 'awaitingPost':
      return `✍️ Write your post for #${pending.category}. Send text, a photo or a voice message.`;
    case 'awaitingComment':
      return pending.parentCommentId === null
        ? '💬 Write your comment.'
        : `↩️ Write your reply to:\n> ${preview ?? ''}`;
    case 'awaitingPrivateMessage':
      return '✉️ Write your private message.';
    case 'awaitingName':
      return '✏️ Send your new display name.';
  }
}

function renderProfile(profile: ProfileView): RenderedMessage {
  const { user } = profile;
  const lines = [
    `${nameOf(user)}`,
    `🎖 Score: ${profile.score} ${formatStars(profile.score)}`,
    `🏅 Rank: ${profile.rank === undefined ? '-' : `#${profile.rank}`}`,
    `👥 Followers: ${profile.followers}`,
  ];
  if (!profile.isSelf) {
    return {
      content: lines.join('\n'),
      controls: [
        profile.viewerFollows
          ? { label: '➖ Unfollow', action: { type: 'unfollow', targetUserId: user.id } }
          : { label: '➕ Follow', action: { type: 'follow', targetUserId: user.id } },
        { label: '✉️ Message', action: { type: 'composeMessage', targetUserId: user.id } },
        { label: '⛔ Block', action: { type: 'block', targetUserId: user.id } },
        MENU_CONTROL,
      ],
    };
  }
  lines.push(
    `🔔 Notifications: ${user.notificationsEnabled ? 'on' : 'off'}`,
    `🌐 Profile: ${user.privacyPublic ? 'public' : 'private'}`,
  );
  return { content: lines.join('\n'), controls: settingsControls(user) };
}

function settingsControls(user: UserRecord): Control[] {
  return [
    { label: '✏️ Edit name', action: { type: 'editName' } },
    ...SEX_TAGS.map((sexTag): Control => ({ label: sexTag, action: { type: 'setSex', sexTag } })),
    {
      label: user.notificationsEnabled ? '🔕 Mute notifications' : '🔔 Enable notifications',
      action: { type: 'toggleNotifications' },
    },
    {
      label: user.privacyPublic ? '🔒 Make private' : '🌐 Make public',
      action: { type: 'togglePrivacy' },
    },
    MENU_CONTROL,
  ];
}

function renderInboxEntry(entry: InboxEntry): RenderedMessage {
  const { message } = entry;
  const marker = message.read ? '' : '🆕 ';
  return {
    content: `${marker}From ${nameOf(entry.sender)} (${message.createdAt.slice(0, 16).replace('T', ' ')}):\n${message.content}`,
    controls: [
      { label: '↩️ Reply', action: { type: 'composeMessage', targetUserId: message.senderId } },
      profileControl(message.senderId),
      { label: '⛔ Block', action: { type: 'block', targetUserId: message.senderId } },
    ],
  };
}

function renderPendingPost(entry: PendingPostEntry): RenderedMessage {
  const { post } = entry;
  return {
    content: `#${post.id} from ${nameOf(entry.author)} in #${post.category}:\n${post.content}`,
    controls: [
      { label: '✅ Approve', action: { type: 'approvePost', postId: post.id } },
      { label: '❌ Reject', action: { type: 'rejectPost', postId: post.id } },
    ],
    ...(post.media !== undefined && { media: post.media }),
  };
}

function pager(page: number, totalPages: number, to: (page: number) => UserAction): Control[] {
  const controls: Control[] = [];
  if (page > 1) controls.push({ label: '⬅️ Previous', action: to(page - 1) });
  if (page < totalPages) controls.push({ label: 'Next ➡️', action: to(page + 1) });
  return controls;
}

/** Turn one outcome into the messages the user sees, in order. */
export function renderOutcome(outcome: OutcomeEvent): RenderedMessage[] {
  switch (outcome.type) {
    case 'post-created':
      return [{
        content: `✅ Your post #${outcome.post.id} was submitted for review.`,
        controls: [MENU_CONTROL],
      }];

    case 'comment-added':
      return [{
        content: `✅ ${outcome.comment.parentCommentId === null ? 'Comment' : 'Reply'} added. The thread now has ${outcome.threadSize} comments.`,
        controls: [
          {
            label: '💬 View thread',
            action: {
              type: 'viewComments',
              postId: outcome.comment.postId,
              parentCommentId: outcome.comment.parentCommentId,
              page: 1,
            },
          },
          MENU_CONTROL,
        ],
      }];

    case 'reaction-toggled':
      return [{
        content: '',
        controls: commentEntryControls(outcome.comment, outcome.reactions, outcome.replyCount),
      }];

    case 'message-sent':
      return [{ content: '✅ Message sent.', controls: [MENU_CONTROL] }];

    case 'awaiting-input':
      return [{
        content: promptFor(outcome.pending, outcome.preview),
        controls: promptControls(outcome.pending),
      }];

    case 'draft-ready':
      return [{
        content: `📝 Preview (#${outcome.draft.category}):\n\n${outcome.draft.content}`,
        controls: [
          { label: '✅ Submit', action: { type: 'confirmPost' } },
          { label: '✏️ Edit', action: { type: 'editPost' } },
          { label: '❌ Cancel', action: { type: 'cancelPost' } },
        ],
        ...(outcome.draft.media !== undefined && { media: outcome.draft.media }),
      }];

    case 'post-cancelled':
      return [{ content: '🗑️ Post cancelled.', controls: [MENU_CONTROL] }];

    case 'post-approved':
      return [{ content: `✅ Post #${outcome.post.id} published.`, controls: [] }];

    case 'post-rejected':
      return [{ content: `❌ Post #${outcome.postId} rejected and removed.`, controls: [] }];

    case 'name-changed':
      return [{ content: `✅ Name updated to ${outcome.user.displayName}.`, controls: settingsControls(outcome.user) }];

    case 'profile':
      return [renderProfile(outcome.profile)];

    case 'profile-updated':
      return [{
        content: `✅ Profile updated.\n${nameOf(outcome.user)}\n`
          + `🔔 Notifications: ${outcome.user.notificationsEnabled ? 'on' : 'off'}\n`
          + `🌐 Profile: ${outcome.user.privacyPublic ? 'public' : 'private'}`,
        controls: settingsControls(outcome.user),
      }];

    case 'follow-changed':
      return [{
        content: outcome.following ? '✅ You now follow this user.' : '✅ You no longer follow this user.',
        controls: [MENU_CONTROL],
      }];

    case 'user-blocked':
      return [{
        content: outcome.alreadyBlocked ? 'ℹ️ This user is already blocked.' : '⛔ User blocked.',
        controls: [MENU_CONTROL],
      }];

    case 'thread-page': {
      const { post, parentCommentId, page, totalPages } = outcome;
      const writeControl: Control = parentCommentId === null
        ? { label: '✍️ Comment', action: { type: 'writeComment', postId: post.id } }
        : { label: '↩️ Reply', action: { type: 'replyTo', postId: post.id, commentId: parentCommentId } };
      const heading = parentCommentId === null
        ? `💬 Comments on post #${post.id} (${outcome.threadSize} total)`
        : `↩️ Replies on post #${post.id}`;

      if (outcome.entries.length === 0) {
        return [{ content: `${heading}\n\nNo comments yet.`, controls: [writeControl, MENU_CONTROL] }];
      }
      const messages: RenderedMessage[] = [{ content: heading, controls: [] }];
      for (const entry of outcome.entries) messages.push(renderEntry(entry));
      messages.push({
        content: `📄 Page ${page}/${totalPages}`,
        controls: [
          ...pager(page, totalPages, (p) => ({ type: 'viewComments', postId: post.id, parentCommentId, page: p })),
          writeControl,
          MENU_CONTROL,
        ],
      });
      return messages;
    }

    case 'leaderboard': {
      const lines = ['🏆 Leaderboard'];
      if (outcome.entries.length === 0) lines.push('No contributions yet.');
      outcome.entries.forEach((entry, i) => {
        lines.push(`${i + 1}. ${nameOf(entry.user)} - ${entry.score} ${formatStars(entry.score)}`);
      });
      if (outcome.viewer) lines.push('', `You: #${outcome.viewer.rank} with ${outcome.viewer.score}`);
      return [{ content: lines.join('\n'), controls: [MENU_CONTROL] }];
    }

    case 'inbox': {
      const heading = `📬 Inbox (${outcome.unread} unread)`;
      if (outcome.entries.length === 0) {
        return [{ content: `${heading}\n\nNo messages yet.`, controls: [MENU_CONTROL] }];
      }
      const messages: RenderedMessage[] = [{ content: heading, controls: [] }];
      for (const entry of outcome.entries) messages.push(renderInboxEntry(entry));
      messages.push({
        content: `📄 Page ${outcome.page}/${outcome.totalPages}`,
        controls: [
          ...pager(outcome.page, outcome.totalPages, (p) => ({ type: 'viewInbox', page: p })),
          MENU_CONTROL,
        ],
      });
      return messages;
    }

    case 'stats': {
      const s = outcome.stats;
      return [{
        content: [
          '📊 Statistics',
          `👥 Users: ${s.users}`,
          `📝 Published posts: ${s.approvedPosts}`,
          `⏳ Pending posts: ${s.pendingPosts}`,
          `💬 Comments: ${s.comments}`,
          `✉️ Private messages: ${s.privateMessages}`,
        ].join('\n'),
        controls: [MENU_CONTROL],
      }];
    }

    case 'pending-posts': {
      const shown = outcome.entries.length;
      if (shown === 0) {
        return [{ content: '⏳ No posts are waiting for approval.', controls: [MENU_CONTROL] }];
      }
      const heading = shown < outcome.total
        ? `⏳ Pending posts (showing ${shown} of ${outcome.total}, oldest first)`
        : `⏳ Pending posts (${outcome.total})`;
      return [
        { content: heading, controls: [] },
        ...outcome.entries.map(renderPendingPost),
        { content: '', controls: [MENU_CONTROL] },
      ];
    }

    case 'categories':
      return [{
        content: '📚 Choose a category for your question:',
        controls: outcome.categories.map((category): Control => ({
          label: `#${category}`,
          action: { type: 'chooseCategory', category },
        })),
      }];

    case 'menu':
      return [{ content: '🏠 What would you like to do?', controls: menuControls(outcome.isAdmin) }];

    case 'ignored':
      return [{ content: '🏠 What would you like to do?', controls: menuControls(outcome.isAdmin) }];

    case 'error':
      return [{ content: ERROR_TEXT[outcome.code], controls: [MENU_CONTROL] }];
  }
}
