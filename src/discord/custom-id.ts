import type { UserAction } from '../discussion/actions.js';
import { isUserActionType } from '../discussion/actions.js';
import { isReactionType } from '../discussion/types.js';

/** Discord rejects button custom ids longer than this. */
export const CUSTOM_ID_MAX_LENGTH = 100;

const PREFIX = 'tl';
const SEP = ':';

function arg(value: string): string {
  return encodeURIComponent(value);
}

/**
 * Button custom id for an action: `tl:<type>[:<arg>...]`. Free-form string
 * arguments are URI-encoded so they cannot contain the separator.
 */
export function encodeAction(action: UserAction): string {
  let args: Array<string | number>;
  switch (action.type) {
    case 'chooseCategory':
      args = [arg(action.category)];
      break;
    case 'writeComment':
    case 'approvePost':
    case 'rejectPost':
      args = [action.postId];
      break;
    case 'replyTo':
      args = [action.postId, action.commentId];
      break;
    case 'composeMessage':
    case 'follow':
    case 'unfollow':
    case 'block':
      args = [arg(action.targetUserId)];
      break;
    case 'toggleReaction':
      args = [action.commentId, action.reaction];
      break;
    case 'setSex':
      args = [arg(action.sexTag)];
      break;
    case 'viewComments':
      args = [action.postId, action.parentCommentId ?? '', action.page];
      break;
    case 'viewProfile':
      args = [arg(action.targetUserId ?? '')];
      break;
    case 'viewInbox':
      args = [action.page];
      break;
    case 'editName':
    case 'confirmPost':
    case 'editPost':
    case 'cancelPost':
    case 'toggleNotifications':
    case 'togglePrivacy':
    case 'viewLeaderboard':
    case 'viewStats':
    case 'viewPendingPosts':
    case 'showCategories':
    case 'menu':
      args = [];
      break;
  }
  const id = [PREFIX, action.type, ...args].join(SEP);
  if (id.length > CUSTOM_ID_MAX_LENGTH) {
    throw new Error(`custom id for ${action.type} exceeds ${CUSTOM_ID_MAX_LENGTH} characters`);
  }
  return id;
}

function positiveInt(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\d+$/.test(raw)) return undefined;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}

function decodeArg(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  try {
    return decodeURIComponent(raw);
  } catch {
    return undefined;
  }
}

/** Inverse of `encodeAction`. Returns undefined for foreign or malformed ids. */
export function decodeAction(customId: string): UserAction | undefined {
  const [prefix, type, ...args] = customId.split(SEP);
  if (prefix !== PREFIX || type === undefined || !isUserActionType(type)) return undefined;

  switch (type) {
    case 'chooseCategory': {
      const category = decodeArg(args[0]);
      return category ? { type, category } : undefined;
    }
    case 'writeComment':
    case 'approvePost':
    case 'rejectPost': {
      const postId = positiveInt(args[0]);
      return postId === undefined ? undefined : { type, postId };
    }
    case 'replyTo': {
      const postId = positiveInt(args[0]);
      const commentId = positiveInt(args[1]);
      return postId === undefined || commentId === undefined ? undefined : { type, postId, commentId };
    }
    case 'composeMessage':
    case 'follow':
    case 'unfollow':
    case 'block': {
      const targetUserId = decodeArg(args[0]);
      return targetUserId ? { type, targetUserId } : undefined;
    }
    case 'toggleReaction': {
      const commentId = positiveInt(args[0]);
      const reaction = args[1];
      if (commentId === undefined || reaction === undefined || !isReactionType(reaction)) return undefined;
      return { type, commentId, reaction };
    }
    case 'setSex': {
      const sexTag = decodeArg(args[0]);
      return sexTag ? { type, sexTag } : undefined;
    }
    case 'viewComments': {
      const postId = positiveInt(args[0]);
      const page = positiveInt(args[2]);
      if (postId === undefined || page === undefined) return undefined;
      if (args[1] === '') return { type, postId, parentCommentId: null, page };
      const parentCommentId = positiveInt(args[1]);
      return parentCommentId === undefined ? undefined : { type, postId, parentCommentId, page };
    }
    case 'viewProfile': {
      const targetUserId = decodeArg(args[0]);
      return targetUserId ? { type, targetUserId } : { type };
    }
    case 'viewInbox': {
      const page = positiveInt(args[0]);
      return page === undefined ? undefined : { type, page };
    }
    case 'editName':
    case 'confirmPost':
    case 'editPost':
    case 'cancelPost':
    case 'toggleNotifications':
    case 'togglePrivacy':
    case 'viewLeaderboard':
    case 'viewStats':
    case 'viewPendingPosts':
    case 'showCategories':
    case 'menu':
      return { type };
  }
}
