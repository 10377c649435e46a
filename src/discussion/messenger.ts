import type { UserAction } from './actions.js';
import type { MediaRef, MessageHandle } from './types.js';

// ---------------------------------------------------------------------------
// Messenger collaborator contract
// ---------------------------------------------------------------------------

export type MessageTarget =
  | { type: 'channel'; channelId: string }
  | { type: 'user'; userId: string };

export type MessageContent = {
  text: string;
  media?: MediaRef;
};

/** A button on an outgoing message: either triggers an action or opens a link. */
export type Control =
  | { label: string; action: UserAction }
  | { label: string; url: string };

export type ControlUpdateOutcome = 'updated' | 'unchanged';

/**
 * Outbound side of the chat transport. Delivery is never assumed; callers
 * handle rejections. `updateControl` must be idempotent and report a no-op as
 * `'unchanged'` (or throw an error `isNotModifiedError` recognises) rather
 * than as a hard failure.
 */
export type Messenger = {
  sendMessage(target: MessageTarget, content: MessageContent, controls: Control[]): Promise<MessageHandle>;
  updateControl(handle: MessageHandle, controls: Control[]): Promise<ControlUpdateOutcome>;
};

/** Thrown by a messenger whose platform rejects an edit that changes nothing. */
export class ControlUnchangedError extends Error {
  constructor(message = 'message is not modified') {
    super(message);
    this.name = 'ControlUnchangedError';
  }
}

export function isNotModifiedError(err: unknown): boolean {
  if (err instanceof ControlUnchangedError) return true;
  const message = err instanceof Error ? err.message : String(err ?? '');
  return message.toLowerCase().includes('message is not modified');
}

/** The control on a published post that shows (and opens) its thread. */
export function commentControls(postId: number, count: number): Control[] {
  return [
    {
      label: `\u{1F4AC} Comments (${count})`,
      action: { type: 'viewComments', postId, parentCommentId: null, page: 1 },
    },
  ];
}
