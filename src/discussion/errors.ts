// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------

export const VALIDATION_CODES = [
  'user_not_found',
  'post_not_found',
  'comment_not_found',
  'invalid_parent',
  'content_empty',
  'content_too_long',
  'name_invalid',
  'unknown_category',
  'invalid_option',
  'draft_missing',
  'draft_expired',
  'blocked',
  'self_target',
  'forbidden',
  'already_published',
  'invalid_page',
  'reaction_conflict',
] as const;

export type ValidationCode = (typeof VALIDATION_CODES)[number];

/** Codes caused by the text the user typed, as opposed to the target it was aimed at. */
export const INPUT_VALIDATION_CODES: ReadonlySet<ValidationCode> = new Set<ValidationCode>([
  'content_empty',
  'content_too_long',
  'name_invalid',
]);

/** Caller mistake. Reported back as-is; never retried and never logged as a fault. */
export class ValidationError extends Error {
  readonly code: ValidationCode;

  constructor(code: ValidationCode, message?: string) {
    super(message ?? code);
    this.name = 'ValidationError';
    this.code = code;
  }
}

export type ConstraintName =
  | 'reactions.comment_user'
  | 'follows.pair'
  | 'blocks.pair'
  | 'comments.post'
  | 'comments.parent'
  | 'posts.mirror_handle';

/** A store-level uniqueness or reference constraint rejected a write. */
export class ConflictError extends Error {
  readonly constraint: ConstraintName;

  constructor(constraint: ConstraintName, message?: string) {
    super(message ?? `constraint violated: ${constraint}`);
    this.name = 'ConflictError';
    this.constraint = constraint;
  }
}

/** Storage unavailable or corrupt. Fatal to the current operation. */
export class RepositoryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RepositoryError';
  }
}

/** The mirrored control could not be updated. The thread data is already committed. */
export class ExternalMirrorError extends Error {
  readonly postId: number;

  constructor(postId: number, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? '');
    super(`mirror update failed for post ${postId}${detail ? `: ${detail}` : ''}`, options);
    this.name = 'ExternalMirrorError';
    this.postId = postId;
  }
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError;
}

export function isConflictError(err: unknown, constraint?: ConstraintName): err is ConflictError {
  return err instanceof ConflictError && (constraint === undefined || err.constraint === constraint);
}
