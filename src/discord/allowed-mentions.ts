import type { MessageMentionOptions } from 'discord.js';

/** Outgoing messages never ping anyone: user text is echoed back verbatim. */
export const NO_MENTIONS = { parse: [] } satisfies MessageMentionOptions;
