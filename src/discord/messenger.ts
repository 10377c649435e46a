import { ActionRowBuilder, ButtonBuilder, ButtonStyle } from 'discord.js';
import type { Client, MessageMentionOptions } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type {
  Control,
  ControlUpdateOutcome,
  MessageContent,
  MessageTarget,
  Messenger,
} from '../discussion/messenger.js';
import type { MessageHandle } from '../discussion/types.js';
import { NO_MENTIONS } from './allowed-mentions.js';
import { encodeAction } from './custom-id.js';

const BUTTONS_PER_ROW = 5;
const MAX_ROWS = 5;
const LABEL_MAX_CHARS = 80;
export const DISCORD_MESSAGE_LIMIT = 2000;

// ---------------------------------------------------------------------------
// Transport seam
// ---------------------------------------------------------------------------

export type OutgoingMessage = {
  content?: string;
  components: ActionRowBuilder<ButtonBuilder>[];
  files?: string[];
  allowedMentions: MessageMentionOptions;
};

export type SentMessage = { id: string; channelId: string };

/** The parts of a fetched Discord message the messenger touches. */
export type EditableMessage = {
  components: ReadonlyArray<{ toJSON(): unknown }>;
  edit(opts: { components: ActionRowBuilder<ButtonBuilder>[] }): Promise<unknown>;
};

/** Thin wrapper over the discord.js client so the messenger can run against a fake. */
export type MessengerTransport = {
  sendToChannel(channelId: string, message: OutgoingMessage): Promise<SentMessage>;
  sendToUser(userId: string, message: OutgoingMessage): Promise<SentMessage>;
  fetchMessage(channelId: string, messageId: string): Promise<EditableMessage>;
};

export function createClientTransport(client: Client): MessengerTransport {
  async function resolveChannel(channelId: string) {
    const channel = client.channels.cache.get(channelId) ?? await client.channels.fetch(channelId);
    if (!channel) throw new Error(`channel ${channelId} not found`);
    return channel;
  }

  return {
    async sendToChannel(channelId, message) {
      const channel = await resolveChannel(channelId);
      if (!channel.isSendable()) throw new Error(`channel ${channelId} is not sendable`);
      const sent = await channel.send(message);
      return { id: sent.id, channelId: sent.channelId };
    },
    async sendToUser(userId, message) {
      const user = await client.users.fetch(userId);
      const sent = await user.send(message);
      return { id: sent.id, channelId: sent.channelId };
    },
    async fetchMessage(channelId, messageId) {
      const channel = await resolveChannel(channelId);
      if (!channel.isTextBased()) throw new Error(`channel ${channelId} is not text-based`);
      return channel.messages.fetch(messageId);
    },
  };
}

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

function clipLabel(label: string): string {
  return label.length > LABEL_MAX_CHARS ? `${label.slice(0, LABEL_MAX_CHARS - 1)}…` : label;
}

export function buildButton(control: Control): ButtonBuilder {
  const button = new ButtonBuilder().setLabel(clipLabel(control.label));
  if ('url' in control) return button.setStyle(ButtonStyle.Link).setURL(control.url);
  return button.setStyle(ButtonStyle.Secondary).setCustomId(encodeAction(control.action));
}

/** Lay controls out five per row. Discord takes at most five rows; the rest are dropped. */
export function buildRows(controls: readonly Control[], log?: LoggerLike): ActionRowBuilder<ButtonBuilder>[] {
  const max = BUTTONS_PER_ROW * MAX_ROWS;
  if (controls.length > max) {
    log?.warn({ controls: controls.length, max }, 'discord:controls truncated');
  }
  const rows: ActionRowBuilder<ButtonBuilder>[] = [];
  const kept = controls.slice(0, max);
  for (let i = 0; i < kept.length; i += BUTTONS_PER_ROW) {
    rows.push(new ActionRowBuilder<ButtonBuilder>().addComponents(
      kept.slice(i, i + BUTTONS_PER_ROW).map(buildButton),
    ));
  }
  return rows;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Comparable form of a message's button rows: label, custom id and url of
 * each button, row by row. Works on both builders and fetched components.
 */
export function controlSignature(rows: ReadonlyArray<{ toJSON(): unknown }>): string {
  const out: string[] = [];
  for (const row of rows) {
    const json = row.toJSON();
    const components = isObject(json) && Array.isArray(json.components) ? json.components : [];
    const buttons: string[] = [];
    for (const c of components) {
      if (!isObject(c)) continue;
      buttons.push([c.label, c.custom_id, c.url].map((v) => (typeof v === 'string' ? v : '')).join('\u0001'));
    }
    out.push(buttons.join('\u0002'));
  }
  return out.join('\n');
}

/** Split text into Discord-sized chunks, preferring line breaks. */
export function splitDiscord(text: string, limit = DISCORD_MESSAGE_LIMIT): string[] {
  if (text.length <= limit) return [text];
  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    const cut = rest.lastIndexOf('\n', limit);
    const at = cut > 0 ? cut : limit;
    chunks.push(rest.slice(0, at));
    rest = rest.slice(cut > 0 ? at + 1 : at);
  }
  if (rest) chunks.push(rest);
  return chunks;
}

// ---------------------------------------------------------------------------
// DiscordMessenger
// ---------------------------------------------------------------------------

export type DiscordMessengerOptions = {
  transport: MessengerTransport;
  log?: LoggerLike;
};

export class DiscordMessenger implements Messenger {
  constructor(private readonly opts: DiscordMessengerOptions) {}

  /** Long text goes out as several messages; the handle points at the last one, which carries the buttons. */
  async sendMessage(target: MessageTarget, content: MessageContent, controls: Control[]): Promise<MessageHandle> {
    const chunks = splitDiscord(content.text);
    let last: SentMessage | undefined;
    for (let i = 0; i < chunks.length; i++) {
      const isFirst = i === 0;
      const isLast = i === chunks.length - 1;
      const message: OutgoingMessage = {
        ...(chunks[i] ? { content: chunks[i] } : {}),
        components: isLast ? buildRows(controls, this.opts.log) : [],
        ...(isFirst && content.media ? { files: [content.media.ref] } : {}),
        allowedMentions: NO_MENTIONS,
      };
      last = target.type === 'channel'
        ? await this.opts.transport.sendToChannel(target.channelId, message)
        : await this.opts.transport.sendToUser(target.userId, message);
    }
    if (!last) throw new Error('nothing was sent');
    return { channelId: last.channelId, messageId: last.id };
  }

  async updateControl(handle: MessageHandle, controls: Control[]): Promise<ControlUpdateOutcome> {
    const message = await this.opts.transport.fetchMessage(handle.channelId, handle.messageId);
    const rows = buildRows(controls, this.opts.log);
    if (controlSignature(message.components) === controlSignature(rows)) return 'unchanged';
    await message.edit({ components: rows });
    return 'updated';
  }
}
