import { Client, GatewayIntentBits, MessageFlags, Partials } from 'discord.js';
import type { Attachment, ButtonInteraction, Message } from 'discord.js';
import type { UserInput } from '../discussion/actions.js';
import type { OutcomeEvent } from '../discussion/outcomes.js';
import type { DiscussionService } from '../discussion/service.js';
import type { MediaRef } from '../discussion/types.js';
import type { LoggerLike } from '../logging/logger-like.js';
import { NO_MENTIONS } from './allowed-mentions.js';
import { decodeAction } from './custom-id.js';
import { buildRows, splitDiscord } from './messenger.js';
import { renderOutcome } from './render.js';
import type { RenderedMessage } from './render.js';

export type BotParams = {
  token: string;
  client: Client;
  service: DiscussionService;
  log?: LoggerLike;
};

const EXPIRED_BUTTON_TEXT = '⌛ This button is no longer valid. Send any message to open the menu.';
const DM_HANDOFF_TEXT = '📩 Check your direct messages with the bot and reply there.';
const DM_CLOSED_TEXT = '📩 I could not message you. Allow direct messages from server members, then send your reply to the bot in a direct message.';

export function createDiscordClient(): Client {
  return new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.DirectMessages,
      GatewayIntentBits.MessageContent,
    ],
    // DM channels are not cached until the first message arrives.
    partials: [Partials.Channel],
  });
}

/** Photo or voice attachment of an incoming message, by content type. */
export function mediaFromAttachment(attachment: Pick<Attachment, 'url' | 'contentType'> | undefined): MediaRef | undefined {
  if (!attachment) return undefined;
  const type = attachment.contentType ?? '';
  if (type.startsWith('image/')) return { type: 'photo', ref: attachment.url };
  if (type.startsWith('audio/')) return { type: 'voice', ref: attachment.url };
  return undefined;
}

/**
 * Prompts opened from a button in the shared channel continue in DMs: guild
 * messages are never read, and a reply typed there would show the author.
 */
export function continuesInDirectMessages(outcome: OutcomeEvent, inGuild: boolean): boolean {
  return inGuild && outcome.type === 'awaiting-input';
}

/** One rendered message as discord.js send options; long text is split with buttons on the last part. */
export function toMessageOptions(rendered: RenderedMessage, log?: LoggerLike) {
  const chunks = splitDiscord(rendered.content);
  return chunks.map((content, i) => ({
    ...(content ? { content } : {}),
    components: i === chunks.length - 1 ? buildRows(rendered.controls, log) : [],
    ...(i === 0 && rendered.media ? { files: [rendered.media.ref] } : {}),
    allowedMentions: NO_MENTIONS,
  }));
}

async function handleDirectMessage(params: BotParams, msg: Message): Promise<void> {
  const attachment = msg.attachments.first();
  const media = mediaFromAttachment(attachment);
  const text = msg.content.trim();
  const input: UserInput = {
    type: 'message',
    ...(text ? { text } : {}),
    ...(media ? { media } : {}),
  };

  const outcome = await params.service.handleUserInput(msg.author.id, input);
  if (!msg.channel.isSendable()) return;
  for (const rendered of renderOutcome(outcome)) {
    for (const options of toMessageOptions(rendered, params.log)) {
      await msg.channel.send(options);
    }
  }
}

async function handleButton(params: BotParams, interaction: ButtonInteraction): Promise<void> {
  // Replies in the shared channel are only visible to the presser.
  const flags: MessageFlags.Ephemeral | undefined = interaction.inGuild() ? MessageFlags.Ephemeral : undefined;
  const action = decodeAction(interaction.customId);
  if (!action) {
    await interaction.reply({ content: EXPIRED_BUTTON_TEXT, ...(flags !== undefined && { flags }) });
    return;
  }

  const outcome = await params.service.handleUserInput(interaction.user.id, { type: 'action', action });

  if (continuesInDirectMessages(outcome, interaction.inGuild())) {
    let delivered = true;
    try {
      for (const rendered of renderOutcome(outcome)) {
        for (const options of toMessageOptions(rendered, params.log)) {
          await interaction.user.send(options);
        }
      }
    } catch (err) {
      delivered = false;
      params.log?.warn({ err, userId: interaction.user.id }, 'discord:dm handoff failed');
    }
    await interaction.reply({ content: delivered ? DM_HANDOFF_TEXT : DM_CLOSED_TEXT, flags: MessageFlags.Ephemeral });
    return;
  }

  // Reaction counts live on the comment's own buttons: edit them in place.
  if (outcome.type === 'reaction-toggled') {
    const [rendered] = renderOutcome(outcome);
    await interaction.update({ components: buildRows(rendered?.controls ?? [], params.log) });
    return;
  }

  let replied = false;
  for (const rendered of renderOutcome(outcome)) {
    for (const options of toMessageOptions(rendered, params.log)) {
      const payload = { ...options, ...(flags !== undefined && { flags }) };
      if (replied) {
        await interaction.followUp(payload);
      } else {
        await interaction.reply(payload);
        replied = true;
      }
    }
  }
}

/**
 * Wire direct messages and button presses to the discussion service and log
 * in. Guild messages are ignored: all writing happens in DMs with the bot.
 */
export async function startDiscordBot(params: BotParams): Promise<Client> {
  const { client, log } = params;

  client.on('messageCreate', async (msg) => {
    if (!msg.author || msg.author.bot) return;
    if (msg.guildId != null) return;
    try {
      await handleDirectMessage(params, msg);
    } catch (err) {
      log?.warn({ err, userId: msg.author.id }, 'discord:message handler failed');
    }
  });

  client.on('interactionCreate', async (interaction) => {
    if (!interaction.isButton()) return;
    try {
      await handleButton(params, interaction);
    } catch (err) {
      log?.warn({ err, userId: interaction.user.id, customId: interaction.customId }, 'discord:button handler failed');
    }
  });

  client.once('ready', (ready) => {
    log?.info({ user: ready.user.tag, guilds: ready.guilds.cache.size }, 'discord:ready');
  });

  await client.login(params.token);
  return client;
}
