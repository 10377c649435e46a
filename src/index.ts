import 'dotenv/config';
import pino from 'pino';

import { parseConfig } from './config.js';
import { createDiscordClient, startDiscordBot } from './discord/bot.js';
import { DiscordMessenger, createClientTransport } from './discord/messenger.js';
import { DiscussionService } from './discussion/service.js';
import { DiscussionStore } from './discussion/store.js';
import { globalMetrics } from './observability/metrics.js';

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' });

let parsedConfig;
try {
  parsedConfig = parseConfig(process.env);
} catch (err) {
  log.error({ err }, 'Invalid configuration');
  process.exit(1);
}
for (const warning of parsedConfig.warnings) {
  log.warn(warning);
}
for (const info of parsedConfig.infos) {
  log.info(info);
}
const cfg = parsedConfig.config;

const store = new DiscussionStore({ dataDir: cfg.dataDir, log });
try {
  await store.load();
} catch (err) {
  log.error({ err, dataDir: cfg.dataDir }, 'store:load failed');
  process.exit(1);
}
log.info({ dataDir: cfg.dataDir, users: (await store.listUsers()).length }, 'store:loaded');

const client = createDiscordClient();
const messenger = new DiscordMessenger({ transport: createClientTransport(client), log });
const service = new DiscussionService({
  repo: store,
  messenger,
  channelId: cfg.channelId,
  adminIds: cfg.adminIds,
  categories: cfg.categories,
  commentsPageSize: cfg.commentsPageSize,
  maxContentChars: cfg.maxContentChars,
  maxNameChars: cfg.maxNameChars,
  leaderboardSize: cfg.leaderboardSize,
  draftTtlMs: cfg.draftTtlMs,
  mirrorRetryEnabled: cfg.mirrorRetryEnabled,
  mirrorRetryDelayMs: cfg.mirrorRetryDelayMs,
  log,
  metrics: globalMetrics,
});

const draftSweepInterval = setInterval(() => {
  const removed = service.drafts.sweep();
  if (removed > 0) log.debug({ removed }, 'drafts:swept expired');
}, cfg.draftTtlMs);
draftSweepInterval.unref?.();

const shutdown = async () => {
  clearInterval(draftSweepInterval);
  service.dispose();
  // Best-effort: may not complete before SIGKILL on short shutdown windows.
  await store.flush();
  log.info({ metrics: globalMetrics.snapshot().counters }, 'shutdown:complete');
  await client.destroy();
  process.exit(0);
};
process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

try {
  await startDiscordBot({ token: cfg.token, client, service, log });
} catch (err) {
  log.error({ err }, 'discord:login failed');
  process.exit(1);
}
