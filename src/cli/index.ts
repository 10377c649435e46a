#!/usr/bin/env node
/**
 * threadline CLI entrypoint.
 * Usage: threadline <command> [options]
 */

import 'dotenv/config';
import path from 'node:path';
import { createRequire } from 'node:module';
import pino from 'pino';
import { migrateLegacyExport } from '../discussion/migrate.js';
import { parseCliArgs } from './args.js';

const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' });
const [, , command, ...rest] = process.argv;

switch (command) {
  case 'migrate': {
    const args = parseCliArgs(rest);
    const sourcePath = args.positional[0];
    const channelId = args.flags.get('channel') ?? process.env.THREADLINE_CHANNEL_ID;
    const destDir = path.resolve(args.flags.get('data-dir') ?? process.env.THREADLINE_DATA_DIR ?? './data');
    if (!sourcePath || !channelId) {
      console.error('Usage: threadline migrate <export.json> --channel <channelId> [--data-dir <dir>]\n');
      process.exit(1);
    }
    try {
      const result = await migrateLegacyExport({ sourcePath, destDir, channelId, log });
      console.log(`Imported into ${destDir}:`);
      const skippedByTable = new Map(Object.entries(result.skipped));
      for (const [table, count] of Object.entries(result.migrated)) {
        const skipped = skippedByTable.get(table);
        console.log(`  ${table}: ${count}${skipped ? ` (${skipped} skipped)` : ''}`);
      }
    } catch (err) {
      log.error({ err, sourcePath }, 'migrate:failed');
      process.exit(1);
    }
    break;
  }
  case '--version':
  case '-v':
    console.log(version);
    break;
  case '--help':
  case '-h':
  case undefined:
    printHelp(version);
    break;
  default:
    console.error(`Unknown command: ${command}\n`);
    printHelp(version);
    process.exit(1);
}

function printHelp(ver: string): void {
  console.log(`threadline ${ver}

Usage: threadline <command> [options]

Commands:
  migrate <export.json>   Import a legacy database export into the data directory
      --channel <id>      Channel the legacy posts were published to (default: THREADLINE_CHANNEL_ID)
      --data-dir <dir>    Target data directory (default: THREADLINE_DATA_DIR or ./data)

Options:
  -v, --version           Print version
  -h, --help              Show this help`);
}
