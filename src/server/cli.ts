#!/usr/bin/env node
/**
 * Guard CLI — Start the presence monitor
 *
 * Usage:
 *   npx tsx src/server/cli.ts --config ./guard.json
 *   npx tsx src/server/cli.ts --data ./data --port 8080
 *
 * Environment variables:
 *   GUARD_CONFIG       - Path to the JSON config file
 *   GUARD_DATA_DIR     - Directory for users.json, checkins.json, alerts.db
 *   GUARD_PORT         - Server port (default: 8080)
 *   GUARD_ADMIN_TOKEN  - Bearer token for /api routes
 *   SMTP_HOST, SMTP_PORT, SMTP_USER, SMTP_PASSWORD - Default SMTP settings
 *   LOG_LEVEL          - Logging level (debug, info, warn, error)
 */

import { loadConfig } from '../config/config.js';
import { createApp, type GuardApp } from '../bootstrap.js';
import { errorMessage } from '../shared/types.js';

const args = process.argv.slice(2);

function getArg(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  return args[idx + 1];
}

function showHelp(): void {
  console.log(`
🛟  Deadman Guard

Usage:
  npx tsx src/server/cli.ts [options]
  npm start -- [options]

Options:
  --config <path>  JSON config file
  --data <dir>     Data directory (overrides the config file)
  --port <number>  Server port (overrides the config file)
  --help           Show this help message

Environment variables:
  GUARD_CONFIG       JSON config file
  GUARD_DATA_DIR     Data directory
  GUARD_PORT         Server port
  GUARD_ADMIN_TOKEN  Bearer token for /api routes
  SMTP_HOST / SMTP_PORT / SMTP_USER / SMTP_PASSWORD
  LOG_LEVEL          Logging level (debug, info, warn, error)
`);
  process.exit(0);
}

if (args.includes('--help') || args.includes('-h')) {
  showHelp();
}

const env: NodeJS.ProcessEnv = { ...process.env };
const dataArg = getArg('data');
if (dataArg) env['GUARD_DATA_DIR'] = dataArg;
const portArg = getArg('port');
if (portArg) env['GUARD_PORT'] = portArg;

let app: GuardApp;
try {
  const config = loadConfig({ configPath: getArg('config'), env });
  app = createApp(config);
} catch (err) {
  console.error(`❌ ${errorMessage(err)}`);
  process.exit(1);
}

const { config } = app;
console.log(`
🛟  Deadman Guard
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
Data:      ${config.dataDir}
Port:      ${config.server.port}
Bots:      ${config.bots.map((bot) => bot.botId).join(', ') || '(none)'}
Interval:  ${config.checkIntervalSeconds}s
Users:     ${app.registry.count()}
`);

let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(`\n${signal} received, shutting down gracefully...`);

  try {
    await app.stop();
    console.log('✅ Monitor stopped');
    process.exit(0);
  } catch (err) {
    console.error('Error during shutdown:', err);
    process.exit(1);
  }
}

app.start().then(() => {
  console.log(`✅ Listening on http://localhost:${config.server.port}`);
  console.log(`   OneBot events: POST http://localhost:${config.server.port}/onebot/event`);
  console.log(`   Health check:  http://localhost:${config.server.port}/health`);
  console.log(`   Press Ctrl+C to stop\n`);
}).catch((err) => {
  console.error('Failed to start:', err);
  process.exit(1);
});

// Graceful shutdown handlers
process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGHUP', () => void shutdown('SIGHUP'));

process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  void shutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
  void shutdown('unhandledRejection');
});
