/**
 * Rain Alert Service
 *
 * Checks the Open-Meteo JMA precipitation forecast for one location and
 * posts a Discord alert when rain is expected. Runs a single check per
 * invocation; schedule it externally (cron, CI).
 */

import dotenv from 'dotenv';
import { ConfigError, loadConfig } from './config.js';
import { checkAndNotify, exitCodeFor } from './checker.js';

async function main(): Promise<void> {
  dotenv.config();

  const config = loadConfig(process.env);

  if (!config.discordWebhookUrl) {
    console.log('Warning: DISCORD_WEBHOOK_URL environment variable is not set');
    console.log('Set the environment variable or add it to .env to send notifications');
    console.log();
    console.log("Example: export DISCORD_WEBHOOK_URL='https://discord.com/api/webhooks/...'");
  }

  const outcome = await checkAndNotify(config);
  process.exitCode = exitCodeFor(outcome);
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error('❌ Rain check failed:', error);
  }
  process.exitCode = 1;
});
