import { createApp, startApi } from './api/index.js';
import { bot, startBot } from './bot/index.js';
import { createChannelInspector, createMessagingTransport, createPostingTransport } from './bot/admin.js';
import { engineConfig, env } from './config/env.js';
import { checkConnection, pool, store } from './db/index.js';
import { createEngine } from './engine.js';
import { errorMessage } from './shared/errors.js';

async function main(): Promise<void> {
  console.log('[app] Starting ad escrow engine...');

  await checkConnection();

  const engine = createEngine({
    store,
    config: engineConfig,
    transports: {
      posting: createPostingTransport(bot.api, env.LIVENESS_CHECK_CHANNEL_ID),
      inspector: createChannelInspector(bot.api),
      messaging: createMessagingTransport(bot.api),
    },
  });

  await engine.start();

  // Start Express API
  startApi(createApp({ commands: engine.commands, botToken: env.BOT_TOKEN }), env.API_PORT);

  // Start Telegram Bot
  try {
    await startBot(engine);
  } catch (err) {
    console.error('[app] Failed to start bot:', errorMessage(err));
    console.error('[app] Bot requires a valid BOT_TOKEN in .env');
  }

  const shutdown = (signal: string): void => {
    console.log(`[app] ${signal} received, shutting down`);
    engine.stop();
    void bot.stop()
      .then(() => pool.end())
      .catch((err) => console.error('[app] Shutdown failed:', errorMessage(err)))
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  console.error('[app] Fatal error:', err);
  process.exit(1);
});
