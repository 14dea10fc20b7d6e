// Load environment variables first
import 'dotenv/config';

import type { Server } from 'node:http';
import { loadConfig } from './config/index.js';
import { createLogger, setLogLevel } from './utils/logger.js';
import { loadTemplate } from './utils/templates.js';
import { TranslationRelay } from './core/relay/TranslationRelay.js';
import { TelegramAdapter } from './adapters/telegram/TelegramAdapter.js';
import { DeepLAdapter } from './adapters/deepl/DeepLAdapter.js';
import { FrancLanguageDetector, loadLexicon } from './adapters/language/FrancLanguageDetector.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting EN/PT translation relay');

  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const translationAdapter = new DeepLAdapter(config);
    await translationAdapter.verify();

    const languageDetector = new FrancLanguageDetector(await loadLexicon(), {
      minLength: config.detectionMinLength,
    });
    const welcomeText = await loadTemplate('welcome.md');

    const telegramAdapter = new TelegramAdapter(config);

    // Register the relay before updates start flowing
    new TranslationRelay({
      messagePort: telegramAdapter,
      translationPort: translationAdapter,
      languageDetector,
      options: {
        flagPrefix: config.flagPrefix,
        quoteOriginal: config.quoteOriginal,
        allowedChatIds: config.allowedChatIds,
        welcomeText,
      },
    });

    await telegramAdapter.initialize();

    let server: Server | undefined;
    if (config.telegramWebhookUrl) {
      server = await startServer(telegramAdapter, config.port, config.host, config.telegramWebhookSecret);
    }

    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
      logger.info({ signal }, 'Shutting down');
      await telegramAdapter.stop();
      server?.close();
      process.exit(0);
    };
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, (received) => {
        shutdown(received).catch((error) => {
          logger.error({ error }, 'Shutdown failed');
          process.exit(1);
        });
      });
    }

    logger.info({ mode: config.telegramWebhookUrl ? 'webhook' : 'polling' }, 'Translation relay running');
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
