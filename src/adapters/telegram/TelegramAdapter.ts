import type { MessagePort, IncomingMessage, MessageHandler, SendMessageOptions } from '../../ports/MessagePort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { TelegramError } from '../../utils/errors.js';
import TelegramBot from 'node-telegram-bot-api';

export class TelegramAdapter implements MessagePort {
  private readonly logger = createLogger({ adapter: 'TelegramAdapter' });
  private readonly bot: TelegramBot;
  private messageHandlers: MessageHandler[] = [];

  constructor(private readonly config: Config) {
    // Use polling if no webhook URL is set, otherwise webhook mode
    const options: TelegramBot.ConstructorOptions = config.telegramWebhookUrl
      ? { webHook: false } // Will set webhook manually
      : {
          polling: {
            interval: 300,
            autoStart: false, // We'll start it manually after initialization
          },
        };
    this.bot = new TelegramBot(config.telegramBotToken, options);
  }

  async initialize(): Promise<void> {
    const logger = this.logger.child({ method: 'initialize' });
    logger.info('Initializing Telegram bot adapter');

    try {
      // Verify bot token by getting bot info
      const me = await this.bot.getMe();
      logger.info({ botId: me.id, botUsername: me.username }, 'Telegram bot verified');

      this.setupMessageHandlers();

      if (this.config.telegramWebhookUrl) {
        await this.setupWebhook(this.config.telegramWebhookUrl);
      } else {
        logger.info('No webhook URL configured, using polling mode');
        // Messages that piled up while the bot was down are not translated
        await this.dropPendingUpdates();
        await this.bot.startPolling();
        logger.info('Polling started');
      }
    } catch (error) {
      logger.error({ error }, 'Failed to initialize Telegram adapter');
      throw new TelegramError('Failed to initialize Telegram adapter', { cause: error });
    }
  }

  async stop(): Promise<void> {
    if (this.bot.isPolling()) {
      await this.bot.stopPolling();
      this.logger.info('Polling stopped');
    }
  }

  private setupMessageHandlers(): void {
    this.bot.on('message', async (msg: TelegramBot.Message) => {
      const logger = this.logger.child({ method: 'onMessage', chatId: msg.chat.id });
      logger.debug({ messageId: msg.message_id }, 'Received message');

      try {
        await this.dispatch(msg);
      } catch (error) {
        logger.error({ error }, 'Error processing message');
      }
    });

    this.bot.on('error', (error: Error) => {
      this.logger.error({ error }, 'Telegram bot error');
    });

    // Polling errors (network blips, 409 if another poll is active, etc.) – usually transient
    this.bot.on('polling_error', (error: Error) => {
      this.logger.warn({ err: error }, 'Telegram polling error (often transient; polling will retry)');
    });
  }

  private async dropPendingUpdates(): Promise<void> {
    // getUpdates answers 409 while a webhook from an earlier run is still registered
    await this.bot.deleteWebHook();

    // A negative offset forgets everything but the newest update; confirming that one clears the queue
    const [latest] = await this.bot.getUpdates({ offset: -1, limit: 1, timeout: 0 });
    if (latest) {
      await this.bot.getUpdates({ offset: latest.update_id + 1, limit: 1, timeout: 0 });
      this.logger.info({ updateId: latest.update_id }, 'Dropped pending updates');
    }
  }

  private async setupWebhook(webhookUrl: string): Promise<void> {
    const logger = this.logger.child({ method: 'setupWebhook' });

    const options: TelegramBot.SetWebHookOptions & { secret_token?: string } = {};
    if (this.config.telegramWebhookSecret) {
      options.secret_token = this.config.telegramWebhookSecret;
    }

    try {
      await this.bot.setWebHook(webhookUrl, options);
      logger.info({ webhookUrl }, 'Webhook set successfully');
    } catch (error) {
      // Keep running so the HTTP server can receive updates once the URL is fixed
      logger.error({ error, webhookUrl }, 'Failed to set webhook (app will keep running)');
    }
  }

  async sendMessage(to: string, text: string, options: SendMessageOptions = {}): Promise<void> {
    const logger = this.logger.child({ method: 'sendMessage', to });
    logger.info({ textLength: text.length }, 'Sending message');

    try {
      const chatId = parseInt(to, 10);
      if (isNaN(chatId)) {
        throw new Error(`Invalid chat ID: ${to}`);
      }

      const sendOptions: TelegramBot.SendMessageOptions = {};
      if (options.replyToMessageId) {
        sendOptions.reply_to_message_id = parseInt(options.replyToMessageId, 10);
      }

      const sentMessage = await this.bot.sendMessage(chatId, text, sendOptions);
      logger.info({ messageId: sentMessage.message_id }, 'Message sent successfully');
    } catch (error) {
      logger.error({ error }, 'Failed to send message');
      throw new TelegramError('Failed to send message', { cause: error });
    }
  }

  onMessage(handler: MessageHandler): void {
    this.messageHandlers.push(handler);
  }

  async handleWebhook(update: TelegramBot.Update): Promise<void> {
    const logger = this.logger.child({ method: 'handleWebhook', updateId: update.update_id });

    if (!update.message) {
      logger.debug('Webhook update does not contain a message');
      return;
    }

    await this.dispatch(update.message);
  }

  private async dispatch(msg: TelegramBot.Message): Promise<void> {
    const incomingMessage = this.parseTelegramMessage(msg);
    if (!incomingMessage) {
      return;
    }

    await Promise.all(this.messageHandlers.map((handler) => handler(incomingMessage)));
  }

  private parseTelegramMessage(msg: TelegramBot.Message): IncomingMessage | null {
    if (!msg.text) {
      // Only plain text is translated
      return null;
    }

    const chatId = msg.chat.id.toString();
    return {
      id: msg.message_id.toString(),
      chatId,
      senderId: msg.from ? msg.from.id.toString() : chatId,
      text: msg.text,
      timestamp: new Date(msg.date * 1000), // Telegram uses Unix timestamp
      fromBot: msg.from?.is_bot ?? false,
    };
  }
}
