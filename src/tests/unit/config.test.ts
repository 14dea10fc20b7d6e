import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadConfig', () => {
  const required = {
    TELEGRAM_BOT_TOKEN: 'test-token',
    DEEPL_API_KEY: 'test-deepl-key',
  };

  it('applies defaults when only credentials are set', () => {
    const config = loadConfig(required);

    expect(config.telegramBotToken).toBe('test-token');
    expect(config.deeplApiKey).toBe('test-deepl-key');
    expect(config.telegramWebhookUrl).toBeUndefined();
    expect(config.englishVariant).toBe('en-GB');
    expect(config.portugueseVariant).toBe('pt-PT');
    expect(config.detectionMinLength).toBe(40);
    expect(config.flagPrefix).toBe(true);
    expect(config.quoteOriginal).toBe(false);
    expect(config.allowedChatIds).toEqual([]);
    expect(config.host).toBe('0.0.0.0');
    expect(config.port).toBe(5000);
    expect(config.logLevel).toBe('info');
    expect(config.telegramWebhookSecret).toBeUndefined();
  });

  it('parses the log level and webhook secret', () => {
    const config = loadConfig({ ...required, LOG_LEVEL: 'debug', TELEGRAM_WEBHOOK_SECRET: 'test-secret' });

    expect(config.logLevel).toBe('debug');
    expect(config.telegramWebhookSecret).toBe('test-secret');
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ ...required, LOG_LEVEL: 'verbose' })).toThrow(/logLevel/);
  });

  it('rejects a webhook secret Telegram would not accept', () => {
    expect(() => loadConfig({ ...required, TELEGRAM_WEBHOOK_SECRET: 'not allowed!' })).toThrow(
      /telegramWebhookSecret/
    );
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig(required))).toBe(true);
  });

  it('parses optional settings', () => {
    const config = loadConfig({
      ...required,
      TELEGRAM_WEBHOOK_URL: 'https://example.com/webhook/telegram',
      ALLOWED_CHAT_IDS: '123, -456 ,,789',
      ENGLISH_VARIANT: 'en-US',
      PORTUGUESE_VARIANT: 'pt-BR',
      DETECTION_MIN_LENGTH: '25',
      REPLY_FLAG_PREFIX: '0',
      REPLY_QUOTE_ORIGINAL: 'true',
      PORT: '8080',
    });

    expect(config.telegramWebhookUrl).toBe('https://example.com/webhook/telegram');
    expect(config.allowedChatIds).toEqual(['123', '-456', '789']);
    expect(config.englishVariant).toBe('en-US');
    expect(config.portugueseVariant).toBe('pt-BR');
    expect(config.detectionMinLength).toBe(25);
    expect(config.flagPrefix).toBe(false);
    expect(config.quoteOriginal).toBe(true);
    expect(config.port).toBe(8080);
  });

  it('throws ConfigError when the bot token is missing', () => {
    expect(() => loadConfig({ DEEPL_API_KEY: 'test-deepl-key' })).toThrow(ConfigError);
    expect(() => loadConfig({ DEEPL_API_KEY: 'test-deepl-key' })).toThrow(/telegramBotToken/);
  });

  it('treats empty strings as unset', () => {
    expect(() => loadConfig({ ...required, DEEPL_API_KEY: '' })).toThrow(/deeplApiKey/);
  });

  it('rejects unsupported language variants', () => {
    expect(() => loadConfig({ ...required, PORTUGUESE_VARIANT: 'pt' })).toThrow(/portugueseVariant/);
  });

  it('rejects a malformed webhook URL', () => {
    expect(() => loadConfig({ ...required, TELEGRAM_WEBHOOK_URL: 'not a url' })).toThrow(/telegramWebhookUrl/);
  });
});
