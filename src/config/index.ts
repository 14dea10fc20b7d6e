import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform((value) => value === 'true' || value === '1');

const configSchema = z.object({
  // Telegram
  telegramBotToken: z.string().min(1),
  telegramWebhookUrl: z.string().url().optional(), // Optional: if not set, uses polling
  // Echoed by Telegram in X-Telegram-Bot-Api-Secret-Token on every webhook call
  telegramWebhookSecret: z
    .string()
    .regex(/^[A-Za-z0-9_-]{1,256}$/)
    .optional(),
  allowedChatIds: z
    .string()
    .optional()
    .transform((value) =>
      value
        ? value
            .split(',')
            .map((id) => id.trim())
            .filter((id) => id.length > 0)
        : []
    ),

  // DeepL
  deeplApiKey: z.string().min(1),
  deeplServerUrl: z.string().url().optional(),
  englishVariant: z.enum(['en-GB', 'en-US']).default('en-GB'),
  portugueseVariant: z.enum(['pt-PT', 'pt-BR']).default('pt-PT'),

  // Relay
  detectionMinLength: z.coerce.number().int().positive().default(40),
  flagPrefix: booleanFlag('true'),
  quoteOriginal: booleanFlag('false'),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),
});

export type Config = Readonly<z.infer<typeof configSchema>>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    telegramBotToken: env('TELEGRAM_BOT_TOKEN'),
    telegramWebhookUrl: env('TELEGRAM_WEBHOOK_URL'),
    telegramWebhookSecret: env('TELEGRAM_WEBHOOK_SECRET'),
    allowedChatIds: env('ALLOWED_CHAT_IDS'),
    deeplApiKey: env('DEEPL_API_KEY'),
    deeplServerUrl: env('DEEPL_SERVER_URL'),
    englishVariant: env('ENGLISH_VARIANT'),
    portugueseVariant: env('PORTUGUESE_VARIANT'),
    detectionMinLength: env('DETECTION_MIN_LENGTH'),
    flagPrefix: env('REPLY_FLAG_PREFIX'),
    quoteOriginal: env('REPLY_QUOTE_ORIGINAL'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
      cause: result.error,
    });
  }

  return Object.freeze(result.data);
}
