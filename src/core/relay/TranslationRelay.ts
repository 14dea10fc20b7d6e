import type { Logger } from 'pino';
import type { IncomingMessage, MessagePort } from '../../ports/MessagePort.js';
import type { TargetLanguage, TranslationPort, TranslationResult } from '../../ports/TranslationPort.js';
import type { LanguageDetectorPort } from '../../ports/LanguageDetectorPort.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';
import { TranslationError } from '../../utils/errors.js';
import { splitMessage } from '../../utils/splitMessage.js';
import { formatReply, isSameText, normalizeWhitespace, oppositeLanguage, parseCommand } from './replyText.js';

const WELCOME_COMMANDS = new Set(['start', 'help']);

export interface TranslationRelayOptions {
  /** Prefix replies with the target language's flag. */
  flagPrefix: boolean;
  /** Send replies as a quote of the original message. */
  quoteOriginal: boolean;
  /** Chats the relay answers in; empty means every chat. */
  allowedChatIds: readonly string[];
  welcomeText: string;
}

export interface TranslationRelayDependencies {
  messagePort: MessagePort;
  translationPort: TranslationPort;
  languageDetector: LanguageDetectorPort;
  options: TranslationRelayOptions;
}

export type RelayOutcome =
  | { status: 'translated'; targetLanguage: TargetLanguage; chunks: number }
  | { status: 'command'; command: string }
  | { status: 'ignored'; reason: 'bot' | 'chat_not_allowed' | 'unsupported_command' | 'empty' }
  | { status: 'skipped'; reason: 'unknown_language' | 'unchanged' }
  | { status: 'failed'; stage: 'translate' | 'send'; error: unknown };

export class TranslationRelay {
  private readonly logger = createLogger({ service: 'TranslationRelay' });
  private readonly deps: TranslationRelayDependencies;

  constructor(deps: TranslationRelayDependencies) {
    this.deps = deps;
    this.deps.messagePort.onMessage(async (message) => {
      await this.handleMessage(message);
    });
  }

  /** Runs one message through detect → translate → reply. Never rejects. */
  async handleMessage(message: IncomingMessage): Promise<RelayOutcome> {
    const logger = this.logger.child({
      correlationId: generateCorrelationId(),
      chatId: message.chatId,
      messageId: message.id,
    });
    logger.debug({ senderId: message.senderId, text: message.text }, 'Received message');

    const outcome = await this.process(message, logger);
    logger.info({ outcome: summarize(outcome) }, 'Message handled');
    return outcome;
  }

  private async process(message: IncomingMessage, logger: Logger): Promise<RelayOutcome> {
    const { options } = this.deps;

    if (message.fromBot) {
      return { status: 'ignored', reason: 'bot' };
    }
    if (options.allowedChatIds.length > 0 && !options.allowedChatIds.includes(message.chatId)) {
      return { status: 'ignored', reason: 'chat_not_allowed' };
    }

    if (message.text.trim().startsWith('/')) {
      return this.handleCommand(message, logger);
    }

    const text = normalizeWhitespace(message.text);
    if (!text) {
      return { status: 'ignored', reason: 'empty' };
    }

    const language = this.deps.languageDetector.detect(text);
    if (language === 'UNKNOWN') {
      return { status: 'skipped', reason: 'unknown_language' };
    }

    const targetLanguage = oppositeLanguage(language);
    logger.debug({ detected: language, targetLanguage }, 'Language detected');

    let result: TranslationResult;
    try {
      result = await this.deps.translationPort.translate({ sourceText: text, targetLanguage });
    } catch (error) {
      const kind = error instanceof TranslationError ? error.kind : 'unknown';
      logger.error({ error, kind, targetLanguage }, 'Translation failed; no reply sent');
      return { status: 'failed', stage: 'translate', error };
    }

    if (isSameText(result.translatedText, text)) {
      logger.debug({ detectedSourceLanguage: result.detectedSourceLanguage }, 'Translation unchanged; no reply sent');
      return { status: 'skipped', reason: 'unchanged' };
    }

    const chunks = splitMessage(formatReply(targetLanguage, result.translatedText, options.flagPrefix));
    try {
      await this.reply(message, chunks);
    } catch (error) {
      logger.error({ error }, 'Failed to send translation');
      return { status: 'failed', stage: 'send', error };
    }

    return { status: 'translated', targetLanguage, chunks: chunks.length };
  }

  private async handleCommand(message: IncomingMessage, logger: Logger): Promise<RelayOutcome> {
    const command = parseCommand(message.text);
    if (!command || !WELCOME_COMMANDS.has(command)) {
      return { status: 'ignored', reason: 'unsupported_command' };
    }

    try {
      await this.reply(message, [this.deps.options.welcomeText]);
    } catch (error) {
      logger.error({ error, command }, 'Failed to send welcome message');
      return { status: 'failed', stage: 'send', error };
    }
    return { status: 'command', command };
  }

  private async reply(message: IncomingMessage, chunks: string[]): Promise<void> {
    const sendOptions = this.deps.options.quoteOriginal ? { replyToMessageId: message.id } : {};
    // Sequential so the chunks arrive in order
    for (const chunk of chunks) {
      await this.deps.messagePort.sendMessage(message.chatId, chunk, sendOptions);
    }
  }
}

function summarize(outcome: RelayOutcome): string {
  switch (outcome.status) {
    case 'translated':
      return `translated:${outcome.targetLanguage}`;
    case 'command':
      return `command:${outcome.command}`;
    case 'ignored':
    case 'skipped':
      return `${outcome.status}:${outcome.reason}`;
    case 'failed':
      return `failed:${outcome.stage}`;
  }
}
