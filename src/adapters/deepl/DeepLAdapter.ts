import * as deepl from 'deepl-node';
import type { Config } from '../../config/index.js';
import type { TranslationPort, TranslationRequest, TranslationResult } from '../../ports/TranslationPort.js';
import { createLogger } from '../../utils/logger.js';
import { TranslationError, type TranslationFailureKind } from '../../utils/errors.js';

function classifyError(error: unknown): TranslationFailureKind {
  if (error instanceof deepl.AuthorizationError) return 'auth';
  if (error instanceof deepl.QuotaExceededError) return 'quota';
  if (error instanceof deepl.TooManyRequestsError) return 'rate_limit';
  if (error instanceof deepl.ConnectionError) return 'network';
  return 'unknown';
}

export class DeepLAdapter implements TranslationPort {
  private readonly logger = createLogger({ adapter: 'DeepLAdapter' });
  private readonly translator: deepl.Translator;

  constructor(private readonly config: Config) {
    // Failures are terminal for a message, so the client must not retry on its own
    const options: deepl.TranslatorOptions = config.deeplServerUrl
      ? { maxRetries: 0, serverUrl: config.deeplServerUrl }
      : { maxRetries: 0 };
    this.translator = new deepl.Translator(config.deeplApiKey, options);
  }

  /** Checks the API key against the usage endpoint. */
  async verify(): Promise<void> {
    const logger = this.logger.child({ method: 'verify' });

    try {
      const usage = await this.translator.getUsage();
      logger.info(
        {
          characterCount: usage.character?.count,
          characterLimit: usage.character?.limit,
          limitReached: usage.anyLimitReached(),
        },
        'DeepL translator verified'
      );
    } catch (error) {
      const kind = classifyError(error);
      logger.error({ error, kind }, 'Failed to verify DeepL translator');
      throw new TranslationError(kind, 'Failed to verify DeepL translator', { cause: error });
    }
  }

  async translate(request: TranslationRequest): Promise<TranslationResult> {
    const targetLang = request.targetLanguage === 'PT' ? this.config.portugueseVariant : this.config.englishVariant;
    const logger = this.logger.child({ method: 'translate', targetLang });
    logger.debug({ textLength: request.sourceText.length }, 'Requesting translation');

    try {
      // Source language left to DeepL's own detection
      const result = await this.translator.translateText(request.sourceText, null, targetLang);
      logger.info({ detectedSourceLang: result.detectedSourceLang }, 'Translation received');
      return {
        translatedText: result.text,
        detectedSourceLanguage: result.detectedSourceLang,
      };
    } catch (error) {
      const kind = classifyError(error);
      logger.error({ error, kind }, 'Translation request failed');
      throw new TranslationError(kind, `Translation to ${targetLang} failed`, { cause: error });
    }
  }
}
