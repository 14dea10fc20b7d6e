export type TargetLanguage = 'EN' | 'PT';

export interface TranslationRequest {
  sourceText: string;
  targetLanguage: TargetLanguage;
}

export interface TranslationResult {
  translatedText: string;
  /** Source language as reported by the provider, e.g. "en" or "pt". */
  detectedSourceLanguage?: string;
}

export interface TranslationPort {
  /** Rejects with a TranslationError when the provider call fails. */
  translate(request: TranslationRequest): Promise<TranslationResult>;
}
