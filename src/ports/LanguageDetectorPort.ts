import type { TargetLanguage } from './TranslationPort.js';

export type DetectedLanguage = TargetLanguage | 'UNKNOWN';

export interface LanguageDetectorPort {
  detect(text: string): DetectedLanguage;
}
