import type { TargetLanguage } from '../../ports/TranslationPort.js';

const FLAGS: Record<TargetLanguage, string> = {
  EN: '🇬🇧',
  PT: '🇵🇹',
};

export function normalizeWhitespace(text: string): string {
  return text.trim().split(/\s+/).join(' ');
}

export function oppositeLanguage(language: TargetLanguage): TargetLanguage {
  return language === 'EN' ? 'PT' : 'EN';
}

/** True when a translation came back as the input, i.e. there was nothing to translate. */
export function isSameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export function formatReply(targetLanguage: TargetLanguage, translatedText: string, withFlag: boolean): string {
  return withFlag ? `${FLAGS[targetLanguage]} ${translatedText}` : translatedText;
}

/** Matches "/start" and "/start@SomeBot", returning the lower-cased command name. */
export function parseCommand(text: string): string | null {
  const match = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s|$)/.exec(text.trim());
  return match?.[1] ? match[1].toLowerCase() : null;
}
