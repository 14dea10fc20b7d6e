import { franc } from 'franc';
import { z } from 'zod';
import type { DetectedLanguage, LanguageDetectorPort } from '../../ports/LanguageDetectorPort.js';
import { createLogger } from '../../utils/logger.js';
import { loadDataFile } from '../../utils/templates.js';

const lexiconSchema = z.object({
  en: z.array(z.string().min(1)),
  pt: z.array(z.string().min(1)),
  other: z.array(z.string().min(1)),
});

export type Lexicon = z.infer<typeof lexiconSchema>;

export async function loadLexicon(name = 'lexicon.json'): Promise<Lexicon> {
  return lexiconSchema.parse(await loadDataFile(name));
}

// English and Portuguese plus the Latin-script languages most often confused with them
const FRANC_CANDIDATES = ['eng', 'por', 'spa', 'fra', 'ita', 'deu', 'nld'];

const URL_PATTERN = /\b(?:https?:\/\/|www\.)\S+/giu;
const MENTION_PATTERN = /@\w+/gu;
const WORD_PATTERN = /\p{L}+(?:'\p{L}+)*/gu;
const PORTUGUESE_MARKERS = /[ãõç]/u;

export interface FrancLanguageDetectorOptions {
  /** Letters needed before the statistical detector is trusted over the lexicon. */
  minLength: number;
}

/**
 * Classifies text as English, Portuguese or neither.
 *
 * Longer text goes through franc's trigram model; short chat lines score
 * words against the lexicon instead.
 */
export class FrancLanguageDetector implements LanguageDetectorPort {
  private readonly logger = createLogger({ adapter: 'FrancLanguageDetector' });
  private readonly english: ReadonlySet<string>;
  private readonly portuguese: ReadonlySet<string>;
  private readonly other: ReadonlySet<string>;

  constructor(
    lexicon: Lexicon,
    private readonly options: FrancLanguageDetectorOptions
  ) {
    const normalize = (words: string[]): Set<string> => new Set(words.map((word) => word.normalize('NFC').toLowerCase()));
    this.english = normalize(lexicon.en);
    this.portuguese = normalize(lexicon.pt);
    this.other = normalize(lexicon.other);
  }

  detect(text: string): DetectedLanguage {
    const cleaned = text
      .normalize('NFC')
      .replace(/[‘’]/gu, "'")
      .replace(URL_PATTERN, ' ')
      .replace(MENTION_PATTERN, ' ');
    const words = cleaned.toLowerCase().match(WORD_PATTERN) ?? [];
    if (words.length === 0) {
      return 'UNKNOWN';
    }

    const letterCount = words.reduce((total, word) => total + word.replace(/'/g, '').length, 0);
    if (letterCount >= this.options.minLength) {
      const code = franc(cleaned, { only: FRANC_CANDIDATES, minLength: this.options.minLength });
      this.logger.debug({ code, letterCount }, 'Statistical detection');
      if (code === 'eng') return 'EN';
      if (code === 'por') return 'PT';
      if (code !== 'und') return 'UNKNOWN';
    }

    return this.detectByLexicon(words);
  }

  private detectByLexicon(words: string[]): DetectedLanguage {
    let english = 0;
    let portuguese = 0;
    let other = 0;

    for (const word of words) {
      if (this.english.has(word)) english++;
      if (this.portuguese.has(word) || PORTUGUESE_MARKERS.test(word)) portuguese++;
      if (this.other.has(word)) other++;
    }

    const best = Math.max(english, portuguese);
    this.logger.debug({ english, portuguese, other }, 'Lexicon detection');

    if (best === 0 || english === portuguese || other >= best) {
      return 'UNKNOWN';
    }
    return english > portuguese ? 'EN' : 'PT';
  }
}
