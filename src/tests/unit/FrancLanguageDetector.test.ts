import { describe, it, expect, beforeAll } from 'vitest';
import { FrancLanguageDetector, loadLexicon, type Lexicon } from '../../adapters/language/FrancLanguageDetector.js';

describe('FrancLanguageDetector', () => {
  let lexicon: Lexicon;
  let detector: FrancLanguageDetector;

  beforeAll(async () => {
    lexicon = await loadLexicon();
    detector = new FrancLanguageDetector(lexicon, { minLength: 40 });
  });

  describe('short messages', () => {
    it('detects English greetings', () => {
      expect(detector.detect('Hello, how are you?')).toBe('EN');
    });

    it('detects Portuguese greetings', () => {
      expect(detector.detect('Bom dia!')).toBe('PT');
      expect(detector.detect('Obrigado pela ajuda')).toBe('PT');
    });

    it('counts Portuguese-only letters toward Portuguese', () => {
      expect(detector.detect('Coração')).toBe('PT');
    });

    it('normalizes curly apostrophes', () => {
      expect(detector.detect('I’m fine')).toBe('EN');
    });

    it('ignores mentions', () => {
      expect(detector.detect('@hello_there bom dia')).toBe('PT');
    });

    it('returns UNKNOWN for other languages', () => {
      expect(detector.detect('Guten Morgen, danke')).toBe('UNKNOWN');
      expect(detector.detect('Hola, ¿qué tal?')).toBe('UNKNOWN');
    });

    it('returns UNKNOWN on a tie', () => {
      expect(detector.detect('hello bom')).toBe('UNKNOWN');
    });

    it('returns UNKNOWN when there are no words', () => {
      expect(detector.detect('')).toBe('UNKNOWN');
      expect(detector.detect('12345 🙂')).toBe('UNKNOWN');
      expect(detector.detect('https://example.com/path')).toBe('UNKNOWN');
    });
  });

  describe('long messages', () => {
    it('detects English text', () => {
      expect(
        detector.detect('The weather is lovely today and we are planning to walk along the river after lunch.')
      ).toBe('EN');
    });

    it('detects Portuguese text', () => {
      expect(
        detector.detect(
          'Hoje o tempo está muito bom e nós vamos passear junto ao rio depois do almoço com os nossos amigos.'
        )
      ).toBe('PT');
    });

    it('returns UNKNOWN for German text', () => {
      expect(
        detector.detect('Das Wetter ist heute sehr schön und wir gehen nach dem Mittagessen am Fluss spazieren.')
      ).toBe('UNKNOWN');
    });
  });

  it('uses the lexicon for long text when the threshold is higher', () => {
    const strict = new FrancLanguageDetector(lexicon, { minLength: 1000 });
    expect(strict.detect('Das Wetter ist heute sehr schön und wir gehen nach dem Mittagessen am Fluss spazieren.')).toBe(
      'UNKNOWN'
    );
    expect(strict.detect('Thank you so much for the lovely dinner yesterday, we should do it again soon.')).toBe('EN');
  });
});
