import { describe, it, expect } from 'vitest';
import { splitMessage, TELEGRAM_MAX_MESSAGE_LENGTH } from '../../utils/splitMessage.js';

describe('splitMessage', () => {
  it('returns short content unchanged', () => {
    expect(splitMessage('Bom dia!')).toEqual(['Bom dia!']);
  });

  it('keeps content of exactly the limit in one chunk', () => {
    const content = 'a'.repeat(TELEGRAM_MAX_MESSAGE_LENGTH);
    expect(splitMessage(content)).toEqual([content]);
  });

  it('prefers splitting at a newline', () => {
    expect(splitMessage('aaaa\nbbbb', 6)).toEqual(['aaaa', 'bbbb']);
  });

  it('falls back to a space', () => {
    expect(splitMessage('aaaa bbbb cc', 7)).toEqual(['aaaa', 'bbbb cc']);
  });

  it('hard-splits when there is no break', () => {
    expect(splitMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('does not cut an emoji in half on a hard split', () => {
    const chunks = splitMessage('a' + '🙂'.repeat(10), 4);

    expect(chunks).toEqual(['a🙂', '🙂🙂', '🙂🙂', '🙂🙂', '🙂🙂', '🙂']);
    expect(chunks.join('')).toBe('a' + '🙂'.repeat(10));
  });
});
