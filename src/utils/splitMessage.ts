/** Telegram rejects messages longer than this many characters. */
export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;

export function splitMessage(content: string, maxLength: number = TELEGRAM_MAX_MESSAGE_LENGTH): string[] {
  if (content.length <= maxLength) return [content];

  const chunks: string[] = [];
  let remaining = content;

  while (remaining.length > 0) {
    if (remaining.length <= maxLength) {
      chunks.push(remaining);
      break;
    }

    // Try to split at a newline near the limit
    let splitIdx = remaining.lastIndexOf('\n', maxLength);
    if (splitIdx < maxLength * 0.5) {
      // No good newline break, split at space
      splitIdx = remaining.lastIndexOf(' ', maxLength);
    }
    if (splitIdx < maxLength * 0.5) {
      // No good break at all, hard split
      splitIdx = maxLength;
      // Keep surrogate pairs (emoji etc.) in one chunk
      const code = remaining.charCodeAt(splitIdx - 1);
      if (code >= 0xd800 && code <= 0xdbff && splitIdx > 1) {
        splitIdx--;
      }
    }

    chunks.push(remaining.slice(0, splitIdx));
    remaining = remaining.slice(splitIdx).trimStart();
  }

  return chunks;
}
