const REPLACEMENT_CHARACTER = /\uFFFD/g;

/**
 * Decodes UTF-8 and drops invalid byte sequences instead of failing.
 * Genuine U+FFFD characters in the input are dropped as well.
 */
export function decodeLenient(buffer: Buffer): string {
  return buffer.toString('utf8').replace(REPLACEMENT_CHARACTER, '');
}

/** Cuts `text` to at most `maxChars` UTF-16 units without splitting a surrogate pair. */
export function truncateChars(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  const limit = Math.max(0, maxChars);
  const last = text.charCodeAt(limit - 1);
  const endsInHighSurrogate = limit > 0 && last >= 0xd800 && last <= 0xdbff;
  return text.slice(0, endsInHighSurrogate ? limit - 1 : limit);
}
