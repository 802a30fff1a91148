/**
 * Input sanitization and message content normalization.
 */

export const DEFAULT_MAX_INPUT_LENGTH = 2000;

// Every Cc code point (C0, DEL, C1) except tab, line feed and carriage return
const CONTROL_CHAR_RE = /[^\P{Cc}\t\n\r]/gu;

// Zero-width and bidi format characters, which can split a keyword invisibly
const FORMAT_CHAR_RE = /[\u200B-\u200F\u202A-\u202E\u2060-\u2064\uFEFF]/g;

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  const end = maxLength > 0 && isHighSurrogate(text.charCodeAt(maxLength - 1)) ? maxLength - 1 : maxLength;
  return text.slice(0, end);
}

/**
 * Strip control and invisible format characters, trim, and cap the length
 * without splitting a surrogate pair. Anything that is not a
 * string becomes the empty string.
 */
export function sanitizeUserInput(
  raw: unknown,
  maxLength: number = DEFAULT_MAX_INPUT_LENGTH
): string {
  if (typeof raw !== 'string') {
    return '';
  }
  const cleaned = raw.replace(CONTROL_CHAR_RE, '').replace(FORMAT_CHAR_RE, '').trim();
  return truncate(cleaned, maxLength);
}

function isTextPart(part: unknown): part is { text: unknown } {
  return typeof part === 'object' && part !== null && 'text' in part;
}

/**
 * Flatten model output into plain text. Structured content (a list of
 * labelled fragments) is joined with single spaces.
 */
export function normalizeContent(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    return content
      .map(part => (isTextPart(part) ? String(part.text) : String(part)))
      .join(' ');
  }
  if (content === null || content === undefined) {
    return '';
  }
  return String(content);
}
