/**
 * Query Text Helpers
 *
 * Markup stripping, normalization and tokenization shared by the cleaner and
 * the enricher. Term matching works on token sequences, so a short term such
 * as "vs" only matches the word "vs" and never the inside of "canvas".
 */

const HTML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

// C0 and C1 control characters, zero-width characters and BOM
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f\u200b-\u200f\ufeff]/g;

/**
 * Remove HTML tags, decode entities and drop markdown emphasis/code marks
 */
export function stripMarkup(text: string): string {
  let cleaned = text;

  // Remove script and style elements
  cleaned = cleaned.replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, ' ');
  cleaned = cleaned.replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, ' ');

  cleaned = cleaned.replace(/<[^>]+>/g, ' ');

  // Double-encoded input ("&amp;amp;") decodes one layer per pass
  let previous: string;
  do {
    previous = cleaned;
    cleaned = cleaned.replace(/&[a-z0-9#]+;/gi, (entity) => HTML_ENTITIES[entity.toLowerCase()] ?? ' ');
  } while (cleaned !== previous);

  // Anything left of a tag after decoding is noise in a search query
  cleaned = cleaned.replace(/[<>`*]/g, ' ');

  return cleaned;
}

export function stripControlCharacters(text: string): string {
  return text.replace(CONTROL_CHARACTERS, ' ');
}

/**
 * NFKC, lowercase, straight apostrophes and single spaces
 */
export function normalizeText(text: string): string {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[\u2018\u2019\u02bc]/g, "'")
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Full query cleaning: control characters, markup, then normalization
 */
export function cleanQueryText(text: string): string {
  return normalizeText(stripMarkup(stripControlCharacters(text)));
}

export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(/[^\p{L}\p{N}']+/u)
    .map((token) => token.replace(/^'+|'+$/g, ''))
    .filter((token) => token.length > 0);
}

/**
 * Light stem: folds regular plurals onto their singular
 */
export function stem(token: string): string {
  if (token.length > 3 && token.endsWith('s') && !token.endsWith('ss')) {
    return token.slice(0, -1);
  }
  return token;
}

/**
 * True when `termTokens` appears as a contiguous run inside `tokens`
 */
export function containsTokenSequence(tokens: readonly string[], termTokens: readonly string[]): boolean {
  if (termTokens.length === 0 || termTokens.length > tokens.length) {
    return false;
  }

  for (let start = 0; start <= tokens.length - termTokens.length; start++) {
    let matched = true;
    for (let offset = 0; offset < termTokens.length; offset++) {
      if (tokens[start + offset] !== termTokens[offset]) {
        matched = false;
        break;
      }
    }
    if (matched) {
      return true;
    }
  }

  return false;
}
