import { EmptyKeyError } from '@/modules/conversion/domain/conversion-error';

/**
 * Headers made of a single symbol become a word instead of an empty key.
 */
export const SYMBOL_WORDS: ReadonlyMap<string, string> = new Map([
  ['#', 'number'],
  ['@', 'at'],
  ['%', 'percent'],
  ['$', 'usd'],
  ['/', 'slash'],
  ['&', 'and'],
]);

const SUBSTITUTIONS: ReadonlyMap<string, string> = new Map([
  ['/', '_'],
  ['&', '_and_'],
  ['@', '_at_'],
  ['#', '_'],
  ['%', '_percent_'],
  ['$', '_usd_'],
]);

const WORD_CHAR = /[\p{L}\p{Nd}]/u;

export function fileBaseName(originalName: string): string {
  const name = originalName.split(/[\\/]/).pop() ?? originalName;
  return name.replace(/\.[^/.]+$/, '').trim();
}

/**
 * Maps a header cell to a JSON key: lowercase letters, digits and single
 * underscores, never starting or ending with one.
 *
 * - "Profit & Loss" -> "profit_and_loss"
 * - "Tax%Rate" -> "tax_percent_rate"
 * - "Amount (USD)" -> "amount_usd"
 * - "#" -> "number"
 *
 * @param position 0-based column, only used in the error message
 * @throws EmptyKeyError when nothing usable is left
 */
export function normalizeHeader(raw: string, position?: number): string {
  const trimmed = raw.trim();

  const word = SYMBOL_WORDS.get(trimmed.toLowerCase());
  if (word !== undefined) return word;

  // compatibility forms fold first ("m²" -> "m2"); marks left over count as separators
  const folded = trimmed.toLowerCase().normalize('NFKC');

  let out = '';
  for (const ch of folded) {
    if (ch === '(' || ch === ')') continue;

    const substitute = SUBSTITUTIONS.get(ch);
    if (substitute !== undefined) {
      out += substitute;
    } else if (WORD_CHAR.test(ch)) {
      out += ch;
    } else {
      // whitespace and any other punctuation
      out += '_';
    }
  }

  const key = out
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');

  if (!key) {
    throw new EmptyKeyError(raw, position);
  }
  return key;
}
