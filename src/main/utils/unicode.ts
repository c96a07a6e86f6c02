/**
 * ASCII transliteration helpers.
 */

/**
 * Characters that survive NFKD decomposition as non-ASCII code points but
 * still have an obvious ASCII stand-in.
 */
const ASCII_SUBSTITUTIONS: Record<string, string> = {
  '\u2018': "'", // ‘
  '\u2019': "'", // ’
  '\u201a': "'", // ‚
  '\u201b': "'", // ‛
  '\u201c': '"', // “
  '\u201d': '"', // ”
  '\u201e': '"', // „
  '\u00a1': '!', // ¡
  '\u00bf': '?', // ¿
  '\u2013': '-', // –
  '\u2014': '-', // —
};

/**
 * Returns true if every code point in the string is ASCII.
 */
export function isAscii(value: string): boolean {
  return /^[\x00-\x7F]*$/.test(value);
}

/**
 * Derives an ASCII form of a string: decomposes it (NFKD), keeps ASCII
 * code points, substitutes the characters in the table above and drops
 * everything else.
 *
 * @returns The ASCII form, or null if the input is already pure ASCII
 */
export function toAscii(value: string): string | null {
  if (isAscii(value)) {
    return null;
  }

  let result = '';
  for (const char of value.normalize('NFKD')) {
    if (isAscii(char)) {
      result += char;
    } else {
      result += ASCII_SUBSTITUTIONS[char] ?? '';
    }
  }
  return result;
}
