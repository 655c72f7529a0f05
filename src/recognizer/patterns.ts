/**
 * Address Patterns
 * Unicode-aware regular expressions for three-word address shapes
 */

// Full stops of the scripts the word lists cover; `.` is the canonical one
export const ADDRESS_DELIMITERS = [
  '.',
  '\uFF61', // halfwidth ideographic full stop
  '\u3002', // ideographic full stop
  '\uFF65', // halfwidth katakana middle dot
  '\u30FB', // katakana middle dot
  '\uFE12', // vertical ideographic full stop
  '\u17D4', // khmer sign khan
  '\u0589', // armenian full stop
  '\u104B', // myanmar sign section
  '\u06D4', // arabic full stop
  '\u1362', // ethiopic full stop
  '\u0964', // devanagari danda
] as const;

// Separators people type in place of the full stop
export const LOOSE_SEPARATORS = [
  ' ',
  '\u00A0',
  '\u3000',
  '-',
  '_',
  ',',
  '/',
  '\\',
  '+',
  "'",
  '&',
  ':',
  ';',
  '|',
] as const;

function characterClass(chars: readonly string[]): string {
  const escaped = chars.map((char) => char.replace(/[\\\]\-^]/g, '\\$&'));
  return `[${escaped.join('')}]`;
}

// One letter of any script, combining marks included (Devanagari, Thai, ...)
const WORD_CHAR = '[\\p{L}\\p{M}]';
// Anything that would glue onto a word and make it part of a longer token
const TOKEN_CHAR = '[\\p{L}\\p{M}\\p{N}_]';
const DELIMITER = characterClass(ADDRESS_DELIMITERS);
const SEPARATOR = characterClass([...ADDRESS_DELIMITERS, ...LOOSE_SEPARATORS]);

const WORD = `${WORD_CHAR}+`;

// The backreference keeps both delimiters identical
const ADDRESS_BODY = `${WORD}(${DELIMITER})${WORD}\\1${WORD}`;

export const POSSIBLE_ADDRESS_PATTERN = new RegExp(`^${ADDRESS_BODY}$`, 'u');

/**
 * Standalone occurrences inside free text. The lookarounds reject a
 * candidate glued to a letter, digit or further dotted segment on either
 * side, so `a.b.c.d` yields nothing while a sentence-ending full stop after
 * an address is left out of the match.
 */
export const EMBEDDED_ADDRESS_PATTERN = new RegExp(
  `(?<!${TOKEN_CHAR}|${TOKEN_CHAR}${DELIMITER})${ADDRESS_BODY}(?!${TOKEN_CHAR}|${DELIMITER}${TOKEN_CHAR})`,
  'gu'
);

export const DID_YOU_MEAN_PATTERN = new RegExp(
  `^${WORD}(${SEPARATOR}{1,2})${WORD}\\1${WORD}$`,
  'u'
);
