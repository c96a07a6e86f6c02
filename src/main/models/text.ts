/**
 * Text with native, ASCII and filename-safe representations.
 *
 * A `TextValue` is immutable. Its ASCII form is either the value itself (pure
 * ASCII input), derived by transliteration, or overridden by hand; an
 * override survives concatenation with anything.
 */

import { makeFileSafe, splitArticle } from '../utils/fileScanner';
import { toAscii } from '../utils/unicode';

/** How the ASCII form of a text relates to its value */
type Ascii =
  | { kind: 'same' }
  | { kind: 'derived'; value: string }
  | { kind: 'overridden'; value: string };

const SAME: Ascii = { kind: 'same' };

function asciiFor(ascii: Ascii, value: string): string {
  return ascii.kind === 'same' ? value : ascii.value;
}

export class TextValue {
  private constructor(
    private readonly text: string,
    private readonly asciiState: Ascii,
    /** Present only when it differs from the ASCII form */
    private readonly fileSafeText: string | null,
  ) {}

  /**
   * Creates a text, deriving the ASCII form unless one is given.
   * A non-ASCII override is transliterated itself but still counts as overridden.
   *
   * @example TextValue.create('本', 'book').ascii() === 'book'
   */
  static create(value: string, asciiOverride?: string | null): TextValue {
    let ascii: Ascii;
    if (asciiOverride !== undefined && asciiOverride !== null) {
      ascii = { kind: 'overridden', value: toAscii(asciiOverride) ?? asciiOverride };
    } else {
      const derived = toAscii(value);
      ascii = derived === null ? SAME : { kind: 'derived', value: derived };
    }
    return new TextValue(value, ascii, makeFileSafe(asciiFor(ascii, value)));
  }

  /**
   * Creates a text without an ASCII override.
   *
   * @example TextValue.from('bók').ascii() === 'bok'
   */
  static from(value: string): TextValue {
    return TextValue.create(value);
  }

  /**
   * Concatenates a sequence of texts left to right. The empty sequence
   * yields the empty text.
   */
  static concatAll(texts: Iterable<TextValue>): TextValue {
    let result = EMPTY_TEXT;
    for (const text of texts) {
      result = result.concat(text);
    }
    return result;
  }

  /** The native text */
  value(): string {
    return this.text;
  }

  /** The ASCII form: the override, the transliteration, or the value itself */
  ascii(): string {
    return asciiFor(this.asciiState, this.text);
  }

  /**
   * The ASCII form with filesystem-unsafe characters substituted.
   *
   * @example TextValue.from('foo: <bar>?').fileSafe() === 'foo - [bar]'
   */
  fileSafe(): string {
    return this.fileSafeText ?? this.ascii();
  }

  /**
   * The filename-safe form with a leading article moved to the end, so
   * names sort alphabetically.
   *
   * @example TextValue.from('The Bók').sortableFileSafe() === 'Bok, The'
   */
  sortableFileSafe(): string {
    const fileSafe = this.fileSafe();
    const split = splitArticle(fileSafe);
    if (split === null) {
      return fileSafe;
    }
    const [article, rest] = split;
    return `${rest}, ${article}`;
  }

  hasOverriddenAscii(): boolean {
    return this.asciiState.kind === 'overridden';
  }

  isEmpty(): boolean {
    return this.text.length === 0 && this.asciiState.kind === 'same';
  }

  /**
   * Appends another text. Neither operand changes; concatenating with the
   * empty text returns the other operand itself.
   */
  concat(other: TextValue): TextValue {
    if (this.isEmpty()) {
      return other;
    }
    if (other.isEmpty()) {
      return this;
    }

    const fileSafe =
      this.fileSafeText === null && other.fileSafeText === null
        ? null
        : this.fileSafe() + other.fileSafe();

    return new TextValue(
      this.text + other.text,
      TextValue.concatAscii(this, other),
      fileSafe === null ? null : (makeFileSafe(fileSafe) ?? fileSafe),
    );
  }

  private static concatAscii(left: TextValue, right: TextValue): Ascii {
    if (left.asciiState.kind === 'same' && right.asciiState.kind === 'same') {
      return SAME;
    }
    const value = left.ascii() + right.ascii();
    return left.hasOverriddenAscii() || right.hasOverriddenAscii()
      ? { kind: 'overridden', value }
      : { kind: 'derived', value };
  }

  equals(other: TextValue): boolean {
    if (this === other) {
      return true;
    }
    if (this.text !== other.text || this.fileSafeText !== other.fileSafeText) {
      return false;
    }
    const a = this.asciiState;
    const b = other.asciiState;
    if (a.kind === 'same' || b.kind === 'same') {
      return a.kind === b.kind;
    }
    return a.kind === b.kind && a.value === b.value;
  }

  toString(): string {
    return this.text;
  }
}

/** The identity element of concatenation */
export const EMPTY_TEXT: TextValue = TextValue.from('');

/** Separator placed between joined artist names */
export const COMMA_SEPARATOR: TextValue = TextValue.from(', ');

/**
 * Joins texts with `", "`. A single text is returned as is.
 *
 * @example commaSeparated([TextValue.from('a'), TextValue.create('b', 'c')]).ascii() === 'a, c'
 */
export function commaSeparated(texts: readonly TextValue[]): TextValue {
  if (texts.length === 1) {
    return texts[0];
  }
  let result = EMPTY_TEXT;
  texts.forEach((text, i) => {
    if (i !== 0) {
      result = result.concat(COMMA_SEPARATOR);
    }
    result = result.concat(text);
  });
  return result;
}

/** Element-wise equality of two text lists */
export function textListsEqual(a: readonly TextValue[], b: readonly TextValue[]): boolean {
  return a.length === b.length && a.every((text, i) => text.equals(b[i]));
}
