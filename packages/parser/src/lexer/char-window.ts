/**
 * Forward-only cursor over source text with bounded lookahead.
 *
 * `peek` never moves the cursor; only `advance` and `consumeThrough` consume.
 * Past the end every read yields the empty string.
 */
export class CharWindow {
  private position = 0;

  constructor(private readonly text: string) {}

  /**
   * Look at `count` characters starting `offset` characters ahead.
   * Returns fewer characters (possibly none) near the end of input.
   */
  peek(count = 1, offset = 0): string {
    const start = this.position + offset;
    return this.text.slice(start, start + count);
  }

  /**
   * The whole code point at the cursor, which may span two UTF-16 units.
   */
  peekCodePoint(): string {
    const code = this.text.codePointAt(this.position);
    return code === undefined ? '' : String.fromCodePoint(code);
  }

  /**
   * Consume and return one character, or '' at end of input.
   */
  advance(): string {
    if (this.position >= this.text.length) {
      return '';
    }
    return this.text[this.position++];
  }

  /**
   * Consume everything up to and including the next occurrence of `needle`.
   *
   * @returns the consumed text (needle included) and whether the needle was found;
   *          when it was not, the rest of the input is consumed
   */
  consumeThrough(needle: string): { text: string; found: boolean } {
    const index = this.text.indexOf(needle, this.position);
    const end = index === -1 ? this.text.length : index + needle.length;
    const consumed = this.text.slice(this.position, end);
    this.position = end;
    return { text: consumed, found: index !== -1 };
  }
}
