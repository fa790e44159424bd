import { CharWindow } from './char-window.js';
import { SINGLE_CHAR_KINDS, TokenKind, createToken, type Token, type TokenSource } from './tokens.js';
import type { LanguageProfile } from '../languages/types.js';
import { goProfile } from '../languages/go.js';
import { LexError, TruncatedLiteralError } from '../errors/index.js';
import { Err, Ok, isOk, type Result } from '../utils/result.js';

/**
 * What to do when input ends inside a literal or block comment.
 * - lenient: keep the partial text, record a diagnostic, keep scanning
 * - strict: throw the TruncatedLiteralError
 */
export type TruncationPolicy = 'lenient' | 'strict';

export interface ScannerOptions {
  /** Name used in diagnostics, usually the file path */
  source?: string;
  language?: LanguageProfile;
  truncation?: TruncationPolicy;
}

const WORD_START = /[A-Za-z_]/;
const WORD_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const WHITESPACE = /\s/;

/**
 * Lexical scanner producing tokens lazily from one unit of source text.
 *
 * A scanner is single-use: create a fresh one per file.
 */
export class Scanner implements TokenSource {
  private readonly input: CharWindow;
  private readonly source: string;
  private readonly language: LanguageProfile;
  private readonly truncation: TruncationPolicy;
  private line = 1;

  /** Truncation signals recorded under the lenient policy */
  readonly diagnostics: TruncatedLiteralError[] = [];

  constructor(text: string, options: ScannerOptions = {}) {
    this.input = new CharWindow(text);
    this.source = options.source ?? '<input>';
    this.language = options.language ?? goProfile;
    this.truncation = options.truncation ?? 'lenient';
  }

  /**
   * Produce the next token. Once EndOfInput has been returned, every later
   * call returns EndOfInput again.
   *
   * @throws {LexError} on a character no rule accepts
   * @throws {TruncatedLiteralError} on unterminated literals under the strict policy
   */
  nextToken(): Token {
    for (;;) {
      this.skipWhitespace();

      const line = this.line;
      const ch = this.input.peek();

      if (ch === '') {
        return createToken(TokenKind.EndOfInput, '', line);
      }

      if (WORD_START.test(ch)) {
        const word = this.readWord();
        const kind = this.language.keywords.has(word) ? TokenKind.ReservedWord : TokenKind.Identifier;
        return createToken(kind, word, line);
      }

      if (DIGIT.test(ch)) {
        return createToken(TokenKind.NumberLiteral, this.readNumber(), line);
      }

      const singleKind = SINGLE_CHAR_KINDS.get(ch);
      if (singleKind) {
        this.input.advance();
        return createToken(singleKind, ch, line);
      }

      if (this.language.quoteDelimiters.has(ch)) {
        this.input.advance(); // opening delimiter
        return createToken(TokenKind.QuotedLiteral, this.settle(this.readQuoted(ch, line)), line);
      }

      if (this.startsComment()) {
        this.skipComment(line);
        continue;
      }

      // Must come after comment handling: '/' is also a symbol character
      if (this.language.symbolCharacters.has(ch)) {
        return createToken(TokenKind.SymbolRun, this.readSymbolRun(), line);
      }

      throw new LexError(this.input.peekCodePoint(), line, this.source);
    }
  }

  /**
   * Iterate tokens up to and including EndOfInput.
   */
  *tokens(): Generator<Token> {
    for (;;) {
      const token = this.nextToken();
      yield token;
      if (token.kind === TokenKind.EndOfInput) {
        return;
      }
    }
  }

  private skipWhitespace(): void {
    let ch = this.input.peek();
    while (ch !== '' && WHITESPACE.test(ch)) {
      this.consume();
      ch = this.input.peek();
    }
  }

  private readWord(): string {
    let word = '';
    while (WORD_PART.test(this.input.peek())) {
      word += this.input.advance();
    }
    return word;
  }

  /** `[0-9]+(\.[0-9]+)?` */
  private readNumber(): string {
    let digits = this.readDigits();
    if (this.input.peek() === '.' && DIGIT.test(this.input.peek(1, 1))) {
      digits += this.input.advance();
      digits += this.readDigits();
    }
    return digits;
  }

  private readDigits(): string {
    let digits = '';
    while (DIGIT.test(this.input.peek())) {
      digits += this.input.advance();
    }
    return digits;
  }

  private readSymbolRun(): string {
    let run = this.input.advance();
    while (this.language.symbolCharacters.has(this.input.peek()) && !this.startsComment()) {
      run += this.input.advance();
    }
    return run;
  }

  private startsComment(): boolean {
    const pair = this.input.peek(2);
    return pair === '//' || pair === '/*';
  }

  /**
   * Read a literal body up to the closing delimiter, honoring backslash
   * escapes: the delimiter closes the literal only when preceded by an even
   * number of backslashes. The opening delimiter is already consumed.
   */
  private readQuoted(delimiter: string, startLine: number): Result<string, TruncatedLiteralError> {
    let body = '';
    let backslashes = 0;

    for (;;) {
      const ch = this.consume();
      if (ch === '') {
        return Err(new TruncatedLiteralError('literal', body, startLine, this.source));
      }
      if (ch === delimiter && backslashes % 2 === 0) {
        return Ok(body);
      }
      backslashes = ch === '\\' ? backslashes + 1 : 0;
      body += ch;
    }
  }

  /**
   * Consume a line or block comment. Comments have no escapes: a block
   * comment ends at the first `*` `/` pair, whatever precedes it.
   */
  private skipComment(startLine: number): void {
    const terminator = this.input.peek(2) === '//' ? '\n' : '*/';
    this.input.advance();
    this.input.advance();

    const { text, found } = this.input.consumeThrough(terminator);
    this.line += countNewlines(text);

    if (!found && terminator === '*/') {
      this.settle(Err(new TruncatedLiteralError('comment', text, startLine, this.source)));
    }
  }

  /**
   * Apply the truncation policy to a scan result.
   */
  private settle(result: Result<string, TruncatedLiteralError>): string {
    if (isOk(result)) {
      return result.value;
    }
    if (this.truncation === 'strict') {
      throw result.error;
    }
    this.diagnostics.push(result.error);
    return result.error.partial;
  }

  private consume(): string {
    const ch = this.input.advance();
    if (ch === '\n') {
      this.line++;
    }
    return ch;
  }
}

function countNewlines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === '\n') {
      count++;
    }
  }
  return count;
}
