/**
 * Token kinds produced by the scanner.
 *
 * The set is closed: the extractor's state machine switches over it
 * exhaustively, so adding a kind means revisiting `GraphExtractor.step()`.
 */
export enum TokenKind {
  Identifier = 'Identifier',
  ReservedWord = 'ReservedWord',
  NumberLiteral = 'NumberLiteral',
  OpenParen = 'OpenParen',
  CloseParen = 'CloseParen',
  OpenBrace = 'OpenBrace',
  CloseBrace = 'CloseBrace',
  Equals = 'Equals',
  QuotedLiteral = 'QuotedLiteral',
  SymbolRun = 'SymbolRun', // catch-all punctuation run
  EndOfInput = 'EndOfInput',
}

export interface Token {
  readonly kind: TokenKind;
  readonly lexeme: string;
  /** 1-based line the token starts on */
  readonly line: number;
}

/**
 * Anything the extractor can pull tokens from.
 */
export interface TokenSource {
  nextToken(): Token;
}

export function createToken(kind: TokenKind, lexeme: string, line: number): Token {
  return Object.freeze({ kind, lexeme, line });
}

/**
 * Single characters that map to their own token kind.
 */
export const SINGLE_CHAR_KINDS: ReadonlyMap<string, TokenKind> = new Map([
  ['(', TokenKind.OpenParen],
  [')', TokenKind.CloseParen],
  ['{', TokenKind.OpenBrace],
  ['}', TokenKind.CloseBrace],
  ['=', TokenKind.Equals],
]);
