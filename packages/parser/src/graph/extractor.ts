import { TokenKind, createToken, type Token, type TokenSource } from '../lexer/tokens.js';
import type { LanguageProfile } from '../languages/types.js';
import { goProfile } from '../languages/go.js';
import { CallGraph, GLOBAL_CALLER } from './call-graph.js';
import type { StatementSink } from './statements.js';

/**
 * Nesting and declaration state for one input unit.
 */
export interface ExtractorState {
  parenDepth: number;
  braceDepth: number;
  inDeclarationHeader: boolean;
  inVariableBinding: boolean;
  currentFunctionName: string | undefined;
  previousToken: Token;
}

export function createExtractorState(): ExtractorState {
  return {
    parenDepth: 0,
    braceDepth: 0,
    inDeclarationHeader: false,
    inVariableBinding: false,
    currentFunctionName: undefined,
    previousToken: createToken(TokenKind.EndOfInput, '', 0),
  };
}

export interface GraphExtractorOptions {
  language?: LanguageProfile;
}

/**
 * Heuristic call-graph extractor.
 *
 * Walks a token stream without building a syntax tree:
 * - after the declaration keyword, the first identifier outside any parens
 *   or braces is the declared function's name
 * - after a binding keyword, calls are ignored until the `=`
 * - otherwise an identifier directly followed by `(` is a call from the
 *   current function, or from GLOBAL at top level
 *
 * One extractor serves a whole run. Its CallGraph persists across units so
 * a node or edge already emitted from one file is not emitted again from
 * another; the nesting state starts fresh for every unit.
 */
export class GraphExtractor {
  private readonly language: LanguageProfile;

  constructor(
    readonly graph: CallGraph = new CallGraph(),
    options: GraphExtractorOptions = {},
  ) {
    this.language = options.language ?? goProfile;
  }

  /**
   * Consume tokens until EndOfInput, writing node and edge statements to the sink.
   */
  process(tokens: TokenSource, sink: StatementSink): void {
    const state = createExtractorState();

    for (;;) {
      const token = tokens.nextToken();
      if (token.kind === TokenKind.EndOfInput) {
        return;
      }
      this.step(state, token, sink);
      state.previousToken = token;
    }
  }

  /**
   * Apply one token to the state. Rules are checked in priority order and
   * the first match wins.
   */
  step(state: ExtractorState, token: Token, sink: StatementSink): void {
    switch (token.kind) {
      case TokenKind.ReservedWord:
        if (token.lexeme === this.language.declarationKeyword) {
          state.inDeclarationHeader = true;
        } else if (this.language.bindingKeywords.has(token.lexeme)) {
          state.inVariableBinding = true;
        }
        break;

      case TokenKind.Identifier:
        if (
          state.inDeclarationHeader &&
          state.parenDepth === 0 &&
          state.braceDepth === 0 &&
          state.currentFunctionName === undefined
        ) {
          state.currentFunctionName = token.lexeme;
          if (this.graph.addNode(token.lexeme)) {
            sink.write({ kind: 'node', name: token.lexeme });
          }
        }
        break;

      case TokenKind.OpenParen:
        state.parenDepth++;
        if (
          !state.inDeclarationHeader &&
          !state.inVariableBinding &&
          state.previousToken.kind === TokenKind.Identifier
        ) {
          const caller = state.currentFunctionName ?? GLOBAL_CALLER;
          const callee = state.previousToken.lexeme;
          if (this.graph.addEdge(caller, callee)) {
            sink.write({ kind: 'edge', caller, callee });
          }
        }
        break;

      case TokenKind.CloseParen:
        state.parenDepth = Math.max(0, state.parenDepth - 1);
        break;

      case TokenKind.OpenBrace:
        state.braceDepth++;
        state.inDeclarationHeader = false;
        break;

      case TokenKind.CloseBrace:
        if (state.braceDepth > 0) {
          state.braceDepth--;
          if (state.braceDepth === 0) {
            state.currentFunctionName = undefined;
          }
        }
        break;

      case TokenKind.Equals:
        state.inVariableBinding = false;
        break;

      case TokenKind.NumberLiteral:
      case TokenKind.QuotedLiteral:
      case TokenKind.SymbolRun:
      case TokenKind.EndOfInput:
        break;
    }
  }
}
