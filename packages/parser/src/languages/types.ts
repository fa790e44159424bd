import type { LanguageId } from './registry.js';

/**
 * Lexical and declaration vocabulary for one analyzed language.
 *
 * The scanner only needs character classes and the keyword set; the
 * extractor only needs to know which reserved words open a function
 * declaration header and which open a variable binding.
 */
export interface LanguageProfile {
  /** Language identifier (e.g., 'go') */
  id: LanguageId;

  /** Source file extensions including the dot (e.g., ['.go']) */
  extensions: readonly string[];

  /** Closed set of reserved words; every other identifier run is an Identifier */
  keywords: ReadonlySet<string>;

  /** Reserved word that starts a function declaration header */
  declarationKeyword: string;

  /** Reserved words that start a variable binding */
  bindingKeywords: ReadonlySet<string>;

  /** Characters that open (and close) a quoted literal, raw-string delimiters included */
  quoteDelimiters: ReadonlySet<string>;

  /** Punctuation consumed greedily into a single SymbolRun token */
  symbolCharacters: ReadonlySet<string>;
}
