// @callflow/parser - token scanner and heuristic call-graph extraction

// =============================================================================
// SCANNING
// =============================================================================

export { TokenKind, createToken } from './lexer/tokens.js';
export type { Token, TokenSource } from './lexer/tokens.js';
export { Scanner } from './lexer/scanner.js';
export type { ScannerOptions, TruncationPolicy } from './lexer/scanner.js';

// =============================================================================
// LANGUAGES
// =============================================================================

export type { LanguageProfile } from './languages/types.js';
export type { LanguageId } from './languages/registry.js';
export {
  LANGUAGE_IDS,
  getLanguageProfile,
} from './languages/registry.js';
export { goProfile } from './languages/go.js';

// =============================================================================
// GRAPH
// =============================================================================

export { CallGraph, GLOBAL_CALLER } from './graph/call-graph.js';
export type { CallEdge, GraphCheckpoint } from './graph/call-graph.js';
export { GraphExtractor, createExtractorState } from './graph/extractor.js';
export type { ExtractorState, GraphExtractorOptions } from './graph/extractor.js';
export { formatStatement, StatementCollector, LineSink } from './graph/statements.js';
export type { GraphStatement, StatementSink } from './graph/statements.js';
export {
  renderDocument,
  stripDocumentFrame,
  filterLines,
  createNameFilter,
  DOCUMENT_EXTENSIONS,
  DEFAULT_LAYOUT,
} from './graph/document.js';
export type { DocumentOptions } from './graph/document.js';

// =============================================================================
// PIPELINE
// =============================================================================

export { extractCallGraph } from './pipeline.js';
export type {
  LexErrorPolicy,
  SourceUnit,
  ExtractionOptions,
  ExtractionResult,
  SkippedUnit,
} from './pipeline.js';

// =============================================================================
// ERRORS & UTILITIES
// =============================================================================

export {
  CallflowError,
  CallflowErrorCode,
  LexError,
  TruncatedLiteralError,
  UnreadableInputError,
  InvalidInputError,
  ConfigError,
  isCallflowError,
  getErrorMessage,
  getErrorStack,
} from './errors/index.js';
export type { ErrorSeverity } from './errors/index.js';

export { Ok, Err, isOk, isErr, unwrap, unwrapOr } from './utils/result.js';
export type { Result } from './utils/result.js';

export { silentLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
