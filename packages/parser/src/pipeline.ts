import { Scanner, type TruncationPolicy } from './lexer/scanner.js';
import { GraphExtractor } from './graph/extractor.js';
import { CallGraph } from './graph/call-graph.js';
import { StatementCollector, type GraphStatement, type StatementSink } from './graph/statements.js';
import type { LanguageProfile } from './languages/types.js';
import { goProfile } from './languages/go.js';
import {
  LexError,
  TruncatedLiteralError,
  getErrorMessage,
  type CallflowError,
} from './errors/index.js';
import { silentLogger, type Logger } from './utils/logger.js';

/**
 * What a lexical failure in one unit does to the run.
 * - skip-file: discard that unit's contributions, report, continue
 * - abort-run: rethrow, the run produces nothing
 */
export type LexErrorPolicy = 'skip-file' | 'abort-run';

export interface SourceUnit {
  /** Identifier used in diagnostics, usually the file path */
  source: string;
  text: string;
}

export interface ExtractionOptions {
  language?: LanguageProfile;
  onLexError?: LexErrorPolicy;
  truncation?: TruncationPolicy;
  logger?: Logger;
  /** Receives each unit's statements once the unit has been fully extracted */
  sink?: StatementSink;
  /** Shared graph, for callers that extract in several batches */
  graph?: CallGraph;
}

export interface SkippedUnit {
  source: string;
  error: CallflowError;
}

export interface ExtractionResult {
  statements: GraphStatement[];
  graph: CallGraph;
  processed: string[];
  skipped: SkippedUnit[];
  /** Non-fatal signals such as truncated literals under the lenient policy */
  diagnostics: CallflowError[];
}

function isLexicalFailure(error: unknown): error is LexError | TruncatedLiteralError {
  return error instanceof LexError || error instanceof TruncatedLiteralError;
}

/**
 * Extract one call graph from a sequence of source units.
 *
 * Units are processed one after another, each to completion, with a fresh
 * scanner and fresh nesting state. Statements of a unit are released only
 * after the unit finishes, so under skip-file a failing unit leaves no
 * trace in the output or in the dedup sets.
 *
 * @throws {LexError | TruncatedLiteralError} under the abort-run policy
 */
export function extractCallGraph(
  units: Iterable<SourceUnit>,
  options: ExtractionOptions = {},
): ExtractionResult {
  const language = options.language ?? goProfile;
  const policy = options.onLexError ?? 'skip-file';
  const logger = options.logger ?? silentLogger;
  const graph = options.graph ?? new CallGraph();
  const extractor = new GraphExtractor(graph, { language });

  const result: ExtractionResult = {
    statements: [],
    graph,
    processed: [],
    skipped: [],
    diagnostics: [],
  };

  for (const unit of units) {
    const checkpoint = graph.checkpoint();
    const collector = new StatementCollector();
    const scanner = new Scanner(unit.text, {
      source: unit.source,
      language,
      truncation: options.truncation,
    });

    try {
      extractor.process(scanner, collector);
    } catch (error) {
      if (!isLexicalFailure(error) || policy === 'abort-run') {
        throw error;
      }
      graph.rollback(checkpoint);
      result.skipped.push({ source: unit.source, error });
      logger.warning(`Skipping ${unit.source}: ${getErrorMessage(error)}`);
      continue;
    }

    for (const diagnostic of scanner.diagnostics) {
      logger.warning(diagnostic.message);
    }
    result.diagnostics.push(...scanner.diagnostics);
    result.processed.push(unit.source);
    result.statements.push(...collector.statements);
    for (const statement of collector.statements) {
      options.sink?.write(statement);
    }
    logger.debug(`${unit.source}: ${collector.statements.length} statement(s)`);
  }

  return result;
}
