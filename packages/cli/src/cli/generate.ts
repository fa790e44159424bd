import {
  extractCallGraph,
  filterLines,
  formatStatement,
  getLanguageProfile,
  isErr,
  renderDocument,
  stripDocumentFrame,
  InvalidInputError,
  type Logger,
  type SourceUnit,
} from '@callflow/parser';
import { loadConfig, applyOverrides } from '../config/loader.js';
import type { CallflowConfig } from '../config/schema.js';
import {
  checkSourceExtension,
  expandInputPaths,
  readGraphDocument,
  readSourceUnit,
} from '../input/sources.js';
import { createCliLogger } from '../utils/logger.js';
import { TaskSpinner, formatDuration, formatFileCount, handleCommandError } from './utils.js';

export interface GenerateOptions {
  /** Source files (or glob patterns) to extract from */
  paths?: string[];
  /** Existing .gv/.dot document to re-filter */
  source?: string;
  /** Keep only statements naming one of these functions */
  filter?: string[];
  config?: string;
  abortOnError?: boolean;
  strict?: boolean;
  verbose?: boolean;
}

/**
 * Collect source units, rejecting wrong extensions and unreadable files
 * with a diagnostic rather than failing the run.
 */
async function collectUnits(
  inputs: readonly string[],
  config: CallflowConfig,
  logger: Logger,
): Promise<SourceUnit[]> {
  const units: SourceUnit[] = [];

  for (const filePath of await expandInputPaths(inputs, logger)) {
    const accepted = checkSourceExtension(filePath, config.extensions);
    if (isErr(accepted)) {
      logger.error(accepted.error.message);
      continue;
    }

    const unit = await readSourceUnit(filePath);
    if (isErr(unit)) {
      logger.error(unit.error.message);
      continue;
    }
    units.push(unit.value);
  }

  return units;
}

async function statementsFromSources(
  inputs: readonly string[],
  config: CallflowConfig,
  logger: Logger,
  verbose: boolean,
): Promise<string[]> {
  const startedAt = Date.now();
  const units = await collectUnits(inputs, config, logger);

  // Verbose runs print the summary through the logger instead
  const spinner = new TaskSpinner(`Extracting call graph from ${formatFileCount(units.length)}...`, {
    silent: verbose,
  });
  try {
    const result = extractCallGraph(units, {
      language: getLanguageProfile(config.language),
      onLexError: config.onLexError,
      truncation: config.truncation,
      logger,
    });

    const summary =
      `${result.graph.nodes.length} nodes, ${result.graph.edges.length} edges ` +
      `from ${formatFileCount(result.processed.length)} in ${formatDuration(Date.now() - startedAt)}`;
    spinner.succeed(summary);
    logger.debug(summary);
    if (result.skipped.length > 0) {
      logger.debug(`Skipped ${formatFileCount(result.skipped.length)}: ${result.skipped.map(s => s.source).join(', ')}`);
    }

    return result.statements.map(formatStatement);
  } catch (error) {
    spinner.fail('Call graph extraction failed');
    throw error;
  }
}

async function statementsFromDocument(source: string): Promise<string[]> {
  return stripDocumentFrame(await readGraphDocument(source));
}

/**
 * Build the call graph document and write it to stdout.
 *
 * @returns process exit code
 */
export async function generateCommand(options: GenerateOptions): Promise<number> {
  const verbose = options.verbose ?? false;
  const logger = createCliLogger({ verbose });

  try {
    const hasPaths = options.paths !== undefined && options.paths.length > 0;
    if (hasPaths === (options.source !== undefined)) {
      throw new InvalidInputError('Provide exactly one of --paths or --source');
    }

    const config = applyOverrides(await loadConfig({ configPath: options.config }), options);

    const statements = options.source
      ? await statementsFromDocument(options.source)
      : await statementsFromSources(options.paths ?? [], config, logger, verbose);

    const document = renderDocument(filterLines(statements, options.filter ?? []), {
      layout: config.layout,
    });
    process.stdout.write(document);
    return 0;
  } catch (error) {
    handleCommandError(error, verbose);
    return 1;
  }
}
