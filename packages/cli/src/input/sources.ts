import fs from 'fs/promises';
import path from 'path';
import { glob, hasMagic } from 'glob';
import {
  DOCUMENT_EXTENSIONS,
  InvalidInputError,
  UnreadableInputError,
  Ok,
  Err,
  getErrorMessage,
  type Logger,
  type Result,
  type SourceUnit,
} from '@callflow/parser';

/**
 * Expand glob patterns among the given paths. Plain paths pass through
 * untouched (their existence is checked when they are read), and so does an
 * existing file whose name only looks like a pattern, such as `handler[v2].go`.
 * Each pattern contributes its matching files in sorted order. Duplicates are
 * dropped, keeping the first position.
 */
export async function expandInputPaths(inputs: readonly string[], logger: Logger): Promise<string[]> {
  const files: string[] = [];

  for (const input of inputs) {
    if (!hasMagic(input) || (await isFile(input))) {
      files.push(input);
      continue;
    }

    const matches = await glob(input, { nodir: true });
    if (matches.length === 0) {
      logger.warning(`No files match ${input}`);
    }
    files.push(...matches.sort());
  }

  return Array.from(new Set(files));
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
}

/**
 * Check a source path against the accepted extensions.
 */
export function checkSourceExtension(
  filePath: string,
  extensions: readonly string[],
): Result<string, InvalidInputError> {
  const ext = path.extname(filePath).toLowerCase();
  if (!extensions.includes(ext)) {
    return Err(new InvalidInputError(`Incorrect file extension on ${filePath}`, { path: filePath, extensions }));
  }
  return Ok(filePath);
}

/**
 * Read one source file as an extraction unit.
 */
export async function readSourceUnit(filePath: string): Promise<Result<SourceUnit, UnreadableInputError>> {
  try {
    const text = await fs.readFile(filePath, 'utf-8');
    return Ok({ source: filePath, text });
  } catch (error) {
    return Err(new UnreadableInputError(filePath, { reason: getErrorMessage(error) }));
  }
}

/**
 * Read an existing graph document.
 *
 * @throws {InvalidInputError} if the path is not a .gv or .dot file
 * @throws {UnreadableInputError} if the file cannot be read
 */
export async function readGraphDocument(filePath: string): Promise<string> {
  if (!DOCUMENT_EXTENSIONS.some(ext => filePath.endsWith(ext))) {
    throw new InvalidInputError(`Incorrect file extension on ${filePath}`, {
      path: filePath,
      extensions: [...DOCUMENT_EXTENSIONS],
    });
  }

  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new UnreadableInputError(filePath, { reason: getErrorMessage(error) });
  }
}
