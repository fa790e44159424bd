/**
 * DOT document framing and line filtering.
 *
 * The extractor only produces statement lines; these helpers wrap them in a
 * `digraph` and reduce existing documents back to their statements.
 */

export const DOCUMENT_EXTENSIONS = ['.gv', '.dot'] as const;

export const DEFAULT_LAYOUT = 'sfdp';

export interface DocumentOptions {
  /** Graphviz layout engine named in the render hint comment */
  layout?: string;
}

/** Lines carrying any of these characters are framing, not statements */
const FRAMING_LINE = /[#{}=]/;

/**
 * Wrap statement lines in a call_graph digraph.
 */
export function renderDocument(lines: readonly string[], options: DocumentOptions = {}): string {
  const layout = options.layout ?? DEFAULT_LAYOUT;
  return [
    `# dot -K${layout} -Tpng input.gv -o output.png`,
    'digraph call_graph {',
    '\tgraph [overlap=false];',
    ...lines,
    '}',
  ].join('\n') + '\n';
}

/**
 * Reduce a DOT document to its node and edge statement lines, dropping the
 * hint comment, the digraph header, attribute lines, braces and blank lines.
 */
export function stripDocumentFrame(document: string): string[] {
  return document
    .split(/\r?\n/)
    .filter(line => line.trim().length > 0 && !FRAMING_LINE.test(line));
}

const WORD_CHAR = 'A-Za-z0-9_';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a predicate matching lines that contain at least one of the names as
 * a whole word. Names are literal text, not patterns.
 */
export function createNameFilter(names: readonly string[]): (line: string) => boolean {
  const patterns = names
    .filter(name => name.length > 0)
    .map(name => new RegExp(`(?<![${WORD_CHAR}])${escapeRegExp(name)}(?![${WORD_CHAR}])`));

  if (patterns.length === 0) {
    return () => true;
  }
  return line => patterns.some(pattern => pattern.test(line));
}

/**
 * Keep lines mentioning any of the names; an empty name list keeps everything.
 */
export function filterLines(lines: readonly string[], names: readonly string[]): string[] {
  const matches = createNameFilter(names);
  return lines.filter(matches);
}
