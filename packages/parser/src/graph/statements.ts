/**
 * Graph statements in discovery order, and the sinks that receive them.
 */

export type GraphStatement =
  | { kind: 'node'; name: string }
  | { kind: 'edge'; caller: string; callee: string };

export interface StatementSink {
  write(statement: GraphStatement): void;
}

/**
 * Render one statement as a DOT statement line.
 */
export function formatStatement(statement: GraphStatement): string {
  switch (statement.kind) {
    case 'node':
      return `\t"${statement.name}";`;
    case 'edge':
      return `\t"${statement.caller}" -> "${statement.callee}";`;
  }
}

/**
 * Buffers statements in memory.
 */
export class StatementCollector implements StatementSink {
  readonly statements: GraphStatement[] = [];

  write(statement: GraphStatement): void {
    this.statements.push(statement);
  }

  lines(): string[] {
    return this.statements.map(formatStatement);
  }
}

/**
 * Formats each statement and hands the line to a writer (stdout, a file, a test array).
 */
export class LineSink implements StatementSink {
  constructor(private readonly writeLine: (line: string) => void) {}

  write(statement: GraphStatement): void {
    this.writeLine(formatStatement(statement));
  }
}
