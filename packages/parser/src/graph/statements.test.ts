import { describe, it, expect } from 'vitest';
import { formatStatement, LineSink, StatementCollector } from './statements.js';

describe('formatStatement', () => {
  it('should format a node statement', () => {
    expect(formatStatement({ kind: 'node', name: 'main' })).toBe('\t"main";');
  });

  it('should format an edge statement', () => {
    expect(formatStatement({ kind: 'edge', caller: 'GLOBAL', callee: 'init' })).toBe(
      '\t"GLOBAL" -> "init";',
    );
  });
});

describe('sinks', () => {
  it('should collect statements and render them as lines', () => {
    const collector = new StatementCollector();
    collector.write({ kind: 'node', name: 'a' });
    collector.write({ kind: 'edge', caller: 'a', callee: 'b' });

    expect(collector.lines()).toEqual(['\t"a";', '\t"a" -> "b";']);
  });

  it('should pass formatted lines to the writer', () => {
    const written: string[] = [];
    const sink = new LineSink(line => written.push(line));

    sink.write({ kind: 'edge', caller: 'x', callee: 'y' });

    expect(written).toEqual(['\t"x" -> "y";']);
  });
});
