import { describe, it, expect } from 'vitest';
import { renderDocument, stripDocumentFrame, filterLines } from './document.js';

describe('renderDocument', () => {
  it('should wrap statements in a digraph', () => {
    expect(renderDocument(['\t"a";', '\t"a" -> "b";'])).toBe(
      '# dot -Ksfdp -Tpng input.gv -o output.png\n' +
        'digraph call_graph {\n' +
        '\tgraph [overlap=false];\n' +
        '\t"a";\n' +
        '\t"a" -> "b";\n' +
        '}\n',
    );
  });

  it('should name the configured layout engine', () => {
    const document = renderDocument([], { layout: 'dot' });

    expect(document.split('\n')[0]).toBe('# dot -Kdot -Tpng input.gv -o output.png');
    expect(document.endsWith('\tgraph [overlap=false];\n}\n')).toBe(true);
  });
});

describe('stripDocumentFrame', () => {
  it('should recover the statement lines of a rendered document', () => {
    const lines = ['\t"main";', '\t"main" -> "run";'];

    expect(stripDocumentFrame(renderDocument(lines))).toEqual(lines);
  });

  it('should drop attribute lines and blank lines', () => {
    const document = 'digraph g {\r\n\tnode [shape=box];\r\n\r\n\t"a" -> "b";\r\n}\r\n';

    expect(stripDocumentFrame(document)).toEqual(['\t"a" -> "b";']);
  });
});

describe('filterLines', () => {
  const lines = ['\t"main" -> "mainLoop";', '\t"init" -> "setup";', '\t"GLOBAL" -> "main";'];

  it('should keep lines naming any filter as a whole word', () => {
    expect(filterLines(lines, ['main'])).toEqual([lines[0], lines[2]]);
    expect(filterLines(lines, ['setup', 'GLOBAL'])).toEqual([lines[1], lines[2]]);
  });

  it('should not match inside longer names', () => {
    expect(filterLines(lines, ['Loop'])).toEqual([]);
    expect(filterLines(lines, ['mai'])).toEqual([]);
  });

  it('should keep everything without filters', () => {
    expect(filterLines(lines, [])).toEqual(lines);
  });

  it('should match names literally', () => {
    expect(filterLines(['\t"axb";', '\t"a.b";'], ['a.b'])).toEqual(['\t"a.b";']);
  });
});
