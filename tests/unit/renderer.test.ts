import { describe, expect, it } from 'vitest';
import { flattenSummary, formatRenderLine, renderTree, renderTreeText } from '../../src/tree/renderer.js';
import type { SummaryTree } from '../../src/types.js';

const example: SummaryTree = new Map<string, string | SummaryTree>([
  ['a.py', 'desc A'],
  ['sub', new Map([['b.py', 'desc B']])],
]);

describe('flattenSummary', () => {
  it('joins lines with a pipe after trimming', () => {
    expect(flattenSummary('line1\nline2\n')).toBe('line1 | line2');
  });

  it('handles every line-break style', () => {
    expect(flattenSummary('  a\r\nb\rc  ')).toBe('a | b | c');
  });
});

describe('renderTree', () => {
  it('renders files with summaries and directories with a slash', () => {
    expect(renderTree(example).map(formatRenderLine)).toEqual([
      '├── a.py    desc A',
      '└── sub/',
      '    └── b.py    desc B',
    ]);
  });

  it('produces structured lines', () => {
    expect(renderTree(example)).toEqual([
      { prefix: '', connector: '├── ', name: 'a.py', kind: 'file', summary: 'desc A' },
      { prefix: '', connector: '└── ', name: 'sub', kind: 'directory' },
      { prefix: '    ', connector: '└── ', name: 'b.py', kind: 'file', summary: 'desc B' },
    ]);
  });

  it('continues the vertical bar under a directory that is not last', () => {
    const tree: SummaryTree = new Map<string, string | SummaryTree>([
      ['src', new Map<string, string | SummaryTree>([
        ['x.ts', 'X'],
        ['lib', new Map([['y.ts', 'Y']])],
      ])],
      ['z.md', 'Z'],
    ]);

    expect(renderTree(tree).map(formatRenderLine)).toEqual([
      '├── src/',
      '│   ├── x.ts    X',
      '│   └── lib/',
      '│       └── y.ts    Y',
      '└── z.md    Z',
    ]);
  });

  it('keeps map order instead of sorting', () => {
    const tree: SummaryTree = new Map([['zeta.py', 'Z'], ['alpha.py', 'A']]);

    expect(renderTree(tree).map(line => line.name)).toEqual(['zeta.py', 'alpha.py']);
  });

  it('puts a multi-line summary on one line', () => {
    const tree: SummaryTree = new Map([['a.py', 'Purpose: parsing\nFunctions: parse()\n']]);

    expect(renderTree(tree).map(formatRenderLine)).toEqual(['└── a.py    Purpose: parsing | Functions: parse()']);
  });
});

describe('renderTreeText', () => {
  it('adds the title header and terminates every line', () => {
    expect(renderTreeText(example)).toBe(
      'Code Summary Tree\n' +
      '=================\n' +
      '\n' +
      '├── a.py    desc A\n' +
      '└── sub/\n' +
      '    └── b.py    desc B\n'
    );
  });

  it('is identical across renders', () => {
    expect(renderTreeText(example)).toBe(renderTreeText(example));
  });

  it('renders only the header for an empty tree', () => {
    expect(renderTreeText(new Map())).toBe('Code Summary Tree\n=================\n\n');
  });
});
