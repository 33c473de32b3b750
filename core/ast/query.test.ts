import { describe, it, expect } from 'vitest';
import type { TexNode } from '@core/types';
import { parseLatex } from '@core/parser';
import {
  childNodes,
  findAll,
  findCommands,
  findEnvironments,
  getAbstract,
  getCitationKeys,
  getSections,
  getTextContent,
  getTitle,
  walk
} from './query';
import { formatTree } from './tree';

const paper = [
  '\\title{My \\emph{Paper}}',
  '\\begin{abstract}Short.\\end{abstract}',
  '\\section{Intro}See \\cite{a, b}.',
  '\\subsection*{Detail}$x$ \\citep[see][p.~2]{c}'
].join('\n');

describe('document queries', () => {
  const { ast } = parseLatex(paper);

  it('finds the title and its text', () => {
    const title = getTitle(ast);

    expect(title?.name).toBe('title');
    expect(title && getTextContent(title)).toBe('My Paper');
  });

  it('finds the abstract environment', () => {
    const abstract = getAbstract(ast);

    expect(abstract?.name).toBe('abstract');
    expect(abstract && getTextContent(abstract)).toBe('Short.');
  });

  it('lists sections with level, title and numbering', () => {
    const sections = getSections(ast).map(({ level, title, numbered }) => ({ level, title, numbered }));

    expect(sections).toEqual([
      { level: 2, title: 'Intro', numbered: true },
      { level: 3, title: 'Detail', numbered: false }
    ]);
  });

  it('collects citation keys in order', () => {
    expect(getCitationKeys(ast)).toEqual(['a', 'b', 'c']);
  });

  it('searches inside arguments', () => {
    expect(findCommands(ast, 'emph')).toHaveLength(1);
    expect(findEnvironments(ast)).toHaveLength(1);
    expect(findAll(ast, 'Math')).toHaveLength(1);
  });
});

describe('walk', () => {
  it('visits nodes depth-first with arguments before later siblings', () => {
    const visited: string[] = [];
    walk(parseLatex('\\textbf{a}b').ast, node => {
      visited.push(node.type === 'Text' ? `Text:${node.content}` : node.type);
    });

    expect(visited).toEqual(['Document', 'Command', 'Group', 'Text:a', 'Text:b']);
  });

  it('skips the children of a node when the visitor returns false', () => {
    const visited: string[] = [];
    walk(parseLatex('\\textbf{a}b').ast, node => {
      visited.push(node.type);
      return node.type !== 'Command';
    });

    expect(visited).toEqual(['Document', 'Command', 'Text']);
  });

  it('passes the parent along', () => {
    const parents = new Map<string, string | undefined>();
    walk(parseLatex('{x}').ast, (node, parent) => {
      parents.set(node.type, parent?.type);
    });

    expect(parents.get('Document')).toBeUndefined();
    expect(parents.get('Group')).toBe('Document');
    expect(parents.get('Text')).toBe('Group');
  });
});

describe('childNodes', () => {
  it('lists environment arguments before the body', () => {
    const [table] = parseLatex('\\begin{tabular}{l}x\\end{tabular}').ast.children;
    const types = childNodes(table).map((node: TexNode) => node.type);

    expect(types).toEqual(['Group', 'Text']);
  });
});

describe('getTextContent', () => {
  it('leaves out math and comments unless asked', () => {
    const { ast } = parseLatex('$x$ y%c\nz');

    expect(getTextContent(ast)).toBe(' y\nz');
    expect(getTextContent(ast, { includeMath: true })).toBe('x y\nz');
    expect(getTextContent(ast, { includeComments: true })).toBe(' yc\nz');
  });

  it('reads a tie as a space and keeps escaped characters', () => {
    expect(getTextContent(parseLatex('a~b \\& c').ast)).toBe('a b & c');
  });
});

describe('formatTree', () => {
  it('draws one node per line', () => {
    expect(formatTree(parseLatex('\\textbf{hi} $x$').ast)).toBe(
      [
        'Document',
        '├── Command \\textbf',
        '│   └── Group',
        '│       └── Text "hi"',
        '├── Text " "',
        '└── Math inline $',
        '    └── Text "x"'
      ].join('\n')
    );
  });

  it('labels optional groups, stars and escaped text', () => {
    expect(formatTree(parseLatex('\\section*[s]{\\%}').ast)).toBe(
      [
        'Document',
        '└── Command \\section*',
        '    ├── Optional',
        '    │   └── Text "s"',
        '    └── Group',
        '        └── Text "%" (escaped)'
      ].join('\n')
    );
  });
});
