import type { TexNode } from '@core/types';
import { childNodes } from './query';

function describe(node: TexNode): string {
  switch (node.type) {
    case 'Document':
      return 'Document';
    case 'Command':
      return `Command \\${node.name}${node.starred ? '*' : ''}`;
    case 'Environment':
      return `Environment ${node.name}`;
    case 'Group':
      return node.optional ? 'Optional' : 'Group';
    case 'Text':
      return `Text ${JSON.stringify(node.content)}${node.escaped ? ' (escaped)' : ''}`;
    case 'SpecialChar':
      return `SpecialChar ${node.char}`;
    case 'Math':
      return `Math ${node.display ? 'display' : 'inline'} ${node.delimiter}`;
    case 'Comment':
      return `Comment ${JSON.stringify(node.content)}`;
  }
}

/**
 * Box-drawing outline of a tree, one node per line. Arguments are listed
 * before body children.
 */
export function formatTree(root: TexNode): string {
  const lines = [describe(root)];

  const visit = (node: TexNode, prefix: string): void => {
    const children = childNodes(node);
    children.forEach((child, index) => {
      const last = index === children.length - 1;
      lines.push(`${prefix}${last ? '└── ' : '├── '}${describe(child)}`);
      visit(child, prefix + (last ? '    ' : '│   '));
    });
  };

  visit(root, '');
  return lines.join('\n');
}
