import {
  mandatoryArgs,
  type CommandNode,
  type DocumentNode,
  type EnvironmentNode,
  type NodeOfType,
  type NodeType,
  type TexNode
} from '@core/types';

/**
 * Return false from a visitor to skip the node's children and arguments.
 */
export type Visitor = (node: TexNode, parent: TexNode | undefined) => boolean | void;

/**
 * Children and arguments of a node, in source order
 */
export function childNodes(node: TexNode): TexNode[] {
  switch (node.type) {
    case 'Command':
      return node.args.map(arg => arg.node);
    case 'Environment':
      return [...node.args.map(arg => arg.node), ...node.children];
    case 'Document':
    case 'Group':
    case 'Math':
      return node.children;
    default:
      return [];
  }
}

/**
 * Depth-first, pre-order walk over a tree, arguments included
 */
export function walk(root: TexNode, visit: Visitor): void {
  const stack: Array<[TexNode, TexNode | undefined]> = [[root, undefined]];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const [node, parent] = entry;
    if (visit(node, parent) === false) {
      continue;
    }
    const children = childNodes(node);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push([children[i], node]);
    }
  }
}

export function findAll<T extends NodeType>(root: TexNode, type: T): NodeOfType<T>[] {
  const found: NodeOfType<T>[] = [];
  walk(root, node => {
    if (isNodeOfType(node, type)) {
      found.push(node);
    }
  });
  return found;
}

export function isNodeOfType<T extends NodeType>(node: TexNode, type: T): node is NodeOfType<T> {
  return node.type === type;
}

export function findCommands(root: TexNode, name?: string): CommandNode[] {
  return findAll(root, 'Command').filter(node => name === undefined || node.name === name);
}

export function findEnvironments(root: TexNode, name?: string): EnvironmentNode[] {
  return findAll(root, 'Environment').filter(node => name === undefined || node.name === name);
}

export interface TextContentOptions {
  /** Include the text inside math nodes (default: false) */
  includeMath?: boolean;
  /** Include comment bodies (default: false) */
  includeComments?: boolean;
}

/**
 * Literal text of a subtree.
 *
 * Commands contribute the text of their mandatory arguments; `~` reads as a
 * space; brackets are kept; other special characters contribute nothing.
 */
export function getTextContent(node: TexNode, options: TextContentOptions = {}): string {
  switch (node.type) {
    case 'Text':
      return node.content;
    case 'SpecialChar':
      if (node.char === '~') return ' ';
      if (node.char === '[' || node.char === ']') return node.char;
      return '';
    case 'Comment':
      return options.includeComments ? node.content : '';
    case 'Math':
      if (!options.includeMath) return '';
      return node.children.map(child => getTextContent(child, options)).join('');
    case 'Command':
      return mandatoryArgs(node).map(arg => getTextContent(arg, options)).join('');
    case 'Document':
    case 'Environment':
    case 'Group':
      return node.children.map(child => getTextContent(child, options)).join('');
  }
}

// Document-level accessors

const SECTION_LEVELS = new Map<string, number>([
  ['part', 0],
  ['chapter', 1],
  ['section', 2],
  ['subsection', 3],
  ['subsubsection', 4],
  ['paragraph', 5],
  ['subparagraph', 6]
]);

export interface SectionInfo {
  command: CommandNode;
  level: number;
  title: string;
  numbered: boolean;
}

/**
 * Sectioning commands in document order with their level and title text
 */
export function getSections(root: TexNode): SectionInfo[] {
  const sections: SectionInfo[] = [];
  for (const command of findAll(root, 'Command')) {
    const level = SECTION_LEVELS.get(command.name);
    if (level !== undefined) {
      sections.push({
        command,
        level,
        title: getTextContent(command).trim(),
        numbered: !command.starred
      });
    }
  }
  return sections;
}

export function getTitle(doc: DocumentNode): CommandNode | undefined {
  return findCommands(doc, 'title')[0];
}

export function getAbstract(doc: DocumentNode): EnvironmentNode | undefined {
  return findEnvironments(doc, 'abstract')[0];
}

const CITE_COMMANDS = new Set(['cite', 'citep', 'citet', 'nocite']);

/**
 * Citation keys in document order, split on commas
 */
export function getCitationKeys(root: TexNode): string[] {
  return findAll(root, 'Command')
    .filter(command => CITE_COMMANDS.has(command.name))
    .flatMap(command => getTextContent(command).split(','))
    .map(key => key.trim())
    .filter(key => key.length > 0);
}
