/**
 * AST node types produced by the parser.
 * Every node is discriminated on `type` and carries its source range.
 */

import type { SourceLocation } from './primitives';
import type { SpecialCharacter } from './tokens';

export type NodeType =
  | 'Document'
  | 'Command'
  | 'Environment'
  | 'Group'
  | 'Text'
  | 'SpecialChar'
  | 'Math'
  | 'Comment';

// Base interface for all nodes
export interface BaseTexNode {
  type: NodeType;
  location: SourceLocation;
}

export interface DocumentNode extends BaseTexNode {
  type: 'Document';
  children: TexNode[];
}

export type ArgumentKind = 'optional' | 'mandatory' | 'parameters';

/**
 * One entry of a command's argument list, in source order.
 * `parameters` only appears on `\def`-style definitions and wraps the raw
 * parameter text (`#1#2`) as a Text node.
 */
export interface CommandArgument {
  kind: ArgumentKind;
  node: TexNode;
}

export interface CommandNode extends BaseTexNode {
  type: 'Command';
  /** Without the leading backslash */
  name: string;
  starred: boolean;
  args: CommandArgument[];
}

export interface EnvironmentNode extends BaseTexNode {
  type: 'Environment';
  name: string;
  /** Arguments following `\begin{name}` */
  args: CommandArgument[];
  children: TexNode[];
}

export interface GroupNode extends BaseTexNode {
  type: 'Group';
  /** True for a bracketed optional argument, false for a brace group */
  optional: boolean;
  children: TexNode[];
}

export interface TextNode extends BaseTexNode {
  type: 'Text';
  content: string;
  /** Set when the text came from an escaped special character such as `\%` */
  escaped?: boolean;
}

export interface SpecialCharNode extends BaseTexNode {
  type: 'SpecialChar';
  char: SpecialCharacter;
}

export type MathDelimiter = '$' | '$$' | '\\(' | '\\[';

export interface MathNode extends BaseTexNode {
  type: 'Math';
  display: boolean;
  delimiter: MathDelimiter;
  children: TexNode[];
}

export interface CommentNode extends BaseTexNode {
  type: 'Comment';
  content: string;
}

export type TexNode =
  | DocumentNode
  | CommandNode
  | EnvironmentNode
  | GroupNode
  | TextNode
  | SpecialCharNode
  | MathNode
  | CommentNode;

export type ParentNode = DocumentNode | EnvironmentNode | GroupNode | MathNode;

export type NodeOfType<T extends NodeType> = Extract<TexNode, { type: T }>;

export function isParentNode(node: TexNode): node is ParentNode {
  return (
    node.type === 'Document' ||
    node.type === 'Environment' ||
    node.type === 'Group' ||
    node.type === 'Math'
  );
}

export function optionalArgs(node: CommandNode | EnvironmentNode): TexNode[] {
  return node.args.filter(arg => arg.kind === 'optional').map(arg => arg.node);
}

export function mandatoryArgs(node: CommandNode | EnvironmentNode): TexNode[] {
  return node.args.filter(arg => arg.kind === 'mandatory').map(arg => arg.node);
}
