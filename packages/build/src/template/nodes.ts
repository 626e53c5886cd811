/**
 * Parse tree of a template
 */

export enum NodeType {
  Text = 'text',
  Action = 'action',
  Pipe = 'pipe',
  Command = 'command',
  Field = 'field',
  Chain = 'chain',
  Identifier = 'identifier',
  Dot = 'dot',
  String = 'string',
  Number = 'number',
  Bool = 'bool'
}

export interface TextNode {
  type: NodeType.Text;
  pos: number;
  text: string;
}

export interface ActionNode {
  type: NodeType.Action;
  pos: number;
  line: number;
  pipe: PipeNode;
}

export interface PipeNode {
  type: NodeType.Pipe;
  pos: number;
  line: number;
  commands: CommandNode[];
}

export interface CommandNode {
  type: NodeType.Command;
  pos: number;
  args: OperandNode[];
}

/** `.A.B`: a field chain starting at the data root */
export interface FieldNode {
  type: NodeType.Field;
  pos: number;
  ident: string[];
}

/** `(pipeline).A.B`: fields applied to another operand */
export interface ChainNode {
  type: NodeType.Chain;
  pos: number;
  node: OperandNode;
  fields: string[];
}

export interface IdentifierNode {
  type: NodeType.Identifier;
  pos: number;
  name: string;
}

export interface DotNode {
  type: NodeType.Dot;
  pos: number;
}

export interface StringNode {
  type: NodeType.String;
  pos: number;
  /** Source form, quotes included */
  quoted: string;
  text: string;
}

export interface NumberNode {
  type: NodeType.Number;
  pos: number;
  text: string;
  value: number;
}

export interface BoolNode {
  type: NodeType.Bool;
  pos: number;
  value: boolean;
}

export type OperandNode =
  | FieldNode
  | ChainNode
  | IdentifierNode
  | DotNode
  | StringNode
  | NumberNode
  | BoolNode
  | PipeNode;

export type TemplateNode = TextNode | ActionNode;

export type Node = TemplateNode | CommandNode | OperandNode;

/**
 * Source-like rendering of a node, used in execution errors
 */
export function nodeToString(node: Node): string {
  switch (node.type) {
    case NodeType.Text:
      return JSON.stringify(node.text);
    case NodeType.Action:
      return `{{${nodeToString(node.pipe)}}}`;
    case NodeType.Pipe:
      return node.commands.map(nodeToString).join(' | ');
    case NodeType.Command:
      return node.args
        .map(arg => (arg.type === NodeType.Pipe ? `(${nodeToString(arg)})` : nodeToString(arg)))
        .join(' ');
    case NodeType.Field:
      return node.ident.map(name => `.${name}`).join('');
    case NodeType.Chain: {
      const inner = node.node.type === NodeType.Pipe ? `(${nodeToString(node.node)})` : nodeToString(node.node);
      return inner + node.fields.map(name => `.${name}`).join('');
    }
    case NodeType.Identifier:
      return node.name;
    case NodeType.Dot:
      return '.';
    case NodeType.String:
      return node.quoted;
    case NodeType.Number:
      return node.text;
    case NodeType.Bool:
      return String(node.value);
  }
}
