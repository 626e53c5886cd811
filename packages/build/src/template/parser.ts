/**
 * Parser from lexer items to a template tree
 */

import { TEMPLATE_NAME, TemplateError, TemplatePhase } from './errors';
import { describeItem, Item, ItemType, lex } from './lexer';
import {
  CommandNode,
  NodeType,
  nodeToString,
  OperandNode,
  PipeNode,
  StringNode,
  TemplateNode
} from './nodes';

export interface Tree {
  /** Source text, used to locate execution errors */
  text: string;
  root: TemplateNode[];
}

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\\': '\\',
  '"': '"'
};

const HEX_ESCAPE_LENGTHS: Readonly<Record<string, number>> = { x: 2, u: 4, U: 8 };

/**
 * Decode a quoted string token. Returns undefined on malformed escapes.
 */
export function unquote(quoted: string): string | undefined {
  if (quoted.startsWith('`')) {
    return quoted.slice(1, -1).replace(/\r/g, '');
  }

  const body = quoted.slice(1, -1);
  let out = '';
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== '\\') {
      out += ch;
      continue;
    }

    const escape = body[++i] ?? '';
    const simple = SIMPLE_ESCAPES[escape];
    if (simple !== undefined) {
      out += simple;
      continue;
    }

    const hexLength = HEX_ESCAPE_LENGTHS[escape];
    if (hexLength !== undefined) {
      const digits = body.slice(i + 1, i + 1 + hexLength);
      if (!/^[0-9a-fA-F]+$/.test(digits) || digits.length !== hexLength) {
        return undefined;
      }
      const code = parseInt(digits, 16);
      if (code > 0x10ffff) {
        return undefined;
      }
      out += String.fromCodePoint(code);
      i += hexLength;
      continue;
    }

    const octal = body.slice(i, i + 3);
    if (/^[0-7]{3}$/.test(octal) && parseInt(octal, 8) <= 0xff) {
      out += String.fromCharCode(parseInt(octal, 8));
      i += 2;
      continue;
    }

    return undefined;
  }
  return out;
}

/**
 * Parse template text. `functions` names the functions a template may call;
 * any other identifier is a parse error.
 */
export function parse(text: string, functions: ReadonlySet<string>): Tree {
  return { text, root: new Parser(lex(text), functions).parse() };
}

class Parser {
  private readonly items: Item[];
  private readonly functions: ReadonlySet<string>;
  private index = 0;
  private last: Item;
  private actionLine = 0;

  constructor(items: Item[], functions: ReadonlySet<string>) {
    this.items = items;
    this.functions = functions;
    this.last = this.itemAt(0);
  }

  parse(): TemplateNode[] {
    const root: TemplateNode[] = [];
    while (this.peek().type !== ItemType.EOF) {
      const token = this.nextNonSpace();
      switch (token.type) {
        case ItemType.Text:
          root.push({ type: NodeType.Text, pos: token.pos, text: token.value });
          break;
        case ItemType.LeftDelim:
          this.actionLine = token.line;
          root.push(this.action());
          this.actionLine = 0;
          break;
        default:
          this.unexpected(token, 'input');
      }
    }
    return root;
  }

  private itemAt(index: number): Item {
    const item = this.items[Math.min(index, this.items.length - 1)];
    if (item === undefined) {
      throw new Error('lexer produced no items');
    }
    return item;
  }

  private next(): Item {
    this.last = this.itemAt(this.index);
    this.index++;
    return this.last;
  }

  private backup(): void {
    this.index--;
  }

  private peek(): Item {
    return this.itemAt(this.index);
  }

  private nextNonSpace(): Item {
    let token = this.next();
    while (token.type === ItemType.Space) {
      token = this.next();
    }
    return token;
  }

  private peekNonSpace(): Item {
    const token = this.nextNonSpace();
    this.backup();
    return token;
  }

  private errorf(message: string, line: number = this.last.line): never {
    throw new TemplateError(TemplatePhase.Parse, `template: ${TEMPLATE_NAME}:${line}: ${message}`);
  }

  private unexpected(token: Item, context: string): never {
    if (token.type === ItemType.Error) {
      let extra = '';
      if (this.actionLine !== 0 && this.actionLine !== token.line) {
        extra = ` in action started at ${TEMPLATE_NAME}:${this.actionLine}`;
        if (token.value.endsWith(' action')) {
          extra = extra.slice(' in action'.length);
        }
      }
      return this.errorf(`${token.value}${extra}`, token.line);
    }
    return this.errorf(`unexpected ${describeItem(token)} in ${context}`, token.line);
  }

  private action(): TemplateNode {
    const token = this.peekNonSpace();
    return {
      type: NodeType.Action,
      pos: token.pos,
      line: token.line,
      pipe: this.pipeline('command', ItemType.RightDelim)
    };
  }

  private pipeline(context: string, end: ItemType): PipeNode {
    const start = this.peekNonSpace();
    const pipe: PipeNode = { type: NodeType.Pipe, pos: start.pos, line: start.line, commands: [] };

    for (;;) {
      const token = this.nextNonSpace();
      if (token.type === end) {
        this.checkPipeline(pipe, context);
        return pipe;
      }
      switch (token.type) {
        case ItemType.Bool:
        case ItemType.Dot:
        case ItemType.Field:
        case ItemType.Identifier:
        case ItemType.Number:
        case ItemType.String:
        case ItemType.RawString:
        case ItemType.LeftParen:
          this.backup();
          pipe.commands.push(this.command());
          break;
        default:
          this.unexpected(token, context);
      }
    }
  }

  private checkPipeline(pipe: PipeNode, context: string): void {
    if (pipe.commands.length === 0) {
      this.errorf(`missing value for ${context}`);
    }
    pipe.commands.slice(1).forEach((command, i) => {
      switch (command.args[0]?.type) {
        case NodeType.Bool:
        case NodeType.Dot:
        case NodeType.Number:
        case NodeType.String:
          this.errorf(`non executable command in pipeline stage ${i + 2}`);
      }
    });
  }

  private command(): CommandNode {
    const command: CommandNode = { type: NodeType.Command, pos: this.peekNonSpace().pos, args: [] };

    for (;;) {
      this.peekNonSpace();
      const operand = this.operand();
      if (operand) {
        command.args.push(operand);
      }

      const token = this.next();
      if (token.type === ItemType.Space) {
        continue;
      }
      if (token.type === ItemType.RightDelim || token.type === ItemType.RightParen) {
        this.backup();
      } else if (token.type !== ItemType.Pipe) {
        this.unexpected(token, 'operand');
      }
      break;
    }

    if (command.args.length === 0) {
      this.errorf('empty command');
    }
    return command;
  }

  private operand(): OperandNode | undefined {
    const node = this.term();
    if (!node || this.peek().type !== ItemType.Field) {
      return node;
    }

    const pos = this.peek().pos;
    const fields: string[] = [];
    while (this.peek().type === ItemType.Field) {
      fields.push(this.next().value.slice(1));
    }

    switch (node.type) {
      case NodeType.Field:
        return { type: NodeType.Field, pos, ident: [...node.ident, ...fields] };
      case NodeType.Bool:
      case NodeType.String:
      case NodeType.Number:
      case NodeType.Dot:
        return this.errorf(`unexpected . after term ${JSON.stringify(nodeToString(node))}`);
      default:
        return { type: NodeType.Chain, pos, node, fields };
    }
  }

  private term(): OperandNode | undefined {
    const token = this.nextNonSpace();
    switch (token.type) {
      case ItemType.Identifier:
        if (!this.functions.has(token.value)) {
          this.errorf(`function ${JSON.stringify(token.value)} not defined`);
        }
        return { type: NodeType.Identifier, pos: token.pos, name: token.value };
      case ItemType.Dot:
        return { type: NodeType.Dot, pos: token.pos };
      case ItemType.Field:
        return { type: NodeType.Field, pos: token.pos, ident: [token.value.slice(1)] };
      case ItemType.Bool:
        return { type: NodeType.Bool, pos: token.pos, value: token.value === 'true' };
      case ItemType.Number: {
        const value = Number(token.value);
        if (Number.isNaN(value)) {
          this.errorf(`illegal number syntax: ${JSON.stringify(token.value)}`);
        }
        return { type: NodeType.Number, pos: token.pos, text: token.value, value };
      }
      case ItemType.LeftParen:
        return this.pipeline('parenthesized pipeline', ItemType.RightParen);
      case ItemType.String:
      case ItemType.RawString:
        return this.stringNode(token);
    }
    this.backup();
    return undefined;
  }

  private stringNode(token: Item): StringNode {
    const text = unquote(token.value);
    if (text === undefined) {
      return this.errorf('invalid syntax');
    }
    return { type: NodeType.String, pos: token.pos, quoted: token.value, text };
  }
}
