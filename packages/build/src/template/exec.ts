/**
 * Evaluation of a parsed template against data
 */

import { errorMessage } from '@crossbuild/core';
import { TEMPLATE_NAME, TemplateError, TemplatePhase } from './errors';
import {
  ChainNode,
  CommandNode,
  FieldNode,
  IdentifierNode,
  Node,
  NodeType,
  nodeToString,
  OperandNode,
  PipeNode
} from './nodes';
import { Tree } from './parser';
import {
  formatValue,
  FunctionMap,
  isTemplateMap,
  TemplateFunction,
  TemplateValue,
  typeName
} from './values';

/** Marks the absence of a piped-in value */
const MISSING = Symbol('missing');
type Final = TemplateValue | typeof MISSING;

const MAX_CONTEXT_LENGTH = 20;

/**
 * Render a tree. Fields missing from a map are errors.
 */
export function execute(tree: Tree, data: TemplateValue, functions: FunctionMap): string {
  return new State(tree, functions).walk(data);
}

class State {
  private node: Node;

  constructor(
    private readonly tree: Tree,
    private readonly functions: FunctionMap
  ) {
    this.node = { type: NodeType.Dot, pos: 0 };
  }

  walk(dot: TemplateValue): string {
    let out = '';
    for (const node of this.tree.root) {
      if (node.type === NodeType.Text) {
        out += node.text;
      } else {
        this.at(node);
        out += formatValue(this.evalPipeline(dot, node.pipe));
      }
    }
    return out;
  }

  private at(node: Node): void {
    this.node = node;
  }

  /**
   * Raise an execution error located at the current node
   */
  private errorf(message: string, cause?: unknown): never {
    const pos = this.node.pos;
    const before = this.tree.text.slice(0, pos);
    const lastNewline = before.lastIndexOf('\n');
    // byte offset within the line
    const column = Buffer.byteLength(before.slice(lastNewline + 1));
    const line = before.split('\n').length;

    let context = nodeToString(this.node);
    if ([...context].length > MAX_CONTEXT_LENGTH) {
      context = `${[...context].slice(0, MAX_CONTEXT_LENGTH).join('')}...`;
    }

    throw new TemplateError(
      TemplatePhase.Execute,
      `template: ${TEMPLATE_NAME}:${line}:${column}: executing "${TEMPLATE_NAME}" at <${context}>: ${message}`,
      { cause }
    );
  }

  private evalPipeline(dot: TemplateValue, pipe: PipeNode): TemplateValue {
    this.at(pipe);
    let value: Final = MISSING;
    for (const command of pipe.commands) {
      value = this.evalCommand(dot, command, value);
    }
    if (value === MISSING) {
      return this.errorf('missing value for command');
    }
    return value;
  }

  private evalCommand(dot: TemplateValue, command: CommandNode, final: Final): TemplateValue {
    const first = command.args[0];
    if (!first) {
      return this.errorf('empty command');
    }

    switch (first.type) {
      case NodeType.Field:
        return this.evalFieldNode(dot, first, command.args, final);
      case NodeType.Chain:
        return this.evalChainNode(dot, first, command.args, final);
      case NodeType.Identifier:
        return this.evalFunction(dot, first, command, command.args, final);
      case NodeType.Pipe:
        this.notAFunction(command.args, final);
        return this.evalPipeline(dot, first);
    }

    this.at(first);
    this.notAFunction(command.args, final);
    switch (first.type) {
      case NodeType.Bool:
        return first.value;
      case NodeType.Dot:
        return dot;
      case NodeType.Number:
        return first.value;
      case NodeType.String:
        return first.text;
    }
  }

  private notAFunction(args: OperandNode[], final: Final): void {
    const [first] = args;
    if (first && (args.length > 1 || final !== MISSING)) {
      this.errorf(`can't give argument to non-function ${nodeToString(first)}`);
    }
  }

  private evalFieldNode(
    dot: TemplateValue,
    field: FieldNode,
    args: OperandNode[],
    final: Final
  ): TemplateValue {
    this.at(field);
    return this.evalFieldChain(dot, field.ident, args, final);
  }

  private evalChainNode(
    dot: TemplateValue,
    chain: ChainNode,
    args: OperandNode[],
    final: Final
  ): TemplateValue {
    this.at(chain);
    const receiver = this.evalOperand(dot, chain.node);
    this.at(chain);
    return this.evalFieldChain(receiver, chain.fields, args, final);
  }

  private evalFieldChain(
    receiver: TemplateValue,
    ident: string[],
    args: OperandNode[],
    final: Final
  ): TemplateValue {
    let value = receiver;
    for (let i = 0; i < ident.length; i++) {
      const last = i === ident.length - 1;
      value = this.evalField(ident[i] ?? '', last ? args : [], last ? final : MISSING, value);
    }
    return value;
  }

  private evalField(
    name: string,
    args: OperandNode[],
    final: Final,
    receiver: TemplateValue
  ): TemplateValue {
    if (!isTemplateMap(receiver)) {
      return this.errorf(`can't evaluate field ${name} in type ${typeName(receiver)}`);
    }
    if (args.length > 1 || final !== MISSING) {
      return this.errorf(`${name} is not a method but has arguments`);
    }
    const value = receiver.get(name);
    if (value === undefined) {
      return this.errorf(`map has no entry for key ${JSON.stringify(name)}`);
    }
    return value;
  }

  private evalFunction(
    dot: TemplateValue,
    identifier: IdentifierNode,
    command: Node,
    args: OperandNode[],
    final: Final
  ): TemplateValue {
    this.at(identifier);
    const fn = this.functions.get(identifier.name);
    if (!fn) {
      return this.errorf(`${JSON.stringify(identifier.name)} is not a defined function`);
    }
    return this.evalCall(dot, fn, command, identifier.name, args, final);
  }

  private evalCall(
    dot: TemplateValue,
    fn: TemplateFunction,
    command: Node,
    name: string,
    args: OperandNode[],
    final: Final
  ): string {
    // args[0] names the function
    const params = args.slice(1);
    const received = params.length + (final === MISSING ? 0 : 1);
    if (received !== fn.length) {
      this.errorf(`wrong number of args for ${name}: want ${fn.length} got ${received}`);
    }

    const argv = params.map(param => this.evalStringArg(dot, param));
    if (final !== MISSING) {
      argv.push(this.validateString(final));
    }

    try {
      return fn(...argv);
    } catch (error) {
      this.at(command);
      return this.errorf(`error calling ${name}: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Value of an operand used as the receiver of a field chain
   */
  private evalOperand(dot: TemplateValue, node: OperandNode): TemplateValue {
    this.at(node);
    switch (node.type) {
      case NodeType.Dot:
        return dot;
      case NodeType.Field:
        return this.evalFieldNode(dot, node, [node], MISSING);
      case NodeType.Chain:
        return this.evalChainNode(dot, node, [node], MISSING);
      case NodeType.Pipe:
        return this.evalPipeline(dot, node);
      case NodeType.Identifier:
        return this.evalFunction(dot, node, node, [node], MISSING);
      case NodeType.String:
        return node.text;
      case NodeType.Number:
      case NodeType.Bool:
        return node.value;
    }
  }

  private evalStringArg(dot: TemplateValue, node: OperandNode): string {
    this.at(node);
    switch (node.type) {
      case NodeType.String:
        return node.text;
      case NodeType.Number:
      case NodeType.Bool:
        return this.errorf(`expected string; found ${nodeToString(node)}`);
      default:
        return this.validateString(this.evalOperand(dot, node));
    }
  }

  private validateString(value: TemplateValue): string {
    if (typeof value !== 'string') {
      return this.errorf(`wrong type for value; expected string; got ${typeName(value)}`);
    }
    return value;
  }
}
