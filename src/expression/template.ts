/**
 * Text templates with `{{ ... }}` actions.
 *
 * Supported:
 * - field paths: `{{.name}}`, `{{.steps.fetch.text}}`, `{{.}}`
 * - variables: `{{$}}`, `{{$x := .a}}`, `{{$x.b}}`, `{{$x = 1}}`
 * - function calls and pipelines: `{{add 1 2}}`, `{{.name | upper}}`, `{{upper (trim .s)}}`
 * - control flow: `if / else if / else / end`, `range`, `with`
 * - comment actions opened with `{{/*`, and trim markers `{{-` / `-}}`
 *
 * A reference to a missing field renders as `<no value>`; the resolver uses that marker to
 * fall back to the original text.
 */

import { ResourceExceededError } from '../types/errors.ts';
import { LIMITS, NO_VALUE } from '../utils/constants.ts';
import { TEMPLATE_FUNCTIONS, type TemplateFunction } from './functions.ts';
import { formatValue, isRecord, isTruthy, lookupPath, typeName } from './values.ts';

export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

// ===== Lexer =====

type Token =
  | { kind: 'field'; segments: string[] }
  | { kind: 'variable'; name: string; segments: string[] }
  | { kind: 'ident'; name: string }
  | { kind: 'literal'; value: unknown }
  | { kind: 'lparen' }
  | { kind: 'rparen' }
  | { kind: 'pipe' }
  | { kind: 'declare' }
  | { kind: 'assign' }
  | { kind: 'comma' };

type Segment = { type: 'text'; text: string } | { type: 'action'; tokens: Token[] };

const LEFT = '{{';
const RIGHT = '}}';

function isSpace(char: string | undefined): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

function readFieldChain(source: string, start: number): { segments: string[]; end: number } {
  const segments: string[] = [];
  let pos = start;
  while (source[pos] === '.') {
    const match = /^[A-Za-z0-9_]+/.exec(source.slice(pos + 1));
    if (!match) break;
    segments.push(match[0]);
    pos += 1 + match[0].length;
  }
  return { segments, end: pos };
}

function lexAction(body: string, offset: number): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const fail = (message: string): never => {
    throw new TemplateError(`template: ${message} at position ${offset + pos}`);
  };

  while (pos < body.length) {
    const char = body[pos];

    if (isSpace(char)) {
      pos++;
      continue;
    }

    if (char === '.') {
      const { segments, end } = readFieldChain(body, pos);
      if (segments.length === 0) {
        tokens.push({ kind: 'field', segments: [] });
        pos++;
      } else {
        tokens.push({ kind: 'field', segments });
        pos = end;
      }
      continue;
    }

    if (char === '$') {
      const match = /^\$[A-Za-z0-9_]*/.exec(body.slice(pos));
      const name = match ? match[0] : '$';
      const { segments, end } = readFieldChain(body, pos + name.length);
      tokens.push({ kind: 'variable', name, segments });
      pos = end;
      continue;
    }

    if (char === '"') {
      let end = pos + 1;
      while (end < body.length && body[end] !== '"') {
        end += body[end] === '\\' ? 2 : 1;
      }
      if (end >= body.length) fail('unterminated quoted string');
      try {
        tokens.push({ kind: 'literal', value: JSON.parse(body.slice(pos, end + 1)) });
      } catch {
        fail('invalid escape in quoted string');
      }
      pos = end + 1;
      continue;
    }

    if (char === '`') {
      const end = body.indexOf('`', pos + 1);
      if (end === -1) fail('unterminated raw string');
      tokens.push({ kind: 'literal', value: body.slice(pos + 1, end) });
      pos = end + 1;
      continue;
    }

    const number = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(body.slice(pos));
    if (number && (/\d/.test(char) || ((char === '-' || char === '+') && /\d/.test(body[pos + 1] ?? '')))) {
      tokens.push({ kind: 'literal', value: Number(number[0]) });
      pos += number[0].length;
      continue;
    }

    const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(body.slice(pos));
    if (ident) {
      const name = ident[0];
      if (name === 'true' || name === 'false') {
        tokens.push({ kind: 'literal', value: name === 'true' });
      } else if (name === 'nil') {
        tokens.push({ kind: 'literal', value: null });
      } else {
        tokens.push({ kind: 'ident', name });
      }
      pos += name.length;
      continue;
    }

    if (body.startsWith(':=', pos)) {
      tokens.push({ kind: 'declare' });
      pos += 2;
      continue;
    }

    switch (char) {
      case '(':
        tokens.push({ kind: 'lparen' });
        break;
      case ')':
        tokens.push({ kind: 'rparen' });
        break;
      case '|':
        tokens.push({ kind: 'pipe' });
        break;
      case '=':
        tokens.push({ kind: 'assign' });
        break;
      case ',':
        tokens.push({ kind: 'comma' });
        break;
      default:
        fail(`unexpected "${char}" in action`);
    }
    pos++;
  }

  return tokens;
}

function findActionEnd(source: string, from: number): number {
  let pos = from;
  while (pos < source.length) {
    const char = source[pos];
    if (char === '"') {
      pos++;
      while (pos < source.length && source[pos] !== '"') {
        pos += source[pos] === '\\' ? 2 : 1;
      }
      pos++;
      continue;
    }
    if (char === '`') {
      const close = source.indexOf('`', pos + 1);
      pos = close === -1 ? source.length : close + 1;
      continue;
    }
    if (source.startsWith(RIGHT, pos)) {
      return pos;
    }
    pos++;
  }
  return -1;
}

function segment(source: string): Segment[] {
  const segments: Segment[] = [];
  let pos = 0;
  let trimNextText = false;

  const pushText = (text: string) => {
    const value = trimNextText ? text.replace(/^\s+/, '') : text;
    trimNextText = false;
    if (value.length > 0) segments.push({ type: 'text', text: value });
  };

  while (pos < source.length) {
    const open = source.indexOf(LEFT, pos);
    if (open === -1) {
      pushText(source.slice(pos));
      break;
    }

    let bodyStart = open + LEFT.length;
    let text = source.slice(pos, open);
    if (source[bodyStart] === '-' && isSpace(source[bodyStart + 1])) {
      text = text.replace(/\s+$/, '');
      bodyStart += 1;
    }
    pushText(text);

    let close: number;
    let body: string;
    const trimmedStart = source.slice(bodyStart).replace(/^\s+/, '');
    if (trimmedStart.startsWith('/*')) {
      const commentStart = source.length - trimmedStart.length;
      const commentEnd = source.indexOf('*/', commentStart + 2);
      if (commentEnd === -1) {
        throw new TemplateError(`template: unclosed comment at position ${open}`);
      }
      close = source.indexOf(RIGHT, commentEnd + 2);
      if (close === -1) {
        throw new TemplateError(`template: unclosed action at position ${open}`);
      }
      body = source.slice(commentEnd + 2, close);
      if (body.trim() !== '' && body.trim() !== '-') {
        throw new TemplateError(`template: comment ends before closing delimiter at ${open}`);
      }
      pos = close + RIGHT.length;
      trimNextText = /\s-\s*$/.test(body) || body.trim() === '-';
      continue;
    }

    close = findActionEnd(source, bodyStart);
    if (close === -1) {
      throw new TemplateError(`template: unclosed action at position ${open}`);
    }
    body = source.slice(bodyStart, close);
    let rightTrim = false;
    if (/\s-$/.test(body)) {
      body = body.slice(0, -1);
      rightTrim = true;
    }

    const tokens = lexAction(body, bodyStart);
    if (tokens.length === 0) {
      throw new TemplateError(`template: missing value for command at position ${open}`);
    }
    segments.push({ type: 'action', tokens });
    pos = close + RIGHT.length;
    trimNextText = rightTrim;
  }

  return segments;
}

// ===== Parser =====

type Operand =
  | { kind: 'field'; segments: string[] }
  | { kind: 'variable'; name: string; segments: string[] }
  | { kind: 'literal'; value: unknown }
  | { kind: 'function'; name: string }
  | { kind: 'pipeline'; pipeline: Pipeline };

interface Command {
  operands: Operand[];
}

interface Pipeline {
  declarations: string[];
  assign: boolean;
  commands: Command[];
}

type TemplateNode =
  | { kind: 'text'; text: string }
  | { kind: 'action'; pipeline: Pipeline }
  | { kind: 'if' | 'with'; pipeline: Pipeline; body: TemplateNode[]; otherwise: TemplateNode[] }
  | { kind: 'range'; pipeline: Pipeline; body: TemplateNode[]; otherwise: TemplateNode[] };

class TokenStream {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly functions: Readonly<Record<string, TemplateFunction>>
  ) {}

  peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  next(): Token | undefined {
    return this.tokens[this.pos++];
  }

  done(): boolean {
    return this.pos >= this.tokens.length;
  }

  parsePipeline(context: string, allowDeclarations: boolean): Pipeline {
    const pipeline: Pipeline = { declarations: [], assign: false, commands: [] };

    if (allowDeclarations) {
      this.parseDeclarations(pipeline);
    }

    for (;;) {
      pipeline.commands.push(this.parseCommand(context));
      const token = this.peek();
      if (token?.kind !== 'pipe') break;
      this.next();
    }
    return pipeline;
  }

  private parseDeclarations(pipeline: Pipeline): void {
    const names: string[] = [];
    let cursor = this.pos;
    for (;;) {
      const token = this.tokens[cursor];
      if (token?.kind !== 'variable' || token.segments.length > 0) return;
      names.push(token.name);
      const following = this.tokens[cursor + 1];
      if (following?.kind === 'comma' && names.length < 2) {
        cursor += 2;
        continue;
      }
      if (following?.kind === 'declare' || following?.kind === 'assign') {
        pipeline.declarations = names;
        pipeline.assign = following.kind === 'assign';
        this.pos = cursor + 2;
      }
      return;
    }
  }

  private parseCommand(context: string): Command {
    const operands: Operand[] = [];
    for (;;) {
      const token = this.peek();
      if (!token || token.kind === 'pipe' || token.kind === 'rparen') break;
      operands.push(this.parseOperand(context));
    }
    if (operands.length === 0) {
      throw new TemplateError(`template: missing value for ${context}`);
    }
    return { operands };
  }

  private parseOperand(context: string): Operand {
    const token = this.next();
    switch (token?.kind) {
      case 'field':
        return { kind: 'field', segments: token.segments };
      case 'variable':
        return { kind: 'variable', name: token.name, segments: token.segments };
      case 'literal':
        return { kind: 'literal', value: token.value };
      case 'ident':
        if (!Object.prototype.hasOwnProperty.call(this.functions, token.name)) {
          throw new TemplateError(`template: function "${token.name}" not defined`);
        }
        return { kind: 'function', name: token.name };
      case 'lparen': {
        const pipeline = this.parsePipeline(context, false);
        if (this.next()?.kind !== 'rparen') {
          throw new TemplateError(`template: unclosed left paren in ${context}`);
        }
        return { kind: 'pipeline', pipeline };
      }
      default:
        throw new TemplateError(`template: unexpected ${token?.kind ?? 'end'} in ${context}`);
    }
  }
}

type Terminator =
  | { kind: 'end' }
  | { kind: 'else'; stream: TokenStream }
  | { kind: 'eof' };

class Parser {
  private index = 0;

  constructor(
    private readonly segments: Segment[],
    private readonly functions: Readonly<Record<string, TemplateFunction>>
  ) {}

  parse(): TemplateNode[] {
    const { nodes, terminator } = this.parseList();
    if (terminator.kind !== 'eof') {
      throw new TemplateError(`template: unexpected {{${terminator.kind}}}`);
    }
    return nodes;
  }

  private parseList(): { nodes: TemplateNode[]; terminator: Terminator } {
    const nodes: TemplateNode[] = [];
    while (this.index < this.segments.length) {
      const current = this.segments[this.index++];
      if (current.type === 'text') {
        nodes.push({ kind: 'text', text: current.text });
        continue;
      }

      const stream = new TokenStream(current.tokens, this.functions);
      const first = stream.peek();
      const keyword = first?.kind === 'ident' ? first.name : undefined;

      switch (keyword) {
        case 'end':
          stream.next();
          if (!stream.done()) throw new TemplateError('template: unexpected tokens after end');
          return { nodes, terminator: { kind: 'end' } };
        case 'else':
          stream.next();
          return { nodes, terminator: { kind: 'else', stream } };
        case 'if':
        case 'with':
        case 'range':
          stream.next();
          nodes.push(this.parseControl(keyword, stream));
          break;
        default:
          nodes.push({ kind: 'action', pipeline: this.parseFull(stream, 'command', true) });
      }
    }
    return { nodes, terminator: { kind: 'eof' } };
  }

  private parseFull(stream: TokenStream, context: string, declarations: boolean): Pipeline {
    const pipeline = stream.parsePipeline(context, declarations);
    if (!stream.done()) {
      throw new TemplateError(`template: unexpected token in ${context}`);
    }
    return pipeline;
  }

  private parseControl(keyword: 'if' | 'with' | 'range', stream: TokenStream): TemplateNode {
    const pipeline = this.parseFull(stream, keyword, keyword !== 'if');
    const body = this.parseList();
    let otherwise: TemplateNode[] = [];

    if (body.terminator.kind === 'eof') {
      throw new TemplateError(`template: unexpected EOF in ${keyword}`);
    }

    if (body.terminator.kind === 'else') {
      const elseStream = body.terminator.stream;
      const chained = elseStream.peek();
      const chainedKeyword = chained?.kind === 'ident' ? chained.name : undefined;
      if (keyword !== 'range' && (chainedKeyword === 'if' || chainedKeyword === 'with')) {
        // `else if` / `else with` share the enclosing end
        elseStream.next();
        otherwise = [this.parseControl(chainedKeyword, elseStream)];
      } else {
        if (!elseStream.done()) throw new TemplateError('template: unexpected tokens after else');
        const rest = this.parseList();
        if (rest.terminator.kind !== 'end') {
          throw new TemplateError(`template: expected end after else in ${keyword}`);
        }
        otherwise = rest.nodes;
      }
    }

    return { kind: keyword, pipeline, body: body.nodes, otherwise };
  }
}

// ===== Execution =====

interface Variable {
  name: string;
  value: unknown;
}

class ExecutionState {
  private readonly parts: string[] = [];
  private size = 0;
  private readonly variables: Variable[];

  constructor(
    root: unknown,
    private readonly functions: Readonly<Record<string, TemplateFunction>>,
    private readonly maxOutput: number
  ) {
    this.variables = [{ name: '$', value: root }];
  }

  write(text: string): void {
    this.size += text.length;
    if (this.size > this.maxOutput) {
      throw new ResourceExceededError(
        `template: output exceeds maximum size of ${this.maxOutput} bytes`,
        this.maxOutput
      );
    }
    this.parts.push(text);
  }

  output(): string {
    return this.parts.join('');
  }

  mark(): number {
    return this.variables.length;
  }

  pop(mark: number): void {
    this.variables.length = mark;
  }

  push(name: string, value: unknown): void {
    this.variables.push({ name, value });
  }

  setVariable(name: string, value: unknown): void {
    for (let i = this.variables.length - 1; i >= 0; i--) {
      if (this.variables[i].name === name) {
        this.variables[i].value = value;
        return;
      }
    }
    throw new TemplateError(`template: undefined variable: ${name}`);
  }

  variable(name: string): unknown {
    for (let i = this.variables.length - 1; i >= 0; i--) {
      if (this.variables[i].name === name) return this.variables[i].value;
    }
    throw new TemplateError(`template: undefined variable: ${name}`);
  }

  walk(nodes: readonly TemplateNode[], dot: unknown): void {
    for (const node of nodes) {
      switch (node.kind) {
        case 'text':
          this.write(node.text);
          break;
        case 'action': {
          const value = this.evalPipeline(node.pipeline, dot);
          if (node.pipeline.declarations.length === 0) {
            this.write(value === undefined ? NO_VALUE : formatValue(value));
          }
          break;
        }
        case 'if':
        case 'with': {
          const mark = this.mark();
          const value = this.evalPipeline(node.pipeline, dot);
          if (isTruthy(value)) {
            this.walk(node.body, node.kind === 'with' ? value : dot);
          } else {
            this.walk(node.otherwise, dot);
          }
          this.pop(mark);
          break;
        }
        case 'range':
          this.walkRange(node, dot);
          break;
      }
    }
  }

  private walkRange(
    node: Extract<TemplateNode, { kind: 'range' }>,
    dot: unknown
  ): void {
    const mark = this.mark();
    const { declarations } = node.pipeline;
    const source = this.evalPipeline({ ...node.pipeline, declarations: [] }, dot);

    const entries: Array<[unknown, unknown]> = [];
    if (Array.isArray(source)) {
      source.forEach((item, i) => entries.push([i, item]));
    } else if (isRecord(source)) {
      for (const key of Object.keys(source).sort()) {
        entries.push([key, source[key]]);
      }
    } else if (typeof source === 'number' && Number.isInteger(source)) {
      for (let i = 0; i < source; i++) entries.push([i, i]);
    } else if (source !== undefined && source !== null) {
      throw new TemplateError(`template: range can't iterate over ${typeName(source)}`);
    }

    if (entries.length === 0) {
      this.walk(node.otherwise, dot);
      this.pop(mark);
      return;
    }

    for (const [key, value] of entries) {
      const iterationMark = this.mark();
      if (declarations.length === 1) {
        this.push(declarations[0], value);
      } else if (declarations.length === 2) {
        this.push(declarations[0], key);
        this.push(declarations[1], value);
      }
      this.walk(node.body, value);
      this.pop(iterationMark);
    }
    this.pop(mark);
  }

  evaluate(pipeline: Pipeline, dot: unknown): unknown {
    return this.evalPipeline(pipeline, dot);
  }

  private evalPipeline(pipeline: Pipeline, dot: unknown): unknown {
    let value: unknown;
    let hasValue = false;
    for (const command of pipeline.commands) {
      value = this.evalCommand(command, dot, hasValue ? { value } : undefined);
      hasValue = true;
    }

    if (pipeline.declarations.length > 0) {
      for (const name of pipeline.declarations) {
        if (pipeline.assign) this.setVariable(name, value);
        else this.push(name, value);
      }
    }
    return value;
  }

  private evalCommand(command: Command, dot: unknown, piped?: { value: unknown }): unknown {
    const [head, ...rest] = command.operands;
    if (head.kind === 'function') {
      const args = rest.map((operand) => this.evalOperand(operand, dot));
      if (piped) args.push(piped.value);
      return this.call(head.name, args);
    }
    if (rest.length > 0 || piped) {
      throw new TemplateError(`template: can't give argument to non-function`);
    }
    return this.evalOperand(head, dot);
  }

  private evalOperand(operand: Operand, dot: unknown): unknown {
    switch (operand.kind) {
      case 'literal':
        return operand.value;
      case 'field':
        return this.evalField(dot, operand.segments);
      case 'variable':
        return this.evalField(this.variable(operand.name), operand.segments);
      case 'function':
        return this.call(operand.name, []);
      case 'pipeline':
        return this.evalPipeline(operand.pipeline, dot);
    }
  }

  private evalField(receiver: unknown, segments: string[]): unknown {
    if (segments.length === 0) return receiver;
    if (receiver !== undefined && receiver !== null && !isRecord(receiver) && !Array.isArray(receiver)) {
      throw new TemplateError(
        `template: can't evaluate field ${segments[0]} in type ${typeName(receiver)}`
      );
    }
    const result = lookupPath(receiver, segments);
    return result.found ? result.value : undefined;
  }

  private call(name: string, args: unknown[]): unknown {
    const fn = this.functions[name];
    try {
      return fn(...args);
    } catch (error) {
      if (error instanceof ResourceExceededError || error instanceof TemplateError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new TemplateError(`template: error calling ${name}: ${message}`);
    }
  }
}

// ===== Public API =====

export interface TemplateOptions {
  /** Extra or overriding functions */
  functions?: Record<string, TemplateFunction>;
  /** Maximum rendered size in characters */
  maxOutput?: number;
}

export class Template {
  private constructor(
    private readonly nodes: TemplateNode[],
    private readonly functions: Readonly<Record<string, TemplateFunction>>,
    private readonly maxOutput: number
  ) {}

  static parse(source: string, options: TemplateOptions = {}): Template {
    const functions = options.functions
      ? { ...TEMPLATE_FUNCTIONS, ...options.functions }
      : TEMPLATE_FUNCTIONS;
    const nodes = new Parser(segment(source), functions).parse();
    return new Template(nodes, functions, options.maxOutput ?? LIMITS.MAX_TEMPLATE_OUTPUT);
  }

  execute(data: unknown): string {
    const state = new ExecutionState(data, this.functions, this.maxOutput);
    state.walk(this.nodes, data);
    return state.output();
  }

  /**
   * Typed value of a template holding exactly one action. `dot` is `.` and `root` is `$`.
   */
  evaluate(dot: unknown, root: unknown = dot): unknown {
    const [node] = this.nodes;
    if (this.nodes.length !== 1 || node?.kind !== 'action') {
      throw new TemplateError('template: expression must be a single action');
    }
    return new ExecutionState(root, this.functions, this.maxOutput).evaluate(node.pipeline, dot);
  }
}

const CACHE_LIMIT = 500;
const cache = new Map<string, Template>();

/**
 * Parse (with caching) and execute a template against `data`.
 */
export function renderTemplate(source: string, data: unknown): string {
  let template = cache.get(source);
  if (!template) {
    template = Template.parse(source);
    if (cache.size >= CACHE_LIMIT) cache.clear();
    cache.set(source, template);
  }
  return template.execute(data);
}
