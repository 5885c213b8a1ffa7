import type { CellValue } from '../model/DataSheet';
import { CellProcessor } from './CellProcessor';

type BinaryOperator =
  | 'or' | 'and'
  | '==' | '!=' | '<' | '<=' | '>' | '>='
  | '+' | '-' | '*' | '/' | '//' | '%' | '**';

type UnaryOperator = '-' | '+' | 'not';

export type Expression =
  | { kind: 'literal'; value: CellValue }
  | { kind: 'column'; name: string }
  | { kind: 'unary'; op: UnaryOperator; operand: Expression }
  | { kind: 'binary'; op: BinaryOperator; left: Expression; right: Expression };

export interface CompiledExpression {
  ast: Expression;
  columns: string[];
}

export interface ParsedFormula {
  target: string;
  expression: string;
}

type Token =
  | { kind: 'number'; value: number; pos: number }
  | { kind: 'string'; value: string; pos: number }
  | { kind: 'ident'; value: string; pos: number }
  | { kind: 'column'; value: string; pos: number }
  | { kind: 'op'; value: string; pos: number }
  | { kind: 'eof'; pos: number };

const OPERATORS = ['**', '//', '==', '!=', '<=', '>=', '<', '>', '+', '-', '*', '/', '%', '&', '|', '~', '(', ')'];
const NUMBER_RE = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*/;
const COMPARISONS: BinaryOperator[] = ['==', '!=', '<', '<=', '>', '>='];

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  while (pos < text.length) {
    const char = text[pos];
    if (/\s/.test(char)) {
      pos++;
      continue;
    }
    const rest = text.slice(pos);
    const number = NUMBER_RE.exec(rest);
    if (number) {
      tokens.push({ kind: 'number', value: Number(number[0]), pos });
      pos += number[0].length;
      continue;
    }
    const ident = IDENT_RE.exec(rest);
    if (ident) {
      tokens.push({ kind: 'ident', value: ident[0], pos });
      pos += ident[0].length;
      continue;
    }
    if (char === '"' || char === "'" || char === '`') {
      const end = text.indexOf(char, pos + 1);
      if (end === -1) {
        throw new Error(`Unterminated ${char === '`' ? 'column name' : 'string'} at position ${pos}`);
      }
      const value = text.slice(pos + 1, end);
      tokens.push(char === '`' ? { kind: 'column', value, pos } : { kind: 'string', value, pos });
      pos = end + 1;
      continue;
    }
    const op = OPERATORS.find(candidate => rest.startsWith(candidate));
    if (!op) {
      throw new Error(`Unexpected character "${char}" at position ${pos}`);
    }
    tokens.push({ kind: 'op', value: op, pos });
    pos += op.length;
  }
  tokens.push({ kind: 'eof', pos });
  return tokens;
}

class Parser {
  private position = 0;
  readonly columns = new Set<string>();

  constructor(private readonly tokens: Token[]) {}

  parse(): Expression {
    const expression = this.parseOr();
    const next = this.peek();
    if (next.kind !== 'eof') {
      throw new Error(`Unexpected token at position ${next.pos}`);
    }
    return expression;
  }

  private peek(): Token {
    return this.tokens[this.position];
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (token.kind !== 'eof') {
      this.position++;
    }
    return token;
  }

  private matchOp(...values: string[]): string | undefined {
    const token = this.peek();
    if (token.kind === 'op' && values.includes(token.value)) {
      this.position++;
      return token.value;
    }
    return undefined;
  }

  private matchKeyword(word: string): boolean {
    const token = this.peek();
    if (token.kind === 'ident' && token.value === word) {
      this.position++;
      return true;
    }
    return false;
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.matchKeyword('or') || this.matchOp('|')) {
      left = { kind: 'binary', op: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseNot();
    while (this.matchKeyword('and') || this.matchOp('&')) {
      left = { kind: 'binary', op: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Expression {
    if (this.matchKeyword('not') || this.matchOp('~')) {
      return { kind: 'unary', op: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expression {
    let left = this.parseAdditive();
    let op = this.matchOp(...COMPARISONS);
    while (op) {
      left = { kind: 'binary', op: toBinary(op), left, right: this.parseAdditive() };
      op = this.matchOp(...COMPARISONS);
    }
    return left;
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    let op = this.matchOp('+', '-');
    while (op) {
      left = { kind: 'binary', op: toBinary(op), left, right: this.parseMultiplicative() };
      op = this.matchOp('+', '-');
    }
    return left;
  }

  private parseMultiplicative(): Expression {
    let left = this.parseUnary();
    let op = this.matchOp('*', '/', '//', '%');
    while (op) {
      left = { kind: 'binary', op: toBinary(op), left, right: this.parseUnary() };
      op = this.matchOp('*', '/', '//', '%');
    }
    return left;
  }

  private parseUnary(): Expression {
    const op = this.matchOp('-', '+');
    if (op === '-' || op === '+') {
      return { kind: 'unary', op, operand: this.parseUnary() };
    }
    return this.parsePower();
  }

  private parsePower(): Expression {
    const base = this.parsePrimary();
    if (this.matchOp('**')) {
      // right-associative, and binds tighter than a unary minus on its left
      return { kind: 'binary', op: '**', left: base, right: this.parseUnary() };
    }
    return base;
  }

  private parsePrimary(): Expression {
    const token = this.next();
    switch (token.kind) {
      case 'number':
        return { kind: 'literal', value: token.value };
      case 'string':
        return { kind: 'literal', value: token.value };
      case 'column':
        this.columns.add(token.value);
        return { kind: 'column', name: token.value };
      case 'ident':
        if (token.value === 'True' || token.value === 'true') return { kind: 'literal', value: true };
        if (token.value === 'False' || token.value === 'false') return { kind: 'literal', value: false };
        if (['and', 'or', 'not'].includes(token.value)) {
          throw new Error(`Unexpected keyword "${token.value}" at position ${token.pos}`);
        }
        this.columns.add(token.value);
        return { kind: 'column', name: token.value };
      case 'op':
        if (token.value === '(') {
          const inner = this.parseOr();
          if (!this.matchOp(')')) {
            throw new Error(`Missing closing parenthesis for position ${token.pos}`);
          }
          return inner;
        }
        throw new Error(`Unexpected operator "${token.value}" at position ${token.pos}`);
      case 'eof':
        throw new Error('Unexpected end of expression');
    }
  }
}

function toBinary(op: string): BinaryOperator {
  const found = (['==', '!=', '<', '<=', '>', '>=', '+', '-', '*', '/', '//', '%', '**'] as const).find(o => o === op);
  if (!found) {
    throw new Error(`Unknown operator "${op}"`);
  }
  return found;
}

function isTruthy(value: CellValue): boolean {
  if (value === null) return false;
  if (typeof value === 'string') return value.length > 0;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  return true;
}

function numericOperand(value: Exclude<CellValue, null>): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return undefined;
}

function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

function describeKind(value: Exclude<CellValue, null>): string {
  return CellProcessor.kindOf(value);
}

function compare(op: BinaryOperator, left: CellValue, right: CellValue): boolean {
  if (left === null || right === null) {
    return op === '!=';
  }
  if (op === '==') return CellProcessor.cellKey(left) === CellProcessor.cellKey(right);
  if (op === '!=') return CellProcessor.cellKey(left) !== CellProcessor.cellKey(right);
  if (CellProcessor.kindOf(left) !== CellProcessor.kindOf(right)) {
    throw new Error(`'${op}' not supported between ${describeKind(left)} and ${describeKind(right)}`);
  }
  const order = CellProcessor.compareValues(left, right);
  switch (op) {
    case '<': return order < 0;
    case '<=': return order <= 0;
    case '>': return order > 0;
    default: return order >= 0;
  }
}

function arithmetic(op: BinaryOperator, left: CellValue, right: CellValue): CellValue {
  if (left === null || right === null) {
    return null;
  }
  if (op === '+' && typeof left === 'string' && typeof right === 'string') {
    return left + right;
  }
  const a = numericOperand(left);
  const b = numericOperand(right);
  if (a === undefined || b === undefined) {
    throw new Error(`Unsupported operand types for ${op}: ${describeKind(left)} and ${describeKind(right)}`);
  }
  switch (op) {
    case '+': return finiteOrNull(a + b);
    case '-': return finiteOrNull(a - b);
    case '*': return finiteOrNull(a * b);
    case '/': return finiteOrNull(a / b);
    case '//': return finiteOrNull(Math.floor(a / b));
    case '%': return finiteOrNull(((a % b) + b) % b);
    default: return finiteOrNull(a ** b);
  }
}

export class FormulaProcessor {
  /**
   * Splits "Target = expression" at the first single "=" outside quotes.
   */
  static parseFormula(text: string): ParsedFormula {
    let quote: string | null = null;
    for (let i = 0; i < text.length; i++) {
      const char = text[i];
      if (quote) {
        if (char === quote) quote = null;
        continue;
      }
      if (char === '"' || char === "'" || char === '`') {
        quote = char;
        continue;
      }
      if (char === '=' && !'=<>!'.includes(text[i - 1] ?? '') && text[i + 1] !== '=') {
        const rawTarget = text.slice(0, i).trim();
        const target = rawTarget.startsWith('`') && rawTarget.endsWith('`') && rawTarget.length > 1
          ? rawTarget.slice(1, -1)
          : rawTarget;
        const expression = text.slice(i + 1).trim();
        if (!target || !expression) {
          break;
        }
        return { target, expression };
      }
    }
    throw new Error(`Formula "${text}" must have the form "<column> = <expression>"`);
  }

  static compileExpression(expression: string): CompiledExpression {
    const parser = new Parser(tokenize(expression));
    const ast = parser.parse();
    return { ast, columns: [...parser.columns] };
  }

  static evaluate(ast: Expression, row: ReadonlyMap<string, CellValue>): CellValue {
    switch (ast.kind) {
      case 'literal':
        return ast.value;
      case 'column': {
        const value = row.get(ast.name);
        if (value === undefined) {
          throw new Error(`Column "${ast.name}" not found`);
        }
        return value;
      }
      case 'unary': {
        const operand = FormulaProcessor.evaluate(ast.operand, row);
        if (ast.op === 'not') {
          return operand === null ? null : !isTruthy(operand);
        }
        if (operand === null) return null;
        const num = numericOperand(operand);
        if (num === undefined) {
          throw new Error(`Bad operand type for unary ${ast.op}: ${describeKind(operand)}`);
        }
        return ast.op === '-' ? -num : num;
      }
      case 'binary': {
        const left = FormulaProcessor.evaluate(ast.left, row);
        const right = FormulaProcessor.evaluate(ast.right, row);
        if (ast.op === 'and') return isTruthy(left) && isTruthy(right);
        if (ast.op === 'or') return isTruthy(left) || isTruthy(right);
        if (COMPARISONS.includes(ast.op)) return compare(ast.op, left, right);
        return arithmetic(ast.op, left, right);
      }
    }
  }
}
