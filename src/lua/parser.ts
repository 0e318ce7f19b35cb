/**
 * Lua 5.1 parser
 *
 * Recursive descent over the token array with precedence climbing for
 * binary operators. `function a.b:c()` statements are lowered to plain
 * assignments with an explicit `self` parameter.
 *
 * @module lua/parser
 */

import type { AssignTarget, BinaryOp, Block, CallExpr, Chunk, Expr, FunctionBody, IfClause, Stat, TableField } from './ast.js';
import { LuaSyntaxError } from './errors.js';
import { tokenize, type Token } from './lexer.js';

/** Left and right binding power of each binary operator */
const BINARY_PRIORITY: Readonly<Record<string, readonly [number, number]>> = {
  'or': [1, 1],
  'and': [2, 2],
  '<': [3, 3], '>': [3, 3], '<=': [3, 3], '>=': [3, 3], '~=': [3, 3], '==': [3, 3],
  '..': [9, 8],
  '+': [10, 10], '-': [10, 10],
  '*': [11, 11], '/': [11, 11], '%': [11, 11], '//': [11, 11],
  '^': [14, 13],
};

const UNARY_PRIORITY = 12;

function isBinaryOp(value: string): value is BinaryOp {
  return value in BINARY_PRIORITY;
}

/**
 * Parse a Lua chunk
 *
 * @param chunk - name used in error messages, e.g. `Module:fi-headword`
 * @throws {LuaSyntaxError} on malformed source
 */
export function parseChunk(source: string, chunk: string): Chunk {
  const parser = new LuaParser(tokenize(source, chunk), chunk);
  return { name: chunk, main: parser.parseMain() };
}

class LuaParser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly chunk: string
  ) {}

  parseMain(): FunctionBody {
    const body = this.block();
    this.expectType('eof');
    return { params: [], isVararg: true, body, name: 'main chunk', chunk: this.chunk, line: 0 };
  }

  // ==========================================================================
  // TOKENS
  // ==========================================================================

  private get token(): Token {
    return this.tokens[this.index] ?? this.tokens[this.tokens.length - 1] ?? { type: 'eof', value: '<eof>', number: 0, line: 0 };
  }

  private peek(offset = 1): Token | undefined {
    return this.tokens[this.index + offset];
  }

  private advance(): Token {
    const token = this.token;
    if (this.index < this.tokens.length - 1) this.index++;
    return token;
  }

  private check(value: string): boolean {
    const token = this.token;
    return (token.type === 'op' || token.type === 'keyword') && token.value === value;
  }

  private accept(value: string): boolean {
    if (!this.check(value)) return false;
    this.advance();
    return true;
  }

  private error(message: string, token: Token = this.token): LuaSyntaxError {
    return new LuaSyntaxError(`${this.chunk}:${token.line}: ${message} near '${token.value}'`);
  }

  private expect(value: string, opener?: { value: string; line: number }): void {
    if (this.accept(value)) return;
    if (opener && opener.line !== this.token.line) {
      throw this.error(`'${value}' expected (to close '${opener.value}' at line ${opener.line})`);
    }
    throw this.error(`'${value}' expected`);
  }

  private expectType(type: Token['type']): Token {
    if (this.token.type !== type) throw this.error(`${type} expected`);
    return this.advance();
  }

  private name(): string {
    return this.expectType('name').value;
  }

  // ==========================================================================
  // STATEMENTS
  // ==========================================================================

  private blockEnds(): boolean {
    const token = this.token;
    if (token.type === 'eof') return true;
    if (token.type !== 'keyword') return false;
    return token.value === 'end' || token.value === 'else' || token.value === 'elseif' || token.value === 'until';
  }

  private block(): Block {
    const statements: Block = [];
    while (!this.blockEnds()) {
      if (this.check('return')) {
        statements.push(this.returnStatement());
        break;
      }
      const statement = this.statement();
      if (statement) statements.push(statement);
    }
    return statements;
  }

  private returnStatement(): Stat {
    const line = this.advance().line;
    const values = this.blockEnds() || this.check(';') ? [] : this.exprList();
    this.accept(';');
    return { type: 'return', values, line };
  }

  private statement(): Stat | null {
    const token = this.token;
    const line = token.line;

    if (token.type === 'op' && token.value === ';') {
      this.advance();
      return null;
    }

    if (token.type === 'keyword') {
      switch (token.value) {
        case 'if':
          return this.ifStatement();
        case 'while': {
          this.advance();
          const cond = this.expr();
          this.expect('do');
          const body = this.block();
          this.expect('end', { value: 'while', line });
          return { type: 'while', cond, body, line };
        }
        case 'do': {
          this.advance();
          const body = this.block();
          this.expect('end', { value: 'do', line });
          return { type: 'do', body, line };
        }
        case 'for':
          return this.forStatement();
        case 'repeat': {
          this.advance();
          const body = this.block();
          this.expect('until', { value: 'repeat', line });
          return { type: 'repeat', body, cond: this.expr(), line };
        }
        case 'function':
          return this.functionStatement();
        case 'local':
          this.advance();
          if (this.accept('function')) {
            const name = this.name();
            return { type: 'localFunction', name, func: this.functionBody(name, line), line };
          }
          return this.localStatement(line);
        case 'break':
          this.advance();
          return { type: 'break', line };
        case 'goto':
          throw this.error('goto is not supported');
        default:
          break;
      }
    }

    return this.exprStatement();
  }

  private ifStatement(): Stat {
    const line = this.advance().line;
    const clauses: IfClause[] = [];
    const cond = this.expr();
    this.expect('then');
    clauses.push({ cond, body: this.block() });
    let orelse: Block | null = null;
    for (;;) {
      if (this.accept('elseif')) {
        const elseCond = this.expr();
        this.expect('then');
        clauses.push({ cond: elseCond, body: this.block() });
      } else if (this.accept('else')) {
        orelse = this.block();
        this.expect('end', { value: 'if', line });
        break;
      } else {
        this.expect('end', { value: 'if', line });
        break;
      }
    }
    return { type: 'if', clauses, orelse, line };
  }

  private forStatement(): Stat {
    const line = this.advance().line;
    const first = this.name();
    if (this.accept('=')) {
      const start = this.expr();
      this.expect(',');
      const limit = this.expr();
      const step = this.accept(',') ? this.expr() : null;
      this.expect('do');
      const body = this.block();
      this.expect('end', { value: 'for', line });
      return { type: 'numericFor', variable: first, start, limit, step, body, line };
    }
    const names = [first];
    while (this.accept(',')) names.push(this.name());
    this.expect('in');
    const exprs = this.exprList();
    this.expect('do');
    const body = this.block();
    this.expect('end', { value: 'for', line });
    return { type: 'genericFor', names, exprs, body, line };
  }

  private functionStatement(): Stat {
    const line = this.advance().line;
    let target: AssignTarget = { type: 'name', name: this.name(), line };
    let fullName = target.name;
    let isMethod = false;
    while (this.check('.') || this.check(':')) {
      isMethod = this.advance().value === ':';
      const key = this.name();
      fullName += `${isMethod ? ':' : '.'}${key}`;
      target = { type: 'index', object: target, key: { type: 'string', value: key, line }, line };
      if (isMethod) break;
    }
    const func = this.functionBody(fullName, line);
    if (isMethod) func.params.unshift('self');
    return { type: 'assign', targets: [target], values: [{ type: 'function', func, line }], line };
  }

  private localStatement(line: number): Stat {
    const names = [this.name()];
    this.attribute();
    while (this.accept(',')) {
      names.push(this.name());
      this.attribute();
    }
    const values = this.accept('=') ? this.exprList() : [];
    return { type: 'local', names, values, line };
  }

  /** Lua 5.4 `<const>` / `<close>` attributes are accepted and ignored */
  private attribute(): void {
    if (this.check('<') && this.peek()?.type === 'name' && this.peek(2)?.value === '>') {
      this.advance();
      this.advance();
      this.advance();
    }
  }

  private exprStatement(): Stat {
    const line = this.token.line;
    const first = this.suffixedExpr();
    if (this.check('=') || this.check(',')) {
      const targets: AssignTarget[] = [this.toTarget(first)];
      while (this.accept(',')) targets.push(this.toTarget(this.suffixedExpr()));
      this.expect('=');
      return { type: 'assign', targets, values: this.exprList(), line };
    }
    if (first.type !== 'call' && first.type !== 'method') {
      throw this.error('syntax error');
    }
    return { type: 'call', call: first, line };
  }

  private toTarget(expr: Expr): AssignTarget {
    if (expr.type === 'name' || expr.type === 'index') return expr;
    throw this.error('syntax error');
  }

  // ==========================================================================
  // EXPRESSIONS
  // ==========================================================================

  private exprList(): Expr[] {
    const list = [this.expr()];
    while (this.accept(',')) list.push(this.expr());
    return list;
  }

  private expr(limit = 0): Expr {
    const token = this.token;
    let left: Expr;
    if ((token.type === 'keyword' && token.value === 'not') || (token.type === 'op' && (token.value === '-' || token.value === '#'))) {
      this.advance();
      const operand = this.expr(UNARY_PRIORITY);
      const op = token.value === 'not' ? 'not' : token.value === '-' ? '-' : '#';
      left = op === '-' && operand.type === 'number'
        ? { type: 'number', value: -operand.value, line: token.line }
        : { type: 'unary', op, operand, line: token.line };
    } else {
      left = this.simpleExpr();
    }

    for (;;) {
      const opToken = this.token;
      if (opToken.type !== 'op' && opToken.type !== 'keyword') break;
      const op = opToken.value;
      if (!isBinaryOp(op)) break;
      const priority = BINARY_PRIORITY[op];
      if (!priority || priority[0] <= limit) break;
      this.advance();
      const right = this.expr(priority[1]);
      left = { type: 'binary', op, left, right, line: opToken.line };
    }
    return left;
  }

  private simpleExpr(): Expr {
    const token = this.token;
    const line = token.line;
    switch (token.type) {
      case 'number':
        this.advance();
        return { type: 'number', value: token.number, line };
      case 'string':
        this.advance();
        return { type: 'string', value: token.value, line };
      case 'keyword':
        switch (token.value) {
          case 'nil':
            this.advance();
            return { type: 'nil', line };
          case 'true':
            this.advance();
            return { type: 'true', line };
          case 'false':
            this.advance();
            return { type: 'false', line };
          case 'function':
            this.advance();
            return { type: 'function', func: this.functionBody('anonymous', line), line };
          default:
            break;
        }
        break;
      case 'op':
        if (token.value === '...') {
          this.advance();
          return { type: 'vararg', line };
        }
        if (token.value === '{') return this.tableConstructor();
        break;
      default:
        break;
    }
    return this.suffixedExpr();
  }

  private primaryExpr(): Expr {
    const token = this.token;
    if (token.type === 'name') {
      this.advance();
      return { type: 'name', name: token.value, line: token.line };
    }
    if (this.accept('(')) {
      const expr = this.expr();
      this.expect(')', { value: '(', line: token.line });
      return { type: 'paren', expr, line: token.line };
    }
    throw this.error('unexpected symbol');
  }

  private suffixedExpr(): Expr {
    let expr = this.primaryExpr();
    for (;;) {
      const token = this.token;
      const line = token.line;
      if (token.type === 'op') {
        if (token.value === '.') {
          this.advance();
          expr = { type: 'index', object: expr, key: { type: 'string', value: this.name(), line }, line };
          continue;
        }
        if (token.value === '[') {
          this.advance();
          const key = this.expr();
          this.expect(']');
          expr = { type: 'index', object: expr, key, line };
          continue;
        }
        if (token.value === ':') {
          this.advance();
          const method = this.name();
          expr = { type: 'method', object: expr, method, args: this.callArgs(), line };
          continue;
        }
        if (token.value === '(' || token.value === '{') {
          expr = this.makeCall(expr, line);
          continue;
        }
      } else if (token.type === 'string') {
        expr = this.makeCall(expr, line);
        continue;
      }
      return expr;
    }
  }

  private makeCall(callee: Expr, line: number): CallExpr {
    return { type: 'call', callee, args: this.callArgs(), line };
  }

  private callArgs(): Expr[] {
    const token = this.token;
    if (token.type === 'string') {
      this.advance();
      return [{ type: 'string', value: token.value, line: token.line }];
    }
    if (this.check('{')) return [this.tableConstructor()];
    this.expect('(');
    if (this.accept(')')) return [];
    const args = this.exprList();
    this.expect(')', { value: '(', line: token.line });
    return args;
  }

  private tableConstructor(): Expr {
    const line = this.token.line;
    this.expect('{');
    const fields: TableField[] = [];
    while (!this.check('}')) {
      if (this.check('[')) {
        this.advance();
        const key = this.expr();
        this.expect(']');
        this.expect('=');
        fields.push({ kind: 'keyed', key, value: this.expr() });
      } else if (this.token.type === 'name' && this.peek()?.value === '=' && this.peek()?.type === 'op') {
        const keyToken = this.advance();
        this.advance();
        fields.push({ kind: 'keyed', key: { type: 'string', value: keyToken.value, line: keyToken.line }, value: this.expr() });
      } else {
        fields.push({ kind: 'item', value: this.expr() });
      }
      if (!this.accept(',') && !this.accept(';')) break;
    }
    this.expect('}', { value: '{', line });
    return { type: 'table', fields, line };
  }

  private functionBody(name: string, line: number): FunctionBody {
    this.expect('(');
    const params: string[] = [];
    let isVararg = false;
    if (!this.check(')')) {
      do {
        if (this.accept('...')) {
          isVararg = true;
          break;
        }
        params.push(this.name());
      } while (this.accept(','));
    }
    this.expect(')');
    const body = this.block();
    this.expect('end', { value: 'function', line });
    return { params, isVararg, body, name, chunk: this.chunk, line };
  }
}
