/**
 * `#expr` evaluator
 *
 * Precedence, from loosest to tightest: `or`, `and`, comparisons, `round`,
 * `+ -`, `* / div mod fmod`, `^`, unary functions and `not`, unary `+ -`
 * and the exponent operator `e`. Binary operators are left-associative.
 *
 * @module expand/expr
 */

export class ExprError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExprError';
    Object.setPrototypeOf(this, ExprError.prototype);
  }
}

type Token = { type: 'number'; value: number } | { type: 'op'; value: string } | { type: 'end' };

const WORDS = new Set([
  'mod', 'fmod', 'div', 'round', 'and', 'or', 'not', 'e', 'pi',
  'sin', 'cos', 'tan', 'asin', 'acos', 'atan', 'exp', 'ln', 'abs',
  'trunc', 'floor', 'ceil', 'sqrt',
]);

const BINARY: Readonly<Record<string, number>> = {
  or: 2,
  and: 3,
  '=': 4,
  '<>': 4,
  '!=': 4,
  '<': 4,
  '>': 4,
  '<=': 4,
  '>=': 4,
  round: 5,
  '+': 6,
  '-': 6,
  '*': 7,
  '/': 7,
  div: 7,
  mod: 7,
  fmod: 7,
  '^': 8,
  e: 10,
};

const FUNCTIONS: Readonly<Record<string, (x: number) => number>> = {
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
  asin: x => {
    if (x < -1 || x > 1) throw new ExprError('Invalid argument for asin: < -1 or > 1.');
    return Math.asin(x);
  },
  acos: x => {
    if (x < -1 || x > 1) throw new ExprError('Invalid argument for acos: < -1 or > 1.');
    return Math.acos(x);
  },
  atan: Math.atan,
  exp: Math.exp,
  ln: x => {
    if (x <= 0) throw new ExprError('Invalid argument for ln: <= 0.');
    return Math.log(x);
  },
  abs: Math.abs,
  trunc: Math.trunc,
  floor: Math.floor,
  ceil: Math.ceil,
  sqrt: x => {
    if (x < 0) throw new ExprError('Invalid argument for sqrt: < 0.');
    return Math.sqrt(x);
  },
  not: x => (x === 0 ? 1 : 0),
};

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < input.length) {
    const ch = input.charAt(i);
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    const number = /^[0-9.]+/.exec(input.slice(i));
    if (number) {
      const text = number[0];
      const value = text === '.' ? 0 : parseFloat(text);
      tokens.push({ type: 'number', value: Number.isNaN(value) ? 0 : value });
      i += text.length;
      continue;
    }
    const word = /^[a-zA-Z]+/.exec(input.slice(i));
    if (word) {
      const name = word[0].toLowerCase();
      if (!WORDS.has(name)) throw new ExprError(`Unrecognized word "${name}".`);
      tokens.push({ type: 'op', value: name });
      i += word[0].length;
      continue;
    }
    const two = input.slice(i, i + 2);
    if (two === '<>' || two === '!=' || two === '<=' || two === '>=') {
      tokens.push({ type: 'op', value: two });
      i += 2;
      continue;
    }
    if ('+-*/^()=<>'.includes(ch)) {
      tokens.push({ type: 'op', value: ch });
      i++;
      continue;
    }
    if (ch === '−') {
      tokens.push({ type: 'op', value: '-' });
      i++;
      continue;
    }
    throw new ExprError(`Unrecognized punctuation character "${ch}".`);
  }
  tokens.push({ type: 'end' });
  return tokens;
}

/** PHP's `round`: half away from zero, to `digits` decimals */
function round(value: number, digits: number): number {
  const factor = Math.pow(10, Math.trunc(digits));
  const scaled = Math.abs(value) * factor;
  const rounded = Math.floor(scaled + 0.5 + 1e-9 * Math.max(1, scaled) * Number.EPSILON) / factor;
  return value < 0 ? -rounded : rounded;
}

function applyBinary(op: string, a: number, b: number): number {
  switch (op) {
    case 'or':
      return a !== 0 || b !== 0 ? 1 : 0;
    case 'and':
      return a !== 0 && b !== 0 ? 1 : 0;
    case '=':
      return a === b ? 1 : 0;
    case '<>':
    case '!=':
      return a !== b ? 1 : 0;
    case '<':
      return a < b ? 1 : 0;
    case '>':
      return a > b ? 1 : 0;
    case '<=':
      return a <= b ? 1 : 0;
    case '>=':
      return a >= b ? 1 : 0;
    case 'round':
      return round(a, b);
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
    case 'div':
      if (b === 0) throw new ExprError('Division by zero.');
      return a / b;
    case 'mod': {
      const divisor = Math.trunc(b);
      if (divisor === 0) throw new ExprError('Division by zero.');
      return Math.trunc(a) % divisor;
    }
    case 'fmod':
      if (b === 0) throw new ExprError('Division by zero.');
      return a % b;
    case '^':
      return Math.pow(a, b);
    case 'e':
      return a * Math.pow(10, b);
    default:
      throw new ExprError(`Unexpected ${op} operator.`);
  }
}

class ExprParser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  private peek(): Token {
    return this.tokens[this.index] ?? { type: 'end' };
  }

  parse(): number {
    if (this.peek().type === 'end') return NaN;
    const value = this.expression(0);
    const token = this.peek();
    if (token.type === 'number') throw new ExprError('Unexpected number.');
    if (token.type === 'op') {
      throw new ExprError(token.value === ')' ? 'Unexpected closing bracket.' : `Unexpected ${token.value} operator.`);
    }
    return value;
  }

  private expression(minPrecedence: number): number {
    let left = this.operand();
    for (;;) {
      const token = this.peek();
      if (token.type !== 'op') return left;
      const precedence = BINARY[token.value];
      if (precedence === undefined || precedence < minPrecedence) return left;
      this.index++;
      const right = this.expression(precedence + 1);
      left = applyBinary(token.value, left, right);
    }
  }

  private operand(): number {
    const token = this.peek();
    if (token.type === 'end') throw new ExprError('Missing operand.');
    this.index++;
    if (token.type === 'number') return token.value;
    const op = token.value;
    switch (op) {
      case '(': {
        const value = this.expression(0);
        const close = this.peek();
        if (close.type !== 'op' || close.value !== ')') throw new ExprError('Unclosed bracket.');
        this.index++;
        return value;
      }
      case '-':
        return -this.operandOf(op, 10);
      case '+':
        return this.operandOf(op, 10);
      case 'pi':
        return Math.PI;
      case 'e':
        return Math.E;
      default: {
        const fn = FUNCTIONS[op];
        if (fn) return fn(this.operandOf(op, 9));
        throw new ExprError(op === ')' ? 'Unexpected closing bracket.' : `Missing operand for ${op}.`);
      }
    }
  }

  private operandOf(op: string, precedence: number): number {
    if (this.peek().type === 'end') throw new ExprError(`Missing operand for ${op}.`);
    return this.expression(precedence);
  }
}

/**
 * Format a result the way PHP prints floats
 */
export function formatExprResult(value: number): string {
  if (Number.isNaN(value)) return 'NAN';
  if (value === Infinity) return 'INF';
  if (value === -Infinity) return '-INF';
  if (Number.isInteger(value) && Math.abs(value) < 1e15) return String(value === 0 ? 0 : value);
  const text = value.toPrecision(14);
  if (!text.includes('e')) return text.includes('.') ? text.replace(/\.?0+$/, '') : text;
  const [mantissa = '', exponent = ''] = text.split('e');
  let digits = mantissa.replace(/\.?0+$/, '');
  if (!digits.includes('.')) digits += '.0';
  return `${digits}E${exponent.startsWith('-') ? exponent : `+${exponent.replace('+', '')}`}`;
}

/**
 * Evaluate an expression; an empty expression gives an empty result
 *
 * @throws {ExprError} with the message shown after `Expression error:`
 */
export function evaluate(input: string): number | null {
  const tokens = tokenize(input);
  const parser = new ExprParser(tokens);
  const value = parser.parse();
  return Number.isNaN(value) && tokens.length === 1 ? null : value;
}
