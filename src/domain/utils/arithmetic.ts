export class ArithmeticError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArithmeticError";
  }
}

type Token =
  | { kind: 'number'; value: number; position: number }
  | { kind: 'operator'; value: '+' | '-' | '*' | '/'; position: number }
  | { kind: 'paren'; value: '(' | ')'; position: number };

export const ALLOWED_CALCULATION_CHARS = '0123456789+-*/.() ';

export const isAllowedExpression = (expression: string): boolean =>
  [...expression].every(char => ALLOWED_CALCULATION_CHARS.includes(char));

export function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expression.length) {
    const char = expression[i];

    if (char === ' ') {
      i++;
      continue;
    }

    if (char === '+' || char === '-' || char === '*' || char === '/') {
      tokens.push({ kind: 'operator', value: char, position: i });
      i++;
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ kind: 'paren', value: char, position: i });
      i++;
      continue;
    }

    if ((char >= '0' && char <= '9') || char === '.') {
      const start = i;
      let seenDot = false;
      while (i < expression.length && ((expression[i] >= '0' && expression[i] <= '9') || expression[i] === '.')) {
        if (expression[i] === '.') {
          if (seenDot) {
            throw new ArithmeticError(`Malformed number at position ${start}`);
          }
          seenDot = true;
        }
        i++;
      }
      const literal = expression.slice(start, i);
      if (literal === '.') {
        throw new ArithmeticError(`Malformed number at position ${start}`);
      }
      tokens.push({ kind: 'number', value: parseFloat(literal), position: start });
      continue;
    }

    throw new ArithmeticError(`Unexpected character '${char}' at position ${i}`);
  }

  return tokens;
}

/**
 * Recursive-descent evaluator over `+ - * / ( )` and decimal literals.
 *
 *   expression := term (('+' | '-') term)*
 *   term       := factor (('*' | '/') factor)*
 *   factor     := ('+' | '-') factor | number | '(' expression ')'
 */
class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new ArithmeticError('Empty expression');
    }
    const value = this.expression();
    const trailing = this.peek();
    if (trailing) {
      throw new ArithmeticError(`Unexpected token '${trailing.value}' at position ${trailing.position}`);
    }
    return value;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token | undefined {
    const token = this.tokens[this.index];
    this.index++;
    return token;
  }

  private expression(): number {
    let value = this.term();
    for (;;) {
      const token = this.peek();
      if (!token || token.kind !== 'operator' || (token.value !== '+' && token.value !== '-')) {
        break;
      }
      this.next();
      const right = this.term();
      value = token.value === '+' ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.factor();
    for (;;) {
      const token = this.peek();
      if (!token || token.kind !== 'operator' || (token.value !== '*' && token.value !== '/')) {
        break;
      }
      this.next();
      const right = this.factor();
      if (token.value === '/') {
        if (right === 0) {
          throw new ArithmeticError('Division by zero');
        }
        value = value / right;
      } else {
        value = value * right;
      }
    }
    return value;
  }

  private factor(): number {
    const token = this.next();
    if (!token) {
      throw new ArithmeticError('Unexpected end of expression');
    }

    if (token.kind === 'number') {
      return token.value;
    }

    if (token.kind === 'operator' && (token.value === '+' || token.value === '-')) {
      const operand = this.factor();
      return token.value === '-' ? -operand : operand;
    }

    if (token.kind === 'paren' && token.value === '(') {
      const value = this.expression();
      const closing = this.next();
      if (!closing || closing.kind !== 'paren' || closing.value !== ')') {
        throw new ArithmeticError(`Missing closing parenthesis for '(' at position ${token.position}`);
      }
      return value;
    }

    throw new ArithmeticError(`Unexpected token '${token.value}' at position ${token.position}`);
  }
}

export function evaluateArithmetic(expression: string): number {
  return new Parser(tokenize(expression)).parse();
}
