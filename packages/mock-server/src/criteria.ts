/**
 * Criteria language
 *
 * `key op value` comparisons joined by `and` / `or`, with `and` binding
 * tighter and parentheses for grouping:
 *
 *   age > 30 and (name = "Ada" or name = Grace)
 *
 * A record matches a comparison when any of its values for the key does.
 */

import { JsonValueCodec, Link, RemoteOperationError, Tag, type TObject, type Value } from '@chronokv/client';

import type { Snapshot } from './store.js';

// ============================================================================
// AST
// ============================================================================

export type Operator = '=' | '!=' | '>' | '>=' | '<' | '<=';

export type Operand = string | number | boolean;

export type Criteria =
  | { readonly kind: 'compare'; readonly key: string; readonly operator: Operator; readonly operand: Operand }
  | { readonly kind: 'and' | 'or'; readonly left: Criteria; readonly right: Criteria };

const OPERATORS: readonly Operator[] = ['>=', '<=', '!=', '=', '>', '<'];

function parseError(message: string): RemoteOperationError {
  return new RemoteOperationError('PARSE_ERROR', message);
}

// ============================================================================
// Tokenizer
// ============================================================================

interface Token {
  kind: 'word' | 'string' | 'operator' | 'lparen' | 'rparen';
  text: string;
}

function isOperator(text: string): text is Operator {
  return OPERATORS.some((operator) => operator === text);
}

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < input.length) {
    const char = input.charAt(i);
    if (/\s/.test(char)) {
      i++;
    } else if (char === '(' || char === ')') {
      tokens.push({ kind: char === '(' ? 'lparen' : 'rparen', text: char });
      i++;
    } else if (char === '"' || char === "'") {
      const close = input.indexOf(char, i + 1);
      if (close === -1) {
        throw parseError(`Unterminated string starting at position ${i}`);
      }
      tokens.push({ kind: 'string', text: input.slice(i + 1, close) });
      i = close + 1;
    } else {
      const operator = OPERATORS.find((candidate) => input.startsWith(candidate, i));
      if (operator !== undefined) {
        tokens.push({ kind: 'operator', text: operator });
        i += operator.length;
        continue;
      }
      let end = i;
      while (end < input.length && !/[\s()=!<>"']/.test(input.charAt(end))) {
        end++;
      }
      if (end === i) {
        throw parseError(`Unexpected character '${char}' at position ${i}`);
      }
      tokens.push({ kind: 'word', text: input.slice(i, end) });
      i = end;
    }
  }
  return tokens;
}

// ============================================================================
// Parser
// ============================================================================

function literal(token: Token): Operand {
  if (token.kind === 'string') return token.text;
  if (token.text === 'true') return true;
  if (token.text === 'false') return false;
  const num = Number(token.text);
  return token.text.length > 0 && !Number.isNaN(num) ? num : token.text;
}

class Parser {
  private position = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  parse(): Criteria {
    if (this.tokens.length === 0) {
      throw parseError('Criteria is empty');
    }
    const criteria = this.parseOr();
    const extra = this.peek();
    if (extra !== undefined) {
      throw parseError(`Unexpected '${extra.text}'`);
    }
    return criteria;
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(expected: string): Token {
    const token = this.tokens[this.position];
    if (token === undefined) {
      throw parseError(`Expected ${expected} but the criteria ended`);
    }
    this.position++;
    return token;
  }

  private isConjunction(word: 'and' | 'or'): boolean {
    const token = this.peek();
    return token?.kind === 'word' && token.text.toLowerCase() === word;
  }

  private parseOr(): Criteria {
    let left = this.parseAnd();
    while (this.isConjunction('or')) {
      this.position++;
      left = { kind: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Criteria {
    let left = this.parseTerm();
    while (this.isConjunction('and')) {
      this.position++;
      left = { kind: 'and', left, right: this.parseTerm() };
    }
    return left;
  }

  private parseTerm(): Criteria {
    const token = this.next('a key or (');
    if (token.kind === 'lparen') {
      const inner = this.parseOr();
      if (this.next(')').kind !== 'rparen') {
        throw parseError('Expected )');
      }
      return inner;
    }
    if (token.kind !== 'word') {
      throw parseError(`Expected a key but found '${token.text}'`);
    }
    const operator = this.next('an operator');
    if (operator.kind !== 'operator' || !isOperator(operator.text)) {
      throw parseError(`Expected an operator after '${token.text}' but found '${operator.text}'`);
    }
    const operand = this.next('a value');
    if (operand.kind !== 'word' && operand.kind !== 'string') {
      throw parseError(`Expected a value after '${operator.text}' but found '${operand.text}'`);
    }
    return { kind: 'compare', key: token.text, operator: operator.text, operand: literal(operand) };
  }
}

/** Parse criteria text. Syntax errors are `PARSE_ERROR` remote errors. */
export function parseCriteria(input: string): Criteria {
  return new Parser(tokenize(input)).parse();
}

// ============================================================================
// Evaluation
// ============================================================================

const codec = new JsonValueCodec();

function comparable(value: Value | null): Operand | null {
  if (value === null) return null;
  if (value instanceof Link) return value.record;
  if (value instanceof Tag) return value.value;
  if (typeof value === 'bigint') return Number(value);
  return value;
}

function compare(stored: TObject, operator: Operator, operand: Operand): boolean {
  const value = comparable(codec.decode(stored));
  if (value === null) return false;

  if (operator === '=' || operator === '!=') {
    const equal = typeof value === 'number' && typeof operand === 'number' ? value === operand : String(value) === String(operand);
    return operator === '=' ? equal : !equal;
  }

  // Ordering is numeric when both sides are numbers, lexicographic otherwise.
  const order =
    typeof value === 'number' && typeof operand === 'number'
      ? value - operand
      : String(value).localeCompare(String(operand));
  switch (operator) {
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
  }
}

export function matches(criteria: Criteria, snapshot: Snapshot, record: number): boolean {
  switch (criteria.kind) {
    case 'and':
      return matches(criteria.left, snapshot, record) && matches(criteria.right, snapshot, record);
    case 'or':
      return matches(criteria.left, snapshot, record) || matches(criteria.right, snapshot, record);
    case 'compare':
      return snapshot
        .values(record, criteria.key)
        .some((value) => compare(value, criteria.operator, criteria.operand));
  }
}

/** Records in the snapshot that satisfy the criteria, ascending. */
export function findRecords(criteria: Criteria, snapshot: Snapshot): number[] {
  return snapshot.records().filter((record) => matches(criteria, snapshot, record));
}
