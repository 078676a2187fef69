import { CriteriaSyntaxError } from './errors.js';
import { isOperatorKeyword } from './operators.js';
import type { Token } from './types.js';
import { debugLog } from '../utils/logger.js';

/** What the next plain word in a clause is read as. */
type ClauseState = 'field' | 'operator' | 'value';

const WHITESPACE = /\s/;

/**
 * Splits one derivation segment into tokens.
 *
 * Words are classified by their place in the clause: the first word is the
 * field, the second the operator, the rest values until the next operator
 * keyword, connective, parenthesis or end of input. The word in operator
 * position is not checked against the table here, so that an unknown operator
 * reaches the validator and is reported as such.
 */
export class Tokenizer {
  private pos = 0;
  private openPositions: number[] = [];
  private state: ClauseState = 'field';
  private input: string;

  constructor(input: string) {
    this.input = input;
  }

  private peek(): string {
    return this.input[this.pos] || '';
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && WHITESPACE.test(this.peek())) {
      this.pos++;
    }
  }

  private readWord(): string {
    const start = this.pos;
    while (this.pos < this.input.length) {
      const ch = this.peek();
      if (WHITESPACE.test(ch) || ch === '(' || ch === ')') {
        break;
      }
      this.pos++;
    }
    return this.input.slice(start, this.pos);
  }

  private classify(word: string, position: number): Token {
    if (word === 'and' || word === 'or') {
      this.state = 'field';
      return { type: word === 'and' ? 'AND' : 'OR', value: word, position };
    }

    if (word === '->') {
      this.state = 'field';
      return { type: 'ARROW', value: word, position };
    }

    switch (this.state) {
      case 'field':
        this.state = 'operator';
        return { type: 'IDENTIFIER', value: word, position };
      case 'operator':
        this.state = 'value';
        return { type: 'OPERATOR', value: word, position };
      case 'value':
        return isOperatorKeyword(word)
          ? { type: 'OPERATOR', value: word, position }
          : { type: 'VALUE', value: word, position };
    }
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (this.pos < this.input.length) {
      this.skipWhitespace();

      if (this.pos >= this.input.length) {
        break;
      }

      const startPos = this.pos;
      const ch = this.peek();

      if (ch === '(') {
        this.pos++;
        this.openPositions.push(startPos);
        this.state = 'field';
        tokens.push({ type: 'LPAREN', value: '(', position: startPos });
        continue;
      }

      if (ch === ')') {
        if (this.openPositions.length === 0) {
          throw new CriteriaSyntaxError({
            message: `Unmatched closing parenthesis at position ${startPos}`,
            stage: 'tokenizer',
            position: startPos,
            snippet: this.input.slice(Math.max(0, startPos - 20), startPos + 1),
            hint: 'Remove the extra ")" or add a matching "("',
          });
        }
        this.pos++;
        this.openPositions.pop();
        this.state = 'field';
        tokens.push({ type: 'RPAREN', value: ')', position: startPos });
        continue;
      }

      tokens.push(this.classify(this.readWord(), startPos));
    }

    const unclosed = this.openPositions[this.openPositions.length - 1];
    if (unclosed !== undefined) {
      throw new CriteriaSyntaxError({
        message: `Unmatched opening parenthesis at position ${unclosed}`,
        stage: 'tokenizer',
        position: unclosed,
        snippet: this.input.slice(unclosed, unclosed + 20),
        hint: 'Close the group with ")"',
      });
    }

    tokens.push({ type: 'EOF', value: '', position: this.pos });
    debugLog('tokenizer', 'tokenized segment', { input: this.input, tokens: tokens.length });
    return tokens;
  }
}

export function tokenize(input: string): Token[] {
  return new Tokenizer(input).tokenize();
}
