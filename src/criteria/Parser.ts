import { CriteriaSyntaxError } from './errors.js';
import type { ComparisonNode, CriteriaNode, Token, TokenType } from './types.js';
import { debugLog } from '../utils/logger.js';

/**
 * Recursive descent parser for criteria expressions.
 *
 * The connective precedence is inverted compared to ordinary boolean algebra:
 * `or` binds tighter than `and`, so `a and b or c` groups as `a and (b or c)`.
 * Stored expressions depend on this grouping and it must not change.
 *
 * ```
 * Expression := OrChain ('and' OrChain)*
 * OrChain    := Primary ('or' Primary)*
 * Primary    := '(' Expression ')' | Comparison
 * Comparison := Field Operator Value*
 * ```
 */
export class Parser {
  private tokens: Token[];
  private current = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  private peek(): Token {
    return this.tokens[Math.min(this.current, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (this.current < this.tokens.length - 1) {
      this.current++;
    }
    return token;
  }

  private match(...types: TokenType[]): boolean {
    return types.includes(this.peek().type);
  }

  private fail(message: string, token: Token, hint?: string): never {
    throw new CriteriaSyntaxError({
      message: `${message} at position ${token.position}. Got ${token.type}`,
      position: token.position,
      snippet: token.value || undefined,
      hint,
    });
  }

  parse(): CriteriaNode {
    if (this.match('EOF')) {
      this.fail('Empty expression', this.peek(), 'Write at least one "<field> <operator> <value>"');
    }

    const expr = this.parseExpression();
    if (!this.match('EOF')) {
      this.fail('Expected end of expression', this.peek(), 'Join clauses with "and" or "or"');
    }

    debugLog('parser', 'parsed expression', { root: expr.type });
    return expr;
  }

  private parseExpression(): CriteriaNode {
    const terms = [this.parseOrChain()];
    while (this.match('AND')) {
      this.advance();
      terms.push(this.parseOrChain());
    }
    return terms.length > 1 ? { type: 'and', children: terms } : terms[0];
  }

  private parseOrChain(): CriteriaNode {
    const terms = [this.parsePrimary()];
    while (this.match('OR')) {
      this.advance();
      terms.push(this.parsePrimary());
    }
    return terms.length > 1 ? { type: 'or', children: terms } : terms[0];
  }

  private parsePrimary(): CriteriaNode {
    if (this.match('LPAREN')) {
      this.advance();
      const expr = this.parseExpression();
      if (!this.match('RPAREN')) {
        this.fail('Expected closing parenthesis', this.peek());
      }
      this.advance();
      return expr;
    }

    return this.parseComparison();
  }

  private parseComparison(): ComparisonNode {
    const fieldToken = this.peek();
    if (!this.match('IDENTIFIER')) {
      this.fail(
        'Expected field name',
        fieldToken,
        'Each clause reads "<field> <operator> <value>"; check for a dangling "and"/"or"'
      );
    }
    this.advance();

    const operatorToken = this.peek();
    if (!this.match('OPERATOR')) {
      this.fail(`Expected operator after field '${fieldToken.value}'`, operatorToken);
    }
    this.advance();

    const values: string[] = [];
    while (this.match('VALUE')) {
      values.push(this.advance().value);
    }

    return {
      type: 'comparison',
      field: fieldToken.value,
      operator: operatorToken.value,
      values,
      position: fieldToken.position,
    };
  }
}

export function parse(tokens: Token[]): CriteriaNode {
  return new Parser(tokens).parse();
}
