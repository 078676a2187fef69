import { describe, it, expect } from '@jest/globals';
import { parse } from '../Parser.js';
import { tokenize } from '../Tokenizer.js';
import { CriteriaSyntaxError } from '../errors.js';
import type { CriteriaNode } from '../types.js';

const parseText = (input: string) => parse(tokenize(input));

/** Strip positions so structural expectations stay readable. */
function shape(node: CriteriaNode): unknown {
  switch (node.type) {
    case 'comparison':
      return [node.field, node.operator, ...node.values];
    case 'not':
      return { not: shape(node.child) };
    case 'and':
      return { and: node.children.map(shape) };
    case 'or':
      return { or: node.children.map(shape) };
  }
}

describe('Parser', () => {
  it('should parse a single comparison', () => {
    expect(parseText('cntn_a one_of x y z')).toEqual({
      type: 'comparison',
      field: 'cntn_a',
      operator: 'one_of',
      values: ['x', 'y', 'z'],
      position: 0,
    });
  });

  it('should collect a run of and-terms into one node', () => {
    expect(shape(parseText('cntn_a equals 1 and cntn_b equals 2 and cntn_c equals 3'))).toEqual({
      and: [
        ['cntn_a', 'equals', '1'],
        ['cntn_b', 'equals', '2'],
        ['cntn_c', 'equals', '3'],
      ],
    });
  });

  it('should bind or tighter than and', () => {
    const tree = parseText(
      'cntn_a equals 1 or cntn_b equals 2 and cntn_c equals 3 or cntn_d equals 4'
    );

    expect(shape(tree)).toEqual({
      and: [
        { or: [['cntn_a', 'equals', '1'], ['cntn_b', 'equals', '2']] },
        { or: [['cntn_c', 'equals', '3'], ['cntn_d', 'equals', '4']] },
      ],
    });
  });

  it('should let parentheses override precedence without adding a node', () => {
    expect(shape(parseText('(cntn_a equals 1 and cntn_b equals 2) or cntn_c equals 3'))).toEqual({
      or: [
        { and: [['cntn_a', 'equals', '1'], ['cntn_b', 'equals', '2']] },
        ['cntn_c', 'equals', '3'],
      ],
    });
  });

  it('should collapse redundant nested parentheses', () => {
    expect(parseText('((((cntn_a equals 1))))')).toEqual(parseText('cntn_a equals 1'));
  });

  it('should keep negated keywords as plain comparisons', () => {
    expect(shape(parseText('cntn_a not_between 1 2'))).toEqual(['cntn_a', 'not_between', '1', '2']);
  });

  it('should accept a comparison without values for the validator to reject', () => {
    expect(parseText('cntn_a equals')).toMatchObject({ type: 'comparison', values: [] });
  });

  it('should record the position of each comparison', () => {
    expect(parseText('cntn_a equals 1 or cntn_b equals 2')).toMatchObject({
      children: [{ position: 0 }, { position: 19 }],
    });
  });

  describe('syntax errors', () => {
    it('should reject a trailing connective', () => {
      expect(() => parseText('cntn_a equals a and')).toThrow(
        'Expected field name at position 19. Got EOF'
      );
    });

    it('should reject a leading connective', () => {
      expect(() => parseText('or cntn_a equals a')).toThrow(CriteriaSyntaxError);
    });

    it('should reject a field without an operator', () => {
      expect(() => parseText('cntn_a')).toThrow(
        "Expected operator after field 'cntn_a' at position 6. Got EOF"
      );
    });

    it('should reject an empty group', () => {
      expect(() => parseText('()')).toThrow(CriteriaSyntaxError);
    });

    it('should reject clauses that are not joined by a connective', () => {
      expect(() => parseText('cntn_a equals a (cntn_b equals b)')).toThrow(
        'Expected end of expression at position 16. Got LPAREN'
      );
    });

    it('should reject an unknown word used as a connective', () => {
      expect(() => parseText('cntn_a equals 1 xor cntn_b equals 2')).toThrow(
        'Expected end of expression at position 27. Got OPERATOR'
      );
    });

    it('should reject a separator nested in parentheses', () => {
      expect(() => parseText('(cntn_a equals a -> cntn_b equals b)')).toThrow(
        /Expected closing parenthesis at position 17\. Got ARROW/
      );
    });

    it('should reject empty input', () => {
      expect(() => parseText('')).toThrow('Empty expression at position 0. Got EOF');
    });
  });
});
