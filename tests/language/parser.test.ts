/**
 * Fountain Language Tests: Parser
 * Precedence, statement forms, rendering and syntax errors
 */

import { describe, expect, it } from 'vitest';

import {
  parse,
  parseExpression,
  ParseError,
  unparse,
  unparseDebug,
} from '../../src/index.js';
import { captureError } from '../helpers/runtime.js';

function tree(source: string): string {
  return unparseDebug(parseExpression(source));
}

describe('Fountain Language: Parser', () => {
  describe('Precedence', () => {
    it('binds factors tighter than terms', () => {
      expect(tree('1 + 2 * 3')).toBe('(+ 1 (* 2 3))');
    });

    it('keeps groups and unary minus', () => {
      expect(tree('-3 * (12.4 + 2)')).toBe('(* (- 3) (group (+ 12.4 2)))');
    });

    it('associates binary operators to the left', () => {
      expect(tree('1 - 2 - 3')).toBe('(- (- 1 2) 3)');
    });

    it('binds and tighter than or', () => {
      expect(tree('a or b and c')).toBe('(or a (and b c))');
    });

    it('binds not tighter than equality', () => {
      expect(tree('not a == b')).toBe('(== (not a) b)');
    });

    it('binds comparison tighter than equality', () => {
      expect(tree('a < b == c')).toBe('(== (< a b) c)');
    });

    it('nests conditionals to the right', () => {
      expect(tree('x if c else y if d else z')).toBe('(if c x (if d y z))');
    });

    it('puts conditionals below or', () => {
      expect(tree('a or b if c else d')).toBe('(if c (or a b) d)');
    });

    it('chains postfix operators', () => {
      expect(tree('f(1, y = 2)(3)')).toBe('(call (call f 1 (= y 2)) 3)');
      expect(tree('t.a[0].b')).toBe('(. (index (. t a) 0) b)');
    });

    it('renders table literal items', () => {
      expect(tree('{1, x = 2, [k] = v}')).toBe('(table 1 (= x 2) ([] k v))');
      expect(tree('{}')).toBe('(table)');
      expect(tree('{1, 2,}')).toBe('(table 1 2)');
    });

    it('renders literals in source form', () => {
      expect(tree('"hi"')).toBe('"hi"');
      expect(tree('nil')).toBe('nil');
      expect(tree('true')).toBe('true');
    });
  });

  describe('Source Rendering', () => {
    it.each([
      '-3 * (12.4 + 2)',
      'not x',
      'a if c else b',
      'f(a, y = 2)',
      '{1, x = 2, [k] = v}',
      't.a[0]',
      'a and b or c',
    ])('renders %s back unchanged', (source) => {
      expect(unparse(parseExpression(source))).toBe(source);
    });

    it('separates a negated negative operand', () => {
      const source = unparse(parseExpression('- -5'));
      expect(source).toBe('- -5');
      expect(tree(source)).toBe('(- (- 5))');
    });

    it('quotes strings containing double quotes with single quotes', () => {
      expect(unparse(parseExpression(`'a "b"'`))).toBe(`'a "b"'`);
    });
  });

  describe('Statements', () => {
    it('parses statement sequences with optional semicolons', () => {
      const script = parse('x = 1; print x\nx');
      expect(script.statements.map((s) => s.type)).toEqual([
        'Assign',
        'Print',
        'ExprStatement',
      ]);
    });

    it('records compound assignment operators', () => {
      expect(parse('x += 2').statements[0]).toMatchObject({
        type: 'Assign',
        op: '+=',
        target: { type: 'Identifier', name: 'x' },
      });
    });

    it('accepts index and field targets', () => {
      expect(parse('t.a[0] = 1').statements[0]).toMatchObject({
        type: 'Assign',
        target: { type: 'Index' },
      });
    });

    it('starts an if statement after an expression statement', () => {
      const script = parse('x = 1\nif x do print x end');
      expect(script.statements.map((s) => s.type)).toEqual(['Assign', 'If']);
    });

    it('parses a conditional expression as an assignment value', () => {
      expect(parse('y = 1 if c else 2').statements[0]).toMatchObject({
        type: 'Assign',
        value: { type: 'ConditionalExpr' },
      });
    });

    it('parses if with else branch', () => {
      const stmt = parse('if a do x = 1 else x = 2 end').statements[0];
      expect(stmt).toMatchObject({
        type: 'If',
        thenBranch: { type: 'Block', statements: [{ type: 'Assign' }] },
        elseBranch: { type: 'Block', statements: [{ type: 'Assign' }] },
      });
    });

    it('parses a bare return before end', () => {
      expect(parse('fn f() return end').statements[0]).toMatchObject({
        type: 'FnDecl',
        name: 'f',
        body: { statements: [{ type: 'Return', value: null }] },
      });
    });

    it('parses parameters with defaults', () => {
      expect(parse('fn f(a, b = a * 2) end').statements[0]).toMatchObject({
        params: [
          { type: 'Param', name: 'a', defaultValue: null },
          { type: 'Param', name: 'b', defaultValue: { type: 'BinaryExpr' } },
        ],
      });
    });

    it('parses assert with and without message', () => {
      const [plain, withMessage] = parse('assert x; assert x, "m"').statements;
      expect(plain).toMatchObject({ type: 'Assert', message: null });
      expect(withMessage).toMatchObject({
        type: 'Assert',
        message: { type: 'StringLiteral', value: 'm' },
      });
    });

    it('spans a statement from its first to last token', () => {
      const stmt = parse('  x = 10').statements[0];
      expect(stmt?.span.start).toEqual({ line: 1, column: 3, offset: 2 });
      expect(stmt?.span.end).toEqual({ line: 1, column: 9, offset: 8 });
    });
  });

  describe('Errors', () => {
    it('rejects assignment to a literal', () => {
      const error = captureError(() => parse('1 = 2'), ParseError);
      expect(error.errorId).toBe('FTN-P002');
      expect(error.message).toBe('Cannot assign to literal at 1:3');
    });

    it('rejects assignment to a call', () => {
      expect(() => parse('f() = 1')).toThrow(
        'Cannot assign to function call at 1:5'
      );
    });

    it('rejects positional after named arguments', () => {
      const error = captureError(() => parse('f(a = 1, 2)'), ParseError);
      expect(error.errorId).toBe('FTN-P003');
      expect(error.message).toBe(
        'Positional argument follows named argument at 1:10'
      );
    });

    it('rejects duplicate parameters', () => {
      const error = captureError(() => parse('fn f(a, a) end'), ParseError);
      expect(error.errorId).toBe('FTN-P004');
      expect(error.message).toBe("Duplicate parameter 'a' at 1:9");
    });

    it('rejects a required parameter after a defaulted one', () => {
      expect(() => parse('fn f(a = 1, b) end')).toThrow(
        "Parameter 'b' without default follows parameter 'a' with default"
      );
    });

    it('reports the expected token', () => {
      const error = captureError(() => parse('if x print 1 end'), ParseError);
      expect(error.errorId).toBe('FTN-P005');
      expect(error.message).toBe("Expected 'do' after condition at 1:6");
      expect(error.context).toEqual({ expected: 'DO', found: 'print' });
    });

    it('hints at an unclosed parenthesis', () => {
      expect(() => parse('(1 + 2')).toThrow(
        "Expected ')' after expression. Hint: Check for unclosed parenthesis at 1:7"
      );
    });

    it('hints at a missing end', () => {
      expect(() => parse('do print 1')).toThrow(
        "Expected 'end' after block. Hint: Every 'do', 'if', 'for' and 'fn' needs a closing 'end' at 1:11"
      );
    });

    it('hints at a misspelled keyword', () => {
      expect(() => parse('if x then print 1 end')).toThrow(
        "Expected 'do' after condition. Hint: Did you mean 'do'? at 1:6"
      );
    });

    it('reports an unexpected token', () => {
      const error = captureError(() => parse(')'), ParseError);
      expect(error.errorId).toBe('FTN-P001');
      expect(error.message).toBe("Unexpected token ')' at 1:1");
    });

    it('reports end of input where an expression is needed', () => {
      expect(() => parse('x = ')).toThrow(
        'Unexpected end of input, expected expression at 1:5'
      );
    });

    it('rejects more than 255 arguments', () => {
      const args = Array.from({ length: 256 }, () => '1').join(', ');
      const error = captureError(() => parse(`f(${args})`), ParseError);
      expect(error.errorId).toBe('FTN-P006');
      expect(error.message).toContain('Cannot have more than 255 arguments');
    });

    it('rejects deeply nested groups', () => {
      const source = 'x = ' + '('.repeat(20000) + '1' + ')'.repeat(20000);
      const error = captureError(() => parse(source), ParseError);
      expect(error.errorId).toBe('FTN-P008');
      expect(error.context).toEqual({ limit: 200 });
      expect(error.message).toBe('Maximum nesting depth exceeded (200) at 1:204');
    });

    it('rejects deeply nested blocks', () => {
      const source = 'do '.repeat(300) + 'end '.repeat(300);
      expect(() => parse(source)).toThrow(
        'Maximum nesting depth exceeded (200) at 1:601'
      );
    });

    it('rejects long chains of unary operators', () => {
      const source = 'x = ' + 'not '.repeat(20000) + 'true';
      expect(() => parse(source)).toThrow(
        'Maximum nesting depth exceeded (200) at 1:801'
      );
    });

    it('accepts nesting below the limit', () => {
      const source = 'x = ' + '('.repeat(100) + '1' + ')'.repeat(100);
      expect(parse(source).statements).toHaveLength(1);
    });

    it('rejects return outside a function', () => {
      const error = captureError(() => parse('for do return end'), ParseError);
      expect(error.errorId).toBe('FTN-P007');
      expect(error.message).toBe("'return' outside function at 1:8");
    });

    it('accepts loop control and return inside their constructs', () => {
      const source = 'fn f() for do if true do break else continue end end return 1 end';
      expect(parse(source).statements[0]).toMatchObject({
        type: 'FnDecl',
        body: { statements: [{ type: 'For' }, { type: 'Return' }] },
      });
    });

    it('requires a single expression in parseExpression', () => {
      expect(() => parseExpression('1 2')).toThrow(
        'Expected end of input after expression at 1:3'
      );
    });
  });
});
