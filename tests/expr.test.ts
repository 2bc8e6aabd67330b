import { describe, it, expect } from 'vitest';
import { evalExpr, evaluate, parseExpr } from '../src/core/expr';
import { formatExpr, negateCompare } from '../src/core/directives';
import { tokenizeAll } from '../src/core/tokenizer';
import { isTrivia } from '../src/core/tokens';
import type { Expr } from '../src/core/directives';

function expr(src: string): Expr {
	return parseExpr(tokenizeAll(src).filter(t => !isTrivia(t) && t.kind !== 'newline' && t.kind !== 'eof'));
}

const id = (name: string): Expr => ({ kind: 'Ident', name });
const int = (value: number): Expr => ({ kind: 'ConstantInt', value });

describe('parseExpr', () => {
	it('binds && tighter than ||', () => {
		expect(expr('A || B && C')).toEqual({ kind: 'Or', left: id('A'), right: { kind: 'And', left: id('B'), right: id('C') } });
		expect(expr('A && B || C')).toEqual({ kind: 'Or', left: { kind: 'And', left: id('A'), right: id('B') }, right: id('C') });
	});

	it('binds comparisons tighter than && and looser than !', () => {
		expect(expr('A < B && C >= 2')).toEqual({
			kind: 'And',
			left: { kind: 'Compare', left: id('A'), op: '<', right: id('B') },
			right: { kind: 'Compare', left: id('C'), op: '>=', right: int(2) },
		});
		expect(expr('!A == B')).toEqual({ kind: 'Compare', left: { kind: 'Not', operand: id('A') }, op: '==', right: id('B') });
		expect(expr('!(A == B)')).toEqual({ kind: 'Not', operand: { kind: 'Compare', left: id('A'), op: '==', right: id('B') } });
	});

	it('chains comparisons from the left', () => {
		expect(expr('A < B > C')).toEqual({
			kind: 'Compare',
			left: { kind: 'Compare', left: id('A'), op: '<', right: id('B') },
			op: '>',
			right: id('C'),
		});
		expect(expr('A == B == C')).toEqual({
			kind: 'Compare',
			left: { kind: 'Compare', left: id('A'), op: '==', right: id('B') },
			op: '==',
			right: id('C'),
		});
	});

	it('accepts both forms of defined', () => {
		expect(expr('defined X && defined(Y)')).toEqual({
			kind: 'And',
			left: { kind: 'Defined', name: 'X' },
			right: { kind: 'Defined', name: 'Y' },
		});
		expect(expr('!defined ( Z )')).toEqual({ kind: 'Not', operand: { kind: 'Defined', name: 'Z' } });
	});

	it('parses macro calls as Apply', () => {
		expect(expr('FOO(1, BAR) || 0x10')).toEqual({
			kind: 'Or',
			left: { kind: 'Apply', name: 'FOO', args: [int(1), id('BAR')] },
			right: int(16),
		});
		expect(expr('HAS()')).toEqual({ kind: 'Apply', name: 'HAS', args: [] });
		expect(expr('CHECK(A && B)')).toEqual({ kind: 'Apply', name: 'CHECK', args: [{ kind: 'And', left: id('A'), right: id('B') }] });
	});

	it('reads integer literals in every base', () => {
		expect(expr('010')).toEqual(int(8));
		expect(expr('0b101')).toEqual(int(5));
		expect(expr('10UL')).toEqual(int(10));
		expect(expr('0xffU')).toEqual(int(255));
	});

	it('ignores tokens after a complete expression', () => {
		expect(expr('1 2')).toEqual(int(1));
		expect(expr('A ) junk')).toEqual(id('A'));
	});

	it('reports incomplete or invalid input', () => {
		expect(() => expr('')).toThrow('expected expression, found end of line');
		expect(() => expr('defined')).toThrow('expected identifier, found end of line');
		expect(() => expr('defined(1)')).toThrow("expected identifier but found '1'");
		expect(() => expr('&& A')).toThrow("unexpected token '&&'");
		expect(() => expr('(A')).toThrow("expected ')', found end of line");
		expect(() => expr('F(A B)')).toThrow("expected ',' or ')' but found 'B'");
		expect(() => expr('A +')).not.toThrow();
	});
});

describe('evalExpr', () => {
	const env = { A: 2, B: 0, LEVEL: 3 };

	it.each([
		['A == 2', 1],
		['B', 0],
		['MISSING', 0],
		['defined B', 1],
		['defined MISSING', 0],
		['!B', 1],
		['!A', 0],
		['A > 1 && !defined(MISSING)', 1],
		['B || MISSING', 0],
		['LEVEL >= 3 && LEVEL < 4', 1],
		['A != 2 || LEVEL <= 2', 0],
		['UNKNOWN_FN(0)', 1],
		['7', 7],
		['A && 5', 1],
	])('%s = %d', (src, expected) => {
		expect(evalExpr(expr(src), env)).toBe(expected);
	});

	it('evaluate maps nonzero to true', () => {
		expect(evaluate(int(-1), {})).toBe(true);
		expect(evaluate(int(0), {})).toBe(false);
		expect(evaluate(id('X'), { X: 4 })).toBe(true);
	});
});

describe('formatting', () => {
	it('renders expressions back to preprocessor syntax', () => {
		expect(formatExpr(expr('defined(A) && !B || F(1, C) > 2'))).toBe('defined(A) && !(B) || F(1, C) > 2');
	});

	it('negates comparison operators', () => {
		expect(negateCompare('==')).toBe('!=');
		expect(negateCompare('<')).toBe('>=');
		expect(negateCompare('>=')).toBe('<');
		expect(negateCompare('<=')).toBe('>');
	});
});
