import type { Token } from './tokens';
import type { CompareOp, Expr } from './directives';
import { type Environment, MACRO_IDENTIFIER, hasMacro, macroValue, parseIntLiteral } from './macros';

export class ExprParseError extends Error {
	readonly token: Token | null;
	constructor(message: string, token: Token | null) {
		super(message);
		this.name = 'ExprParseError';
		this.token = token;
	}
}

// Binding power, low to high
const PREC = { lowest: 0, or: 1, and: 2, compare: 3, bang: 4, call: 5 } as const;

const COMPARE_OPS = new Set<string>(['==', '!=', '<', '<=', '>', '>=']);

function isCompareOp(s: string): s is CompareOp {
	return COMPARE_OPS.has(s);
}

function infixPrecedence(t: Token): number | undefined {
	if (t.kind !== 'op') return undefined;
	if (t.value === '||') return PREC.or;
	if (t.value === '&&') return PREC.and;
	if (isCompareOp(t.value)) return PREC.compare;
	return undefined;
}

function isIdentifier(t: Token | undefined): t is Token & { kind: 'word' } {
	return !!t && t.kind === 'word' && MACRO_IDENTIFIER.test(t.value);
}

function isPunct(t: Token | undefined, value: string): boolean {
	return !!t && t.kind === 'punct' && t.value === value;
}

// Pratt parser over the significant tokens of one #if/#elif line.
class ExprParser {
	private i = 0;
	constructor(private readonly toks: readonly Token[]) {}

	private peek(): Token | undefined { return this.toks[this.i]; }

	private take(what: string): Token {
		const t = this.toks[this.i];
		if (!t) throw new ExprParseError(`expected ${what}, found end of line`, null);
		this.i++;
		return t;
	}

	private expectPunct(value: string) {
		const t = this.take(`'${value}'`);
		if (t.kind !== 'punct' || t.value !== value) throw new ExprParseError(`expected '${value}' but found '${t.value}'`, t);
	}

	private identifier(): string {
		const t = this.take('identifier');
		if (!isIdentifier(t)) throw new ExprParseError(`expected identifier but found '${t.value}'`, t);
		return t.value;
	}

	parse(minPrec: number): Expr {
		let left = this.prefix(this.take('expression'));
		for (;;) {
			const op = this.peek();
			const prec = op ? infixPrecedence(op) : undefined;
			if (!op || prec === undefined || prec < minPrec) return left;
			this.i++;
			left = this.infix(op, prec, left);
		}
	}

	private prefix(t: Token): Expr {
		if (t.kind === 'op' && t.value === '!') return { kind: 'Not', operand: this.parse(PREC.bang + 1) };
		if (isPunct(t, '(')) {
			const inner = this.parse(PREC.lowest);
			this.expectPunct(')');
			return inner;
		}
		if (t.kind === 'number') {
			const value = parseIntLiteral(t.value);
			if (value === undefined) throw new ExprParseError(`invalid integer literal '${t.value}'`, t);
			return { kind: 'ConstantInt', value };
		}
		if (!isIdentifier(t)) throw new ExprParseError(`unexpected token '${t.value}'`, t);
		if (t.value === 'defined') {
			if (isPunct(this.peek(), '(')) {
				this.i++;
				const name = this.identifier();
				this.expectPunct(')');
				return { kind: 'Defined', name };
			}
			return { kind: 'Defined', name: this.identifier() };
		}
		if (isPunct(this.peek(), '(')) {
			this.i++;
			return { kind: 'Apply', name: t.value, args: this.arguments() };
		}
		return { kind: 'Ident', name: t.value };
	}

	private arguments(): Expr[] {
		const args: Expr[] = [];
		if (isPunct(this.peek(), ')')) { this.i++; return args; }
		for (;;) {
			args.push(this.parse(PREC.lowest));
			const sep = this.take(`',' or ')'`);
			if (isPunct(sep, ')')) return args;
			if (!isPunct(sep, ',')) throw new ExprParseError(`expected ',' or ')' but found '${sep.value}'`, sep);
		}
	}

	private infix(op: Token, prec: number, left: Expr): Expr {
		if (op.value === '||') return { kind: 'Or', left, right: this.parse(PREC.or + 1) };
		if (op.value === '&&') return { kind: 'And', left, right: this.parse(PREC.and + 1) };
		if (!isCompareOp(op.value)) throw new ExprParseError(`unknown operator '${op.value}'`, op);
		// left-associative: A == B == C is (A == B) == C
		return { kind: 'Compare', left, op: op.value, right: this.parse(prec + 1) };
	}
}

// Parses a condition from the significant tokens of a directive line. Tokens after
// a complete expression are ignored.
export function parseExpr(tokens: readonly Token[]): Expr {
	return new ExprParser(tokens).parse(PREC.lowest);
}

function truth(b: boolean): number { return b ? 1 : 0; }

export function evalExpr(e: Expr, env: Environment): number {
	switch (e.kind) {
		case 'Defined': return truth(hasMacro(env, e.name));
		case 'Not': return truth(evalExpr(e.operand, env) === 0);
		case 'And': return truth(evalExpr(e.left, env) !== 0 && evalExpr(e.right, env) !== 0);
		case 'Or': return truth(evalExpr(e.left, env) !== 0 || evalExpr(e.right, env) !== 0);
		case 'Compare': {
			const l = evalExpr(e.left, env), r = evalExpr(e.right, env);
			switch (e.op) {
				case '==': return truth(l === r);
				case '!=': return truth(l !== r);
				case '<': return truth(l < r);
				case '<=': return truth(l <= r);
				case '>': return truth(l > r);
				case '>=': return truth(l >= r);
			}
			break;
		}
		// Macros are never expanded: assume a function-like macro call holds.
		case 'Apply': return 1;
		case 'Ident': return macroValue(env, e.name);
		case 'ConstantInt': return e.value;
	}
	return 0;
}

export function evaluate(e: Expr, env: Environment): boolean {
	return evalExpr(e, env) !== 0;
}
