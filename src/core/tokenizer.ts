import { type Cursor, CURSOR_INIT, advanceCursor, formatCursor } from './cursor';
import { type DirectiveKeyword, type Token, type TokenKind, TokenStream, isDirectiveKeyword } from './tokens';

export type TokenizeErrorCode = 'continuation-invalid' | 'comment-unterminated';

const ERROR_MESSAGES: Record<TokenizeErrorCode, string> = {
	'continuation-invalid': 'missing newline character after line continuation backslash',
	'comment-unterminated': 'unterminated multi-line comment',
};

export class TokenizeError extends Error {
	readonly code: TokenizeErrorCode;
	readonly cursor: Cursor;
	readonly construct: string;

	constructor(code: TokenizeErrorCode, cursor: Cursor, construct: string) {
		super(`${formatCursor(cursor)}: ${ERROR_MESSAGES[code]}`);
		this.name = 'TokenizeError';
		this.code = code;
		this.cursor = cursor;
		this.construct = construct;
	}
}

interface RuleMatch {
	start: number;
	end: number;
	rank: number;
	kind: TokenKind;
	directive?: DirectiveKeyword;
	error?: TokenizeErrorCode;
}

// A way of finding the leftmost match of one token kind at or after `from`.
interface MatchingRule {
	readonly kind: TokenKind;
	find(text: string, from: number, rank: number): RuleMatch | null;
}

function fixedRule(kind: TokenKind, literal: string): MatchingRule {
	return {
		kind,
		find(text, from, rank) {
			const start = text.indexOf(literal, from);
			return start < 0 ? null : { start, end: start + literal.length, rank, kind };
		},
	};
}

function regexRule(kind: TokenKind, source: RegExp, refine?: (m: RegExpExecArray, match: RuleMatch) => void): MatchingRule {
	const re = new RegExp(source.source, 'g');
	return {
		kind,
		find(text, from, rank) {
			re.lastIndex = from;
			const m = re.exec(text);
			if (!m) return null;
			const match: RuleMatch = { start: m.index, end: m.index + m[0].length, rank, kind };
			refine?.(m, match);
			return match;
		},
	};
}

const BLANK = '[\\t\\v\\f\\r ]';

// Order is the tie-break rank for matches covering the same range.
const RULES: readonly MatchingRule[] = [
	regexRule('directive', new RegExp(`#${BLANK}*(include_next|include|define|undef|ifdef|ifndef|if|elifdef|elifndef|elif|else|endif)(?![A-Za-z0-9_])`), (m, match) => {
		const kw = m[1] ?? '';
		if (isDirectiveKeyword(kw)) match.directive = kw;
	}),
	fixedRule('newline', '\n'),
	regexRule('whitespace', new RegExp(`${BLANK}+`)),
	regexRule('continuation', new RegExp(`\\\\${BLANK}*\\n`)),
	// backslash with no newline anywhere after it
	regexRule('continuation', /\\[^\n]*$/, (_m, match) => { match.error = 'continuation-invalid'; }),
	regexRule('comment-line', /\/\/[^\n]*/),
	regexRule('comment-block', /\/\*[\s\S]*?(\*\/|$)/, (m, match) => {
		if (!m[1]) match.error = 'comment-unterminated';
	}),
	regexRule('string', /"(?:[^"\\\n]|\\.)*"/),
	regexRule('number', /(?:0[xX][0-9a-fA-F]+|0[bB][01]+|0[0-7]*|[1-9][0-9]*)(?:[uU](?:ll|LL|l|L)?|(?:ll|LL|l|L)[uU]?)?/),
	regexRule('word', /[A-Za-z_][A-Za-z0-9_]*/),
	fixedRule('op', '=='),
	fixedRule('op', '!='),
	fixedRule('op', '<='),
	fixedRule('op', '>='),
	fixedRule('op', '&&'),
	fixedRule('op', '||'),
	fixedRule('op', '<'),
	fixedRule('op', '>'),
	fixedRule('op', '!'),
	fixedRule('punct', '('),
	fixedRule('punct', ')'),
	fixedRule('punct', '{'),
	fixedRule('punct', '}'),
	fixedRule('punct', '['),
	fixedRule('punct', ']'),
	fixedRule('punct', ','),
	fixedRule('punct', ';'),
];

// Earlier start wins, then the longer match, then the lower rank.
function precedes(a: RuleMatch, b: RuleMatch): boolean {
	if (a.start !== b.start) return a.start < b.start;
	const la = a.end - a.start, lb = b.end - b.start;
	if (la !== lb) return la > lb;
	return a.rank < b.rank;
}

export function decodeInput(input: string | Uint8Array): string {
	return typeof input === 'string' ? input : new TextDecoder('utf-8').decode(input);
}

// Splits C/C++ source into classified tokens. Nothing is skipped: whitespace, comments
// and line continuations are tokens too, so the raw values concatenate back to the input.
export class Tokenizer {
	private pos = 0;
	private cursor: Cursor = CURSOR_INIT;
	private readonly text: string;
	private readonly n: number;
	// Earliest known match per rule: undefined = not computed yet, null = none left in the input.
	private readonly cache: Array<RuleMatch | null | undefined> = new Array(RULES.length);
	private readonly ts: TokenStream;

	constructor(input: string | Uint8Array) {
		this.text = decodeInput(input);
		this.n = this.text.length;
		this.ts = new TokenStream(() => this.scanOne());
	}

	next(): Token { return this.ts.next(); }
	peek(): Token { return this.ts.peek(); }
	pushBack(t: Token) { this.ts.pushBack(t); }

	private scanOne(): Token {
		if (this.pos >= this.n) return this.mk('eof', this.pos, this.pos);
		let best: RuleMatch | null = null;
		for (let i = 0; i < RULES.length; i++) {
			let m = this.cache[i];
			if (m === undefined || (m !== null && m.start < this.pos)) {
				m = RULES[i]?.find(this.text, this.pos, i) ?? null;
				this.cache[i] = m;
			}
			if (m && (!best || precedes(m, best))) best = m;
		}
		if (!best) return this.mk('word', this.pos, this.n);
		if (best.start > this.pos) return this.mk('word', this.pos, best.start);
		if (best.error) {
			throw new TokenizeError(best.error, this.cursor, best.error === 'comment-unterminated' ? '/*' : '\\');
		}
		const t = this.mk(best.kind, best.start, best.end);
		if (best.directive) t.directive = best.directive;
		return t;
	}

	private mk(kind: TokenKind, start: number, end: number): Token {
		const value = this.text.slice(start, end);
		const t: Token = { kind, value, cursor: this.cursor, span: { start, end } };
		this.pos = end;
		this.cursor = advanceCursor(this.cursor, value);
		return t;
	}
}

// Lazy token sequence; every iteration rescans from the beginning. The EOF sentinel is not part of it.
export function tokenize(input: string | Uint8Array): Iterable<Token> {
	const text = decodeInput(input);
	return {
		*[Symbol.iterator]() {
			const tz = new Tokenizer(text);
			for (;;) {
				const t = tz.next();
				if (t.kind === 'eof') return;
				yield t;
			}
		},
	};
}

export function tokenizeAll(input: string | Uint8Array): Token[] {
	const tz = new Tokenizer(input);
	const out: Token[] = [];
	for (;;) { const t = tz.next(); out.push(t); if (t.kind === 'eof') break; }
	return out;
}
