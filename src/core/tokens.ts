import type { Cursor } from './cursor';

export type Span = { start: number; end: number };

export type TokenKind =
	| 'word' // identifier, or any run of characters no other kind claims
	| 'number'
	| 'string'
	| 'op'
	| 'punct'
	| 'newline' // terminates a directive, never merged into whitespace
	| 'whitespace'
	| 'continuation'
	| 'comment-line'
	| 'comment-block'
	| 'directive'
	| 'eof';

export const DIRECTIVE_KEYWORDS = [
	'include_next',
	'include',
	'define',
	'undef',
	'ifdef',
	'ifndef',
	'if',
	'elifdef',
	'elifndef',
	'elif',
	'else',
	'endif',
] as const;
export type DirectiveKeyword = typeof DIRECTIVE_KEYWORDS[number];

const KEYWORD_SET = new Set<string>(DIRECTIVE_KEYWORDS);

export function isDirectiveKeyword(s: string): s is DirectiveKeyword {
	return KEYWORD_SET.has(s);
}

export interface Token {
	kind: TokenKind;
	value: string;
	cursor: Cursor;
	span: Span;
	// directive keyword without '#' and blanks, for kind 'directive'
	directive?: DirectiveKeyword;
}

// Tokens that carry no meaning for directive parsing.
export function isTrivia(t: Token): boolean {
	return t.kind === 'whitespace' || t.kind === 'continuation' || t.kind === 'comment-line' || t.kind === 'comment-block';
}

// Pull-based stream over a producer; the producer returns undefined (or an EOF token) at the end.
export class TokenStream {
	private pushback: Token[] = [];
	private stickyEof: Token | null = null;
	private lastEnd = 0;
	private lastCursor: Cursor = { line: 1, column: 1 };

	constructor(private readonly producer: () => Token | undefined) {}

	next(): Token {
		if (this.stickyEof) {
			return this.stickyEof;
		}
		const pushed = this.pushback.pop();
		if (pushed) {
			this.lastEnd = pushed.span.end;
			return pushed;
		}
		const t = this.producer() ?? this.eofToken();
		if (t.kind === 'eof') { this.stickyEof = t; return t; }
		this.lastEnd = t.span.end;
		this.lastCursor = t.cursor;
		return t;
	}

	peek(): Token {
		const t = this.next();
		if (t.kind !== 'eof') this.pushBack(t);
		return t;
	}

	pushBack(t: Token) {
		if (t.kind === 'eof') return; // ignore pushing back EOF
		this.pushback.push(t);
	}

	private eofToken(): Token {
		return { kind: 'eof', value: '', cursor: this.lastCursor, span: { start: this.lastEnd, end: this.lastEnd } };
	}
}
