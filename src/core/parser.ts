import { type Diagnostic, type DiagCode, SCAN_DIAGCODES } from '../analysisTypes';
import { formatCursor } from './cursor';
import type { BranchKind, ConditionalBranch, Directive, Expr, IncludeDirective, SourceInfo } from './directives';
import { ExprParseError, parseExpr } from './expr';
import { MACRO_IDENTIFIER } from './macros';
import { type DirectiveKeyword, type Token, isTrivia } from './tokens';
import { Tokenizer } from './tokenizer';

type BranchKeyword = Extract<DirectiveKeyword, 'elif' | 'elifdef' | 'elifndef' | 'else' | 'endif'>;

// One directive with the significant tokens of its logical line.
interface DirectiveLine {
	readonly token: Token;
	readonly keyword: DirectiveKeyword;
	readonly args: readonly Token[];
}

type BlockEnd =
	| { kind: 'eof' }
	| { kind: 'branch'; keyword: BranchKeyword; line: DirectiveLine };

class DirectiveError extends Error {
	constructor(readonly code: DiagCode, message: string, readonly at: Token) {
		super(message);
		this.name = 'DirectiveError';
	}
}

function isBranchKeyword(k: DirectiveKeyword): k is BranchKeyword {
	return k === 'elif' || k === 'elifdef' || k === 'elifndef' || k === 'else' || k === 'endif';
}

function isIdent(t: Token | undefined): t is Token & { kind: 'word' } {
	return !!t && t.kind === 'word' && MACRO_IDENTIFIER.test(t.value);
}

function isPunct(t: Token | undefined, value: string): boolean {
	return !!t && t.kind === 'punct' && t.value === value;
}

function debugEnabled(): boolean {
	return !!process.env.CC_DEPSCAN_DEBUG_PARSER;
}

class SourceParser {
	private readonly tz: Tokenizer;
	private readonly diagnostics: Diagnostic[] = [];
	private hasMain = false;
	private prev: Token | null = null; // previous significant token outside directives
	private pendingMain = false;
	private unterminated = false;

	constructor(input: string | Uint8Array) {
		this.tz = new Tokenizer(input);
	}

	run(): SourceInfo {
		const { body } = this.parseBlock(0);
		const directives = this.unterminated ? [] : body;
		return { directives, hasMain: this.hasMain, diagnostics: this.diagnostics };
	}

	private report(code: DiagCode, message: string, at: Token) {
		this.diagnostics.push({ code, message, cursor: at.cursor, severity: code === SCAN_DIAGCODES.UNTERMINATED_CONDITIONAL ? 'error' : 'warning' });
		if (debugEnabled()) console.log(`[cc-depscan] ${formatCursor(at.cursor)} ${code}: ${message}`);
	}

	// Significant tokens up to the end of the logical line; the newline is consumed.
	private readLine(directive: Token, keyword: DirectiveKeyword): DirectiveLine {
		const args: Token[] = [];
		for (;;) {
			const t = this.tz.next();
			if (t.kind === 'eof' || t.kind === 'newline') break;
			if (!isTrivia(t)) args.push(t);
		}
		return { token: directive, keyword, args };
	}

	private trackMain(t: Token) {
		if (this.pendingMain) {
			this.pendingMain = false;
			if (isPunct(t, '(')) this.hasMain = true;
		}
		if (t.kind === 'word' && t.value === 'main' && this.prev?.kind === 'word' && this.prev.value === 'int') this.pendingMain = true;
		this.prev = t;
	}

	private parseBlock(depth: number): { body: Directive[]; end: BlockEnd } {
		const body: Directive[] = [];
		for (;;) {
			const t = this.tz.next();
			if (t.kind === 'eof') return { body, end: { kind: 'eof' } };
			if (t.kind !== 'directive') {
				if (!isTrivia(t) && t.kind !== 'newline') this.trackMain(t);
				continue;
			}
			this.pendingMain = false;
			const keyword = t.directive;
			if (!keyword) continue;
			const line = this.readLine(t, keyword);
			if (isBranchKeyword(keyword)) {
				if (depth > 0) return { body, end: { kind: 'branch', keyword, line } };
				this.report(SCAN_DIAGCODES.UNPAIRED_CONDITIONAL, `unpaired #${keyword}`, t);
				continue;
			}
			if (keyword === 'if' || keyword === 'ifdef' || keyword === 'ifndef') {
				const condition = this.condition(line);
				// a malformed #if line is dropped; its body stays at this level
				if (condition) body.push(this.parseIfBlock(depth, line, condition));
				continue;
			}
			try {
				body.push(this.simpleDirective(line));
			} catch (err) {
				if (!(err instanceof DirectiveError)) throw err;
				this.report(err.code, err.message, err.at);
			}
		}
	}

	private simpleDirective(line: DirectiveLine): Directive {
		switch (line.keyword) {
			case 'include':
			case 'include_next':
				return parseInclude(line);
			case 'define':
				return parseDefine(line);
			case 'undef': {
				const name = line.args[0];
				if (!isIdent(name)) throw new DirectiveError(SCAN_DIAGCODES.MALFORMED_UNDEF, '#undef expects a macro name', name ?? line.token);
				return { kind: 'Undefine', name: name.value };
			}
			default:
				throw new Error(`unexpected directive #${line.keyword}`);
		}
	}

	private condition(line: DirectiveLine): Expr | null {
		const { keyword, args } = line;
		if (keyword === 'ifdef' || keyword === 'elifdef' || keyword === 'ifndef' || keyword === 'elifndef') {
			const name = args[0];
			if (!isIdent(name)) {
				this.report(SCAN_DIAGCODES.MALFORMED_CONDITION, `#${keyword} expects a macro name`, name ?? line.token);
				return null;
			}
			const defined: Expr = { kind: 'Defined', name: name.value };
			return keyword === 'ifndef' || keyword === 'elifndef' ? { kind: 'Not', operand: defined } : defined;
		}
		try {
			return parseExpr(args);
		} catch (err) {
			if (!(err instanceof ExprParseError)) throw err;
			this.report(SCAN_DIAGCODES.MALFORMED_CONDITION, `#${keyword}: ${err.message}`, err.token ?? line.token);
			return null;
		}
	}

	// A malformed #elif, or any #elif/#else after #else, is dropped and the current branch goes on.
	private parseIfBlock(depth: number, open: DirectiveLine, condition: Expr): Directive {
		const branches: ConditionalBranch[] = [];
		let kind: BranchKind = 'if';
		let current: Expr | undefined = condition;
		let body: Directive[] = [];
		for (;;) {
			const block = this.parseBlock(depth + 1);
			body.push(...block.body);
			const end = block.end;
			if (end.kind === 'eof') {
				if (!this.unterminated) this.report(SCAN_DIAGCODES.UNTERMINATED_CONDITIONAL, `#${open.keyword} is never closed by #endif`, open.token);
				this.unterminated = true;
				branches.push(branch(kind, current, body));
				return { kind: 'IfBlock', branches };
			}
			if (end.keyword === 'endif') {
				branches.push(branch(kind, current, body));
				return { kind: 'IfBlock', branches };
			}
			if (kind === 'else') {
				this.report(SCAN_DIAGCODES.UNPAIRED_CONDITIONAL, `#${end.keyword} after #else`, end.line.token);
				continue;
			}
			if (end.keyword === 'else') {
				branches.push(branch(kind, current, body));
				kind = 'else';
				current = undefined;
				body = [];
				continue;
			}
			const next = this.condition(end.line);
			if (!next) continue;
			branches.push(branch(kind, current, body));
			kind = 'elif';
			current = next;
			body = [];
		}
	}
}

function branch(kind: BranchKind, condition: Expr | undefined, body: Directive[]): ConditionalBranch {
	return condition ? { kind, condition, body } : { kind, body };
}

function parseInclude(line: DirectiveLine): IncludeDirective {
	const [first, ...rest] = line.args;
	const lineNo = line.token.cursor.line;
	if (first?.kind === 'string') {
		const path = first.value.slice(1, -1);
		if (path.includes('"')) throw new DirectiveError(SCAN_DIAGCODES.MALFORMED_INCLUDE, `#${line.keyword}: quotes inside path`, first);
		return { kind: 'Include', path, system: false, line: lineNo };
	}
	if (first?.kind === 'op' && first.value === '<') {
		const parts: string[] = [];
		for (const t of rest) {
			if (t.kind === 'op' && t.value === '>') {
				if (!parts.length) break;
				return { kind: 'Include', path: parts.join(''), system: true, line: lineNo };
			}
			parts.push(t.value);
		}
		throw new DirectiveError(SCAN_DIAGCODES.MALFORMED_INCLUDE, `#${line.keyword}: missing closing '>'`, first);
	}
	throw new DirectiveError(SCAN_DIAGCODES.MALFORMED_INCLUDE, `#${line.keyword} expects "file" or <file>`, first ?? line.token);
}

function parseDefine(line: DirectiveLine): Directive {
	const [name, ...rest] = line.args;
	if (!isIdent(name)) throw new DirectiveError(SCAN_DIAGCODES.MALFORMED_DEFINE, '#define expects a macro name', name ?? line.token);
	const open = rest[0];
	// function-like only when '(' touches the name
	if (!open || !isPunct(open, '(') || open.span.start !== name.span.end) {
		return { kind: 'Define', name: name.value, args: null, body: rest.map(t => t.value) };
	}
	const args: string[] = [];
	let i = 1;
	let expectArg = true;
	for (;;) {
		const t = rest[i++];
		if (!t) throw new DirectiveError(SCAN_DIAGCODES.MALFORMED_DEFINE, `#define ${name.value}: missing ')'`, open);
		if (isPunct(t, ')')) {
			if (expectArg && args.length) throw new DirectiveError(SCAN_DIAGCODES.MALFORMED_DEFINE, `#define ${name.value}: expected parameter before ')'`, t);
			break;
		}
		if (expectArg) {
			if (!isIdent(t) && t.value !== '...') throw new DirectiveError(SCAN_DIAGCODES.MALFORMED_DEFINE, `#define ${name.value}: invalid parameter '${t.value}'`, t);
			args.push(t.value);
			expectArg = false;
		} else {
			if (!isPunct(t, ',')) throw new DirectiveError(SCAN_DIAGCODES.MALFORMED_DEFINE, `#define ${name.value}: expected ',' or ')' but found '${t.value}'`, t);
			expectArg = true;
		}
	}
	return { kind: 'Define', name: name.value, args, body: rest.slice(i).map(t => t.value) };
}

// Parses the directive structure of one translation unit. Tokenizer errors propagate.
export function parseSource(input: string | Uint8Array): SourceInfo {
	return new SourceParser(input).run();
}
