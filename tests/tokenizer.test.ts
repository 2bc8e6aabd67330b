import { describe, it, expect } from 'vitest';
import { Tokenizer, TokenizeError, tokenize, tokenizeAll } from '../src/core/tokenizer';
import type { Token } from '../src/core/tokens';

const kinds = (src: string) => [...tokenize(src)].map(t => t.kind);
const values = (src: string) => [...tokenize(src)].map(t => t.value);

function tokenizeError(src: string): TokenizeError {
	try {
		tokenizeAll(src);
	} catch (err) {
		if (err instanceof TokenizeError) return err;
		throw err;
	}
	throw new Error('expected a TokenizeError');
}

describe('tokenizer', () => {
	it('emits a single operator token with its position', () => {
		const tokens = [...tokenize('&&')];
		expect(tokens).toEqual([{ kind: 'op', value: '&&', cursor: { line: 1, column: 1 }, span: { start: 0, end: 2 } }]);
	});

	it('keeps every character so values concatenate back to the input', () => {
		const src = '#include <a/b.h> // c\nint  main ( ) { return 0x1F; } /* x\ny */\n';
		expect(values(src).join('')).toBe(src);
	});

	it('recognises directives with optional blanks after #', () => {
		const tokens = [...tokenize('#define X\n#  include <a.h>\n')];
		expect(tokens[0]).toMatchObject({ kind: 'directive', value: '#define', directive: 'define' });
		const include = tokens.find(t => t.directive === 'include');
		expect(include).toMatchObject({ kind: 'directive', value: '#  include', cursor: { line: 2, column: 1 } });
	});

	it('prefers the longest directive keyword', () => {
		const [t] = [...tokenize('#ifndef GUARD')];
		expect(t?.directive).toBe('ifndef');
		const [u] = [...tokenize('#include_next <x>')];
		expect(u?.directive).toBe('include_next');
	});

	it('does not treat a keyword prefix of a longer identifier as a directive', () => {
		expect(values('#defined')).toEqual(['#', 'defined']);
		expect(kinds('#defined')).toEqual(['word', 'word']);
	});

	it('takes the earliest match, then the longest', () => {
		expect(values('a<=b')).toEqual(['a', '<=', 'b']);
		expect(values('!=!')).toEqual(['!=', '!']);
		expect(values('x86_64 0x10u')).toEqual(['x86_64', ' ', '0x10u']);
		expect(kinds('x86_64 0x10u')).toEqual(['word', 'whitespace', 'number']);
	});

	it('fills unclaimed runs with word tokens', () => {
		expect(values('a+b')).toEqual(['a', '+', 'b']);
		expect(kinds('a+b')).toEqual(['word', 'word', 'word']);
		expect(values('...)')).toEqual(['...', ')']);
		expect(values('@@')).toEqual(['@@']);
	});

	it('classifies strings, punctuation and comments', () => {
		expect(kinds('"a\\"b" ( ) [ ] { } , ;').filter(k => k !== 'whitespace')).toEqual([
			'string', 'punct', 'punct', 'punct', 'punct', 'punct', 'punct', 'punct', 'punct',
		]);
		expect(kinds('x // rest\ny')).toEqual(['word', 'whitespace', 'comment-line', 'newline', 'word']);
		expect(values('a/* b\n c */d')).toEqual(['a', '/* b\n c */', 'd']);
	});

	it('tracks lines and columns across continuations and newlines', () => {
		const tokens = [...tokenize('a \\\nbc\n  d')];
		expect(tokens.map(t => [t.kind, t.cursor.line, t.cursor.column])).toEqual([
			['word', 1, 1],
			['whitespace', 1, 2],
			['continuation', 1, 3],
			['word', 2, 1],
			['newline', 2, 3],
			['whitespace', 3, 1],
			['word', 3, 3],
		]);
	});

	it('counts columns in code points', () => {
		const tokens = [...tokenize('😀 x')];
		expect(tokens.map(t => t.value)).toEqual(['😀', ' ', 'x']);
		expect(tokens[2]?.cursor).toEqual({ line: 1, column: 3 });
		expect(tokens[2]?.span).toEqual({ start: 3, end: 4 });
	});

	it('accepts UTF-8 bytes', () => {
		const bytes = new TextEncoder().encode('#if X\n');
		expect([...tokenize(bytes)]).toEqual([...tokenize('#if X\n')]);
	});

	it('is restartable', () => {
		const seq = tokenize('int main() {}');
		expect([...seq]).toEqual([...seq]);
	});

	it('returns a sticky EOF sentinel', () => {
		const tz = new Tokenizer('x');
		expect(tz.peek().value).toBe('x');
		expect(tz.next().value).toBe('x');
		const eof = tz.next();
		expect(eof).toMatchObject({ kind: 'eof', value: '', span: { start: 1, end: 1 } });
		expect(tz.next()).toBe(eof);
		const all: Token[] = tokenizeAll('x');
		expect(all.map(t => t.kind)).toEqual(['word', 'eof']);
	});

	it('fails on a backslash that never reaches a newline', () => {
		const err = tokenizeError('a \\  ');
		expect(err.code).toBe('continuation-invalid');
		expect(err.cursor).toEqual({ line: 1, column: 3 });
		expect(err.message).toBe('1:3: missing newline character after line continuation backslash');
	});

	it('fails on a backslash followed by text on the last line', () => {
		const err = tokenizeError('#define X 1 \\ foo');
		expect(err.code).toBe('continuation-invalid');
		expect(err.cursor).toEqual({ line: 1, column: 13 });
		expect(err.construct).toBe('\\');
	});

	it('keeps a stray backslash that a later line ends', () => {
		expect(tokenizeAll('a \\ b\nc').map(t => [t.kind, t.value])).toEqual([
			['word', 'a'],
			['whitespace', ' '],
			['word', '\\'],
			['whitespace', ' '],
			['word', 'b'],
			['newline', '\n'],
			['word', 'c'],
			['eof', ''],
		]);
	});

	it('fails on an unterminated block comment', () => {
		const err = tokenizeError('x\n  /* open');
		expect(err.code).toBe('comment-unterminated');
		expect(err.cursor).toEqual({ line: 2, column: 3 });
		expect(err.construct).toBe('/*');
	});

	it('yields the tokens before an error lazily', () => {
		const iter = tokenize('ok /*')[Symbol.iterator]();
		expect(iter.next().value).toMatchObject({ kind: 'word', value: 'ok' });
		expect(iter.next().value).toMatchObject({ kind: 'whitespace' });
		expect(() => iter.next()).toThrow(TokenizeError);
	});
});
