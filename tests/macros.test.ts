import { describe, it, expect } from 'vitest';
import { hasMacro, macroValue, parseIntLiteral, parseMacro, parseMacros } from '../src/core/macros';

describe('parseIntLiteral', () => {
	it.each([
		['42', 42],
		['0x2A', 42],
		['052', 42],
		['0b101010', 42],
		['42u', 42],
		['42LL', 42],
		['0', 0],
	])('%s -> %d', (tok, value) => {
		expect(parseIntLiteral(tok)).toBe(value);
	});

	it.each(['abc', '4.2', '08', '0x', '-1', '', '0xFFFFFFFFFFFFFFFF', '18446744073709551615u'])('rejects %j', tok => {
		expect(parseIntLiteral(tok)).toBeUndefined();
	});
});

describe('parseMacro', () => {
	it('defaults a bare name to 1 and accepts the -D prefix', () => {
		expect(parseMacro('FOO')).toEqual({ name: 'FOO', value: 1 });
		expect(parseMacro('-DBAR=0x10')).toEqual({ name: 'BAR', value: 16 });
		expect(parseMacro('BAZ=010')).toEqual({ name: 'BAZ', value: 8 });
		expect(parseMacro('-D_QUX=0')).toEqual({ name: '_QUX', value: 0 });
	});

	it('rejects bad names and non-integer values', () => {
		expect(() => parseMacro('1BAD')).toThrow('invalid macro name "1BAD"');
		expect(() => parseMacro('N=0b11')).toThrow('macro N=0b11, only integer literal values are allowed');
		expect(() => parseMacro('N=abc')).toThrow('only integer literal values are allowed');
		expect(() => parseMacro('N=0x10000000000000000')).toThrow('only integer literal values are allowed');
	});

	it('accepts integer suffixes', () => {
		expect(parseMacro('-DX=1u')).toEqual({ name: 'X', value: 1 });
		expect(parseMacro('Y=0x10UL')).toEqual({ name: 'Y', value: 16 });
		expect(parseMacro('Z=7ll')).toEqual({ name: 'Z', value: 7 });
	});
});

describe('parseMacros', () => {
	it('merges definitions, later ones winning', () => {
		expect(parseMacros(['A', '-DB=2', 'A=3'])).toEqual({ A: 3, B: 2 });
	});

	it('lists every invalid definition in one error', () => {
		expect(() => parseMacros(['A=x', 'OK', '9=1'])).toThrow(
			'Invalid macro definitions:\n' +
			'failed to parse A=x: macro A=x, only integer literal values are allowed\n' +
			'failed to parse 9=1: invalid macro name "9"',
		);
	});
});

describe('environment lookups', () => {
	it('only sees own keys', () => {
		const env = { ZERO: 0 };
		expect(hasMacro(env, 'ZERO')).toBe(true);
		expect(hasMacro(env, 'toString')).toBe(false);
		expect(macroValue(env, 'toString')).toBe(0);
		expect(macroValue(env, 'ZERO')).toBe(0);
	});
});
