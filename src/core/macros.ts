// Known macros and their integer values, e.g. { __linux__: 1, __ARM_ARCH: 8 }.
// A macro defined without a value is 1. String and float macros are not modelled.
export type Environment = Readonly<Record<string, number>>;

export interface MacroDefinition { name: string; value: number }

export const MACRO_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
// -D values: decimal, hex or octal, u/l suffixes allowed
const PLAIN_INTEGER = /^(?:0[xX][0-9a-fA-F]+|0[0-7]*|[1-9][0-9]*)(?:[uU](?:ll|LL|l|L)?|(?:ll|LL|l|L)[uU]?)?$/;
const INTEGER_WITH_SUFFIX = /^(0[xX][0-9a-fA-F]+|0[bB][01]+|0[0-7]*|[1-9][0-9]*)(?:[uU](?:ll|LL|l|L)?|(?:ll|LL|l|L)[uU]?)?$/;

export function hasMacro(env: Environment, name: string): boolean {
	return Object.prototype.hasOwnProperty.call(env, name);
}

export function macroValue(env: Environment, name: string): number {
	return hasMacro(env, name) ? env[name] ?? 0 : 0;
}

// Integer literal as written in C source: decimal, hex, octal or binary, with u/l suffixes ignored.
// Returns undefined for anything else, and for values a number cannot hold exactly.
export function parseIntLiteral(tok: string): number | undefined {
	const m = INTEGER_WITH_SUFFIX.exec(tok);
	const digits = m?.[1];
	if (!digits) return undefined;
	let value: number;
	if (/^0[xX]/.test(digits)) value = parseInt(digits.slice(2), 16);
	else if (/^0[bB]/.test(digits)) value = parseInt(digits.slice(2), 2);
	else if (digits.length > 1 && digits.startsWith('0')) value = parseInt(digits.slice(1), 8);
	else value = parseInt(digits, 10);
	return Number.isSafeInteger(value) ? value : undefined;
}

export function parseMacro(definition: string): MacroDefinition {
	const d = definition.startsWith('-D') ? definition.slice(2) : definition;
	const eq = d.indexOf('=');
	const name = eq >= 0 ? d.slice(0, eq) : d;
	const raw = eq >= 0 ? d.slice(eq + 1) : '';
	if (!MACRO_IDENTIFIER.test(name)) throw new Error(`invalid macro name "${name}"`);
	if (raw === '') return { name, value: 1 };
	const value = PLAIN_INTEGER.test(raw) ? parseIntLiteral(raw) : undefined;
	if (value === undefined) throw new Error(`macro ${name}=${raw}, only integer literal values are allowed`);
	return { name, value };
}

// Parses -D style definitions; one Error lists every definition that failed.
export function parseMacros(definitions: readonly string[]): Environment {
	const out: Record<string, number> = {};
	const errors: string[] = [];
	for (const d of definitions) {
		try {
			const m = parseMacro(d);
			out[m.name] = m.value;
		} catch (err) {
			errors.push(`failed to parse ${d}: ${err instanceof Error ? err.message : String(err)}`);
		}
	}
	if (errors.length) throw new Error(`Invalid macro definitions:\n${errors.join('\n')}`);
	return out;
}
