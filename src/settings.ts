import { type DiagCode, type Diagnostic, normalizeDiagCode } from './analysisTypes';
import type { IncludeSearch, PathVariantOptions } from './grouping/includePaths';

export interface ScanSettings {
	platforms: string[]; // 'os/arch'
	macros: string[]; // -D style, e.g. 'NDEBUG' or '-DLEVEL=2'
	grouping: PathVariantOptions;
	diagnostics: { disable: Set<DiagCode> };
	debug: boolean;
}

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function str(v: unknown, fallback = ''): string {
	return typeof v === 'string' ? v.trim() : fallback;
}

// Strings from an array or a comma/whitespace separated string; anything else is dropped.
function stringList(v: unknown): string[] {
	const items = Array.isArray(v) ? v : typeof v === 'string' ? v.split(/[,\s]+/) : [];
	const out: string[] = [];
	for (const it of items) {
		const s = str(it);
		if (s && !out.includes(s)) out.push(s);
	}
	return out;
}

// Disabled diagnostics given as codes or friendly names ('CCS010', 'malformed-include'),
// either as a list, a separated string, or a map of name -> false.
export function parseDisabledDiagList(input: unknown): Set<DiagCode> {
	const names = isRecord(input)
		? Object.entries(input).filter(([, enabled]) => enabled === false).map(([name]) => name)
		: stringList(input);
	const out = new Set<DiagCode>();
	for (const name of names) {
		const code = normalizeDiagCode(name);
		if (code) out.add(code);
	}
	return out;
}

export function filterDiagnostics(diags: readonly Diagnostic[], disabled: ReadonlySet<DiagCode>): Diagnostic[] {
	return disabled.size ? diags.filter(d => !disabled.has(d.code)) : [...diags];
}

function searches(v: unknown): IncludeSearch[] {
	if (!Array.isArray(v)) return [];
	const out: IncludeSearch[] = [];
	for (const it of v) {
		if (!isRecord(it)) continue;
		out.push({ stripIncludePrefix: str(it.stripIncludePrefix), includePrefix: str(it.includePrefix) });
	}
	return out;
}

// Reads untyped settings (JSON, YAML, client configuration); missing or ill-typed fields take defaults.
export function normalizeSettings(input: unknown): ScanSettings {
	const s = isRecord(input) ? input : {};
	const grouping = isRecord(s.grouping) ? s.grouping : {};
	const diagnostics = isRecord(s.diagnostics) ? s.diagnostics : {};
	return {
		platforms: stringList(s.platforms),
		macros: stringList(s.macros),
		grouping: {
			rel: str(grouping.rel),
			stripIncludePrefix: str(grouping.stripIncludePrefix),
			includePrefix: str(grouping.includePrefix),
			searches: searches(grouping.searches),
		},
		diagnostics: { disable: parseDisabledDiagList(diagnostics.disable) },
		debug: s.debug === true,
	};
}
