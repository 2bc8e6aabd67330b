import type { Cursor } from './core/cursor';

export const SCAN_DIAGCODES = {
	UNTERMINATED_COMMENT: 'CCS001',
	INVALID_CONTINUATION: 'CCS002',
	MALFORMED_INCLUDE: 'CCS010',
	MALFORMED_DEFINE: 'CCS011',
	MALFORMED_UNDEF: 'CCS012',
	MALFORMED_CONDITION: 'CCS020',
	UNPAIRED_CONDITIONAL: 'CCS021',
	UNTERMINATED_CONDITIONAL: 'CCS022',
} as const;
export type DiagCode = typeof SCAN_DIAGCODES[keyof typeof SCAN_DIAGCODES];

const DIAG_VALUE_SET = new Set<string>(Object.values(SCAN_DIAGCODES));

function isDiagCode(s: string): s is DiagCode {
	return DIAG_VALUE_SET.has(s);
}

// Build name->code mapping from the enum to avoid duplication. Tokenizer failures (< CCS010) only keep numeric form.
const DIAG_NAME_MAP: Record<string, DiagCode> = (() => {
	const map: Record<string, DiagCode> = {};
	for (const [enumName, code] of Object.entries(SCAN_DIAGCODES)) {
		const m = /^CCS(\d+)/i.exec(code);
		const num = m?.[1] ? parseInt(m[1], 10) : 999;
		if (Number.isFinite(num) && num < 10) continue;
		map[enumName.toLowerCase().replace(/_/g, '-')] = code;
	}
	return map;
})();

export function normalizeDiagCode(raw: string | null | undefined): DiagCode | null {
	if (!raw) return null;
	const trimmed = raw.trim();
	if (!trimmed) return null;
	const upper = trimmed.toUpperCase();
	if (isDiagCode(upper)) return upper;
	const canon = trimmed.toLowerCase().replace(/[-_]/g, '-');
	return DIAG_NAME_MAP[canon] ?? null;
}

export interface Diagnostic {
	code: DiagCode;
	message: string;
	cursor: Cursor;
	severity?: 'error' | 'warning';
}
