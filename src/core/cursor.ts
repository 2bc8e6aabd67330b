// 1-based position in the source text.
export interface Cursor {
	readonly line: number;
	readonly column: number;
}

export const CURSOR_INIT: Cursor = { line: 1, column: 1 };

function codePointLength(s: string): number {
	let n = 0;
	for (const _ of s) n++;
	return n;
}

// Cursor right after `lookAhead`, assuming `c` points at its first character.
// Newlines bump the line and reset the column; other characters advance the column.
export function advanceCursor(c: Cursor, lookAhead: string): Cursor {
	const lastNewline = lookAhead.lastIndexOf('\n');
	if (lastNewline < 0) return { line: c.line, column: c.column + codePointLength(lookAhead) };
	let newlines = 0;
	for (let i = 0; i <= lastNewline; i++) if (lookAhead.charCodeAt(i) === 10) newlines++;
	return { line: c.line + newlines, column: 1 + codePointLength(lookAhead.slice(lastNewline + 1)) };
}

export function formatCursor(c: Cursor): string {
	return `${c.line}:${c.column}`;
}
