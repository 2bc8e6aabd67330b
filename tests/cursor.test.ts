import { describe, it, expect } from 'vitest';
import { CURSOR_INIT, advanceCursor, formatCursor } from '../src/core/cursor';

describe('cursor', () => {
	it('starts at 1:1', () => {
		expect(CURSOR_INIT).toEqual({ line: 1, column: 1 });
		expect(formatCursor(CURSOR_INIT)).toBe('1:1');
	});

	it('advances the column within a line', () => {
		expect(advanceCursor({ line: 3, column: 4 }, 'abc')).toEqual({ line: 3, column: 7 });
	});

	it('counts newlines and restarts the column after the last one', () => {
		expect(advanceCursor({ line: 1, column: 5 }, 'x\ny\nzz')).toEqual({ line: 3, column: 3 });
		expect(advanceCursor({ line: 2, column: 9 }, '\n')).toEqual({ line: 3, column: 1 });
	});

	it('counts code points rather than UTF-16 units', () => {
		expect(advanceCursor(CURSOR_INIT, '😀é')).toEqual({ line: 1, column: 3 });
	});
});
