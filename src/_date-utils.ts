/**
 * UTC calendar day helpers; the cost API books costs on UTC days
 */
import type { ReportDays } from './_types.ts';

const MILLISECONDS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Formats an instant as its UTC date in YYYY-MM-DD format
 */
export function formatUtcDate(date: Date): string {
	return date.toISOString().substring(0, 10);
}

/**
 * Shifts a YYYY-MM-DD date by whole days
 */
export function addDays(day: string, days: number): string {
	const midnight = Date.parse(`${day}T00:00:00.000Z`);
	if (Number.isNaN(midnight)) {
		throw new TypeError(`Invalid date: ${day}`);
	}
	return formatUtcDate(new Date(midnight + days * MILLISECONDS_PER_DAY));
}

/**
 * Today and yesterday in UTC, both derived from the same instant
 */
export function getReportDays(now: Date): ReportDays {
	const today = formatUtcDate(now);
	return Object.freeze({
		today,
		yesterday: addDays(today, -1),
	});
}

/**
 * Reduces a date or timestamp string to its YYYY-MM-DD part
 */
export function toDay(value: string): string {
	return value.substring(0, 10);
}

if (import.meta.vitest != null) {
	describe('formatUtcDate', () => {
		it('should use the UTC day regardless of the local timezone', () => {
			expect(formatUtcDate(new Date('2024-01-15T23:59:59.999Z'))).toBe('2024-01-15');
			expect(formatUtcDate(new Date('2024-01-16T00:00:00.000Z'))).toBe('2024-01-16');
		});
	});

	describe('addDays', () => {
		it('should cross month and year boundaries', () => {
			expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
			expect(addDays('2025-01-01', -1)).toBe('2024-12-31');
			expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
		});

		it('should reject malformed dates', () => {
			expect(() => addDays('yesterday', -1)).toThrow('Invalid date: yesterday');
		});
	});

	describe('getReportDays', () => {
		it('should return today and yesterday in UTC', () => {
			expect(getReportDays(new Date('2024-06-01T00:30:00.000Z'))).toEqual({
				today: '2024-06-01',
				yesterday: '2024-05-31',
			});
		});

		it('should not roll over for late evening instants', () => {
			expect(getReportDays(new Date('2024-06-01T23:59:59.000Z')).today).toBe('2024-06-01');
		});
	});

	describe('toDay', () => {
		it('should keep plain dates and strip timestamps', () => {
			expect(toDay('2024-06-01')).toBe('2024-06-01');
			expect(toDay('2024-06-01T00:00:00Z')).toBe('2024-06-01');
		});
	});
}
