import type {
	Configuration,
	CostEvaluation,
	CostReportEntry,
	DailyTotals,
	DayAccumulator,
	ReportDays,
} from './_types.ts';
import { CENTS_PER_EURO, CURRENCY } from './_consts.ts';
import { toDay } from './_date-utils.ts';
import { UnexpectedReportDateError } from './errors.ts';

/**
 * Creates empty accumulators for exactly the days of a probe run
 */
export function createDailyTotals(days: ReportDays): DailyTotals {
	return new Map<string, DayAccumulator>([
		[days.yesterday, { charge: 0, discount: 0 }],
		[days.today, { charge: 0, discount: 0 }],
	]);
}

/**
 * Books cost entries into per-day EUR sums
 * @throws UnexpectedReportDateError when an entry belongs to neither day
 */
export function bookCostEntries(entries: readonly CostReportEntry[], days: ReportDays): DailyTotals {
	const totals = createDailyTotals(days);

	for (const entry of entries) {
		const date = toDay(entry.date);
		const accumulator = totals.get(date);
		if (accumulator == null) {
			throw new UnexpectedReportDateError(entry.date);
		}
		accumulator.charge += entry.charge / CENTS_PER_EURO;
		accumulator.discount += entry.discount / CENTS_PER_EURO;
	}

	return totals;
}

function getDay(totals: DailyTotals, date: string): DayAccumulator {
	return totals.get(date) ?? { charge: 0, discount: 0 };
}

/**
 * Cost of one day as compared against the thresholds
 *
 * The charge reported by STACKIT already has granted discounts subtracted.
 * Adding the discount back raises an alarm before free budget runs out.
 */
export function dayTotal(day: DayAccumulator, skipDiscount: boolean): number {
	return skipDiscount ? day.charge : day.charge + day.discount;
}

/**
 * Classifies the higher of both days' cost; thresholds are inclusive
 */
export function evaluateCosts(
	totals: DailyTotals,
	days: ReportDays,
	config: Pick<Configuration, 'warning' | 'critical' | 'skipDiscount'>,
): CostEvaluation {
	const today = getDay(totals, days.today);
	const yesterday = getDay(totals, days.yesterday);
	const reportedCost = Math.max(
		dayTotal(today, config.skipDiscount),
		dayTotal(yesterday, config.skipDiscount),
	);

	if (reportedCost >= config.critical) {
		return { status: 'CRITICAL', reportedCost, threshold: config.critical, today, yesterday };
	}
	if (reportedCost >= config.warning) {
		return { status: 'WARNING', reportedCost, threshold: config.warning, today, yesterday };
	}
	return { status: 'OK', reportedCost, today, yesterday };
}

/**
 * Formats an amount with 2 decimal places, rounding exact binary ties to even
 *
 * Same result as printf-style `%.2f`: `toFixed` alone turns 12.625 into
 * `12.63`, this returns `12.62`.
 */
export function formatAmount(value: number): string {
	const rounded = value.toFixed(2);
	const exact = Math.abs(value).toFixed(20);
	if (!/^\d+\.\d{2}50*$/.test(exact)) {
		return rounded;
	}

	const truncated = exact.slice(0, exact.indexOf('.') + 3);
	if (Number(truncated.slice(-1)) % 2 !== 0) {
		return rounded;
	}
	return value < 0 ? `-${truncated}` : truncated;
}

/**
 * Renders a threshold the way it was configured as a float, e.g. `10.0` or `12.5`
 */
export function formatThreshold(value: number): string {
	return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Performance data: raw per-day sums without discount folding
 */
export function formatPerfData(evaluation: Pick<CostEvaluation, 'today' | 'yesterday'>): string {
	const items = [
		`yesterday_cost=${formatAmount(evaluation.yesterday.charge)};;;`,
		`yesterday_discounted_cost=${formatAmount(evaluation.yesterday.discount)};;;`,
		`today_cost=${formatAmount(evaluation.today.charge)};;;`,
		`today_discounted_cost=${formatAmount(evaluation.today.discount)};;;`,
	];
	return items.join(' ');
}

export function formatStatusLine(evaluation: CostEvaluation): string {
	let message = `Daily costs ${formatAmount(evaluation.reportedCost)} ${CURRENCY}`;
	if (evaluation.threshold != null) {
		message += ` >= ${formatThreshold(evaluation.threshold)} ${CURRENCY}`;
	}
	return `${evaluation.status}: ${message} | ${formatPerfData(evaluation)}`;
}

/**
 * Status line for failures; the empty perf data section keeps the line shape
 */
export function formatUnknownLine(message: string): string {
	return `UNKNOWN: ${message} |`;
}

if (import.meta.vitest != null) {
	const days: ReportDays = { today: '2024-06-02', yesterday: '2024-06-01' };
	const defaults = { warning: 10, critical: 50, skipDiscount: false };

	const entry = (date: string, charge: number, discount = 0): CostReportEntry => ({ date, charge, discount });

	describe('bookCostEntries', () => {
		it('should convert cents to euros per day', () => {
			const totals = bookCostEntries([entry('2024-06-02', 500), entry('2024-06-01', 200, 150)], days);
			expect(totals.get('2024-06-02')).toEqual({ charge: 5, discount: 0 });
			expect(totals.get('2024-06-01')).toEqual({ charge: 2, discount: 1.5 });
		});

		it('should accumulate several entries for the same day', () => {
			const totals = bookCostEntries([entry('2024-06-02', 100, 25), entry('2024-06-02', 300, 75)], days);
			expect(totals.get('2024-06-02')).toEqual({ charge: 4, discount: 1 });
		});

		it('should accept timestamps on the right day', () => {
			const totals = bookCostEntries([entry('2024-06-01T00:00:00Z', 700)], days);
			expect(totals.get('2024-06-01')?.charge).toBe(7);
		});

		it('should start both days at zero without entries', () => {
			const totals = bookCostEntries([], days);
			expect([...totals.entries()]).toEqual([
				['2024-06-01', { charge: 0, discount: 0 }],
				['2024-06-02', { charge: 0, discount: 0 }],
			]);
		});

		it('should fail on a date outside the queried days', () => {
			expect(() => bookCostEntries([entry('2024-06-02', 100), entry('2024-05-31', 100)], days))
				.toThrow(new UnexpectedReportDateError('2024-05-31'));
			expect(() => bookCostEntries([entry('2024-05-31', 100)], days))
				.toThrow('Cost API returned unexpected date: 2024-05-31');
		});
	});

	describe('evaluateCosts', () => {
		const evaluate = (todayCents: number, yesterdayCents: number, config = defaults): CostEvaluation =>
			evaluateCosts(bookCostEntries([entry(days.today, todayCents), entry(days.yesterday, yesterdayCents)], days), days, config);

		it('should report OK below the warning threshold', () => {
			const evaluation = evaluate(500, 200);
			expect(evaluation.status).toBe('OK');
			expect(evaluation.reportedCost).toBe(5);
			expect(evaluation.threshold).toBeUndefined();
		});

		it('should report WARNING from the warning threshold on', () => {
			expect(evaluate(1200, 200)).toMatchObject({ status: 'WARNING', reportedCost: 12, threshold: 10 });
			expect(evaluate(1000, 0)).toMatchObject({ status: 'WARNING', reportedCost: 10 });
			expect(evaluate(999, 0).status).toBe('OK');
		});

		it('should report CRITICAL from the critical threshold on', () => {
			expect(evaluate(5200, 200)).toMatchObject({ status: 'CRITICAL', reportedCost: 52, threshold: 50 });
			expect(evaluate(5000, 0).status).toBe('CRITICAL');
			expect(evaluate(4999, 0).status).toBe('WARNING');
		});

		it('should use the higher day regardless of entry order', () => {
			const forward = bookCostEntries([entry(days.today, 300), entry(days.yesterday, 1500)], days);
			const backward = bookCostEntries([entry(days.yesterday, 1500), entry(days.today, 300)], days);
			expect(evaluateCosts(forward, days, defaults).reportedCost).toBe(15);
			expect(evaluateCosts(backward, days, defaults).reportedCost).toBe(15);
		});

		it('should add discounts back unless skipped', () => {
			const totals = bookCostEntries([entry(days.today, 100, 400)], days);
			expect(evaluateCosts(totals, days, defaults).reportedCost).toBe(5);
			expect(evaluateCosts(totals, days, { ...defaults, skipDiscount: true }).reportedCost).toBe(1);
		});

		it('should treat a zero warning threshold as always warning', () => {
			expect(evaluate(0, 0, { warning: 0, critical: 1, skipDiscount: false }).status).toBe('WARNING');
		});
	});

	describe('formatStatusLine', () => {
		it('should render the OK line with perf data', () => {
			const evaluation = evaluateCosts(bookCostEntries([entry(days.today, 500), entry(days.yesterday, 200)], days), days, defaults);
			expect(formatStatusLine(evaluation)).toBe(
				'OK: Daily costs 5.00 EUR | yesterday_cost=2.00;;; yesterday_discounted_cost=0.00;;; today_cost=5.00;;; today_discounted_cost=0.00;;;',
			);
		});

		it('should name the exceeded threshold', () => {
			const evaluation = evaluateCosts(bookCostEntries([entry(days.today, 1200), entry(days.yesterday, 200)], days), days, defaults);
			expect(formatStatusLine(evaluation)).toBe(
				'WARNING: Daily costs 12.00 EUR >= 10.0 EUR | yesterday_cost=2.00;;; yesterday_discounted_cost=0.00;;; today_cost=12.00;;; today_discounted_cost=0.00;;;',
			);
		});

		it('should keep perf data unfolded when discounts are added', () => {
			const evaluation = evaluateCosts(bookCostEntries([entry(days.today, 100, 400)], days), days, { warning: 2.5, critical: 4.75, skipDiscount: false });
			expect(formatStatusLine(evaluation)).toBe(
				'CRITICAL: Daily costs 5.00 EUR >= 4.75 EUR | yesterday_cost=0.00;;; yesterday_discounted_cost=0.00;;; today_cost=1.00;;; today_discounted_cost=4.00;;;',
			);
		});
	});

	describe('formatAmount', () => {
		it('should round exact ties to even', () => {
			expect(formatAmount(12.625)).toBe('12.62');
			expect(formatAmount(0.125)).toBe('0.12');
			expect(formatAmount(0.375)).toBe('0.38');
			expect(formatAmount(-12.625)).toBe('-12.62');
		});

		it('should round other values to the nearest cent', () => {
			expect(formatAmount(5)).toBe('5.00');
			expect(formatAmount(12.6251)).toBe('12.63');
			expect(formatAmount(0.1 + 0.2)).toBe('0.30');
		});

		it('should apply to the status line and perf data', () => {
			const evaluation = evaluateCosts(bookCostEntries([entry(days.today, 1262.5)], days), days, defaults);
			expect(formatStatusLine(evaluation)).toBe(
				'WARNING: Daily costs 12.62 EUR >= 10.0 EUR | yesterday_cost=0.00;;; yesterday_discounted_cost=0.00;;; today_cost=12.62;;; today_discounted_cost=0.00;;;',
			);
		});
	});

	describe('formatThreshold', () => {
		it('should print whole amounts with one decimal', () => {
			expect(formatThreshold(10)).toBe('10.0');
			expect(formatThreshold(0)).toBe('0.0');
			expect(formatThreshold(12.5)).toBe('12.5');
		});
	});

	describe('formatUnknownLine', () => {
		it('should keep the perf data separator', () => {
			expect(formatUnknownLine('Token request failed')).toBe('UNKNOWN: Token request failed |');
		});
	});
}
