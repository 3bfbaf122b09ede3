import type { CostEvaluation, DayAccumulator, MonitoringStatusName, ReportDays } from './_types.ts';
import Table from 'cli-table3';
import pc from 'picocolors';
import { CURRENCY } from './_consts.ts';
import { dayTotal, formatAmount } from './reporter.ts';

/**
 * Horizontal alignment options for table cells
 */
export type TableCellAlign = 'left' | 'right' | 'center';

/**
 * Table row data type
 */
export type TableRow = string[];

/**
 * Formats an amount in EUR with 2 decimal places
 */
export function formatCurrency(amount: number): string {
	return `${formatAmount(amount)} ${CURRENCY}`;
}

/**
 * Colors a status name by severity
 */
export function colorStatus(status: MonitoringStatusName): string {
	switch (status) {
		case 'OK':
			return pc.green(status);
		case 'WARNING':
			return pc.yellow(status);
		case 'CRITICAL':
			return pc.red(status);
		case 'UNKNOWN':
			return pc.magenta(status);
	}
}

/**
 * Creates the per-day cost table with consistent styling
 */
export function createCostReportTable(): InstanceType<typeof Table> {
	const colAligns: TableCellAlign[] = ['left', 'right', 'right', 'right'];
	return new Table({
		head: ['Date', 'Charge', 'Discount', 'Total'],
		style: { head: ['cyan'] },
		colAligns,
	});
}

/**
 * Formats one day for display in the table
 */
export function formatCostRow(date: string, day: DayAccumulator, skipDiscount: boolean): TableRow {
	return [
		date,
		formatCurrency(day.charge),
		formatCurrency(day.discount),
		formatCurrency(dayTotal(day, skipDiscount)),
	];
}

/**
 * Renders both report days and the evaluated status
 */
export function renderCostReport(days: ReportDays, evaluation: CostEvaluation, skipDiscount: boolean): string {
	const table = createCostReportTable();
	table.push(formatCostRow(days.yesterday, evaluation.yesterday, skipDiscount));
	table.push(formatCostRow(days.today, evaluation.today, skipDiscount));
	table.push([
		pc.yellow('Reported'),
		'',
		'',
		pc.yellow(formatCurrency(evaluation.reportedCost)),
	]);

	const threshold = evaluation.threshold == null ? '' : ` (>= ${formatCurrency(evaluation.threshold)})`;
	return `${table.toString()}\n${colorStatus(evaluation.status)}${threshold}`;
}

if (import.meta.vitest != null) {
	describe('formatCurrency', () => {
		it('should format EUR amounts with 2 decimal places', () => {
			expect(formatCurrency(5)).toBe('5.00 EUR');
			expect(formatCurrency(0.125)).toBe('0.12 EUR');
			expect(formatCurrency(0.375)).toBe('0.38 EUR');
			expect(formatCurrency(1234.5)).toBe('1234.50 EUR');
		});
	});

	describe('formatCostRow', () => {
		const day = { charge: 1, discount: 4 };

		it('should include the discount in the total by default', () => {
			expect(formatCostRow('2024-06-02', day, false)).toEqual(['2024-06-02', '1.00 EUR', '4.00 EUR', '5.00 EUR']);
		});

		it('should leave the discount out when skipped', () => {
			expect(formatCostRow('2024-06-02', day, true)).toEqual(['2024-06-02', '1.00 EUR', '4.00 EUR', '1.00 EUR']);
		});
	});

	describe('renderCostReport', () => {
		it('should list both days', () => {
			const output = renderCostReport(
				{ today: '2024-06-02', yesterday: '2024-06-01' },
				{ status: 'OK', reportedCost: 5, today: { charge: 5, discount: 0 }, yesterday: { charge: 2, discount: 0 } },
				false,
			);
			expect(output).toContain('2024-06-01');
			expect(output).toContain('2024-06-02');
			expect(output.indexOf('2024-06-01')).toBeLessThan(output.indexOf('2024-06-02'));
		});
	});
}
