import type {
	Configuration,
	CostEvaluation,
	CostQuery,
	CostQueryService,
	CredentialLoader,
	MonitoringStatusName,
	ReportDays,
} from './_types.ts';
import { getReportDays } from './_date-utils.ts';
import { loadSession } from './auth.ts';
import { fetchProjectCosts } from './cost-api.ts';
import { AuthenticationError, CostServiceError, errorMessage } from './errors.ts';
import { logger } from './logger.ts';
import { bookCostEntries, evaluateCosts, formatStatusLine, formatUnknownLine } from './reporter.ts';

/**
 * External collaborators of a probe run
 */
export type ProbeDependencies = {
	loadSession: CredentialLoader;
	fetchProjectCosts: CostQueryService;
};

export const defaultDependencies: ProbeDependencies = {
	loadSession,
	fetchProjectCosts: async (session, query) => fetchProjectCosts(session, query),
};

export type ProbeResult = {
	status: MonitoringStatusName;
	line: string;
};

/**
 * The daily project query for both report days
 */
export function createCostQuery(config: Configuration, days: ReportDays): CostQuery {
	return {
		customerAccountId: config.customerAccountId,
		projectId: config.projectId,
		from: days.yesterday,
		to: days.today,
		granularity: 'daily',
		depth: 'project',
		includeZeroCosts: false,
	};
}

/**
 * Authenticates, queries and evaluates the costs of the report days
 *
 * The days are derived once from `now` and used for both the query range and
 * the bucketing of the returned entries.
 */
export async function collectCosts(
	config: Configuration,
	dependencies: ProbeDependencies,
	now: Date,
): Promise<{ days: ReportDays; evaluation: CostEvaluation }> {
	const days = getReportDays(now);
	const session = await dependencies.loadSession(config.saKeyJson);
	const entries = await dependencies.fetchProjectCosts(session, createCostQuery(config, days));
	const totals = bookCostEntries(entries, days);
	return { days, evaluation: evaluateCosts(totals, days, config) };
}

/**
 * Runs one check; never rejects, failures become an UNKNOWN result
 */
export async function runProbe(
	config: Configuration,
	dependencies: ProbeDependencies = defaultDependencies,
	now: Date = new Date(),
): Promise<ProbeResult> {
	try {
		const { evaluation } = await collectCosts(config, dependencies, now);
		return { status: evaluation.status, line: formatStatusLine(evaluation) };
	}
	catch (error) {
		logger.debug(error);
		return { status: 'UNKNOWN', line: formatUnknownLine(errorMessage(error)) };
	}
}

if (import.meta.vitest != null) {
	const config: Configuration = {
		customerAccountId: 'account-1',
		projectId: 'project-1',
		warning: 10,
		critical: 50,
		saKeyJson: '/tmp/sa-key.json',
		skipDiscount: false,
	};
	const now = new Date('2024-06-02T08:00:00.000Z');

	const withEntries = (entries: Awaited<ReturnType<CostQueryService>>): ProbeDependencies => ({
		loadSession: vi.fn<CredentialLoader>().mockResolvedValue({ accessToken: 'test-token' }),
		fetchProjectCosts: vi.fn<CostQueryService>().mockResolvedValue(entries),
	});

	describe('runProbe', () => {
		it('should report OK for low costs', async () => {
			const result = await runProbe(config, withEntries([
				{ date: '2024-06-02', charge: 500, discount: 0 },
				{ date: '2024-06-01', charge: 200, discount: 0 },
			]), now);

			expect(result).toEqual({
				status: 'OK',
				line: 'OK: Daily costs 5.00 EUR | yesterday_cost=2.00;;; yesterday_discounted_cost=0.00;;; today_cost=5.00;;; today_discounted_cost=0.00;;;',
			});
		});

		it('should report WARNING above the warning threshold', async () => {
			const result = await runProbe(config, withEntries([
				{ date: '2024-06-02', charge: 1200, discount: 0 },
				{ date: '2024-06-01', charge: 200, discount: 0 },
			]), now);

			expect(result.status).toBe('WARNING');
			expect(result.line).toBe(
				'WARNING: Daily costs 12.00 EUR >= 10.0 EUR | yesterday_cost=2.00;;; yesterday_discounted_cost=0.00;;; today_cost=12.00;;; today_discounted_cost=0.00;;;',
			);
		});

		it('should report CRITICAL above the critical threshold', async () => {
			const result = await runProbe(config, withEntries([
				{ date: '2024-06-02', charge: 5200, discount: 0 },
				{ date: '2024-06-01', charge: 200, discount: 0 },
			]), now);

			expect(result.status).toBe('CRITICAL');
			expect(result.line.startsWith('CRITICAL: Daily costs 52.00 EUR >= 50.0 EUR | ')).toBe(true);
		});

		it('should fold discounts only without skipDiscount', async () => {
			const entries = [{ date: '2024-06-02', charge: 100, discount: 400 }];
			const folded = await runProbe({ ...config, warning: 2, critical: 8 }, withEntries(entries), now);
			const skipped = await runProbe({ ...config, warning: 2, critical: 8, skipDiscount: true }, withEntries(entries), now);

			expect(folded.line.startsWith('WARNING: Daily costs 5.00 EUR >= 2.0 EUR | ')).toBe(true);
			expect(skipped.line.startsWith('OK: Daily costs 1.00 EUR | ')).toBe(true);
		});

		it('should query yesterday and today from one instant', async () => {
			const dependencies = withEntries([]);
			await runProbe(config, dependencies, new Date('2024-03-01T00:00:00.000Z'));

			expect(dependencies.loadSession).toHaveBeenCalledWith('/tmp/sa-key.json');
			expect(dependencies.fetchProjectCosts).toHaveBeenCalledWith({ accessToken: 'test-token' }, {
				customerAccountId: 'account-1',
				projectId: 'project-1',
				from: '2024-02-29',
				to: '2024-03-01',
				granularity: 'daily',
				depth: 'project',
				includeZeroCosts: false,
			});
		});

		it('should report authentication failures as UNKNOWN', async () => {
			const dependencies: ProbeDependencies = {
				loadSession: vi.fn<CredentialLoader>().mockRejectedValue(new AuthenticationError('Token request failed: 401 Unauthorized')),
				fetchProjectCosts: vi.fn<CostQueryService>(),
			};

			const result = await runProbe(config, dependencies, now);

			expect(result).toEqual({ status: 'UNKNOWN', line: 'UNKNOWN: Token request failed: 401 Unauthorized |' });
			expect(dependencies.fetchProjectCosts).not.toHaveBeenCalled();
		});

		it('should report cost service failures as UNKNOWN', async () => {
			const dependencies: ProbeDependencies = {
				loadSession: vi.fn<CredentialLoader>().mockResolvedValue({ accessToken: 'test-token' }),
				fetchProjectCosts: vi.fn<CostQueryService>().mockRejectedValue(new CostServiceError('Cost API returned item without report data')),
			};

			const result = await runProbe(config, dependencies, now);

			expect(result.line).toBe('UNKNOWN: Cost API returned item without report data |');
		});

		it('should report unexpected dates as UNKNOWN', async () => {
			const result = await runProbe(config, withEntries([{ date: '2024-05-30', charge: 100, discount: 0 }]), now);

			expect(result).toEqual({ status: 'UNKNOWN', line: 'UNKNOWN: Cost API returned unexpected date: 2024-05-30 |' });
		});
	});
}
