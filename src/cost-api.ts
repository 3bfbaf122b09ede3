import type { CostQuery, CostReportEntry, Session } from './_types.ts';
import process from 'node:process';
import { DEFAULT_COST_API_URL } from './_consts.ts';
import { projectCostSchema } from './_schemas.ts';
import { CostServiceError, errorMessage } from './errors.ts';
import { logger } from './logger.ts';

export type CostApiOptions = {
	baseUrl?: string;
	fetch?: typeof fetch;
};

/**
 * Builds the project cost endpoint URL for a query
 */
export function buildProjectCostUrl(baseUrl: string, query: CostQuery): URL {
	const path = [
		'v3',
		'costs',
		encodeURIComponent(query.customerAccountId),
		'projects',
		encodeURIComponent(query.projectId),
	].join('/');
	const url = new URL(path, baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);
	url.searchParams.set('from', query.from);
	url.searchParams.set('to', query.to);
	url.searchParams.set('depth', query.depth);
	url.searchParams.set('granularity', query.granularity);
	url.searchParams.set('includeZeroCosts', String(query.includeZeroCosts));
	return url;
}

/**
 * Validates a project cost response and flattens its report data
 * @throws CostServiceError when the body is malformed or lacks per-day data
 */
export function parseProjectCosts(body: unknown): CostReportEntry[] {
	const result = projectCostSchema.safeParse(body);
	if (!result.success) {
		const issue = result.error.issues[0];
		const detail = issue == null ? 'invalid format' : `${issue.path.join('.')}: ${issue.message}`;
		throw new CostServiceError(`Cost API returned malformed response (${detail})`);
	}

	const { reportData } = result.data;
	if (reportData == null) {
		throw new CostServiceError('Cost API returned item without report data');
	}

	return reportData.map(data => ({
		date: data.timePeriod.start,
		charge: data.charge,
		discount: data.discount,
	}));
}

/**
 * Fetches one project's costs from the STACKIT cost API
 * @throws CostServiceError for transport, HTTP and response failures
 */
export async function fetchProjectCosts(
	session: Session,
	query: CostQuery,
	options: CostApiOptions = {},
): Promise<CostReportEntry[]> {
	const baseUrl = options.baseUrl ?? (process.env.STACKIT_COST_API_URL || DEFAULT_COST_API_URL);
	const fetchFn = options.fetch ?? fetch;
	const url = buildProjectCostUrl(baseUrl, query);
	logger.debug(`Querying ${url.toString()}`);

	let response: Response;
	try {
		response = await fetchFn(url, {
			headers: {
				Accept: 'application/json',
				Authorization: `Bearer ${session.accessToken}`,
			},
		});
	}
	catch (error) {
		throw new CostServiceError(`Cost API request failed: ${errorMessage(error)}`, { cause: error });
	}

	if (!response.ok) {
		throw new CostServiceError(`Cost API request failed: ${response.status} ${response.statusText}`.trimEnd());
	}

	let body: unknown;
	try {
		body = await response.json();
	}
	catch (error) {
		throw new CostServiceError('Cost API returned invalid JSON', { cause: error });
	}

	const entries = parseProjectCosts(body);
	logger.debug(`Cost API returned ${entries.length} report entries`);
	return entries;
}

if (import.meta.vitest != null) {
	const session: Session = { accessToken: 'test-token' };
	const query: CostQuery = {
		customerAccountId: 'account-1',
		projectId: 'project-1',
		from: '2024-06-01',
		to: '2024-06-02',
		granularity: 'daily',
		depth: 'project',
		includeZeroCosts: false,
	};

	const projectCost = {
		customerAccountId: 'account-1',
		projectId: 'project-1',
		projectName: 'demo',
		totalCharge: 700,
		totalDiscount: 50,
		reportData: [
			{ charge: 200, discount: 50, quantity: 1, timePeriod: { start: '2024-06-01', end: '2024-06-01' } },
			{ charge: 500, discount: 0, quantity: 1, timePeriod: { start: '2024-06-02', end: '2024-06-02' } },
		],
	};

	describe('buildProjectCostUrl', () => {
		it('should build the project cost URL with query parameters', () => {
			expect(buildProjectCostUrl('https://cost.example.test', query).toString()).toBe(
				'https://cost.example.test/v3/costs/account-1/projects/project-1?from=2024-06-01&to=2024-06-02&depth=project&granularity=daily&includeZeroCosts=false',
			);
		});

		it('should keep a base path and encode identifiers', () => {
			const url = buildProjectCostUrl('https://proxy.example.test/stackit/', { ...query, projectId: 'a b' });
			expect(url.pathname).toBe('/stackit/v3/costs/account-1/projects/a%20b');
		});
	});

	describe('parseProjectCosts', () => {
		it('should flatten report data into entries', () => {
			expect(parseProjectCosts(projectCost)).toEqual([
				{ date: '2024-06-01', charge: 200, discount: 50 },
				{ date: '2024-06-02', charge: 500, discount: 0 },
			]);
		});

		it('should fail for an item without report data', () => {
			const { reportData: _, ...summary } = projectCost;
			expect(() => parseProjectCosts(summary)).toThrow(new CostServiceError('Cost API returned item without report data'));
		});

		it('should fail for malformed report data', () => {
			expect(() => parseProjectCosts({ reportData: [{ charge: '200', discount: 0, timePeriod: { start: '2024-06-01', end: '2024-06-01' } }] }))
				.toThrow('Cost API returned malformed response (reportData.0.charge: Expected number, received string)');
		});
	});

	describe('fetchProjectCosts', () => {
		it('should send the bearer token and return entries', async () => {
			const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(
				new Response(JSON.stringify(projectCost), { status: 200 }),
			);

			const entries = await fetchProjectCosts(session, query, { baseUrl: 'https://cost.example.test', fetch: fetchMock });

			expect(entries).toHaveLength(2);
			const call = fetchMock.mock.calls[0];
			expect(String(call?.[0])).toContain('/v3/costs/account-1/projects/project-1?');
			expect(call?.[1]?.headers).toEqual({
				Accept: 'application/json',
				Authorization: 'Bearer test-token',
			});
		});

		it('should report HTTP failures', async () => {
			const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(
				new Response('{}', { status: 403, statusText: 'Forbidden' }),
			);

			await expect(fetchProjectCosts(session, query, { baseUrl: 'https://cost.example.test', fetch: fetchMock }))
				.rejects
				.toThrow(new CostServiceError('Cost API request failed: 403 Forbidden'));
		});

		it('should report transport failures', async () => {
			const fetchMock = vi.fn<typeof fetch>().mockRejectedValueOnce(new TypeError('fetch failed'));

			await expect(fetchProjectCosts(session, query, { baseUrl: 'https://cost.example.test', fetch: fetchMock }))
				.rejects
				.toThrow('Cost API request failed: fetch failed');
		});

		it('should report invalid JSON', async () => {
			const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(
				new Response('<html>', { status: 200 }),
			);

			await expect(fetchProjectCosts(session, query, { baseUrl: 'https://cost.example.test', fetch: fetchMock }))
				.rejects
				.toThrow('Cost API returned invalid JSON');
		});
	});
}
