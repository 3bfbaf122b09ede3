import process from 'node:process';
import { cli } from 'gunshi';
import { description, name, version } from '../../package.json';
import { joinNegativeThresholds } from '../_shared-args.ts';
import { checkCommand } from './check.ts';
import { reportCommand } from './report.ts';

export { checkCommand, reportCommand };

/**
 * Command entries as tuple array
 */
const subCommandUnion = [
	['check', checkCommand],
	['report', reportCommand],
] as const;

/**
 * Map of available CLI subcommands
 */
const subCommands = new Map();
for (const [name, command] of subCommandUnion) {
	subCommands.set(name, command);
}

/**
 * Default command when no subcommand is specified; monitoring systems call the plugin without one
 */
const mainCommand = checkCommand;

export async function runCli(argv: readonly string[]): Promise<void> {
	await cli(joinNegativeThresholds(argv), mainCommand, {
		name,
		version,
		description,
		subCommands,
		renderHeader: null,
	});
}

export async function run(): Promise<void> {
	await runCli(process.argv.slice(2));
}

if (import.meta.vitest != null) {
	const { generateKeyPairSync } = await import('node:crypto');
	const { mkdtempSync, rmSync, writeFileSync } = await import('node:fs');
	const { tmpdir } = await import('node:os');
	const { join } = await import('node:path');

	const { privateKey } = generateKeyPairSync('rsa', {
		modulusLength: 2048,
		privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
		publicKeyEncoding: { type: 'spki', format: 'pem' },
	});

	const tokenUrl = 'https://token.example.test/token';
	const costApiUrl = 'https://cost.example.test';
	let dir: string;
	let keyPath: string;

	const costBody = (todayCents: number, yesterdayCents: number): unknown => ({
		projectId: 'project-1',
		reportData: [
			{ charge: yesterdayCents, discount: 0, timePeriod: { start: '2024-06-01', end: '2024-06-01' } },
			{ charge: todayCents, discount: 0, timePeriod: { start: '2024-06-02', end: '2024-06-02' } },
		],
	});

	const stubFetch = (body: unknown, tokenStatus = 200) => {
		const fetchMock = vi.fn<typeof fetch>(async (input) => {
			if (String(input) === tokenUrl) {
				return tokenStatus === 200
					? new Response(JSON.stringify({ access_token: 'test-token' }), { status: 200 })
					: new Response('denied', { status: tokenStatus, statusText: 'Unauthorized' });
			}
			return new Response(JSON.stringify(body), { status: 200 });
		});
		vi.stubGlobal('fetch', fetchMock);
		return fetchMock;
	};

	const captureOutput = () => ({
		stdout: vi.spyOn(process.stdout, 'write').mockImplementation(() => true),
		stderr: vi.spyOn(process.stderr, 'write').mockImplementation(() => true),
	});

	const written = (spy: { mock: { calls: unknown[][] } }): string => spy.mock.calls.map(call => String(call[0])).join('');

	const accountArgs = (): string[] => [
		'--customer-account-id',
		'account-1',
		'--project-id',
		'project-1',
		'--sa-key-json',
		keyPath,
	];

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'stackit-cost-cli-'));
		keyPath = join(dir, 'sa-key.json');
		writeFileSync(keyPath, JSON.stringify({
			credentials: {
				kid: 'test-kid',
				iss: 'monitor@sa.stackit.cloud',
				sub: 'service-account-id',
				aud: 'https://service-account.example.test',
				privateKey,
			},
		}));
		vi.stubEnv('STACKIT_TOKEN_BASEURL', tokenUrl);
		vi.stubEnv('STACKIT_COST_API_URL', costApiUrl);
		vi.useFakeTimers({ toFake: ['Date'] });
		vi.setSystemTime(new Date('2024-06-02T08:00:00.000Z'));
	});

	afterEach(() => {
		vi.useRealTimers();
		vi.unstubAllGlobals();
		vi.unstubAllEnvs();
		vi.restoreAllMocks();
		process.exitCode = undefined;
		rmSync(dir, { recursive: true, force: true });
	});

	describe('check command', () => {
		it('should print one OK line and exit with 0', async () => {
			const fetchMock = stubFetch(costBody(500, 200));
			const { stdout } = captureOutput();

			await runCli(accountArgs());

			expect(written(stdout)).toBe(
				'OK: Daily costs 5.00 EUR | yesterday_cost=2.00;;; yesterday_discounted_cost=0.00;;; today_cost=5.00;;; today_discounted_cost=0.00;;;\n',
			);
			expect(process.exitCode).toBe(0);
			expect(String(fetchMock.mock.calls[1]?.[0])).toBe(
				'https://cost.example.test/v3/costs/account-1/projects/project-1?from=2024-06-01&to=2024-06-02&depth=project&granularity=daily&includeZeroCosts=false',
			);
		});

		it('should exit with 1 on WARNING', async () => {
			stubFetch(costBody(1200, 200));
			const { stdout } = captureOutput();

			await runCli(accountArgs());

			expect(written(stdout)).toBe(
				'WARNING: Daily costs 12.00 EUR >= 10.0 EUR | yesterday_cost=2.00;;; yesterday_discounted_cost=0.00;;; today_cost=12.00;;; today_discounted_cost=0.00;;;\n',
			);
			expect(process.exitCode).toBe(1);
		});

		it('should exit with 2 on CRITICAL', async () => {
			stubFetch(costBody(5200, 200));
			const { stdout } = captureOutput();

			await runCli(accountArgs());

			expect(written(stdout)).toBe(
				'CRITICAL: Daily costs 52.00 EUR >= 50.0 EUR | yesterday_cost=2.00;;; yesterday_discounted_cost=0.00;;; today_cost=52.00;;; today_discounted_cost=0.00;;;\n',
			);
			expect(process.exitCode).toBe(2);
		});

		it('should honour short threshold flags', async () => {
			stubFetch(costBody(500, 200));
			const { stdout } = captureOutput();

			await runCli([...accountArgs(), '-w', '1', '-c', '3']);

			expect(written(stdout).startsWith('CRITICAL: Daily costs 5.00 EUR >= 3.0 EUR | ')).toBe(true);
			expect(process.exitCode).toBe(2);
		});

		it('should print UNKNOWN and exit with 3 when authentication fails', async () => {
			const fetchMock = stubFetch(costBody(500, 200), 401);
			const { stdout } = captureOutput();

			await runCli(accountArgs());

			expect(written(stdout)).toBe('UNKNOWN: Token request failed: 401 Unauthorized |\n');
			expect(process.exitCode).toBe(3);
			expect(fetchMock).toHaveBeenCalledTimes(1);
		});

		it('should report a negative warning threshold given as a separate token', async () => {
			const fetchMock = stubFetch(costBody(500, 200));

			for (const flag of ['-w', '--warning']) {
				const { stdout, stderr } = captureOutput();
				await runCli([...accountArgs(), flag, '-1']);

				expect(written(stderr)).toContain('Warning threshold must be >= 0.0\n');
				expect(written(stdout)).toBe('');
				expect(process.exitCode).toBe(3);
				vi.restoreAllMocks();
				process.exitCode = undefined;
			}
			expect(fetchMock).not.toHaveBeenCalled();
		});

		it('should report a negative critical threshold as an ordering error', async () => {
			const fetchMock = stubFetch(costBody(500, 200));
			const { stdout, stderr } = captureOutput();

			await runCli([...accountArgs(), '-c', '-5']);

			expect(written(stderr)).toContain('Critical threshold must be > warning threshold\n');
			expect(written(stdout)).toBe('');
			expect(process.exitCode).toBe(3);
			expect(fetchMock).not.toHaveBeenCalled();
		});
	});

	describe('report command', () => {
		it('should print the JSON document and exit with the status code', async () => {
			stubFetch(costBody(1200, 200));
			const { stdout } = captureOutput();

			await runCli(['report', '--json', ...accountArgs()]);

			expect(JSON.parse(written(stdout))).toEqual({
				projectId: 'project-1',
				days: { today: '2024-06-02', yesterday: '2024-06-01' },
				evaluation: {
					status: 'WARNING',
					reportedCost: 12,
					threshold: 10,
					today: { charge: 12, discount: 0 },
					yesterday: { charge: 2, discount: 0 },
				},
			});
			expect(process.exitCode).toBe(1);
		});

		it('should exit with 3 without output when the query fails', async () => {
			stubFetch(costBody(1200, 200), 401);
			const { stdout } = captureOutput();

			await runCli(['report', '--json', ...accountArgs()]);

			expect(written(stdout)).toBe('');
			expect(process.exitCode).toBe(3);
		});
	});
}
