import type { ConfigurationInput } from '../config.ts';
import process from 'node:process';
import { define } from 'gunshi';
import pc from 'picocolors';
import { sharedCommandConfig } from '../_shared-args.ts';
import { MonitoringStatus } from '../_types.ts';
import { resolveConfiguration } from '../config.ts';
import { InvalidConfigurationError } from '../errors.ts';
import { enableVerboseLogging } from '../logger.ts';
import { runProbe } from '../probe.ts';

/**
 * Resolves the configuration or reports the violated constraint on stderr
 *
 * Configuration errors are operator mistakes, so they are printed like a
 * parser error instead of a monitoring status line.
 */
export function resolveOrReport(values: ConfigurationInput): ReturnType<typeof resolveConfiguration> | null {
	try {
		return resolveConfiguration(values);
	}
	catch (error) {
		if (error instanceof InvalidConfigurationError) {
			process.stderr.write(`${pc.red('Error:')} ${error.message}\n`);
			process.exitCode = MonitoringStatus.UNKNOWN;
			return null;
		}
		throw error;
	}
}

export const checkCommand = define({
	name: 'check',
	description: 'Check daily project costs against thresholds (monitoring plugin output)',
	...sharedCommandConfig,
	async run(ctx) {
		if (ctx.values.verbose) {
			enableVerboseLogging();
		}

		const config = resolveOrReport(ctx.values);
		if (config == null) {
			return;
		}

		const result = await runProbe(config);
		process.stdout.write(`${result.line}\n`);
		process.exitCode = MonitoringStatus[result.status];
	},
});

if (import.meta.vitest != null) {
	describe('resolveOrReport', () => {
		afterEach(() => {
			process.exitCode = undefined;
			vi.restoreAllMocks();
		});

		it('should return the configuration for valid input', () => {
			const config = resolveOrReport({ customerAccountId: 'account-1', projectId: 'project-1', saKeyJson: '/tmp/sa-key.json' });
			expect(config?.warning).toBe(10);
			expect(process.exitCode).toBeUndefined();
		});

		it('should report an invalid threshold ordering on stderr only', () => {
			const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
			const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

			const config = resolveOrReport({ customerAccountId: 'account-1', projectId: 'project-1', warning: 50, critical: 10 });

			expect(config).toBeNull();
			expect(process.exitCode).toBe(3);
			expect(stderr).toHaveBeenCalledTimes(1);
			expect(String(stderr.mock.calls[0]?.[0])).toContain('Critical threshold must be > warning threshold\n');
			expect(stdout).not.toHaveBeenCalled();
		});
	});
}
