import type { Configuration } from './_types.ts';
import { homedir } from 'node:os';
import { join } from 'node:path';
import process from 'node:process';
import { DEFAULT_CRITICAL_EUROS, DEFAULT_SA_KEY_JSON, DEFAULT_WARNING_EUROS } from './_consts.ts';
import { configurationSchema } from './_schemas.ts';
import { InvalidConfigurationError } from './errors.ts';

/**
 * Raw values as they come out of the argument parser
 */
export type ConfigurationInput = {
	customerAccountId?: string;
	projectId?: string;
	warning?: number;
	critical?: number;
	saKeyJson?: string;
	skipDiscount?: boolean;
};

/**
 * Expands a leading `~` to the home directory
 */
export function expandHome(path: string): string {
	if (path === '~') {
		return homedir();
	}
	if (path.startsWith('~/')) {
		return join(homedir(), path.slice(2));
	}
	return path;
}

/**
 * Applies defaults and validates command line input
 *
 * Reads nothing from disk and touches no network.
 * @throws InvalidConfigurationError naming the first violated constraint
 */
export function resolveConfiguration(
	input: ConfigurationInput,
	env: NodeJS.ProcessEnv = process.env,
): Configuration {
	const envKeyPath = env.STACKIT_SERVICE_ACCOUNT_KEY_PATH;
	const saKeyJson = input.saKeyJson ?? (envKeyPath != null && envKeyPath !== '' ? envKeyPath : DEFAULT_SA_KEY_JSON);

	const result = configurationSchema.safeParse({
		customerAccountId: input.customerAccountId,
		projectId: input.projectId,
		warning: input.warning ?? DEFAULT_WARNING_EUROS,
		critical: input.critical ?? DEFAULT_CRITICAL_EUROS,
		saKeyJson: expandHome(saKeyJson),
		skipDiscount: input.skipDiscount ?? false,
	});

	if (!result.success) {
		const message = result.error.issues[0]?.message ?? 'Invalid configuration';
		throw new InvalidConfigurationError(message);
	}

	return Object.freeze(result.data);
}

if (import.meta.vitest != null) {
	const required = { customerAccountId: 'account-1', projectId: 'project-1' };

	describe('resolveConfiguration', () => {
		it('should apply defaults', () => {
			const config = resolveConfiguration(required, {});
			expect(config).toEqual({
				customerAccountId: 'account-1',
				projectId: 'project-1',
				warning: 10,
				critical: 50,
				saKeyJson: DEFAULT_SA_KEY_JSON,
				skipDiscount: false,
			});
			expect(Object.isFrozen(config)).toBe(true);
		});

		it('should take the key path from the environment', () => {
			const config = resolveConfiguration(required, { STACKIT_SERVICE_ACCOUNT_KEY_PATH: '/etc/stackit/key.json' });
			expect(config.saKeyJson).toBe('/etc/stackit/key.json');
		});

		it('should prefer the command line key path over the environment', () => {
			const config = resolveConfiguration(
				{ ...required, saKeyJson: '/tmp/key.json' },
				{ STACKIT_SERVICE_ACCOUNT_KEY_PATH: '/etc/stackit/key.json' },
			);
			expect(config.saKeyJson).toBe('/tmp/key.json');
		});

		it('should expand the home directory', () => {
			const config = resolveConfiguration({ ...required, saKeyJson: '~/keys/sa.json' }, {});
			expect(config.saKeyJson).toBe(join(homedir(), 'keys', 'sa.json'));
		});

		it('should accept a zero warning threshold', () => {
			const config = resolveConfiguration({ ...required, warning: 0, critical: 0.01 }, {});
			expect(config.warning).toBe(0);
			expect(config.critical).toBe(0.01);
		});

		it('should reject a negative warning threshold', () => {
			expect(() => resolveConfiguration({ ...required, warning: -1 }, {}))
				.toThrow(new InvalidConfigurationError('Warning threshold must be >= 0.0'));
		});

		it('should report the warning sign before the threshold ordering', () => {
			expect(() => resolveConfiguration({ ...required, warning: -5, critical: -10 }, {}))
				.toThrow('Warning threshold must be >= 0.0');
		});

		it('should reject a critical threshold equal to the warning threshold', () => {
			expect(() => resolveConfiguration({ ...required, warning: 20, critical: 20 }, {}))
				.toThrow(new InvalidConfigurationError('Critical threshold must be > warning threshold'));
		});

		it('should reject a critical threshold below the warning threshold', () => {
			expect(() => resolveConfiguration({ ...required, warning: 20, critical: 5 }, {}))
				.toThrow('Critical threshold must be > warning threshold');
		});

		it('should reject malformed thresholds', () => {
			expect(() => resolveConfiguration({ ...required, warning: Number.NaN }, {}))
				.toThrow('Warning threshold must be a number');
		});

		it('should require both identifiers', () => {
			expect(() => resolveConfiguration({ projectId: 'project-1' }, {}))
				.toThrow('Customer account ID is required');
			expect(() => resolveConfiguration({ customerAccountId: 'account-1', projectId: '  ' }, {}))
				.toThrow('Project ID must not be empty');
		});
	});
}
