import type { Args } from 'gunshi';
import { DEFAULT_CRITICAL_EUROS, DEFAULT_SA_KEY_JSON, DEFAULT_WARNING_EUROS } from './_consts.ts';

/**
 * Parses a threshold argument in EUR
 *
 * Malformed values become NaN and are rejected by the configuration schema,
 * so every invalid threshold is reported the same way.
 * @param value - Raw argument value
 */
export function parseAmountArg(value: string): number {
	if (value.trim() === '') {
		return Number.NaN;
	}
	return Number(value);
}

/**
 * Command line arguments shared by the check and report commands
 */
export const sharedArgs = {
	customerAccountId: {
		type: 'string',
		description: 'STACKIT customer account ID (required)',
	},
	projectId: {
		type: 'string',
		description: 'STACKIT project ID (required)',
	},
	warning: {
		type: 'custom',
		short: 'w',
		description: `Warning threshold for 24h cost in EUR (default: ${DEFAULT_WARNING_EUROS.toFixed(2)})`,
		parse: parseAmountArg,
	},
	critical: {
		type: 'custom',
		short: 'c',
		description: `Critical threshold for 24h cost in EUR (default: ${DEFAULT_CRITICAL_EUROS.toFixed(2)})`,
		parse: parseAmountArg,
	},
	saKeyJson: {
		type: 'string',
		description: `Path to STACKIT credentials in JSON format (default: $STACKIT_SERVICE_ACCOUNT_KEY_PATH or ${DEFAULT_SA_KEY_JSON})`,
	},
	skipDiscount: {
		type: 'boolean',
		description: 'Skip discounted costs in calculation',
		default: false,
	},
	verbose: {
		type: 'boolean',
		description: 'Log diagnostics to stderr',
		default: false,
	},
} as const satisfies Args;

const THRESHOLD_FLAGS = new Map([
	['-w', '--warning'],
	['--warning', '--warning'],
	['-c', '--critical'],
	['--critical', '--critical'],
]);

const NEGATIVE_NUMBER_PATTERN = /^-(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Attaches a negative number to the threshold flag before it
 *
 * The argument tokenizer reads `-1` in `-w -1` as another option, which would
 * hide the sign check behind a "not a number" error.
 * @param argv - Raw arguments without the node and script paths
 */
export function joinNegativeThresholds(argv: readonly string[]): string[] {
	const joined: string[] = [];
	for (let index = 0; index < argv.length; index++) {
		const arg = argv[index] ?? '';
		if (arg === '--') {
			joined.push(...argv.slice(index));
			break;
		}

		const flag = THRESHOLD_FLAGS.get(arg);
		const next = argv[index + 1];
		if (flag != null && next != null && NEGATIVE_NUMBER_PATTERN.test(next)) {
			joined.push(`${flag}=${next}`);
			index++;
			continue;
		}
		joined.push(arg);
	}
	return joined;
}

/**
 * Shared command configuration for Gunshi CLI commands
 */
export const sharedCommandConfig = {
	args: sharedArgs,
	toKebab: true,
} as const;

if (import.meta.vitest != null) {
	describe('parseAmountArg', () => {
		it('should parse integer and decimal amounts', () => {
			expect(parseAmountArg('10')).toBe(10);
			expect(parseAmountArg('12.5')).toBe(12.5);
			expect(parseAmountArg('0')).toBe(0);
		});

		it('should keep negative amounts for the schema to reject', () => {
			expect(parseAmountArg('-1')).toBe(-1);
		});

		it('should turn malformed amounts into NaN', () => {
			expect(parseAmountArg('ten')).toBeNaN();
			expect(parseAmountArg('')).toBeNaN();
			expect(parseAmountArg('   ')).toBeNaN();
		});
	});

	describe('joinNegativeThresholds', () => {
		it('should attach negative numbers to threshold flags', () => {
			expect(joinNegativeThresholds(['-w', '-1', '--critical', '-0.5'])).toEqual(['--warning=-1', '--critical=-0.5']);
			expect(joinNegativeThresholds(['--warning', '-2', '-c', '-.5'])).toEqual(['--warning=-2', '--critical=-.5']);
		});

		it('should leave other arguments alone', () => {
			expect(joinNegativeThresholds(['-w', '5', '--skip-discount', '-c', '--verbose'])).toEqual(['-w', '5', '--skip-discount', '-c', '--verbose']);
			expect(joinNegativeThresholds(['--project-id', '-1'])).toEqual(['--project-id', '-1']);
		});

		it('should stop at the end of options marker', () => {
			expect(joinNegativeThresholds(['--', '-w', '-1'])).toEqual(['--', '-w', '-1']);
		});
	});
}
