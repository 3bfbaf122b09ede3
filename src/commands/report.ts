import process from 'node:process';
import { define } from 'gunshi';
import pc from 'picocolors';
import { renderCostReport } from '../_table.ts';
import { sharedCommandConfig } from '../_shared-args.ts';
import { MonitoringStatus } from '../_types.ts';
import { errorMessage } from '../errors.ts';
import { enableVerboseLogging, logger } from '../logger.ts';
import { collectCosts, defaultDependencies } from '../probe.ts';
import { resolveOrReport } from './check.ts';

export const reportCommand = define({
	name: 'report',
	description: 'Show yesterday\'s and today\'s project costs',
	...sharedCommandConfig,
	args: {
		...sharedCommandConfig.args,
		json: {
			type: 'boolean',
			short: 'j',
			description: 'Output in JSON format',
			default: false,
		},
	},
	async run(ctx) {
		const { json, verbose } = ctx.values;
		if (verbose) {
			enableVerboseLogging();
		}

		const config = resolveOrReport(ctx.values);
		if (config == null) {
			return;
		}

		let result: Awaited<ReturnType<typeof collectCosts>>;
		try {
			result = await collectCosts(config, defaultDependencies, new Date());
		}
		catch (error) {
			logger.error(errorMessage(error));
			logger.debug(error);
			process.exitCode = MonitoringStatus.UNKNOWN;
			return;
		}

		const { days, evaluation } = result;
		if (json) {
			const jsonOutput = {
				projectId: config.projectId,
				days,
				evaluation,
			};
			process.stdout.write(`${JSON.stringify(jsonOutput, null, 2)}\n`);
		}
		else {
			process.stdout.write(pc.cyan(`STACKIT Cost Report - Project ${config.projectId}\n\n`));
			process.stdout.write(`${renderCostReport(days, evaluation, config.skipDiscount)}\n`);
		}
		process.exitCode = MonitoringStatus[evaluation.status];
	},
});
