import process from 'node:process';
import { createConsola, LogLevels } from 'consola';

/**
 * Diagnostic logger
 *
 * Everything goes to stderr: stdout is reserved for the single status line the
 * monitoring system parses.
 */
export const logger = createConsola({
	level: LogLevels.warn,
	stdout: process.stderr,
	stderr: process.stderr,
});

export function enableVerboseLogging(): void {
	logger.level = LogLevels.debug;
}
