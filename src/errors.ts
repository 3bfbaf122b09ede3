/**
 * Base class for failures the probe knows how to report
 */
export class ProbeError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Command line input violates a constraint; raised before any network access
 */
export class InvalidConfigurationError extends ProbeError {}

/**
 * The service account key could not be turned into an access token
 */
export class AuthenticationError extends ProbeError {}

/**
 * The cost API request failed or returned an unusable response
 */
export class CostServiceError extends ProbeError {}

/**
 * The cost API returned a period outside the queried days
 */
export class UnexpectedReportDateError extends ProbeError {
	readonly date: string;

	constructor(date: string) {
		super(`Cost API returned unexpected date: ${date}`);
		this.date = date;
	}
}

/**
 * Extracts a one-line message from anything thrown
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
