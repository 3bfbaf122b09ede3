/**
 * Monitoring plugin states, valued by their exit code
 */
export const MonitoringStatus = {
	OK: 0,
	WARNING: 1,
	CRITICAL: 2,
	UNKNOWN: 3,
} as const;

export type MonitoringStatusName = keyof typeof MonitoringStatus;

/**
 * Resolved command line configuration
 */
export type Configuration = Readonly<{
	customerAccountId: string;
	projectId: string;
	warning: number;
	critical: number;
	saKeyJson: string;
	skipDiscount: boolean;
}>;

/**
 * One day of cost as reported by the cost API, amounts in euro cents
 */
export type CostReportEntry = {
	date: string;
	charge: number;
	discount: number;
};

/**
 * Per-day sums in EUR
 */
export type DayAccumulator = {
	charge: number;
	discount: number;
};

/**
 * Day accumulators keyed by YYYY-MM-DD
 */
export type DailyTotals = Map<string, DayAccumulator>;

/**
 * The two UTC days a probe run covers
 */
export type ReportDays = Readonly<{
	today: string;
	yesterday: string;
}>;

/**
 * Outcome of comparing the reported cost against the thresholds
 */
export type CostEvaluation = {
	status: Exclude<MonitoringStatusName, 'UNKNOWN'>;
	reportedCost: number;
	threshold?: number;
	today: DayAccumulator;
	yesterday: DayAccumulator;
};

/**
 * Authenticated handle for the STACKIT APIs
 */
export type Session = {
	accessToken: string;
};

/**
 * Parameters of a project cost query
 */
export type CostQuery = {
	customerAccountId: string;
	projectId: string;
	from: string;
	to: string;
	granularity: 'daily';
	depth: 'project';
	includeZeroCosts: boolean;
};

export type CredentialLoader = (keyPath: string) => Promise<Session>;

export type CostQueryService = (session: Session, query: CostQuery) => Promise<CostReportEntry[]>;
