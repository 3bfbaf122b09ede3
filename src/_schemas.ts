import * as z from 'zod';

/**
 * Command line configuration validation schema
 *
 * Field rules are checked before the threshold ordering, so a negative warning
 * threshold is reported ahead of a critical threshold below it.
 */
export const configurationSchema = z.object({
	customerAccountId: z.string({ required_error: 'Customer account ID is required' })
		.trim()
		.min(1, 'Customer account ID must not be empty'),
	projectId: z.string({ required_error: 'Project ID is required' })
		.trim()
		.min(1, 'Project ID must not be empty'),
	warning: z.number({ invalid_type_error: 'Warning threshold must be a number' })
		.finite('Warning threshold must be a finite number')
		.min(0, 'Warning threshold must be >= 0.0'),
	critical: z.number({ invalid_type_error: 'Critical threshold must be a number' })
		.finite('Critical threshold must be a finite number'),
	saKeyJson: z.string().min(1, 'Service account key path must not be empty'),
	skipDiscount: z.boolean(),
}).refine(config => config.critical > config.warning, {
	message: 'Critical threshold must be > warning threshold',
	path: ['critical'],
});

/**
 * STACKIT service account key file, as downloaded from the portal
 */
export const serviceAccountKeySchema = z.object({
	id: z.string().optional(),
	credentials: z.object({
		kid: z.string().min(1),
		iss: z.string().min(1),
		sub: z.string().min(1),
		aud: z.string().min(1),
		privateKey: z.string({ required_error: 'Service account key contains no private key' })
			.min(1, 'Service account key contains no private key'),
	}).passthrough(),
}).passthrough();

/**
 * Token endpoint response
 */
export const tokenResponseSchema = z.object({
	access_token: z.string().min(1),
	token_type: z.string().optional(),
	expires_in: z.number().optional(),
}).passthrough();

/**
 * One reporting period of a cost API item
 */
export const reportDataSchema = z.object({
	charge: z.number(),
	discount: z.number(),
	quantity: z.number().optional(),
	timePeriod: z.object({
		start: z.string(),
		end: z.string(),
	}).passthrough(),
}).passthrough();

/**
 * Project cost item returned by the cost API
 */
export const projectCostSchema = z.object({
	customerAccountId: z.string().optional(),
	projectId: z.string().optional(),
	projectName: z.string().optional(),
	totalCharge: z.number().optional(),
	totalDiscount: z.number().optional(),
	reportData: z.array(reportDataSchema).optional(),
}).passthrough();

/**
 * Type inference from Zod schemas
 */
export type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;
export type TokenResponse = z.infer<typeof tokenResponseSchema>;
export type ReportData = z.infer<typeof reportDataSchema>;
export type ProjectCost = z.infer<typeof projectCostSchema>;
