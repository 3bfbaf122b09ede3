/**
 * Application constants
 */
import { homedir } from 'node:os';
import { join } from 'node:path';

// Thresholds for the higher of yesterday's and today's cost, in EUR
export const DEFAULT_WARNING_EUROS = 10.0;
export const DEFAULT_CRITICAL_EUROS = 50.0;

export const CENTS_PER_EURO = 100;

export const DEFAULT_SA_KEY_JSON = join(homedir(), '.stackit', 'sa-key.json');

// STACKIT endpoints, overridable through the environment
export const DEFAULT_COST_API_URL = 'https://cost.api.stackit.cloud';
export const DEFAULT_TOKEN_URL = 'https://service-account.api.stackit.cloud/token';

export const JWT_BEARER_GRANT_TYPE = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
export const ASSERTION_LIFETIME_SECONDS = 600;

export const CURRENCY = 'EUR';
