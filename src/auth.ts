import type { ServiceAccountKey } from './_schemas.ts';
import type { Session } from './_types.ts';
import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import process from 'node:process';
import jwt from 'jsonwebtoken';
import { ASSERTION_LIFETIME_SECONDS, DEFAULT_TOKEN_URL, JWT_BEARER_GRANT_TYPE } from './_consts.ts';
import { serviceAccountKeySchema, tokenResponseSchema } from './_schemas.ts';
import { AuthenticationError, errorMessage } from './errors.ts';
import { logger } from './logger.ts';

export type AuthOptions = {
	tokenUrl?: string;
	fetch?: typeof fetch;
};

/**
 * Reads and validates a service account key file
 */
export async function loadServiceAccountKey(keyPath: string): Promise<ServiceAccountKey> {
	let content: string;
	try {
		content = await readFile(keyPath, 'utf-8');
	}
	catch (error) {
		throw new AuthenticationError(`Cannot read service account key ${keyPath}: ${errorMessage(error)}`, { cause: error });
	}

	let data: unknown;
	try {
		data = JSON.parse(content);
	}
	catch (error) {
		throw new AuthenticationError(`Service account key ${keyPath} is not valid JSON`, { cause: error });
	}

	const result = serviceAccountKeySchema.safeParse(data);
	if (!result.success) {
		const issue = result.error.issues[0];
		const detail = issue == null ? 'invalid format' : `${issue.path.join('.')}: ${issue.message}`;
		throw new AuthenticationError(`Invalid service account key ${keyPath} (${detail})`);
	}
	return result.data;
}

/**
 * Signs the self-issued assertion exchanged for an access token
 */
export function createAssertion(key: ServiceAccountKey): string {
	const { kid, iss, sub, aud, privateKey } = key.credentials;
	try {
		return jwt.sign({}, privateKey, {
			algorithm: 'RS512',
			keyid: kid,
			issuer: iss,
			subject: sub,
			audience: aud,
			jwtid: randomUUID(),
			expiresIn: ASSERTION_LIFETIME_SECONDS,
		});
	}
	catch (error) {
		throw new AuthenticationError(`Cannot sign service account assertion: ${errorMessage(error)}`, { cause: error });
	}
}

/**
 * Exchanges a service account key for an access token
 * @param keyPath - Path to the key JSON downloaded from the STACKIT portal
 * @throws AuthenticationError for any failure on the way
 */
export async function authenticate(keyPath: string, options: AuthOptions = {}): Promise<Session> {
	const tokenUrl = options.tokenUrl ?? (process.env.STACKIT_TOKEN_BASEURL || DEFAULT_TOKEN_URL);
	const fetchFn = options.fetch ?? fetch;

	const key = await loadServiceAccountKey(keyPath);
	const assertion = createAssertion(key);
	logger.debug(`Requesting access token for ${key.credentials.sub} from ${tokenUrl}`);

	let response: Response;
	try {
		response = await fetchFn(tokenUrl, {
			method: 'POST',
			headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
			body: new URLSearchParams({
				grant_type: JWT_BEARER_GRANT_TYPE,
				assertion,
			}),
		});
	}
	catch (error) {
		throw new AuthenticationError(`Token request failed: ${errorMessage(error)}`, { cause: error });
	}

	if (!response.ok) {
		throw new AuthenticationError(`Token request failed: ${response.status} ${response.statusText}`.trimEnd());
	}

	let body: unknown;
	try {
		body = await response.json();
	}
	catch (error) {
		throw new AuthenticationError('Token endpoint returned invalid JSON', { cause: error });
	}

	const result = tokenResponseSchema.safeParse(body);
	if (!result.success) {
		throw new AuthenticationError('Token endpoint returned no access token');
	}
	return { accessToken: result.data.access_token };
}

/**
 * Credential loader bound to the environment's token endpoint
 */
export const loadSession = async (keyPath: string): Promise<Session> => authenticate(keyPath);

if (import.meta.vitest != null) {
	const { generateKeyPairSync } = await import('node:crypto');
	const { mkdtempSync, rmSync, writeFileSync } = await import('node:fs');
	const { tmpdir } = await import('node:os');
	const { join } = await import('node:path');

	const { privateKey, publicKey } = generateKeyPairSync('rsa', {
		modulusLength: 2048,
		privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
		publicKeyEncoding: { type: 'spki', format: 'pem' },
	});

	const keyFile = {
		id: 'key-id',
		credentials: {
			kid: 'test-kid',
			iss: 'probe@sa.stackit.cloud',
			sub: 'service-account-id',
			aud: 'https://service-account.example.test',
			privateKey,
		},
	};

	const tokenUrl = 'https://token.example.test/token';
	let dir: string;

	const writeKey = (name: string, content: string): string => {
		const path = join(dir, name);
		writeFileSync(path, content);
		return path;
	};

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'stackit-cost-probe-'));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	describe('loadServiceAccountKey', () => {
		it('should load a valid key file', async () => {
			const key = await loadServiceAccountKey(writeKey('sa-key.json', JSON.stringify(keyFile)));
			expect(key.credentials.kid).toBe('test-kid');
		});

		it('should fail for a missing file', async () => {
			const path = join(dir, 'missing.json');
			await expect(loadServiceAccountKey(path)).rejects.toThrow(`Cannot read service account key ${path}`);
		});

		it('should fail for invalid JSON', async () => {
			const path = writeKey('broken.json', '{ not json');
			await expect(loadServiceAccountKey(path)).rejects.toThrow(new AuthenticationError(`Service account key ${path} is not valid JSON`));
		});

		it('should fail for a key without private key', async () => {
			const { privateKey: _, ...credentials } = keyFile.credentials;
			const path = writeKey('public-only.json', JSON.stringify({ credentials }));
			await expect(loadServiceAccountKey(path)).rejects.toThrow(
				`Invalid service account key ${path} (credentials.privateKey: Service account key contains no private key)`,
			);
		});
	});

	describe('createAssertion', () => {
		it('should sign an RS512 assertion with the key claims', () => {
			const assertion = createAssertion(keyFile);
			const decoded = jwt.verify(assertion, publicKey, { algorithms: ['RS512'], complete: true });
			expect(decoded.header).toMatchObject({ alg: 'RS512', kid: 'test-kid' });
			expect(decoded.payload).toMatchObject({
				iss: 'probe@sa.stackit.cloud',
				sub: 'service-account-id',
				aud: 'https://service-account.example.test',
			});
		});

		it('should fail for an unusable private key', () => {
			const broken = { credentials: { ...keyFile.credentials, privateKey: 'not a key' } };
			expect(() => createAssertion(broken)).toThrow(AuthenticationError);
		});
	});

	describe('authenticate', () => {
		it('should exchange the assertion for an access token', async () => {
			const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(
				new Response(JSON.stringify({ access_token: 'test-token', token_type: 'Bearer', expires_in: 3600 }), { status: 200 }),
			);
			const path = writeKey('sa-key.json', JSON.stringify(keyFile));

			const session = await authenticate(path, { tokenUrl, fetch: fetchMock });

			expect(session).toEqual({ accessToken: 'test-token' });
			expect(fetchMock).toHaveBeenCalledTimes(1);
			const call = fetchMock.mock.calls[0];
			expect(call?.[0]).toBe(tokenUrl);
			const init = call?.[1];
			expect(init?.method).toBe('POST');
			const form = new URLSearchParams(String(init?.body));
			expect(form.get('grant_type')).toBe(JWT_BEARER_GRANT_TYPE);
			expect(jwt.verify(form.get('assertion') ?? '', publicKey, { algorithms: ['RS512'] })).toMatchObject({ sub: 'service-account-id' });
		});

		it('should report a rejected token request', async () => {
			const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(
				new Response('denied', { status: 401, statusText: 'Unauthorized' }),
			);
			const path = writeKey('sa-key.json', JSON.stringify(keyFile));

			await expect(authenticate(path, { tokenUrl, fetch: fetchMock }))
				.rejects
				.toThrow(new AuthenticationError('Token request failed: 401 Unauthorized'));
		});

		it('should report a transport failure', async () => {
			const fetchMock = vi.fn<typeof fetch>().mockRejectedValueOnce(new TypeError('fetch failed'));
			const path = writeKey('sa-key.json', JSON.stringify(keyFile));

			await expect(authenticate(path, { tokenUrl, fetch: fetchMock }))
				.rejects
				.toThrow('Token request failed: fetch failed');
		});

		it('should report a response without access token', async () => {
			const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(
				new Response(JSON.stringify({ token_type: 'Bearer' }), { status: 200 }),
			);
			const path = writeKey('sa-key.json', JSON.stringify(keyFile));

			await expect(authenticate(path, { tokenUrl, fetch: fetchMock }))
				.rejects
				.toThrow('Token endpoint returned no access token');
		});

		it('should not contact the token endpoint without a usable key', async () => {
			const fetchMock = vi.fn<typeof fetch>();
			await expect(authenticate(join(dir, 'missing.json'), { tokenUrl, fetch: fetchMock })).rejects.toThrow(AuthenticationError);
			expect(fetchMock).not.toHaveBeenCalled();
		});
	});
}
