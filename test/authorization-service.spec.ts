/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import * as assert from 'assert';
import {
	AuthorizationService,
	AuthorizationServiceOpts,
} from '../lib/authorization-service';
import { DockerJsonClient } from '../lib/docker-json-client';
import {
	AuthorizationError,
	TransportError,
	UnauthorizedError,
} from '../lib/errors';
import { MockRegistry, MockRegistryOpts, basic } from './mock-registry';

const SCOPE_APP = 'repository:app:*';
const SCOPE_CATALOG = 'registry:catalog:*';

jest.setTimeout(10 * 1000);

describe('AuthorizationService', function () {
	let mock: MockRegistry;
	let api: DockerJsonClient;

	async function setup(
		mockOpts: MockRegistryOpts,
		authOpts: Partial<AuthorizationServiceOpts> = {},
	) {
		mock = await MockRegistry.start(mockOpts);
		api = new DockerJsonClient({ url: mock.url, userAgent: 'test' });
		return new AuthorizationService({
			api,
			registry: '127.0.0.1',
			...authOpts,
		});
	}

	afterEach(async () => {
		api.close();
		await mock.stop();
	});

	it('probes once and detects bearer auth', async () => {
		const auth = await setup({ auth: 'bearer' });
		assert.strictEqual(await auth.tokenRequired(), true);
		assert.strictEqual(await auth.tokenRequired(), true);
		assert.strictEqual(mock.count('GET', '/v2/'), 1);
		const [probe] = mock.find('GET', '/v2/');
		assert.strictEqual(probe.headers.authorization, undefined);
	});

	it('needs no token from an open registry', async () => {
		const auth = await setup({ auth: 'none' });
		assert.strictEqual(await auth.tokenRequired(), false);
		assert.deepStrictEqual(await auth.authInfo(SCOPE_APP), { type: 'None' });
		assert.strictEqual(mock.count('GET', '/token'), 0);
	});

	it('sends basic credentials to a basic-auth registry', async () => {
		const auth = await setup(
			{ auth: 'basic', username: 'alice', password: 'test-secret' },
			{ username: 'alice', password: 'test-secret' },
		);
		assert.strictEqual(await auth.tokenRequired(), false);
		assert.deepStrictEqual(await auth.authInfo(SCOPE_APP), {
			type: 'Basic',
			username: 'alice',
			password: 'test-secret',
		});
	});

	it('ignores a username without a password', async () => {
		const auth = await setup({ auth: 'none' }, { username: 'alice' });
		assert.deepStrictEqual(await auth.authInfo(SCOPE_APP), { type: 'None' });
	});

	it('renews only when the scope changes', async () => {
		const auth = await setup({ auth: 'bearer' });

		assert.strictEqual(await auth.getToken(SCOPE_APP), 'token-1');
		assert.strictEqual(auth.renewals, 1);
		assert.strictEqual(auth.scope, SCOPE_APP);

		assert.strictEqual(await auth.getToken(SCOPE_APP), 'token-1');
		assert.strictEqual(auth.renewals, 1);

		assert.strictEqual(await auth.getToken(SCOPE_CATALOG), 'token-2');
		assert.strictEqual(auth.renewals, 2);
		assert.strictEqual(auth.scope, SCOPE_CATALOG);
		assert.strictEqual(auth.token, 'token-2');

		assert.strictEqual(await auth.getToken(SCOPE_CATALOG), 'token-2');
		assert.strictEqual(mock.count('GET', '/token'), 2);
	});

	it('uses the desired scope by default', async () => {
		const auth = await setup({ auth: 'bearer' });
		auth.setDesiredScope(SCOPE_CATALOG);
		assert.strictEqual(auth.desiredScope, SCOPE_CATALOG);
		await auth.getToken();
		assert.strictEqual(auth.scope, SCOPE_CATALOG);
		assert.strictEqual(mock.issuedTokens.get('token-1'), SCOPE_CATALOG);
	});

	it('refuses to get a token for no scope', async () => {
		const auth = await setup({ auth: 'bearer' });
		await assert.rejects(auth.getToken(), AuthorizationError);
	});

	it('asks the token endpoint with service, scope and account', async () => {
		const auth = await setup(
			{ auth: 'bearer', username: 'alice', password: 'test-secret' },
			{ username: 'alice', password: 'test-secret' },
		);
		assert.deepStrictEqual(await auth.authInfo(SCOPE_APP), {
			type: 'Bearer',
			token: 'token-1',
		});

		const [tokenReq] = mock.find('GET', '/token');
		assert.strictEqual(tokenReq.url.searchParams.get('service'), 'mock-registry');
		assert.strictEqual(tokenReq.url.searchParams.get('scope'), SCOPE_APP);
		assert.strictEqual(tokenReq.url.searchParams.get('account'), 'alice');
		assert.strictEqual(
			tokenReq.headers.authorization,
			basic('alice', 'test-secret'),
		);
	});

	it('fails with AuthorizationError on rejected credentials', async () => {
		const auth = await setup(
			{ auth: 'bearer', username: 'alice', password: 'test-secret' },
			{ username: 'alice', password: 'wrong' },
		);
		const err = await auth.getToken(SCOPE_APP).then(
			() => assert.fail('expected a rejection'),
			(e: unknown) => e,
		);
		assert.ok(err instanceof AuthorizationError);
		assert.ok(err.cause instanceof UnauthorizedError);
		assert.match(err.message, /incorrect username or password/);
		assert.strictEqual(auth.token, null);
		assert.strictEqual(auth.renewals, 0);
	});

	it('fails with AuthorizationError when the endpoint is unreachable', async () => {
		const auth = await setup(
			{ auth: 'bearer' },
			{ url: 'http://127.0.0.1:1/token' },
		);
		await assert.rejects(auth.getToken(SCOPE_APP), AuthorizationError);
		assert.strictEqual(auth.token, null);
	});

	it('uses the configured endpoint when the challenge is missing', async () => {
		const auth = await setup({ auth: 'bearer', omitChallenge: true });
		await assert.rejects(auth.tokenRequired(), UnauthorizedError);

		const withUrl = new AuthorizationService({
			api,
			registry: 'mock-registry',
			url: `${mock.url}/token`,
		});
		assert.strictEqual(await withUrl.tokenRequired(), true);
		assert.strictEqual(await withUrl.getToken(SCOPE_APP), 'token-1');
		const [tokenReq] = mock.find('GET', '/token');
		assert.strictEqual(tokenReq.url.searchParams.get('service'), 'mock-registry');
	});

	it('reaches a realm without a scheme over http when insecure', async () => {
		const auth = await setup({ auth: 'bearer' }, { insecure: true });
		mock.realm = `${mock.url.slice('http://'.length)}/token`;
		assert.strictEqual(await auth.getToken(SCOPE_APP), 'token-1');
		assert.strictEqual(mock.count('GET', '/token'), 1);
	});

	it('reaches a realm without a scheme over https by default', async () => {
		const auth = await setup({ auth: 'bearer' });
		mock.realm = `${mock.url.slice('http://'.length)}/token`;
		const err = await auth.getToken(SCOPE_APP).then(
			() => assert.fail('expected a rejection'),
			(e: unknown) => e,
		);
		assert.ok(err instanceof AuthorizationError);
		assert.ok(err.cause instanceof TransportError);
		assert.strictEqual(mock.count('GET', '/token'), 0);
	});

	it('rejects a realm with another scheme', async () => {
		const auth = await setup({ auth: 'bearer' });
		mock.realm = 'ftp://127.0.0.1/token';
		await assert.rejects(
			auth.getToken(SCOPE_APP),
			(err: unknown) =>
				err instanceof AuthorizationError &&
				err.message ===
					'unsupported scheme for token endpoint "ftp://127.0.0.1/token": "ftp"',
		);
		assert.strictEqual(mock.count('GET', '/token'), 0);
	});

	it('serializes concurrent renewals', async () => {
		const auth = await setup({ auth: 'bearer' });
		const tokens = await Promise.all([
			auth.getToken(SCOPE_APP),
			auth.getToken(SCOPE_CATALOG),
			auth.getToken(SCOPE_CATALOG),
		]);
		assert.deepStrictEqual(tokens, ['token-1', 'token-2', 'token-2']);
		assert.strictEqual(auth.renewals, 2);
		assert.strictEqual(auth.scope, SCOPE_CATALOG);
	});
});
