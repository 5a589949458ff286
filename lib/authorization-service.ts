/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { Headers } from 'node-fetch';
import { DockerJsonClient } from './docker-json-client';
import { AuthorizationError } from './errors';
import { Lazy, Mutex } from './lazy';
import { Logger, silentLogger } from './logger';
import { TokenResponse, parseBody, tokenResponseSchema } from './schemas';
import { AuthInfo } from './types';
import { parseWWWAuthenticate } from './www-authenticate';

/** How the registry answered an unauthenticated `GET /v2/`. */
export type Challenge =
	| { type: 'None' }
	| { type: 'Basic' }
	| { type: 'Bearer'; realm?: string; service?: string };

export interface AuthorizationServiceOpts {
	api: DockerJsonClient;
	/** Service identity sent to the token endpoint when the challenge names none. */
	registry: string;
	/** Token endpoint; overrides the realm of the challenge. */
	url?: string;
	username?: string;
	password?: string;
	/** Use http:// for a realm given without a scheme. */
	insecure?: boolean;
	log?: Logger;
}

/*
 * Set the "Authorization" HTTP header into the headers object from the given
 * auth info.
 * - Bearer auth if `token`.
 * - Else, Basic auth if `username`.
 * - Else, if the authorization key exists, then it is removed from headers.
 */
export function setAuthHeaderFromAuthInfo(headers: Headers, authInfo: AuthInfo) {
	if (authInfo.type === 'Bearer') {
		headers.set('authorization', 'Bearer ' + authInfo.token);
	} else if (authInfo.type === 'Basic') {
		const credentials = `${authInfo.username}:${authInfo.password}`;
		headers.set(
			'authorization',
			'Basic ' + Buffer.from(credentials).toString('base64'),
		);
	} else {
		headers.delete('authorization');
	}
	return headers;
}

/**
 * Holds the one bearer token of a registry session and renews it whenever a
 * call needs a different scope than the token was issued for.
 *
 * See <https://distribution.github.io/distribution/spec/auth/token/>.
 */
export class AuthorizationService {
	readonly registry: string;
	/** Scope the next authenticated call needs. */
	desiredScope: string | null = null;
	private _token: string | null = null;
	private _scope: string | null = null;
	private _renewals = 0;
	private readonly _api: DockerJsonClient;
	private readonly _url?: string;
	private readonly _username?: string;
	private readonly _password?: string;
	private readonly _insecure: boolean;
	private readonly _log: Logger;
	private readonly _challenge = new Lazy(() => this._probe());
	private readonly _lock = new Mutex();

	constructor(opts: AuthorizationServiceOpts) {
		this.registry = opts.registry;
		this._api = opts.api;
		this._url = opts.url || undefined;
		// Credentials only count as a pair.
		if (opts.username !== undefined && opts.password !== undefined) {
			this._username = opts.username;
			this._password = opts.password;
		}
		this._insecure = Boolean(opts.insecure);
		this._log = opts.log ?? silentLogger;
	}

	get token(): string | null {
		return this._token;
	}

	/** Scope the current token was issued for. */
	get scope(): string | null {
		return this._scope;
	}

	/** Number of tokens obtained so far. */
	get renewals(): number {
		return this._renewals;
	}

	setDesiredScope(scope: string) {
		this.desiredScope = scope;
	}

	/**
	 * Whether the registry wants bearer tokens. The first call probes
	 * `GET /v2/` without credentials; the answer is kept once obtained.
	 */
	async tokenRequired(): Promise<boolean> {
		const challenge = await this._challenge.get();
		return challenge.type === 'Bearer';
	}

	/** Credentials to send with a call that needs `scope`. */
	async authInfo(scope: string): Promise<AuthInfo> {
		if (await this.tokenRequired()) {
			return { type: 'Bearer', token: await this.getToken(scope) };
		}
		if (this._username !== undefined && this._password !== undefined) {
			return {
				type: 'Basic',
				username: this._username,
				password: this._password,
			};
		}
		return { type: 'None' };
	}

	/**
	 * A token valid for `scope`. The held token is reused when it was issued
	 * for exactly that scope; otherwise a new one is requested and replaces
	 * it. Concurrent callers are served one at a time.
	 *
	 * @throws {AuthorizationError} when the token endpoint cannot be reached,
	 *      rejects the credentials or answers without a token.
	 */
	async getToken(scope: string | null = this.desiredScope): Promise<string> {
		if (scope === null) {
			throw new AuthorizationError('no scope requested for the token');
		}
		return this._lock.runExclusive(async () => {
			if (this._token !== null && this._scope === scope) {
				return this._token;
			}
			this._log.debug('Getting new token', { scope });
			const token = await this._renew(scope);
			this._token = token;
			this._scope = scope;
			this._renewals += 1;
			return token;
		});
	}

	private async _probe(): Promise<Challenge> {
		const res = await this._api.request({
			method: 'GET',
			path: '/v2/',
			expectStatus: [200, 401, 404],
		});
		await res.dockerBody();
		if (res.status !== 401) {
			this._log.debug('Registry requires no token', { status: res.status });
			return { type: 'None' };
		}

		const header = res.headers.get('www-authenticate');
		if (!header) {
			if (this._url) {
				return { type: 'Bearer' };
			}
			throw await res.dockerThrowable(
				'missing WWW-Authenticate header from "GET /v2/" (see ' +
					'https://docs.docker.com/registry/spec/api/#api-version-check)',
			);
		}

		const challenge = parseWWWAuthenticate(header);
		switch (challenge.scheme.toLowerCase()) {
			case 'bearer':
				this._log.debug('Registry requires a bearer token');
				return {
					type: 'Bearer',
					realm: challenge.params.realm,
					service: challenge.params.service,
				};
			case 'basic':
				return { type: 'Basic' };
			default:
				throw new AuthorizationError(
					`unsupported auth scheme: "${challenge.scheme}"`,
				);
		}
	}

	/*
	 * - GET $realm
	 *      ?service=$service
	 *      &scope=$scope
	 *      (&account=$username)
	 *   Authorization: Basic ...
	 *
	 * See: docker/docker.git:registry/token.go
	 */
	private async _renew(scope: string): Promise<string> {
		const challenge = await this._challenge.get();
		const realm =
			this._url ?? (challenge.type === 'Bearer' ? challenge.realm : undefined);
		if (!realm) {
			throw new AuthorizationError(
				`no token endpoint known for registry ${this.registry}`,
			);
		}
		const service =
			(challenge.type === 'Bearer' ? challenge.service : undefined) ??
			this.registry;

		const tokenUrl = new URL(this._withScheme(realm));
		tokenUrl.searchParams.set('service', service);
		tokenUrl.searchParams.append('scope', scope); // intentionally singular
		const headers = new Headers();
		if (this._username !== undefined && this._password !== undefined) {
			tokenUrl.searchParams.set('account', this._username);
			setAuthHeaderFromAuthInfo(headers, {
				type: 'Basic',
				username: this._username,
				password: this._password,
			});
		}

		let body: TokenResponse;
		try {
			const resp = await this._api.request({
				method: 'GET',
				path: tokenUrl.toString(),
				headers,
				expectStatus: [200],
			});
			body = parseBody(tokenResponseSchema, await resp.dockerJson(), 'token response');
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err);
			throw new AuthorizationError(
				`Registry auth failed for scope "${scope}": ${reason}`,
				{ cause: err },
			);
		}

		const token = body.token ?? body.access_token;
		if (!token) {
			throw new AuthorizationError(
				'authorization server did not include a token in the response',
			);
		}
		return token;
	}

	// Add an https:// prefix (or http://) if the realm has none.
	private _withScheme(realm: string) {
		const match = /^(\w+):\/\//.exec(realm);
		if (!match) {
			return (this._insecure ? 'http' : 'https') + '://' + realm;
		}
		if (match[1] !== 'http' && match[1] !== 'https') {
			throw new AuthorizationError(
				`unsupported scheme for token endpoint "${realm}": "${match[1]}"`,
			);
		}
		return realm;
	}
}
