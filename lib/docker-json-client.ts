/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import * as http from 'http';
import * as https from 'https';
import { Readable } from 'stream';
import fetch, { Headers, RequestRedirect, Response } from 'node-fetch';
import {
	HttpError,
	InvalidContentError,
	TransportError,
	getHttpError,
} from './errors';
import { Logger, silentLogger } from './logger';
import { errorBodySchema } from './schemas';
import { RegistryError } from './types';

// --- API

interface HttpReqOpts {
	method: 'GET' | 'DELETE';
	path: string;
	headers?: Headers;
	/** Accepted statuses; any 2xx when omitted. */
	expectStatus?: number[];
	redirect?: RequestRedirect;
}

/**
 * HTTP session against one registry: a base URL plus the keep-alive agents
 * every request goes through.
 */
export class DockerJsonClient {
	accept: string;
	url: string;
	userAgent: string;
	timeout: number;
	log: Logger;
	private readonly _httpAgent: http.Agent;
	private readonly _httpsAgent: https.Agent;

	constructor(options: {
		url: string;
		userAgent: string;
		accept?: string;
		rejectUnauthorized?: boolean;
		timeout?: number;
		log?: Logger;
	}) {
		this.accept = options.accept ?? 'application/json';
		this.url = options.url;
		this.userAgent = options.userAgent;
		this.timeout = options.timeout ?? 0;
		this.log = options.log ?? silentLogger;
		this._httpAgent = new http.Agent({ keepAlive: true });
		this._httpsAgent = new https.Agent({
			keepAlive: true,
			rejectUnauthorized: options.rejectUnauthorized ?? true,
		});
	}

	async request(opts: HttpReqOpts) {
		const headers = new Headers(opts.headers);
		if (!headers.has('accept') && this.accept) {
			headers.set('accept', this.accept);
		}
		headers.set('user-agent', this.userAgent);

		const url = new URL(opts.path, this.url);
		this.log.debug(`${opts.method} ${url.pathname}`);

		let rawResp: Response;
		try {
			rawResp = await fetch(url.toString(), {
				method: opts.method,
				headers,
				redirect: opts.redirect ?? 'manual',
				timeout: this.timeout,
				agent: (parsedUrl) =>
					parsedUrl.protocol === 'http:' ? this._httpAgent : this._httpsAgent,
			});
		} catch (err) {
			this._releaseIdle();
			const reason = err instanceof Error ? err.message : String(err);
			throw new TransportError(`${opts.method} ${url.pathname}: ${reason}`, {
				cause: err,
			});
		}
		this.log.debug(`${rawResp.status} ${rawResp.statusText}`);

		const resp = new DockerResponse(rawResp.body, {
			headers: rawResp.headers,
			status: rawResp.status,
			statusText: rawResp.statusText,
			url: rawResp.url,
			timeout: this.timeout,
		});

		const ok = opts.expectStatus
			? opts.expectStatus.includes(rawResp.status)
			: rawResp.ok;
		if (!ok) {
			const err = await resp.dockerThrowable(
				`Unexpected HTTP ${rawResp.status} from ${opts.method} ${url.pathname}`,
			);
			this._releaseIdle();
			throw err;
		}
		return resp;
	}

	/** Drop every connection, busy or idle. Later requests open new ones. */
	close() {
		this._httpAgent.destroy();
		this._httpsAgent.destroy();
	}

	// Idle sockets only: requests still in flight keep theirs.
	private _releaseIdle() {
		for (const agent of [this._httpAgent, this._httpsAgent]) {
			for (const sockets of Object.values(agent.freeSockets)) {
				for (const socket of sockets ?? []) {
					socket.destroy();
				}
			}
		}
	}
}

export class DockerResponse extends Response {
	// Cache the body once we decode it once.
	decodedBody?: Uint8Array;

	/**
	 * @throws {TransportError} if the body cannot be read in time; the
	 *      response stream is destroyed.
	 */
	async dockerBody() {
		if (!this.decodedBody) {
			try {
				this.decodedBody = new Uint8Array(await this.arrayBuffer());
			} catch (err) {
				if (this.body instanceof Readable) {
					this.body.destroy();
				}
				const reason = err instanceof Error ? err.message : String(err);
				throw new TransportError(`reading body from ${this.url}: ${reason}`, {
					cause: err,
				});
			}
		}
		return this.decodedBody;
	}

	async dockerText() {
		return new TextDecoder().decode(await this.dockerBody());
	}

	/** The decoded JSON body, or `undefined` for an empty one. */
	async dockerJson(): Promise<unknown> {
		const text = await this.dockerText();
		if (text.trim().length === 0) {
			return undefined;
		}
		try {
			const parsed: unknown = JSON.parse(text);
			return parsed;
		} catch (jsonErr) {
			throw new InvalidContentError(
				`Invalid JSON in response from ${this.url}`,
				{ cause: jsonErr },
			);
		}
	}

	async dockerErrors(): Promise<RegistryError[]> {
		const text = await this.dockerText();
		let obj: unknown;
		try {
			obj = JSON.parse(text);
		} catch {
			// Not JSON: no structured errors, the caller falls back to the text.
			return [];
		}
		const parsed = errorBodySchema.safeParse(obj);
		return parsed.success ? parsed.data : [];
	}

	async dockerThrowable(baseMsg: string): Promise<HttpError> {
		const ErrorClass = getHttpError(this.status);

		// no point trying to parse HTML
		if (this.headers.get('content-type')?.startsWith('text/html')) {
			await this.dockerBody();
			return new ErrorClass(this, [], `${baseMsg} (w/ HTML body)`);
		}

		try {
			const errors = this.status >= 400 ? await this.dockerErrors() : [];
			if (errors.length === 0) {
				const text = await this.dockerText();
				if (text.length > 1) {
					errors.push({ message: text.slice(0, 512) });
				}
			}
			const errorTexts = errors.map(
				(x) =>
					'    ' +
					[
						x.code,
						x.message,
						x.detail === undefined ? '' : JSON.stringify(x.detail),
					]
						.filter((part) => part)
						.join(': '),
			);

			return new ErrorClass(this, errors, [baseMsg, ...errorTexts].join('\n'));
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err);
			return new ErrorClass(
				this,
				[],
				`${baseMsg} - and failed to read error body: ${reason}`,
			);
		}
	}
}
