/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { Headers, RequestRedirect } from 'node-fetch';
import {
	AuthorizationService,
	setAuthHeaderFromAuthInfo,
} from './authorization-service';
import {
	DEFAULT_SCOPE_ACTIONS,
	DEFAULT_USERAGENT,
	MANIFEST_MEDIATYPES,
	MEDIATYPE_IMAGE_CONFIG_V1,
	makeAuthScope,
	parseIndex,
	splitIntoTwo,
	urlFromIndex,
} from './common';
import { DockerJsonClient, DockerResponse } from './docker-json-client';
import { BadDigestError, HttpError, NotSupportedError } from './errors';
import { Logger, silentLogger } from './logger';
import {
	Catalog,
	JsonObject,
	ManifestContent,
	TagList,
	catalogSchema,
	jsonObjectSchema,
	manifestContentSchema,
	parseBody,
	tagListSchema,
} from './schemas';
import { ManifestSchema, RegistryClientOpts, RegistryIndex } from './types';

export interface ManifestResponse {
	content: ManifestContent;
	/** The `Content-Type` of the response. */
	mediaType: string;
	/** Canonical digest, as computed by the registry. */
	digest: string;
}

/** Low-level operations against one registry. */
export interface RegistryClient {
	readonly version: number;
	readonly host: string;
	readonly auth: AuthorizationService;
	checkStatus(): Promise<JsonObject>;
	catalog(): Promise<Catalog>;
	listTags(name: string): Promise<TagList>;
	getManifest(
		name: string,
		reference: string,
		opts?: { schema?: ManifestSchema },
	): Promise<ManifestResponse>;
	getManifestAndDigest(
		name: string,
		reference: string,
	): Promise<[ManifestContent, string]>;
	deleteManifest(name: string, digest: string): Promise<JsonObject>;
	getBlob(name: string, digest: string, mediaType?: string): Promise<unknown>;
	deleteBlob(name: string, digest: string): Promise<JsonObject>;
	close(): void;
}

function _isDigest(reference: string) {
	return /^[a-z0-9]+(?:[.+_-][a-z0-9]+)*:[a-zA-Z0-9=_-]+$/.test(reference);
}

/*
 * Digest of a manifest response, from the 'Docker-Content-Digest' header.
 * A registry may leave the header out; a manifest requested by digest then
 * has that digest.
 *
 * @throws {BadDigestError} if the value is missing or malformed
 */
function _digestFromResponse(resp: DockerResponse, reference: string) {
	const dcd = resp.headers.get('docker-content-digest');
	if (!dcd) {
		if (_isDigest(reference)) {
			return reference;
		}
		throw new BadDigestError(
			`missing "Docker-Content-Digest" header for manifest "${reference}"`,
		);
	}
	// E.g. docker-content-digest: sha256:887f7ecfd0bda3...
	const parts = splitIntoTwo(dcd, ':');
	if (parts.length !== 2 || !parts[0] || !parts[1]) {
		throw new BadDigestError(
			`could not parse Docker-Content-Digest header ${JSON.stringify(dcd)}`,
		);
	}
	return dcd;
}

export class RegistryClientV2 implements RegistryClient {
	readonly version = 2;
	readonly host: string;
	readonly index: RegistryIndex;
	readonly auth: AuthorizationService;
	/** Manifest schema asked for when a call names none. */
	schema: ManifestSchema;
	scopeActions: readonly string[];
	private readonly _api: DockerJsonClient;
	private readonly _log: Logger;

	/**
	 * Create a client for the registry at `opts.host`. Nothing is sent until
	 * the first operation.
	 *
	 * @param opts.verifySsl Default true. Set to false to *not* fail on an
	 *      invalid or self-signed server certificate.
	 * @param opts.username Used, together with `opts.password`, against the
	 *      token endpoint or as Basic credentials, whichever the registry asks.
	 */
	constructor(opts: RegistryClientOpts) {
		this.host = opts.host;
		this.index = parseIndex(opts.host);
		this.schema = opts.schema ?? 'v2';
		this.scopeActions = opts.scopeActions ?? DEFAULT_SCOPE_ACTIONS;
		this._log = opts.log ?? silentLogger;

		const verifySsl = opts.verifySsl ?? true;
		this._api = new DockerJsonClient({
			url: urlFromIndex(this.index, opts.scheme),
			userAgent: opts.userAgent ?? DEFAULT_USERAGENT,
			rejectUnauthorized: verifySsl,
			timeout: opts.apiTimeout,
			log: this._log,
		});
		this.auth = new AuthorizationService({
			api: this._api,
			registry: this.index.name,
			url: opts.authServiceUrl,
			username: opts.username,
			password: opts.password,
			insecure: !verifySsl,
			log: this._log,
		});
	}

	/**
	 * Ping the base URL.
	 * See: <https://docs.docker.com/registry/spec/api/#base>
	 */
	async checkStatus() {
		return this._call({ method: 'GET', path: '/v2/', scope: this._catalogScope() });
	}

	// TODO: follow the `Link` header for catalogs served in pages
	async catalog(): Promise<Catalog> {
		const res = await this._request({
			method: 'GET',
			path: '/v2/_catalog',
			scope: this._catalogScope(),
		});
		return parseBody(catalogSchema, await res.dockerJson(), 'catalog');
	}

	/*
	 * Example:
	 *  {
	 *      "name": "library/alpine",
	 *      "tags": [ "2.6", "2.7", "3.1", "3.2", "edge", "latest" ]
	 *  }
	 */
	async listTags(name: string): Promise<TagList> {
		const res = await this._request({
			method: 'GET',
			path: `/v2/${encodeURI(name)}/tags/list`,
			scope: this._repositoryScope(name),
		});
		return parseBody(tagListSchema, await res.dockerJson(), `tag list of ${name}`);
	}

	/*
	 * Get an image manifest. `reference` is either a tag or a digest.
	 * <https://docs.docker.com/registry/spec/api/#pulling-an-image-manifest>
	 *
	 * The digest is the one the registry reports in Docker-Content-Digest; it
	 * is not recomputed from the body, which a registry may have converted.
	 */
	async getManifest(
		name: string,
		reference: string,
		opts: { schema?: ManifestSchema } = {},
	): Promise<ManifestResponse> {
		const resp = await this._request({
			method: 'GET',
			path: this._manifestPath(name, reference),
			scope: this._repositoryScope(name),
			accept: MANIFEST_MEDIATYPES[opts.schema ?? this.schema],
		});
		const content = parseBody(
			manifestContentSchema,
			await resp.dockerJson(),
			`manifest ${name}:${reference}`,
		);
		return {
			content,
			mediaType: resp.headers.get('content-type') ?? 'application/json',
			digest: _digestFromResponse(resp, reference),
		};
	}

	async getManifestAndDigest(
		name: string,
		reference: string,
	): Promise<[ManifestContent, string]> {
		const { content, digest } = await this.getManifest(name, reference);
		return [content, digest];
	}

	async deleteManifest(name: string, digest: string) {
		return this._call({
			method: 'DELETE',
			path: this._manifestPath(name, digest),
			scope: this._repositoryScope(name),
		});
	}

	/**
	 * Get a blob as decoded JSON, e.g. an image configuration.
	 * <https://docs.docker.com/registry/spec/api/#get-blob>
	 *
	 * This endpoint can return 3xx redirects to an object store; they are
	 * followed.
	 */
	async getBlob(
		name: string,
		digest: string,
		mediaType = MEDIATYPE_IMAGE_CONFIG_V1,
	): Promise<unknown> {
		const resp = await this._request({
			method: 'GET',
			path: this._blobPath(name, digest),
			scope: this._repositoryScope(name),
			accept: mediaType,
			redirect: 'follow',
		});
		return (await resp.dockerJson()) ?? {};
	}

	async deleteBlob(name: string, digest: string) {
		return this._call({
			method: 'DELETE',
			path: this._blobPath(name, digest),
			scope: this._repositoryScope(name),
		});
	}

	close() {
		this._api.close();
	}

	private _catalogScope() {
		return makeAuthScope('registry', 'catalog', this.scopeActions);
	}

	private _repositoryScope(name: string) {
		return makeAuthScope('repository', name, this.scopeActions);
	}

	private _manifestPath(name: string, reference: string) {
		return `/v2/${encodeURI(name)}/manifests/${encodeURI(reference)}`;
	}

	private _blobPath(name: string, digest: string) {
		return `/v2/${encodeURI(name)}/blobs/${encodeURI(digest)}`;
	}

	/*
	 * Issue one call with the credentials its scope needs. Every call
	 * announces its scope first, so a scope change renews the token.
	 */
	private async _request(opts: {
		method: 'GET' | 'DELETE';
		path: string;
		scope: string;
		accept?: string;
		redirect?: RequestRedirect;
	}) {
		this.auth.setDesiredScope(opts.scope);
		const headers = new Headers({
			accept: opts.accept ?? MANIFEST_MEDIATYPES[this.schema],
		});
		setAuthHeaderFromAuthInfo(headers, await this.auth.authInfo(opts.scope));
		return this._api.request({
			method: opts.method,
			path: opts.path,
			headers,
			redirect: opts.redirect,
		});
	}

	/** `_request`, then the decoded body; an empty body gives `{}`. */
	private async _call(opts: {
		method: 'GET' | 'DELETE';
		path: string;
		scope: string;
	}): Promise<JsonObject> {
		const resp = await this._request(opts);
		const body = await resp.dockerJson();
		if (body === undefined) {
			return {};
		}
		return parseBody(jsonObjectSchema, body, `response from ${opts.path}`);
	}
}

/**
 * Client for the registry at `opts.host`.
 *
 * With `opts.apiVersion` unset, the registry is asked for `GET /v2/` first;
 * a 404 means it does not speak the v2 API.
 *
 * @throws {NotSupportedError} for API version 1, or a registry without v2.
 */
export async function createRegistryClient(
	opts: RegistryClientOpts,
): Promise<RegistryClient> {
	const log = opts.log ?? silentLogger;
	switch (opts.apiVersion) {
		case 1:
			throw new NotSupportedError('registry API v1 is not supported');
		case 2:
			return new RegistryClientV2(opts);
		case undefined:
			break;
		default:
			throw new Error(`invalid apiVersion: ${String(opts.apiVersion)}`);
	}

	log.debug('Checking for v2 API', { host: opts.host });
	const client = new RegistryClientV2(opts);
	try {
		await client.checkStatus();
	} catch (err) {
		client.close();
		if (err instanceof HttpError && err.statusCode === 404) {
			throw new NotSupportedError(
				`${opts.host} does not support the registry v2 API`,
				{ cause: err },
			);
		}
		throw err;
	}
	log.debug('Using v2 API', { host: opts.host });
	return client;
}
