/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import * as os from 'os';
import { version as VERSION } from '../package.json';
import { DeepReadonly, ManifestSchema, RegistryIndex } from './types';

export const MEDIATYPE_MANIFEST_V1_SIGNED =
	'application/vnd.docker.distribution.manifest.v1+prettyjws';
export const MEDIATYPE_MANIFEST_V1 =
	'application/vnd.docker.distribution.manifest.v1+json';
export const MEDIATYPE_MANIFEST_V2 =
	'application/vnd.docker.distribution.manifest.v2+json';
export const MEDIATYPE_IMAGE_CONFIG_V1 =
	'application/vnd.docker.container.image.v1+json';

export const MANIFEST_MEDIATYPES: Record<ManifestSchema, string> = {
	'v1-signed': MEDIATYPE_MANIFEST_V1_SIGNED,
	v1: MEDIATYPE_MANIFEST_V1,
	v2: MEDIATYPE_MANIFEST_V2,
};

// --- globals

export const DEFAULT_USERAGENT =
	'registry-graph/' +
	VERSION +
	' (' +
	os.arch() +
	'-' +
	os.platform() +
	'; ' +
	'node/' +
	process.versions.node +
	')';

// See `INDEXNAME` in docker/docker.git:registry/config.go.
export const DEFAULT_INDEX_NAME = 'docker.io';
export const DEFAULT_INDEX_URL = 'https://registry-1.docker.io';

export const DEFAULT_SCOPE_ACTIONS: readonly string[] = ['*'];

// --- exports

export function splitIntoTwo(str: string, sep: string) {
	const sepIdx = str.indexOf(sep);
	return sepIdx === -1
		? [str]
		: [str.slice(0, sepIdx), str.slice(sepIdx + 1)];
}

/**
 * Parse a registry host, optionally with a leading scheme.
 *
 * Examples:
 *      docker.io               (no scheme implies 'https')
 *      index.docker.io         (normalized to docker.io)
 *      registry.example.com:5000
 *      http://localhost:5000
 *      localhost:5000          (localhost implies 'http')
 */
export function parseIndex(arg: string): RegistryIndex {
	let indexName: string;
	let scheme: 'https' | 'http';
	const protoSepIdx = arg.indexOf('://');
	if (protoSepIdx !== -1) {
		const foundScheme = arg.slice(0, protoSepIdx);
		if (foundScheme !== 'http' && foundScheme !== 'https') {
			throw new Error(
				'invalid registry scheme, must be "http" or "https": ' + arg,
			);
		}
		scheme = foundScheme;
		indexName = arg.slice(protoSepIdx + 3);
	} else {
		scheme = isLocalhost(arg) ? 'http' : 'https';
		indexName = arg;
	}

	// Allow a trailing '/' as from URL builders, e.g. 'https://docker.io/'.
	if (indexName.endsWith('/')) {
		indexName = indexName.slice(0, -1);
	}

	if (!indexName) {
		throw new Error('invalid registry, empty host: ' + arg);
	}
	if (
		indexName.indexOf('.') === -1 &&
		indexName.indexOf(':') === -1 &&
		indexName !== 'localhost'
	) {
		throw new Error(
			`invalid registry, "${indexName}" does not look like a valid host: ${arg}`,
		);
	}
	if (indexName.indexOf('/') !== -1) {
		throw new Error('invalid registry, trailing path: ' + arg);
	}

	// Per docker.git's `ValidateIndexName`.
	if (indexName === 'index.' + DEFAULT_INDEX_NAME) {
		indexName = DEFAULT_INDEX_NAME;
	}

	const index: RegistryIndex = {
		name: indexName,
		official: indexName === DEFAULT_INDEX_NAME,
		scheme,
	};

	if (index.official && index.scheme === 'http') {
		throw new Error(
			'invalid registry, plaintext HTTP to the official index is disallowed: ' +
				arg,
		);
	}

	return index;
}

/**
 * Base URL for the registry API. Similar in spirit to
 * docker.git:registry/endpoint.go#NewEndpoint().
 */
export function urlFromIndex(index: RegistryIndex, scheme?: 'http' | 'https') {
	if (index.official) {
		if (scheme != null && scheme !== 'https') {
			throw new Error(
				`Unencrypted communication with docker.io is not allowed`,
			);
		}
		return DEFAULT_INDEX_URL;
	}
	return `${scheme ?? index.scheme}://${index.name}`;
}

export function isLocalhost(host: string) {
	const lead = host.split(':')[0];
	return lead === 'localhost' || lead === '127.0.0.1' || host.includes('::1');
}

/**
 * Return a scope string to be used for an auth request. Example:
 *   repository:library/nginx:pull
 */
export function makeAuthScope(
	resource: 'repository' | 'registry',
	name: string,
	actions: readonly string[],
) {
	return `${resource}:${name}:${actions.join(',')}`;
}

/**
 * Freeze `value` and everything reachable from it. Returns `value` itself,
 * typed as read-only.
 */
export function deepFreeze<T>(value: T): DeepReadonly<T>;
export function deepFreeze(value: unknown): unknown {
	if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
	}
	return value;
}
