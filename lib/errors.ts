/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import type { DockerResponse } from './docker-json-client';
import type { RegistryError } from './types';

/*
 * Error classes that the registry client may produce.
 */

/** Base class for custom error classes. */
export class ApiError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		Error.captureStackTrace?.(this, new.target);
	}
}

/** The request never produced a response: connection refused, reset, timeout. */
export class TransportError extends ApiError {}

export class HttpError extends ApiError {
	readonly statusCode: number;
	readonly reason: string;

	constructor(
		public resp: DockerResponse,
		public errors: RegistryError[],
		message: string,
	) {
		super(message);
		this.statusCode = resp.status;
		this.reason = resp.statusText;
	}
}

export class UnauthorizedError extends HttpError {}

export class ForbiddenError extends HttpError {}

export class NotFoundError extends HttpError {}

export function getHttpError(statusCode: number): typeof HttpError {
	switch (statusCode) {
		case 401:
			return UnauthorizedError;
		case 403:
			return ForbiddenError;
		case 404:
			return NotFoundError;
		default:
			return HttpError;
	}
}

/** Token renewal against the authorization endpoint failed. */
export class AuthorizationError extends ApiError {}

/** The registry does not speak the requested API version. */
export class NotSupportedError extends ApiError {}

export class BadDigestError extends ApiError {}

export class InvalidContentError extends ApiError {}

export class InvalidManifestError extends ApiError {}

/** A strict lookup of a repository or tag missing from the cached listing. */
export class EntityNotFoundError extends ApiError {
	constructor(
		readonly kind: 'repository' | 'tag',
		readonly key: string,
	) {
		super(`${kind} ${JSON.stringify(key)} not found`);
	}
}

export interface DeletionFailure {
	name: string;
	error: unknown;
}

/** Best-effort deletion completed, but some deletes failed. */
export class DeletionError extends ApiError {
	constructor(
		message: string,
		readonly failures: DeletionFailure[],
	) {
		super(message, { cause: failures[0]?.error });
	}
}
