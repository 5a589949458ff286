/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

export * from './types';

export { Registry } from './registry';
export { Repository, RepositoryOpts } from './repository';
export { Tag } from './tag';
export { Manifest, ManifestView, parseCreated } from './manifest';

export {
	RegistryClient,
	RegistryClientV2,
	ManifestResponse,
	createRegistryClient,
} from './registry-client-v2';
export { AuthorizationService, Challenge } from './authorization-service';
export { Lazy, Mutex } from './lazy';
export { Logger, LogContext, ConsoleLogger, silentLogger } from './logger';
export { parseWWWAuthenticate, AuthChallenge } from './www-authenticate';

export {
	Catalog,
	TagList,
	Descriptor,
	ManifestContent,
	ImageConfig,
	JsonObject,
} from './schemas';

export {
	MEDIATYPE_MANIFEST_V1_SIGNED,
	MEDIATYPE_MANIFEST_V1,
	MEDIATYPE_MANIFEST_V2,
	MEDIATYPE_IMAGE_CONFIG_V1,
	DEFAULT_INDEX_NAME,
	parseIndex,
	makeAuthScope,
} from './common';

export {
	ApiError as RegistryApiError,
	HttpError as RegistryHttpError,
	TransportError,
	UnauthorizedError,
	ForbiddenError,
	NotFoundError,
	AuthorizationError,
	NotSupportedError,
	BadDigestError,
	InvalidContentError,
	InvalidManifestError,
	EntityNotFoundError,
	DeletionError,
	DeletionFailure,
} from './errors';
