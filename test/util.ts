import * as assert from 'assert';

import { MEDIATYPE_IMAGE_CONFIG_V1, MEDIATYPE_MANIFEST_V2 } from '../lib/common';
import { HttpError } from '../lib/errors';
import { MockRepo } from './mock-registry';

export async function assertThrowsHttp<T = void>(
	fn: () => Promise<T>,
	statusCode?: number,
): Promise<HttpError> {
	let httpErr: HttpError | undefined;
	await assert.rejects(async () => {
		try {
			await fn();
		} catch (err) {
			if (err instanceof HttpError) {
				httpErr = err;
			}
			throw err;
		}
	}, HttpError);

	assert.ok(httpErr);
	if (statusCode) {
		assert.strictEqual(httpErr.statusCode, statusCode);
	}
	return httpErr;
}

export const DIGEST_ABC = 'sha256:abc';
export const DIGEST_DEF = 'sha256:def';
export const CONFIG_ABC = 'sha256:c0ffee01';
export const CONFIG_DEF = 'sha256:c0ffee02';

export function imageManifest(configDigest: string, layerDigest: string) {
	return {
		schemaVersion: 2,
		mediaType: MEDIATYPE_MANIFEST_V2,
		config: {
			mediaType: MEDIATYPE_IMAGE_CONFIG_V1,
			size: 1459,
			digest: configDigest,
		},
		layers: [
			{
				mediaType: 'application/vnd.docker.image.rootfs.diff.tar.gzip',
				size: 667590,
				digest: layerDigest,
			},
		],
	};
}

/*
 * Repository "app": tags v1 and v2 on sha256:abc, v3 on sha256:def.
 * Repository "team/tools": tag latest on sha256:abc (its own copy).
 * Fresh objects on every call; the mock registry mutates them on delete.
 */
export function sampleRepositories(): Record<string, MockRepo> {
	return {
		app: {
			tags: { v1: DIGEST_ABC, v2: DIGEST_ABC, v3: DIGEST_DEF },
			manifests: {
				[DIGEST_ABC]: imageManifest(CONFIG_ABC, 'sha256:1a7e401'),
				[DIGEST_DEF]: imageManifest(CONFIG_DEF, 'sha256:1a7e402'),
			},
			blobs: {
				[CONFIG_ABC]: {
					architecture: 'amd64',
					os: 'linux',
					created: '2019-03-07T22:19:46.815331171Z',
				},
				[CONFIG_DEF]: {
					architecture: 'amd64',
					os: 'linux',
					created: '2020-11-30T08:00:01Z',
				},
			},
		},
		'team/tools': {
			tags: { latest: DIGEST_ABC },
			manifests: {
				[DIGEST_ABC]: imageManifest(CONFIG_ABC, 'sha256:1a7e401'),
			},
		},
	};
}
