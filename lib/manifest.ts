/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { isDeepStrictEqual } from 'util';
import { deepFreeze } from './common';
import { InvalidManifestError } from './errors';
import { Lazy } from './lazy';
import { RegistryClient } from './registry-client-v2';
import { ManifestContent, imageConfigSchema, parseBody } from './schemas';
import { DeepReadonly } from './types';

export type ManifestView = DeepReadonly<ManifestContent>;

// `2019-03-07T22:19:46.815331171Z` -> `2019-03-07T22:19:46`
const CREATED_SECONDS = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})/;

/**
 * Parse the `created` timestamp of an image configuration, dropping
 * fractional seconds and the zone designator. The result is read as UTC.
 */
export function parseCreated(created: string): Date {
	const m = CREATED_SECONDS.exec(created);
	const date = m ? new Date(m[1] + 'Z') : undefined;
	if (!date || Number.isNaN(date.getTime())) {
		throw new InvalidManifestError(
			`could not parse image creation time ${JSON.stringify(created)}`,
		);
	}
	return date;
}

/**
 * One manifest of a repository, identified by its digest. Content and age
 * are fetched on first use and kept.
 */
export class Manifest {
	readonly name: string;
	private readonly _content: Lazy<ManifestView>;
	private readonly _created: Lazy<number>;

	constructor(
		private readonly _client: RegistryClient,
		readonly repository: string,
		readonly digest: string,
		content?: ManifestContent,
	) {
		this.name = `${repository}@${digest}`;
		this._content =
			content === undefined
				? new Lazy(async () => {
						const [fetched] = await this._client.getManifestAndDigest(
							this.repository,
							this.digest,
						);
						return deepFreeze(fetched);
				  })
				: Lazy.of(deepFreeze(structuredClone(content)));
		this._created = new Lazy(() => this._loadCreated());
	}

	/** The manifest document. Frozen: the cached copy cannot be altered. */
	getContent(): Promise<ManifestView> {
		return this._content.get();
	}

	/** Creation time of the image, from its configuration blob. */
	async getAge(): Promise<Date> {
		return new Date(await this._created.get());
	}

	async delete(): Promise<void> {
		await this._client.deleteManifest(this.repository, this.digest);
	}

	/** Same repository, digest and content. Fetches content as needed. */
	async equals(other: Manifest): Promise<boolean> {
		if (this.digest !== other.digest || this.repository !== other.repository) {
			return false;
		}
		const [mine, theirs] = await Promise.all([
			this.getContent(),
			other.getContent(),
		]);
		return isDeepStrictEqual(mine, theirs);
	}

	toString() {
		return `Manifest(${this.name})`;
	}

	private async _loadCreated(): Promise<number> {
		const content = await this.getContent();
		const config = content.config;
		if (!config) {
			throw new InvalidManifestError(
				`manifest ${this.name} has no config descriptor`,
			);
		}
		const blob = await this._client.getBlob(
			this.repository,
			config.digest,
			config.mediaType,
		);
		const { created } = parseBody(
			imageConfigSchema,
			blob,
			`image config ${config.digest}`,
		);
		return parseCreated(created).getTime();
	}
}
