/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { Lazy } from './lazy';
import { Manifest } from './manifest';
import { RegistryClient } from './registry-client-v2';

export class Tag {
	readonly name: string;
	private readonly _manifest: Lazy<Manifest>;

	constructor(
		private readonly _client: RegistryClient,
		readonly repository: string,
		readonly tag: string,
	) {
		this.name = `${repository}:${tag}`;
		this._manifest = new Lazy(async () => {
			const { content, digest } = await this._client.getManifest(
				this.repository,
				this.tag,
			);
			return new Manifest(this._client, this.repository, digest, content);
		});
	}

	/**
	 * The manifest the tag points to, resolved on first call. Later calls
	 * return the same instance, even if the tag has moved since.
	 */
	getManifest(): Promise<Manifest> {
		return this._manifest.get();
	}

	/** Delete the manifest behind this tag, and with it every tag on it. */
	async delete(): Promise<void> {
		const manifest = await this.getManifest();
		await manifest.delete();
	}

	equals(other: Tag): boolean {
		return this.tag === other.tag && this.repository === other.repository;
	}

	toString() {
		return `Tag(${this.name})`;
	}
}
