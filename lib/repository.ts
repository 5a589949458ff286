/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { DeletionError, DeletionFailure, EntityNotFoundError } from './errors';
import { Lazy } from './lazy';
import { Logger, silentLogger } from './logger';
import { Manifest } from './manifest';
import { RegistryClient } from './registry-client-v2';
import { Tag } from './tag';
import { DeletePolicy } from './types';

export interface RepositoryOpts {
	deletePolicy?: DeletePolicy;
	log?: Logger;
}

export class Repository {
	readonly deletePolicy: DeletePolicy;
	private readonly _tags: Lazy<ReadonlyMap<string, Tag>>;
	private readonly _log: Logger;

	constructor(
		private readonly _client: RegistryClient,
		readonly name: string,
		opts: RepositoryOpts = {},
	) {
		this.deletePolicy = opts.deletePolicy ?? 'abort';
		this._log = opts.log ?? silentLogger;
		this._tags = new Lazy(async () => {
			const { tags } = await this._client.listTags(this.name);
			return new Map(
				tags.map((tag): [string, Tag] => [
					tag,
					new Tag(this._client, this.name, tag),
				]),
			);
		});
	}

	/**
	 * Tags by name. Listed on the first call only; the same map is returned
	 * from then on.
	 */
	getTags(): Promise<ReadonlyMap<string, Tag>> {
		return this._tags.get();
	}

	/** @throws {EntityNotFoundError} if the listing has no such tag. */
	async getTag(tag: string): Promise<Tag> {
		const found = (await this.getTags()).get(tag);
		if (!found) {
			throw new EntityNotFoundError('tag', tag);
		}
		return found;
	}

	get(tag: string): Promise<Tag | undefined>;
	get<D>(tag: string, defaultValue: D): Promise<Tag | D>;
	async get<D>(tag: string, defaultValue?: D): Promise<Tag | D | undefined> {
		return (await this.getTags()).get(tag) ?? defaultValue;
	}

	async *[Symbol.asyncIterator](): AsyncIterableIterator<Tag> {
		yield* (await this.getTags()).values();
	}

	/**
	 * Distinct manifests behind the tags: several tags on one digest give a
	 * single entry.
	 */
	async getManifests(): Promise<Manifest[]> {
		const manifests: Manifest[] = [];
		for (const tag of (await this.getTags()).values()) {
			const manifest = await tag.getManifest();
			if (!(await this._includes(manifests, manifest))) {
				manifests.push(manifest);
			}
		}
		return manifests;
	}

	/**
	 * Delete every manifest of the repository. Deletes already issued are
	 * never undone.
	 *
	 * With the `abort` policy the first failing delete stops the sequence and
	 * is thrown as is. With `best-effort` every manifest is attempted and a
	 * {@link DeletionError} lists the failures.
	 */
	async delete(opts: { policy?: DeletePolicy } = {}): Promise<void> {
		const policy = opts.policy ?? this.deletePolicy;
		const manifests = await this.getManifests();
		if (policy === 'abort') {
			for (const manifest of manifests) {
				await manifest.delete();
			}
			return;
		}

		const failures: DeletionFailure[] = [];
		for (const manifest of manifests) {
			try {
				await manifest.delete();
			} catch (error) {
				const reason = error instanceof Error ? error.message : String(error);
				this._log.warn('Manifest delete failed', {
					manifest: manifest.name,
					reason,
				});
				failures.push({ name: manifest.name, error });
			}
		}
		if (failures.length) {
			throw new DeletionError(
				`${failures.length} of ${manifests.length} manifests of ${this.name} could not be deleted`,
				failures,
			);
		}
	}

	/** Same name and the same tag names. */
	async equals(other: Repository): Promise<boolean> {
		if (this.name !== other.name) {
			return false;
		}
		const [mine, theirs] = await Promise.all([
			this.getTags(),
			other.getTags(),
		]);
		if (mine.size !== theirs.size) {
			return false;
		}
		for (const [key, tag] of mine) {
			const match = theirs.get(key);
			if (!match || !tag.equals(match)) {
				return false;
			}
		}
		return true;
	}

	toString() {
		return `Repository(${this.name})`;
	}

	private async _includes(manifests: Manifest[], candidate: Manifest) {
		for (const manifest of manifests) {
			if (await manifest.equals(candidate)) {
				return true;
			}
		}
		return false;
	}
}
