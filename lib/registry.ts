/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { EntityNotFoundError } from './errors';
import { Lazy } from './lazy';
import { Logger, silentLogger } from './logger';
import { RegistryClient, createRegistryClient } from './registry-client-v2';
import { Repository } from './repository';
import { DeletePolicy, RegistryOptions } from './types';

/**
 * Entry point of the object model: a registry, its repositories, their tags
 * and the manifests behind them. Everything below is fetched on first use
 * and cached on the instance that asked for it.
 *
 * Usage:
 *
 *      const registry = await Registry.connect({ host: 'localhost:5000' });
 *      const repo = await registry.get('app');
 *      for await (const tag of repo ?? []) {
 *          console.log(tag.name, (await tag.getManifest()).digest);
 *      }
 *      registry.close();
 */
export class Registry {
	readonly name: string;
	readonly deletePolicy: DeletePolicy;
	private readonly _repositories: Lazy<ReadonlyMap<string, Repository>>;
	private readonly _log: Logger;

	constructor(
		readonly client: RegistryClient,
		opts: { deletePolicy?: DeletePolicy; log?: Logger } = {},
	) {
		this.name = client.host;
		this.deletePolicy = opts.deletePolicy ?? 'abort';
		this._log = opts.log ?? silentLogger;
		this._repositories = new Lazy(async () => {
			const { repositories } = await this.client.catalog();
			return new Map(
				repositories.map((name): [string, Repository] => [
					name,
					new Repository(this.client, name, {
						deletePolicy: this.deletePolicy,
						log: this._log,
					}),
				]),
			);
		});
	}

	/**
	 * Connect to the registry at `opts.host`, detecting the API version
	 * unless `opts.apiVersion` is given.
	 *
	 * @throws {NotSupportedError} if the registry has no v2 API.
	 */
	static async connect(opts: RegistryOptions): Promise<Registry> {
		const client = await createRegistryClient(opts);
		return new Registry(client, opts);
	}

	/**
	 * Repositories by name, from the catalog. Fetched on the first call; the
	 * same snapshot is returned from then on.
	 */
	getRepositories(): Promise<ReadonlyMap<string, Repository>> {
		return this._repositories.get();
	}

	/** @throws {EntityNotFoundError} if the catalog has no such repository. */
	async getRepository(name: string): Promise<Repository> {
		const found = (await this.getRepositories()).get(name);
		if (!found) {
			throw new EntityNotFoundError('repository', name);
		}
		return found;
	}

	get(name: string): Promise<Repository | undefined>;
	get<D>(name: string, defaultValue: D): Promise<Repository | D>;
	async get<D>(
		name: string,
		defaultValue?: D,
	): Promise<Repository | D | undefined> {
		return (await this.getRepositories()).get(name) ?? defaultValue;
	}

	async *[Symbol.asyncIterator](): AsyncIterableIterator<Repository> {
		yield* (await this.getRepositories()).values();
	}

	/** Release the connections of the underlying session. */
	close() {
		this.client.close();
	}

	toString() {
		return `Registry(${this.name})`;
	}
}
