/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import * as assert from 'assert';

import { BadDigestError, NotFoundError } from '../lib/errors';
import { RegistryClientV2 } from '../lib/registry-client-v2';
import { Tag } from '../lib/tag';
import { MockRegistry, MockRegistryOpts } from './mock-registry';
import { CONFIG_ABC, DIGEST_ABC, sampleRepositories } from './util';

jest.setTimeout(10 * 1000);

describe('Tag', function () {
	let mock: MockRegistry | undefined;
	let client: RegistryClientV2 | undefined;

	async function setup(opts: MockRegistryOpts = {}) {
		mock = await MockRegistry.start({
			repositories: sampleRepositories(),
			...opts,
		});
		client = new RegistryClientV2({ host: mock.url });
		return { reg: mock, api: client };
	}

	afterEach(async () => {
		client?.close();
		await mock?.stop();
		client = mock = undefined;
	});

	it('name and toString', async () => {
		const { api } = await setup();
		const tag = new Tag(api, 'team/tools', 'latest');
		assert.strictEqual(tag.name, 'team/tools:latest');
		assert.strictEqual(String(tag), 'Tag(team/tools:latest)');
	});

	it('resolves its manifest once, with the digest the registry reports', async () => {
		const { reg, api } = await setup();
		const tag = new Tag(api, 'app', 'v1');
		const manifest = await tag.getManifest();
		assert.strictEqual(manifest.digest, DIGEST_ABC);
		assert.strictEqual(manifest.repository, 'app');
		assert.strictEqual(await tag.getManifest(), manifest);

		// The body came with the tag lookup; no second manifest request.
		const content = await manifest.getContent();
		assert.strictEqual(content.config?.digest, CONFIG_ABC);
		assert.strictEqual(reg.count('GET', '/v2/app/manifests/v1'), 1);
		assert.strictEqual(reg.count('GET', `/v2/app/manifests/${DIGEST_ABC}`), 0);
	});

	it('does not compute a digest the registry leaves out', async () => {
		const { api } = await setup({ omitDigestHeader: true });
		const tag = new Tag(api, 'app', 'v1');
		await assert.rejects(tag.getManifest(), BadDigestError);
	});

	it('of a missing tag', async () => {
		const { api } = await setup();
		const tag = new Tag(api, 'app', 'nope');
		await assert.rejects(tag.getManifest(), NotFoundError);
	});

	it('equality ignores resolution state', async () => {
		const { api } = await setup();
		const resolved = new Tag(api, 'app', 'v1');
		await resolved.getManifest();
		const fresh = new Tag(api, 'app', 'v1');

		assert.strictEqual(resolved.equals(fresh), true);
		assert.strictEqual(fresh.equals(resolved), true);
		assert.strictEqual(resolved.equals(new Tag(api, 'app', 'v2')), false);
		assert.strictEqual(resolved.equals(new Tag(api, 'team/tools', 'v1')), false);
	});

	it('delete removes the manifest behind the tag', async () => {
		const { reg, api } = await setup();
		const tag = new Tag(api, 'app', 'v2');
		await tag.delete();
		assert.strictEqual(reg.count('DELETE', `/v2/app/manifests/${DIGEST_ABC}`), 1);
		assert.deepStrictEqual((await api.listTags('app')).tags, ['v3']);
	});
});
