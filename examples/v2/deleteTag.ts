/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { mainline, printUsage, withRegistry } from '../mainline';

/*
 * Delete the manifest a tag points to. Every other tag on that manifest goes
 * with it.
 */
const cmd = 'deleteTag';
const usage = 'REPO TAG';
const { opts, args } = mainline({ cmd, usage });
const [name, tagName] = args;
if (!name || !tagName) {
	printUsage(cmd, usage);
	process.exit(2);
}

withRegistry(opts, async (registry) => {
	const repo = await registry.getRepository(name);
	const tag = await repo.getTag(tagName);
	const manifest = await tag.getManifest();
	await tag.delete();
	console.log('deleted %s (%s)', tag.name, manifest.digest);
});
