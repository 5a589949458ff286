/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { mainline, printUsage, withRegistry } from '../mainline';

const cmd = 'listTags';
const usage = 'REPO';
const { opts, args } = mainline({ cmd, usage });
const name = args[0];
if (!name) {
	printUsage(cmd, usage);
	process.exit(2);
}

withRegistry(opts, async (registry) => {
	const repo = await registry.getRepository(name);
	for await (const tag of repo) {
		const manifest = await tag.getManifest();
		console.log('%s\t%s', tag.tag, manifest.digest);
	}
});
