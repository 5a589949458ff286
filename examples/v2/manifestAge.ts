/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { mainline, printUsage, withRegistry } from '../mainline';

/*
 * Print the creation time of every distinct image in a repository, oldest
 * first.
 */
const cmd = 'manifestAge';
const usage = 'REPO';
const { opts, args } = mainline({ cmd, usage });
const name = args[0];
if (!name) {
	printUsage(cmd, usage);
	process.exit(2);
}

withRegistry(opts, async (registry) => {
	const repo = await registry.getRepository(name);
	const rows: Array<{ digest: string; created: Date }> = [];
	for (const manifest of await repo.getManifests()) {
		rows.push({ digest: manifest.digest, created: await manifest.getAge() });
	}
	rows.sort((a, b) => a.created.getTime() - b.created.getTime());
	for (const { digest, created } of rows) {
		console.log('%s\t%s', created.toISOString(), digest);
	}
});
