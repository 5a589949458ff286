/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { mainline, printUsage, withRegistry } from '../mainline';

/*
 * Delete every manifest of a repository. With --best-effort, failed deletes
 * are reported at the end instead of stopping the run.
 */
const cmd = 'deleteRepository';
const usage = '[--best-effort] REPO';
const { opts, args } = mainline({ cmd, usage });
const name = args[0];
if (!name) {
	printUsage(cmd, usage);
	process.exit(2);
}

withRegistry(opts, async (registry) => {
	const repo = await registry.getRepository(name);
	const manifests = await repo.getManifests();
	await repo.delete();
	console.log('deleted %d manifests of %s', manifests.length, repo.name);
});
