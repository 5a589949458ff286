/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import { createRegistryClient } from '../../lib';
import { mainline } from '../mainline';

// Check that the host speaks the v2 API and that the credentials work.
const { opts } = mainline({ cmd: 'ping', usage: '' });

async function main() {
	const client = await createRegistryClient(opts);
	try {
		const body = await client.checkStatus();
		console.log('v%d API OK: %s', client.version, JSON.stringify(body));
		console.log('bearer tokens: %s', await client.auth.tokenRequired());
	} finally {
		client.close();
	}
}

main().catch((err: unknown) => {
	console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
	process.exitCode = 1;
});
