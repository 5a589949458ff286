/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

/*
 * Command line handling shared by the examples:
 *
 *      node dist/examples/v2/<cmd>.js [OPTIONS] ARGS...
 *
 * Options:
 *      -h, --host HOST         registry, default "localhost:5000"
 *      -u, --username USER     with --password, credentials for the registry
 *      -p, --password PASS
 *      -k, --insecure          do not verify the server certificate
 *      --schema v1-signed|v1|v2
 *      --timeout MS
 *      -d, --debug             log requests to stderr
 *      --best-effort           keep deleting after a failed delete
 */

import minimist from 'minimist';

import {
	ConsoleLogger,
	ManifestSchema,
	Registry,
	RegistryOptions,
} from '../lib';

export interface Mainline {
	opts: RegistryOptions;
	args: string[];
	log: ConsoleLogger;
}

const SCHEMAS: readonly ManifestSchema[] = ['v1-signed', 'v1', 'v2'];

function stringOpt(value: unknown): string | undefined {
	return typeof value === 'string' && value !== '' ? value : undefined;
}

export function mainline({ cmd, usage }: { cmd: string; usage: string }): Mainline {
	const argv = minimist(process.argv.slice(2), {
		string: ['host', 'username', 'password', 'schema', 'timeout'],
		boolean: ['insecure', 'debug', 'best-effort', 'help'],
		alias: { h: 'host', u: 'username', p: 'password', k: 'insecure', d: 'debug' },
		default: { host: 'localhost:5000' },
	});

	const schemaArg = stringOpt(argv.schema);
	const schema = SCHEMAS.find((s) => s === schemaArg);
	if (schemaArg !== undefined && schema === undefined) {
		console.error(`${cmd}: invalid --schema ${JSON.stringify(schemaArg)}`);
		process.exit(2);
	}
	const timeoutArg = stringOpt(argv.timeout);
	const apiTimeout = timeoutArg === undefined ? undefined : Number(timeoutArg);
	if (apiTimeout !== undefined && !Number.isInteger(apiTimeout)) {
		console.error(`${cmd}: invalid --timeout ${JSON.stringify(timeoutArg)}`);
		process.exit(2);
	}

	const log = new ConsoleLogger(argv.debug === true);
	const opts: RegistryOptions = {
		host: stringOpt(argv.host) ?? 'localhost:5000',
		username: stringOpt(argv.username),
		password: stringOpt(argv.password),
		verifySsl: argv.insecure !== true,
		apiTimeout,
		schema,
		deletePolicy: argv['best-effort'] === true ? 'best-effort' : 'abort',
		log,
	};
	if (argv.help === true) {
		printUsage(cmd, usage);
		process.exit(0);
	}
	return { opts, args: argv._.map(String), log };
}

export function printUsage(cmd: string, usage: string) {
	console.error(`usage: node dist/examples/v2/${cmd}.js [OPTIONS] ${usage}`);
}

/** Connect, run `fn`, close; print errors and exit non-zero on failure. */
export function withRegistry(
	opts: RegistryOptions,
	fn: (registry: Registry) => Promise<void>,
) {
	async function main() {
		const registry = await Registry.connect(opts);
		try {
			await fn(registry);
		} finally {
			registry.close();
		}
	}

	main().catch((err: unknown) => {
		console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
		process.exitCode = 1;
	});
}
