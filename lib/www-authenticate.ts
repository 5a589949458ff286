/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

export interface AuthChallenge {
	scheme: string;
	/** Parameter names are lower-cased. */
	params: Record<string, string>;
}

const SCHEME = /^\s*([\w!#$%&'*+.^`|~-]+)(?:\s+([\s\S]*))?$/;
// -> name, quoted value, token value, separator
const PARAM = /\s*([\w-]+)\s*=\s*(?:"((?:[^"\\]|\\.)*)"|([^\s,"]*))\s*(,|$)/y;

/**
 * Parse a WWW-Authenticate header like this:
 *
 *      // JSSTYLED
 *      www-authenticate: Bearer realm="https://auth.docker.io/token",service="registry.docker.io"
 *      www-authenticate: Basic realm="registry456.example.com"
 *
 * into an object like this:
 *
 *      {
 *          scheme: 'Bearer',
 *          params: {
 *              realm: 'https://auth.docker.io/token',
 *              service: 'registry.docker.io'
 *          }
 *      }
 *
 * Note: This doesn't handle *multiple* challenges.
 */
export function parseWWWAuthenticate(header: string): AuthChallenge {
	const m = SCHEME.exec(header);
	if (!m) {
		throw new Error(`could not parse WWW-Authenticate header "${header}"`);
	}

	const params: Record<string, string> = {};
	const rest = (m[2] ?? '').trim();
	let pos = 0;
	while (pos < rest.length) {
		PARAM.lastIndex = pos;
		const pm = PARAM.exec(rest);
		if (!pm) {
			throw new Error(
				`could not parse WWW-Authenticate header "${header}": ` +
					`unexpected input at "${rest.slice(pos)}"`,
			);
		}
		params[pm[1].toLowerCase()] =
			pm[2] !== undefined ? pm[2].replace(/\\(.)/g, '$1') : pm[3];
		pos = PARAM.lastIndex;
	}

	return { scheme: m[1], params };
}
