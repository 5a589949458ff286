/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

import * as assert from 'assert';
import { Lazy, Mutex } from '../lib/lazy';

function deferred<T>() {
	let resolve: (value: T) => void = () => undefined;
	let reject: (err: unknown) => void = () => undefined;
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

describe('Lazy', function () {
	it('loads once and keeps the value', async () => {
		let loads = 0;
		const cell = new Lazy(async () => {
			loads += 1;
			return { n: loads };
		});
		assert.strictEqual(cell.resolved, false);
		assert.strictEqual(cell.peek(), undefined);

		const first = await cell.get();
		const second = await cell.get();
		assert.strictEqual(first, second);
		assert.strictEqual(loads, 1);
		assert.strictEqual(cell.resolved, true);
		assert.strictEqual(cell.peek(), first);
	});

	it('shares the in-flight load between concurrent callers', async () => {
		const gate = deferred<string>();
		let loads = 0;
		const cell = new Lazy(() => {
			loads += 1;
			return gate.promise;
		});
		const a = cell.get();
		const b = cell.get();
		gate.resolve('value');
		assert.deepStrictEqual(await Promise.all([a, b]), ['value', 'value']);
		assert.strictEqual(loads, 1);
	});

	it('retries after a failed load', async () => {
		let loads = 0;
		const cell = new Lazy(async () => {
			loads += 1;
			if (loads === 1) {
				throw new Error('first load fails');
			}
			return 'second';
		});
		await assert.rejects(cell.get(), /first load fails/);
		assert.strictEqual(cell.resolved, false);
		assert.strictEqual(await cell.get(), 'second');
		assert.strictEqual(loads, 2);
	});

	it('of() starts resolved', async () => {
		const cell = Lazy.of(42);
		assert.strictEqual(cell.resolved, true);
		assert.strictEqual(cell.peek(), 42);
		assert.strictEqual(await cell.get(), 42);
	});
});

describe('Mutex', function () {
	it('runs sections one at a time, in call order', async () => {
		const mutex = new Mutex();
		const events: string[] = [];
		const gate = deferred<void>();

		const first = mutex.runExclusive(async () => {
			events.push('first:start');
			await gate.promise;
			events.push('first:end');
			return 1;
		});
		const second = mutex.runExclusive(async () => {
			events.push('second:start');
			return 2;
		});

		// Let queued microtasks run: only the first section may have started.
		await new Promise((resolve) => setImmediate(resolve));
		assert.deepStrictEqual(events, ['first:start']);

		gate.resolve();
		assert.deepStrictEqual(await Promise.all([first, second]), [1, 2]);
		assert.deepStrictEqual(events, ['first:start', 'first:end', 'second:start']);
	});

	it('keeps going after a section fails', async () => {
		const mutex = new Mutex();
		const failed = mutex.runExclusive(async () => {
			throw new Error('boom');
		});
		const next = mutex.runExclusive(async () => 'ok');
		await assert.rejects(failed, /boom/);
		assert.strictEqual(await next, 'ok');
	});
});
