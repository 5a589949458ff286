/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

/**
 * A value computed on first use and kept afterwards.
 *
 * Callers arriving while the first load is in flight share its promise, so
 * the loader runs at most once per successful population. A rejected load
 * leaves the cell empty and the next `get()` starts over.
 */
export class Lazy<T> {
	private _resolved?: { value: T };
	private _pending?: Promise<T>;

	constructor(private readonly _load: () => Promise<T>) {}

	/** A cell that starts out resolved to `value`. */
	static of<T>(value: T): Lazy<T> {
		const cell = new Lazy<T>(() => Promise.resolve(value));
		cell._resolved = { value };
		return cell;
	}

	get resolved(): boolean {
		return this._resolved !== undefined;
	}

	/** The cached value, without loading. */
	peek(): T | undefined {
		return this._resolved?.value;
	}

	get(): Promise<T> {
		if (this._resolved) {
			return Promise.resolve(this._resolved.value);
		}
		if (!this._pending) {
			this._pending = this._load().then(
				(value) => {
					this._resolved = { value };
					this._pending = undefined;
					return value;
				},
				(err: unknown) => {
					this._pending = undefined;
					throw err;
				},
			);
		}
		return this._pending;
	}
}

/** Runs async critical sections one after another, in call order. */
export class Mutex {
	private _tail: Promise<void> = Promise.resolve();

	runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		const run = this._tail.then(fn);
		// The caller observes the failure through `run`; the queue moves on.
		this._tail = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}
}
