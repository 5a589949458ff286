/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

export type LogContext = Record<string, string | number | boolean | undefined>;

/** What the library needs from a logger. */
export interface Logger {
	debug(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
}

export const silentLogger: Logger = {
	debug() {
		// nothing
	},
	warn() {
		// nothing
	},
};

export enum LogLevel {
	DEBUG = 'DEBUG',
	WARN = 'WARN',
}

/**
 * Logger writing one line per entry to the console, either as
 * `[timestamp] LEVEL message {context}` or as a JSON object.
 */
export class ConsoleLogger implements Logger {
	constructor(
		private debugEnabled = false,
		private jsonFormat = false,
	) {}

	setDebugEnabled(enabled: boolean) {
		this.debugEnabled = enabled;
	}

	setJsonFormat(enabled: boolean) {
		this.jsonFormat = enabled;
	}

	format(level: LogLevel, message: string, context?: LogContext): string {
		const timestamp = new Date().toISOString();
		if (this.jsonFormat) {
			return JSON.stringify({ timestamp, level, message, ...context });
		}
		const contextStr = context ? ` ${JSON.stringify(context)}` : '';
		return `[${timestamp}] ${level} ${message}${contextStr}`;
	}

	debug(message: string, context?: LogContext) {
		if (this.debugEnabled) {
			console.debug(this.format(LogLevel.DEBUG, message, context));
		}
	}

	warn(message: string, context?: LogContext) {
		console.warn(this.format(LogLevel.WARN, message, context));
	}
}
