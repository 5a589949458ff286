import type { Logger } from './logger';

export interface RegistryIndex {
	name: string;
	official: boolean;
	scheme: 'https' | 'http';
}

/** Manifest formats a client can ask for through the `Accept` header. */
export type ManifestSchema = 'v1-signed' | 'v1' | 'v2';

export type DeletePolicy = 'abort' | 'best-effort';

export interface RegistryClientOpts {
	host: string;
	/** Default true. Set to false to accept invalid or self-signed certificates. */
	verifySsl?: boolean;
	username?: string;
	password?: string;
	/** Per-request timeout in milliseconds; 0 or unset means none. */
	apiTimeout?: number;
	/** Omit to probe the registry for v2 support. */
	apiVersion?: 1 | 2;
	/** Token endpoint to use instead of the realm of the registry's challenge. */
	authServiceUrl?: string;
	scheme?: 'https' | 'http';
	userAgent?: string;
	schema?: ManifestSchema;
	scopeActions?: readonly string[];
	log?: Logger;
}

export interface RegistryOptions extends RegistryClientOpts {
	deletePolicy?: DeletePolicy;
}

export type AuthInfo =
	| { type: 'None' }
	| { type: 'Basic'; username: string; password: string }
	| { type: 'Bearer'; token: string };

export interface RegistryError {
	code?: string;
	message: string;
	detail?: unknown;
}

export type DeepReadonly<T> = T extends (infer U)[]
	? ReadonlyArray<DeepReadonly<U>>
	: T extends Date
	? T
	: T extends object
	? { readonly [K in keyof T]: DeepReadonly<T[K]> }
	: T;
