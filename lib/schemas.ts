/*
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at http://mozilla.org/MPL/2.0/.
 */

/**
 * Zod schemas for the JSON documents read from a registry.
 *
 * Object schemas use `.passthrough()` so fields this library does not look
 * at are kept as the registry sent them.
 */

import { z } from 'zod';
import { InvalidContentError } from './errors';

/** `null` (as sent by some registries for an empty listing) becomes `[]`. */
const nameList = z
	.array(z.string())
	.nullish()
	.transform((names) => names ?? []);

export const catalogSchema = z
	.object({
		repositories: nameList,
	})
	.passthrough();

export const tagListSchema = z
	.object({
		name: z.string().optional(),
		tags: nameList,
	})
	.passthrough();

/** Reference to a blob or manifest by digest. */
export const descriptorSchema = z
	.object({
		mediaType: z.string(),
		digest: z.string(),
		size: z.number().optional(),
	})
	.passthrough();

/**
 * Any manifest document: schema 1 (signed or not), schema 2, manifest lists
 * and the OCI equivalents. Only the fields the object model reads are typed.
 */
export const manifestContentSchema = z
	.object({
		schemaVersion: z.number(),
		mediaType: z.string().optional(),
		config: descriptorSchema.optional(),
		layers: z.array(descriptorSchema).optional(),
		manifests: z.array(descriptorSchema).optional(),
	})
	.passthrough();

/** Image configuration blob; `created` is an RFC 3339 timestamp. */
export const imageConfigSchema = z
	.object({
		created: z.string(),
	})
	.passthrough();

export const tokenResponseSchema = z
	.object({
		token: z.string().optional(),
		access_token: z.string().optional(),
		expires_in: z.number().optional(),
	})
	.passthrough();

export const jsonObjectSchema = z.record(z.unknown());

export const registryErrorSchema = z
	.object({
		code: z.string().optional(),
		message: z.string(),
		detail: z.unknown().optional(),
	})
	.passthrough();

/**
 * Error bodies seen in the wild:
 *
 *      {"errors": [{"code": "MANIFEST_UNKNOWN", "message": "...", "detail": {}}]}
 *      {"error": {"code": "...", "message": "..."}}
 *      {"details": "incorrect username or password"}
 *      {"code": "...", "message": "..."}
 */
export const errorBodySchema = z.union([
	z
		.object({ errors: z.array(registryErrorSchema) })
		.transform((body) => body.errors),
	z.object({ error: registryErrorSchema }).transform((body) => [body.error]),
	z
		.object({ details: z.string() })
		.transform((body) => [{ message: body.details }]),
	registryErrorSchema.transform((err) => [err]),
]);

export type Catalog = z.infer<typeof catalogSchema>;
export type TagList = z.infer<typeof tagListSchema>;
export type Descriptor = z.infer<typeof descriptorSchema>;
export type ManifestContent = z.infer<typeof manifestContentSchema>;
export type ImageConfig = z.infer<typeof imageConfigSchema>;
export type TokenResponse = z.infer<typeof tokenResponseSchema>;
export type JsonObject = z.infer<typeof jsonObjectSchema>;

/**
 * Validate a decoded JSON body.
 *
 * @throws {InvalidContentError} naming `what` and the first failing path.
 */
export function parseBody<T extends z.ZodTypeAny>(
	schema: T,
	body: unknown,
	what: string,
): z.output<T> {
	const result = schema.safeParse(body);
	if (!result.success) {
		const issue = result.error.issues[0];
		const where = issue?.path.length ? ` at "${issue.path.join('.')}"` : '';
		throw new InvalidContentError(
			`invalid ${what}${where}: ${issue?.message ?? 'unexpected shape'}`,
		);
	}
	return result.data;
}
