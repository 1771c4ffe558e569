/**
 * Opaque credential container: secrets never leak through toString,
 * JSON.stringify, or Node.js inspect.
 */

import { inspect } from "node:util";
import { AuthError } from "../shared/errors.js";
import type { Credentials, OpenApiKeySet } from "./types.js";

const REDACTED = "[REDACTED]";

class SealedCredentials {
	readonly __opaque = true as const;

	toString(): string {
		return REDACTED;
	}

	toJSON(): string {
		return REDACTED;
	}

	[inspect.custom](): string {
		return REDACTED;
	}
}

// ── Private store ────────────────────────────────────────────────────

const store = new WeakMap<object, OpenApiKeySet>();

function isCredentials(value: SealedCredentials): value is SealedCredentials & Credentials {
	return store.has(value);
}

// ── Factory ──────────────────────────────────────────────────────────

/**
 * Seal an OpenApiKeySet. The result redacts itself when stringified or
 * inspected, so it can travel inside config objects that get logged.
 * @throws AuthError if any field is empty
 */
export function createCredentials(keys: OpenApiKeySet): Credentials {
	for (const [field, value] of Object.entries(keys)) {
		if (typeof value !== "string" || value.length === 0) {
			throw new AuthError(`Credential field "${field}" must be a non-empty string`);
		}
	}
	const sealed = new SealedCredentials();
	store.set(sealed, { ...keys });
	if (!isCredentials(sealed)) {
		throw new AuthError("Failed to seal credentials");
	}
	return sealed;
}

// ── Accessor ─────────────────────────────────────────────────────────

/**
 * The only way back to the raw key set. Returns a copy.
 * @throws AuthError if the object was not produced by createCredentials
 */
export function unwrapCredentials(credentials: Credentials): OpenApiKeySet {
	const keys = store.get(credentials);
	if (!keys) {
		throw new AuthError("Invalid credentials object");
	}
	return { ...keys };
}
