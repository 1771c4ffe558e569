/**
 * Auth bounded context: type definitions.
 *
 * The application secret and both account access tokens are sealed into one
 * opaque Credentials object at config load time. OpenApiKeySet is the raw
 * material before sealing.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Plaintext secrets for one Open API application and its two accounts. */
export interface OpenApiKeySet {
	/** Application client id issued by the venue */
	readonly clientId: string;
	readonly clientSecret: string;
	/** OAuth access token granting trading rights on the master account */
	readonly masterAccessToken: string;
	/** OAuth access token granting trading rights on the slave account */
	readonly slaveAccessToken: string;
}

/**
 * Opaque credential container. toString, toJSON and Node's inspect all
 * return "[REDACTED]".
 *
 * Use createCredentials() to seal an OpenApiKeySet and unwrapCredentials()
 * to read it back.
 */
export type Credentials = Brand<{ readonly __opaque: true }, "Credentials">;
