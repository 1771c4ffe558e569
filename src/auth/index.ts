export type { Credentials, OpenApiKeySet } from "./types.js";
export { createCredentials, unwrapCredentials } from "./credentials.js";
