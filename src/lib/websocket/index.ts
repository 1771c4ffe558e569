export type { WsClientLike, WsConfig, WsEvents, WsState } from "./types.js";
export { WsClient } from "./client.js";
