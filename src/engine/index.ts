export { CopyEngine } from "./copy-engine.js";
export type { CopyEngineConfig, EngineEvents, EngineJob } from "./copy-engine.js";
export { createMirror } from "./create-mirror.js";
export type { CreateMirrorOptions, Mirror } from "./create-mirror.js";
