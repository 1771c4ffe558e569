export { Broker, type InstrumentSpec, type SymbolCatalog } from "./types.js";
export { SymbolMapper, normalizeSymbolName } from "./symbol-mapper.js";
