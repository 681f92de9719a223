export { loadConfig } from "./config.js";
export type { Environment, LayerproofConfig } from "./config.js";
