export {
  bundledCatalogPath,
  loadCatalog,
  parseCatalog,
} from "./catalog-loader.js";
export type { Catalog } from "./types.js";
