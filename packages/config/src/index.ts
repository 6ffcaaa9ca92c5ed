export { loadConfig } from "./load-config.js";
export { configSchema, type AppConfig } from "./schema.js";
export {
  catalogSchema,
  collectRelevanceTerms,
  defaultCatalogPath,
  findTopic,
  loadCatalog,
  parseCatalog,
  type Catalog,
  type Feed,
  type QuoteIndicator,
  type QuotesCatalog,
  type Topic
} from "./catalog.js";
