/**
 * Schema catalog module
 */

export { ConfiguredSchemaCatalog, validateCatalog, type SchemaCatalog } from './schema-catalog.js';
export { checkAttributeValue } from './values.js';
export {
  CATALOG_FILE_NAME,
  parseCatalogDocument,
  parseCatalogYaml,
  loadCatalogFile,
} from './file.js';
