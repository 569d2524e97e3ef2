export { buildCatalogEntry, type CatalogField } from "./build";
export {
	fieldMetadata,
	isFieldSelected,
	resolveStreamDefinitions,
	streamMetadata,
} from "./resolve";
export type { Catalog, CatalogEntry, Inclusion, MetadataEntry } from "./types";
export { validateCatalog } from "./validate";
