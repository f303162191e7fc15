export { JurisdictionRegistry, RegistryBuilder, createRegistry, isKnownTimezone } from './registry.js'
export { loadRegistry, defaultRegistry, configuredDefaults, readCatalogFile, findCatalogFiles } from './loader.js'
export type { LoadOptions } from './loader.js'
export { DEFAULT_ORG_CLASSIFICATIONS, buildRecord, createBaseRecord } from './defaults.js'
export { JurisdictionEntrySchema, CatalogFileSchema, entryToOverrides } from './schema.js'
export type { JurisdictionEntry } from './schema.js'
export { labelText, orgClassification, jurisdictionId, parsePortalDate } from './accessors.js'
export type { BillDetailField } from './accessors.js'
export * from '../core/errors.js'
export type * from '../core/types.js'
