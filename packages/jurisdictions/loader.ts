/**
 * Catalog loader
 *
 * Discovers the catalog files in the data directory, validates every entry
 * and registers it. Runs once at startup; any error is fatal.
 */

import fs from 'fs'
import path from 'path'
import { globSync } from 'glob'
import config from '../../config.js'
import type { RegistryDefaults } from '../core/types.js'
import { InvalidRecordError } from '../core/errors.js'
import { CatalogFileSchema, describeIssues, entryToOverrides } from './schema.js'
import type { JurisdictionEntry } from './schema.js'
import { JurisdictionRegistry, RegistryBuilder } from './registry.js'

export interface LoadOptions {
  /** Directory holding the catalog files (default: config.registry.data_dir) */
  dataDir?: string;
  /** Registry-wide defaults (default: from config) */
  defaults?: RegistryDefaults;
  /** Log a summary line (default: true) */
  verbose?: boolean;
}

/**
 * Registry-wide defaults from the root config
 */
export function configuredDefaults(): RegistryDefaults {
  return {
    timezone: config.registry.default_timezone,
    divisionId: config.registry.default_division_id
  }
}

/**
 * Find catalog files, sorted so duplicate detection is deterministic
 */
export function findCatalogFiles(dataDir: string): string[] {
  return globSync('*.json', { cwd: dataDir, absolute: true }).sort()
}

/**
 * Read and validate one catalog file
 * @throws InvalidRecordError naming the file and the failing entries
 */
export function readCatalogFile(file: string): JurisdictionEntry[] {
  const label = path.basename(file)
  let raw: unknown

  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'))
  } catch (error) {
    throw new InvalidRecordError(label, `unreadable catalog file: ${error instanceof Error ? error.message : String(error)}`)
  }

  const parsed = CatalogFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new InvalidRecordError(label, describeIssues(parsed.error))
  }

  return parsed.data
}

/**
 * Build the registry from every catalog file in the data directory
 * @throws Error if no catalog file is found
 * @throws InvalidRecordError, DuplicateJurisdictionError
 */
export function loadRegistry(options: LoadOptions = {}): JurisdictionRegistry {
  const dataDir = options.dataDir ?? config.registry.data_dir
  const defaults = options.defaults ?? configuredDefaults()
  const verbose = options.verbose ?? true

  const files = findCatalogFiles(dataDir)
  if (files.length === 0) {
    throw new Error(`No jurisdiction catalog files found in ${dataDir}`)
  }

  const builder = new RegistryBuilder(defaults)

  for (const file of files) {
    for (const entry of readCatalogFile(file)) {
      builder.register(entryToOverrides(entry))
    }
  }

  const registry = builder.build()

  if (verbose) {
    console.log(`[registry] Loaded ${registry.size} jurisdiction(s) from ${files.length} catalog file(s)`)
  }

  return registry
}

let cached: JurisdictionRegistry | null = null

/**
 * Registry built from the configured data directory, loaded on first use
 */
export function defaultRegistry(): JurisdictionRegistry {
  if (!cached) {
    cached = loadRegistry()
  }

  return cached
}
