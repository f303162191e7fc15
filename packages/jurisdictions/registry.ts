/**
 * Jurisdiction Configuration Registry
 *
 * Records are registered on a builder at startup. The built registry is
 * read-only and can be shared by any number of scraper workers.
 */

import type { ConfigOverrides, ConfigRecord, RecordDefaults, RegistryDefaults } from '../core/types.js'
import {
  DuplicateJurisdictionError,
  InvalidRecordError,
  UnknownJurisdictionError
} from '../core/errors.js'
import { lookupKey } from '../core/names.js'
import { buildRecord, createBaseRecord } from './defaults.js'

/**
 * Check that a timezone name is known to the runtime
 */
export function isKnownTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone })
    return true
  } catch {
    return false
  }
}

function parseHttpUrl(value: string): URL | null {
  try {
    const url = new URL(value)
    return url.protocol === 'http:' || url.protocol === 'https:' ? url : null
  } catch {
    return null
  }
}

/**
 * Reject overrides that break a record invariant
 * @throws InvalidRecordError
 */
function validateOverrides(overrides: ConfigOverrides): void {
  const name = overrides.name.trim()
  if (!name) {
    throw new InvalidRecordError('(unnamed)', 'name is empty')
  }

  if (name !== overrides.name) {
    throw new InvalidRecordError(name, 'name has leading or trailing whitespace')
  }

  if (!overrides.rootUrl.trim()) {
    throw new InvalidRecordError(name, 'root_url is empty')
  }

  if (!parseHttpUrl(overrides.rootUrl)) {
    throw new InvalidRecordError(name, `root_url is not an http(s) URL: ${overrides.rootUrl}`)
  }

  if (overrides.timezone !== undefined && !isKnownTimezone(overrides.timezone)) {
    throw new InvalidRecordError(name, `unknown timezone: ${overrides.timezone}`)
  }
}

export class JurisdictionRegistry {
  private readonly byName: ReadonlyMap<string, ConfigRecord>

  constructor(records: ReadonlyMap<string, ConfigRecord>) {
    this.byName = new Map(records)
  }

  /**
   * Get the record for a jurisdiction
   * @throws UnknownJurisdictionError if the name is not registered
   */
  get(name: string): ConfigRecord {
    const record = this.byName.get(name)

    if (!record) {
      throw new UnknownJurisdictionError(name, this.suggest(name))
    }

    return record
  }

  has(name: string): boolean {
    return this.byName.has(name)
  }

  /** All registered names, in registration order */
  list(): string[] {
    return Array.from(this.byName.keys())
  }

  records(): ConfigRecord[] {
    return Array.from(this.byName.values())
  }

  get size(): number {
    return this.byName.size
  }

  /**
   * Registered names matching `name` once case and separators are ignored
   */
  suggest(name: string): string[] {
    const key = lookupKey(name)
    if (!key) return []

    return this.list().filter(candidate => lookupKey(candidate) === key)
  }
}

export class RegistryBuilder {
  private readonly base: RecordDefaults
  private readonly records = new Map<string, ConfigRecord>()

  constructor(defaults: RegistryDefaults) {
    if (!isKnownTimezone(defaults.timezone)) {
      throw new InvalidRecordError('(registry defaults)', `unknown timezone: ${defaults.timezone}`)
    }

    this.base = createBaseRecord(defaults)
  }

  /**
   * Add a jurisdiction
   * @param overrides - The fields the jurisdiction sets explicitly
   * @returns The completed record
   * @throws DuplicateJurisdictionError, InvalidRecordError
   */
  register(overrides: ConfigOverrides): ConfigRecord {
    validateOverrides(overrides)

    if (this.records.has(overrides.name)) {
      throw new DuplicateJurisdictionError(overrides.name)
    }

    const record = buildRecord(overrides, this.base)
    this.records.set(record.name, record)
    return record
  }

  /**
   * Seal the registered records into a read-only registry.
   * Later registrations on this builder do not affect it.
   */
  build(): JurisdictionRegistry {
    return new JurisdictionRegistry(this.records)
  }
}

/**
 * Build a registry from a list of overrides
 */
export function createRegistry(
  definitions: Iterable<ConfigOverrides>,
  defaults: RegistryDefaults
): JurisdictionRegistry {
  const builder = new RegistryBuilder(defaults)

  for (const definition of definitions) {
    builder.register(definition)
  }

  return builder.build()
}
