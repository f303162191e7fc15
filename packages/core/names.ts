/**
 * Name helpers for jurisdiction keys
 */

/**
 * Display name derived from a jurisdiction key
 *
 * @example
 * verboseNameFor('LassenCounty') // 'Lassen County'
 * verboseNameFor('DCCouncil')    // 'DC Council'
 */
export function verboseNameFor(name: string): string {
  return name
    .replace(/_+/g, ' ')
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .replace(/\s+/g, ' ')
    .trim()
}

/**
 * Case- and separator-insensitive key, used to suggest names for typos
 * like "lassen-county". Lookups themselves stay exact.
 */
export function lookupKey(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '')
}
