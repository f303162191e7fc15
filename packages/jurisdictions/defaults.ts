/**
 * Base record shared by every jurisdiction
 *
 * A record is this base overlaid with the fields the jurisdiction sets.
 * There is exactly one level of overriding.
 */

import type {
  ConfigOverrides,
  ConfigRecord,
  OrgClassification,
  RecordDefaults,
  RegistryDefaults
} from '../core/types.js'
import { verboseNameFor } from '../core/names.js'

/** Organization labels as they commonly appear on portal rosters */
export const DEFAULT_ORG_CLASSIFICATIONS: Readonly<Record<string, OrgClassification>> = Object.freeze({
  'City Council': 'legislature',
  'Board of Supervisors': 'legislature',
  'Board of Commissioners': 'legislature',
  'Committee': 'committee',
  'Standing Committee': 'committee',
  'Subcommittee': 'committee',
  'Joint Committee': 'committee',
  'Task Force': 'committee',
  'Commission': 'commission',
  'Board': 'commission',
  'Authority': 'agency',
  'Department': 'department',
  'Office of the Mayor': 'executive'
})

/**
 * Build the base record for a registry
 * @param registry - Registry-wide timezone and division id
 */
export function createBaseRecord(registry: RegistryDefaults): RecordDefaults {
  const base: RecordDefaults = {
    divisionId: registry.divisionId,
    classification: 'government',

    pplSearchTableDetailAvailable: true,
    createLegislatureMembership: false,
    pplPartyRequired: true,

    orgClassifications: DEFAULT_ORG_CLASSIFICATIONS,
    toplevelOrgMembershipName: 'City Council',

    timezone: registry.timezone,
    datetimeFormat: 'MM/DD/YYYY',

    billDetailTextAgenda: 'On agenda',
    billDetailTextEnactmentDate: 'Enactment date',
    billDetailTextFinalAction: 'Final action',
    billDetailTextSponsors: 'Sponsors',
    billSearchTimePeriod: 'This Year'
  }

  return Object.freeze(base)
}

/**
 * Overlay a jurisdiction's explicit fields on the base record.
 * Organization classifications extend the base table; every other field
 * replaces the base value when set.
 */
export function buildRecord(overrides: ConfigOverrides, base: RecordDefaults): ConfigRecord {
  const orgClassifications = Object.freeze({
    ...base.orgClassifications,
    ...overrides.orgClassifications
  })

  const record: ConfigRecord = {
    name: overrides.name,
    rootUrl: overrides.rootUrl,
    divisionId: overrides.divisionId ?? base.divisionId,
    classification: overrides.classification ?? base.classification,
    verboseName: overrides.verboseName ?? verboseNameFor(overrides.name),

    pplSearchTableDetailAvailable: overrides.pplSearchTableDetailAvailable ?? base.pplSearchTableDetailAvailable,
    createLegislatureMembership: overrides.createLegislatureMembership ?? base.createLegislatureMembership,
    pplPartyRequired: overrides.pplPartyRequired ?? base.pplPartyRequired,

    orgClassifications,
    toplevelOrgMembershipName: overrides.toplevelOrgMembershipName ?? base.toplevelOrgMembershipName,

    timezone: overrides.timezone ?? base.timezone,
    datetimeFormat: overrides.datetimeFormat ?? base.datetimeFormat,

    billDetailTextAgenda: overrides.billDetailTextAgenda ?? base.billDetailTextAgenda,
    billDetailTextEnactmentDate: overrides.billDetailTextEnactmentDate ?? base.billDetailTextEnactmentDate,
    billDetailTextFinalAction: overrides.billDetailTextFinalAction ?? base.billDetailTextFinalAction,
    billDetailTextSponsors: overrides.billDetailTextSponsors ?? base.billDetailTextSponsors,
    billSearchTimePeriod: overrides.billSearchTimePeriod ?? base.billSearchTimePeriod
  }

  return Object.freeze(record)
}
