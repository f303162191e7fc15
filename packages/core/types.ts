/**
 * Core types for the jurisdiction configuration registry
 */

/** Organization classifications accepted by the civic data schema */
export type OrgClassification =
  | 'legislature'
  | 'executive'
  | 'upper'
  | 'lower'
  | 'party'
  | 'committee'
  | 'commission'
  | 'corporation'
  | 'agency'
  | 'department'

/** How dates are written on a portal instance */
export type DatetimeFormat = 'MM/DD/YYYY' | 'DD/MM/YYYY' | 'YYYY-MM-DD'

export interface ConfigRecord {
  // Identity
  readonly name: string
  readonly rootUrl: string               // Base URL of the portal instance
  readonly divisionId: string            // OCD division id
  readonly classification: string        // e.g. "government"
  readonly verboseName: string

  // Feature flags
  readonly pplSearchTableDetailAvailable: boolean
  readonly createLegislatureMembership: boolean
  readonly pplPartyRequired: boolean

  // Normalization
  readonly orgClassifications: Readonly<Record<string, OrgClassification>>
  readonly toplevelOrgMembershipName: string

  // Timestamps
  readonly timezone: string              // IANA zone name
  readonly datetimeFormat: DatetimeFormat

  // Portal field labels
  readonly billDetailTextAgenda: string
  readonly billDetailTextEnactmentDate: string
  readonly billDetailTextFinalAction: string
  readonly billDetailTextSponsors: string
  readonly billSearchTimePeriod: string
}

/**
 * Values every record inherits unless the jurisdiction sets its own.
 * Name, URL and display name are per-jurisdiction only.
 */
export type RecordDefaults = Omit<ConfigRecord, 'name' | 'rootUrl' | 'verboseName'>

/** The fields a jurisdiction sets explicitly */
export type ConfigOverrides = Pick<ConfigRecord, 'name' | 'rootUrl'> &
  Partial<Omit<ConfigRecord, 'name' | 'rootUrl'>>

/** Registry-wide values taken from the application config */
export interface RegistryDefaults {
  timezone: string
  divisionId: string
}
