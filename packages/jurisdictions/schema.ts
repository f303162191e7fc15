/**
 * Catalog file schema
 *
 * Each catalog file is a JSON list of jurisdiction entries. Keys follow the
 * names the scraper has always used; unknown keys are rejected so a typo in
 * a flag name fails loudly instead of silently keeping the default.
 */

import { z } from 'zod'
import type { ConfigOverrides } from '../core/types.js'

export const OrgClassificationSchema = z.enum([
  'legislature',
  'executive',
  'upper',
  'lower',
  'party',
  'committee',
  'commission',
  'corporation',
  'agency',
  'department'
])

export const DatetimeFormatSchema = z.enum(['MM/DD/YYYY', 'DD/MM/YYYY', 'YYYY-MM-DD'])

const label = z.string().trim().min(1, 'Label text must not be empty')

export const JurisdictionEntrySchema = z.object({
  name: z.string()
    .regex(/^[A-Za-z][A-Za-z0-9_]*$/, 'Name must be an identifier (letters, digits, underscores)'),
  // Emptiness and URL shape are checked on registration
  root_url: z.string(),
  division_id: z.string().startsWith('ocd-division/', 'Division id must be an OCD division').optional(),
  classification: z.string().min(1).optional(),
  verbose_name: z.string().trim().min(1).optional(),

  PPL_SEARCH_TABLE_DETAIL_AVAILABLE: z.boolean().optional(),
  CREATE_LEGISLATURE_MEMBERSHIP: z.boolean().optional(),
  PPL_PARTY_REQUIRED: z.boolean().optional(),

  ORG_CLASSIFICATIONS: z.record(OrgClassificationSchema).optional(),
  TOPLEVEL_ORG_MEMBERSHIP_NAME: label.optional(),

  TIMEZONE: z.string().min(1).optional(),
  DATETIME_FORMAT: DatetimeFormatSchema.optional(),

  BILL_DETAIL_TEXT_AGENDA: label.optional(),
  BILL_DETAIL_TEXT_ENACTMENT_DATE: label.optional(),
  BILL_DETAIL_TEXT_FINAL_ACTION: label.optional(),
  BILL_DETAIL_TEXT_SPONSORS: label.optional(),
  BILL_SEARCH_TIME_PERIOD: label.optional()
}).strict()

export const CatalogFileSchema = z.array(JurisdictionEntrySchema)

export type JurisdictionEntry = z.infer<typeof JurisdictionEntrySchema>

/**
 * Transform a catalog entry to the overrides it declares.
 * Absent keys come through as undefined and the base record supplies them.
 */
export function entryToOverrides(entry: JurisdictionEntry): ConfigOverrides {
  return {
    name: entry.name,
    rootUrl: entry.root_url,
    divisionId: entry.division_id,
    classification: entry.classification,
    verboseName: entry.verbose_name,

    pplSearchTableDetailAvailable: entry.PPL_SEARCH_TABLE_DETAIL_AVAILABLE,
    createLegislatureMembership: entry.CREATE_LEGISLATURE_MEMBERSHIP,
    pplPartyRequired: entry.PPL_PARTY_REQUIRED,

    orgClassifications: entry.ORG_CLASSIFICATIONS,
    toplevelOrgMembershipName: entry.TOPLEVEL_ORG_MEMBERSHIP_NAME,

    timezone: entry.TIMEZONE,
    datetimeFormat: entry.DATETIME_FORMAT,

    billDetailTextAgenda: entry.BILL_DETAIL_TEXT_AGENDA,
    billDetailTextEnactmentDate: entry.BILL_DETAIL_TEXT_ENACTMENT_DATE,
    billDetailTextFinalAction: entry.BILL_DETAIL_TEXT_FINAL_ACTION,
    billDetailTextSponsors: entry.BILL_DETAIL_TEXT_SPONSORS,
    billSearchTimePeriod: entry.BILL_SEARCH_TIME_PERIOD
  }
}

/**
 * Format zod issues as "path: message" lines
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `${where}: ${issue.message}`
    })
    .join('; ')
}
