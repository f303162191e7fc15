/**
 * Record accessors used by the scraper
 *
 * Label lookup, organization classification, OCD ids and portal date
 * interpretation, all driven by the jurisdiction's record.
 */

import type { ConfigRecord, DatetimeFormat, OrgClassification } from '../core/types.js'
import { PortalDateError } from '../core/errors.js'

export type BillDetailField = 'agenda' | 'enactmentDate' | 'finalAction' | 'sponsors'

const BILL_DETAIL_LABELS = {
  agenda: 'billDetailTextAgenda',
  enactmentDate: 'billDetailTextEnactmentDate',
  finalAction: 'billDetailTextFinalAction',
  sponsors: 'billDetailTextSponsors'
} as const satisfies Record<BillDetailField, keyof ConfigRecord>

/**
 * Label text of a bill detail field on this jurisdiction's portal
 *
 * @example
 * labelText(record, 'agenda') // 'On agenda'
 */
export function labelText(record: ConfigRecord, field: BillDetailField): string {
  return record[BILL_DETAIL_LABELS[field]]
}

/**
 * Classification for an organization label scraped from a roster.
 * Labels not in the record's table are treated as committees.
 */
export function orgClassification(record: ConfigRecord, orgName: string): OrgClassification {
  const name = orgName.trim()

  if (name === record.toplevelOrgMembershipName) {
    return 'legislature'
  }

  if (Object.hasOwn(record.orgClassifications, name)) {
    return record.orgClassifications[name]
  }

  return 'committee'
}

/**
 * OCD jurisdiction id for output tagging
 *
 * @example
 * // divisionId 'ocd-division/country:us/state:wa/place:olympia'
 * jurisdictionId(record) // 'ocd-jurisdiction/country:us/state:wa/place:olympia/government'
 */
export function jurisdictionId(record: ConfigRecord): string {
  const division = record.divisionId.replace(/^ocd-division\//, '')
  return `ocd-jurisdiction/${division}/${record.classification}`
}

interface WallClock {
  year: number
  month: number    // 1-12
  day: number
  hour: number     // 0-23
  minute: number
}

const TIME = String.raw`(?:\s+(\d{1,2}):(\d{2})\s*([AaPp][Mm]))?`

type DatePart = 'year' | 'month' | 'day'

const DATE_PATTERNS: Record<DatetimeFormat, { pattern: RegExp; order: [DatePart, DatePart, DatePart] }> = {
  'MM/DD/YYYY': { pattern: new RegExp(String.raw`^(\d{1,2})/(\d{1,2})/(\d{4})${TIME}$`), order: ['month', 'day', 'year'] },
  'DD/MM/YYYY': { pattern: new RegExp(String.raw`^(\d{1,2})/(\d{1,2})/(\d{4})${TIME}$`), order: ['day', 'month', 'year'] },
  'YYYY-MM-DD': { pattern: new RegExp(String.raw`^(\d{4})-(\d{1,2})-(\d{1,2})${TIME}$`), order: ['year', 'month', 'day'] }
}

function readWallClock(text: string, format: DatetimeFormat): WallClock | null {
  const { pattern, order } = DATE_PATTERNS[format]
  const match = pattern.exec(text)
  if (!match) return null

  const date = { year: 0, month: 0, day: 0 }
  order.forEach((part, i) => {
    date[part] = parseInt(match[i + 1], 10)
  })

  let hour = 0
  let minute = 0
  if (match[4] !== undefined) {
    const hour12 = parseInt(match[4], 10)
    minute = parseInt(match[5], 10)
    if (hour12 < 1 || hour12 > 12 || minute > 59) return null

    const pm = match[6].toLowerCase() === 'pm'
    hour = (hour12 % 12) + (pm ? 12 : 0)
  }

  // Reject dates that roll over, like 02/30
  const check = new Date(Date.UTC(date.year, date.month - 1, date.day))
  if (
    check.getUTCFullYear() !== date.year ||
    check.getUTCMonth() !== date.month - 1 ||
    check.getUTCDate() !== date.day
  ) {
    return null
  }

  return { ...date, hour, minute }
}

/**
 * Offset of a zone from UTC at an instant, in milliseconds
 */
function zoneOffset(instant: number, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit'
  }).formatToParts(new Date(instant))

  const get = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(parts.find(part => part.type === type)?.value ?? '0', 10)

  const asUtc = Date.UTC(get('year'), get('month') - 1, get('day'), get('hour'), get('minute'), get('second'))
  return asUtc - Math.floor(instant / 1000) * 1000
}

const DAY = 24 * 60 * 60 * 1000

/**
 * UTC instant of a wall-clock time in a zone.
 *
 * A time repeated by a fall-back transition resolves to the earlier instant.
 * A time skipped by a spring-forward transition is read with the offset in
 * force before the gap, which moves it forward (2:30 AM becomes 3:30 AM).
 */
function wallClockToUtc(wall: WallClock, timeZone: string): Date {
  const naive = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute)
  const before = zoneOffset(naive - DAY, timeZone)
  const after = zoneOffset(naive + DAY, timeZone)

  const candidates = [naive - before, naive - after]
    .filter(instant => naive - zoneOffset(instant, timeZone) === instant)
    .sort((a, b) => a - b)

  return new Date(candidates.length > 0 ? candidates[0] : naive - before)
}

/**
 * Parse a date as written on the jurisdiction's portal
 *
 * The text is read in the record's datetime format, optionally followed by
 * a "6:30 PM" style time, and interpreted in the record's timezone.
 *
 * @returns The UTC instant, or null for blank text
 * @throws PortalDateError if the text does not match the format
 */
export function parsePortalDate(record: ConfigRecord, text: string): Date | null {
  const trimmed = text.replace(/\u00a0/g, ' ').trim()
  if (!trimmed) return null

  const wall = readWallClock(trimmed, record.datetimeFormat)
  if (!wall) {
    throw new PortalDateError(record.name, trimmed, record.datetimeFormat)
  }

  return wallClockToUtc(wall, record.timezone)
}
