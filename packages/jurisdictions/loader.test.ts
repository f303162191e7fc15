import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { fileURLToPath } from 'url'
import { defaultRegistry, findCatalogFiles, loadRegistry, readCatalogFile } from './loader.js'
import config from '../../config.js'
import { DuplicateJurisdictionError, InvalidRecordError } from '../core/errors.js'
import type { RegistryDefaults } from '../core/types.js'

const defaults: RegistryDefaults = {
  timezone: 'America/New_York',
  divisionId: 'ocd-division/country:us'
}

describe('catalog loader', () => {
  let dataDir: string

  function writeCatalog(file: string, contents: unknown): void {
    fs.writeFileSync(path.join(dataDir, file), JSON.stringify(contents))
  }

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'jurisdictions-'))
  })

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true })
  })

  it('registers entries from every catalog file', () => {
    writeCatalog('us.json', [
      { name: 'Olympia', root_url: 'https://olympia.legistar.com/' },
      { name: 'Maricopa', root_url: 'https://maricopa.legistar.com/', PPL_SEARCH_TABLE_DETAIL_AVAILABLE: false }
    ])
    writeCatalog('ca.json', [
      {
        name: 'Barrie',
        root_url: 'https://barrie.legistar.com/',
        TIMEZONE: 'America/Toronto',
        ORG_CLASSIFICATIONS: { 'Circulation List': 'committee' }
      }
    ])

    const registry = loadRegistry({ dataDir, defaults, verbose: false })

    expect(registry.list().sort()).toEqual(['Barrie', 'Maricopa', 'Olympia'])
    expect(registry.get('Maricopa').pplSearchTableDetailAvailable).toBe(false)
    expect(registry.get('Barrie').timezone).toBe('America/Toronto')
    expect(registry.get('Barrie').orgClassifications['Circulation List']).toBe('committee')
    expect(registry.get('Olympia').timezone).toBe('America/New_York')
  })

  it('ignores files that are not JSON', () => {
    writeCatalog('us.json', [{ name: 'Olympia', root_url: 'https://olympia.legistar.com/' }])
    fs.writeFileSync(path.join(dataDir, 'README.md'), '# catalog')

    expect(findCatalogFiles(dataDir).map(file => path.basename(file))).toEqual(['us.json'])
  })

  it('fails when the directory has no catalog', () => {
    expect(() => loadRegistry({ dataDir, defaults, verbose: false }))
      .toThrow(`No jurisdiction catalog files found in ${dataDir}`)
  })

  it('rejects a name registered in two files', () => {
    writeCatalog('a.json', [{ name: 'Olympia', root_url: 'https://olympia.legistar.com/' }])
    writeCatalog('b.json', [{ name: 'Olympia', root_url: 'https://olympia.example.org/' }])

    expect(() => loadRegistry({ dataDir, defaults, verbose: false })).toThrow(DuplicateJurisdictionError)
  })

  it('rejects an entry with an empty root_url', () => {
    writeCatalog('us.json', [{ name: 'Nowhere', root_url: '' }])

    expect(() => loadRegistry({ dataDir, defaults, verbose: false }))
      .toThrow('Invalid record for Nowhere: root_url is empty')
  })

  it('rejects unknown keys', () => {
    writeCatalog('us.json', [{ name: 'Olympia', root_url: 'https://olympia.legistar.com/', PPL_SEARCH_TABLE: false }])

    expect(() => readCatalogFile(path.join(dataDir, 'us.json'))).toThrow(InvalidRecordError)
  })

  it('names the failing entry and field', () => {
    writeCatalog('us.json', [
      { name: 'Olympia', root_url: 'https://olympia.legistar.com/' },
      { name: 'Seattle', root_url: 'https://seattle.legistar.com/', PPL_SEARCH_TABLE_DETAIL_AVAILABLE: 'no' }
    ])

    try {
      readCatalogFile(path.join(dataDir, 'us.json'))
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRecordError)
      if (error instanceof InvalidRecordError) {
        expect(error.jurisdiction).toBe('us.json')
        expect(error.reason).toMatch(/^1\.PPL_SEARCH_TABLE_DETAIL_AVAILABLE: /)
      }
    }
  })

  it('rejects a file that is not valid JSON', () => {
    fs.writeFileSync(path.join(dataDir, 'broken.json'), '[{ "name": ')

    expect(() => readCatalogFile(path.join(dataDir, 'broken.json')))
      .toThrow(/^Invalid record for broken\.json: unreadable catalog file: /)
  })

  it('rejects organization classifications outside the schema', () => {
    writeCatalog('ca.json', [
      { name: 'Barrie', root_url: 'https://barrie.legistar.com/', ORG_CLASSIFICATIONS: { 'Circulation List': 'mailing list' } }
    ])

    expect(() => readCatalogFile(path.join(dataDir, 'ca.json'))).toThrow(InvalidRecordError)
  })
})

describe('defaultRegistry', () => {
  it('finds the shipped catalog beside the sources', () => {
    expect(config.registry.data_dir).toBe(path.join(path.dirname(fileURLToPath(import.meta.url)), 'data'))
  })

  it('loads the configured catalog once', () => {
    const registry = defaultRegistry()

    expect(registry.get('Maricopa').pplSearchTableDetailAvailable).toBe(false)
    expect(defaultRegistry()).toBe(registry)
  })
})
