#!/usr/bin/env node
/**
 * CLI for inspecting the jurisdiction catalog
 *
 * Usage:
 *   node apps/cli/run.js list
 *   node apps/cli/run.js show <name>
 *   node apps/cli/run.js validate
 */

import 'dotenv/config'
import { loadRegistry } from '../../packages/jurisdictions/loader.js'
import { jurisdictionId } from '../../packages/jurisdictions/accessors.js'
import { UnknownJurisdictionError, isFatal } from '../../packages/core/errors.js'
import type { JurisdictionRegistry } from '../../packages/jurisdictions/registry.js'

function printUsage(): void {
  console.error('Usage: node apps/cli/run.js <command> [args]')
  console.error('')
  console.error('Commands:')
  console.error('  list          - List all registered jurisdictions')
  console.error('  show <name>   - Print the resolved record for a jurisdiction')
  console.error('  validate      - Load every catalog file and report overrides')
}

function list(registry: JurisdictionRegistry): void {
  console.log('\n📋 Registered jurisdictions:\n')

  const names = registry.list().sort()
  names.forEach(name => {
    const record = registry.get(name)
    console.log(`  ${name}`)
    console.log(`    ${record.verboseName} - ${record.rootUrl}`)
  })

  console.log(`\nTotal: ${names.length} jurisdiction(s)`)
}

function show(registry: JurisdictionRegistry, name: string): void {
  const record = registry.get(name)

  console.log(JSON.stringify({ ...record, jurisdictionId: jurisdictionId(record) }, null, 2))
}

function validate(registry: JurisdictionRegistry): void {
  const records = registry.records()
  const withDetail = records.filter(r => r.pplSearchTableDetailAvailable)

  console.log(`\n✓ ${records.length} record(s) valid`)
  console.log(`  People search detail disabled: ${records.length - withDetail.length}`)
  console.log(`  Timezones in use: ${[...new Set(records.map(r => r.timezone))].sort().join(', ')}`)
}

function main(): void {
  const command = process.argv[2]
  const arg = process.argv[3]

  if (!command) {
    printUsage()
    process.exit(1)
  }

  try {
    const registry = loadRegistry({ verbose: command === 'validate' })

    if (command === 'list') {
      list(registry)
    }

    else if (command === 'show') {
      if (!arg) {
        console.error('Error: jurisdiction name required')
        console.error('Usage: node apps/cli/run.js show <name>')
        process.exit(1)
      }
      show(registry, arg)
    }

    else if (command === 'validate') {
      validate(registry)
    }

    else {
      console.error(`Unknown command: ${command}`)
      process.exit(1)
    }

  } catch (error) {
    if (error instanceof UnknownJurisdictionError && error.suggestions.length > 0) {
      console.error(`\n❌ ${error.message} (did you mean ${error.suggestions.join(', ')}?)`)
      process.exit(1)
    }

    console.error(`\n❌ ${isFatal(error) ? 'Fatal error' : 'Error'}:`, error instanceof Error ? error.message : String(error))
    if (isFatal(error) && error instanceof Error) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

main()
