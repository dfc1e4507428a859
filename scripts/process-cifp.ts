// Script to decode the VHF navaids of a CIFP file into JSON and a SQL dump
// Usage: npm run process-cifp -- [path/to/FAACIFP18]
import { readFile, writeFile } from 'fs/promises'
import { convertToApiFormat, parseCifpFile } from '../lib/cifp-parser'
import { loadConfig } from '../lib/config'
import { filterValidNavaids } from '../lib/navaid-processing'
import { toSqlScript } from '../lib/sql-export'
import { validateCifpFile } from '../lib/validate-cifp'

async function processCifp() {
  const config = loadConfig()
  const inputPath = process.argv[2] ?? config.cifpFiles[0]

  console.log(`Reading ${inputPath}...`)
  const content = await readFile(inputPath, 'utf-8')

  console.log('Validating...')
  const validation = validateCifpFile(content)
  for (const warning of validation.warnings) {
    console.warn(`  warning: ${warning}`)
  }
  if (!validation.isValid) {
    throw new Error(`Not a usable CIFP file: ${validation.errors.join('; ')}`)
  }

  console.log('Parsing VHF navaid records...')
  const { navaids, skipped, errors } = parseCifpFile(content)
  console.log(`Parsed ${navaids.length} navaids (${skipped} other records skipped, ${errors.length} errors)`)

  const converted = filterValidNavaids(convertToApiFormat(navaids, config.source))
  console.log(`${converted.length} navaids have usable coordinates`)

  const jsonPath = `${inputPath}.navaids.json`
  const sqlPath = `${inputPath}.navaids.sql`
  await writeFile(jsonPath, JSON.stringify(converted, null, 2), 'utf-8')
  await writeFile(sqlPath, toSqlScript(navaids), 'utf-8')

  console.log(`\n✅ Wrote ${jsonPath}`)
  console.log(`✅ Wrote ${sqlPath}`)
}

processCifp().catch(error => {
  console.error('Error processing CIFP file:', error)
  process.exit(1)
})
