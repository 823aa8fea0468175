import { loadDocument, parseSearchResults } from '../src'

async function runExample() {
  const filePath = process.argv[2]?.trim() ?? ''
  if (!filePath) {
    throw new Error('Usage: decode_search.ts <hits.json> [--include-private]')
  }
  const includePrivateProfiles = process.argv.includes('--include-private')

  console.log('\n--- People Search Decoder ---')
  console.log(`Input: ${filePath}`)
  console.log(`Private profiles: ${includePrivateProfiles ? 'kept' : 'dropped'}`)

  const document = await loadDocument(filePath)
  const hits: unknown[] = Array.isArray(document) ? document : []
  const results = parseSearchResults(hits, { includePrivateProfiles })

  for (const result of results) {
    const degree = result.connectionDegree ?? '-'
    console.log(`${result.name ?? '(no name)'} [${degree}] ${result.jobTitle ?? ''}`)
  }
  console.log(`\n${results.length} of ${hits.length} hits decoded`)
}

runExample().catch((error) => {
  console.error('Search decoding failed:', error)
  process.exitCode = 1
})
