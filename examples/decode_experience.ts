import {
  buildHealthReport,
  createExperiencePipeline,
  experienceToString,
  formatExperienceForOutput,
  loadDocuments,
} from '../src'

async function runExample() {
  const filePaths = process.argv.slice(2).filter((arg) => !arg.startsWith('--'))
  if (filePaths.length === 0) {
    throw new Error('Usage: decode_experience.ts <page.json> [page2.json ...] [--summary]')
  }
  const summaryOnly = process.argv.includes('--summary')

  console.log('\n--- Experience Decoder ---')
  console.log(`Pages: ${filePaths.join(', ')}`)

  const documents = await loadDocuments(filePaths)
  const result = createExperiencePipeline().decodePages(documents)
  const report = buildHealthReport(result)

  console.log(`\n${'='.repeat(50)}`)
  console.log(report.message)
  console.log('='.repeat(50))

  if (summaryOnly) {
    for (const experience of result.items) {
      console.log(experienceToString(experience))
    }
  } else {
    console.log(JSON.stringify(formatExperienceForOutput(result.items), null, 2))
  }

  if (result.diagnostics.upstreamErrors.length > 0) {
    console.warn(`Upstream errors: ${result.diagnostics.upstreamErrors.join('; ')}`)
  }
}

runExample().catch((error) => {
  console.error('Experience decoding failed:', error)
  process.exitCode = 1
})
