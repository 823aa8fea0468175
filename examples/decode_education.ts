import { formatEducationForOutput, loadDocument, parseEducationResponse } from '../src'

async function runExample() {
  const filePath = process.argv[2]?.trim() ?? ''
  if (!filePath) {
    throw new Error('Usage: decode_education.ts <response.json>')
  }

  console.log('\n--- Education Decoder ---')
  console.log(`Input: ${filePath}`)

  const educations = parseEducationResponse(await loadDocument(filePath))
  console.log(JSON.stringify(formatEducationForOutput(educations), null, 2))
}

runExample().catch((error) => {
  console.error('Education decoding failed:', error)
  process.exitCode = 1
})
