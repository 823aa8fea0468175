import fs from 'node:fs/promises'
import { DocumentReadError } from './exceptions'

/**
 * Reads a saved response document (JSON) from disk
 * @throws DocumentReadError when the file cannot be read or is not JSON
 */
export async function loadDocument(filePath: string): Promise<unknown> {
  let content: string
  try {
    content = await fs.readFile(filePath, 'utf8')
  } catch (e) {
    throw new DocumentReadError(`Cannot read ${filePath}: ${e}`, filePath)
  }

  try {
    return JSON.parse(content)
  } catch (e) {
    throw new DocumentReadError(`${filePath} is not valid JSON: ${e}`, filePath)
  }
}

export async function loadDocuments(filePaths: string[]): Promise<unknown[]> {
  return Promise.all(filePaths.map((filePath) => loadDocument(filePath)))
}
