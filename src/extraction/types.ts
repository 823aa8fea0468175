/**
 * Which list roots hold the records of a section: the largest one, or every
 * one in document order (tabbed sections such as skills)
 */
export type ListRootMode = 'primary' | 'all'

export interface PipelineDiagnostics {
  sectionName: string
  listRootsFound: number
  elementsFound: number
  itemsParsed: number
  /** Records kept although the parser's validate() rejected them */
  itemsIncomplete: number
  itemsFailed: number
  /** Error messages the upstream service embedded in the document */
  upstreamErrors: string[]
  durationMs: number
}

export interface PipelineResult<T> {
  items: T[]
  diagnostics: PipelineDiagnostics
}

export type HealthStatus = 'healthy' | 'degraded' | 'broken'

export interface HealthReport {
  section: string
  status: HealthStatus
  itemCount: number
  incompleteCount: number
  failedCount: number
  message: string
}
