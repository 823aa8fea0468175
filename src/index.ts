export * from './config/constants'
export * from './config/options'
export * from './decoders'
export * from './documents'
export * from './exceptions'
export * from './extraction/components'
export {
  containsMonthToken,
  formatIsoDate,
  normalizeDateRange,
  normalizeYearRange,
  parsePartialDate,
} from './extraction/date-range'
export type { PartialDate } from './extraction/date-range'
export { buildHealthReport, computeStatus } from './extraction/health'
export type { HealthThresholds } from './extraction/health'
export * from './extraction/parsers'
export {
  DecodingPipeline,
  ResponseDocumentSchema,
  readResponseDocument,
} from './extraction/pipeline'
export type { PipelineConfig, ResponseDocument } from './extraction/pipeline'
export type {
  HealthReport,
  HealthStatus,
  ListRootMode,
  PipelineDiagnostics,
  PipelineResult,
} from './extraction/types'
export * from './models'
export { createLogger, log } from './utils/logger'
export type { Logger } from './utils/logger'
