import { DECODING_CONSTANTS } from '../config/constants'
import type { HealthReport, HealthStatus, PipelineResult } from './types'

export interface HealthThresholds {
  /** Share of incomplete records above which a section counts as degraded */
  degradedIncompleteRatio: number
}

const DEFAULT_THRESHOLDS: HealthThresholds = {
  degradedIncompleteRatio: DECODING_CONSTANTS.DEGRADED_INCOMPLETE_RATIO,
}

/**
 * Summarizes how well a section decoded. An empty record list is ambiguous on
 * its own: a list root with no elements is a healthy empty section, while a
 * document without any list root likely changed shape.
 */
export function buildHealthReport<T>(
  result: PipelineResult<T>,
  thresholds: Partial<HealthThresholds> = {},
): HealthReport {
  const effective = {
    ...DEFAULT_THRESHOLDS,
    ...thresholds,
  }
  const { diagnostics } = result
  const status = computeStatus(result, effective)

  return {
    section: diagnostics.sectionName,
    status,
    itemCount: result.items.length,
    incompleteCount: diagnostics.itemsIncomplete,
    failedCount: diagnostics.itemsFailed,
    message: buildMessage(status, result),
  }
}

export function computeStatus<T>(
  result: PipelineResult<T>,
  thresholds: HealthThresholds,
): HealthStatus {
  const { diagnostics } = result
  if (diagnostics.listRootsFound === 0) return 'broken'
  if (diagnostics.elementsFound > 0 && result.items.length === 0) {
    return 'broken'
  }
  if (diagnostics.itemsFailed > 0) return 'degraded'

  const incompleteRatio =
    result.items.length === 0
      ? 0
      : diagnostics.itemsIncomplete / result.items.length
  return incompleteRatio > thresholds.degradedIncompleteRatio
    ? 'degraded'
    : 'healthy'
}

function buildMessage<T>(status: HealthStatus, result: PipelineResult<T>): string {
  const { diagnostics } = result
  const section = diagnostics.sectionName

  if (status === 'healthy') {
    return `${section} decoding healthy: ${result.items.length} items`
  }

  if (status === 'degraded') {
    return `${section} decoding degraded: ${result.items.length} items, ${diagnostics.itemsIncomplete} incomplete, ${diagnostics.itemsFailed} failed`
  }

  return diagnostics.listRootsFound === 0
    ? `${section} decoding broken: no list root in document`
    : `${section} decoding broken: ${diagnostics.elementsFound} elements, none decoded`
}
