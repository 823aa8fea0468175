import {
  DEFAULT_DECODER_OPTIONS,
  type DecoderOptions,
} from '../../config/options'
import type { ComponentNode } from '../components/nodes'
import { EntityIndex } from '../components/entity-index'

/**
 * Per-decode state threaded through every parser call
 */
export interface DecodeContext {
  index: EntityIndex
  options: DecoderOptions
}

export function createDecodeContext(
  index: EntityIndex = EntityIndex.empty(),
  options: DecoderOptions = DEFAULT_DECODER_OPTIONS,
): DecodeContext {
  return { index, options }
}

export interface SectionParser<T> {
  readonly sectionName: string
  /** Decodes one list element, null when it holds no entity */
  parse(element: ComponentNode, context: DecodeContext): T | null
  /**
   * Records an element stands for when it bundles several of them (an
   * employer with many roles), null when it is an ordinary element
   */
  expand?(element: ComponentNode, context: DecodeContext): T[] | null
  /** Whether a decoded record carries enough to be useful */
  validate(item: T): boolean
}
