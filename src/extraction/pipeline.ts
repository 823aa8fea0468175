import { z } from 'zod'
import {
  type DecoderOptions,
  type DecoderOptionsInput,
  resolveDecoderOptions,
} from '../config/options'
import { createLogger } from '../utils/logger'
import { deduplicateItems, parseItems } from './common-patterns'
import { EntityIndex } from './components/entity-index'
import {
  type ListRoot,
  findListRoots,
  pickPrimaryListRoot,
} from './components/list-root'
import type { ComponentNode } from './components/nodes'
import type { DecodeContext, SectionParser } from './parsers/types'
import type { ListRootMode, PipelineDiagnostics, PipelineResult } from './types'

const logger = createLogger('pipeline')

const UpstreamErrorListSchema = z
  .array(z.object({ message: z.string().catch('Unknown error') }))
  .catch([])

/**
 * Envelope of a profile components response. Anything malformed decodes as
 * an empty document.
 */
export const ResponseDocumentSchema = z.object({
  included: z.array(z.unknown()).catch([]),
  errors: UpstreamErrorListSchema,
  data: z.object({ errors: UpstreamErrorListSchema }).catch({ errors: [] }),
})

export interface ResponseDocument {
  included: unknown[]
  upstreamErrors: string[]
}

export function readResponseDocument(document: unknown): ResponseDocument {
  const result = ResponseDocumentSchema.safeParse(document)
  if (!result.success) {
    return { included: [], upstreamErrors: [] }
  }

  return {
    included: result.data.included,
    upstreamErrors: [...result.data.errors, ...result.data.data.errors].map(
      (error) => error.message,
    ),
  }
}

export interface PipelineConfig<T> {
  parser: SectionParser<T>
  listRoots?: ListRootMode
  deduplicateKey?: (item: T) => string
  options?: DecoderOptionsInput
}

export class DecodingPipeline<T> {
  private readonly config: PipelineConfig<T>
  private readonly options: DecoderOptions

  constructor(config: PipelineConfig<T>) {
    this.config = config
    this.options = resolveDecoderOptions(config.options)
  }

  get sectionName(): string {
    return this.config.parser.sectionName
  }

  decode(document: unknown): PipelineResult<T> {
    const startTime = Date.now()
    const diagnostics = this.emptyDiagnostics()

    const { included, upstreamErrors } = readResponseDocument(document)
    if (upstreamErrors.length > 0) {
      diagnostics.upstreamErrors = upstreamErrors
      logger.warning(
        `${this.sectionName}: upstream returned ${upstreamErrors.length} error(s): ${upstreamErrors[0]}`,
      )
    }

    const index = EntityIndex.build(included)
    const context: DecodeContext = { index, options: this.options }

    const allRoots = findListRoots(included)
    diagnostics.listRootsFound = allRoots.length
    const elements = this.selectRoots(allRoots).flatMap((root) => root.elements)
    diagnostics.elementsFound = elements.length

    let items = parseItems(
      elements,
      (element) => this.parseElement(element, context),
      {
        itemType: this.sectionName,
        logSkipped: true,
        onError: () => {
          diagnostics.itemsFailed++
        },
      },
    )

    if (this.config.deduplicateKey) {
      items = deduplicateItems(items, this.config.deduplicateKey)
    }

    this.countItems(items, diagnostics)
    diagnostics.durationMs = Date.now() - startTime
    logger.debug(
      `${this.sectionName}: ${diagnostics.itemsParsed} item(s) from ${diagnostics.elementsFound} element(s) in ${diagnostics.listRootsFound} list root(s)`,
    )

    return { items, diagnostics }
  }

  /**
   * Decodes caller-assembled pages of one section, keeping page order
   */
  decodePages(documents: unknown[]): PipelineResult<T> {
    const startTime = Date.now()
    const diagnostics = this.emptyDiagnostics()
    let items: T[] = []

    for (const document of documents) {
      const page = this.decode(document)
      items.push(...page.items)
      diagnostics.listRootsFound += page.diagnostics.listRootsFound
      diagnostics.elementsFound += page.diagnostics.elementsFound
      diagnostics.itemsFailed += page.diagnostics.itemsFailed
      diagnostics.upstreamErrors.push(...page.diagnostics.upstreamErrors)
    }

    if (this.config.deduplicateKey) {
      items = deduplicateItems(items, this.config.deduplicateKey)
    }

    this.countItems(items, diagnostics)
    diagnostics.durationMs = Date.now() - startTime
    return { items, diagnostics }
  }

  private parseElement(element: ComponentNode, context: DecodeContext): T[] {
    const expanded = this.config.parser.expand?.(element, context)
    if (expanded) {
      return expanded
    }

    const item = this.config.parser.parse(element, context)
    return item ? [item] : []
  }

  private selectRoots(roots: ListRoot[]): ListRoot[] {
    if (this.config.listRoots === 'all') {
      return roots
    }
    const primary = pickPrimaryListRoot(roots)
    return primary ? [primary] : []
  }

  private countItems(items: T[], diagnostics: PipelineDiagnostics): void {
    diagnostics.itemsParsed = items.length
    diagnostics.itemsIncomplete = items.filter(
      (item) => !this.config.parser.validate(item),
    ).length
  }

  private emptyDiagnostics(): PipelineDiagnostics {
    return {
      sectionName: this.sectionName,
      listRootsFound: 0,
      elementsFound: 0,
      itemsParsed: 0,
      itemsIncomplete: 0,
      itemsFailed: 0,
      upstreamErrors: [],
      durationMs: 0,
    }
  }
}
