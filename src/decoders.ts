import type { DecoderOptionsInput } from './config/options'
import { SEARCH_PATTERNS } from './config/constants'
import { ConfigurationError, InvalidSearchHitError } from './exceptions'
import { DecodingPipeline } from './extraction/pipeline'
import {
  EducationParser,
  ExperienceParser,
  SkillParser,
  parseSearchResult,
  skillKey,
} from './extraction/parsers'
import {
  type Education,
  type Experience,
  type SearchOptions,
  SearchOptionsSchema,
  type SearchResult,
  type Skill,
} from './models'
import { createLogger } from './utils/logger'

const logger = createLogger('search')

export function createExperiencePipeline(
  options?: DecoderOptionsInput,
): DecodingPipeline<Experience> {
  return new DecodingPipeline({
    parser: new ExperienceParser(),
    listRoots: 'primary',
    options,
  })
}

export function createEducationPipeline(
  options?: DecoderOptionsInput,
): DecodingPipeline<Education> {
  return new DecodingPipeline({
    parser: new EducationParser(),
    listRoots: 'primary',
    options,
  })
}

/**
 * Skills are spread over one list root per tab, and tabs repeat skills
 */
export function createSkillsPipeline(
  options?: DecoderOptionsInput,
): DecodingPipeline<Skill> {
  return new DecodingPipeline({
    parser: new SkillParser(),
    listRoots: 'all',
    deduplicateKey: skillKey,
    options,
  })
}

/**
 * Work experience of one profile components response, position groups
 * expanded in place. A document without a list root gives an empty list.
 */
export function parseExperienceResponse(
  document: unknown,
  options?: DecoderOptionsInput,
): Experience[] {
  return createExperiencePipeline(options).decode(document).items
}

export function parseExperiencePages(
  documents: unknown[],
  options?: DecoderOptionsInput,
): Experience[] {
  return createExperiencePipeline(options).decodePages(documents).items
}

export function parseEducationResponse(
  document: unknown,
  options?: DecoderOptionsInput,
): Education[] {
  return createEducationPipeline(options).decode(document).items
}

export function parseEducationPages(
  documents: unknown[],
  options?: DecoderOptionsInput,
): Education[] {
  return createEducationPipeline(options).decodePages(documents).items
}

export function parseSkillsResponse(
  document: unknown,
  options?: DecoderOptionsInput,
): Skill[] {
  return createSkillsPipeline(options).decode(document).items
}

/**
 * Decodes people-search hits in order. Out-of-network profiles are dropped
 * unless `includePrivateProfiles` is set; malformed hits are skipped.
 */
export function parseSearchResults(
  hits: unknown[],
  options: SearchOptions = {},
): SearchResult[] {
  const parsedOptions = SearchOptionsSchema.safeParse(options)
  if (!parsedOptions.success) {
    throw new ConfigurationError(
      `Invalid search options: ${parsedOptions.error.issues.map((issue) => issue.message).join('; ')}`,
    )
  }
  const { includePrivateProfiles } = parsedOptions.data

  const results: SearchResult[] = []
  hits.forEach((hit, idx) => {
    let result: SearchResult
    try {
      result = parseSearchResult(hit)
    } catch (e) {
      if (!(e instanceof InvalidSearchHitError)) throw e
      logger.warning(`Skipping search hit ${idx}: ${e.message}`)
      return
    }

    if (
      !includePrivateProfiles &&
      result.distance === SEARCH_PATTERNS.OUT_OF_NETWORK
    ) {
      logger.skip(`Skipping out-of-network search hit ${idx}`)
      return
    }
    results.push(result)
  })

  return results
}
