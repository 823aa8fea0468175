import { z } from 'zod'
import { ConfigurationError } from '../exceptions'
import { DECODING_CONSTANTS } from './constants'

export const DecoderOptionsSchema = z.object({
  preferredLogoWidth: z
    .number()
    .int()
    .positive()
    .default(DECODING_CONSTANTS.PREFERRED_LOGO_WIDTH),
  descriptionMinLength: z
    .number()
    .int()
    .nonnegative()
    .default(DECODING_CONSTANTS.DESCRIPTION_MIN_LENGTH),
  skillsPrefix: z.string().min(1).default(DECODING_CONSTANTS.SKILLS_PREFIX),
  positionGroupMarker: z
    .string()
    .min(1)
    .default(DECODING_CONSTANTS.POSITION_GROUP_MARKER),
})

export type DecoderOptions = z.output<typeof DecoderOptionsSchema>
export type DecoderOptionsInput = z.input<typeof DecoderOptionsSchema>

export const DEFAULT_DECODER_OPTIONS: DecoderOptions =
  DecoderOptionsSchema.parse({})

/**
 * Applies defaults to caller-supplied options.
 * @throws ConfigurationError when a value has the wrong type or range
 */
export function resolveDecoderOptions(
  input: DecoderOptionsInput = {},
): DecoderOptions {
  const result = DecoderOptionsSchema.safeParse(input)
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid decoder options: ${details}`)
  }
  return result.data
}
