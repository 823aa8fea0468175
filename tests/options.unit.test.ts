import { describe, expect, test } from 'vitest'
import {
  DEFAULT_DECODER_OPTIONS,
  resolveDecoderOptions,
} from '../src/config/options'
import { ConfigurationError, ProfileDecoderError } from '../src/exceptions'

describe('resolveDecoderOptions', () => {
  test('fills in defaults', () => {
    expect(resolveDecoderOptions()).toEqual({
      preferredLogoWidth: 200,
      descriptionMinLength: 50,
      skillsPrefix: 'Skills:',
      positionGroupMarker: 'profilePositionGroup',
    })
    expect(DEFAULT_DECODER_OPTIONS).toEqual(resolveDecoderOptions({}))
  })

  test('keeps supplied values', () => {
    expect(
      resolveDecoderOptions({ preferredLogoWidth: 400, skillsPrefix: 'Tools:' }),
    ).toMatchObject({ preferredLogoWidth: 400, skillsPrefix: 'Tools:' })
  })

  test('throws a configuration error naming the bad field', () => {
    expect(() => resolveDecoderOptions({ preferredLogoWidth: -5 })).toThrow(
      /^Invalid decoder options: preferredLogoWidth: /,
    )
    expect(() => resolveDecoderOptions({ descriptionMinLength: 1.5 })).toThrow(
      ConfigurationError,
    )
  })

  test('configuration errors share the library base class', () => {
    try {
      resolveDecoderOptions({ skillsPrefix: '' })
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(ProfileDecoderError)
      expect(e).toBeInstanceOf(ConfigurationError)
      expect(e instanceof Error && e.name).toBe('ConfigurationError')
    }
  })
})
