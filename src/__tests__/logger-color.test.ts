import { describe, it, expect, vi, afterEach } from 'vitest'
import { logger } from '../utils/logger'
import { setColorMode, padVisible, parseColorMode } from '../utils/colors'

describe('logger colors and icons', () => {
  afterEach(() => {
    setColorMode('auto')
    logger.setNoEmoji(false)
  })

  it('prints green success with an icon when colors are forced', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
    setColorMode('always')
    logger.success('All good')
    expect(spy.mock.calls[0]?.[0]).toBe('ℹ \u001b[32m✓ All good\u001b[39m')
  })

  it('prints ASCII markers under --no-emoji', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
    setColorMode('never')
    logger.setNoEmoji(true)
    logger.success('All good')
    expect(spy.mock.calls[0]?.[0]).toBe('[info] [ok] All good')
  })

  it('sends errors to stderr without ANSI when color is off', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
    setColorMode('never')
    logger.error('Boom')
    expect(spy.mock.calls[0]?.[0]).toBe('✖ Boom')
  })

  it('respects the log level', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
    setColorMode('never')
    logger.debug('hidden')
    logger.setLevel('debug')
    logger.debug('shown')
    expect(spy.mock.calls.map(c => c[0])).toEqual(['• shown'])
  })
})

describe('color helpers', () => {
  afterEach(() => { setColorMode('auto') })

  it('pads by visible width', () => {
    setColorMode('always')
    expect(padVisible('\u001b[32mok\u001b[39m', 4)).toBe('\u001b[32mok\u001b[39m  ')
  })

  it('parses --color values', () => {
    expect(parseColorMode('always')).toBe('always')
    expect(parseColorMode('bogus')).toBe('auto')
  })
})
