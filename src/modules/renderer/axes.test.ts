import { describe, expect, it } from 'vitest'
import { parseTemporal, resolveXAxis } from './axes'

describe('parseTemporal', () => {
  it('reads clock times as milliseconds since midnight', () => {
    expect(parseTemporal('00:01')).toBe(60_000)
    expect(parseTemporal('1:02:03.25')).toBe(3_723_250)
  })

  it('honours an explicit offset', () => {
    expect(parseTemporal('2024-05-01T02:00:00+02:00')).toBe(Date.UTC(2024, 4, 1))
  })

  it('ignores numbers and free text', () => {
    expect(parseTemporal(12)).toBeNull()
    expect(parseTemporal('12')).toBeNull()
    expect(parseTemporal('25:00')).toBeNull()
    expect(parseTemporal('lap 2')).toBeNull()
  })
})

describe('resolveXAxis', () => {
  it('treats an all-empty column as linear', () => {
    expect(resolveXAxis([null, null])).toEqual({ type: 'linear', values: [null, null] })
  })

  it('keeps gaps in a numeric column', () => {
    expect(resolveXAxis([1, null, '2,5'])).toEqual({ type: 'linear', values: [1, null, 2.5] })
  })

  it('labels hex codes instead of plotting them as numbers', () => {
    expect(resolveXAxis(['0x1F', '0x20', '0x1F'])).toEqual({
      type: 'category',
      values: [0, 1, 0],
      categories: ['0x1F', '0x20'],
    })
  })

  it('falls back to categories when kinds are mixed', () => {
    expect(resolveXAxis([1, 'pit', null, 1])).toEqual({
      type: 'category',
      values: [0, 1, null, 0],
      categories: ['1', 'pit'],
    })
  })
})
