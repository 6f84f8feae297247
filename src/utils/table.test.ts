import { describe, expect, it } from 'vitest'
import { coerceCell, tableFromRows, toNumber, uniqueHeaders } from './table'

describe('coerceCell', () => {
  it('turns decimal text into numbers and blanks into null', () => {
    expect(coerceCell('12.5')).toBe(12.5)
    expect(coerceCell(' -3 ')).toBe(-3)
    expect(coerceCell('1e3')).toBe(1000)
    expect(coerceCell('')).toBeNull()
    expect(coerceCell(undefined)).toBeNull()
  })

  it('keeps timestamps and labels as text', () => {
    expect(coerceCell('12:30:05')).toBe('12:30:05')
    expect(coerceCell('2024-05-01')).toBe('2024-05-01')
    expect(coerceCell('lap 3')).toBe('lap 3')
  })
})

describe('toNumber', () => {
  it('accepts a decimal comma', () => {
    expect(toNumber('1,5')).toBe(1.5)
    expect(toNumber('-12,25')).toBe(-12.25)
    expect(toNumber('0,125')).toBe(0.125)
    expect(toNumber(',5')).toBe(0.5)
  })

  it('reads plain decimal text', () => {
    expect(toNumber(' 2.5 ')).toBe(2.5)
    expect(toNumber('1e3')).toBe(1000)
  })

  it('leaves text that Number() would misread as a gap', () => {
    expect(toNumber('0x1F')).toBeNull()
    expect(toNumber('0b11')).toBeNull()
    expect(toNumber('1,000')).toBeNull()
    expect(toNumber('1,2,3')).toBeNull()
    expect(toNumber('Infinity')).toBeNull()
    expect(toNumber('1e999')).toBeNull()
    expect(toNumber('')).toBeNull()
  })

  it('rejects text and booleans', () => {
    expect(toNumber('abc')).toBeNull()
    expect(toNumber(true)).toBeNull()
    expect(toNumber(null)).toBeNull()
  })
})

describe('uniqueHeaders', () => {
  it('names blanks by position and suffixes repeats', () => {
    expect(uniqueHeaders(['t', 'v', 'v', '', 'v'])).toEqual(['t', 'v', 'v.1', 'Unnamed: 3', 'v.2'])
  })
})

describe('tableFromRows', () => {
  it('stores columns in header order and pads short rows', () => {
    const table = tableFromRows(['a', 'b'], [['1', 'x'], ['2']])
    expect(table.columns).toEqual([
      { name: 'a', values: [1, 2] },
      { name: 'b', values: ['x', null] },
    ])
    expect(table.rowCount).toBe(2)
    expect(table.paddedRows).toBe(1)
  })
})
