import { describe, expect, it } from 'vitest'
import { serialToIso } from './SpreadsheetXlsx'

describe('serialToIso', () => {
  it('writes the stored wall-clock time as UTC', () => {
    expect(serialToIso(45413 + 10 / 24)).toBe('2024-05-01T10:00:00.000Z')
    expect(serialToIso(45413.5 + 1.5 / 86400)).toBe('2024-05-01T12:00:01.500Z')
  })

  it('honours the 1904 date system', () => {
    expect(serialToIso(0, true)).toBe('1904-01-01T00:00:00.000Z')
  })
})
