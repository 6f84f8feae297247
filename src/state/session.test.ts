import { beforeEach, describe, expect, it, vi } from 'vitest'
import { textFile } from '@/test/fixtures'
import { generate, hasData, setCount, startSession, updateSpec } from './session'

const A_CSV = 't,v1\n0,1\n1,2\n2,3\n3,4\n4,5\n'
const B_CSV = 't,v2\n0,5\n1,4\n2,3\n3,2\n4,1\n'

function twoFiles() {
  return startSession([textFile('a.csv', A_CSV), textFile('b.csv', B_CSV)])
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
  vi.spyOn(console, 'info').mockImplementation(() => {})
})

describe('startSession', () => {
  it('loads the files, builds the catalog and opens two default slots', () => {
    const s = twoFiles()
    expect(hasData(s)).toBe(true)
    expect(Array.from(s.datasets.keys())).toEqual(['a.csv', 'b.csv'])
    expect(s.catalog).toEqual(['t', 'v1', 'v2'])
    expect(s.count).toBe(2)
    expect(s.specs.map(spec => spec.title)).toEqual(['a.csv - v1 vs t', 'a.csv - v1 vs t'])
    expect(s.figures).toEqual([])
    expect(s.log.map(d => d.message)).toEqual(['Loaded 2 of 2 file(s)'])
  })

  it('logs a file the browser could not read and keeps the others', () => {
    const s = startSession([{ name: 'gone.xlsx', readError: 'The file could not be read' }, textFile('a.csv', A_CSV)])
    expect(Array.from(s.datasets.keys())).toEqual(['a.csv'])
    expect(s.log.map(d => d.message)).toEqual([
      'Error loading gone.xlsx: The file could not be read',
      'Loaded 1 of 2 file(s)',
    ])
  })

  it('stays inactive when only an unsupported file is uploaded', () => {
    const s = startSession([textFile('data.txt', 't,v\n1,2\n')])
    expect(s.datasets.size).toBe(0)
    expect(hasData(s)).toBe(false)
    expect(s.catalog).toEqual([])
    expect(s.specs).toEqual([])
    expect(s.log.filter(d => d.kind === 'UnsupportedFileType')).toHaveLength(1)
    expect(s.log.filter(d => d.kind === 'EmptyCatalog')).toHaveLength(1)
  })
})

describe('configure then generate', () => {
  it('renders one titled figure per slot', () => {
    let s = twoFiles()
    s = setCount(s, 2)
    s = updateSpec(s, 0, 'source', 'a.csv')
    s = updateSpec(s, 0, 'xColumn', 't')
    s = updateSpec(s, 0, 'yColumn', 'v1')
    s = updateSpec(s, 0, 'mode', 'line')
    s = updateSpec(s, 1, 'source', 'b.csv')
    s = updateSpec(s, 1, 'xColumn', 't')
    s = updateSpec(s, 1, 'yColumn', 'v2')
    s = updateSpec(s, 1, 'mode', 'scatter')
    expect(s.figures).toEqual([])

    s = generate(s)
    expect(s.figures).toHaveLength(2)
    expect(s.figures.map(f => f.title)).toEqual(['a.csv - v1 vs t', 'b.csv - v2 vs t'])
    expect(s.figures.map(f => f.traces[0].mode)).toEqual(['lines', 'markers'])
    expect(s.figures[1].traces[0].y).toEqual([5, 4, 3, 2, 1])
    expect(s.stale).toBe(false)
  })

  it('logs the axis reset when a new source lacks the column', () => {
    const s = updateSpec(twoFiles(), 1, 'source', 'b.csv')
    expect(s.specs[1]).toMatchObject({ source: 'b.csv', xColumn: 't', yColumn: 'v2' })
    expect(s.log[0]).toEqual({
      level: 'info',
      kind: 'StaleColumnReference',
      subject: 'Plot 2',
      message: 'Plot 2: Y-axis reset to "v2" (previous column not in b.csv)',
    })
  })

  it('treats re-selecting the current count as no change', () => {
    const rendered = generate(twoFiles())
    expect(setCount(rendered, 2)).toBe(rendered)
    expect(setCount(rendered, 3).stale).toBe(true)
  })

  it('leaves figures alone until the next generate', () => {
    const rendered = generate(twoFiles())
    const changed = updateSpec(rendered, 0, 'mode', 'scatter')
    expect(changed.figures).toBe(rendered.figures)
    expect(changed.stale).toBe(true)
    expect(generate(changed).figures[0].traces[0].mode).toBe('markers')
  })
})

describe('setCount', () => {
  it.each([1, 2, 3, 4])('sets the slot count to %i', (n) => {
    const s = setCount(twoFiles(), n)
    expect(s.count).toBe(n)
    expect(s.specs).toHaveLength(n)
  })

  it('keeps surviving slots when shrinking', () => {
    let s = setCount(twoFiles(), 3)
    s = updateSpec(s, 0, 'source', 'b.csv')
    const first = s.specs[0]
    s = setCount(s, 1)
    expect(s.specs).toEqual([first])
  })

  it('logs and ignores an out-of-range count', () => {
    const before = twoFiles()
    const after = setCount(before, 5)
    expect(after.specs).toBe(before.specs)
    expect(after.count).toBe(2)
    expect(after.log[0]).toEqual({
      level: 'warn',
      kind: 'InvalidPlotConfig',
      subject: 'Number of Plots',
      message: 'Number of Plots: Number of plots must be between 1 and 4, got 5',
    })
  })
})

describe('updateSpec', () => {
  it('logs and ignores a slot that does not exist', () => {
    const before = twoFiles()
    const after = updateSpec(before, 7, 'mode', 'scatter')
    expect(after.specs).toBe(before.specs)
    expect(after.log[0].message).toBe('Plot 8: there is no plot slot 8')
  })

  it('logs and ignores a column missing from the source', () => {
    const before = twoFiles()
    const after = updateSpec(before, 0, 'yColumn', 'v2')
    expect(after.specs).toBe(before.specs)
    expect(after.log[0].kind).toBe('InvalidPlotConfig')
  })
})
