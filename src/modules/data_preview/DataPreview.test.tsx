// @vitest-environment jsdom
import { afterEach, describe, expect, it } from 'vitest'
import { cleanup, fireEvent, render, screen } from '@testing-library/react'
import { datasetMap, makeDataset } from '@/test/fixtures'
import DataPreview, { PAGE_SIZE } from './DataPreview'

afterEach(cleanup)

function bodyRows(container: HTMLElement) {
  return Array.from(container.querySelectorAll('tbody tr'))
}

describe('DataPreview', () => {
  it('pages a long dataset without altering the cells', () => {
    const t = Array.from({ length: 250 }, (_, i) => i)
    const ds = makeDataset('long.csv', [['t', t], ['v', t.map(i => (i % 3 === 0 ? null : `r${i}`))]])
    const { container } = render(<DataPreview datasets={datasetMap(ds)} />)

    expect(bodyRows(container)).toHaveLength(PAGE_SIZE)
    expect(screen.getByText('Rows 1-100 of 250')).toBeTruthy()
    expect(screen.getByText('Previous').hasAttribute('disabled')).toBe(true)

    fireEvent.click(screen.getByText('Next'))
    fireEvent.click(screen.getByText('Next'))
    const rows = bodyRows(container)
    expect(rows).toHaveLength(50)
    expect(Array.from(rows[0].children).map(td => td.textContent)).toEqual(['200', '200', 'r200'])
    expect(Array.from(rows[1].children).map(td => td.textContent)).toEqual(['201', '201', ''])
    expect(screen.getByText('Rows 201-250 of 250')).toBeTruthy()
    expect(screen.getByText('Next').hasAttribute('disabled')).toBe(true)
  })

  it('shows a short dataset in full with no pager', () => {
    const ds = makeDataset('a.csv', [['t', [0, 1]], ['v', [1.5, 2.5]]])
    const { container } = render(<DataPreview datasets={datasetMap(ds)} />)
    expect(bodyRows(container)).toHaveLength(2)
    expect(screen.queryByText('Next')).toBeNull()
  })
})
