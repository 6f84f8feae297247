import type { Dataset, DatasetMap } from '@/types'

export class EmptyCatalogError extends Error {
  constructor() {
    super('No usable data: none of the uploaded files could be loaded')
    this.name = 'EmptyCatalogError'
  }
}

export function columnNames(ds: Dataset): string[] {
  return ds.columns.map(c => c.name)
}

/**
 * Union of column names over all datasets, first-seen order. Only used to seed
 * column pickers; plots always read from their own source dataset.
 */
export function buildCatalog(datasets: DatasetMap): string[] {
  if (datasets.size === 0) throw new EmptyCatalogError()
  const seen = new Set<string>()
  for (const ds of datasets.values()) {
    for (const name of columnNames(ds)) seen.add(name)
  }
  return Array.from(seen)
}
