import type { Cell, Dataset, DatasetMap, UploadedFile } from '@/types'

export function makeDataset(name: string, columns: [string, Cell[]][]): Dataset {
  return {
    id: `id-${name}`,
    name,
    parserId: 'fixture',
    loadedAt: '2024-01-01T00:00:00.000Z',
    columns: columns.map(([colName, values]) => ({ name: colName, values })),
    rowCount: columns[0]?.[1].length ?? 0,
  }
}

export function datasetMap(...datasets: Dataset[]): DatasetMap {
  return new Map(datasets.map(ds => [ds.name, ds]))
}

export function textFile(name: string, text: string): UploadedFile {
  return { name, bytes: new TextEncoder().encode(text) }
}
