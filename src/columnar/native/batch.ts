import { ValidationError } from '../../errors.js'
import type { ColumnLayout } from '../layout.js'
import type { BackendName, CellRow, CellValue, ColumnVector, ColumnarBatch } from '../types.js'

/**
 * A finished batch held as one plain array per column.
 *
 * @public
 */
export class NativeColumnarBatch implements ColumnarBatch {
  readonly backend: BackendName = 'native'

  constructor(
    readonly layout: ColumnLayout,
    readonly numRows: number,
    private readonly columns: ReadonlyMap<string, readonly CellValue[]>
  ) {}

  /** Raw values of a column, one per row */
  values(name: string): readonly CellValue[] {
    const values = this.columns.get(name)
    if (values === undefined) {
      throw new ValidationError(`no column '${name}' in batch`, 'name', name)
    }
    return values
  }

  getColumn(name: string): ColumnVector {
    const values = this.values(name)
    return {
      name,
      length: values.length,
      get: (i: number): CellValue => {
        const value = values[i]
        if (!Number.isInteger(i) || value === undefined) {
          throw new ValidationError(`row index ${i} out of range 0..${values.length - 1}`, 'index', i)
        }
        return value
      },
    }
  }

  toRows(): CellRow[] {
    const rows: CellRow[] = []
    for (let i = 0; i < this.numRows; i++) {
      const row: Record<string, CellValue> = {}
      for (const column of this.layout.columns) {
        row[column.name] = this.values(column.name)[i] ?? null
      }
      rows.push(row)
    }
    return rows
  }
}
