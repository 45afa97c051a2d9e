import type { RecordBatch } from 'apache-arrow'
import { ValidationError } from '../../errors.js'
import type { ColumnLayout } from '../layout.js'
import type { BackendName, CellRow, CellValue, ColumnVector, ColumnarBatch } from '../types.js'
import { fromArrowValue } from './type-system.js'

/**
 * A finished batch backed by an apache-arrow RecordBatch.
 *
 * @public
 */
export class ArrowColumnarBatch implements ColumnarBatch {
  readonly backend: BackendName = 'arrow'

  constructor(
    readonly layout: ColumnLayout,
    readonly recordBatch: RecordBatch
  ) {}

  get numRows(): number {
    return this.recordBatch.numRows
  }

  getColumn(name: string): ColumnVector {
    const index = this.layout.columns.findIndex(column => column.name === name)
    const spec = this.layout.columns[index]
    const vector = this.recordBatch.getChildAt(index)
    if (spec === undefined || vector === null) {
      throw new ValidationError(`no column '${name}' in batch`, 'name', name)
    }
    const length = this.recordBatch.numRows
    return {
      name,
      length,
      get: (i: number): CellValue => {
        if (!Number.isInteger(i) || i < 0 || i >= length) {
          throw new ValidationError(`row index ${i} out of range 0..${length - 1}`, 'index', i)
        }
        return fromArrowValue(vector.get(i), spec.type)
      },
    }
  }

  toRows(): CellRow[] {
    const columns = this.layout.columns.map(column => this.getColumn(column.name))
    const rows: CellRow[] = []
    for (let i = 0; i < this.numRows; i++) {
      const row: Record<string, CellValue> = {}
      for (const column of columns) {
        row[column.name] = column.get(i)
      }
      rows.push(row)
    }
    return rows
  }
}
