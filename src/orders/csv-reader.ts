import { readFile } from 'node:fs/promises'
import Papa from 'papaparse'
import { CsvFormatError, MissingColumnError } from './errors.js'

export type CsvRow = Record<string, string | undefined>

/**
 * Parses header-driven CSV text into rows keyed by column name.
 * A leading byte-order mark is dropped and every listed column must be present.
 *
 * @example
 * parseCsvRows('OrderID,AmountRefunded\nA,5.00', ['OrderID'], 'refunds.csv')
 * // => [{ OrderID: 'A', AmountRefunded: '5.00' }]
 */
export const parseCsvRows = (
  content: string,
  requiredColumns: readonly string[],
  source: string
): CsvRow[] => {
  const result = Papa.parse<CsvRow>(content.replace(/^\uFEFF/, ''), {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  })

  // Short or long rows are fine (missing cells read as undefined); broken quoting is not
  const fatal = result.errors.find((e) => e.type === 'Quotes')
  if (fatal) {
    throw new CsvFormatError(`${fatal.message} (row ${fatal.row ?? '?'})`, source)
  }

  const fields = result.meta.fields ?? []
  for (const column of requiredColumns) {
    if (!fields.includes(column)) {
      throw new MissingColumnError(column, source)
    }
  }

  return result.data
}

/**
 * Reads a UTF-8 CSV file and parses it with {@link parseCsvRows}.
 */
export const readCsvFile = async (
  path: string,
  requiredColumns: readonly string[]
): Promise<CsvRow[]> => {
  const content = await readFile(path, 'utf-8')
  return parseCsvRows(content, requiredColumns, path)
}
