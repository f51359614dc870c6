export type Printable = string | number | bigint | boolean | null | undefined
type Key = string | number
type FlatObject = Record<Key, Printable>

/**
 * Renders one or more flat objects as a column-aligned table.
 * The keys of the first row make up the header; further rows are
 * printed underneath it in the same column order.
 */
export function toGridString(rows: FlatObject | FlatObject[]): string {
  const list = Array.isArray(rows) ? rows : [rows]
  const first = list[0]
  if (!first) return ''

  const keys = Object.keys(first)
  const cell = (row: FlatObject, key: string) => String(row[key] ?? '')

  // Determine column widths
  const widths = keys.map(key => Math.max(key.length, ...list.map(row => cell(row, key).length)))

  const header = keys.map((key, i) => key.padEnd(widths[i] ?? 0)).join('  ').trimEnd()
  const lines = list.map(row => keys.map((key, i) => cell(row, key).padEnd(widths[i] ?? 0)).join('  ').trimEnd())

  return [header, ...lines].join('\n')
}
