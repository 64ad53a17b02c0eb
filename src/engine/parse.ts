import { ParseError } from './errors'
import type { ParseShotsResult, Reading, ShotRecord } from '../types'

const REQUIRED_COLUMNS = ['from', 'name', 'distance'] as const
const READING_COLUMNS = ['azimuth', 'inclination', 'left', 'right', 'up', 'down'] as const

type ReadingColumn = (typeof READING_COLUMNS)[number]

export interface CsvRow {
  line: number // where the row starts
  cells: string[]
}

// Splits CSV text into rows. Quoted fields may hold commas, line breaks and "" escapes.
export const splitCsvRows = (input: string): CsvRow[] => {
  const rows: CsvRow[] = []
  let cells: string[] = []
  let cell = ''
  let quoted = false
  let line = 1
  let rowLine = 1

  const endRow = () => {
    cells.push(cell)
    if (cells.length > 1 || cells[0].trim()) rows.push({ line: rowLine, cells })
    cells = []
    cell = ''
  }

  for (let i = 0; i < input.length; i++) {
    const ch = input[i]
    if (quoted) {
      if (ch === '"' && input[i + 1] === '"') {
        cell += '"'
        i++
      } else if (ch === '"') {
        quoted = false
      } else {
        if (ch === '\n') line++
        cell += ch
      }
    } else if (ch === '"') {
      quoted = true
    } else if (ch === ',') {
      cells.push(cell)
      cell = ''
    } else if (ch === '\n') {
      endRow()
      line++
      rowLine = line
    } else if (ch === '\r' && input[i + 1] === '\n') {
      continue
    } else {
      cell += ch
    }
  }
  if (cell || cells.length) endRow()
  return rows
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

const toNumber = (token: string): number | null => {
  const trimmed = token.trim()
  if (!DECIMAL.test(trimmed)) return null
  return Number(trimmed)
}

/**
 * Reads a cell as blank, a single decimal, or a `fore/back` pair.
 * Only the first two slash-separated tokens count.
 */
export const parseReading = (cell: string): Reading | null => {
  const trimmed = cell.trim()
  if (!trimmed) return { kind: 'absent' }
  if (!trimmed.includes('/')) {
    const value = toNumber(trimmed)
    return value == null ? null : { kind: 'single', value }
  }
  const [foreStr, backStr] = trimmed.split('/')
  const fore = toNumber(foreStr)
  const back = toNumber(backStr)
  if (fore == null || back == null) return null
  return { kind: 'paired', fore, back }
}

export const parseShots = (input: string): ParseShotsResult => {
  const shots: ShotRecord[] = []
  const logs: string[] = []

  let columns: Map<string, number> | null = null

  for (const { line: lineNum, cells } of splitCsvRows(input)) {
    if (!columns) {
      const header = new Map<string, number>()
      cells.forEach((label, idx) => header.set(label.trim().toLowerCase(), idx))
      for (const col of REQUIRED_COLUMNS) {
        if (!header.has(col)) throw new ParseError('missing required column', lineNum, col, '')
      }
      const missing = [...READING_COLUMNS, 'note'].filter((col) => !header.has(col))
      if (missing.length) logs.push(`Columns not present, read as empty: ${missing.join(', ')}`)
      columns = header
      continue
    }

    const header = columns
    const cellOf = (field: string): string => {
      const idx = header.get(field)
      return idx == null ? '' : cells[idx] ?? ''
    }

    const distanceCell = cellOf('distance')
    const distance = toNumber(distanceCell)
    if (distance == null) {
      throw new ParseError('expected a decimal distance', lineNum, 'distance', distanceCell)
    }

    const readingOf = (field: ReadingColumn): Reading => {
      const cell = cellOf(field)
      const reading = parseReading(cell)
      if (!reading) throw new ParseError('expected blank, a decimal or two decimals joined by "/"', lineNum, field, cell)
      return reading
    }

    shots.push({
      from: cellOf('from').trim(),
      name: cellOf('name').trim(),
      distance,
      azimuth: readingOf('azimuth'),
      inclination: readingOf('inclination'),
      left: readingOf('left'),
      right: readingOf('right'),
      up: readingOf('up'),
      down: readingOf('down'),
      note: cellOf('note').trim(),
    })
  }

  if (!columns) logs.push('No header row found')
  logs.push(`Shots read: ${shots.length}`)

  return { shots, logs }
}
