import { assertFirstWeekday } from '../../config/calendar'
import type { CalendarCell, CellEdge, EdgeSet, Weekday } from '../../types/calendar'
import { daysInMonth } from '../../utils/date'

export const GRID_COLUMNS = 7
export const GRID_ROWS = 6
export const GRID_CELL_COUNT = GRID_COLUMNS * GRID_ROWS

const WEEKDAY_LABELS = ['日', '一', '二', '三', '四', '五', '六'] as const

const NO_EDGES: EdgeSet = new Set<CellEdge>()

function weekdayOf(date: Date): Weekday {
  return assertFirstWeekday(date.getDay() + 1)
}

export function countLeadingPadding(month: Date, firstWeekday: Weekday): number {
  const firstDay = new Date(month.getFullYear(), month.getMonth(), 1)
  return (((weekdayOf(firstDay) - firstWeekday) % GRID_COLUMNS) + GRID_COLUMNS) % GRID_COLUMNS
}

/**
 * Lays out `month` on a fixed 6x7 grid. Padding cells carry `date: null`, so
 * every month renders at the same height.
 */
export function buildMonthGrid(month: Date, firstWeekday: number): CalendarCell[] {
  const weekStart = assertFirstWeekday(firstWeekday)
  const year = month.getFullYear()
  const monthIndex = month.getMonth()
  const leading = countLeadingPadding(month, weekStart)
  const days = daysInMonth(year, monthIndex)

  return Array.from({ length: GRID_CELL_COUNT }, (_, index) => {
    const dayNumber = index - leading + 1
    if (dayNumber < 1 || dayNumber > days) {
      return { index, date: null }
    }
    return { index, date: new Date(year, monthIndex, dayNumber) }
  })
}

export function getWeekdayLabels(firstWeekday: number): string[] {
  const offset = assertFirstWeekday(firstWeekday) - 1
  return Array.from({ length: GRID_COLUMNS }, (_, column) => WEEKDAY_LABELS[(offset + column) % GRID_COLUMNS])
}

export function collectDatedIndices(cells: readonly CalendarCell[]): Set<number> {
  const indices = new Set<number>()
  for (const cell of cells) {
    if (cell.date) {
      indices.add(cell.index)
    }
  }
  return indices
}

// Interior cells leave top/leading to the neighbour's bottom/trailing so
// shared borders are drawn once.
export function resolveEdges(cellIndex: number, datedIndices: ReadonlySet<number>): EdgeSet {
  if (!datedIndices.has(cellIndex)) {
    return NO_EDGES
  }

  const edges = new Set<CellEdge>(['trailing', 'bottom'])
  const isFirstRow = cellIndex < GRID_COLUMNS
  const isFirstColumn = cellIndex % GRID_COLUMNS === 0

  if (isFirstRow || !datedIndices.has(cellIndex - GRID_COLUMNS)) {
    edges.add('top')
  }
  if (isFirstColumn || !datedIndices.has(cellIndex - 1)) {
    edges.add('leading')
  }
  return edges
}
